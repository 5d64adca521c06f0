/**
 * Finds every syntactic usage of one class across a directory of PHP sources.
 */

import path from "node:path";
import { Err, Ok, type Logger, type Result } from "@phpscope/core";

import { selectDetectors } from "../detectors/registry.js";
import { runDetectors, type DetectionContext } from "../detectors/Detector.js";
import { InvalidParameterError, MalformedInputError, NotFoundError, type ScanError } from "../errors.js";
import {
  SORT_KEYS,
  isUsageType,
  shortName,
  stripRoot,
  type FindUsagesRequest,
  type ScanStatistics,
  type SortKey,
  type UsageListing,
  type UsageMatch,
  type UsageRecord,
  type UsageScanReport,
  type UsageType,
} from "../model.js";
import { buildNamespaceContext, findMixinUses } from "../namespace/NamespaceResolver.js";
import type { FileSystem } from "../ports/FileSystem.js";
import type { SourceScanner } from "../ports/SourceScanner.js";
import type { Tokenizer } from "../ports/Tokenizer.js";
import { TokenStream } from "../TokenStream.js";
import { VendorResultCache } from "./VendorResultCache.js";

export interface UsageScannerOptions {
  /** Base of every request path and of reported file paths */
  projectRoot: string;
  vendorDir: string;
  fs: FileSystem;
  scanner: SourceScanner;
  tokenizer: Tokenizer;
  vendorCache: VendorResultCache;
  logger?: Logger;
  /** Clock for scan timing */
  now?: () => number;
}

interface ValidRequest {
  target: string;
  path: string;
  usageTypes: UsageType[];
  excludeVendor: boolean;
  flushCache: boolean;
  sortBy: SortKey;
  groupByType: boolean;
  limit: number;
  offset: number;
}

type FileOutcome = { kind: "skipped" } | { kind: "unreadable" } | { kind: "scanned"; matches: UsageMatch[] };

export class UsageScanner {
  private readonly now: () => number;

  constructor(private readonly options: UsageScannerOptions) {
    this.now = options.now ?? Date.now;
  }

  async findUsages(request: FindUsagesRequest): Promise<Result<UsageScanReport, ScanError>> {
    const validated = validate(request);
    if (!validated.ok) return validated;
    const req = validated.value;

    const started = this.now();

    if (req.flushCache) {
      this.options.vendorCache.flush();
    }

    const directory = path.resolve(this.options.projectRoot, req.path);
    const stats = this.options.fs.stats(directory);
    if (!stats.ok || !stats.value.isDirectory) {
      return Err(new NotFoundError(`Directory not found: ${req.path}`));
    }

    const listed = this.options.scanner.scan(directory, {
      excludeDirs: req.excludeVendor ? [this.options.vendorDir] : [],
    });
    if (!listed.ok) {
      return Err(new MalformedInputError(`Cannot list ${req.path}: ${listed.error.message}`));
    }
    const files = listed.value;

    const usages: UsageRecord[] = [];
    let filesMatched = 0;
    let unreadable = 0;

    // Files are processed one at a time: order of results follows discovery order
    for (const file of files) {
      const outcome = await this.scanFile(file, req);
      if (outcome.kind === "unreadable") {
        unreadable++;
        continue;
      }
      if (outcome.kind === "skipped" || outcome.matches.length === 0) continue;

      filesMatched++;
      const relative = this.relativePath(file);
      for (const match of outcome.matches) {
        usages.push({ file: relative, ...match });
      }
    }

    if (files.length > 0 && unreadable === files.length) {
      return Err(new MalformedInputError(`None of the ${files.length} files under ${req.path} could be read`));
    }

    const sorted = sortUsages(usages, req.sortBy);
    const page = req.limit > 0 ? sorted.slice(req.offset, req.offset + req.limit) : sorted.slice(req.offset);
    const listing: UsageListing = req.groupByType
      ? { grouped: true, usagesByType: groupByType(page) }
      : { grouped: false, usages: page };

    return Ok({
      target: request.target,
      totalUsages: sorted.length,
      scanStats: {
        filesScanned: files.length,
        filesMatched,
        scanTimeMs: Math.max(0, Math.round(this.now() - started)),
      },
      statistics: buildStatistics(sorted),
      listing,
    });
  }

  private async scanFile(file: string, req: ValidRequest): Promise<FileOutcome> {
    const content = this.options.fs.read(file);
    if (!content.ok) {
      this.options.logger?.debug(`Skipping unreadable ${file}: ${content.error.message}`);
      return { kind: "unreadable" };
    }

    if (!content.value.includes(shortName(req.target))) {
      return { kind: "skipped" };
    }

    if (!this.isVendorFile(file)) {
      return this.analyze(file, content.value, req);
    }

    const key = VendorResultCache.keyFor({
      filePath: file,
      content: content.value,
      target: req.target,
      usageTypes: req.usageTypes,
    });
    const cached = this.options.vendorCache.get(key);
    if (cached) {
      return { kind: "scanned", matches: cached };
    }

    const outcome = await this.analyze(file, content.value, req);
    if (outcome.kind === "scanned") {
      this.options.vendorCache.set(key, outcome.matches);
    }
    return outcome;
  }

  private async analyze(file: string, source: string, req: ValidRequest): Promise<FileOutcome> {
    const tokens = await this.options.tokenizer.tokenize(source);
    if (!tokens.ok) {
      this.options.logger?.debug(`Skipping malformed ${file}: ${tokens.error.message}`);
      return { kind: "unreadable" };
    }

    const stream = new TokenStream(tokens.value);
    const mixinUses = findMixinUses(stream);
    const context: DetectionContext = {
      target: req.target,
      namespace: buildNamespaceContext(stream, mixinUses),
      mixinUses,
    };

    return { kind: "scanned", matches: runDetectors(stream, selectDetectors(req.usageTypes), context) };
  }

  private isVendorFile(file: string): boolean {
    return path.relative(this.options.projectRoot, file).split(path.sep).includes(this.options.vendorDir);
  }

  private relativePath(file: string): string {
    return path.relative(this.options.projectRoot, file).split(path.sep).join("/");
  }
}

function validate(request: FindUsagesRequest): Result<ValidRequest, InvalidParameterError> {
  const target = stripRoot(request.target.trim());
  if (target === "") {
    return Err(new InvalidParameterError("Target class is required"));
  }

  const limit = request.limit ?? 0;
  const offset = request.offset ?? 0;
  if (!Number.isInteger(limit) || limit < 0) {
    return Err(new InvalidParameterError(`limit must be a non-negative integer, got ${limit}`));
  }
  if (!Number.isInteger(offset) || offset < 0) {
    return Err(new InvalidParameterError(`offset must be a non-negative integer, got ${offset}`));
  }

  const usageTypes = request.usageTypes ?? [];
  const unknown = usageTypes.filter((type) => !isUsageType(type));
  if (unknown.length > 0) {
    return Err(new InvalidParameterError(`Unknown usage type: ${unknown.join(", ")}`));
  }

  const sortBy = request.sortBy ?? "line";
  if (!SORT_KEYS.includes(sortBy)) {
    return Err(new InvalidParameterError(`Unknown sort key: ${sortBy}`));
  }

  return Ok({
    target,
    path: request.path,
    usageTypes,
    excludeVendor: request.excludeVendor ?? true,
    flushCache: request.flushCache ?? false,
    sortBy,
    groupByType: request.groupByType ?? false,
    limit,
    offset,
  });
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Stable sort: usages that compare equal keep their discovery order.
 */
export function sortUsages(usages: readonly UsageRecord[], sortBy: SortKey): UsageRecord[] {
  const compare: Record<SortKey, (a: UsageRecord, b: UsageRecord) => number> = {
    line: (a, b) => a.line - b.line,
    file: (a, b) => compareText(a.file, b.file),
    type: (a, b) => compareText(a.usageType, b.usageType),
  };
  return [...usages].sort(compare[sortBy]);
}

/**
 * Counts over the full list. The most used file is the first to reach the
 * highest count.
 */
export function buildStatistics(usages: readonly UsageRecord[]): ScanStatistics {
  const byType: Partial<Record<UsageType, number>> = {};
  const fileCounts = new Map<string, number>();

  for (const usage of usages) {
    byType[usage.usageType] = (byType[usage.usageType] ?? 0) + 1;
    fileCounts.set(usage.file, (fileCounts.get(usage.file) ?? 0) + 1);
  }

  let mostUsedFile: string | null = null;
  let max = 0;
  for (const [file, count] of fileCounts) {
    if (count > max) {
      max = count;
      mostUsedFile = file;
    }
  }

  const byFile = Object.fromEntries(fileCounts);
  return { totalUsages: usages.length, byType, byFile, mostUsedFile };
}

export function groupByType(usages: readonly UsageRecord[]): Partial<Record<UsageType, UsageRecord[]>> {
  const grouped: Partial<Record<UsageType, UsageRecord[]>> = {};
  for (const usage of usages) {
    const group = grouped[usage.usageType] ?? [];
    group.push(usage);
    grouped[usage.usageType] = group;
  }
  return grouped;
}
