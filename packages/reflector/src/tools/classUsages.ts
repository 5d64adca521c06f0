import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import * as z from "zod/v4";
import { jsonResponse, resultToResponse, type ToolErrorContent, type ToolResponse } from "@phpscope/core";

import { isUsageType, type SortKey, type UsageRecord, type UsageScanReport, type UsageType } from "../core/model.js";
import type { UsageScanner } from "../core/services/UsageScanner.js";
import { SortKeySchema, UsageItemSchema, UsageTypeSchema } from "./schemas.js";

interface ClassUsagesInput {
  target: string;
  path?: string;
  usage_types?: UsageType[];
  exclude_vendor?: boolean;
  flush_cache?: boolean;
  limit?: number;
  offset?: number;
  group_by_type?: boolean;
  sort_by?: SortKey;
}

interface UsageItem {
  file: string;
  line: number;
  usage_type: UsageType;
  code: string;
  method?: string;
}

interface ClassUsagesOutput extends Record<string, unknown> {
  target: string;
  type: "class";
  total_usages: number;
  scan_stats: {
    files_scanned: number;
    files_matched: number;
    scan_time_ms: number;
  };
  statistics: {
    by_type: Partial<Record<UsageType, number>>;
    by_file: Record<string, number>;
    most_used_in: string | null;
  };
  usages?: UsageItem[];
  usages_by_type?: Partial<Record<UsageType, UsageItem[]>>;
}

const DEFAULT_LIMIT = 100;

function toItem(usage: UsageRecord): UsageItem {
  const item: UsageItem = {
    file: usage.file,
    line: usage.line,
    usage_type: usage.usageType,
    code: usage.code,
  };
  if (usage.method !== undefined) item.method = usage.method;
  return item;
}

/**
 * Wire shape of a scan report: snake_case keys, usages flat or grouped.
 */
export function formatUsageReport(report: UsageScanReport): ClassUsagesOutput {
  const output: ClassUsagesOutput = {
    target: report.target,
    type: "class",
    total_usages: report.totalUsages,
    scan_stats: {
      files_scanned: report.scanStats.filesScanned,
      files_matched: report.scanStats.filesMatched,
      scan_time_ms: report.scanStats.scanTimeMs,
    },
    statistics: {
      by_type: report.statistics.byType,
      by_file: report.statistics.byFile,
      most_used_in: report.statistics.mostUsedFile,
    },
  };

  if (report.listing.grouped) {
    const grouped: Partial<Record<UsageType, UsageItem[]>> = {};
    for (const [type, usages] of Object.entries(report.listing.usagesByType)) {
      if (usages && isUsageType(type)) grouped[type] = usages.map(toItem);
    }
    output.usages_by_type = grouped;
  } else {
    output.usages = report.listing.usages.map(toItem);
  }

  return output;
}

export function registerClassUsages(server: McpServer, scanner: UsageScanner, defaultPath: string): void {
  server.registerTool(
    "class_usages",
    {
      title: "Class usages",
      description: `Find every place a PHP class is used across a directory.

Detects imports (use statements), instantiations (new), static calls (::),
extends, implements, trait use, and parameter, property and return type hints.
Names are resolved through the file's namespace and use imports, so \`User\`
in a file importing App\\Models\\User matches the target App\\Models\\User.

Matching is exact: a leading backslash is ignored, case is not.
Dependency files are cached per content; pass flush_cache to drop that cache.

Use cases:
- Gauge the blast radius of renaming or changing a class
- Find where a model is instantiated or queried statically
- List classes implementing an interface or using a trait`,
      inputSchema: {
        target: z.string().describe("Fully-qualified class name, e.g. App\\Models\\User"),
        path: z
          .string()
          .optional()
          .describe(`Directory to scan, relative to the project root (default: ${defaultPath})`),
        usage_types: z
          .array(UsageTypeSchema)
          .optional()
          .describe("Usage types to report; empty or omitted means all"),
        exclude_vendor: z.boolean().optional().describe("Skip the vendor directory (default: true)"),
        flush_cache: z.boolean().optional().describe("Drop cached vendor results before scanning (default: false)"),
        limit: z
          .number()
          .int()
          .min(0)
          .optional()
          .describe(`Maximum usages to return, 0 for all (default: ${DEFAULT_LIMIT})`),
        offset: z.number().int().min(0).optional().describe("Usages to skip (default: 0)"),
        group_by_type: z.boolean().optional().describe("Group usages by usage type (default: false)"),
        sort_by: SortKeySchema.optional().describe("Sort by line, file or type (default: line)"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        code: z.string().optional(),
        target: z.string().optional(),
        type: z.literal("class").optional(),
        total_usages: z.number().optional(),
        scan_stats: z
          .object({
            files_scanned: z.number(),
            files_matched: z.number(),
            scan_time_ms: z.number(),
          })
          .optional(),
        statistics: z
          .object({
            by_type: z.record(z.string(), z.number()),
            by_file: z.record(z.string(), z.number()),
            most_used_in: z.string().nullable(),
          })
          .optional(),
        usages: z.array(UsageItemSchema).optional(),
        usages_by_type: z.record(z.string(), z.array(UsageItemSchema)).optional(),
      },
    },
    async (
      input: ClassUsagesInput
    ): Promise<ToolResponse<ClassUsagesOutput & { success: true }> | ToolResponse<ToolErrorContent>> => {
      const result = await scanner.findUsages({
        target: input.target,
        path: input.path ?? defaultPath,
        usageTypes: input.usage_types ?? [],
        excludeVendor: input.exclude_vendor ?? true,
        flushCache: input.flush_cache ?? false,
        sortBy: input.sort_by ?? "line",
        groupByType: input.group_by_type ?? false,
        limit: input.limit ?? DEFAULT_LIMIT,
        offset: input.offset ?? 0,
      });

      return resultToResponse(result, (report) => {
        const output = formatUsageReport(report);
        return jsonResponse(output, output);
      });
    }
  );
}
