import path from "node:path";
import { Err, Ok, type Logger, type Result } from "@phpscope/core";

import { InvalidParameterError, NotFoundError } from "../errors.js";
import { sameClass } from "../model.js";
import type { FileSystem } from "../ports/FileSystem.js";
import type { SourceScanner } from "../ports/SourceScanner.js";
import type { ClassDescriptor } from "./ClassDescriptor.js";
import type { ClassRepository } from "./ClassRepository.js";

export interface DiscoverRequest {
  /** Directory relative to the project root */
  path: string;
  /** Fully-qualified trait the class uses directly */
  hasTrait?: string;
  /** Fully-qualified interface the class implements, inherited ones included */
  hasInterface?: string;
  hasMethod?: string;
  /** When false, only files directly inside `path` */
  recursive?: boolean;
  /** 0 means unlimited */
  limit?: number;
  offset?: number;
}

export interface DiscoveryOptions {
  projectRoot: string;
  fs: FileSystem;
  scanner: SourceScanner;
  repository: ClassRepository;
  logger?: Logger;
}

type ClassFilter = (descriptor: ClassDescriptor) => boolean;

/**
 * Enumerates class-likes under a directory and narrows them by structure.
 */
export class ClassDiscovery {
  constructor(private readonly options: DiscoveryOptions) {}

  async discover(request: DiscoverRequest): Promise<Result<ClassDescriptor[], NotFoundError | InvalidParameterError>> {
    const limit = request.limit ?? 0;
    const offset = request.offset ?? 0;
    if (!Number.isInteger(limit) || limit < 0 || !Number.isInteger(offset) || offset < 0) {
      return Err(new InvalidParameterError("limit and offset must be non-negative integers"));
    }

    const directory = path.resolve(this.options.projectRoot, request.path);
    const stats = this.options.fs.stats(directory);
    if (!stats.ok || !stats.value.isDirectory) {
      return Err(new NotFoundError(`Directory not found: ${request.path}`));
    }

    const listed = this.options.scanner.scan(directory);
    if (!listed.ok) {
      return Err(new NotFoundError(`Cannot list ${request.path}: ${listed.error.message}`));
    }

    const recursive = request.recursive ?? true;
    const files = recursive ? listed.value : listed.value.filter((file) => path.dirname(file) === directory);

    const classes: ClassDescriptor[] = [];
    for (const file of files) {
      const declarations = await this.options.repository.declarationsIn(file);
      if (!declarations.ok) {
        this.options.logger?.debug(`Skipping ${file}: ${declarations.error.message}`);
        continue;
      }
      for (const declaration of declarations.value) {
        classes.push(await this.options.repository.describe(declaration));
      }
    }

    if (classes.length === 0) {
      return Err(new NotFoundError("No classes found in the specified path."));
    }

    const filters = buildFilters(request);
    const matched = classes.filter((descriptor) => filters.every((filter) => filter(descriptor)));
    if (matched.length === 0) {
      return Err(new NotFoundError(`No classes in ${request.path} match the given filters (${classes.length} classes scanned).`));
    }

    const page = limit > 0 ? matched.slice(offset, offset + limit) : matched.slice(offset);
    if (page.length === 0) {
      return Err(new NotFoundError(`No classes found at offset ${offset} (${matched.length} classes matched).`));
    }

    return Ok(page);
  }
}

function buildFilters(request: DiscoverRequest): ClassFilter[] {
  const filters: ClassFilter[] = [];

  const { hasTrait, hasInterface, hasMethod } = request;
  if (hasTrait) {
    filters.push((d) => d.traits.some((trait) => sameClass(trait, hasTrait)));
  }
  if (hasInterface) {
    filters.push((d) => d.interfaces.some((iface) => sameClass(iface, hasInterface)));
  }
  if (hasMethod) {
    filters.push((d) => d.hasMethod(hasMethod));
  }

  return filters;
}
