import fs from "node:fs";
import path from "node:path";
import { Err, Ok, toError, type Logger, type Result } from "@phpscope/core";

import type { ScanOptions, SourceScanner } from "../../core/ports/SourceScanner.js";

const PHP_EXTENSION = ".php";

export interface NodeSourceScannerOptions {
  /** Reads one directory; defaults to `fs.readdirSync` with file types */
  readDirectory?: (directory: string) => fs.Dirent[];
  logger?: Logger;
}

/**
 * Node.js implementation of SourceScanner.
 * Recursively lists `.php` files, skipping excluded directory names.
 * A subdirectory that cannot be read is left out of the listing; only an
 * unreadable root fails the scan.
 */
export class NodeSourceScanner implements SourceScanner {
  private readonly readDirectory: (directory: string) => fs.Dirent[];

  constructor(private readonly options: NodeSourceScannerOptions = {}) {
    this.readDirectory = options.readDirectory ?? ((directory) => fs.readdirSync(directory, { withFileTypes: true }));
  }

  scan(rootPath: string, options: ScanOptions = {}): Result<string[], Error> {
    try {
      const files: string[] = [];
      const excluded = new Set(options.excludeDirs ?? []);
      this.scanDirectory(path.resolve(rootPath), excluded, files);
      return Ok(files.sort());
    } catch (error) {
      return Err(toError(error));
    }
  }

  private scanDirectory(currentPath: string, excluded: ReadonlySet<string>, results: string[]): void {
    const entries = this.readDirectory(currentPath);

    for (const entry of entries) {
      const fullPath = path.join(currentPath, entry.name);

      if (entry.isDirectory()) {
        if (excluded.has(entry.name)) continue;
        try {
          this.scanDirectory(fullPath, excluded, results);
        } catch (error) {
          this.options.logger?.warn(`Skipping unreadable directory ${fullPath}: ${toError(error).message}`);
        }
      } else if (entry.isFile() && path.extname(entry.name) === PHP_EXTENSION) {
        results.push(fullPath);
      }
    }
  }
}
