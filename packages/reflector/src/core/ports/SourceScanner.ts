import type { Result } from "@phpscope/core";

export interface ScanOptions {
  /** Directory names skipped wherever they occur */
  excludeDirs?: string[];
}

/**
 * Port for enumerating PHP sources under a directory.
 */
export interface SourceScanner {
  /**
   * Recursively list `.php` files below `rootPath`.
   *
   * @returns Absolute paths in sorted order
   */
  scan(rootPath: string, options?: ScanOptions): Result<string[], Error>;
}
