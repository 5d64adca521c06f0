import type { Result } from "@phpscope/core";

export interface FileStats {
  mtime: number;
  size: number;
  isDirectory: boolean;
}

/**
 * Port for read-only file system access.
 */
export interface FileSystem {
  /**
   * Read file contents as string.
   */
  read(filePath: string): Result<string, Error>;

  /**
   * Check if a file or directory exists.
   */
  exists(filePath: string): boolean;

  /**
   * Get file stats (for cache invalidation).
   */
  stats(filePath: string): Result<FileStats, Error>;
}
