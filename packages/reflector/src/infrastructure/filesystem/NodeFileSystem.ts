import fs from "node:fs";
import path from "node:path";
import { Err, Ok, toError, type Result } from "@phpscope/core";

import type { FileStats, FileSystem } from "../../core/ports/FileSystem.js";

/**
 * Node.js implementation of the FileSystem port.
 * Relative paths resolve against the project root.
 */
export class NodeFileSystem implements FileSystem {
  private readonly basePath: string;

  constructor(basePath?: string) {
    this.basePath = basePath ?? process.cwd();
  }

  private resolvePath(filePath: string): string {
    if (path.isAbsolute(filePath)) {
      return filePath;
    }
    return path.resolve(this.basePath, filePath);
  }

  read(filePath: string): Result<string, Error> {
    try {
      return Ok(fs.readFileSync(this.resolvePath(filePath), "utf-8"));
    } catch (error) {
      return Err(toError(error));
    }
  }

  exists(filePath: string): boolean {
    return fs.existsSync(this.resolvePath(filePath));
  }

  stats(filePath: string): Result<FileStats, Error> {
    try {
      const stat = fs.statSync(this.resolvePath(filePath));
      return Ok({
        mtime: stat.mtimeMs,
        size: stat.size,
        isDirectory: stat.isDirectory(),
      });
    } catch (error) {
      return Err(toError(error));
    }
  }
}
