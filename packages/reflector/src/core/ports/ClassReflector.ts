import type { Result } from "@phpscope/core";

import type { ClassDeclaration } from "../model.js";

/**
 * Port for extracting class-like declarations from a source file.
 */
export interface ClassReflector {
  /**
   * Every class, interface, trait and enum declared in the file, in source order.
   *
   * @param filePath - Absolute path of a PHP file
   * @param source - File contents
   */
  reflect(filePath: string, source: string): Promise<Result<ClassDeclaration[], Error>>;
}
