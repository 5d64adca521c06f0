/**
 * Port for mapping a fully-qualified class name to the files that may declare it.
 */
export interface ClassLocator {
  /**
   * Candidate absolute paths, most specific autoload prefix first. Paths are
   * not checked for existence.
   */
  candidates(fqn: string): string[];
}
