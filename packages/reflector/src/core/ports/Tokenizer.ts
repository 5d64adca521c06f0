import type { Result } from "@phpscope/core";

import type { MalformedInputError } from "../errors.js";
import type { Token } from "../model.js";

/**
 * Port for lexing PHP source into a complete token sequence.
 */
export interface Tokenizer {
  /**
   * Tokenize source text. Whitespace and comment tokens are kept, so joining
   * every token's text reproduces the input.
   */
  tokenize(source: string): Promise<Result<Token[], MalformedInputError>>;
}
