import type { Token, TokenKind } from "./model.js";

const TRIVIA: ReadonlySet<TokenKind> = new Set<TokenKind>(["whitespace", "comment", "doc_comment"]);

const NAME_PARTS: ReadonlySet<TokenKind> = new Set<TokenKind>(["name", "ns_separator"]);

/** A contiguous class name spelled across one or more tokens. */
export interface NameSpan {
  text: string;
  /** Index of the first token */
  start: number;
  /** Index one past the last token */
  end: number;
}

/**
 * Random-access view over one file's tokens, shared read-only by every detector.
 */
export class TokenStream {
  constructor(private readonly tokens: readonly Token[]) {}

  get length(): number {
    return this.tokens.length;
  }

  at(index: number): Token | undefined {
    return this.tokens[index];
  }

  kindAt(index: number): TokenKind | undefined {
    return this.tokens[index]?.kind;
  }

  isTrivia(index: number): boolean {
    const token = this.tokens[index];
    return token !== undefined && TRIVIA.has(token.kind);
  }

  isNamePart(index: number): boolean {
    const token = this.tokens[index];
    return token !== undefined && NAME_PARTS.has(token.kind);
  }

  isPunct(index: number, text: string): boolean {
    const token = this.tokens[index];
    return token !== undefined && token.kind === "punct" && token.text === text;
  }

  /** `{`, including the `${` that opens string interpolation. */
  isOpenBrace(index: number): boolean {
    return this.isPunct(index, "{") || this.isPunct(index, "${");
  }

  isCloseBrace(index: number): boolean {
    return this.isPunct(index, "}");
  }

  /**
   * First non-trivia index at or after `index`; `length` when none.
   */
  skipForward(index: number): number {
    let i = Math.max(index, 0);
    while (i < this.tokens.length && this.isTrivia(i)) i++;
    return i;
  }

  /**
   * Last non-trivia index at or before `index`; -1 when none.
   */
  skipBackward(index: number): number {
    let i = Math.min(index, this.tokens.length - 1);
    while (i >= 0 && this.isTrivia(i)) i--;
    return i;
  }

  /**
   * Name whose first token sits at `index`. Trivia ends the name.
   */
  nameAt(index: number): NameSpan | undefined {
    let end = index;
    while (this.isNamePart(end)) end++;
    if (end === index) return undefined;
    return this.span(index, end);
  }

  /**
   * Name whose last token sits at `index`, collected backward.
   */
  nameEndingAt(index: number): NameSpan | undefined {
    let start = index;
    while (start >= 0 && this.isNamePart(start)) start--;
    start++;
    if (start > index) return undefined;
    return this.span(start, index + 1);
  }

  /**
   * Concatenated source text of tokens `[start, end)`.
   */
  text(start: number, end: number): string {
    let out = "";
    for (let i = Math.max(start, 0); i < Math.min(end, this.tokens.length); i++) {
      out += this.tokens[i]?.text ?? "";
    }
    return out;
  }

  /**
   * Index of the `)` closing the `(` at `open`; -1 when unbalanced.
   */
  matchingParen(open: number): number {
    if (!this.isPunct(open, "(")) return -1;
    let depth = 0;
    for (let i = open; i < this.tokens.length; i++) {
      if (this.isPunct(i, "(")) depth++;
      else if (this.isPunct(i, ")")) {
        depth--;
        if (depth === 0) return i;
      }
    }
    return -1;
  }

  private span(start: number, end: number): NameSpan | undefined {
    const text = this.text(start, end);
    // A lone separator is not a name
    if (text.replace(/\\/g, "") === "") return undefined;
    return { text, start, end };
  }
}
