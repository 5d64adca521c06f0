import { Err, Ok, type Result } from "@phpscope/core";
import type Parser from "tree-sitter";

import { MalformedInputError } from "../../core/errors.js";
import type { Token, TokenKind } from "../../core/model.js";
import type { Tokenizer } from "../../core/ports/Tokenizer.js";
import { createPhpParser, parseSource } from "./phpGrammar.js";

const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ["namespace", "namespace"],
  ["use", "use"],
  ["as", "as"],
  ["new", "new"],
  ["extends", "extends"],
  ["implements", "implements"],
  ["class", "class"],
  ["trait", "trait"],
  ["interface", "interface"],
  ["enum", "enum"],
  ["function", "function"],
  ["fn", "fn"],
  ["const", "const"],
  ["public", "public"],
  ["protected", "protected"],
  ["private", "private"],
  ["static", "static"],
  ["readonly", "readonly"],
  ["abstract", "abstract"],
  ["final", "final"],
  ["var", "var"],
]);

const LEAF_KINDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ["name", "name"],
  ["\\", "ns_separator"],
  ["::", "double_colon"],
  ["...", "ellipsis"],
  ["php_tag", "open_tag"],
  ["?>", "close_tag"],
  ["text", "inline_html"],
]);

/** Nodes read as one token although the grammar gives them children. */
const ATOMIC = new Set(["variable_name", "comment"]);

const PUNCTUATION = /^[^\w\s]+$/;

function classify(node: Parser.SyntaxNode): TokenKind {
  if (node.type === "variable_name") return "variable";
  if (node.type === "comment") return node.text.startsWith("/**") ? "doc_comment" : "comment";

  const leaf = LEAF_KINDS.get(node.type);
  if (leaf) return leaf;

  const keyword = KEYWORDS.get(node.type);
  if (keyword) return keyword;

  // Anonymous tokens are typed by their own text
  if (node.type === node.text && PUNCTUATION.test(node.text)) return "punct";
  return "other";
}

/**
 * Flatten a parse tree into tokens: leaves in source order, gaps as whitespace.
 */
export function collectTokens(root: Parser.SyntaxNode, source: string): Token[] {
  const tokens: Token[] = [];
  let offset = 0;
  let line = 1;

  const push = (kind: TokenKind, text: string): void => {
    tokens.push({ kind, text, line });
    for (const ch of text) {
      if (ch === "\n") line++;
    }
  };

  const stack: Parser.SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (node.childCount > 0 && !ATOMIC.has(node.type)) {
      const children = node.children;
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];
        if (child) stack.push(child);
      }
      continue;
    }

    // Zero-width nodes are inserted by error recovery
    if (node.endIndex <= node.startIndex || node.startIndex < offset) continue;

    if (node.startIndex > offset) {
      push("whitespace", source.slice(offset, node.startIndex));
    }
    push(classify(node), source.slice(node.startIndex, node.endIndex));
    offset = node.endIndex;
  }

  if (offset < source.length) {
    push("whitespace", source.slice(offset));
  }

  return tokens;
}

/**
 * Tokenizer over tree-sitter-php: the parse tree's leaves in source order,
 * with the gaps between them as whitespace tokens.
 */
export class TreeSitterTokenizer implements Tokenizer {
  private parser: Promise<Parser> | undefined;

  async tokenize(source: string): Promise<Result<Token[], MalformedInputError>> {
    let tree: Parser.Tree;
    try {
      const parser = await this.getParser();
      tree = parseSource(parser, source);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return Err(new MalformedInputError(`Cannot tokenize source: ${message}`));
    }

    return Ok(collectTokens(tree.rootNode, source));
  }

  private getParser(): Promise<Parser> {
    if (!this.parser) {
      this.parser = createPhpParser();
    }
    return this.parser;
  }
}
