import Parser from "tree-sitter";

// Tree-sitter language type (uses any in the typings)
type TreeSitterLanguage = unknown;

let grammar: Promise<TreeSitterLanguage> | undefined;

/**
 * The tree-sitter-php grammar, imported once per process.
 */
export function loadPhpGrammar(): Promise<TreeSitterLanguage> {
  if (!grammar) {
    grammar = import("tree-sitter-php").then((mod) => mod.default.php);
  }
  return grammar;
}

/**
 * A parser bound to the PHP grammar.
 */
export async function createPhpParser(): Promise<Parser> {
  const parser = new Parser();
  parser.setLanguage(await loadPhpGrammar());
  return parser;
}

/**
 * Parse a whole file. The buffer is sized to the source: the binding rejects
 * inputs larger than its default 32 KiB buffer.
 */
export function parseSource(parser: Parser, source: string): Parser.Tree {
  return parser.parse(source, undefined, { bufferSize: Math.max(32 * 1024, source.length * 2 + 1) });
}
