import { Err, Ok, type Result } from "@phpscope/core";
import type Parser from "tree-sitter";

import type { ClassDeclaration } from "../../core/model.js";
import { buildAliasMap } from "../../core/namespace/NamespaceResolver.js";
import type { ClassReflector } from "../../core/ports/ClassReflector.js";
import { TokenStream } from "../../core/TokenStream.js";
import { extractClasses } from "./ClassExtractor.js";
import { createPhpParser, parseSource } from "./phpGrammar.js";
import { collectTokens } from "./TreeSitterTokenizer.js";

/**
 * Tree-sitter based class reflector.
 *
 * One parse per file serves both the declaration walk and the token stream the
 * alias map is built from, so names resolve exactly as the usage scanner
 * resolves them.
 */
export class TreeSitterReflector implements ClassReflector {
  private parser: Promise<Parser> | undefined;

  async reflect(filePath: string, source: string): Promise<Result<ClassDeclaration[], Error>> {
    try {
      const parser = await this.getParser();
      const tree = parseSource(parser, source);
      const aliases = buildAliasMap(new TokenStream(collectTokens(tree.rootNode, source)));
      return Ok(extractClasses(tree.rootNode, { file: filePath, aliases }));
    } catch (error) {
      return Err(error instanceof Error ? error : new Error(String(error)));
    }
  }

  private getParser(): Promise<Parser> {
    if (!this.parser) {
      this.parser = createPhpParser();
    }
    return this.parser;
  }
}
