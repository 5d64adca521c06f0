/**
 * Lexical name resolution for one file: the declared namespace, the alias map
 * built from top-level `use` imports, and the rule that turns a written class
 * name into a fully-qualified one.
 */

import { NAMESPACE_SEPARATOR, shortName, stripRoot, type NamespaceContext, type TokenKind } from "../model.js";
import type { TokenStream } from "../TokenStream.js";
import { parseUseStatement } from "./UseStatement.js";

/** How far back a `use` looks for a class-opening keyword. */
export const MIXIN_LOOKBACK = 20;

const CLASS_OPENERS: ReadonlySet<TokenKind> = new Set<TokenKind>(["class", "trait", "enum"]);

/**
 * Namespace declared by the first `namespace` statement, "" when there is none.
 */
export function getNamespace(stream: TokenStream): string {
  for (let i = 0; i < stream.length; i++) {
    if (stream.kindAt(i) !== "namespace") continue;

    const start = stream.skipForward(i + 1);
    // `namespace\Foo` is a relative name, not a declaration
    if (stream.kindAt(start) === "ns_separator") continue;

    let name = "";
    let j = start;
    while (j < stream.length && !stream.isPunct(j, ";") && !stream.isOpenBrace(j)) {
      if (stream.isNamePart(j)) {
        name += stream.at(j)?.text ?? "";
      } else if (!stream.isTrivia(j)) {
        break;
      }
      j++;
    }
    return stripRoot(name);
  }
  return "";
}

/**
 * Indices of `use` tokens that import traits into a class body rather than
 * names into the file.
 *
 * A `use` counts as a trait import when, walking back at most
 * {@link MIXIN_LOOKBACK} tokens, a `class`, `trait` or `enum` keyword is met
 * before a `;` or a `namespace` keyword; or when it sits directly inside a
 * class-like body.
 */
export function findMixinUses(stream: TokenStream): Set<number> {
  const mixins = new Set<number>();
  const bodies: number[] = [];
  let depth = 0;
  let pendingBody = false;

  for (let i = 0; i < stream.length; i++) {
    const kind = stream.kindAt(i);

    if (kind !== undefined && CLASS_OPENERS.has(kind)) {
      // `Foo::class` names a class, it does not open one
      if (stream.kindAt(stream.skipBackward(i - 1)) !== "double_colon") pendingBody = true;
    } else if (stream.isOpenBrace(i)) {
      depth++;
      if (pendingBody) {
        bodies.push(depth);
        pendingBody = false;
      }
    } else if (stream.isCloseBrace(i)) {
      if (bodies[bodies.length - 1] === depth) bodies.pop();
      depth--;
    } else if (stream.isPunct(i, ";")) {
      pendingBody = false;
    } else if (kind === "use") {
      if (bodies[bodies.length - 1] === depth || lookbackFindsClass(stream, i)) {
        mixins.add(i);
      }
    }
  }

  return mixins;
}

function lookbackFindsClass(stream: TokenStream, useIndex: number): boolean {
  for (let j = useIndex - 1; j >= Math.max(0, useIndex - MIXIN_LOOKBACK); j--) {
    const kind = stream.kindAt(j);
    if (kind !== undefined && CLASS_OPENERS.has(kind)) return true;
    if (kind === "namespace" || stream.isPunct(j, ";")) return false;
  }
  return false;
}

/**
 * Alias map from every top-level class import: alias, or last segment, to the
 * imported name. Later imports overwrite earlier ones.
 */
export function buildAliasMap(stream: TokenStream, mixinUses: ReadonlySet<number> = findMixinUses(stream)): Map<string, string> {
  const aliases = new Map<string, string>();

  for (let i = 0; i < stream.length; i++) {
    if (stream.kindAt(i) !== "use" || mixinUses.has(i)) continue;

    const statement = parseUseStatement(stream, i);
    if (!statement || statement.kind !== "class") continue;

    for (const item of statement.items) {
      aliases.set(item.alias ?? shortName(item.name), item.name);
    }
  }

  return aliases;
}

/**
 * Namespace and alias map in one pass over the file.
 */
export function buildNamespaceContext(stream: TokenStream, mixinUses?: ReadonlySet<number>): NamespaceContext {
  return {
    namespace: getNamespace(stream),
    aliases: buildAliasMap(stream, mixinUses),
  };
}

/**
 * Resolve a class name as written to its fully-qualified form.
 *
 * `\A\B` is already qualified; an exact alias key maps to its import; anything
 * else is taken relative to the current namespace.
 */
export function resolveName(name: string, context: NamespaceContext): string {
  if (name.startsWith(NAMESPACE_SEPARATOR)) {
    return stripRoot(name);
  }

  const imported = context.aliases.get(name);
  if (imported !== undefined) {
    return imported;
  }

  if (context.namespace !== "") {
    return `${context.namespace}${NAMESPACE_SEPARATOR}${name}`;
  }

  return name;
}
