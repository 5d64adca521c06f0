import type { TokenStream } from "../TokenStream.js";

export interface ImportedName {
  /** Imported name as written, group prefix applied, leading `\` removed */
  name: string;
  alias: string | null;
}

export interface UseStatement {
  kind: "class" | "function" | "const";
  items: ImportedName[];
  /** Index of the `use` token */
  start: number;
  /** Index of the terminating `;`, or of the last token read when it is missing */
  end: number;
}

/**
 * Parse the top-level `use` statement starting at `useIndex`.
 *
 * Handles comma lists (`use A\B, C\D;`), aliases and group imports
 * (`use App\Models\{User, Post as Article};`). Returns undefined when no name
 * follows, as with a closure's `use ($x)`.
 */
export function parseUseStatement(stream: TokenStream, useIndex: number): UseStatement | undefined {
  let i = stream.skipForward(useIndex + 1);
  let kind: UseStatement["kind"] = "class";
  const next = stream.at(i);
  if (next?.kind === "function" || next?.kind === "const") {
    kind = next.kind === "function" ? "function" : "const";
    i = stream.skipForward(i + 1);
  }

  const items: ImportedName[] = [];
  let last = i;

  while (i < stream.length) {
    const name = stream.nameAt(i);
    if (!name) break;
    i = stream.skipForward(name.end);

    if (name.text.endsWith("\\") && stream.isOpenBrace(i)) {
      const prefix = stripSeparators(name.text);
      i = readGroup(stream, stream.skipForward(i + 1), prefix, items);
      last = i;
      if (stream.isCloseBrace(i)) i = stream.skipForward(i + 1);
    } else {
      const alias = readAlias(stream, i);
      items.push({ name: stripSeparators(name.text), alias: alias?.text ?? null });
      last = alias ? alias.index : name.end - 1;
      if (alias) i = stream.skipForward(alias.index + 1);
    }

    if (stream.isPunct(i, ",")) {
      last = i;
      i = stream.skipForward(i + 1);
      continue;
    }
    break;
  }

  if (items.length === 0) return undefined;
  return { kind, items, start: useIndex, end: stream.isPunct(i, ";") ? i : last };
}

function readGroup(stream: TokenStream, from: number, prefix: string, items: ImportedName[]): number {
  let i = from;
  while (i < stream.length && !stream.isCloseBrace(i)) {
    // Mixed groups may carry `function`/`const` members, which are not classes
    const kind = stream.kindAt(i);
    let skipMember = false;
    if (kind === "function" || kind === "const") {
      skipMember = true;
      i = stream.skipForward(i + 1);
    }

    const name = stream.nameAt(i);
    if (!name) break;
    i = stream.skipForward(name.end);
    const alias = readAlias(stream, i);
    if (alias) i = stream.skipForward(alias.index + 1);

    if (!skipMember) {
      items.push({ name: `${prefix}\\${stripSeparators(name.text)}`, alias: alias?.text ?? null });
    }

    if (!stream.isPunct(i, ",")) break;
    i = stream.skipForward(i + 1);
  }
  return i;
}

function readAlias(stream: TokenStream, index: number): { text: string; index: number } | undefined {
  if (stream.kindAt(index) !== "as") return undefined;
  const aliasIndex = stream.skipForward(index + 1);
  const token = stream.at(aliasIndex);
  if (token?.kind !== "name") return undefined;
  return { text: token.text, index: aliasIndex };
}

function stripSeparators(name: string): string {
  return name.replace(/^\\+/, "").replace(/\\+$/, "");
}
