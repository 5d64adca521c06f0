/**
 * Docblock parsing: summary, long description and tags.
 */

export interface DocTag {
  name: string;
  /** Everything after the tag name, continuation lines joined by a space */
  body: string;
}

export interface DocBlock {
  summary: string;
  description: string;
  tags: DocTag[];
}

/** Tags with no bearing on the API. */
export const IGNORED_TAGS: ReadonlySet<string> = new Set(["author", "package", "subpackage", "license"]);

const TAG_LINE = /^@([\w-]+(?:[:\\][\w-]+)*)\s*(.*)$/;

/**
 * Strip the comment delimiters and leading asterisks.
 */
function contentLines(raw: string): string[] {
  const body = raw
    .trim()
    .replace(/^\/\*\*+/, "")
    .replace(/\*+\/$/, "");
  return body.split(/\r?\n/).map((line) => line.replace(/^\s*\*?\s?/, "").trimEnd());
}

/**
 * The summary runs to the first blank line or to the first line ending in a
 * period; the description is the rest of the text before the first tag.
 */
export function parseDocBlock(raw: string): DocBlock {
  const lines = contentLines(raw);
  const firstTag = lines.findIndex((line) => line.startsWith("@"));
  const text = firstTag < 0 ? lines : lines.slice(0, firstTag);
  const tagLines = firstTag < 0 ? [] : lines.slice(firstTag);

  while (text.length > 0 && text[0]?.trim() === "") text.shift();

  const summary: string[] = [];
  let i = 0;
  for (; i < text.length; i++) {
    const line = text[i] ?? "";
    if (line.trim() === "") break;
    summary.push(line.trim());
    if (line.endsWith(".")) {
      i++;
      break;
    }
  }

  return {
    summary: summary.join("\n"),
    description: text.slice(i).join("\n").trim(),
    tags: parseTags(tagLines),
  };
}

function parseTags(lines: string[]): DocTag[] {
  const tags: DocTag[] = [];
  for (const line of lines) {
    const match = TAG_LINE.exec(line);
    if (match) {
      tags.push({ name: match[1] ?? "", body: (match[2] ?? "").trim() });
      continue;
    }
    const current = tags[tags.length - 1];
    if (current && line.trim() !== "") {
      current.body = current.body ? `${current.body} ${line.trim()}` : line.trim();
    }
  }
  return tags;
}

export function renderTag(tag: DocTag): string {
  return tag.body ? `@${tag.name} ${tag.body}` : `@${tag.name}`;
}
