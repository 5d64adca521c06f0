import { sameClass, type NamespaceContext, type TokenKind, type UsageMatch, type UsageType } from "../model.js";
import { resolveName } from "../namespace/NamespaceResolver.js";
import type { NameSpan, TokenStream } from "../TokenStream.js";

export interface DetectionContext {
  /** Fully-qualified target class, leading `\` removed */
  target: string;
  namespace: NamespaceContext;
  /** Indices of `use` tokens that import traits */
  mixinUses: ReadonlySet<number>;
}

export interface Detection {
  matches: UsageMatch[];
  /** Index the pass continues from; anything at or below the trigger means "next token" */
  resumeAt: number;
}

/**
 * One syntactic usage pattern. A detector is invoked for every token whose
 * kind is in `triggers` and never fails: a construct it cannot read yields no
 * matches.
 */
export interface UsageDetector {
  readonly name: string;
  readonly usageType: UsageType;
  readonly triggers: ReadonlySet<TokenKind>;
  detect(stream: TokenStream, index: number, context: DetectionContext): Detection;
}

export function noMatch(resumeAt: number): Detection {
  return { matches: [], resumeAt };
}

/**
 * Resolve a written name in the file's namespace and compare it with the target.
 */
export function refersToTarget(name: NameSpan | string, context: DetectionContext): boolean {
  const written = typeof name === "string" ? name : name.text;
  return sameClass(resolveName(written, context.namespace), context.target);
}

/**
 * Run each detector over the stream in its own pass; matches are
 * concatenated in detector order.
 */
export function runDetectors(
  stream: TokenStream,
  detectors: readonly UsageDetector[],
  context: DetectionContext
): UsageMatch[] {
  const matches: UsageMatch[] = [];

  for (const detector of detectors) {
    let i = 0;
    while (i < stream.length) {
      const kind = stream.kindAt(i);
      if (kind === undefined || !detector.triggers.has(kind)) {
        i++;
        continue;
      }
      const detection = detector.detect(stream, i, context);
      matches.push(...detection.matches);
      i = Math.max(detection.resumeAt, i + 1);
    }
  }

  return matches;
}

/**
 * Read a comma-separated name list starting at `from` until `isEnd` holds.
 * Unexpected tokens are skipped.
 *
 * @returns The names and the index where the list stopped
 */
export function readNameList(
  stream: TokenStream,
  from: number,
  isEnd: (index: number) => boolean
): { names: NameSpan[]; end: number } {
  const names: NameSpan[] = [];
  let i = from;

  while (i < stream.length && !isEnd(i)) {
    const name = stream.nameAt(i);
    if (name) {
      names.push(name);
      i = name.end;
    } else {
      i++;
    }
  }

  return { names, end: i };
}

/**
 * Header of a `function`/`fn` declaration or closure: the parameter list bounds.
 * Only trivia, `&` and a single name may sit between the keyword and `(`.
 */
export function readFunctionHeader(
  stream: TokenStream,
  keywordIndex: number
): { open: number; close: number } | undefined {
  let i = stream.skipForward(keywordIndex + 1);
  if (stream.isPunct(i, "&")) i = stream.skipForward(i + 1);

  const token = stream.at(i);
  if (token !== undefined && token.kind !== "punct") {
    // Method names may be any identifier-like token, keywords included
    if (stream.isNamePart(i) && token.kind !== "name") return undefined;
    i = stream.skipForward(i + 1);
  }

  if (!stream.isPunct(i, "(")) return undefined;
  const close = stream.matchingParen(i);
  if (close < 0) return undefined;
  return { open: i, close };
}

export interface TypedVariable {
  /** Every named member of the type: `A|B $x` has two */
  members: NameSpan[];
  variable: number;
}

/**
 * A type declaration at `at` followed by a variable: `User $u`, `A|B $x`,
 * `Foo &$ref`, `Bar ...$rest`.
 */
export function readTypedVariable(stream: TokenStream, at: number): TypedVariable | undefined {
  const first = stream.nameAt(at);
  if (!first) return undefined;

  const members: NameSpan[] = [first];
  let i = stream.skipForward(first.end);

  for (;;) {
    if (stream.isPunct(i, "|") || stream.isPunct(i, "&")) {
      const next = stream.skipForward(i + 1);
      const member = stream.nameAt(next);
      if (member) {
        members.push(member);
        i = stream.skipForward(member.end);
      } else {
        i = next;
      }
      continue;
    }
    if (stream.kindAt(i) === "ellipsis") {
      i = stream.skipForward(i + 1);
      continue;
    }
    break;
  }

  if (stream.kindAt(i) !== "variable") return undefined;
  return { members, variable: i };
}
