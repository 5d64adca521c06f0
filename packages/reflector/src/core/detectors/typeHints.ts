/**
 * Type declaration detectors. Parameter and property types are one detector;
 * return types are another, both reporting `type_hint`.
 */

import type { TokenKind, UsageMatch } from "../model.js";
import type { TokenStream } from "../TokenStream.js";
import {
  noMatch,
  readFunctionHeader,
  readTypedVariable,
  refersToTarget,
  type DetectionContext,
  type Detection,
  type UsageDetector,
} from "./Detector.js";

const FUNCTION_KEYWORDS: ReadonlySet<TokenKind> = new Set<TokenKind>(["function", "fn"]);

const VISIBILITY: ReadonlySet<TokenKind> = new Set<TokenKind>(["public", "protected", "private"]);

/** Modifiers that may follow a visibility keyword before the type. */
const PROPERTY_MODIFIERS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  "static",
  "readonly",
  "abstract",
  "final",
  "var",
  "public",
  "protected",
  "private",
]);

const OPENERS = new Set(["(", "[", "{", "${", "#["]);
const CLOSERS = new Set([")", "]", "}"]);

function parameterTypes(stream: TokenStream, index: number, context: DetectionContext): Detection {
  const header = readFunctionHeader(stream, index);
  if (!header) return noMatch(index + 1);

  const matches: UsageMatch[] = [];
  let depth = 0;
  let i = header.open + 1;

  while (i < header.close) {
    const token = stream.at(i);
    if (token?.kind === "punct" && OPENERS.has(token.text)) {
      depth++;
      i++;
      continue;
    }
    if (token?.kind === "punct" && CLOSERS.has(token.text)) {
      depth--;
      i++;
      continue;
    }

    const typed = depth === 0 ? readTypedVariable(stream, i) : undefined;
    if (!typed) {
      // Skip a whole name so a qualified name is not re-read from its middle
      i = stream.nameAt(i)?.end ?? i + 1;
      continue;
    }

    for (const member of typed.members) {
      if (!refersToTarget(member, context)) continue;
      matches.push({
        line: stream.at(member.start)?.line ?? 0,
        usageType: "type_hint",
        code: stream.text(member.start, typed.variable + 1).trim(),
      });
    }
    i = typed.variable + 1;
  }

  return { matches, resumeAt: header.close };
}

function propertyType(stream: TokenStream, index: number, context: DetectionContext): Detection {
  let i = stream.skipForward(index + 1);
  while (true) {
    const kind = stream.kindAt(i);
    if (kind === undefined || !PROPERTY_MODIFIERS.has(kind)) break;
    i = stream.skipForward(i + 1);
  }

  // A method: leave it to the `function` trigger
  if (stream.kindAt(i) === "function") return noMatch(i);

  if (stream.isPunct(i, "?")) i = stream.skipForward(i + 1);

  const typed = readTypedVariable(stream, i);
  if (!typed) return noMatch(i);

  const matches: UsageMatch[] = [];
  for (const member of typed.members) {
    if (!refersToTarget(member, context)) continue;
    matches.push({
      line: stream.at(member.start)?.line ?? 0,
      usageType: "type_hint",
      code: stream.text(index, typed.variable + 1).trim(),
    });
  }
  return { matches, resumeAt: typed.variable + 1 };
}

export const typeHintDetector: UsageDetector = {
  name: "type_hint",
  usageType: "type_hint",
  triggers: new Set<TokenKind>([...FUNCTION_KEYWORDS, ...VISIBILITY]),
  detect(stream, index, context) {
    const kind = stream.kindAt(index);
    if (kind !== undefined && FUNCTION_KEYWORDS.has(kind)) {
      return parameterTypes(stream, index, context);
    }
    return propertyType(stream, index, context);
  },
};

export const returnTypeDetector: UsageDetector = {
  name: "return_type",
  usageType: "type_hint",
  triggers: FUNCTION_KEYWORDS,
  detect(stream, index, context) {
    const header = readFunctionHeader(stream, index);
    if (!header) return noMatch(index + 1);

    // Body and nested closures are scanned from just past the parameter list
    const resumeAt = header.close + 1;
    let i = stream.skipForward(header.close + 1);

    // Closure capture list: function () use ($x): Foo
    if (stream.kindAt(i) === "use") {
      const open = stream.skipForward(i + 1);
      const close = stream.matchingParen(open);
      if (close < 0) return noMatch(resumeAt);
      i = stream.skipForward(close + 1);
    }

    if (!stream.isPunct(i, ":")) return noMatch(resumeAt);
    const colon = i;

    i = stream.skipForward(i + 1);
    if (stream.isPunct(i, "?")) i = stream.skipForward(i + 1);

    const matches: UsageMatch[] = [];
    let member = stream.nameAt(i);
    while (member) {
      if (refersToTarget(member, context)) {
        matches.push({
          line: stream.at(member.start)?.line ?? 0,
          usageType: "type_hint",
          code: stream.text(colon, member.end).trim(),
        });
      }
      const next = stream.skipForward(member.end);
      if (!stream.isPunct(next, "|") && !stream.isPunct(next, "&")) break;
      member = stream.nameAt(stream.skipForward(next + 1));
    }

    return { matches, resumeAt };
  },
};
