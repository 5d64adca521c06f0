/**
 * Detectors for declaration-level usages: imports, inheritance, interface
 * implementation and trait use.
 */

import { sameClass, type TokenKind } from "../model.js";
import { parseUseStatement } from "../namespace/UseStatement.js";
import { noMatch, readNameList, refersToTarget, type UsageDetector } from "./Detector.js";

export const importDetector: UsageDetector = {
  name: "import",
  usageType: "import",
  triggers: new Set<TokenKind>(["use"]),
  detect(stream, index, context) {
    if (context.mixinUses.has(index)) return noMatch(index + 1);

    const statement = parseUseStatement(stream, index);
    if (!statement) return noMatch(index + 1);
    if (statement.kind !== "class") return noMatch(statement.end + 1);

    // Imports are already fully qualified: compared as written
    const imported = statement.items.some((item) => sameClass(item.name, context.target));
    if (!imported) return noMatch(statement.end + 1);

    return {
      matches: [
        {
          line: stream.at(index)?.line ?? 0,
          usageType: "import",
          code: stream.text(index, statement.end + 1).trim(),
        },
      ],
      resumeAt: statement.end + 1,
    };
  },
};

export const extendsDetector: UsageDetector = {
  name: "extends",
  usageType: "extends",
  triggers: new Set<TokenKind>(["extends"]),
  detect(stream, index, context) {
    const name = stream.nameAt(stream.skipForward(index + 1));
    if (!name) return noMatch(index + 1);
    if (!refersToTarget(name, context)) return noMatch(name.end);

    return {
      matches: [
        {
          line: stream.at(index)?.line ?? 0,
          usageType: "extends",
          code: stream.text(index, name.end).trim(),
        },
      ],
      resumeAt: name.end,
    };
  },
};

export const implementsDetector: UsageDetector = {
  name: "implements",
  usageType: "implements",
  triggers: new Set<TokenKind>(["implements"]),
  detect(stream, index, context) {
    const { names, end } = readNameList(
      stream,
      index + 1,
      (i) => stream.isOpenBrace(i) || stream.kindAt(i) === "extends"
    );

    // One record per clause, however many of its members match
    if (!names.some((name) => refersToTarget(name, context))) return noMatch(end);

    return {
      matches: [
        {
          line: stream.at(index)?.line ?? 0,
          usageType: "implements",
          code: stream.text(index, end).trim(),
        },
      ],
      resumeAt: end,
    };
  },
};

export const traitDetector: UsageDetector = {
  name: "trait",
  usageType: "trait",
  triggers: new Set<TokenKind>(["use"]),
  detect(stream, index, context) {
    if (!context.mixinUses.has(index)) return noMatch(index + 1);

    const { names, end } = readNameList(
      stream,
      index + 1,
      (i) => stream.isPunct(i, ";") || stream.isOpenBrace(i)
    );

    if (!names.some((name) => refersToTarget(name, context))) return noMatch(end);

    return {
      matches: [
        {
          line: stream.at(index)?.line ?? 0,
          usageType: "trait",
          code: stream.text(index, end + 1).trim(),
        },
      ],
      resumeAt: end + 1,
    };
  },
};
