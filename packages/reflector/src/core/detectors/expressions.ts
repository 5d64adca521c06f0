/**
 * Detectors for usages inside code: instantiation and static access.
 */

import type { TokenKind } from "../model.js";
import { noMatch, refersToTarget, type UsageDetector } from "./Detector.js";

export const instantiationDetector: UsageDetector = {
  name: "new",
  usageType: "new",
  triggers: new Set<TokenKind>(["new"]),
  detect(stream, index, context) {
    // `new $class`, `new static` and `new class {}` carry no class name
    const name = stream.nameAt(stream.skipForward(index + 1));
    if (!name) return noMatch(index + 1);
    if (!refersToTarget(name, context)) return noMatch(name.end);

    return {
      matches: [
        {
          line: stream.at(index)?.line ?? 0,
          usageType: "new",
          code: stream.text(index, name.end).trim(),
        },
      ],
      resumeAt: name.end,
    };
  },
};

export const staticCallDetector: UsageDetector = {
  name: "static_call",
  usageType: "static_call",
  triggers: new Set<TokenKind>(["double_colon"]),
  detect(stream, index, context) {
    const name = stream.nameEndingAt(stream.skipBackward(index - 1));
    if (!name || !refersToTarget(name, context)) return noMatch(index + 1);

    let end = index + 1;
    let method: string | undefined;
    const member = stream.skipForward(index + 1);
    const token = stream.at(member);
    // `User::class` is a name resolution, not a member
    if (token?.kind === "name" && token.text.toLowerCase() !== "class") {
      method = token.text;
      end = member + 1;
    }

    return {
      matches: [
        {
          line: stream.at(index)?.line ?? 0,
          usageType: "static_call",
          code: stream.text(name.start, end).trim(),
          ...(method !== undefined ? { method } : {}),
        },
      ],
      resumeAt: end,
    };
  },
};
