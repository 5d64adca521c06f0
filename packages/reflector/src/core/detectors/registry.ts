import type { UsageType } from "../model.js";
import { extendsDetector, implementsDetector, importDetector, traitDetector } from "./declarations.js";
import type { UsageDetector } from "./Detector.js";
import { instantiationDetector, staticCallDetector } from "./expressions.js";
import { returnTypeDetector, typeHintDetector } from "./typeHints.js";

/**
 * Every detector in reporting order. Matches from one file are concatenated
 * in this order before sorting.
 */
export const DETECTORS: readonly UsageDetector[] = [
  importDetector,
  instantiationDetector,
  staticCallDetector,
  extendsDetector,
  implementsDetector,
  traitDetector,
  typeHintDetector,
  returnTypeDetector,
];

/**
 * Detectors for the requested usage types; every detector when none are given.
 */
export function selectDetectors(usageTypes: readonly UsageType[] = []): UsageDetector[] {
  if (usageTypes.length === 0) return [...DETECTORS];
  const wanted = new Set(usageTypes);
  return DETECTORS.filter((detector) => wanted.has(detector.usageType));
}
