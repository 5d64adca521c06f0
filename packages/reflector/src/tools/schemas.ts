import * as z from "zod/v4";

import { SORT_KEYS, USAGE_TYPES } from "../core/model.js";

export const UsageTypeSchema = z.enum(USAGE_TYPES);

export const SortKeySchema = z.enum(SORT_KEYS);

export const UsageItemSchema = z.object({
  file: z.string(),
  line: z.number(),
  usage_type: UsageTypeSchema,
  code: z.string(),
  method: z.string().optional(),
});

/**
 * Class summaries and details nest interfaces, traits and members several
 * levels deep; the structured output only pins the identifying fields.
 */
export const ClassInformationSchema = z.looseObject({
  file: z.string().nullable(),
  name: z.string(),
});
