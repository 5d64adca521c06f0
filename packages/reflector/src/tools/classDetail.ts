import path from "node:path";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import * as z from "zod/v4";
import { jsonResponse, resultToResponse, type ToolErrorContent, type ToolResponse } from "@phpscope/core";

import type { FileSystem } from "../core/ports/FileSystem.js";
import type { ClassInformation, ClassInspector } from "../core/services/ClassInspector.js";
import type { ClassSource } from "../core/services/ClassRepository.js";
import { ClassInformationSchema } from "./schemas.js";

interface ClassDetailInput {
  class: string;
  constants?: boolean;
  properties?: boolean;
  methods?: boolean;
  include_inherited?: boolean;
  summary?: boolean;
  full_docblocks?: boolean;
  raw_docblock?: boolean;
  visibility?: string;
  methods_offset?: number;
  methods_limit?: number;
  properties_offset?: number;
  properties_limit?: number;
  constants_offset?: number;
  constants_limit?: number;
  static_only?: boolean;
  summary_mode?: boolean;
}

interface ClassDetailOutput extends Record<string, unknown> {
  class: ClassInformation;
}

/**
 * A value naming an existing file (or ending in `.php`) is a file; anything
 * else is a class name.
 */
export function toClassSource(value: string, projectRoot: string, fs: FileSystem): ClassSource {
  const looksLikeFile = value.toLowerCase().endsWith(".php") || value.includes("/");
  if (looksLikeFile || fs.exists(path.resolve(projectRoot, value))) {
    return { kind: "file", path: value };
  }
  return { kind: "name", name: value };
}

const count = z.number().int().min(0).optional();

export function registerClassDetail(
  server: McpServer,
  inspector: ClassInspector,
  fs: FileSystem,
  projectRoot: string
): void {
  server.registerTool(
    "class_detail",
    {
      title: "Class detail",
      description: `Describe one PHP class: docblock, parent, interfaces, traits, constants,
properties and methods with their signatures and line ranges.

\`class\` is a fully-qualified class name or a file path relative to the
project root; a file yields the first class declared in it.

Large classes: use summary_mode, or page through a member kind with
methods_offset / methods_limit (and the same for properties and constants).`,
      inputSchema: {
        class: z.string().describe("Fully-qualified class name or file path"),
        constants: z.boolean().optional().describe("Include constants (default: true)"),
        properties: z.boolean().optional().describe("Include properties (default: true)"),
        methods: z.boolean().optional().describe("Include methods (default: true)"),
        include_inherited: z.boolean().optional().describe("Include inherited members (default: false)"),
        summary: z.boolean().optional().describe("Docblock summaries only (default: true)"),
        full_docblocks: z.boolean().optional().describe("Full docblocks with tags; overrides summary"),
        raw_docblock: z.boolean().optional().describe("Docblocks as written (default: false)"),
        visibility: z
          .string()
          .optional()
          .describe("Comma list of public, protected, private or all (default: public)"),
        methods_offset: count,
        methods_limit: count,
        properties_offset: count,
        properties_limit: count,
        constants_offset: count,
        constants_limit: count,
        static_only: z.boolean().optional().describe("Only static methods (default: false)"),
        summary_mode: z
          .boolean()
          .optional()
          .describe("Methods only, at most five, without inherited members (default: false)"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        code: z.string().optional(),
        class: ClassInformationSchema.optional(),
      },
    },
    async (
      input: ClassDetailInput
    ): Promise<ToolResponse<ClassDetailOutput & { success: true }> | ToolResponse<ToolErrorContent>> => {
      const result = await inspector.inspect(toClassSource(input.class, projectRoot, fs), {
        constants: input.constants,
        properties: input.properties,
        methods: input.methods,
        includeInherited: input.include_inherited,
        summary: input.summary,
        fullDocblocks: input.full_docblocks,
        rawDocblock: input.raw_docblock,
        visibility: input.visibility,
        methodsOffset: input.methods_offset,
        methodsLimit: input.methods_limit,
        propertiesOffset: input.properties_offset,
        propertiesLimit: input.properties_limit,
        constantsOffset: input.constants_offset,
        constantsLimit: input.constants_limit,
        staticOnly: input.static_only,
        summaryMode: input.summary_mode,
      });

      return resultToResponse(result, (info): ToolResponse<ClassDetailOutput & { success: true }> =>
        jsonResponse(info, { class: info })
      );
    }
  );
}
