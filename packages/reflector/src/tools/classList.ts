import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import * as z from "zod/v4";
import { errorResponse, jsonResponse, type ToolErrorContent, type ToolResponse } from "@phpscope/core";

import type { ClassDiscovery } from "../core/services/ClassDiscovery.js";
import type { ClassInformation, ClassInspector } from "../core/services/ClassInspector.js";
import { ClassInformationSchema } from "./schemas.js";

interface ClassListInput {
  path: string;
  has_trait?: string;
  has_interface?: string;
  has_method?: string;
  recursive?: boolean;
  limit?: number;
  offset?: number;
  raw_docblock?: boolean;
}

interface ClassListOutput extends Record<string, unknown> {
  count: number;
  classes: ClassInformation[];
}

export function registerClassList(server: McpServer, discovery: ClassDiscovery, inspector: ClassInspector): void {
  server.registerTool(
    "class_list",
    {
      title: "List classes",
      description: `List the PHP classes, interfaces, traits and enums under a directory.

Each entry has the file, fully-qualified name, line range, docblock, parent,
implemented interfaces and used traits. Members are left out: use class_detail.

Filters combine with AND:
- has_trait: uses this trait directly (fully-qualified name)
- has_interface: implements this interface, inherited ones included
- has_method: declares or inherits a method with this name`,
      inputSchema: {
        path: z.string().describe("Directory relative to the project root"),
        has_trait: z.string().optional().describe("Fully-qualified trait the class uses"),
        has_interface: z.string().optional().describe("Fully-qualified interface the class implements"),
        has_method: z.string().optional().describe("Method the class has"),
        recursive: z.boolean().optional().describe("Include subdirectories (default: true)"),
        limit: z.number().int().min(0).optional().describe("Maximum classes, 0 for all (default: 0)"),
        offset: z.number().int().min(0).optional().describe("Classes to skip (default: 0)"),
        raw_docblock: z.boolean().optional().describe("Docblocks as written instead of parsed (default: false)"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        code: z.string().optional(),
        count: z.number().optional(),
        classes: z.array(ClassInformationSchema).optional(),
      },
    },
    async (
      input: ClassListInput
    ): Promise<ToolResponse<ClassListOutput & { success: true }> | ToolResponse<ToolErrorContent>> => {
      const result = await discovery.discover({
        path: input.path,
        hasTrait: input.has_trait,
        hasInterface: input.has_interface,
        hasMethod: input.has_method,
        recursive: input.recursive ?? true,
        limit: input.limit ?? 0,
        offset: input.offset ?? 0,
      });

      if (!result.ok) {
        return errorResponse(result.error);
      }

      const rawDocblock = input.raw_docblock ?? false;
      const classes = result.value.map((descriptor) => inspector.summarize(descriptor, { rawDocblock }));
      return jsonResponse(classes, { count: classes.length, classes });
    }
  );
}
