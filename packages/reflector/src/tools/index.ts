import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { FileSystem } from "../core/ports/FileSystem.js";
import type { ClassDiscovery } from "../core/services/ClassDiscovery.js";
import type { ClassInspector } from "../core/services/ClassInspector.js";
import type { UsageScanner } from "../core/services/UsageScanner.js";
import { registerClassDetail } from "./classDetail.js";
import { registerClassList } from "./classList.js";
import { registerClassUsages } from "./classUsages.js";

export interface Services {
  projectRoot: string;
  defaultScanPath: string;
  fs: FileSystem;
  discovery: ClassDiscovery;
  inspector: ClassInspector;
  usages: UsageScanner;
}

export function registerAllTools(server: McpServer, services: Services): void {
  registerClassList(server, services.discovery, services.inspector);
  registerClassDetail(server, services.inspector, services.fs, services.projectRoot);
  registerClassUsages(server, services.usages, services.defaultScanPath);
}

export { formatUsageReport } from "./classUsages.js";
export { toClassSource } from "./classDetail.js";
export * from "./schemas.js";
