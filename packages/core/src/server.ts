/**
 * MCP server bootstrap shared by every phpscope server.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { createLogger, type Logger } from "./logger.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Builds the services the tools close over */
  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;

  onShutdown?: (services: S) => Promise<void> | void;

  /** Defaults to a logger tagged with the server name */
  logger?: Logger;
}

/**
 * Create services, register tools, install signal handlers and connect stdio.
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "phpscope:reflector", version: "0.1.0" },
 *   createServices: () => createReflectorServices(loadConfig(process.env)),
 *   registerTools: registerAllTools,
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;
  const logger = options.logger ?? createLogger(config.name);

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = new StdioServerTransport();

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down...");
    try {
      await onShutdown?.(services);
      await server.close();
    } catch (error) {
      logger.error("Shutdown failed:", error);
      process.exit(1);
    }
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());

  await onStartup?.(services);

  await server.connect(transport);
  logger.info(`Ready (${config.name} ${config.version})`);
}

/**
 * Entry point wrapper: a failed bootstrap is logged and exits with status 1.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  const logger = options.logger ?? createLogger(options.config.name);
  bootstrapServer({ ...options, logger }).catch((error: unknown) => {
    logger.error("Fatal error:", error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
