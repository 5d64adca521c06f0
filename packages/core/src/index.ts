export type { Result } from "./result.js";
export { Ok, Err, toError } from "./result.js";

export type { TextContent, ToolResponse, ToolErrorContent } from "./mcp.js";
export { errorResponse, jsonResponse, resultToResponse } from "./mcp.js";

export type { Logger, LogLevel, LogSink } from "./logger.js";
export { createLogger, LOG_LEVELS } from "./logger.js";

export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
export { bootstrapServer, runServer, McpServer } from "./server.js";
