#!/usr/bin/env node
/**
 * MCP server for PHP class inspection and usage search.
 */

import { createLogger, runServer } from "@phpscope/core";

import { loadConfig } from "./config.js";
import { createReflectorServices } from "./services.js";
import { registerAllTools, type Services } from "./tools/index.js";

const config = loadConfig(process.env);
if (!config.ok) {
  console.error(`[reflector] ${config.error.message}`);
  process.exit(1);
}

const logger = createLogger("reflector", config.value.logLevel);

runServer<Services>({
  config: {
    name: "phpscope:reflector",
    version: "0.1.0",
  },
  logger,
  createServices: () => createReflectorServices(config.value, logger),
  registerTools: registerAllTools,
  onStartup: (services) => {
    logger.info(`Project root: ${services.projectRoot} (vendor dir: ${config.value.vendorDir})`);
  },
});
