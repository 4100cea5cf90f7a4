#!/usr/bin/env node
/**
 * @shapekit/mcp: MCP server for shape conversion and mesh import.
 *
 * Configured through SHAPEKIT_LOG_LEVEL and SHAPEKIT_PACKAGE_PATH.
 */

import { delimiter } from "node:path";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { logger } from "@shapekit/core";
import { loadConfig } from "./config.js";
import { createServer } from "./server.js";

async function main() {
  const config = loadConfig(process.env, delimiter);
  logger.setMinLevel(config.logLevel);

  const server = createServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
