#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./services/config.js";
import { configureLogging, getLogger } from "./services/logger.js";
import { createEngine } from "./services/engine.js";
import { createMcpServer } from "./tools.js";

const log = getLogger("mcp");

// Keep the server alive through a stray rejection; it is logged.
process.on("unhandledRejection", (reason) => {
  log.error("Unhandled rejection in cavesync MCP server", { reason: String(reason) });
});

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogging({ level: config.logLevel, home: config.home });

  const engine = createEngine(config);
  const server = createMcpServer(engine);

  // Release held locks before exit.
  const shutdown = async () => {
    log.info("Shutting down");
    try {
      await engine.stop();
      await server.close();
    } catch (err) {
      log.error("Shutdown failed", { error: String(err) });
      process.exit(1);
    }
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  await engine.start();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("cavesync MCP server running (stdio)");
}

main().catch((error) => {
  log.error("Fatal error", { error: String(error) });
  process.exit(1);
});
