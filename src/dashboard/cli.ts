#!/usr/bin/env node

import { startServer } from "./server.js";
import { loadConfig } from "../services/config.js";
import { createEngine } from "../services/engine.js";
import { configureLogging, getLogger } from "../services/logger.js";

const log = getLogger("cli");

function parseArgs(args: string[], defaultPort: number): { port: number; host: string } {
  let port = defaultPort;
  let host = "127.0.0.1";

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--port" && args[i + 1]) {
      port = parseInt(args[i + 1], 10) || defaultPort;
      i++;
    } else if (args[i] === "--host" && args[i + 1]) {
      host = args[i + 1];
      i++;
    }
  }

  return { port, host };
}

async function main() {
  const config = loadConfig();
  configureLogging({ level: config.logLevel, home: config.home });
  const opts = parseArgs(process.argv.slice(2), config.dashboardPort);

  console.log(`cavesync dashboard`);
  console.log(`  Home:     ${config.home}`);
  console.log(`  Instance: ${config.instance}`);

  const engine = createEngine(config);
  await engine.start();
  const app = await startServer({ engine, port: opts.port, host: opts.host });

  const url = `http://${opts.host}:${opts.port}`;
  console.log(`\n  API:    ${url}/api/state`);
  console.log(`  Events: ${url}/api/events`);
  console.log(`\n  Press Ctrl+C to stop.\n`);

  // Clean shutdown: held locks are released before exit.
  const shutdown = async () => {
    console.log("\n  Shutting down...");
    try {
      await engine.stop();
      await app.close();
    } catch (err) {
      log.error("Shutdown failed", { error: String(err) });
      process.exit(1);
    }
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((err) => {
  log.error("Fatal error", { error: String(err) });
  process.exit(1);
});
