#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./config/env.js";
import { MCP_PATH, createAppServer, runHttpServer, runStdioServer } from "./app.js";
import { createRuntime } from "./services/createRuntime.js";
import { describeError, logger, setLogLevel } from "./utils/logger.js";

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const runtime = await createRuntime(config);
  const shutdownTasks: Array<() => Promise<void>> = [];

  if (config.transport === "http") {
    const httpServer = await runHttpServer(config.host, config.port, runtime, () =>
      createAppServer(runtime),
    );
    shutdownTasks.unshift(httpServer.close);
    logger.info("HTTP server listening", {
      url: `http://${config.host}:${httpServer.port}`,
      mcp_path: MCP_PATH,
    });
  } else {
    await runStdioServer(createAppServer(runtime));
  }

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error("Shutdown failed", { error: describeError(error) });
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error) => {
  logger.fatal("Failed to start MCP server", { error: describeError(error) });
  process.exit(1);
});
