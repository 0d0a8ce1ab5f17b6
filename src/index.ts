#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, parseCliArgs } from "./config/loader.js";
import type { HttpTransportConfig } from "./config/types.js";
import { DEFAULT_HTTP_PORT } from "./config/types.js";
import { createMcpServerInstance, createReadyConnector } from "./server.js";
import { closeSession, startHttpTransport } from "./transport/http.js";
import { initLogger } from "./utils/logger.js";

async function main() {
  const cli = parseCliArgs(process.argv.slice(2));
  const config = loadConfig(cli.configPath);

  const logger = initLogger(config.logLevel, { file: config.logFile });
  logger.info("Starting hana-mcp", {
    server: config.server.name,
    connector: config.connector.type,
    config: cli.configPath,
  });

  const connector = await createReadyConnector(config);

  // CLI flags override the file
  const transportType = cli.transport ?? config.transport.type;

  let shutdown: () => Promise<void>;

  if (transportType === "http") {
    const fromFile: HttpTransportConfig =
      config.transport.type === "http"
        ? config.transport
        : { type: "http", port: DEFAULT_HTTP_PORT, host: "127.0.0.1", stateless: false, sessionTimeout: 30 * 60 * 1000 };
    const transportConfig: HttpTransportConfig = {
      ...fromFile,
      host: cli.host ?? fromFile.host,
      port: cli.port ?? fromFile.port,
    };

    const { httpServer, sessions, cleanupInterval } = await startHttpTransport(config, transportConfig, connector);

    shutdown = async () => {
      logger.info("Shutting down HTTP server...");
      if (cleanupInterval) clearInterval(cleanupInterval);
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
      });
      for (const [sid, entry] of sessions) {
        sessions.delete(sid);
        await closeSession(entry);
      }
      await connector.close();
    };
  } else {
    const server = createMcpServerInstance(connector, config);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info("Serving on stdio");

    shutdown = async () => {
      logger.info("Shutting down stdio server...");
      await server.close();
      await transport.close();
      await connector.close();
    };
  }

  let shutdownInProgress = false;
  const gracefulShutdown = async () => {
    if (shutdownInProgress) {
      logger.warn("Shutdown already in progress, forcing exit");
      process.exit(1);
    }
    shutdownInProgress = true;
    const timer = setTimeout(() => {
      logger.error("Shutdown timed out after 10s, forcing exit");
      process.exit(1);
    }, 10_000);
    timer.unref();
    try {
      await shutdown();
    } catch (err) {
      logger.error("Error during shutdown", { error: String(err) });
    }
    clearTimeout(timer);
    process.exit(0);
  };

  process.on("SIGINT", gracefulShutdown);
  process.on("SIGTERM", gracefulShutdown);
}

main().catch((err: unknown) => {
  console.error("Failed to start hana-mcp:", err instanceof Error ? err.message : err);
  process.exit(1);
});
