import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Connector } from "./connectors/interface.js";
import { createConnector } from "./connectors/factory.js";
import { SerializedConnector } from "./connectors/serialized.js";
import { registerTools } from "./tools/registry.js";
import type { AppConfig } from "./config/types.js";
import { ConnectionError } from "./utils/errors.js";
import { getLogger } from "./utils/logger.js";

/**
 * Build the connector for the configured backend and check that it can reach
 * the database. The server is not started when the check fails.
 */
export async function createReadyConnector(
  config: AppConfig,
  build: (config: AppConfig["connector"]) => Connector = createConnector,
): Promise<Connector> {
  const connector = new SerializedConnector(build(config.connector));

  if (!(await connector.testConnection())) {
    const details = connector.getLastError() ?? "Unknown error";
    await connector.close();
    throw new ConnectionError(
      `Failed to connect to database.\nDetails: ${details}\n\nPlease check your configuration.`,
    );
  }

  getLogger().info("Database connection successful", { connector: connector.type });
  return connector;
}

export function createMcpServerInstance(connector: Connector, config: AppConfig): McpServer {
  const server = new McpServer({
    name: config.server.name,
    version: config.server.version,
  });
  registerTools(server, connector, config.server.prefix);
  return server;
}
