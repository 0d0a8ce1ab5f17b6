import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Connector } from "../connectors/interface.js";
import { formatText } from "../utils/response.js";

import { GET_TABLES_DESCRIPTION, createGetTablesParams, getTablesHandler } from "./get-tables.js";
import { GET_COLUMNS_DESCRIPTION, createGetColumnsParams, getColumnsHandler } from "./get-columns.js";
import { RUN_QUERY_DESCRIPTION, createRunQueryParams, runQueryHandler } from "./run-query.js";

export function toolNames(prefix: string) {
  return {
    getTables: `${prefix}_get_tables`,
    getColumns: `${prefix}_get_columns`,
    runQuery: `${prefix}_run_query`,
  };
}

export function registerTools(server: McpServer, connector: Connector, prefix: string) {
  const names = toolNames(prefix);
  const getTables = getTablesHandler(connector);
  const getColumns = getColumnsHandler(connector);
  const runQuery = runQueryHandler(connector);

  server.tool(names.getTables, GET_TABLES_DESCRIPTION, createGetTablesParams(), async (params) =>
    formatText(await getTables(params)),
  );

  server.tool(names.getColumns, GET_COLUMNS_DESCRIPTION, createGetColumnsParams(), async (params) =>
    formatText(await getColumns(params)),
  );

  server.tool(names.runQuery, RUN_QUERY_DESCRIPTION, createRunQueryParams(), async (params) =>
    formatText(await runQuery(params)),
  );
}
