import { z } from "zod";
import type { Connector } from "../connectors/interface.js";
import { DEFAULT_TABLE_LIMIT } from "../connectors/base.js";
import { toCsv } from "../utils/csv.js";
import { errorText } from "../utils/response.js";
import { identifyingColumns } from "./output-columns.js";

export const GET_TABLES_DESCRIPTION = `Retrieves a list of objects, entities, collections, etc. (as tables) available in the data source.

Use the get_columns tool to list available columns on a table.
Both catalog and schema are optional parameters.
The output of the tool will be returned in CSV format, with the first line containing column headers.`;

export const NO_TABLES_FOUND = "No tables found.";

export interface GetTablesParams {
  catalog?: string;
  schema?: string;
  search?: string;
  limit?: number;
}

export function createGetTablesParams() {
  return {
    catalog: z.string().optional().describe("Optional catalog name to filter tables"),
    schema: z.string().optional().describe("Optional schema name to filter tables"),
    search: z.string().optional().describe("Optional search term to filter table names (e.g., 'ITM', 'ORD')"),
    limit: z
      .number()
      .int()
      .positive()
      .optional()
      .describe(`Maximum number of tables to return (default: ${DEFAULT_TABLE_LIMIT})`),
  };
}

export function getTablesHandler(connector: Connector) {
  return async (params: GetTablesParams = {}): Promise<string> => {
    try {
      const tables = await connector.listTables({
        catalog: params.catalog,
        schema: params.schema,
        search: params.search,
        limit: params.limit ?? DEFAULT_TABLE_LIMIT,
      });

      if (tables.length === 0) return NO_TABLES_FOUND;

      const rows = tables.map((t) => ({
        Catalog: t.catalog,
        Schema: t.schema,
        Table: t.table,
        Description: t.description,
      }));
      return toCsv(rows, [...identifyingColumns(tables), "Table", "Description"]);
    } catch (err) {
      return errorText(err);
    }
  };
}
