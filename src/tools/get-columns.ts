import { z } from "zod";
import type { Connector } from "../connectors/interface.js";
import { toCsv } from "../utils/csv.js";
import { ERROR_PREFIX, errorText } from "../utils/response.js";
import { identifyingColumns } from "./output-columns.js";

export const GET_COLUMNS_DESCRIPTION = `Retrieves a list of fields, dimensions, or measures (as columns) for an object, entity or collection (table).

Use the get_tables tool to get a list of available tables.
The output of the tool will be returned in CSV format, with the first line containing column headers.`;

export interface GetColumnsParams {
  table?: string;
  catalog?: string;
  schema?: string;
}

export function createGetColumnsParams() {
  return {
    table: z.string().describe("The table name (required)"),
    catalog: z.string().optional().describe("Optional catalog name"),
    schema: z.string().optional().describe("Optional schema name"),
  };
}

export function getColumnsHandler(connector: Connector) {
  return async (params: GetColumnsParams): Promise<string> => {
    const { table } = params;
    if (!table) {
      return `${ERROR_PREFIX}table parameter is required`;
    }

    try {
      const columns = await connector.listColumns(table, { catalog: params.catalog, schema: params.schema });

      if (columns.length === 0) return `No columns found for table: ${table}`;

      const rows = columns.map((c) => ({
        Catalog: c.catalog,
        Schema: c.schema,
        Table: c.table,
        Column: c.column,
        DataType: c.dataType,
        Description: c.description,
      }));
      return toCsv(rows, [...identifyingColumns(columns), "Table", "Column", "DataType", "Description"]);
    } catch (err) {
      return errorText(err);
    }
  };
}
