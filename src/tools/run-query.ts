import { z } from "zod";
import type { Connector } from "../connectors/interface.js";
import { toCsv } from "../utils/csv.js";
import { ERROR_PREFIX, errorText } from "../utils/response.js";
import { ROW_CAP_NOTICE, applyRowCap, checkSelectOnly } from "../utils/sql-guard.js";

export const RUN_QUERY_DESCRIPTION = `Execute a SQL SELECT statement.

Use the get_tables tool to get a list of available tables,
and the get_columns tool to list table columns.

The SQL dialect is based on SQL-92.
Identifiers should be quoted using double quotes ("").
Valid clauses: SELECT, FROM, WHERE, INNER JOIN, LEFT JOIN, GROUP BY, ORDER BY, LIMIT/OFFSET.

The output of the tool will be returned in CSV format, with the first line containing column headers.`;

export const NO_QUERY_RESULTS = "Query returned no results.";

export interface RunQueryParams {
  sql?: string;
}

export function createRunQueryParams() {
  return {
    sql: z.string().describe("The SELECT statement to execute"),
  };
}

export function runQueryHandler(connector: Connector) {
  return async (params: RunQueryParams): Promise<string> => {
    const { sql } = params;
    if (!sql) {
      return `${ERROR_PREFIX}sql parameter is required`;
    }

    const guard = checkSelectOnly(sql);
    if (!guard.allowed) {
      return errorText(guard.error);
    }

    try {
      const capped = applyRowCap(sql);
      const rows = await connector.executeQuery(capped.sql);

      if (rows.length === 0) return NO_QUERY_RESULTS;

      const csv = toCsv(rows);
      return capped.capped ? `${ROW_CAP_NOTICE}\n\n${csv}` : csv;
    } catch (err) {
      return errorText(err);
    }
  };
}
