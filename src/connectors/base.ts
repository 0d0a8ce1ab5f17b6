import type {
  Connector,
  ConnectorType,
  ListTablesOptions,
  ListColumnsOptions,
  TableInfo,
  ColumnInfo,
  Row,
} from "./interface.js";
import { InvalidArgumentError, errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

export const DEFAULT_TABLE_LIMIT = 50;

/** Standard SQL quoting: wrap in double quotes, double any embedded ones. */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function asText(value: unknown): string {
  return value === null || value === undefined ? "" : String(value);
}

export function resolveTableLimit(limit: number | undefined): number {
  const value = limit ?? DEFAULT_TABLE_LIMIT;
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`limit must be a positive integer, got ${value}`);
  }
  return value;
}

export function requireTableName(table: string | undefined): string {
  if (!table) {
    throw new InvalidArgumentError("table parameter is required");
  }
  return table;
}

export abstract class BaseConnector implements Connector {
  abstract readonly type: ConnectorType;
  /** Cheapest statement the backend accepts, used by testConnection. */
  protected abstract readonly probeSql: string;
  private lastError: string | undefined;

  abstract connect(): Promise<void>;
  abstract close(): Promise<void>;
  abstract listTables(options?: ListTablesOptions): Promise<TableInfo[]>;
  abstract listColumns(table: string, options?: ListColumnsOptions): Promise<ColumnInfo[]>;
  abstract executeQuery(sql: string): Promise<Row[]>;

  async testConnection(): Promise<boolean> {
    try {
      await this.executeQuery(this.probeSql);
      this.lastError = undefined;
      return true;
    } catch (err) {
      this.lastError = errorMessage(err);
      getLogger().warn("Connection test failed", { connector: this.type, error: this.lastError });
      return false;
    }
  }

  getLastError(): string | undefined {
    return this.lastError;
  }

  quoteIdentifier(name: string): string {
    return quoteIdentifier(name);
  }
}
