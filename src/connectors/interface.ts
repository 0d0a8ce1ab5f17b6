export type ConnectorType = "hana" | "odbc";

export type Row = Record<string, unknown>;

export interface TableInfo {
  catalog?: string;
  schema?: string;
  table: string;
  description: string;
}

export interface ColumnInfo {
  catalog?: string;
  schema?: string;
  table: string;
  column: string;
  dataType: string;
  description: string;
}

export interface ListTablesOptions {
  catalog?: string;
  schema?: string;
  /** Case-insensitive substring of the table name. */
  search?: string;
  limit?: number;
}

export interface ListColumnsOptions {
  catalog?: string;
  schema?: string;
}

export interface Connector {
  readonly type: ConnectorType;

  connect(): Promise<void>;
  close(): Promise<void>;

  listTables(options?: ListTablesOptions): Promise<TableInfo[]>;
  listColumns(table: string, options?: ListColumnsOptions): Promise<ColumnInfo[]>;
  executeQuery(sql: string): Promise<Row[]>;

  /** Resolves false instead of rejecting; see getLastError for the reason. */
  testConnection(): Promise<boolean>;
  getLastError(): string | undefined;

  quoteIdentifier(name: string): string;
}
