import type { ListTablesOptions, ListColumnsOptions, TableInfo, ColumnInfo, Row } from "./interface.js";
import { BaseConnector, asText, requireTableName } from "./base.js";
import { isRecord, loadOdbc, toRows, type DriverLoader, type OdbcConnection, type OdbcModule } from "./drivers.js";
import type { OdbcConnectorConfig } from "../config/types.js";
import { BackendError, ConnectionError, errorMessage, truncateMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

// The driver's own message is generic; the diagnostic records carry the detail.
function describeOdbcError(err: unknown): string {
  const records = isRecord(err) ? err.odbcErrors : undefined;
  if (Array.isArray(records)) {
    const messages = records.filter(isRecord).map((r) => asText(r.message)).filter(Boolean);
    if (messages.length > 0) return messages.join("; ");
  }
  return errorMessage(err);
}

/** Hides credentials when a connection string ends up in a log line. */
export function redactConnectionString(connectionString: string): string {
  return connectionString.replace(/((?:PWD|PASSWORD)\s*=\s*)(\{[^}]*\}|[^;]*)/gi, "$1***");
}

/**
 * Generic connector over an ODBC driver manager. Metadata comes from the
 * driver's SQLTables/SQLColumns catalog functions, which filter by catalog and
 * schema only: `search` and `limit` are not applied.
 */
export class OdbcConnector extends BaseConnector {
  readonly type = "odbc" as const;
  protected readonly probeSql = "SELECT 1";
  private connection: OdbcConnection | null = null;
  private config: OdbcConnectorConfig;
  private loadDriver: DriverLoader<OdbcModule>;

  constructor(config: OdbcConnectorConfig, loadDriver: DriverLoader<OdbcModule> = loadOdbc) {
    super();
    this.config = config;
    this.loadDriver = loadDriver;
  }

  async connect(): Promise<void> {
    await this.open();
  }

  async close(): Promise<void> {
    if (this.connection) {
      const connection = this.connection;
      this.connection = null;
      await connection.close();
      getLogger().debug("ODBC connection closed");
    }
  }

  async listTables(options: ListTablesOptions = {}): Promise<TableInfo[]> {
    if (options.search || options.limit !== undefined) {
      getLogger().debug("ODBC catalog listing ignores search and limit", {
        search: options.search,
        limit: options.limit,
      });
    }
    const rows = await this.run((conn) =>
      conn.tables(options.catalog ?? null, options.schema ?? null, null, null),
    );

    return rows.map((r) => ({
      catalog: asText(r.TABLE_CAT),
      schema: asText(r.TABLE_SCHEM),
      table: asText(r.TABLE_NAME),
      description: asText(r.REMARKS),
    }));
  }

  async listColumns(table: string, options: ListColumnsOptions = {}): Promise<ColumnInfo[]> {
    const tableName = requireTableName(table);
    const rows = await this.run((conn) =>
      conn.columns(options.catalog ?? null, options.schema ?? null, tableName, null),
    );

    return rows.map((r) => ({
      catalog: asText(r.TABLE_CAT),
      schema: asText(r.TABLE_SCHEM),
      table: asText(r.TABLE_NAME),
      column: asText(r.COLUMN_NAME),
      dataType: asText(r.TYPE_NAME),
      description: asText(r.REMARKS),
    }));
  }

  executeQuery(sql: string): Promise<Row[]> {
    return this.run((conn) => conn.query(sql));
  }

  private async open(): Promise<OdbcConnection> {
    const odbc = await this.loadDriver();
    await this.close();

    let connection: OdbcConnection;
    try {
      connection = await odbc.connect(this.config.connectionString);
    } catch (err) {
      throw new ConnectionError(`Failed to connect via ODBC: ${truncateMessage(describeOdbcError(err))}`);
    }

    this.connection = connection;
    getLogger().info("Connected via ODBC", {
      connectionString: redactConnectionString(this.config.connectionString),
    });
    return connection;
  }

  private async getConnection(): Promise<OdbcConnection> {
    return this.connection ?? (await this.open());
  }

  private async run(call: (conn: OdbcConnection) => Promise<unknown>): Promise<Row[]> {
    const conn = await this.getConnection();
    try {
      return toRows(await call(conn));
    } catch (err) {
      throw new BackendError(describeOdbcError(err));
    }
  }
}
