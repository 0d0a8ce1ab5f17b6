import type { ListTablesOptions, ListColumnsOptions, TableInfo, ColumnInfo, Row } from "./interface.js";
import { BaseConnector, asText, requireTableName, resolveTableLimit } from "./base.js";
import {
  loadHdb,
  toRows,
  type DriverLoader,
  type HdbClient,
  type HdbClientOptions,
  type HdbModule,
  type HdbStatement,
} from "./drivers.js";
import type { HanaConnectorConfig } from "../config/types.js";
import { BackendError, ConnectionError, errorMessage, truncateMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

/**
 * SAP HANA connector on the pure-JavaScript `hdb` client. Metadata comes from
 * the SYS.TABLES and SYS.TABLE_COLUMNS catalog views.
 */
export class HanaConnector extends BaseConnector {
  readonly type = "hana" as const;
  protected readonly probeSql = "SELECT 1 FROM DUMMY";
  private client: HdbClient | null = null;
  private config: HanaConnectorConfig;
  private loadDriver: DriverLoader<HdbModule>;

  constructor(config: HanaConnectorConfig, loadDriver: DriverLoader<HdbModule> = loadHdb) {
    super();
    this.config = config;
    this.loadDriver = loadDriver;
  }

  async connect(): Promise<void> {
    await this.open();
  }

  async close(): Promise<void> {
    if (this.client) {
      this.client.end();
      this.client = null;
      getLogger().debug("SAP HANA connection closed", { host: this.config.host });
    }
  }

  async listTables(options: ListTablesOptions = {}): Promise<TableInfo[]> {
    const limit = resolveTableLimit(options.limit);
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (options.schema) {
      conditions.push("SCHEMA_NAME = ?");
      params.push(options.schema);
    }
    if (options.search) {
      conditions.push("UPPER(TABLE_NAME) LIKE ?");
      params.push(`%${options.search.toUpperCase()}%`);
    }

    const where = conditions.length > 0 ? ` WHERE ${conditions.join(" AND ")}` : "";
    const rows = await this.run(
      `SELECT SCHEMA_NAME AS "Schema", TABLE_NAME AS "Table", COMMENTS AS "Description"
       FROM SYS.TABLES${where}
       ORDER BY SCHEMA_NAME, TABLE_NAME
       LIMIT ${limit}`,
      params,
    );

    return rows.map((r) => ({
      schema: asText(r.Schema),
      table: asText(r.Table),
      description: asText(r.Description),
    }));
  }

  async listColumns(table: string, options: ListColumnsOptions = {}): Promise<ColumnInfo[]> {
    const params: unknown[] = [requireTableName(table)];
    let schemaFilter = "";
    if (options.schema) {
      schemaFilter = " AND SCHEMA_NAME = ?";
      params.push(options.schema);
    }

    const rows = await this.run(
      `SELECT SCHEMA_NAME AS "Schema", TABLE_NAME AS "Table", COLUMN_NAME AS "Column",
              DATA_TYPE_NAME AS "DataType", COMMENTS AS "Description"
       FROM SYS.TABLE_COLUMNS
       WHERE TABLE_NAME = ?${schemaFilter}
       ORDER BY POSITION`,
      params,
    );

    return rows.map((r) => ({
      schema: asText(r.Schema),
      table: asText(r.Table),
      column: asText(r.Column),
      dataType: asText(r.DataType),
      description: asText(r.Description),
    }));
  }

  executeQuery(sql: string): Promise<Row[]> {
    return this.run(sql);
  }

  private async open(): Promise<HdbClient> {
    const hdb = await this.loadDriver();
    await this.close();

    const { host, port, user, password, databaseName, encrypt, sslValidateCertificate } = this.config;
    const options: HdbClientOptions = { host, port, user, password };
    if (databaseName) options.databaseName = databaseName;
    if (encrypt) {
      options.useTLS = true;
      options.rejectUnauthorized = sslValidateCertificate;
    }

    const logger = getLogger();
    const client = hdb.createClient(options);
    client.on("error", (err) => {
      logger.warn("SAP HANA connection lost", { host, error: err.message });
      if (this.client === client) this.client = null;
    });

    try {
      await new Promise<void>((resolve, reject) => {
        client.connect((err) => (err ? reject(err) : resolve()));
      });
    } catch (err) {
      // a rejected login leaves the socket open
      client.end();
      throw new ConnectionError(
        `Failed to connect to SAP HANA at ${host}:${port}: ${truncateMessage(errorMessage(err))}`,
      );
    }

    this.client = client;
    logger.info("Connected to SAP HANA", { host, port, databaseName, encrypt });
    return client;
  }

  private async getClient(): Promise<HdbClient> {
    return this.client ?? (await this.open());
  }

  private async run(sql: string, params: unknown[] = []): Promise<Row[]> {
    const client = await this.getClient();
    try {
      if (params.length === 0) {
        const result = await new Promise<unknown>((resolve, reject) => {
          client.exec(sql, (err, rows) => (err ? reject(err) : resolve(rows)));
        });
        return toRows(result);
      }

      const statement = await new Promise<HdbStatement>((resolve, reject) => {
        client.prepare(sql, (err, stmt) => (err ? reject(err) : resolve(stmt)));
      });
      try {
        const result = await new Promise<unknown>((resolve, reject) => {
          statement.exec(params, (err, rows) => (err ? reject(err) : resolve(rows)));
        });
        return toRows(result);
      } finally {
        statement.drop((err) => {
          if (err) getLogger().debug("Failed to drop prepared statement", { error: err.message });
        });
      }
    } catch (err) {
      throw new BackendError(errorMessage(err));
    }
  }
}
