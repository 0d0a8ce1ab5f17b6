import type {
  Connector,
  ConnectorType,
  ListTablesOptions,
  ListColumnsOptions,
  TableInfo,
  ColumnInfo,
  Row,
} from "./interface.js";
import { getLogger, type Logger } from "../utils/logger.js";

/**
 * Runs every call on the wrapped connector one at a time, in arrival order.
 * Connectors hold a single live connection, and the HTTP transport can
 * dispatch calls from several sessions at once.
 */
export class SerializedConnector implements Connector {
  readonly type: ConnectorType;
  private tail: Promise<unknown> = Promise.resolve();
  private logger: Logger;

  constructor(private inner: Connector) {
    this.type = inner.type;
    this.logger = getLogger().child({ connector: inner.type });
  }

  connect(): Promise<void> {
    return this.enqueue("connect", () => this.inner.connect());
  }

  close(): Promise<void> {
    return this.enqueue("close", () => this.inner.close());
  }

  listTables(options?: ListTablesOptions): Promise<TableInfo[]> {
    return this.enqueue("listTables", () => this.inner.listTables(options));
  }

  listColumns(table: string, options?: ListColumnsOptions): Promise<ColumnInfo[]> {
    return this.enqueue("listColumns", () => this.inner.listColumns(table, options));
  }

  executeQuery(sql: string): Promise<Row[]> {
    return this.enqueue("executeQuery", () => this.inner.executeQuery(sql), { sql });
  }

  testConnection(): Promise<boolean> {
    return this.enqueue("testConnection", () => this.inner.testConnection());
  }

  getLastError(): string | undefined {
    return this.inner.getLastError();
  }

  quoteIdentifier(name: string): string {
    return this.inner.quoteIdentifier(name);
  }

  private enqueue<T>(operation: string, call: () => Promise<T>, data?: Record<string, unknown>): Promise<T> {
    const run = async (): Promise<T> => {
      const start = performance.now();
      try {
        return await call();
      } finally {
        this.logger.debug("Connector call finished", {
          operation,
          durationMs: Math.round(performance.now() - start),
          ...data,
        });
      }
    };
    const result = this.tail.then(run, run);
    // A failed call must not block the ones queued after it.
    this.tail = result.catch(() => undefined);
    return result;
  }
}
