import { describe, it, expect } from "vitest";
import { OdbcConnector, redactConnectionString } from "../../src/connectors/odbc.js";
import type { OdbcConnectorConfig } from "../../src/config/types.js";
import { BackendError, ConnectionError, InvalidArgumentError } from "../../src/utils/errors.js";
import { FakeOdbc, type OdbcCall } from "../helpers/fake-drivers.js";

const config: OdbcConnectorConfig = {
  type: "odbc",
  connectionString: "DSN=warehouse;UID=reader;PWD=test-secret",
};

function setup(responder?: (call: OdbcCall) => unknown) {
  const odbc = new FakeOdbc(responder);
  const connector = new OdbcConnector(config, async () => odbc);
  return { odbc, connector };
}

function odbcFailure(message: string) {
  return Object.assign(new Error("[odbc] Error executing the sql statement"), {
    odbcErrors: [{ state: "42S02", code: 208, message }],
  });
}

describe("OdbcConnector connection handling", () => {
  it("connects lazily with the configured connection string", async () => {
    const { odbc, connector } = setup();
    expect(odbc.connectionStrings).toEqual([]);
    await connector.executeQuery("SELECT 1");
    await connector.executeQuery("SELECT 2");
    expect(odbc.connectionStrings).toEqual(["DSN=warehouse;UID=reader;PWD=test-secret"]);
  });

  it("closes the previous connection when reconnecting", async () => {
    const { odbc, connector } = setup();
    await connector.connect();
    await connector.connect();
    expect(odbc.connections).toHaveLength(2);
    expect(odbc.connections[0].closed).toBe(true);
  });

  it("close releases the connection once", async () => {
    const { odbc, connector } = setup();
    await connector.connect();
    await connector.close();
    await connector.close();
    expect(odbc.connections[0].closed).toBe(true);
  });

  it("reports the driver diagnostic on connection failure", async () => {
    const { odbc, connector } = setup();
    odbc.connectError = odbcFailure("[unixODBC][Driver Manager]Data source name not found");
    const error = await connector.connect().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toHaveProperty(
      "message",
      "Failed to connect via ODBC: [unixODBC][Driver Manager]Data source name not found",
    );
  });
});

describe("OdbcConnector.listTables", () => {
  const tableRows = [
    { TABLE_CAT: "warehouse", TABLE_SCHEM: "dbo", TABLE_NAME: "Orders", TABLE_TYPE: "TABLE", REMARKS: null },
    { TABLE_CAT: null, TABLE_SCHEM: "dbo", TABLE_NAME: "Items", TABLE_TYPE: "TABLE", REMARKS: "Item master" },
  ];

  it("uses the catalog function and maps the result", async () => {
    const { odbc, connector } = setup(() => tableRows);
    const tables = await connector.listTables({ catalog: "warehouse", schema: "dbo" });

    expect(odbc.calls).toEqual([{ method: "tables", args: ["warehouse", "dbo", null, null] }]);
    expect(tables).toEqual([
      { catalog: "warehouse", schema: "dbo", table: "Orders", description: "" },
      { catalog: "", schema: "dbo", table: "Items", description: "Item master" },
    ]);
  });

  it("returns the unfiltered listing when search and limit are given", async () => {
    const { odbc, connector } = setup(() => tableRows);
    const tables = await connector.listTables({ search: "ord", limit: 1 });
    expect(tables.map((t) => t.table)).toEqual(["Orders", "Items"]);
    expect(odbc.calls[0].args).toEqual([null, null, null, null]);
  });
});

describe("OdbcConnector.listColumns", () => {
  it("requires a table name", async () => {
    const { odbc, connector } = setup();
    await expect(connector.listColumns("")).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(odbc.calls).toEqual([]);
  });

  it("maps driver column metadata", async () => {
    const { odbc, connector } = setup(() => [
      {
        TABLE_CAT: "warehouse",
        TABLE_SCHEM: "dbo",
        TABLE_NAME: "Orders",
        COLUMN_NAME: "OrderId",
        DATA_TYPE: 4,
        TYPE_NAME: "int",
        ORDINAL_POSITION: 1,
        REMARKS: null,
      },
    ]);
    const columns = await connector.listColumns("Orders", { schema: "dbo" });

    expect(odbc.calls).toEqual([{ method: "columns", args: [null, "dbo", "Orders", null] }]);
    expect(columns).toEqual([
      { catalog: "warehouse", schema: "dbo", table: "Orders", column: "OrderId", dataType: "int", description: "" },
    ]);
  });
});

describe("OdbcConnector.executeQuery", () => {
  it("returns the row objects of the result", async () => {
    const result = Object.assign([{ id: 1, name: "widget" }], { count: 1, columns: [{ name: "id" }, { name: "name" }] });
    const { odbc, connector } = setup(() => result);
    await expect(connector.executeQuery("SELECT id, name FROM items")).resolves.toEqual([{ id: 1, name: "widget" }]);
    expect(odbc.calls).toEqual([{ method: "query", args: ["SELECT id, name FROM items"] }]);
  });

  it("uses the diagnostic records for the error message", async () => {
    const { connector } = setup(() => {
      throw odbcFailure("[SQL Server]Invalid object name 'nope'.");
    });
    const error = await connector.executeQuery("SELECT * FROM nope").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(BackendError);
    expect(error).toHaveProperty("message", "[SQL Server]Invalid object name 'nope'.");
  });

  it("falls back to the error message without diagnostics", async () => {
    const { connector } = setup(() => {
      throw new Error("driver crashed");
    });
    await expect(connector.executeQuery("SELECT 1")).rejects.toThrow("driver crashed");
  });
});

describe("OdbcConnector.testConnection", () => {
  it("probes with SELECT 1", async () => {
    const { odbc, connector } = setup();
    await expect(connector.testConnection()).resolves.toBe(true);
    expect(odbc.calls).toEqual([{ method: "query", args: ["SELECT 1"] }]);
  });

  it("returns false and keeps the reason when the server is unreachable", async () => {
    const { odbc, connector } = setup();
    odbc.connectError = new Error("Login timeout expired");
    await expect(connector.testConnection()).resolves.toBe(false);
    expect(connector.getLastError()).toBe("Failed to connect via ODBC: Login timeout expired");
  });
});

describe("redactConnectionString", () => {
  it("masks passwords", () => {
    expect(redactConnectionString("DSN=warehouse;UID=reader;PWD=test-secret")).toBe("DSN=warehouse;UID=reader;PWD=***");
    expect(redactConnectionString("Driver={HDBODBC};Password={a;b};Server=h")).toBe("Driver={HDBODBC};Password=***;Server=h");
  });
});
