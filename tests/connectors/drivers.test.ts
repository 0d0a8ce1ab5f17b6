import { describe, it, expect } from "vitest";
import { isHdbModule, isOdbcModule, loadDriver, toRows } from "../../src/connectors/drivers.js";
import { DriverMissingError } from "../../src/utils/errors.js";

describe("driver module guards", () => {
  it("recognizes the hdb entry point", () => {
    expect(isHdbModule({ createClient: () => ({}) })).toBe(true);
    expect(isHdbModule({ createClient: "nope" })).toBe(false);
    expect(isHdbModule(null)).toBe(false);
  });

  it("recognizes the odbc entry point", () => {
    expect(isOdbcModule({ connect: async () => ({}) })).toBe(true);
    expect(isOdbcModule({})).toBe(false);
  });
});

describe("toRows", () => {
  it("keeps object rows only", () => {
    expect(toRows([{ a: 1 }, null, [1], { b: 2 }])).toEqual([{ a: 1 }, { b: 2 }]);
  });

  it("returns no rows for a non-array result", () => {
    expect(toRows(5)).toEqual([]);
    expect(toRows(undefined)).toEqual([]);
  });
});

describe("loadDriver", () => {
  it("reports a package that cannot be imported", async () => {
    const error = await loadDriver("hana-mcp-no-such-driver", isHdbModule, "Install the driver").catch(
      (err: unknown) => err,
    );
    expect(error).toBeInstanceOf(DriverMissingError);
    expect(error).toHaveProperty("code", "DRIVER_MISSING");
    expect(String(error)).toContain("Install the driver");
  });

  it("rejects a package without the expected API", async () => {
    await expect(loadDriver("node:path", isHdbModule, "Install the driver")).rejects.toThrow(
      'Package "node:path" does not expose the expected driver API',
    );
  });

  it("returns a module that matches the guard", async () => {
    const isPathModule = (value: unknown): value is { join: (...parts: string[]) => string } =>
      value !== null && typeof value === "object" && "join" in value && typeof value.join === "function";
    const path = await loadDriver("node:path", isPathModule, "unused");
    expect(path.join("a", "b")).toBe("a/b");
  });
});
