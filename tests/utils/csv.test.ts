import { describe, it, expect } from "vitest";
import { toCsv } from "../../src/utils/csv.js";

describe("toCsv", () => {
  it("writes a quoted header and one line per row", () => {
    const rows = [
      { name: "Alice", age: "30" },
      { name: "Bob", age: "25" },
    ];
    expect(toCsv(rows)).toBe('"name","age"\r\n"Alice","30"\r\n"Bob","25"\r\n');
  });

  it("follows the requested column order", () => {
    const result = toCsv([{ b: "2", a: "1", c: "3" }], ["a", "b", "c"]);
    expect(result.split("\r\n")[0]).toBe('"a","b","c"');
    expect(result).toBe('"a","b","c"\r\n"1","2","3"\r\n');
  });

  it("terminates every line with CRLF", () => {
    expect(toCsv([{ a: "1" }])).toBe('"a"\r\n"1"\r\n');
  });

  it("returns an empty string for no rows", () => {
    expect(toCsv([])).toBe("");
    expect(toCsv([], ["a", "b"])).toBe("");
  });

  it("doubles embedded quotes", () => {
    expect(toCsv([{ name: 'Say "Hello"', value: "test" }])).toBe('"name","value"\r\n"Say ""Hello""","test"\r\n');
  });

  it("keeps commas inside the quoted field", () => {
    expect(toCsv([{ name: "Smith, John", value: "test" }])).toBe('"name","value"\r\n"Smith, John","test"\r\n');
  });

  it("fills missing keys and drops extra ones", () => {
    const rows = [{ a: 1, x: 9 }, { b: 2 }];
    expect(toCsv(rows, ["a", "b"])).toBe('"a","b"\r\n"1",""\r\n"","2"\r\n');
  });

  it("renders non-string values as text", () => {
    const row = {
      empty: null,
      missing: undefined,
      when: new Date("2024-01-02T03:04:05.000Z"),
      raw: Buffer.from([0xde, 0xad]),
      json: { k: 1 },
      num: 1.5,
      flag: true,
      big: 12345678901234567890n,
    };
    expect(toCsv([row]).split("\r\n")[1]).toBe(
      '"","","2024-01-02T03:04:05.000Z","dead","{""k"":1}","1.5","true","12345678901234567890"',
    );
  });
});
