function renderValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString("hex");
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function quoteField(value: unknown): string {
  return `"${renderValue(value).replace(/"/g, '""')}"`;
}

/**
 * Render rows as CSV with a header line. Every field is quoted.
 *
 * Columns default to the keys of the first row. Keys missing from a row
 * produce an empty field; keys not listed in `columns` are dropped.
 * Lines end in CRLF. Returns an empty string for no rows.
 */
export function toCsv(rows: readonly Record<string, unknown>[], columns?: readonly string[]): string {
  if (rows.length === 0) return "";

  const header = columns ?? Object.keys(rows[0]);
  const lines = [header.map(quoteField).join(",")];
  for (const row of rows) {
    lines.push(header.map((col) => quoteField(row[col])).join(","));
  }
  return lines.join("\r\n") + "\r\n";
}
