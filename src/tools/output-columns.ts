interface Identified {
  catalog?: string;
  schema?: string;
}

/** Catalog and Schema are only shown when at least one record has a value for them. */
export function identifyingColumns(records: readonly Identified[]): string[] {
  const columns: string[] = [];
  if (records.some((r) => r.catalog)) columns.push("Catalog");
  if (records.some((r) => r.schema)) columns.push("Schema");
  return columns;
}
