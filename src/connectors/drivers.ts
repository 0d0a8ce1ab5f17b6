import { DriverMissingError, errorMessage } from "../utils/errors.js";

// Only the parts of the driver APIs the connectors call. Both packages are
// loaded with import() on first connect so a host without them still starts.

export type Callback<T> = (err: Error | null, result: T) => void;

export interface HdbClientOptions {
  host: string;
  port: number;
  user: string;
  password: string;
  databaseName?: string;
  useTLS?: boolean;
  rejectUnauthorized?: boolean;
}

export interface HdbStatement {
  exec(params: unknown[], cb: Callback<unknown>): void;
  drop(cb?: (err: Error | null) => void): void;
}

export interface HdbClient {
  connect(cb: (err: Error | null) => void): void;
  exec(sql: string, cb: Callback<unknown>): void;
  prepare(sql: string, cb: Callback<HdbStatement>): void;
  end(): void;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export interface HdbModule {
  createClient(options: HdbClientOptions): HdbClient;
}

export interface OdbcConnection {
  query(sql: string): Promise<unknown>;
  tables(catalog: string | null, schema: string | null, table: string | null, type: string | null): Promise<unknown>;
  columns(catalog: string | null, schema: string | null, table: string | null, column: string | null): Promise<unknown>;
  close(): Promise<void>;
}

export interface OdbcModule {
  connect(connectionString: string): Promise<OdbcConnection>;
}

export type DriverLoader<T> = () => Promise<T>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function toRows(result: unknown): Record<string, unknown>[] {
  return Array.isArray(result) ? result.filter(isRecord) : [];
}

function hasFunction(value: unknown, name: string): boolean {
  if ((typeof value !== "object" && typeof value !== "function") || value === null) return false;
  return typeof Reflect.get(value, name) === "function";
}

export function isHdbModule(value: unknown): value is HdbModule {
  return hasFunction(value, "createClient");
}

export function isOdbcModule(value: unknown): value is OdbcModule {
  return hasFunction(value, "connect");
}

/**
 * Import a driver package by name. CommonJS packages come back wrapped in a
 * namespace object, so the default export is checked too.
 */
export async function loadDriver<T>(
  packageName: string,
  isDriver: (value: unknown) => value is T,
  installHint: string,
): Promise<T> {
  let mod: unknown;
  try {
    mod = await import(packageName);
  } catch (err) {
    throw new DriverMissingError(`${installHint} (${errorMessage(err)})`);
  }

  if (isDriver(mod)) return mod;
  const fallback = isRecord(mod) ? mod.default : undefined;
  if (isDriver(fallback)) return fallback;

  throw new DriverMissingError(`Package "${packageName}" does not expose the expected driver API`);
}

export const loadHdb: DriverLoader<HdbModule> = () =>
  loadDriver("hdb", isHdbModule, "The hdb package is required for SAP HANA connections. Install with: npm install hdb");

export const loadOdbc: DriverLoader<OdbcModule> = () =>
  loadDriver("odbc", isOdbcModule, "The odbc package is required for ODBC connections. Install with: npm install odbc");
