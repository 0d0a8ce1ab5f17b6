import { z } from "zod";

export const DEFAULT_HANA_PORT = 30013;
export const DEFAULT_HTTP_PORT = 8088;

const ServerConfigSchema = z.object({
  name: z.string().min(1, "server.name is required"),
  prefix: z
    .string()
    .min(1, "server.prefix is required")
    .regex(/^[A-Za-z0-9_-]+$/, "server.prefix may only contain letters, digits, '_' and '-'"),
  version: z.string().default("1.0.0"),
});

const HanaConnectorConfigSchema = z.object({
  type: z.literal("hana"),
  host: z.string().min(1, "HANA host is required"),
  port: z.number().int().positive().default(DEFAULT_HANA_PORT), // SYSTEMDB SQL port of instance 00
  user: z.string().min(1, "HANA user is required"),
  password: z.string().min(1, "HANA password is required"),
  databaseName: z.string().optional(),
  encrypt: z.boolean().default(false),
  sslValidateCertificate: z.boolean().default(true),
});

const OdbcConnectorConfigSchema = z.object({
  type: z.literal("odbc"),
  connectionString: z.string().min(1, "ODBC connectionString is required"),
});

const ConnectorConfigSchema = z.preprocess(
  (value) =>
    value !== null && typeof value === "object" && !("type" in value) ? { ...value, type: "hana" } : value,
  z.discriminatedUnion("type", [HanaConnectorConfigSchema, OdbcConnectorConfigSchema]),
);

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const HttpTransportConfigSchema = z.object({
  type: z.literal("http"),
  port: z.number().int().positive().default(DEFAULT_HTTP_PORT),
  host: z.string().default("127.0.0.1"),
  stateless: z.boolean().default(false),
  sessionTimeout: z.number().default(30 * 60 * 1000), // 30 minutes
  auth: z
    .object({
      type: z.literal("bearer"),
      token: z.string().min(1),
    })
    .optional(),
});

const StdioTransportConfigSchema = z.object({
  type: z.literal("stdio"),
});

const TransportConfigSchema = z.discriminatedUnion("type", [StdioTransportConfigSchema, HttpTransportConfigSchema]);

export const AppConfigSchema = z.object({
  server: ServerConfigSchema,
  connector: ConnectorConfigSchema,
  transport: TransportConfigSchema.optional().default({ type: "stdio" }),
  logLevel: LogLevelSchema.default("info"),
  logFile: z.string().optional(),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type HanaConnectorConfig = z.infer<typeof HanaConnectorConfigSchema>;
export type OdbcConnectorConfig = z.infer<typeof OdbcConnectorConfigSchema>;
export type ConnectorConfig = HanaConnectorConfig | OdbcConnectorConfig;
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type HttpTransportConfig = z.infer<typeof HttpTransportConfigSchema>;
export type TransportConfig = z.infer<typeof TransportConfigSchema>;
