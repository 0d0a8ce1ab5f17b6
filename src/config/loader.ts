import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema, type AppConfig } from "./types.js";

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

const USAGE = "Usage: hana-mcp --config <path-to-config.json> [--transport stdio|http] [--host <host>] [--port <port>]";

export interface CliArgs {
  configPath: string;
  transport?: "stdio" | "http";
  host?: string;
  port?: number;
}

export function resolveEnvVariables(obj: unknown): unknown {
  if (typeof obj === "string") {
    return obj.replace(ENV_VAR_PATTERN, (match, varName: string) => {
      const value = process.env[varName];
      if (value === undefined) {
        throw new Error(`Environment variable "${varName}" is not defined (referenced as "${match}")`);
      }
      return value;
    });
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVariables(item));
  }
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVariables(value);
    }
    return result;
  }
  return obj;
}

export function loadConfig(configPath: string): AppConfig {
  const absolutePath = resolve(configPath);
  if (!existsSync(absolutePath)) {
    throw new Error(`Configuration file not found: ${configPath}`);
  }
  const raw = readFileSync(absolutePath, "utf-8");
  const json: unknown = JSON.parse(raw);
  const resolved = resolveEnvVariables(json);
  return AppConfigSchema.parse(resolved);
}

function optionValue(args: string[], ...names: string[]): string | undefined {
  for (const name of names) {
    const index = args.indexOf(name);
    if (index !== -1 && index + 1 < args.length) return args[index + 1];
  }
  return undefined;
}

export function parseCliArgs(args: string[]): CliArgs {
  const configPath = optionValue(args, "--config", "-c");
  if (!configPath) {
    throw new Error(USAGE);
  }

  const result: CliArgs = { configPath };

  const transport = optionValue(args, "--transport", "-t");
  if (transport !== undefined) {
    if (transport !== "stdio" && transport !== "http") {
      throw new Error(`Invalid transport: "${transport}". Must be "stdio" or "http".`);
    }
    result.transport = transport;
  }

  const host = optionValue(args, "--host", "-H");
  if (host !== undefined) result.host = host;

  const port = optionValue(args, "--port", "-p");
  if (port !== undefined) {
    const parsed = Number(port);
    if (!Number.isInteger(parsed) || parsed <= 0 || parsed > 65535) {
      throw new Error(`Invalid port: "${port}"`);
    }
    result.port = parsed;
  }

  return result;
}
