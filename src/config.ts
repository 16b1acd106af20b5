import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parseAlertMode, type AlertMode } from "./alerts.js";
import { ConfigError, getErrorMessage } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export const ConnectionConfigSchema = Type.Object({
  driver: Type.Union([Type.Literal("sqlite"), Type.Literal("postgres"), Type.Literal("mysql")]),
  path: Type.Optional(Type.String({ description: "Database file (sqlite)" })),
  connectionString: Type.Optional(Type.String({ description: "Connection URL (postgres, mysql)" })),
  readOnly: Type.Optional(Type.Boolean({ description: "Refuse statements that write" })),
});

export type ConnectionConfig = Static<typeof ConnectionConfigSchema>;
export type DriverName = ConnectionConfig["driver"];

const RawConfigSchema = Type.Object({
  connections: Type.Optional(Type.Record(Type.String(), ConnectionConfigSchema)),
  defaultConnection: Type.Optional(Type.String()),
  maxRows: Type.Optional(Type.Integer({ minimum: 1 })),
  queryTimeout: Type.Optional(Type.Integer({ minimum: 0 })),
  alertMode: Type.Optional(Type.Union([Type.String(), Type.Integer()])),
  logLevel: Type.Optional(Type.String()),
  historyPath: Type.Optional(Type.String()),
});

export interface SqlrunConfig {
  connections: Record<string, ConnectionConfig>;
  defaultConnection: string;
  maxRows: number;
  /** milliseconds; 0 disables the server-side timeout */
  queryTimeout: number;
  alertMode: AlertMode;
  logLevel: LogLevel;
  historyPath: string;
}

export const MAX_ROWS_CAP = 10000;
export const DEFAULT_CONFIG_PATH = "~/.config/sqlrun/config.json";

const DEFAULTS: SqlrunConfig = {
  connections: {},
  defaultConnection: "",
  maxRows: 1000,
  queryTimeout: 30000,
  alertMode: "off",
  logLevel: "info",
  historyPath: "~/.config/sqlrun/history.json",
};

export function resolveConfig(raw?: unknown): SqlrunConfig {
  if (raw === undefined) return { ...DEFAULTS, connections: {} };

  if (!Value.Check(RawConfigSchema, raw)) {
    const first = Value.Errors(RawConfigSchema, raw).First();
    const where = first?.path ? ` at ${first.path}` : "";
    throw new ConfigError(`Invalid configuration${where}: ${first?.message ?? "unexpected shape"}`);
  }

  let alertMode = DEFAULTS.alertMode;
  if (raw.alertMode !== undefined) {
    const parsed = parseAlertMode(raw.alertMode);
    if (!parsed) {
      throw new ConfigError(`Invalid alertMode "${raw.alertMode}". Use off, delete or write.`);
    }
    alertMode = parsed;
  }

  let logLevel = DEFAULTS.logLevel;
  if (raw.logLevel !== undefined) {
    if (!isLogLevel(raw.logLevel)) {
      throw new ConfigError(`Invalid logLevel "${raw.logLevel}".`);
    }
    logLevel = raw.logLevel;
  }

  const connections = raw.connections ?? {};
  return {
    connections,
    defaultConnection: raw.defaultConnection ?? Object.keys(connections)[0] ?? "",
    maxRows: Math.min(raw.maxRows ?? DEFAULTS.maxRows, MAX_ROWS_CAP),
    queryTimeout: raw.queryTimeout ?? DEFAULTS.queryTimeout,
    alertMode,
    logLevel,
    historyPath: raw.historyPath ?? DEFAULTS.historyPath,
  };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Load configuration from `path`, else $SQLRUN_CONFIG, else the default
 * location. Only a missing file at the default location falls back to
 * defaults; an explicitly named file must exist.
 */
export async function loadConfig(path?: string): Promise<SqlrunConfig> {
  const explicit = path ?? process.env.SQLRUN_CONFIG;
  const file = resolvePath(explicit ?? DEFAULT_CONFIG_PATH);

  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (e) {
    if (explicit === undefined && isNotFound(e)) return resolveConfig();
    throw new ConfigError(`Cannot read config file ${file}: ${getErrorMessage(e)}`, { cause: e });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Config file ${file} is not valid JSON: ${getErrorMessage(e)}`, { cause: e });
  }
  return resolveConfig(raw);
}

export function resolveConnectionName(cfg: SqlrunConfig, name?: string): string {
  const available = Object.keys(cfg.connections);
  const chosen = name || cfg.defaultConnection || (available.length === 1 ? available[0] : "");

  if (!chosen) {
    if (available.length === 0) {
      throw new ConfigError("No database connections configured. Add connections to the sqlrun config file.");
    }
    throw new ConfigError(`Multiple connections available (${available.join(", ")}). Specify which one to use.`);
  }
  if (!cfg.connections[chosen]) {
    throw new ConfigError(
      available.length > 0
        ? `Connection "${chosen}" not found. Available: ${available.join(", ")}`
        : `No database connections configured. Add connections to the sqlrun config file.`
    );
  }
  return chosen;
}

const ENV_REF = /\$([A-Z_][A-Z0-9_]*)/gi;

/** Substitutes `$NAME` references from the environment; an unset name is a ConfigError. */
export function expandEnv(value: string): string {
  return value.replace(ENV_REF, (_ref, name: string) => {
    const replacement = process.env[name];
    if (replacement === undefined) {
      throw new ConfigError(`Environment variable $${name} is not set. Set it before connecting.`);
    }
    return replacement;
  });
}

/** `expandEnv`, then a leading `~/` becomes $HOME. */
export function resolvePath(p: string): string {
  const expanded = expandEnv(p);
  return expanded.startsWith("~/") ? `${process.env.HOME ?? "/tmp"}${expanded.slice(1)}` : expanded;
}

/** Show driver and host at most, never credentials. */
export function maskConnectionString(connCfg: ConnectionConfig): string {
  if (connCfg.driver === "sqlite") return connCfg.path ?? ":memory:";
  const raw = connCfg.connectionString ?? "";
  if (raw.startsWith("$")) return raw; // env var reference, safe to show
  try {
    const url = new URL(raw);
    return `${url.protocol}//${url.host}/${url.pathname.slice(1).split("/")[0] ?? ""}`;
  } catch {
    return "[configured]";
  }
}
