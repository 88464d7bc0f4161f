import fs from "fs";
import path from "path";
import { parse } from "smol-toml";

export interface Config {
  host: string;
  port: number;
  db_path: string;
  default_limit: number;
  max_limit: number;
  cors_origins: string[];
  log_requests: boolean;
}

const DEFAULTS: Config = {
  host: "0.0.0.0",
  port: 8000,
  db_path: "tasks.db",
  default_limit: 10,
  max_limit: 100,
  cors_origins: ["*"],
  log_requests: true,
};

export function getConfigPath(): string {
  if (process.env.TASKS_CONFIG) {
    return process.env.TASKS_CONFIG;
  }
  return path.join(process.cwd(), "tasks.toml");
}

function isPort(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 && value < 65536;
}

function isPositiveInt(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

export function loadConfig(configPath?: string): Config {
  const resolved = configPath ?? getConfigPath();

  if (!fs.existsSync(resolved)) {
    return { ...DEFAULTS };
  }

  const raw = fs.readFileSync(resolved, "utf-8");
  let parsed;
  try {
    parsed = parse(raw);
  } catch (err) {
    process.stderr.write(
      `Warning: Could not parse config file at ${resolved}: ${err instanceof Error ? err.message : String(err)}. Using defaults.\n`,
    );
    return { ...DEFAULTS };
  }
  const config = { ...DEFAULTS };

  if (typeof parsed.host === "string" && parsed.host.length > 0) {
    config.host = parsed.host;
  }

  if (isPort(parsed.port)) {
    config.port = parsed.port;
  }

  if (typeof parsed.db_path === "string" && parsed.db_path.length > 0) {
    config.db_path = parsed.db_path;
  }

  if (isPositiveInt(parsed.max_limit)) {
    config.max_limit = parsed.max_limit;
  }

  if (isPositiveInt(parsed.default_limit)) {
    config.default_limit = parsed.default_limit;
  }
  if (config.default_limit > config.max_limit) {
    config.default_limit = config.max_limit;
  }

  const origins = parsed.cors_origins;
  if (
    Array.isArray(origins) &&
    origins.length > 0 &&
    origins.every((o): o is string => typeof o === "string")
  ) {
    config.cors_origins = origins;
  }

  if (typeof parsed.log_requests === "boolean") {
    config.log_requests = parsed.log_requests;
  }

  return config;
}

/** Environment variables win over the config file. Invalid values are ignored. */
export function applyEnv(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const result = { ...config };

  if (env.TASKS_HOST) {
    result.host = env.TASKS_HOST;
  }

  if (env.TASKS_PORT) {
    const port = Number(env.TASKS_PORT);
    if (isPort(port)) {
      result.port = port;
    } else {
      process.stderr.write(`Warning: Ignoring invalid TASKS_PORT: ${env.TASKS_PORT}\n`);
    }
  }

  if (env.TASKS_DB_PATH) {
    result.db_path = env.TASKS_DB_PATH;
  }

  if (env.TASKS_LOG_REQUESTS === "0") {
    result.log_requests = false;
  } else if (env.TASKS_LOG_REQUESTS === "1") {
    result.log_requests = true;
  }

  return result;
}
