import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { ConfigurationError } from "./types.js";

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 6379;

/**
 * Where and how the todo store reaches its Redis server.
 */
export interface TodoStoreConfig {
  host: string;
  port: number;

  /**
   * Sent with `AUTH` after connecting. Empty or absent skips authentication.
   */
  password?: string;

  /**
   * Milliseconds each store command may take before failing with a `TimeoutError`.
   * Absent means commands may wait indefinitely.
   */
  commandTimeout?: number;
}

/**
 * Applies defaults to a partial configuration and validates it.
 *
 * @param {unknown} input - Configuration values, typically parsed from a file
 * @returns {TodoStoreConfig} Complete configuration
 * @throws {ConfigurationError} If a value has the wrong type or is out of range
 *
 * @example
 * ```typescript
 * resolveConfig({ port: 6380 });
 * // { host: "localhost", port: 6380 }
 * ```
 */
export function resolveConfig(input: unknown = {}): TodoStoreConfig {
  if (input === null || typeof input !== "object" || Array.isArray(input)) {
    throw new ConfigurationError("Configuration must be an object");
  }

  const source = new Map<string, unknown>(Object.entries(input));
  const host = source.get("host") ?? DEFAULT_HOST;
  const port = source.get("port") ?? DEFAULT_PORT;
  const password = source.get("password");
  const commandTimeout = source.get("commandTimeout");

  if (typeof host !== "string" || host === "") {
    throw new ConfigurationError("host must be a non-empty string");
  }
  if (typeof port !== "number" || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`port must be an integer between 1 and 65535, got ${String(port)}`);
  }

  const config: TodoStoreConfig = { host, port };

  if (password !== undefined && password !== null) {
    if (typeof password !== "string") {
      throw new ConfigurationError("password must be a string");
    }
    if (password !== "") {
      config.password = password;
    }
  }

  if (commandTimeout !== undefined && commandTimeout !== null) {
    if (typeof commandTimeout !== "number" || !Number.isInteger(commandTimeout) || commandTimeout <= 0) {
      throw new ConfigurationError(`commandTimeout must be a positive integer, got ${String(commandTimeout)}`);
    }
    config.commandTimeout = commandTimeout;
  }

  return config;
}

/**
 * Reads a YAML configuration file.
 *
 * @example
 * ```yaml
 * host: redis.internal
 * port: 6380
 * password: test-secret
 * commandTimeout: 2000
 * ```
 */
export async function loadConfigFile(path: string): Promise<TodoStoreConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Could not read configuration file "${path}"`, { cause: error });
  }

  let document: unknown;
  try {
    document = parse(text);
  } catch (error) {
    throw new ConfigurationError(`Could not parse configuration file "${path}"`, { cause: error });
  }

  // An empty file parses to null and means "all defaults"
  return resolveConfig(document ?? {});
}

/**
 * Reads `REDIS_HOST`, `REDIS_PORT`, `REDIS_PASSWORD` and `REDIS_COMMAND_TIMEOUT`.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): TodoStoreConfig {
  const integer = (name: string): number | undefined => {
    const raw = env[name];
    if (raw === undefined || raw === "") return undefined;
    if (!/^\d+$/.test(raw)) {
      throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
    }
    return Number(raw);
  };

  return resolveConfig({
    host: env.REDIS_HOST || undefined,
    port: integer("REDIS_PORT"),
    password: env.REDIS_PASSWORD,
    commandTimeout: integer("REDIS_COMMAND_TIMEOUT"),
  });
}
