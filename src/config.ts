import { DEFAULT_SERVER_CONFIG, HTTP_TOKEN_REGEX } from "./global";
import { ServerConfig, ServerOptions } from "./types";
import { ConfigError } from "./utils/HttpError";

const POSITIVE_INTEGER_KEYS = [
  "highWaterMark",
  "keepAliveTimeoutMs",
  "requestTimeoutMs",
  "disconnectGraceMs",
  "gracefulShutdownTimeoutMs",
  "lifespanTimeoutMs",
  "maxHeaderBytes",
] as const;

export function resolveConfig(options: ServerOptions = {}): ServerConfig {
  const config: ServerConfig = { ...DEFAULT_SERVER_CONFIG, ...options };

  for (const key of POSITIVE_INTEGER_KEYS) {
    if (!Number.isInteger(config[key]) || config[key] <= 0) {
      throw new ConfigError(`${key} must be a positive integer, got ${config[key]}`);
    }
  }

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    throw new ConfigError(`port must be between 0 and 65535, got ${config.port}`);
  }

  if (!Number.isInteger(config.lowWaterMark) || config.lowWaterMark < 0) {
    throw new ConfigError(`lowWaterMark must be a non-negative integer, got ${config.lowWaterMark}`);
  }

  if (config.lowWaterMark >= config.highWaterMark) {
    throw new ConfigError(
      `lowWaterMark (${config.lowWaterMark}) must be below highWaterMark (${config.highWaterMark})`
    );
  }

  if (!Number.isInteger(config.eventPoolCapacity) || config.eventPoolCapacity < 0) {
    throw new ConfigError(
      `eventPoolCapacity must be a non-negative integer, got ${config.eventPoolCapacity}`
    );
  }

  for (const key of ["limitConcurrency", "limitMaxRequests"] as const) {
    const limit = config[key];
    if (limit !== null && (!Number.isInteger(limit) || limit <= 0)) {
      throw new ConfigError(`${key} must be a positive integer or null, got ${limit}`);
    }
  }

  if (config.notify && config.notify.intervalMs <= 0) {
    throw new ConfigError(`notify.intervalMs must be positive, got ${config.notify.intervalMs}`);
  }

  for (const [name, value] of config.headers) {
    if (!HTTP_TOKEN_REGEX.test(name) || /[\x00\r\n]|[^\x00-\xff]/.test(value)) {
      throw new ConfigError(`invalid default header: ${name}`);
    }
  }

  return {
    ...config,
    headers: config.headers.map(([name, value]) => [name.toLowerCase(), value]),
  };
}
