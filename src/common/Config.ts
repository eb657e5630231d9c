import { ConfigError } from './Errors';

export const SERVER_VERSION = '1.0.0';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export interface ServerConfig {
  host: string;
  port: number;
  httpPort: number;
  enableHttp: boolean;
  maxConnections: number;
  connectionTimeoutMs: number;
  enableTimeouts: boolean;
  maxLineLength: number;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: ServerConfig = {
  host: '127.0.0.1',
  port: 2312,
  httpPort: 2313,
  enableHttp: true,
  maxConnections: 100,
  connectionTimeoutMs: 30_000,
  enableTimeouts: false,
  maxLineLength: 64 * 1024,
  logLevel: LogLevel.INFO,
};

export const ENV_PREFIX = 'EMBERKV_';

export function parseLogLevel(value: string): LogLevel {
  const normalized = value.toLowerCase();
  switch (normalized) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    default: throw new ConfigError(`Invalid log level: ${value}. Must be debug, info, warn, or error`);
  }
}

/**
 * Reads EMBERKV_* variables. Numbers that do not parse are ignored so a
 * stray variable cannot stop the server; the defaults stay in effect.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ServerConfig> {
  const config: Partial<ServerConfig> = {};

  const host = env[`${ENV_PREFIX}HOST`];
  if (host) {
    config.host = host;
  }

  const port = parseEnvInteger(env[`${ENV_PREFIX}PORT`]);
  if (port !== undefined) {
    config.port = port;
  }

  const httpPort = parseEnvInteger(env[`${ENV_PREFIX}HTTP_PORT`]);
  if (httpPort !== undefined) {
    config.httpPort = httpPort;
  }

  const enableHttp = env[`${ENV_PREFIX}ENABLE_HTTP`];
  if (enableHttp !== undefined) {
    config.enableHttp = enableHttp.toLowerCase() === 'true';
  }

  const maxConnections = parseEnvInteger(env[`${ENV_PREFIX}MAX_CONNECTIONS`]);
  if (maxConnections !== undefined) {
    config.maxConnections = maxConnections;
  }

  const timeoutSeconds = parseEnvInteger(env[`${ENV_PREFIX}TIMEOUT`]);
  if (timeoutSeconds !== undefined) {
    config.connectionTimeoutMs = timeoutSeconds * 1000;
  }

  const enableTimeouts = env[`${ENV_PREFIX}ENABLE_TIMEOUTS`];
  if (enableTimeouts !== undefined) {
    config.enableTimeouts = enableTimeouts.toLowerCase() === 'true';
  }

  const maxLineLength = parseEnvInteger(env[`${ENV_PREFIX}MAX_LINE_LENGTH`]);
  if (maxLineLength !== undefined) {
    config.maxLineLength = maxLineLength;
  }

  const logLevel = env[`${ENV_PREFIX}LOG_LEVEL`];
  if (logLevel) {
    config.logLevel = parseLogLevel(logLevel);
  }

  return config;
}

export function resolveServerConfig(config?: Partial<ServerConfig>): ServerConfig {
  const resolved = { ...DEFAULT_CONFIG, ...config };

  assertPort('port', resolved.port);
  assertPort('httpPort', resolved.httpPort);

  if (resolved.host.length === 0) {
    throw new ConfigError('host must be a non-empty string');
  }
  if (!Number.isInteger(resolved.maxConnections) || resolved.maxConnections < 1) {
    throw new ConfigError('maxConnections must be >= 1');
  }
  if (!Number.isInteger(resolved.connectionTimeoutMs) || resolved.connectionTimeoutMs < 1) {
    throw new ConfigError('connectionTimeoutMs must be >= 1');
  }
  if (!Number.isInteger(resolved.maxLineLength) || resolved.maxLineLength < 16) {
    throw new ConfigError('maxLineLength must be >= 16');
  }

  return resolved;
}

function assertPort(name: string, port: number): void {
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`${name} must be between 0 and 65535`);
  }
}

function parseEnvInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  return parseInt(value, 10);
}
