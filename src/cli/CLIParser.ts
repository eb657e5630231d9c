import type { ServerConfig } from '../common/Config';
import {
  DEFAULT_CONFIG,
  loadConfigFromEnv,
  parseLogLevel,
  resolveServerConfig,
} from '../common/Config';
import { ConfigError } from '../common/Errors';

export interface CLIOptions {
  readonly config: ServerConfig;
  readonly help: boolean;
}

export interface BenchmarkOptions {
  readonly host: string;
  readonly port: number;
  readonly operations: number;
  readonly clients: number;
  readonly durationMs?: number;
  readonly help: boolean;
}

export class CLIParser {
  private readonly args: string[];
  private readonly env: NodeJS.ProcessEnv;

  constructor(args: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env) {
    this.args = args;
    this.env = env;
  }

  /**
   * Precedence: flags, then EMBERKV_* environment variables, then defaults.
   */
  public parse(): CLIOptions {
    if (this.hasFlag('--help') || this.hasFlag('-h')) {
      return { config: DEFAULT_CONFIG, help: true };
    }

    const fromEnv = loadConfigFromEnv(this.env);
    const flags: Partial<ServerConfig> = {};

    const host = this.getString('--host');
    if (host !== undefined) flags.host = host;

    const port = this.getNumber('--port');
    if (port !== undefined) flags.port = port;

    const httpPort = this.getNumber('--http-port');
    if (httpPort !== undefined) flags.httpPort = httpPort;

    if (this.hasFlag('--no-http')) flags.enableHttp = false;

    const maxConnections = this.getNumber('--max-connections');
    if (maxConnections !== undefined) flags.maxConnections = maxConnections;

    const timeoutSeconds = this.getNumber('--timeout');
    if (timeoutSeconds !== undefined) flags.connectionTimeoutMs = timeoutSeconds * 1000;

    if (this.hasFlag('--enable-timeouts')) flags.enableTimeouts = true;

    const maxLineLength = this.getNumber('--max-line-length');
    if (maxLineLength !== undefined) flags.maxLineLength = maxLineLength;

    const logLevel = this.getString('--log-level');
    if (logLevel !== undefined) flags.logLevel = parseLogLevel(logLevel);

    return { config: resolveServerConfig({ ...fromEnv, ...flags }), help: false };
  }

  public parseBenchmark(): BenchmarkOptions {
    const durationSeconds = this.getNumber('--duration');

    return {
      host: this.getString('--host') ?? DEFAULT_CONFIG.host,
      port: this.getNumber('--port') ?? DEFAULT_CONFIG.port,
      operations: this.getNumber('--ops') ?? 1000,
      clients: this.getNumber('--clients') ?? 1,
      ...(durationSeconds !== undefined ? { durationMs: durationSeconds * 1000 } : {}),
      help: this.hasFlag('--help') || this.hasFlag('-h'),
    };
  }

  private getString(flag: string): string | undefined {
    const inline = this.args.find(arg => arg.startsWith(`${flag}=`));
    if (inline !== undefined) {
      return inline.slice(flag.length + 1);
    }

    const flagIndex = this.args.indexOf(flag);
    if (flagIndex !== -1 && flagIndex + 1 < this.args.length) {
      return this.args[flagIndex + 1];
    }

    return undefined;
  }

  private getNumber(flag: string): number | undefined {
    const str = this.getString(flag);
    if (str === undefined) return undefined;

    if (!/^\d+$/.test(str)) {
      throw new ConfigError(`Invalid number for ${flag}: ${str}`);
    }
    return parseInt(str, 10);
  }

  private hasFlag(flag: string): boolean {
    return this.args.includes(flag);
  }

  public static printHelp(): void {
    console.log(`
emberkv - in-memory key-value store

Usage: node dist/index.js [options]

Options:
  --help, -h                Show this help message

Server Options:
  --host=HOST               Interface to bind (default: 127.0.0.1, env EMBERKV_HOST)
  --port=PORT               TCP command port (default: 2312, env EMBERKV_PORT)
  --http-port=PORT          HTTP API port (default: 2313, env EMBERKV_HTTP_PORT)
  --no-http                 Disable the HTTP API (env EMBERKV_ENABLE_HTTP=false)
  --max-connections=N       Concurrent TCP clients (default: 100, env EMBERKV_MAX_CONNECTIONS)
  --enable-timeouts         Close idle TCP clients (env EMBERKV_ENABLE_TIMEOUTS=true)
  --timeout=SECONDS         Idle timeout (default: 30, env EMBERKV_TIMEOUT)
  --max-line-length=BYTES   Longest accepted command line (default: 65536, env EMBERKV_MAX_LINE_LENGTH)
  --log-level=LEVEL         debug, info, warn, error (default: info, env EMBERKV_LOG_LEVEL)

Examples:
  # Defaults: TCP on 127.0.0.1:2312, HTTP on 127.0.0.1:2313
  node dist/index.js

  # All interfaces, idle clients dropped after 60s
  node dist/index.js --host=0.0.0.0 --enable-timeouts --timeout=60

  # Talk to it
  printf 'SET greeting hello\\nGET greeting\\nQUIT\\n' | nc 127.0.0.1 2312
`);
  }
}
