import * as net from 'net';
import type { IServer } from './IServer';
import { WELCOME_LINE } from './CommandDispatcher';
import type { CommandDispatcher, CommandReply } from './CommandDispatcher';
import { renderError } from './ResponseFormatter';
import type { Logger } from '../common/Logger';

export interface TCPServerConfig {
  readonly port: number;
  readonly host?: string;
  readonly maxConnections: number;
  readonly maxLineLength: number;
  /** Idle timeout; undefined disables it. */
  readonly connectionTimeoutMs?: number | undefined;
}

export class TCPServer implements IServer {
  public readonly name = 'TCPServer';
  private readonly dispatcher: CommandDispatcher;
  private readonly config: TCPServerConfig;
  private readonly logger: Logger;
  private server: net.Server | null = null;
  private connections: Set<net.Socket> = new Set();

  constructor(dispatcher: CommandDispatcher, config: TCPServerConfig, logger: Logger) {
    this.dispatcher = dispatcher;
    this.config = config;
    this.logger = logger;
  }

  public async start(): Promise<void> {
    if (this.server !== null) {
      throw new Error('TCPServer: Already started');
    }

    const server = net.createServer((socket) => this.handleConnection(socket));
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);

      server.listen(this.config.port, this.config.host ?? '127.0.0.1', () => {
        server.off('error', reject);
        server.on('error', (err) => {
          this.logger.error('TCPServer: Server error:', err.message);
        });
        this.logger.info(`TCPServer: Listening on ${this.config.host ?? '127.0.0.1'}:${this.getPort()}`);
        resolve();
      });
    });
  }

  public async stop(): Promise<void> {
    const server = this.server;
    if (server === null) {
      return;
    }

    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();

    return new Promise((resolve) => {
      server.close(() => {
        this.server = null;
        this.logger.info('TCPServer: Stopped');
        resolve();
      });
    });
  }

  public getPort(): number {
    const address = this.server?.address();
    if (address !== null && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }

  public getConnectionCount(): number {
    return this.connections.size;
  }

  private handleConnection(socket: net.Socket): void {
    const clientId = `${socket.remoteAddress}:${socket.remotePort}`;

    if (this.connections.size >= this.config.maxConnections) {
      this.logger.warn(`TCPServer: Rejecting ${clientId} - max connections (${this.config.maxConnections}) reached`);
      socket.on('error', (err) => {
        this.logger.debug(`TCPServer: Socket error on rejected connection - ${clientId}:`, err.message);
      });
      socket.end(`${renderError('Max connections reached')}\n`);
      return;
    }

    this.connections.add(socket);
    this.logger.info(`TCPServer: Client connected - ${clientId}`);

    socket.setEncoding('utf8');
    if (this.config.connectionTimeoutMs !== undefined) {
      socket.setTimeout(this.config.connectionTimeoutMs);
    }

    socket.write(`${WELCOME_LINE}\n`);

    let buffer = '';

    socket.on('data', (chunk: Buffer | string) => {
      buffer += typeof chunk === 'string' ? chunk : chunk.toString('utf8');

      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        const line = buffer.slice(0, newline).replace(/\r$/, '');
        buffer = buffer.slice(newline + 1);

        if (!this.processLine(socket, clientId, line)) {
          buffer = '';
          return;
        }
        newline = buffer.indexOf('\n');
      }

      if (buffer.length > this.config.maxLineLength) {
        buffer = '';
        this.closeWithError(socket, 'Line too long');
      }
    });

    socket.on('timeout', () => {
      this.logger.info(`TCPServer: Client timed out - ${clientId}`);
      this.closeWithError(socket, 'Connection timed out');
    });

    socket.on('close', () => {
      this.connections.delete(socket);
      this.logger.info(`TCPServer: Client disconnected - ${clientId}`);
    });

    socket.on('error', (err) => {
      this.logger.error(`TCPServer: Socket error - ${clientId}:`, err.message);
      this.connections.delete(socket);
    });
  }

  /**
   * @returns false once the connection is closing and no further lines should be read
   */
  private processLine(socket: net.Socket, clientId: string, line: string): boolean {
    if (socket.writableEnded) {
      return false;
    }

    if (line.length > this.config.maxLineLength) {
      this.closeWithError(socket, 'Line too long');
      return false;
    }

    this.logger.debug(`TCPServer: ${clientId} -> ${line}`);

    let reply: CommandReply;
    try {
      reply = this.dispatcher.handleLine(line);
    } catch (err) {
      this.logger.error(`TCPServer: Command failed - ${clientId}:`, err);
      reply = { line: renderError('Internal error'), close: false };
    }

    if (reply.close) {
      socket.end(`${reply.line}\n`);
      return false;
    }

    socket.write(`${reply.line}\n`);
    return true;
  }

  private closeWithError(socket: net.Socket, message: string): void {
    if (!socket.writableEnded) {
      socket.end(`${renderError(message)}\n`);
    }
  }
}
