import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import type { IServer } from './IServer';
import type { IStorageEngine } from '../interfaces/Storage';
import type { CommandDispatcher } from './CommandDispatcher';
import type { Logger } from '../common/Logger';
import type { StoredValue } from '../common/Types';
import { InvalidArgumentError, TypeMismatchError } from '../common/Errors';

export interface HTTPServerConfig {
  readonly port: number;
  readonly host?: string;
}

type JsonValue = string | string[] | Record<string, string>;

export class HTTPServer implements IServer {
  public readonly name = 'HTTPServer';
  private readonly app: express.Application;
  private readonly store: IStorageEngine;
  private readonly dispatcher: CommandDispatcher;
  private readonly config: HTTPServerConfig;
  private readonly logger: Logger;
  private server: Server | null = null;

  constructor(
    store: IStorageEngine,
    dispatcher: CommandDispatcher,
    config: HTTPServerConfig,
    logger: Logger
  ) {
    this.store = store;
    this.dispatcher = dispatcher;
    this.config = config;
    this.logger = logger;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    this.app.use(express.json({ limit: '1mb' }));
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: Date.now() });
    });

    this.app.get('/info', (_req: Request, res: Response) => {
      res.json({ info: this.store.info(), stats: this.store.stats() });
    });

    this.app.get('/keys', this.handleListKeys.bind(this));

    this.app.get('/keys/:key', this.handleGet.bind(this));

    this.app.put('/keys/:key', this.handlePut.bind(this));

    this.app.delete('/keys/:key', this.handleDelete.bind(this));

    this.app.get('/keys/:key/ttl', this.handleTtl.bind(this));

    this.app.post('/keys/:key/expire', this.handleExpire.bind(this));

    this.app.post('/command', this.handleCommand.bind(this));
  }

  /**
   * Storage errors map onto client errors; everything else is a 500.
   */
  private setupErrorHandling(): void {
    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      if (err instanceof TypeMismatchError) {
        res.status(409).json({ error: err.message });
        return;
      }
      if (err instanceof InvalidArgumentError) {
        res.status(400).json({ error: err.message });
        return;
      }
      this.logger.error('HTTPServer: Unhandled error:', err);
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  private handleListKeys(req: Request, res: Response): void {
    const { pattern } = req.query;

    if (pattern !== undefined && (typeof pattern !== 'string' || pattern.length === 0)) {
      res.status(400).json({ error: 'Invalid pattern: must be non-empty string' });
      return;
    }

    const keys = pattern === undefined ? this.store.listKeys() : this.store.keys(pattern);
    res.json({ count: keys.length, keys });
  }

  private handleGet(req: Request, res: Response): void {
    const key = req.params['key'] ?? '';
    const value = this.store.get(key);

    if (value === null) {
      res.status(404).json({ error: 'Key not found', key });
      return;
    }

    res.json({ key, value });
  }

  private handlePut(req: Request, res: Response): void {
    const key = req.params['key'] ?? '';
    const body: unknown = req.body;
    const value = readBodyField(body, 'value');
    const ttl = readBodyField(body, 'ttl');

    if (typeof value !== 'string') {
      res.status(400).json({ error: 'Invalid value: must be a string' });
      return;
    }

    if (ttl === undefined) {
      this.store.set(key, value);
      res.json({ success: true });
      return;
    }

    if (typeof ttl !== 'number') {
      res.status(400).json({ error: 'Invalid ttl: must be a non-negative integer' });
      return;
    }

    this.store.setWithTtl(key, value, ttl);
    res.json({ success: true, ttl });
  }

  private handleDelete(req: Request, res: Response): void {
    const key = req.params['key'] ?? '';
    const removed = this.store.delete(key);

    if (removed === null) {
      res.status(404).json({ error: 'Key not found', key });
      return;
    }

    res.json({ key, type: removed.kind, deleted: toJson(removed) });
  }

  private handleTtl(req: Request, res: Response): void {
    const key = req.params['key'] ?? '';
    const status = this.store.ttlStatus(key);

    switch (status.state) {
      case 'missing':
        res.status(404).json({ error: 'Key not found', key });
        return;
      case 'persistent':
        res.json({ key, status: status.state, ttl: null });
        return;
      case 'expired':
        res.json({ key, status: status.state, ttl: -1 });
        return;
      case 'expiring':
        res.json({ key, status: status.state, ttl: status.seconds });
        return;
    }
  }

  private handleExpire(req: Request, res: Response): void {
    const key = req.params['key'] ?? '';
    const ttl = readBodyField(req.body, 'ttl');

    if (typeof ttl !== 'number') {
      res.status(400).json({ error: 'Invalid ttl: must be a non-negative integer' });
      return;
    }

    if (!this.store.expire(key, ttl)) {
      res.status(404).json({ error: 'Key not found', key });
      return;
    }

    res.json({ key, ttl });
  }

  private handleCommand(req: Request, res: Response): void {
    const command = readBodyField(req.body, 'command');

    if (typeof command !== 'string' || command.length === 0) {
      res.status(400).json({ error: 'Invalid command: must be non-empty string' });
      return;
    }

    const reply = this.dispatcher.handleLine(command);
    res.json({ response: reply.line });
  }

  public async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host ?? '127.0.0.1', () => {
        this.logger.info(`HTTPServer: Listening on ${this.config.host ?? '127.0.0.1'}:${this.getPort()}`);
        resolve();
      });
      this.server = server;

      server.on('error', (err: Error) => {
        reject(err);
      });
    });
  }

  public async stop(): Promise<void> {
    const server = this.server;
    if (server === null) {
      return;
    }

    return new Promise((resolve, reject) => {
      server.close((err) => {
        this.server = null;
        if (err) {
          reject(err);
          return;
        }
        this.logger.info('HTTPServer: Stopped');
        resolve();
      });
      server.closeAllConnections();
    });
  }

  public getPort(): number {
    const address = this.server?.address();
    if (address !== null && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }
}

function readBodyField(body: unknown, field: string): unknown {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  return Object.getOwnPropertyDescriptor(body, field)?.value;
}

function toJson(value: StoredValue): JsonValue {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'hash':
      return Object.fromEntries(value.fields);
    case 'list':
      return [...value.items];
  }
}
