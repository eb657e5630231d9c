/**
 * Application assembly: one store shared by reference between the command
 * dispatcher and every network front end.
 */

import { KVStore } from '../storage/KVStore';
import type { KVStoreDependencies } from '../storage/KVStore';
import { CommandDispatcher } from '../server/CommandDispatcher';
import { TCPServer } from '../server/TCPServer';
import { HTTPServer } from '../server/HTTPServer';
import type { IServer } from '../server/IServer';
import { SERVER_VERSION } from '../common/Config';
import type { ServerConfig } from '../common/Config';
import { createLogger } from '../common/Logger';
import type { Logger } from '../common/Logger';

export interface Application {
  readonly config: ServerConfig;
  readonly store: KVStore;
  readonly dispatcher: CommandDispatcher;
  readonly tcpServer: TCPServer;
  readonly httpServer: HTTPServer | undefined;
  readonly logger: Logger;
}

export interface ApplicationOverrides {
  logger?: Logger;
  storeDependencies?: KVStoreDependencies;
}

export function createApplication(config: ServerConfig, overrides?: ApplicationOverrides): Application {
  const logger = overrides?.logger ?? createLogger(config.logLevel);
  const store = new KVStore(overrides?.storeDependencies);
  const dispatcher = new CommandDispatcher(store);

  const tcpServer = new TCPServer(
    dispatcher,
    {
      host: config.host,
      port: config.port,
      maxConnections: config.maxConnections,
      maxLineLength: config.maxLineLength,
      connectionTimeoutMs: config.enableTimeouts ? config.connectionTimeoutMs : undefined,
    },
    logger
  );

  const httpServer = config.enableHttp
    ? new HTTPServer(store, dispatcher, { host: config.host, port: config.httpPort }, logger)
    : undefined;

  return { config, store, dispatcher, tcpServer, httpServer, logger };
}

function serversOf(app: Application): IServer[] {
  return app.httpServer ? [app.tcpServer, app.httpServer] : [app.tcpServer];
}

export async function startApplication(app: Application): Promise<void> {
  for (const server of serversOf(app)) {
    await server.start();
  }
  printStartupInfo(app);
}

export async function shutdownApplication(app: Application): Promise<void> {
  app.logger.info('Shutting down gracefully...');

  for (const server of serversOf(app).reverse()) {
    await server.stop();
  }

  app.logger.info('Shutdown complete');
}

function printStartupInfo(app: Application): void {
  const { config, logger } = app;

  logger.info(`emberkv ${SERVER_VERSION} - Ready!`);
  logger.info(`  TCP commands: ${config.host}:${app.tcpServer.getPort()}`);
  if (app.httpServer) {
    logger.info(`  HTTP API: http://${config.host}:${app.httpServer.getPort()}`);
  }
  logger.info(`  Max connections: ${config.maxConnections}`);
  logger.info(`  Timeouts: ${config.enableTimeouts ? `${config.connectionTimeoutMs / 1000}s` : 'disabled'}`);
  logger.info(`  Log level: ${config.logLevel}`);
}
