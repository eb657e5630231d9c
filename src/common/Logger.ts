import { LogLevel } from './Config';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const levelWeights: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

export type LogSink = Pick<Console, 'log' | 'warn' | 'error'>;

export function createLogger(level: LogLevel, sink: LogSink = console): Logger {
  const threshold = levelWeights[level];
  const shouldLog = (entryLevel: LogLevel): boolean => levelWeights[entryLevel] >= threshold;

  return {
    debug(message, ...details) {
      if (shouldLog(LogLevel.DEBUG)) sink.log(message, ...details);
    },
    info(message, ...details) {
      if (shouldLog(LogLevel.INFO)) sink.log(message, ...details);
    },
    warn(message, ...details) {
      if (shouldLog(LogLevel.WARN)) sink.warn(message, ...details);
    },
    error(message, ...details) {
      if (shouldLog(LogLevel.ERROR)) sink.error(message, ...details);
    },
  };
}

export const silentLogger: Logger = createLogger(LogLevel.ERROR, {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
});
