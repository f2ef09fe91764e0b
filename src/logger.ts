import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import type { DestinationStream, Logger as PinoLogger } from 'pino';
import * as rfs from 'rotating-file-stream';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Also write JSON lines here, rotated weekly and kept for about a month. */
  logFile?: string;
  /** Terminal output; defaults to pretty-printed stderr. */
  destination?: DestinationStream;
}

const LOG_FILE_ROTATION = '7d';
const LOG_FILE_KEEP = 5;

export function createLogFileStream(file: string): rfs.RotatingFileStream {
  const directory = path.dirname(path.resolve(file));
  fs.mkdirSync(directory, { recursive: true });
  return rfs.createStream(path.basename(file), {
    path: directory,
    interval: LOG_FILE_ROTATION,
    maxFiles: LOG_FILE_KEEP,
  });
}

// stderr keeps `--check` output and piped stdout clean
function prettyStderr(): DestinationStream {
  return pino.transport({
    target: 'pino-pretty',
    options: {
      destination: 2,
      translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
      ignore: 'pid,hostname',
    },
  });
}

export function createLogger(options: LoggerOptions = {}): PinoLogger {
  const level = options.level ?? 'info';
  const terminal = options.destination ?? prettyStderr();
  if (!options.logFile) {
    return pino({ name: 'shopping-sync', level }, terminal);
  }
  const streams = pino.multistream([
    { level: 'debug', stream: terminal },
    { level: 'debug', stream: createLogFileStream(options.logFile) },
  ]);
  return pino({ name: 'shopping-sync', level }, streams);
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

let rootLogger: Logger | null = null;

/** Replaces the shared logger; call once the configuration is known. */
export function configureLogger(options: LoggerOptions): Logger {
  rootLogger = createLogger(options);
  return rootLogger;
}

export function getLogger(): Logger {
  if (!rootLogger) rootLogger = createLogger();
  return rootLogger;
}
