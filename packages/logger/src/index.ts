import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import pino, { multistream, type Logger as PinoLogger, type StreamEntry } from 'pino';

const packageDirectory = fileURLToPath(new URL('.', import.meta.url));
const repositoryRoot = path.resolve(packageDirectory, '..', '..', '..');

const managedLoggers = new Map<string, ManagedLogger>();

interface ManagedLogger {
  logger: Logger;
  fileStream: fs.WriteStream | null;
  filePath: string | null;
  cleanup: () => void;
}

export type Logger = PinoLogger;

export interface LoggerOptions {
  /** Also write to a per-run file under the log root. Defaults to LOG_TO_FILE, then true. */
  file?: boolean;
  level?: string;
  /** Log root; defaults to LOG_DIR, then `<repo>/logs`. */
  dir?: string;
}

function resolveLogRoot(options: LoggerOptions): string {
  const configured = (options.dir ?? process.env.LOG_DIR)?.trim();
  if (configured && configured.length > 0) {
    return path.resolve(configured);
  }
  return path.join(repositoryRoot, 'logs');
}

function fileLoggingEnabled(options: LoggerOptions): boolean {
  if (typeof options.file === 'boolean') {
    return options.file;
  }
  return process.env.LOG_TO_FILE?.trim() !== '0';
}

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;
type LogLevel = (typeof LEVELS)[number];

function resolveLevel(configured: string | undefined): LogLevel {
  const wanted = (configured ?? 'debug').trim().toLowerCase();
  return LEVELS.find((level) => level === wanted) ?? 'debug';
}

function createRunFileName(): string {
  const iso = new Date().toISOString().replace(/[:.]/g, '-');
  return `run-${iso}-${process.pid}.log`;
}

function openRunLog(serviceName: string, options: LoggerOptions): { filePath: string; stream: fs.WriteStream } {
  const serviceDir = path.join(resolveLogRoot(options), serviceName);
  fs.mkdirSync(serviceDir, { recursive: true });

  const filePath = path.join(serviceDir, createRunFileName());
  const stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
  return { filePath, stream };
}

function registerProcessHandlers(logger: Logger): () => void {
  const handleRejection = (reason: unknown) => {
    logger.error({ err: reason }, 'Unhandled promise rejection');
  };

  const handleException = (error: Error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
  };

  const handleBeforeExit = (code: number) => {
    logger.info({ code }, 'Process exiting, flushing logs');
    logger.flush();
  };

  process.on('unhandledRejection', handleRejection);
  process.on('uncaughtExceptionMonitor', handleException);
  process.once('beforeExit', handleBeforeExit);

  return () => {
    process.off('unhandledRejection', handleRejection);
    process.off('uncaughtExceptionMonitor', handleException);
    process.off('beforeExit', handleBeforeExit);
  };
}

export function makeLogger(serviceName: string, options: LoggerOptions = {}): Logger {
  const existing = managedLoggers.get(serviceName);
  if (existing) {
    return existing.logger;
  }

  const level = resolveLevel(options.level ?? process.env.LOG_LEVEL);
  const streams: StreamEntry[] = [{ stream: process.stdout, level }];

  let runLog: { filePath: string; stream: fs.WriteStream } | null = null;
  if (fileLoggingEnabled(options)) {
    runLog = openRunLog(serviceName, options);
    streams.push({ stream: runLog.stream, level });
  }

  const logger = pino(
    {
      level,
      base: {
        service: serviceName,
        pid: process.pid,
        hostname: os.hostname(),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    multistream(streams),
  );

  const cleanup = registerProcessHandlers(logger);
  managedLoggers.set(serviceName, {
    logger,
    fileStream: runLog?.stream ?? null,
    filePath: runLog?.filePath ?? null,
    cleanup,
  });

  return logger;
}

export function getLogFilePath(serviceName: string): string | null {
  return managedLoggers.get(serviceName)?.filePath ?? null;
}

export function closeLogger(serviceName: string): void {
  const entry = managedLoggers.get(serviceName);
  if (!entry) {
    return;
  }

  entry.cleanup();
  try {
    entry.logger.flush();
  } catch (error) {
    console.warn(`Failed to flush logger for ${serviceName}:`, error);
  }
  entry.fileStream?.end();
  managedLoggers.delete(serviceName);
}
