import fs from 'node:fs';
import path from 'node:path';
import { format as formatDate } from 'date-fns';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { ConfigManager, type LogLevel, type Rotation } from './config.js';

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  logDir?: string;
  rotation?: Rotation;
  /** Rotated files to keep; 0 keeps all of them */
  backupCount?: number;
  consoleStream?: NodeJS.WritableStream;
  handleExceptions?: boolean;
}

// Custom log levels
const customLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

// date-fns tokens for the file name, winston-daily-rotate-file (moment) tokens for rotation
const ROTATION_PATTERNS: Record<Rotation, { fileStamp: string; datePattern: string }> = {
  daily: { fileStamp: 'yyyyMMdd', datePattern: 'YYYYMMDD' },
  hourly: { fileStamp: 'yyyyMMddHH', datePattern: 'YYYYMMDDHH' },
};

function formatMeta(meta: LogMeta): string {
  return Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
}

const consoleFormat = winston.format.printf((info) => {
  const { level, message, timestamp: _timestamp, label: _label, ...meta } = info;
  return `${level.toUpperCase()}: ${message}${formatMeta(meta)}`;
});

const fileFormat = winston.format.printf((info) => {
  const { level, message, timestamp, label, ...meta } = info;
  return `${timestamp} - ${label} - ${level.toUpperCase()} - ${message}${formatMeta(meta)}`;
});

interface StderrTransportOptions {
  stream?: NodeJS.WritableStream;
  format?: typeof consoleFormat;
  handleExceptions?: boolean;
  handleRejections?: boolean;
}

// Console output goes to stderr, same as a plain stream handler
class StderrTransport extends winston.transports.Stream {
  constructor(options: StderrTransportOptions = {}) {
    super({
      ...options,
      stream: options.stream ?? process.stderr,
    });
  }
}

const registry = new Map<string, AppLogger>();

export class AppLogger {
  private winston: winston.Logger;
  private readonly fileTransport: DailyRotateFile;
  readonly name: string;
  private readonly logDir: string;
  private readonly rotation: Rotation;

  constructor(options: Required<Omit<LoggerOptions, 'consoleStream'>> & Pick<LoggerOptions, 'consoleStream'>) {
    this.name = options.name;
    this.logDir = options.logDir;
    this.rotation = options.rotation;

    const { datePattern } = ROTATION_PATTERNS[options.rotation];

    this.fileTransport = new DailyRotateFile({
      dirname: options.logDir,
      filename: 'app_%DATE%.log',
      datePattern,
      maxFiles: options.backupCount > 0 ? options.backupCount : undefined,
      format: fileFormat,
      handleExceptions: options.handleExceptions,
      handleRejections: options.handleExceptions,
    });

    this.winston = winston.createLogger({
      levels: customLevels,
      level: options.level,
      format: winston.format.combine(
        winston.format.label({ label: options.name }),
        winston.format.timestamp({
          format: 'YYYY-MM-DD HH:mm:ss,SSS',
        }),
        winston.format.errors({ stack: true }),
      ),
      transports: [
        new StderrTransport({
          stream: options.consoleStream,
          format: consoleFormat,
          handleExceptions: options.handleExceptions,
          handleRejections: options.handleExceptions,
        }),
        this.fileTransport,
      ],
      exitOnError: true,
    });
  }

  error(message: string, meta?: LogMeta): void {
    this.winston.error(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  handleError(error: Error, context?: string): void {
    this.error(error.message, context ? { stack: error.stack, context } : { stack: error.stack });
  }

  // Set log level dynamically
  setLevel(level: LogLevel): void {
    this.winston.level = level;
  }

  getLevel(): string {
    return this.winston.level;
  }

  // Create child logger with context
  child(defaultMeta: LogMeta): winston.Logger {
    return this.winston.child(defaultMeta);
  }

  /**
   * Path of the file currently being written, e.g. logs/app_20240131.log
   */
  get logFile(): string {
    const stamp = formatDate(new Date(), ROTATION_PATTERNS[this.rotation].fileStamp);
    return path.join(this.logDir, `app_${stamp}.log`);
  }

  /**
   * Flush pending writes to disk and forget this logger's name. The logger is unusable afterwards.
   */
  async close(): Promise<void> {
    if (registry.get(this.name) === this) {
      registry.delete(this.name);
    }
    this.winston.exceptions.unhandle();
    this.winston.rejections.unhandle();

    await new Promise<void>((resolve) => {
      // The first finish means every line reached the rotating stream. The next one is
      // emitted by close() once that stream has been flushed and ended.
      this.fileTransport.once('finish', () => {
        this.fileTransport.once('finish', () => resolve());
        this.fileTransport.close?.();
      });
      this.winston.end();
    });
  }
}

/**
 * Configure the named process-wide logger with a console handler and a
 * date-rotated file handler under `logDir`. Calling it again with the same
 * name hands back the logger that is already set up.
 */
export function setupLogger(options: LoggerOptions = {}): AppLogger {
  const name = options.name ?? 'app_logger';
  const existing = registry.get(name);
  if (existing) {
    return existing;
  }

  const logDir = options.logDir ?? 'logs';
  fs.mkdirSync(logDir, { recursive: true });

  const logger = new AppLogger({
    name,
    level: options.level ?? 'info',
    logDir,
    rotation: options.rotation ?? 'daily',
    backupCount: options.backupCount ?? 7,
    consoleStream: options.consoleStream,
    handleExceptions: options.handleExceptions ?? false,
  });
  registry.set(name, logger);
  return logger;
}

export function getLogger(name: string): AppLogger | undefined {
  return registry.get(name);
}

/**
 * Logger configured from the [logging] section of the process configuration.
 */
export function createAppLogger(name?: string, overrides: Omit<LoggerOptions, 'name'> = {}): AppLogger {
  const logging = ConfigManager.getInstance().logging;
  return setupLogger({
    name,
    level: logging.level,
    logDir: logging.directory,
    rotation: logging.rotation,
    backupCount: logging.backupCount,
    ...overrides,
  });
}

/**
 * Write a few sample lines through the configured logger and return the file they went to.
 */
export async function runLoggingDemo(overrides: Omit<LoggerOptions, 'name'> = {}): Promise<string> {
  const logger = createAppLogger(undefined, { handleExceptions: true, ...overrides });
  const logFile = logger.logFile;
  logger.info('Logger module initialized successfully');
  logger.debug('Debug output is visible at level debug', { level: logger.getLevel() });
  logger.warn('Sample warning line');
  logger.error('Sample error line', { logFile });
  await logger.close();
  return logFile;
}

// Run demo if this file is executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  runLoggingDemo().catch((error) => {
    process.stderr.write(`FATAL_ERROR: ${error instanceof Error ? error.stack : String(error)}\n`);
    process.exit(1);
  });
}
