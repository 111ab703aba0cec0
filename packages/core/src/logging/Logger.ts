/**
 * Logger - Lightweight logging for the inference engine and CLI
 *
 * Levels: silent, errors, warnings, info, debug (trace shares debug).
 * Console output is human-readable; file output is one JSON object per line.
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.debug('Cycle cut', { nodeId: 12, name: 'a' });
 *
 *   // Console plus a debug-level file log:
 *   const logger = createLogger('warnings', { logFile: '.tessera/inference.log' });
 */

import { createWriteStream, writeFileSync, mkdirSync, accessSync, statSync, constants, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';

export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

type Method = keyof Logger;

const METHOD_PRIORITY: Record<Method, number> = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

const METHOD_TAG: Record<Method, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * JSON stringify that replaces repeated object references with "[Circular]"
 */
export function safeStringify(value: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(value, (_key, current: unknown) => {
    if (typeof current === 'object' && current !== null) {
      if (seen.has(current)) {
        return '[Circular]';
      }
      seen.add(current);
    }
    return current;
  });
}

export function formatMessage(message: string, context?: LogContext): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${safeStringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Shared level gate. Subclasses only decide where an accepted entry goes.
 */
abstract class LevelLogger implements Logger {
  private readonly priority: number;

  constructor(readonly level: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  protected abstract write(method: Method, message: string, context?: LogContext): void;

  private emit(method: Method, message: string, context?: LogContext): void {
    if (this.priority < METHOD_PRIORITY[method]) return;
    this.write(method, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.emit('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.emit('trace', message, context);
  }
}

/**
 * Console-based Logger. Errors go to stderr, everything else to the
 * matching console method.
 */
export class ConsoleLogger extends LevelLogger {
  constructor(level: LogLevel = 'info') {
    super(level);
  }

  protected write(method: Method, message: string, context?: LogContext): void {
    const line = formatMessage(`[${METHOD_TAG[method]}] ${message}`, context);
    switch (method) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'debug':
      case 'trace':
        console.debug(line);
        break;
    }
  }
}

/**
 * JSON-lines file Logger.
 *
 * The file is truncated on construction and parent directories are created.
 * Throws if the directory is not writable or the path is a directory.
 */
export class FileLogger extends LevelLogger {
  private readonly stream: WriteStream;
  private streamError: Error | null = null;

  constructor(level: LogLevel, filePath: string) {
    super(level);
    const resolvedPath = resolve(filePath);
    const dir = dirname(resolvedPath);
    mkdirSync(dir, { recursive: true });

    try {
      accessSync(dir, constants.W_OK);
    } catch {
      throw new Error(`Cannot write log file: directory '${dir}' is not writable`);
    }

    let isDirectory = false;
    try {
      isDirectory = statSync(resolvedPath).isDirectory();
    } catch {
      // stat fails when the file does not exist yet
      isDirectory = false;
    }
    if (isDirectory) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (err: Error) => {
      this.streamError = err;
    });
  }

  /** Last write failure, if the stream reported one */
  get lastError(): Error | null {
    return this.streamError;
  }

  protected write(method: Method, message: string, context?: LogContext): void {
    const entry = {
      time: new Date().toISOString(),
      level: METHOD_TAG[method],
      message,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };
    this.stream.write(safeStringify(entry) + '\n');
  }

  /** Flush and close the stream */
  close(): Promise<void> {
    return new Promise((done) => {
      this.stream.end(done);
    });
  }
}

/**
 * Fans every call out to several loggers; each applies its own level.
 */
export class MultiLogger implements Logger {
  constructor(private readonly loggers: readonly Logger[]) {}

  error(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.trace(message, context);
  }

  async close(): Promise<void> {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        await logger.close();
      }
    }
  }
}

/**
 * Create a Logger with the given console level.
 *
 * With `logFile`, a file logger at 'debug' level is added next to the
 * console one, so the file always carries the full inference trace.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
  }

  return consoleLogger;
}
