/**
 * Structured logging for the research agent.
 *
 * A logger is a name, a minimum level, context bound to every entry, and a
 * sink. Child loggers extend all of these. Loggers built without their own
 * sink write through the global one, so `configureLogging` also moves
 * loggers that already exist.
 */

import { appendFileSync } from 'node:fs';

/** Levels in ascending severity. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  /** Colon-joined path of the emitting logger, e.g. `research-agent:session` */
  name?: string | undefined;
  context?: LogContext | undefined;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** @default 'info' */
  level?: LogLevel | undefined;
  name?: string | undefined;
  /** Context attached to every entry; per-call context wins on key clashes */
  bindings?: LogContext | undefined;
  handler?: LogSink | undefined;
}

export interface ConfigureLoggingOptions {
  handler?: LogSink | undefined;
  /** Append lines to this file instead of writing to the console */
  file?: string | undefined;
}

export interface Logger {
  readonly name: string | undefined;
  readonly level: LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Derive a logger whose name nests under this one and whose bindings extend these. */
  child(options: LoggerOptions): Logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function severity(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/** `[timestamp] LEVEL [name]: message {context}` on one line. */
export function formatLogEntry(entry: LogEntry): string {
  const source = entry.name ? ` [${entry.name}]` : '';
  const head = `[${entry.timestamp}] ${entry.level.toUpperCase()}${source}: ${entry.message}`;
  return entry.context ? `${head} ${JSON.stringify(entry.context)}` : head;
}

const consoleWriters: Record<LogLevel, (line: string) => void> = {
  debug: (line) => {
    console.debug(line);
  },
  info: (line) => {
    console.info(line);
  },
  warn: (line) => {
    console.warn(line);
  },
  error: (line) => {
    console.error(line);
  },
};

function consoleSink(entry: LogEntry): void {
  consoleWriters[entry.level](formatLogEntry(entry));
}

function fileSink(path: string): LogSink {
  return (entry) => {
    appendFileSync(path, `${formatLogEntry(entry)}\n`);
  };
}

let globalSink: LogSink = consoleSink;

const throughGlobalSink: LogSink = (entry) => {
  globalSink(entry);
};

/**
 * Point every logger without its own handler at a new sink.
 *
 * @example
 * ```typescript
 * // Keep the terminal clean while the chat prompt is active
 * configureLogging({ file: 'research-agent.log' });
 * ```
 */
export function configureLogging(options: ConfigureLoggingOptions): void {
  if (options.handler) {
    globalSink = options.handler;
  } else if (options.file) {
    globalSink = fileSink(options.file);
  }
}

/** Back to the console. */
export function resetLogging(): void {
  globalSink = consoleSink;
}

function joinNames(parent: string | undefined, child: string | undefined): string | undefined {
  return parent && child ? `${parent}:${child}` : (child ?? parent);
}

function mergeContext(
  bound: LogContext | undefined,
  extra: LogContext | undefined
): LogContext | undefined {
  if (!bound) return extra;
  if (!extra) return bound;
  return { ...bound, ...extra };
}

/**
 * @example
 * ```typescript
 * const log = createLogger({ name: 'orchestrator', bindings: { agent: 'research_agent' } });
 * log.info('Tool call started', { tool: 'web_search' });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', name, bindings, handler = throughGlobalSink } = options;
  const threshold = severity(level);

  const emit = (entryLevel: LogLevel, message: string, context?: LogContext): void => {
    if (severity(entryLevel) < threshold) return;
    handler({
      level: entryLevel,
      message,
      timestamp: new Date().toISOString(),
      name,
      context: mergeContext(bindings, context),
    });
  };

  return {
    name,
    level,
    isLevelEnabled: (candidate) => severity(candidate) >= threshold,
    debug: (message, context) => {
      emit('debug', message, context);
    },
    info: (message, context) => {
      emit('info', message, context);
    },
    warn: (message, context) => {
      emit('warn', message, context);
    },
    error: (message, context) => {
      emit('error', message, context);
    },
    child: (childOptions) =>
      createLogger({
        level: childOptions.level ?? level,
        handler: childOptions.handler ?? handler,
        name: joinNames(name, childOptions.name),
        bindings: mergeContext(bindings, childOptions.bindings),
      }),
  };
}

const envLogLevel = process.env['RESEARCH_AGENT_LOG_LEVEL'];

/** Root logger. RESEARCH_AGENT_LOG_LEVEL sets its level. */
export const logger: Logger = createLogger({
  name: 'research-agent',
  level: isLogLevel(envLogLevel) ? envLogLevel : 'info',
});
