/**
 * portwatch — Logger
 *
 * A small leveled logger injected into every component. Lines go to stderr
 * (stdout belongs to the MCP stdio transport) and, when configured, are
 * appended to a log file.
 */

import fs from 'node:fs';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  /** Returns a logger whose lines carry `scope`. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Append lines to this file as well. */
  file?: string;
  scope?: string;
  /** Overrides the default stderr/file sink. */
  sink?: (line: string) => void;
  now?: () => Date;
}

/** Extracts a printable message from anything thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatLine(
  now: Date,
  level: LogLevel,
  scope: string | undefined,
  message: string,
  error?: unknown,
): string {
  const scopePart = scope ? ` [${scope}]` : '';
  const errorPart = error !== undefined ? ` | ${errorMessage(error)}` : '';
  return `${now.toISOString()} ${level.toUpperCase()}${scopePart} ${message}${errorPart}`;
}

function defaultSink(file: string | undefined): (line: string) => void {
  return (line) => {
    process.stderr.write(`${line}\n`);
    if (file) {
      try {
        fs.appendFileSync(file, `${line}\n`, 'utf-8');
      } catch (err) {
        process.stderr.write(`log file write failed (${file}): ${errorMessage(err)}\n`);
      }
    }
  };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const sink = options.sink ?? defaultSink(options.file);
  const now = options.now ?? (() => new Date());

  const emit = (level: LogLevel, message: string, error?: unknown): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    sink(formatLine(now(), level, options.scope, message, error));
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message, error) => emit('error', message, error),
    child: (scope) =>
      createLogger({
        ...options,
        sink,
        scope: options.scope ? `${options.scope}:${scope}` : scope,
      }),
  };
}

/** Discards everything. */
export const silentLogger: Logger = createLogger({ sink: () => {} });
