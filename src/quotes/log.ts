/**
 * log.ts
 *
 * Progress logging for the demos. Lines read "[INFO] [Playwright] message"
 * so output from the two libraries can be told apart side by side.
 */

export type LogLevel = 'info' | 'warn' | 'error';

export interface LogSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function formatLogLine(level: LogLevel, scope: string, message: string): string {
  return `[${level.toUpperCase()}] [${scope}] ${message}`;
}

export function createLogger(scope: string, sink: LogSink = console): Logger {
  return {
    info: (message) => sink.log(formatLogLine('info', scope, message)),
    warn: (message) => sink.warn(formatLogLine('warn', scope, message)),
    error: (message) => sink.error(formatLogLine('error', scope, message)),
  };
}
