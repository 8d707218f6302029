/**
 * errors.ts
 *
 * Library errors are left to propagate as they are. This only covers
 * - turning a missing element into an error that names the selector and page
 * - reporting a failed script and setting a non-zero exit code
 */

import { createLogger, type LogSink } from './log';

export function requireElement<T>(value: T | null | undefined, selector: string, url: string): T {
  if (value === null || value === undefined) {
    throw new Error(`No element matches "${selector}" on ${url}`);
  }
  return value;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.stack ?? err.message;
  return String(err);
}

// .catch handler for every script entry point
export function exitOnFailure(script: string, sink: LogSink = console): (err: unknown) => void {
  const log = createLogger(script, sink);
  return (err) => {
    log.error(describeError(err));
    process.exitCode = 1;
  };
}
