/**
 * CLI Error Handling Utilities
 *
 * Error taxonomy for command handlers and the single place that turns an error
 * into output on stderr.
 */

import chalk from 'chalk';
import { OutputStream } from '../types/cli';

/** A flag or argument failed validation; raised before any network call. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** No credential is stored for the base URL. Read-only commands treat this as "proceed unauthenticated". */
export class TokenNotFoundError extends Error {
  constructor(baseUrl: string) {
    super(`No stored token for ${baseUrl}`);
    this.name = 'TokenNotFoundError';
  }
}

/** A mutating command was run without any token. */
export class AuthRequiredError extends Error {
  constructor(message = "Authentication required. Run 'xbe auth login' first.") {
    super(message);
    this.name = 'AuthRequiredError';
  }
}

/** The server answered with a non-2xx status. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly method: string,
    readonly path: string,
    readonly body: string
  ) {
    super(`${method} ${path} failed: HTTP ${status}`);
    this.name = 'HttpError';
  }
}

/** The request never produced a response (network failure, timeout or interrupt). */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/** The response body is not a JSON:API document. */
export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Print an error the way every command reports failures: the raw response body
 * first, when there is one, so server-side validation messages stay visible.
 */
export function reportError(
  stderr: OutputStream,
  error: unknown,
  ui: chalk.Chalk = chalk,
  verbose = false
): void {
  if (error instanceof HttpError && error.body.trim().length > 0) {
    stderr.write(`${error.body.trimEnd()}\n`);
  }
  if (error instanceof AuthRequiredError) {
    stderr.write(`${ui.yellow(error.message)}\n`);
    return;
  }
  const detail = verbose && error instanceof Error && error.stack ? error.stack : errorMessage(error);
  stderr.write(`${ui.red('Error:')} ${detail}\n`);
}

/**
 * JSON parsing that throws with context
 */
export function parseJsonWithContext(jsonString: string, context = 'JSON parse'): unknown {
  try {
    return JSON.parse(jsonString);
  } catch (error) {
    throw new DecodeError(`${context}: ${errorMessage(error)}`, { cause: error });
  }
}
