/**
 * Control client error taxonomy
 *
 * Every failure surfaced by ControlClient is a ControlError subclass with a
 * `kind` discriminant, so callers can switch on the kind instead of
 * matching messages.
 */

import type { ErrorPayload } from './schema/types.js';

export type ControlErrorKind =
  | 'encode'
  | 'request'
  | 'transport'
  | 'server'
  | 'decode'
  | 'daemon';

export abstract class ControlError extends Error {
  abstract readonly kind: ControlErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Config could not be serialized. Always a caller bug; no request was sent. */
export class EncodeError extends ControlError {
  readonly kind = 'encode' as const;

  constructor(cause: unknown) {
    super(`failed to encode config: ${describeCause(cause)}`, { cause });
  }
}

/** The HTTP request could not be built: a malformed host or call option. */
export class RequestError extends ControlError {
  readonly kind = 'request' as const;
  readonly host: string;

  constructor(host: string, cause: unknown, problem = `invalid daemon host "${host}"`) {
    super(`${problem}: ${describeCause(cause)}`, { cause });
    this.host = host;
  }
}

/** Network-level failure: refused, reset, DNS, timeout or abort. */
export class TransportError extends ControlError {
  readonly kind = 'transport' as const;
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super(`request to ${url} failed: ${describeCause(cause)}`, { cause });
    this.url = url;
  }
}

/** Daemon answered 500 without a structured body. */
export class ServerError extends ControlError {
  readonly kind = 'server' as const;
  readonly status: number;
  readonly statusText: string;

  constructor(status: number, statusText: string) {
    super(`${status} ${statusText}`.trim());
    this.status = status;
    this.statusText = statusText;
  }
}

/** A body that should have been valid JSON of a known shape was not. */
export class DecodeError extends ControlError {
  readonly kind = 'decode' as const;
  /** Raw response body, truncated */
  readonly body: string;

  constructor(what: string, body: string, cause: unknown) {
    super(`failed to decode ${what} response: ${describeCause(cause)}`, { cause });
    this.body = excerpt(body);
  }
}

/** Structured rejection returned by the daemon, e.g. an invalid config. */
export class DaemonError extends ControlError {
  readonly kind = 'daemon' as const;
  readonly status: number;
  readonly payload: ErrorPayload;

  constructor(payload: ErrorPayload, status: number) {
    super(payload.message);
    this.payload = payload;
    this.status = status;
  }
}

export type AnyControlError =
  | EncodeError
  | RequestError
  | TransportError
  | ServerError
  | DecodeError
  | DaemonError;

const MAX_BODY_EXCERPT = 512;

/** Cuts on code points so a surrogate pair is never split. */
function excerpt(body: string): string {
  const chars = Array.from(body);
  return chars.length > MAX_BODY_EXCERPT ? `${chars.slice(0, MAX_BODY_EXCERPT).join('')}…` : body;
}

export function isControlError(value: unknown): value is AnyControlError {
  return value instanceof ControlError;
}

/**
 * Unwraps the innermost useful message. Node's fetch reports every network
 * failure as `TypeError: fetch failed` and keeps the real reason in `cause`.
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    if (cause.message === 'fetch failed' && cause.cause !== undefined) {
      return describeCause(cause.cause);
    }
    const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : undefined;
    if (code && !cause.message.includes(code)) {
      return `${cause.message} (${code})`;
    }
    return cause.message;
  }
  return String(cause);
}

/**
 * Formats an error for display to the user.
 */
export function formatError(error: unknown): string {
  if (isControlError(error)) {
    switch (error.kind) {
      case 'daemon':
        return `daemon rejected request (HTTP ${error.status}): ${error.message}`;
      case 'server':
        return `daemon internal error: ${error.message}`;
      default:
        return error.message;
    }
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
