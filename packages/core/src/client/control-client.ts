/**
 * RA Daemon Control Client
 *
 * HTTP client for the daemon's control endpoints:
 *   POST /reload   apply a new Config
 *   GET  /status   snapshot of per-interface lifecycle state
 *
 * The client is a stateless pass-through. Each call sends exactly one
 * request and classifies the response into one of the ControlError kinds;
 * nothing is retried or cached.
 */

import { STATUS_CODES } from 'http';
import {
  DaemonError,
  RequestError,
  ServerError,
  TransportError,
  describeCause,
  isControlError,
} from '../errors.js';
import { decodeErrorPayload, decodeStatus, encodeConfig } from '../schema/codec.js';
import { DEFAULT_INTERFACE_STATES, type Config, type Status } from '../schema/types.js';
import { silentLogger, type Logger, type LogMeta } from '../utils/logger.js';

export type FetchLike = typeof globalThis.fetch;

export interface ControlClientOptions {
  /** HTTP transport. Defaults to the global fetch (undici, keep-alive pooled). */
  fetch?: FetchLike;
  /** Interface states to accept in addition to Init and Running */
  states?: readonly string[];
  logger?: Logger;
}

/**
 * Per-call cancellation. Neither is applied unless given: without them a
 * call waits as long as the transport does.
 */
export interface CallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/** Largest delay a Node timer accepts */
export const MAX_TIMEOUT_MS = 0xffffffff;

type Method = 'GET' | 'POST';

interface Exchange {
  method: Method;
  path: '/reload' | '/status';
  /** Produces the request body; runs before anything touches the network */
  encode?: () => string;
}

export class ControlClient {
  readonly host: string;
  private readonly fetchImpl: FetchLike;
  private readonly states: readonly string[];
  private readonly logger: Logger;

  constructor(host: string, options: ControlClientOptions = {}) {
    this.host = host;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.states = [...DEFAULT_INTERFACE_STATES, ...(options.states ?? [])];
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Push a new configuration. Resolves once the daemon accepted it (HTTP 200).
   */
  async reload(config: Config, options: CallOptions = {}): Promise<void> {
    await this.exchange(
      {
        method: 'POST',
        path: '/reload',
        encode: () => encodeConfig(config),
      },
      options,
      () => undefined,
    );
  }

  /**
   * Fetch the daemon's current per-interface status.
   */
  async status(options: CallOptions = {}): Promise<Status> {
    return this.exchange({ method: 'GET', path: '/status' }, options, (body) =>
      decodeStatus(body, this.states),
    );
  }

  private async exchange<T>(
    request: Exchange,
    options: CallOptions,
    onOk: (body: string) => T,
  ): Promise<T> {
    const { method, path } = request;
    const started = Date.now();

    try {
      const payload = request.encode?.();
      const url = this.endpoint(path);
      this.checkTimeout(options.timeoutMs);

      await this.log('debug', `${method} ${url}`, payload === undefined ? undefined : { bytes: payload.length });

      const { signal, dispose } = combineSignals(options);
      try {
        let response: Response;
        try {
          response = await this.fetchImpl(url, {
            method,
            headers: payload === undefined ? undefined : { 'Content-Type': 'application/json' },
            body: payload,
            signal,
          });
        } catch (error) {
          throw new TransportError(url, error);
        }

        // Body is read eagerly so a mid-stream failure is a transport error,
        // not a decode error.
        let text: string;
        try {
          text = await response.text();
        } catch (error) {
          throw new TransportError(url, error);
        }

        await this.log('info', `${method} ${path} -> ${response.status}`, {
          duration_ms: Date.now() - started,
        });

        if (response.status === 200) {
          return onOk(text);
        }

        if (response.status === 500) {
          throw new ServerError(response.status, response.statusText || STATUS_CODES[500] || '');
        }

        throw new DaemonError(decodeErrorPayload(text), response.status);
      } finally {
        dispose();
      }
    } catch (error) {
      await this.log('warn', `${method} ${path} failed`, {
        kind: isControlError(error) ? error.kind : 'unknown',
        error: describeCause(error),
        duration_ms: Date.now() - started,
      });
      throw error;
    }
  }

  /**
   * Logger failures never reach the caller.
   */
  private async log(level: 'debug' | 'info' | 'warn', message: string, meta?: LogMeta): Promise<void> {
    try {
      await this.logger[level](message, meta);
    } catch {
      // Ignore logging errors
    }
  }

  private checkTimeout(timeoutMs: number | undefined): void {
    if (timeoutMs === undefined) return;
    if (!Number.isInteger(timeoutMs) || timeoutMs < 0 || timeoutMs > MAX_TIMEOUT_MS) {
      throw new RequestError(
        this.host,
        new RangeError(`expected an integer from 0 to ${MAX_TIMEOUT_MS}, got ${timeoutMs}`),
        'invalid timeoutMs',
      );
    }
  }

  /**
   * Builds `http://{host}{path}`. Anything beyond a bare host:port (a path,
   * credentials, a query) makes the request unbuildable.
   */
  private endpoint(path: string): string {
    if (/[/?#@\\]/.test(this.host)) {
      throw new RequestError(this.host, new Error('expected a bare host:port'));
    }

    let url: URL;
    try {
      url = new URL(`http://${this.host}${path}`);
    } catch (error) {
      throw new RequestError(this.host, error);
    }

    if (url.pathname !== path || url.username || url.password || url.search || url.hash) {
      throw new RequestError(this.host, new Error('expected a bare host:port'));
    }

    return url.href;
  }
}

/**
 * Merges the caller's signal and timeout into a single signal for fetch.
 */
function combineSignals(options: CallOptions): { signal?: AbortSignal; dispose: () => void } {
  const signals: AbortSignal[] = [];
  if (options.signal) signals.push(options.signal);
  if (options.timeoutMs !== undefined) signals.push(AbortSignal.timeout(options.timeoutMs));

  if (signals.length < 2) {
    return { signal: signals[0], dispose: () => undefined };
  }

  const controller = new AbortController();
  const detach: Array<() => void> = [];

  for (const source of signals) {
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = () => controller.abort(source.reason);
    source.addEventListener('abort', onAbort, { once: true });
    detach.push(() => source.removeEventListener('abort', onAbort));
  }

  return {
    signal: controller.signal,
    dispose: () => detach.forEach((fn) => fn()),
  };
}
