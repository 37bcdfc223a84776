/**
 * LXD API Client
 *
 * Implements the control-plane operations the reconciler needs on top of
 * the LXD REST API:
 * - unix socket or HTTPS with a client certificate
 * - async operations awaited through /1.0/operations/<id>/wait
 * - not-found lookups reported as null
 * - retries with backoff for reads only
 * - optional request log (debug) with secret redaction
 */

import { readFileSync } from 'node:fs';
import { Agent, fetch as undiciFetch, type Dispatcher, type Response } from 'undici';
import type {
  HttpMethod,
  InstanceMetadata,
  InstanceStateMetadata,
  LxdEnvelope,
  LxdOperation,
  RequestLogEntry,
  StateChangeRequest,
} from './types.js';
import { ApiError, TransportError, toError } from './errors.js';
import { withRetry } from './retry.js';
import { logger as defaultLogger, redactObject, type ApiLogger } from './logger.js';
import type { ConnectionConfig } from '../config/connection.js';
import type {
  ControlPlaneClient,
  CreateInstanceRequest,
  InstanceAttributes,
} from '../reconcilers/instance/types.js';

// =============================================================================
// Types
// =============================================================================

export type FetchLike = typeof undiciFetch;

/**
 * Client configuration
 */
export interface LxdClientConfig extends Omit<ConnectionConfig, 'trustPassword'> {
  /** Record every request/response in `logs` */
  debug?: boolean;
  /** Per-request timeout in ms for everything except operation waits (default: 30000) */
  requestTimeoutMs?: number;
  /** Verify the server certificate over HTTPS (default: false, LXD servers are self-signed) */
  verifyServerCert?: boolean;
  logger?: ApiLogger;
  /** Replaces undici's fetch (tests) */
  fetchImpl?: FetchLike;
  /** Replaces the dispatcher built from the URL (tests) */
  dispatcher?: Dispatcher;
  /** Replaces the sleep between read retries (tests) */
  sleep?: (ms: number) => Promise<void>;
  /** Aborts any request in flight, operation waits included */
  signal?: AbortSignal;
}

/**
 * LXD client: the control-plane interface plus lifecycle helpers
 */
export interface LxdClient extends ControlPlaneClient {
  readonly logs?: readonly RequestLogEntry[];
  /** Release the underlying connection pool */
  close(): Promise<void>;
  /** Endpoint description without secrets */
  getConfig(): { url: string; instancesEndpoint: string; debug: boolean };
}

interface RequestOptions {
  body?: unknown;
  /** Resolve to null on 404 instead of failing */
  allowNotFound?: boolean;
  /** Retry transient failures (reads only) */
  retry?: boolean;
  /** Disable the per-request timeout */
  noTimeout?: boolean;
}

// =============================================================================
// Envelope Parsing
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate the common response envelope
 */
export function parseEnvelope(value: unknown, status: number): LxdEnvelope {
  if (!isRecord(value)) {
    throw new ApiError(`Unexpected LXD response (${status}): not a JSON object`, status);
  }
  const type = value.type;
  if (type !== 'sync' && type !== 'async' && type !== 'error') {
    throw new ApiError(`Unexpected LXD response type: ${String(type)}`, status);
  }
  return {
    type,
    status: typeof value.status === 'string' ? value.status : undefined,
    status_code: typeof value.status_code === 'number' ? value.status_code : undefined,
    operation: typeof value.operation === 'string' ? value.operation : undefined,
    error_code: typeof value.error_code === 'number' ? value.error_code : undefined,
    error: typeof value.error === 'string' ? value.error : undefined,
    metadata: value.metadata,
  };
}

export function isInstanceMetadata(value: unknown): value is InstanceMetadata {
  return isRecord(value) && typeof value.name === 'string' && typeof value.status === 'string';
}

export function isInstanceState(value: unknown): value is InstanceStateMetadata {
  return (
    isRecord(value) &&
    typeof value.status === 'string' &&
    (value.network === null || value.network === undefined || isRecord(value.network))
  );
}

function isOperation(value: unknown): value is LxdOperation {
  return isRecord(value) && typeof value.status === 'string' && typeof value.status_code === 'number';
}

// =============================================================================
// Transport
// =============================================================================

/**
 * Split the configured URL into a request origin and a dispatcher
 */
function buildTransport(config: LxdClientConfig): { origin: string; dispatcher: Dispatcher } {
  if (config.url.startsWith('unix:')) {
    const socketPath = config.url.slice('unix:'.length);
    return {
      origin: 'http://lxd',
      dispatcher: config.dispatcher ?? new Agent({ connect: { socketPath } }),
    };
  }

  if (!config.url.startsWith('https://')) {
    throw new TransportError(`Unsupported LXD URL: ${config.url} (expected unix:<path> or https://)`);
  }

  if (config.dispatcher) {
    return { origin: config.url.replace(/\/+$/, ''), dispatcher: config.dispatcher };
  }

  let cert: Buffer;
  let key: Buffer;
  try {
    cert = readFileSync(config.clientCert);
    key = readFileSync(config.clientKey);
  } catch (error) {
    throw new TransportError(
      `Cannot read client certificate/key (${config.clientCert}, ${config.clientKey}): ${toError(error).message}`,
      { cause: error }
    );
  }

  return {
    origin: config.url.replace(/\/+$/, ''),
    dispatcher: new Agent({
      connect: { cert, key, rejectUnauthorized: config.verifyServerCert ?? false },
    }),
  };
}

function extractErrnoCode(error: unknown): string | undefined {
  if (!isRecord(error) && !(error instanceof Error)) return undefined;
  const code: unknown = Reflect.get(error, 'code');
  if (typeof code === 'string') return code;
  return extractErrnoCode(Reflect.get(error, 'cause'));
}

/**
 * Wrap a fetch failure as a TransportError
 */
function toTransportError(
  error: unknown,
  method: HttpMethod,
  url: string,
  signal?: AbortSignal
): TransportError {
  const err = toError(error);
  if (signal?.aborted) {
    return new TransportError(`LXD request ${method} ${url} interrupted`, { cause: err });
  }
  if (err.name === 'AbortError' || err.name === 'TimeoutError') {
    return new TransportError(`LXD request ${method} ${url} timed out`, { cause: err });
  }
  const code = extractErrnoCode(err);
  const detail = code ? `${code}: ${err.message}` : err.message;
  return new TransportError(`LXD request ${method} ${url} failed: ${detail}`, { cause: err });
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create an LXD client
 */
export function createClient(config: LxdClientConfig): LxdClient {
  const { origin, dispatcher } = buildTransport(config);
  const fetchImpl = config.fetchImpl ?? undiciFetch;
  const requestTimeoutMs = config.requestTimeoutMs ?? 30000;
  const log = (config.logger ?? defaultLogger).child({ component: 'lxd-client' });
  const debug = config.debug ?? false;
  const logs: RequestLogEntry[] = [];
  const endpoint = `/1.0${config.instancesEndpoint}`;

  function requestSignal(noTimeout?: boolean): AbortSignal | undefined {
    const timeout = noTimeout ? undefined : AbortSignal.timeout(requestTimeoutMs);
    if (config.signal === undefined) return timeout;
    return timeout ? AbortSignal.any([timeout, config.signal]) : config.signal;
  }

  function instancePath(name: string, suffix = ''): string {
    return `${endpoint}/${encodeURIComponent(name)}${suffix}`;
  }

  async function send(
    method: HttpMethod,
    path: string,
    options: RequestOptions
  ): Promise<{ status: number; json: unknown }> {
    const url = `${origin}${path}`;
    log.debug('HTTP Request', { method, url, body: options.body });

    let response: Response;
    let text: string;
    try {
      response = await fetchImpl(url, {
        method,
        headers: { 'Content-Type': 'application/json' },
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        dispatcher,
        signal: requestSignal(options.noTimeout),
      });
      text = await response.text();
    } catch (error) {
      throw toTransportError(error, method, url, config.signal);
    }

    let json: unknown = undefined;
    if (text.trim().length > 0) {
      try {
        json = JSON.parse(text);
      } catch {
        throw new ApiError(
          `LXD returned non-JSON response (${response.status}): ${text.substring(0, 200)}`,
          response.status
        );
      }
    }

    log.debug(`HTTP Response ${response.status}`, { method, url });

    if (debug) {
      logs.push({
        type: 'sent request',
        request: {
          method,
          url,
          ...(options.body !== undefined ? { json: redactObject(options.body) } : {}),
        },
        response: { status: response.status, json: redactObject(json) },
      });
    }

    return { status: response.status, json };
  }

  async function waitOperation(operation: string): Promise<unknown> {
    const { status, json } = await send('GET', `${operation}/wait`, { noTimeout: true });
    const envelope = parseEnvelope(json, status);
    if (envelope.type === 'error' || status >= 400) {
      throw new ApiError(envelope.error ?? `LXD operation wait failed (${status})`, envelope.error_code ?? status);
    }
    if (!isOperation(envelope.metadata)) {
      throw new ApiError(`Unexpected operation payload from ${operation}`, status);
    }
    if (envelope.metadata.status !== 'Success') {
      throw new ApiError(
        envelope.metadata.err || `LXD operation ${envelope.metadata.status}`,
        envelope.metadata.status_code,
        { details: { operation, status: envelope.metadata.status } }
      );
    }
    return envelope.metadata.metadata;
  }

  /**
   * Perform a request and unwrap its envelope, waiting for async operations
   */
  async function request(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<unknown | null> {
    const once = async (): Promise<unknown | null> => {
      const { status, json } = await send(method, path, options);

      if (status === 404 && options.allowNotFound) {
        return null;
      }

      const envelope = parseEnvelope(json, status);
      if (envelope.type === 'error' || status >= 400) {
        const code = envelope.error_code ?? status;
        if (code === 404 && options.allowNotFound) {
          return null;
        }
        throw new ApiError(envelope.error ?? `LXD API error (${status})`, code, {
          details: { method, path },
        });
      }

      if (envelope.type === 'async' && envelope.operation !== undefined) {
        return waitOperation(envelope.operation);
      }

      return envelope.metadata;
    };

    if (!options.retry) {
      return once();
    }

    const result = await withRetry(once, {
      logger: log,
      sleep: config.sleep,
      onRetry: (attempt, error, delayMs) => {
        log.info(`Retrying request to ${path}`, { attempt, error: error.message, delayMs });
      },
    });

    if (!result.success) {
      throw result.error ?? new Error(`Request to ${path} failed`);
    }
    return result.data ?? null;
  }

  return {
    ...(debug ? { logs } : {}),

    async fetch(name: string): Promise<InstanceMetadata | null> {
      const metadata = await request('GET', instancePath(name), { allowNotFound: true, retry: true });
      if (metadata === null) return null;
      if (!isInstanceMetadata(metadata)) {
        throw new ApiError(`Unexpected instance payload for ${name}`, 200);
      }
      return metadata;
    },

    async fetchState(name: string): Promise<InstanceStateMetadata | null> {
      const metadata = await request('GET', instancePath(name, '/state'), {
        allowNotFound: true,
        retry: true,
      });
      if (metadata === null) return null;
      if (!isInstanceState(metadata)) {
        throw new ApiError(`Unexpected instance state payload for ${name}`, 200);
      }
      return metadata;
    },

    async create(body: CreateInstanceRequest, target?: string): Promise<void> {
      const query = target ? `?${new URLSearchParams({ target }).toString()}` : '';
      await request('POST', `${endpoint}${query}`, { body });
    },

    async setState(name: string, body: StateChangeRequest): Promise<void> {
      await request('PUT', instancePath(name, '/state'), { body });
    },

    async delete(name: string): Promise<void> {
      await request('DELETE', instancePath(name));
    },

    async update(name: string, attributes: InstanceAttributes): Promise<void> {
      await request('PUT', instancePath(name), { body: attributes });
    },

    async authenticate(trustPassword: string): Promise<void> {
      await request('POST', '/1.0/certificates', {
        body: { type: 'client', password: trustPassword },
      });
    },

    async close(): Promise<void> {
      await dispatcher.close();
    },

    getConfig() {
      return {
        url: config.url,
        instancesEndpoint: config.instancesEndpoint,
        debug,
      };
    },
  };
}
