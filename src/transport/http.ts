/**
 * HTTP execution capability used by the registry client.
 *
 * The client never talks to `fetch` directly; it goes through an
 * {@link HttpTransport}, so connection handling, TLS and proxies stay the
 * transport's concern and tests can substitute an in-process one.
 *
 * @module transport/http
 */

import { RegistryError } from '../errors.js';

/**
 * HTTP methods.
 */
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * A request handed to the transport.
 */
export interface TransportRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: Uint8Array | string;
  /** Aborts the request and any body still being read */
  readonly signal?: AbortSignal;
  /** Milliseconds until response headers must arrive */
  readonly timeout?: number;
}

/**
 * A response whose body has not been read yet.
 */
export interface TransportResponse {
  readonly status: number;
  readonly headers: Headers;
  /** Body chunks; single pass */
  readonly body: AsyncIterable<Uint8Array>;
  /** Releases the body without reading it */
  discard(): Promise<void>;
}

/**
 * HTTP transport interface.
 */
export interface HttpTransport {
  perform(request: TransportRequest): Promise<TransportResponse>;
}

/**
 * Builds a URL with query parameters.
 */
export function buildUrl(
  baseUrl: string,
  path: string,
  query?: Record<string, string | number | boolean | undefined>
): string {
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  const url = new URL(baseUrl.replace(/\/+$/, '') + normalizedPath);

  if (query) {
    Object.entries(query).forEach(([key, value]) => {
      if (value !== undefined) {
        url.searchParams.append(key, String(value));
      }
    });
  }

  return url.toString();
}

/**
 * Reads a whole body, failing once it grows past `limit` bytes.
 */
export async function readBody(
  response: TransportResponse,
  limit: number = Number.POSITIVE_INFINITY,
  tooLarge: (limit: number) => RegistryError = (max) =>
    RegistryError.invalidResponse(`body exceeds ${max} bytes`)
): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  let total = 0;
  for await (const chunk of response.body) {
    total += chunk.byteLength;
    if (total > limit) {
      throw tooLarge(limit);
    }
    chunks.push(chunk);
  }
  return Buffer.concat(chunks, total);
}

/**
 * Reads a body as UTF-8 text, keeping at most `limit` bytes.
 */
export async function readText(response: TransportResponse, limit = 64 * 1024): Promise<string> {
  const chunks: Uint8Array[] = [];
  let total = 0;
  for await (const chunk of response.body) {
    const room = limit - total;
    if (room <= 0) {
      continue;
    }
    const kept = chunk.byteLength > room ? chunk.subarray(0, room) : chunk;
    chunks.push(kept);
    total += kept.byteLength;
  }
  return Buffer.concat(chunks, total).toString('utf8');
}

/**
 * Options for FetchTransport.
 */
export interface FetchTransportOptions {
  /** Default header timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

/**
 * Transport backed by the global `fetch`.
 */
export class FetchTransport implements HttpTransport {
  private readonly timeout: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetchTransportOptions = {}) {
    this.timeout = options.timeout ?? 30000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async perform(request: TransportRequest): Promise<TransportResponse> {
    const timeout = request.timeout ?? this.timeout;
    const label = `${request.method} ${redactUrl(request.url)}`;

    if (request.signal?.aborted) {
      throw RegistryError.transport(`${label} aborted`, request.signal.reason);
    }

    const controller = new AbortController();
    const onAbort = (): void => controller.abort(request.signal?.reason);
    request.signal?.addEventListener('abort', onAbort, { once: true });
    const release = (): void => request.signal?.removeEventListener('abort', onAbort);

    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);

    let response: Response;
    try {
      response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        redirect: 'follow',
      });
    } catch (error) {
      release();
      if (timedOut) {
        throw RegistryError.timeout(label, timeout);
      }
      if (request.signal?.aborted) {
        throw RegistryError.transport(`${label} aborted`, error);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw RegistryError.transport(`${label} failed: ${message}`, error);
    } finally {
      clearTimeout(timeoutId);
    }

    return wrapResponse(response, label, release, () => request.signal?.aborted ?? false);
  }
}

function wrapResponse(
  response: Response,
  label: string,
  release: () => void,
  aborted: () => boolean
): TransportResponse {
  const stream = response.body;
  let started = false;

  async function* chunks(): AsyncGenerator<Uint8Array, void, undefined> {
    if (!stream) {
      release();
      return;
    }
    const reader = stream.getReader();
    let done = false;
    try {
      for (;;) {
        const result = await reader.read().catch((error: unknown) => {
          done = true;
          const reason = aborted() ? 'aborted' : 'connection lost';
          throw RegistryError.transport(`${label} body read failed: ${reason}`, error);
        });
        if (result.done) {
          done = true;
          return;
        }
        yield result.value;
      }
    } finally {
      if (!done) {
        await reader.cancel();
      }
      release();
    }
  }

  const iterator = chunks();

  return {
    status: response.status,
    headers: response.headers,
    body: {
      [Symbol.asyncIterator]: () => {
        if (started) {
          throw RegistryError.invalidState('Response body already consumed');
        }
        started = true;
        return iterator;
      },
    },
    async discard(): Promise<void> {
      if (started) {
        await iterator.return(undefined);
        return;
      }
      started = true;
      release();
      if (stream) {
        await stream.cancel();
      }
    },
  };
}

/**
 * Strips credentials and query strings from a URL for messages and logs.
 */
export function redactUrl(value: string): string {
  try {
    const url = new URL(value);
    url.username = '';
    url.password = '';
    url.search = '';
    return url.toString();
  } catch {
    return value;
  }
}
