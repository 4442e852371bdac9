/**
 * Downstream forwarding
 *
 * The forwarder only moves bytes: which host and path to call is decided by
 * the route table and the balancer before it runs.
 */

import { Err, Ok, type Result } from '@schoolreg/core';

export type HeaderMap = Record<string, string | string[]>;

export interface ForwardRequest {
  method: string;
  /** Absolute downstream URL, query string included */
  url: string;
  headers: HeaderMap;
  body?: Buffer;
}

export interface ForwardResponse {
  statusCode: number;
  headers: HeaderMap;
  body: Buffer;
}

export type UpstreamFailure = 'timeout' | 'unreachable';

const UPSTREAM_ERROR_CODES = {
  timeout: 'GATEWAY_TIMEOUT',
  unreachable: 'BAD_GATEWAY',
} as const satisfies Record<UpstreamFailure, string>;

export type UpstreamErrorCode = (typeof UPSTREAM_ERROR_CODES)[UpstreamFailure];

export class UpstreamError extends Error {
  /** Error code the gateway answers with */
  public readonly code: UpstreamErrorCode;

  constructor(
    public readonly reason: UpstreamFailure,
    message: string,
    public readonly target: string
  ) {
    super(message);
    this.name = 'UpstreamError';
    this.code = UPSTREAM_ERROR_CODES[reason];
  }
}

export interface Forwarder {
  forward(request: ForwardRequest): Promise<Result<ForwardResponse, UpstreamError>>;
}

/**
 * RFC 7230 section 6.1 connection-scoped headers
 */
export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
]);

/**
 * Drop hop-by-hop headers, including those named by the Connection header
 */
export function stripHopByHop(headers: HeaderMap, alsoDrop: readonly string[] = []): HeaderMap {
  const connection = headers.connection;
  const listed = (Array.isArray(connection) ? connection.join(',') : (connection ?? ''))
    .split(',')
    .map((name) => name.trim().toLowerCase())
    .filter((name) => name.length > 0);
  const dropped = new Set([...HOP_BY_HOP_HEADERS, ...listed, ...alsoDrop]);

  const result: HeaderMap = {};
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (!dropped.has(lower)) {
      result[lower] = value;
    }
  }
  return result;
}

const BODYLESS_METHODS = new Set(['GET', 'HEAD']);

/**
 * Forwarder over the global fetch
 */
export class FetchForwarder implements Forwarder {
  constructor(private readonly timeoutMs: number) {}

  async forward(request: ForwardRequest): Promise<Result<ForwardResponse, UpstreamError>> {
    const headers = new Headers();
    for (const [name, value] of Object.entries(request.headers)) {
      for (const item of Array.isArray(value) ? value : [value]) {
        headers.append(name, item);
      }
    }

    const sendBody =
      !BODYLESS_METHODS.has(request.method.toUpperCase()) &&
      request.body !== undefined &&
      request.body.length > 0;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers,
        body: sendBody ? request.body : undefined,
        signal: controller.signal,
        redirect: 'manual',
      });
      const body = Buffer.from(await response.arrayBuffer());

      const relayed: HeaderMap = {};
      response.headers.forEach((value, name) => {
        relayed[name] = value;
      });
      const cookies = response.headers.getSetCookie();
      if (cookies.length > 0) {
        relayed['set-cookie'] = cookies;
      }

      return Ok({
        statusCode: response.status,
        // fetch has already decoded the body, so its framing headers no longer apply
        headers: stripHopByHop(relayed, ['content-encoding', 'content-length']),
        body,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return Err(
          new UpstreamError('timeout', `No response within ${this.timeoutMs}ms`, request.url)
        );
      }
      const message = error instanceof Error ? error.message : String(error);
      return Err(new UpstreamError('unreachable', message, request.url));
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
