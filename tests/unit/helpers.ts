/**
 * Shared test helpers: a scripted in-process fetch and a transport over it
 */

import { ApiLogger } from '../../src/api/logger.js';
import { createTransport, type DirectoryTransport } from '../../src/api/transport.js';
import type { RetryConfig } from '../../src/api/types.js';

export const BASE_URL = 'https://directory.test';

/** Logger that only prints errors; tests spy on console.error where failures are expected */
export const quietLogger = new ApiLogger({ level: 'error' });

/** No retries and 1ms waits */
export const NO_RETRY: RetryConfig = {
  maxRetries: 0,
  consistencyRetries: 0,
  baseDelayMs: 1,
  maxDelayMs: 1,
  jitterFactor: 0,
};

export interface ScriptedResponse {
  status: number;
  body?: unknown;
  headers?: Record<string, string>;
}

export interface RecordedRequest {
  method: string;
  url: URL;
  /** `METHOD /path`, matching the route keys */
  route: string;
  headers: Headers;
  body?: string;
}

export interface ScriptedFetch {
  fetch: typeof fetch;
  requests: RecordedRequest[];
  /** Requests sent to one route */
  sent(route: string): RecordedRequest[];
}

/**
 * OData error envelope
 */
export function odataError(code: string, message: string): { error: { code: string; message: string } } {
  return { error: { code, message } };
}

function toUrl(input: string | URL | Request): URL {
  if (typeof input === 'string') return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
}

/**
 * Fetch that answers from per-route queues keyed by `METHOD /path`. Each call
 * takes the next response; the last one repeats. Unknown routes reject.
 */
export function scriptedFetch(routes: Record<string, ScriptedResponse | ScriptedResponse[]>): ScriptedFetch {
  const queues = new Map<string, ScriptedResponse[]>();
  for (const [route, responses] of Object.entries(routes)) {
    queues.set(route, Array.isArray(responses) ? [...responses] : [responses]);
  }

  const requests: RecordedRequest[] = [];

  const fetchImpl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = toUrl(input);
    const method = init?.method ?? 'GET';
    const route = `${method} ${url.pathname}`;
    requests.push({
      method,
      url,
      route,
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : undefined,
    });

    const queue = queues.get(route);
    const next = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    if (!next) {
      throw new Error(`no scripted response for ${route}`);
    }

    const body = next.body === undefined || next.status === 204 ? null : JSON.stringify(next.body);
    return new Response(body, { status: next.status, headers: next.headers });
  };

  return {
    fetch: fetchImpl,
    requests,
    sent: (route) => requests.filter((request) => request.route === route),
  };
}

/**
 * Transport over a scripted fetch
 */
export function scriptedTransport(
  script: ScriptedFetch,
  retry: RetryConfig = NO_RETRY
): DirectoryTransport {
  return createTransport({
    baseUrl: BASE_URL,
    apiVersion: 'beta',
    tenantId: 'tenant-1',
    timeout: 1000,
    tokenProvider: () => 'test-token',
    retry,
    fetch: script.fetch,
    logger: quietLogger,
  });
}

/**
 * Return what a function throws
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

/**
 * Return what a promise rejects with
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected promise to reject');
}
