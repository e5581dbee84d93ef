import { TransportError, errorMessage } from './errors.js';

/** Subset of `fetch` the package depends on; injectable for tests. */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface SendOptions {
  readonly fetch?: FetchLike;
  readonly timeoutMs?: number;
  readonly label?: string;
}

/** A response whose body has been read into `text`. */
export interface HttpReply {
  readonly response: Response;
  readonly text: string;
}

/**
 * Issue one HTTP request and read its body, both under the same timeout.
 * Network failures, body read failures and timeouts become TransportError.
 * An abort of `init.signal` also aborts the call.
 */
export async function send(url: string, init: RequestInit, options: SendOptions = {}): Promise<HttpReply> {
  const fetchImpl = options.fetch ?? globalThis.fetch;
  const controller = new AbortController();
  let timedOut = false;

  const timer = options.timeoutMs !== undefined && options.timeoutMs > 0
    ? setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, options.timeoutMs)
    : null;

  const upstream = init.signal;
  const onAbort = () => controller.abort();
  if (upstream) {
    if (upstream.aborted) {
      controller.abort();
    } else {
      upstream.addEventListener('abort', onAbort, { once: true });
    }
  }

  try {
    const response = await fetchImpl(url, { ...init, signal: controller.signal });
    const text = await response.text();
    return { response, text };
  } catch (error: unknown) {
    const label = options.label ?? `${init.method ?? 'GET'} ${url}`;
    const reason = timedOut ? `timed out after ${options.timeoutMs}ms` : errorMessage(error);
    throw new TransportError(`${label} failed: ${reason}`, { cause: error });
  } finally {
    if (timer) clearTimeout(timer);
    upstream?.removeEventListener('abort', onAbort);
  }
}

/**
 * Parse a body as JSON, or null when it is empty or not JSON.
 */
export function parseJson(text: string): unknown {
  if (text.trim().length === 0) {
    return null;
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return null;
  }
}
