/**
 * HTTP client for listing pages and file bodies, built on `fetch`.
 */

import { Readable } from 'node:stream';
import type {
  HttpClient,
  StreamResponse,
  TextResponse,
} from '../../interfaces/remote-tree';
import { CancelledError, HttpStatusError, NetworkError } from './http-errors';

export type FetchFn = typeof fetch;

export interface HttpClientOptions {
  fetchFn?: FetchFn;
  /** Time allowed until response headers arrive (and the whole body, for text). */
  timeoutMs?: number;
  userAgent?: string;
}

export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_USER_AGENT = 'archive-mirror/1.0';

interface Deadline {
  signal: AbortSignal;
  timedOut: () => boolean;
  clear: () => void;
}

/**
 * Abort signal that fires on the caller's signal or after `timeoutMs`,
 * remembering which of the two happened.
 */
function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let expired = false;
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }
  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  return {
    signal: controller.signal,
    timedOut: () => expired,
    clear: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

function parseContentLength(value: string | null): number | undefined {
  if (value === null || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  return Number(value.trim());
}

/**
 * `fetch` decodes compressed bodies, so a Content-Length that describes an
 * encoded body says nothing about the bytes we receive.
 */
function isEncoded(value: string | null): boolean {
  if (value === null) {
    return false;
  }
  const encoding = value.trim().toLowerCase();
  return encoding !== '' && encoding !== 'identity';
}

function parseLastModified(value: string | null): Date | undefined {
  if (value === null) {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  const fetchFn = options.fetchFn ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;

  const translateError = (
    url: string,
    error: unknown,
    deadline: Deadline,
    parent?: AbortSignal,
  ): Error => {
    if (error instanceof HttpStatusError) {
      return error;
    }
    if (parent?.aborted) {
      return new CancelledError(`Request cancelled: ${url}`);
    }
    if (deadline.timedOut()) {
      return new NetworkError(url, `timed out after ${timeoutMs}ms`);
    }
    const cause =
      error instanceof Error && error.cause instanceof Error
        ? `${error.message} (${error.cause.message})`
        : error instanceof Error
          ? error.message
          : String(error);
    return new NetworkError(url, cause);
  };

  const request = async (url: string, signal: AbortSignal): Promise<Response> => {
    const response = await fetchFn(url, {
      signal,
      redirect: 'follow',
      // Mirror the archive's bytes as stored, never a transfer encoding of them
      headers: { 'User-Agent': userAgent, 'Accept-Encoding': 'identity' },
    });
    if (!response.ok) {
      // Release the connection before reporting the status
      await response.body?.cancel().catch(() => undefined);
      throw new HttpStatusError(response.status, url, response.statusText);
    }
    return response;
  };

  const fetchText = async (
    url: string,
    signal?: AbortSignal,
  ): Promise<TextResponse> => {
    const deadline = createDeadline(timeoutMs, signal);
    try {
      const response = await request(url, deadline.signal);
      const body = await response.text();
      return { url: response.url || url, body };
    } catch (error) {
      throw translateError(url, error, deadline, signal);
    } finally {
      deadline.clear();
    }
  };

  const fetchStream = async (
    url: string,
    signal?: AbortSignal,
  ): Promise<StreamResponse> => {
    const deadline = createDeadline(timeoutMs, signal);
    let response: Response;
    try {
      response = await request(url, deadline.signal);
    } catch (error) {
      deadline.clear();
      throw translateError(url, error, deadline, signal);
    }
    // Headers arrived: the body may take as long as it needs
    deadline.clear();

    if (!response.body) {
      throw new NetworkError(url, 'response has no body');
    }

    return {
      url: response.url || url,
      body: Readable.fromWeb(response.body, { signal }),
      contentLength: isEncoded(response.headers.get('content-encoding'))
        ? undefined
        : parseContentLength(response.headers.get('content-length')),
      lastModified: parseLastModified(response.headers.get('last-modified')),
    };
  };

  return { fetchText, fetchStream };
}
