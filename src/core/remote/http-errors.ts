/**
 * Error classes surfaced by the HTTP client. `transient` errors are worth
 * retrying; everything else ends handling of the affected file or subtree.
 */

export class HttpStatusError extends Error {
  readonly status: number;
  readonly url: string;
  readonly transient: boolean;

  constructor(status: number, url: string, statusText: string = '') {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''} for ${url}`);
    this.name = 'HttpStatusError';
    this.status = status;
    this.url = url;
    // 408 and 429 are the server asking us to come back later, so they
    // retry like 5xx; every other 4xx is final
    this.transient = status >= 500 || status === 408 || status === 429;
  }
}

export class NetworkError extends Error {
  readonly url: string;
  readonly transient = true;

  constructor(url: string, detail: string) {
    super(`Network error for ${url}: ${detail}`);
    this.name = 'NetworkError';
    this.url = url;
  }
}

export class CancelledError extends Error {
  constructor(message: string = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'ERR_STREAM_PREMATURE_CLOSE',
]);

export function isTransientError(error: unknown): boolean {
  if (error instanceof CancelledError) {
    return false;
  }
  if (error instanceof HttpStatusError || error instanceof NetworkError) {
    return error.transient;
  }
  if (error instanceof Error && 'code' in error) {
    return typeof error.code === 'string' && TRANSIENT_ERROR_CODES.has(error.code);
  }
  return false;
}
