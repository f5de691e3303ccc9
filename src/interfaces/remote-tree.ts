/**
 * Remote archive discovery related interfaces
 */

import type { Readable } from 'node:stream';

export type RemoteNodeKind = 'file' | 'directory';

/**
 * One entry discovered in the remote tree.
 * `path` is relative to the archive root, `/`-separated, without a leading slash.
 */
export interface RemoteNode {
  readonly path: string;
  readonly kind: RemoteNodeKind;
  readonly sizeHint?: number;
}

/**
 * One row of a parsed directory listing page
 */
export interface ListingEntry {
  name: string;
  kind: RemoteNodeKind;
  size?: number;
}

/**
 * A directory whose listing could not be fetched after retries
 */
export interface UnreachableSubtree {
  path: string;
  reason: string;
  attempts: number;
}

export interface TextResponse {
  url: string;
  body: string;
}

export interface StreamResponse {
  url: string;
  body: Readable;
  contentLength?: number;
  lastModified?: Date;
}

/**
 * GET-only client used for listing pages and file bodies
 */
export interface HttpClient {
  fetchText(url: string, signal?: AbortSignal): Promise<TextResponse>;
  fetchStream(url: string, signal?: AbortSignal): Promise<StreamResponse>;
}
