import type { DataResult, TodoResult } from '../types/results.js';

export interface StoredObject {
  readonly bytes: Buffer;
  readonly contentType: string;
}

/**
 * Object storage as the application consumes it. Implementations report
 * failures as results rather than throwing.
 */
export interface StorageBucket {
  readonly name: string;

  /** Store bytes at `path`; resolves to the path. Fails if the object already exists. */
  upload(path: string, bytes: Uint8Array, contentType: string): Promise<DataResult<string>>;

  download(path: string): Promise<DataResult<StoredObject>>;

  /** Time-limited, pre-authorised download link */
  createSignedUrl(path: string, ttlSeconds: number): Promise<DataResult<string>>;

  /** Removing an object that is already gone succeeds */
  remove(path: string): Promise<TodoResult>;
}
