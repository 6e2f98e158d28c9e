import { type RuntimeResource } from '../lifecycle';

/**
 * Flat key/value blob store. A `put` that resolves is immediately visible to `get`.
 */
export interface BlobStoragePort extends RuntimeResource {
  put(key: string, data: Buffer | string): Promise<void>;
  /** Resolves `null` when the key does not exist. */
  get(key: string): Promise<Buffer | null>;
  /** Rejects with `StorageFailure` when the key is missing or cannot be removed. */
  delete(key: string): Promise<void>;
  list(): Promise<string[]>;
}
