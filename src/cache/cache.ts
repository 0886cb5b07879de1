export interface CacheEntry {
  checksum: string;
  /** ISO timestamp of when the entry was written. */
  storedAt: string;
  metadata?: Record<string, unknown>;
  body: string;
}

export type CacheWriteInput = Omit<CacheEntry, 'storedAt'>;

/** Namespaced key/value store for raw API responses, keyed by request checksum. */
export interface CacheClient {
  read(namespace: string, checksum: string): Promise<CacheEntry | null>;
  write(namespace: string, entry: CacheWriteInput): Promise<void>;
}
