/**
 * Port for an expiring key-value store.
 */
export interface KeyValueStore<V> {
  /**
   * Value stored under `key`, or undefined when missing or expired.
   */
  get(key: string): V | undefined;

  /**
   * Store a value; `ttlMs` overrides the store's default lifetime.
   */
  set(key: string, value: V, ttlMs?: number): void;

  delete(key: string): void;

  clear(): void;

  /** Entries currently held, expired ones not yet collected included */
  readonly size: number;

  /**
   * Call `listener` with the key of every entry that leaves the store:
   * deleted, cleared, expired or evicted at capacity.
   */
  onRemove(listener: (key: string) => void): void;
}
