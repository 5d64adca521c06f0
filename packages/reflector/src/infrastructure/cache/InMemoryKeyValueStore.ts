import type { KeyValueStore } from "../../core/ports/KeyValueStore.js";

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface InMemoryKeyValueStoreOptions {
  /** Default entry lifetime in milliseconds */
  ttlMs: number;
  maxSize?: number;
  /** Injectable for tests */
  now?: () => number;
}

/**
 * In-memory implementation of KeyValueStore.
 * Entries expire after their TTL; the oldest entry is evicted at capacity.
 */
export class InMemoryKeyValueStore<V> implements KeyValueStore<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly ttlMs: number;
  private readonly maxSize: number;
  private readonly now: () => number;
  private readonly listeners: Array<(key: string) => void> = [];

  constructor(options: InMemoryKeyValueStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.maxSize = options.maxSize ?? 10_000;
    this.now = options.now ?? Date.now;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      this.remove(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: V, ttlMs = this.ttlMs): void {
    // Evict oldest entries if at capacity
    if (this.entries.size >= this.maxSize && !this.entries.has(key)) {
      const firstKey = this.entries.keys().next().value;
      if (firstKey !== undefined) {
        this.remove(firstKey);
      }
    }

    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  delete(key: string): void {
    this.remove(key);
  }

  clear(): void {
    for (const key of [...this.entries.keys()]) {
      this.remove(key);
    }
  }

  onRemove(listener: (key: string) => void): void {
    this.listeners.push(listener);
  }

  get size(): number {
    return this.entries.size;
  }

  private remove(key: string): void {
    if (!this.entries.delete(key)) return;
    for (const listener of this.listeners) {
      listener(key);
    }
  }
}
