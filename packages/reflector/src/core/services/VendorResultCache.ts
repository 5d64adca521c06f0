import { createHash } from "node:crypto";
import type { Logger } from "@phpscope/core";

import type { UsageMatch, UsageType } from "../model.js";
import type { KeyValueStore } from "../ports/KeyValueStore.js";

export const VENDOR_CACHE_PREFIX = "class_usages_vendor_";

export interface VendorCacheKeyParts {
  filePath: string;
  content: string;
  target: string;
  usageTypes: readonly UsageType[];
}

/**
 * Per-file usage results for dependency sources, which rarely change.
 *
 * Every key written is tracked so `flush()` evicts exactly the entries this
 * cache created and nothing else sharing the store. A key leaves the tracked
 * set when its entry leaves the store.
 */
export class VendorResultCache {
  private readonly tracked = new Set<string>();

  constructor(
    private readonly store: KeyValueStore<UsageMatch[]>,
    private readonly logger?: Logger
  ) {
    store.onRemove((key) => this.tracked.delete(key));
  }

  /**
   * Key for one file's results. The content hash invalidates edited files;
   * target and usage types keep different queries apart.
   */
  static keyFor(parts: VendorCacheKeyParts): string {
    const contentHash = sha1(parts.content);
    const types = [...parts.usageTypes].sort().join(",");
    return VENDOR_CACHE_PREFIX + sha1([parts.filePath, contentHash, parts.target, types].join("\0"));
  }

  get(key: string): UsageMatch[] | undefined {
    return this.store.get(key);
  }

  set(key: string, matches: UsageMatch[]): void {
    this.store.set(key, matches);
    this.tracked.add(key);
  }

  /**
   * Evict every tracked entry.
   *
   * @returns Number of keys evicted
   */
  flush(): number {
    const keys = [...this.tracked];
    for (const key of keys) {
      this.store.delete(key);
    }
    this.tracked.clear();
    const count = keys.length;
    this.logger?.info(`Flushed ${count} vendor cache entries`);
    return count;
  }

  get trackedKeys(): number {
    return this.tracked.size;
  }
}

function sha1(text: string): string {
  return createHash("sha1").update(text).digest("hex");
}
