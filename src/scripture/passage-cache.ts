const DEFAULT_TTL_MS = 12 * 60 * 60_000; // 12 hours
const DEFAULT_MAX_ENTRIES = 128;

export interface CachedPassage {
  readonly text: string;
  readonly reference: string;
}

export interface PassageCacheOptions {
  readonly enabled?: boolean;
  readonly maxEntries?: number;
  readonly ttlMs?: number;
  readonly now?: () => number;
}

interface Entry {
  readonly value: CachedPassage;
  storedAt: number;
}

/**
 * LRU cache of resolved passages keyed by (reference, translation), both
 * compared case-insensitively. Entries older than the TTL are never returned
 * and are dropped when touched. Map insertion order doubles as recency order.
 */
export class PassageCache {
  private readonly entries = new Map<string, Entry>();
  private readonly enabled: boolean;
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: PassageCacheOptions = {}) {
    this.enabled = opts.enabled ?? true;
    this.maxEntries = opts.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.ttlMs = opts.ttlMs ?? DEFAULT_TTL_MS;
    this.now = opts.now ?? Date.now;
  }

  static key(reference: string, translation: string): string {
    return `${reference.trim().toLowerCase()}|${translation.trim().toLowerCase()}`;
  }

  get size(): number {
    return this.entries.size;
  }

  get(reference: string, translation: string): CachedPassage | undefined {
    if (!this.enabled) return undefined;

    const key = PassageCache.key(reference, translation);
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    this.entries.delete(key);
    const now = this.now();
    if (now - entry.storedAt > this.ttlMs) return undefined;

    // A hit refreshes both recency and age.
    entry.storedAt = now;
    this.entries.set(key, entry);
    return entry.value;
  }

  put(reference: string, translation: string, value: CachedPassage): void {
    if (!this.enabled) return;

    const key = PassageCache.key(reference, translation);
    this.entries.delete(key);
    this.entries.set(key, { value, storedAt: this.now() });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next().value;
      if (oldest === undefined) break;
      this.entries.delete(oldest);
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
