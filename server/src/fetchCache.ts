import { performance } from "perf_hooks";
import { ComputeFailedError, RelayError, TimeoutError, errorMessage } from "./errors";

export type Result<V, E = RelayError> = { ok: true; value: V } | { ok: false; error: E };

export type EntryState = "pending" | "ready" | "failed";

interface CacheEntry<V> {
  key: string;
  state: EntryState;
  value?: V;
  error?: RelayError;
  waiters: number;
  createdAt: number;
  settledAt?: number;
  outcome: Promise<Result<V>>;
}

/** Read-only view of an entry handed out to callers. */
export type CacheEntrySnapshot<V> = Readonly<{
  key: string;
  state: EntryState;
  value?: V;
  error?: RelayError;
  waiters: number;
}>;

export interface FetchCacheOptions {
  /** Label used in log lines */
  name?: string;
  maxEntries?: number;
  /** Lifetime of ready entries; unset means they live until evicted */
  ttlMs?: number;
  /** Lifetime of failed entries; unset means they stay until invalidate() */
  failureTtlMs?: number;
  now?: () => number;
}

export interface ComputeOptions {
  timeoutMs?: number;
}

export type ComputeFn<V> = (signal: AbortSignal) => Promise<V>;

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  dedupedWaits: number;
  evictions: number;
}

export type Capability = "lyrics" | "language" | "phonetics" | "translation";

function normalizeKeyPart(value: string): string {
  return value.toLowerCase().trim().replace(/\s+/g, " ");
}

/** Prefix shared by every key of one song */
export function songKeyPrefix(song: { title: string; artist: string }): string {
  return `${normalizeKeyPart(song.title)}|${normalizeKeyPart(song.artist)}::`;
}

/**
 * Build a cache key from song identity, capability and an optional variant
 * (for translations: the target language and profile).
 */
export function cacheKey(
  song: { title: string; artist: string },
  capability: Capability,
  variant?: string
): string {
  const base = `${songKeyPrefix(song)}${capability}`;
  return variant === undefined ? base : `${base}::${variant}`;
}

function toCacheError(error: unknown): RelayError {
  if (error instanceof RelayError) {
    return error;
  }
  return new ComputeFailedError(errorMessage(error), { cause: error });
}

/**
 * Memoizes expensive async computations per key with at most one computation
 * in flight for a key. Failures are cached as well and stay until
 * invalidate() or, if configured, until failureTtlMs elapses.
 *
 * Map insertion order doubles as recency order for LRU eviction.
 */
export class FetchCache<V> {
  private readonly entries: Map<string, CacheEntry<V>> = new Map();
  private readonly name: string;
  private readonly maxEntries: number;
  private readonly ttlMs?: number;
  private readonly failureTtlMs?: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private dedupedWaits = 0;
  private evictions = 0;

  constructor(options: FetchCacheOptions = {}) {
    this.name = options.name ?? "FetchCache";
    this.maxEntries = options.maxEntries ?? 500;
    this.ttlMs = options.ttlMs;
    this.failureTtlMs = options.failureTtlMs;
    this.now = options.now ?? (() => performance.now());

    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${this.maxEntries}`);
    }
  }

  public getOrCompute(key: string, compute: ComputeFn<V>, options: ComputeOptions = {}): Promise<Result<V>> {
    const existing = this.lookup(key);

    if (existing) {
      this.touch(existing);
      if (existing.state === "pending") {
        existing.waiters++;
        this.dedupedWaits++;
        return existing.outcome;
      }
      this.hits++;
      return existing.outcome;
    }

    // Lookup and insert happen in the same synchronous turn, so no other
    // caller can observe the key as absent once we get here.
    this.misses++;
    const entry: CacheEntry<V> = {
      key,
      state: "pending",
      waiters: 1,
      createdAt: this.now(),
      outcome: this.run(key, compute, options).then((result) => this.settle(entry, result)),
    };
    this.entries.set(key, entry);
    this.evictOverflow();

    return entry.outcome;
  }

  /**
   * Drop the entry for a key. An in-flight computation still settles for the
   * callers already waiting on it, but its result is not stored.
   */
  public invalidate(key: string): boolean {
    const removed = this.entries.delete(key);
    if (removed) {
      console.log(`[${this.name}] Invalidated ${key}`);
    }
    return removed;
  }

  public invalidatePrefix(prefix: string): number {
    let count = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        count++;
      }
    }
    if (count > 0) {
      console.log(`[${this.name}] Invalidated ${count} entr${count === 1 ? "y" : "ies"} under ${prefix}`);
    }
    return count;
  }

  public clear(): void {
    this.entries.clear();
  }

  public peek(key: string): CacheEntrySnapshot<V> | undefined {
    const entry = this.lookup(key);
    if (!entry) {
      return undefined;
    }
    return Object.freeze({
      key: entry.key,
      state: entry.state,
      value: entry.value,
      error: entry.error,
      waiters: entry.waiters,
    });
  }

  public get size(): number {
    return this.entries.size;
  }

  public stats(): CacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      dedupedWaits: this.dedupedWaits,
      evictions: this.evictions,
    };
  }

  private async run(key: string, compute: ComputeFn<V>, options: ComputeOptions): Promise<Result<V>> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    try {
      const work = compute(controller.signal);

      if (options.timeoutMs === undefined) {
        return { ok: true, value: await work };
      }

      const timeoutMs = options.timeoutMs;
      const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          controller.abort();
          reject(new TimeoutError(`Computation for ${key} exceeded ${timeoutMs}ms`));
        }, timeoutMs);
      });
      void work.then(undefined, (lateError: unknown) => {
        if (controller.signal.aborted) {
          console.warn(`[${this.name}] Computation for ${key} failed after timeout:`, errorMessage(lateError));
        }
      });
      return { ok: true, value: await Promise.race([work, deadline]) };
    } catch (error) {
      return { ok: false, error: toCacheError(error) };
    } finally {
      clearTimeout(timer);
    }
  }

  private settle(entry: CacheEntry<V>, result: Result<V>): Result<V> {
    entry.settledAt = this.now();
    entry.waiters = 0;
    if (result.ok) {
      entry.state = "ready";
      entry.value = result.value;
    } else {
      entry.state = "failed";
      entry.error = result.error;
      console.error(`[${this.name}] ${result.error.kind} for ${entry.key}:`, result.error.message);
    }
    return result;
  }

  private lookup(key: string): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry || entry.settledAt === undefined) {
      return entry;
    }

    const lifetime = entry.state === "failed" ? this.failureTtlMs : this.ttlMs;
    if (lifetime !== undefined && this.now() - entry.settledAt >= lifetime) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private touch(entry: CacheEntry<V>): void {
    this.entries.delete(entry.key);
    this.entries.set(entry.key, entry);
  }

  private evictOverflow(): void {
    if (this.entries.size <= this.maxEntries) {
      return;
    }
    for (const [key, entry] of this.entries) {
      if (this.entries.size <= this.maxEntries) {
        break;
      }
      // Pending entries have callers attached and are never evicted.
      if (entry.state === "pending") {
        continue;
      }
      this.entries.delete(key);
      this.evictions++;
    }
  }
}
