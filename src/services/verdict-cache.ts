import type { Verdict } from "../types"

interface CacheEntry {
  verdict: Verdict
  expiresAt: number
}

export interface VerdictCacheStats {
  size: number
  inFlight: number
  hits: number
  misses: number
  joined: number
  hitRate: number
}

/**
 * LRU map of verdicts by normalized URL with per-entry expiry, plus a
 * single-flight table so concurrent misses on one key share a computation.
 */
export class VerdictCache {
  private readonly entries = new Map<string, CacheEntry>()
  private readonly inFlight = new Map<string, Promise<Verdict>>()
  private hits = 0
  private misses = 0
  private joined = 0

  constructor(
    private readonly maxEntries: number,
    private readonly now: () => number = Date.now,
  ) {}

  get(key: string): Verdict | null {
    const entry = this.entries.get(key)
    if (!entry) {
      this.misses += 1
      return null
    }

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key)
      this.misses += 1
      return null
    }

    // Re-insert to mark as most recently used.
    this.entries.delete(key)
    this.entries.set(key, entry)
    this.hits += 1
    return entry.verdict
  }

  put(key: string, verdict: Verdict, ttlMs: number): void {
    this.entries.delete(key)
    if (ttlMs <= 0) {
      return
    }

    this.entries.set(key, { verdict, expiresAt: this.now() + ttlMs })

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next()
      if (oldest.done) {
        break
      }
      this.entries.delete(oldest.value)
    }
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key)
  }

  isInFlight(key: string): boolean {
    return this.inFlight.has(key)
  }

  /**
   * Runs `task` unless a computation for `key` is already in flight, in
   * which case the caller joins it. Failures are not cached.
   */
  singleFlight(key: string, task: () => Promise<Verdict>): Promise<Verdict> {
    const running = this.inFlight.get(key)
    if (running) {
      this.joined += 1
      return running
    }

    const request = task().finally(() => {
      this.inFlight.delete(key)
    })

    this.inFlight.set(key, request)
    return request
  }

  stats(): VerdictCacheStats {
    const lookups = this.hits + this.misses

    return {
      size: this.entries.size,
      inFlight: this.inFlight.size,
      hits: this.hits,
      misses: this.misses,
      joined: this.joined,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    }
  }
}
