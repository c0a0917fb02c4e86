import { setTimeout as delay } from "node:timers/promises"

export interface TokenBucketOptions {
  capacity: number
  refillPerSecond: number
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

/**
 * Per-provider request budget. Starts full, refills continuously at
 * `refillPerSecond` up to `capacity`. Tokens are only taken through
 * `tryAcquire` and `acquire`, which run to completion on the event loop, so
 * no two callers can spend the same token.
 */
export class TokenBucket {
  readonly capacity: number
  readonly refillPerSecond: number

  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>
  private tokens: number
  private lastRefill: number

  constructor(options: TokenBucketOptions) {
    this.capacity = Math.max(1, options.capacity)
    this.refillPerSecond = Math.max(0, options.refillPerSecond)
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? ((ms) => delay(ms))
    this.tokens = this.capacity
    this.lastRefill = this.now()
  }

  get available(): number {
    this.refill()
    return this.tokens
  }

  tryAcquire(): boolean {
    this.refill()
    if (this.tokens >= 1) {
      this.tokens -= 1
      return true
    }

    return false
  }

  /**
   * Waits for a token as long as one can arrive before `deadline` (epoch ms).
   * Resolves false straight away when the bucket cannot refill in time.
   */
  async acquire(deadline: number): Promise<boolean> {
    for (;;) {
      if (this.tryAcquire()) {
        return true
      }

      const waitMs = this.msUntilNextToken()
      if (!Number.isFinite(waitMs) || this.now() + waitMs > deadline) {
        return false
      }

      await this.sleep(waitMs)
    }
  }

  private msUntilNextToken(): number {
    if (this.refillPerSecond === 0) {
      return Number.POSITIVE_INFINITY
    }

    return Math.ceil(((1 - this.tokens) / this.refillPerSecond) * 1000)
  }

  private refill(): void {
    const now = this.now()
    const elapsedMs = now - this.lastRefill
    if (elapsedMs <= 0) {
      return
    }

    this.tokens = Math.min(this.capacity, this.tokens + (elapsedMs / 1000) * this.refillPerSecond)
    this.lastRefill = now
  }
}
