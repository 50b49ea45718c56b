/**
 * Fixed-window request limiter keyed by client (IP address or connection id).
 */

export interface RateLimiterOptions {
  windowMs?: number
  maxRequests?: number
  maxBuckets?: number
  nowFn?: () => number
}

export class RateLimiter {
  private readonly windowMs: number
  private readonly maxRequests: number
  private readonly maxBuckets: number
  private readonly nowFn: () => number
  private readonly buckets = new Map<string, { count: number; resetAt: number }>()

  constructor(options: RateLimiterOptions = {}) {
    this.windowMs = options.windowMs ?? 60_000
    this.maxRequests = options.maxRequests ?? 200
    this.maxBuckets = options.maxBuckets ?? 100_000
    this.nowFn = options.nowFn ?? (() => Date.now())
  }

  /** Returns true if allowed, false if rate-limited. */
  allow(client: string): boolean {
    const now = this.nowFn()
    const bucket = this.buckets.get(client)

    if (!bucket || now >= bucket.resetAt) {
      if (!bucket && this.buckets.size >= this.maxBuckets) {
        this.cleanup()
        // still full: reject rather than grow
        if (this.buckets.size >= this.maxBuckets) {
          return false
        }
      }
      this.buckets.set(client, { count: 1, resetAt: now + this.windowMs })
      return true
    }

    bucket.count++
    return bucket.count <= this.maxRequests
  }

  forget(client: string): void {
    this.buckets.delete(client)
  }

  cleanup(): void {
    const now = this.nowFn()
    for (const [client, bucket] of this.buckets) {
      if (now >= bucket.resetAt) this.buckets.delete(client)
    }
  }

  get size(): number {
    return this.buckets.size
  }
}
