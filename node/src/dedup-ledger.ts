/**
 * Dedup ledger
 *
 * Remembers the keys of flooded messages this node has already handled.
 * Entries expire after `windowMs`; when the ledger is full the oldest entry is
 * evicted first. A Map keeps insertion order, so the oldest key is always
 * `keys().next()`.
 */

export interface DedupLedgerOptions {
  windowMs: number
  maxEntries: number
  nowFn?: () => number
}

export const DEFAULT_DEDUP_WINDOW_MS = 5 * 60_000
export const DEFAULT_DEDUP_MAX_ENTRIES = 100_000

export class DedupLedger {
  private readonly windowMs: number
  private readonly maxEntries: number
  private readonly nowFn: () => number
  private readonly items = new Map<string, number>()
  private evicted = 0

  constructor(options: Partial<DedupLedgerOptions> = {}) {
    this.windowMs = options.windowMs ?? DEFAULT_DEDUP_WINDOW_MS
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_DEDUP_MAX_ENTRIES)
    this.nowFn = options.nowFn ?? (() => Date.now())
  }

  has(key: string): boolean {
    const now = this.nowFn()
    this.pruneExpired(now)
    return this.items.has(key)
  }

  add(key: string): void {
    const now = this.nowFn()
    this.pruneExpired(now)
    if (this.items.has(key)) return

    while (this.items.size >= this.maxEntries) {
      const oldestKey = this.items.keys().next().value
      if (oldestKey === undefined) break
      this.items.delete(oldestKey)
      this.evicted++
    }

    this.items.set(key, now)
  }

  /**
   * Record the key and report whether it was new. The check and the insert
   * happen in one synchronous step.
   */
  markIfNew(key: string): boolean {
    if (this.has(key)) return false
    this.add(key)
    return true
  }

  delete(key: string): boolean {
    return this.items.delete(key)
  }

  prune(): void {
    this.pruneExpired(this.nowFn())
  }

  get size(): number {
    return this.items.size
  }

  /** Entries dropped because the ledger was full. */
  get evictedCount(): number {
    return this.evicted
  }

  private pruneExpired(now: number): void {
    if (this.windowMs <= 0) return
    const cutoff = now - this.windowMs
    // insertion order is time order, so stop at the first live entry
    for (const [key, ts] of this.items) {
      if (ts >= cutoff) break
      this.items.delete(key)
    }
  }
}
