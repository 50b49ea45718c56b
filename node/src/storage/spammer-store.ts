/**
 * Spammer store
 *
 * One record per identifier under `spammer:<identifier>`, JSON encoded.
 * Conflicting reports resolve last-write-wins on the report timestamp; equal
 * timestamps fall back to the greater originId, then the greater note, so
 * every node settles on the same record whatever the arrival order.
 */

import { StoreWriteError, errorMessage } from "../errors.ts"
import { createLogger } from "../logger.ts"
import { SpammerRecordSchema } from "../messages.ts"
import type { SpammerRecord } from "../messages.ts"
import type { IDatabase } from "./db.ts"

const log = createLogger("spammer-store")

const KEY_PREFIX = "spammer:"

export interface UpsertResult {
  changed: boolean
  record: SpammerRecord
}

function recordKey(identifier: string): string {
  return `${KEY_PREFIX}${identifier}`
}

function sameRecord(a: SpammerRecord, b: SpammerRecord): boolean {
  return a.timestamp === b.timestamp && a.originId === b.originId && a.note === b.note
}

/** True when `incoming` should replace `existing`. */
export function supersedes(incoming: SpammerRecord, existing: SpammerRecord): boolean {
  if (incoming.timestamp !== existing.timestamp) {
    return incoming.timestamp > existing.timestamp
  }
  if (incoming.originId !== existing.originId) {
    return incoming.originId > existing.originId
  }
  return incoming.note > existing.note
}

export class SpammerStore {
  private readonly db: IDatabase
  private readonly encoder = new TextEncoder()
  private readonly decoder = new TextDecoder()
  private readonly locks = new Map<string, Promise<void>>()
  private closed = false

  constructor(db: IDatabase) {
    this.db = db
  }

  async open(): Promise<void> {
    await this.db.open()
  }

  async get(identifier: string): Promise<SpammerRecord | null> {
    const raw = await this.db.get(recordKey(identifier))
    if (!raw) return null
    return this.decode(identifier, raw)
  }

  /**
   * Insert or replace the record for `record.identifier`.
   * Resolves after the write is durable; rejects with StoreWriteError when
   * the write fails.
   */
  async upsert(record: SpammerRecord): Promise<UpsertResult> {
    if (this.closed) {
      throw new StoreWriteError(record.identifier, "store is closed")
    }
    return this.withLock(record.identifier, async () => {
      const existing = await this.get(record.identifier)
      if (existing && (sameRecord(existing, record) || !supersedes(record, existing))) {
        return { changed: false, record: existing }
      }
      const stored: SpammerRecord = {
        identifier: record.identifier,
        note: record.note,
        timestamp: record.timestamp,
        originId: record.originId,
      }
      try {
        await this.db.put(recordKey(record.identifier), this.encoder.encode(JSON.stringify(stored)))
      } catch (err) {
        throw new StoreWriteError(record.identifier, errorMessage(err))
      }
      log.debug("record stored", { identifier: stored.identifier, originId: stored.originId, replaced: existing !== null })
      return { changed: true, record: stored }
    })
  }

  /** Manual removal. Returns whether a record existed. */
  async purge(identifier: string): Promise<boolean> {
    if (this.closed) {
      throw new StoreWriteError(identifier, "store is closed")
    }
    return this.withLock(identifier, async () => {
      const existing = await this.db.get(recordKey(identifier))
      if (!existing) return false
      try {
        await this.db.del(recordKey(identifier))
      } catch (err) {
        throw new StoreWriteError(identifier, errorMessage(err))
      }
      log.info("record purged", { identifier })
      return true
    })
  }

  async all(): Promise<SpammerRecord[]> {
    const entries = await this.db.getEntriesWithPrefix(KEY_PREFIX)
    const records: SpammerRecord[] = []
    for (const [key, raw] of entries) {
      const record = this.decode(key.slice(KEY_PREFIX.length), raw)
      if (record) records.push(record)
    }
    return records
  }

  async count(): Promise<number> {
    const keys = await this.db.getKeysWithPrefix(KEY_PREFIX)
    return keys.length
  }

  /** Waits for in-flight writes, then closes the database. */
  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    await Promise.all([...this.locks.values()])
    await this.db.close()
  }

  private decode(identifier: string, raw: Uint8Array): SpammerRecord | null {
    let parsed: unknown
    try {
      parsed = JSON.parse(this.decoder.decode(raw))
    } catch (err) {
      log.warn("unreadable record skipped", { identifier, error: errorMessage(err) })
      return null
    }
    const result = SpammerRecordSchema.safeParse(parsed)
    if (!result.success) {
      log.warn("invalid record skipped", { identifier })
      return null
    }
    return result.data
  }

  // Serializes work per identifier; different identifiers run concurrently.
  private async withLock<T>(identifier: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(identifier) ?? Promise.resolve()
    let release: () => void = () => {}
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.locks.set(identifier, tail)
    await previous
    try {
      return await fn()
    } finally {
      release()
      if (this.locks.get(identifier) === tail) {
        this.locks.delete(identifier)
      }
    }
  }
}
