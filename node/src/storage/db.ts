/**
 * Key-value storage
 *
 * The spammer store talks to an `IDatabase`: utf8 string keys, byte values,
 * ordered prefix scans. `LevelDatabase` keeps the data in a LevelDB directory
 * under the node's data dir and flushes every write to disk before resolving;
 * `MemoryDatabase` backs tests.
 */

import { Level } from "level"
import { resolve } from "node:path"

export interface ScanOptions {
  limit?: number
  reverse?: boolean
}

export interface IDatabase {
  open(): Promise<void>
  get(key: string): Promise<Uint8Array | null>
  put(key: string, value: Uint8Array): Promise<void>
  /** Deleting a missing key is not an error. */
  del(key: string): Promise<void>
  close(): Promise<void>
  getKeysWithPrefix(prefix: string, opts?: ScanOptions): Promise<string[]>
  getEntriesWithPrefix(prefix: string, opts?: ScanOptions): Promise<Array<[string, Uint8Array]>>
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "LEVEL_NOT_FOUND"
}

/** Smallest key greater than every key starting with `prefix`. */
export function prefixUpperBound(prefix: string): string {
  if (prefix.length === 0) return "\uffff"
  const last = prefix.charCodeAt(prefix.length - 1)
  return prefix.slice(0, -1) + String.fromCharCode(last + 1)
}

export class LevelDatabase implements IDatabase {
  readonly path: string
  private readonly level: Level<string, Uint8Array>
  private opened: Promise<void> | null = null

  constructor(dataDir: string, namespace: string) {
    this.path = resolve(dataDir, `leveldb-${namespace}`)
    this.level = new Level(this.path, { keyEncoding: "utf8", valueEncoding: "view" })
  }

  /** Opens once; creates the directory on first use. */
  open(): Promise<void> {
    this.opened ??= this.level.open()
    return this.opened
  }

  async get(key: string): Promise<Uint8Array | null> {
    await this.open()
    try {
      return (await this.level.get(key)) ?? null
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    await this.open()
    await this.level.put(key, value, { sync: true })
  }

  async del(key: string): Promise<void> {
    await this.open()
    await this.level.del(key, { sync: true })
  }

  async close(): Promise<void> {
    if (!this.opened) return
    await this.opened
    this.opened = null
    await this.level.close()
  }

  async getKeysWithPrefix(prefix: string, opts: ScanOptions = {}): Promise<string[]> {
    await this.open()
    return this.level.keys(this.range(prefix, opts)).all()
  }

  async getEntriesWithPrefix(prefix: string, opts: ScanOptions = {}): Promise<Array<[string, Uint8Array]>> {
    await this.open()
    return this.level.iterator(this.range(prefix, opts)).all()
  }

  private range(prefix: string, opts: ScanOptions) {
    return { gte: prefix, lt: prefixUpperBound(prefix), reverse: opts.reverse ?? false, limit: opts.limit ?? -1 }
  }
}

export class MemoryDatabase implements IDatabase {
  private readonly data = new Map<string, Uint8Array>()

  async open(): Promise<void> {}

  async get(key: string): Promise<Uint8Array | null> {
    return this.data.get(key) ?? null
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    // the caller may reuse its buffer
    this.data.set(key, value.slice())
  }

  async del(key: string): Promise<void> {
    this.data.delete(key)
  }

  async close(): Promise<void> {}

  async getKeysWithPrefix(prefix: string, opts: ScanOptions = {}): Promise<string[]> {
    const keys = [...this.data.keys()].filter((k) => k.startsWith(prefix)).sort()
    if (opts.reverse) keys.reverse()
    return opts.limit !== undefined && opts.limit >= 0 ? keys.slice(0, opts.limit) : keys
  }

  async getEntriesWithPrefix(prefix: string, opts: ScanOptions = {}): Promise<Array<[string, Uint8Array]>> {
    const keys = await this.getKeysWithPrefix(prefix, opts)
    return keys.flatMap((key): Array<[string, Uint8Array]> => {
      const value = this.data.get(key)
      return value ? [[key, value]] : []
    })
  }
}
