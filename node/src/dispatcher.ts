/**
 * Dispatcher
 *
 * Applies inbound messages to the store and the address book, and serves the
 * local submit and query operations. Whether a flooded message travels on is
 * decided here and carried out by the node manager.
 */

import crypto from "node:crypto"
import { z } from "zod"
import { IdentifierSchema, MAX_NOTE_LENGTH, buildMessage, recordToReport } from "./messages.ts"
import type { Envelope, FloodKind, GossipMessage, OutboundMessage, PayloadMap, SpammerRecord } from "./messages.ts"
import type { PeerAddress } from "./peer-connection.ts"
import type { DispatchContext, DispatchOutcome, MessageHandler } from "./node-manager.ts"
import type { SpammerStore, UpsertResult } from "./storage/spammer-store.ts"
import { StoreWriteError, errorMessage } from "./errors.ts"
import { createLogger } from "./logger.ts"

const log = createLogger("dispatcher")

export const DEFAULT_QUERY_TIMEOUT_MS = 5_000

export interface RegisterResult {
  isNew: boolean
  dialing: boolean
}

/** What the dispatcher needs from the network side. */
export interface GossipTransport {
  readonly nodeId: string
  broadcast(message: OutboundMessage, exclude?: ReadonlySet<string>): number
  sendTo(peerId: string, message: OutboundMessage): boolean
  /** False once the peer is gone. */
  whenPeerWritable(peerId: string): Promise<boolean>
  originate<K extends FloodKind>(kind: K, payload: PayloadMap[K], exclude?: ReadonlySet<string>): Envelope<K>
  registerPeerAddress(address: PeerAddress): RegisterResult
  readyPeerIds(): string[]
}

export const ReportInputSchema = z.object({
  identifier: IdentifierSchema,
  note: z.string().max(MAX_NOTE_LENGTH).default(""),
  timestamp: z.number().finite().nonnegative().optional(),
})

export type ReportInput = z.input<typeof ReportInputSchema>

export type SubmitResult =
  | { ok: true; changed: boolean; record: SpammerRecord }
  | { ok: false; error: string }

export type QueryResult =
  | { found: true; record: SpammerRecord; source: "local" | "network"; peerId?: string }
  | { found: false }

export interface QueryOptions {
  network?: boolean
  timeoutMs?: number
}

export interface DispatcherOptions {
  store: SpammerStore
  transport: GossipTransport
  queryTimeoutMs?: number
  nowFn?: () => number
}

interface PendingQuery {
  identifier: string
  awaiting: Set<string>
  timer: ReturnType<typeof setTimeout>
  settle: (result: QueryResult) => void
}

export class Dispatcher implements MessageHandler {
  private readonly store: SpammerStore
  private readonly transport: GossipTransport
  private readonly queryTimeoutMs: number
  private readonly nowFn: () => number
  private readonly pending = new Map<string, PendingQuery>()

  constructor(opts: DispatcherOptions) {
    this.store = opts.store
    this.transport = opts.transport
    this.queryTimeoutMs = opts.queryTimeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS
    this.nowFn = opts.nowFn ?? (() => Date.now())
  }

  async dispatch(message: GossipMessage, context: DispatchContext): Promise<DispatchOutcome> {
    switch (message.kind) {
      case "announce-peer": {
        const { host, port, nodeId } = message.payload
        const result = this.transport.registerPeerAddress({ host, port, nodeId: nodeId ?? undefined })
        return { rebroadcast: result.isNew }
      }

      case "report-spammer": {
        const { identifier, note, timestamp } = message.payload
        // StoreWriteError propagates so the node manager can undo its dedup entry
        const result = await this.store.upsert({ identifier, note, timestamp, originId: message.originId })
        if (!result.changed) {
          log.debug("stale or repeated report", { identifier, origin: message.originId })
        }
        return { rebroadcast: result.changed }
      }

      case "query-spammer": {
        const { correlationId, identifier } = message.payload
        const record = await this.store.get(identifier)
        const response = buildMessage("query-response", this.transport.nodeId, { correlationId, identifier, record })
        if (!this.transport.sendTo(context.peerId, response)) {
          log.debug("query response not delivered", { peer: context.peerId, correlationId })
        }
        return { rebroadcast: false }
      }

      case "query-response": {
        await this.handleQueryResponse(message.payload, context.peerId)
        return { rebroadcast: false }
      }

      default: {
        log.warn("message kind not dispatched", { kind: message.kind, peer: context.peerId })
        return { rebroadcast: false }
      }
    }
  }

  /** Send every stored record to a newly connected peer, pacing on its socket. */
  async onPeerReady(peerId: string): Promise<void> {
    const records = await this.store.all()
    let sent = 0
    for (const record of records) {
      if (!(await this.transport.whenPeerWritable(peerId))) break
      if (!this.transport.sendTo(peerId, recordToReport(record))) break
      sent++
    }
    if (records.length > 0) {
      log.info("records sent to new peer", { peer: peerId, sent, total: records.length })
    }
  }

  /**
   * Record a report made on this node and flood it when it changed the store.
   */
  async submitReport(input: ReportInput): Promise<SubmitResult> {
    const parsed = ReportInputSchema.safeParse(input)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      return { ok: false, error: issue ? `${issue.path.join(".") || "input"}: ${issue.message}` : "invalid report" }
    }
    const { identifier, note } = parsed.data
    const timestamp = parsed.data.timestamp ?? this.nowFn()

    let result: UpsertResult
    try {
      result = await this.store.upsert({ identifier, note, timestamp, originId: this.transport.nodeId })
    } catch (err) {
      if (err instanceof StoreWriteError) {
        log.warn("local report not stored", { identifier, error: err.message })
        return { ok: false, error: err.message }
      }
      throw err
    }

    if (result.changed) {
      this.transport.originate("report-spammer", { identifier, note, timestamp })
      log.info("spammer reported", { identifier })
    }
    return { ok: true, changed: result.changed, record: result.record }
  }

  /**
   * Look an identifier up locally and, when asked to and nothing is stored,
   * ask the direct peers. The first positive answer wins.
   */
  async query(identifier: string, opts: QueryOptions = {}): Promise<QueryResult> {
    const local = await this.store.get(identifier)
    if (local) return { found: true, record: local, source: "local" }
    if (!opts.network) return { found: false }

    const peerIds = this.transport.readyPeerIds()
    if (peerIds.length === 0) return { found: false }

    const correlationId = crypto.randomUUID()
    const timeoutMs = opts.timeoutMs ?? this.queryTimeoutMs

    return new Promise<QueryResult>((resolve) => {
      const entry: PendingQuery = {
        identifier,
        awaiting: new Set(),
        timer: setTimeout(() => {
          log.debug("network query timed out", { identifier, unanswered: entry.awaiting.size })
          this.finish(correlationId, entry, { found: false })
        }, timeoutMs),
        settle: resolve,
      }
      this.pending.set(correlationId, entry)

      const request = buildMessage("query-spammer", this.transport.nodeId, { correlationId, identifier })
      for (const peerId of peerIds) {
        if (this.transport.sendTo(peerId, request)) entry.awaiting.add(peerId)
      }
      if (entry.awaiting.size === 0) {
        this.finish(correlationId, entry, { found: false })
      }
    })
  }

  get pendingQueries(): number {
    return this.pending.size
  }

  /** Resolve every outstanding query as not found. */
  close(): void {
    for (const [correlationId, entry] of [...this.pending]) {
      this.finish(correlationId, entry, { found: false })
    }
  }

  private async handleQueryResponse(payload: PayloadMap["query-response"], peerId: string): Promise<void> {
    const entry = this.pending.get(payload.correlationId)
    if (!entry || !entry.awaiting.has(peerId)) {
      log.debug("unexpected query response discarded", { peer: peerId, correlationId: payload.correlationId })
      return
    }
    const record = payload.record
    if (record === null || record.identifier !== entry.identifier) {
      entry.awaiting.delete(peerId)
      if (entry.awaiting.size === 0) {
        this.finish(payload.correlationId, entry, { found: false })
      }
      return
    }

    // first positive answer wins; later ones find no pending entry
    this.pending.delete(payload.correlationId)
    clearTimeout(entry.timer)
    let stored = record
    try {
      const result = await this.store.upsert(record)
      stored = result.record
    } catch (err) {
      log.warn("learned record not stored", { identifier: record.identifier, error: errorMessage(err) })
    }
    entry.settle({ found: true, record: stored, source: "network", peerId })
  }

  private finish(correlationId: string, entry: PendingQuery, result: QueryResult): void {
    if (this.pending.get(correlationId) !== entry) return
    this.pending.delete(correlationId)
    clearTimeout(entry.timer)
    entry.settle(result)
  }
}
