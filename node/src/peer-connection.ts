/**
 * Peer connection
 *
 * One TCP link to another node. Owns the socket, a frame decoder and the
 * inbound processing chain. Handshake, ping and pong are handled here; every
 * other message goes to the owner in arrival order, one at a time.
 */

import crypto from "node:crypto"
import type net from "node:net"
import { JsonFrameDecoder, DEFAULT_MAX_FRAME_BYTES } from "./json-framer.ts"
import { decodeMessageText } from "./message-codec.ts"
import { buildMessage, encodeMessage, parseMessage } from "./messages.ts"
import type { GossipMessage, OutboundMessage } from "./messages.ts"
import { DecodeError, FramingError, UnknownMessageKindError, errorMessage } from "./errors.ts"
import { createLogger } from "./logger.ts"

const log = createLogger("peer-connection")

export const DEFAULT_MAX_SEND_QUEUE_BYTES = 8 * 1024 * 1024
const MAX_LATENCY_SAMPLES = 20

export type ConnectionDirection = "inbound" | "outbound"

export interface PeerAddress {
  host: string
  port: number
  nodeId?: string
}

export function addressKey(address: { host: string; port: number }): string {
  return `${address.host}:${address.port}`
}

export function normalizeHost(host: string): string {
  return host.startsWith("::ffff:") ? host.slice(7) : host
}

export interface PeerConnectionOptions {
  socket: net.Socket
  direction: ConnectionDirection
  localNodeId: string
  localListenPort: number
  /** Address this side dialed; outbound only. */
  dialAddress?: PeerAddress
  maxFrameBytes?: number
  maxSendQueueBytes?: number
  pingIntervalMs?: number
  idleTimeoutMs?: number
  nowFn?: () => number
  onReady: (conn: PeerConnection) => void
  onMessage: (conn: PeerConnection, message: GossipMessage, receivedAtMs: number) => Promise<void>
  onClose: (conn: PeerConnection, reason: string) => void
}

export type PeerConnectionStats = {
  messagesIn: number
  messagesOut: number
  bytesIn: number
  bytesOut: number
  decodeErrors: number
}

export class PeerConnection {
  readonly id = crypto.randomUUID()
  readonly direction: ConnectionDirection
  readonly remoteHost: string
  readonly connectedAtMs: number
  private readonly socket: net.Socket
  private readonly opts: PeerConnectionOptions
  private readonly decoder: JsonFrameDecoder
  private readonly maxSendQueueBytes: number
  private readonly nowFn: () => number
  private queue: Promise<void> = Promise.resolve()
  private ready = false
  private closed = false
  private remoteId: string | null = null
  private remotePort: number | null = null
  private lastSeen: number
  private lastPingSentMs = 0
  private lastPingAt = 0
  private latencySamples: number[] = []
  private pingTimer: ReturnType<typeof setInterval> | null = null
  private readonly stats: PeerConnectionStats = {
    messagesIn: 0,
    messagesOut: 0,
    bytesIn: 0,
    bytesOut: 0,
    decodeErrors: 0,
  }

  constructor(opts: PeerConnectionOptions) {
    this.opts = opts
    this.socket = opts.socket
    this.direction = opts.direction
    this.remoteHost = normalizeHost(opts.socket.remoteAddress ?? opts.dialAddress?.host ?? "unknown")
    this.decoder = new JsonFrameDecoder(opts.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES)
    this.maxSendQueueBytes = opts.maxSendQueueBytes ?? DEFAULT_MAX_SEND_QUEUE_BYTES
    this.nowFn = opts.nowFn ?? (() => Date.now())
    this.connectedAtMs = this.nowFn()
    this.lastSeen = this.connectedAtMs

    this.socket.setNoDelay(true)
    this.socket.setTimeout(0)
    this.socket.on("data", (data: Buffer) => this.onData(data))
    this.socket.on("close", () => this.close("socket closed"))
    this.socket.on("error", (err) => {
      log.debug("socket error", { conn: this.id, peer: this.remoteId, error: err.message })
    })
  }

  /** Send our handshake and start liveness checks. */
  start(): void {
    if (this.closed) return
    this.write(buildMessage("handshake", this.opts.localNodeId, { listenPort: this.opts.localListenPort }))

    const pingIntervalMs = this.opts.pingIntervalMs ?? 30_000
    const idleTimeoutMs = this.opts.idleTimeoutMs ?? 120_000
    const tickMs = Math.max(10, Math.min(pingIntervalMs, idleTimeoutMs))
    this.pingTimer = setInterval(() => this.tick(pingIntervalMs, idleTimeoutMs), tickMs)
  }

  /**
   * Queue a message for the peer. Returns false when the connection is not
   * ready, or when the peer stopped reading and the connection was dropped.
   */
  send(message: OutboundMessage): boolean {
    if (!this.ready || this.closed) return false
    return this.write(message)
  }

  isReady(): boolean {
    return this.ready && !this.closed
  }

  isClosed(): boolean {
    return this.closed
  }

  get remoteNodeId(): string | null {
    return this.remoteId
  }

  get remoteListenPort(): number | null {
    return this.remotePort
  }

  get lastSeenMs(): number {
    return this.lastSeen
  }

  get dialAddress(): PeerAddress | undefined {
    return this.opts.dialAddress
  }

  /** Address other nodes can dial to reach this peer, once known. */
  dialableAddress(): PeerAddress | null {
    if (this.opts.dialAddress) {
      return { ...this.opts.dialAddress, nodeId: this.remoteId ?? this.opts.dialAddress.nodeId }
    }
    if (this.remotePort === null) return null
    return { host: this.remoteHost, port: this.remotePort, nodeId: this.remoteId ?? undefined }
  }

  /** Id of the node that opened this connection. */
  initiatorId(): string | null {
    return this.direction === "outbound" ? this.opts.localNodeId : this.remoteId
  }

  /** Average round trip of recent pings, or null before the first pong. */
  latencyMs(): number | null {
    if (this.latencySamples.length === 0) return null
    const sum = this.latencySamples.reduce((a, b) => a + b, 0)
    return Math.round(sum / this.latencySamples.length)
  }

  getStats(): PeerConnectionStats {
    return { ...this.stats }
  }

  /** Pending outbound bytes not yet handed to the kernel. */
  pendingBytes(): number {
    return this.socket.writableLength
  }

  /**
   * Resolves true once the socket has flushed its buffer to the kernel, or
   * false when the connection closes first.
   */
  whenWritable(): Promise<boolean> {
    if (this.closed) return Promise.resolve(false)
    if (!this.socket.writableNeedDrain) return Promise.resolve(true)
    return new Promise((resolve) => {
      const settle = (writable: boolean) => {
        this.socket.off("drain", onDrain)
        this.socket.off("close", onClose)
        resolve(writable && !this.closed)
      }
      const onDrain = () => settle(true)
      const onClose = () => settle(false)
      this.socket.once("drain", onDrain)
      this.socket.once("close", onClose)
    })
  }

  /** Resolves once every message received so far has been processed. */
  drain(): Promise<void> {
    return this.queue
  }

  close(reason: string): void {
    if (this.closed) return
    this.closed = true
    this.ready = false
    if (this.pingTimer) {
      clearInterval(this.pingTimer)
      this.pingTimer = null
    }
    const dropped = this.decoder.end()
    if (dropped > 0) {
      log.debug("partial message dropped on close", { conn: this.id, bytes: dropped })
    }
    this.socket.destroy()
    log.info("peer connection closed", { conn: this.id, peer: this.remoteId, reason })
    this.opts.onClose(this, reason)
  }

  private write(message: OutboundMessage): boolean {
    if (this.closed) return false
    if (this.socket.writableLength > this.maxSendQueueBytes) {
      log.warn("peer send queue overflow, disconnecting", {
        conn: this.id,
        peer: this.remoteId,
        bufferedBytes: this.socket.writableLength,
      })
      this.close("send queue overflow")
      return false
    }
    const text = encodeMessage(message)
    this.stats.messagesOut++
    this.stats.bytesOut += Buffer.byteLength(text)
    this.socket.write(text)
    return true
  }

  private onData(data: Buffer): void {
    if (this.closed) return
    const receivedAtMs = this.nowFn()
    this.lastSeen = receivedAtMs
    this.stats.bytesIn += data.byteLength

    let texts: string[]
    try {
      texts = this.decoder.feed(data)
    } catch (err) {
      const reason = err instanceof FramingError ? "framing error" : "decoder failure"
      log.warn(`${reason}, closing connection`, { conn: this.id, peer: this.remoteId, error: errorMessage(err) })
      this.close(reason)
      return
    }

    for (const text of texts) {
      this.queue = this.queue.then(() => this.process(text, receivedAtMs))
    }
  }

  private async process(text: string, receivedAtMs: number): Promise<void> {
    if (this.closed) return

    let message: GossipMessage
    try {
      message = parseMessage(decodeMessageText(text))
    } catch (err) {
      this.stats.decodeErrors++
      if (err instanceof UnknownMessageKindError) {
        log.warn("unknown message kind discarded", { conn: this.id, peer: this.remoteId, kind: err.kind })
        return
      }
      log.warn("undecodable message discarded", {
        conn: this.id,
        peer: this.remoteId,
        code: err instanceof DecodeError ? err.code : "INTERNAL",
        error: errorMessage(err),
      })
      return
    }
    this.stats.messagesIn++

    switch (message.kind) {
      case "handshake": {
        if (this.ready) {
          log.debug("repeated handshake ignored", { conn: this.id, peer: this.remoteId })
          return
        }
        this.remoteId = message.originId
        this.remotePort = message.payload.listenPort
        this.ready = true
        this.opts.onReady(this)
        return
      }
      case "ping": {
        if (this.ready) this.write(buildMessage("pong", this.opts.localNodeId, message.payload))
        return
      }
      case "pong": {
        if (this.lastPingSentMs > 0 && message.payload.sentAtMs === this.lastPingSentMs) {
          this.latencySamples.push(Math.max(0, receivedAtMs - this.lastPingSentMs))
          if (this.latencySamples.length > MAX_LATENCY_SAMPLES) this.latencySamples.shift()
          this.lastPingSentMs = 0
        }
        return
      }
    }

    if (!this.ready) {
      log.warn("message before handshake discarded", { conn: this.id, kind: message.kind })
      return
    }

    try {
      await this.opts.onMessage(this, message, receivedAtMs)
    } catch (err) {
      log.error("message handler failed", { conn: this.id, peer: this.remoteId, kind: message.kind, error: errorMessage(err) })
    }
  }

  private tick(pingIntervalMs: number, idleTimeoutMs: number): void {
    if (this.closed) return
    const now = this.nowFn()
    if (now - this.lastSeen > idleTimeoutMs) {
      this.close("idle timeout")
      return
    }
    if (this.ready && now - this.lastPingAt >= pingIntervalMs) {
      this.lastPingAt = now
      this.lastPingSentMs = now
      this.write(buildMessage("ping", this.opts.localNodeId, { sentAtMs: now }))
    }
  }
}
