/**
 * Node manager
 *
 * Owns this node's identity, the P2P listener, the live peer set and the
 * address book. Flooded messages pass the dedup ledger here before the
 * dispatcher sees them; the dispatcher's outcome decides the rebroadcast.
 *
 * Address book has two tiers: bootstrap addresses from configuration are
 * redialed with exponential backoff whenever they drop, discovered addresses
 * (learned from announce-peer or inbound handshakes) are dialed once.
 */

import net from "node:net"
import crypto from "node:crypto"
import { DedupLedger } from "./dedup-ledger.ts"
import { buildMessage, dedupKey, isFloodKind } from "./messages.ts"
import type { Envelope, FloodKind, GossipMessage, OutboundMessage, PayloadMap } from "./messages.ts"
import { PeerConnection, addressKey } from "./peer-connection.ts"
import type { ConnectionDirection, PeerAddress } from "./peer-connection.ts"
import { PeerUnreachableError, StoreWriteError, errorMessage } from "./errors.ts"
import { createLogger } from "./logger.ts"
import type { GossipTransport, RegisterResult } from "./dispatcher.ts"

const log = createLogger("node-manager")

const MAX_KNOWN_ADDRESSES = 1024
const LOCAL_HOSTS: ReadonlySet<string> = new Set(["127.0.0.1", "::1", "localhost", "0.0.0.0", "::"])

export interface DispatchContext {
  connectionId: string
  peerId: string
  receivedAtMs: number
}

export interface DispatchOutcome {
  rebroadcast: boolean
}

export interface MessageHandler {
  dispatch(message: GossipMessage, context: DispatchContext): Promise<DispatchOutcome>
  /** Called once a peer finished its handshake and joined the fan-out set. */
  onPeerReady(peerId: string): Promise<void>
}

export interface NodeManagerConfig {
  nodeId?: string
  bind: string
  port: number
  /** Ports tried upward from `port` when it is taken; 1 disables the search. */
  portSearchLimit?: number
  bootstrap?: PeerAddress[]
  maxPeers?: number
  maxFrameBytes?: number
  maxSendQueueBytes?: number
  dedupWindowMs?: number
  dedupMaxEntries?: number
  reconnectMinMs?: number
  reconnectMaxMs?: number
  /** 0 retries forever. */
  maxReconnectAttempts?: number
  pingIntervalMs?: number
  idleTimeoutMs?: number
  connectTimeoutMs?: number
}

type AddressTier = "bootstrap" | "discovered"

interface KnownAddress {
  address: PeerAddress
  tier: AddressTier
  attempts: number
  timer: ReturnType<typeof setTimeout> | null
}

export type PeerInfo = {
  nodeId: string
  host: string
  port: number | null
  direction: ConnectionDirection
  connectedAtMs: number
  lastSeenMs: number
  latencyMs: number | null
}

export type NodeStats = {
  nodeId: string
  listenPort: number
  peers: number
  connections: number
  bootstrapAddresses: number
  discoveredAddresses: number
  dedupEntries: number
  messagesReceived: number
  duplicatesDropped: number
  ownMessagesDropped: number
  messagesRebroadcast: number
  dispatchErrors: number
}

function isAddrInUse(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "EADDRINUSE"
}

function listenOnce(server: net.Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      server.off("listening", onListening)
      reject(err)
    }
    const onListening = () => {
      server.off("error", onError)
      const addr = server.address()
      resolve(typeof addr === "object" && addr !== null ? addr.port : port)
    }
    server.once("error", onError)
    server.once("listening", onListening)
    server.listen(port, host)
  })
}

/**
 * Of two connections to the same node, keep the one opened by the node with
 * the smaller id. Both ends apply the same rule and agree on the survivor.
 */
function preferNewConnection(incoming: PeerConnection, existing: PeerConnection): boolean {
  const a = incoming.initiatorId()
  const b = existing.initiatorId()
  if (a === null || b === null || a === b) return false
  return a < b
}

export class NodeManager implements GossipTransport {
  readonly nodeId: string
  private readonly cfg: Required<Omit<NodeManagerConfig, "nodeId">>
  private readonly ledger: DedupLedger
  private server: net.Server | null = null
  private port = 0
  private stopped = false
  private handler: MessageHandler | null = null
  private readonly connections = new Map<string, PeerConnection>()
  private readonly peers = new Map<string, PeerConnection>()
  private readonly addresses = new Map<string, KnownAddress>()
  private readonly dialing = new Map<string, net.Socket>()
  private readonly selfAddresses = new Set<string>()
  private readonly counters = {
    messagesReceived: 0,
    duplicatesDropped: 0,
    ownMessagesDropped: 0,
    messagesRebroadcast: 0,
    dispatchErrors: 0,
  }

  constructor(config: NodeManagerConfig) {
    this.nodeId = config.nodeId ?? crypto.randomUUID()
    this.cfg = {
      bind: config.bind,
      port: config.port,
      portSearchLimit: config.portSearchLimit ?? 1,
      bootstrap: config.bootstrap ?? [],
      maxPeers: config.maxPeers ?? 50,
      maxFrameBytes: config.maxFrameBytes ?? 1024 * 1024,
      maxSendQueueBytes: config.maxSendQueueBytes ?? 8 * 1024 * 1024,
      dedupWindowMs: config.dedupWindowMs ?? 5 * 60_000,
      dedupMaxEntries: config.dedupMaxEntries ?? 100_000,
      reconnectMinMs: config.reconnectMinMs ?? 1_000,
      reconnectMaxMs: config.reconnectMaxMs ?? 30_000,
      maxReconnectAttempts: config.maxReconnectAttempts ?? 0,
      pingIntervalMs: config.pingIntervalMs ?? 30_000,
      idleTimeoutMs: config.idleTimeoutMs ?? 120_000,
      connectTimeoutMs: config.connectTimeoutMs ?? 10_000,
    }
    this.ledger = new DedupLedger({ windowMs: this.cfg.dedupWindowMs, maxEntries: this.cfg.dedupMaxEntries })
  }

  setHandler(handler: MessageHandler): void {
    this.handler = handler
  }

  get listenPort(): number {
    return this.port
  }

  /**
   * Bind the P2P listener, then dial every bootstrap address in the
   * background. Resolves once listening; unreachable peers never fail it.
   */
  async start(): Promise<void> {
    if (this.server) return
    this.stopped = false
    const server = net.createServer((socket) => this.handleInbound(socket))
    this.port = await this.listen(server)
    this.server = server
    server.on("error", (err) => {
      log.error("p2p server error", { error: err.message })
    })
    log.info("p2p listening", { nodeId: this.nodeId, bind: this.cfg.bind, port: this.port })

    for (const address of this.cfg.bootstrap) {
      const entry = this.remember(address, "bootstrap")
      if (entry) this.dial(entry)
    }
  }

  async stop(): Promise<void> {
    this.stopped = true
    for (const entry of this.addresses.values()) {
      if (entry.timer) {
        clearTimeout(entry.timer)
        entry.timer = null
      }
    }
    for (const socket of this.dialing.values()) {
      socket.destroy()
    }
    this.dialing.clear()
    for (const conn of [...this.connections.values()]) {
      conn.close("node stopping")
    }
    this.connections.clear()
    this.peers.clear()

    const server = this.server
    this.server = null
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()))
      log.info("p2p stopped", { nodeId: this.nodeId })
    }
  }

  /** Send to every ready peer except the excluded connection or node ids and the message's origin. */
  broadcast(message: OutboundMessage, exclude?: ReadonlySet<string>): number {
    let sent = 0
    for (const [peerId, conn] of this.peers) {
      if (exclude && (exclude.has(conn.id) || exclude.has(peerId))) continue
      if (peerId === message.originId) continue
      if (conn.send(message)) sent++
    }
    return sent
  }

  sendTo(peerId: string, message: OutboundMessage): boolean {
    const conn = this.peers.get(peerId)
    if (!conn) return false
    return conn.send(message)
  }

  /**
   * Resolves true when the peer can take more data without nearing the send
   * queue cap, waiting for its socket to drain if needed. False once the peer
   * is gone.
   */
  async whenPeerWritable(peerId: string): Promise<boolean> {
    const conn = this.peers.get(peerId)
    if (!conn || !conn.isReady()) return false
    if (conn.pendingBytes() < this.cfg.maxSendQueueBytes / 2) return true
    return conn.whenWritable()
  }

  /** Create a flooded message from this node, remember it and send it to every peer. */
  originate<K extends FloodKind>(kind: K, payload: PayloadMap[K], exclude?: ReadonlySet<string>): Envelope<K> {
    const message = buildMessage(kind, this.nodeId, payload)
    this.ledger.add(dedupKey(message))
    this.broadcast(message, exclude)
    return message
  }

  readyPeerIds(): string[] {
    const ids: string[] = []
    for (const [peerId, conn] of this.peers) {
      if (conn.isReady()) ids.push(peerId)
    }
    return ids
  }

  /**
   * Add an address to the discovered tier and dial it unless a live or
   * pending connection already reaches it.
   */
  registerPeerAddress(address: PeerAddress): RegisterResult {
    if (this.stopped || this.isSelfAddress(address)) return { isNew: false, dialing: false }
    const key = addressKey(address)
    const existing = this.addresses.get(key)
    const entry = existing ?? this.remember(address, "discovered")
    if (!entry) return { isNew: false, dialing: false }
    if (existing && address.nodeId && !existing.address.nodeId) {
      existing.address.nodeId = address.nodeId
    }
    const isNew = existing === undefined
    if (this.hasLiveConnection(entry.address) || this.dialing.has(key) || this.peers.size >= this.cfg.maxPeers) {
      return { isNew, dialing: false }
    }
    this.dial(entry)
    return { isNew, dialing: true }
  }

  getPeers(): PeerInfo[] {
    const out: PeerInfo[] = []
    for (const [peerId, conn] of this.peers) {
      const addr = conn.dialableAddress()
      out.push({
        nodeId: peerId,
        host: addr?.host ?? conn.remoteHost,
        port: addr?.port ?? null,
        direction: conn.direction,
        connectedAtMs: conn.connectedAtMs,
        lastSeenMs: conn.lastSeenMs,
        latencyMs: conn.latencyMs(),
      })
    }
    return out
  }

  getStats(): NodeStats {
    let bootstrap = 0
    let discovered = 0
    for (const entry of this.addresses.values()) {
      if (entry.tier === "bootstrap") bootstrap++
      else discovered++
    }
    return {
      nodeId: this.nodeId,
      listenPort: this.port,
      peers: this.peers.size,
      connections: this.connections.size,
      bootstrapAddresses: bootstrap,
      discoveredAddresses: discovered,
      dedupEntries: this.ledger.size,
      ...this.counters,
    }
  }

  private async listen(server: net.Server): Promise<number> {
    const attempts = this.cfg.port === 0 ? 1 : Math.max(1, this.cfg.portSearchLimit)
    let lastError: unknown = null
    for (let i = 0; i < attempts; i++) {
      const candidate = this.cfg.port === 0 ? 0 : this.cfg.port + i
      try {
        return await listenOnce(server, candidate, this.cfg.bind)
      } catch (err) {
        lastError = err
        if (!isAddrInUse(err)) break
        log.warn("p2p port in use", { port: candidate })
      }
    }
    throw lastError instanceof Error ? lastError : new Error(`cannot listen on port ${this.cfg.port}`)
  }

  private handleInbound(socket: net.Socket): void {
    if (this.stopped) {
      socket.destroy()
      return
    }
    if (this.connections.size >= this.cfg.maxPeers) {
      log.warn("connection limit reached, rejecting inbound", { current: this.connections.size })
      socket.destroy()
      return
    }
    this.attach(socket, "inbound")
  }

  private attach(socket: net.Socket, direction: ConnectionDirection, dialAddress?: PeerAddress): PeerConnection {
    const conn = new PeerConnection({
      socket,
      direction,
      dialAddress,
      localNodeId: this.nodeId,
      localListenPort: this.port,
      maxFrameBytes: this.cfg.maxFrameBytes,
      maxSendQueueBytes: this.cfg.maxSendQueueBytes,
      pingIntervalMs: this.cfg.pingIntervalMs,
      idleTimeoutMs: this.cfg.idleTimeoutMs,
      onReady: (c) => this.onPeerReady(c),
      onMessage: (c, message, receivedAtMs) => this.onPeerMessage(c, message, receivedAtMs),
      onClose: (c, reason) => this.onPeerClosed(c, reason),
    })
    this.connections.set(conn.id, conn)
    conn.start()
    return conn
  }

  private remember(address: PeerAddress, tier: AddressTier): KnownAddress | null {
    if (this.isSelfAddress(address)) return null
    const key = addressKey(address)
    const existing = this.addresses.get(key)
    if (existing) {
      if (tier === "bootstrap") existing.tier = "bootstrap"
      return existing
    }
    if (tier === "discovered" && this.addresses.size >= MAX_KNOWN_ADDRESSES) {
      this.evictDiscovered()
    }
    const entry: KnownAddress = { address: { ...address }, tier, attempts: 0, timer: null }
    this.addresses.set(key, entry)
    return entry
  }

  private evictDiscovered(): void {
    for (const [key, entry] of this.addresses) {
      if (entry.tier === "discovered" && !this.hasLiveConnection(entry.address)) {
        this.addresses.delete(key)
        return
      }
    }
  }

  private dial(entry: KnownAddress): void {
    const { host, port } = entry.address
    const key = addressKey(entry.address)
    if (this.stopped || this.dialing.has(key) || this.selfAddresses.has(key)) return
    if (this.hasLiveConnection(entry.address)) return

    log.debug("dialing peer", { host, port, tier: entry.tier, attempt: entry.attempts })
    const socket = net.createConnection({ host, port })
    this.dialing.set(key, socket)
    socket.setTimeout(this.cfg.connectTimeoutMs)

    const onTimeout = () => socket.destroy(new Error("connect timeout"))
    const onError = (err: Error) => {
      if (this.dialing.get(key) === socket) this.dialing.delete(key)
      const failure = new PeerUnreachableError(host, port, err.message)
      if (entry.tier === "bootstrap") {
        log.warn("bootstrap peer unreachable", { host, port, error: failure.message })
      } else {
        log.debug("peer unreachable", { host, port, error: failure.message })
      }
      socket.destroy()
      this.scheduleReconnect(entry)
    }

    socket.on("timeout", onTimeout)
    socket.on("error", onError)
    socket.once("connect", () => {
      socket.off("timeout", onTimeout)
      socket.off("error", onError)
      if (this.dialing.get(key) === socket) this.dialing.delete(key)
      if (this.stopped) {
        socket.destroy()
        return
      }
      log.info("connected to peer", { host, port, tier: entry.tier })
      this.attach(socket, "outbound", entry.address)
    })
  }

  private scheduleReconnect(entry: KnownAddress): void {
    if (this.stopped || entry.tier !== "bootstrap" || entry.timer) return
    if (this.selfAddresses.has(addressKey(entry.address))) return
    const max = this.cfg.maxReconnectAttempts
    if (max > 0 && entry.attempts >= max) {
      log.warn("giving up on bootstrap peer", { host: entry.address.host, port: entry.address.port, attempts: entry.attempts })
      return
    }
    const delay = Math.min(this.cfg.reconnectMinMs * 2 ** entry.attempts, this.cfg.reconnectMaxMs)
    entry.attempts++
    entry.timer = setTimeout(() => {
      entry.timer = null
      this.dial(entry)
    }, delay)
  }

  private onPeerReady(conn: PeerConnection): void {
    const remoteId = conn.remoteNodeId
    if (remoteId === null) {
      conn.close("handshake without node id")
      return
    }

    if (remoteId === this.nodeId) {
      const dialed = conn.dialAddress
      if (dialed) this.selfAddresses.add(addressKey(dialed))
      conn.close("self connection")
      return
    }

    const existing = this.peers.get(remoteId)
    if (existing && existing !== conn && !existing.isClosed()) {
      if (!preferNewConnection(conn, existing)) {
        conn.close("duplicate connection")
        return
      }
      this.peers.set(remoteId, conn)
      existing.close("duplicate connection")
    } else {
      if (this.peers.size >= this.cfg.maxPeers) {
        conn.close("too many peers")
        return
      }
      this.peers.set(remoteId, conn)
    }

    const dialable = conn.dialableAddress()
    if (dialable && !this.isSelfAddress(dialable)) {
      const entry = this.remember(dialable, "discovered")
      if (entry) {
        entry.attempts = 0
        entry.address.nodeId = remoteId
      }
      this.originate(
        "announce-peer",
        { host: dialable.host, port: dialable.port, nodeId: remoteId },
        new Set([conn.id]),
      )
    }

    // tell the newcomer about everyone else
    for (const [peerId, other] of this.peers) {
      if (other === conn) continue
      const addr = other.dialableAddress()
      if (!addr) continue
      const announce = buildMessage("announce-peer", this.nodeId, { host: addr.host, port: addr.port, nodeId: peerId })
      this.ledger.add(dedupKey(announce))
      conn.send(announce)
    }

    log.info("peer ready", { peer: remoteId, direction: conn.direction, peers: this.peers.size })

    const handler = this.handler
    if (handler) {
      handler.onPeerReady(remoteId).catch((err) => {
        log.warn("peer sync failed", { peer: remoteId, error: errorMessage(err) })
      })
    }
  }

  private async onPeerMessage(conn: PeerConnection, message: GossipMessage, receivedAtMs: number): Promise<void> {
    const handler = this.handler
    if (!handler) {
      log.warn("no message handler, message dropped", { kind: message.kind })
      return
    }
    this.counters.messagesReceived++
    const context: DispatchContext = {
      connectionId: conn.id,
      peerId: conn.remoteNodeId ?? conn.id,
      receivedAtMs,
    }

    if (!isFloodKind(message.kind)) {
      await handler.dispatch(message, context)
      return
    }

    if (message.originId === this.nodeId) {
      this.counters.ownMessagesDropped++
      return
    }
    const key = dedupKey(message)
    if (!this.ledger.markIfNew(key)) {
      this.counters.duplicatesDropped++
      return
    }

    let outcome: DispatchOutcome
    try {
      outcome = await handler.dispatch(message, context)
    } catch (err) {
      // forget the key so a later copy of this message can still apply
      this.ledger.delete(key)
      this.counters.dispatchErrors++
      if (err instanceof StoreWriteError) {
        log.warn("store write failed for gossip", { kind: message.kind, origin: message.originId, error: err.message })
      } else {
        log.error("dispatch failed", { kind: message.kind, origin: message.originId, error: errorMessage(err) })
      }
      return
    }

    if (outcome.rebroadcast) {
      this.broadcast(message, new Set([conn.id]))
      this.counters.messagesRebroadcast++
    }
  }

  private onPeerClosed(conn: PeerConnection, reason: string): void {
    this.connections.delete(conn.id)
    const remoteId = conn.remoteNodeId
    if (remoteId !== null && this.peers.get(remoteId) === conn) {
      this.peers.delete(remoteId)
    }
    if (this.stopped || reason === "self connection" || reason === "duplicate connection") return

    const addr = conn.dialableAddress()
    if (!addr) return
    const entry = this.addresses.get(addressKey(addr))
    if (entry && entry.tier === "bootstrap" && !this.hasLiveConnection(entry.address)) {
      this.scheduleReconnect(entry)
    }
  }

  private hasLiveConnection(address: PeerAddress): boolean {
    if (address.nodeId && this.peers.has(address.nodeId)) return true
    const key = addressKey(address)
    for (const conn of this.connections.values()) {
      if (conn.isClosed()) continue
      const dialed = conn.dialAddress
      if (dialed && addressKey(dialed) === key) return true
      const dialable = conn.dialableAddress()
      if (dialable && addressKey(dialable) === key) return true
    }
    return false
  }

  private isSelfAddress(address: PeerAddress): boolean {
    if (address.nodeId === this.nodeId) return true
    if (this.selfAddresses.has(addressKey(address))) return true
    if (this.port === 0 || address.port !== this.port) return false
    return LOCAL_HOSTS.has(address.host) || address.host === this.cfg.bind
  }
}
