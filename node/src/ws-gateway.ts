/**
 * WebSocket gateway
 *
 * JSON-RPC 2.0 over WebSocket with the same method table as the HTTP
 * gateway. A bare `{ "user_id": ... }` frame is answered as a spam_check and
 * gets the short `{ user_id, is_spammer, note }` reply older clients expect.
 */

import { WebSocketServer, WebSocket } from "ws"
import type { RawData } from "ws"
import type { IncomingMessage } from "node:http"
import crypto from "node:crypto"
import { parseJsonText, isJsonObject } from "./message-codec.ts"
import type { JsonValue } from "./message-codec.ts"
import { RateLimiter } from "./rate-limiter.ts"
import {
  RPC_PARSE_ERROR,
  RPC_RATE_LIMITED,
  createGatewayMethods,
  handleRpcRequest,
} from "./gateway-methods.ts"
import type { GatewayContext, GatewayMethod } from "./gateway-methods.ts"
import { DecodeError, errorMessage } from "./errors.ts"
import { createLogger } from "./logger.ts"

const log = createLogger("ws-gateway")

export const WS_MAX_PAYLOAD = 64 * 1024
const HEARTBEAT_INTERVAL_MS = 30_000
const MAX_CLIENTS = 100
const MAX_MESSAGES_PER_MINUTE = 120

export interface WsGatewayConfig {
  bind: string
  port: number
  maxMessagesPerMinute?: number
  heartbeatIntervalMs?: number
}

interface ClientState {
  id: string
  ip: string
  alive: boolean
}

export class WsGateway {
  private readonly config: WsGatewayConfig
  private readonly methods: Record<string, GatewayMethod>
  private readonly rateLimiter: RateLimiter
  private wss: WebSocketServer | null = null
  private readonly clients = new Map<WebSocket, ClientState>()
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null
  private boundPort = 0

  constructor(config: WsGatewayConfig, ctx: GatewayContext) {
    this.config = config
    this.methods = createGatewayMethods(ctx)
    this.rateLimiter = new RateLimiter({
      windowMs: 60_000,
      maxRequests: config.maxMessagesPerMinute ?? MAX_MESSAGES_PER_MINUTE,
    })
  }

  get port(): number {
    return this.boundPort
  }

  async start(): Promise<void> {
    if (this.wss) return
    const wss = new WebSocketServer({
      port: this.config.port,
      host: this.config.bind,
      maxPayload: WS_MAX_PAYLOAD,
    })
    await new Promise<void>((resolve, reject) => {
      wss.once("error", reject)
      wss.once("listening", () => {
        wss.off("error", reject)
        resolve()
      })
    })
    const addr = wss.address()
    this.boundPort = typeof addr === "object" && addr !== null ? addr.port : this.config.port
    this.wss = wss

    wss.on("connection", (ws: WebSocket, req: IncomingMessage) => this.onConnection(ws, req))
    wss.on("error", (err) => {
      log.error("ws server error", { error: err.message })
    })

    this.heartbeatTimer = setInterval(() => this.heartbeat(), this.config.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS)
    this.heartbeatTimer.unref()
    log.info("ws gateway listening", { bind: this.config.bind, port: this.boundPort })
  }

  async stop(): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer)
      this.heartbeatTimer = null
    }
    for (const ws of this.clients.keys()) {
      ws.terminate()
    }
    this.clients.clear()
    const wss = this.wss
    this.wss = null
    if (wss) {
      await new Promise<void>((resolve) => wss.close(() => resolve()))
    }
  }

  getClientCount(): number {
    return this.clients.size
  }

  private onConnection(ws: WebSocket, req: IncomingMessage): void {
    if (this.clients.size >= MAX_CLIENTS) {
      log.warn("max clients reached, rejecting connection", { current: this.clients.size })
      ws.close(1013, "max connections reached")
      return
    }
    const rawIp = req.socket.remoteAddress ?? "unknown"
    const state: ClientState = {
      id: crypto.randomUUID(),
      ip: rawIp.startsWith("::ffff:") ? rawIp.slice(7) : rawIp,
      alive: true,
    }
    this.clients.set(ws, state)
    log.debug("client connected", { client: state.id, ip: state.ip, clients: this.clients.size })

    ws.on("pong", () => {
      state.alive = true
    })

    ws.on("message", (data: RawData) => {
      if (!this.rateLimiter.allow(state.id)) {
        this.send(ws, { jsonrpc: "2.0", id: null, error: { code: RPC_RATE_LIMITED, message: "rate limit exceeded" } })
        return
      }
      this.handleMessage(ws, rawDataToString(data)).catch((err) => {
        log.error("message handler error", { error: errorMessage(err) })
      })
    })

    ws.on("close", () => this.cleanupClient(ws))
    ws.on("error", (err: Error) => {
      log.warn("client error", { client: state.id, error: err.message })
      this.cleanupClient(ws)
    })
  }

  private async handleMessage(ws: WebSocket, raw: string): Promise<void> {
    let payload: JsonValue
    try {
      payload = parseJsonText(raw)
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err
      this.send(ws, { jsonrpc: "2.0", id: null, error: { code: RPC_PARSE_ERROR, message: "parse error" } })
      return
    }

    if (isJsonObject(payload) && payload.method === undefined && payload.user_id !== undefined) {
      await this.handleBareCheck(ws, payload.user_id)
      return
    }

    const response = Array.isArray(payload)
      ? await Promise.all(payload.map((item) => handleRpcRequest(this.methods, item)))
      : await handleRpcRequest(this.methods, payload)
    this.send(ws, response)
  }

  private async handleBareCheck(ws: WebSocket, userId: JsonValue): Promise<void> {
    const response = await handleRpcRequest(this.methods, { jsonrpc: "2.0", id: null, method: "spam_check", params: { identifier: userId } })
    if ("error" in response) {
      this.send(ws, { user_id: userId, error: response.error.message })
      return
    }
    const result = response.result
    const record = isJsonObject(result) && isJsonObject(result.record) ? result.record : null
    this.send(ws, {
      user_id: userId,
      is_spammer: record !== null,
      note: record !== null && typeof record.note === "string" ? record.note : null,
    })
  }

  private heartbeat(): void {
    for (const [ws, client] of this.clients) {
      if (!client.alive) {
        log.info("terminating unresponsive client", { client: client.id, ip: client.ip })
        ws.terminate()
        this.cleanupClient(ws)
        continue
      }
      client.alive = false
      ws.ping()
    }
  }

  private cleanupClient(ws: WebSocket): void {
    const state = this.clients.get(ws)
    if (!state) return
    this.clients.delete(ws)
    this.rateLimiter.forget(state.id)
  }

  private send(ws: WebSocket, data: JsonValue): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(data))
    }
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8")
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8")
  return data.toString("utf8")
}
