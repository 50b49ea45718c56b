/**
 * HTTP gateway
 *
 * Local REST surface over the gateway methods plus a JSON-RPC endpoint.
 *
 *   GET    /health
 *   GET    /check?identifier=<id>[&local=1]
 *   POST   /report              { identifier, note?, timestamp? }
 *   GET    /peers
 *   GET    /stats
 *   DELETE /spammers/<id>       manual purge
 *   POST   /rpc                 JSON-RPC 2.0, single or batch
 */

import http from "node:http"
import { parseJsonText } from "./message-codec.ts"
import { IdentifierSchema } from "./messages.ts"
import type { JsonValue } from "./message-codec.ts"
import { RateLimiter } from "./rate-limiter.ts"
import type { RateLimiterOptions } from "./rate-limiter.ts"
import {
  GatewayError,
  RPC_PARSE_ERROR,
  RPC_RATE_LIMITED,
  createGatewayMethods,
  handleRpcRequest,
} from "./gateway-methods.ts"
import type { GatewayContext, GatewayMethod } from "./gateway-methods.ts"
import { DecodeError, StoreWriteError, errorMessage } from "./errors.ts"
import { createLogger } from "./logger.ts"

const log = createLogger("http-gateway")

const MAX_BODY_BYTES = 64 * 1024

export interface HttpGatewayConfig {
  bind: string
  port: number
  rateLimit?: RateLimiterOptions
}

export class HttpGateway {
  private readonly config: HttpGatewayConfig
  private readonly ctx: GatewayContext
  private readonly methods: Record<string, GatewayMethod>
  private readonly rateLimiter: RateLimiter
  private server: http.Server | null = null
  private cleanupTimer: ReturnType<typeof setInterval> | null = null
  private boundPort = 0

  constructor(config: HttpGatewayConfig, ctx: GatewayContext) {
    this.config = config
    this.ctx = ctx
    this.methods = createGatewayMethods(ctx)
    this.rateLimiter = new RateLimiter(config.rateLimit)
  }

  get port(): number {
    return this.boundPort
  }

  async start(): Promise<void> {
    if (this.server) return
    const server = http.createServer((req, res) => {
      this.handle(req, res).catch((err) => {
        log.error("request handler error", { error: errorMessage(err) })
        sendJson(res, 500, { error: "internal error" })
      })
    })
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject)
      server.listen(this.config.port, this.config.bind, () => {
        server.off("error", reject)
        resolve()
      })
    })
    const addr = server.address()
    this.boundPort = typeof addr === "object" && addr !== null ? addr.port : this.config.port
    this.server = server
    this.cleanupTimer = setInterval(() => this.rateLimiter.cleanup(), 300_000)
    this.cleanupTimer.unref()
    log.info("http gateway listening", { bind: this.config.bind, port: this.boundPort })
  }

  async stop(): Promise<void> {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer)
      this.cleanupTimer = null
    }
    const server = this.server
    this.server = null
    if (!server) return
    server.closeAllConnections()
    await new Promise<void>((resolve) => server.close(() => resolve()))
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const rawIp = req.socket.remoteAddress ?? "unknown"
    const clientIp = rawIp.startsWith("::ffff:") ? rawIp.slice(7) : rawIp
    if (!this.rateLimiter.allow(clientIp)) {
      sendJson(res, 429, { error: "rate limit exceeded", code: RPC_RATE_LIMITED })
      return
    }

    const url = new URL(req.url ?? "/", "http://localhost")
    const method = req.method ?? "GET"
    const path = url.pathname

    if (method === "GET" && path === "/health") {
      sendJson(res, 200, { ok: true, nodeId: this.ctx.network.getStats().nodeId })
      return
    }

    if (method === "GET" && path === "/check") {
      const identifier = url.searchParams.get("identifier") ?? url.searchParams.get("user_id")
      if (!identifier) {
        sendJson(res, 400, { error: "identifier is required" })
        return
      }
      const localParam = url.searchParams.get("local")
      const params: JsonValue = localParam === null
        ? { identifier }
        : { identifier, local: localParam === "1" || localParam === "true" }
      await this.callMethod(res, "spam_check", params)
      return
    }

    if (method === "POST" && path === "/report") {
      const body = await this.readJsonBody(req, res)
      if (body === undefined) return
      await this.callMethod(res, "spam_report", body)
      return
    }

    if (method === "GET" && path === "/peers") {
      await this.callMethod(res, "spam_peers", undefined)
      return
    }

    if (method === "GET" && path === "/stats") {
      await this.callMethod(res, "spam_stats", undefined)
      return
    }

    if (method === "DELETE" && path.startsWith("/spammers/")) {
      let raw: string
      try {
        raw = decodeURIComponent(path.slice("/spammers/".length))
      } catch (err) {
        if (!(err instanceof URIError)) throw err
        sendJson(res, 400, { error: "malformed identifier encoding" })
        return
      }
      const parsed = IdentifierSchema.safeParse(raw)
      if (!parsed.success) {
        sendJson(res, 400, { error: "invalid identifier" })
        return
      }
      const identifier = parsed.data
      try {
        const removed = await this.ctx.store.purge(identifier)
        sendJson(res, removed ? 200 : 404, { identifier, removed })
      } catch (err) {
        if (err instanceof StoreWriteError) {
          sendJson(res, 500, { error: err.message })
          return
        }
        throw err
      }
      return
    }

    if (method === "POST" && path === "/rpc") {
      const body = await this.readJsonBody(req, res)
      if (body === undefined) return
      const response = Array.isArray(body)
        ? await Promise.all(body.map((item) => handleRpcRequest(this.methods, item)))
        : await handleRpcRequest(this.methods, body)
      sendJson(res, 200, response)
      return
    }

    sendJson(res, 404, { error: "not found" })
  }

  private async callMethod(res: http.ServerResponse, name: string, params: JsonValue | undefined): Promise<void> {
    const method = this.methods[name]
    try {
      const result = await method(params)
      sendJson(res, 200, result)
    } catch (err) {
      if (err instanceof GatewayError) {
        sendJson(res, 400, { error: err.message, code: err.rpcCode })
        return
      }
      throw err
    }
  }

  /** Reads and decodes the body; on failure answers the request and returns undefined. */
  private async readJsonBody(req: http.IncomingMessage, res: http.ServerResponse): Promise<JsonValue | undefined> {
    const chunks: Buffer[] = []
    let size = 0
    for await (const chunk of req) {
      const buf = Buffer.from(chunk)
      size += buf.byteLength
      if (size > MAX_BODY_BYTES) {
        sendJson(res, 413, { error: "request body too large" })
        req.destroy()
        return undefined
      }
      chunks.push(buf)
    }
    const body = Buffer.concat(chunks).toString("utf8")
    if (body.trim().length === 0) {
      sendJson(res, 400, { error: "empty request body", code: RPC_PARSE_ERROR })
      return undefined
    }
    try {
      return parseJsonText(body)
    } catch (err) {
      if (err instanceof DecodeError) {
        sendJson(res, 400, { error: "invalid JSON body", code: RPC_PARSE_ERROR })
        return undefined
      }
      throw err
    }
  }
}

function sendJson(res: http.ServerResponse, status: number, body: JsonValue): void {
  if (res.headersSent) {
    res.end()
    return
  }
  res.writeHead(status, { "content-type": "application/json" })
  res.end(JSON.stringify(body))
}
