/**
 * Local gateway methods
 *
 * JSON-RPC method table shared by the WebSocket and HTTP gateways. Params are
 * either an object (`{ identifier }`) or positional (`["123"]`).
 */

import { z } from "zod"
import { IdentifierSchema } from "./messages.ts"
import type { JsonValue } from "./message-codec.ts"
import type { Dispatcher } from "./dispatcher.ts"
import type { NodeStats, PeerInfo } from "./node-manager.ts"
import type { SpammerStore } from "./storage/spammer-store.ts"
import { SpamnetError } from "./errors.ts"

export const RPC_PARSE_ERROR = -32700
export const RPC_INVALID_REQUEST = -32600
export const RPC_METHOD_NOT_FOUND = -32601
export const RPC_INVALID_PARAMS = -32602
export const RPC_INTERNAL_ERROR = -32603
export const RPC_RATE_LIMITED = -32005

export class GatewayError extends SpamnetError {
  readonly rpcCode: number

  constructor(message: string, rpcCode: number) {
    super(message, "GATEWAY_ERROR", { rpcCode })
    this.name = "GatewayError"
    this.rpcCode = rpcCode
  }
}

export interface GatewayContext {
  dispatcher: Dispatcher
  store: SpammerStore
  network: {
    getPeers(): PeerInfo[]
    getStats(): NodeStats
  }
  /** Default for spam_check when the caller does not say. */
  queryNetworkByDefault?: boolean
}

export type GatewayMethod = (params: JsonValue | undefined) => Promise<JsonValue>

const CheckParamsSchema = z.object({
  identifier: IdentifierSchema,
  local: z.boolean().optional(),
})

const ReportParamsSchema = z.object({
  identifier: IdentifierSchema,
  note: z.string().optional(),
  timestamp: z.number().optional(),
})

function parseParams<T extends z.ZodTypeAny>(schema: T, params: JsonValue | undefined, positional: string[]): z.output<T> {
  let input: JsonValue | undefined = params
  if (Array.isArray(params)) {
    const obj: { [key: string]: JsonValue } = {}
    positional.forEach((name, i) => {
      const value = params[i]
      if (value !== undefined) obj[name] = value
    })
    input = obj
  }
  const result = schema.safeParse(input ?? {})
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : ""
    throw new GatewayError(`invalid params: ${where}${issue?.message ?? "unknown"}`, RPC_INVALID_PARAMS)
  }
  return result.data
}

export function createGatewayMethods(ctx: GatewayContext): Record<string, GatewayMethod> {
  return {
    async spam_check(params): Promise<JsonValue> {
      const { identifier, local } = parseParams(CheckParamsSchema, params, ["identifier", "local"])
      const network = local === undefined ? ctx.queryNetworkByDefault ?? true : !local
      const result = await ctx.dispatcher.query(identifier, { network })
      if (!result.found) {
        return { identifier, spammer: false, record: null }
      }
      return {
        identifier,
        spammer: true,
        record: result.record,
        source: result.source,
      }
    },

    async spam_report(params) {
      const input = parseParams(ReportParamsSchema, params, ["identifier", "note", "timestamp"])
      const result = await ctx.dispatcher.submitReport(input)
      if (!result.ok) {
        throw new GatewayError(result.error, RPC_INVALID_PARAMS)
      }
      return { changed: result.changed, record: result.record }
    },

    async spam_peers() {
      return ctx.network.getPeers()
    },

    async spam_stats() {
      return {
        ...ctx.network.getStats(),
        records: await ctx.store.count(),
        pendingQueries: ctx.dispatcher.pendingQueries,
      }
    },
  }
}

export type RpcId = string | number | null

export type RpcResponse =
  | { jsonrpc: "2.0"; id: RpcId; result: JsonValue }
  | { jsonrpc: "2.0"; id: RpcId; error: { code: number; message: string } }

function rpcId(value: JsonValue | undefined): RpcId {
  return typeof value === "string" || typeof value === "number" ? value : null
}

/** Run one decoded JSON-RPC request against the method table. */
export async function handleRpcRequest(methods: Record<string, GatewayMethod>, request: JsonValue): Promise<RpcResponse> {
  if (typeof request !== "object" || request === null || Array.isArray(request) || typeof request.method !== "string") {
    const id = typeof request === "object" && request !== null && !Array.isArray(request) ? rpcId(request.id) : null
    return { jsonrpc: "2.0", id, error: { code: RPC_INVALID_REQUEST, message: "invalid request" } }
  }
  const id = rpcId(request.id)
  const method = Object.hasOwn(methods, request.method) ? methods[request.method] : undefined
  if (!method) {
    return { jsonrpc: "2.0", id, error: { code: RPC_METHOD_NOT_FOUND, message: `method not found: ${request.method}` } }
  }
  try {
    const result = await method(request.params)
    return { jsonrpc: "2.0", id, result }
  } catch (err) {
    if (err instanceof GatewayError) {
      return { jsonrpc: "2.0", id, error: { code: err.rpcCode, message: err.message } }
    }
    return { jsonrpc: "2.0", id, error: { code: RPC_INTERNAL_ERROR, message: String(err) } }
  }
}
