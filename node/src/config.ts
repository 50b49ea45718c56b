import { readFile, mkdir } from "node:fs/promises"
import { join } from "node:path"
import { homedir } from "node:os"
import { z } from "zod"
import { ConfigError } from "./errors.ts"
import type { NodeManagerConfig } from "./node-manager.ts"
import type { PeerAddress } from "./peer-connection.ts"

/**
 * Parse "host:port" (or "[v6]:port"). Returns null for anything else.
 */
export function parsePeerAddress(input: string): PeerAddress | null {
  const trimmed = input.trim()
  let host: string
  let portText: string
  if (trimmed.startsWith("[")) {
    const end = trimmed.indexOf("]")
    if (end < 0 || trimmed.charAt(end + 1) !== ":") return null
    host = trimmed.slice(1, end)
    portText = trimmed.slice(end + 2)
  } else {
    const idx = trimmed.lastIndexOf(":")
    if (idx <= 0) return null
    host = trimmed.slice(0, idx)
    portText = trimmed.slice(idx + 1)
    if (host.includes(":")) return null
  }
  if (host.length === 0 || /\s/.test(host)) return null
  if (!/^\d{1,5}$/.test(portText)) return null
  const port = Number(portText)
  if (port < 1 || port > 65535) return null
  return { host, port }
}

const PortSchema = z.number().int().min(0).max(65535)

const PeerAddressSchema = z.union([
  z.string().transform((value, ctx) => {
    const parsed = parsePeerAddress(value)
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid peer address "${value}", expected host:port` })
      return z.NEVER
    }
    return parsed
  }),
  z.object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
  }),
])

export const NodeConfigSchema = z
  .object({
    dataDir: z.string().min(1).default(() => defaultDataDir()),
    bind: z.string().min(1).default("127.0.0.1").describe("P2P listen address"),
    p2pPort: PortSchema.default(9828),
    gatewayBind: z.string().min(1).default("127.0.0.1").describe("WebSocket and HTTP gateway address"),
    wsPort: PortSchema.default(9000),
    httpPort: PortSchema.default(8081),
    bootstrap: z.array(PeerAddressSchema).default([]),
    maxPeers: z.number().int().min(1).default(50),
    maxFrameBytes: z.number().int().min(1024).default(1024 * 1024),
    maxSendQueueBytes: z.number().int().min(64 * 1024).default(8 * 1024 * 1024),
    dedupWindowMs: z.number().int().min(1000).default(5 * 60_000),
    dedupMaxEntries: z.number().int().min(1).default(100_000),
    queryTimeoutMs: z.number().int().min(10).default(5_000),
    reconnectMinMs: z.number().int().min(10).default(1_000),
    reconnectMaxMs: z.number().int().min(10).default(30_000),
    maxReconnectAttempts: z.number().int().min(0).default(0).describe("0 = retry forever"),
    pingIntervalMs: z.number().int().min(100).default(30_000),
    idleTimeoutMs: z.number().int().min(100).default(120_000),
    portSearchLimit: z.number().int().min(1).max(1000).default(1),
    rateLimitWindowMs: z.number().int().min(100).default(60_000),
    rateLimitMaxRequests: z.number().int().min(1).default(200),
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.reconnectMaxMs < cfg.reconnectMinMs) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["reconnectMaxMs"], message: "must be >= reconnectMinMs" })
    }
    if (cfg.idleTimeoutMs <= cfg.pingIntervalMs) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["idleTimeoutMs"], message: "must be greater than pingIntervalMs" })
    }
  })

export type NodeConfig = z.output<typeof NodeConfigSchema>

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".")
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

/**
 * Validate a node config object. Returns an array of error messages (empty = valid).
 */
export function validateConfig(input: unknown): string[] {
  const result = NodeConfigSchema.safeParse(input)
  return result.success ? [] : formatIssues(result.error)
}

type Env = Record<string, string | undefined>

function envNumber(env: Env, name: string): number | undefined {
  const raw = env[name]
  if (raw === undefined || raw.trim() === "") return undefined
  // NaN is left for the schema to reject with the field name
  return Number(raw)
}

function envOverrides(env: Env): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  const p2pPort = envNumber(env, "SPAMNET_P2P_PORT")
  if (p2pPort !== undefined) out.p2pPort = p2pPort
  const wsPort = envNumber(env, "SPAMNET_WS_PORT")
  if (wsPort !== undefined) out.wsPort = wsPort
  const httpPort = envNumber(env, "SPAMNET_HTTP_PORT")
  if (httpPort !== undefined) out.httpPort = httpPort
  if (env.SPAMNET_BOOTSTRAP !== undefined) {
    out.bootstrap = env.SPAMNET_BOOTSTRAP.split(",").map((s) => s.trim()).filter((s) => s.length > 0)
  }
  if (env.SPAMNET_LOG_LEVEL) out.logLevel = env.SPAMNET_LOG_LEVEL.trim().toLowerCase()
  return out
}

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let raw: string
  try {
    raw = await readFile(path, "utf-8")
  } catch (err) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") return {}
    throw err
  }
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new ConfigError([`not valid JSON (${String(err)})`], path)
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(["top level must be an object"], path)
  }
  return { ...parsed }
}

/**
 * Defaults, then the JSON config file, then environment variables.
 * Throws ConfigError listing every problem when the result is invalid.
 */
export async function loadNodeConfig(env: Env = process.env): Promise<NodeConfig> {
  const dataDir = resolveDataDir(env)
  await mkdir(dataDir, { recursive: true })
  const configPath = env.SPAMNET_CONFIG || join(dataDir, "node-config.json")

  const fromFile = await readConfigFile(configPath)
  const merged = { ...fromFile, dataDir, ...envOverrides(env) }

  const result = NodeConfigSchema.safeParse(merged)
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), configPath)
  }
  return result.data
}

export function toNodeManagerConfig(cfg: NodeConfig): NodeManagerConfig {
  return {
    bind: cfg.bind,
    port: cfg.p2pPort,
    portSearchLimit: cfg.portSearchLimit,
    bootstrap: cfg.bootstrap,
    maxPeers: cfg.maxPeers,
    maxFrameBytes: cfg.maxFrameBytes,
    maxSendQueueBytes: cfg.maxSendQueueBytes,
    dedupWindowMs: cfg.dedupWindowMs,
    dedupMaxEntries: cfg.dedupMaxEntries,
    reconnectMinMs: cfg.reconnectMinMs,
    reconnectMaxMs: cfg.reconnectMaxMs,
    maxReconnectAttempts: cfg.maxReconnectAttempts,
    pingIntervalMs: cfg.pingIntervalMs,
    idleTimeoutMs: cfg.idleTimeoutMs,
  }
}

function defaultDataDir(): string {
  return join(homedir(), ".spamnet")
}

function resolveDataDir(env: Env): string {
  const raw = env.SPAMNET_DATA_DIR || defaultDataDir()
  if (raw.startsWith("~/")) {
    return join(homedir(), raw.slice(2))
  }
  return raw
}
