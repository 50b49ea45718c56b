import type { Command } from "commander"
import { parseJsonText, isJsonObject } from "../message-codec.ts"
import type { JsonValue } from "../message-codec.ts"
import { errorMessage } from "../errors.ts"

export interface CliIo {
  out(line: string): void
  err(line: string): void
}

export interface GatewayClient {
  check(identifier: string, local: boolean): Promise<JsonValue>
  report(identifier: string, note: string): Promise<JsonValue>
  peers(): Promise<JsonValue>
}

export interface CliDeps {
  io: CliIo
  /** Builds a client for the gateway URL given on the command line, or the configured one. */
  resolveClient(gatewayUrl: string | undefined): Promise<GatewayClient>
  startNode(): Promise<void>
}

export class GatewayRequestError extends Error {
  readonly status: number

  constructor(status: number, message: string) {
    super(message)
    this.name = "GatewayRequestError"
    this.status = status
  }
}

async function readJson(res: Response): Promise<JsonValue> {
  const body = parseJsonText(await res.text())
  if (!res.ok && res.status !== 404) {
    const message = isJsonObject(body) && typeof body.error === "string" ? body.error : `HTTP ${res.status}`
    throw new GatewayRequestError(res.status, message)
  }
  return body
}

export function createHttpGatewayClient(baseUrl: string): GatewayClient {
  const base = baseUrl.replace(/\/+$/, "")
  return {
    async check(identifier, local) {
      const query = new URLSearchParams({ identifier })
      if (local) query.set("local", "1")
      return readJson(await fetch(`${base}/check?${query.toString()}`))
    },
    async report(identifier, note) {
      const res = await fetch(`${base}/report`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ identifier, note }),
      })
      return readJson(res)
    },
    async peers() {
      return readJson(await fetch(`${base}/peers`))
    },
  }
}

function padRow(...cols: string[]): string {
  const widths = [38, 24, 10, 12]
  return cols.map((c, i) => c.padEnd(widths[i] ?? 12)).join(" ")
}

function field(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return "-"
  return typeof value === "string" ? value : JSON.stringify(value)
}

export function registerSpamnetCommands(program: Command, deps: CliDeps): void {
  const { io } = deps
  program.option("-g, --gateway <url>", "HTTP gateway URL (default from node config)")

  const gatewayUrl = (): string | undefined => {
    const value: unknown = program.opts().gateway
    return typeof value === "string" ? value : undefined
  }

  // --- spamnet start ---
  program
    .command("start")
    .description("Run a node until interrupted")
    .action(async () => {
      await deps.startNode()
    })

  // --- spamnet check <identifier> ---
  program
    .command("check <identifier>")
    .description("Ask whether an identifier is a known spammer")
    .option("--local", "Only consult this node's store")
    .option("--json", "Output JSON")
    .action(async (identifier: string, opts: { local?: boolean; json?: boolean }) => {
      const client = await deps.resolveClient(gatewayUrl())
      const result = await client.check(identifier, opts.local === true)
      if (opts.json) {
        io.out(JSON.stringify(result))
        return
      }
      const record = isJsonObject(result) && isJsonObject(result.record) ? result.record : null
      if (!record) {
        io.out(`${identifier}: not a known spammer`)
        return
      }
      io.out(`${identifier}: spammer (${field(record.note)})`)
    })

  // --- spamnet report <identifier> <note> ---
  program
    .command("report <identifier> <note>")
    .description("Report an identifier as a spammer")
    .action(async (identifier: string, note: string) => {
      const client = await deps.resolveClient(gatewayUrl())
      const result = await client.report(identifier, note)
      const changed = isJsonObject(result) && result.changed === true
      io.out(changed ? `reported ${identifier}` : `${identifier} already reported with a newer entry`)
    })

  // --- spamnet peers ---
  program
    .command("peers")
    .description("List live peers of the node")
    .option("--json", "Output JSON")
    .action(async (opts: { json?: boolean }) => {
      const client = await deps.resolveClient(gatewayUrl())
      const peers = await client.peers()
      if (opts.json) {
        io.out(JSON.stringify(peers))
        return
      }
      if (!Array.isArray(peers) || peers.length === 0) {
        io.out("no peers connected")
        return
      }
      const header = padRow("NODE ID", "ADDRESS", "DIRECTION", "LATENCY")
      io.out(header)
      io.out("-".repeat(header.length))
      for (const peer of peers) {
        if (!isJsonObject(peer)) continue
        const address = peer.port === null ? field(peer.host) : `${field(peer.host)}:${field(peer.port)}`
        const latency = typeof peer.latencyMs === "number" ? `${peer.latencyMs}ms` : "-"
        io.out(padRow(field(peer.nodeId), address, field(peer.direction), latency))
      }
    })
}

/** Parse argv and report failures on stderr; returns the exit code. */
export async function runCli(program: Command, argv: string[], io: CliIo): Promise<number> {
  try {
    await program.parseAsync(argv)
    return 0
  } catch (err) {
    io.err(`error: ${errorMessage(err)}`)
    return 1
  }
}
