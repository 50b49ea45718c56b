/**
 * Wires a full node together: store, node manager, dispatcher and the two
 * local gateways. Startup order is store → P2P → gateways; shutdown runs the
 * other way so the store closes last.
 */

import { mkdir } from "node:fs/promises"
import { toNodeManagerConfig } from "./config.ts"
import type { NodeConfig } from "./config.ts"
import { Dispatcher } from "./dispatcher.ts"
import { HttpGateway } from "./http-gateway.ts"
import { NodeManager } from "./node-manager.ts"
import { WsGateway } from "./ws-gateway.ts"
import { LevelDatabase } from "./storage/db.ts"
import type { IDatabase } from "./storage/db.ts"
import { SpammerStore } from "./storage/spammer-store.ts"
import { setLogLevel, createLogger } from "./logger.ts"

const log = createLogger("node")

export const STORE_NAMESPACE = "spammers"

export interface RunningNode {
  readonly nodeId: string
  readonly manager: NodeManager
  readonly dispatcher: Dispatcher
  readonly store: SpammerStore
  readonly http: HttpGateway
  readonly ws: WsGateway
  stop(): Promise<void>
}

export interface StartNodeOptions {
  /** Backing database; defaults to LevelDB under `<dataDir>/leveldb-spammers`. */
  db?: IDatabase
  nodeId?: string
}

export async function startNode(cfg: NodeConfig, opts: StartNodeOptions = {}): Promise<RunningNode> {
  setLogLevel(cfg.logLevel)

  if (!opts.db) await mkdir(cfg.dataDir, { recursive: true })
  const store = new SpammerStore(opts.db ?? new LevelDatabase(cfg.dataDir, STORE_NAMESPACE))
  await store.open()

  const manager = new NodeManager({ ...toNodeManagerConfig(cfg), nodeId: opts.nodeId })
  const dispatcher = new Dispatcher({ store, transport: manager, queryTimeoutMs: cfg.queryTimeoutMs })
  manager.setHandler(dispatcher)

  const gatewayCtx = { dispatcher, store, network: manager }
  const http = new HttpGateway(
    {
      bind: cfg.gatewayBind,
      port: cfg.httpPort,
      rateLimit: { windowMs: cfg.rateLimitWindowMs, maxRequests: cfg.rateLimitMaxRequests },
    },
    gatewayCtx,
  )
  const ws = new WsGateway({ bind: cfg.gatewayBind, port: cfg.wsPort }, gatewayCtx)

  try {
    await manager.start()
    await http.start()
    await ws.start()
  } catch (err) {
    await ws.stop()
    await http.stop()
    await manager.stop()
    await store.close()
    throw err
  }

  log.info("node started", {
    nodeId: manager.nodeId,
    p2pPort: manager.listenPort,
    httpPort: http.port,
    wsPort: ws.port,
    records: await store.count(),
  })

  let stopping: Promise<void> | null = null
  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      await ws.stop()
      await http.stop()
      dispatcher.close()
      await manager.stop()
      await store.close()
      log.info("node stopped", { nodeId: manager.nodeId })
    })()
    return stopping
  }

  return { nodeId: manager.nodeId, manager, dispatcher, store, http, ws, stop }
}

/** Start the node and keep it running until SIGINT or SIGTERM. */
export async function runUntilSignal(cfg: NodeConfig): Promise<void> {
  const node = await startNode(cfg)
  await new Promise<void>((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      log.info("shutting down...", { signal })
      process.off("SIGINT", onSignal)
      process.off("SIGTERM", onSignal)
      resolve()
    }
    process.on("SIGINT", onSignal)
    process.on("SIGTERM", onSignal)
  })
  await node.stop()
}
