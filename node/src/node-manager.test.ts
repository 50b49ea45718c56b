import { describe, it, afterEach } from "node:test"
import assert from "node:assert/strict"
import net from "node:net"
import { NodeManager } from "./node-manager.ts"
import type { NodeManagerConfig } from "./node-manager.ts"
import { Dispatcher } from "./dispatcher.ts"
import { MemoryDatabase } from "./storage/db.ts"
import type { IDatabase } from "./storage/db.ts"
import { SpammerStore } from "./storage/spammer-store.ts"
import type { PeerAddress } from "./peer-connection.ts"
import { setLogLevel } from "./logger.ts"
import { RawPeer, eventually, waitFor } from "./test-helpers.ts"

setLogLevel("error")

interface TestNode {
  manager: NodeManager
  dispatcher: Dispatcher
  store: SpammerStore
  address: PeerAddress
}

const running: TestNode[] = []
const rawPeers: RawPeer[] = []

afterEach(async () => {
  for (const peer of rawPeers.splice(0)) peer.destroy()
  for (const node of running.splice(0)) {
    node.dispatcher.close()
    await node.manager.stop()
  }
})

async function startTestNode(
  nodeId: string,
  overrides: Partial<NodeManagerConfig> = {},
  db: IDatabase = new MemoryDatabase(),
): Promise<TestNode> {
  const store = new SpammerStore(db)
  const manager = new NodeManager({
    nodeId,
    bind: "127.0.0.1",
    port: 0,
    reconnectMinMs: 50,
    reconnectMaxMs: 200,
    ...overrides,
  })
  const dispatcher = new Dispatcher({ store, transport: manager, queryTimeoutMs: 2_000 })
  manager.setHandler(dispatcher)
  await manager.start()
  const node = { manager, dispatcher, store, address: { host: "127.0.0.1", port: manager.listenPort } }
  running.push(node)
  return node
}

async function rawPeer(node: TestNode, originId: string, listenPort: number): Promise<RawPeer> {
  const peer = await RawPeer.connect(node.address.port)
  rawPeers.push(peer)
  peer.send({ kind: "handshake", originId, payload: { listenPort } })
  return peer
}

/** A loopback port with nothing listening on it. */
async function closedPort(): Promise<number> {
  const server = net.createServer()
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()))
  const address = server.address()
  await new Promise<void>((resolve) => server.close(() => resolve()))
  if (address === null || typeof address === "string") throw new Error("no TCP address")
  return address.port
}

/** Counts connections made to a fixed loopback port for a while. */
async function countDials(port: number, forMs: number): Promise<number> {
  let dials = 0
  const server = net.createServer((socket) => {
    dials++
    socket.destroy()
  })
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject)
    server.listen(port, "127.0.0.1", () => resolve())
  })
  await new Promise((resolve) => setTimeout(resolve, forMs))
  await new Promise<void>((resolve) => server.close(() => resolve()))
  return dials
}

class FlakyDatabase extends MemoryDatabase {
  failWrites = false

  override async put(key: string, value: Uint8Array): Promise<void> {
    if (this.failWrites) throw new Error("disk full")
    await super.put(key, value)
  }
}

const peerIds = (node: TestNode) => node.manager.getPeers().map((p) => p.nodeId).sort()

describe("NodeManager", () => {
  it("listens on an ephemeral port", async () => {
    const node = await startTestNode("node-a")
    assert.ok(node.manager.listenPort > 0)
    assert.equal(node.manager.getStats().peers, 0)
  })

  it("starts even when its bootstrap peer is down", async () => {
    const port = await closedPort()
    const node = await startTestNode("node-a", { bootstrap: [{ host: "127.0.0.1", port }], reconnectMinMs: 5_000, reconnectMaxMs: 5_000 })
    const stats = node.manager.getStats()
    assert.equal(stats.bootstrapAddresses, 1)
    assert.equal(stats.peers, 0)

    const peer = await rawPeer(node, "node-b", 7001)
    await waitFor(() => node.manager.readyPeerIds().length === 1)
    assert.deepEqual(node.manager.readyPeerIds(), ["node-b"])
    assert.equal(peer.closed, false)
  })

  it("links bootstrap peers and floods a report to every node", async () => {
    const a = await startTestNode("node-a")
    const b = await startTestNode("node-b", { bootstrap: [a.address] })
    const c = await startTestNode("node-c", { bootstrap: [b.address] })

    // c learns about a through b's announcement and the mesh closes
    await waitFor(() => peerIds(a).length === 2 && peerIds(b).length === 2 && peerIds(c).length === 2)
    assert.deepEqual(peerIds(a), ["node-b", "node-c"])

    const result = await a.dispatcher.submitReport({ identifier: "user-7", note: "bot", timestamp: 42 })
    assert.equal(result.ok, true)
    const expected = { identifier: "user-7", note: "bot", timestamp: 42, originId: "node-a" }
    for (const node of [b, c]) {
      assert.deepEqual(await eventually(() => node.store.get("user-7")), expected)
    }
  })

  it("sends its records to a peer that joins later", async () => {
    const a = await startTestNode("node-a")
    await a.store.upsert({ identifier: "old-1", note: "x", timestamp: 1, originId: "node-z" })
    const d = await startTestNode("node-d", { bootstrap: [a.address] })
    assert.deepEqual(await eventually(() => d.store.get("old-1")), { identifier: "old-1", note: "x", timestamp: 1, originId: "node-z" })
  })

  it("answers network queries from a direct peer", async () => {
    const a = await startTestNode("node-a")
    const b = await startTestNode("node-b", { bootstrap: [a.address] })
    await waitFor(() => a.manager.readyPeerIds().length === 1 && b.manager.readyPeerIds().length === 1)
    // stored on b only, without flooding
    await b.store.upsert({ identifier: "remote-only", note: "n", timestamp: 5, originId: "node-b" })

    const result = await a.dispatcher.query("remote-only", { network: true })
    assert.deepEqual(result, {
      found: true,
      record: { identifier: "remote-only", note: "n", timestamp: 5, originId: "node-b" },
      source: "network",
      peerId: "node-b",
    })
    assert.deepEqual(await a.store.get("remote-only"), {
      identifier: "remote-only",
      note: "n",
      timestamp: 5,
      originId: "node-b",
    })
  })

  it("forwards a flooded message once and never back to its sender", async () => {
    const node = await startTestNode("node-n")
    const r1 = await rawPeer(node, "raw-1", 7101)
    const r2 = await rawPeer(node, "raw-2", 7102)
    await waitFor(() => node.manager.readyPeerIds().length === 2)

    const report = { kind: "report-spammer", originId: "raw-1", payload: { identifier: "dup", note: "", timestamp: 9 } }
    r1.send(JSON.stringify(report) + JSON.stringify(report))
    await waitFor(() => node.manager.getStats().duplicatesDropped === 1)
    await r2.waitForKind("report-spammer")

    assert.equal(r2.ofKind("report-spammer").length, 1)
    assert.deepEqual(r2.ofKind("report-spammer")[0], report)
    assert.equal(r1.ofKind("report-spammer").length, 0)
    assert.equal(node.manager.getStats().messagesRebroadcast, 1)
  })

  it("drops flooded messages that carry its own origin", async () => {
    const node = await startTestNode("node-n")
    const r1 = await rawPeer(node, "raw-1", 7101)
    await waitFor(() => node.manager.readyPeerIds().length === 1)
    r1.send({ kind: "report-spammer", originId: "node-n", payload: { identifier: "echo", note: "", timestamp: 1 } })
    await waitFor(() => node.manager.getStats().ownMessagesDropped === 1)
    assert.equal(await node.store.get("echo"), null)
  })

  it("announces a new peer to the others", async () => {
    const node = await startTestNode("node-n")
    const r1 = await rawPeer(node, "raw-1", 7101)
    await waitFor(() => node.manager.readyPeerIds().length === 1)
    const r2 = await rawPeer(node, "raw-2", 7102)

    const [toOld] = await r1.waitForKind("announce-peer")
    assert.deepEqual(toOld, {
      kind: "announce-peer",
      originId: "node-n",
      payload: { host: "127.0.0.1", port: 7102, nodeId: "raw-2" },
    })
    const [toNew] = await r2.waitForKind("announce-peer")
    assert.deepEqual(toNew, {
      kind: "announce-peer",
      originId: "node-n",
      payload: { host: "127.0.0.1", port: 7101, nodeId: "raw-1" },
    })
  })

  it("removes a peer whose connection closes", async () => {
    const node = await startTestNode("node-n")
    const r1 = await rawPeer(node, "raw-1", 7101)
    await waitFor(() => node.manager.readyPeerIds().length === 1)
    r1.destroy()
    await waitFor(() => node.manager.getStats().connections === 0)
    assert.deepEqual(node.manager.getPeers(), [])
  })

  it("closes a connection from itself", async () => {
    const node = await startTestNode("node-n")
    const self = await rawPeer(node, "node-n", 7200)
    await waitFor(() => self.closed)
    assert.equal(node.manager.getStats().peers, 0)
    assert.deepEqual(node.manager.registerPeerAddress({ host: "127.0.0.1", port: node.manager.listenPort }), {
      isNew: false,
      dialing: false,
    })
  })

  it("keeps a single connection when two nodes dial each other", async () => {
    const a = await startTestNode("node-a")
    const b = await startTestNode("node-b", { bootstrap: [a.address] })
    a.manager.registerPeerAddress({ ...b.address })
    await waitFor(
      () =>
        a.manager.getStats().connections === 1 &&
        b.manager.getStats().connections === 1 &&
        a.manager.readyPeerIds().length === 1 &&
        b.manager.readyPeerIds().length === 1,
    )
    assert.deepEqual(a.manager.readyPeerIds(), ["node-b"])
    assert.deepEqual(b.manager.readyPeerIds(), ["node-a"])
  })

  it("rejects inbound connections beyond the peer limit", async () => {
    const node = await startTestNode("node-n", { maxPeers: 1 })
    await rawPeer(node, "raw-1", 7101)
    await waitFor(() => node.manager.readyPeerIds().length === 1)
    const extra = await rawPeer(node, "raw-2", 7102)
    await waitFor(() => extra.closed)
    assert.deepEqual(node.manager.readyPeerIds(), ["raw-1"])
  })

  it("syncs a store larger than the send queue without dropping the link", async () => {
    const maxSendQueueBytes = 64 * 1024
    const a = await startTestNode("node-a", { maxSendQueueBytes })
    const note = "x".repeat(4000)
    for (let i = 0; i < 2000; i++) {
      await a.store.upsert({ identifier: `bulk-${i}`, note, timestamp: 1, originId: "node-z" })
    }
    const b = await startTestNode("node-b", { bootstrap: [a.address], maxSendQueueBytes })

    await eventually(async () => ((await b.store.count()) === 2000 ? true : null), 15_000)
    assert.deepEqual(await b.store.get("bulk-1999"), { identifier: "bulk-1999", note, timestamp: 1, originId: "node-z" })
    assert.equal(a.manager.getStats().connections, 1)
    assert.deepEqual(peerIds(b), ["node-a"])
  })

  it("redials a bootstrap peer that restarts", async () => {
    const a = await startTestNode("node-a")
    const port = a.address.port
    const b = await startTestNode("node-b", { bootstrap: [a.address] })
    await waitFor(() => peerIds(b).length === 1)

    await a.manager.stop()
    await waitFor(() => b.manager.getStats().peers === 0)

    const restarted = await startTestNode("node-a", { port })
    await waitFor(() => peerIds(b).length === 1 && peerIds(restarted).length === 1, 3_000, "redial of the bootstrap peer")
    assert.deepEqual(peerIds(b), ["node-a"])
    assert.deepEqual(peerIds(restarted), ["node-b"])
  })

  it("does not redial a discovered peer that went away", async () => {
    const n = await startTestNode("node-n")
    const c = await startTestNode("node-c")
    const port = c.address.port
    assert.deepEqual(n.manager.registerPeerAddress({ ...c.address }), { isNew: true, dialing: true })
    await waitFor(() => peerIds(n).length === 1)

    await c.manager.stop()
    await waitFor(() => n.manager.getStats().connections === 0)

    // bootstrap redials start at 50 ms here
    assert.equal(await countDials(port, 500), 0)
    assert.equal(n.manager.getStats().discoveredAddresses, 1)
  })

  it("applies a report again after a failed store write", async () => {
    const db = new FlakyDatabase()
    const node = await startTestNode("node-n", {}, db)
    const r1 = await rawPeer(node, "raw-1", 7101)
    await waitFor(() => node.manager.readyPeerIds().length === 1)
    const report = { kind: "report-spammer", originId: "raw-1", payload: { identifier: "retry", note: "", timestamp: 4 } }

    db.failWrites = true
    r1.send(report)
    await waitFor(() => node.manager.getStats().dispatchErrors === 1)
    assert.equal(await node.store.get("retry"), null)

    db.failWrites = false
    r1.send(report)
    assert.deepEqual(await eventually(() => node.store.get("retry")), {
      identifier: "retry",
      note: "",
      timestamp: 4,
      originId: "raw-1",
    })
    const stats = node.manager.getStats()
    assert.equal(stats.duplicatesDropped, 0)
    assert.equal(stats.dispatchErrors, 1)
  })
})
