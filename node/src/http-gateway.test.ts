import { describe, it, beforeEach, afterEach } from "node:test"
import assert from "node:assert/strict"
import { HttpGateway } from "./http-gateway.ts"
import type { HttpGatewayConfig } from "./http-gateway.ts"
import { Dispatcher } from "./dispatcher.ts"
import { NodeManager } from "./node-manager.ts"
import { MemoryDatabase } from "./storage/db.ts"
import { SpammerStore } from "./storage/spammer-store.ts"
import { setLogLevel } from "./logger.ts"

setLogLevel("error")

describe("HttpGateway", () => {
  let gateway: HttpGateway | null = null
  let store: SpammerStore
  let base = ""

  async function start(overrides: Partial<HttpGatewayConfig> = {}): Promise<void> {
    store = new SpammerStore(new MemoryDatabase())
    // never started: no peers, so network lookups come back empty at once
    const manager = new NodeManager({ nodeId: "node-gw", bind: "127.0.0.1", port: 0 })
    const dispatcher = new Dispatcher({ store, transport: manager })
    gateway = new HttpGateway({ bind: "127.0.0.1", port: 0, ...overrides }, { dispatcher, store, network: manager })
    await gateway.start()
    base = `http://127.0.0.1:${gateway.port}`
  }

  async function call(path: string, init?: RequestInit): Promise<{ status: number; body: unknown }> {
    const res = await fetch(base + path, init)
    return { status: res.status, body: await res.json() }
  }

  function post(path: string, body: string): Promise<{ status: number; body: unknown }> {
    return call(path, { method: "POST", headers: { "content-type": "application/json" }, body })
  }

  beforeEach(async () => {
    await start()
  })

  afterEach(async () => {
    await gateway?.stop()
    gateway = null
  })

  it("reports health with the node id", async () => {
    assert.deepEqual(await call("/health"), { status: 200, body: { ok: true, nodeId: "node-gw" } })
  })

  it("stores a report and finds it again", async () => {
    const record = { identifier: "u1", note: "spam", timestamp: 10, originId: "node-gw" }
    assert.deepEqual(await post("/report", '{"identifier":"u1","note":"spam","timestamp":10}'), {
      status: 200,
      body: { changed: true, record },
    })
    assert.deepEqual(await call("/check?identifier=u1"), {
      status: 200,
      body: { identifier: "u1", spammer: true, record, source: "local" },
    })
  })

  it("keeps a note that looks like JSON as text", async () => {
    const note = '{"not":"parsed"}'
    const res = await post("/report", JSON.stringify({ identifier: "u2", note, timestamp: 1 }))
    assert.equal(res.status, 200)
    assert.deepEqual(await store.get("u2"), { identifier: "u2", note, timestamp: 1, originId: "node-gw" })
  })

  it("answers unknown identifiers, accepting user_id as well", async () => {
    assert.deepEqual(await call("/check?user_id=nobody&local=1"), {
      status: 200,
      body: { identifier: "nobody", spammer: false, record: null },
    })
    assert.deepEqual(await call("/check?identifier=nobody"), {
      status: 200,
      body: { identifier: "nobody", spammer: false, record: null },
    })
  })

  it("rejects bad requests", async () => {
    assert.deepEqual(await call("/check"), { status: 400, body: { error: "identifier is required" } })
    assert.deepEqual(await post("/report", "{oops"), { status: 400, body: { error: "invalid JSON body", code: -32700 } })
    assert.deepEqual(await post("/report", "  "), { status: 400, body: { error: "empty request body", code: -32700 } })

    const res = await post("/report", '{"identifier":""}')
    assert.equal(res.status, 400)
    assert.ok(typeof res.body === "object" && res.body !== null && "error" in res.body && "code" in res.body)
    assert.equal(res.body.code, -32602)
    assert.match(String(res.body.error), /^invalid params: identifier: /)
  })

  it("purges a record on DELETE", async () => {
    await post("/report", '{"identifier":"gone","timestamp":1}')
    assert.deepEqual(await call("/spammers/gone", { method: "DELETE" }), {
      status: 200,
      body: { identifier: "gone", removed: true },
    })
    assert.deepEqual(await call("/spammers/gone", { method: "DELETE" }), {
      status: 404,
      body: { identifier: "gone", removed: false },
    })
  })

  it("trims the purge identifier and rejects bad ones", async () => {
    await post("/report", '{"identifier":"padded","timestamp":1}')
    assert.deepEqual(await call("/spammers/%20padded%20", { method: "DELETE" }), {
      status: 200,
      body: { identifier: "padded", removed: true },
    })
    assert.deepEqual(await call("/spammers/%E0", { method: "DELETE" }), {
      status: 400,
      body: { error: "malformed identifier encoding" },
    })
    assert.deepEqual(await call("/spammers/%20", { method: "DELETE" }), {
      status: 400,
      body: { error: "invalid identifier" },
    })
    assert.deepEqual(await call("/spammers/", { method: "DELETE" }), {
      status: 400,
      body: { error: "invalid identifier" },
    })
  })

  it("lists peers and stats", async () => {
    await post("/report", '{"identifier":"s1","timestamp":1}')
    assert.deepEqual(await call("/peers"), { status: 200, body: [] })
    const stats = await call("/stats")
    assert.equal(stats.status, 200)
    assert.ok(typeof stats.body === "object" && stats.body !== null && "records" in stats.body && "nodeId" in stats.body)
    assert.equal(stats.body.records, 1)
    assert.equal(stats.body.nodeId, "node-gw")
  })

  it("serves JSON-RPC, batched or single", async () => {
    await post("/report", '{"identifier":"r1","note":"n","timestamp":3}')
    const batch = await post(
      "/rpc",
      JSON.stringify([
        { jsonrpc: "2.0", id: 1, method: "spam_check", params: ["r1", true] },
        { jsonrpc: "2.0", id: 2, method: "spam_nope" },
        { jsonrpc: "2.0", id: 3, method: "spam_report", params: { identifier: "" } },
      ]),
    )
    assert.equal(batch.status, 200)
    assert.ok(Array.isArray(batch.body))
    assert.deepEqual(batch.body[0], {
      jsonrpc: "2.0",
      id: 1,
      result: {
        identifier: "r1",
        spammer: true,
        record: { identifier: "r1", note: "n", timestamp: 3, originId: "node-gw" },
        source: "local",
      },
    })
    assert.deepEqual(batch.body[1], { jsonrpc: "2.0", id: 2, error: { code: -32601, message: "method not found: spam_nope" } })
    assert.equal(batch.body[2].error.code, -32602)

    assert.deepEqual(await post("/rpc", '{"jsonrpc":"2.0","id":"x","method":"spam_peers"}'), {
      status: 200,
      body: { jsonrpc: "2.0", id: "x", result: [] },
    })
    assert.deepEqual(await post("/rpc", '{"id":7}'), {
      status: 200,
      body: { jsonrpc: "2.0", id: 7, error: { code: -32600, message: "invalid request" } },
    })
  })

  it("answers 404 for unknown routes", async () => {
    assert.deepEqual(await call("/nowhere"), { status: 404, body: { error: "not found" } })
  })

  it("rate limits per client address", async () => {
    await gateway?.stop()
    await start({ rateLimit: { windowMs: 60_000, maxRequests: 2 } })
    assert.equal((await call("/health")).status, 200)
    assert.equal((await call("/health")).status, 200)
    assert.deepEqual(await call("/health"), { status: 429, body: { error: "rate limit exceeded", code: -32005 } })
  })
})
