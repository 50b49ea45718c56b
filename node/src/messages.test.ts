import { describe, it } from "node:test"
import assert from "node:assert/strict"
import { buildMessage, dedupKey, encodeMessage, isFloodKind, parseMessage, recordToReport } from "./messages.ts"
import { decodeMessageText } from "./message-codec.ts"
import { DecodeError, UnknownMessageKindError } from "./errors.ts"

describe("parseMessage", () => {
  it("accepts a report-spammer envelope", () => {
    const msg = parseMessage({
      kind: "report-spammer",
      originId: "node-a",
      payload: { identifier: "user-1", note: "crypto spam", timestamp: 1000 },
    })
    assert.equal(msg.kind, "report-spammer")
    assert.equal(msg.originId, "node-a")
    assert.deepEqual(msg.payload, { identifier: "user-1", note: "crypto spam", timestamp: 1000 })
  })

  it("stores numeric identifiers as strings", () => {
    const msg = parseMessage({
      kind: "query-spammer",
      originId: "node-a",
      payload: { correlationId: "q1", identifier: 424242 },
    })
    assert.equal(msg.kind, "query-spammer")
    if (msg.kind === "query-spammer") {
      assert.equal(msg.payload.identifier, "424242")
    }
  })

  it("fills a missing announce-peer nodeId with null", () => {
    const msg = parseMessage({ kind: "announce-peer", originId: "n", payload: { host: "10.0.0.2", port: 9828 } })
    assert.deepEqual(msg.payload, { host: "10.0.0.2", port: 9828, nodeId: null })
  })

  it("accepts a payload that arrived double encoded", () => {
    const wire = JSON.stringify({
      kind: "report-spammer",
      originId: "node-b",
      payload: JSON.stringify({ identifier: "u2", note: "", timestamp: 5 }),
    })
    const msg = parseMessage(decodeMessageText(wire))
    assert.deepEqual(msg.payload, { identifier: "u2", note: "", timestamp: 5 })
  })

  it("throws UnknownMessageKindError for kinds it does not speak", () => {
    assert.throws(
      () => parseMessage({ kind: "gossip-v9", originId: "n", payload: {} }),
      (err: unknown) => err instanceof UnknownMessageKindError && err.kind === "gossip-v9",
    )
  })

  it("throws DecodeError for malformed envelopes and payloads", () => {
    assert.throws(() => parseMessage([1, 2]), DecodeError)
    assert.throws(() => parseMessage({ originId: "n", payload: {} }), DecodeError)
    assert.throws(() => parseMessage({ kind: "ping", payload: { sentAtMs: 1 } }), DecodeError)
    assert.throws(
      () => parseMessage({ kind: "report-spammer", originId: "n", payload: { identifier: "", note: "", timestamp: 1 } }),
      DecodeError,
    )
    assert.throws(
      () => parseMessage({ kind: "handshake", originId: "n", payload: { listenPort: 70000 } }),
      DecodeError,
    )
  })
})

describe("dedupKey", () => {
  it("is stable under payload key order", () => {
    const a = buildMessage("report-spammer", "node-a", { identifier: "u", note: "n", timestamp: 1 })
    const b = parseMessage(decodeMessageText('{"payload":{"timestamp":1,"note":"n","identifier":"u"},"originId":"node-a","kind":"report-spammer"}'))
    assert.equal(dedupKey(a), dedupKey(b))
    assert.match(dedupKey(a), /^node-a:[0-9a-f]{64}$/)
  })

  it("differs by origin, kind or payload", () => {
    const base = buildMessage("report-spammer", "node-a", { identifier: "u", note: "n", timestamp: 1 })
    const otherOrigin = buildMessage("report-spammer", "node-b", { identifier: "u", note: "n", timestamp: 1 })
    const otherPayload = buildMessage("report-spammer", "node-a", { identifier: "u", note: "n", timestamp: 2 })
    const keys = new Set([dedupKey(base), dedupKey(otherOrigin), dedupKey(otherPayload)])
    assert.equal(keys.size, 3)
  })
})

describe("encodeMessage", () => {
  it("writes the envelope fields only", () => {
    const msg = buildMessage("ping", "node-a", { sentAtMs: 12 })
    assert.equal(encodeMessage(msg), '{"kind":"ping","originId":"node-a","payload":{"sentAtMs":12}}')
  })
})

describe("recordToReport", () => {
  it("keeps the original reporter as origin", () => {
    const msg = recordToReport({ identifier: "u", note: "n", timestamp: 3, originId: "reporter" })
    assert.deepEqual(msg, {
      kind: "report-spammer",
      originId: "reporter",
      payload: { identifier: "u", note: "n", timestamp: 3 },
    })
  })
})

describe("isFloodKind", () => {
  it("floods only announcements and reports", () => {
    assert.equal(isFloodKind("announce-peer"), true)
    assert.equal(isFloodKind("report-spammer"), true)
    assert.equal(isFloodKind("query-spammer"), false)
    assert.equal(isFloodKind("query-response"), false)
    assert.equal(isFloodKind("handshake"), false)
  })
})
