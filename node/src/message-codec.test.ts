import { describe, it } from "node:test"
import assert from "node:assert/strict"
import { decodeMessageText, isJsonObject, stableStringify, unwrapNestedJson } from "./message-codec.ts"
import { DecodeError } from "./errors.ts"

describe("decodeMessageText", () => {
  it("unwraps JSON-encoded strings inside objects and arrays", () => {
    const text = '{"key1": "{\\"nested_key1\\": \\"nested_value1\\"}", "key2": ["{\\"nested_key2\\": \\"nested_value2\\"}"]}'
    assert.deepEqual(decodeMessageText(text), {
      key1: { nested_key1: "nested_value1" },
      key2: [{ nested_key2: "nested_value2" }],
    })
  })

  it("unwraps several layers of encoding", () => {
    const inner = JSON.stringify({ deep: [1, "two"] })
    const twice = JSON.stringify(JSON.stringify(inner))
    const text = `{"payload":${twice}}`
    assert.deepEqual(decodeMessageText(text), { payload: { deep: [1, "two"] } })
  })

  it("recurses into unwrapped structures", () => {
    const text = JSON.stringify({ a: JSON.stringify({ b: JSON.stringify([JSON.stringify({ c: true })]) }) })
    assert.deepEqual(decodeMessageText(text), { a: { b: [{ c: true }] } })
  })

  it("leaves plain strings untouched", () => {
    const value = decodeMessageText('{"id":"123","flag":"true","nil":"null","note":"spam {link}","q":"\\"quoted\\""}')
    assert.deepEqual(value, { id: "123", flag: "true", nil: "null", note: "spam {link}", q: '"quoted"' })
  })

  it("keeps scalars and top-level arrays", () => {
    assert.deepEqual(decodeMessageText("[1, true, null, 2.5]"), [1, true, null, 2.5])
    assert.equal(decodeMessageText('"plain"'), "plain")
  })

  it("throws DecodeError on invalid JSON", () => {
    assert.throws(() => decodeMessageText("{not json}"), DecodeError)
    assert.throws(() => decodeMessageText(""), DecodeError)
  })
})

describe("unwrapNestedJson", () => {
  it("keeps a __proto__ key as ordinary data", () => {
    const value = decodeMessageText('{"payload":{"__proto__":"{\\"identifier\\":\\"x\\"}"}}')
    assert.ok(isJsonObject(value))
    const payload = value.payload
    assert.ok(isJsonObject(payload))
    assert.deepEqual(Object.keys(payload), ["__proto__"])
    assert.equal(Object.getPrototypeOf(payload), Object.prototype)
    assert.equal(stableStringify(value), '{"payload":{"__proto__":{"identifier":"x"}}}')
  })

  it("does not modify its input", () => {
    const input = { a: '{"b":1}' }
    const out = unwrapNestedJson(input)
    assert.deepEqual(out, { a: { b: 1 } })
    assert.deepEqual(input, { a: '{"b":1}' })
  })
})

describe("stableStringify", () => {
  it("sorts object keys at every depth", () => {
    assert.equal(stableStringify({ b: 1, a: { d: [2, { f: 1, e: 0 }], c: null } }), '{"a":{"c":null,"d":[2,{"e":0,"f":1}]},"b":1}')
  })
})
