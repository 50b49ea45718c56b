/**
 * Message codec
 *
 * Parses a framed message text and undoes double encoding: intermediaries may
 * forward a sub-message as a JSON string instead of an inline object. Any
 * string whose content parses to an object or array (possibly through several
 * string layers) is replaced by that structure, recursively.
 */

import { DecodeError } from "./errors.ts"

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue }

export type JsonObject = { [key: string]: JsonValue }

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function isContainer(value: JsonValue): value is JsonValue[] | JsonObject {
  return typeof value === "object" && value !== null
}

/**
 * Parse one complete message text into a fully unwrapped value.
 * Throws DecodeError when the text is not valid JSON.
 */
export function decodeMessageText(text: string): JsonValue {
  return unwrapNestedJson(parseJsonText(text))
}

/** JSON.parse without unwrapping; throws DecodeError on invalid input. */
export function parseJsonText(text: string): JsonValue {
  try {
    return JSON.parse(text)
  } catch (err) {
    throw new DecodeError(`invalid JSON message: ${String(err)}`, { length: text.length })
  }
}

export function unwrapNestedJson(value: JsonValue): JsonValue {
  if (typeof value === "string") {
    return unwrapString(value) ?? value
  }
  if (Array.isArray(value)) {
    return value.map((item) => unwrapNestedJson(item))
  }
  if (isJsonObject(value)) {
    // fromEntries defines own properties, so a "__proto__" key stays a key
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, unwrapNestedJson(item)]))
  }
  return value
}

/** Returns the unwrapped structure, or null when the string is a plain scalar. */
function unwrapString(text: string): JsonValue | null {
  const trimmed = text.trimStart()
  const first = trimmed.charAt(0)
  // only objects, arrays and quoted strings can carry an encoded structure
  if (first !== "{" && first !== "[" && first !== "\"") return null

  let inner: JsonValue
  try {
    inner = JSON.parse(text)
  } catch {
    return null
  }
  if (isContainer(inner)) return unwrapNestedJson(inner)
  if (typeof inner === "string") return unwrapString(inner)
  return null
}

/**
 * Canonical JSON with sorted object keys. Used for content hashing so that
 * key order on the wire never changes a dedup key.
 */
export function stableStringify(value: JsonValue): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value)
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(",")}]`
  }
  const keys = Object.keys(value).sort()
  const props = keys.map((k) => `${JSON.stringify(k)}:${stableStringify(value[k])}`)
  return `{${props.join(",")}}`
}
