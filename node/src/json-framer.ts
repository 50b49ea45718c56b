/**
 * JSON stream framer
 *
 * The P2P wire carries bare JSON documents back to back: no length prefix,
 * no delimiter. Boundaries are recovered by balanced-bracket counting over
 * `{}`/`[]`, ignoring brackets inside strings and honouring escapes.
 *
 * Scanning works on raw bytes. Every structural character is ASCII and UTF-8
 * continuation bytes never collide with ASCII, so a multi-byte character split
 * across reads is decoded only once its message is complete.
 */

import { FramingError } from "./errors.ts"

export const DEFAULT_MAX_FRAME_BYTES = 1024 * 1024 // 1 MiB

const OPEN_BRACE = 0x7b
const CLOSE_BRACE = 0x7d
const OPEN_BRACKET = 0x5b
const CLOSE_BRACKET = 0x5d
const QUOTE = 0x22
const BACKSLASH = 0x5c

function isWhitespace(b: number): boolean {
  return b === 0x20 || b === 0x0a || b === 0x0d || b === 0x09
}

/**
 * Frame accumulator for streaming TCP data.
 * Buffers incoming bytes and yields complete message texts in arrival order.
 */
export class JsonFrameDecoder {
  private buffer: Uint8Array = new Uint8Array(0)
  private used = 0
  // scan state survives between feed() calls
  private scanPos = 0
  private start = -1
  private depth = 0
  private inString = false
  private escaped = false
  private discarded = 0
  private readonly maxBufferSize: number
  private readonly textDecoder = new TextDecoder()

  constructor(maxBufferSize = DEFAULT_MAX_FRAME_BYTES) {
    this.maxBufferSize = maxBufferSize
  }

  /**
   * Feed incoming bytes and return any complete message texts.
   * Throws FramingError once an unterminated message outgrows maxBufferSize.
   */
  feed(data: Uint8Array): string[] {
    const needed = this.used + data.length
    if (needed > this.buffer.length) {
      const newCap = Math.max(needed, this.buffer.length * 2, 4096)
      const grown = new Uint8Array(newCap)
      grown.set(this.buffer.subarray(0, this.used), 0)
      this.buffer = grown
    }
    this.buffer.set(data, this.used)
    this.used += data.length

    const messages: string[] = []
    // bytes before `consumed` were emitted or skipped
    let consumed = 0

    while (this.scanPos < this.used) {
      const b = this.buffer[this.scanPos]

      if (this.start < 0) {
        if (b === OPEN_BRACE || b === OPEN_BRACKET) {
          this.start = this.scanPos
          this.depth = 1
          this.scanPos++
          continue
        }
        if (!isWhitespace(b)) this.discarded++
        this.scanPos++
        consumed = this.scanPos
        continue
      }

      if (this.inString) {
        if (this.escaped) {
          this.escaped = false
        } else if (b === BACKSLASH) {
          this.escaped = true
        } else if (b === QUOTE) {
          this.inString = false
        }
      } else if (b === QUOTE) {
        this.inString = true
      } else if (b === OPEN_BRACE || b === OPEN_BRACKET) {
        this.depth++
      } else if (b === CLOSE_BRACE || b === CLOSE_BRACKET) {
        this.depth--
        if (this.depth === 0) {
          messages.push(this.textDecoder.decode(this.buffer.subarray(this.start, this.scanPos + 1)))
          this.start = -1
          consumed = this.scanPos + 1
        }
      }
      this.scanPos++
    }

    // Compact: shift unconsumed bytes to front
    if (consumed > 0) {
      this.buffer.copyWithin(0, consumed, this.used)
      this.used -= consumed
      this.scanPos -= consumed
      if (this.start >= 0) this.start -= consumed
    }

    if (this.used > this.maxBufferSize) {
      const buffered = this.used
      this.reset()
      throw new FramingError(`unterminated message exceeds ${this.maxBufferSize} bytes`, {
        buffered,
        max: this.maxBufferSize,
      })
    }

    return messages
  }

  /**
   * Signal end of stream. A partial message is dropped, never emitted.
   * Returns the number of bytes discarded.
   */
  end(): number {
    const dropped = this.used
    this.reset()
    return dropped
  }

  bufferedBytes(): number {
    return this.used
  }

  /** Non-whitespace bytes skipped outside any top-level value. */
  get discardedBytes(): number {
    return this.discarded
  }

  reset(): void {
    this.buffer = new Uint8Array(0)
    this.used = 0
    this.scanPos = 0
    this.start = -1
    this.depth = 0
    this.inString = false
    this.escaped = false
  }
}

/**
 * Split a complete text into its top-level JSON documents.
 * Convenience wrapper over JsonFrameDecoder for in-memory input.
 */
export function splitJsonMessages(text: string, maxBufferSize = DEFAULT_MAX_FRAME_BYTES): string[] {
  const decoder = new JsonFrameDecoder(maxBufferSize)
  return decoder.feed(new TextEncoder().encode(text))
}
