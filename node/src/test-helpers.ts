/**
 * Helpers shared by the network tests: a bare TCP peer that speaks the wire
 * format by hand, and a polling wait.
 */

import net from "node:net"
import { JsonFrameDecoder } from "./json-framer.ts"
import { decodeMessageText, isJsonObject } from "./message-codec.ts"
import type { JsonValue } from "./message-codec.ts"

export async function waitFor(cond: () => boolean, timeoutMs = 3_000, label = "condition"): Promise<void> {
  const deadline = Date.now() + timeoutMs
  while (!cond()) {
    if (Date.now() > deadline) throw new Error(`timed out waiting for ${label}`)
    await new Promise((resolve) => setTimeout(resolve, 5))
  }
}

/** Polls an async lookup until it yields a value. */
export async function eventually<T>(lookup: () => Promise<T | null>, timeoutMs = 3_000): Promise<T> {
  const deadline = Date.now() + timeoutMs
  for (;;) {
    const value = await lookup()
    if (value !== null) return value
    if (Date.now() > deadline) throw new Error("timed out waiting for a value")
    await new Promise((resolve) => setTimeout(resolve, 10))
  }
}

export class RawPeer {
  readonly received: JsonValue[] = []
  closed = false
  /** Answer every ping with a pong carrying the same payload. */
  autoPong = false
  private readonly decoder = new JsonFrameDecoder()

  constructor(readonly socket: net.Socket) {
    socket.on("data", (data: Buffer) => {
      for (const text of this.decoder.feed(data)) {
        const message = decodeMessageText(text)
        this.received.push(message)
        if (this.autoPong && isJsonObject(message) && message.kind === "ping") {
          this.send({ kind: "pong", originId: "raw-peer", payload: message.payload })
        }
      }
    })
    socket.on("close", () => {
      this.closed = true
    })
    socket.on("error", () => {
      this.closed = true
    })
  }

  static connect(port: number, host = "127.0.0.1"): Promise<RawPeer> {
    return new Promise((resolve, reject) => {
      const socket = net.connect({ host, port }, () => {
        socket.off("error", reject)
        resolve(new RawPeer(socket))
      })
      socket.once("error", reject)
    })
  }

  send(value: JsonValue | string): void {
    this.socket.write(typeof value === "string" ? value : JSON.stringify(value))
  }

  /** Messages received so far with the given kind. */
  ofKind(kind: string): JsonValue[] {
    return this.received.filter((m) => isJsonObject(m) && m.kind === kind)
  }

  async waitForKind(kind: string, count = 1): Promise<JsonValue[]> {
    await waitFor(() => this.ofKind(kind).length >= count, 3_000, `${count} ${kind} message(s)`)
    return this.ofKind(kind)
  }

  destroy(): void {
    this.socket.destroy()
  }
}

/** Listening TCP server on an ephemeral loopback port. */
export async function listenEphemeral(onSocket: (socket: net.Socket) => void): Promise<{ server: net.Server; port: number }> {
  const server = net.createServer(onSocket)
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject)
    server.listen(0, "127.0.0.1", () => {
      server.off("error", reject)
      resolve()
    })
  })
  const address = server.address()
  if (address === null || typeof address === "string") throw new Error("server has no TCP address")
  return { server, port: address.port }
}
