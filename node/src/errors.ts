/**
 * Error taxonomy for the gossip core.
 *
 * FramingError is connection-fatal, DecodeError and UnknownMessageKindError are
 * message-fatal, PeerUnreachableError is retried, StoreWriteError is returned
 * to the caller of a local operation.
 */

export class SpamnetError extends Error {
  readonly code: string
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message)
    this.name = "SpamnetError"
    this.code = code
    this.context = context
  }
}

export class FramingError extends SpamnetError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "FRAMING_ERROR", context)
    this.name = "FramingError"
  }
}

export class DecodeError extends SpamnetError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "DECODE_ERROR", context)
    this.name = "DecodeError"
  }
}

export class UnknownMessageKindError extends SpamnetError {
  readonly kind: string

  constructor(kind: string) {
    super(`unknown message kind: ${kind}`, "UNKNOWN_MESSAGE_KIND", { kind })
    this.name = "UnknownMessageKindError"
    this.kind = kind
  }
}

export class PeerUnreachableError extends SpamnetError {
  constructor(host: string, port: number, cause: string) {
    super(`peer unreachable: ${host}:${port} (${cause})`, "PEER_UNREACHABLE", { host, port, cause })
    this.name = "PeerUnreachableError"
  }
}

export class StoreWriteError extends SpamnetError {
  constructor(identifier: string, cause: string) {
    super(`store write failed for ${identifier}: ${cause}`, "STORE_WRITE_FAILURE", { identifier, cause })
    this.name = "StoreWriteError"
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export class ConfigError extends SpamnetError {
  readonly problems: string[]

  constructor(problems: string[], source?: string) {
    super(`invalid configuration${source ? ` in ${source}` : ""}: ${problems.join("; ")}`, "CONFIG_INVALID", { source })
    this.name = "ConfigError"
    this.problems = problems
  }
}
