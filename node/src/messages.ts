/**
 * Gossip message envelope and payload schemas.
 *
 * Every message on the wire is `{ kind, originId, payload }`. Flooded kinds
 * (announce-peer, report-spammer) go through the dedup ledger; the others are
 * point-to-point between two directly connected nodes.
 */

import { createHash } from "node:crypto"
import { z } from "zod"
import { DecodeError, UnknownMessageKindError } from "./errors.ts"
import { isJsonObject, stableStringify } from "./message-codec.ts"
import type { JsonValue } from "./message-codec.ts"

export const MAX_IDENTIFIER_LENGTH = 256
export const MAX_NOTE_LENGTH = 4096

// chat user ids arrive as numbers from some clients; they are stored as strings
export const IdentifierSchema = z
  .union([z.string().trim().min(1).max(MAX_IDENTIFIER_LENGTH), z.number().int().nonnegative()])
  .transform((v) => String(v))

const NodeIdSchema = z.string().min(1).max(128)
const PortSchema = z.number().int().min(1).max(65535)
const TimestampSchema = z.number().finite().nonnegative()

export const SpammerRecordSchema = z.object({
  identifier: IdentifierSchema,
  note: z.string().max(MAX_NOTE_LENGTH),
  timestamp: TimestampSchema,
  originId: NodeIdSchema,
})

export type SpammerRecord = z.infer<typeof SpammerRecordSchema>

const AnnouncePeerPayloadSchema = z.object({
  host: z.string().min(1).max(255),
  port: PortSchema,
  nodeId: NodeIdSchema.nullable().default(null),
})

const ReportSpammerPayloadSchema = z.object({
  identifier: IdentifierSchema,
  note: z.string().max(MAX_NOTE_LENGTH),
  timestamp: TimestampSchema,
})

const QuerySpammerPayloadSchema = z.object({
  correlationId: z.string().min(1).max(128),
  identifier: IdentifierSchema,
})

const QueryResponsePayloadSchema = z.object({
  correlationId: z.string().min(1).max(128),
  identifier: IdentifierSchema,
  record: SpammerRecordSchema.nullable(),
})

const HandshakePayloadSchema = z.object({
  listenPort: PortSchema,
})

const PingPayloadSchema = z.object({
  sentAtMs: TimestampSchema,
})

export type AnnouncePeerPayload = z.infer<typeof AnnouncePeerPayloadSchema>
export type ReportSpammerPayload = z.infer<typeof ReportSpammerPayloadSchema>
export type QuerySpammerPayload = z.infer<typeof QuerySpammerPayloadSchema>
export type QueryResponsePayload = z.infer<typeof QueryResponsePayloadSchema>
export type HandshakePayload = z.infer<typeof HandshakePayloadSchema>
export type PingPayload = z.infer<typeof PingPayloadSchema>

export interface PayloadMap {
  "announce-peer": AnnouncePeerPayload
  "report-spammer": ReportSpammerPayload
  "query-spammer": QuerySpammerPayload
  "query-response": QueryResponsePayload
  handshake: HandshakePayload
  ping: PingPayload
  pong: PingPayload
}

export type MessageKind = keyof PayloadMap

export type Envelope<K extends MessageKind> = {
  kind: K
  originId: string
  payload: PayloadMap[K]
}

export type GossipMessage = { [K in MessageKind]: Envelope<K> }[MessageKind]

/** Any well-formed message, for code that only forwards or encodes. */
export type OutboundMessage = Envelope<MessageKind>

export const MESSAGE_KINDS: readonly MessageKind[] = [
  "announce-peer",
  "report-spammer",
  "query-spammer",
  "query-response",
  "handshake",
  "ping",
  "pong",
]

export type FloodKind = "announce-peer" | "report-spammer"

const KNOWN_KINDS: ReadonlySet<string> = new Set(MESSAGE_KINDS)

export function isKnownKind(kind: string): kind is MessageKind {
  return KNOWN_KINDS.has(kind)
}

export function isFloodKind(kind: MessageKind): kind is FloodKind {
  return kind === "announce-peer" || kind === "report-spammer"
}

const MessageSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("announce-peer"), originId: NodeIdSchema, payload: AnnouncePeerPayloadSchema }),
  z.object({ kind: z.literal("report-spammer"), originId: NodeIdSchema, payload: ReportSpammerPayloadSchema }),
  z.object({ kind: z.literal("query-spammer"), originId: NodeIdSchema, payload: QuerySpammerPayloadSchema }),
  z.object({ kind: z.literal("query-response"), originId: NodeIdSchema, payload: QueryResponsePayloadSchema }),
  z.object({ kind: z.literal("handshake"), originId: NodeIdSchema, payload: HandshakePayloadSchema }),
  z.object({ kind: z.literal("ping"), originId: NodeIdSchema, payload: PingPayloadSchema }),
  z.object({ kind: z.literal("pong"), originId: NodeIdSchema, payload: PingPayloadSchema }),
])

/**
 * Validate a decoded value as a message.
 * Throws UnknownMessageKindError for a kind this node does not speak and
 * DecodeError for anything else that does not fit the envelope or payload.
 */
export function parseMessage(value: JsonValue): GossipMessage {
  if (!isJsonObject(value)) {
    throw new DecodeError("message is not an object")
  }
  const kind = value.kind
  if (typeof kind !== "string" || kind.length === 0) {
    throw new DecodeError("message has no kind")
  }
  if (!isKnownKind(kind)) {
    throw new UnknownMessageKindError(kind)
  }
  const result = MessageSchema.safeParse(value)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue ? issue.path.join(".") : ""
    throw new DecodeError(`invalid ${kind} message${where ? ` at ${where}` : ""}: ${issue?.message ?? "unknown"}`, {
      kind,
    })
  }
  return result.data
}

export function buildMessage<K extends MessageKind>(kind: K, originId: string, payload: PayloadMap[K]): Envelope<K> {
  return { kind, originId, payload }
}

export function encodeMessage(message: OutboundMessage): string {
  return JSON.stringify({ kind: message.kind, originId: message.originId, payload: message.payload })
}

/**
 * Key under which a flooded message is remembered. Two messages from the
 * same origin with the same kind and payload are the same message.
 */
export function dedupKey(message: OutboundMessage): string {
  const content = stableStringify({ kind: message.kind, payload: message.payload })
  const digest = createHash("sha256").update(content, "utf8").digest("hex")
  return `${message.originId}:${digest}`
}

/** Wrap a locally known record as the report that would have produced it. */
export function recordToReport(record: SpammerRecord): Envelope<"report-spammer"> {
  return buildMessage("report-spammer", record.originId, {
    identifier: record.identifier,
    note: record.note,
    timestamp: record.timestamp,
  })
}
