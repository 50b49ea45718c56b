/**
 * Structured logger
 *
 * One JSON line per entry. Components get their own logger through
 * createLogger(); the level threshold is global.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent"

export type LogFields = Record<string, string | number | boolean | null | undefined>

export interface LogEntry {
  ts: string
  level: Exclude<LogLevel, "silent">
  component: string
  msg: string
  fields: LogFields
}

export type LogSink = (entry: LogEntry) => void

export interface Logger {
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export const consoleSink: LogSink = (entry) => {
  const line = JSON.stringify({
    ts: entry.ts,
    level: entry.level,
    component: entry.component,
    msg: entry.msg,
    ...entry.fields,
  })
  if (entry.level === "warn" || entry.level === "error") {
    process.stderr.write(line + "\n")
  } else {
    process.stdout.write(line + "\n")
  }
}

let currentLevel: LogLevel = parseLogLevel(process.env.SPAMNET_LOG_LEVEL) ?? "info"
let currentSink: LogSink = consoleSink

export function parseLogLevel(input: unknown): LogLevel | undefined {
  if (typeof input !== "string") return undefined
  const v = input.trim().toLowerCase()
  if (v === "debug" || v === "info" || v === "warn" || v === "error" || v === "silent") {
    return v
  }
  return undefined
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

/** Replace the output sink. Returns the previous one so tests can restore it. */
export function setLogSink(sink: LogSink): LogSink {
  const previous = currentSink
  currentSink = sink
  return previous
}

export function createLogger(component: string): Logger {
  const emit = (level: Exclude<LogLevel, "silent">, msg: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return
    const clean: LogFields = {}
    if (fields) {
      for (const [k, v] of Object.entries(fields)) {
        if (v !== undefined) clean[k] = v
      }
    }
    currentSink({ ts: new Date().toISOString(), level, component, msg, fields: clean })
  }

  return {
    debug: (msg, fields) => emit("debug", msg, fields),
    info: (msg, fields) => emit("info", msg, fields),
    warn: (msg, fields) => emit("warn", msg, fields),
    error: (msg, fields) => emit("error", msg, fields),
  }
}
