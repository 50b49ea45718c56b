#!/usr/bin/env -S node --import tsx
import { Command } from "commander"
import { loadNodeConfig } from "./config.ts"
import { runUntilSignal } from "./node-runtime.ts"
import { createHttpGatewayClient, registerSpamnetCommands, runCli } from "./cli/commands.ts"
import type { CliIo } from "./cli/commands.ts"

const io: CliIo = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => process.stderr.write(line + "\n"),
}

const program = new Command()
program.name("spamnet").description("Spammer report gossip node")

registerSpamnetCommands(program, {
  io,
  async resolveClient(gatewayUrl) {
    if (gatewayUrl) return createHttpGatewayClient(gatewayUrl)
    const cfg = await loadNodeConfig()
    const host = cfg.gatewayBind === "0.0.0.0" ? "127.0.0.1" : cfg.gatewayBind
    return createHttpGatewayClient(`http://${host}:${cfg.httpPort}`)
  },
  async startNode() {
    await runUntilSignal(await loadNodeConfig())
  },
})

process.exitCode = await runCli(program, process.argv, io)
