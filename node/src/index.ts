import { loadNodeConfig } from "./config.ts"
import { runUntilSignal } from "./node-runtime.ts"
import { createLogger } from "./logger.ts"
import { errorMessage } from "./errors.ts"

const log = createLogger("main")

try {
  const config = await loadNodeConfig()
  await runUntilSignal(config)
} catch (err) {
  log.error("node failed", { error: errorMessage(err) })
  process.exitCode = 1
}
