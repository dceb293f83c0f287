// src/index.ts — Gateway entry point
// Boot sequence: config → resolve engine config → engine handle → app → serve

import { loadConfig } from "./config.js"
import { run, startup } from "./boot/gateway-boot.js"
import { ConfigError } from "./engine/errors.js"
import { createLogger } from "./logger.js"

async function main() {
  const bootLogger = createLogger("boot")
  const config = loadConfig()
  const started = await startup(config, {
    onEngineExit: () => {
      bootLogger.error("engine process died; exiting so the platform can replace this container")
      process.exit(1)
    },
  })
  run(started)
}

main().catch((err) => {
  createLogger("boot").fault("fatal", err, err instanceof ConfigError ? { code: err.code, ...err.context } : {})
  process.exit(1)
})
