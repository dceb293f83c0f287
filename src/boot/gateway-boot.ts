// src/boot/gateway-boot.ts — Startup and serving phases of the gateway process

import { serve } from "@hono/node-server"
import type { GatewayConfig } from "../config.js"
import { resolveEngineConfig } from "../engine/deployment.js"
import { EngineHandle } from "../engine/handle.js"
import type { SpawnFn } from "../engine/engine-process.js"
import { createApp } from "../gateway/server.js"
import { createLogger, type Logger, type LogSink } from "../logger.js"

export interface Startup {
  app: ReturnType<typeof createApp>
  engine: EngineHandle
  logger: Logger
  host: string
  port: number
}

export interface StartupHooks {
  /** Called if a spawned engine dies after startup */
  onEngineExit: () => void
  logSink?: LogSink
  spawnFn?: SpawnFn
}

/**
 * One-shot async initialization. Must finish before the listener binds.
 * Throws ConfigError or EngineError; the caller exits non-zero.
 */
export async function startup(config: GatewayConfig, hooks: StartupHooks): Promise<Startup> {
  const engineConfig = resolveEngineConfig(config.deployment)
  const logger = createLogger("gateway", engineConfig.logLevel, hooks.logSink)
  logger.info("resolved engine config", {
    model: engineConfig.model,
    tokenizer: engineConfig.tokenizer ?? null,
    tensorParallelSize: engineConfig.tensorParallelSize,
    maxModelLen: engineConfig.maxModelLen,
  })

  const engine = await EngineHandle.initialize(engineConfig, {
    logger: logger.child("engine"),
    engineUrl: config.engine.url,
    command: config.engine.command,
    enginePort: config.engine.port,
    startupTimeoutMs: config.engine.startupTimeoutMs,
    shutdownTimeoutMs: config.engine.shutdownTimeoutMs,
    onUnexpectedExit: hooks.onEngineExit,
    spawnFn: hooks.spawnFn,
  })

  const app = createApp(engine, {
    logger,
    requestLog: config.requestLog.enabled ? { maxLogLen: config.requestLog.maxLogLen } : undefined,
  })

  return { app, engine, logger, host: engineConfig.host, port: engineConfig.port }
}

/** Serve until SIGTERM/SIGINT; shuts the engine down on the way out. */
export function run(started: Startup): void {
  const { app, engine, logger, host, port } = started
  const server = serve({ fetch: app.fetch, hostname: host, port }, (info) => {
    logger.info("listening", { host, port: info.port })
  })

  let shuttingDown = false
  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    const start = Date.now()
    logger.info("shutting down", { signal })

    server.close()
    try {
      await engine.shutdown()
    } catch (err) {
      logger.fault("engine shutdown error", err)
    }

    logger.info("shutdown complete", { duration_ms: Date.now() - start })
    process.exit(0)
  }

  const handleSignal = (signal: string) => {
    setTimeout(() => {
      logger.error("forced shutdown after 30s timeout")
      process.exit(1)
    }, 30_000).unref()

    void gracefulShutdown(signal)
  }

  process.on("SIGTERM", () => handleSignal("SIGTERM"))
  process.on("SIGINT", () => handleSignal("SIGINT"))
}
