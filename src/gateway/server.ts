// src/gateway/server.ts — Hono HTTP app: the SageMaker serving contract

import { Hono } from "hono"
import type { ChatEngine } from "../engine/handle.js"
import type { Logger } from "../logger.js"
import { RequestLogger } from "./request-logger.js"
import { createInvocationsHandler } from "./routes/invocations.js"

export interface AppOptions {
  logger: Logger
  /** Omit to disable request logging */
  requestLog?: { maxLogLen?: number }
  newRequestId?: () => string
}

export function createApp(engine: ChatEngine, options: AppOptions) {
  const app = new Hono()
  const logger = options.logger

  // Liveness only; the listener is bound after the engine is up
  app.get("/ping", (c) => c.json({}, 200))

  app.post(
    "/invocations",
    createInvocationsHandler({
      engine,
      logger: logger.child("invocations"),
      requestLogger: options.requestLog
        ? new RequestLogger(logger.child("requests"), options.requestLog)
        : undefined,
      newRequestId: options.newRequestId,
    }),
  )

  app.notFound((c) => c.json({ error: "Not found" }, 404))

  app.onError((err, c) => {
    logger.fault("unhandled route error", err, { method: c.req.method, path: c.req.path })
    return c.json({ error: "Internal error", code: "INTERNAL_ERROR" }, 500)
  })

  return app
}
