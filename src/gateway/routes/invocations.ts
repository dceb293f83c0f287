// src/gateway/routes/invocations.ts — POST /invocations handler
// Thin HTTP rendering of runInvocation() outcomes.

import type { Context } from "hono"
import { stream } from "hono/streaming"
import type { ContentfulStatusCode } from "hono/utils/http-status"
import { runInvocation, type InvocationDeps, type InvocationOutcome } from "../invocation.js"

/**
 * Create the POST /invocations handler.
 *
 * Streamed outcomes are written chunk by chunk as the engine yields them. When
 * the caller disconnects, forwarding stops and the engine stream is released.
 */
export function createInvocationsHandler(deps: InvocationDeps) {
  return async (c: Context) => {
    let rawBody: string
    try {
      rawBody = await c.req.text()
    } catch (err) {
      deps.logger.fault("failed to read request body", err)
      return c.json({ error: "Internal error", code: "INTERNAL_ERROR" }, 500)
    }

    const outcome = await runInvocation(deps, rawBody)
    c.header("X-Request-Id", outcome.requestId)

    switch (outcome.kind) {
      case "rejected":
        return c.json(outcome.body, isContentfulStatus(outcome.status) ? outcome.status : 500)
      case "buffered":
        return c.json(outcome.body, 200)
      case "streamed":
        return renderStream(c, outcome, deps)
    }
  }
}

function renderStream(
  c: Context,
  outcome: Extract<InvocationOutcome, { kind: "streamed" }>,
  deps: InvocationDeps,
): Response {
  const { chunks, requestId } = outcome
  c.header("Content-Type", "text/event-stream")
  c.header("Cache-Control", "no-cache")

  return stream(
    c,
    async (out) => {
      out.onAbort(() => {
        deps.logger.info("client disconnected mid-stream", { request_id: requestId })
        outcome.abort()
      })

      try {
        for await (const chunk of chunks) {
          if (out.aborted) break
          await out.write(chunk)
          if (out.aborted) break
        }
      } finally {
        // Breaking out of for-await already closed the generator; this covers throws.
        await chunks.return(undefined)
      }
    },
    async (err, out) => {
      // An aborted upstream read after disconnect is expected, not a fault
      if (!out.aborted) {
        deps.logger.fault("stream forwarding failed", err, { request_id: requestId })
      }
      outcome.abort()
    },
  )
}

const CONTENTLESS = new Set([204, 205, 304])

/** Engine statuses pass through when a JSON body can ride on them. */
function isContentfulStatus(status: number): status is ContentfulStatusCode {
  return Number.isInteger(status) && status >= 200 && status <= 599 && !CONTENTLESS.has(status)
}
