// src/gateway/invocation.ts — /invocations state machine
//
// parse → validate → one engine call → classify. The caller's `stream` flag alone
// selects between buffered and streamed; a result of the other shape is an
// invariant violation, never reshaped.

import { ulid } from "ulid"
import type { ChatEngine } from "../engine/handle.js"
import { InvariantViolation } from "../engine/errors.js"
import {
  parseChatCompletionRequest,
  type ChatCompletionRequest,
  type ChatCompletionResponse,
} from "../engine/protocol.js"
import type { Logger } from "../logger.js"
import type { RequestLogger } from "./request-logger.js"

// --- Types ---

export type RejectionReason = "request_format" | "domain" | "invariant" | "internal"

export type InvocationOutcome =
  | { kind: "buffered"; requestId: string; body: ChatCompletionResponse }
  | { kind: "streamed"; requestId: string; chunks: AsyncGenerator<string, void, undefined>; abort: () => void }
  | { kind: "rejected"; requestId: string; status: number; body: Record<string, unknown>; reason: RejectionReason }

export interface InvocationDeps {
  engine: ChatEngine
  logger: Logger
  requestLogger?: RequestLogger
  /** Defaults to a ULID */
  newRequestId?: () => string
}

export const INVALID_REQUEST_FORMAT = "Invalid request format"

const INTERNAL_ERROR_BODY = { error: "Internal error", code: "INTERNAL_ERROR" } as const

// --- Adapter ---

/**
 * Turn one raw request body into exactly one outcome.
 * Never throws: every failure becomes a `rejected` outcome.
 */
export async function runInvocation(deps: InvocationDeps, rawBody: string): Promise<InvocationOutcome> {
  const requestId = (deps.newRequestId ?? ulid)()
  const log = deps.logger

  const parsed = parseChatCompletionRequest(rawBody)
  if (!parsed.ok) {
    log.debug("rejected request", { request_id: requestId, details: parsed.details })
    return {
      kind: "rejected",
      requestId,
      status: 400,
      body: { error: INVALID_REQUEST_FORMAT, details: parsed.details },
      reason: "request_format",
    }
  }

  const request = labelModel(parsed.request, deps.engine.servedModelNames)
  const wantsStream = request.stream === true
  deps.requestLogger?.logRequest(requestId, request)

  const abortController = new AbortController()

  try {
    const result = await deps.engine.createChatCompletion(request, {
      signal: abortController.signal,
      requestId,
    })

    if (result.kind === "error") {
      log.info("engine rejected request", { request_id: requestId, status: result.status })
      return { kind: "rejected", requestId, status: result.status, body: result.body, reason: "domain" }
    }

    if (wantsStream && result.kind === "streamed") {
      return { kind: "streamed", requestId, chunks: result.chunks, abort: () => abortController.abort() }
    }

    if (!wantsStream && result.kind === "buffered") {
      return { kind: "buffered", requestId, body: result.body }
    }

    if (result.kind === "streamed") {
      await result.chunks.return(undefined)
    }
    throw new InvariantViolation(
      "STREAM_MODE_MISMATCH",
      `stream=${wantsStream} but engine returned a ${result.kind} result`,
      { requestId, stream: wantsStream, engineResult: result.kind },
    )
  } catch (err) {
    abortController.abort()

    if (err instanceof InvariantViolation) {
      log.error("engine result contradicts stream flag", { request_id: requestId, code: err.code, ...err.context })
      return { kind: "rejected", requestId, status: 500, body: { ...INTERNAL_ERROR_BODY }, reason: "invariant" }
    }

    log.fault("invocation failed", err, { request_id: requestId })
    return { kind: "rejected", requestId, status: 500, body: { ...INTERNAL_ERROR_BODY }, reason: "internal" }
  }
}

/** Requests that name no model are labeled with the first served model name. */
function labelModel(request: ChatCompletionRequest, servedModelNames: readonly string[]): ChatCompletionRequest {
  if (request.model || servedModelNames.length === 0) return request
  return { ...request, model: servedModelNames[0] }
}
