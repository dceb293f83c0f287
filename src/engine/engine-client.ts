// src/engine/engine-client.ts — HTTP client for the engine's OpenAI-compatible API
//
// Uses native fetch (Node 20). The engine reports domain errors (context length,
// bad sampling values, unknown model) as non-2xx JSON bodies; those come back as
// values, not exceptions.

import { Value } from "@sinclair/typebox/value"
import { EngineError } from "./errors.js"
import {
  ModelListSchema,
  isChatCompletionResponse,
  isEngineErrorBody,
  type ChatCompletionRequest,
  type ChatCompletionResponse,
  type EngineErrorBody,
  type ModelList,
} from "./protocol.js"
import { formatSSEEvent, parseSSEBytes } from "./sse.js"

// --- Types ---

export interface EngineClientConfig {
  baseUrl: string                      // e.g., "http://127.0.0.1:8081"
  probeTimeoutMs: number               // Default: 5000
}

/** What one engine call produced, tagged by shape */
export type EngineResult =
  | { kind: "buffered"; body: ChatCompletionResponse }
  | { kind: "streamed"; chunks: AsyncGenerator<string, void, undefined> }
  | { kind: "error"; status: number; body: EngineErrorBody }

export interface CompletionCallOptions {
  /** Aborts the upstream request; a streamed result stops yielding */
  signal?: AbortSignal
  /** Sent as X-Request-Id so engine logs line up with ours */
  requestId?: string
}

// --- EngineClient ---

export class EngineClient {
  private config: EngineClientConfig

  constructor(config: Partial<EngineClientConfig> & { baseUrl: string }) {
    this.config = {
      baseUrl: config.baseUrl.replace(/\/+$/, ""),
      probeTimeoutMs: config.probeTimeoutMs ?? 5000,
    }
  }

  get baseUrl(): string {
    return this.config.baseUrl
  }

  /**
   * POST /v1/chat/completions.
   *
   * The result shape follows what the engine actually sent back:
   *   non-2xx + JSON object   → error (status and body untouched)
   *   text/event-stream       → streamed, one chunk per SSE event
   *   JSON chat completion    → buffered
   * Anything else throws EngineError. Transport failures propagate as-is.
   */
  async createChatCompletion(
    request: ChatCompletionRequest,
    options: CompletionCallOptions = {},
  ): Promise<EngineResult> {
    const abortController = new AbortController()
    if (options.signal) {
      if (options.signal.aborted) {
        abortController.abort()
      } else {
        options.signal.addEventListener("abort", () => abortController.abort(), { once: true })
      }
    }

    const response = await fetch(`${this.config.baseUrl}/v1/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...(options.requestId ? { "X-Request-Id": options.requestId } : {}),
      },
      body: JSON.stringify(request),
      signal: abortController.signal,
    })

    if (!response.ok) {
      const text = await response.text()
      const parsed = parseJson(text)
      if (isEngineErrorBody(parsed)) {
        return { kind: "error", status: response.status, body: parsed }
      }
      throw new EngineError(
        "ENGINE_BAD_RESPONSE",
        `Engine HTTP ${response.status}: ${text.slice(0, 200)}`,
        response.status,
      )
    }

    const contentType = response.headers.get("content-type") ?? ""
    if (contentType.includes("text/event-stream")) {
      if (!response.body) {
        throw new EngineError("ENGINE_BAD_RESPONSE", "Engine stream has no body")
      }
      return { kind: "streamed", chunks: relayEvents(response.body, abortController) }
    }

    const body = parseJson(await response.text())
    if (!isChatCompletionResponse(body)) {
      throw new EngineError("ENGINE_BAD_RESPONSE", "Engine reply is not a chat completion")
    }
    return { kind: "buffered", body }
  }

  /** GET /health — true once the engine accepts requests */
  async isHealthy(): Promise<boolean> {
    try {
      const response = await fetch(`${this.config.baseUrl}/health`, {
        signal: AbortSignal.timeout(this.config.probeTimeoutMs),
      })
      return response.ok
    } catch {
      // Not listening yet
      return false
    }
  }

  /** GET /v1/models — served model metadata */
  async listModels(): Promise<ModelList> {
    const response = await fetch(`${this.config.baseUrl}/v1/models`, {
      signal: AbortSignal.timeout(this.config.probeTimeoutMs),
    })
    if (!response.ok) {
      throw new EngineError("ENGINE_METADATA_INVALID", `GET /v1/models returned ${response.status}`, response.status)
    }
    const body = parseJson(await response.text())
    if (!Value.Check(ModelListSchema, body)) {
      throw new EngineError("ENGINE_METADATA_INVALID", "GET /v1/models returned an unexpected model list")
    }
    return body
  }
}

// --- Helpers ---

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

/**
 * Re-frame upstream SSE events one at a time, in arrival order.
 * If the consumer stops before the stream ends, the upstream request is aborted.
 */
async function* relayEvents(
  body: ReadableStream<Uint8Array>,
  abortController: AbortController,
): AsyncGenerator<string, void, undefined> {
  let completed = false
  try {
    for await (const event of parseSSEBytes(readChunks(body))) {
      yield formatSSEEvent(event)
    }
    completed = true
  } finally {
    if (!completed) {
      abortController.abort()
    }
  }
}

async function* readChunks(body: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array> {
  const reader = body.getReader()
  try {
    while (true) {
      const { done, value } = await reader.read()
      if (done) return
      yield value
    }
  } finally {
    reader.releaseLock()
  }
}
