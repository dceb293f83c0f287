// tests/helpers/fake-engine.ts — In-process stand-in for the engine handle

import type { ChatEngine } from "../../src/engine/handle.js"
import type { CompletionCallOptions, EngineResult } from "../../src/engine/engine-client.js"
import type { ChatCompletionRequest, ChatCompletionResponse } from "../../src/engine/protocol.js"
import { createLogger, type LogEntry, type Logger } from "../../src/logger.js"

export type Responder = (request: ChatCompletionRequest) => EngineResult | Promise<EngineResult>

export class FakeEngine implements ChatEngine {
  readonly calls: Array<{ request: ChatCompletionRequest; options?: CompletionCallOptions }> = []

  constructor(
    private readonly respond: Responder,
    readonly servedModelNames: readonly string[] = ["test-model"],
  ) {}

  async createChatCompletion(request: ChatCompletionRequest, options?: CompletionCallOptions): Promise<EngineResult> {
    this.calls.push({ request, options })
    return this.respond(request)
  }
}

export function completion(content = "Hello! How can I help?"): ChatCompletionResponse {
  return {
    id: "chatcmpl-test-1",
    object: "chat.completion",
    created: 1_700_000_000,
    model: "test-model",
    choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
    usage: { prompt_tokens: 5, completion_tokens: 7, total_tokens: 12 },
  }
}

/** Tracks how far a fake stream was consumed */
export interface StreamProbe {
  yielded: number
  finished: boolean
  closed: boolean
}

/**
 * Fake engine stream. `closed` flips when the generator is torn down,
 * whether it ran to the end or the consumer stopped early.
 */
export function fakeStream(chunks: string[], gate?: Promise<void>): { chunks: AsyncGenerator<string, void, undefined>; probe: StreamProbe } {
  const probe: StreamProbe = { yielded: 0, finished: false, closed: false }
  async function* generate(): AsyncGenerator<string, void, undefined> {
    try {
      for (const [i, chunk] of chunks.entries()) {
        if (i === 1 && gate) await gate
        probe.yielded++
        yield chunk
      }
      probe.finished = true
    } finally {
      probe.closed = true
    }
  }
  return { chunks: generate(), probe }
}

export function sseData(payload: unknown): string {
  return `data: ${typeof payload === "string" ? payload : JSON.stringify(payload)}\n\n`
}

/** Logger that keeps parsed entries in memory */
export function captureLogger(component = "test"): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const logger = createLogger(component, "trace", (line) => {
    entries.push(JSON.parse(line))
  })
  return { logger, entries }
}
