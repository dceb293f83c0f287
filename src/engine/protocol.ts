// src/engine/protocol.ts — OpenAI chat-completion wire schemas and request parsing
//
// Inbound payloads are untrusted: they are checked against an explicit schema and
// rejected, never coerced. Sampling values are only type-checked here; range
// checks belong to the engine, which answers with a domain error.

import { Type, type Static, type TSchema } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"

const Nullable = <T extends TSchema>(schema: T) => Type.Optional(Type.Union([schema, Type.Null()]))

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

const ContentPart = Type.Object({
  type: Type.String({ minLength: 1 }),
})

const ChatMessage = Type.Object({
  role: Type.String({ minLength: 1 }),
  content: Nullable(Type.Union([Type.String(), Type.Array(ContentPart)])),
  name: Type.Optional(Type.String()),
  tool_call_id: Type.Optional(Type.String()),
  tool_calls: Nullable(Type.Array(Type.Object({ id: Type.String(), type: Type.String() }))),
})

const FunctionTool = Type.Object({
  type: Type.Literal("function"),
  function: Type.Object({
    name: Type.String({ minLength: 1 }),
    description: Type.Optional(Type.String()),
    parameters: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  }),
})

const NamedToolChoice = Type.Object({
  type: Type.Literal("function"),
  function: Type.Object({ name: Type.String({ minLength: 1 }) }),
})

const ToolChoice = Type.Union([
  Type.Literal("none"),
  Type.Literal("auto"),
  Type.Literal("required"),
  NamedToolChoice,
])

const StreamOptions = Type.Object({
  include_usage: Nullable(Type.Boolean()),
  continuous_usage_stats: Nullable(Type.Boolean()),
})

/** Additional properties are allowed and forwarded to the engine untouched. */
export const ChatCompletionRequestSchema = Type.Object({
  model: Nullable(Type.String()),
  messages: Type.Array(ChatMessage, { minItems: 1 }),
  stream: Nullable(Type.Boolean()),
  stream_options: Nullable(StreamOptions),
  temperature: Nullable(Type.Number()),
  top_p: Nullable(Type.Number()),
  max_tokens: Nullable(Type.Integer()),
  max_completion_tokens: Nullable(Type.Integer()),
  n: Nullable(Type.Integer()),
  stop: Nullable(Type.Union([Type.String(), Type.Array(Type.String())])),
  seed: Nullable(Type.Integer()),
  presence_penalty: Nullable(Type.Number()),
  frequency_penalty: Nullable(Type.Number()),
  logprobs: Nullable(Type.Boolean()),
  top_logprobs: Nullable(Type.Integer()),
  logit_bias: Nullable(Type.Record(Type.String(), Type.Number())),
  response_format: Nullable(Type.Object({ type: Type.String() })),
  tools: Nullable(Type.Array(FunctionTool)),
  tool_choice: Nullable(ToolChoice),
  parallel_tool_calls: Nullable(Type.Boolean()),
  user: Nullable(Type.String()),
})

export type ChatCompletionRequest = Static<typeof ChatCompletionRequestSchema>
export type ChatMessage = Static<typeof ChatMessage>

export type ParseResult =
  | { ok: true; request: ChatCompletionRequest }
  | { ok: false; details: string }

/**
 * Decode and validate a raw /invocations body.
 * Failures carry the text reported back to the caller as `details`.
 */
export function parseChatCompletionRequest(raw: string): ParseResult {
  let payload: unknown
  try {
    payload = JSON.parse(raw)
  } catch (err) {
    return { ok: false, details: err instanceof Error ? err.message : String(err) }
  }

  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    return { ok: false, details: "Request body must be a JSON object" }
  }

  if (!Value.Check(ChatCompletionRequestSchema, payload)) {
    const first = Value.Errors(ChatCompletionRequestSchema, payload).First()
    const details = first ? `${first.path || "/"}: ${first.message}` : "Request does not match the chat completion schema"
    return { ok: false, details }
  }

  const violation = checkCrossFieldRules(payload)
  if (violation) return { ok: false, details: violation }

  return { ok: true, request: payload }
}

function checkCrossFieldRules(request: ChatCompletionRequest): string | null {
  if (request.stream_options != null && request.stream !== true) {
    return "Stream options can only be defined when `stream=True`."
  }

  const choice = request.tool_choice
  if (choice != null && choice !== "none" && choice !== "auto") {
    const tools = request.tools ?? []
    if (tools.length === 0) {
      return "When using `tool_choice`, `tools` must be set."
    }
    if (typeof choice === "object" && !tools.some((t) => t.function.name === choice.function.name)) {
      return `Tool "${choice.function.name}" in \`tool_choice\` is not one of the declared \`tools\`.`
    }
  }

  if (request.top_logprobs != null && request.logprobs !== true) {
    return "When using `top_logprobs`, `logprobs` must be set to true."
  }

  return null
}

// ---------------------------------------------------------------------------
// Engine replies
// ---------------------------------------------------------------------------

export const ChatCompletionResponseSchema = Type.Object({
  id: Type.String(),
  object: Type.Literal("chat.completion"),
  created: Type.Number(),
  model: Type.String(),
  choices: Type.Array(Type.Object({ index: Type.Integer() })),
})

export interface ChatCompletionChoice {
  index: number
  message?: { role: string; content: string | null; [key: string]: unknown }
  finish_reason?: string | null
  [key: string]: unknown
}

/** Buffered completion; extra engine fields (prompt_logprobs, ...) ride along. */
export interface ChatCompletionResponse {
  id: string
  object: "chat.completion"
  created: number
  model: string
  choices: ChatCompletionChoice[]
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number }
  [key: string]: unknown
}

/** Engine-declared error body, passed through verbatim */
export type EngineErrorBody = Record<string, unknown>

export const ModelListSchema = Type.Object({
  data: Type.Array(
    Type.Object({
      id: Type.String(),
      root: Nullable(Type.String()),
      max_model_len: Nullable(Type.Integer()),
    }),
    { minItems: 1 },
  ),
})

export type ModelList = Static<typeof ModelListSchema>

export function isChatCompletionResponse(value: unknown): value is ChatCompletionResponse {
  return Value.Check(ChatCompletionResponseSchema, value)
}

export function isEngineErrorBody(value: unknown): value is EngineErrorBody {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
