// src/gateway/request-logger.ts — Per-request log line with truncated prompt text

import type { ChatCompletionRequest, ChatMessage } from "../engine/protocol.js"
import type { Logger } from "../logger.js"

export interface RequestLoggerOptions {
  /** Max prompt characters logged; undefined logs the whole prompt */
  maxLogLen?: number
}

export class RequestLogger {
  constructor(
    private readonly logger: Logger,
    private readonly options: RequestLoggerOptions = {},
  ) {}

  logRequest(requestId: string, request: ChatCompletionRequest): void {
    this.logger.info("received request", {
      request_id: requestId,
      model: request.model ?? null,
      stream: request.stream === true,
      messages: request.messages.length,
      prompt: truncate(promptText(request.messages), this.options.maxLogLen),
    })
  }
}

/** Text content of all messages, one line per message */
export function promptText(messages: ChatMessage[]): string {
  return messages
    .map((m) => `${m.role}: ${contentText(m.content)}`)
    .join("\n")
}

function contentText(content: ChatMessage["content"]): string {
  if (content == null) return ""
  if (typeof content === "string") return content
  return content
    .map((part) => ("text" in part && typeof part.text === "string" ? part.text : `<${part.type}>`))
    .join(" ")
}

export function truncate(text: string, maxLen: number | undefined): string {
  if (maxLen === undefined || text.length <= maxLen) return text
  return text.slice(0, Math.max(0, maxLen))
}
