// src/engine/sse.ts — Server-Sent Events framing for the engine's streamed replies
//
// The engine streams `data: {...}` events terminated by `data: [DONE]`. Events are
// decoded as they arrive and re-framed one by one, so the gateway forwards them
// without coalescing.

export interface SSEEvent {
  eventType: string   // "message" if no event: field
  data: string
  id: string
}

interface ParserState {
  eventType: string
  dataLines: string[]
  eventId: string
}

/** Apply one non-empty line to the parser state. Comments and unknown fields are ignored. */
function applyLine(state: ParserState, line: string): void {
  if (line.startsWith(":")) return

  let fieldName: string
  let value: string
  const colonIdx = line.indexOf(":")
  if (colonIdx !== -1) {
    fieldName = line.slice(0, colonIdx)
    value = line.slice(colonIdx + 1)
    if (value.startsWith(" ")) value = value.slice(1)
  } else {
    fieldName = line
    value = ""
  }

  if (fieldName === "event") {
    state.eventType = value
  } else if (fieldName === "data") {
    state.dataLines.push(value)
  } else if (fieldName === "id" && !value.includes("\0")) {
    state.eventId = value
  }
}

function takeEvent(state: ParserState): SSEEvent | null {
  const event = state.dataLines.length > 0
    ? { eventType: state.eventType, data: state.dataLines.join("\n"), id: state.eventId }
    : null
  state.eventType = "message"
  state.dataLines = []
  state.eventId = ""
  return event
}

/**
 * W3C SSE decoder for async byte streams.
 *
 * Handles CRLF normalization, multi-line data, events split across chunks,
 * and comments. Events are dispatched on empty lines; a trailing event without
 * a blank line is flushed at end of stream.
 */
export async function* parseSSEBytes(
  stream: AsyncIterable<Uint8Array>,
): AsyncGenerator<SSEEvent> {
  const decoder = new TextDecoder("utf-8")
  const state: ParserState = { eventType: "message", dataLines: [], eventId: "" }
  let buffer = ""

  for await (const chunk of stream) {
    buffer += decoder.decode(chunk, { stream: true })
    buffer = buffer.replace(/\r\n/g, "\n").replace(/\r/g, "\n")

    let idx = buffer.indexOf("\n")
    while (idx !== -1) {
      const line = buffer.slice(0, idx)
      buffer = buffer.slice(idx + 1)

      if (line === "") {
        const event = takeEvent(state)
        if (event) yield event
      } else {
        applyLine(state, line)
      }
      idx = buffer.indexOf("\n")
    }
  }

  buffer += decoder.decode()
  if (buffer) applyLine(state, buffer)

  const last = takeEvent(state)
  if (last) yield last
}

/** Serialize one event back to wire form, terminated by a blank line. */
export function formatSSEEvent(event: SSEEvent): string {
  let out = ""
  if (event.eventType !== "message") out += `event: ${event.eventType}\n`
  if (event.id) out += `id: ${event.id}\n`
  for (const line of event.data.split("\n")) {
    out += `data: ${line}\n`
  }
  return out + "\n"
}
