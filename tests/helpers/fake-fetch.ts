// tests/helpers/fake-fetch.ts — In-process fetch stand-in for the engine's HTTP API

import { vi } from "vitest"

export type FetchHandler = (url: string, init?: RequestInit) => Response | Promise<Response>

/** Replace global fetch; undo with vi.unstubAllGlobals() */
export function stubFetch(handler: FetchHandler) {
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url
    return handler(url, init)
  })
  vi.stubGlobal("fetch", fetchMock)
  return fetchMock
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  })
}

/** text/event-stream response; `open` leaves the stream unterminated */
export function sseResponse(parts: string[], open = false): Response {
  const encoder = new TextEncoder()
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const part of parts) controller.enqueue(encoder.encode(part))
      if (!open) controller.close()
    },
  })
  return new Response(body, { status: 200, headers: { "Content-Type": "text/event-stream" } })
}

export function modelList(id = "org/test-model", maxModelLen: number | null = 4049) {
  return { object: "list", data: [{ id, object: "model", root: id, max_model_len: maxModelLen }] }
}
