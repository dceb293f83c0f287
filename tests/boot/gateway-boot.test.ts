// tests/boot/gateway-boot.test.ts — Startup sequencing against an attached engine

import { describe, it, expect, afterEach, vi } from "vitest"
import { startup } from "../../src/boot/gateway-boot.js"
import { loadConfig } from "../../src/config.js"
import { ConfigError } from "../../src/engine/errors.js"
import type { LogEntry } from "../../src/logger.js"
import { completion } from "../helpers/fake-engine.js"
import { jsonResponse, modelList, stubFetch } from "../helpers/fake-fetch.js"

function stubAttachedEngine() {
  return stubFetch((url) => {
    if (url.endsWith("/health")) return new Response(null, { status: 200 })
    if (url.endsWith("/v1/models")) return jsonResponse(modelList())
    return jsonResponse(completion())
  })
}

function sink() {
  const entries: LogEntry[] = []
  return { entries, logSink: (line: string) => entries.push(JSON.parse(line)) }
}

const baseEnv = {
  MODEL_ID: "org/test-model",
  INSTANCE_TYPE: "ml.g5.12xlarge",
  ENGINE_URL: "http://engine.test:8081",
}

afterEach(() => {
  vi.unstubAllGlobals()
})

describe("startup", () => {
  it("resolves config, attaches to the engine and builds the app", async () => {
    stubAttachedEngine()
    const { entries, logSink } = sink()
    const started = await startup(loadConfig({ ...baseEnv, API_PORT: "8080" }), { onEngineExit: () => {}, logSink })

    expect(started.host).toBe("0.0.0.0")
    expect(started.port).toBe(8080)
    expect(started.engine.config.tensorParallelSize).toBe(4)
    expect(started.engine.getProcessStatus()).toBeNull()

    const resolved = entries.find((e) => e.message === "resolved engine config")
    expect(resolved?.tensorParallelSize).toBe(4)
    expect(resolved?.maxModelLen).toBe(4049)

    const res = await started.app.request("/ping")
    expect(res.status).toBe(200)
  })

  it("serves invocations and logs requests by default", async () => {
    stubAttachedEngine()
    const { entries, logSink } = sink()
    const started = await startup(loadConfig(baseEnv), { onEngineExit: () => {}, logSink })

    const res = await started.app.request("/invocations", {
      method: "POST",
      body: JSON.stringify({ messages: [{ role: "user", content: "Hello" }] }),
    })

    expect(res.status).toBe(200)
    const logged = entries.find((e) => e.message === "received request")
    expect(logged?.component).toBe("requests")
    expect(logged?.model).toBe("org/test-model")
  })

  it("skips request logs when disabled", async () => {
    stubAttachedEngine()
    const { entries, logSink } = sink()
    const started = await startup(loadConfig({ ...baseEnv, DISABLE_LOG_REQUESTS: "true" }), { onEngineExit: () => {}, logSink })

    await started.app.request("/invocations", {
      method: "POST",
      body: JSON.stringify({ messages: [{ role: "user", content: "Hello" }] }),
    })
    expect(entries.some((e) => e.message === "received request")).toBe(false)
  })

  it("fails before contacting the engine when MODEL_ID is missing", async () => {
    const fetchMock = stubAttachedEngine()
    const env = { INSTANCE_TYPE: baseEnv.INSTANCE_TYPE, ENGINE_URL: baseEnv.ENGINE_URL }
    await expect(startup(loadConfig(env), { onEngineExit: () => {} })).rejects.toBeInstanceOf(ConfigError)
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it("fails on an unsupported instance type", async () => {
    stubAttachedEngine()
    await expect(startup(loadConfig({ ...baseEnv, INSTANCE_TYPE: "ml.unknown" }), { onEngineExit: () => {} }))
      .rejects.toThrow("UNSUPPORTED_INSTANCE_TYPE")
  })
})
