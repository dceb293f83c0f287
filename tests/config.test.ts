// tests/config.test.ts — Environment loading

import { describe, it, expect } from "vitest"
import { loadConfig } from "../src/config.js"
import { ConfigError } from "../src/engine/errors.js"

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({})

    expect(config.deployment).toEqual({
      instanceType: undefined,
      modelId: undefined,
      tokenizerId: undefined,
      host: "0.0.0.0",
      port: 8000,
      logLevel: "info",
      servedModelNames: [],
      chatTemplate: undefined,
      responseRole: undefined,
      enableAutoToolChoice: false,
      toolCallParser: undefined,
    })
    expect(config.requestLog).toEqual({ enabled: true, maxLogLen: undefined })
    expect(config.engine).toEqual({
      url: undefined,
      command: "vllm",
      port: 8081,
      startupTimeoutMs: 1_200_000,
      shutdownTimeoutMs: 30_000,
    })
  })

  it("reads deployment parameters", () => {
    const config = loadConfig({
      MODEL_ID: "org/test-model",
      TOKENIZER: "org/tokenizer",
      INSTANCE_TYPE: "ml.g5.12xlarge",
      API_HOST: "127.0.0.1",
      API_PORT: "9000",
      SERVED_MODEL_NAME: "chat, chat-v2,",
      ENABLE_AUTO_TOOL_CHOICE: "true",
      TOOL_CALL_PARSER: "hermes",
    })

    expect(config.deployment.modelId).toBe("org/test-model")
    expect(config.deployment.tokenizerId).toBe("org/tokenizer")
    expect(config.deployment.instanceType).toBe("ml.g5.12xlarge")
    expect(config.deployment.host).toBe("127.0.0.1")
    expect(config.deployment.port).toBe(9000)
    expect(config.deployment.servedModelNames).toEqual(["chat", "chat-v2"])
    expect(config.deployment.enableAutoToolChoice).toBe(true)
    expect(config.deployment.toolCallParser).toBe("hermes")
  })

  it("prefers UVICORN_LOG_LEVEL over LOG_LEVEL", () => {
    expect(loadConfig({ LOG_LEVEL: "debug" }).deployment.logLevel).toBe("debug")
    expect(loadConfig({ LOG_LEVEL: "debug", UVICORN_LOG_LEVEL: "warning" }).deployment.logLevel).toBe("warning")
  })

  it("configures request logging", () => {
    expect(loadConfig({ DISABLE_LOG_REQUESTS: "true" }).requestLog.enabled).toBe(false)
    expect(loadConfig({ MAX_LOG_LEN: "120" }).requestLog.maxLogLen).toBe(120)
  })

  it("reads engine attach and spawn settings", () => {
    const config = loadConfig({
      ENGINE_URL: "http://127.0.0.1:9100",
      ENGINE_COMMAND: "/opt/venv/bin/vllm",
      ENGINE_PORT: "9100",
      ENGINE_STARTUP_TIMEOUT_MS: "5000",
      ENGINE_SHUTDOWN_TIMEOUT_MS: "1000",
    })
    expect(config.engine).toEqual({
      url: "http://127.0.0.1:9100",
      command: "/opt/venv/bin/vllm",
      port: 9100,
      startupTimeoutMs: 5000,
      shutdownTimeoutMs: 1000,
    })
  })

  it("treats an empty ENGINE_URL as unset", () => {
    expect(loadConfig({ ENGINE_URL: "" }).engine.url).toBeUndefined()
  })

  it("fails fast on non-numeric integers", () => {
    expect(() => loadConfig({ API_PORT: "eighty" })).toThrow(ConfigError)
    expect(() => loadConfig({ ENGINE_PORT: "x" })).toThrow(/ENGINE_PORT must be a valid integer/)
  })
})
