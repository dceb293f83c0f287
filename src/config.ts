// src/config.ts — Configuration loader from environment variables
//
// Collects raw deployment parameters only. Validation and the deployment policy
// live in engine/deployment.ts so they can be tested without an environment.

import type { DeploymentParams } from "./engine/deployment.js"
import { ConfigError } from "./engine/errors.js"

export interface GatewayConfig {
  deployment: DeploymentParams

  /** Request logging (prompt text included) */
  requestLog: {
    enabled: boolean
    /** Max characters of prompt text per entry; undefined = unlimited */
    maxLogLen: number | undefined
  }

  engine: {
    /** When set, attach to this engine instead of spawning one */
    url: string | undefined
    command: string
    port: number
    startupTimeoutMs: number
    shutdownTimeoutMs: number
  }
}

type Env = Record<string, string | undefined>

/** Parse an integer from an environment variable, failing fast on NaN. */
function parseIntEnv(env: Env, envKey: string, fallback: string): number {
  const raw = env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new ConfigError("INVALID_INTEGER", `${envKey} must be a valid integer (got "${raw}")`, { envKey })
  }
  return value
}

function parseList(value: string | undefined): string[] {
  return (value ?? "").split(",").map((s) => s.trim()).filter(Boolean)
}

export function loadConfig(env: Env = process.env): GatewayConfig {
  const maxLogLen = env.MAX_LOG_LEN ? parseIntEnv(env, "MAX_LOG_LEN", "0") : undefined

  return {
    deployment: {
      instanceType: env.INSTANCE_TYPE,
      modelId: env.MODEL_ID,
      tokenizerId: env.TOKENIZER,
      host: env.API_HOST ?? "0.0.0.0",
      port: parseIntEnv(env, "API_PORT", "8000"),
      logLevel: env.UVICORN_LOG_LEVEL ?? env.LOG_LEVEL ?? "info",
      servedModelNames: parseList(env.SERVED_MODEL_NAME),
      chatTemplate: env.CHAT_TEMPLATE,
      responseRole: env.RESPONSE_ROLE,
      enableAutoToolChoice: env.ENABLE_AUTO_TOOL_CHOICE === "true",
      toolCallParser: env.TOOL_CALL_PARSER,
    },

    requestLog: {
      enabled: env.DISABLE_LOG_REQUESTS !== "true",
      maxLogLen,
    },

    engine: {
      url: env.ENGINE_URL || undefined,
      command: env.ENGINE_COMMAND ?? "vllm",
      port: parseIntEnv(env, "ENGINE_PORT", "8081"),
      startupTimeoutMs: parseIntEnv(env, "ENGINE_STARTUP_TIMEOUT_MS", "1200000"),
      shutdownTimeoutMs: parseIntEnv(env, "ENGINE_SHUTDOWN_TIMEOUT_MS", "30000"),
    },
  }
}
