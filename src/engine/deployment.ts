// src/engine/deployment.ts — Deployment parameters → EngineConfig
//
// Pure and deterministic: no env reads, no I/O. src/config.ts collects the raw
// parameters, this module validates them and fixes the deployment policy.

import { ConfigError } from "./errors.js"
import { isLogLevel, type LogLevel } from "../logger.js"

// --- Hardware table ---

/** GPUs per SageMaker instance type; the tensor-parallel degree for the engine */
export const INSTANCE_TO_GPUS: Readonly<Record<string, number>> = Object.freeze({
  "ml.g5.4xlarge": 1,
  "ml.g6.4xlarge": 1,
  "ml.g5.12xlarge": 4,
  "ml.g6.12xlarge": 4,
  "ml.g5.48xlarge": 8,
  "ml.g6.48xlarge": 8,
  "ml.p4d.24xlarge": 8,
  "ml.p4de.24xlarge": 8,
  "ml.p5.48xlarge": 8,
})

export const DEFAULT_INSTANCE_TYPE = "ml.g6.4xlarge"

// --- Deployment policy ---
// Fixed for this deployment profile. Callers cannot override these.

export const TRUST_REMOTE_CODE = true
export const MAX_MODEL_LEN = 4049
export const LIMIT_MM_PER_PROMPT: Readonly<Record<string, number>> = Object.freeze({ image: 2 })
export const DEFAULT_RESPONSE_ROLE = "assistant"

// --- Types ---

export interface DeploymentParams {
  instanceType?: string
  modelId?: string
  tokenizerId?: string
  host: string
  port: number
  logLevel: string
  /** Aliases the engine answers to; the model id is used when empty */
  servedModelNames?: string[]
  chatTemplate?: string
  responseRole?: string
  enableAutoToolChoice?: boolean
  toolCallParser?: string
}

export interface EngineConfig {
  readonly model: string
  readonly tokenizer?: string
  readonly tensorParallelSize: number
  readonly host: string
  readonly port: number
  readonly logLevel: LogLevel
  readonly trustRemoteCode: boolean
  readonly maxModelLen: number
  readonly limitMmPerPrompt: Readonly<Record<string, number>>
  readonly servedModelNames?: readonly string[]
  readonly chatTemplate?: string
  readonly responseRole: string
  readonly enableAutoToolChoice: boolean
  readonly toolCallParser?: string
}

// --- Resolver ---

/**
 * Look up the tensor-parallel degree for an instance type.
 * Unknown types fail; there is no fallback degree.
 */
export function getNumGpus(instanceType: string): number {
  const gpus = Object.hasOwn(INSTANCE_TO_GPUS, instanceType) ? INSTANCE_TO_GPUS[instanceType] : undefined
  if (gpus === undefined) {
    throw new ConfigError(
      "UNSUPPORTED_INSTANCE_TYPE",
      `Instance type ${instanceType} is not supported`,
      { instanceType, supported: Object.keys(INSTANCE_TO_GPUS) },
    )
  }
  return gpus
}

export function resolveEngineConfig(params: DeploymentParams): EngineConfig {
  const model = params.modelId?.trim()
  if (!model) {
    throw new ConfigError("MODEL_ID_MISSING", "MODEL_ID must be provided")
  }

  // Looked up exactly as given; only an unset value takes the default
  const instanceType = params.instanceType ?? DEFAULT_INSTANCE_TYPE
  const tensorParallelSize = getNumGpus(instanceType)

  if (!Number.isInteger(params.port) || params.port < 1 || params.port > 65535) {
    throw new ConfigError("INVALID_PORT", `Port must be an integer in 1..65535 (got ${params.port})`, {
      port: params.port,
    })
  }

  const logLevel = params.logLevel.trim().toLowerCase()
  if (!isLogLevel(logLevel)) {
    throw new ConfigError("INVALID_LOG_LEVEL", `Unknown log level "${params.logLevel}"`, {
      logLevel: params.logLevel,
    })
  }

  const enableAutoToolChoice = params.enableAutoToolChoice ?? false
  const toolCallParser = params.toolCallParser?.trim() || undefined
  if (enableAutoToolChoice && !toolCallParser) {
    throw new ConfigError("TOOL_PARSER_MISSING", "Auto tool choice requires TOOL_CALL_PARSER")
  }

  const tokenizer = params.tokenizerId?.trim() || undefined
  const servedModelNames = (params.servedModelNames ?? []).map((n) => n.trim()).filter(Boolean)
  const chatTemplate = params.chatTemplate || undefined

  return Object.freeze({
    model,
    ...(tokenizer ? { tokenizer } : {}),
    tensorParallelSize,
    host: params.host,
    port: params.port,
    logLevel,
    trustRemoteCode: TRUST_REMOTE_CODE,
    maxModelLen: MAX_MODEL_LEN,
    limitMmPerPrompt: LIMIT_MM_PER_PROMPT,
    ...(servedModelNames.length > 0 ? { servedModelNames: Object.freeze(servedModelNames) } : {}),
    ...(chatTemplate ? { chatTemplate } : {}),
    responseRole: params.responseRole?.trim() || DEFAULT_RESPONSE_ROLE,
    enableAutoToolChoice,
    ...(toolCallParser ? { toolCallParser } : {}),
  })
}

// --- Engine argv ---

/**
 * Render the `vllm serve` arguments for an engine bound to `bind`.
 * The engine listens on its own loopback address; config.host/port belong to
 * the gateway listener.
 */
export function buildEngineArgs(config: EngineConfig, bind: { host: string; port: number }): string[] {
  const args = [
    "serve", config.model,
    "--host", bind.host,
    "--port", String(bind.port),
    "--tensor-parallel-size", String(config.tensorParallelSize),
    "--uvicorn-log-level", config.logLevel,
  ]

  if (config.tokenizer) args.push("--tokenizer", config.tokenizer)
  if (config.trustRemoteCode) args.push("--trust-remote-code")

  args.push("--max-model-len", String(config.maxModelLen))

  const mmLimits = Object.entries(config.limitMmPerPrompt).map(([modality, n]) => `${modality}=${n}`)
  if (mmLimits.length > 0) args.push("--limit-mm-per-prompt", mmLimits.join(","))

  if (config.servedModelNames) args.push("--served-model-name", ...config.servedModelNames)
  if (config.chatTemplate) args.push("--chat-template", config.chatTemplate)
  args.push("--response-role", config.responseRole)
  if (config.enableAutoToolChoice) args.push("--enable-auto-tool-choice")
  if (config.toolCallParser) args.push("--tool-call-parser", config.toolCallParser)

  return args
}
