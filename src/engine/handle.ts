// src/engine/handle.ts — The process-wide engine handle
//
// Built once by the bootstrap before the listener binds, then passed by reference
// to the HTTP layer. Request handlers only read it.

import type { EngineConfig } from "./deployment.js"
import { buildEngineArgs } from "./deployment.js"
import { EngineClient, type CompletionCallOptions, type EngineResult } from "./engine-client.js"
import { EngineProcess, type ExitListener, type SpawnFn, type EngineStatus } from "./engine-process.js"
import { EngineError } from "./errors.js"
import type { ChatCompletionRequest } from "./protocol.js"
import type { Logger } from "../logger.js"

// --- Types ---

/** What the protocol adapter needs from the engine */
export interface ChatEngine {
  /** Aliases the engine answers to; the first one labels requests that name no model */
  readonly servedModelNames: readonly string[]
  createChatCompletion(request: ChatCompletionRequest, options?: CompletionCallOptions): Promise<EngineResult>
}

export interface ModelConfig {
  id: string
  root: string
  maxModelLen: number | null
}

export interface EngineHandleOptions {
  logger: Logger
  /** Attach to an already running engine instead of spawning one */
  engineUrl?: string
  command?: string
  enginePort?: number
  startupTimeoutMs?: number
  shutdownTimeoutMs?: number
  pollIntervalMs?: number
  onUnexpectedExit?: ExitListener
  spawnFn?: SpawnFn
}

const ENGINE_BIND_HOST = "127.0.0.1"

// --- EngineHandle ---

export class EngineHandle implements ChatEngine {
  private constructor(
    readonly config: EngineConfig,
    readonly modelConfig: Readonly<ModelConfig>,
    readonly servedModelNames: readonly string[],
    private readonly client: EngineClient,
    private readonly process: EngineProcess | null,
  ) {}

  /**
   * Bring the engine up and read its model metadata.
   *
   * 1. Attach to `engineUrl`, or spawn `vllm serve` on a loopback port
   * 2. Poll GET /health until ready (timeout or early exit → EngineError)
   * 3. GET /v1/models for the model config
   *
   * Any failure is fatal to startup; a spawned engine is stopped before rethrowing.
   */
  static async initialize(config: EngineConfig, options: EngineHandleOptions): Promise<EngineHandle> {
    const log = options.logger
    const startupTimeoutMs = options.startupTimeoutMs ?? 1_200_000
    const pollIntervalMs = options.pollIntervalMs ?? 1000

    let client: EngineClient
    let engineProcess: EngineProcess | null = null

    if (options.engineUrl) {
      client = new EngineClient({ baseUrl: options.engineUrl })
      log.info("attaching to running engine", { baseUrl: client.baseUrl })
      await waitForHealthy(client, startupTimeoutMs, pollIntervalMs)
    } else {
      const port = options.enginePort ?? 8081
      const spawned = new EngineProcess(
        {
          command: options.command,
          args: buildEngineArgs(config, { host: ENGINE_BIND_HOST, port }),
          host: ENGINE_BIND_HOST,
          port,
          startupTimeoutMs,
          shutdownTimeoutMs: options.shutdownTimeoutMs,
          pollIntervalMs,
        },
        log,
        options.onUnexpectedExit,
        options.spawnFn,
      )
      const spawnedClient = new EngineClient({ baseUrl: spawned.baseUrl })
      await spawned.start(() => spawnedClient.isHealthy())
      engineProcess = spawned
      client = spawnedClient
    }

    try {
      const models = await client.listModels()
      const [first] = models.data
      const modelConfig: ModelConfig = {
        id: first.id,
        root: first.root ?? first.id,
        maxModelLen: first.max_model_len ?? null,
      }
      const servedModelNames = config.servedModelNames ?? [config.model]

      log.info("engine initialized", {
        model: modelConfig.id,
        maxModelLen: modelConfig.maxModelLen,
        servedModelNames,
        tensorParallelSize: config.tensorParallelSize,
      })

      return new EngineHandle(config, Object.freeze(modelConfig), Object.freeze([...servedModelNames]), client, engineProcess)
    } catch (err) {
      await engineProcess?.stop()
      throw err
    }
  }

  createChatCompletion(request: ChatCompletionRequest, options?: CompletionCallOptions): Promise<EngineResult> {
    return this.client.createChatCompletion(request, options)
  }

  /** Stop a spawned engine. An attached engine is left running. */
  async shutdown(): Promise<void> {
    await this.process?.stop()
  }

  /** Null when attached to an external engine */
  getProcessStatus(): EngineStatus | null {
    return this.process?.getStatus() ?? null
  }
}

async function waitForHealthy(client: EngineClient, timeoutMs: number, pollIntervalMs: number): Promise<void> {
  const deadline = Date.now() + timeoutMs
  while (Date.now() < deadline) {
    if (await client.isHealthy()) return
    await new Promise((resolve) => setTimeout(resolve, pollIntervalMs))
  }
  throw new EngineError("ENGINE_START_TIMEOUT", `Engine at ${client.baseUrl} not ready after ${timeoutMs}ms`)
}
