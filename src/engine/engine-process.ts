// src/engine/engine-process.ts — Lifecycle of the spawned `vllm serve` process

import { spawn, type SpawnOptions } from "node:child_process"
import type { Readable } from "node:stream"
import { EngineError } from "./errors.js"
import type { Logger } from "../logger.js"

// --- Types ---

/** The parts of ChildProcess the manager touches */
export interface EngineChild {
  readonly pid?: number
  readonly exitCode: number | null
  readonly stdout: Readable | null
  readonly stderr: Readable | null
  on(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this
  on(event: "error", listener: (err: Error) => void): this
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this
  kill(signal?: NodeJS.Signals): boolean
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => EngineChild

export interface EngineProcessConfig {
  command: string                      // Default: "vllm"
  args: string[]
  host: string                         // Default: "127.0.0.1"
  port: number                         // Default: 8081
  startupTimeoutMs: number             // Default: 1_200_000 (weights load slowly)
  shutdownTimeoutMs: number            // Default: 30_000
  pollIntervalMs: number               // Default: 1000
  env: Record<string, string>
}

export type EngineState = "stopped" | "starting" | "running" | "stopping"

export interface EngineStatus {
  state: EngineState
  pid: number | null
  uptimeMs: number
  baseUrl: string
}

export type ExitListener = (code: number | null, signal: NodeJS.Signals | null) => void

// --- Default Config ---

export function defaultEngineProcessConfig(
  overrides: Partial<EngineProcessConfig> & { args: string[] },
): EngineProcessConfig {
  return {
    command: overrides.command ?? "vllm",
    args: overrides.args,
    host: overrides.host ?? "127.0.0.1",
    port: overrides.port ?? 8081,
    startupTimeoutMs: overrides.startupTimeoutMs ?? 1_200_000,
    shutdownTimeoutMs: overrides.shutdownTimeoutMs ?? 30_000,
    pollIntervalMs: overrides.pollIntervalMs ?? 1000,
    env: overrides.env ?? {},
  }
}

// --- EngineProcess ---

/**
 * Owns one engine child process.
 *
 * There is no auto-restart: the handle built on top of this process lives for
 * the whole gateway lifetime, so an unexpected exit after startup is reported
 * to `onUnexpectedExit` and the gateway decides how to die.
 */
export class EngineProcess {
  private child: EngineChild | null = null
  private state: EngineState = "stopped"
  private startedAt = 0
  private spawnError: Error | null = null
  private exitInfo: { code: number | null; signal: NodeJS.Signals | null } | null = null
  private config: EngineProcessConfig

  constructor(
    config: Partial<EngineProcessConfig> & { args: string[] },
    private readonly logger: Logger,
    private readonly onUnexpectedExit: ExitListener = () => {},
    private readonly spawnFn: SpawnFn = spawn,
  ) {
    this.config = defaultEngineProcessConfig(config)
  }

  /**
   * Spawn the engine and wait until `probe` reports ready.
   *
   * Fails with EngineError when the executable cannot be spawned, the process
   * exits while loading, or the startup deadline passes (the child is killed).
   */
  async start(probe: () => Promise<boolean>): Promise<void> {
    if (this.state !== "stopped") {
      return
    }

    this.state = "starting"
    this.startedAt = Date.now()
    this.spawnError = null
    this.exitInfo = null

    const { command, args, env } = this.config
    this.logger.info("spawning engine", { command, args })

    const child = this.spawnFn(command, args, {
      env: { ...process.env, ...env },
      stdio: ["ignore", "pipe", "pipe"],
    })
    this.child = child

    relayLines(child.stdout, (line) => this.logger.info(line))
    relayLines(child.stderr, (line) => this.logger.warn(line))

    child.on("error", (err) => {
      this.spawnError = err
      this.child = null
      this.state = "stopped"
    })

    child.on("exit", (code, signal) => {
      const previous = this.state
      this.child = null
      this.state = "stopped"
      this.exitInfo = { code, signal }

      if (previous === "running") {
        this.logger.error("engine exited unexpectedly", { pid: child.pid, code, signal })
        this.onUnexpectedExit(code, signal)
      }
    })

    await this.waitForReady(probe)
    this.state = "running"
    this.logger.info("engine ready", { pid: child.pid, baseUrl: this.baseUrl })
  }

  /**
   * Graceful shutdown: SIGTERM, then SIGKILL after shutdownTimeoutMs.
   */
  async stop(): Promise<void> {
    const child = this.child
    if (this.state === "stopped" || !child) {
      this.state = "stopped"
      return
    }

    this.state = "stopping"

    return new Promise<void>((resolve) => {
      const timeout = setTimeout(() => {
        if (child.exitCode === null) {
          this.logger.warn("engine shutdown timeout, sending SIGKILL", { pid: child.pid })
          child.kill("SIGKILL")
        }
        cleanup()
      }, this.config.shutdownTimeoutMs)
      timeout.unref()

      const cleanup = () => {
        clearTimeout(timeout)
        this.child = null
        this.state = "stopped"
        resolve()
      }

      child.once("exit", cleanup)
      child.kill("SIGTERM")
    })
  }

  getStatus(): EngineStatus {
    return {
      state: this.state,
      pid: this.child?.pid ?? null,
      uptimeMs: this.state === "running" ? Date.now() - this.startedAt : 0,
      baseUrl: this.baseUrl,
    }
  }

  /** Base URL of the engine API (e.g., "http://127.0.0.1:8081") */
  get baseUrl(): string {
    return `http://${this.config.host}:${this.config.port}`
  }

  get isRunning(): boolean {
    return this.state === "running"
  }

  // --- Private ---

  private async waitForReady(probe: () => Promise<boolean>): Promise<void> {
    const deadline = Date.now() + this.config.startupTimeoutMs

    while (Date.now() < deadline) {
      this.throwIfGone()
      if (await probe()) {
        this.throwIfGone()
        return
      }
      await sleep(this.config.pollIntervalMs)
    }

    this.child?.kill("SIGKILL")
    this.child = null
    this.state = "stopped"
    throw new EngineError(
      "ENGINE_START_TIMEOUT",
      `Engine not ready after ${this.config.startupTimeoutMs}ms`,
    )
  }

  private throwIfGone(): void {
    if (this.spawnError) {
      throw new EngineError("ENGINE_SPAWN_FAILED", `Cannot spawn ${this.config.command}: ${this.spawnError.message}`)
    }
    if (this.exitInfo) {
      const { code, signal } = this.exitInfo
      throw new EngineError("ENGINE_EXITED", `Engine exited during startup (code=${code}, signal=${signal})`)
    }
  }
}

/** Emit complete lines; a line split across chunks is held until its newline arrives. */
function relayLines(stream: Readable | null, emit: (line: string) => void): void {
  if (!stream) return
  let pending = ""
  const flush = (line: string) => {
    if (line.trim()) emit(line.trimEnd())
  }

  stream.setEncoding("utf8")
  stream.on("data", (data: string) => {
    const lines = (pending + data).split("\n")
    pending = lines.pop() ?? ""
    for (const line of lines) flush(line)
  })
  stream.on("end", () => {
    flush(pending)
    pending = ""
  })
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
