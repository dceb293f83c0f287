// src/engine/errors.ts — Typed error classes for startup and engine faults

/** Error codes for deployment configuration failures (always fatal at startup) */
export type ConfigErrorCode =
  | "MODEL_ID_MISSING"
  | "UNSUPPORTED_INSTANCE_TYPE"
  | "INVALID_PORT"
  | "INVALID_LOG_LEVEL"
  | "INVALID_INTEGER"
  | "TOOL_PARSER_MISSING"

/** Raised while turning deployment parameters into an EngineConfig */
export class ConfigError extends Error {
  readonly name = "ConfigError"
  readonly code: ConfigErrorCode
  readonly context: Record<string, unknown>

  constructor(code: ConfigErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(`[config] ${code}: ${message}`)
    this.code = code
    this.context = context
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    }
  }
}

/** Error codes for engine lifecycle and transport failures */
export type EngineErrorCode =
  | "ENGINE_START_TIMEOUT"
  | "ENGINE_EXITED"
  | "ENGINE_SPAWN_FAILED"
  | "ENGINE_METADATA_INVALID"
  | "ENGINE_BAD_RESPONSE"

/**
 * Engine fault that is not a domain error.
 * Fatal during startup; rendered as a 500 when it happens per request.
 */
export class EngineError extends Error {
  readonly name = "EngineError"
  readonly code: EngineErrorCode
  readonly statusCode?: number

  constructor(code: EngineErrorCode, message: string, statusCode?: number) {
    super(`[engine] ${code}: ${message}`)
    this.code = code
    this.statusCode = statusCode
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      status_code: this.statusCode,
    }
  }
}

export type InvariantViolationCode = "STREAM_MODE_MISMATCH"

/**
 * The engine's result shape contradicts the caller's streaming selection.
 * Signals a layering bug, never caller error.
 */
export class InvariantViolation extends Error {
  readonly name = "InvariantViolation"
  readonly code: InvariantViolationCode
  readonly context: Record<string, unknown>

  constructor(code: InvariantViolationCode, message: string, context: Record<string, unknown> = {}) {
    super(`[invariant] ${code}: ${message}`)
    this.code = code
    this.context = context
  }
}
