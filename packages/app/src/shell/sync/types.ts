import type * as Fx from "effect"

import type { ConfigError } from "../../core/config.js"
import type { PlanError } from "../../core/plan-error.js"

export interface FileError {
  readonly _tag: "FileError"
  readonly path: string
  readonly reason: string
}

export interface UsageError {
  readonly _tag: "UsageError"
  readonly reason: string
}

export interface ApiError {
  readonly _tag: "ApiError"
  readonly operation: string
  readonly status: number | undefined
  readonly body: string
}

export interface FetchError {
  readonly _tag: "FetchError"
  readonly operation: string
  readonly cause: ApiError
}

export interface ApplyError {
  readonly _tag: "ApplyError"
  readonly operation: string
  readonly entity: string
  readonly status: number | undefined
  readonly body: string
}

export type ApplyPhase = "experiences" | "test suites" | "tags and systems" | "archive"

export interface Cancelled {
  readonly _tag: "Cancelled"
  readonly phase: ApplyPhase
  readonly completed: number
}

export interface SyncOptions {
  readonly cwd: string
  readonly project?: string
  readonly experienceConfig?: string
  readonly clone: boolean
  readonly verbose: boolean
  readonly updateConfig: boolean
  readonly concurrency?: number
}

export type SyncFailure =
  | FileError
  | UsageError
  | ConfigError
  | FetchError
  | PlanError
  | ApplyError
  | Cancelled

export type SyncEffect<A, R = never> = Fx.Effect.Effect<A, SyncFailure, R>

// CHANGE: centralize shell error constructors next to the error model
// WHY: every failure carries enough context to be reported without the original call site
// FORMAT THEOREM: forall e: SyncFailure -> typed(e)
// PURITY: SHELL
// EFFECT: n/a
// INVARIANT: errors are plain tagged values
// COMPLEXITY: O(1)/O(1)
export const fileError = (pathValue: string, reason: string): FileError => ({
  _tag: "FileError",
  path: pathValue,
  reason
})

export const usageError = (reason: string): UsageError => ({
  _tag: "UsageError",
  reason
})

export const apiError = (
  operation: string,
  status: number | undefined,
  body: string
): ApiError => ({
  _tag: "ApiError",
  operation,
  status,
  body
})

export const fetchError = (cause: ApiError): FetchError => ({
  _tag: "FetchError",
  operation: cause.operation,
  cause
})

export const applyError = (
  operation: string,
  entity: string,
  status: number | undefined,
  body: string
): ApplyError => ({
  _tag: "ApplyError",
  operation,
  entity,
  status,
  body
})

export const cancelled = (phase: ApplyPhase, completed: number): Cancelled => ({
  _tag: "Cancelled",
  phase,
  completed
})
