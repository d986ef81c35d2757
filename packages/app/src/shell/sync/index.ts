import { Console, type Deferred, Effect, Match } from "effect"

import { cloneSyncConfig, withResolvedIds } from "../../core/clone.js"
import type { SyncConfig } from "../../core/experience.js"
import { describePlanError } from "../../core/plan-error.js"
import { computeUpdatePlan, describePlanSummary, type PlanSummary, summarizePlan } from "../../core/plan.js"
import { FileSystemService } from "../services/file-system.js"
import type { ResimApi } from "../services/resim-api.js"
import { applyPlan, type ApplySummary, describeApplyError } from "./apply.js"
import { loadSyncConfig, writeSyncConfig } from "./config.js"
import { DEFAULT_CONCURRENCY, fetchDatabaseState } from "./fetch-state.js"
import { resolveProjectId } from "./project.js"
import { type ApiError, type SyncEffect, type SyncFailure, type SyncOptions, usageError } from "./types.js"

export type SyncResult =
  | { readonly _tag: "Cloned"; readonly path: string; readonly experiences: number }
  | {
    readonly _tag: "Applied"
    readonly path: string
    readonly plan: PlanSummary
    readonly applied: ApplySummary
  }

type SyncEnv = ResimApi | FileSystemService

const describeApiError = (error: ApiError): string =>
  error.status === undefined
    ? `${error.operation} failed: ${error.body}`
    : `${error.operation} failed with status ${error.status}: ${error.body}`

// CHANGE: render every sync failure as one log line
// WHY: the CLI reports the failure it stopped on, after per-item errors were already logged
// FORMAT THEOREM: forall f: SyncFailure -> describe(f) : string
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: exhaustive over SyncFailure
// COMPLEXITY: O(1)/O(1)
export const describeSyncFailure = (failure: SyncFailure): string =>
  Match.value(failure).pipe(
    Match.tag("FileError", ({ path, reason }) => `${reason}: ${path}`),
    Match.tag("UsageError", ({ reason }) => reason),
    Match.tag("ParseError", ({ path, reason }) => `Failed to parse ${path}: ${reason}`),
    Match.tag("SchemaError", ({ path, reason }) => `Invalid experience config ${path}: ${reason}`),
    Match.tag("DuplicateNameError", ({ kind, name, path }) => `Duplicate ${kind} name in ${path}: ${name}`),
    Match.tag("FetchError", ({ cause }) => `Failed to fetch current state: ${describeApiError(cause)}`),
    Match.tag("ApplyError", describeApplyError),
    Match.tag("Cancelled", ({ completed, phase }) => `Cancelled during ${phase} after ${completed} operations`),
    Match.tag(
      "NameCollision",
      "AmbiguousRename",
      "UnknownOrDuplicateId",
      "UnknownManagedTag",
      "UnknownTag",
      "UnknownSystem",
      "UnknownTestSuite",
      "TestSuiteReferencesMissingExperience",
      describePlanError
    ),
    Match.exhaustive
  )

// CHANGE: map failures onto process exit codes
// WHY: callers distinguish rejected input from partial application
// FORMAT THEOREM: forall f: code(f) in {1, 2, 3}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: 1 means nothing was mutated
// COMPLEXITY: O(1)/O(1)
export const exitCodeFor = (failure: SyncFailure): number => {
  switch (failure._tag) {
    case "Cancelled":
      return 3
    case "ApplyError":
      return 2
    default:
      return 1
  }
}

const requireOption = (value: string | undefined, message: string): SyncEffect<string> =>
  value === undefined || value.length === 0 ? Effect.fail(usageError(message)) : Effect.succeed(value)

export type PreparedSync =
  | { readonly _tag: "Clone"; readonly configPath: string }
  | { readonly _tag: "Apply"; readonly configPath: string; readonly config: SyncConfig }

// CHANGE: resolve the configuration path and load the file before any backend access
// WHY: a malformed configuration is reported even when the API client cannot be built
// FORMAT THEOREM: forall o: prepare(o) reads at most one file
// PURITY: SHELL
// EFFECT: Effect<PreparedSync, SyncFailure, FileSystemService>
// INVARIANT: clone never reads the configuration path
// COMPLEXITY: O(n)/O(n)
export const prepareSync = (options: SyncOptions): SyncEffect<PreparedSync, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    const configOption = yield* _(requireOption(options.experienceConfig, "--experience-config is required"))
    const configPath = fs.resolve(options.cwd, configOption)
    if (options.clone) {
      return { _tag: "Clone", configPath } satisfies PreparedSync
    }
    const config = yield* _(loadSyncConfig(configPath))
    return { _tag: "Apply", configPath, config } satisfies PreparedSync
  })

/**
 * Runs a prepared sync against a project.
 *
 * A clone writes the current project state to the configuration path and mutates nothing.
 * Otherwise the current state is fetched, a plan computed and applied, and with
 * `updateConfig` the configuration is rewritten with every resolved experience id.
 *
 * @param cancel - Completing it stops the apply between or during phases.
 *
 * @pure false - reads files and calls the backend
 * @effect ResimApi, FileSystemService
 * @invariant no mutation is issued unless the whole plan was computed
 * @complexity O(n) backend calls where n = plan size
 */
export const executeSync = (
  prepared: PreparedSync,
  options: SyncOptions,
  cancel?: Deferred.Deferred<void>
): SyncEffect<SyncResult, SyncEnv> =>
  Effect.gen(function*(_) {
    const { configPath } = prepared
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY
    const project = yield* _(requireOption(options.project, "--project is required (or set RESIM_PROJECT)"))
    const projectId = yield* _(resolveProjectId(project))
    const state = yield* _(fetchDatabaseState(projectId, concurrency))

    if (prepared._tag === "Clone") {
      const cloned = cloneSyncConfig(state)
      yield* _(writeSyncConfig(configPath, cloned))
      yield* _(Console.log(`Cloned ${cloned.experiences.length} experiences to ${configPath}`))
      return { _tag: "Cloned", path: configPath, experiences: cloned.experiences.length } satisfies SyncResult
    }

    const plan = yield* _(computeUpdatePlan(prepared.config, state))
    const summary = summarizePlan(plan)
    yield* _(Console.log(`Experience sync plan: ${describePlanSummary(summary)}`))

    const applied = yield* _(
      applyPlan(plan, {
        projectId,
        concurrency,
        verbose: options.verbose,
        cancel
      })
    )

    if (options.updateConfig) {
      yield* _(writeSyncConfig(configPath, withResolvedIds(prepared.config, plan)))
      yield* _(Console.log(`Updated config written to ${configPath}`))
    }
    yield* _(Console.log("Experience sync complete"))
    return { _tag: "Applied", path: configPath, plan: summary, applied } satisfies SyncResult
  })

// CHANGE: orchestrate load -> fetch -> plan -> apply
// WHY: one entry point shared by the CLI and tests
// FORMAT THEOREM: forall o: planError(o) -> mutations(o) = 0
// PURITY: SHELL
// EFFECT: Effect<SyncResult, SyncFailure, ResimApi | FileSystemService>
// INVARIANT: the configuration is read before any backend call
// COMPLEXITY: O(n)/O(n)
export const runExperienceSync = (
  options: SyncOptions,
  cancel?: Deferred.Deferred<void>
): SyncEffect<SyncResult, SyncEnv> =>
  Effect.flatMap(prepareSync(options), (prepared) => executeSync(prepared, options, cancel))
