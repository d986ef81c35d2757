import { Console, Deferred, Effect, Either, Match, Option, pipe, Ref } from "effect"

import type { Experience } from "../../core/experience.js"
import type { ExperienceMatch } from "../../core/matching.js"
import { classifyMatch, type UpdatePlan } from "../../core/plan.js"
import type { SystemUpdates } from "../../core/systems.js"
import type { TagUpdates } from "../../core/tags.js"
import type { TestSuiteUpdate } from "../../core/test-suites.js"
import { type ExperienceInput, ResimApi, type UpdateMaskField } from "../services/resim-api.js"
import { DEFAULT_CONCURRENCY } from "./fetch-state.js"
import {
  type ApiError,
  type ApplyError,
  applyError,
  type ApplyPhase,
  type Cancelled,
  cancelled
} from "./types.js"

export interface ApplyOptions {
  readonly projectId: string
  readonly concurrency?: number
  readonly verbose?: boolean
  // Completing this deferred stops the current phase and fails with Cancelled.
  readonly cancel?: Deferred.Deferred<void>
}

export interface ApplySummary {
  readonly experiences: number
  readonly testSuites: number
  readonly tagsAndSystems: number
  readonly archived: number
}

type TagSystemWork =
  | { readonly _tag: "AddTag"; readonly update: TagUpdates }
  | { readonly _tag: "RemoveTag"; readonly update: TagUpdates; readonly experience: Experience }
  | { readonly _tag: "AddSystem"; readonly update: SystemUpdates }

const toApplyError = (entity: string) => (error: ApiError): ApplyError =>
  applyError(error.operation, entity, error.status, error.body)

const missingId = (operation: string, entity: string, experience: string): ApplyError =>
  applyError(
    operation,
    entity,
    undefined,
    `Experience ${experience} has no id; its creation may have failed`
  )

export const describeApplyError = (error: ApplyError): string => {
  const status = error.status === undefined ? "" : ` (status ${error.status})`
  return `Failed to ${error.operation} for ${error.entity}${status}: ${error.body}`
}

const requireIds = (
  operation: string,
  entity: string,
  experiences: ReadonlyArray<Experience>
): Either.Either<ReadonlyArray<string>, ApplyError> => {
  const ids: Array<string> = []
  for (const experience of experiences) {
    if (experience.experienceId === undefined) {
      return Either.left(missingId(operation, entity, experience.name))
    }
    ids.push(experience.experienceId)
  }
  return Either.right(ids)
}

export const toExperienceInput = (experience: Experience): ExperienceInput => ({
  name: experience.name,
  description: experience.description,
  locations: experience.locations,
  profile: experience.profile,
  environmentVariables: experience.environmentVariables,
  cacheExempt: experience.cacheExempt,
  containerTimeoutSeconds: experience.containerTimeoutSeconds,
  customFields: experience.customFields
})

// CHANGE: update mask that leaves unconfigured optional fields untouched
// WHY: omitted optional keys keep their stored value
// FORMAT THEOREM: forall e: mask(e) ⊇ {name, description, cacheExempt, locations}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: optional fields appear iff present in the configuration
// COMPLEXITY: O(1)/O(1)
export const updateMaskFor = (experience: Experience): ReadonlyArray<UpdateMaskField> => [
  "name",
  "description",
  "cacheExempt",
  "locations",
  ...(experience.containerTimeoutSeconds === undefined ? [] : ["containerTimeoutSeconds" as const]),
  ...(experience.profile === undefined ? [] : ["profile" as const]),
  ...(experience.environmentVariables === undefined ? [] : ["environmentVariables" as const]),
  ...(experience.customFields === undefined ? [] : ["customFields" as const])
]

const applyExperience = (
  projectId: string,
  match: ExperienceMatch
): Effect.Effect<void, ApplyError, ResimApi> =>
  Effect.gen(function*(_) {
    const api = yield* _(ResimApi)
    const { desired } = match
    const kind = classifyMatch(match)
    const fail = toApplyError(desired.name)

    if (kind === "Create") {
      const created = yield* _(api.createExperience(projectId, toExperienceInput(desired)), Effect.mapError(fail))
      desired.experienceId = created.experienceId
      return
    }

    const experienceId = desired.experienceId
    if (experienceId === undefined) {
      return yield* _(Effect.fail(missingId("update experience", desired.name, desired.name)))
    }
    if (kind === "RestoreUpdate") {
      yield* _(api.restoreExperience(projectId, experienceId), Effect.mapError(fail))
    }
    yield* _(
      api.updateExperience(projectId, experienceId, toExperienceInput(desired), updateMaskFor(desired)),
      Effect.mapError(fail)
    )
  })

const reviseTestSuite = (
  projectId: string,
  update: TestSuiteUpdate
): Effect.Effect<void, ApplyError, ResimApi> =>
  Effect.gen(function*(_) {
    const api = yield* _(ResimApi)
    const ids = yield* _(requireIds("revise test suite", update.name, update.experiences))
    yield* _(api.reviseTestSuite(projectId, update.testSuiteId, ids), Effect.mapError(toApplyError(update.name)))
  })

const applyTagSystemWork = (
  projectId: string,
  work: TagSystemWork
): Effect.Effect<void, ApplyError, ResimApi> =>
  Effect.gen(function*(_) {
    const api = yield* _(ResimApi)
    yield* _(
      Match.value(work).pipe(
        Match.tag("AddTag", ({ update }) =>
          Effect.gen(function*(_) {
            const ids = yield* _(requireIds("add tags to experiences", update.name, update.additions))
            yield* _(api.addTagsToExperiences(projectId, [update.tagId], ids), Effect.mapError(toApplyError(update.name)))
          })),
        Match.tag("RemoveTag", ({ experience, update }) => {
          const entity = `${update.name}/${experience.name}`
          const experienceId = experience.experienceId
          return experienceId === undefined
            ? Effect.fail(missingId("remove tag from experience", entity, experience.name))
            : pipe(
              api.removeTagFromExperience(projectId, update.tagId, experienceId),
              Effect.mapError(toApplyError(entity))
            )
        }),
        Match.tag("AddSystem", ({ update }) =>
          Effect.gen(function*(_) {
            const ids = yield* _(requireIds("add systems to experiences", update.name, update.additions))
            yield* _(
              api.addSystemsToExperiences(projectId, [update.systemId], ids),
              Effect.mapError(toApplyError(update.name))
            )
          })),
        Match.exhaustive
      )
    )
  })

const archiveExperiences = (
  projectId: string,
  experiences: ReadonlyArray<Experience>
): Effect.Effect<void, ApplyError, ResimApi> =>
  Effect.gen(function*(_) {
    const api = yield* _(ResimApi)
    const entity = `${experiences.length} experiences`
    const ids = yield* _(requireIds("archive experiences", entity, experiences))
    yield* _(api.archiveExperiences(projectId, ids), Effect.mapError(toApplyError(entity)))
  })

const collectTagSystemWork = (plan: UpdatePlan): ReadonlyArray<TagSystemWork> => {
  const work: Array<TagSystemWork> = []
  for (const update of plan.tagUpdatesByName.values()) {
    if (update.additions.length > 0) {
      work.push({ _tag: "AddTag", update })
    }
    for (const experience of update.removals) {
      work.push({ _tag: "RemoveTag", update, experience })
    }
  }
  for (const update of plan.systemUpdatesByName.values()) {
    if (update.additions.length > 0) {
      work.push({ _tag: "AddSystem", update })
    }
  }
  return work
}

interface PhaseSettings {
  readonly concurrency: number
  readonly verbose: boolean
  readonly cancel: Deferred.Deferred<void> | undefined
}

const isCancelled = (cancel: Deferred.Deferred<void> | undefined): Effect.Effect<boolean> =>
  cancel === undefined ? Effect.succeed(false) : Deferred.isDone(cancel)

/**
 * Runs one phase over a bounded worker pool.
 *
 * Every item is attempted; failures are logged as they happen and the first one is returned
 * once the phase has drained. Cancellation interrupts in-flight items and skips queued ones.
 *
 * @returns Number of items processed.
 *
 * @pure false - runs backend mutations
 * @invariant at most `concurrency` items are in flight
 * @complexity O(n / concurrency) rounds
 */
// CHANGE: bounded-concurrency phase runner with progress and error aggregation
// WHY: phases are drained completely before the next one reads back-filled ids
// FORMAT THEOREM: forall items: run(items) = Right(n) <-> forall i: success(i)
// PURITY: SHELL
// EFFECT: Effect<number, ApplyError | Cancelled, R>
// INVARIANT: completed counts items that finished, successfully or not
// COMPLEXITY: O(n)/O(n)
export const runPhase = <A, R>(
  phase: ApplyPhase,
  items: ReadonlyArray<A>,
  task: (item: A) => Effect.Effect<void, ApplyError, R>,
  settings: PhaseSettings
): Effect.Effect<number, ApplyError | Cancelled, R> =>
  Effect.gen(function*(_) {
    if (items.length === 0) {
      return 0
    }
    if (yield* _(isCancelled(settings.cancel))) {
      return yield* _(Effect.fail(cancelled(phase, 0)))
    }
    if (settings.verbose) {
      yield* _(Console.log(`Applying ${phase}: ${items.length} items`))
    }

    const completed = yield* _(Ref.make(0))
    const reportProgress = pipe(
      Ref.updateAndGet(completed, (count) => count + 1),
      Effect.flatMap((count) =>
        settings.verbose ? Console.log(`${phase}: ${count}/${items.length}`) : Effect.void
      )
    )
    const work = pipe(
      Effect.forEach(
        items,
        (item) =>
          pipe(
            task(item),
            Effect.tapError((error) => Console.error(describeApplyError(error))),
            Effect.either,
            Effect.zipLeft(reportProgress)
          ),
        { concurrency: settings.concurrency }
      ),
      Effect.map(Option.some)
    )
    const outcome = settings.cancel === undefined
      ? work
      : Effect.raceFirst(
        work,
        Effect.as(Deferred.await(settings.cancel), Option.none<Array<Either.Either<void, ApplyError>>>())
      )

    const results = yield* _(outcome)
    if (Option.isNone(results)) {
      return yield* _(Effect.fail(cancelled(phase, yield* _(Ref.get(completed)))))
    }

    const failures = results.value.flatMap((result) => Either.isLeft(result) ? [result.left] : [])
    const [first] = failures
    if (first !== undefined) {
      yield* _(Console.error(`${phase}: ${failures.length} of ${items.length} items failed`))
      return yield* _(Effect.fail(first))
    }
    return items.length
  })

/**
 * Applies an update plan in four strictly ordered phases.
 *
 * 1. create, restore and update experiences (creations back-fill their ids),
 * 2. revise managed test suites,
 * 3. add and remove tag members, add system members,
 * 4. archive, last, so revisions in phase 2 still reference the experiences being archived.
 *
 * A phase that ends with errors stops the apply with its first error.
 *
 * @pure false - mutates the backend
 * @effect ResimApi
 * @invariant phase N+1 starts only after phase N drained without errors
 * @complexity O(n) calls where n = plan size
 */
// CHANGE: orchestrate the four apply phases over the shared plan
// WHY: ids written in phase 1 are read by every later phase through shared references
// FORMAT THEOREM: forall p: calls(phase1) < calls(phase2) < calls(phase3) < calls(phase4)
// PURITY: SHELL
// EFFECT: Effect<ApplySummary, ApplyError | Cancelled, ResimApi>
// INVARIANT: archive is a single bulk call
// COMPLEXITY: O(n)/O(n)
export const applyPlan = (
  plan: UpdatePlan,
  options: ApplyOptions
): Effect.Effect<ApplySummary, ApplyError | Cancelled, ResimApi> =>
  Effect.gen(function*(_) {
    const settings: PhaseSettings = {
      concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
      verbose: options.verbose ?? false,
      cancel: options.cancel
    }
    const { projectId } = options

    const experienceMatches = plan.matches.filter((match) => {
      const kind = classifyMatch(match)
      return kind === "Create" || kind === "Update" || kind === "RestoreUpdate"
    })
    const experiences = yield* _(
      runPhase("experiences", experienceMatches, (match) => applyExperience(projectId, match), settings)
    )

    const testSuites = yield* _(
      runPhase(
        "test suites",
        [...plan.testSuiteUpdatesByName.values()],
        (update) => reviseTestSuite(projectId, update),
        settings
      )
    )

    const tagsAndSystems = yield* _(
      runPhase(
        "tags and systems",
        collectTagSystemWork(plan),
        (work) => applyTagSystemWork(projectId, work),
        settings
      )
    )

    const toArchive = plan.matches
      .filter((match) => classifyMatch(match) === "Archive")
      .map((match) => match.desired)
    yield* _(
      runPhase(
        "archive",
        toArchive.length === 0 ? [] : [toArchive],
        (batch) => archiveExperiences(projectId, batch),
        settings
      )
    )

    return { experiences, testSuites, tagsAndSystems, archived: toArchive.length }
  })
