import { Either } from "effect"

import type { DatabaseState, SyncConfig } from "./experience.js"
import { type ExperienceMatch, matchExperiences } from "./matching.js"
import type { PlanError } from "./plan-error.js"
import { computeSystemUpdates, type SystemUpdates } from "./systems.js"
import { computeTagUpdates, type TagUpdates } from "./tags.js"
import { computeTestSuiteUpdates, type TestSuiteUpdate } from "./test-suites.js"

/**
 * Everything the applier needs to converge the backend.
 *
 * `matches` is the owning collection; the other entries reference the `desired` experiences
 * held there, so an id written during creation is seen by every later phase.
 */
export interface UpdatePlan {
  readonly matches: ReadonlyArray<ExperienceMatch>
  readonly matchesByDesiredName: ReadonlyMap<string, ExperienceMatch>
  readonly tagUpdatesByName: ReadonlyMap<string, TagUpdates>
  readonly systemUpdatesByName: ReadonlyMap<string, SystemUpdates>
  readonly testSuiteUpdatesByName: ReadonlyMap<string, TestSuiteUpdate>
}

export type MatchKind = "Create" | "Update" | "RestoreUpdate" | "Archive" | "NoOp"

// CHANGE: classify a match into the lifecycle transition it requests
// WHY: the applier dispatches on the transition, never on raw flags
// FORMAT THEOREM: forall m: kind(m) in {Create, Update, RestoreUpdate, Archive, NoOp}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Absent -> Archived is NoOp
// COMPLEXITY: O(1)/O(1)
export const classifyMatch = (match: ExperienceMatch): MatchKind => {
  const { desired, original } = match
  if (original === undefined) {
    return desired.archived ? "NoOp" : "Create"
  }
  if (desired.archived) {
    return original.archived ? "NoOp" : "Archive"
  }
  return original.archived ? "RestoreUpdate" : "Update"
}

/**
 * Computes the full update plan for a configuration against a snapshot.
 *
 * @param config - Desired state.
 * @param state - Current backend snapshot.
 * @returns The plan, or the first rejection found.
 *
 * @pure true
 * @invariant Right(plan) covers every configured and every unarchived current experience
 * @precondition state names are unique among active experiences
 * @postcondition Left(error) implies no plan entity was produced
 * @complexity O(n * t) where n = |experiences|, t = |tags + systems| per experience
 */
// CHANGE: compose matching, tag, system and test-suite planning
// WHY: a single pure entry point between fetching and applying
// FORMAT THEOREM: forall (c, s): plan(c, s) = Right(p) | Left(e), e in PlanError
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: stages run in order matching -> tags -> systems -> test suites
// COMPLEXITY: O(n * t)/O(n)
export const computeUpdatePlan = (
  config: SyncConfig,
  state: DatabaseState
): Either.Either<UpdatePlan, PlanError> =>
  Either.gen(function*(_) {
    const matches = yield* _(matchExperiences(config.experiences, state.experiencesByName))
    const matchesByDesiredName = new Map(matches.map((match) => [match.desired.name, match]))
    const tagUpdatesByName = yield* _(
      computeTagUpdates(matches, state.tagSetsByName, config.managedExperienceTags)
    )
    const systemUpdatesByName = yield* _(computeSystemUpdates(matches, state.systemSetsByName))
    const testSuiteUpdatesByName = yield* _(
      computeTestSuiteUpdates(matchesByDesiredName, config.managedTestSuites, state.testSuiteIdsByName)
    )
    return {
      matches,
      matchesByDesiredName,
      tagUpdatesByName,
      systemUpdatesByName,
      testSuiteUpdatesByName
    }
  })

export interface PlanSummary {
  readonly creations: number
  readonly updates: number
  readonly restores: number
  readonly archives: number
  readonly tagAdditions: number
  readonly tagRemovals: number
  readonly systemAdditions: number
  readonly testSuiteRevisions: number
}

export const summarizePlan = (plan: UpdatePlan): PlanSummary => {
  const kinds = plan.matches.map(classifyMatch)
  const count = (kind: MatchKind): number => kinds.filter((candidate) => candidate === kind).length
  let tagAdditions = 0
  let tagRemovals = 0
  for (const update of plan.tagUpdatesByName.values()) {
    tagAdditions += update.additions.length
    tagRemovals += update.removals.length
  }
  let systemAdditions = 0
  for (const update of plan.systemUpdatesByName.values()) {
    systemAdditions += update.additions.length
  }
  return {
    creations: count("Create"),
    updates: count("Update"),
    restores: count("RestoreUpdate"),
    archives: count("Archive"),
    tagAdditions,
    tagRemovals,
    systemAdditions,
    testSuiteRevisions: plan.testSuiteUpdatesByName.size
  }
}

export const describePlanSummary = (summary: PlanSummary): string =>
  [
    `${summary.creations} to create`,
    `${summary.updates} to update`,
    `${summary.restores} to restore`,
    `${summary.archives} to archive`,
    `${summary.tagAdditions} tag additions`,
    `${summary.tagRemovals} tag removals`,
    `${summary.systemAdditions} system additions`,
    `${summary.testSuiteRevisions} test suite revisions`
  ].join(", ")
