import type { DatabaseState, Experience, SyncConfig } from "./experience.js"
import type { UpdatePlan } from "./plan.js"

const byName = (left: Experience, right: Experience): number =>
  left.name < right.name ? -1 : left.name > right.name ? 1 : 0

/**
 * Builds a configuration that reproduces the active experiences of a snapshot.
 *
 * Archived experiences are left out: once absent from a configuration they stay archived.
 * Test suites are left out as their membership is not part of the snapshot.
 *
 * @pure true
 * @invariant planning the result against the same snapshot creates and archives nothing
 * @complexity O(n log n) where n = |experiences|
 */
// CHANGE: derive a configuration file from the current backend state
// WHY: bootstrap a configuration for an existing project
// FORMAT THEOREM: forall s: plan(clone(s), s) has no Create and no Archive
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: experiences are ordered by name
// COMPLEXITY: O(n log n)/O(n)
export const cloneSyncConfig = (state: DatabaseState): SyncConfig => ({
  experiences: [...state.experiencesByName.values()]
    .filter((experience) => !experience.archived)
    .sort(byName)
    .map((experience) => ({ ...experience })),
  managedExperienceTags: [],
  managedTestSuites: []
})

// CHANGE: write back resolved ids into the configuration after a sync
// WHY: later edits can rename experiences by id without ambiguity
// FORMAT THEOREM: forall e in config: id(e') = id(desired(match(e)))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: entry order and managed sections are preserved
// COMPLEXITY: O(n)/O(n)
export const withResolvedIds = (config: SyncConfig, plan: UpdatePlan): SyncConfig => ({
  ...config,
  experiences: config.experiences.map((experience) => ({
    ...experience,
    experienceId: plan.matchesByDesiredName.get(experience.name)?.desired.experienceId ??
      experience.experienceId
  }))
})
