import { Either } from "effect"

import type { Experience, TagSet } from "./experience.js"
import type { ExperienceMatch } from "./matching.js"
import { type PlanError, unknownManagedTag, unknownTag } from "./plan-error.js"

export interface TagUpdates {
  readonly name: string
  readonly tagId: string
  readonly additions: ReadonlyArray<Experience>
  readonly removals: ReadonlyArray<Experience>
}

interface MutableTagUpdates {
  readonly name: string
  readonly tagId: string
  readonly additions: Array<Experience>
  readonly removals: Array<Experience>
}

/**
 * Computes tag membership changes for every tag present in the current state.
 *
 * Managed tags converge exactly to the configuration. Unmanaged tags only ever gain members.
 * Archived desired experiences are skipped: archiving drops their memberships.
 *
 * @pure true
 * @invariant removals only appear on managed tags; each match contributes at most once per tag
 * @complexity O(n * (t + k)) where n = |matches|, t = |tags per experience|, k = |managed tags|
 */
// CHANGE: derive per-tag additions and removals from matched experiences
// WHY: one bulk add per tag and one removal per (tag, experience) in the applier
// FORMAT THEOREM: forall m, t in managed: has(original(m), t) && !wants(m, t) -> removal(t, m)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: additions and removals preserve match order
// COMPLEXITY: O(n * (t + k))/O(n)
export const computeTagUpdates = (
  matches: ReadonlyArray<ExperienceMatch>,
  tagSetsByName: ReadonlyMap<string, TagSet>,
  managedTags: ReadonlyArray<string>
): Either.Either<ReadonlyMap<string, TagUpdates>, PlanError> => {
  const updates = new Map<string, MutableTagUpdates>()
  for (const [name, set] of tagSetsByName) {
    updates.set(name, { name, tagId: set.tagId, additions: [], removals: [] })
  }
  for (const tag of managedTags) {
    if (!tagSetsByName.has(tag)) {
      return Either.left(unknownManagedTag(tag))
    }
  }

  for (const match of matches) {
    if (match.desired.archived) {
      continue
    }
    const originalId = match.original?.experienceId
    for (const tag of match.desired.tags) {
      const set = tagSetsByName.get(tag)
      const update = updates.get(tag)
      if (set === undefined || update === undefined) {
        return Either.left(unknownTag(tag))
      }
      if (originalId === undefined || !set.experienceIds.has(originalId)) {
        update.additions.push(match.desired)
      }
    }
    if (originalId === undefined) {
      continue
    }
    for (const tag of managedTags) {
      const carried = tagSetsByName.get(tag)?.experienceIds.has(originalId) ?? false
      const update = updates.get(tag)
      if (carried && update !== undefined && !match.desired.tags.includes(tag)) {
        update.removals.push(match.desired)
      }
    }
  }

  return Either.right(updates)
}
