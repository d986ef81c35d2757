import { Either } from "effect"

import type { Experience, SystemSet } from "./experience.js"
import type { ExperienceMatch } from "./matching.js"
import { type PlanError, unknownSystem } from "./plan-error.js"

export interface SystemUpdates {
  readonly name: string
  readonly systemId: string
  readonly additions: ReadonlyArray<Experience>
}

// CHANGE: derive per-system additions; membership outside the configuration is kept
// WHY: systems describe where an experience may run and are never pruned by sync
// FORMAT THEOREM: forall m, s in systems(m): !member(original(m), s) -> addition(s, m)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no removals are ever produced
// COMPLEXITY: O(n * s)/O(n)
export const computeSystemUpdates = (
  matches: ReadonlyArray<ExperienceMatch>,
  systemSetsByName: ReadonlyMap<string, SystemSet>
): Either.Either<ReadonlyMap<string, SystemUpdates>, PlanError> => {
  const additionsByName = new Map<string, Array<Experience>>()
  for (const name of systemSetsByName.keys()) {
    additionsByName.set(name, [])
  }

  for (const match of matches) {
    if (match.desired.archived) {
      continue
    }
    const originalId = match.original?.experienceId
    for (const system of match.desired.systems) {
      const set = systemSetsByName.get(system)
      const additions = additionsByName.get(system)
      if (set === undefined || additions === undefined) {
        return Either.left(unknownSystem(system))
      }
      if (originalId === undefined || !set.experienceIds.has(originalId)) {
        additions.push(match.desired)
      }
    }
  }

  const updates = new Map<string, SystemUpdates>()
  for (const [name, set] of systemSetsByName) {
    updates.set(name, {
      name,
      systemId: set.systemId,
      additions: additionsByName.get(name) ?? []
    })
  }
  return Either.right(updates)
}
