import { Either } from "effect"

import type { Experience } from "./experience.js"
import {
  ambiguousRename,
  nameCollision,
  type PlanError,
  unknownOrDuplicateId
} from "./plan-error.js"

/**
 * Pairs a desired experience with the current record it replaces.
 *
 * `original` is undefined for creations. For archives `desired` is a copy of the original
 * with `archived` set.
 */
export interface ExperienceMatch {
  readonly original: Experience | undefined
  readonly desired: Experience
}

const indexById = (
  byName: ReadonlyMap<string, Experience>
): Map<string, Experience> => {
  const byId = new Map<string, Experience>()
  for (const experience of byName.values()) {
    if (experience.experienceId !== undefined) {
      byId.set(experience.experienceId, experience)
    }
  }
  return byId
}

/**
 * Matches configured experiences to current ones, by name first and by id second.
 *
 * A configured experience whose name is owned by a current record takes that record over.
 * If it also names a different id, some other record would have to give up the name first;
 * that ordering is never searched for and the configuration is rejected instead. Without a
 * same-name record, an explicit id must point at a record nobody has claimed yet. Everything
 * else is new. Current records left unclaimed are archived unless they already are.
 *
 * @param configured - Desired experiences in configuration order.
 * @param currentByName - Snapshot of archived and active experiences keyed by name.
 * @returns Matches in configuration order followed by archive matches, or the first rejection.
 *
 * @pure true
 * @invariant every desired name is unique, every desired id is unique, every original is claimed once
 * @complexity O(n + m) where n = |configured|, m = |current|
 */
// CHANGE: two-key experience matching with explicit rejections
// WHY: renames stay ordinary updates while name ownership never transiently overlaps
// FORMAT THEOREM: forall c in configured: match(c) = byName(c) | byId(c) | new(c)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: claimed originals are removed from the id index before the next entry is read
// COMPLEXITY: O(n + m)/O(n + m)
export const matchExperiences = (
  configured: ReadonlyArray<Experience>,
  currentByName: ReadonlyMap<string, Experience>
): Either.Either<ReadonlyArray<ExperienceMatch>, PlanError> => {
  const remainingById = indexById(currentByName)
  const matches: Array<ExperienceMatch> = []
  const claimedNames = new Set<string>()

  const claim = (match: ExperienceMatch): PlanError | undefined => {
    if (claimedNames.has(match.desired.name)) {
      return nameCollision(match.desired.name)
    }
    claimedNames.add(match.desired.name)
    matches.push(match)
    return undefined
  }

  for (const experience of configured) {
    const sameName = currentByName.get(experience.name)
    if (sameName !== undefined) {
      const currentId = sameName.experienceId
      if (currentId === undefined || !remainingById.has(currentId)) {
        return Either.left(nameCollision(experience.name))
      }
      if (experience.experienceId !== undefined && experience.experienceId !== currentId) {
        return Either.left(ambiguousRename(experience.name))
      }
      const rejected = claim({
        original: sameName,
        desired: { ...experience, experienceId: currentId }
      })
      if (rejected !== undefined) {
        return Either.left(rejected)
      }
      remainingById.delete(currentId)
      continue
    }

    if (experience.experienceId !== undefined) {
      const sameId = remainingById.get(experience.experienceId)
      if (sameId === undefined) {
        return Either.left(unknownOrDuplicateId(experience.experienceId))
      }
      const rejected = claim({ original: sameId, desired: { ...experience } })
      if (rejected !== undefined) {
        return Either.left(rejected)
      }
      remainingById.delete(experience.experienceId)
      continue
    }

    const rejected = claim({ original: undefined, desired: { ...experience } })
    if (rejected !== undefined) {
      return Either.left(rejected)
    }
  }

  for (const leftover of remainingById.values()) {
    if (leftover.archived) {
      continue
    }
    const rejected = claim({ original: leftover, desired: { ...leftover, archived: true } })
    if (rejected !== undefined) {
      return Either.left(rejected)
    }
  }

  return Either.right(matches)
}
