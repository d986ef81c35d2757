import { Either } from "effect"

import type { Experience, ManagedTestSuite } from "./experience.js"
import type { ExperienceMatch } from "./matching.js"
import {
  type PlanError,
  testSuiteReferencesMissingExperience,
  unknownTestSuite
} from "./plan-error.js"

export interface TestSuiteUpdate {
  readonly name: string
  readonly testSuiteId: string
  readonly experiences: ReadonlyArray<Experience>
}

/**
 * Builds one revision request per managed test suite.
 *
 * Every managed suite is revised on each run, whether or not its membership changed; the
 * current membership of a suite is not part of the snapshot.
 *
 * @pure true
 * @invariant update.experiences follows the configured order of the suite
 * @complexity O(s * e) where s = |suites|, e = |experiences per suite|
 */
// CHANGE: resolve managed suite members against the matched desired experiences
// WHY: revisions must reference the final names and the ids back-filled during apply
// FORMAT THEOREM: forall s, i: update(s).experiences[i] = desired(s.experiences[i])
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: archived or unknown members reject the whole plan
// COMPLEXITY: O(s * e)/O(s * e)
export const computeTestSuiteUpdates = (
  matchesByDesiredName: ReadonlyMap<string, ExperienceMatch>,
  managedTestSuites: ReadonlyArray<ManagedTestSuite>,
  testSuiteIdsByName: ReadonlyMap<string, string>
): Either.Either<ReadonlyMap<string, TestSuiteUpdate>, PlanError> => {
  const updates = new Map<string, TestSuiteUpdate>()

  for (const suite of managedTestSuites) {
    const testSuiteId = testSuiteIdsByName.get(suite.name)
    if (testSuiteId === undefined) {
      return Either.left(unknownTestSuite(suite.name))
    }
    const experiences: Array<Experience> = []
    for (const name of suite.experiences) {
      const match = matchesByDesiredName.get(name)
      if (match === undefined || match.desired.archived) {
        return Either.left(testSuiteReferencesMissingExperience(suite.name, name))
      }
      experiences.push(match.desired)
    }
    updates.set(suite.name, { name: suite.name, testSuiteId, experiences })
  }

  return Either.right(updates)
}
