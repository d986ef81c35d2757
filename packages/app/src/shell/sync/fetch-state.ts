import { Effect, pipe } from "effect"

import type { DatabaseState, Experience, SystemSet, TagSet } from "../../core/experience.js"
import { makeExperience } from "../../core/experience.js"
import { type ExperienceRecord, type Page, ResimApi } from "../services/resim-api.js"
import { type ApiError, type FetchError, fetchError } from "./types.js"

export const DEFAULT_CONCURRENCY = 16

// CHANGE: follow forward page tokens until the backend reports the end
// WHY: every list endpoint shares the same pagination contract
// FORMAT THEOREM: forall pages: collect = concat(pages) until empty(page) or empty(token)
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<A>, ApiError, R>
// INVARIANT: pages are requested sequentially in token order
// COMPLEXITY: O(p)/O(n) where p = number of pages
export const collectPages = <A, R>(
  fetchPage: (pageToken: string | undefined) => Effect.Effect<Page<A>, ApiError, R>
): Effect.Effect<ReadonlyArray<A>, ApiError, R> => {
  const loop = (
    pageToken: string | undefined,
    collected: Array<A>
  ): Effect.Effect<ReadonlyArray<A>, ApiError, R> =>
    Effect.gen(function*(_) {
      const page = yield* _(fetchPage(pageToken))
      if (page.items.length === 0) {
        return collected
      }
      collected.push(...page.items)
      if (page.nextPageToken === undefined || page.nextPageToken === "") {
        return collected
      }
      return yield* _(loop(page.nextPageToken, collected))
    })
  return Effect.suspend(() => loop(undefined, []))
}

const toExperience = (record: ExperienceRecord, tags: ReadonlyArray<string>, systems: ReadonlyArray<string>): Experience =>
  makeExperience({
    name: record.name,
    experienceId: record.experienceId,
    description: record.description,
    locations: record.locations,
    profile: record.profile,
    environmentVariables: record.environmentVariables,
    cacheExempt: record.cacheExempt,
    containerTimeoutSeconds: record.containerTimeoutSeconds,
    customFields: record.customFields,
    tags,
    systems,
    archived: record.archived
  })

const membershipIndex = (
  sets: Iterable<{ readonly name: string; readonly experienceIds: ReadonlySet<string> }>
): ReadonlyMap<string, ReadonlyArray<string>> => {
  const index = new Map<string, Array<string>>()
  for (const set of sets) {
    for (const experienceId of set.experienceIds) {
      const names = index.get(experienceId)
      if (names === undefined) {
        index.set(experienceId, [set.name])
      } else {
        names.push(set.name)
      }
    }
  }
  return index
}

/**
 * Joins list results into the snapshot consumed by the planner.
 *
 * Archived and active experiences share one name-keyed map; an active record wins over an
 * archived one with the same name.
 *
 * @pure true
 * @invariant every experience lists the tags and systems whose sets contain its id
 * @complexity O(n + m) where n = |experiences|, m = |memberships|
 */
export const joinDatabaseState = (input: {
  readonly activeExperiences: ReadonlyArray<ExperienceRecord>
  readonly archivedExperiences: ReadonlyArray<ExperienceRecord>
  readonly tagSets: ReadonlyArray<TagSet>
  readonly systemSets: ReadonlyArray<SystemSet>
  readonly testSuites: ReadonlyArray<{ readonly name: string; readonly testSuiteId: string }>
}): DatabaseState => {
  const tagsById = membershipIndex(input.tagSets)
  const systemsById = membershipIndex(input.systemSets)
  const experiencesByName = new Map<string, Experience>()
  for (const record of [...input.archivedExperiences, ...input.activeExperiences]) {
    experiencesByName.set(
      record.name,
      toExperience(record, tagsById.get(record.experienceId) ?? [], systemsById.get(record.experienceId) ?? [])
    )
  }
  return {
    experiencesByName,
    tagSetsByName: new Map(input.tagSets.map((set) => [set.name, set])),
    systemSetsByName: new Map(input.systemSets.map((set) => [set.name, set])),
    testSuiteIdsByName: new Map(input.testSuites.map((suite) => [suite.name, suite.testSuiteId]))
  }
}

const collectMembers = (
  fetchPage: (archived: boolean, pageToken: string | undefined) => Effect.Effect<Page<string>, ApiError>
): Effect.Effect<ReadonlySet<string>, ApiError> =>
  Effect.gen(function*(_) {
    const active = yield* _(collectPages((pageToken) => fetchPage(false, pageToken)))
    const archived = yield* _(collectPages((pageToken) => fetchPage(true, pageToken)))
    return new Set([...active, ...archived])
  })

/**
 * Reads the current project state from the backend.
 *
 * @param projectId - Project whose namespace is reconciled.
 * @param concurrency - Upper bound on parallel membership listings.
 * @returns Snapshot of experiences, tag and system memberships and test-suite ids.
 *
 * @pure false - issues list calls against the backend
 * @effect ResimApi
 * @invariant any failed list call aborts the whole fetch
 * @complexity O(p) list calls where p = total number of pages
 */
// CHANGE: fan out the top-level lists, then membership lists per tag and system
// WHY: independent list calls overlap; pages of one listing stay sequential
// FORMAT THEOREM: forall call: fails(call) -> fetch = Left(FetchError(call))
// PURITY: SHELL
// EFFECT: Effect<DatabaseState, FetchError, ResimApi>
// INVARIANT: five top-level lists run concurrently, then tag and system memberships together
// COMPLEXITY: O(p)/O(n)
export const fetchDatabaseState = (
  projectId: string,
  concurrency: number = DEFAULT_CONCURRENCY
): Effect.Effect<DatabaseState, FetchError, ResimApi> =>
  pipe(
    Effect.gen(function*(_) {
      const api = yield* _(ResimApi)
      const [activeExperiences, archivedExperiences, tags, systems, testSuites] = yield* _(
        Effect.all(
          [
            collectPages((pageToken) => api.listExperiences({ projectId, archived: false, pageToken })),
            collectPages((pageToken) => api.listExperiences({ projectId, archived: true, pageToken })),
            collectPages((pageToken) => api.listExperienceTags({ projectId, pageToken })),
            collectPages((pageToken) => api.listSystems({ projectId, pageToken })),
            collectPages((pageToken) => api.listTestSuites({ projectId, pageToken }))
          ],
          { concurrency: "unbounded" }
        )
      )

      const [tagSets, systemSets] = yield* _(
        Effect.all(
          [
            Effect.forEach(
              tags,
              (tag) =>
                pipe(
                  collectMembers((archived, pageToken) =>
                    api.listExperiencesForTag({ projectId, tagId: tag.tagId, archived, pageToken })
                  ),
                  Effect.map((experienceIds): TagSet => ({ name: tag.name, tagId: tag.tagId, experienceIds }))
                ),
              { concurrency }
            ),
            Effect.forEach(
              systems,
              (system) =>
                pipe(
                  collectMembers((archived, pageToken) =>
                    api.listExperiencesForSystem({ projectId, systemId: system.systemId, archived, pageToken })
                  ),
                  Effect.map((experienceIds): SystemSet => ({
                    name: system.name,
                    systemId: system.systemId,
                    experienceIds
                  }))
                ),
              { concurrency }
            )
          ],
          { concurrency: "unbounded" }
        )
      )

      return joinDatabaseState({ activeExperiences, archivedExperiences, tagSets, systemSets, testSuites })
    }),
    Effect.mapError(fetchError)
  )
