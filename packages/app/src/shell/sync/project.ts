import * as Schema from "@effect/schema/Schema"
import { Effect, Either, pipe } from "effect"

import { ResimApi } from "../services/resim-api.js"
import { collectPages } from "./fetch-state.js"
import { type FetchError, fetchError, type UsageError, usageError } from "./types.js"

const isUuid = Schema.is(Schema.UUID)

// CHANGE: accept a project UUID as is, otherwise look the name up
// WHY: the backend addresses projects by id only
// FORMAT THEOREM: forall p: uuid(p) -> resolve(p) = p
// PURITY: SHELL
// EFFECT: Effect<string, UsageError | FetchError, ResimApi>
// INVARIANT: no list call is issued for a UUID
// COMPLEXITY: O(p)/O(n) where p = pages of projects
export const resolveProjectId = (
  project: string
): Effect.Effect<string, UsageError | FetchError, ResimApi> =>
  isUuid(project)
    ? Effect.succeed(project)
    : Effect.gen(function*(_) {
      const api = yield* _(ResimApi)
      const projects = yield* _(
        collectPages((pageToken) => api.listProjects(pageToken)),
        Effect.mapError(fetchError)
      )
      const found = projects.find((candidate) => candidate.name === project)
      return yield* _(
        pipe(
          Either.fromNullable(found, () => usageError(`Unable to find project: ${project}`)),
          Either.map((record) => record.projectId)
        )
      )
    })
