import * as HttpClient from "@effect/platform/HttpClient"
import * as HttpClientRequest from "@effect/platform/HttpClientRequest"
import type * as HttpClientResponse from "@effect/platform/HttpClientResponse"
import * as Schema from "@effect/schema/Schema"
import { Context, Effect, flow, Layer, Option, pipe } from "effect"
import type * as Scope from "effect/Scope"

import type { CustomField, EnvironmentVariable } from "../../core/experience.js"
import { type ApiError, apiError, type UsageError, usageError } from "../sync/types.js"
import { RuntimeEnv } from "./runtime-env.js"

export interface Page<A> {
  readonly items: ReadonlyArray<A>
  readonly nextPageToken: string | undefined
}

export interface ProjectRecord {
  readonly projectId: string
  readonly name: string
}

export interface ExperienceRecord {
  readonly experienceId: string
  readonly name: string
  readonly description: string
  readonly locations: ReadonlyArray<string>
  readonly profile: string
  readonly environmentVariables: ReadonlyArray<EnvironmentVariable>
  readonly cacheExempt: boolean
  readonly containerTimeoutSeconds: number | undefined
  readonly customFields: ReadonlyArray<CustomField> | undefined
  readonly archived: boolean
}

export interface ExperienceTagRecord {
  readonly tagId: string
  readonly name: string
}

export interface SystemRecord {
  readonly systemId: string
  readonly name: string
}

export interface TestSuiteRecord {
  readonly testSuiteId: string
  readonly name: string
  readonly revision: number
}

export interface ExperienceInput {
  readonly name: string
  readonly description: string
  readonly locations: ReadonlyArray<string>
  readonly profile: string | undefined
  readonly environmentVariables: ReadonlyArray<EnvironmentVariable> | undefined
  readonly cacheExempt: boolean
  readonly containerTimeoutSeconds: number | undefined
  readonly customFields: ReadonlyArray<CustomField> | undefined
}

export type UpdateMaskField =
  | "name"
  | "description"
  | "cacheExempt"
  | "locations"
  | "containerTimeoutSeconds"
  | "profile"
  | "environmentVariables"
  | "customFields"

export interface ProjectListParams {
  readonly projectId: string
  readonly pageToken: string | undefined
}

export interface ArchivedListParams extends ProjectListParams {
  readonly archived: boolean
}

export class ResimApi extends Context.Tag("ResimApi")<
  ResimApi,
  {
    readonly listProjects: (pageToken: string | undefined) => Effect.Effect<Page<ProjectRecord>, ApiError>
    readonly listExperiences: (params: ArchivedListParams) => Effect.Effect<Page<ExperienceRecord>, ApiError>
    readonly listExperienceTags: (params: ProjectListParams) => Effect.Effect<Page<ExperienceTagRecord>, ApiError>
    readonly listExperiencesForTag: (
      params: ArchivedListParams & { readonly tagId: string }
    ) => Effect.Effect<Page<string>, ApiError>
    readonly listSystems: (params: ProjectListParams) => Effect.Effect<Page<SystemRecord>, ApiError>
    readonly listExperiencesForSystem: (
      params: ArchivedListParams & { readonly systemId: string }
    ) => Effect.Effect<Page<string>, ApiError>
    readonly listTestSuites: (params: ProjectListParams) => Effect.Effect<Page<TestSuiteRecord>, ApiError>
    readonly createExperience: (
      projectId: string,
      input: ExperienceInput
    ) => Effect.Effect<ExperienceRecord, ApiError>
    readonly updateExperience: (
      projectId: string,
      experienceId: string,
      input: ExperienceInput,
      updateMask: ReadonlyArray<UpdateMaskField>
    ) => Effect.Effect<void, ApiError>
    readonly restoreExperience: (projectId: string, experienceId: string) => Effect.Effect<void, ApiError>
    readonly archiveExperiences: (
      projectId: string,
      experienceIds: ReadonlyArray<string>
    ) => Effect.Effect<void, ApiError>
    readonly addTagsToExperiences: (
      projectId: string,
      tagIds: ReadonlyArray<string>,
      experienceIds: ReadonlyArray<string>
    ) => Effect.Effect<void, ApiError>
    readonly removeTagFromExperience: (
      projectId: string,
      tagId: string,
      experienceId: string
    ) => Effect.Effect<void, ApiError>
    readonly addSystemsToExperiences: (
      projectId: string,
      systemIds: ReadonlyArray<string>,
      experienceIds: ReadonlyArray<string>
    ) => Effect.Effect<void, ApiError>
    readonly reviseTestSuite: (
      projectId: string,
      testSuiteId: string,
      experienceIds: ReadonlyArray<string>
    ) => Effect.Effect<void, ApiError>
  }
>() {}

export interface ResimApiConfig {
  readonly baseUrl: string
  readonly token: string
}

export const DEFAULT_API_URL = "https://api.resim.ai/v1"
const PAGE_SIZE = 100

const CustomFieldJson = Schema.Struct({
  name: Schema.String,
  type: Schema.Literal("text", "number", "timestamp", "json"),
  values: Schema.Array(Schema.String)
})

const EnvironmentVariableJson = Schema.Struct({
  name: Schema.String,
  value: Schema.String
})

const ExperienceJson = Schema.Struct({
  experienceID: Schema.String,
  name: Schema.String,
  description: Schema.optional(Schema.String),
  locations: Schema.optional(Schema.NullOr(Schema.Array(Schema.String))),
  profile: Schema.optional(Schema.String),
  environmentVariables: Schema.optional(Schema.NullOr(Schema.Array(EnvironmentVariableJson))),
  cacheExempt: Schema.optional(Schema.Boolean),
  containerTimeoutSeconds: Schema.optional(Schema.Number),
  customFields: Schema.optional(Schema.NullOr(Schema.Array(CustomFieldJson))),
  archived: Schema.optional(Schema.Boolean)
})

const ProjectJson = Schema.Struct({ projectID: Schema.String, name: Schema.String })
const ExperienceTagJson = Schema.Struct({ experienceTagID: Schema.String, name: Schema.String })
const SystemJson = Schema.Struct({ systemID: Schema.String, name: Schema.String })
const TestSuiteJson = Schema.Struct({
  testSuiteID: Schema.String,
  name: Schema.String,
  testSuiteRevision: Schema.optional(Schema.Number)
})

const PageEnvelope = Schema.Struct({
  nextPageToken: Schema.optional(Schema.NullOr(Schema.String))
})
const JsonObject = Schema.Record({ key: Schema.String, value: Schema.Unknown })

const toExperienceRecord = (json: Schema.Schema.Type<typeof ExperienceJson>): ExperienceRecord => ({
  experienceId: json.experienceID,
  name: json.name,
  description: json.description ?? "",
  locations: json.locations ?? [],
  profile: json.profile ?? "",
  environmentVariables: json.environmentVariables ?? [],
  cacheExempt: json.cacheExempt ?? false,
  containerTimeoutSeconds: json.containerTimeoutSeconds,
  customFields: json.customFields ?? undefined,
  archived: json.archived ?? false
})

const experienceBody = (input: ExperienceInput) => ({
  name: input.name,
  description: input.description,
  locations: input.locations,
  cacheExempt: input.cacheExempt,
  ...(input.profile === undefined ? {} : { profile: input.profile }),
  ...(input.environmentVariables === undefined ? {} : { environmentVariables: input.environmentVariables }),
  ...(input.containerTimeoutSeconds === undefined
    ? {}
    : { containerTimeoutSeconds: input.containerTimeoutSeconds }),
  ...(input.customFields === undefined ? {} : { customFields: input.customFields })
})

const listParams = (pageToken: string | undefined, archived?: boolean): Record<string, string> => ({
  pageSize: String(PAGE_SIZE),
  ...(pageToken === undefined ? {} : { pageToken }),
  ...(archived === undefined ? {} : { archived: String(archived) })
})

const describeBody = (body: string, fallback: string): string => body.length === 0 ? fallback : body

// CHANGE: REST client for the calls experience sync needs, over @effect/platform HttpClient
// WHY: the sync engine depends on the ResimApi tag only; tests swap in an in-memory backend
// FORMAT THEOREM: forall op: status(op) = expected(op) <-> success(op)
// PURITY: SHELL
// EFFECT: Effect<ResimApi, never, HttpClient>
// INVARIANT: every unexpected status becomes ApiError with the response body
// COMPLEXITY: O(1) per call
export const makeResimApiLayer = (
  config: ResimApiConfig
): Layer.Layer<ResimApi, never, HttpClient.HttpClient> =>
  Layer.effect(
    ResimApi,
    Effect.gen(function*(_) {
      const client = (yield* _(HttpClient.HttpClient)).pipe(
        HttpClient.mapRequest(
          flow(
            HttpClientRequest.prependUrl(config.baseUrl),
            HttpClientRequest.bearerToken(config.token),
            HttpClientRequest.acceptJson
          )
        )
      )

      const send = (
        operation: string,
        request: HttpClientRequest.HttpClientRequest,
        expectedStatus: number
      ): Effect.Effect<HttpClientResponse.HttpClientResponse, ApiError, Scope.Scope> =>
        pipe(
          client.execute(request),
          Effect.mapError((error) => apiError(operation, undefined, error.message)),
          Effect.flatMap((response) =>
            response.status === expectedStatus
              ? Effect.succeed(response)
              : pipe(
                response.text,
                Effect.orElseSucceed(() => ""),
                Effect.flatMap((body) =>
                  Effect.fail(
                    apiError(operation, response.status, describeBody(body, `unexpected status ${response.status}`))
                  )
                )
              )
          )
        )

      const sendVoid = (
        operation: string,
        request: HttpClientRequest.HttpClientRequest,
        expectedStatus: number
      ): Effect.Effect<void, ApiError> => Effect.scoped(Effect.asVoid(send(operation, request, expectedStatus)))

      const sendJson = <A, I>(
        operation: string,
        request: HttpClientRequest.HttpClientRequest,
        expectedStatus: number,
        schema: Schema.Schema<A, I>
      ): Effect.Effect<A, ApiError> =>
        Effect.scoped(
          Effect.gen(function*(_) {
            const response = yield* _(send(operation, request, expectedStatus))
            const json = yield* _(
              response.json,
              Effect.mapError((error) => apiError(operation, response.status, error.message))
            )
            return yield* _(
              Schema.decodeUnknown(schema)(json),
              Effect.mapError((error) => apiError(operation, response.status, error.message))
            )
          })
        )

      const listPage = <A, I, B>(
        operation: string,
        request: HttpClientRequest.HttpClientRequest,
        itemsKey: string,
        item: Schema.Schema<A, I>,
        toRecord: (value: A) => B
      ): Effect.Effect<Page<B>, ApiError> =>
        Effect.gen(function*(_) {
          const body = yield* _(sendJson(operation, request, 200, JsonObject))
          const envelope = yield* _(
            Schema.decodeUnknown(PageEnvelope)(body),
            Effect.mapError((error) => apiError(operation, 200, error.message))
          )
          const items = yield* _(
            Schema.decodeUnknown(Schema.NullOr(Schema.Array(item)))(body[itemsKey] ?? null),
            Effect.mapError((error) => apiError(operation, 200, error.message))
          )
          return {
            items: (items ?? []).map(toRecord),
            nextPageToken: Option.getOrUndefined(Option.fromNullable(envelope.nextPageToken))
          }
        })

      const get = (url: string, params: Record<string, string>) =>
        HttpClientRequest.get(url).pipe(HttpClientRequest.setUrlParams(params))

      const post = (url: string, body: unknown) => HttpClientRequest.post(url).pipe(HttpClientRequest.bodyUnsafeJson(body))

      const projectUrl = (projectId: string, suffix: string): string =>
        `/projects/${encodeURIComponent(projectId)}${suffix}`

      return {
        listProjects: (pageToken) =>
          listPage(
            "list projects",
            get("/projects", listParams(pageToken)),
            "projects",
            ProjectJson,
            (json) => ({ projectId: json.projectID, name: json.name })
          ),
        listExperiences: ({ archived, pageToken, projectId }) =>
          listPage(
            archived ? "list archived experiences" : "list experiences",
            get(projectUrl(projectId, "/experiences"), { ...listParams(pageToken, archived), orderBy: "timestamp" }),
            "experiences",
            ExperienceJson,
            toExperienceRecord
          ),
        listExperienceTags: ({ pageToken, projectId }) =>
          listPage(
            "list experience tags",
            get(projectUrl(projectId, "/experienceTags"), listParams(pageToken)),
            "experienceTags",
            ExperienceTagJson,
            (json) => ({ tagId: json.experienceTagID, name: json.name })
          ),
        listExperiencesForTag: ({ archived, pageToken, projectId, tagId }) =>
          listPage(
            "list experiences for tag",
            get(
              projectUrl(projectId, `/experienceTags/${encodeURIComponent(tagId)}/experiences`),
              listParams(pageToken, archived)
            ),
            "experiences",
            ExperienceJson,
            (json) => json.experienceID
          ),
        listSystems: ({ pageToken, projectId }) =>
          listPage(
            "list systems",
            get(projectUrl(projectId, "/systems"), listParams(pageToken)),
            "systems",
            SystemJson,
            (json) => ({ systemId: json.systemID, name: json.name })
          ),
        listExperiencesForSystem: ({ archived, pageToken, projectId, systemId }) =>
          listPage(
            "list experiences for system",
            get(
              projectUrl(projectId, `/systems/${encodeURIComponent(systemId)}/experiences`),
              listParams(pageToken, archived)
            ),
            "experiences",
            ExperienceJson,
            (json) => json.experienceID
          ),
        listTestSuites: ({ pageToken, projectId }) =>
          listPage(
            "list test suites",
            get(projectUrl(projectId, "/suites"), listParams(pageToken)),
            "testSuites",
            TestSuiteJson,
            (json) => ({ testSuiteId: json.testSuiteID, name: json.name, revision: json.testSuiteRevision ?? 0 })
          ),
        createExperience: (projectId, input) =>
          pipe(
            sendJson(
              "create experience",
              post(projectUrl(projectId, "/experiences"), experienceBody(input)),
              201,
              ExperienceJson
            ),
            Effect.map(toExperienceRecord)
          ),
        updateExperience: (projectId, experienceId, input, updateMask) =>
          sendVoid(
            "update experience",
            HttpClientRequest.patch(projectUrl(projectId, `/experiences/${encodeURIComponent(experienceId)}`)).pipe(
              HttpClientRequest.bodyUnsafeJson({ experience: experienceBody(input), updateMask })
            ),
            200
          ),
        restoreExperience: (projectId, experienceId) =>
          sendVoid(
            "restore experience",
            HttpClientRequest.post(projectUrl(projectId, `/experiences/${encodeURIComponent(experienceId)}/restore`)),
            204
          ),
        archiveExperiences: (projectId, experienceIds) =>
          sendVoid(
            "archive experiences",
            post(projectUrl(projectId, "/experiences/archive"), { experienceIDs: experienceIds }),
            200
          ),
        addTagsToExperiences: (projectId, tagIds, experienceIds) =>
          sendVoid(
            "add tags to experiences",
            post(projectUrl(projectId, "/experienceTags/experiences"), {
              experienceTagIDs: tagIds,
              experiences: experienceIds
            }),
            201
          ),
        removeTagFromExperience: (projectId, tagId, experienceId) =>
          sendVoid(
            "remove tag from experience",
            HttpClientRequest.del(
              projectUrl(
                projectId,
                `/experienceTags/${encodeURIComponent(tagId)}/experiences/${encodeURIComponent(experienceId)}`
              )
            ),
            204
          ),
        addSystemsToExperiences: (projectId, systemIds, experienceIds) =>
          sendVoid(
            "add systems to experiences",
            post(projectUrl(projectId, "/systems/experiences"), {
              systemIDs: systemIds,
              experiences: experienceIds
            }),
            201
          ),
        reviseTestSuite: (projectId, testSuiteId, experienceIds) =>
          sendVoid(
            "revise test suite",
            post(projectUrl(projectId, `/suites/${encodeURIComponent(testSuiteId)}/revise`), {
              experiences: experienceIds
            }),
            200
          )
      }
    })
  )

// CHANGE: build the live client from environment configuration
// WHY: the token and endpoint come from the runtime, never from the sync configuration
// FORMAT THEOREM: forall env: token(env) = none -> UsageError
// PURITY: SHELL
// EFFECT: Effect<ResimApi, UsageError, RuntimeEnv | HttpClient>
// INVARIANT: RESIM_API_URL defaults to the public endpoint
// COMPLEXITY: O(1)/O(1)
export const ResimApiFromEnv: Layer.Layer<ResimApi, UsageError, RuntimeEnv | HttpClient.HttpClient> = Layer
  .unwrapEffect(
    Effect.gen(function*(_) {
      const env = yield* _(RuntimeEnv)
      const baseUrl = Option.getOrElse(yield* _(env.envVar("RESIM_API_URL")), () => DEFAULT_API_URL)
      const token = yield* _(env.envVar("RESIM_API_TOKEN"))
      if (Option.isNone(token)) {
        return yield* _(Effect.fail(usageError("RESIM_API_TOKEN is not set")))
      }
      return makeResimApiLayer({ baseUrl, token: token.value })
    })
  )
