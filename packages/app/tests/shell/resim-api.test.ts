import * as HttpClient from "@effect/platform/HttpClient"
import * as HttpClientError from "@effect/platform/HttpClientError"
import type * as HttpClientRequest from "@effect/platform/HttpClientRequest"
import * as HttpClientResponse from "@effect/platform/HttpClientResponse"
import { describe, expect, it } from "@effect/vitest"
import { Effect, Layer } from "effect"

import { makeResimApiLayer, ResimApi, ResimApiFromEnv } from "../../src/shell/services/resim-api.js"
import { apiError, usageError } from "../../src/shell/sync/types.js"
import { PROJECT_ID } from "../support/fake-api.js"
import { ID_A, ID_B } from "../support/planning.js"
import { makeRuntimeEnv } from "../support/runtime-env.js"

interface RecordedRequest {
  readonly method: string
  readonly url: URL
  readonly authorization: string | undefined
  readonly body: unknown
}

type Reply = { readonly status: number; readonly body?: unknown } | "offline"

const decodeBody = (request: HttpClientRequest.HttpClientRequest): unknown =>
  request.body._tag === "Uint8Array" ? JSON.parse(new TextDecoder().decode(request.body.body)) : undefined

const stubClient = (replies: ReadonlyArray<Reply>) => {
  const requests: Array<RecordedRequest> = []
  const client = HttpClient.make((request, url) => {
    requests.push({
      method: request.method,
      url,
      authorization: request.headers["authorization"],
      body: decodeBody(request)
    })
    const reply = replies[requests.length - 1] ?? { status: 500 }
    if (reply === "offline") {
      return Effect.fail(new HttpClientError.RequestError({ request, reason: "Transport", cause: "offline" }))
    }
    const text = reply.body === undefined ? "" : typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body)
    return Effect.succeed(
      HttpClientResponse.fromWeb(request, new Response(reply.status === 204 ? null : text, { status: reply.status }))
    )
  })
  return { requests, layer: Layer.succeed(HttpClient.HttpClient, client) }
}

const apiLayer = (replies: ReadonlyArray<Reply>) => {
  const stub = stubClient(replies)
  return {
    requests: stub.requests,
    layer: Layer.provide(makeResimApiLayer({ baseUrl: "https://api.test/v1", token: "test-secret" }), stub.layer)
  }
}

describe("makeResimApiLayer", () => {
  it.effect("lists a page of experiences", () => {
    const { layer, requests } = apiLayer([
      {
        status: 200,
        body: {
          experiences: [
            { experienceID: ID_A, name: "drive", description: "d", locations: ["s3://b/o"], cacheExempt: true }
          ],
          nextPageToken: "page-2"
        }
      }
    ])

    return Effect.gen(function*(_) {
      const api = yield* _(ResimApi)
      const page = yield* _(api.listExperiences({ projectId: PROJECT_ID, archived: true, pageToken: "page-1" }))

      expect(page.nextPageToken).toBe("page-2")
      expect(page.items).toEqual([
        {
          experienceId: ID_A,
          name: "drive",
          description: "d",
          locations: ["s3://b/o"],
          profile: "",
          environmentVariables: [],
          cacheExempt: true,
          containerTimeoutSeconds: undefined,
          customFields: undefined,
          archived: false
        }
      ])
      const [request] = requests
      expect(request?.method).toBe("GET")
      expect(request?.url.pathname).toBe(`/v1/projects/${PROJECT_ID}/experiences`)
      expect(request?.url.searchParams.get("pageSize")).toBe("100")
      expect(request?.url.searchParams.get("pageToken")).toBe("page-1")
      expect(request?.url.searchParams.get("archived")).toBe("true")
      expect(request?.authorization).toBe("Bearer test-secret")
    }).pipe(Effect.provide(layer))
  })

  it.effect("treats a missing item list as an empty page", () => {
    const { layer } = apiLayer([{ status: 200, body: {} }])

    return Effect.gen(function*(_) {
      const api = yield* _(ResimApi)
      const page = yield* _(api.listExperienceTags({ projectId: PROJECT_ID, pageToken: undefined }))

      expect(page).toEqual({ items: [], nextPageToken: undefined })
    }).pipe(Effect.provide(layer))
  })

  it.effect("creates an experience and sends only configured fields", () => {
    const { layer, requests } = apiLayer([{ status: 201, body: { experienceID: ID_B, name: "drive" } }])

    return Effect.gen(function*(_) {
      const api = yield* _(ResimApi)
      const created = yield* _(
        api.createExperience(PROJECT_ID, {
          name: "drive",
          description: "d",
          locations: ["s3://b/o"],
          profile: undefined,
          environmentVariables: undefined,
          cacheExempt: false,
          containerTimeoutSeconds: 30,
          customFields: undefined
        })
      )

      expect(created.experienceId).toBe(ID_B)
      expect(requests[0]?.method).toBe("POST")
      expect(requests[0]?.body).toEqual({
        name: "drive",
        description: "d",
        locations: ["s3://b/o"],
        cacheExempt: false,
        containerTimeoutSeconds: 30
      })
    }).pipe(Effect.provide(layer))
  })

  it.effect("sends bulk membership and revision bodies", () => {
    const { layer, requests } = apiLayer([{ status: 201 }, { status: 200 }, { status: 204 }])

    return Effect.gen(function*(_) {
      const api = yield* _(ResimApi)
      yield* _(api.addTagsToExperiences(PROJECT_ID, [ID_A], [ID_B]))
      yield* _(api.reviseTestSuite(PROJECT_ID, ID_A, [ID_B]))
      yield* _(api.removeTagFromExperience(PROJECT_ID, ID_A, ID_B))

      expect(requests.map((request) => [request.method, request.url.pathname, request.body])).toEqual([
        ["POST", `/v1/projects/${PROJECT_ID}/experienceTags/experiences`, {
          experienceTagIDs: [ID_A],
          experiences: [ID_B]
        }],
        ["POST", `/v1/projects/${PROJECT_ID}/suites/${ID_A}/revise`, { experiences: [ID_B] }],
        ["DELETE", `/v1/projects/${PROJECT_ID}/experienceTags/${ID_A}/experiences/${ID_B}`, undefined]
      ])
    }).pipe(Effect.provide(layer))
  })

  it.effect("turns an unexpected status into an api error with the body", () => {
    const { layer } = apiLayer([{ status: 409, body: "name already taken" }])

    return Effect.gen(function*(_) {
      const api = yield* _(ResimApi)
      const error = yield* _(
        Effect.flip(
          api.updateExperience(
            PROJECT_ID,
            ID_A,
            {
              name: "drive",
              description: "d",
              locations: [],
              profile: undefined,
              environmentVariables: undefined,
              cacheExempt: false,
              containerTimeoutSeconds: undefined,
              customFields: undefined
            },
            ["name"]
          )
        )
      )

      expect(error).toEqual(apiError("update experience", 409, "name already taken"))
    }).pipe(Effect.provide(layer))
  })

  it.effect("reports transport failures without a status", () => {
    const { layer } = apiLayer(["offline"])

    return Effect.gen(function*(_) {
      const api = yield* _(ResimApi)
      const error = yield* _(Effect.flip(api.archiveExperiences(PROJECT_ID, [ID_A])))

      expect(error.operation).toBe("archive experiences")
      expect(error.status).toBeUndefined()
    }).pipe(Effect.provide(layer))
  })
})

describe("ResimApiFromEnv", () => {
  it.effect("requires an api token", () => {
    const env = makeRuntimeEnv({})
    const layer = ResimApiFromEnv.pipe(Layer.provide(Layer.merge(env.layer, stubClient([]).layer)))

    return Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(Effect.provide(ResimApi, layer)))

      expect(error).toEqual(usageError("RESIM_API_TOKEN is not set"))
    })
  })

  it.effect("uses the configured endpoint", () => {
    const env = makeRuntimeEnv({ env: { RESIM_API_URL: "https://staging.test/v1", RESIM_API_TOKEN: "test-secret" } })
    const stub = stubClient([{ status: 200, body: { projects: [{ projectID: PROJECT_ID, name: "test-project" }] } }])
    const layer = ResimApiFromEnv.pipe(Layer.provide(Layer.merge(env.layer, stub.layer)))

    return Effect.gen(function*(_) {
      const api = yield* _(ResimApi)
      const page = yield* _(api.listProjects(undefined))

      expect(page.items).toEqual([{ projectId: PROJECT_ID, name: "test-project" }])
      expect(stub.requests[0]?.url.origin).toBe("https://staging.test")
      expect(stub.requests[0]?.authorization).toBe("Bearer test-secret")
    }).pipe(Effect.provide(layer))
  })
})
