import { describe, expect, it } from "@effect/vitest"
import { Deferred, Effect, pipe } from "effect"

import type { SyncConfig } from "../../src/core/experience.js"
import { computeUpdatePlan, type UpdatePlan } from "../../src/core/plan.js"
import { applyPlan, updateMaskFor } from "../../src/shell/sync/apply.js"
import { fetchDatabaseState } from "../../src/shell/sync/fetch-state.js"
import { apiError } from "../../src/shell/sync/types.js"
import { FakeBackend, PROJECT_ID } from "../support/fake-api.js"
import { configOf, configured, ID_A, stored } from "../support/planning.js"

const planFor = (config: SyncConfig) =>
  pipe(
    fetchDatabaseState(PROJECT_ID),
    Effect.flatMap((state) => computeUpdatePlan(config, state))
  )

const PHASES: Readonly<Record<string, number>> = {
  "create experience": 1,
  "restore experience": 1,
  "update experience": 1,
  "revise test suite": 2,
  "add tags to experiences": 3,
  "remove tag from experience": 3,
  "add systems to experiences": 3,
  "archive experiences": 4
}

describe("applyPlan", () => {
  it.effect("creates one experience", () => {
    const backend = new FakeBackend()

    return Effect.gen(function*(_) {
      const plan = yield* _(planFor(configOf([configured("A")])))
      const summary = yield* _(applyPlan(plan, { projectId: PROJECT_ID }))

      expect(backend.calls).toEqual([{ operation: "create experience", target: "A" }])
      expect(summary).toEqual({ experiences: 1, testSuites: 0, tagsAndSystems: 0, archived: 0 })
      expect(plan.matches[0]?.desired.experienceId).toBe(backend.experienceNamed("A")?.experienceId)
    }).pipe(Effect.provide(backend.layer))
  })

  it.effect("archives with a single bulk call", () => {
    const backend = new FakeBackend()
    backend.addExperience({ name: "A" })
    backend.addExperience({ name: "B" })

    return Effect.gen(function*(_) {
      const plan = yield* _(planFor(configOf([])))
      const summary = yield* _(applyPlan(plan, { projectId: PROJECT_ID }))

      expect(backend.calls).toEqual([{ operation: "archive experiences", target: "A,B" }])
      expect(summary.archived).toBe(2)
      expect(backend.experienceNamed("A")?.archived).toBe(true)
      expect(backend.experienceNamed("B")?.archived).toBe(true)
    }).pipe(Effect.provide(backend.layer))
  })

  it.effect("renames through an update and revises suites afterwards", () => {
    const backend = new FakeBackend()
    const id = backend.addExperience({ name: "old-name" })
    backend.addSuite("S")

    return Effect.gen(function*(_) {
      const plan = yield* _(
        planFor(
          configOf([configured("new-name", { experienceId: id })], {
            managedTestSuites: [{ name: "S", experiences: ["new-name"] }]
          })
        )
      )
      yield* _(applyPlan(plan, { projectId: PROJECT_ID }))

      expect(backend.calls).toEqual([
        { operation: "update experience", target: "new-name" },
        { operation: "revise test suite", target: "S" }
      ])
      expect(backend.experienceNamed("new-name")?.experienceId).toBe(id)
      expect(backend.suiteNamed("S")?.experiences).toEqual([id])
    }).pipe(Effect.provide(backend.layer))
  })

  it.effect("restores archived experiences before updating them", () => {
    const backend = new FakeBackend()
    backend.addExperience({ name: "back", archived: true })

    return Effect.gen(function*(_) {
      const plan = yield* _(planFor(configOf([configured("back")])))
      yield* _(applyPlan(plan, { projectId: PROJECT_ID }))

      expect(backend.operations()).toEqual(["restore experience", "update experience"])
      expect(backend.experienceNamed("back")?.archived).toBe(false)
    }).pipe(Effect.provide(backend.layer))
  })

  it.effect("runs the phases in order and feeds created ids downstream", () => {
    const backend = new FakeBackend()
    backend.addExperience({ name: "gone" })
    const kept = backend.addExperience({ name: "kept" })
    backend.addTag("smoke", [kept])
    backend.addSystem("planner")
    backend.addSuite("S")

    return Effect.gen(function*(_) {
      const plan = yield* _(
        planFor(
          configOf([configured("new", { tags: ["smoke"], systems: ["planner"] }), configured("kept")], {
            managedExperienceTags: ["smoke"],
            managedTestSuites: [{ name: "S", experiences: ["new", "kept"] }]
          })
        )
      )
      const summary = yield* _(applyPlan(plan, { projectId: PROJECT_ID, concurrency: 4 }))

      const phases = backend.operations().map((operation) => PHASES[operation] ?? 0)
      expect(phases).toEqual([...phases].sort())
      expect([...backend.operations()].sort()).toEqual([
        "add systems to experiences",
        "add tags to experiences",
        "archive experiences",
        "create experience",
        "remove tag from experience",
        "revise test suite",
        "update experience"
      ])
      const created = backend.experienceNamed("new")?.experienceId
      expect(backend.suiteNamed("S")?.experiences).toEqual([created, kept])
      expect(backend.tagMembers("smoke")).toEqual(["new"])
      expect(backend.systemMembers("planner")).toEqual(["new"])
      expect(backend.experienceNamed("gone")?.archived).toBe(true)
      expect(summary).toEqual({ experiences: 2, testSuites: 1, tagsAndSystems: 3, archived: 1 })
    }).pipe(Effect.provide(backend.layer))
  })

  it.effect("leaves unconfigured optional fields untouched", () => {
    const backend = new FakeBackend()
    backend.addExperience({ name: "A", profile: "test-profile", containerTimeoutSeconds: 60 })

    return Effect.gen(function*(_) {
      const plan = yield* _(planFor(configOf([configured("A", { containerTimeoutSeconds: 120 })])))
      yield* _(applyPlan(plan, { projectId: PROJECT_ID }))

      expect(backend.experienceNamed("A")).toMatchObject({
        profile: "test-profile",
        containerTimeoutSeconds: 120,
        description: "d"
      })
    }).pipe(Effect.provide(backend.layer))
  })

  it.effect("finishes the failing phase, then stops with the first error", () => {
    const backend = new FakeBackend()
    backend.addTag("smoke")
    backend.intercept = (call) =>
      call.operation === "create experience" && call.target === "bad"
        ? Effect.fail(apiError("create experience", 500, "boom"))
        : Effect.void

    return Effect.gen(function*(_) {
      const plan = yield* _(
        planFor(configOf([configured("bad", { tags: ["smoke"] }), configured("good", { tags: ["smoke"] })]))
      )
      const error = yield* _(Effect.flip(applyPlan(plan, { projectId: PROJECT_ID })))

      expect(error).toEqual({
        _tag: "ApplyError",
        operation: "create experience",
        entity: "bad",
        status: 500,
        body: "boom"
      })
      expect(backend.operations()).toEqual(["create experience", "create experience"])
      expect(backend.experienceNamed("good")).toBeDefined()
      expect(backend.tagMembers("smoke")).toEqual([])
    }).pipe(Effect.provide(backend.layer))
  })

  it.effect("reports a missing id without calling the backend", () => {
    const backend = new FakeBackend()
    const plan: UpdatePlan = {
      matches: [{ original: stored("x", ID_A), desired: configured("x") }],
      matchesByDesiredName: new Map(),
      tagUpdatesByName: new Map(),
      systemUpdatesByName: new Map(),
      testSuiteUpdatesByName: new Map()
    }

    return Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(applyPlan(plan, { projectId: PROJECT_ID })))

      expect(error).toEqual({
        _tag: "ApplyError",
        operation: "update experience",
        entity: "x",
        status: undefined,
        body: "Experience x has no id; its creation may have failed"
      })
      expect(backend.calls).toEqual([])
    }).pipe(Effect.provide(backend.layer))
  })

  it.effect("keeps at most `concurrency` calls in flight", () => {
    const backend = new FakeBackend()
    backend.intercept = () => Effect.yieldNow()

    return Effect.gen(function*(_) {
      const names = Array.from({ length: 10 }, (_value, index) => `e${index}`)
      const plan = yield* _(planFor(configOf(names.map((name) => configured(name)))))
      yield* _(applyPlan(plan, { projectId: PROJECT_ID, concurrency: 3 }))

      expect(backend.calls).toHaveLength(10)
      expect(backend.maxInFlight).toBeLessThanOrEqual(3)
    }).pipe(Effect.provide(backend.layer))
  })

  it.effect("stops when cancelled and never starts queued items", () => {
    const backend = new FakeBackend()

    return Effect.gen(function*(_) {
      const cancel = yield* _(Deferred.make<void>())
      backend.intercept = (call) =>
        Effect.gen(function*(_) {
          if (call.target === "e4") {
            yield* _(Deferred.succeed(cancel, undefined))
          }
          if (call.target === "e3" || call.target === "e4") {
            yield* _(Effect.never)
          }
        })

      const plan = yield* _(planFor(configOf(["e1", "e2", "e3", "e4", "e5"].map((name) => configured(name)))))
      const error = yield* _(Effect.flip(applyPlan(plan, { projectId: PROJECT_ID, concurrency: 2, cancel })))

      expect(error).toEqual({ _tag: "Cancelled", phase: "experiences", completed: 2 })
      expect(backend.calls.map((call) => call.target).sort()).toEqual(["e1", "e2", "e3", "e4"])
      expect(backend.experienceNamed("e1")).toBeDefined()
      expect(backend.experienceNamed("e2")).toBeDefined()
      expect(backend.experienceNamed("e3")).toBeUndefined()
      expect(backend.inFlight).toBe(0)
    }).pipe(Effect.provide(backend.layer))
  })

  it.effect("does not start a phase once cancelled", () => {
    const backend = new FakeBackend()

    return Effect.gen(function*(_) {
      const cancel = yield* _(Deferred.make<void>())
      yield* _(Deferred.succeed(cancel, undefined))
      const plan = yield* _(planFor(configOf([configured("A")])))
      const error = yield* _(Effect.flip(applyPlan(plan, { projectId: PROJECT_ID, cancel })))

      expect(error).toEqual({ _tag: "Cancelled", phase: "experiences", completed: 0 })
      expect(backend.calls).toEqual([])
    }).pipe(Effect.provide(backend.layer))
  })
})

describe("updateMaskFor", () => {
  it("adds optional fields only when configured", () => {
    expect(updateMaskFor(configured("A"))).toEqual(["name", "description", "cacheExempt", "locations"])
    expect(
      updateMaskFor(
        configured("A", {
          profile: "",
          environmentVariables: [],
          containerTimeoutSeconds: 30,
          customFields: []
        })
      )
    ).toEqual([
      "name",
      "description",
      "cacheExempt",
      "locations",
      "containerTimeoutSeconds",
      "profile",
      "environmentVariables",
      "customFields"
    ])
  })
})
