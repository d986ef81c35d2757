import { describe, expect, it } from "@effect/vitest"
import { Effect, Either } from "effect"

import { reportFailure } from "../../src/app/program.js"
import { parseArgs, readSyncOptions } from "../../src/shell/cli.js"
import { applyError, cancelled, usageError } from "../../src/shell/sync/types.js"
import { makeRuntimeEnv } from "../support/runtime-env.js"

describe("parseArgs", () => {
  it("applies defaults", () => {
    expect(parseArgs([], "/work")).toEqual(
      Either.right({ cwd: "/work", clone: false, verbose: false, updateConfig: false })
    )
  })

  it("reads long and short flags", () => {
    const parsed = parseArgs(
      ["-p", "test-project", "-c", "experiences.yaml", "--concurrency", "4", "-v", "--update-config", "--clone"],
      "/work"
    )

    expect(parsed).toEqual(
      Either.right({
        cwd: "/work",
        project: "test-project",
        experienceConfig: "experiences.yaml",
        concurrency: 4,
        clone: true,
        verbose: true,
        updateConfig: true
      })
    )
  })

  it("rejects unknown and incomplete flags", () => {
    expect(parseArgs(["--dry-run"], "/work")).toEqual(Either.left(usageError("Unknown argument: --dry-run")))
    expect(parseArgs(["--project"], "/work")).toEqual(Either.left(usageError("Missing value for --project")))
    expect(parseArgs(["--concurrency", "0"], "/work")).toEqual(
      Either.left(usageError("--concurrency must be a positive integer, got: 0"))
    )
    expect(parseArgs(["--concurrency", "2.5"], "/work")).toEqual(
      Either.left(usageError("--concurrency must be a positive integer, got: 2.5"))
    )
  })
})

describe("readSyncOptions", () => {
  it.effect("falls back to RESIM_PROJECT", () => {
    const env = makeRuntimeEnv({
      args: ["--experience-config", "experiences.yaml"],
      cwd: "/repo",
      env: { RESIM_PROJECT: "from-env" }
    })

    return Effect.gen(function*(_) {
      const options = yield* _(readSyncOptions)

      expect(options.project).toBe("from-env")
      expect(options.cwd).toBe("/repo")
      expect(options.experienceConfig).toBe("experiences.yaml")
    }).pipe(Effect.provide(env.layer))
  })

  it.effect("prefers the flag over the environment", () => {
    const env = makeRuntimeEnv({ args: ["--project", "from-flag"], env: { RESIM_PROJECT: "from-env" } })

    return Effect.gen(function*(_) {
      const options = yield* _(readSyncOptions)

      expect(options.project).toBe("from-flag")
    }).pipe(Effect.provide(env.layer))
  })
})

describe("reportFailure", () => {
  it.effect("sets the exit code for the failure", () => {
    const env = makeRuntimeEnv({})

    return Effect.gen(function*(_) {
      yield* _(reportFailure(usageError("--experience-config is required")))
      yield* _(reportFailure(applyError("archive experiences", "2 experiences", 500, "boom")))
      yield* _(reportFailure(cancelled("experiences", 1)))

      expect(env.exitCodes).toEqual([1, 2, 3])
    }).pipe(Effect.provide(env.layer))
  })
})
