import { Effect, Either, Option } from "effect"

import { RuntimeEnv } from "./services/runtime-env.js"
import { type SyncOptions, type UsageError, usageError } from "./sync/types.js"

type ValueKey = "project" | "experienceConfig" | "concurrency"
type BooleanKey = "clone" | "verbose" | "updateConfig"

const valueFlags = new Map<string, ValueKey>([
  ["--project", "project"],
  ["-p", "project"],
  ["--experience-config", "experienceConfig"],
  ["-c", "experienceConfig"],
  ["--concurrency", "concurrency"]
])

const booleanFlags = new Map<string, BooleanKey>([
  ["--clone", "clone"],
  ["--verbose", "verbose"],
  ["-v", "verbose"],
  ["--update-config", "updateConfig"]
])

const parseConcurrency = (value: string): Either.Either<number, UsageError> => {
  const parsed = Number(value)
  return Number.isInteger(parsed) && parsed > 0
    ? Either.right(parsed)
    : Either.left(usageError(`--concurrency must be a positive integer, got: ${value}`))
}

// CHANGE: parse experience sync flags from argv
// WHY: keep argument handling pure so it is testable without a process
// FORMAT THEOREM: forall a: parse(a) = Right(opts) | Left(UsageError)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a value flag without a value is a usage error
// COMPLEXITY: O(n)/O(1)
export const parseArgs = (
  args: ReadonlyArray<string>,
  cwd: string
): Either.Either<SyncOptions, UsageError> => {
  let result: SyncOptions = { cwd, clone: false, verbose: false, updateConfig: false }

  let index = 0
  while (index < args.length) {
    const arg = args[index]
    if (arg === undefined) {
      index += 1
      continue
    }

    const booleanKey = booleanFlags.get(arg)
    if (booleanKey !== undefined) {
      result = { ...result, [booleanKey]: true }
      index += 1
      continue
    }

    const valueKey = valueFlags.get(arg)
    if (valueKey === undefined) {
      return Either.left(usageError(`Unknown argument: ${arg}`))
    }
    const value = args[index + 1]
    if (value === undefined) {
      return Either.left(usageError(`Missing value for ${arg}`))
    }
    if (valueKey === "concurrency") {
      const concurrency = parseConcurrency(value)
      if (Either.isLeft(concurrency)) {
        return Either.left(concurrency.left)
      }
      result = { ...result, concurrency: concurrency.right }
    } else {
      result = { ...result, [valueKey]: value }
    }
    index += 2
  }

  return Either.right(result)
}

/**
 * Reads CLI arguments and builds SyncOptions.
 *
 * @returns Effect with resolved SyncOptions.
 *
 * @pure false - reads process argv, cwd and environment via RuntimeEnv
 * @effect RuntimeEnv
 * @invariant options.cwd is always defined; --project overrides RESIM_PROJECT
 * @complexity O(n) where n = |args|
 */
export const readSyncOptions: Effect.Effect<SyncOptions, UsageError, RuntimeEnv> = Effect.gen(function*(_) {
  const env = yield* _(RuntimeEnv)
  const argv = yield* _(env.argv)
  const cwd = yield* _(env.cwd)
  const options = yield* _(parseArgs(argv.slice(2), cwd))
  if (options.project !== undefined) {
    return options
  }
  const project = yield* _(env.envVar("RESIM_PROJECT"))
  return Option.match(project, {
    onNone: () => options,
    onSome: (value) => ({ ...options, project: value })
  })
})
