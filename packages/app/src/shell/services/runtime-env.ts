import { Context, Effect, Layer, Option } from "effect"

export class RuntimeEnv extends Context.Tag("RuntimeEnv")<
  RuntimeEnv,
  {
    readonly argv: Effect.Effect<ReadonlyArray<string>>
    readonly cwd: Effect.Effect<string>
    readonly envVar: (key: string) => Effect.Effect<Option.Option<string>>
    readonly setExitCode: (code: number) => Effect.Effect<void>
  }
>() {}

const readProcess = (): NodeJS.Process | undefined => typeof process === "undefined" ? undefined : process

const readEnv = (): NodeJS.ProcessEnv => readProcess()?.env ?? {}

// CHANGE: wrap process access behind a typed Effect service
// WHY: keep shell dependencies injectable and testable
// FORMAT THEOREM: forall k: env(k) -> Option<string>
// PURITY: SHELL
// EFFECT: Effect<RuntimeEnv, never, never>
// INVARIANT: empty environment values read as none
// COMPLEXITY: O(1)/O(1)
export const RuntimeEnvLive = Layer.succeed(RuntimeEnv, {
  argv: Effect.sync(() => {
    const proc = readProcess()
    return proc === undefined ? [] : [...proc.argv]
  }),
  cwd: Effect.sync(() => readProcess()?.cwd() ?? "."),
  envVar: (key) =>
    Effect.sync(() =>
      Option.fromNullable(readEnv()[key]).pipe(
        Option.filter((value) => value.length > 0)
      )
    ),
  setExitCode: (code) =>
    Effect.sync(() => {
      const proc = readProcess()
      if (proc !== undefined) {
        proc.exitCode = code
      }
    })
})
