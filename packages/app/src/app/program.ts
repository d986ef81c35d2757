import type * as HttpClient from "@effect/platform/HttpClient"
import { Cause, Console, Deferred, Effect, Exit, Fiber, type Layer, Option, pipe } from "effect"

import { readSyncOptions } from "../shell/cli.js"
import type { FileSystemService } from "../shell/services/file-system.js"
import { type ResimApi, ResimApiFromEnv } from "../shell/services/resim-api.js"
import { RuntimeEnv } from "../shell/services/runtime-env.js"
import { describeSyncFailure, executeSync, exitCodeFor, prepareSync } from "../shell/sync/index.js"
import type { SyncFailure, UsageError } from "../shell/sync/types.js"

// CHANGE: log the failure the sync stopped on and set the matching exit code
// WHY: the program itself never fails; the exit code carries the outcome
// FORMAT THEOREM: forall f: report(f) -> exitCode = code(f)
// PURITY: SHELL
// EFFECT: Effect<void, never, RuntimeEnv>
// INVARIANT: exactly one summary line per failure
// COMPLEXITY: O(1)/O(1)
export const reportFailure = (failure: SyncFailure): Effect.Effect<void, never, RuntimeEnv> =>
  Effect.gen(function*(_) {
    const env = yield* _(RuntimeEnv)
    yield* _(Console.error(describeSyncFailure(failure)))
    yield* _(env.setExitCode(exitCodeFor(failure)))
  })

const reportExit = <A>(exit: Exit.Exit<A, SyncFailure>): Effect.Effect<void, never, RuntimeEnv> =>
  Exit.isSuccess(exit)
    ? Effect.void
    : Option.match(Cause.failureOption(exit.cause), {
      onNone: () => Effect.void,
      onSome: reportFailure
    })

// Interrupting the caller (SIGINT under runMain) completes `cancel` and waits for the
// sync to stop, so the applier's Cancelled failure is still reported.
const runCancellable = <A, R>(
  run: (cancel: Deferred.Deferred<void>) => Effect.Effect<A, SyncFailure, R>
): Effect.Effect<A, SyncFailure, R | RuntimeEnv> =>
  Effect.gen(function*(_) {
    const cancel = yield* _(Deferred.make<void>())
    const fiber = yield* _(Effect.forkDaemon(run(cancel)))
    return yield* _(
      Fiber.join(fiber),
      Effect.onInterrupt(() =>
        pipe(
          Deferred.succeed(cancel, undefined),
          Effect.zipRight(Fiber.await(fiber)),
          Effect.flatMap(reportExit)
        )
      )
    )
  })

/**
 * Compose the experience sync CLI around a given API layer.
 *
 * @param api - Layer providing the backend client; built only once the configuration loaded.
 * @returns Effect that parses arguments, loads the configuration and runs one sync.
 *
 * @pure false - reads argv, environment and files, calls the backend
 * @effect RuntimeEnv, FileSystemService, the API layer's requirements
 * @invariant every failure is reported and mapped to an exit code
 * @complexity O(n) where n = plan size
 * @throws Never - all errors are typed in the Effect error channel
 */
export const makeProgram = <R>(
  api: Layer.Layer<ResimApi, UsageError, R>
): Effect.Effect<void, never, RuntimeEnv | FileSystemService | R> =>
  pipe(
    readSyncOptions,
    Effect.flatMap((options) =>
      pipe(
        prepareSync(options),
        Effect.flatMap((prepared) =>
          runCancellable((cancel) => Effect.provide(executeSync(prepared, options, cancel), api))
        )
      )
    ),
    Effect.asVoid,
    Effect.catchAll(reportFailure)
  )

export const program: Effect.Effect<void, never, RuntimeEnv | FileSystemService | HttpClient.HttpClient> =
  makeProgram(ResimApiFromEnv)
