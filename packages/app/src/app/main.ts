#!/usr/bin/env node
import * as FetchHttpClient from "@effect/platform/FetchHttpClient"
import { defaultTeardown, type Teardown } from "@effect/platform/Runtime"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Cause, Effect, Exit, Layer, pipe } from "effect"

import { FileSystemLive } from "../shell/services/file-system.js"
import { RuntimeEnvLive } from "../shell/services/runtime-env.js"
import { program } from "./program.js"

const CANCELLED_EXIT_CODE = 3

// Interrupted by a signal.
const teardown: Teardown = (exit, onExit) => {
  if (Exit.isFailure(exit) && Cause.isInterruptedOnly(exit.cause)) {
    onExit(CANCELLED_EXIT_CODE)
    return
  }
  defaultTeardown(exit, onExit)
}

// CHANGE: run the sync program through the Node runtime with all live layers
// WHY: provide platform services and shell dependencies in one place
// FORMAT THEOREM: forall env: provide(env) -> runMain(program)
// PURITY: SHELL
// EFFECT: Effect<void, never, RuntimeEnv | FileSystemService | HttpClient>
// INVARIANT: program executed with NodeContext + live services
// COMPLEXITY: O(1)/O(1)
const main = pipe(
  program,
  Effect.provide(
    Layer.provideMerge(
      Layer.mergeAll(RuntimeEnvLive, FileSystemLive, FetchHttpClient.layer),
      NodeContext.layer
    )
  )
)

NodeRuntime.runMain(main, { teardown })
