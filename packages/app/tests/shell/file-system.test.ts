import { NodeContext } from "@effect/platform-node"
import * as Path from "@effect/platform/Path"
import { describe, expect, it } from "@effect/vitest"
import { Effect, Layer } from "effect"

import { FileSystemLive, FileSystemService } from "../../src/shell/services/file-system.js"
import { makeTempDir } from "../support/fs-helpers.js"

const layer = Layer.mergeAll(Layer.provide(FileSystemLive, NodeContext.layer), NodeContext.layer)

describe("FileSystemLive", () => {
  it.scoped("writes into missing directories and reads back", () =>
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystemService)
      const path = yield* _(Path.Path)
      const root = yield* _(makeTempDir(new URL(import.meta.url), "fs-"))
      const target = path.join(root, "nested", "experiences.yaml")

      yield* _(fs.writeFileString(target, "experiences: []\n"))

      expect(yield* _(fs.readFileString(target))).toBe("experiences: []\n")
    }).pipe(Effect.provide(layer)))

  it.scoped("maps a missing file to a file error", () =>
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystemService)
      const path = yield* _(Path.Path)
      const root = yield* _(makeTempDir(new URL(import.meta.url), "fs-"))
      const missing = path.join(root, "absent.yaml")

      const error = yield* _(Effect.flip(fs.readFileString(missing)))

      expect(error).toEqual({ _tag: "FileError", path: missing, reason: "Cannot read file: File does not exist" })
    }).pipe(Effect.provide(layer)))

  it.effect("resolves relative paths against the working directory", () =>
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystemService)

      expect(fs.resolve("/work", "configs/experiences.yaml")).toBe("/work/configs/experiences.yaml")
      expect(fs.resolve("/work", "/etc/experiences.yaml")).toBe("/etc/experiences.yaml")
    }).pipe(Effect.provide(layer)))
})
