import type { PlatformError as PlatformErrorType } from "@effect/platform/Error"
import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { Context, Effect, Layer, pipe } from "effect"

import { type FileError, fileError } from "../sync/types.js"

export class FileSystemService extends Context.Tag("FileSystemService")<
  FileSystemService,
  {
    readonly readFileString: (pathValue: string) => Effect.Effect<string, FileError>
    readonly writeFileString: (pathValue: string, content: string) => Effect.Effect<void, FileError>
    readonly resolve: (cwd: string, pathValue: string) => string
  }
>() {}

const isNotFoundError = (error: PlatformErrorType): boolean =>
  error._tag === "SystemError" && error.reason === "NotFound"

const describePlatformError = (error: PlatformErrorType): string =>
  isNotFoundError(error) ? "File does not exist" : error.message

// CHANGE: wrap filesystem access behind a service for typed errors and testing
// WHY: enforce shell boundary and avoid raw fs usage in logic
// FORMAT THEOREM: forall p: read(write(p, c)) = c
// PURITY: SHELL
// EFFECT: Effect<FileSystemService, never, FileSystem | Path>
// INVARIANT: writeFileString creates missing parent directories
// COMPLEXITY: O(n)/O(n)
export const FileSystemLive = Layer.effect(
  FileSystemService,
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)

    const readFileString = (pathValue: string): Effect.Effect<string, FileError> =>
      pipe(
        fs.readFileString(pathValue, "utf8"),
        Effect.mapError((error) => fileError(pathValue, `Cannot read file: ${describePlatformError(error)}`))
      )

    const writeFileString = (pathValue: string, content: string): Effect.Effect<void, FileError> =>
      pipe(
        fs.makeDirectory(path.dirname(pathValue), { recursive: true }),
        Effect.zipRight(fs.writeFileString(pathValue, content)),
        Effect.mapError((error) => fileError(pathValue, `Cannot write file: ${describePlatformError(error)}`))
      )

    const resolve = (cwd: string, pathValue: string): string =>
      path.isAbsolute(pathValue) ? pathValue : path.resolve(cwd, pathValue)

    return {
      readFileString,
      writeFileString,
      resolve
    }
  })
)
