import { Effect, pipe } from "effect"
import { parse, stringify } from "yaml"

import { type ConfigError, decodeSyncConfig, encodeSyncConfig, parseError } from "../../core/config.js"
import type { SyncConfig } from "../../core/experience.js"
import { FileSystemService } from "../services/file-system.js"
import type { FileError } from "./types.js"

const describeUnknownError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

/**
 * Reads and decodes an experience configuration file.
 *
 * @pure false - reads the file system
 * @effect FileSystemService
 * @invariant an empty document decodes to an empty configuration
 * @complexity O(n) where n = file size
 */
// CHANGE: load the YAML configuration through the file-system service
// WHY: decoding stays pure; only the read is effectful
// FORMAT THEOREM: forall p: load(p) = decode(parse(read(p)))
// PURITY: SHELL
// EFFECT: Effect<SyncConfig, FileError | ConfigError, FileSystemService>
// INVARIANT: YAML syntax errors become ParseError
// COMPLEXITY: O(n)/O(n)
export const loadSyncConfig = (
  pathValue: string
): Effect.Effect<SyncConfig, FileError | ConfigError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    const text = yield* _(fs.readFileString(pathValue))
    const document = yield* _(
      Effect.try({
        try: (): unknown => parse(text),
        catch: (error) => parseError(pathValue, describeUnknownError(error))
      })
    )
    return yield* _(decodeSyncConfig(pathValue, document ?? {}))
  })

export const renderSyncConfig = (config: SyncConfig): string => stringify(encodeSyncConfig(config))

export const writeSyncConfig = (
  pathValue: string,
  config: SyncConfig
): Effect.Effect<void, FileError, FileSystemService> =>
  pipe(
    FileSystemService,
    Effect.flatMap((fs) => fs.writeFileString(pathValue, renderSyncConfig(config)))
  )
