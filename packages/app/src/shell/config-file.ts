import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, loadError } from "../core/errors.js"
import { loadErrorFromPlatform } from "./load-document.js"

// CHANGE: decode .slabjson.json with schema validation
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types and ranges
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing implicit config yields undefined
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    indent: S.Int.pipe(S.nonNegative()),
    blockBytes: S.Int.pipe(S.positive()),
    singleValue: S.Boolean
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.indent === undefined ? {} : { indent: config.indent }),
      ...(config.blockBytes === undefined ? {} : { blockBytes: config.blockBytes }),
      ...(config.singleValue === undefined ? {} : { singleValue: config.singleValue })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => loadErrorFromPlatform(path, error)))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(loadError("file-not-found", path, "config file not found")))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => loadErrorFromPlatform(path, error)))
    )
    const decoded = yield* _(decodeConfig(contents))
    yield* _(Effect.logDebug(`loaded config ${path}`))
    return decoded
  })
