import type { PlatformError } from "@effect/platform/Error"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import { Match } from "effect"
import * as Effect from "effect/Effect"

import type { DocumentOptions, JsonDocument } from "../core/document.js"
import { makeJsonDocument } from "../core/document.js"
import type { AppError, LoadError, LoadErrorCode } from "../core/errors.js"
import { documentError, loadError } from "../core/errors.js"

// CHANGE: file loader in front of the parser; owns the three file-layer error codes
// FORMAT THEOREM: ∀p: read(p) fails ⇒ LoadError.code ∈ {file-not-found, file-could-not-be-opened, file-read-error}
// PURITY: SHELL
// EFFECT: Effect<JsonDocument, AppError, FileSystem>
// INVARIANT: the parser only ever sees bytes that were read completely
// COMPLEXITY: O(n) where n = file size

const codeForReason = (error: PlatformError): LoadErrorCode =>
  Match.value(error).pipe(
    Match.tag("BadArgument", (): LoadErrorCode => "file-could-not-be-opened"),
    Match.tag("SystemError", (system) =>
      Match.value(system.reason).pipe(
        Match.when("NotFound", (): LoadErrorCode => "file-not-found"),
        Match.whenOr("PermissionDenied", "BadResource", "Busy", (): LoadErrorCode => "file-could-not-be-opened"),
        Match.orElse((): LoadErrorCode => "file-read-error")
      )),
    Match.exhaustive
  )

export const loadErrorFromPlatform = (path: string, error: PlatformError): LoadError =>
  loadError(codeForReason(error), path, error.message)

/**
 * Read a file and parse it into a fresh document, keeping any parse error on the document.
 *
 * @param path - File to read.
 * @param options - Pool block size and top-level strictness.
 * @returns The document; only IO failures fail the effect.
 *
 * @pure false
 * @effect FileSystem
 * @invariant the returned document is the caller's to destroy
 * @complexity O(n)
 */
export const readDocument = (
  path: string,
  options: DocumentOptions
): Effect.Effect<JsonDocument, LoadError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const bytes = yield* _(fs.readFile(path).pipe(Effect.mapError((error) => loadErrorFromPlatform(path, error))))
    const document = makeJsonDocument(options)
    const code = document.parse(bytes)
    yield* _(Effect.logDebug(`parsed ${path} (${bytes.length} bytes): ${code}`))
    return document
  })

/**
 * Like readDocument, but a parse error fails the effect with a DocumentError.
 *
 * @pure false
 * @effect FileSystem
 * @invariant success ⇒ document.errorCode() = "no-error"
 * @complexity O(n)
 */
export const loadDocument = (
  path: string,
  options: DocumentOptions
): Effect.Effect<JsonDocument, AppError, FileSystemService> =>
  Effect.flatMap(readDocument(path, options), (document) => {
    const detail = document.errorDetail()
    if (detail._tag === "None") {
      return Effect.succeed(document)
    }
    document.destroy()
    return Effect.fail(documentError(detail.value.code, detail.value.offset, path))
  })
