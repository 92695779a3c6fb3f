import { Data, Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify the error algebra of the parser core and the CLI shell
// FORMAT THEOREM: ∀c ∈ ErrorCode: errorCodeNumber(c) = index of c in ErrorCodes
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: ErrorCodes order is stable; "no-error" is ordinal 0
// COMPLEXITY: O(1)/O(1)

export const ErrorCodes = [
  "no-error",
  "file-not-found",
  "file-could-not-be-opened",
  "file-read-error",
  "memory-pool-error",
  "object-mismatch",
  "parsing-object",
  "array-mismatch",
  "parsing-element",
  "parsing-number",
  "parsing-string",
  "parsing-reserved-literal",
  "generic-parsing",
  "empty-document"
] as const

export type ErrorCode = typeof ErrorCodes[number]

/** The three codes owned by a file loader, never raised by the parser. */
export type LoadErrorCode = "file-not-found" | "file-could-not-be-opened" | "file-read-error"

export const errorCodeNumber = (code: ErrorCode): number => ErrorCodes.indexOf(code)

export const isErrorCode = (value: string): value is ErrorCode => ErrorCodes.some((code) => code === value)

/**
 * Human readable one-liner for an error code.
 *
 * @pure true
 * @invariant every code maps to a non-empty message
 * @complexity O(1)
 */
export const describeErrorCode = (code: ErrorCode): string =>
  Match.value(code).pipe(
    Match.when("no-error", () => "no error"),
    Match.when("file-not-found", () => "file not found"),
    Match.when("file-could-not-be-opened", () => "file could not be opened"),
    Match.when("file-read-error", () => "file could not be read"),
    Match.when("memory-pool-error", () => "memory pool error"),
    Match.when("object-mismatch", () => "object is not closed or has a malformed member list"),
    Match.when("parsing-object", () => "object could not be parsed"),
    Match.when("array-mismatch", () => "array is not closed or has a malformed value list"),
    Match.when("parsing-element", () => "object member must be \"key\" : value"),
    Match.when("parsing-number", () => "malformed number"),
    Match.when("parsing-string", () => "string is missing its closing quote"),
    Match.when("parsing-reserved-literal", () => "expected null, true or false"),
    Match.when("generic-parsing", () => "unexpected character"),
    Match.when("empty-document", () => "document is empty"),
    Match.exhaustive
  )

export type ParseFailure = {
  readonly _tag: "ParseFailure"
  readonly code: ErrorCode
  readonly offset: number
}

export const parseFailure = (code: ErrorCode, offset: number): ParseFailure => ({
  _tag: "ParseFailure",
  code,
  offset
})

/** Allocator contract violation: double free, foreign slot, stale handle. */
export class PoolDefect extends Data.TaggedError("PoolDefect")<{
  readonly pool: string
  readonly message: string
}> {}

/** Tree contract violation: unlinking from a parent the node is not attached to. */
export class TreeDefect extends Data.TaggedError("TreeDefect")<{
  readonly message: string
}> {}

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type LoadError = {
  readonly _tag: "LoadError"
  readonly code: LoadErrorCode
  readonly path: string
  readonly message: string
}
export type DocumentError = {
  readonly _tag: "DocumentError"
  readonly code: ErrorCode
  readonly offset: number
  readonly path: string
}

export type AppError =
  | CliError
  | ConfigError
  | LoadError
  | DocumentError

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const loadError = (code: LoadErrorCode, path: string, message: string): LoadError => ({
  _tag: "LoadError",
  code,
  path,
  message
})

export const documentError = (code: ErrorCode, offset: number, path: string): DocumentError => ({
  _tag: "DocumentError",
  code,
  offset,
  path
})

export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => value.message),
    Match.tag("ConfigError", (value) => `invalid config: ${value.message}`),
    Match.tag("LoadError", (value) => `${value.code}: ${value.path}: ${value.message}`),
    Match.tag(
      "DocumentError",
      (value) => `${value.code} at byte ${value.offset} in ${value.path}: ${describeErrorCode(value.code)}`
    ),
    Match.exhaustive
  )
