import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import {
  configError,
  describeErrorCode,
  documentError,
  errorCodeNumber,
  ErrorCodes,
  isErrorCode,
  loadError,
  renderAppError
} from "../../src/core/errors.js"

describe("error codes", () => {
  it.effect("keeps a stable ordinal per code", () =>
    Effect.sync(() => {
      expect(ErrorCodes).toHaveLength(14)
      expect(errorCodeNumber("no-error")).toBe(0)
      expect(errorCodeNumber("file-not-found")).toBe(1)
      expect(errorCodeNumber("memory-pool-error")).toBe(4)
      expect(errorCodeNumber("generic-parsing")).toBe(12)
      expect(errorCodeNumber("empty-document")).toBe(13)
    }))

  it.effect("recognizes only known codes", () =>
    Effect.sync(() => {
      expect(isErrorCode("parsing-string")).toBe(true)
      expect(isErrorCode("parsing-strings")).toBe(false)
    }))

  it.effect("describes every code", () =>
    Effect.sync(() => {
      for (const code of ErrorCodes) {
        expect(describeErrorCode(code).length).toBeGreaterThan(0)
      }
      expect(describeErrorCode("parsing-number")).toBe("malformed number")
    }))
})

describe("renderAppError", () => {
  it.effect("renders each shell error", () =>
    Effect.sync(() => {
      expect(renderAppError({ _tag: "CliError", message: "Unknown flag: --x" })).toBe("Unknown flag: --x")
      expect(renderAppError(configError("bad indent"))).toBe("invalid config: bad indent")
      expect(renderAppError(loadError("file-not-found", "a.json", "missing"))).toBe("file-not-found: a.json: missing")
      expect(renderAppError(documentError("parsing-number", 3, "a.json"))).toBe(
        "parsing-number at byte 3 in a.json: malformed number"
      )
    }))
})
