import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { DEFAULT_CONFIG_PATH, parseCliArgs } from "../../src/core/cli.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "slabjson", ...args]

const errorMessage = (args: ReadonlyArray<string>): string =>
  Either.match(parseCliArgs(args), {
    onLeft: (error) => error.message,
    onRight: () => "parsed"
  })

describe("parseCliArgs", () => {
  it.effect("defaults to format with no optional flags", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(argv("--file", "input.json"))
      expect(parsed).toEqual(
        Either.right({
          command: "format",
          file: "input.json",
          indent: undefined,
          blockBytes: undefined,
          singleValue: undefined,
          configPath: DEFAULT_CONFIG_PATH,
          configExplicit: false,
          json: false,
          silent: false,
          trace: false
        })
      )
    }))

  it.effect("reads every flag in both spellings", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(
        argv(
          "stats",
          "--file=data.json",
          "--indent",
          "2",
          "--block-bytes=512",
          "--single-value",
          "--config",
          "custom.json",
          "--json",
          "--silent",
          "--trace"
        )
      )
      expect(Either.getOrThrow(parsed)).toEqual({
        command: "stats",
        file: "data.json",
        indent: 2,
        blockBytes: 512,
        singleValue: true,
        configPath: "custom.json",
        configExplicit: true,
        json: true,
        silent: true,
        trace: true
      })
    }))

  it.effect("takes an explicit boolean after --single-value", () =>
    Effect.sync(() => {
      const parsed = Either.getOrThrow(parseCliArgs(argv("check", "--single-value", "false", "--file", "a.json")))
      expect(parsed.singleValue).toBe(false)
      expect(parsed.command).toBe("check")
    }))

  it.effect("rejects malformed input", () =>
    Effect.sync(() => {
      expect(errorMessage(argv("lint", "--file", "a.json"))).toBe("Unknown command: lint")
      expect(errorMessage(argv("--file", "a.json", "--pretty"))).toBe("Unknown flag: --pretty")
      expect(errorMessage(argv("--file", "a.json", "-f"))).toBe("Unknown flag: -f")
      expect(errorMessage(argv("format", "a.json"))).toBe("Unexpected positional argument: a.json")
      expect(errorMessage(argv("check"))).toBe("Missing required flag --file")
      expect(errorMessage(argv("--file"))).toBe("Missing value for --file")
      expect(errorMessage(argv("--file", "a.json", "--indent", "two"))).toBe("Invalid value for --indent: two")
      expect(errorMessage(argv("--file", "a.json", "--block-bytes", "0"))).toBe("--block-bytes must be at least 1")
      expect(errorMessage(argv("--file", "a.json", "--single-value=maybe"))).toBe("Invalid boolean value: maybe")
    }))

  it.effect("accepts an indent of zero", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(parseCliArgs(argv("--file", "a.json", "--indent=0"))).indent).toBe(0)
    }))
})
