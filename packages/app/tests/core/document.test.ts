import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Option from "effect/Option"

import { makeJsonDocument } from "../../src/core/document.js"
import type { JsonDocument } from "../../src/core/document.js"
import { TreeDefect } from "../../src/core/errors.js"
import type { ErrorCode } from "../../src/core/errors.js"
import { toJson } from "../../src/core/json.js"
import { makePrinter } from "../../src/core/printer.js"
import { childRefs, insertEndChild } from "../../src/core/tree.js"

const rootKinds = (document: JsonDocument): ReadonlyArray<string> =>
  childRefs(document.store, document.root).map((ref) => ref.kind)

const outstanding = (document: JsonDocument): number =>
  document.poolStats().reduce((total, stats) => total + stats.outstanding, 0)

describe("JsonDocument.parse", () => {
  it.effect("builds one object for a well-formed value", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      expect(document.parse("{\"a\":1,\"b\":[true,false]}")).toBe("no-error")
      expect(document.errorCode()).toBe("no-error")
      expect(Option.isNone(document.errorDetail())).toBe(true)
      expect(rootKinds(document)).toEqual(["Object"])
    }))

  it.effect("accepts a sequence of top-level values by default", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      expect(document.parse("1 \"x\" [] null")).toBe("no-error")
      expect(rootKinds(document)).toEqual(["Number", "String", "Array", "Literal"])
    }))

  it.effect("rejects a second top-level value when a single value is required", () =>
    Effect.sync(() => {
      const document = makeJsonDocument({ requireSingleValue: true })
      expect(document.parse("1 \"x\"")).toBe("generic-parsing")
      expect(Option.getOrThrow(document.errorDetail()).offset).toBe(2)
      expect(rootKinds(document)).toEqual([])
      expect(outstanding(document)).toBe(0)
    }))

  const failures: ReadonlyArray<readonly [string, ErrorCode, number]> = [
    ["{", "object-mismatch", 1],
    ["{\"a\":1", "object-mismatch", 6],
    ["nul", "parsing-reserved-literal", 0],
    ["[tru]", "parsing-reserved-literal", 1],
    ["[1,2", "array-mismatch", 4],
    ["[1,]", "array-mismatch", 3],
    ["{\"a", "parsing-string", 3],
    ["{\"a\" 1}", "parsing-element", 5],
    ["{\"a\":}", "parsing-element", 5],
    ["{1:2}", "parsing-element", 1],
    ["-", "parsing-number", 0],
    ["[-x]", "parsing-number", 1],
    ["}", "generic-parsing", 0],
    ["1 ?", "generic-parsing", 2]
  ]

  for (const [input, code, offset] of failures) {
    it.effect(`reports ${code} for ${input}`, () =>
      Effect.sync(() => {
        const document = makeJsonDocument()
        expect(document.parse(input)).toBe(code)
        expect(Option.getOrThrow(document.errorDetail())).toEqual({ _tag: "ParseFailure", code, offset })
        expect(rootKinds(document)).toEqual([])
        expect(outstanding(document)).toBe(0)
      }))
  }

  it.effect("reports empty-document for empty and whitespace-only input", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      expect(document.parse("")).toBe("empty-document")
      expect(document.parse(" \n\t ")).toBe("empty-document")
      expect(rootKinds(document)).toEqual([])
    }))

  it.effect("clears the previous tree and error on every parse", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      expect(document.parse("[1,2,3]")).toBe("no-error")
      expect(document.parse("[")).toBe("array-mismatch")
      expect(document.parse("true")).toBe("no-error")
      expect(document.errorCode()).toBe("no-error")
      expect(rootKinds(document)).toEqual(["Literal"])
      expect(outstanding(document)).toBe(1)
    }))

  it.effect("reads only up to an explicit length", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      expect(document.parse("[1,2]garbage", 5)).toBe("no-error")
      expect(rootKinds(document)).toEqual(["Array"])
    }))

  it.effect("stops at the first zero byte", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      expect(document.parse(new Uint8Array([0x31, 0x00, 0x7d]))).toBe("no-error")
      expect(rootKinds(document)).toEqual(["Number"])
      expect(document.buffer()).toEqual(new Uint8Array([0x31, 0x00]))
    }))

  it.effect("overwrites each closing string quote with a terminator", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      expect(document.parse("\"ab\"")).toBe("no-error")
      expect(document.buffer()).toEqual(new Uint8Array([0x22, 0x61, 0x62, 0x00, 0x00]))
    }))

  it.effect("does not modify the caller's bytes", () =>
    Effect.sync(() => {
      const input = new TextEncoder().encode("\"ab\"")
      makeJsonDocument().parse(input)
      expect(input[3]).toBe(0x22)
    }))

  it.effect("makes handles from an earlier parse stale", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      document.parse("[1]")
      const [array] = childRefs(document.store, document.root)
      if (array === undefined) {
        throw new Error("expected a root child")
      }
      document.parse("[2]")
      expect(Option.isNone(document.lookup(array))).toBe(true)
      expect(() => document.store.resolve(array)).toThrow(TreeDefect)
    }))

  it.effect("grows each pool block by block", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      const values = Array.from({ length: 20 }, (_, index) => String(index)).join(",")
      expect(document.parse(`[${values}]`)).toBe("no-error")
      const number = document.poolStats().find((stats) => stats.name === "number")
      expect(number?.slotsPerBlock).toBe(14)
      expect(number?.blocks).toBe(2)
      expect(number?.outstanding).toBe(20)
    }))

  it.effect("honours a custom block size", () =>
    Effect.sync(() => {
      const document = makeJsonDocument({ blockBytes: 128 })
      document.parse("[1,2,3]")
      const number = document.poolStats().find((stats) => stats.name === "number")
      expect(number?.slotsPerBlock).toBe(1)
      expect(number?.blocks).toBe(3)
    }))
})

describe("JsonDocument.parse at the limits", () => {
  const depth = 10_000

  it.effect("parses, prints and tears down arrays nested ten thousand deep", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      expect(document.parse("[".repeat(depth) + "]".repeat(depth))).toBe("no-error")
      expect(outstanding(document)).toBe(depth)
      const printer = makePrinter({ indent: 0 })
      document.accept(printer)
      expect(printer.text()).toBe("[\n".repeat(depth) + "\n]".repeat(depth))
      document.destroy()
      expect(outstanding(document)).toBe(0)
    }))

  it.effect("frees every open container when a deep document is cut short", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      expect(document.parse("[".repeat(depth))).toBe("array-mismatch")
      expect(Option.getOrThrow(document.errorDetail()).offset).toBe(depth)
      expect(rootKinds(document)).toEqual([])
      expect(outstanding(document)).toBe(0)
      expect(document.parse("[1]")).toBe("no-error")
      expect(outstanding(document)).toBe(2)
    }))

  it.effect("rejects every proper prefix without leaking a slot", () =>
    Effect.sync(() => {
      const source = "{\"a\":[1,-2.5e3,true,false,null],\"b\\\"c\":{\"d\":\"x\\\\y\"},\"e\":[]}"
      const document = makeJsonDocument()
      expect(document.parse(source)).toBe("no-error")
      const accepted: Array<number> = []
      const leaking: Array<number> = []
      for (let length = 0; length < source.length; length++) {
        if (document.parse(source, length) === "no-error") {
          accepted.push(length)
        }
        if (outstanding(document) !== 0) {
          leaking.push(length)
        }
      }
      expect(accepted).toEqual([])
      expect(leaking).toEqual([])
      document.destroy()
      expect(outstanding(document)).toBe(0)
    }))

  it.effect("reads a number hundreds of thousands of digits long", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      expect(document.parse("0".repeat(300_000) + "7")).toBe("no-error")
      expect(toJson({ buffer: document.buffer(), store: document.store }, document.root)).toEqual([7])
    }))
})

describe("JsonDocument factories", () => {
  it.effect("allocates nodes from the pool of their kind", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      const element = document.createElement()
      const text = document.createNode("String")
      expect(element.ref.kind).toBe("Element")
      expect(text._tag).toBe("String")
      const elements = document.poolStats().find((stats) => stats.name === "element")
      expect(elements?.outstanding).toBe(1)
      expect(elements?.untracked).toBe(1)
    }))

  it.effect("releases a detached node and its children", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      const array = document.createNode("Array")
      const child = document.createNode("Number")
      if (array._tag !== "Array") {
        throw new Error("expected an array")
      }
      insertEndChild(document.store, array.ref, child.ref)
      expect(childRefs(document.store, array.ref)).toEqual([child.ref])
      document.releaseNode(array.ref)
      expect(outstanding(document)).toBe(0)
      expect(document.poolStats().every((stats) => stats.untracked === 0)).toBe(true)
    }))

  it.effect("destroy leaves empty pools behind", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      document.parse("{\"a\":[1,\"x\"]}")
      document.destroy()
      expect(rootKinds(document)).toEqual([])
      expect(document.poolStats().map((stats) => [stats.blocks, stats.outstanding])).toEqual([
        [0, 0],
        [0, 0],
        [0, 0],
        [0, 0],
        [0, 0],
        [0, 0]
      ])
    }))
})
