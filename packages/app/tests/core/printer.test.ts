import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { makeJsonDocument } from "../../src/core/document.js"
import type { JsonDocument } from "../../src/core/document.js"
import { toJson } from "../../src/core/json.js"
import { makePrinter } from "../../src/core/printer.js"
import type { PrinterOptions } from "../../src/core/printer.js"

const print = (text: string, options?: PrinterOptions): string => {
  const document = makeJsonDocument()
  expect(document.parse(text)).toBe("no-error")
  const printer = makePrinter(options)
  document.accept(printer)
  return printer.text()
}

const materialize = (document: JsonDocument) => toJson({ buffer: document.buffer(), store: document.store }, document.root)

describe("makePrinter", () => {
  it.effect("prints nested containers with four-space indentation", () =>
    Effect.sync(() => {
      expect(print("{\"a\":1,\"b\":[true,false]}")).toBe(
        "{\n    \"a\" : 1,\n    \"b\" : [\n        true,\n        false\n    ]\n}"
      )
    }))

  it.effect("prints empty containers on three lines", () =>
    Effect.sync(() => {
      expect(print("{}")).toBe("{\n\n}")
      expect(print("[]")).toBe("[\n\n]")
    }))

  it.effect("honours a custom indent", () =>
    Effect.sync(() => {
      expect(print("[1,[null]]", { indent: 2 })).toBe("[\n  1,\n  [\n    null\n  ]\n]")
    }))

  it.effect("separates top-level values with a comma", () =>
    Effect.sync(() => {
      expect(print("1 2")).toBe("1,\n2")
    }))

  it.effect("prints numbers in their shortest form and strings verbatim", () =>
    Effect.sync(() => {
      expect(print("[1.5e2,-0.25,\"a\\\"b\"]", { indent: 0 })).toBe("[\n150,\n-0.25,\n\"a\\\"b\"\n]")
    }))

  it.effect("spells out-of-range numbers so they read back as infinities", () =>
    Effect.sync(() => {
      const text = print("[1e999,-1e999]", { indent: 0 })
      expect(text).toBe("[\n1e999,\n-1e999\n]")
      const again = makeJsonDocument()
      expect(again.parse(text)).toBe("no-error")
      expect(materialize(again)).toEqual([[Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY]])
    }))

  it.effect("reparses its own output into the same values", () =>
    Effect.sync(() => {
      const source = "{\"name\":\"slab\",\"sizes\":[64,72,80],\"nested\":{\"ok\":true,\"none\":null}}"
      const first = makeJsonDocument()
      first.parse(source)
      const printer = makePrinter()
      first.accept(printer)
      const second = makeJsonDocument()
      expect(second.parse(printer.text())).toBe("no-error")
      expect(materialize(second)).toEqual(materialize(first))
      expect(materialize(second)).toEqual([JSON.parse(source)])
    }))
})

describe("JsonDocument.accept", () => {
  it.effect("stops the remaining siblings when a leaf returns false", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      document.parse("[1,2,3]")
      const seen: Array<number> = []
      let exits = 0
      document.accept({
        visitNumber: (node) => {
          seen.push(node.value)
          return false
        },
        visitExitArray: () => {
          exits++
          return true
        }
      })
      expect(seen).toEqual([1])
      expect(exits).toBe(1)
    }))

  it.effect("skips the children of a container whose enter returns false", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      document.parse("[[1],2]")
      const seen: Array<number> = []
      let enters = 0
      document.accept({
        visitEnterArray: () => {
          enters++
          return enters === 1
        },
        visitNumber: (node) => {
          seen.push(node.value)
          return true
        }
      })
      expect(enters).toBe(2)
      expect(seen).toEqual([2])
    }))

  it.effect("stops top-level siblings when an exit returns false", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      document.parse("[1] [2]")
      let enters = 0
      const result = document.accept({
        visitEnterArray: () => {
          enters++
          return true
        },
        visitExitArray: () => false
      })
      expect(enters).toBe(1)
      expect(result).toBe(true)
    }))

  it.effect("visits a subtree from any handle", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      document.parse("{\"k\":\"v\"}")
      const strings: Array<string> = []
      document.accept({
        visitString: (node, scope) => {
          strings.push(new TextDecoder().decode(scope.buffer.subarray(node.span.start, node.span.end)))
          return true
        }
      })
      expect(strings).toEqual(["k", "v"])
    }))
})
