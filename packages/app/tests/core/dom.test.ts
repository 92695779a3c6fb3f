import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Option from "effect/Option"

import { makeJsonDocument } from "../../src/core/document.js"
import {
  childCount,
  children,
  elementKey,
  elementValue,
  firstChild,
  integerValue,
  lastChild,
  literalType,
  nextSibling,
  numberValue,
  parentOf,
  previousSibling,
  stringBytes,
  stringValue,
  toArray,
  toElement,
  toObject
} from "../../src/core/dom.js"
import { insertEndChild } from "../../src/core/tree.js"

const parsed = () => {
  const document = makeJsonDocument()
  expect(document.parse("{\"k\":[1,-2.5,\"s\"],\"n\":null}")).toBe("no-error")
  const object = Option.getOrThrow(firstChild(document, document.root))
  const [first, second] = children(document, object.ref)
  if (first === undefined || second === undefined) {
    throw new Error("expected two members")
  }
  const array = Option.getOrThrow(elementValue(document, first.ref))
  return { document, object, first, second, array }
}

describe("navigation", () => {
  it.effect("walks members, values and siblings", () =>
    Effect.sync(() => {
      const { array, document, first, object, second } = parsed()
      expect(object._tag).toBe("Object")
      expect(childCount(document, object.ref)).toBe(2)
      expect(Option.getOrThrow(nextSibling(document, first.ref)).ref).toEqual(second.ref)
      expect(Option.getOrThrow(previousSibling(document, second.ref)).ref).toEqual(first.ref)
      expect(Option.isNone(nextSibling(document, second.ref))).toBe(true)
      expect(Option.getOrThrow(parentOf(document, array.ref)).ref).toEqual(first.ref)
      expect(Option.getOrThrow(lastChild(document, object.ref)).ref).toEqual(second.ref)
      expect(childCount(document, array.ref)).toBe(3)
    }))

  it.effect("narrows by kind", () =>
    Effect.sync(() => {
      const { array, document, first, object } = parsed()
      expect(Option.isSome(toObject(document, object.ref))).toBe(true)
      expect(Option.isNone(toObject(document, document.root))).toBe(true)
      expect(Option.isSome(toArray(document, array.ref))).toBe(true)
      expect(Option.isSome(toElement(document, first.ref))).toBe(true)
      expect(Option.isNone(toElement(document, array.ref))).toBe(true)
    }))

  it.effect("returns None for handles from an earlier parse", () =>
    Effect.sync(() => {
      const { array, document } = parsed()
      document.parse("[]")
      expect(Option.isNone(firstChild(document, array.ref))).toBe(true)
      expect(children(document, array.ref)).toEqual([])
    }))
})

describe("values", () => {
  it.effect("reads numbers, strings and literals", () =>
    Effect.sync(() => {
      const { array, document, second } = parsed()
      const [one, fraction, text] = children(document, array.ref)
      if (one === undefined || fraction === undefined || text === undefined) {
        throw new Error("expected three values")
      }
      expect(numberValue(document, one.ref)).toEqual(Option.some(1))
      expect(numberValue(document, fraction.ref)).toEqual(Option.some(-2.5))
      expect(integerValue(document, fraction.ref)).toEqual(Option.some(-2))
      expect(stringValue(document, text.ref)).toEqual(Option.some("s"))
      expect(Array.from(Option.getOrThrow(stringBytes(document, text.ref)))).toEqual([0x73])
      expect(numberValue(document, text.ref)).toEqual(Option.none())
      const nullValue = Option.getOrThrow(elementValue(document, second.ref))
      expect(literalType(document, nullValue.ref)).toEqual(Option.some("null"))
    }))

  it.effect("reads element keys", () =>
    Effect.sync(() => {
      const { document, first, second } = parsed()
      expect(elementKey(document, first.ref)).toEqual(Option.some("k"))
      expect(elementKey(document, second.ref)).toEqual(Option.some("n"))
    }))

  it.effect("has no value for an element holding only its key", () =>
    Effect.sync(() => {
      const document = makeJsonDocument()
      const element = document.createElement()
      const key = document.createNode("String")
      insertEndChild(document.store, element.ref, key.ref)
      expect(Option.isNone(elementValue(document, element.ref))).toBe(true)
    }))
})
