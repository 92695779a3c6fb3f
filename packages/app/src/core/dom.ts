import * as Option from "effect/Option"

import type { JsonDocument } from "./document.js"
import type {
  ArrayNode,
  ElementNode,
  JsonNode,
  LiteralType,
  NodeRef,
  ObjectNode,
  Ref,
  StringNode,
  TreeNode
} from "./node.js"
import { isArray, isElement, isObject } from "./node.js"
import { spanBytes, spanText } from "./span.js"

// CHANGE: read-only navigation and value accessors over a parsed document
// FORMAT THEOREM: ∀r: children(d, r) = [c₁..cₙ] → nextSibling(d, cᵢ) = Some(cᵢ₊₁)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: stale handles read as None, never as another node
// COMPLEXITY: O(1) per accessor, O(k) for children

const node = (document: JsonDocument, ref: Ref): Option.Option<TreeNode> => document.lookup(ref)

const follow = (
  document: JsonDocument,
  ref: Ref,
  pick: (current: TreeNode) => Ref | null
): Option.Option<TreeNode> =>
  Option.flatMap(node(document, ref), (current) => {
    const next = pick(current)
    return next === null ? Option.none() : node(document, next)
  })

export const parentOf = (document: JsonDocument, ref: Ref): Option.Option<TreeNode> =>
  follow(document, ref, (current) => current.links.parent)

export const firstChild = (document: JsonDocument, ref: Ref): Option.Option<TreeNode> =>
  follow(document, ref, (current) => current.links.firstChild)

export const lastChild = (document: JsonDocument, ref: Ref): Option.Option<TreeNode> =>
  follow(document, ref, (current) => current.links.lastChild)

export const nextSibling = (document: JsonDocument, ref: Ref): Option.Option<TreeNode> =>
  follow(document, ref, (current) => current.links.next)

export const previousSibling = (document: JsonDocument, ref: Ref): Option.Option<TreeNode> =>
  follow(document, ref, (current) => current.links.prev)

/**
 * Children of `ref` in sibling order.
 *
 * @returns Empty for leaves and for stale handles.
 *
 * @pure true
 * @invariant result.length = childCount(document, ref)
 * @complexity O(k) where k = number of children
 */
export const children = (document: JsonDocument, ref: Ref): ReadonlyArray<JsonNode> => {
  const result: Array<JsonNode> = []
  let current: NodeRef | null = Option.match(node(document, ref), {
    onNone: () => null,
    onSome: (parent) => parent.links.firstChild
  })
  while (current !== null) {
    const child = document.lookup(current)
    if (Option.isNone(child) || child.value._tag === "Document") {
      return result
    }
    result.push(child.value)
    current = child.value.links.next
  }
  return result
}

export const childCount = (document: JsonDocument, ref: Ref): number => children(document, ref).length

export const toElement = (document: JsonDocument, ref: Ref): Option.Option<ElementNode> =>
  Option.filter(node(document, ref), isElement)

export const toObject = (document: JsonDocument, ref: Ref): Option.Option<ObjectNode> =>
  Option.filter(node(document, ref), isObject)

export const toArray = (document: JsonDocument, ref: Ref): Option.Option<ArrayNode> =>
  Option.filter(node(document, ref), isArray)

export const numberValue = (document: JsonDocument, ref: Ref): Option.Option<number> =>
  Option.flatMap(node(document, ref), (current) =>
    current._tag === "Number" ? Option.some(current.value) : Option.none())

/** The numeric value truncated toward zero. */
export const integerValue = (document: JsonDocument, ref: Ref): Option.Option<number> =>
  Option.flatMap(node(document, ref), (current) =>
    current._tag === "Number" ? Option.some(current.integer) : Option.none())

export const literalType = (document: JsonDocument, ref: Ref): Option.Option<LiteralType> =>
  Option.flatMap(node(document, ref), (current) =>
    current._tag === "Literal" ? Option.some(current.literal) : Option.none())

const stringNode = (document: JsonDocument, ref: Ref): Option.Option<StringNode> =>
  Option.flatMap(node(document, ref), (current) =>
    current._tag === "String" ? Option.some(current) : Option.none())

/** Raw string content, escapes left as written. */
export const stringValue = (document: JsonDocument, ref: Ref): Option.Option<string> =>
  Option.map(stringNode(document, ref), (current) => spanText(document.buffer(), current.span))

/** Raw string bytes, sharing memory with the document buffer. */
export const stringBytes = (document: JsonDocument, ref: Ref): Option.Option<Uint8Array> =>
  Option.map(stringNode(document, ref), (current) => spanBytes(document.buffer(), current.span))

export const elementKey = (document: JsonDocument, ref: Ref): Option.Option<string> =>
  Option.flatMap(toElement(document, ref), (element) =>
    Option.flatMap(firstChild(document, element.ref), (key) => stringValue(document, key.ref)))

export const elementValue = (document: JsonDocument, ref: Ref): Option.Option<TreeNode> =>
  Option.flatMap(toElement(document, ref), (element) => lastChild(document, element.ref)).pipe(
    Option.filter((value) => value.links.prev !== null)
  )
