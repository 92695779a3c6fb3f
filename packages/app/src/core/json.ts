import { Match } from "effect"

import type { ContainerNode, JsonNode, LiteralNode, NumberNode, Ref, StringNode, TreeNode } from "./node.js"
import { isContainerNode } from "./node.js"
import { spanText } from "./span.js"
import type { VisitScope } from "./visitor.js"

// CHANGE: JSON value domain and materialization of a parsed subtree into it
// FORMAT THEOREM: ∀r: toJson(s, r) mirrors the kind/value sequence of the subtree at r
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(n) where n = subtree size

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

const childNodes = (scope: VisitScope, node: TreeNode): ReadonlyArray<JsonNode> => {
  const result: Array<JsonNode> = []
  let current = node.links.firstChild
  while (current !== null) {
    const child = scope.store.resolve(current)
    if (child._tag !== "Document") {
      result.push(child)
    }
    current = child.links.next
  }
  return result
}

// defineProperty keeps keys such as "__proto__" as plain data
const setMember = (target: Record<string, Json>, key: string, value: Json): void => {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true })
}

/** A materialized child; elements also hand their key and value to the enclosing object. */
interface Built {
  readonly value: Json
  readonly member: readonly [string, Json] | undefined
}

/** A container whose children are materialized one by one into `built`. */
interface Frame {
  readonly node: ContainerNode
  readonly children: ReadonlyArray<JsonNode>
  readonly built: Array<Built>
}

const plain = (value: Json): Built => ({ value, member: undefined })

const leafJson = (scope: VisitScope, node: LiteralNode | NumberNode | StringNode): Json =>
  Match.value(node).pipe(
    Match.tag("Literal", (literal): Json => literal.literal === "null" ? null : literal.literal === "true"),
    Match.tag("Number", (numeric): Json => numeric.value),
    Match.tag("String", (text): Json => spanText(scope.buffer, text.span)),
    Match.exhaustive
  )

const openFrame = (scope: VisitScope, node: ContainerNode): Frame => ({
  node,
  children: childNodes(scope, node),
  built: []
})

const elementMember = (scope: VisitScope, frame: Frame): readonly [string, Json] | undefined => {
  const key = frame.children[0]
  const value = frame.built[1]
  if (key === undefined || key._tag !== "String" || value === undefined) {
    return undefined
  }
  return [spanText(scope.buffer, key.span), value.value]
}

const assemble = (scope: VisitScope, frame: Frame): Built =>
  Match.value(frame.node).pipe(
    Match.tag("Document", (): Built => plain(frame.built.map((built) => built.value))),
    Match.tag("Array", (): Built => plain(frame.built.map((built) => built.value))),
    Match.tag("Object", (): Built => {
      const result: Record<string, Json> = {}
      for (const built of frame.built) {
        if (built.member !== undefined) {
          setMember(result, built.member[0], built.member[1])
        }
      }
      return plain(result)
    }),
    Match.tag("Element", (): Built => {
      const result: Record<string, Json> = {}
      const member = elementMember(scope, frame)
      if (member !== undefined) {
        setMember(result, member[0], member[1])
      }
      return { value: result, member }
    }),
    Match.exhaustive
  )

/**
 * Materialize the subtree at `ref` as a plain JSON value.
 *
 * @param scope - Buffer and node store of the owning document.
 * @param ref - Any node; the document yields the array of its top-level values.
 * @returns Strings hold raw (undecoded) content; for duplicate keys the later member wins.
 *
 * @pure true
 * @invariant elements materialize as single-member objects
 * @complexity O(n) time, O(depth) extra space
 */
export const toJson = (scope: VisitScope, ref: Ref): Json => {
  const root = scope.store.resolve(ref)
  if (!isContainerNode(root)) {
    return leafJson(scope, root)
  }
  const ancestors: Array<Frame> = []
  let frame = openFrame(scope, root)
  for (;;) {
    const next = frame.children[frame.built.length]
    if (next === undefined) {
      const built = assemble(scope, frame)
      const outer = ancestors.pop()
      if (outer === undefined) {
        return built.value
      }
      outer.built.push(built)
      frame = outer
    } else if (isContainerNode(next)) {
      ancestors.push(frame)
      frame = openFrame(scope, next)
    } else {
      frame.built.push(plain(leafJson(scope, next)))
    }
  }
}
