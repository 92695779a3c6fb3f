import { Match } from "effect"

import type {
  ArrayNode,
  ContainerNode,
  ElementNode,
  LiteralNode,
  NodeRef,
  NumberNode,
  ObjectNode,
  Ref,
  StringNode,
  TreeNode
} from "./node.js"
import type { NodeStore } from "./tree.js"

// CHANGE: double-dispatch traversal over the closed node variant
// FORMAT THEOREM: ∀c ∈ {Object, Array, Element}: visitExit(c) fires iff accept reached c
// PURITY: CORE
// EFFECT: callbacks may carry their own state
// INVARIANT: false from a callback stops the remaining siblings at that level only
// COMPLEXITY: O(n) where n = visited nodes

/** What a callback may read besides the node itself: string bytes and the other nodes. */
export interface VisitScope {
  readonly buffer: Uint8Array
  readonly store: NodeStore
}

type Callback<N> = (node: N, scope: VisitScope) => boolean

/** Every callback is optional; a missing one behaves as if it returned true. */
export interface JsonVisitor {
  readonly visitEnterObject?: Callback<ObjectNode>
  readonly visitExitObject?: Callback<ObjectNode>
  readonly visitEnterArray?: Callback<ArrayNode>
  readonly visitExitArray?: Callback<ArrayNode>
  readonly visitEnterElement?: Callback<ElementNode>
  readonly visitExitElement?: Callback<ElementNode>
  readonly visitNumber?: Callback<NumberNode>
  readonly visitString?: Callback<StringNode>
  readonly visitLiteral?: Callback<LiteralNode>
}

/** A container whose children are being visited; `next` is the sibling still to come. */
interface Frame {
  readonly node: ContainerNode
  next: NodeRef | null
}

const descend = (frames: Array<Frame>, node: ContainerNode): boolean => {
  frames.push({ node, next: node.links.firstChild })
  return true
}

const finish = (scope: VisitScope, node: ContainerNode, visitor: JsonVisitor): boolean =>
  Match.value(node).pipe(
    Match.tag("Document", () => true),
    Match.tag("Object", (object) => visitor.visitExitObject?.(object, scope) ?? true),
    Match.tag("Array", (array) => visitor.visitExitArray?.(array, scope) ?? true),
    Match.tag("Element", (element) => visitor.visitExitElement?.(element, scope) ?? true),
    Match.exhaustive
  )

const composite = <N extends ContainerNode>(
  scope: VisitScope,
  frames: Array<Frame>,
  node: N,
  visitor: JsonVisitor,
  enter: Callback<N> | undefined
): boolean => (enter?.(node, scope) ?? true) ? descend(frames, node) : finish(scope, node, visitor)

// leaves answer at once; containers that are entered push a frame and answer when it is finished
const begin = (scope: VisitScope, frames: Array<Frame>, node: TreeNode, visitor: JsonVisitor): boolean =>
  Match.value(node).pipe(
    Match.tag("Document", (document) => descend(frames, document)),
    Match.tag("Object", (object) => composite(scope, frames, object, visitor, visitor.visitEnterObject)),
    Match.tag("Array", (array) => composite(scope, frames, array, visitor, visitor.visitEnterArray)),
    Match.tag("Element", (element) => composite(scope, frames, element, visitor, visitor.visitEnterElement)),
    Match.tag("Number", (numeric) => visitor.visitNumber?.(numeric, scope) ?? true),
    Match.tag("String", (text) => visitor.visitString?.(text, scope) ?? true),
    Match.tag("Literal", (literal) => visitor.visitLiteral?.(literal, scope) ?? true),
    Match.exhaustive
  )

/**
 * Drive `visitor` over `node` and its subtree.
 *
 * @returns The value of the node's exit (composites) or visit (leaves) callback; always true for the document.
 *
 * @pure false
 * @invariant children are visited in sibling order
 * @complexity O(n) time, O(depth) extra space
 */
export const acceptNode = (scope: VisitScope, node: TreeNode, visitor: JsonVisitor): boolean => {
  const frames: Array<Frame> = []
  let last = begin(scope, frames, node, visitor)
  for (let frame = frames.at(-1); frame !== undefined; frame = frames.at(-1)) {
    if (!last || frame.next === null) {
      frames.pop()
      last = finish(scope, frame.node, visitor)
    } else {
      const child = scope.store.resolve(frame.next)
      frame.next = child.links.next
      last = begin(scope, frames, child, visitor)
    }
  }
  return last
}

export const accept = (scope: VisitScope, ref: Ref, visitor: JsonVisitor): boolean =>
  acceptNode(scope, scope.store.resolve(ref), visitor)
