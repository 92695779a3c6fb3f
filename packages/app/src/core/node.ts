import type { PoolSlot } from "./pool.js"
import type { Span } from "./span.js"

// CHANGE: closed variant of DOM node kinds with intrusive parent/child/sibling links
// FORMAT THEOREM: ∀n: n.links.firstChild = null ⇔ n.links.lastChild = null
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every link is a generation-checked handle into the pool of the linked node's kind
// COMPLEXITY: O(1)/O(1)

export type NodeKind = "Literal" | "Number" | "String" | "Element" | "Object" | "Array"

export type TreeKind = NodeKind | "Document"

export type ContainerKind = "Document" | "Element" | "Object" | "Array"

export const NodeKinds: ReadonlyArray<NodeKind> = ["Object", "Array", "Element", "Number", "String", "Literal"]

/** Handle to a node: the pool slot it lives in, tagged with its kind. */
export interface Ref<K extends TreeKind = TreeKind> extends PoolSlot {
  readonly kind: K
}

export type NodeRef = Ref<NodeKind>
export type ContainerRef = Ref<ContainerKind>
export type DocumentRef = Ref<"Document">

export interface NodeLinks {
  parent: ContainerRef | null
  firstChild: NodeRef | null
  lastChild: NodeRef | null
  prev: NodeRef | null
  next: NodeRef | null
}

export type LiteralType = "null" | "true" | "false"

interface NodeBase<K extends TreeKind> {
  readonly _tag: K
  readonly ref: Ref<K>
  readonly links: NodeLinks
}

export interface LiteralNode extends NodeBase<"Literal"> {
  literal: LiteralType
}

export interface NumberNode extends NodeBase<"Number"> {
  value: number
  integer: number
}

/** Raw text between the quotes; escapes are kept as written. */
export interface StringNode extends NodeBase<"String"> {
  span: Span
}

/** One object member: first child is the key String, second child the value. */
export interface ElementNode extends NodeBase<"Element"> {}

export interface ObjectNode extends NodeBase<"Object"> {}

export interface ArrayNode extends NodeBase<"Array"> {}

export interface DocumentNode extends NodeBase<"Document"> {}

export type JsonNode =
  | LiteralNode
  | NumberNode
  | StringNode
  | ElementNode
  | ObjectNode
  | ArrayNode

export type TreeNode = JsonNode | DocumentNode

export type ContainerNode = ElementNode | ObjectNode | ArrayNode | DocumentNode

// Nominal slot sizes: a vtable pointer, the owning document, five links and the pool pointer
// (8 × 8 bytes), plus the kind's own fields.
export const NODE_SLOT_BYTES: Readonly<Record<NodeKind, number>> = {
  Literal: 72,
  Number: 72,
  String: 80,
  Element: 64,
  Object: 64,
  Array: 64
}

export const emptyLinks = (): NodeLinks => ({
  parent: null,
  firstChild: null,
  lastChild: null,
  prev: null,
  next: null
})

export const sameRef = (left: Ref | null, right: Ref | null): boolean =>
  left === right ||
  (left !== null &&
    right !== null &&
    left.kind === right.kind &&
    left.pool === right.pool &&
    left.index === right.index &&
    left.generation === right.generation)

export const isContainerKind = (kind: TreeKind): kind is ContainerKind =>
  kind === "Document" || kind === "Element" || kind === "Object" || kind === "Array"

export const isContainerNode = (node: TreeNode): node is ContainerNode => isContainerKind(node._tag)

export const isElement = (node: TreeNode): node is ElementNode => node._tag === "Element"

export const isObject = (node: TreeNode): node is ObjectNode => node._tag === "Object"

export const isArray = (node: TreeNode): node is ArrayNode => node._tag === "Array"
