import { Match } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { ErrorCode, ParseFailure } from "./errors.js"
import { parseFailure, TreeDefect } from "./errors.js"
import type {
  ArrayNode,
  DocumentNode,
  DocumentRef,
  ElementNode,
  JsonNode,
  LiteralNode,
  NodeKind,
  NodeRef,
  NumberNode,
  ObjectNode,
  Ref,
  StringNode,
  TreeNode
} from "./node.js"
import { emptyLinks, NODE_SLOT_BYTES, NodeKinds, sameRef } from "./node.js"
import type { ParseContext } from "./parser.js"
import { parseTopLevel } from "./parser.js"
import type { FixedBlockPool, PoolSlot, PoolStats } from "./pool.js"
import { DEFAULT_BLOCK_BYTES, makeFixedBlockPool } from "./pool.js"
import { isAtEnd, skipWhiteSpace, TERMINATOR } from "./scanner.js"
import type { NodeStore } from "./tree.js"
import { deleteChildren, deleteNode } from "./tree.js"
import type { JsonVisitor } from "./visitor.js"
import { accept } from "./visitor.js"

// CHANGE: document that owns the input copy, one pool per node kind, the root child list and the sticky error
// FORMAT THEOREM: ∀d,x: d.parse(x) = c → c = "no-error" ⇔ every byte of x up to its terminator formed values
// PURITY: CORE
// EFFECT: n/a (stateful object, no IO)
// INVARIANT: the first recorded failure wins until the next parse; a failed parse leaves zero children
// COMPLEXITY: O(n) parse, O(tree) teardown

export interface DocumentOptions {
  /** Byte budget of one pool block; slots per block = blockBytes / nominal node size. */
  readonly blockBytes?: number
  /** Reject a second top-level value with generic-parsing. */
  readonly requireSingleValue?: boolean
}

export type DocumentInput = string | Uint8Array

export interface JsonDocument {
  readonly root: DocumentRef
  readonly store: NodeStore
  readonly parse: (input: DocumentInput, length?: number) => ErrorCode
  readonly errorCode: () => ErrorCode
  readonly errorDetail: () => Option.Option<ParseFailure>
  readonly buffer: () => Uint8Array
  readonly lookup: (ref: Ref) => Option.Option<TreeNode>
  readonly createNode: (kind: NodeKind) => JsonNode
  readonly createElement: () => ElementNode
  readonly releaseNode: (ref: NodeRef) => void
  readonly accept: (visitor: JsonVisitor, ref?: Ref) => boolean
  readonly poolStats: () => ReadonlyArray<PoolStats>
  readonly destroy: () => void
}

interface NodePools {
  readonly Literal: FixedBlockPool<LiteralNode>
  readonly Number: FixedBlockPool<NumberNode>
  readonly String: FixedBlockPool<StringNode>
  readonly Element: FixedBlockPool<ElementNode>
  readonly Object: FixedBlockPool<ObjectNode>
  readonly Array: FixedBlockPool<ArrayNode>
}

const utf8 = new TextEncoder()

const makePools = (blockBytes: number): NodePools => ({
  Literal: makeFixedBlockPool<LiteralNode>({ name: "literal", itemBytes: NODE_SLOT_BYTES.Literal, blockBytes }),
  Number: makeFixedBlockPool<NumberNode>({ name: "number", itemBytes: NODE_SLOT_BYTES.Number, blockBytes }),
  String: makeFixedBlockPool<StringNode>({ name: "string", itemBytes: NODE_SLOT_BYTES.String, blockBytes }),
  Element: makeFixedBlockPool<ElementNode>({ name: "element", itemBytes: NODE_SLOT_BYTES.Element, blockBytes }),
  Object: makeFixedBlockPool<ObjectNode>({ name: "object", itemBytes: NODE_SLOT_BYTES.Object, blockBytes }),
  Array: makeFixedBlockPool<ArrayNode>({ name: "array", itemBytes: NODE_SLOT_BYTES.Array, blockBytes })
})

const allocate = <N extends JsonNode>(pool: FixedBlockPool<N>, build: (slot: PoolSlot) => N): N => {
  const node = build(pool.alloc())
  pool.store(node.ref, node)
  return node
}

const toBytes = (input: DocumentInput): Uint8Array => typeof input === "string" ? utf8.encode(input) : input

// up to the first zero byte, as for a C string
const terminatedLength = (bytes: Uint8Array): number => {
  const index = bytes.indexOf(TERMINATOR)
  return index === -1 ? bytes.length : index
}

const logicalLength = (bytes: Uint8Array, length: number | undefined): number =>
  length === undefined
    ? terminatedLength(bytes)
    : Math.min(bytes.length, Math.max(0, Math.floor(length)))

/**
 * Create an empty document with its own pools.
 *
 * @param options - Pool block size and top-level strictness.
 * @returns A reusable document; every parse discards the previous tree.
 *
 * @pure false
 * @invariant pools are never shared between documents
 * @complexity O(1)
 */
export const makeJsonDocument = (options: DocumentOptions = {}): JsonDocument => {
  const pools = makePools(options.blockBytes ?? DEFAULT_BLOCK_BYTES)
  const maxValues = options.requireSingleValue === true ? 1 : Number.POSITIVE_INFINITY
  const rootRef: DocumentRef = { kind: "Document", pool: Symbol("document"), index: 0, generation: 0 }
  const rootNode: DocumentNode = { _tag: "Document", ref: rootRef, links: emptyLinks() }
  let buffer = new Uint8Array([TERMINATOR])
  let failure: ParseFailure | undefined

  const find = (ref: Ref): TreeNode | undefined => {
    if (ref.kind === "Document") {
      return sameRef(ref, rootRef) ? rootNode : undefined
    }
    return pools[ref.kind].get(ref)
  }

  const store: NodeStore = {
    resolve: (ref) => {
      const node = find(ref)
      if (node === undefined) {
        throw new TreeDefect({ message: `stale or foreign ${ref.kind} handle ${ref.index}` })
      }
      return node
    },
    release: (ref) => {
      pools[ref.kind].free(ref)
    },
    track: (ref) => {
      pools[ref.kind].markTracked(ref)
    }
  }

  const createNode = (kind: NodeKind): JsonNode =>
    Match.value(kind).pipe(
      Match.when("Literal", () =>
        allocate<LiteralNode>(pools.Literal, (slot) => ({
          _tag: "Literal",
          ref: { ...slot, kind: "Literal" },
          links: emptyLinks(),
          literal: "null"
        }))),
      Match.when("Number", () =>
        allocate<NumberNode>(pools.Number, (slot) => ({
          _tag: "Number",
          ref: { ...slot, kind: "Number" },
          links: emptyLinks(),
          value: 0,
          integer: 0
        }))),
      Match.when("String", () =>
        allocate<StringNode>(pools.String, (slot) => ({
          _tag: "String",
          ref: { ...slot, kind: "String" },
          links: emptyLinks(),
          span: { start: 0, end: 0 }
        }))),
      Match.when("Element", () => createElement()),
      Match.when("Object", () =>
        allocate<ObjectNode>(pools.Object, (slot) => ({ _tag: "Object", ref: { ...slot, kind: "Object" }, links: emptyLinks() }))),
      Match.when("Array", () =>
        allocate<ArrayNode>(pools.Array, (slot) => ({ _tag: "Array", ref: { ...slot, kind: "Array" }, links: emptyLinks() }))),
      Match.exhaustive
    )

  const createElement = (): ElementNode =>
    allocate(pools.Element, (slot) => ({ _tag: "Element", ref: { ...slot, kind: "Element" }, links: emptyLinks() }))

  const recordError = (next: ParseFailure): void => {
    if (failure === undefined) {
      failure = next
    }
  }

  const errorCode = (): ErrorCode => failure?.code ?? "no-error"

  const parse = (input: DocumentInput, length?: number): ErrorCode => {
    deleteChildren(store, rootRef)
    failure = undefined

    const bytes = toBytes(input)
    const size = logicalLength(bytes, length)
    const owned = new Uint8Array(size + 1)
    owned.set(bytes.subarray(0, size))
    owned[size] = TERMINATOR
    buffer = owned

    const start = skipWhiteSpace(buffer, 0)
    if (isAtEnd(buffer, start)) {
      recordError(parseFailure("empty-document", start))
      return errorCode()
    }

    const context: ParseContext = { buffer, store, createNode }
    const result = parseTopLevel(context, rootRef, start, { maxValues })
    if (Either.isLeft(result)) {
      recordError(result.left)
      deleteChildren(store, rootRef)
    }
    return errorCode()
  }

  const releaseNode = (ref: NodeRef): void => {
    deleteNode(store, ref)
  }

  return {
    root: rootRef,
    store,
    parse,
    errorCode,
    errorDetail: () => Option.fromNullable(failure),
    buffer: () => buffer,
    lookup: (ref) => Option.fromNullable(find(ref)),
    createNode,
    createElement,
    releaseNode,
    accept: (visitor, ref = rootRef) => accept({ buffer, store }, ref, visitor),
    poolStats: () => NodeKinds.map((kind) => pools[kind].stats()),
    destroy: () => {
      deleteChildren(store, rootRef)
      for (const kind of NodeKinds) {
        pools[kind].release()
      }
      buffer = new Uint8Array([TERMINATOR])
    }
  }
}
