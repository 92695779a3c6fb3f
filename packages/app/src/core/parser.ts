import { Match } from "effect"
import * as Either from "effect/Either"

import type { ErrorCode, ParseFailure } from "./errors.js"
import { parseFailure } from "./errors.js"
import type {
  ArrayNode,
  ContainerRef,
  ElementNode,
  JsonNode,
  LiteralNode,
  LiteralType,
  NodeKind,
  NumberNode,
  ObjectNode,
  StringNode
} from "./node.js"
import { sameRef } from "./node.js"
import {
  asciiText,
  Byte,
  byteAt,
  classify,
  isAtEnd,
  matchesAscii,
  scanNumberLength,
  skipWhiteSpace,
  TERMINATOR
} from "./scanner.js"
import type { TokenClass } from "./scanner.js"
import type { NodeStore } from "./tree.js"
import { deleteNode, insertEndChild } from "./tree.js"

// CHANGE: descent parser that builds the pooled DOM in place over the owned buffer, open containers on an explicit stack
// FORMAT THEOREM: ∀n,c: parseInto(p,n,c) = Right(c') → c' > c ∧ n is the complete last child of p
//                 parseInto(p,n,c) = Left(f) → n and every node allocated below it are back in their pools
// PURITY: CORE
// EFFECT: n/a (mutates the owned buffer: each closing string quote becomes a terminator)
// INVARIANT: a failed step never leaves a node attached; the innermost failure is the one reported
// COMPLEXITY: O(n) where n = buffer length

/** A cursor into the buffer, or the failure that stopped the parse. */
export type Step = Either.Either<number, ParseFailure>

export interface ParseContext {
  readonly buffer: Uint8Array
  readonly store: NodeStore
  readonly createNode: (kind: NodeKind) => JsonNode
}

export type Identified =
  | { readonly _tag: "End"; readonly cursor: number }
  | { readonly _tag: "Unknown"; readonly cursor: number }
  | { readonly _tag: "Found"; readonly node: JsonNode; readonly cursor: number }

const LITERALS: ReadonlyArray<LiteralType> = ["null", "true", "false"]

const fail = (code: ErrorCode, offset: number): Step => Either.left(parseFailure(code, offset))

const kindForToken = (token: TokenClass): NodeKind | undefined =>
  Match.value(token).pipe(
    Match.when("literal", (): NodeKind => "Literal"),
    Match.when("string", (): NodeKind => "String"),
    Match.when("object", (): NodeKind => "Object"),
    Match.when("array", (): NodeKind => "Array"),
    Match.when("number", (): NodeKind => "Number"),
    Match.when("unknown", () => undefined),
    Match.exhaustive
  )

// string, object and array consume their opening byte; literals and numbers re-read it
const opensWithDelimiter = (kind: NodeKind): boolean => kind === "String" || kind === "Object" || kind === "Array"

/**
 * Skip whitespace and allocate the node the next significant byte opens.
 *
 * @returns End at the terminator, Unknown when no value starts here, Found otherwise.
 *
 * @pure false
 * @invariant Found.node is freshly allocated and unattached
 * @complexity O(w) where w = whitespace run length
 */
export const identify = (context: ParseContext, cursor: number): Identified => {
  const start = skipWhiteSpace(context.buffer, cursor)
  if (isAtEnd(context.buffer, start)) {
    return { _tag: "End", cursor: start }
  }
  const kind = kindForToken(classify(byteAt(context.buffer, start)))
  if (kind === undefined) {
    return { _tag: "Unknown", cursor: start }
  }
  const node = context.createNode(kind)
  return { _tag: "Found", node, cursor: opensWithDelimiter(kind) ? start + 1 : start }
}

const parseLiteral = (context: ParseContext, node: LiteralNode, cursor: number): Step => {
  const literal = LITERALS.find((word) => matchesAscii(context.buffer, cursor, word))
  if (literal === undefined) {
    return fail("parsing-reserved-literal", cursor)
  }
  node.literal = literal
  return Either.right(cursor + literal.length)
}

const parseNumber = (context: ParseContext, node: NumberNode, cursor: number): Step => {
  const length = scanNumberLength(context.buffer, cursor)
  if (length === 0) {
    return fail("parsing-number", cursor)
  }
  const value = Number(asciiText(context.buffer, cursor, cursor + length))
  node.value = value
  node.integer = Math.trunc(value)
  return Either.right(cursor + length)
}

// cursor sits just past the opening quote; a backslash always swallows the byte after it
const parseString = (context: ParseContext, node: StringNode, cursor: number): Step => {
  const { buffer } = context
  let index = cursor
  let current = byteAt(buffer, index)
  while (current !== Byte.quote) {
    if (current === TERMINATOR) {
      return fail("parsing-string", Math.min(index, buffer.length - 1))
    }
    index += current === Byte.backslash ? 2 : 1
    current = byteAt(buffer, index)
  }
  buffer[index] = TERMINATOR
  node.span = { start: cursor, end: index }
  return Either.right(index + 1)
}

type OpenNode = ObjectNode | ArrayNode | ElementNode

type LeafNode = LiteralNode | NumberNode | StringNode

/** What an open container asks for next. */
type Action =
  | { readonly _tag: "Child"; readonly node: JsonNode; readonly cursor: number }
  | { readonly _tag: "Close"; readonly cursor: number }
  | { readonly _tag: "Fail"; readonly failure: ParseFailure }

const child = (node: JsonNode, cursor: number): Action => ({ _tag: "Child", node, cursor })

const close = (cursor: number): Action => ({ _tag: "Close", cursor })

const failWith = (code: ErrorCode, offset: number): Action => ({ _tag: "Fail", failure: parseFailure(code, offset) })

const fromStep = (step: Step, next: (cursor: number) => Action): Action =>
  Either.isLeft(step) ? { _tag: "Fail", failure: step.left } : next(step.right)

const isOpenNode = (node: JsonNode): node is OpenNode =>
  node._tag === "Object" || node._tag === "Array" || node._tag === "Element"

const parseLeaf = (context: ParseContext, node: LeafNode, cursor: number): Step =>
  Match.value(node).pipe(
    Match.tag("Literal", (literal) => parseLiteral(context, literal, cursor)),
    Match.tag("Number", (numeric) => parseNumber(context, numeric, cursor)),
    Match.tag("String", (text) => parseString(context, text, cursor)),
    Match.exhaustive
  )

// parse a leaf and append it to `parent`; on failure the leaf goes back to its pool
const attachLeaf = (context: ParseContext, parent: ContainerRef, node: LeafNode, cursor: number): Step => {
  const parsed = parseLeaf(context, node, cursor)
  if (Either.isLeft(parsed)) {
    deleteNode(context.store, node.ref)
    return parsed
  }
  insertEndChild(context.store, parent, node.ref)
  return Either.right(skipWhiteSpace(context.buffer, parsed.right))
}

const openValue = (context: ParseContext, cursor: number, missing: ErrorCode): Action => {
  const found = identify(context, cursor)
  return found._tag === "Found" ? child(found.node, found.cursor) : failWith(missing, found.cursor)
}

const enterElement = (context: ParseContext, cursor: number): Action => {
  const start = skipWhiteSpace(context.buffer, cursor)
  if (byteAt(context.buffer, start) !== Byte.quote) {
    return failWith("parsing-element", start)
  }
  return child(context.createNode("String"), start + 1)
}

// an element holding only its key still owes the colon and the value
const resumeElement = (context: ParseContext, element: ElementNode, cursor: number): Action => {
  if (!sameRef(element.links.firstChild, element.links.lastChild)) {
    return close(cursor)
  }
  return byteAt(context.buffer, cursor) === Byte.colon
    ? openValue(context, cursor + 1, "parsing-element")
    : failWith("parsing-element", cursor)
}

const enterObject = (context: ParseContext, cursor: number): Action => {
  const index = skipWhiteSpace(context.buffer, cursor)
  if (isAtEnd(context.buffer, index)) {
    return failWith("object-mismatch", index)
  }
  if (byteAt(context.buffer, index) === Byte.closeBrace) {
    return close(index + 1)
  }
  return child(context.createNode("Element"), index)
}

const resumeObject = (context: ParseContext, cursor: number): Action => {
  const byte = byteAt(context.buffer, cursor)
  if (byte === Byte.comma) {
    return child(context.createNode("Element"), cursor + 1)
  }
  return byte === Byte.closeBrace ? close(cursor + 1) : failWith("object-mismatch", cursor)
}

const enterArray = (context: ParseContext, cursor: number): Action => {
  const index = skipWhiteSpace(context.buffer, cursor)
  if (isAtEnd(context.buffer, index)) {
    return failWith("array-mismatch", index)
  }
  if (byteAt(context.buffer, index) === Byte.closeBracket) {
    return close(index + 1)
  }
  return openValue(context, index, "array-mismatch")
}

const resumeArray = (context: ParseContext, cursor: number): Action => {
  const byte = byteAt(context.buffer, cursor)
  if (byte === Byte.comma) {
    return openValue(context, cursor + 1, "array-mismatch")
  }
  return byte === Byte.closeBracket ? close(cursor + 1) : failWith("array-mismatch", cursor)
}

const enter = (context: ParseContext, node: OpenNode, cursor: number): Action =>
  Match.value(node).pipe(
    Match.tag("Element", () => enterElement(context, cursor)),
    Match.tag("Object", () => enterObject(context, cursor)),
    Match.tag("Array", () => enterArray(context, cursor)),
    Match.exhaustive
  )

// cursor sits past the whitespace that follows the child just completed
const resume = (context: ParseContext, node: OpenNode, cursor: number): Action =>
  Match.value(node).pipe(
    Match.tag("Element", (element) => resumeElement(context, element, cursor)),
    Match.tag("Object", () => resumeObject(context, cursor)),
    Match.tag("Array", () => resumeArray(context, cursor)),
    Match.exhaustive
  )

/**
 * Parse `node` starting at `cursor` (past its opening delimiter, if any), then append it to `parent`.
 * Containers are tracked on an explicit stack, so nesting depth is bounded by memory only.
 *
 * @param context - Buffer, node store and node factory.
 * @param parent - Container the finished node is appended to.
 * @param node - Freshly allocated node whose kind was chosen by identify.
 * @param cursor - Offset where the node's own text starts.
 * @returns Offset past the node's text and trailing whitespace, or the innermost failure.
 *
 * @pure false
 * @invariant a node is appended to its parent only once its text is complete
 * @invariant Left(f) → node and every node allocated below it are back in their pools
 * @complexity O(n) time, O(depth) extra space
 */
export const parseInto = (context: ParseContext, parent: ContainerRef, node: JsonNode, cursor: number): Step => {
  if (!isOpenNode(node)) {
    return attachLeaf(context, parent, node, cursor)
  }
  const ancestors: Array<OpenNode> = []
  let open: OpenNode = node
  let action = enter(context, open, cursor)
  for (;;) {
    if (action._tag === "Fail") {
      // open containers are not attached yet, so each one is freed on its own
      deleteNode(context.store, open.ref)
      for (let pending = ancestors.pop(); pending !== undefined; pending = ancestors.pop()) {
        deleteNode(context.store, pending.ref)
      }
      return Either.left(action.failure)
    }
    if (action._tag === "Child") {
      const next = action.node
      if (isOpenNode(next)) {
        ancestors.push(open)
        open = next
        action = enter(context, open, action.cursor)
      } else {
        const current = open
        action = fromStep(attachLeaf(context, current.ref, next, action.cursor), (index) =>
          resume(context, current, index))
      }
      continue
    }
    const outer = ancestors.pop()
    insertEndChild(context.store, outer === undefined ? parent : outer.ref, open.ref)
    const index = skipWhiteSpace(context.buffer, action.cursor)
    if (outer === undefined) {
      return Either.right(index)
    }
    open = outer
    action = resume(context, open, index)
  }
}

export interface TopLevelSettings {
  /** Values accepted before another one is a generic-parsing failure. */
  readonly maxValues: number
}

/**
 * Parse a sequence of top-level values into `root` until the terminator.
 *
 * @returns Offset of the terminator, or the first failure.
 *
 * @pure false
 * @invariant on Left, values parsed before the failing one are still attached to root
 * @complexity O(n)
 */
export const parseTopLevel = (
  context: ParseContext,
  root: ContainerRef,
  cursor: number,
  settings: TopLevelSettings
): Step => {
  let index = cursor
  let count = 0
  for (;;) {
    const found = identify(context, index)
    if (found._tag === "End") {
      return Either.right(found.cursor)
    }
    if (found._tag === "Unknown") {
      return fail("generic-parsing", found.cursor)
    }
    if (count >= settings.maxValues) {
      deleteNode(context.store, found.node.ref)
      return fail("generic-parsing", found.cursor - (opensWithDelimiter(found.node._tag) ? 1 : 0))
    }
    const step = parseInto(context, root, found.node, found.cursor)
    if (Either.isLeft(step)) {
      return step
    }
    index = step.right
    count++
  }
}
