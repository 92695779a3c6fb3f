import * as Option from "effect/Option"

import type { JsonDocument } from "./document.js"
import type { ErrorCode } from "./errors.js"
import type { NodeKind } from "./node.js"
import { NodeKinds } from "./node.js"
import type { PoolStats } from "./pool.js"
import type { JsonVisitor } from "./visitor.js"

// CHANGE: build structured document reports and render output formats
// FORMAT THEOREM: ∀d: Σ report(d).nodes = number of nodes reachable from d.root
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: pools are listed in NodeKinds order
// COMPLEXITY: O(n)

export type NodeCounts = Readonly<Record<NodeKind, number>>

export interface DocumentReport {
  readonly errorCode: ErrorCode
  readonly offset: number | undefined
  readonly nodes: NodeCounts
  readonly pools: ReadonlyArray<PoolStats>
}

const countNodes = (document: JsonDocument): NodeCounts => {
  const counts: Record<NodeKind, number> = { Object: 0, Array: 0, Element: 0, Number: 0, String: 0, Literal: 0 }
  const bump = (kind: NodeKind) => (): boolean => {
    counts[kind]++
    return true
  }
  const counter: JsonVisitor = {
    visitEnterObject: bump("Object"),
    visitEnterArray: bump("Array"),
    visitEnterElement: bump("Element"),
    visitNumber: bump("Number"),
    visitString: bump("String"),
    visitLiteral: bump("Literal")
  }
  document.accept(counter)
  return counts
}

/**
 * Build a report of the document's current tree and pools.
 *
 * @param document - Document after a parse.
 * @returns Report ready for output.
 *
 * @pure true
 * @invariant offset is defined iff errorCode ≠ "no-error"
 * @complexity O(n)
 */
export const buildReport = (document: JsonDocument): DocumentReport => {
  return {
    errorCode: document.errorCode(),
    offset: Option.getOrUndefined(Option.map(document.errorDetail(), (failure) => failure.offset)),
    nodes: countNodes(document),
    pools: document.poolStats()
  }
}

/**
 * One-line pool summary.
 *
 * @returns `Mempool <name> watermark=<hw> [<kb>k] current=<n> size=<bytes> nAlloc=<n> blocks=<n>`
 *
 * @pure true
 * @invariant kb = floor(highWater × itemBytes / 1024)
 * @complexity O(1)
 */
export const formatPoolTrace = (stats: PoolStats): string =>
  `Mempool ${stats.name} watermark=${stats.highWater} [${Math.floor((stats.highWater * stats.itemBytes) / 1024)}k]` +
  ` current=${stats.outstanding} size=${stats.itemBytes} nAlloc=${stats.lifetimeAllocs} blocks=${stats.blocks}`

const formatList = (title: string, values: ReadonlyArray<string>): ReadonlyArray<string> => {
  if (values.length === 0) {
    return [`${title}: (none)`]
  }
  return [title + ":", ...values.map((value) => `  - ${value}`)]
}

const formatStatus = (report: DocumentReport): string =>
  report.offset === undefined ? `Status: ${report.errorCode}` : `Status: ${report.errorCode} at byte ${report.offset}`

/**
 * Render a human-readable report.
 *
 * @param report - Report data.
 * @returns Multi-line string for stdout.
 *
 * @pure true
 * @invariant output lists status, node counts and every pool
 * @complexity O(n)
 */
export const renderHumanReport = (report: DocumentReport): string =>
  [
    formatStatus(report),
    `Nodes: ${NodeKinds.map((kind) => `${kind.toLowerCase()}=${report.nodes[kind]}`).join(" ")}`,
    ...formatList("Pools", report.pools.map(formatPoolTrace))
  ].join("\n")

/**
 * Render report as JSON text.
 *
 * @pure true
 * @invariant offset is null when the parse succeeded
 * @complexity O(n)
 */
export const renderJsonReport = (report: DocumentReport): string =>
  JSON.stringify(
    {
      errorCode: report.errorCode,
      offset: report.offset ?? null,
      nodes: report.nodes,
      pools: report.pools
    },
    null,
    2
  )
