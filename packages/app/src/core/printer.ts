import type { JsonNode } from "./node.js"
import { spanText } from "./span.js"
import type { JsonVisitor } from "./visitor.js"

// CHANGE: visitor that renders the tree as indented text
// FORMAT THEOREM: ∀t compact single-value JSON: parse(print(parse(t))) has the kind/value sequence of parse(t)
// PURITY: CORE
// EFFECT: accumulates into the printer's own output
// INVARIANT: strings are re-quoted byte for byte; literals print as null, true, false
// COMPLEXITY: O(n) where n = output length

export const DEFAULT_INDENT = 4

export interface PrinterOptions {
  /** Spaces per nesting level. */
  readonly indent?: number
}

export interface Printer extends JsonVisitor {
  readonly text: () => string
}

// 1e999 reads back as Infinity; NaN has no spelling in the number grammar
export const formatNumber = (value: number): string => {
  if (Number.isFinite(value)) {
    return String(value)
  }
  if (Number.isNaN(value)) {
    return "null"
  }
  return value > 0 ? "1e999" : "-1e999"
}

/**
 * Create a printer; pass it to `document.accept` and read `text()` afterwards.
 *
 * @param options - Indentation width.
 * @returns A visitor accumulating formatted output.
 *
 * @pure false
 * @invariant depth returns to 0 after a complete traversal
 * @complexity O(1)
 */
export const makePrinter = (options: PrinterOptions = {}): Printer => {
  const unit = " ".repeat(Math.max(0, Math.floor(options.indent ?? DEFAULT_INDENT)))
  const out: Array<string> = []
  let depth = 0

  const printSpace = (level: number): void => {
    if (level > 0) {
      out.push(unit.repeat(level))
    }
  }

  // separator before a node that follows a sibling; members of an object carry no indentation of their own
  const printPrevSymbol = (node: JsonNode): void => {
    const { parent, prev } = node.links
    if (parent !== null && prev !== null) {
      if (parent.kind === "Element") {
        out.push(" : ")
        return
      }
      out.push(",\n")
    }
    if (node._tag !== "Element") {
      printSpace(depth)
    }
  }

  const enter = (node: JsonNode, open: string): boolean => {
    printPrevSymbol(node)
    out.push(open)
    depth++
    return true
  }

  const exit = (close: string): boolean => {
    out.push("\n")
    depth = Math.max(0, depth - 1)
    printSpace(depth)
    out.push(close)
    return true
  }

  return {
    text: () => out.join(""),
    visitEnterObject: (node) => enter(node, "{\n"),
    visitExitObject: () => exit("}"),
    visitEnterArray: (node) => enter(node, "[\n"),
    visitExitArray: () => exit("]"),
    visitEnterElement: (node) => {
      printPrevSymbol(node)
      return true
    },
    visitNumber: (node) => {
      printPrevSymbol(node)
      out.push(formatNumber(node.value))
      return true
    },
    visitString: (node, scope) => {
      printPrevSymbol(node)
      out.push(`"${spanText(scope.buffer, node.span)}"`)
      return true
    },
    visitLiteral: (node) => {
      printPrevSymbol(node)
      out.push(node.literal)
      return true
    }
  }
}
