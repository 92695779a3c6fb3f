// CHANGE: public library surface of slabjson
// PURITY: CORE
// INVARIANT: nothing exported here performs IO except the shell loaders

export type { CliArgs, CliCommand, CliError } from "./core/cli.js"
export type { FileConfig, ResolvedConfig } from "./core/config.js"
export { resolveConfig } from "./core/config.js"
export type { DocumentInput, DocumentOptions, JsonDocument } from "./core/document.js"
export { makeJsonDocument } from "./core/document.js"
export {
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
} from "./core/dom.js"
export type { AppError, ConfigError, DocumentError, ErrorCode, LoadError, LoadErrorCode, ParseFailure } from "./core/errors.js"
export {
  describeErrorCode,
  errorCodeNumber,
  ErrorCodes,
  isErrorCode,
  PoolDefect,
  renderAppError,
  TreeDefect
} from "./core/errors.js"
export { checkPoolBalance } from "./core/invariants.js"
export type { Json, JsonObject } from "./core/json.js"
export { toJson } from "./core/json.js"
export type {
  ArrayNode,
  ContainerRef,
  DocumentNode,
  DocumentRef,
  ElementNode,
  JsonNode,
  LiteralNode,
  LiteralType,
  NodeKind,
  NodeRef,
  NumberNode,
  ObjectNode,
  Ref,
  StringNode,
  TreeNode
} from "./core/node.js"
export { NodeKinds } from "./core/node.js"
export type { FixedBlockPool, PoolSettings, PoolSlot, PoolStats } from "./core/pool.js"
export { DEFAULT_BLOCK_BYTES, makeFixedBlockPool } from "./core/pool.js"
export type { Printer, PrinterOptions } from "./core/printer.js"
export { DEFAULT_INDENT, makePrinter } from "./core/printer.js"
export type { DocumentReport, NodeCounts } from "./core/report.js"
export { buildReport, formatPoolTrace, renderHumanReport, renderJsonReport } from "./core/report.js"
export type { Span } from "./core/span.js"
export type { NodeStore } from "./core/tree.js"
export { childRefs, deleteChildren, deleteNode, insertEndChild, unlink } from "./core/tree.js"
export type { JsonVisitor, VisitScope } from "./core/visitor.js"
export { loadDocument, readDocument } from "./shell/load-document.js"
