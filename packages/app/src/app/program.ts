import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { documentOptions, printerOptions, resolveConfig } from "../core/config.js"
import type { JsonDocument } from "../core/document.js"
import type { AppError } from "../core/errors.js"
import { checkPoolBalance } from "../core/invariants.js"
import { makePrinter } from "../core/printer.js"
import { buildReport, formatPoolTrace, renderHumanReport, renderJsonReport } from "../core/report.js"
import { deleteChildren } from "../core/tree.js"
import { loadConfigFile } from "../shell/config-file.js"
import { loadDocument, readDocument } from "../shell/load-document.js"

// CHANGE: orchestrate CLI modes with functional core + imperative shell
// FORMAT THEOREM: ∀mode: run(mode) returns exitCode ∈ {0,2} or fails with AppError
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output emitted at most once; every document is destroyed before the program returns
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly exitCode: number
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitOutput = (result: ProgramResult, silent: boolean): Effect.Effect<void> =>
  silent ? Effect.void : writeStdout(result.output)

const traceDocument = (document: JsonDocument): Effect.Effect<void> =>
  Effect.forEach(document.poolStats(), (stats) => Effect.logDebug(formatPoolTrace(stats)), { discard: true })

// tears the tree down, then checks that only never-attached nodes are left in the pools
const releaseDocument = (document: JsonDocument): Effect.Effect<void> =>
  Effect.gen(function*(_) {
    yield* _(traceDocument(document))
    deleteChildren(document.store, document.root)
    const unbalanced = checkPoolBalance(document.poolStats())
    if (unbalanced.length > 0) {
      yield* _(Effect.logWarning(`pools not balanced after teardown: ${unbalanced.join(", ")}`))
    }
    document.destroy()
  })

const withDocument = <E>(
  acquire: Effect.Effect<JsonDocument, E, FileSystemService>,
  use: (document: JsonDocument) => ProgramResult
): Effect.Effect<ProgramResult, E, FileSystemService> =>
  Effect.acquireUseRelease(acquire, (document) => Effect.sync(() => use(document)), releaseDocument)

const handleFormat = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  withDocument(loadDocument(cli.file, documentOptions(config)), (document) => {
    const printer = makePrinter(printerOptions(config))
    document.accept(printer)
    return { output: printer.text(), exitCode: 0 }
  })

const handleCheck = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  withDocument(readDocument(cli.file, documentOptions(config)), (document) => {
    const report = buildReport(document)
    return report.offset === undefined
      ? { output: "ok", exitCode: 0 }
      : { output: `${report.errorCode} at byte ${report.offset}`, exitCode: 2 }
  })

const handleStats = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  withDocument(readDocument(cli.file, documentOptions(config)), (document) => {
    const report = buildReport(document)
    return { output: cli.json ? renderJsonReport(report) : renderHumanReport(report), exitCode: 0 }
  })

const executeCommand = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Match.value(cli.command).pipe(
    Match.when("format", () => handleFormat(cli, config)),
    Match.when("check", () => handleCheck(cli, config)),
    Match.when("stats", () => handleStats(cli, config)),
    Match.exhaustive
  )

const runCommand = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configExplicit))
    const config = resolveConfig(cli, fileConfig)
    yield* _(Effect.logDebug(`indent=${config.indent} blockBytes=${config.blockBytes} single=${config.requireSingleValue}`))
    const result = yield* _(executeCommand(cli, config))
    yield* _(emitOutput(result, cli.silent))
    return result
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the rendered output and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const program = runCommand(cli)
    return yield* _(cli.trace ? program.pipe(Logger.withMinimumLogLevel(LogLevel.Debug)) : program)
  })
