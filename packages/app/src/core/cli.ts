import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: deterministic CLI parsing for slabjson
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.file ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and positional arguments are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "format" | "check" | "stats"

export interface CliArgs {
  readonly command: CliCommand
  readonly file: string
  readonly indent: number | undefined
  readonly blockBytes: number | undefined
  readonly singleValue: boolean | undefined
  readonly configPath: string
  readonly configExplicit: boolean
  readonly json: boolean
  readonly silent: boolean
  readonly trace: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const DEFAULT_CONFIG_PATH = "./.slabjson.json"

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseCount = (flagName: string, value: string, minimum: number): Either.Either<number, CliError> => {
  if (!/^\d+$/.test(value)) {
    return Either.left(cliError(`Invalid value for --${flagName}: ${value}`))
  }
  const parsed = Number.parseInt(value, 10)
  return parsed < minimum
    ? Either.left(cliError(`--${flagName} must be at least ${minimum}`))
    : Either.right(parsed)
}

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("format", () => Either.right<CliCommand>("format")),
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.when("stats", () => Either.right<CliCommand>("stats")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

// file stays empty until --file is seen
const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  file: "",
  indent: undefined,
  blockBytes: undefined,
  singleValue: undefined,
  configPath: DEFAULT_CONFIG_PATH,
  configExplicit: false,
  json: false,
  silent: false,
  trace: false
})

interface FlagStep {
  readonly next: CliArgs
  readonly consumed: number
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: CliArgs, consumed: number): Either.Either<FlagStep, CliError> =>
  Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): Either.Either<FlagStep, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Either.Either<FlagStep, CliError> => {
  const useNext = inlineValue === undefined && nextValue !== undefined && /^(true|false|1|0)$/.test(nextValue)
  const nextValueResolved = inlineValue ?? (useNext ? nextValue : "true")
  return Either.map(parseBoolean(nextValueResolved ?? "true"), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<FlagStep, CliError>

const flagParsers: Record<string, FlagParser> = {
  json: (current) => setParsedFlag({ ...current, json: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  trace: (current) => setParsedFlag({ ...current, trace: true }, 1),
  "single-value": (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      singleValue: value
    })),
  file: (current, inlineValue, nextValue) =>
    parseValueFlag("file", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, file: value })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        configPath: value,
        configExplicit: true
      })),
  indent: (current, inlineValue, nextValue) =>
    parseValueFlag("indent", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseCount("indent", value, 0), (indent) => ({ ...args, indent }))),
  "block-bytes": (current, inlineValue, nextValue) =>
    parseValueFlag("block-bytes", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseCount("block-bytes", value, 1), (blockBytes) => ({ ...args, blockBytes })))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<FlagStep, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "format", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const requireFile = (args: CliArgs): Either.Either<CliArgs, CliError> =>
  args.file.length === 0 ? Either.left(cliError("Missing required flag --file")) : Either.right(args)

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to format when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  return Either.flatMap(
    parseCommandFromArgs(rawArgs),
    (parsed) => Either.flatMap(parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command)), requireFile)
  )
}
