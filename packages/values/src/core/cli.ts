import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: deterministic argv parsing for the quarry CLI
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.input ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "format" | "sort" | "compare" | "get"

export interface CliArgs {
  readonly command: CliCommand
  readonly input: string
  readonly against: string | undefined
  readonly path: string
  readonly configPath: string
  readonly configExplicit: boolean
  readonly descending: boolean | undefined
  readonly unique: boolean | undefined
  readonly silent: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

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

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("format", () => Either.right<CliCommand>("format")),
    Match.when("sort", () => Either.right<CliCommand>("sort")),
    Match.when("compare", () => Either.right<CliCommand>("compare")),
    Match.when("get", () => Either.right<CliCommand>("get")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  input: "",
  against: undefined,
  path: "",
  configPath: "./.quarry.json",
  configExplicit: false,
  descending: undefined,
  unique: undefined,
  silent: false,
  verbose: false
})

interface ParsedFlag {
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

const setParsedFlag = (next: CliArgs, consumed: number): Either.Either<ParsedFlag, CliError> =>
  Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => CliArgs
): Either.Either<ParsedFlag, CliError> =>
  Either.map(readFlagValue(flagName, inlineValue, nextValue), (value) => ({
    next: update(current, value),
    consumed: inlineValue === undefined ? 2 : 1
  }))

const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Either.Either<ParsedFlag, CliError> => {
  const useNext = inlineValue === undefined && nextValue !== undefined && !isFlag(nextValue)
  const resolved = inlineValue ?? (useNext ? nextValue : "true")
  return Either.map(parseBoolean(resolved), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, (args, value) => ({ ...args, input: value })),
  against: (current, inlineValue, nextValue) =>
    parseValueFlag("against", current, inlineValue, nextValue, (args, value) => ({ ...args, against: value })),
  path: (current, inlineValue, nextValue) =>
    parseValueFlag("path", current, inlineValue, nextValue, (args, value) => ({ ...args, path: value })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      configPath: value,
      configExplicit: true
    })),
  descending: (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({ ...args, descending: value })),
  unique: (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({ ...args, unique: value }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
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

const parseCommandFromArgs = (rawArgs: ReadonlyArray<string>): Either.Either<ParsedCommand, CliError> => {
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

const requireInputs = (args: CliArgs): Either.Either<CliArgs, CliError> => {
  if (args.input.length === 0) {
    return Either.left(cliError("Missing required flag --input"))
  }
  if (args.command === "compare" && args.against === undefined) {
    return Either.left(cliError("compare requires --against"))
  }
  return Either.right(args)
}

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
export const parseCliArgs = (argv: ReadonlyArray<string>): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  return Either.flatMap(
    parseCommandFromArgs(rawArgs),
    (parsed) => Either.flatMap(parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command)), requireInputs)
  )
}
