import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import { resolveConfig } from "../core/config.js"
import { type AppError, notAnArray } from "../core/errors.js"
import { getPath, parsePath } from "../core/path.js"
import { sortArray } from "../core/sort.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readDocument } from "../shell/document.js"

// CHANGE: orchestrate CLI commands with functional core + imperative shell
// FORMAT THEOREM: ∀cmd: run(cmd) = Right(r) → r.output is compact JSON or an ordering
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output emitted at most once
// COMPLEXITY: O(n log n)

export interface ProgramResult {
  readonly output: string
  readonly exitCode: number
}

type ProgramEnv = FileSystemService

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

// stdout carries only command output; log lines go to stderr
const stderrLogger = Logger.replace(Logger.defaultLogger, Logger.withConsoleError(Logger.logfmtLogger))

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const handleFormat = (cli: CliArgs): Effect.Effect<string, AppError, ProgramEnv> =>
  Effect.map(readDocument(cli.input), (value) => value.marshalJSON())

const handleSort = (cli: CliArgs): Effect.Effect<string, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configExplicit))
    const options = resolveConfig(cli, fileConfig)
    yield* _(Effect.logDebug(`sort descending=${options.descending} unique=${options.unique}`))
    const document = yield* _(readDocument(cli.input))
    if (document._tag !== "Array") {
      return yield* _(Effect.fail(notAnArray(document.type())))
    }
    return sortArray(document, options).marshalJSON()
  })

const handleCompare = (cli: CliArgs): Effect.Effect<string, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const left = yield* _(readDocument(cli.input))
    const right = yield* _(readDocument(cli.against ?? cli.input))
    return String(left.compare(right))
  })

const handleGet = (cli: CliArgs): Effect.Effect<string, AppError, ProgramEnv> =>
  Effect.map(readDocument(cli.input), (value) => getPath(value, parsePath(cli.path)).marshalJSON())

const executeCommand = (cli: CliArgs): Effect.Effect<string, AppError, ProgramEnv> =>
  Match.value(cli.command).pipe(
    Match.when("format", () => handleFormat(cli)),
    Match.when("sort", () => handleSort(cli)),
    Match.when("compare", () => handleCompare(cli)),
    Match.when("get", () => handleGet(cli)),
    Match.exhaustive
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the printed output and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant output is deterministic for fixed inputs
 * @complexity O(n log n)
 */
export const runCli = (argv: ReadonlyArray<string>): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const run = Effect.gen(function*(_) {
      const output = yield* _(executeCommand(cli))
      if (!cli.silent) {
        yield* _(writeStdout(output))
      }
      return { output, exitCode: 0 }
    })
    const logged = Effect.provide(run, stderrLogger)
    return yield* _(cli.verbose ? logged.pipe(Logger.withMinimumLogLevel(LogLevel.Debug)) : logged)
  })
