import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { type CliArgs, parseCliArgs } from "../../src/core/cli.js"
import { resolveConfig } from "../../src/core/config.js"
import { arrayOf } from "../../src/core/array.js"
import { makeFloat, makeInt } from "../../src/core/number.js"
import { sortArray } from "../../src/core/sort.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "quarry", ...args]

const expectError = (args: ReadonlyArray<string>, message: string): void => {
  const parsed = parseCliArgs(args)
  expect(Either.isLeft(parsed)).toBe(true)
  if (Either.isLeft(parsed)) {
    expect(parsed.left).toEqual({ _tag: "CliError", message })
  }
}

const parsedOrThrow = (args: ReadonlyArray<string>): CliArgs =>
  Either.getOrThrowWith(parseCliArgs(args), (error) => new Error(error.message))

describe("parseCliArgs", () => {
  it.effect("parses sort flags", () =>
    Effect.sync(() => {
      const cli = parsedOrThrow(argv("sort", "--input", "data.json", "--descending", "--unique=false"))
      expect(cli.command).toBe("sort")
      expect(cli.input).toBe("data.json")
      expect(cli.descending).toBe(true)
      expect(cli.unique).toBe(false)
      expect(cli.configExplicit).toBe(false)
    }))

  it.effect("defaults to format", () =>
    Effect.sync(() => {
      const cli = parsedOrThrow(argv("--input=a.json"))
      expect(cli.command).toBe("format")
      expect(cli.input).toBe("a.json")
      expect(cli.configPath).toBe("./.quarry.json")
    }))

  it.effect("marks an explicit config path", () =>
    Effect.sync(() => {
      const cli = parsedOrThrow(argv("get", "--input", "a.json", "--path", "x.0", "--config", "c.json"))
      expect(cli.path).toBe("x.0")
      expect(cli.configPath).toBe("c.json")
      expect(cli.configExplicit).toBe(true)
    }))

  it.effect("rejects bad input", () =>
    Effect.sync(() => {
      expectError(argv("explode"), "Unknown command: explode")
      expectError(argv("sort", "--input", "a.json", "--nope"), "Unknown flag: --nope")
      expectError(argv("sort"), "Missing required flag --input")
      expectError(argv("sort", "--input"), "Missing value for --input")
      expectError(argv("compare", "--input", "a.json"), "compare requires --against")
      expectError(argv("sort", "--input", "a.json", "stray"), "Unexpected positional argument: stray")
      expectError(argv("sort", "--input", "a.json", "--unique", "maybe"), "Invalid boolean value: maybe")
    }))
})

describe("resolveConfig", () => {
  it.effect("prefers CLI flags over the config file over defaults", () =>
    Effect.sync(() => {
      const cli = parsedOrThrow(argv("sort", "--input", "a.json", "--descending=false"))
      expect(resolveConfig(cli, { descending: true, unique: true })).toEqual({ descending: false, unique: true })
      expect(resolveConfig(cli, undefined)).toEqual({ descending: false, unique: false })
    }))
})

describe("sortArray", () => {
  it.effect("sorts descending and drops equal neighbours", () =>
    Effect.sync(() => {
      const arr = arrayOf(makeInt(2), makeInt(1), makeFloat(2), makeInt(1))
      expect(sortArray(arr, { descending: false, unique: true }).marshalJSON()).toBe("[1,2]")
      expect(sortArray(arr, { descending: true, unique: false }).marshalJSON()).toBe("[2,2,1,1]")
      expect(arr.marshalJSON()).toBe("[2,1,2,1]")
    }))
})

describe("output flags", () => {
  it.effect("parses --silent and --verbose", () =>
    Effect.sync(() => {
      const cli = parsedOrThrow(argv("format", "--input", "a.json", "--silent", "--verbose"))
      expect(cli.silent).toBe(true)
      expect(cli.verbose).toBe(true)
      expect(parsedOrThrow(argv("format", "--input", "a.json")).silent).toBe(false)
    }))
})
