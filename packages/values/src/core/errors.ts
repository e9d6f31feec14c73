import type { CliError } from "./cli.js"

// CHANGE: error algebra for the value layer and the CLI shell
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type IndexOutOfRange = {
  readonly _tag: "IndexOutOfRange"
  readonly index: number
  readonly length: number
  readonly message: string
}
export type UnmarshalError = { readonly _tag: "UnmarshalError"; readonly message: string }
export type NotAnArray = { readonly _tag: "NotAnArray"; readonly actual: string; readonly message: string }
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }

export type AppError =
  | CliError
  | IndexOutOfRange
  | UnmarshalError
  | NotAnArray
  | ConfigError
  | FileError

export const indexOutOfRange = (index: number, length: number): IndexOutOfRange => ({
  _tag: "IndexOutOfRange",
  index,
  length,
  message: `index ${index} is out of range [0, ${length})`
})

export const unmarshalError = (message: string): UnmarshalError => ({
  _tag: "UnmarshalError",
  message
})

export const notAnArray = (actual: string): NotAnArray => ({
  _tag: "NotAnArray",
  actual,
  message: `expected an Array, got ${actual}`
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

/**
 * Render any AppError as a single human-readable line.
 */
export const formatAppError = (error: AppError): string => `${error._tag}: ${error.message}`
