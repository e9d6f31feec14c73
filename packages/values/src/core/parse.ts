import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import { arrayFrom } from "./array.js"
import { makeBoolean } from "./boolean.js"
import { type UnmarshalError, unmarshalError } from "./errors.js"
import { None } from "./none.js"
import { makeFloat, makeInt } from "./number.js"
import { makeObject } from "./object.js"
import { makeString } from "./string.js"
import { isValue, type Value } from "./value.js"

// CHANGE: lift host data and JSON text into runtime values
// WHY: documents enter the runtime as plain JS data or raw JSON
// FORMAT THEOREM: ∀j ∈ Json: parseValue(j).unwrap() ≅ j
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: integral numbers become Int, every other number becomes Float
// COMPLEXITY: O(n) where n = number of nodes

// JSON.parse keeps "__proto__" as an own key; parseValue reads own entries only
const JsonText = Schema.parseJson()

const parseNumber = (value: number): Value => Number.isInteger(value) ? makeInt(value) : makeFloat(value)

/**
 * Convert arbitrary host data into a Value.
 *
 * @param input - Host value; values already in the runtime are returned unchanged.
 * @returns None for null, undefined and unsupported host types.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseValue = (input: unknown): Value => {
  if (isValue(input)) {
    return input
  }
  switch (typeof input) {
    case "boolean":
      return makeBoolean(input)
    case "number":
      return parseNumber(input)
    case "bigint":
      return makeInt(Number(input))
    case "string":
      return makeString(input)
    case "object": {
      if (input === null) {
        return None
      }
      if (Array.isArray(input)) {
        return arrayFrom(input.map((item: unknown) => parseValue(item)))
      }
      return makeObject(Object.entries(input).map(([key, item]: [string, unknown]) => [key, parseValue(item)] as const))
    }
    default:
      return None
  }
}

/**
 * Decode JSON text into a Value.
 *
 * @pure true
 * @invariant Left carries the schema decoder's formatted message
 * @complexity O(n)
 */
export const unmarshalJSON = (text: string): Either.Either<Value, UnmarshalError> =>
  pipe(
    Schema.decodeUnknownEither(JsonText)(text),
    Either.map(parseValue),
    Either.mapLeft((error) => unmarshalError(TreeFormatter.formatErrorSync(error)))
  )
