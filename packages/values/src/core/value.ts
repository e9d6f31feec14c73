import type * as Equal from "effect/Equal"
import type * as Equivalence from "effect/Equivalence"
import type * as Order from "effect/Order"
import type { Ordering } from "effect/Ordering"

import type { ArrayValue } from "./array.js"
import type { BooleanValue } from "./boolean.js"
import type { Json } from "./json.js"
import type { NoneValue } from "./none.js"
import type { FloatValue, IntValue } from "./number.js"
import type { ObjectValue } from "./object.js"
import type { StringValue } from "./string.js"
import type { ValueType } from "./value-type.js"

// CHANGE: define the shared contract every runtime value implements
// FORMAT THEOREM: ∀v ∈ Value: v.compare(v) = 0 ∧ Equal.equals(a,b) ⇔ a.compare(b) = 0
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Value is a closed union discriminated by _tag
// COMPLEXITY: O(1)/O(1)

export const TypeId: unique symbol = Symbol.for("@quarry/values/Value")

export type TypeId = typeof TypeId

export interface ValueProto extends Equal.Equal {
  readonly [TypeId]: TypeId
  readonly _tag: ValueType
  /** Identity token used by operator, printer and serializer dispatch. */
  type(): ValueType
  /** Three-way comparison against any other value. */
  compare(other: Value): Ordering
  toString(): string
  /** Compact JSON text with no inserted whitespace. */
  marshalJSON(): string
  /** JSON tree matching marshalJSON, picked up by JSON.stringify. */
  toJSON(): Json
  /** Plain host data, free of value classes. */
  unwrap(): Json
  /** Deep copy; immutable variants return themselves. */
  clone(): Value
}

export type Value =
  | NoneValue
  | BooleanValue
  | IntValue
  | FloatValue
  | StringValue
  | ArrayValue
  | ObjectValue

export const isValue = (input: unknown): input is Value =>
  typeof input === "object" && input !== null && TypeId in input

/**
 * Universal total order over values, usable with effect/Array sorting helpers.
 *
 * @pure true
 * @invariant ValueOrder(a, b) = -ValueOrder(b, a)
 * @complexity O(n) in the size of the compared structures
 */
export const ValueOrder: Order.Order<Value> = (self, that) => self.compare(that)

export const ValueEquivalence: Equivalence.Equivalence<Value> = (self, that) => self.compare(that) === 0
