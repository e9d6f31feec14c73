import * as Equal from "effect/Equal"
import * as Hash from "effect/Hash"
import * as Order from "effect/Order"
import type { Ordering } from "effect/Ordering"

import { isValue, TypeId, type Value, type ValueProto } from "./value.js"
import { compareTypes, ValueType } from "./value-type.js"

// CHANGE: numeric variants share one comparison so Int and Float interleave by magnitude
// FORMAT THEOREM: ∀a ∈ Int, b ∈ Float: a.compare(b) = compareNumbers(a.value, b.value)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: NaN equals NaN and sorts below every other number
// COMPLEXITY: O(1)/O(1)

/**
 * Total order over JS numbers, NaN included.
 *
 * @pure true
 * @invariant compareNumbers(NaN, x) = -1 for every non-NaN x
 * @complexity O(1)
 */
export const compareNumbers = (left: number, right: number): Ordering => {
  const leftNaN = Number.isNaN(left)
  const rightNaN = Number.isNaN(right)
  if (leftNaN || rightNaN) {
    return Order.boolean(!leftNaN, !rightNaN)
  }
  return Order.number(left, right)
}

const compareNumeric = (self: IntValue | FloatValue, other: Value): Ordering => {
  if (other._tag === ValueType.Int || other._tag === ValueType.Float) {
    return compareNumbers(self.value, other.value)
  }
  return compareTypes(self._tag, other._tag)
}

export class IntValue implements ValueProto {
  readonly [TypeId]: TypeId = TypeId
  readonly _tag = ValueType.Int

  constructor(readonly value: number) {}

  type(): ValueType {
    return this._tag
  }

  compare(other: Value): Ordering {
    return compareNumeric(this, other)
  }

  toString(): string {
    return String(this.value)
  }

  marshalJSON(): string {
    return String(this.value)
  }

  toJSON(): number {
    return this.value
  }

  unwrap(): number {
    return this.value
  }

  clone(): IntValue {
    return this
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return isValue(that) && this.compare(that) === 0
  }

  [Hash.symbol](): number {
    return Hash.number(this.value)
  }
}

export class FloatValue implements ValueProto {
  readonly [TypeId]: TypeId = TypeId
  readonly _tag = ValueType.Float

  constructor(readonly value: number) {}

  type(): ValueType {
    return this._tag
  }

  compare(other: Value): Ordering {
    return compareNumeric(this, other)
  }

  toString(): string {
    return String(this.value)
  }

  // JSON has no NaN or Infinity
  marshalJSON(): string {
    return Number.isFinite(this.value) ? JSON.stringify(this.value) : "null"
  }

  toJSON(): number | null {
    return Number.isFinite(this.value) ? this.value : null
  }

  unwrap(): number {
    return this.value
  }

  clone(): FloatValue {
    return this
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return isValue(that) && this.compare(that) === 0
  }

  [Hash.symbol](): number {
    return Hash.number(this.value)
  }
}

export const ZeroInt: IntValue = new IntValue(0)
export const ZeroFloat: FloatValue = new FloatValue(0)

/**
 * Build an Int, truncating toward zero. Non-finite input becomes 0.
 *
 * @pure true
 * @invariant Number.isInteger(makeInt(n).value)
 * @complexity O(1)
 */
export const makeInt = (value: number): IntValue => {
  const truncated = Number.isFinite(value) ? Math.trunc(value) + 0 : 0
  return truncated === 0 ? ZeroInt : new IntValue(truncated)
}

export const makeFloat = (value: number): FloatValue => new FloatValue(value)
