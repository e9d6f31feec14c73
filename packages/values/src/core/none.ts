import * as Equal from "effect/Equal"
import * as Hash from "effect/Hash"
import type { Ordering } from "effect/Ordering"

import { isValue, TypeId, type Value, type ValueProto } from "./value.js"
import { compareTypes, ValueType } from "./value-type.js"

/**
 * The absence sentinel. Out-of-range reads and missing keys resolve to it.
 */
export class NoneValue implements ValueProto {
  readonly [TypeId]: TypeId = TypeId
  readonly _tag = ValueType.None

  type(): ValueType {
    return this._tag
  }

  compare(other: Value): Ordering {
    return compareTypes(this._tag, other._tag)
  }

  toString(): string {
    return ""
  }

  marshalJSON(): string {
    return "null"
  }

  toJSON(): null {
    return null
  }

  unwrap(): null {
    return null
  }

  clone(): NoneValue {
    return this
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return isValue(that) && this.compare(that) === 0
  }

  [Hash.symbol](): number {
    return Hash.string(this._tag)
  }
}

export const None: NoneValue = new NoneValue()
