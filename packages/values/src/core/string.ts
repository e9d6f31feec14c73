import * as Equal from "effect/Equal"
import * as Hash from "effect/Hash"
import * as Order from "effect/Order"
import type { Ordering } from "effect/Ordering"

import { isValue, TypeId, type Value, type ValueProto } from "./value.js"
import { compareTypes, ValueType } from "./value-type.js"

export class StringValue implements ValueProto {
  readonly [TypeId]: TypeId = TypeId
  readonly _tag = ValueType.String

  constructor(readonly value: string) {}

  type(): ValueType {
    return this._tag
  }

  // UTF-16 code unit order
  compare(other: Value): Ordering {
    if (other._tag !== ValueType.String) {
      return compareTypes(this._tag, other._tag)
    }
    return Order.string(this.value, other.value)
  }

  toString(): string {
    return this.value
  }

  marshalJSON(): string {
    return JSON.stringify(this.value)
  }

  toJSON(): string {
    return this.value
  }

  unwrap(): string {
    return this.value
  }

  clone(): StringValue {
    return this
  }

  length(): number {
    return this.value.length
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return isValue(that) && this.compare(that) === 0
  }

  [Hash.symbol](): number {
    return Hash.string(this.value)
  }
}

export const EmptyString: StringValue = new StringValue("")

export const makeString = (value: string): StringValue => value.length === 0 ? EmptyString : new StringValue(value)
