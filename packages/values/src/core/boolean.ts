import * as Equal from "effect/Equal"
import * as Hash from "effect/Hash"
import * as Order from "effect/Order"
import type { Ordering } from "effect/Ordering"

import { isValue, TypeId, type Value, type ValueProto } from "./value.js"
import { compareTypes, ValueType } from "./value-type.js"

export class BooleanValue implements ValueProto {
  readonly [TypeId]: TypeId = TypeId
  readonly _tag = ValueType.Boolean

  constructor(readonly value: boolean) {}

  type(): ValueType {
    return this._tag
  }

  compare(other: Value): Ordering {
    if (other._tag !== ValueType.Boolean) {
      return compareTypes(this._tag, other._tag)
    }
    return Order.boolean(this.value, other.value)
  }

  toString(): string {
    return String(this.value)
  }

  marshalJSON(): string {
    return String(this.value)
  }

  toJSON(): boolean {
    return this.value
  }

  unwrap(): boolean {
    return this.value
  }

  clone(): BooleanValue {
    return this
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return isValue(that) && this.compare(that) === 0
  }

  [Hash.symbol](): number {
    return Hash.hash(this.value)
  }
}

export const True: BooleanValue = new BooleanValue(true)
export const False: BooleanValue = new BooleanValue(false)

export const makeBoolean = (value: boolean): BooleanValue => value ? True : False
