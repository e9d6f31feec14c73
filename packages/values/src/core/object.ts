import * as Arr from "effect/Array"
import * as Equal from "effect/Equal"
import * as Hash from "effect/Hash"
import * as Option from "effect/Option"
import * as Order from "effect/Order"
import type { Ordering } from "effect/Ordering"

import type { JsonObject } from "./json.js"
import { None } from "./none.js"
import { isValue, TypeId, type Value, type ValueProto } from "./value.js"
import { compareTypes, ValueType } from "./value-type.js"

// CHANGE: keyed Object value, the highest-ranked variant
// FORMAT THEOREM: ∀o ∈ Object, v ∉ Object: o.compare(v) = 1
// PURITY: CORE
// EFFECT: in-place mutation of the receiver only
// INVARIANT: keys() follows insertion order; marshalJSON() follows sorted key order
// COMPLEXITY: get/set/has/remove O(1); compare/marshalJSON O(n log n)

export type ObjectVisitor = (value: Value, key: string) => boolean

export class ObjectValue implements ValueProto {
  readonly [TypeId]: TypeId = TypeId
  readonly _tag = ValueType.Object

  private readonly entries: Map<string, Value>

  constructor(entries: Iterable<readonly [string, Value]> = []) {
    this.entries = new Map(entries)
  }

  type(): ValueType {
    return this._tag
  }

  length(): number {
    return this.entries.size
  }

  get(key: string): Option.Option<Value> {
    return Option.fromNullable(this.entries.get(key))
  }

  getOrNone(key: string): Value {
    return this.entries.get(key) ?? None
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  set(key: string, value: Value): void {
    this.entries.set(key, value)
  }

  remove(key: string): boolean {
    return this.entries.delete(key)
  }

  keys(): ReadonlyArray<string> {
    return Array.from(this.entries.keys())
  }

  forEach(visitor: ObjectVisitor): void {
    for (const [key, value] of this.entries) {
      if (!visitor(value, key)) {
        return
      }
    }
  }

  private sortedKeys(): ReadonlyArray<string> {
    return Arr.sort(this.entries.keys(), Order.string)
  }

  /**
   * Objects compare by size first, then pairwise over sorted keys: key text,
   * then the value stored under it.
   *
   * @pure true
   * @complexity O(n log n)
   */
  compare(other: Value): Ordering {
    if (other._tag !== ValueType.Object) {
      return compareTypes(this._tag, other._tag)
    }
    const bySize = Order.number(this.entries.size, other.entries.size)
    if (bySize !== 0) {
      return bySize
    }
    for (const [left, right] of Arr.zip(this.sortedKeys(), other.sortedKeys())) {
      const byKey = Order.string(left, right)
      if (byKey !== 0) {
        return byKey
      }
      const byValue = this.getOrNone(left).compare(other.getOrNone(right))
      if (byValue !== 0) {
        return byValue
      }
    }
    return 0
  }

  toString(): string {
    return this.marshalJSON()
  }

  marshalJSON(): string {
    const fields = this.sortedKeys().map((key) => `${JSON.stringify(key)}:${this.getOrNone(key).marshalJSON()}`)
    return `{${fields.join(",")}}`
  }

  // own properties only: a "__proto__" key must not reach the prototype setter
  toJSON(): JsonObject {
    return Object.fromEntries(this.sortedKeys().map((key) => [key, this.getOrNone(key).toJSON()] as const))
  }

  unwrap(): JsonObject {
    return Object.fromEntries(Array.from(this.entries, ([key, value]) => [key, value.unwrap()] as const))
  }

  copy(): ObjectValue {
    return new ObjectValue(this.entries)
  }

  clone(): ObjectValue {
    return new ObjectValue(Array.from(this.entries, ([key, value]) => [key, value.clone()] as const))
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return isValue(that) && this.compare(that) === 0
  }

  [Hash.symbol](): number {
    let hash = Hash.string(this._tag)
    for (const key of this.sortedKeys()) {
      hash = Hash.combine(Hash.string(key))(hash)
      hash = Hash.combine(Hash.hash(this.getOrNone(key)))(hash)
    }
    return Hash.optimize(hash)
  }
}

export const makeObject = (entries: Iterable<readonly [string, Value]> = []): ObjectValue => new ObjectValue(entries)
