import * as Arr from "effect/Array"
import * as Either from "effect/Either"
import * as Equal from "effect/Equal"
import * as Hash from "effect/Hash"
import type * as Option from "effect/Option"
import * as Order from "effect/Order"
import type { Ordering } from "effect/Ordering"

import { type IndexOutOfRange, indexOutOfRange } from "./errors.js"
import type { Json } from "./json.js"
import { None } from "./none.js"
import { isValue, TypeId, type Value, ValueOrder, type ValueProto } from "./value.js"
import { compareTypes, ValueType } from "./value-type.js"

// CHANGE: growable, index-addressable Array value
// WHY: the evaluator builds and mutates sequences in place while querying irregular data
// FORMAT THEOREM: ∀i ∉ [0, length): get(i) = None ∧ set(i, v) = Left(IndexOutOfRange)
// PURITY: CORE
// EFFECT: in-place mutation of the receiver only
// INVARIANT: 0 ≤ length ≤ capacity; capacity never decreases
// COMPLEXITY: push/get/set O(1) amortized; insert/removeAt/compare O(n)

export type ArrayVisitor = (value: Value, index: number) => boolean

const minimumGrowth = 4

const normalizeCapacity = (hint: number): number =>
  Number.isSafeInteger(hint) && hint > 0 ? hint : 0

export class ArrayValue implements ValueProto, Iterable<Value> {
  readonly [TypeId]: TypeId = TypeId
  readonly _tag = ValueType.Array

  // slots past `size` hold None so no removed element stays reachable
  private slots: Array<Value>
  private size = 0

  constructor(capacityHint = 0) {
    this.slots = new Array<Value>(normalizeCapacity(capacityHint)).fill(None)
  }

  type(): ValueType {
    return this._tag
  }

  length(): number {
    return this.size
  }

  capacity(): number {
    return this.slots.length
  }

  private isIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.size
  }

  private ensureCapacity(required: number): void {
    const current = this.slots.length
    if (required <= current) {
      return
    }
    const next = Math.max(required, current * 2, minimumGrowth)
    for (let slot = current; slot < next; slot += 1) {
      this.slots.push(None)
    }
  }

  /**
   * Read the element at index. Never fails.
   *
   * @returns the element, or None when index is outside [0, length)
   *
   * @pure true
   * @complexity O(1)
   */
  get(index: number): Value {
    return this.isIndex(index) ? this.slots[index] ?? None : None
  }

  /**
   * Replace the element at index in place.
   *
   * @pure false
   * @invariant on Left, no element and no length is changed
   * @complexity O(1)
   */
  set(index: number, value: Value): Either.Either<void, IndexOutOfRange> {
    if (!this.isIndex(index)) {
      return Either.left(indexOutOfRange(index, this.size))
    }
    this.slots[index] = value
    return Either.right(undefined)
  }

  push(value: Value): void {
    this.ensureCapacity(this.size + 1)
    this.slots[this.size] = value
    this.size += 1
  }

  /**
   * Insert value at index, shifting elements at ≥ index one position right.
   * Valid indices are [0, length]; inserting at length appends.
   *
   * @pure false
   * @complexity O(n)
   */
  insert(index: number, value: Value): Either.Either<void, IndexOutOfRange> {
    if (!Number.isInteger(index) || index < 0 || index > this.size) {
      return Either.left(indexOutOfRange(index, this.size + 1))
    }
    this.ensureCapacity(this.size + 1)
    this.slots.copyWithin(index + 1, index, this.size)
    this.slots[index] = value
    this.size += 1
    return Either.right(undefined)
  }

  /**
   * Remove the element at index, shifting elements at > index one position left.
   *
   * @returns the removed element
   *
   * @pure false
   * @complexity O(n)
   */
  removeAt(index: number): Either.Either<Value, IndexOutOfRange> {
    if (!this.isIndex(index)) {
      return Either.left(indexOutOfRange(index, this.size))
    }
    const removed = this.slots[index] ?? None
    this.slots.copyWithin(index, index + 1, this.size)
    this.size -= 1
    this.slots[this.size] = None
    return Either.right(removed)
  }

  /**
   * Copy the elements in [from, min(to, length)) into a new list.
   * A negative from is read as 0.
   *
   * @pure true
   * @invariant result.length = max(0, min(to, length) - max(from, 0))
   * @complexity O(to - from)
   */
  slice(from: number, to: number): ReadonlyArray<Value> {
    const start = Math.max(0, from)
    const end = Math.min(to, this.size)
    if (start >= end) {
      return []
    }
    return this.slots.slice(start, end)
  }

  /**
   * Visit elements in index order until the visitor returns false.
   */
  forEach(visitor: ArrayVisitor): void {
    for (let index = 0; index < this.size; index += 1) {
      if (!visitor(this.get(index), index)) {
        return
      }
    }
  }

  *values(): Generator<Value, void, undefined> {
    for (let index = 0; index < this.size; index += 1) {
      yield this.get(index)
    }
  }

  [Symbol.iterator](): Iterator<Value> {
    return this.values()
  }

  private elements(): ReadonlyArray<Value> {
    return this.slots.slice(0, this.size)
  }

  /**
   * Arrays rank above every scalar and below Object. Two arrays compare
   * element-wise; when one is a prefix of the other the shorter is lesser.
   *
   * @pure true
   * @complexity O(min(n, m))
   */
  compare(other: Value): Ordering {
    if (other._tag !== ValueType.Array) {
      return compareTypes(this._tag, other._tag)
    }
    const shared = Math.min(this.size, other.size)
    for (let index = 0; index < shared; index += 1) {
      const result = this.get(index).compare(other.get(index))
      if (result !== 0) {
        return result
      }
    }
    return Order.number(this.size, other.size)
  }

  toString(): string {
    return this.marshalJSON()
  }

  marshalJSON(): string {
    return `[${this.elements().map((value) => value.marshalJSON()).join(",")}]`
  }

  toJSON(): ReadonlyArray<Json> {
    return this.elements().map((value) => value.toJSON())
  }

  unwrap(): ReadonlyArray<Json> {
    return this.elements().map((value) => value.unwrap())
  }

  /** Shallow copy: the new array shares element references. */
  copy(): ArrayValue {
    return arrayFrom(this.elements())
  }

  clone(): ArrayValue {
    return arrayFrom(this.elements().map((value) => value.clone()))
  }

  sort(): ArrayValue {
    return this.sortWith(ValueOrder)
  }

  /**
   * Stable sort into a new array; the receiver is left as is.
   *
   * @pure true
   * @complexity O(n log n)
   */
  sortWith(order: Order.Order<Value>): ArrayValue {
    return arrayFrom(Arr.sort(this.elements(), order))
  }

  indexOf(value: Value): Option.Option<number> {
    return Arr.findFirstIndex(this.elements(), (element) => element.compare(value) === 0)
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return isValue(that) && this.compare(that) === 0
  }

  [Hash.symbol](): number {
    let hash = Hash.string(this._tag)
    for (const value of this) {
      hash = Hash.combine(Hash.hash(value))(hash)
    }
    return Hash.optimize(hash)
  }
}

/**
 * Create an empty array; capacityHint only pre-sizes the backing storage.
 */
export const makeArray = (capacityHint = 0): ArrayValue => new ArrayValue(capacityHint)

export const arrayFrom = (values: Iterable<Value>): ArrayValue => {
  const items = Array.from(values)
  const result = new ArrayValue(items.length)
  for (const value of items) {
    result.push(value)
  }
  return result
}

export const arrayOf = (...values: ReadonlyArray<Value>): ArrayValue => arrayFrom(values)
