import * as Arr from "effect/Array"
import * as Order from "effect/Order"

import { type ArrayValue, arrayFrom } from "./array.js"
import type { ResolvedConfig } from "./config.js"
import { ValueEquivalence, ValueOrder } from "./value.js"

/**
 * Sort an array by the universal value order, optionally descending and
 * without elements that compare equal.
 *
 * @pure true
 * @invariant with unique, no two adjacent results compare equal
 * @complexity O(n log n)
 */
export const sortArray = (array: ArrayValue, options: ResolvedConfig): ArrayValue => {
  const sorted = array.sortWith(options.descending ? Order.reverse(ValueOrder) : ValueOrder)
  return options.unique ? arrayFrom(Arr.dedupeAdjacentWith(sorted, ValueEquivalence)) : sorted
}
