import * as Order from "effect/Order"
import type { Ordering } from "effect/Ordering"

// CHANGE: central rank table for the closed value universe
// WHY: values of different variants compare by the rank of their type
// FORMAT THEOREM: ∀a,b ∈ ValueType: compareTypes(a,b) = sign(rank(a) - rank(b))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: None < Boolean < Int < Float < String < Array < Object
// COMPLEXITY: O(1)/O(1)

export const ValueType = {
  None: "None",
  Boolean: "Boolean",
  Int: "Int",
  Float: "Float",
  String: "String",
  Array: "Array",
  Object: "Object"
} as const

export type ValueType = (typeof ValueType)[keyof typeof ValueType]

const rankTable: Readonly<Record<ValueType, number>> = {
  None: 0,
  Boolean: 1,
  Int: 2,
  Float: 3,
  String: 4,
  Array: 5,
  Object: 6
}

export const typeRank = (type: ValueType): number => rankTable[type]

/**
 * Compare two type identities by their rank.
 *
 * @pure true
 * @invariant compareTypes(a, a) = 0
 * @complexity O(1)
 */
export const compareTypes = (left: ValueType, right: ValueType): Ordering =>
  Order.number(typeRank(left), typeRank(right))
