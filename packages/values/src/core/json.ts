// CHANGE: describe the host-side JSON shape produced by unwrap and toJSON
// WHY: host code walks results without knowing the value classes
// FORMAT THEOREM: ∀x ∈ Json: x is null | boolean | number | string | Json[] | {k: Json}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }
