import { Match } from "effect"
import * as Option from "effect/Option"

import { None } from "./none.js"
import type { Value } from "./value.js"

// CHANGE: permissive dotted-path reads over nested values
// FORMAT THEOREM: ∀v,p: getPath(v, p) ∈ Value (never fails)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: any missing index, key or non-container step yields None
// COMPLEXITY: O(k) where k = number of segments

const indexPattern = /^\d+$/

const readIndex = (segment: string): Option.Option<number> =>
  indexPattern.test(segment) ? Option.some(Number(segment)) : Option.none()

export const parsePath = (raw: string): ReadonlyArray<string> => raw.length === 0 ? [] : raw.split(".")

const step = (value: Value, segment: string): Value =>
  Match.value(value).pipe(
    Match.tag("Array", (array) =>
      Option.match(readIndex(segment), {
        onNone: () => None,
        onSome: (index) => array.get(index)
      })),
    Match.tag("Object", (object) => object.getOrNone(segment)),
    Match.orElse(() => None)
  )

/**
 * Follow path segments from root. Numeric segments index Arrays, the rest
 * read Object keys.
 *
 * @pure true
 * @complexity O(k)
 */
export const getPath = (root: Value, segments: ReadonlyArray<string>): Value => {
  let current = root
  for (const segment of segments) {
    current = step(current, segment)
  }
  return current
}
