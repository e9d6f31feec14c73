import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Option from "effect/Option"

import { arrayOf, makeArray } from "../../src/core/array.js"
import { None } from "../../src/core/none.js"
import { makeInt, ZeroInt } from "../../src/core/number.js"
import { makeObject } from "../../src/core/object.js"
import { makeString } from "../../src/core/string.js"

describe("ObjectValue", () => {
  it.effect("ranks above arrays and scalars", () =>
    Effect.sync(() => {
      const obj = makeObject()
      expect(obj.compare(makeArray())).toBe(1)
      expect(obj.compare(None)).toBe(1)
      expect(obj.compare(makeString("z"))).toBe(1)
    }))

  it.effect("compares by size, then keys, then values", () =>
    Effect.sync(() => {
      const one = makeObject([["a", makeInt(1)]])
      expect(one.compare(makeObject())).toBe(1)
      expect(one.compare(makeObject([["b", ZeroInt]]))).toBe(-1)
      expect(one.compare(makeObject([["a", makeInt(2)]]))).toBe(-1)
      expect(one.compare(makeObject([["a", makeInt(1)]]))).toBe(0)
    }))

  it.effect("ignores insertion order when comparing", () =>
    Effect.sync(() => {
      const left = makeObject([["a", ZeroInt], ["b", ZeroInt]])
      const right = makeObject([["b", ZeroInt], ["a", ZeroInt]])
      expect(left.compare(right)).toBe(0)
    }))

  it.effect("reads keys as Option or None", () =>
    Effect.sync(() => {
      const obj = makeObject([["a", makeInt(1)]])
      expect(Option.isSome(obj.get("a"))).toBe(true)
      expect(Option.isNone(obj.get("b"))).toBe(true)
      expect(obj.getOrNone("b")).toBe(None)
      expect(obj.has("a")).toBe(true)
    }))

  it.effect("mutates keys in place", () =>
    Effect.sync(() => {
      const obj = makeObject()
      obj.set("b", makeInt(2))
      obj.set("a", makeInt(1))
      expect(obj.keys()).toEqual(["b", "a"])
      expect(obj.remove("b")).toBe(true)
      expect(obj.remove("b")).toBe(false)
      expect(obj.length()).toBe(1)
    }))

  it.effect("serializes with sorted keys and no whitespace", () =>
    Effect.sync(() => {
      const obj = makeObject([["b", arrayOf(makeInt(1))], ["a", makeString("x")]])
      expect(obj.marshalJSON()).toBe(`{"a":"x","b":[1]}`)
      expect(JSON.stringify(obj)).toBe(`{"a":"x","b":[1]}`)
      expect(obj.toString()).toBe(`{"a":"x","b":[1]}`)
      expect(makeObject().marshalJSON()).toBe("{}")
    }))

  it.effect("unwraps into a plain record", () =>
    Effect.sync(() => {
      const obj = makeObject([["list", arrayOf(makeInt(1), None)]])
      expect(obj.unwrap()).toEqual({ list: [1, null] })
    }))

  it.effect("stops iteration when the visitor returns false", () =>
    Effect.sync(() => {
      const obj = makeObject([["a", ZeroInt], ["b", ZeroInt], ["c", ZeroInt]])
      const seen: Array<string> = []
      obj.forEach((_value, key) => {
        seen.push(key)
        return key !== "b"
      })
      expect(seen).toEqual(["a", "b"])
    }))

  it.effect("clones nested arrays", () =>
    Effect.sync(() => {
      const inner = arrayOf(ZeroInt)
      const obj = makeObject([["xs", inner]])
      const clone = obj.clone()
      const copy = obj.copy()
      inner.push(makeInt(1))
      expect(clone.marshalJSON()).toBe(`{"xs":[0]}`)
      expect(copy.marshalJSON()).toBe(`{"xs":[0,1]}`)
    }))
})

describe("ObjectValue host projections", () => {
  it.effect("keeps a __proto__ key as an own property", () =>
    Effect.sync(() => {
      const obj = makeObject([["__proto__", makeInt(1)], ["a", makeInt(2)]])
      const arr = arrayOf(obj)
      expect(JSON.stringify(arr)).toBe(`[{"__proto__":1,"a":2}]`)
      expect(arr.marshalJSON()).toBe(`[{"__proto__":1,"a":2}]`)
      const unwrapped = obj.unwrap()
      expect(Object.keys(unwrapped)).toEqual(["__proto__", "a"])
      expect(Object.getPrototypeOf(unwrapped)).toBe(Object.prototype)
    }))
})
