export { type ArrayVisitor, ArrayValue, arrayFrom, arrayOf, makeArray } from "./core/array.js"
export { BooleanValue, False, makeBoolean, True } from "./core/boolean.js"
export {
  type AppError,
  formatAppError,
  type IndexOutOfRange,
  indexOutOfRange,
  type NotAnArray,
  type UnmarshalError
} from "./core/errors.js"
export type { Json, JsonObject } from "./core/json.js"
export { None, NoneValue } from "./core/none.js"
export { compareNumbers, FloatValue, IntValue, makeFloat, makeInt, ZeroFloat, ZeroInt } from "./core/number.js"
export { makeObject, type ObjectVisitor, ObjectValue } from "./core/object.js"
export { parseValue, unmarshalJSON } from "./core/parse.js"
export { getPath, parsePath } from "./core/path.js"
export { EmptyString, makeString, StringValue } from "./core/string.js"
export { isValue, TypeId, type Value, ValueEquivalence, ValueOrder, type ValueProto } from "./core/value.js"
export { compareTypes, typeRank, ValueType } from "./core/value-type.js"
