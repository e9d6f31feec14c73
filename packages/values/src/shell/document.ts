import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import { unmarshalJSON } from "../core/parse.js"
import type { Value } from "../core/value.js"

// CHANGE: load a JSON document from disk as a runtime value
// PURITY: SHELL
// EFFECT: Effect<Value, AppError, FileSystem>
// INVARIANT: decoding failures surface as UnmarshalError, IO failures as FileError
// COMPLEXITY: O(n)

export const readDocument = (path: string): Effect.Effect<Value, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const raw = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    const decoded = unmarshalJSON(raw)
    if (decoded._tag === "Left") {
      return yield* _(Effect.fail(decoded.left))
    }
    const value = decoded.right
    yield* _(Effect.logDebug(`read ${value.type()} document from ${path}`))
    return value
  })
