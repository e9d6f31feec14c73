import { NodeContext } from "@effect/platform-node"
import type { PlatformError } from "@effect/platform/Error"
import { FileSystem, type FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path, type Path as PathService } from "@effect/platform/Path"
import { Effect } from "effect"

export interface TempContext {
  readonly tempDir: string
  /** Write contents under tempDir and return the absolute path. */
  readonly writeFile: (name: string, contents: string) => Effect.Effect<string, PlatformError>
}

export const withTempDir = <A, E, R>(
  use: (context: TempContext) => Effect.Effect<A, E, R>
): Effect.Effect<A, E | PlatformError, R | FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const tempDir = yield* _(fs.makeTempDirectory())
    const writeFile = (name: string, contents: string) => {
      const target = path.join(tempDir, name)
      return Effect.as(fs.writeFileString(target, contents), target)
    }
    return yield* _(use({ tempDir, writeFile }))
  })

export const provideNodeContext = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  effect.pipe(Effect.provide(NodeContext.layer))

export const quarryArgv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => [
  "node",
  "quarry",
  ...args,
  "--silent"
]
