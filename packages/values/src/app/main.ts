#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { formatAppError } from "../core/errors.js"
import { runCli } from "./program.js"

// CHANGE: wire the CLI program into the Node runtime
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: failures print one line to stderr and set exit code 1
// COMPLEXITY: O(1)

const main = runCli(process.argv).pipe(
  Effect.flatMap((result) =>
    Effect.sync(() => {
      process.exitCode = result.exitCode
    })
  ),
  Effect.catchAll((error) =>
    Effect.sync(() => {
      process.stderr.write(`${formatAppError(error)}\n`)
      process.exitCode = 1
    })
  )
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
