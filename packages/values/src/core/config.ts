import type { CliArgs } from "./cli.js"

// CHANGE: config merging rules and defaults for sort options
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: CLI flags override the config file, which overrides defaults
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly descending?: boolean
  readonly unique?: boolean
}

export interface ResolvedConfig {
  readonly descending: boolean
  readonly unique: boolean
}

/**
 * Resolve the effective sort options.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .quarry.json.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (cli: CliArgs, fileConfig: FileConfig | undefined): ResolvedConfig => ({
  descending: cli.descending ?? fileConfig?.descending ?? false,
  unique: cli.unique ?? fileConfig?.unique ?? false
})
