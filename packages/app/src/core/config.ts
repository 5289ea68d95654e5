import type { CliArgs } from "./cli.js"
import type { ParseOptions } from "./parse.js"
import { DEFAULT_MAX_DEPTH } from "./parse.js"
import type { SerializeOptions } from "./serialize.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): n/a
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: maxDepth ≥ 1
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly maxDepth?: number
  readonly indent?: number
  readonly skipUnknownCharacters?: boolean
}

export interface ResolvedConfig {
  readonly parse: Required<ParseOptions>
  /** Indent used by `format` and file writes; 0 means compact. */
  readonly indent: number
}

export const DEFAULT_INDENT = 2

const resolveIndent = (cli: CliArgs, fileConfig: FileConfig | undefined): number =>
  cli.compact ? 0 : cli.indent ?? fileConfig?.indent ?? DEFAULT_INDENT

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .jsondocrc.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @invariant CLI flags win over the config file
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  parse: {
    maxDepth: cli.maxDepth ?? fileConfig?.maxDepth ?? DEFAULT_MAX_DEPTH,
    skipUnknownCharacters: cli.skipUnknown ?? fileConfig?.skipUnknownCharacters ?? false
  },
  indent: resolveIndent(cli, fileConfig)
})

export const serializeOptionsFor = (config: ResolvedConfig): SerializeOptions =>
  config.indent > 0 ? { indent: config.indent } : {}
