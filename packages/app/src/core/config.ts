import type { CliArgs } from "./cli.js"
import type { DocumentOptions } from "./document.js"
import { DEFAULT_BLOCK_BYTES } from "./pool.js"
import type { PrinterOptions } from "./printer.js"
import { DEFAULT_INDENT } from "./printer.js"

// CHANGE: define config merging rules and defaults
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved blockBytes ≥ 1 and indent ≥ 0
// COMPLEXITY: O(1)

export interface FileConfig {
  readonly indent?: number
  readonly blockBytes?: number
  readonly singleValue?: boolean
}

export interface ResolvedConfig {
  readonly indent: number
  readonly blockBytes: number
  readonly requireSingleValue: boolean
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .slabjson.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @invariant CLI values win over file values, file values over defaults
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  indent: cli.indent ?? fileConfig?.indent ?? DEFAULT_INDENT,
  blockBytes: cli.blockBytes ?? fileConfig?.blockBytes ?? DEFAULT_BLOCK_BYTES,
  requireSingleValue: cli.singleValue ?? fileConfig?.singleValue ?? false
})

export const documentOptions = (config: ResolvedConfig): DocumentOptions => ({
  blockBytes: config.blockBytes,
  requireSingleValue: config.requireSingleValue
})

export const printerOptions = (config: ResolvedConfig): PrinterOptions => ({ indent: config.indent })
