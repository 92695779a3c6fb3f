import type { PoolStats } from "./pool.js"

// CHANGE: leak check over pool statistics after a tree has been torn down
// FORMAT THEOREM: ∀p ∈ result: p.outstanding ≠ p.untracked
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: result is sorted and unique
// COMPLEXITY: O(n log n)

const sortStrings = (values: ReadonlyArray<string>): ReadonlyArray<string> =>
  [...new Set(values)].toSorted((left, right) => left.localeCompare(right))

/**
 * List pools still holding nodes that were linked into a tree.
 *
 * Only meaningful once the tree is gone (after a failed parse, deleteChildren or destroy):
 * at that point every live slot must be one that was allocated and never attached.
 *
 * @param stats - Per-pool statistics, as returned by document.poolStats().
 * @returns Names of the unbalanced pools, sorted.
 *
 * @pure true
 * @invariant result ⊆ names(stats)
 * @complexity O(n log n)
 */
export const checkPoolBalance = (stats: ReadonlyArray<PoolStats>): ReadonlyArray<string> =>
  sortStrings(stats.filter((pool) => pool.outstanding !== pool.untracked).map((pool) => pool.name))
