// CHANGE: append-only sequence with fixed inline storage that spills past a threshold
// FORMAT THEOREM: ∀n: after n pushes on an empty buffer, size() = n ∧ at(i) is the (i+1)-th pushed value
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: spilled storage grows to 2 × requested capacity; clear() returns to the inline store
// COMPLEXITY: O(1) amortized push, O(1) indexed access

export interface InlineBuffer<T> {
  readonly push: (value: T) => void
  readonly at: (index: number) => T | undefined
  readonly size: () => number
  readonly clear: () => void
}

/**
 * Create an InlineBuffer whose first `inlineCapacity` entries live in a preallocated store.
 *
 * @param inlineCapacity - Entries served before the first spill; at least 1.
 *
 * @pure false
 * @invariant storage is replaced, never resized in place, so indices stay valid across growth
 * @complexity O(inlineCapacity)
 */
export const makeInlineBuffer = <T>(inlineCapacity: number): InlineBuffer<T> => {
  const initial = Math.max(1, Math.floor(inlineCapacity))
  const inline: Array<T | undefined> = new Array<T | undefined>(initial).fill(undefined)
  let memory = inline
  let allocated = initial
  let count = 0

  const ensureCapacity = (required: number): void => {
    if (required <= allocated) {
      return
    }
    const nextAllocated = required * 2
    const next: Array<T | undefined> = new Array<T | undefined>(nextAllocated).fill(undefined)
    for (let index = 0; index < count; index++) {
      next[index] = memory[index]
    }
    memory = next
    allocated = nextAllocated
  }

  return {
    push: (value) => {
      ensureCapacity(count + 1)
      memory[count] = value
      count++
    },
    at: (index) => (index >= 0 && index < count ? memory[index] : undefined),
    size: () => count,
    clear: () => {
      inline.fill(undefined)
      memory = inline
      allocated = initial
      count = 0
    }
  }
}
