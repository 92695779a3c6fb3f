import { PoolDefect } from "./errors.js"
import type { InlineBuffer } from "./inline-buffer.js"
import { makeInlineBuffer } from "./inline-buffer.js"

// CHANGE: fixed-size block pool with an intrusive free list and generation-checked slots
// FORMAT THEOREM: ∀s = alloc(): get(s) is defined after store(s, v) until free(s); free(s) twice → PoolDefect
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: slots never move; blocks are only added until release()
// COMPLEXITY: O(1) amortized alloc/free/get, O(slotsPerBlock) per block growth

export const DEFAULT_BLOCK_BYTES = 1024

const BLOCK_REGISTRY_INLINE = 10
const NO_SLOT = -1

export interface PoolSlot {
  readonly pool: symbol
  readonly index: number
  readonly generation: number
}

export interface PoolStats {
  readonly name: string
  readonly itemBytes: number
  readonly slotsPerBlock: number
  readonly blocks: number
  readonly outstanding: number
  readonly lifetimeAllocs: number
  readonly highWater: number
  /** Live slots that were never marked as linked into a tree. */
  readonly untracked: number
}

export interface FixedBlockPool<T> {
  readonly name: string
  readonly itemBytes: number
  readonly slotsPerBlock: number
  readonly alloc: () => PoolSlot
  readonly store: (slot: PoolSlot, value: T) => void
  readonly get: (slot: PoolSlot) => T | undefined
  readonly free: (slot: PoolSlot) => void
  readonly markTracked: (slot: PoolSlot) => void
  readonly stats: () => PoolStats
  readonly release: () => void
}

export interface PoolSettings {
  readonly name: string
  readonly itemBytes: number
  readonly blockBytes?: number
}

interface Block<T> {
  readonly values: Array<T | undefined>
  readonly generations: Uint32Array
  readonly live: Uint8Array
  readonly tracked: Uint8Array
  readonly next: Int32Array
}

interface SlotLocation<T> {
  readonly block: Block<T>
  readonly offset: number
}

export const slotsPerBlockFor = (itemBytes: number, blockBytes: number): number =>
  Math.max(1, Math.floor(blockBytes / Math.max(1, itemBytes)))

/**
 * Create a pool serving one fixed item size.
 *
 * @param settings - Pool name (diagnostics), nominal item size and block byte budget.
 * @returns A pool whose slots stay valid until freed or until release().
 *
 * @pure false
 * @invariant outstanding = lifetimeAllocs - frees; highWater = max(outstanding)
 * @complexity O(1)
 */
export const makeFixedBlockPool = <T>(settings: PoolSettings): FixedBlockPool<T> => {
  const { itemBytes, name } = settings
  const slotsPerBlock = slotsPerBlockFor(itemBytes, settings.blockBytes ?? DEFAULT_BLOCK_BYTES)
  const blocks: InlineBuffer<Block<T>> = makeInlineBuffer<Block<T>>(BLOCK_REGISTRY_INLINE)
  let token = Symbol(name)
  let freeHead = NO_SLOT
  let outstanding = 0
  let lifetimeAllocs = 0
  let highWater = 0
  let untracked = 0

  const defect = (message: string): PoolDefect => new PoolDefect({ pool: name, message })

  const grow = (): void => {
    const base = blocks.size() * slotsPerBlock
    const block: Block<T> = {
      values: new Array<T | undefined>(slotsPerBlock).fill(undefined),
      generations: new Uint32Array(slotsPerBlock),
      live: new Uint8Array(slotsPerBlock),
      tracked: new Uint8Array(slotsPerBlock),
      next: new Int32Array(slotsPerBlock)
    }
    for (let offset = 0; offset < slotsPerBlock - 1; offset++) {
      block.next[offset] = base + offset + 1
    }
    block.next[slotsPerBlock - 1] = NO_SLOT
    blocks.push(block)
    freeHead = base
  }

  const locate = (index: number): SlotLocation<T> | undefined => {
    const block = blocks.at(Math.floor(index / slotsPerBlock))
    return block === undefined ? undefined : { block, offset: index % slotsPerBlock }
  }

  const findLive = (slot: PoolSlot): SlotLocation<T> | undefined => {
    if (slot.pool !== token) {
      return undefined
    }
    const location = locate(slot.index)
    if (
      location === undefined ||
      location.block.live[location.offset] !== 1 ||
      location.block.generations[location.offset] !== slot.generation
    ) {
      return undefined
    }
    return location
  }

  const checkLive = (slot: PoolSlot): SlotLocation<T> => {
    if (slot.pool !== token) {
      throw defect(`slot ${slot.index} does not belong to pool ${name}`)
    }
    const location = findLive(slot)
    if (location === undefined) {
      throw defect(`slot ${slot.index} of pool ${name} is not allocated`)
    }
    return location
  }

  const alloc = (): PoolSlot => {
    if (freeHead === NO_SLOT) {
      grow()
    }
    const index = freeHead
    const location = locate(index)
    if (location === undefined) {
      throw defect(`free list of pool ${name} points outside its blocks`)
    }
    const { block, offset } = location
    freeHead = block.next[offset] ?? NO_SLOT
    block.live[offset] = 1
    block.tracked[offset] = 0
    outstanding++
    lifetimeAllocs++
    untracked++
    if (outstanding > highWater) {
      highWater = outstanding
    }
    return { pool: token, index, generation: block.generations[offset] ?? 0 }
  }

  const store = (slot: PoolSlot, value: T): void => {
    const { block, offset } = checkLive(slot)
    block.values[offset] = value
  }

  const get = (slot: PoolSlot): T | undefined => {
    const location = findLive(slot)
    return location === undefined ? undefined : location.block.values[location.offset]
  }

  const free = (slot: PoolSlot): void => {
    const { block, offset } = checkLive(slot)
    if (block.tracked[offset] === 0) {
      untracked--
    }
    block.values[offset] = undefined
    block.live[offset] = 0
    block.generations[offset] = (slot.generation + 1) >>> 0
    block.next[offset] = freeHead
    freeHead = slot.index
    outstanding--
  }

  const release = (): void => {
    blocks.clear()
    freeHead = NO_SLOT
    outstanding = 0
    untracked = 0
    token = Symbol(name)
  }

  return {
    name,
    itemBytes,
    slotsPerBlock,
    alloc,
    store,
    get,
    free,
    markTracked: (slot) => {
      const { block, offset } = checkLive(slot)
      if (block.tracked[offset] === 0) {
        block.tracked[offset] = 1
        untracked--
      }
    },
    stats: () => ({
      name,
      itemBytes,
      slotsPerBlock,
      blocks: blocks.size(),
      outstanding,
      lifetimeAllocs,
      highWater,
      untracked
    }),
    release
  }
}
