import type { Addr, AddrRange, ElementArray, ElementArrayCtor, StorageKey } from './types.js'
import { rangeLen, subRange, toBufRange } from './types.js'
import { assert, assertEq } from './utils.js'

/**
 * A block owns the elements for one stored range. data[i] holds the element at address
 * range[0] + i.
 *
 * data is a view of buf starting at offset. buf may have spare room past the end of data, so
 * appending to a block doesn't always need a copy of what's already there.
 */
export interface Block<A> {
  range: AddrRange,
  data: A,

  buf: A,
  offset: number,
}

export type BlockStore<A> = Map<StorageKey, Block<A>>

/** Make a block which owns data outright. */
export const blockCreate = <A>(range: AddrRange, data: A): Block<A> => ({ range, data, buf: data, offset: 0 })

/**
 * Append elements onto the end of the block. If the block's buffer has no room left, it is
 * reallocated with double the needed capacity.
 */
export function blockAppend<A extends ElementArray<A>>(block: Block<A>, ctor: ElementArrayCtor<A>, end: Addr, other: A) {
  const len = block.data.length
  const newLen = len + other.length
  assertEq(BigInt(newLen), end - block.range[0])

  if (block.offset + newLen > block.buf.length) {
    const buf = new ctor(newLen * 2)
    buf.set(block.data, 0)
    block.buf = buf
    block.offset = 0
  }

  block.buf.set(other, block.offset + len)
  block.data = block.buf.subarray(block.offset, block.offset + newLen)
  block.range = [block.range[0], end]
}

export const storeCreate = <A>(): BlockStore<A> => new Map()

/** Get the block with the specified key. The block must exist. */
export function storeGet<A>(store: BlockStore<A>, key: StorageKey): Block<A> {
  const block = store.get(key)
  assert(block != null, `missing block for key ${key}`)
  return block
}

export function storeInsert<A>(store: BlockStore<A>, key: StorageKey, block: Block<A>) {
  assert(!store.has(key), `key ${key} is already in use`)
  store.set(key, block)
}

/** Remove and return the block with the specified key. The block must exist. */
export function storeRemove<A>(store: BlockStore<A>, key: StorageKey): Block<A> {
  const block = storeGet(store, key)
  store.delete(key)
  return block
}

/** Remove every block for which pred returns false. */
export function storeRetain<A>(store: BlockStore<A>, pred: (key: StorageKey, block: Block<A>) => boolean) {
  for (const [key, block] of store) {
    // Deleting the current entry while iterating a Map is fine.
    if (!pred(key, block)) store.delete(key)
  }
}

/**
 * Shrink the block to the specified range, which must be a subset of the block's current
 * range. Blocks are never grown here.
 */
export function resizeBlock<A extends ElementArray<A>>(store: BlockStore<A>, key: StorageKey, range: AddrRange) {
  const block = storeGet(store, key)
  const [oldStart, oldEnd] = block.range
  if (oldStart === range[0] && oldEnd === range[1]) return

  assert(range[0] >= oldStart && range[1] <= oldEnd, `cannot grow block ${oldStart}..${oldEnd} to ${range[0]}..${range[1]}`)

  // The surviving elements stay where they are in the buffer. Only the view moves.
  const [from, to] = toBufRange(subRange(range, oldStart))
  block.offset += from
  block.data = block.buf.subarray(block.offset, block.offset + (to - from))
  block.range = [range[0], range[1]]
  assert(BigInt(block.data.length) === rangeLen(range))
}
