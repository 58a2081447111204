// A sparse vec stores the parts of a 64-bit address space which have actually been written.
//
// It's made of two structures which are kept in lockstep:
//
// - The range index maps each stored address range to a storage key
// - The block store maps each key to the range's element buffer
//
// Writes which overlap existing data replace it (last write wins), keeping whatever parts of
// the old blocks weren't overwritten. Writes which touch an existing block are merged into it,
// so two stored ranges are never adjacent. That means any address-contiguous query is always
// answered by a single block.

import { AddressOverflowError, BorrowError } from './errors.js'
import { blockAppend, blockCreate, resizeBlock, storeCreate, storeGet, storeInsert, storeRemove, storeRetain } from './block-store.js'
import type { BlockStore } from './block-store.js'
import { riClear, riCount, riCreate, riDbgCheck, riGetEntry, riIter, riOverlaps, riRemove, riSetRange } from './range-index.js'
import type { RangeIndex, IndexRun } from './range-index.js'
import { MAX_BOUND, subRange, toBufRange } from './types.js'
import type { Addr, AddrRange, ElementArray, ElementArrayCtor, StorageKey } from './types.js'
import { assert, assertEq } from './utils.js'

export interface SparseVecOptions {
  /**
   * Run the (expensive) consistency check at the end of every insert. Off by default. Turn
   * this on in tests.
   */
  checkInvariants?: boolean,
}

export interface SparseVecInner<A> {
  index: RangeIndex<StorageKey>,
  store: BlockStore<A>,

  /** Keys are handed out in order and never reused. */
  nextKey: StorageKey,
  ctor: ElementArrayCtor<A>,

  /** Number of mutable views currently handed out by svWithMut. */
  borrows: number,
  checkInvariants: boolean,
}

export function svCreate<A extends ElementArray<A>>(ctor: ElementArrayCtor<A>, opts: SparseVecOptions = {}): SparseVecInner<A> {
  return {
    index: riCreate(),
    store: storeCreate(),
    nextKey: 0,
    ctor,
    borrows: 0,
    checkInvariants: opts.checkInvariants ?? false,
  }
}

const allocKey = <A>(sv: SparseVecInner<A>): StorageKey => sv.nextKey++

/**
 * If [start, end) lands strictly inside a single block, split the block around it. Otherwise
 * clipping the index would leave the block's key on both sides of the new range.
 */
function splitContaining<A extends ElementArray<A>>(sv: SparseVecInner<A>, start: Addr, end: Addr) {
  const entry = riGetEntry(sv.index, start)
  if (entry == null) return
  const endEntry = riGetEntry(sv.index, end)
  if (endEntry == null || endEntry.val !== entry.val) return

  const key = entry.val
  const block = storeGet(sv.store, key)
  const [oldStart, oldEnd] = block.range

  if (end < oldEnd) {
    // The upper part gets copied out into its own block.
    const upperKey = allocKey(sv)
    const [from, to] = toBufRange(subRange([end, oldEnd], oldStart))
    riSetRange(sv.index, end, oldEnd, upperKey)
    storeInsert(sv.store, upperKey, blockCreate([end, oldEnd], block.data.slice(from, to)))
  }

  if (oldStart < start) {
    // And the lower part keeps the key.
    resizeBlock(sv.store, key, [oldStart, start])
    riSetRange(sv.index, oldStart, start, key)
  }
}

/** Merge the block for hi onto the end of the block for lo. Returns the merged run. */
function mergeAdjacent<A extends ElementArray<A>>(sv: SparseVecInner<A>, lo: IndexRun<StorageKey>, hi: IndexRun<StorageKey>): IndexRun<StorageKey> {
  assertEq(lo.end, hi.start)
  const loBlock = storeGet(sv.store, lo.val)
  const hiBlock = storeRemove(sv.store, hi.val)

  blockAppend(loBlock, sv.ctor, hi.end, hiBlock.data)

  riRemove(sv.index, [hi.start, hi.end])
  riSetRange(sv.index, lo.start, hi.end, lo.val)
  return { start: lo.start, end: hi.end, val: lo.val }
}

/**
 * Only the block at addr can have picked up new neighbours. Everything else was already
 * separated by a gap before this insert, and clipping only ever moves a block's edge up to the
 * new block.
 */
function mergeNeighbours<A extends ElementArray<A>>(sv: SparseVecInner<A>, addr: Addr) {
  let entry = riGetEntry(sv.index, addr)
  assert(entry != null)

  const next = riGetEntry(sv.index, entry.end)
  if (next != null) entry = mergeAdjacent(sv, entry, next)

  if (entry.start > 0n) {
    const prev = riGetEntry(sv.index, entry.start - 1n)
    if (prev != null && prev.end === entry.start) mergeAdjacent(sv, prev, entry)
  }
}

function collectGarbage<A>(sv: SparseVecInner<A>) {
  const used = new Set<StorageKey>()
  for (const run of riIter(sv.index)) used.add(run.val)
  storeRetain(sv.store, key => used.has(key))
}

/**
 * Write data into the address space starting at addr. The data is copied in.
 *
 * Anything already stored in the written range is replaced. Stored data on either side of the
 * write is kept, and merged with the new data if it touches.
 */
export function svInsert<A extends ElementArray<A>>(sv: SparseVecInner<A>, data: A, addr: Addr): void {
  if (sv.borrows > 0) throw new BorrowError('insert')
  if (data.length === 0) return

  const len = data.length
  if (addr < 0n || addr >= MAX_BOUND || addr + BigInt(len) > MAX_BOUND) {
    throw new AddressOverflowError(addr, len)
  }
  const start = addr
  const end = addr + BigInt(len)

  splitContaining(sv, start, end)

  // The index clips (or drops) anything else overlapping the new range.
  const key = allocKey(sv)
  riSetRange(sv.index, start, end, key)
  storeInsert(sv.store, key, blockCreate([start, end], data.slice()))

  // Clipping only changed the index. Bring the clipped blocks back in sync with it.
  for (const run of riIter(sv.index)) {
    resizeBlock(sv.store, run.val, [run.start, run.end])
  }

  mergeNeighbours(sv, start)
  collectGarbage(sv)

  if (sv.checkInvariants) svDbgCheck(sv)
}

/** Find the block covering the whole range, and return the range's elements in it. */
function lookup<A extends ElementArray<A>>(sv: SparseVecInner<A>, [start, end]: AddrRange): A | null {
  if (end < start) return null

  const entry = riGetEntry(sv.index, start)
  // Queries never span two blocks. If the blocks were contiguous, they'd have been merged.
  if (entry == null || end > entry.end) return null

  const [from, to] = toBufRange(subRange([start, end], entry.start))
  return storeGet(sv.store, entry.val).data.subarray(from, to)
}

/**
 * Get the stored elements for the specified range. This returns null unless the whole range
 * has been written.
 *
 * The returned array is a view into the container's storage. Don't write to it (use
 * svWithMut), and don't hold on to it across inserts.
 */
export function svGet<A extends ElementArray<A>>(sv: SparseVecInner<A>, range: AddrRange): A | null {
  return lookup(sv, range)
}

/**
 * Call fn with a writable view of the stored elements in range, and return what it returns.
 * If the range isn't fully stored, fn isn't called and this returns null.
 *
 * The container can't be modified while fn runs.
 */
export function svWithMut<A extends ElementArray<A>, R>(sv: SparseVecInner<A>, range: AddrRange, fn: (view: A) => R): R | null {
  const view = lookup(sv, range)
  if (view == null) return null

  sv.borrows++
  try {
    return fn(view)
  } finally {
    sv.borrows--
  }
}

export function svOverlaps<A>(sv: SparseVecInner<A>, range: AddrRange): boolean {
  return riOverlaps(sv.index, range)
}

/** Iterate through the stored ranges, in address order. */
export function* svRanges<A>(sv: SparseVecInner<A>): Generator<AddrRange, void, unknown> {
  for (const { start, end } of riIter(sv.index)) yield [start, end]
}

/** Iterate through the stored ranges along with (read-only) views of their data. */
export function* svBlocks<A>(sv: SparseVecInner<A>): Generator<[AddrRange, A], void, unknown> {
  for (const { start, end, val } of riIter(sv.index)) {
    yield [[start, end], storeGet(sv.store, val).data]
  }
}

/** Total number of elements stored. */
export function svStoredLen<A extends ElementArray<A>>(sv: SparseVecInner<A>): number {
  let len = 0
  for (const run of riIter(sv.index)) len += storeGet(sv.store, run.val).data.length
  return len
}

export const svBlockCount = <A>(sv: SparseVecInner<A>): number => riCount(sv.index)

export function svClear<A>(sv: SparseVecInner<A>) {
  if (sv.borrows > 0) throw new BorrowError('clear')
  riClear(sv.index)
  sv.store.clear()
}


// *** Debug checking

/**
 * Check the index and the block store agree with each other. This walks the whole structure,
 * so it's slow. Throws if anything is wrong.
 */
export function svDbgCheck<A extends ElementArray<A>>(sv: SparseVecInner<A>): void {
  riDbgCheck(sv.index)

  const seen = new Map<StorageKey, IndexRun<StorageKey>>()
  let prev: IndexRun<StorageKey> | null = null
  for (const run of riIter(sv.index)) {
    const { start, end, val: key } = run

    const block = sv.store.get(key)
    assert(block != null, `range ${start}..${end} has no block (key ${key})`)
    assertEq(block.range[0], start, `block start for key ${key}`)
    assertEq(block.range[1], end, `block end for key ${key}`)
    assertEq(BigInt(block.data.length), end - start, `buffer length for key ${key}`)
    assert(block.offset + block.data.length <= block.buf.length, `block for key ${key} runs past its buffer`)

    const other = seen.get(key)
    assert(other == null, `${start}..${end} and ${other?.start}..${other?.end} use key ${key}`)
    seen.set(key, run)
    assert(key < sv.nextKey, `key ${key} was never allocated`)

    assert(prev == null || prev.end !== start, `ranges ${prev?.start}..${prev?.end} and ${start}..${end} should have been merged`)
    prev = run
  }

  for (const key of sv.store.keys()) {
    assert(seen.has(key), `block for key ${key} is not in the index`)
  }
}


export class SparseVec<A extends ElementArray<A>> {
  inner: SparseVecInner<A>

  constructor(ctor: ElementArrayCtor<A>, opts?: SparseVecOptions) {
    this.inner = svCreate(ctor, opts)
  }

  insert(data: A, addr: Addr) {
    svInsert(this.inner, data, addr)
  }

  get(range: AddrRange): A | null {
    return svGet(this.inner, range)
  }

  withMut<R>(range: AddrRange, fn: (view: A) => R): R | null {
    return svWithMut(this.inner, range, fn)
  }

  overlaps(range: AddrRange): boolean {
    return svOverlaps(this.inner, range)
  }

  ranges() {
    return svRanges(this.inner)
  }

  blocks() {
    return svBlocks(this.inner)
  }

  storedLen(): number {
    return svStoredLen(this.inner)
  }

  blockCount(): number {
    return svBlockCount(this.inner)
  }

  clear() {
    svClear(this.inner)
  }

  dbgCheck() {
    svDbgCheck(this.inner)
  }
}
