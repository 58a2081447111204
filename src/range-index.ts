// A map from half-open address ranges to values.
//
// Runs are kept in a flat list sorted by start address, and looked up by binary search. Runs
// never overlap. Addresses which have never been set have no run at all (there is no default
// value filling the gaps).
//
// Setting a range clips whatever was there before. Note the index never merges runs: two
// touching runs with the same value stay separate, and a run which strictly contains a newly
// set range is split into two runs which share the old value. Callers who care about
// uniqueness of values (like the sparse vec) need to deal with that themselves.

import bs from 'binary-search'
import type { Addr, AddrRange } from './types.js'
import { assert } from './utils.js'

export interface IndexRun<V> {
  start: Addr,
  end: Addr,
  val: V,
}

export interface RangeIndex<V> {
  runs: IndexRun<V>[],

  [Symbol.iterator](): Iterator<IndexRun<V>>
}

export function riCreate<V>(): RangeIndex<V> {
  return {
    runs: [],
    [Symbol.iterator]() { return riIter(this) }
  }
}

/**
 * Find the index of the run containing addr. If no run contains addr, this returns the 2s
 * complement of the index the run would be inserted at (same as binary-search).
 */
function findRun<V>(index: RangeIndex<V>, addr: Addr): number {
  return bs(index.runs, addr, (run, needle) => (
    needle < run.start ? 1
      : needle >= run.end ? -1
      : 0 // Needle is actually within the run.
  ))
}

/** Index of the first run which ends after addr. */
function firstRunEndingAfter<V>(index: RangeIndex<V>, addr: Addr): number {
  const idx = findRun(index, addr)
  return idx < 0 ? -idx - 1 : idx
}

/** Get the run which contains the specified address, if any. */
export function riGetEntry<V>(index: RangeIndex<V>, addr: Addr): IndexRun<V> | null {
  const idx = findRun(index, addr)
  return idx < 0 ? null : index.runs[idx]
}

export function riOverlaps<V>(index: RangeIndex<V>, [start, end]: AddrRange): boolean {
  if (start >= end) return false
  const idx = firstRunEndingAfter(index, start)
  return idx < index.runs.length && index.runs[idx].start < end
}

/**
 * Replace everything in [start, end) with the specified runs. Runs partially covered by the
 * range are truncated. Existing run objects are never modified, since callers may hold on to
 * them.
 */
function replaceRange<V>(index: RangeIndex<V>, start: Addr, end: Addr, middle: IndexRun<V>[]) {
  const runs = index.runs
  const lo = firstRunEndingAfter(index, start)
  let hi = lo
  while (hi < runs.length && runs[hi].start < end) hi++

  if (lo === hi) {
    // Nothing overlaps. Just splice the new content in.
    runs.splice(lo, 0, ...middle)
    return
  }

  const first = runs[lo]
  const last = runs[hi - 1]
  const replacement: IndexRun<V>[] = []
  if (first.start < start) replacement.push({ start: first.start, end: start, val: first.val })
  replacement.push(...middle)
  if (last.end > end) replacement.push({ start: end, end: last.end, val: last.val })

  runs.splice(lo, hi - lo, ...replacement)
}

export function riSetRange<V>(index: RangeIndex<V>, start: Addr, end: Addr, val: V): void {
  if (start >= end) return
  replaceRange(index, start, end, [{ start, end, val }])
}

export function riRemove<V>(index: RangeIndex<V>, [start, end]: AddrRange): void {
  if (start >= end) return
  replaceRange(index, start, end, [])
}

export function riClear<V>(index: RangeIndex<V>) {
  index.runs.length = 0
}

export function riCount<V>(index: RangeIndex<V>): number {
  return index.runs.length
}

export function* riIter<V>(index: RangeIndex<V>): Generator<IndexRun<V>, void, unknown> {
  // Modifying the index while iterating is not supported.
  for (const run of index.runs) yield run
}


// *** Debug checking

export function riDbgCheck<V>(index: RangeIndex<V>): void {
  let prevEnd: Addr | null = null
  for (const { start, end } of index.runs) {
    assert(start >= 0n, `run starts at negative address ${start}`)
    assert(start < end, `empty run ${start}..${end}`)
    assert(prevEnd == null || prevEnd <= start, `run ${start}..${end} overlaps previous run ending at ${prevEnd}`)
    prevEnd = end
  }
}
