/** An address in the 64-bit address space. */
export type Addr = bigint

/** Address range. Range is [start, end). */
export type AddrRange = [start: Addr, end: Addr]

/** Opaque key linking a range index entry to its block. Never reused. */
export type StorageKey = number

/**
 * Exclusive upper bound of the address space. A range may end here, but no address is ever
 * equal to it.
 */
export const MAX_BOUND: Addr = 1n << 64n

/**
 * The subset of the typed array interface the container needs. Uint8Array, Float64Array,
 * BigUint64Array and friends all fit.
 */
export interface ElementArray<Self> {
  readonly length: number
  subarray(begin?: number, end?: number): Self
  slice(start?: number, end?: number): Self
  set(array: Self, offset?: number): void
}

export type ElementArrayCtor<A> = new (length: number) => A

export const rangeLen = ([start, end]: AddrRange): Addr => end - start

/** Shift the range down by offset. */
export const subRange = ([start, end]: AddrRange, offset: Addr): AddrRange => [start - offset, end - offset]

/** Convert a range relative to a block's start into buffer offsets. */
export const toBufRange = ([start, end]: AddrRange): [start: number, end: number] => [Number(start), Number(end)]
