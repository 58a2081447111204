import type { Addr } from './types.js'

/** Thrown when a write would not fit inside the 64-bit address space. */
export class AddressOverflowError extends Error {
  readonly code = 'AddressOverflow'

  constructor(readonly addr: Addr, readonly len: number) {
    super(`Write of ${len} elements at address ${addr} does not fit in the 64-bit address space`)
    this.name = 'AddressOverflowError'
  }
}

/** Thrown when the container is modified while a mutable view into it is outstanding. */
export class BorrowError extends Error {
  readonly code = 'Borrowed'

  constructor(op: string) {
    super(`Cannot ${op} while a mutable view is outstanding`)
    this.name = 'BorrowError'
  }
}
