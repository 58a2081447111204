export * from './sparse-vec.js'
export * from './range-index.js'
export * from './errors.js'
export { MAX_BOUND, rangeLen } from './types.js'
export type { Addr, AddrRange, StorageKey, ElementArray, ElementArrayCtor } from './types.js'
