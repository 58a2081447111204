import assert from 'node:assert/strict'
import seedRandom from 'seed-random'
import consoleLib from 'console'
import { SparseVec } from './sparse-vec.js'
import type { Addr, ElementArray, ElementArrayCtor } from './types.js'

/**
 * Describes how the fuzzer makes elements of a particular type. The model stores elements as
 * whatever the typed array hands back when indexed.
 */
export interface ElementKind<A, E> {
  ctor: ElementArrayCtor<A>,
  /** Make the i-th element of a write tagged with n. */
  make(i: number, n: number): E,
  at(arr: A, i: number): E,
  put(arr: A, i: number, val: E): void,
}

export const u8Kind: ElementKind<Uint8Array, number> = {
  ctor: Uint8Array,
  make: (i, n) => (i * n) & 0xff,
  at: (arr, i) => arr[i],
  put: (arr, i, val) => { arr[i] = val },
}

export const u64Kind: ElementKind<BigUint64Array, bigint> = {
  ctor: BigUint64Array,
  make: (i, n) => BigInt.asUintN(64, BigInt(i) * BigInt(n) * 0x9e3779b97f4a7c15n),
  at: (arr, i) => arr[i],
  put: (arr, i, val) => { arr[i] = val },
}

export interface FuzzOpts {
  /** Number of inserts per run. */
  steps?: number,
  /** Writes land somewhere in [0, addrSpace). */
  addrSpace?: number,
  maxLen?: number,
  verbose?: boolean,
}

/**
 * Check the container holds exactly what the model says it should. Stored ranges must also
 * never touch.
 */
function checkAgainstModel<A extends ElementArray<A>, E>(kind: ElementKind<A, E>, sv: SparseVec<A>, model: Map<Addr, E>) {
  sv.dbgCheck()

  let covered = 0
  let prevEnd: Addr | null = null
  for (const [[start, end], data] of sv.blocks()) {
    assert.notEqual(prevEnd, start)
    prevEnd = end

    assert.equal(BigInt(data.length), end - start)
    for (let i = 0; i < data.length; i++) {
      assert.equal(kind.at(data, i), model.get(start + BigInt(i)))
    }
    covered += data.length
  }
  assert.equal(covered, model.size)
  assert.equal(sv.storedLen(), model.size)
}

export function fuzzer<A extends ElementArray<A>, E>(kind: ElementKind<A, E>, seed: number, opts: FuzzOpts = {}) {
  const { steps = 200, addrSpace = 1000, maxLen = 100, verbose = false } = opts

  const random = seedRandom(`sv ${seed}`)
  const randInt = (n: number) => Math.floor(random() * n)

  const sv = new SparseVec(kind.ctor, { checkInvariants: true })
  const model = new Map<Addr, E>()

  for (let i = 0; i < steps; i++) {
    const n = randInt(255)
    const len = randInt(maxLen)
    const addr = BigInt(randInt(addrSpace))
    if (verbose) console.log('insert', { i, n, len, addr })

    const data = new kind.ctor(len)
    for (let j = 0; j < len; j++) kind.put(data, j, kind.make(j, n))

    sv.insert(data, addr)
    for (let j = 0; j < len; j++) model.set(addr + BigInt(j), kind.make(j, n))

    if (len > 0) {
      const view = sv.get([addr, addr + BigInt(len)])
      assert(view != null)
      assert.deepEqual(view, data)
    }

    checkAgainstModel(kind, sv, model)
  }
}

export function fuzzLots<A extends ElementArray<A>, E>(kind: ElementKind<A, E>, count: number, opts?: FuzzOpts) {
  globalThis.console = new consoleLib.Console({
    stdout: process.stdout, stderr: process.stderr,
    inspectOptions: {depth: null}
  })

  for (let i = 0; i < count; i++) {
    if (i % 100 === 0) console.log('i', i)
    try {
      fuzzer(kind, i, opts)
    } catch (e) {
      console.log('in seed', i)
      throw e
    }
  }
}
