import { test, describe } from 'node:test'
import { fuzzer, u64Kind, u8Kind } from '../src/fuzzer.js'

describe('sparse vec fuzzer', () => {
  test('u8 elements', () => {
    for (let seed = 0; seed < 20; seed++) fuzzer(u8Kind, seed)
  })

  test('u64 elements', () => {
    for (let seed = 0; seed < 10; seed++) fuzzer(u64Kind, seed, { steps: 100 })
  })

  // Lots of small writes packed close together, so nearly every insert overlaps or touches
  // something.
  test('dense writes', () => {
    for (let seed = 0; seed < 20; seed++) fuzzer(u8Kind, seed, { addrSpace: 60, maxLen: 12 })
  })
})
