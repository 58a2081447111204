// Long-running fuzzer. This isn't part of the test suite. Run it with:
// $ npm run fuzz

import { fuzzLots, u64Kind, u8Kind } from '../src/fuzzer.js'

const count = Number(process.argv[2] ?? 100000)
fuzzLots(u8Kind, count)
fuzzLots(u64Kind, count)
