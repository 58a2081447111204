// Assertion helpers. A failed assertion means the data structure is corrupt.
export function assert(expr: boolean, msg?: string): asserts expr {
  if (!expr) {
    const err = Error(msg != null ? `Assertion failed: ${msg}` : 'Assertion failed')
    Error.captureStackTrace(err, assert)
    throw err
  }
}

export function assertEq<T>(a: unknown, b: T, msg?: string): asserts a is T {
  if (a !== b) {
    const err = Error(`Assertion failed: ${a} !== ${b} ${msg ?? ''}`)
    Error.captureStackTrace(err, assertEq)
    throw err
  }
}
