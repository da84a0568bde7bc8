/**
 * Shared test fixtures.
 */

export const TEST_KEY = 'unit-test-key'
export const TEST_ZETA = 424242n
export const TEST_ETA = 20

/** [from, from+1, ..., to] as bigint. */
export function range(from: number, to: number): bigint[] {
  return Array.from({ length: to - from + 1 }, (_, i) => BigInt(from + i))
}

/** Increments every even index below `limit`, flipping the parity of those pairs. */
export function tamperEvenIndices(params: readonly bigint[], limit = 100): bigint[] {
  const out = [...params]
  for (let i = 0; i < limit; i += 2) {
    out[i] = (out[i] ?? 0n) + 1n
  }
  return out
}
