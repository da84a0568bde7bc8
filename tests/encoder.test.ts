/**
 * Tests for the encoder: permutation and coverage, hint detection, code
 * building, prepare/build/restore.
 */

import { describe, it, expect } from 'vitest'
import { createHmac } from 'node:crypto'
import {
  MIN_RING_NODES,
  ringDigits,
  computePermutation,
  hintsDetection,
  codeBuilder,
  prepare,
  build,
  restore,
} from '../src/watermark/encoder.ts'
import { decodeWatermark } from '../src/watermark/graph.ts'
import { TEST_ETA, TEST_KEY, TEST_ZETA, range } from './helpers/fixtures.ts'

describe('ringDigits', () => {
  it('pads short codes to the minimum ring size', () => {
    expect(ringDigits(7n)).toEqual({ ok: true, value: [0, 0, 0, 1, 1] })
    expect(ringDigits(0n)).toEqual({ ok: true, value: [0, 0, 0, 0, 0] })
  })

  it('leaves long codes unpadded', () => {
    expect(ringDigits(424242n)).toEqual({ ok: true, value: [1, 3, 0, 3, 2, 0, 3, 0] })
  })

  it('never yields fewer than MIN_RING_NODES digits', () => {
    expect(MIN_RING_NODES).toBe(5)
  })
})

describe('computePermutation', () => {
  it('returns a permutation over all pairs', () => {
    const result = computePermutation(1024, TEST_KEY, TEST_ETA)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value).toHaveLength(512)
    expect(new Set(result.value).size).toBe(512)
  })

  it('fails with fewer than two parameters', () => {
    const result = computePermutation(1, TEST_KEY, 1)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('config')
    expect(result.error.message).toBe('need at least one pair (2 parameters)')
  })

  it('fails when there are fewer pairs than eta', () => {
    const result = computePermutation(10, TEST_KEY, 6)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('coverage')
    expect(result.error.message).toBe('not enough pairs for eta=6: need at least 6 pairs, got 5')
  })

  it('fails for eta <= 0', () => {
    const result = computePermutation(10, TEST_KEY, 0)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('config')
  })

  it('fails coverage when pairs barely match eta, and fails the same way every time', () => {
    // 20 pairs hashed onto 20 positions almost never hit all of them
    const first = computePermutation(40, TEST_KEY, 20)
    expect(first.ok).toBe(false)
    if (first.ok) return
    expect(first.error.kind).toBe('coverage')
    expect(first.error.message).toMatch(/^insufficient coverage: only \d+\/20 bit positions/)

    for (let i = 0; i < 3; i++) {
      expect(computePermutation(40, TEST_KEY, 20)).toEqual(first)
    }
  })

  it('ignores an odd trailing parameter', () => {
    expect(computePermutation(1025, TEST_KEY, TEST_ETA)).toEqual(computePermutation(1024, TEST_KEY, TEST_ETA))
  })
})

describe('hintsDetection', () => {
  it('reads the non-negative parity of each pair difference', () => {
    expect(hintsDetection([5n, 2n, -3n, 4n, 4n, 2n], [2, 0, 1])).toEqual([1, 1, 0])
  })
})

describe('codeBuilder', () => {
  // eta = 1 routes every pair to bit position 0
  const perm = [0, 1, 2]

  it('yields 1 when every vote is one', () => {
    expect(codeBuilder([1, 1, 1], 1, TEST_KEY, perm)).toEqual({ ok: true, value: [1] })
  })

  it('yields 0 when every vote is zero', () => {
    expect(codeBuilder([0, 0, 0], 1, TEST_KEY, perm)).toEqual({ ok: true, value: [0] })
  })

  it('breaks any disagreement with the keyed bit over the vote counts', () => {
    const r = createHmac('sha256', TEST_KEY).update('KBit|v1|chaos|j=0|o=2|z=1').digest().readBigUInt64BE(0)
    const expected = r % 2n === 1n ? 1 : 0
    expect(codeBuilder([1, 1, 0], 1, TEST_KEY, perm)).toEqual({ ok: true, value: [expected] })
  })
})

describe('prepare', () => {
  it('returns a watermarked copy of the same length', () => {
    const params = range(1, 1024)
    const result = prepare(params, TEST_KEY, TEST_ZETA, TEST_ETA)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.watermarkedParams).toHaveLength(1024)
    expect(result.value.watermarkedParams).not.toEqual(params)
    expect(result.value.eta).toBe(TEST_ETA)
    expect(params).toEqual(range(1, 1024))
  })

  it('uses the same permutation as the verification side', () => {
    const result = prepare(range(1, 1024), TEST_KEY, TEST_ZETA, TEST_ETA)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(computePermutation(1024, TEST_KEY, TEST_ETA)).toEqual({ ok: true, value: result.value.permutation })
  })

  it('rejects a negative code', () => {
    const result = prepare(range(1, 1024), TEST_KEY, -1n, TEST_ETA)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toBe('zeta must be non-negative')
  })

  it('rejects a code that does not fit in eta bits', () => {
    const result = prepare(range(1, 1024), TEST_KEY, 1n << 20n, TEST_ETA)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('config')
    expect(result.error.message).toBe('code needs 21 bits but eta is 20')
  })

  it('leaves an odd trailing parameter untouched', () => {
    const params = [...range(1, 1024), 99n]
    const result = prepare(params, TEST_KEY, TEST_ZETA, TEST_ETA)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.watermarkedParams[1024]).toBe(99n)
  })
})

describe('build and restore', () => {
  it('rebuilds a graph that decodes to the embedded code', () => {
    const prepared = prepare(range(1, 1024), TEST_KEY, TEST_ZETA, TEST_ETA)
    expect(prepared.ok).toBe(true)
    if (!prepared.ok) return

    const built = build(prepared.value.watermarkedParams, TEST_KEY, TEST_ETA)
    expect(built.ok).toBe(true)
    if (!built.ok) return
    expect(built.value.permutation).toEqual(prepared.value.permutation)
    expect(built.value.graph.nodes).toHaveLength(8)
    expect(decodeWatermark(built.value.graph, 8)).toEqual({ ok: true, value: [1, 3, 0, 3, 2, 0, 3, 0] })
  })

  it('pads the ring for small codes', () => {
    const prepared = prepare(range(1, 1024), TEST_KEY, 7n, TEST_ETA)
    expect(prepared.ok).toBe(true)
    if (!prepared.ok) return

    const built = build(prepared.value.watermarkedParams, TEST_KEY, TEST_ETA)
    expect(built.ok).toBe(true)
    if (!built.ok) return
    expect(decodeWatermark(built.value.graph, 5)).toEqual({ ok: true, value: [0, 0, 0, 1, 1] })
  })

  it('fails build with the same coverage error as prepare', () => {
    const built = build(range(1, 10), TEST_KEY, TEST_ETA)
    expect(built.ok).toBe(false)
    if (built.ok) return
    expect(built.error.kind).toBe('coverage')
  })

  it('restores the exact original values', () => {
    const original = range(1, 1024)
    const prepared = prepare(original, TEST_KEY, TEST_ZETA, TEST_ETA)
    expect(prepared.ok).toBe(true)
    if (!prepared.ok) return
    expect(restore(prepared.value.watermarkedParams, prepared.value.permutation)).toEqual(original)
  })

  it('restores negative and large values', () => {
    const original = Array.from({ length: 64 }, (_, i) =>
      i % 3 === 0 ? -(1n << 70n) + BigInt(i) : BigInt(i * i) - 500n,
    )
    const prepared = prepare(original, TEST_KEY, 5n, 3)
    expect(prepared.ok).toBe(true)
    if (!prepared.ok) return
    expect(restore(prepared.value.watermarkedParams, prepared.value.permutation)).toEqual(original)
  })
})
