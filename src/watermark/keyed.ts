/**
 * Keyed pseudorandom primitives.
 *
 * Every draw is HMAC-SHA256(key, label) truncated to its first 8 bytes, read
 * as an unsigned big-endian 64-bit integer. Counters are passed through labels
 * explicitly so the embedding and verification sides derive the same values
 * from the shared key alone.
 *
 * Reductions into [0, m) use rejection sampling: draws at or above the largest
 * multiple of m below 2^64 are discarded, so r mod m is unbiased. The threshold
 * is always at least 2^63, so each draw is rejected with probability < 1/2.
 */

import { createHmac } from 'node:crypto'
import { configError, ok } from '../types.ts'
import type { Bit, KeyMaterial, Result, WatermarkError } from '../types.ts'

const TWO_POW_64 = 1n << 64n

export const SEED_LABEL = 'PRNG|v1'
export const PERMUTATION_CONTEXT = 'KPerm|v1'
export const INDEX_LABEL = 'KInd|v1'

/** First 8 bytes of HMAC-SHA256(key, message) as an unsigned big-endian value. */
export function hmacUint64(key: KeyMaterial, message: string): bigint {
  return createHmac('sha256', key).update(message, 'utf8').digest().readBigUInt64BE(0)
}

/** Largest multiple of m that fits below 2^64; draws at or above it are rejected. */
function acceptanceLimit(m: number): bigint {
  const mb = BigInt(m)
  return TWO_POW_64 - (TWO_POW_64 % mb)
}

/** Seed material for {@link keyedPermutation}. */
export function deriveSeed(key: KeyMaterial): Buffer {
  return createHmac('sha256', key).update(SEED_LABEL, 'utf8').digest()
}

/**
 * Deterministic Fisher–Yates shuffle of [0..n).
 *
 * Step i draws j ∈ [0, i] and swaps positions i and j. The draw counter runs
 * across the whole shuffle, not per step, and is part of every label.
 */
export function keyedPermutation(
  seed: KeyMaterial,
  n: number,
  ctx: string = PERMUTATION_CONTEXT,
): Result<number[], WatermarkError> {
  if (!Number.isInteger(n) || n < 0) {
    return configError(`n must be a non-negative integer, got: ${n}`)
  }
  const perm = Array.from({ length: n }, (_, i) => i)
  let c = 0
  for (let i = 0; i < n - 1; i++) {
    const m = i + 1
    const limit = acceptanceLimit(m)
    for (;;) {
      const r = hmacUint64(seed, `perm|${ctx}|i=${i}|c=${c}`)
      c++
      if (r < limit) {
        const j = Number(r % BigInt(m))
        const a = perm[i] ?? i
        perm[i] = perm[j] ?? j
        perm[j] = a
        break
      }
    }
  }
  return ok(perm)
}

/**
 * Maps pair index `p` to a bit position in [0, eta).
 * The counter is local to the call and separated by U+2014 in the label.
 */
export function keyedIndex(
  p: number,
  eta: number,
  key: KeyMaterial,
  label: string = INDEX_LABEL,
): Result<number, WatermarkError> {
  if (!Number.isInteger(eta) || eta <= 0) {
    return configError(`eta must be a positive integer, got: ${eta}`)
  }
  const limit = acceptanceLimit(eta)
  for (let c = 0; ; c++) {
    const r = hmacUint64(key, `${label}\u2014${p}\u2014${c}`)
    if (r < limit) return ok(Number(r % BigInt(eta)))
  }
}

/** Single deterministic bit. Used only to break disagreements in code building. */
export function keyedBit(key: KeyMaterial, label: string): Bit {
  return hmacUint64(key, label) % 2n === 1n ? 1 : 0
}
