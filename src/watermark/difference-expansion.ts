/**
 * Reversible difference expansion (DE) over an integer pair.
 *
 * Embed:
 *   d  = x − y,  a = ⌊(x + y)/2⌋,  d' = 2d + b
 *   x' = a + ⌈d'/2⌉,  y' = a − ⌊d'/2⌋
 *
 * Extract:
 *   d' = x' − y',  b = d' mod 2,  d = ⌊d'/2⌋,  a = ⌊(x' + y')/2⌋
 *   x  = a + ⌈d/2⌉,  y = a − ⌊d/2⌋
 *
 * Embedding doubles |d|, so values are bigint throughout.
 */

import type { Bit } from '../types.ts'

export interface IntPair {
  readonly x: bigint
  readonly y: bigint
}

export interface ExtractedPair {
  readonly bit: Bit
  readonly pair: IntPair
}

/** Mathematical modulo; always in [0, m). */
export function mod(n: bigint, m: bigint): bigint {
  const r = n % m
  return r < 0n ? r + m : r
}

function floorDiv2(n: bigint): bigint {
  return (n - mod(n, 2n)) / 2n
}

function ceilDiv2(n: bigint): bigint {
  return -floorDiv2(-n)
}

export function embedBit(x: bigint, y: bigint, bit: Bit): IntPair {
  const d = x - y
  const a = floorDiv2(x + y)
  const dPrime = 2n * d + BigInt(bit)
  return {
    x: a + ceilDiv2(dPrime),
    y: a - floorDiv2(dPrime),
  }
}

export function extractBit(xPrime: bigint, yPrime: bigint): ExtractedPair {
  const dPrime = xPrime - yPrime
  const bit: Bit = mod(dPrime, 2n) === 1n ? 1 : 0
  const d = floorDiv2(dPrime)
  const a = floorDiv2(xPrime + yPrime)
  return {
    bit,
    pair: { x: a + ceilDiv2(d), y: a - floorDiv2(d) },
  }
}
