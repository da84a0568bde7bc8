/**
 * Digit conversions between integers and big-endian digit arrays.
 *
 *   ζ  – secret code (bigint)
 *   ζ₂ – fixed-length bit array of length η
 *   ζ₆ – base-6 digit array of length μ
 */

import { configError, ok } from '../types.ts'
import type { Bit, Result, WatermarkError } from '../types.ts'

export function toDigits(n: bigint, base: number): Result<number[], WatermarkError> {
  if (!Number.isInteger(base) || base < 2) {
    return configError(`base must be an integer >= 2, got: ${base}`)
  }
  if (n < 0n) {
    return configError('n must be non-negative')
  }
  if (n === 0n) return ok([0])

  const b = BigInt(base)
  const digits: number[] = []
  let rest = n
  while (rest > 0n) {
    digits.push(Number(rest % b))
    rest /= b
  }
  return ok(digits.reverse())
}

export function fromDigits(digits: readonly number[], base: number): Result<bigint, WatermarkError> {
  if (!Number.isInteger(base) || base < 2) {
    return configError(`base must be an integer >= 2, got: ${base}`)
  }
  if (digits.length === 0) {
    return configError('digits must be non-empty')
  }
  const b = BigInt(base)
  let n = 0n
  for (const d of digits) {
    if (!Number.isInteger(d) || d < 0 || d >= base) {
      return configError(`digit ${d} out of range for base ${base}`)
    }
    n = n * b + BigInt(d)
  }
  return ok(n)
}

/** ζ → ζ₂: big-endian bits, zero-padded on the left to exactly `eta` entries. */
export function bitsFromInt(n: bigint, eta: number): Result<Bit[], WatermarkError> {
  if (!Number.isInteger(eta) || eta <= 0) {
    return configError(`eta must be a positive integer, got: ${eta}`)
  }
  const digits = toDigits(n, 2)
  if (!digits.ok) return digits
  if (digits.value.length > eta) {
    return configError(`code needs ${digits.value.length} bits but eta is ${eta}`)
  }
  const bits: Bit[] = digits.value.map((d) => (d === 1 ? 1 : 0))
  return ok([...new Array<Bit>(eta - bits.length).fill(0), ...bits])
}

export function intFromBits(bits: readonly Bit[]): Result<bigint, WatermarkError> {
  return fromDigits(bits, 2)
}

export function convertBase(
  digits: readonly number[],
  baseFrom: number,
  baseTo: number,
): Result<number[], WatermarkError> {
  const n = fromDigits(digits, baseFrom)
  if (!n.ok) return n
  return toDigits(n.value, baseTo)
}

/** Left-pads with zeros up to `length`; longer inputs are returned as a copy. */
export function padDigits(digits: readonly number[], length: number): number[] {
  if (digits.length >= length) return [...digits]
  return [...new Array<number>(length - digits.length).fill(0), ...digits]
}
