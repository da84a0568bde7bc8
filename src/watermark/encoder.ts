/**
 * Watermark hint embedding (client side) and graph reconstruction (server side).
 *
 *   prepare:  ζ → ζ₂ → Γ (scatter through keyedIndex) → DE-embed Γ into pairs
 *   build:    received pairs → Γ → ζ₂ (vote per bit position) → ζ₆ → graph
 *   restore:  DE-extract every pair, recovering the original values
 *
 * Both sides call computePermutation with the same (key, n_pairs, η), so a
 * coverage failure on one side is a coverage failure on the other.
 */

import { childLogger } from '../logger.ts'
import { configError, err, ok, WatermarkError } from '../types.ts'
import type {
  AuthenticationBuild,
  Bit,
  KeyMaterial,
  PreparedInput,
  Result,
} from '../types.ts'
import { bitsFromInt, convertBase, padDigits, toDigits } from './digits.ts'
import { embedBit, extractBit, mod } from './difference-expansion.ts'
import { encodeWatermark } from './graph.ts'
import { deriveSeed, keyedBit, keyedIndex, keyedPermutation } from './keyed.ts'

const log = childLogger('encoder')

const TIE_BREAK_LABEL = 'KBit|v1'

/**
 * Minimum number of ring nodes. A digit d only survives the graph when
 * d ≤ μ, so ζ₆ is left-padded with zeros until every digit 1..5 fits.
 */
export const MIN_RING_NODES = 5

/** ζ₆ of `code` at the ring size shared by build and verification. */
export function ringDigits(code: bigint): Result<number[], WatermarkError> {
  const digits = toDigits(code, 6)
  if (!digits.ok) return digits
  return ok(padDigits(digits.value, MIN_RING_NODES))
}

function coverageError(message: string): Result<never, WatermarkError> {
  return err(new WatermarkError('coverage', message))
}

/** keyedIndex for every p in `permutation`, in permutation order. */
function bitPositions(
  permutation: readonly number[],
  eta: number,
  key: KeyMaterial,
): Result<number[], WatermarkError> {
  const positions: number[] = []
  for (const p of permutation) {
    const j = keyedIndex(p, eta, key)
    if (!j.ok) return j
    positions.push(j.value)
  }
  return ok(positions)
}

export function computePermutation(
  paramsLen: number,
  key: KeyMaterial,
  eta: number,
): Result<number[], WatermarkError> {
  if (!Number.isInteger(eta) || eta <= 0) {
    return configError(`eta must be a positive integer, got: ${eta}`)
  }
  if (paramsLen < 2) {
    return configError('need at least one pair (2 parameters)')
  }
  const nPairs = Math.floor(paramsLen / 2)
  if (nPairs < eta) {
    return coverageError(
      `not enough pairs for eta=${eta}: need at least ${eta} pairs, got ${nPairs}`,
    )
  }

  const perm = keyedPermutation(deriveSeed(key), nPairs)
  if (!perm.ok) return perm

  const positions = bitPositions(perm.value, eta, key)
  if (!positions.ok) return positions
  const covered = new Set(positions.value).size
  if (covered < eta) {
    log.debug('Coverage check failed', { nPairs, eta, covered })
    return coverageError(
      `insufficient coverage: only ${covered}/${eta} bit positions receive votes; use more pairs or a smaller eta`,
    )
  }
  return ok(perm.value)
}

/** Γ[p] = (x − y) mod 2 for pair p = (params[2p], params[2p+1]). */
export function hintsDetection(params: readonly bigint[], permutation: readonly number[]): Bit[] {
  const gamma = new Array<Bit>(Math.floor(params.length / 2)).fill(0)
  for (const p of permutation) {
    const x = params[2 * p] ?? 0n
    const y = params[2 * p + 1] ?? 0n
    gamma[p] = mod(x - y, 2n) === 1n ? 1 : 0
  }
  return gamma
}

/**
 * Rebuilds ζ₂ from Γ by voting per bit position.
 *
 * A position with only one-votes is 1, only zero-votes is 0. Any mix of the
 * two, not just an even split, is settled by keyedBit over the vote counts.
 */
export function codeBuilder(
  gamma: readonly Bit[],
  eta: number,
  key: KeyMaterial,
  permutation: readonly number[],
): Result<Bit[], WatermarkError> {
  const positions = bitPositions(permutation, eta, key)
  if (!positions.ok) return positions

  const ones = new Array<number>(eta).fill(0)
  const zeros = new Array<number>(eta).fill(0)
  permutation.forEach((p, i) => {
    const j = positions.value[i] ?? 0
    if (gamma[p] === 1) {
      ones[j] = (ones[j] ?? 0) + 1
    } else {
      zeros[j] = (zeros[j] ?? 0) + 1
    }
  })

  const zeta2: Bit[] = []
  for (let j = 0; j < eta; j++) {
    const o = ones[j] ?? 0
    const z = zeros[j] ?? 0
    if (o > 0 && z === 0) {
      zeta2.push(1)
    } else if (z > 0 && o === 0) {
      zeta2.push(0)
    } else {
      zeta2.push(keyedBit(key, `${TIE_BREAK_LABEL}|chaos|j=${j}|o=${o}|z=${z}`))
    }
  }
  return ok(zeta2)
}

/** Embeds ζ into a copy of `params`. */
export function prepare(
  params: readonly bigint[],
  key: KeyMaterial,
  zeta: bigint,
  eta: number,
): Result<PreparedInput, WatermarkError> {
  if (zeta < 0n) {
    return configError('zeta must be non-negative')
  }
  const perm = computePermutation(params.length, key, eta)
  if (!perm.ok) return perm

  const zeta2 = bitsFromInt(zeta, eta)
  if (!zeta2.ok) return zeta2

  const positions = bitPositions(perm.value, eta, key)
  if (!positions.ok) return positions

  const out = [...params]
  perm.value.forEach((p, i) => {
    const bit = zeta2.value[positions.value[i] ?? 0] ?? 0
    const embedded = embedBit(out[2 * p] ?? 0n, out[2 * p + 1] ?? 0n, bit)
    out[2 * p] = embedded.x
    out[2 * p + 1] = embedded.y
  })

  log.debug('Parameters watermarked', { pairs: perm.value.length, eta })
  return ok({ watermarkedParams: out, permutation: perm.value, eta })
}

/** Reconstructs the watermark graph carried by `receivedParams`. */
export function build(
  receivedParams: readonly bigint[],
  key: KeyMaterial,
  eta: number,
): Result<AuthenticationBuild, WatermarkError> {
  const perm = computePermutation(receivedParams.length, key, eta)
  if (!perm.ok) return perm

  const gamma = hintsDetection(receivedParams, perm.value)
  const zeta2 = codeBuilder(gamma, eta, key, perm.value)
  if (!zeta2.ok) return zeta2

  const zeta6 = convertBase(zeta2.value, 2, 6)
  if (!zeta6.ok) return zeta6

  const graph = encodeWatermark(padDigits(zeta6.value, MIN_RING_NODES))
  if (!graph.ok) return graph

  log.debug('Watermark graph built', { pairs: perm.value.length, eta, nodes: graph.value.nodes.length })
  return ok({ graph: graph.value, permutation: perm.value, eta })
}

/** Inverts the embedding for every pair in `permutation`. */
export function restore(watermarkedParams: readonly bigint[], permutation: readonly number[]): bigint[] {
  const out = [...watermarkedParams]
  for (const p of permutation) {
    const { pair } = extractBit(out[2 * p] ?? 0n, out[2 * p + 1] ?? 0n)
    out[2 * p] = pair.x
    out[2 * p + 1] = pair.y
  }
  return out
}
