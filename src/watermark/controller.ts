/**
 * Controller: decides authenticity by decoding the watermark graph and
 * comparing the recovered code with the expected one.
 *
 * Structural decode failures are an outcome here, not an error: they produce
 * a non-authentic result carrying the failure text.
 */

import { childLogger } from '../logger.ts'
import { configError, ok } from '../types.ts'
import type { Result, VerificationResult, WatermarkError, WatermarkGraph } from '../types.ts'
import { fromDigits } from './digits.ts'
import { ringDigits } from './encoder.ts'
import { decodeWatermark } from './graph.ts'

const log = childLogger('controller')

export function verify(
  graph: WatermarkGraph,
  expectedCode: bigint,
): Result<VerificationResult, WatermarkError> {
  if (expectedCode < 0n) {
    return configError('expected code must be non-negative')
  }
  const expected6 = ringDigits(expectedCode)
  if (!expected6.ok) return expected6
  const mu = expected6.value.length

  const decoded = decodeWatermark(graph, mu)
  if (!decoded.ok) {
    log.debug('Watermark decode failed', { mu, error: decoded.error.message })
    return ok({
      isAuthentic: false,
      recoveredCode: null,
      recoveredZeta6: null,
      error: decoded.error.message,
    })
  }

  const recovered = fromDigits(decoded.value, 6)
  if (!recovered.ok) {
    return ok({
      isAuthentic: false,
      recoveredCode: null,
      recoveredZeta6: null,
      error: recovered.error.message,
    })
  }

  return ok({
    isAuthentic: recovered.value === expectedCode,
    recoveredCode: recovered.value,
    recoveredZeta6: decoded.value,
    error: null,
  })
}
