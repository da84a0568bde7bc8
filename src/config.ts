/**
 * Configuration loader.
 *
 * Required env vars:
 *   WATERMARK_KEY        – shared secret key (used as UTF-8 bytes)
 *   WATERMARK_ZETA       – expected secret code ζ, decimal, non-negative
 *
 * Optional env vars:
 *   WATERMARK_ETA        – bit length η of ζ₂ (default 32)
 *   WATERMARK_ON_TAMPER  – raise | return-sentinel | call-anyway (default raise)
 *   WATERMARK_AUDIT_FILE – JSONL audit trail path (unset: no audit)
 *   LOG_LEVEL            – debug | info | warn | error (default info)
 */

import { isLogLevel } from './logger.ts'
import type { LogLevel } from './logger.ts'
import { parseTamperPolicy } from './protect.ts'
import { err, ok } from './types.ts'
import type { Result, TamperPolicy } from './types.ts'

export interface Config {
  readonly key: string
  readonly zeta: bigint
  readonly eta: number
  readonly onTamper: TamperPolicy
  readonly logLevel: LogLevel
  readonly auditFile?: string
}

const DEFAULT_ETA = 32

export function loadConfig(): Result<Config> {
  const key = process.env.WATERMARK_KEY
  if (key === undefined || key === '') {
    return err(new Error('WATERMARK_KEY env var is required'))
  }

  const zetaStr = process.env.WATERMARK_ZETA
  if (zetaStr === undefined || zetaStr === '') {
    return err(new Error('WATERMARK_ZETA env var is required'))
  }
  if (!/^\d+$/.test(zetaStr)) {
    return err(new Error(`WATERMARK_ZETA must be a non-negative decimal integer, got: ${zetaStr}`))
  }
  const zeta = BigInt(zetaStr)

  const etaStr = process.env.WATERMARK_ETA ?? String(DEFAULT_ETA)
  const eta = /^\d+$/.test(etaStr) ? parseInt(etaStr, 10) : NaN
  if (isNaN(eta) || eta <= 0) {
    return err(new Error(`WATERMARK_ETA must be a positive integer, got: ${etaStr}`))
  }
  if (zeta >= 1n << BigInt(eta)) {
    return err(new Error(`WATERMARK_ZETA does not fit in WATERMARK_ETA=${eta} bits`))
  }

  const policy = parseTamperPolicy(process.env.WATERMARK_ON_TAMPER ?? 'raise')
  if (!policy.ok) {
    return err(new Error(`WATERMARK_ON_TAMPER: ${policy.error.message}`))
  }

  const rawLevel = process.env.LOG_LEVEL ?? 'info'
  const logLevel: LogLevel = isLogLevel(rawLevel) ? rawLevel : 'info'

  const auditFile = process.env.WATERMARK_AUDIT_FILE

  return ok({
    key,
    zeta,
    eta,
    onTamper: policy.value,
    logLevel,
    ...(auditFile !== undefined && auditFile !== '' ? { auditFile } : {}),
  })
}
