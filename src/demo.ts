/**
 * Demo: input-parameter authentication via dynamic watermarking.
 *
 * Run with:
 *   WATERMARK_KEY=demo-key WATERMARK_ZETA=123456789 npm run demo
 *
 * 1. The client watermarks 512 integers (256 pairs).
 * 2. A protected function receives them and authenticates before running.
 * 3. The same call with tampered parameters goes through the tamper policy.
 */

import { loadConfig } from './config.ts'
import { initAuditLog, initAuditSigner, writeAuditEntry } from './audit.ts'
import { logger, setLogLevel } from './logger.ts'
import { prepareParameters, protect } from './protect.ts'
import { isWatermarkError } from './types.ts'

const configResult = loadConfig()
if (!configResult.ok) {
  logger.error('Configuration error', { error: configResult.error.message })
  process.exit(1)
}

const config = configResult.value
setLogLevel(config.logLevel)

if (config.auditFile !== undefined) {
  initAuditLog(config.auditFile)
  const publicKey = initAuditSigner(config.key)
  logger.info('Audit signing enabled', {
    path: config.auditFile,
    publicKey: Buffer.from(publicKey).toString('base64url'),
  })
}

// Secrets now live in `config`; keep them out of /proc/self/environ.
delete process.env.WATERMARK_KEY
delete process.env.WATERMARK_ZETA

const options = { key: config.key, zeta: config.zeta, eta: config.eta }

const sumEvenIndexed = protect(
  { ...options, onTamper: config.onTamper, audit: writeAuditEntry },
  (params) => params.filter((_, i) => i % 2 === 0).reduce((sum, v) => sum + v, 0n),
)

function run(label: string, params: readonly bigint[]): void {
  try {
    const result = sumEvenIndexed(params)
    logger.info(`${label}: protected call returned`, { result })
  } catch (e: unknown) {
    if (!isWatermarkError(e)) throw e
    logger.warn(`${label}: protected call rejected`, { kind: e.kind, error: e.message })
  }
}

try {
  const original = Array.from({ length: 512 }, (_, i) => BigInt(i + 1))
  const watermarked = prepareParameters(original, options)
  logger.info('Parameters watermarked', { length: watermarked.length, eta: config.eta })

  run('authentic', watermarked)

  const tampered = [...watermarked]
  for (let i = 0; i < 100; i += 2) {
    tampered[i] = (tampered[i] ?? 0n) + 1n
  }
  run('tampered', tampered)
} catch (e: unknown) {
  logger.error('Demo failed', { error: e instanceof Error ? e.message : String(e) })
  process.exit(1)
}
