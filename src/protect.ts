/**
 * Protected-call boundary.
 *
 * Usage:
 *   const sumEven = protect({ key, zeta, eta }, (params) => ...)
 *   sumEven(prepareParameters(values, { key, zeta, eta }))
 *
 * Each call rebuilds the watermark graph from the received parameters, lets
 * the Controller verify it, and runs `fn` on the restored values only when
 * authentic. Otherwise the tamper policy decides. Configuration and coverage
 * errors are thrown whatever the policy.
 */

import { randomUUID } from 'node:crypto'
import { childLogger } from './logger.ts'
import { configError, ok, WatermarkError } from './types.ts'
import type {
  AuditEntry,
  AuditSink,
  KeyMaterial,
  Result,
  TamperPolicy,
} from './types.ts'
import { verify } from './watermark/controller.ts'
import { build, prepare, restore } from './watermark/encoder.ts'

const log = childLogger('protect')

export interface WatermarkOptions {
  readonly key: KeyMaterial
  readonly zeta: bigint
  readonly eta: number
}

export interface ProtectOptions<S> extends WatermarkOptions {
  readonly onTamper?: TamperPolicy<S>
  readonly audit?: AuditSink
}

/** Maps a policy name to its variant. `return-sentinel` returns null. */
export function parseTamperPolicy(name: string): Result<TamperPolicy, WatermarkError> {
  switch (name) {
    case 'raise':
      return ok<TamperPolicy>({ kind: 'raise' })
    case 'return-sentinel':
      return ok<TamperPolicy>({ kind: 'return-sentinel', sentinel: null })
    case 'call-anyway':
      return ok<TamperPolicy>({ kind: 'call-anyway' })
    default:
      return configError(`unknown tamper policy: ${name}`)
  }
}

function unwrap<T>(result: Result<T, WatermarkError>): T {
  if (!result.ok) throw result.error
  return result.value
}

/** Client-side helper: the watermarked list, or a thrown WatermarkError. */
export function prepareParameters(params: readonly bigint[], options: WatermarkOptions): bigint[] {
  return unwrap(prepare(params, options.key, options.zeta, options.eta)).watermarkedParams
}

function submitAudit(sink: AuditSink, entry: AuditEntry): void {
  sink(entry).catch((e: unknown) => {
    log.warn('Audit sink failed', {
      requestId: entry.requestId,
      error: e instanceof Error ? e.message : String(e),
    })
  })
}

export function protect<R, S = never>(
  options: ProtectOptions<S>,
  fn: (params: bigint[]) => R,
): (receivedParams: readonly bigint[]) => R | S {
  const policy: TamperPolicy<S> = options.onTamper ?? { kind: 'raise' }

  return (receivedParams) => {
    const started = performance.now()
    const requestId = randomUUID()

    const built = unwrap(build(receivedParams, options.key, options.eta))
    const verdict = unwrap(verify(built.graph, options.zeta))

    if (options.audit !== undefined) {
      submitAudit(options.audit, {
        timestamp: new Date().toISOString(),
        requestId,
        authentic: verdict.isAuthentic,
        policy: policy.kind,
        pairs: built.permutation.length,
        eta: built.eta,
        durationMs: Math.round(performance.now() - started),
        ...(verdict.error !== null ? { error: verdict.error } : {}),
      })
    }

    if (verdict.isAuthentic) {
      log.debug('Parameters authenticated', { requestId })
      return fn(restore(receivedParams, built.permutation))
    }

    const reason = verdict.error ?? 'code mismatch'
    log.warn('Parameter authentication failed', { requestId, policy: policy.kind, reason })

    switch (policy.kind) {
      case 'call-anyway':
        return fn([...receivedParams])
      case 'return-sentinel':
        return policy.sentinel
      case 'raise':
        throw new WatermarkError('tamper', `parameter authentication failed: ${reason}`)
    }
  }
}
