/**
 * Core shared types for parameter watermark authentication.
 */

// ── Result<T, E> ────────────────────────────────────────────────────────────

type Ok<T> = { readonly ok: true; readonly value: T }
type Err<E> = { readonly ok: false; readonly error: E }
export type Result<T, E = Error> = Ok<T> | Err<E>

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error }
}

// ── Errors ──────────────────────────────────────────────────────────────────

/**
 * config    – invalid input or configuration, fatal to the call
 * coverage  – η cannot be served by the available parameter pairs
 * structure – the watermark graph is malformed (broken ring, unreachable digit)
 * tamper    – decoded code differs from the expected one
 */
export type WatermarkErrorKind = 'config' | 'coverage' | 'structure' | 'tamper'

export class WatermarkError extends Error {
  readonly kind: WatermarkErrorKind

  constructor(kind: WatermarkErrorKind, message: string) {
    super(message)
    this.name = 'WatermarkError'
    this.kind = kind
  }
}

export function isWatermarkError(value: unknown): value is WatermarkError {
  return value instanceof WatermarkError
}

export function configError(message: string): Err<WatermarkError> {
  return err(new WatermarkError('config', message))
}

// ── Keys and bits ───────────────────────────────────────────────────────────

/** HMAC key material. Strings are used as their UTF-8 bytes. */
export type KeyMaterial = string | Uint8Array

export type Bit = 0 | 1

// ── Watermark graph ─────────────────────────────────────────────────────────

/** Relations are arena indices; `undefined` means the relation is absent. */
export interface WatermarkNode {
  next: number | undefined
  digit: number | undefined
}

export interface WatermarkGraph {
  readonly nodes: WatermarkNode[]
  readonly head: number
}

// ── Pipeline outputs ────────────────────────────────────────────────────────

export interface PreparedInput {
  readonly watermarkedParams: bigint[]
  readonly permutation: readonly number[]
  readonly eta: number
}

export interface AuthenticationBuild {
  readonly graph: WatermarkGraph
  readonly permutation: readonly number[]
  readonly eta: number
}

export interface VerificationResult {
  readonly isAuthentic: boolean
  readonly recoveredCode: bigint | null
  readonly recoveredZeta6: readonly number[] | null
  readonly error: string | null
}

// ── Protected-call boundary ─────────────────────────────────────────────────

export type TamperPolicy<S = null> =
  | { readonly kind: 'raise' }
  | { readonly kind: 'return-sentinel'; readonly sentinel: S }
  | { readonly kind: 'call-anyway' }

export type TamperPolicyKind = TamperPolicy['kind']

// ── Audit ────────────────────────────────────────────────────────────────────

export interface AuditEntry {
  readonly timestamp: string
  readonly requestId: string
  readonly authentic: boolean
  readonly policy: TamperPolicyKind
  readonly pairs: number
  readonly eta: number
  readonly durationMs: number
  readonly error?: string
  readonly signature?: string
  readonly sigAlgorithm?: string
}

export type AuditSink = (entry: AuditEntry) => Promise<void>
