/**
 * Audit trail for protected calls.
 *
 * Appends one JSON line per verification to the file set by initAuditLog().
 * Entries hold only metadata (outcome, policy, sizes, timing, decode error
 * text), never the key, the code, or parameter values.
 *
 * After initAuditSigner() every entry is signed with SLH-DSA-SHA2-128s over
 * its JSON text, so the log can be checked offline with the returned public key.
 *
 * Failures log a warning and are never thrown to the caller.
 */

import { appendFile, mkdir, lstat } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { hkdfSync } from 'node:crypto'
import { slh_dsa_sha2_128s } from '@noble/post-quantum/slh-dsa'
import { logger } from './logger.ts'
import type { AuditEntry, KeyMaterial } from './types.ts'

export const SIG_ALGORITHM = 'slh-dsa-sha2-128s'

// SLH-DSA-SHA2-128s takes 3 x N bytes of seed (N = 16).
const SLH_DSA_SEED_BYTES = 48

/** Type guard for Node.js filesystem errors with a `code` property. */
function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value
}

let auditFile: string | null = null
let dirReady = false
let auditSecretKey: Uint8Array | null = null

export function initAuditLog(filePath: string): void {
  auditFile = resolve(filePath)
  dirReady = false
}

export function getAuditFilePath(): string | null {
  return auditFile
}

/**
 * Derives the signing keypair from `key` via HKDF-SHA256 and enables signing.
 * Returns the public key.
 */
export function initAuditSigner(key: KeyMaterial): Uint8Array {
  const seed = Buffer.from(
    hkdfSync('sha256', key, 'watermark:slh-dsa:salt', 'watermark:audit:v1', SLH_DSA_SEED_BYTES),
  )
  const { secretKey, publicKey } = slh_dsa_sha2_128s.keygen(seed)
  auditSecretKey = secretKey
  return publicKey
}

export async function writeAuditEntry(entry: AuditEntry): Promise<void> {
  const file = auditFile
  if (file === null) {
    logger.debug('Audit log not configured; entry dropped', { requestId: entry.requestId })
    return
  }

  if (!dirReady) {
    try {
      await mkdir(dirname(file), { recursive: true })
      dirReady = true
    } catch (e: unknown) {
      logger.warn('Audit dir creation failed', {
        error: e instanceof Error ? e.message : String(e),
      })
      return
    }
  }

  // A symlink at the audit path could redirect writes to an arbitrary file.
  try {
    const stats = await lstat(file)
    if (stats.isSymbolicLink()) {
      logger.warn('Audit file is a symlink, refusing to write', { path: file })
      return
    }
  } catch (e: unknown) {
    // ENOENT: not created yet
    const isNotFound = isErrnoException(e) && e.code === 'ENOENT'
    if (!isNotFound) {
      logger.warn('Audit file access check failed', {
        error: e instanceof Error ? e.message : String(e),
      })
      return
    }
  }

  try {
    const finalEntry: AuditEntry = auditSecretKey !== null
      ? signEntry(entry, auditSecretKey)
      : entry

    await appendFile(file, JSON.stringify(finalEntry) + '\n', 'utf-8')
  } catch (e: unknown) {
    logger.warn('Audit write failed', {
      error: e instanceof Error ? e.message : String(e),
    })
  }
}

function signEntry(entry: AuditEntry, secretKey: Uint8Array): AuditEntry {
  const msgBytes = Buffer.from(JSON.stringify(entry))
  const sig = slh_dsa_sha2_128s.sign(secretKey, msgBytes)
  return {
    ...entry,
    signature: Buffer.from(sig).toString('base64url'),
    sigAlgorithm: SIG_ALGORITHM,
  }
}

/** Reset internal state (for testing). */
export function resetAuditState(): void {
  auditFile = null
  dirReady = false
  auditSecretKey = null
}
