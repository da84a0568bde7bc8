export { toDigits, fromDigits, bitsFromInt, intFromBits, convertBase, padDigits } from './watermark/digits.ts'
export { hmacUint64, deriveSeed, keyedPermutation, keyedIndex, keyedBit } from './watermark/keyed.ts'
export { embedBit, extractBit } from './watermark/difference-expansion.ts'
export type { IntPair, ExtractedPair } from './watermark/difference-expansion.ts'
export { encodeWatermark, decodeWatermark } from './watermark/graph.ts'
export {
  MIN_RING_NODES,
  ringDigits,
  computePermutation,
  hintsDetection,
  codeBuilder,
  prepare,
  build,
  restore,
} from './watermark/encoder.ts'
export { verify } from './watermark/controller.ts'
export { protect, prepareParameters, parseTamperPolicy } from './protect.ts'
export type { WatermarkOptions, ProtectOptions } from './protect.ts'
export { initAuditLog, initAuditSigner, writeAuditEntry } from './audit.ts'
export { loadConfig } from './config.ts'
export type { Config } from './config.ts'
export { logger, childLogger, setLogLevel, getLogLevel } from './logger.ts'
export type { Logger, LogLevel } from './logger.ts'
export { ok, err, WatermarkError, isWatermarkError } from './types.ts'
export type {
  Result,
  WatermarkErrorKind,
  KeyMaterial,
  Bit,
  WatermarkNode,
  WatermarkGraph,
  PreparedInput,
  AuthenticationBuild,
  VerificationResult,
  TamperPolicy,
  TamperPolicyKind,
  AuditEntry,
  AuditSink,
} from './types.ts'
