/**
 * Base-6 watermark graph.
 *
 * μ nodes form a ring through `next`. Node r carries digit d of ζ₆ as a
 * `digit` relation to node (r + d − 1) mod μ, or no relation when d = 0.
 * The digits exist only as relations between nodes; decoding recovers them
 * by counting `next` steps from each node to its digit target.
 *
 * Nodes live in an arena and relations are indices into it.
 */

import { configError, err, ok, WatermarkError } from '../types.ts'
import type { Result, WatermarkGraph, WatermarkNode } from '../types.ts'

const MAX_DIGIT = 5

export function encodeWatermark(zeta6: readonly number[]): Result<WatermarkGraph, WatermarkError> {
  const mu = zeta6.length
  if (mu === 0) {
    return configError('zeta6 must be non-empty')
  }

  const nodes: WatermarkNode[] = []
  for (let r = 0; r < mu; r++) {
    const d = zeta6[r] ?? 0
    if (!Number.isInteger(d) || d < 0 || d > MAX_DIGIT) {
      return configError(`digit ${d} at position ${r} is not a base-6 digit`)
    }
    nodes.push({
      next: (r + 1) % mu,
      digit: d === 0 ? undefined : (r + d - 1) % mu,
    })
  }
  return ok({ nodes, head: 0 })
}

function brokenRing(): Result<never, WatermarkError> {
  return err(new WatermarkError('structure', 'invalid structure (broken ring)'))
}

/** Follows `next` from `index`; undefined when the relation is absent or dangling. */
function step(graph: WatermarkGraph, index: number): number | undefined {
  const next = graph.nodes[index]?.next
  if (next === undefined || graph.nodes[next] === undefined) return undefined
  return next
}

export function decodeWatermark(graph: WatermarkGraph, mu: number): Result<number[], WatermarkError> {
  if (!Number.isInteger(mu) || mu <= 0) {
    return configError(`mu must be a positive integer, got: ${mu}`)
  }
  if (graph.nodes[graph.head] === undefined) return brokenRing()

  const ring: number[] = [graph.head]
  let cur = graph.head
  for (let i = 1; i < mu; i++) {
    const next = step(graph, cur)
    if (next === undefined) return brokenRing()
    cur = next
    ring.push(cur)
  }

  const zeta6: number[] = []
  for (const index of ring) {
    const target = graph.nodes[index]?.digit
    if (target === undefined) {
      zeta6.push(0)
      continue
    }

    let s = 0
    let probe = index
    while (probe !== target) {
      const next = step(graph, probe)
      if (next === undefined) return brokenRing()
      probe = next
      s++
      if (s > mu) {
        return err(new WatermarkError('structure', 'invalid structure (unreachable digit)'))
      }
    }
    // s = 0 is a relation to the node itself, i.e. digit 1
    zeta6.push(s + 1)
  }
  return ok(zeta6)
}
