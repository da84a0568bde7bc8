/**
 * Tests for watermark graph encoding and decoding.
 */

import { describe, it, expect } from 'vitest'
import { encodeWatermark, decodeWatermark } from '../src/watermark/graph.ts'
import type { WatermarkGraph } from '../src/types.ts'

function encoded(zeta6: number[]): WatermarkGraph {
  const result = encodeWatermark(zeta6)
  if (!result.ok) throw result.error
  return result.value
}

describe('encodeWatermark', () => {
  it('links next into a ring and digits to (r + d − 1) mod μ', () => {
    const graph = encoded([1, 3, 0, 3, 2, 0, 3, 0])
    expect(graph.head).toBe(0)
    expect(graph.nodes.map((n) => n.next)).toEqual([1, 2, 3, 4, 5, 6, 7, 0])
    expect(graph.nodes.map((n) => n.digit)).toEqual([0, 3, undefined, 5, 5, undefined, 0, undefined])
  })

  it('fails on an empty digit array', () => {
    const result = encodeWatermark([])
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('config')
  })

  it('fails on a digit outside [0, 5]', () => {
    expect(encodeWatermark([1, 6]).ok).toBe(false)
  })
})

describe('decodeWatermark', () => {
  it('inverts encodeWatermark', () => {
    const zeta6 = [1, 3, 0, 3, 2, 0, 3, 0]
    expect(decodeWatermark(encoded(zeta6), 8)).toEqual({ ok: true, value: zeta6 })
  })

  it('inverts every digit value once the ring has at least 5 nodes', () => {
    for (let d = 0; d <= 5; d++) {
      const zeta6 = [d, 5 - d, d, 0, 5, 1]
      expect(decodeWatermark(encoded(zeta6), zeta6.length)).toEqual({ ok: true, value: zeta6 })
    }
  })

  it('folds digits larger than μ back onto the ring', () => {
    // μ = 2: digit 5 at r=0 targets (0 + 4) mod 2 = 0, which decodes as 1
    expect(decodeWatermark(encoded([5, 1]), 2)).toEqual({ ok: true, value: [1, 1] })
  })

  it('reports a broken ring while collecting nodes', () => {
    const graph = encoded([1, 2, 3])
    const node = graph.nodes[1]
    if (node === undefined) throw new Error('missing node')
    node.next = undefined
    const result = decodeWatermark(graph, 3)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('structure')
    expect(result.error.message).toBe('invalid structure (broken ring)')
  })

  it('reports a broken ring for a dangling next index', () => {
    const graph = encoded([1, 2, 3])
    const node = graph.nodes[0]
    if (node === undefined) throw new Error('missing node')
    node.next = 99
    const result = decodeWatermark(graph, 3)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toBe('invalid structure (broken ring)')
  })

  it('reports an unreachable digit target', () => {
    // Node 3 exists in the arena but is not on the ring.
    const graph: WatermarkGraph = {
      head: 0,
      nodes: [
        { next: 1, digit: 3 },
        { next: 2, digit: undefined },
        { next: 0, digit: undefined },
        { next: undefined, digit: undefined },
      ],
    }
    const result = decodeWatermark(graph, 3)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('structure')
    expect(result.error.message).toBe('invalid structure (unreachable digit)')
  })

  it('wraps around when mu exceeds the ring length', () => {
    // ring of 2 read as 4 nodes: 0,1,0,1
    expect(decodeWatermark(encoded([2, 0]), 4)).toEqual({ ok: true, value: [2, 0, 2, 0] })
  })

  it('rejects mu <= 0', () => {
    expect(decodeWatermark(encoded([1]), 0).ok).toBe(false)
  })
})
