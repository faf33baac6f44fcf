import fc, { type Arbitrary } from 'fast-check'
import { describe, expect, it } from 'vitest'
import { Graph } from '../graph/graph'

/**
 * Property-based checks over small random graphs: the component partition
 * must not depend on walk order or strategy, and the cycle answer must match
 * plain reachability.
 */

interface GraphShape {
  size: number
  edges: Array<[number, number]>
}

const graphShape: Arbitrary<GraphShape> = fc
  .integer({ min: 1, max: 12 })
  .chain(size =>
    fc.record({
      size: fc.constant(size),
      edges: fc.array(fc.tuple(fc.nat(size - 1), fc.nat(size - 1)), {
        maxLength: 30,
      }),
    }),
  )

function build({ size, edges }: GraphShape): Graph<number> {
  const g = new Graph<number>()
  for (let i = 0; i < size; i++) g.addVertex(i)
  for (const [src, dst] of edges) g.addEdge(dst, src)
  return g
}

// mulberry32, so a failing seed replays the same shuffles.
function seeded(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

function partition(components: number[][]): number[][] {
  return components
    .map(component => [...component].sort((a, b) => a - b))
    .sort((a, b) => a[0] - b[0])
}

describe('strongly connected components (properties)', () => {
  it('puts every vertex in exactly one component', () => {
    fc.assert(
      fc.property(graphShape, shape => {
        const members = build(shape).stronglyConnectedComponents().flat()

        expect(members.sort((a, b) => a - b)).toEqual(
          Array.from({ length: shape.size }, (_, i) => i),
        )
      }),
    )
  })

  it('gives the same partition for any walk order', () => {
    fc.assert(
      fc.property(graphShape, fc.integer(), (shape, seed) => {
        const g = build(shape)
        const expected = partition(g.stronglyConnectedComponents())

        expect(
          partition(
            g.stronglyConnectedComponents({
              randomize: true,
              random: seeded(seed),
            }),
          ),
        ).toEqual(expected)
      }),
    )
  })

  it('gives the same components from both strategies', () => {
    fc.assert(
      fc.property(graphShape, fc.integer(), (shape, seed) => {
        const g = build(shape)

        expect(
          g.stronglyConnectedComponents({
            strategy: 'iterative',
            randomize: true,
            random: seeded(seed),
          }),
        ).toEqual(
          g.stronglyConnectedComponents({
            strategy: 'recursive',
            randomize: true,
            random: seeded(seed),
          }),
        )
      }),
    )
  })

  it('reports a cycle exactly when some edge closes a path', () => {
    fc.assert(
      fc.property(graphShape, shape => {
        const g = build(shape)
        const expected = shape.edges.some(
          ([src, dst]) => src === dst || g.getAllSuccessors(dst).includes(src),
        )

        expect(g.isCyclic()).toBe(expected)
        expect(g.isCyclic({ randomize: true })).toBe(expected)
        expect(g.findCycles().length > 0).toBe(expected)
      }),
    )
  })
})

describe('transitive queries (properties)', () => {
  // Fixpoint over the direct queries, used as the reference closure.
  function closure(start: number, step: (key: number) => number[]): number[] {
    const seen = new Set<number>()
    let frontier = step(start)
    while (frontier.length > 0) {
      const next: number[] = []
      for (const key of frontier) {
        if (!seen.has(key)) {
          seen.add(key)
          next.push(...step(key))
        }
      }
      frontier = next
    }
    seen.delete(start)
    return [...seen].sort((a, b) => a - b)
  }

  it('matches the closure of the direct queries', () => {
    fc.assert(
      fc.property(graphShape, shape => {
        const g = build(shape)

        for (const key of g.keys()) {
          expect([...g.getAllSuccessors(key)].sort((a, b) => a - b)).toEqual(
            closure(key, k => g.getDirectSuccessors(k)),
          )
          expect([...g.getAllPredecessors(key)].sort((a, b) => a - b)).toEqual(
            closure(key, k => g.getDirectPredecessors(k)),
          )
        }
      }),
    )
  })
})
