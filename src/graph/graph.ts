import type { CycleDetectionOptions } from '../cycle-detector/options'
import {
  stronglyConnectedComponents,
  type AdjacencySource,
  type StronglyConnectedComponent,
} from '../cycle-detector/tarjan'
import { DuplicateKeyError, UnknownKeyError } from '../errors'
import { silentLogger, type Logger } from '../logger'
import { Vertex } from './vertex'

export interface GraphOptions {
  /** Used by the cycle queries unless a call passes its own. */
  logger?: Logger
}

type Direction = 'successors' | 'predecessors'

/**
 * A directed graph of keyed vertices. Vertices and edges can only be added;
 * the graph grows for its whole lifetime.
 *
 * Edges are added as `addEdge(dst, src)`, meaning `src → dst`: in a build
 * graph, `addEdge('app.o', 'app.c')` records that `app.c` feeds `app.o`, so
 * `app.c` is a predecessor of `app.o`.
 */
export class Graph<K, V = unknown> implements AdjacencySource<K> {
  private readonly vertices: Map<K, Vertex<K, V>> = new Map()
  private directCyclic = false
  private readonly logger: Logger

  constructor(options: GraphOptions = {}) {
    this.logger = options.logger ?? silentLogger
  }

  get size(): number {
    return this.vertices.size
  }

  /** True once any self-loop has been added. Never reset. */
  get isDirectCyclic(): boolean {
    return this.directCyclic
  }

  has(key: K): boolean {
    return this.vertices.has(key)
  }

  get(key: K): V | undefined {
    return this.requireVertex(key).value
  }

  /**
   * Adds a vertex. There is no update in place: an existing key fails with
   * DuplicateKeyError just like `addVertex`.
   */
  set(key: K, value: V): this {
    this.addVertex(key, value)
    return this
  }

  keys(): K[] {
    return Array.from(this.vertices.keys())
  }

  addVertex(key: K, value?: V): void {
    if (this.vertices.has(key)) {
      throw new DuplicateKeyError(key)
    }
    this.vertices.set(key, new Vertex<K, V>(key, value))
  }

  addEdge(dst: K, src: K): void {
    const from = this.requireVertex(src)
    const to = this.requireVertex(dst)

    // Same vertex under Map key equality, which also matches NaN to NaN.
    if (from === to) {
      this.directCyclic = true
    }
    from.connectTo(to)
  }

  /** Adds `src → dst` for each source, in order, stopping at the first failure. */
  addEdges(dst: K, ...srcs: K[]): void {
    this.addEdgesFrom(dst, srcs)
  }

  /** Key-list form of `addEdges`. */
  addEdgesFrom(dst: K, srcs: Iterable<K>): void {
    for (const src of srcs) {
      this.addEdge(dst, src)
    }
  }

  getDirectSuccessors(key: K): K[] {
    return Array.from(this.requireVertex(key).successors)
  }

  getDirectPredecessors(key: K): K[] {
    return Array.from(this.requireVertex(key).predecessors)
  }

  /** Every vertex reachable from `key`, excluding `key` itself. */
  getAllSuccessors(key: K): K[] {
    return this.collectReachable(key, 'successors')
  }

  /** Every vertex that reaches `key`, excluding `key` itself. */
  getAllPredecessors(key: K): K[] {
    return this.collectReachable(key, 'predecessors')
  }

  stronglyConnectedComponents(
    options: CycleDetectionOptions = {},
  ): StronglyConnectedComponent<K>[] {
    return stronglyConnectedComponents(this, {
      ...options,
      logger: options.logger ?? this.logger,
    })
  }

  isCyclic(options: CycleDetectionOptions = {}): boolean {
    if (this.directCyclic) {
      const logger = options.logger ?? this.logger
      logger.debug('isCyclic: self-loop present, skipping component search')
      return true
    }
    return this.stronglyConnectedComponents(options).length < this.vertices.size
  }

  /**
   * Components that contain a cycle: every component with more than one
   * member, plus single vertices with an edge to themselves.
   */
  findCycles(options: CycleDetectionOptions = {}): StronglyConnectedComponent<K>[] {
    return this.stronglyConnectedComponents(options).filter(
      component =>
        component.length > 1 ||
        this.requireVertex(component[0]).successors.has(component[0]),
    )
  }

  private requireVertex(key: K): Vertex<K, V> {
    const vertex = this.vertices.get(key)
    if (!vertex) {
      throw new UnknownKeyError(key)
    }
    return vertex
  }

  // Breadth-first over one edge direction; each vertex is queued once.
  private collectReachable(key: K, direction: Direction): K[] {
    const visited = new Set<K>([key])
    const reached: K[] = []
    const queue: K[] = [key]

    for (const current of queue) {
      for (const next of this.requireVertex(current)[direction]) {
        if (!visited.has(next)) {
          visited.add(next)
          reached.push(next)
          queue.push(next)
        }
      }
    }
    return reached
  }
}
