import { isCallStackExhaustion, StackOverflowError } from '../errors'
import { UniqueStack } from '../unique-stack/unique-stack'
import {
  resolveDetectionOptions,
  type CycleDetectionOptions,
  type ResolvedDetectionOptions,
} from './options'
import { insertionOrder, randomOrder, type Ordering } from './ordering'

/** The read-only view of a graph the detector walks. */
export interface AdjacencySource<K> {
  keys(): K[]
  getDirectSuccessors(key: K): K[]
}

export type StronglyConnectedComponent<K> = K[]

interface VertexState {
  index: number
  lowLink: number
}

interface Frame<K> {
  state: VertexState
  successors: Iterator<K>
}

/**
 * Working state of one Tarjan pass: discovery counter, per-vertex index and
 * low-link, the stack of vertices on the open path, and the finished
 * components. Created per call and dropped afterwards.
 */
class TarjanState<K> {
  private counter = 0
  private readonly visited: Map<K, VertexState> = new Map()
  private readonly path: UniqueStack<K> = new UniqueStack()
  readonly components: StronglyConnectedComponent<K>[] = []

  constructor(
    private readonly graph: AdjacencySource<K>,
    private readonly order: Ordering,
  ) {}

  roots(): K[] {
    return this.order(this.graph.keys())
  }

  successorsOf(key: K): K[] {
    return this.order(this.graph.getDirectSuccessors(key))
  }

  stateOf(key: K): VertexState | undefined {
    return this.visited.get(key)
  }

  open(key: K): VertexState {
    const state = { index: this.counter, lowLink: this.counter }
    this.counter++
    this.visited.set(key, state)
    this.path.push(key)
    return state
  }

  // Back or cross edge to an already visited vertex. Only vertices still on
  // the open path lower the low-link; closed ones belong to another SCC.
  touch(state: VertexState, successor: K, successorState: VertexState): void {
    if (this.path.has(successor)) {
      state.lowLink = Math.min(state.lowLink, successorState.index)
    }
  }

  close(state: VertexState): void {
    if (state.lowLink !== state.index) return

    const component: StronglyConnectedComponent<K> = []
    for (;;) {
      const member = this.path.pop()
      component.push(member)
      // Compared by state, not key, so keys such as NaN close their component.
      if (this.visited.get(member) === state) break
    }
    this.components.push(component)
  }
}

function runRecursive<K>(tarjan: TarjanState<K>): void {
  const strongConnect = (key: K): VertexState => {
    const state = tarjan.open(key)

    for (const successor of tarjan.successorsOf(key)) {
      const successorState = tarjan.stateOf(successor)
      if (!successorState) {
        const child = strongConnect(successor)
        state.lowLink = Math.min(state.lowLink, child.lowLink)
      } else {
        tarjan.touch(state, successor, successorState)
      }
    }

    tarjan.close(state)
    return state
  }

  for (const root of tarjan.roots()) {
    if (!tarjan.stateOf(root)) {
      strongConnect(root)
    }
  }
}

function runIterative<K>(tarjan: TarjanState<K>): void {
  const frames: Frame<K>[] = []
  const enter = (key: K): void => {
    const state = tarjan.open(key)
    frames.push({
      state,
      successors: tarjan.successorsOf(key)[Symbol.iterator](),
    })
  }

  for (const root of tarjan.roots()) {
    if (tarjan.stateOf(root)) continue
    enter(root)

    while (frames.length > 0) {
      const frame = frames[frames.length - 1]
      const next = frame.successors.next()

      if (!next.done) {
        const successorState = tarjan.stateOf(next.value)
        if (successorState) {
          tarjan.touch(frame.state, next.value, successorState)
        } else {
          enter(next.value)
        }
        continue
      }

      frames.pop()
      tarjan.close(frame.state)
      if (frames.length > 0) {
        const parent = frames[frames.length - 1].state
        parent.lowLink = Math.min(parent.lowLink, frame.state.lowLink)
      }
    }
  }
}

function detect<K>(
  graph: AdjacencySource<K>,
  options: ResolvedDetectionOptions,
): StronglyConnectedComponent<K>[] {
  const order = options.randomize ? randomOrder(options.random) : insertionOrder
  const tarjan = new TarjanState(graph, order)

  if (options.strategy === 'iterative') {
    runIterative(tarjan)
    return tarjan.components
  }

  try {
    runRecursive(tarjan)
  } catch (error) {
    if (isCallStackExhaustion(error)) {
      throw new StackOverflowError(graph.keys().length, error)
    }
    throw error
  }
  return tarjan.components
}

/**
 * Partitions the graph into strongly connected components using Tarjan's
 * algorithm. Components come out in reverse topological order of the
 * condensed graph; members within a component are in pop order.
 *
 * With `randomize` the root order and each vertex's successor order are
 * shuffled. The partition itself does not depend on the order.
 */
export function stronglyConnectedComponents<K>(
  graph: AdjacencySource<K>,
  options?: CycleDetectionOptions,
): StronglyConnectedComponent<K>[] {
  const resolved = resolveDetectionOptions(options)
  const components = detect(graph, resolved)

  resolved.logger.debug(
    `tarjan: ${resolved.strategy} pass over ${graph.keys().length} vertices found ${components.length} components`,
    { randomize: resolved.randomize },
  )
  return components
}
