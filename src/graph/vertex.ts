/**
 * A vertex and its adjacency. Both directions are stored so predecessor
 * queries never scan the graph; `connectTo` keeps them symmetric.
 */
export class Vertex<K, V> {
  readonly successors: Set<K> = new Set()
  readonly predecessors: Set<K> = new Set()

  constructor(
    readonly key: K,
    readonly value: V | undefined,
  ) {}

  connectTo(other: Vertex<K, V>): void {
    this.successors.add(other.key)
    other.predecessors.add(this.key)
  }
}
