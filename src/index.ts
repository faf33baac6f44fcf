export { Graph, type GraphOptions } from './graph/graph'
export { UniqueStack } from './unique-stack/unique-stack'

export * from './cycle-detector/options'
export {
  stronglyConnectedComponents,
  type AdjacencySource,
  type StronglyConnectedComponent,
} from './cycle-detector/tarjan'
export * from './errors'
export * from './logger'
