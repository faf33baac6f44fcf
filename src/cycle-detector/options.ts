import { silentLogger, type Logger } from '../logger'

/**
 * How the depth-first walk is driven. `recursive` uses one call frame per
 * vertex on the current path and fails with a StackOverflowError on very
 * deep graphs; `iterative` keeps its frames on an explicit stack.
 */
export type TraversalStrategy = 'recursive' | 'iterative'

export interface CycleDetectionOptions {
  /** Shuffle root and successor order for this pass. */
  randomize?: boolean
  /** Source of randomness for `randomize`, returning values in [0, 1). */
  random?: () => number
  strategy?: TraversalStrategy
  logger?: Logger
}

export type ResolvedDetectionOptions = Required<CycleDetectionOptions>

export const DEFAULT_DETECTION_OPTIONS: Readonly<ResolvedDetectionOptions> =
  Object.freeze({
    randomize: false,
    random: Math.random,
    strategy: 'recursive',
    logger: silentLogger,
  })

export function resolveDetectionOptions(
  options: CycleDetectionOptions = {},
  defaults: Readonly<ResolvedDetectionOptions> = DEFAULT_DETECTION_OPTIONS,
): ResolvedDetectionOptions {
  return {
    randomize: options.randomize ?? defaults.randomize,
    random: options.random ?? defaults.random,
    strategy: options.strategy ?? defaults.strategy,
    logger: options.logger ?? defaults.logger,
  }
}
