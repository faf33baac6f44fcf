export type GraphErrorCode =
  | 'DUPLICATE_KEY'
  | 'UNKNOWN_KEY'
  | 'DUPLICATE_ELEMENT'
  | 'EMPTY_STACK'
  | 'STACK_OVERFLOW'

/**
 * Base class for every error raised by the library. All of them are usage
 * errors raised at the point of violation; none are retried internally.
 */
export class GraphError extends Error {
  readonly code: GraphErrorCode

  constructor(message: string, code: GraphErrorCode, options?: ErrorOptions) {
    super(message, options)
    this.name = 'GraphError'
    this.code = code

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

export class DuplicateKeyError extends GraphError {
  readonly key: unknown

  constructor(key: unknown) {
    super(`${String(key)} already in graph`, 'DUPLICATE_KEY')
    this.name = 'DuplicateKeyError'
    this.key = key
  }
}

export class UnknownKeyError extends GraphError {
  readonly key: unknown

  constructor(key: unknown) {
    super(`${String(key)} not present in graph`, 'UNKNOWN_KEY')
    this.name = 'UnknownKeyError'
    this.key = key
  }
}

export class DuplicateElementError extends GraphError {
  readonly element: unknown

  constructor(element: unknown) {
    super(
      `Stack requires unique elements, ${String(element)} is already present`,
      'DUPLICATE_ELEMENT',
    )
    this.name = 'DuplicateElementError'
    this.element = element
  }
}

export class EmptyStackError extends GraphError {
  constructor(operation: 'pop' | 'peek') {
    super(`Cannot ${operation} an empty stack`, 'EMPTY_STACK')
    this.name = 'EmptyStackError'
  }
}

/**
 * Raised when the recursive SCC walk runs out of call stack. The host
 * `RangeError` is kept as `cause`.
 */
export class StackOverflowError extends GraphError {
  constructor(vertexCount: number, cause: RangeError) {
    super(
      `Call stack exhausted while walking ${vertexCount} vertices recursively; use the 'iterative' strategy for deep graphs`,
      'STACK_OVERFLOW',
      { cause },
    )
    this.name = 'StackOverflowError'
  }
}

// V8 reports exhaustion as a RangeError with this message.
export function isCallStackExhaustion(error: unknown): error is RangeError {
  return (
    error instanceof RangeError &&
    /maximum call stack size exceeded/i.test(error.message)
  )
}
