import { DuplicateElementError, EmptyStackError } from '../errors'

/**
 * A stack of unique elements. An array keeps the order and a set mirrors
 * its contents, so membership checks are O(1).
 */
export class UniqueStack<T> implements Iterable<T> {
  private readonly sequence: T[] = []
  private readonly membership: Set<T> = new Set()

  constructor(items?: Iterable<T>) {
    if (items) {
      for (const item of items) {
        this.push(item)
      }
    }
  }

  static from<T>(items: Iterable<T>): UniqueStack<T> {
    return new UniqueStack(items)
  }

  get size(): number {
    return this.sequence.length
  }

  isEmpty(): boolean {
    return this.sequence.length === 0
  }

  has(item: T): boolean {
    return this.membership.has(item)
  }

  push(item: T): void {
    if (this.membership.has(item)) {
      throw new DuplicateElementError(item)
    }
    this.sequence.push(item)
    this.membership.add(item)
  }

  pop(): T {
    if (this.sequence.length === 0) {
      throw new EmptyStackError('pop')
    }
    const item = this.sequence[this.sequence.length - 1]
    this.sequence.length -= 1
    this.membership.delete(item)
    return item
  }

  peek(): T {
    if (this.sequence.length === 0) {
      throw new EmptyStackError('peek')
    }
    return this.sequence[this.sequence.length - 1]
  }

  /** Bottom-to-top copy of the contents. */
  toArray(): T[] {
    return [...this.sequence]
  }

  [Symbol.iterator](): Iterator<T> {
    return this.sequence[Symbol.iterator]()
  }
}
