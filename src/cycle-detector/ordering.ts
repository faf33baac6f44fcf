/**
 * Fisher–Yates shuffle, in place. `random` should return values in [0, 1);
 * a value of 1 is clamped to the last index.
 */
export function shuffle<T>(items: T[], random: () => number): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.min(i, Math.floor(random() * (i + 1)))
    const tmp = items[i]
    items[i] = items[j]
    items[j] = tmp
  }
  return items
}

export type Ordering = <T>(items: T[]) => T[]

export const insertionOrder: Ordering = items => items

export function randomOrder(random: () => number): Ordering {
  return items => shuffle(items, random)
}
