import type { FrequencyTable } from './types'

export function increment(table: FrequencyTable, unit: string): void {
  table.set(unit, (table.get(unit) ?? 0) + 1)
}

/**
 * Sum of all counts: total characters, word matches or lines seen.
 */
export function totalUnits(table: FrequencyTable): number {
  let total = 0
  for (const value of table.values()) total += value
  return total
}

/**
 * Entries by count descending, ties broken by key (code unit order).
 */
export function sortedEntries(table: FrequencyTable): Array<[string, number]> {
  return Array.from(table.entries()).sort(([keyA, countA], [keyB, countB]) => {
    if (countA !== countB) return countB - countA
    if (keyA === keyB) return 0
    return keyA < keyB ? -1 : 1
  })
}
