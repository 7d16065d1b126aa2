/**
 * String similarity functions used by fuzzy identity matching
 * @module core/comparators
 */

import { nameMatchKey } from './normalizers/name.js'

/**
 * A similarity score between 0 (nothing in common) and 1 (identical).
 * The identity resolver takes any function of this shape, so the algorithm
 * can be swapped without touching its control flow.
 */
export type SimilarityFunction = (a: string, b: string) => number

/**
 * Levenshtein edit distance normalized to a 0-1 similarity
 * (`1 - distance / maxLength`).
 *
 * @example
 * ```typescript
 * levenshtein('kitten', 'sitting') // 1 - 3/7
 * ```
 */
export function levenshtein(a: string, b: string): number {
  if (a.length === 0 && b.length === 0) return 1
  if (a.length === 0 || b.length === 0) return 0

  // Wagner-Fischer, keeping only the previous row
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j)
  for (let i = 1; i <= a.length; i++) {
    const current = [i]
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1
      current[j] = Math.min(
        previous[j] + 1, // deletion
        current[j - 1] + 1, // insertion
        previous[j - 1] + cost // substitution
      )
    }
    previous = current
  }

  return 1 - previous[b.length] / Math.max(a.length, b.length)
}

/**
 * Jaro-Winkler similarity with the standard 0.1 prefix scale over at most
 * four leading characters.
 */
export function jaroWinkler(a: string, b: string): number {
  if (a.length === 0 && b.length === 0) return 1
  if (a.length === 0 || b.length === 0) return 0
  if (a === b) return 1

  const jaro = calculateJaro(a, b)

  let prefixLength = 0
  for (let i = 0; i < Math.min(a.length, b.length, 4); i++) {
    if (a[i] !== b[i]) break
    prefixLength++
  }

  return jaro + prefixLength * 0.1 * (1 - jaro)
}

function calculateJaro(a: string, b: string): number {
  const matchWindow = Math.max(0, Math.floor(Math.max(a.length, b.length) / 2) - 1)
  const matchedA: boolean[] = new Array<boolean>(a.length).fill(false)
  const matchedB: boolean[] = new Array<boolean>(b.length).fill(false)

  let matches = 0
  for (let i = 0; i < a.length; i++) {
    const start = Math.max(0, i - matchWindow)
    const end = Math.min(i + matchWindow + 1, b.length)
    for (let j = start; j < end; j++) {
      if (!matchedB[j] && a[i] === b[j]) {
        matchedA[i] = true
        matchedB[j] = true
        matches++
        break
      }
    }
  }
  if (matches === 0) return 0

  let transpositions = 0
  let k = 0
  for (let i = 0; i < a.length; i++) {
    if (!matchedA[i]) continue
    while (!matchedB[k]) k++
    if (a[i] !== b[k]) transpositions++
    k++
  }

  return (
    (matches / a.length + matches / b.length + (matches - transpositions / 2) / matches) /
    3
  )
}

function longestCommonSubsequence(a: string, b: string): number {
  let previous: number[] = new Array<number>(b.length + 1).fill(0)
  for (let i = 1; i <= a.length; i++) {
    const current: number[] = [0]
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        a[i - 1] === b[j - 1]
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1])
    }
    previous = current
  }
  return previous[b.length]
}

/**
 * Indel similarity: `2 * LCS / (|a| + |b|)`.
 *
 * @example
 * ```typescript
 * ratio('abcd', 'abce') // 0.75
 * ```
 */
export function ratio(a: string, b: string): number {
  const total = a.length + b.length
  if (total === 0) return 1
  return (2 * longestCommonSubsequence(a, b)) / total
}

function sortTokens(value: string): string {
  return nameMatchKey(value).split(' ').filter(Boolean).sort().join(' ')
}

/**
 * Token-sort ratio: both names are reduced to their match key, their words
 * sorted, and the results compared with {@link ratio}. Word order and
 * punctuation therefore do not matter.
 *
 * @example
 * ```typescript
 * tokenSortRatio('Doe, Jane', 'jane doe') // 1
 * ```
 */
export const tokenSortRatio: SimilarityFunction = (a, b) =>
  ratio(sortTokens(a), sortTokens(b))
