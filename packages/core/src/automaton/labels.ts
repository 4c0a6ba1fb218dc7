/**
 * Label ordering and fresh label generation.
 * @packageDocumentation
 */

import type { FiniteAutomaton, StateLabel } from '../types'

/**
 * Lexicographic comparison of state or symbol labels.
 *
 * Every place where iteration order is observable (synthesized state names,
 * rendered rows and columns) sorts with this comparator.
 *
 * @public
 */
export function compareLabels(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Sort labels lexicographically into a new array.
 *
 * @public
 */
export function sortLabels(labels: Iterable<string>): string[] {
  return [...labels].sort(compareLabels)
}

/**
 * Every label the automaton uses: declared states, start and accept states,
 * and transition sources and destinations.
 *
 * @public
 */
export function usedLabels(automaton: FiniteAutomaton): Set<StateLabel> {
  const labels = new Set<StateLabel>([...automaton.states, ...automaton.startStates, ...automaton.acceptStates])

  for (const [from, bySymbol] of automaton.transitions) {
    labels.add(from)
    for (const targets of bySymbol.values()) {
      targets.forEach((target) => labels.add(target))
    }
  }
  return labels
}

/**
 * Pick a label that is not in `taken`.
 *
 * Returns `base` itself when free, otherwise the first of `base1`, `base2`, ...
 * that is free.
 *
 * @param taken - Labels already in use
 * @param base - Preferred label
 *
 * @public
 */
export function freshLabel(taken: ReadonlySet<string>, base: string): string {
  if (!taken.has(base)) {
    return base
  }

  let suffix = 1
  while (taken.has(`${base}${suffix}`)) {
    suffix++
  }
  return `${base}${suffix}`
}
