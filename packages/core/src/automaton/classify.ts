/**
 * Classification predicates.
 * @packageDocumentation
 */

import type { FiniteAutomaton, Classification } from '../types'
import { EPSILON } from '../types'

/**
 * Check that no (state, symbol) pair has more than one destination and that
 * no state has an outgoing epsilon transition.
 *
 * Missing transitions do not make an automaton nondeterministic; they only
 * make it incomplete.
 *
 * @public
 */
export function isDeterministic(automaton: FiniteAutomaton): boolean {
  for (const bySymbol of automaton.transitions.values()) {
    for (const [symbol, targets] of bySymbol) {
      if (symbol === EPSILON && targets.size > 0) {
        return false
      }
      if (targets.size > 1) {
        return false
      }
    }
  }
  return true
}

/**
 * Check that every state has a transition for every alphabet symbol.
 *
 * A state without any transition entry is incomplete even when the
 * alphabet is empty. Epsilon transitions do not count toward completeness.
 *
 * @public
 */
export function isComplete(automaton: FiniteAutomaton): boolean {
  for (const state of automaton.states) {
    const bySymbol = automaton.transitions.get(state)
    if (bySymbol === undefined) {
      return false
    }
    for (const symbol of automaton.alphabet) {
      if (!bySymbol.has(symbol)) {
        return false
      }
    }
  }
  return true
}

/**
 * Check that the automaton has exactly one start state.
 *
 * @public
 */
export function isStandard(automaton: FiniteAutomaton): boolean {
  return automaton.startStates.size === 1
}

/**
 * Evaluate all three predicates.
 *
 * @public
 */
export function classification(automaton: FiniteAutomaton): Classification {
  const deterministic = isDeterministic(automaton)
  const complete = isComplete(automaton)
  const standard = isStandard(automaton)

  const names: string[] = []
  if (deterministic) names.push('deterministic')
  if (complete) names.push('complete')
  if (standard) names.push('standard')

  return {
    deterministic,
    complete,
    standard,
    label: names.length > 0 ? names.join(' ') : 'not recognized',
  }
}

/**
 * Describe the automaton as "deterministic", "complete" and "standard", in
 * that order, keeping only the properties that hold.
 *
 * @returns The space-separated names, or "not recognized" when none hold
 *
 * @public
 */
export function classify(automaton: FiniteAutomaton): string {
  return classification(automaton).label
}
