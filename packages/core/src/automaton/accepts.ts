/**
 * Word acceptance by simulation.
 * @packageDocumentation
 */

import type { FiniteAutomaton, SymbolLabel } from '../types'
import { epsilonClosureOfSet } from './epsilon-closure'

/**
 * Test whether the automaton accepts a word.
 *
 * Uses set-based simulation, so it works on nondeterministic automata with
 * epsilon transitions as well as on DFAs.
 *
 * @param automaton - The automaton to run
 * @param word - Input symbols, in order
 * @returns true if some run ends in an accepting state
 *
 * @public
 */
export function accepts(automaton: FiniteAutomaton, word: readonly SymbolLabel[]): boolean {
  // Start with epsilon closure of the initial states
  let current = epsilonClosureOfSet(automaton, automaton.startStates)

  for (const symbol of word) {
    const next = new Set<string>()

    for (const state of current) {
      const targets = automaton.transitions.get(state)?.get(symbol)
      targets?.forEach((target) => next.add(target))
    }

    current = epsilonClosureOfSet(automaton, next)

    if (current.size === 0) {
      return false // No live states - no match possible
    }
  }

  for (const state of current) {
    if (automaton.acceptStates.has(state)) {
      return true
    }
  }
  return false
}
