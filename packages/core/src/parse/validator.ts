/**
 * Automaton validation - checks that every referenced label is declared.
 * @packageDocumentation
 */

import type { FiniteAutomaton, AutomatonIssue } from '../types'
import { EPSILON } from '../types'
import { sortLabels } from '../automaton/labels'

/**
 * Validate an automaton against its structural invariants.
 *
 * Returns issues for:
 * - Start or accept states that are not declared states
 * - Transition sources or destinations that are not declared states
 * - Transitions on symbols outside the alphabet (epsilon excepted)
 *
 * Engine operations accept invalid automata; validation is for readers and
 * callers that want to report problems in their input.
 *
 * @param automaton - The automaton to validate
 * @returns Array of issues (empty if valid)
 *
 * @public
 */
export function validateAutomaton(automaton: FiniteAutomaton): readonly AutomatonIssue[] {
  const issues: AutomatonIssue[] = []

  for (const state of sortLabels(automaton.startStates)) {
    checkState(automaton, state, 'start state', issues)
  }
  for (const state of sortLabels(automaton.acceptStates)) {
    checkState(automaton, state, 'accept state', issues)
  }

  for (const from of sortLabels(automaton.transitions.keys())) {
    checkState(automaton, from, 'transition source', issues)

    const bySymbol = automaton.transitions.get(from)
    if (bySymbol === undefined) continue

    for (const symbol of sortLabels(bySymbol.keys())) {
      if (symbol !== EPSILON && !automaton.alphabet.has(symbol)) {
        issues.push({
          code: 'UNKNOWN_SYMBOL',
          message: `Transition from ${from} uses symbol ${symbol} which is not in the alphabet`,
          state: from,
          symbol,
        })
      }

      for (const to of sortLabels(bySymbol.get(symbol) ?? [])) {
        checkState(automaton, to, 'transition destination', issues)
      }
    }
  }

  return dedupe(issues)
}

/**
 * Check if an automaton is valid (has no issues).
 *
 * @public
 */
export function isValidAutomaton(automaton: FiniteAutomaton): boolean {
  return validateAutomaton(automaton).length === 0
}

function checkState(automaton: FiniteAutomaton, state: string, role: string, issues: AutomatonIssue[]): void {
  if (!automaton.states.has(state)) {
    issues.push({
      code: 'UNKNOWN_STATE',
      message: `Undeclared ${role}: ${state}`,
      state,
    })
  }
}

// The same undeclared destination may be reached from many transitions
function dedupe(issues: readonly AutomatonIssue[]): AutomatonIssue[] {
  const seen = new Set<string>()
  return issues.filter((issue) => {
    const key = issue.message
    if (seen.has(key)) return false
    seen.add(key)
    return true
  })
}
