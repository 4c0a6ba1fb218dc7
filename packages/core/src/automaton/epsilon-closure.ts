/**
 * Epsilon closure computation.
 * @packageDocumentation
 */

import type { FiniteAutomaton, StateLabel } from '../types'
import { EPSILON } from '../types'

/**
 * Compute the states reachable from `state` through zero or more epsilon
 * transitions. The result always contains `state` itself.
 *
 * @public
 */
export function epsilonClosure(automaton: FiniteAutomaton, state: StateLabel): ReadonlySet<StateLabel> {
  return epsilonClosureOfSet(automaton, [state])
}

/**
 * Union of the epsilon closures of several states.
 *
 * @public
 */
export function epsilonClosureOfSet(automaton: FiniteAutomaton, states: Iterable<StateLabel>): Set<StateLabel> {
  const closure = new Set(states)
  const worklist = [...closure]

  let current = worklist.pop()
  while (current !== undefined) {
    const targets = automaton.transitions.get(current)?.get(EPSILON)

    if (targets) {
      for (const target of targets) {
        if (!closure.has(target)) {
          closure.add(target)
          worklist.push(target)
        }
      }
    }

    current = worklist.pop()
  }

  return closure
}
