/**
 * Reduction to a single start state.
 * @packageDocumentation
 */

import type { FiniteAutomaton } from '../types'
import { AutomatonBuilder } from './builder'
import { isStandard } from './classify'
import { freshLabel, sortLabels, usedLabels } from './labels'

/**
 * Default label of the start state introduced by {@link standardize}.
 * @public
 */
export const DEFAULT_START_LABEL = 'q0_new'

/**
 * Options for standardization.
 * @public
 */
export interface StandardizeOptions {
  /**
   * Preferred label for the new start state. A numeric suffix is appended
   * when the label is already taken.
   * @defaultValue 'q0_new'
   */
  startLabel?: string
}

/**
 * Give the automaton exactly one start state.
 *
 * A standard automaton is returned as is. Otherwise a fresh state receives
 * a copy of every outgoing transition of every original start state and
 * becomes the only start state. The original start states keep their
 * transitions.
 *
 * The new state accepts when any original start state accepts, so the
 * empty word stays in the language.
 *
 * @param automaton - The automaton to standardize
 * @param options - Optional configuration
 * @returns A standard automaton recognizing the same language
 *
 * @public
 */
export function standardize(automaton: FiniteAutomaton, options: StandardizeOptions = {}): FiniteAutomaton {
  if (isStandard(automaton)) {
    return automaton
  }

  const builder = AutomatonBuilder.from(automaton)
  const start = freshLabel(usedLabels(automaton), options.startLabel ?? DEFAULT_START_LABEL)
  builder.addState(start)

  for (const original of sortLabels(automaton.startStates)) {
    const bySymbol = automaton.transitions.get(original)
    if (bySymbol) {
      for (const [symbol, targets] of bySymbol) {
        for (const target of targets) {
          builder.addTransition(start, symbol, target)
        }
      }
    }

    if (automaton.acceptStates.has(original)) {
      builder.addAcceptState(start)
    }
  }

  return builder.setStartStates([start]).build()
}
