/**
 * Completion with a sink state.
 * @packageDocumentation
 */

import type { FiniteAutomaton } from '../types'
import { AutomatonBuilder } from './builder'
import { isComplete } from './classify'
import { freshLabel, sortLabels, usedLabels } from './labels'

/**
 * Default label of the sink state introduced by {@link complete}.
 * @public
 */
export const DEFAULT_SINK_LABEL = 'p'

/**
 * Options for completion.
 * @public
 */
export interface CompleteOptions {
  /**
   * Preferred label for the sink state. A numeric suffix is appended when
   * the label is already taken.
   * @defaultValue 'p'
   */
  sinkLabel?: string
}

/**
 * Make the transition function total over the alphabet.
 *
 * A complete automaton is returned as is. Otherwise a non-accepting sink
 * state is added; every missing (state, symbol) transition goes to the sink,
 * and the sink loops to itself on every symbol. Epsilon is not part of the
 * alphabet and gets no sink transitions.
 *
 * @param automaton - The automaton to complete
 * @param options - Optional configuration
 * @returns A complete automaton recognizing the same language
 *
 * @public
 */
export function complete(automaton: FiniteAutomaton, options: CompleteOptions = {}): FiniteAutomaton {
  if (isComplete(automaton)) {
    return automaton
  }

  const builder = AutomatonBuilder.from(automaton)
  const sink = freshLabel(usedLabels(automaton), options.sinkLabel ?? DEFAULT_SINK_LABEL)
  builder.addState(sink)

  const alphabet = sortLabels(automaton.alphabet)

  for (const state of sortLabels(automaton.states)) {
    const bySymbol = automaton.transitions.get(state)
    for (const symbol of alphabet) {
      if (!bySymbol?.has(symbol)) {
        builder.addTransition(state, symbol, sink)
      }
    }
  }

  for (const symbol of alphabet) {
    builder.addTransition(sink, symbol, sink)
  }

  return builder.build()
}
