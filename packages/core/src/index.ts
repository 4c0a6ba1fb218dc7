/**
 * Finite Automaton Engine
 *
 * Classification, standardization, completion and determinization of
 * finite automata with epsilon transitions, plus a reader for a simple text
 * format and a table renderer.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.1.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Automaton types
  StateLabel,
  SymbolLabel,
  TransitionTable,
  FiniteAutomaton,
  Classification,
  // Error types
  AutomatonErrorCode,
  AutomatonIssue,
} from './types'
export { EPSILON, AutomatonSyntaxError, AutomatonLimitError } from './types'

// =============================================================================
// Construction
// =============================================================================

export { AutomatonBuilder, emptyAutomaton } from './automaton'
export { compareLabels, sortLabels, freshLabel, usedLabels } from './automaton'

// =============================================================================
// Classification
// =============================================================================

export { isDeterministic, isComplete, isStandard, classify, classification } from './automaton'

// =============================================================================
// Transformations
// =============================================================================

export { standardize, DEFAULT_START_LABEL, type StandardizeOptions } from './automaton'
export { complete, DEFAULT_SINK_LABEL, type CompleteOptions } from './automaton'
export { epsilonClosure, epsilonClosureOfSet } from './automaton'
export {
  determinize,
  determinizeWithSubsets,
  formatSubset,
  DEFAULT_MAX_DFA_STATES,
  DEFAULT_STATE_PREFIX,
  type DeterminizeOptions,
  type DeterminizeResult,
} from './automaton'
export { accepts } from './automaton'

// =============================================================================
// Reading and Rendering
// =============================================================================

export { parseAutomaton, type ParseOptions } from './parse'
export { validateAutomaton, isValidAutomaton } from './parse'
export { renderTable, formatGrid } from './render'
