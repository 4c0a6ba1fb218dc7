/**
 * Automaton construction and transformation.
 * @packageDocumentation
 */

export { AutomatonBuilder, emptyAutomaton } from './builder'
export { isDeterministic, isComplete, isStandard, classify, classification } from './classify'
export { standardize, DEFAULT_START_LABEL, type StandardizeOptions } from './standardize'
export { complete, DEFAULT_SINK_LABEL, type CompleteOptions } from './complete'
export { epsilonClosure, epsilonClosureOfSet } from './epsilon-closure'
export {
  determinize,
  determinizeWithSubsets,
  formatSubset,
  DEFAULT_MAX_DFA_STATES,
  DEFAULT_STATE_PREFIX,
  type DeterminizeOptions,
  type DeterminizeResult,
} from './determinize'
export { accepts } from './accepts'
export { compareLabels, sortLabels, freshLabel, usedLabels } from './labels'
