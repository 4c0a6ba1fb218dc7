/**
 * Type definitions for finite automata.
 * @packageDocumentation
 */

// Automaton types
export type { StateLabel, SymbolLabel, TransitionTable, FiniteAutomaton, Classification } from './automaton'
export { EPSILON } from './automaton'

// Error types
export type { AutomatonErrorCode, AutomatonIssue } from './errors'
export { AutomatonSyntaxError, AutomatonLimitError } from './errors'
