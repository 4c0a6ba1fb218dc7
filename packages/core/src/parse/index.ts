/**
 * Reading and validating automaton descriptions.
 * @packageDocumentation
 */

export { parseAutomaton, type ParseOptions } from './reader'
export { validateAutomaton, isValidAutomaton } from './validator'
