/**
 * Tabular rendering of automata.
 * @packageDocumentation
 */

import type { FiniteAutomaton, StateLabel } from '../types'
import { EPSILON } from '../types'
import { sortLabels } from '../automaton/labels'

const EMPTY_CELL = '-'

/**
 * Render the transition table of an automaton as a bordered text grid.
 *
 * Rows are states and columns are symbols, both in lexicographic order. An
 * `ε` column follows the alphabet when the automaton has epsilon
 * transitions. State labels are prefixed with `-->` (start), `<--`
 * (accept) or `<-->` (both).
 *
 * @example
 * ```text
 * +--------+----+----+
 * | State  | a  | b  |
 * +--------+----+----+
 * | --> q0 | q1 | q0 |
 * | <-- q1 | -  | -  |
 * +--------+----+----+
 * ```
 *
 * @public
 */
export function renderTable(automaton: FiniteAutomaton): string {
  const symbols = sortLabels(automaton.alphabet)
  if (hasEpsilonTransitions(automaton)) {
    symbols.push(EPSILON)
  }

  const header = ['State', ...symbols]
  const rows = sortLabels(automaton.states).map((state) => [
    stateCell(automaton, state),
    ...symbols.map((symbol) => transitionCell(automaton, state, symbol)),
  ])

  return formatGrid(header, rows)
}

/**
 * Format a header and rows into a bordered grid with left-aligned cells.
 *
 * @public
 */
export function formatGrid(header: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = header.map((title, column) => Math.max(title.length, ...rows.map((row) => row[column].length)))

  const border = '+' + widths.map((width) => '-'.repeat(width + 2)).join('+') + '+'
  const line = (cells: readonly string[]): string =>
    '| ' + cells.map((cell, column) => cell.padEnd(widths[column])).join(' | ') + ' |'

  const lines = [border, line(header), border]
  if (rows.length > 0) {
    lines.push(...rows.map(line), border)
  }
  return lines.join('\n')
}

function stateCell(automaton: FiniteAutomaton, state: StateLabel): string {
  const start = automaton.startStates.has(state)
  const accept = automaton.acceptStates.has(state)

  if (start && accept) return `<--> ${state}`
  if (accept) return `<-- ${state}`
  if (start) return `--> ${state}`
  return state
}

function transitionCell(automaton: FiniteAutomaton, state: StateLabel, symbol: string): string {
  const targets = automaton.transitions.get(state)?.get(symbol)
  if (targets === undefined || targets.size === 0) {
    return EMPTY_CELL
  }
  return sortLabels(targets).join(' ')
}

function hasEpsilonTransitions(automaton: FiniteAutomaton): boolean {
  for (const bySymbol of automaton.transitions.values()) {
    if (bySymbol.has(EPSILON)) return true
  }
  return false
}
