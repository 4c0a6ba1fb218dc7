// =============================================================================
// LABELS
// =============================================================================

/**
 * Opaque identifier of a state.
 * @public
 */
export type StateLabel = string

/**
 * An input symbol. {@link EPSILON} is reserved for the empty transition.
 * @public
 */
export type SymbolLabel = string

/**
 * The reserved symbol of an epsilon (empty) transition.
 *
 * It is never part of an automaton's alphabet: completeness is checked
 * against the non-epsilon symbols only.
 *
 * @public
 */
export const EPSILON: SymbolLabel = 'ε'

// =============================================================================
// FINITE AUTOMATON
// =============================================================================

/**
 * Transition relation as a two-level mapping: state, then symbol, then the
 * set of destinations.
 *
 * A state only has an entry when it has at least one outgoing transition,
 * and a symbol only has an entry when its destination set is non-empty, so
 * a missing entry always means "no transition defined".
 *
 * @public
 */
export type TransitionTable = ReadonlyMap<StateLabel, ReadonlyMap<SymbolLabel, ReadonlySet<StateLabel>>>

/**
 * A nondeterministic finite automaton with optional epsilon transitions.
 *
 * Values are immutable: operations that change an automaton return a new
 * one with its own collections, so two automata never share a set or map.
 *
 * Labels used in `startStates`, `acceptStates` and `transitions` are expected
 * to appear in `states`. The engine does not enforce this; see
 * `validateAutomaton`.
 *
 * @public
 */
export interface FiniteAutomaton {
  /** All states */
  readonly states: ReadonlySet<StateLabel>

  /** Input symbols, never containing {@link EPSILON} */
  readonly alphabet: ReadonlySet<SymbolLabel>

  /** Initial states. Exactly one makes the automaton standard. */
  readonly startStates: ReadonlySet<StateLabel>

  /** Accepting (final) states */
  readonly acceptStates: ReadonlySet<StateLabel>

  /** Transition relation */
  readonly transitions: TransitionTable
}

/**
 * Result of the three classification predicates.
 * @public
 */
export interface Classification {
  readonly deterministic: boolean
  readonly complete: boolean
  readonly standard: boolean

  /** Space-separated names of the properties that hold, or "not recognized" */
  readonly label: string
}
