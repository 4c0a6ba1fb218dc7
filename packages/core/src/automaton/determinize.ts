/**
 * NFA to DFA conversion using subset construction.
 * @packageDocumentation
 */

import type { FiniteAutomaton, StateLabel } from '../types'
import { AutomatonLimitError } from '../types'
import { AutomatonBuilder } from './builder'
import { isDeterministic } from './classify'
import { epsilonClosure } from './epsilon-closure'
import { compareLabels, sortLabels } from './labels'

/**
 * Default maximum number of DFA states. Subset construction is unbounded
 * unless a caller sets `maxStates`.
 *
 * @public
 */
export const DEFAULT_MAX_DFA_STATES = Infinity

/**
 * Default prefix of synthesized DFA state names.
 *
 * @public
 */
export const DEFAULT_STATE_PREFIX = 'S'

/**
 * Options for DFA construction.
 *
 * @public
 */
export interface DeterminizeOptions {
  /**
   * Maximum number of DFA states to create before throwing an error.
   * @defaultValue Infinity
   */
  maxStates?: number

  /**
   * Prefix of synthesized state names. States are numbered from 0 in the
   * order they are discovered.
   * @defaultValue 'S'
   */
  statePrefix?: string
}

/**
 * A DFA together with the original states behind each of its states.
 *
 * @public
 */
export interface DeterminizeResult {
  readonly automaton: FiniteAutomaton

  /** Sorted original states for every state of `automaton` */
  readonly subsets: ReadonlyMap<StateLabel, readonly StateLabel[]>
}

interface PendingSubset {
  name: StateLabel
  members: readonly StateLabel[]
}

/**
 * Convert an automaton to an equivalent deterministic one.
 *
 * See {@link determinizeWithSubsets} for the construction.
 *
 * @param nfa - The automaton to determinize
 * @param options - Optional configuration for the conversion
 * @returns An equivalent automaton satisfying `isDeterministic`
 * @throws AutomatonLimitError if DFA state count exceeds the configured limit
 *
 * @public
 */
export function determinize(nfa: FiniteAutomaton, options: DeterminizeOptions = {}): FiniteAutomaton {
  return determinizeWithSubsets(nfa, options).automaton
}

/**
 * Convert an automaton to an equivalent deterministic one, reporting which
 * original states each new state stands for.
 *
 * Each DFA state is the epsilon closure of a set of original states. The
 * initial subset is the union of the closures of every start state. States
 * and symbols are visited in lexicographic order and subsets are processed
 * first-in first-out, so the synthesized names are reproducible: the initial
 * subset is always `S0`.
 *
 * Symbols that lead nowhere from a subset get no transition, so the result
 * may be incomplete. An automaton that is already deterministic is returned
 * unchanged.
 *
 * @param nfa - The automaton to determinize
 * @param options - Optional configuration for the conversion
 * @throws AutomatonLimitError if DFA state count exceeds the configured limit
 *
 * @public
 */
export function determinizeWithSubsets(nfa: FiniteAutomaton, options: DeterminizeOptions = {}): DeterminizeResult {
  if (isDeterministic(nfa)) {
    const subsets = new Map<StateLabel, readonly StateLabel[]>()
    for (const state of sortLabels(nfa.states)) {
      subsets.set(state, [state])
    }
    return { automaton: nfa, subsets }
  }

  const maxStates = options.maxStates ?? DEFAULT_MAX_DFA_STATES
  const prefix = options.statePrefix ?? DEFAULT_STATE_PREFIX
  const alphabet = sortLabels(nfa.alphabet)

  const closures = new Map<StateLabel, ReadonlySet<StateLabel>>()
  for (const state of sortLabels(nfa.states)) {
    closures.set(state, epsilonClosure(nfa, state))
  }
  // Labels referenced without being declared still get a closure
  const closureOf = (state: StateLabel): ReadonlySet<StateLabel> => {
    let closure = closures.get(state)
    if (closure === undefined) {
      closure = epsilonClosure(nfa, state)
      closures.set(state, closure)
    }
    return closure
  }

  const builder = new AutomatonBuilder()
  alphabet.forEach((symbol) => builder.addSymbol(symbol))

  // Map from subset key to DFA state name
  const names = new Map<string, StateLabel>()
  const subsets = new Map<StateLabel, readonly StateLabel[]>()
  const queue: PendingSubset[] = []

  const getOrCreateState = (subset: ReadonlySet<StateLabel>): StateLabel => {
    const members = sortLabels(subset)
    const key = serializeSubset(members)
    const existing = names.get(key)
    if (existing !== undefined) {
      return existing
    }

    if (names.size >= maxStates) {
      throw new AutomatonLimitError(
        'DFA_STATE_LIMIT',
        `DFA construction exceeded limit of ${maxStates} states. ` +
          `Consider raising the maxStates limit.`,
        maxStates,
        names.size + 1,
      )
    }

    const name = `${prefix}${names.size}`
    names.set(key, name)
    subsets.set(name, members)
    builder.addState(name)

    if (members.some((member) => nfa.acceptStates.has(member))) {
      builder.addAcceptState(name)
    }

    queue.push({ name, members })
    return name
  }

  const initial = new Set<StateLabel>()
  for (const start of sortLabels(nfa.startStates)) {
    closureOf(start).forEach((state) => initial.add(state))
  }
  builder.addStartState(getOrCreateState(initial))

  for (let head = 0; head < queue.length; head++) {
    const { name, members } = queue[head]

    for (const symbol of alphabet) {
      const reached = new Set<StateLabel>()

      for (const member of members) {
        const targets = nfa.transitions.get(member)?.get(symbol)
        if (targets === undefined) continue

        for (const target of targets) {
          closureOf(target).forEach((state) => reached.add(state))
        }
      }

      if (reached.size > 0) {
        builder.addTransition(name, symbol, getOrCreateState(reached))
      }
    }
  }

  return { automaton: builder.build(), subsets }
}

/**
 * Serialize a sorted subset to a string key for map lookup.
 */
function serializeSubset(members: readonly StateLabel[]): string {
  return JSON.stringify(members)
}

/**
 * Describe a subset the way it is usually written, e.g. `{q0,q1}`.
 *
 * @public
 */
export function formatSubset(members: readonly StateLabel[]): string {
  return `{${[...members].sort(compareLabels).join(',')}}`
}
