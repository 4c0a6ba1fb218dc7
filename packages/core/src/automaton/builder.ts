/**
 * Incremental automaton construction.
 * @packageDocumentation
 */

import type { FiniteAutomaton, StateLabel, SymbolLabel } from '../types'
import { EPSILON } from '../types'

/**
 * Mutable builder for {@link FiniteAutomaton} values.
 *
 * Every `add*` method is idempotent and may be called in any order. The
 * builder does not check that referenced states were declared; the text
 * reader declares states before it references them, and
 * `validateAutomaton` reports anything left undeclared.
 *
 * @example
 * ```ts
 * const automaton = new AutomatonBuilder()
 *   .addState('q0')
 *   .addState('q1')
 *   .addSymbol('a')
 *   .addStartState('q0')
 *   .addAcceptState('q1')
 *   .addTransition('q0', 'a', 'q1')
 *   .build()
 * ```
 *
 * @public
 */
export class AutomatonBuilder {
  private readonly states = new Set<StateLabel>()
  private readonly alphabet = new Set<SymbolLabel>()
  private readonly startStates = new Set<StateLabel>()
  private readonly acceptStates = new Set<StateLabel>()
  private readonly transitions = new Map<StateLabel, Map<SymbolLabel, Set<StateLabel>>>()

  /**
   * Start a builder holding a copy of an existing automaton.
   */
  static from(automaton: FiniteAutomaton): AutomatonBuilder {
    const builder = new AutomatonBuilder()
    automaton.states.forEach((state) => builder.addState(state))
    automaton.alphabet.forEach((symbol) => builder.addSymbol(symbol))
    automaton.startStates.forEach((state) => builder.addStartState(state))
    automaton.acceptStates.forEach((state) => builder.addAcceptState(state))

    for (const [from, bySymbol] of automaton.transitions) {
      for (const [symbol, targets] of bySymbol) {
        for (const to of targets) {
          builder.addTransition(from, symbol, to)
        }
      }
    }

    return builder
  }

  addState(state: StateLabel): this {
    this.states.add(state)
    return this
  }

  /**
   * Add an input symbol. Adding {@link EPSILON} has no effect.
   */
  addSymbol(symbol: SymbolLabel): this {
    if (symbol !== EPSILON) {
      this.alphabet.add(symbol)
    }
    return this
  }

  addStartState(state: StateLabel): this {
    this.startStates.add(state)
    return this
  }

  addAcceptState(state: StateLabel): this {
    this.acceptStates.add(state)
    return this
  }

  /**
   * Replace the start states with exactly the given ones.
   */
  setStartStates(states: Iterable<StateLabel>): this {
    this.startStates.clear()
    for (const state of states) {
      this.startStates.add(state)
    }
    return this
  }

  addTransition(from: StateLabel, symbol: SymbolLabel, to: StateLabel): this {
    let bySymbol = this.transitions.get(from)
    if (bySymbol === undefined) {
      bySymbol = new Map()
      this.transitions.set(from, bySymbol)
    }

    let targets = bySymbol.get(symbol)
    if (targets === undefined) {
      targets = new Set()
      bySymbol.set(symbol, targets)
    }

    targets.add(to)
    return this
  }

  /** Labels currently declared as states */
  get stateLabels(): ReadonlySet<StateLabel> {
    return this.states
  }

  /**
   * Snapshot the builder into an automaton.
   *
   * The snapshot owns its collections: later calls on the builder do not
   * affect it.
   */
  build(): FiniteAutomaton {
    const transitions = new Map<StateLabel, ReadonlyMap<SymbolLabel, ReadonlySet<StateLabel>>>()
    for (const [from, bySymbol] of this.transitions) {
      const copy = new Map<SymbolLabel, ReadonlySet<StateLabel>>()
      for (const [symbol, targets] of bySymbol) {
        copy.set(symbol, new Set(targets))
      }
      transitions.set(from, copy)
    }

    return {
      states: new Set(this.states),
      alphabet: new Set(this.alphabet),
      startStates: new Set(this.startStates),
      acceptStates: new Set(this.acceptStates),
      transitions,
    }
  }
}

/**
 * An automaton with no states and no symbols.
 *
 * @public
 */
export function emptyAutomaton(): FiniteAutomaton {
  return new AutomatonBuilder().build()
}
