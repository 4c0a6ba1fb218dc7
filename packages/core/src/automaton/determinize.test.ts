import { describe, it, expect } from 'vitest'
import { determinize, determinizeWithSubsets, formatSubset, DEFAULT_MAX_DFA_STATES } from './determinize'
import { isDeterministic, isComplete } from './classify'
import { complete } from './complete'
import { accepts } from './accepts'
import { AutomatonBuilder } from './builder'
import { parseAutomaton } from '../parse'
import { AutomatonLimitError } from '../types'

// q0 -ε-> q1 -a-> q2
const epsilonNfa = parseAutomaton(`
  States: q0 q1 q2
  Alphabet: a
  Start: q0
  Accept: q2
  Transitions:
  q0 ε q1
  q1 a q2
`)

// Words over {a, b} ending in "ab"
const endsWithAb = parseAutomaton(`
  States: q0 q1 q2
  Alphabet: a b
  Start: q0
  Accept: q2
  Transitions:
  q0 a q0
  q0 b q0
  q0 a q1
  q1 b q2
`)

describe('determinize', () => {
  describe('basic conversion', () => {
    it('returns already deterministic automata unchanged', () => {
      const dfa = parseAutomaton(`
        States: q0 q1
        Alphabet: a
        Start: q0
        Transitions:
        q0 a q1
      `)

      expect(determinize(dfa)).toBe(dfa)
    })

    it('converts simple NFA to DFA', () => {
      expect(isDeterministic(endsWithAb)).toBe(false)

      const dfa = determinize(endsWithAb)

      expect(isDeterministic(dfa)).toBe(true)
      expect(dfa.states).toEqual(new Set(['S0', 'S1', 'S2']))
    })

    it('names states in discovery order', () => {
      const { automaton, subsets } = determinizeWithSubsets(endsWithAb)

      expect(subsets).toEqual(
        new Map([
          ['S0', ['q0']],
          ['S1', ['q0', 'q1']],
          ['S2', ['q0', 'q2']],
        ]),
      )
      expect(automaton.startStates).toEqual(new Set(['S0']))
      expect(automaton.acceptStates).toEqual(new Set(['S2']))
    })

    it('builds the subset transitions', () => {
      const dfa = determinize(endsWithAb)

      expect(dfa.transitions.get('S0')?.get('a')).toEqual(new Set(['S1']))
      expect(dfa.transitions.get('S0')?.get('b')).toEqual(new Set(['S0']))
      expect(dfa.transitions.get('S1')?.get('a')).toEqual(new Set(['S1']))
      expect(dfa.transitions.get('S1')?.get('b')).toEqual(new Set(['S2']))
      expect(dfa.transitions.get('S2')?.get('a')).toEqual(new Set(['S1']))
      expect(dfa.transitions.get('S2')?.get('b')).toEqual(new Set(['S0']))
    })

    it('preserves matching semantics', () => {
      const dfa = determinize(endsWithAb)

      expect(accepts(dfa, ['a', 'b'])).toBe(true)
      expect(accepts(dfa, ['b', 'a', 'a', 'b'])).toBe(true)
      expect(accepts(dfa, ['b', 'a'])).toBe(false)
      expect(accepts(dfa, [])).toBe(false)
    })

    it('keeps the alphabet', () => {
      expect(determinize(endsWithAb).alphabet).toEqual(new Set(['a', 'b']))
    })
  })

  describe('epsilon closure', () => {
    it('starts from the closure of the start state', () => {
      const { automaton, subsets } = determinizeWithSubsets(epsilonNfa)

      expect(subsets.get('S0')).toEqual(['q0', 'q1'])
      expect(automaton.startStates).toEqual(new Set(['S0']))
    })

    it('reaches an accepting state with a single a', () => {
      const { automaton, subsets } = determinizeWithSubsets(epsilonNfa)

      expect(automaton.transitions.get('S0')?.get('a')).toEqual(new Set(['S1']))
      expect(subsets.get('S1')).toEqual(['q2'])
      expect(automaton.acceptStates).toEqual(new Set(['S1']))
      expect(accepts(automaton, ['a'])).toBe(true)
    })

    it('leaves dead symbols without a transition', () => {
      const dfa = determinize(epsilonNfa)

      expect(dfa.transitions.has('S1')).toBe(false)
      expect(isComplete(dfa)).toBe(false)
      expect(isComplete(complete(dfa))).toBe(true)
    })
  })

  describe('several start states', () => {
    it('seeds the initial subset from every start state', () => {
      const nfa = parseAutomaton(`
        States: q0 q1 q2
        Alphabet: a b
        Start: q0 q1
        Accept: q2
        Transitions:
        q0 a q1
        q0 a q2
        q1 b q2
      `)

      const { automaton, subsets } = determinizeWithSubsets(nfa)

      expect(subsets.get('S0')).toEqual(['q0', 'q1'])
      expect(accepts(nfa, ['b'])).toBe(true)
      expect(accepts(automaton, ['b'])).toBe(true)
      expect(accepts(automaton, ['a', 'b'])).toBe(true)
      expect(accepts(automaton, ['b', 'b'])).toBe(false)
    })

    it('creates an empty initial subset when there is no start state', () => {
      const nfa = parseAutomaton(`
        States: q0 q1
        Alphabet: a
        Transitions:
        q0 a q0
        q0 a q1
      `)

      const { automaton, subsets } = determinizeWithSubsets(nfa)

      expect(subsets).toEqual(new Map([['S0', []]]))
      expect(automaton.startStates).toEqual(new Set(['S0']))
      expect(automaton.transitions.size).toBe(0)
    })
  })

  describe('options', () => {
    it('uses a custom state prefix', () => {
      expect(determinize(epsilonNfa, { statePrefix: 'D' }).states).toEqual(new Set(['D0', 'D1']))
    })
  })

  describe('state limit', () => {
    it('has no limit by default', () => {
      expect(DEFAULT_MAX_DFA_STATES).toBe(Infinity)
    })

    it('builds more than ten thousand subsets without options', () => {
      // (a|b)* a (a|b)^13: every subset of the 14 states after q0 is reachable
      const builder = new AutomatonBuilder().addSymbol('a').addSymbol('b').addStartState('q0').addAcceptState('q14')
      builder.addState('q0').addTransition('q0', 'a', 'q0').addTransition('q0', 'b', 'q0').addTransition('q0', 'a', 'q1')
      for (let i = 1; i < 14; i++) {
        builder.addState(`q${i}`).addTransition(`q${i}`, 'a', `q${i + 1}`).addTransition(`q${i}`, 'b', `q${i + 1}`)
      }
      builder.addState('q14')

      const dfa = determinize(builder.build())

      expect(dfa.states.size).toBe(16_384)
      expect(isDeterministic(dfa)).toBe(true)
    })

    it('accepts custom maxStates option', () => {
      const dfa = determinize(endsWithAb, { maxStates: 3 })
      expect(isDeterministic(dfa)).toBe(true)
    })

    it('throws AutomatonLimitError when state limit exceeded', () => {
      expect(() => determinize(endsWithAb, { maxStates: 2 })).toThrow(AutomatonLimitError)
    })

    it('AutomatonLimitError contains limit info', () => {
      try {
        determinize(endsWithAb, { maxStates: 2 })
        expect.fail('Should have thrown')
      } catch (e) {
        expect(e).toBeInstanceOf(AutomatonLimitError)
        if (e instanceof AutomatonLimitError) {
          expect(e.code).toBe('DFA_STATE_LIMIT')
          expect(e.limit).toBe(2)
          expect(e.actual).toBe(3)
        }
      }
    })
  })
})

describe('formatSubset', () => {
  it('writes members in braces', () => {
    expect(formatSubset(['q1', 'q0'])).toBe('{q0,q1}')
  })

  it('writes the empty subset', () => {
    expect(formatSubset([])).toBe('{}')
  })
})
