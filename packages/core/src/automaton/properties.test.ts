import { describe, it, expect } from 'vitest'
import type { FiniteAutomaton } from '../types'
import { accepts } from './accepts'
import { isDeterministic, isStandard, isComplete } from './classify'
import { complete } from './complete'
import { determinize } from './determinize'
import { standardize } from './standardize'
import { emptyAutomaton } from './builder'
import { sortLabels } from './labels'
import { parseAutomaton } from '../parse'

const samples: Record<string, FiniteAutomaton> = {
  'incomplete DFA': parseAutomaton(`
    States: q0 q1
    Alphabet: a b
    Start: q0
    Accept: q1
    Transitions:
    q0 a q1
    q0 b q0
  `),
  'NFA ending in ab': parseAutomaton(`
    States: q0 q1 q2
    Alphabet: a b
    Start: q0
    Accept: q2
    Transitions:
    q0 a q0
    q0 b q0
    q0 a q1
    q1 b q2
  `),
  'epsilon NFA with two start states': parseAutomaton(`
    States: s t u v
    Alphabet: a b
    Start: s u
    Accept: u v
    Transitions:
    s ε t
    t a v
    t b s
    u b u
    v ε s
  `),
  'empty automaton': emptyAutomaton(),
}

/**
 * Every word over the alphabet up to the given length.
 */
function wordsUpTo(automaton: FiniteAutomaton, maxLength: number): string[][] {
  const symbols = sortLabels(automaton.alphabet)
  const words: string[][] = [[]]
  let frontier: string[][] = [[]]

  for (let length = 1; length <= maxLength; length++) {
    frontier = frontier.flatMap((word) => symbols.map((symbol) => [...word, symbol]))
    words.push(...frontier)
  }
  return words
}

function expectSameLanguage(actual: FiniteAutomaton, expected: FiniteAutomaton): void {
  for (const word of wordsUpTo(expected, 4)) {
    expect(accepts(actual, word), `word "${word.join('')}"`).toBe(accepts(expected, word))
  }
}

describe.each(Object.entries(samples))('%s', (_name, automaton) => {
  it('completes idempotently', () => {
    const once = complete(automaton)
    expect(complete(once).transitions).toEqual(once.transitions)
    expect(isComplete(once)).toBe(true)
  })

  it('standardizes idempotently', () => {
    const once = standardize(automaton)
    expect(standardize(once).startStates).toEqual(once.startStates)
    expect(isStandard(once)).toBe(true)
  })

  it('determinizes to a deterministic automaton', () => {
    expect(isDeterministic(determinize(automaton))).toBe(true)
  })

  it('preserves the language through every transformation', () => {
    expectSameLanguage(standardize(automaton), automaton)
    expectSameLanguage(complete(automaton), automaton)
    expectSameLanguage(determinize(automaton), automaton)
    expectSameLanguage(complete(determinize(standardize(automaton))), automaton)
  })
})
