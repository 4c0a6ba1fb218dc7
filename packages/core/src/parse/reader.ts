/**
 * Automaton reader - converts the line-oriented text format to an automaton.
 * @packageDocumentation
 */

import type { FiniteAutomaton } from '../types'
import { AutomatonSyntaxError, EPSILON } from '../types'
import { AutomatonBuilder } from '../automaton/builder'

/**
 * Options for reading an automaton description.
 * @public
 */
export interface ParseOptions {
  /**
   * Token that stands for the empty transition in the source text.
   * @defaultValue 'ε'
   */
  epsilon?: string
}

type ListSection = 'States:' | 'Alphabet:' | 'Start:' | 'Accept:'

const LIST_MARKERS: readonly ListSection[] = ['States:', 'Alphabet:', 'Start:', 'Accept:']

const TRANSITIONS_MARKER = 'Transitions:'

/**
 * Parse an automaton description.
 *
 * The format is line-oriented:
 *
 * ```text
 * States: q0 q1
 * Alphabet: a b
 * Start: q0
 * Accept: q1
 * Transitions:
 * q0 a q1
 * q0 b q0
 * ```
 *
 * The transition block ends at the first blank line. Lines that start with
 * no known marker are ignored.
 *
 * @param source - The description text
 * @param options - Optional configuration
 * @returns The described automaton
 * @throws AutomatonSyntaxError if a transition line does not have exactly
 *   three tokens
 *
 * @public
 */
export function parseAutomaton(source: string, options: ParseOptions = {}): FiniteAutomaton {
  const epsilon = options.epsilon ?? EPSILON
  const symbolOf = (token: string): string => (token === epsilon ? EPSILON : token)

  const builder = new AutomatonBuilder()
  const lines = source.split(/\r?\n/)

  const sections: Record<ListSection, (token: string) => void> = {
    'States:': (token) => builder.addState(token),
    'Alphabet:': (token) => builder.addSymbol(symbolOf(token)),
    'Start:': (token) => builder.addStartState(token),
    'Accept:': (token) => builder.addAcceptState(token),
  }

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim()

    if (line.startsWith(TRANSITIONS_MARKER)) {
      i = readTransitions(lines, i + 1, builder, symbolOf)
      continue
    }

    for (const marker of LIST_MARKERS) {
      if (line.startsWith(marker)) {
        tokenize(line.slice(marker.length)).forEach(sections[marker])
        break
      }
    }
  }

  return builder.build()
}

/**
 * Read transition triples starting at `start` until a blank line.
 *
 * @returns Index of the last line consumed
 */
function readTransitions(
  lines: readonly string[],
  start: number,
  builder: AutomatonBuilder,
  symbolOf: (token: string) => string,
): number {
  let i = start

  for (; i < lines.length; i++) {
    const line = lines[i].trim()
    if (line === '') {
      return i
    }

    const tokens = tokenize(line)
    if (tokens.length !== 3) {
      throw new AutomatonSyntaxError(
        'MALFORMED_TRANSITION',
        `Line ${i + 1}: expected "from symbol to", got ${tokens.length} token(s): ${line}`,
        i + 1,
      )
    }

    const [from, symbol, to] = tokens
    builder.addTransition(from, symbolOf(symbol), to)
  }

  return i
}

function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0)
}
