/**
 * Reading automata from files.
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises'
import {
  emptyAutomaton,
  parseAutomaton,
  validateAutomaton,
  type AutomatonIssue,
  type FiniteAutomaton,
} from '@automata-workbench/core'
import type { Logger } from './logger'

export interface LoadOptions {
  log: Logger

  /** Token read as the empty transition */
  epsilon?: string
}

export interface LoadResult {
  readonly automaton: FiniteAutomaton

  /** false when the file does not exist */
  readonly found: boolean

  /** Undeclared labels and symbols found in the description */
  readonly issues: readonly AutomatonIssue[]
}

/**
 * Read and parse an automaton description file.
 *
 * A missing file is not an error: it is logged and yields the empty
 * automaton. Syntax errors and other read failures propagate.
 *
 * @throws AutomatonSyntaxError if the description is malformed
 */
export async function readAutomatonFile(path: string, options: LoadOptions): Promise<LoadResult> {
  const { log } = options

  let source: string
  try {
    source = await readFile(path, 'utf8')
  } catch (err) {
    if (isNotFound(err)) {
      log.error({ path }, 'automaton file not found')
      return { automaton: emptyAutomaton(), found: false, issues: [] }
    }
    throw err
  }

  const automaton = parseAutomaton(source, { epsilon: options.epsilon })
  const issues = validateAutomaton(automaton)
  for (const issue of issues) {
    log.warn({ code: issue.code, state: issue.state, symbol: issue.symbol }, issue.message)
  }

  log.debug(
    { path, states: automaton.states.size, symbols: automaton.alphabet.size },
    'automaton loaded',
  )
  return { automaton, found: true, issues }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
