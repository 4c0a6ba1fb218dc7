/**
 * The driver pipeline: load, report, transform, report.
 * @packageDocumentation
 */

import { Chalk, type ChalkInstance } from 'chalk'
import {
  AutomatonLimitError,
  AutomatonSyntaxError,
  classify,
  complete,
  determinizeWithSubsets,
  formatSubset,
  renderTable,
  standardize,
  type FiniteAutomaton,
  type StateLabel,
} from '@automata-workbench/core'
import type { CliConfig, Step } from './config'
import { readAutomatonFile } from './load'
import type { Logger } from './logger'

/**
 * Where the driver writes. Each call receives one block of text without a
 * trailing newline.
 */
export interface Output {
  write(text: string): void
  error(text: string): void
}

interface StepResult {
  automaton: FiniteAutomaton
  subsets?: ReadonlyMap<StateLabel, readonly StateLabel[]>
}

const STEP_TITLES: Record<Step, string> = {
  standardize: 'Standardized',
  determinize: 'Determinized',
  complete: 'Completed',
}

/**
 * Run the configured pipeline.
 *
 * @returns Process exit code
 */
export async function run(config: CliConfig, output: Output, log: Logger): Promise<number> {
  const chalk = new Chalk({ level: config.color ? 1 : 0 })

  try {
    const loaded = await readAutomatonFile(config.file, { log, epsilon: config.epsilon })
    if (!loaded.found) {
      output.error(`Error: File '${config.file}' not found.`)
    }
    for (const issue of loaded.issues) {
      output.error(`Warning: ${issue.message}`)
    }

    let automaton = loaded.automaton
    report(output, chalk, 'Automaton', automaton)

    for (const step of config.steps) {
      const before = automaton.states.size
      const result = applyStep(step, automaton, config)
      automaton = result.automaton

      log.info({ step, before, after: automaton.states.size }, 'step applied')
      report(output, chalk, STEP_TITLES[step], automaton)

      if (result.subsets && config.showSubsets) {
        for (const [state, members] of result.subsets) {
          output.write(`${state} = ${formatSubset(members)}`)
        }
      }
    }

    return 0
  } catch (err) {
    if (err instanceof AutomatonSyntaxError || err instanceof AutomatonLimitError) {
      log.error({ err }, 'pipeline failed')
      output.error(`Error: ${err.message}`)
      return 1
    }
    throw err
  }
}

function applyStep(step: Step, automaton: FiniteAutomaton, config: CliConfig): StepResult {
  switch (step) {
    case 'standardize':
      return { automaton: standardize(automaton) }
    case 'determinize':
      return determinizeWithSubsets(automaton, { maxStates: config.maxStates })
    case 'complete':
      return { automaton: complete(automaton) }
  }
}

function report(output: Output, chalk: ChalkInstance, title: string, automaton: FiniteAutomaton): void {
  output.write(chalk.bold.cyan(title))
  output.write(renderTable(automaton))
  output.write(`Type: ${classify(automaton)}`)
}
