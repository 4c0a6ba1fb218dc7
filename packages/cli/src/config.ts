/**
 * Command line configuration.
 * @packageDocumentation
 */

import { z } from 'zod'

export const USAGE = `
Usage:
  automata <file> [options]
  automata -h | --help
  automata --version

Options:
  -h --help               Show this screen
  --version               Show version
  -s --standardize        Give the automaton a single start state
  -d --determinize        Apply the subset construction
  -c --complete           Add a sink state for missing transitions
  --subsets               Show the original states behind determinized states
  --epsilon=<token>       Token read as the empty transition [default: ε]
  --max-states=<n>        State limit of the subset construction [default: 10000]
  --no-color              Disable colored headings
  --debug-log=<filename>  Write a debug log
`

/**
 * A transformation the driver can apply. Steps run in the order listed here.
 */
export type Step = 'standardize' | 'determinize' | 'complete'

export const STEP_ORDER: readonly Step[] = ['standardize', 'determinize', 'complete']

export interface CliConfig {
  readonly file: string
  readonly steps: readonly Step[]
  readonly epsilon: string
  readonly maxStates: number
  readonly showSubsets: boolean
  readonly color: boolean
  readonly debugLog?: string
}

const optionsSchema = z.object({
  '<file>': z.string().min(1),
  '--standardize': z.boolean().default(false),
  '--determinize': z.boolean().default(false),
  '--complete': z.boolean().default(false),
  '--subsets': z.boolean().default(false),
  '--no-color': z.boolean().default(false),
  '--epsilon': z.string().min(1).default('ε'),
  '--max-states': z.coerce.number().int().positive().default(10_000),
  '--debug-log': z.string().min(1).nullish(),
})

export class ConfigError extends Error {
  readonly issues: readonly string[]

  constructor(issues: readonly string[]) {
    super(`Invalid options:\n${issues.map((issue) => `  ${issue}`).join('\n')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

/**
 * Validate the options parsed from the command line.
 *
 * @param raw - Option map as produced by docopt
 * @throws ConfigError listing every invalid option
 */
export function parseConfig(raw: unknown): CliConfig {
  const result = optionsSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`))
  }

  const options = result.data
  const requested: Record<Step, boolean> = {
    standardize: options['--standardize'],
    determinize: options['--determinize'],
    complete: options['--complete'],
  }

  return {
    file: options['<file>'],
    steps: STEP_ORDER.filter((step) => requested[step]),
    epsilon: options['--epsilon'],
    maxStates: options['--max-states'],
    showSubsets: options['--subsets'],
    color: !options['--no-color'],
    debugLog: options['--debug-log'] ?? undefined,
  }
}
