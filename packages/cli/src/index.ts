/**
 * Command line driver for the automaton engine.
 * @packageDocumentation
 */

export { USAGE, STEP_ORDER, parseConfig, ConfigError, type CliConfig, type Step } from './config'
export { createLogger, type Logger, type LoggerOptions } from './logger'
export { readAutomatonFile, type LoadOptions, type LoadResult } from './load'
export { run, type Output } from './run'
