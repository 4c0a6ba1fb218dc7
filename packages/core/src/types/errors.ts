/**
 * Error codes for automaton reading, validation and construction failures.
 * @public
 */
export type AutomatonErrorCode =
  | 'MALFORMED_TRANSITION' // Transition line without exactly three tokens
  | 'UNKNOWN_STATE' // Label referenced but never declared as a state
  | 'UNKNOWN_SYMBOL' // Transition on a symbol outside the alphabet
  | 'DFA_STATE_LIMIT' // Subset construction exceeded state limit

/**
 * A structural problem found in an automaton.
 * @public
 */
export interface AutomatonIssue {
  /** Issue classification code */
  readonly code: AutomatonErrorCode

  /** Human-readable description */
  readonly message: string

  /** State the issue is about, if any */
  readonly state?: string

  /** Symbol the issue is about, if any */
  readonly symbol?: string
}

/**
 * Error thrown when a textual automaton description cannot be read.
 *
 * @public
 */
export class AutomatonSyntaxError extends Error {
  /** Error classification code */
  readonly code: AutomatonErrorCode

  /** 1-based line number of the offending line */
  readonly line: number

  constructor(code: AutomatonErrorCode, message: string, line: number) {
    super(message)
    this.name = 'AutomatonSyntaxError'
    this.code = code
    this.line = line
  }
}

/**
 * Error thrown when automaton operations exceed configured limits.
 *
 * This occurs during subset construction when the number of reachable
 * subsets grows past the configured maximum.
 *
 * @public
 */
export class AutomatonLimitError extends Error {
  /** Error classification code */
  readonly code: AutomatonErrorCode

  /** The limit that was exceeded */
  readonly limit: number

  /** The actual value that exceeded the limit */
  readonly actual: number

  constructor(code: AutomatonErrorCode, message: string, limit: number, actual: number) {
    super(message)
    this.name = 'AutomatonLimitError'
    this.code = code
    this.limit = limit
    this.actual = actual
  }
}
