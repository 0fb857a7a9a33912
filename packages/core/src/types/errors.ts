/**
 * Error codes for pattern insertion and single-string matching failures.
 * @public
 */
export type TableErrorCode =
  | 'INVALID_STRING' // non-ASCII pattern or query
  | 'INVALID_INPUT' // character outside the alphabet
  | 'INVALID_RANGE' // [abc without ], [], [+, or + with nothing to repeat
  | 'EMPTY_PATTERN' // ''
  | 'LOCATION_OCCUPIED' // a+ where the state already moves elsewhere on a
  | 'VALUE_ALREADY_DEFINED' // pattern (or an overlapping one) already stored
  | 'NODE_LIMIT' // trie grew past the configured node limit

/**
 * Error codes for tokenizer failures.
 * @public
 */
export type LexerErrorCode =
  | 'INVALID_STRING' // non-ASCII input, reported before scanning
  | 'UNKNOWN_CHAR' // character outside the alphabet, mid-scan
  | 'UNEXPECTED_END' // no pattern accepts any prefix at this position

/**
 * Extra details attached to a {@link TableError}.
 * @public
 */
export interface TableErrorDetails {
  /** 0-based position in the pattern or query where the problem starts */
  readonly position?: number

  /** The offending character, when there is one */
  readonly char?: string
}

/**
 * An error raised while adding a pattern to a table or matching a query against it.
 *
 * Errors are returned inside a {@link Result} rather than thrown; they extend `Error`
 * so callers are free to throw them.
 *
 * @public
 */
export class TableError extends Error {
  /** Error classification code */
  readonly code: TableErrorCode

  /** 0-based position where the problem starts */
  readonly position?: number

  /** The offending character */
  readonly char?: string

  constructor(code: TableErrorCode, message: string, details: TableErrorDetails = {}) {
    super(message)
    this.name = 'TableError'
    this.code = code
    this.position = details.position
    this.char = details.char
  }
}

/**
 * Raised when a pattern ends on a trie state that already carries a value.
 *
 * Both values are kept so the caller can report which pattern conflicted.
 *
 * @public
 */
export class ValueAlreadyDefinedError<T> extends TableError {
  /** The value already stored at the conflicting state */
  readonly current: T

  /** The value the failed insertion tried to store */
  readonly requested: T

  /** Source of the pattern being inserted */
  readonly pattern: string

  constructor(pattern: string, current: T, requested: T) {
    super('VALUE_ALREADY_DEFINED', `Value already defined for pattern '${pattern}'`)
    this.name = 'ValueAlreadyDefinedError'
    this.pattern = pattern
    this.current = current
    this.requested = requested
  }
}

/**
 * Raised when an insertion would grow the trie past its node limit.
 *
 * @public
 */
export class NodeLimitError extends TableError {
  /** The limit that was exceeded */
  readonly limit: number

  /** The node count the insertion asked for */
  readonly actual: number

  constructor(limit: number, actual: number) {
    super('NODE_LIMIT', `Trie exceeded limit of ${limit} nodes. Split the pattern set or raise maxNodes.`)
    this.name = 'NodeLimitError'
    this.limit = limit
    this.actual = actual
  }
}

/**
 * An error yielded by a tokenizer session, or returned when one cannot start.
 *
 * @public
 */
export class LexerError extends Error {
  /** Error classification code */
  readonly code: LexerErrorCode

  /** 0-based offset into the input */
  readonly position: number

  /** The offending character, for `UNKNOWN_CHAR` */
  readonly char?: string

  constructor(code: LexerErrorCode, message: string, position: number, char?: string) {
    super(message)
    this.name = 'LexerError'
    this.code = code
    this.position = position
    this.char = char
  }
}
