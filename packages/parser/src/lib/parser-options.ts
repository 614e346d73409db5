export type ParserLogger = Pick<Console, 'debug'>

export interface ParserOptions {
  /**
   * Treat carriage return as insignificant whitespace. Off by default,
   * where only space, horizontal tab and line feed are skipped.
   */
  allowCarriageReturn: boolean

  /**
   * Maximum nesting of objects and arrays before parsing is abandoned.
   */
  maxDepth: number

  /**
   * Receives debug messages about parsing. Nothing is logged without one.
   */
  logger?: ParserLogger
}

export interface FileParserOptions extends ParserOptions {
  /**
   * Number of bytes of data to read at a time. Should
   * be a multiple of 8 since the parser works on Uint8Array
   * buffer.
   */
  bufferSize: number
}
