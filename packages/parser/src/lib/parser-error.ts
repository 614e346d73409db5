export class ParserError extends Error {
  override readonly name: string = 'ParserError'
  override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.cause = cause
  }
}

export type JsonSyntaxErrorKind =
  | 'END_OF_INPUT' // Input exhausted where a value was expected
  | 'UNEXPECTED_TOKEN' // A byte that cannot start or follow a value
  | 'EXPECTED_DELIMITER' // A required structural character is missing
  | 'UNEXPECTED_END' // Malformed continuation of an array, object or literal
  | 'MAX_DEPTH_EXCEEDED'
  | 'NUMBER_OUT_OF_RANGE' // Digit run too large for a double
  | 'INVALID_ENCODING' // String bytes that are not valid UTF-8

/**
 * Raised for malformed input. The whole parse is abandoned; no partial
 * value is returned.
 */
export class JsonSyntaxError extends ParserError {
  override readonly name: string = 'JsonSyntaxError'

  /**
   * @param kind Category of the failure
   * @param description Human readable reason, without position
   * @param position Byte offset where the failure was detected
   * @param token The offending byte, or the expected delimiter, when there is one
   */
  constructor(
    readonly kind: JsonSyntaxErrorKind,
    description: string,
    readonly position: number,
    readonly token?: string,
  ) {
    super(`${description} at position ${position}`)
  }
}
