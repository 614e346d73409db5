import {
  AllowedWhitespaceToken,
  Token,
  NumberValueLiteralToken,
  ValueLiteralStartToken,
  TRUE_LITERAL,
  FALSE_LITERAL,
  NULL_LITERAL,
  isDigit,
} from './charset'
import {
  JsonValue,
  ObjectJsonValue,
  ArrayJsonValue,
  StringJsonValue,
  NumberJsonValue,
  BooleanJsonValue,
  NullJsonValue,
  objectValue,
  arrayValue,
  stringValue,
  numberValue,
  booleanValue,
  NULL_VALUE,
} from './json-value'
import { JsonSyntaxError, JsonSyntaxErrorKind } from './parser-error'
import { ParserOptions } from './parser-options'
import { END_OF_INPUT, ParserState } from './parser-state'

export abstract class Parser {
  readonly options: ParserOptions
  readonly #whitespace: AllowedWhitespaceToken[]

  constructor(option: Partial<ParserOptions> = {}) {
    this.options = {
      allowCarriageReturn: false,
      maxDepth: 512,
      ...option,
    }

    if (Number.isNaN(this.options.maxDepth) || this.options.maxDepth < 1) {
      this.options.maxDepth = 1
    } else {
      this.options.maxDepth = Math.floor(this.options.maxDepth)
    }

    this.#whitespace = [
      AllowedWhitespaceToken.SPACE,
      AllowedWhitespaceToken.HORIZONTAL_TAB,
      AllowedWhitespaceToken.LINE_FEED,
    ]
    if (this.options.allowCarriageReturn) {
      this.#whitespace.push(AllowedWhitespaceToken.CARRIAGE_RETURN)
    }
  }

  abstract parse(): JsonValue | Promise<JsonValue>

  /**
   * Main logic of parsing the input into a value tree. The whole input
   * must hold exactly one value, optionally surrounded by whitespace.
   * @param input Complete UTF-8 encoded input
   */
  protected parseBuffer(input: Uint8Array): JsonValue {
    const parserState = new ParserState(input, this.#whitespace)

    try {
      const value = this.#parseValue(parserState)

      parserState.skipWhitespace()
      if (!parserState.isEnd()) {
        throw this.#unexpectedToken(parserState)
      }

      this.options.logger?.debug(`Parsed ${input.length} bytes`)
      return value
    } catch (err) {
      if (err instanceof JsonSyntaxError) {
        this.options.logger?.debug(err.message)
      }
      throw err
    }
  }

  #parseValue(parserState: ParserState): JsonValue {
    parserState.skipWhitespace()
    if (parserState.isEnd()) {
      throw this.#syntaxError(parserState, 'END_OF_INPUT', 'Unexpected end of JSON input')
    }

    const charCode = parserState.current()
    switch (charCode) {
      case Token.LEFT_CURLY_BRACKET:
        return this.#parseObject(parserState)
      case Token.LEFT_SQUARE_BRACKET:
        return this.#parseArray(parserState)
      case Token.DOUBLE_QUOTE:
        return this.#parseString(parserState)
      case ValueLiteralStartToken.T:
      case ValueLiteralStartToken.F:
        return this.#parseBoolean(parserState)
      case ValueLiteralStartToken.N:
        return this.#parseNull(parserState)
      case NumberValueLiteralToken.MINUS:
      case NumberValueLiteralToken.PLUS:
        return this.#parseNumber(parserState)
    }

    if (isDigit(charCode)) {
      return this.#parseNumber(parserState)
    }

    throw this.#unexpectedToken(parserState)
  }

  #parseObject(parserState: ParserState): ObjectJsonValue {
    this.#expect(parserState, Token.LEFT_CURLY_BRACKET, "Expected '{' at start of object")
    this.#enter(parserState)

    const entries = new Map<string, JsonValue>()
    parserState.skipWhitespace()
    while (!parserState.isEnd() && parserState.current() !== Token.RIGHT_CURLY_BRACKET) {
      parserState.skipWhitespace()
      const key = this.#lexString(parserState)

      parserState.skipWhitespace()
      this.#expect(parserState, Token.COLON, "Expected ':' after property name in JSON")
      entries.set(key, this.#parseValue(parserState))

      parserState.skipWhitespace()
      if (!parserState.consumeByte(Token.COMMA)) {
        break
      }

      parserState.skipWhitespace()
      if (parserState.current() === Token.RIGHT_CURLY_BRACKET) {
        throw this.#syntaxError(parserState, 'UNEXPECTED_END', 'Trailing comma in object', '}')
      }
    }

    this.#expect(parserState, Token.RIGHT_CURLY_BRACKET, "Expected ',' or '}' after property value in JSON")
    parserState.depth--
    return objectValue(entries)
  }

  #parseArray(parserState: ParserState): ArrayJsonValue {
    this.#expect(parserState, Token.LEFT_SQUARE_BRACKET, "Expected '[' at start of array")
    this.#enter(parserState)

    const items: JsonValue[] = []
    parserState.skipWhitespace()
    if (parserState.current() !== Token.RIGHT_SQUARE_BRACKET) {
      while (!parserState.isEnd()) {
        items.push(this.#parseValue(parserState))

        parserState.skipWhitespace()
        if (parserState.current() === Token.RIGHT_SQUARE_BRACKET) {
          break
        }
        if (parserState.consumeByte(Token.COMMA)) {
          parserState.skipWhitespace()
          if (parserState.current() === Token.RIGHT_SQUARE_BRACKET) {
            throw this.#syntaxError(parserState, 'UNEXPECTED_END', 'Trailing comma in array', ']')
          }
          continue
        }

        throw this.#syntaxError(
          parserState,
          'UNEXPECTED_END',
          "Expected ',' or ']' after array element in JSON",
          this.#tokenAt(parserState),
        )
      }
    }

    this.#expect(parserState, Token.RIGHT_SQUARE_BRACKET, "Expected ']' at end of array")
    parserState.depth--
    return arrayValue(items)
  }

  #parseString(parserState: ParserState): StringJsonValue {
    return stringValue(this.#lexString(parserState))
  }

  /**
   * Reads the raw text between two double quotes. Escape sequences are not
   * interpreted, so a backslash before a quote does not keep the string open.
   */
  #lexString(parserState: ParserState): string {
    this.#expect(parserState, Token.DOUBLE_QUOTE, 'Expected double-quoted string in JSON')

    const start = parserState.cursor
    while (!parserState.isEnd() && parserState.current() !== Token.DOUBLE_QUOTE) {
      parserState.cursor++
    }
    const end = parserState.cursor

    this.#expect(parserState, Token.DOUBLE_QUOTE, 'Unterminated string in JSON')
    if (!parserState.isUtf8(start, end)) {
      throw new JsonSyntaxError('INVALID_ENCODING', 'Invalid UTF-8 in string', start - 1)
    }
    return parserState.slice(start, end)
  }

  #parseBoolean(parserState: ParserState): BooleanJsonValue {
    if (parserState.consume(TRUE_LITERAL)) {
      return booleanValue(true)
    }
    if (parserState.consume(FALSE_LITERAL)) {
      return booleanValue(false)
    }

    throw this.#syntaxError(
      parserState,
      'UNEXPECTED_END',
      `Invalid literal, expected '${TRUE_LITERAL}' or '${FALSE_LITERAL}'`,
      this.#tokenAt(parserState),
    )
  }

  /**
   * Reads an optionally signed run of decimal digits, rounded to the nearest
   * double. A leading '+' is accepted and ignored. Fractions and exponents
   * are left unconsumed.
   */
  #parseNumber(parserState: ParserState): NumberJsonValue {
    const sign = parserState.current()
    if (
      (sign === NumberValueLiteralToken.MINUS || sign === NumberValueLiteralToken.PLUS) &&
      !isDigit(parserState.lookahead())
    ) {
      throw this.#syntaxError(
        parserState,
        'UNEXPECTED_TOKEN',
        `Expected digit after '${String.fromCharCode(sign)}'`,
        String.fromCharCode(sign),
      )
    }

    const start = parserState.cursor
    const negative = parserState.consumeByte(NumberValueLiteralToken.MINUS)
    if (!negative) {
      parserState.consumeByte(NumberValueLiteralToken.PLUS)
    }

    const digitsStart = parserState.cursor
    while (!parserState.isEnd() && isDigit(parserState.current())) {
      parserState.cursor++
    }

    const value = Number(parserState.slice(digitsStart, parserState.cursor))
    if (!Number.isFinite(value)) {
      throw new JsonSyntaxError('NUMBER_OUT_OF_RANGE', 'Number out of range', start)
    }

    return numberValue(negative ? -value : value)
  }

  #parseNull(parserState: ParserState): NullJsonValue {
    if (!parserState.consume(NULL_LITERAL)) {
      throw this.#syntaxError(
        parserState,
        'UNEXPECTED_END',
        `Invalid literal, expected '${NULL_LITERAL}'`,
        this.#tokenAt(parserState),
      )
    }

    return NULL_VALUE
  }

  #enter(parserState: ParserState): void {
    parserState.depth++
    if (parserState.depth > this.options.maxDepth) {
      throw this.#syntaxError(
        parserState,
        'MAX_DEPTH_EXCEEDED',
        `Maximum nesting depth of ${this.options.maxDepth} exceeded`,
      )
    }
  }

  #expect(parserState: ParserState, delimiter: Token, description: string): void {
    if (!parserState.consumeByte(delimiter)) {
      throw this.#syntaxError(parserState, 'EXPECTED_DELIMITER', description, String.fromCharCode(delimiter))
    }
  }

  #unexpectedToken(parserState: ParserState): JsonSyntaxError {
    const token = this.#tokenAt(parserState)
    return this.#syntaxError(parserState, 'UNEXPECTED_TOKEN', `Unexpected token '${token}'`, token)
  }

  #tokenAt(parserState: ParserState): string | undefined {
    const charCode = parserState.current()
    return charCode === END_OF_INPUT ? undefined : String.fromCharCode(charCode)
  }

  #syntaxError(
    parserState: ParserState,
    kind: JsonSyntaxErrorKind,
    description: string,
    token?: string,
  ): JsonSyntaxError {
    return new JsonSyntaxError(kind, description, parserState.cursor, token)
  }
}
