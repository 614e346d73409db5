export enum AllowedWhitespaceToken {
  SPACE = 0x20,
  HORIZONTAL_TAB = 0x9, // "\t"
  LINE_FEED = 0xa, // "\n"
  CARRIAGE_RETURN = 0xd, // "\r"
}

export enum Token {
  // Array tokens
  LEFT_SQUARE_BRACKET = 0x5b, // [
  RIGHT_SQUARE_BRACKET = 0x5d, // ]

  // Object tokens
  LEFT_CURLY_BRACKET = 0x7b, // {
  RIGHT_CURLY_BRACKET = 0x7d, // }

  // Value separation tokens
  COLON = 0x3a, // :
  COMMA = 0x2c, // ,

  // String tokens
  DOUBLE_QUOTE = 0x22, // "
}

export enum NumberValueLiteralToken {
  PLUS = 0x2b, // +
  MINUS = 0x2d, // -
  ZERO = 0x30, // 0
  NINE = 0x39, // 9
}

export enum ValueLiteralStartToken {
  T = 0x74, // t
  F = 0x66, // f
  N = 0x6e, // n
}

export const TRUE_LITERAL = 'true'
export const FALSE_LITERAL = 'false'
export const NULL_LITERAL = 'null'

export function isDigit(charCode: number): boolean {
  return charCode >= NumberValueLiteralToken.ZERO && charCode <= NumberValueLiteralToken.NINE
}
