import { isUtf8 } from 'node:buffer'

/**
 * Returned by reads past the end of the input. Lies outside the byte range so
 * it can never be mistaken for an input byte.
 */
export const END_OF_INPUT = -1

const decoder = new TextDecoder()

/**
 * Holds onto the state of a single parse: the input bytes and a cursor that
 * only ever moves forward.
 */
export class ParserState {
  cursor = 0
  depth = 0
  readonly #input: Uint8Array
  readonly #whitespace: ReadonlySet<number>

  constructor(input: Uint8Array, whitespace: Iterable<number>) {
    this.#input = input
    this.#whitespace = new Set(whitespace)
  }

  get length(): number {
    return this.#input.length
  }

  isEnd(): boolean {
    return this.cursor >= this.#input.length
  }

  /**
   * Byte at the cursor, or END_OF_INPUT.
   */
  current(): number {
    return this.#byteAt(this.cursor)
  }

  /**
   * Byte after the cursor, or END_OF_INPUT.
   */
  lookahead(): number {
    return this.#byteAt(this.cursor + 1)
  }

  /**
   * Consumes an ASCII literal if the input continues with it exactly.
   * @returns Whether the literal was consumed
   */
  consume(literal: string): boolean {
    if (this.cursor + literal.length > this.#input.length) {
      return false
    }
    for (let index = 0; index < literal.length; index++) {
      if (this.#input[this.cursor + index] !== literal.charCodeAt(index)) {
        return false
      }
    }
    this.cursor += literal.length
    return true
  }

  consumeByte(charCode: number): boolean {
    if (this.current() !== charCode) {
      return false
    }
    this.cursor++
    return true
  }

  skipWhitespace(): void {
    while (!this.isEnd() && this.#whitespace.has(this.current())) {
      this.cursor++
    }
  }

  /**
   * Whether the bytes between two offsets are well-formed UTF-8.
   */
  isUtf8(start: number, end: number): boolean {
    return isUtf8(this.#input.subarray(start, end))
  }

  /**
   * Decodes the UTF-8 bytes between two offsets. Malformed sequences decode
   * to U+FFFD; check them with isUtf8 first where that matters.
   */
  slice(start: number, end: number): string {
    return decoder.decode(this.#input.subarray(start, end))
  }

  #byteAt(index: number): number {
    return index < this.#input.length ? this.#input[index] : END_OF_INPUT
  }
}
