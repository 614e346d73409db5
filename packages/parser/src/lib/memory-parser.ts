import { Parser } from './parser'
import { ParserOptions } from './parser-options'
import { JsonValue } from './json-value'

export class MemoryParser extends Parser {
  #input: Uint8Array

  constructor(input: string | Uint8Array, options?: Partial<ParserOptions>) {
    super(options)

    if (input instanceof Uint8Array) {
      this.#input = input
    } else {
      this.#input = new TextEncoder().encode(input)
    }
  }

  /**
   * Parses the provided input into a value tree. Each call starts again
   * from the beginning of the input.
   */
  override parse(): JsonValue {
    return this.parseBuffer(this.#input)
  }
}
