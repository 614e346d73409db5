import { JsonValue } from './json-value'
import { MemoryParser } from './memory-parser'
import { ParserOptions } from './parser-options'

/**
 * Parses a complete JSON document held in memory.
 * @throws JsonSyntaxError when the input is malformed
 */
export function parse(source: string | Uint8Array, options?: Partial<ParserOptions>): JsonValue {
  return new MemoryParser(source, options).parse()
}
