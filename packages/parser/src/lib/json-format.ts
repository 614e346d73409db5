import { JsonValue } from './json-value'

export type Json = null | boolean | number | string | ReadonlyArray<Json> | { readonly [key: string]: Json }

/**
 * Serializes a value tree to JSON text. Strings are written raw between
 * quotes, the same way the parser reads them, so output of a parsed tree
 * parses back to an equal tree.
 * @param space Number of spaces to indent each nesting level by, 0 for compact output
 */
export function stringify(value: JsonValue, space = 0): string {
  return write(value, ' '.repeat(Math.max(0, Math.floor(space))), '')
}

function write(value: JsonValue, indent: string, current: string): string {
  switch (value.type) {
    case 'OBJECT': {
      if (value.entries.size === 0) {
        return '{}'
      }
      const inner = current + indent
      const members = [...value.entries].map(
        ([key, member]) => `${inner}"${key}":${indent ? ' ' : ''}${write(member, indent, inner)}`,
      )
      return wrap('{', members, '}', indent, current)
    }
    case 'ARRAY': {
      if (value.items.length === 0) {
        return '[]'
      }
      const inner = current + indent
      const items = value.items.map((item) => inner + write(item, indent, inner))
      return wrap('[', items, ']', indent, current)
    }
    case 'STRING':
      return `"${value.value}"`
    case 'NUMBER':
      return writeNumber(value.value)
    case 'BOOLEAN':
      return String(value.value)
    case 'NULL':
      return 'null'
  }
}

/**
 * Integers are written as plain digits, never in exponent form, so the
 * parser reads them back to the same double.
 */
function writeNumber(value: number): string {
  if (Object.is(value, -0)) {
    return '-0'
  }
  if (Number.isInteger(value)) {
    return BigInt(value).toString()
  }
  return String(value)
}

function wrap(open: string, members: string[], close: string, indent: string, current: string): string {
  if (!indent) {
    return open + members.join(',') + close
  }
  return `${open}\n${members.join(',\n')}\n${current}${close}`
}

/**
 * Converts a value tree to plain JavaScript data.
 */
export function toPlain(value: JsonValue): Json {
  switch (value.type) {
    case 'OBJECT':
      // fromEntries defines own properties, so a "__proto__" key stays data
      return Object.fromEntries([...value.entries].map(([key, member]): [string, Json] => [key, toPlain(member)]))
    case 'ARRAY':
      return value.items.map(toPlain)
    case 'STRING':
    case 'NUMBER':
    case 'BOOLEAN':
      return value.value
    case 'NULL':
      return null
  }
}
