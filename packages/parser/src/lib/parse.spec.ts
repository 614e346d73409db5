import { parse } from './parse'
import { JsonSyntaxError } from './parser-error'
import { NULL_VALUE, numberValue, objectValue } from './json-value'

it('should parse a document', () => {
  expect(parse('{"a": 1, "a": 2}')).toEqual(objectValue([['a', numberValue(2)]]))
})

it('should parse null', () => {
  expect(parse('null')).toBe(NULL_VALUE)
})

it('should pass options to the parser', () => {
  expect(parse('\r\n-12\r\n', { allowCarriageReturn: true })).toEqual(numberValue(-12))
})

it('should throw a syntax error for malformed input', () => {
  expect(() => parse('[1, 2, ]')).toThrow(JsonSyntaxError)
  expect(() => parse('nul')).toThrow("Invalid literal, expected 'null' at position 0")
})
