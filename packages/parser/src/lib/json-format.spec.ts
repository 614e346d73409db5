import { faker } from '@faker-js/faker'
import { stringify, toPlain } from './json-format'
import { arrayValue, booleanValue, JsonValue, NULL_VALUE, numberValue, objectValue, stringValue } from './json-value'
import { parse } from './parse'

describe('stringify', () => {
  it('should write compact output', () => {
    const value = parse('{"a": [1, -2, true, null], "b": "x y", "c": {}, "d": []}')

    expect(stringify(value)).toEqual('{"a":[1,-2,true,null],"b":"x y","c":{},"d":[]}')
  })

  it('should indent nested values', () => {
    const value = objectValue([
      ['a', arrayValue([numberValue(1)])],
      ['b', objectValue([])],
    ])

    expect(stringify(value, 2)).toEqual('{\n  "a": [\n    1\n  ],\n  "b": {}\n}')
  })

  it.each<[JsonValue, string]>([
    [stringValue('a\\n'), '"a\\n"'],
    [numberValue(-3), '-3'],
    [numberValue(-0), '-0'],
    [numberValue(1e21), '1000000000000000000000'],
    [booleanValue(false), 'false'],
    [NULL_VALUE, 'null'],
  ])('should write scalar values %#', (value, expected) => {
    expect(stringify(value)).toEqual(expected)
  })

  it.each([
    '[true, false, "hello", {}, -12]',
    '{"name": "x", "tags": ["a", "b"], "meta": {"active": true, "score": 10, "none": null}}',
    '[[], [[]], {"": {"": []}}]',
    '"raw \\t text"',
    '1000000000000000000000',
    '-12345678901234567891',
    '-0',
    '[-0, 0, +5]',
  ])('should parse back to an equal tree %s', (input) => {
    const value = parse(input)

    expect(parse(stringify(value))).toEqual(value)
    expect(parse(stringify(value, 4))).toEqual(value)
  })

  it('should parse back generated values', () => {
    const value = objectValue([
      [faker.lorem.word(), stringValue(faker.lorem.words(3))],
      ['count', numberValue(faker.number.int({ min: -1_000, max: 1_000 }))],
    ])

    expect(parse(stringify(value))).toEqual(value)
  })
})

describe('toPlain', () => {
  it('should convert a tree to plain data', () => {
    const value = parse('{"a": [1, "x", null, false], "b": {"c": true}}')

    expect(toPlain(value)).toEqual({ a: [1, 'x', null, false], b: { c: true } })
  })

  it('should keep a "__proto__" key as an own property', () => {
    const plain = toPlain(parse('{"__proto__": {"a": 1}}'))

    if (plain === null || typeof plain !== 'object' || Array.isArray(plain)) {
      throw new Error('Expected an object')
    }
    expect(Object.keys(plain)).toEqual(['__proto__'])
    expect(Object.getPrototypeOf(plain)).toBe(Object.prototype)
    expect(Object.getOwnPropertyDescriptor(plain, '__proto__')?.value).toEqual({ a: 1 })
  })

  it('should convert scalar roots', () => {
    expect(toPlain(parse('"x"'))).toEqual('x')
    expect(toPlain(parse('null'))).toBeNull()
  })
})
