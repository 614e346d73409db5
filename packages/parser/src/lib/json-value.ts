export type JsonValue =
  | ObjectJsonValue
  | ArrayJsonValue
  | StringJsonValue
  | NumberJsonValue
  | BooleanJsonValue
  | NullJsonValue

export type JsonValueType = JsonValue['type']

export interface BaseJsonValue {
  readonly type: string
}

/**
 * A JSON object. Keys are unique; a repeated key keeps the last value parsed.
 */
export interface ObjectJsonValue extends BaseJsonValue {
  readonly type: 'OBJECT'
  readonly entries: ReadonlyMap<string, JsonValue>
}

/**
 * An ordered JSON array.
 */
export interface ArrayJsonValue extends BaseJsonValue {
  readonly type: 'ARRAY'
  readonly items: ReadonlyArray<JsonValue>
}

/**
 * A JSON string. Holds the raw text between the quotes; escape
 * sequences are not decoded.
 */
export interface StringJsonValue extends BaseJsonValue {
  readonly type: 'STRING'
  readonly value: string
}

export interface NumberJsonValue extends BaseJsonValue {
  readonly type: 'NUMBER'
  readonly value: number
}

export interface BooleanJsonValue extends BaseJsonValue {
  readonly type: 'BOOLEAN'
  readonly value: boolean
}

export interface NullJsonValue extends BaseJsonValue {
  readonly type: 'NULL'
}

export function objectValue(entries: Iterable<readonly [string, JsonValue]>): ObjectJsonValue {
  return Object.freeze({ type: 'OBJECT', entries: new Map(entries) })
}

export function arrayValue(items: Iterable<JsonValue>): ArrayJsonValue {
  return Object.freeze({ type: 'ARRAY', items: Object.freeze([...items]) })
}

export function stringValue(value: string): StringJsonValue {
  return Object.freeze({ type: 'STRING', value })
}

export function numberValue(value: number): NumberJsonValue {
  return Object.freeze({ type: 'NUMBER', value })
}

export function booleanValue(value: boolean): BooleanJsonValue {
  return Object.freeze({ type: 'BOOLEAN', value })
}

export const NULL_VALUE: NullJsonValue = Object.freeze({ type: 'NULL' })
