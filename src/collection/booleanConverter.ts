import { Converter, DecodeResult } from './converter.js'
import { FieldType, FieldValue, Ifield } from '../shared/collection/index.js'

export const trueToken = '✓'
export const falseToken = '✗'

const inputWords: Record<string, boolean> = {
  [trueToken]: true,
  [falseToken]: false,
  true: true,
  false: false,
  yes: true,
  no: false,
  y: true,
  n: false,
  '1': true,
  '0': false,
}

export class BooleanConverter extends Converter {
  constructor() {
    super(FieldType.boolean)
  }
  override encode(value: FieldValue): string {
    return value === true ? trueToken : falseToken
  }
  override decode(_field: Ifield, text: string): DecodeResult {
    if (text == trueToken) return { value: true }
    if (text == falseToken) return { value: false }
    return { error: "'" + text + "' is not " + trueToken + ' or ' + falseToken }
  }
  override parseInput(_field: Ifield, text: string): DecodeResult {
    const v = inputWords[text.trim().toLowerCase()]
    if (v == undefined) return { error: "'" + text + "' is not a boolean (yes/no)" }
    return { value: v }
  }
  override checkValue(_field: Ifield, value: FieldValue): string | undefined {
    if (typeof value !== 'boolean') return 'expected a boolean, got ' + typeof value
    return undefined
  }
}
