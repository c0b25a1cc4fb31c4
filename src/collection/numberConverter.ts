import { Converter, DecodeResult } from './converter.js'
import { FieldType, FieldValue, Ifield } from '../shared/collection/index.js'

const numberSyntax = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

export class NumberConverter extends Converter {
  constructor() {
    super(FieldType.number)
  }
  override encode(value: FieldValue): string {
    return String(value)
  }
  override decode(_field: Ifield, text: string): DecodeResult {
    if (!numberSyntax.test(text)) return { error: "'" + text + "' is not a number" }
    const v = Number(text)
    if (!Number.isFinite(v)) return { error: "'" + text + "' is out of range" }
    return { value: v }
  }
  override checkValue(_field: Ifield, value: FieldValue): string | undefined {
    if (typeof value !== 'number') return 'expected a number, got ' + typeof value
    if (!Number.isFinite(value)) return 'expected a finite number, got ' + value
    return undefined
  }
}
