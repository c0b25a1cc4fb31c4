import { Converter, DecodeResult } from './converter.js'
import { FieldType, FieldValue, Ifield } from '../shared/collection/index.js'

export class TextConverter extends Converter {
  constructor() {
    super(FieldType.text)
  }
  override encode(value: FieldValue): string {
    return String(value)
  }
  override decode(_field: Ifield, text: string): DecodeResult {
    return { value: text }
  }
  override checkValue(_field: Ifield, value: FieldValue): string | undefined {
    if (typeof value !== 'string') return 'expected text, got ' + typeof value
    return undefined
  }
  override acceptsEmptyString(): boolean {
    return true
  }
}
