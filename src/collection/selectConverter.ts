import { Converter, DecodeResult } from './converter.js'
import { FieldType, FieldValue, Ifield } from '../shared/collection/index.js'

export class SelectConverter extends Converter {
  constructor() {
    super(FieldType.select)
  }
  override encode(value: FieldValue): string {
    return String(value)
  }
  override decode(field: Ifield, text: string): DecodeResult {
    if (!field.options.includes(text)) return { error: this.notAnOption(field, text) }
    return { value: text }
  }
  override checkValue(field: Ifield, value: FieldValue): string | undefined {
    if (typeof value !== 'string') return 'expected one of the options, got ' + typeof value
    if (value.length > 0 && !field.options.includes(value)) return this.notAnOption(field, value)
    return undefined
  }
  override acceptsEmptyString(): boolean {
    return true
  }
  private notAnOption(field: Ifield, value: string): string {
    return "'" + value + "' is not one of the options: " + field.options.join(', ')
  }
}
