import { Converter, DecodeResult } from './converter.js'
import { FieldType, FieldValue, Ifield } from '../shared/collection/index.js'

const dateSyntax = /^\d{4}-\d{2}-\d{2}$/

function isCalendarDate(text: string): boolean {
  if (!dateSyntax.test(text)) return false
  const d = new Date(text + 'T00:00:00.000Z')
  // Date rolls 2024-02-30 over into March
  return !Number.isNaN(d.getTime()) && d.toISOString().substring(0, 10) == text
}

export class DateConverter extends Converter {
  constructor() {
    super(FieldType.date)
  }
  override encode(value: FieldValue): string {
    return String(value)
  }
  override decode(_field: Ifield, text: string): DecodeResult {
    if (!isCalendarDate(text)) return { error: "'" + text + "' is not a date (YYYY-MM-DD)" }
    return { value: text }
  }
  override checkValue(_field: Ifield, value: FieldValue): string | undefined {
    if (typeof value !== 'string') return 'expected a date string, got ' + typeof value
    if (!isCalendarDate(value)) return "'" + value + "' is not a date (YYYY-MM-DD)"
    return undefined
  }
}
