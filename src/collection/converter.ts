import { FieldType, FieldValue, Ifield } from '../shared/collection/index.js'

export type DecodeResult = { value: FieldValue } | { error: string }

const escapes: Record<string, string> = {
  '\\': '\\\\',
  '|': '\\|',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
}
const unescapes: Record<string, string> = {
  '\\': '\\',
  '|': '|',
  n: '\n',
  r: '\r',
  t: '\t',
  s: ' ',
  '"': '"',
}

/**
 * Escapes a string for a table cell.
 * Edge spaces become \s because cells are trimmed when read back.
 */
export function escapeCell(text: string): string {
  let rc = ''
  for (const ch of text) rc += escapes[ch] ?? ch
  if (rc.startsWith(' ')) rc = '\\s' + rc.substring(1)
  if (rc.endsWith(' ')) rc = rc.substring(0, rc.length - 1) + '\\s'
  // "" is the empty string marker
  if (rc == '""') rc = '\\"\\"'
  return rc
}

/** Unknown escape sequences are kept as written */
export function unescapeCell(cell: string): string {
  let rc = ''
  for (let i = 0; i < cell.length; i++) {
    const ch = cell[i]
    if (ch == '\\' && i + 1 < cell.length) {
      const next = cell[i + 1]
      const replacement = unescapes[next]
      rc += replacement != undefined ? replacement : ch + next
      i++
    } else rc += ch
  }
  return rc
}

// Base class for all cell converters
export abstract class Converter {
  constructor(protected fieldType: FieldType) {}

  getFieldType(): FieldType {
    return this.fieldType
  }

  /** Cell text (before escaping) for a non-empty value */
  abstract encode(value: FieldValue): string

  /** Decodes unescaped, non-empty cell text */
  abstract decode(field: Ifield, text: string): DecodeResult

  /** Returns a problem description, or undefined if value fits the field */
  abstract checkValue(field: Ifield, value: FieldValue): string | undefined

  /** Decodes text typed by a user. Defaults to the cell syntax */
  parseInput(field: Ifield, text: string): DecodeResult {
    return this.decode(field, text)
  }

  /** Empty strings have a value of their own only where the runtime type is a string */
  acceptsEmptyString(): boolean {
    return false
  }
}
