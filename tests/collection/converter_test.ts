import { describe, it, expect } from 'vitest'
import { escapeCell, unescapeCell } from '../../src/collection/converter.js'
import { ConverterMap } from '../../src/collection/convertermap.js'
import { FieldType, newField } from '../../src/shared/collection/index.js'

const textField = newField('note', FieldType.text)
const numberField = newField('count', FieldType.number)
const dateField = newField('when', FieldType.date)
const booleanField = newField('done', FieldType.boolean)
const selectField = newField('level', FieldType.select, false, ['beginner', 'advanced'])

describe('cell escaping', () => {
  it('escapes pipes, backslashes and line breaks', () => {
    expect(escapeCell('a|b')).toBe('a\\|b')
    expect(escapeCell('C:\\temp')).toBe('C:\\\\temp')
    expect(escapeCell('one\ntwo')).toBe('one\\ntwo')
    expect(escapeCell('tab\there')).toBe('tab\\there')
    expect(escapeCell('cr\rlf')).toBe('cr\\rlf')
  })

  it('protects edge spaces, which are trimmed otherwise', () => {
    expect(escapeCell(' padded ')).toBe('\\spadded\\s')
    expect(escapeCell('inner space')).toBe('inner space')
  })

  it('escapes a literal "" so it is not read as the empty string', () => {
    expect(escapeCell('""')).toBe('\\"\\"')
    expect(unescapeCell('\\"\\"')).toBe('""')
  })

  it('reverses every escape', () => {
    const samples = ['a|b', 'C:\\temp\\', 'one\ntwo', ' x ', 'tab\t', '""', 'plain']
    samples.forEach((s) => {
      expect(unescapeCell(escapeCell(s))).toBe(s)
    })
  })

  it('keeps unknown escape sequences as written', () => {
    expect(unescapeCell('a\\qb')).toBe('a\\qb')
    expect(unescapeCell('trailing\\')).toBe('trailing\\')
  })
})

describe('converters', () => {
  it('has a converter for every field type', () => {
    expect(ConverterMap.getFieldTypes()).toEqual(['text', 'number', 'date', 'boolean', 'select'])
    expect(ConverterMap.getConverter(dateField).getFieldType()).toBe(FieldType.date)
  })

  it('number: decodes integers, decimals and exponents', () => {
    const c = ConverterMap.getConverter(numberField)
    expect(c.decode(numberField, '42')).toEqual({ value: 42 })
    expect(c.decode(numberField, '-1.5')).toEqual({ value: -1.5 })
    expect(c.decode(numberField, '.5')).toEqual({ value: 0.5 })
    expect(c.decode(numberField, '1e3')).toEqual({ value: 1000 })
    expect(c.decode(numberField, '12abc')).toEqual({ error: "'12abc' is not a number" })
    expect(c.decode(numberField, 'NaN')).toEqual({ error: "'NaN' is not a number" })
    expect(c.encode(2.25)).toBe('2.25')
  })

  it('number: rejects values of other types and non-finite numbers', () => {
    const c = ConverterMap.getConverter(numberField)
    expect(c.checkValue(numberField, 3)).toBeUndefined()
    expect(c.checkValue(numberField, '3')).toBe('expected a number, got string')
    expect(c.checkValue(numberField, Infinity)).toBe('expected a finite number, got Infinity')
  })

  it('date: accepts calendar dates only', () => {
    const c = ConverterMap.getConverter(dateField)
    expect(c.decode(dateField, '2024-02-29')).toEqual({ value: '2024-02-29' })
    expect(c.decode(dateField, '2023-02-29')).toEqual({ error: "'2023-02-29' is not a date (YYYY-MM-DD)" })
    expect(c.decode(dateField, '29.02.2024')).toEqual({ error: "'29.02.2024' is not a date (YYYY-MM-DD)" })
    expect(c.checkValue(dateField, 20240229)).toBe('expected a date string, got number')
  })

  it('boolean: cells use check marks, user input accepts words', () => {
    const c = ConverterMap.getConverter(booleanField)
    expect(c.encode(true)).toBe('✓')
    expect(c.encode(false)).toBe('✗')
    expect(c.decode(booleanField, '✓')).toEqual({ value: true })
    expect(c.decode(booleanField, 'yes')).toEqual({ error: "'yes' is not ✓ or ✗" })
    expect(c.parseInput(booleanField, 'Yes')).toEqual({ value: true })
    expect(c.parseInput(booleanField, '0')).toEqual({ value: false })
    expect(c.parseInput(booleanField, 'maybe')).toEqual({ error: "'maybe' is not a boolean (yes/no)" })
  })

  it('select: values must be one of the options', () => {
    const c = ConverterMap.getConverter(selectField)
    expect(c.decode(selectField, 'advanced')).toEqual({ value: 'advanced' })
    expect(c.decode(selectField, 'expert')).toEqual({ error: "'expert' is not one of the options: beginner, advanced" })
    expect(c.checkValue(selectField, 'Beginner')).toBe("'Beginner' is not one of the options: beginner, advanced")
  })

  it('only text and select accept the empty string', () => {
    expect(ConverterMap.getConverter(textField).acceptsEmptyString()).toBe(true)
    expect(ConverterMap.getConverter(selectField).acceptsEmptyString()).toBe(true)
    expect(ConverterMap.getConverter(numberField).acceptsEmptyString()).toBe(false)
    expect(ConverterMap.getConverter(booleanField).acceptsEmptyString()).toBe(false)
  })
})
