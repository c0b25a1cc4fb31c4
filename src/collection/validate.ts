import { FieldType, Ifield, IvalidationIssue, ItemData, isFieldType } from '../shared/collection/index.js'
import { ConverterMap } from './convertermap.js'

export function validateFieldName(name: unknown): IvalidationIssue[] {
  if (typeof name !== 'string' || name.length == 0) return [{ message: 'field name must be a non-empty string' }]
  const issues: IvalidationIssue[] = []
  if (name.trim() != name) issues.push({ field: name, message: 'field name must not start or end with whitespace' })
  if (/[|\r\n]/.test(name)) issues.push({ field: name, message: "field name must not contain '|' or line breaks" })
  return issues
}

export function validateField(field: Ifield, others: Ifield[] = []): IvalidationIssue[] {
  const issues = validateFieldName(field.name)
  if (others.some((f) => f.name == field.name)) issues.push({ field: field.name, message: 'field already exists' })
  if (!isFieldType(field.type)) {
    issues.push({
      field: field.name,
      message: "unknown field type '" + String(field.type) + "', expected one of " + ConverterMap.getFieldTypes().join(', '),
    })
    return issues
  }
  if (typeof field.required !== 'boolean') issues.push({ field: field.name, message: 'required must be true or false' })
  if (!Array.isArray(field.options) || field.options.some((o) => typeof o !== 'string')) {
    issues.push({ field: field.name, message: 'options must be a list of strings' })
    return issues
  }
  if (field.type == FieldType.select) {
    if (field.options.length == 0) issues.push({ field: field.name, message: 'a select field needs at least one option' })
    if (field.options.some((o) => o.length == 0)) issues.push({ field: field.name, message: 'options must not be empty' })
    if (new Set(field.options).size != field.options.length)
      issues.push({ field: field.name, message: 'options must be unique' })
  }
  return issues
}

/**
 * Checks item data against the field definitions.
 * Unknown keys, type mismatches, values outside select options and missing required values are reported.
 */
export function validateItemData(fields: Ifield[], data: ItemData, row?: number): IvalidationIssue[] {
  const issues: IvalidationIssue[] = []
  const names = new Set(fields.map((f) => f.name))
  Object.keys(data).forEach((key) => {
    if (!names.has(key)) issues.push({ row, field: key, message: 'unknown field' })
  })
  fields.forEach((field) => {
    const value = data[field.name]
    if ((value === undefined || value === '') && field.required) {
      issues.push({ row, field: field.name, message: 'a value is required' })
      return
    }
    if (value === undefined) return
    const converter = ConverterMap.getConverter(field)
    if (value === '' && !converter.acceptsEmptyString()) {
      issues.push({ row, field: field.name, message: 'empty text is not a ' + field.type })
      return
    }
    const problem = converter.checkValue(field, value)
    if (problem) issues.push({ row, field: field.name, message: problem })
  })
  return issues
}
