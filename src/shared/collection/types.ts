export enum FieldType {
  text = 'text',
  number = 'number',
  date = 'date',
  boolean = 'boolean',
  select = 'select',
}

// Runtime representation of a value, per declared field type
export interface IfieldValueTypes {
  [FieldType.text]: string
  [FieldType.number]: number
  [FieldType.date]: string
  [FieldType.boolean]: boolean
  [FieldType.select]: string
}

export type FieldValue = IfieldValueTypes[FieldType]

export interface Ifield {
  name: string
  type: FieldType
  required: boolean
  options: string[]
}

export type ItemData = Record<string, FieldValue>

/** Changes for updateItem: null clears a value */
export type ItemChanges = Record<string, FieldValue | null>

export interface Iitem {
  id: string
  data: ItemData
  created_at: Date
  updated_at: Date
}

export interface Icollection {
  name: string
  type: string
  fields: Ifield[]
  items: Iitem[]
  created_at: Date
  updated_at: Date
}

export interface IcollectionSummary {
  name: string
  type: string
  filename: string
  fieldCount: number
  itemCount: number
  created_at: Date
  updated_at: Date
}

export interface IvalidationIssue {
  field?: string
  // 1-based table row, only set while parsing
  row?: number
  message: string
}

export function isFieldType(value: unknown): value is FieldType {
  return Object.values(FieldType).some((t) => t === value)
}

export function newField(name: string, type: FieldType, required: boolean = false, options: string[] = []): Ifield {
  return { name, type, required, options }
}
