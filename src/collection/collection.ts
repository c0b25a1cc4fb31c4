import { randomUUID } from 'crypto'
import Debug from 'debug'
import { Icollection, Ifield, Iitem, ItemChanges, ItemData, IvalidationIssue } from '../shared/collection/index.js'
import { NotFoundError, ValidationError } from './errors.js'
import { validateField, validateFieldName, validateItemData } from './validate.js'

const debug = Debug('collection')

export type FieldInput = Pick<Ifield, 'name' | 'type'> & Partial<Pick<Ifield, 'required' | 'options'>>

export interface IcollectionOptions {
  clock?: () => Date
  idGenerator?: () => string
}

function notBefore(candidate: Date, floor: Date): Date {
  return candidate.getTime() < floor.getTime() ? new Date(floor.getTime()) : candidate
}

// drops keys whose value is undefined
function compact(data: ItemData): ItemData {
  const rc: ItemData = {}
  Object.entries(data).forEach(([key, value]) => {
    if (value !== undefined) rc[key] = value
  })
  return rc
}

function validateCollectionName(name: unknown): IvalidationIssue[] {
  if (typeof name !== 'string' || name.trim().length == 0) return [{ message: 'collection name must be a non-empty string' }]
  if (/[\r\n]/.test(name)) return [{ message: 'collection name must not contain line breaks' }]
  return []
}

/**
 * A named group of fields and items.
 * All mutators validate first and apply afterwards, so a rejected change leaves the collection untouched.
 * Readers hand out copies; the collection is the only owner of its fields and items.
 */
export class Collection {
  private fieldList: Ifield[] = []
  private itemList: Iitem[] = []
  private createdAt: Date
  private updatedAt: Date
  private modified = true
  private clock: () => Date
  private idGenerator: () => string

  constructor(
    readonly name: string,
    readonly type: string,
    options: IcollectionOptions = {}
  ) {
    const issues = validateCollectionName(name)
    if (typeof type !== 'string') issues.push({ message: 'collection type must be a string' })
    if (issues.length) throw new ValidationError(issues)
    this.clock = options.clock ?? (() => new Date())
    this.idGenerator = options.idGenerator ?? randomUUID
    this.createdAt = this.clock()
    this.updatedAt = new Date(this.createdAt.getTime())
  }

  /** Rebuilds a collection from stored data. The result counts as saved */
  static fromData(data: Icollection, options: IcollectionOptions = {}): Collection {
    const c = new Collection(data.name, data.type, options)
    const issues: IvalidationIssue[] = []
    const fields: Ifield[] = []
    data.fields.forEach((f) => {
      issues.push(...validateField(f, fields))
      fields.push(structuredClone(f))
    })
    const ids = new Set<string>()
    data.items.forEach((item) => {
      if (ids.has(item.id)) issues.push({ message: "duplicate item id '" + item.id + "'" })
      ids.add(item.id)
      issues.push(...validateItemData(fields, item.data))
      if (item.updated_at.getTime() < item.created_at.getTime())
        issues.push({ message: "item '" + item.id + "' was updated before it was created" })
    })
    if (data.updated_at.getTime() < data.created_at.getTime())
      issues.push({ message: 'collection was updated before it was created' })
    if (issues.length) throw new ValidationError(issues)
    c.fieldList = fields
    c.itemList = data.items.map((item) => structuredClone(item))
    c.createdAt = new Date(data.created_at.getTime())
    c.updatedAt = new Date(data.updated_at.getTime())
    c.modified = false
    return c
  }

  get created_at(): Date {
    return new Date(this.createdAt.getTime())
  }

  get updated_at(): Date {
    return new Date(this.updatedAt.getTime())
  }

  get fields(): Ifield[] {
    return structuredClone(this.fieldList)
  }

  get items(): Iitem[] {
    return structuredClone(this.itemList)
  }

  getFieldNames(): string[] {
    return this.fieldList.map((f) => f.name)
  }

  getField(name: string): Ifield | undefined {
    const field = this.fieldList.find((f) => f.name == name)
    return field ? structuredClone(field) : undefined
  }

  getItem(id: string): Iitem | undefined {
    const item = this.itemList.find((i) => i.id == id)
    return item ? structuredClone(item) : undefined
  }

  toData(): Icollection {
    return {
      name: this.name,
      type: this.type,
      fields: this.fields,
      items: this.items,
      created_at: this.created_at,
      updated_at: this.updated_at,
    }
  }

  addField(input: FieldInput): Ifield {
    const field: Ifield = {
      name: input.name,
      type: input.type,
      required: input.required ?? false,
      options: input.options ? [...input.options] : [],
    }
    const issues = validateField(field, this.fieldList)
    if (field.required && this.itemList.length > 0)
      issues.push({ field: field.name, message: 'a required field cannot be added while items exist' })
    if (issues.length) throw new ValidationError(issues)
    this.fieldList.push(field)
    this.touch()
    debug('addField ' + this.name + '.' + field.name)
    return structuredClone(field)
  }

  /** Removes a field together with its values on every item */
  removeField(name: string): void {
    const idx = this.fieldList.findIndex((f) => f.name == name)
    if (idx < 0) throw new ValidationError({ field: name, message: 'unknown field' })
    this.fieldList.splice(idx, 1)
    const now = this.now()
    this.itemList.forEach((item) => {
      if (name in item.data) {
        delete item.data[name]
        item.updated_at = notBefore(now, item.created_at)
      }
    })
    this.touch(now)
  }

  /** Renames a field and migrates every item's data key */
  renameField(from: string, to: string): void {
    const field = this.fieldList.find((f) => f.name == from)
    if (!field) throw new ValidationError({ field: from, message: 'unknown field' })
    if (from == to) return
    const issues = validateFieldName(to)
    if (this.fieldList.some((f) => f.name == to)) issues.push({ field: to, message: 'field already exists' })
    if (issues.length) throw new ValidationError(issues)
    field.name = to
    const now = this.now()
    this.itemList.forEach((item) => {
      if (from in item.data) {
        const data: ItemData = {}
        // keep key order stable
        Object.keys(item.data).forEach((key) => {
          data[key == from ? to : key] = item.data[key]
        })
        item.data = data
        item.updated_at = notBefore(now, item.created_at)
      }
    })
    this.touch(now)
  }

  addItem(input: ItemData): Iitem {
    const data = compact(input)
    const issues = validateItemData(this.fieldList, data)
    if (issues.length) throw new ValidationError(issues)
    const id = this.newId()
    const now = this.now()
    const item: Iitem = { id, data: structuredClone(data), created_at: now, updated_at: new Date(now.getTime()) }
    this.itemList.push(item)
    this.touch(now)
    debug('addItem ' + this.name + ' ' + id)
    return structuredClone(item)
  }

  /** Merges changes into the item's data; null clears a value */
  updateItem(id: string, changes: ItemChanges): Iitem {
    const item = this.itemList.find((i) => i.id == id)
    if (!item) throw new NotFoundError(this.name, id)
    const data: ItemData = { ...item.data }
    Object.entries(changes).forEach(([key, value]) => {
      if (value === null || value === undefined) delete data[key]
      else data[key] = value
    })
    const issues = validateItemData(this.fieldList, data)
    if (issues.length) throw new ValidationError(issues)
    const now = this.now()
    item.data = structuredClone(data)
    item.updated_at = notBefore(now, item.created_at)
    this.touch(now)
    return structuredClone(item)
  }

  removeItem(id: string): void {
    const idx = this.itemList.findIndex((i) => i.id == id)
    if (idx < 0) throw new NotFoundError(this.name, id)
    this.itemList.splice(idx, 1)
    this.touch()
  }

  /** True if the collection changed since it was loaded or last saved */
  isModified(): boolean {
    return this.modified
  }

  markSaved(): void {
    this.modified = false
  }

  touch(now: Date = this.now()): void {
    this.updatedAt = notBefore(now, this.createdAt)
    this.modified = true
  }

  private now(): Date {
    return this.clock()
  }

  private newId(): string {
    let id = this.idGenerator()
    // ids stay unique within the collection
    while (this.itemList.some((i) => i.id == id)) id = this.idGenerator()
    return id
  }
}
