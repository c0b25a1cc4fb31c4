import { FieldType, ItemChanges, ItemData, isFieldType } from '../shared/collection/index.js'
import { Collection } from '../collection/collection.js'
import { ConverterMap } from '../collection/convertermap.js'
import { ValidationError } from '../collection/errors.js'
import { MarkdownSerializer, emptyStringCell } from '../persistence/markdownSerializer.js'
import { ICollectionPersistence, isUnreadable } from '../persistence/persistence.js'

export interface IaddFieldOptions {
  type: string
  required?: boolean
  options?: string
}

interface Iassignment {
  field: string
  text: string
}

function splitAssignment(arg: string): Iassignment {
  const idx = arg.indexOf('=')
  if (idx <= 0) throw new ValidationError({ message: "expected <field>=<value>, got '" + arg + "'" })
  return { field: arg.substring(0, idx), text: arg.substring(idx + 1) }
}

/**
 * Decodes field=value arguments with the field's converter.
 * An empty value clears the field, "" stands for the empty string.
 */
export function parseAssignments(collection: Collection, args: string[]): ItemChanges {
  const changes: ItemChanges = {}
  const issues = args.map(splitAssignment).flatMap(({ field: name, text }) => {
    const field = collection.getField(name)
    if (!field) return [{ field: name, message: 'unknown field' }]
    if (text.length == 0) changes[name] = null
    else if (text == emptyStringCell) changes[name] = ''
    else {
      const result = ConverterMap.getConverter(field).parseInput(field, text)
      if ('error' in result) return [{ field: name, message: result.error }]
      changes[name] = result.value
    }
    return []
  })
  if (issues.length) throw new ValidationError(issues)
  return changes
}

function withoutCleared(changes: ItemChanges): ItemData {
  const data: ItemData = {}
  Object.entries(changes).forEach(([key, value]) => {
    if (value !== null) data[key] = value
  })
  return data
}

/** Command implementations. Each returns the lines to print */
export class CollectionCommands {
  private serializer = new MarkdownSerializer()

  constructor(private store: ICollectionPersistence) {}

  list(): string[] {
    const entries = this.store.list()
    if (entries.length == 0) return ['No collections found']
    return entries.map((e) => {
      if (isUnreadable(e)) return e.name + ' (error: ' + e.error.reason + ')'
      return e.name + ' (' + e.type + ', ' + e.itemCount + (e.itemCount == 1 ? ' item)' : ' items)')
    })
  }

  show(name: string): string[] {
    const collection = this.store.load(name)
    const fields = collection.fields
    const lines = ['# ' + collection.name + ' (' + collection.type + ')']
    if (fields.length == 0) return [...lines, 'No fields defined']
    lines.push('| id | ' + fields.map((f) => f.name).join(' | ') + ' |')
    lines.push('| --- | ' + fields.map(() => '---').join(' | ') + ' |')
    collection.items.forEach((item) => {
      const cells = fields.map((f) => this.serializer.encodeCell(f, item.data[f.name]))
      lines.push('| ' + item.id + ' | ' + cells.join(' | ') + ' |')
    })
    return lines
  }

  create(name: string, type: string): string[] {
    if (this.store.exists(name)) throw new ValidationError({ message: "collection '" + name + "' already exists" })
    const collection = new Collection(name, type)
    this.store.save(collection)
    return ["Created collection '" + name + "'"]
  }

  addField(name: string, fieldName: string, opts: IaddFieldOptions): string[] {
    if (!isFieldType(opts.type))
      throw new ValidationError({
        field: fieldName,
        message: "unknown field type '" + opts.type + "', expected one of " + Object.values(FieldType).join(', '),
      })
    const collection = this.store.load(name)
    const options = opts.options
      ? opts.options
          .split(',')
          .map((o) => o.trim())
          .filter((o) => o.length > 0)
      : []
    collection.addField({ name: fieldName, type: opts.type, required: opts.required ?? false, options })
    this.store.save(collection)
    return ["Added field '" + fieldName + "' to '" + name + "'"]
  }

  removeField(name: string, fieldName: string): string[] {
    const collection = this.store.load(name)
    collection.removeField(fieldName)
    this.store.save(collection)
    return ["Removed field '" + fieldName + "' from '" + name + "'"]
  }

  renameField(name: string, from: string, to: string): string[] {
    const collection = this.store.load(name)
    collection.renameField(from, to)
    this.store.save(collection)
    return ["Renamed field '" + from + "' to '" + to + "' in '" + name + "'"]
  }

  add(name: string, args: string[]): string[] {
    const collection = this.store.load(name)
    const item = collection.addItem(withoutCleared(parseAssignments(collection, args)))
    this.store.save(collection)
    return [item.id]
  }

  update(name: string, id: string, args: string[]): string[] {
    const collection = this.store.load(name)
    collection.updateItem(id, parseAssignments(collection, args))
    this.store.save(collection)
    return ["Updated item '" + id + "'"]
  }

  remove(name: string, id: string): string[] {
    const collection = this.store.load(name)
    collection.removeItem(id)
    this.store.save(collection)
    return ["Removed item '" + id + "'"]
  }

  delete(name: string): string[] {
    this.store.delete(name)
    return ["Deleted collection '" + name + "'"]
  }
}
