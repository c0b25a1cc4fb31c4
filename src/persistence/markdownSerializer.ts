import { parse, stringify } from 'yaml'
import Debug from 'debug'
import { FieldValue, Ifield, Iitem, ItemData, IvalidationIssue, isFieldType } from '../shared/collection/index.js'
import { Collection, IcollectionOptions } from '../collection/collection.js'
import { ConverterMap } from '../collection/convertermap.js'
import { escapeCell, unescapeCell } from '../collection/converter.js'
import { FormatError, ValidationError } from '../collection/errors.js'
import { validateField, validateItemData } from '../collection/validate.js'
import { ICollectionSerializer, IcollectionHeader } from './persistence.js'

const debug = Debug('markdownSerializer')

export const metadataDelimiter = '---'
export const emptyStringCell = '""'
const separatorCell = /^:?-{3,}:?$/

interface IitemMetadata {
  id: string
  created_at: Date
  updated_at: Date
}

interface Imetadata extends IcollectionHeader {
  items: IitemMetadata[]
}

interface IsplitFile {
  metadata: string
  // body lines with their 1-based line numbers in the file
  body: { line: number; text: string }[]
}

interface ItableRow {
  line: number
  cells: string[]
}

interface Itable {
  line: number
  header: string[]
  rows: ItableRow[]
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function readScalar(o: Record<string, unknown>, key: string, context: string): string {
  const v = o[key]
  if (v === undefined || v === null) throw new FormatError(context + ': missing required key ' + key)
  if (typeof v === 'string') return v
  if (typeof v === 'number') return String(v)
  throw new FormatError(context + ': ' + key + ' must be a string')
}

function readTimestamp(o: Record<string, unknown>, key: string, context: string): Date {
  const v = readScalar(o, key, context)
  const ms = Date.parse(v)
  if (!/^\d{4}-\d{2}-\d{2}/.test(v) || Number.isNaN(ms)) throw new FormatError(context + ': ' + key + " '" + v + "' is not an ISO-8601 timestamp")
  return new Date(ms)
}

function splitFile(text: string): IsplitFile {
  const lines = text.replace(/^\uFEFF/, '').replace(/\r\n/g, '\n').split('\n')
  if (lines[0].trimEnd() != metadataDelimiter) throw new FormatError('missing metadata block', 1)
  const end = lines.findIndex((l, idx) => idx > 0 && l.trimEnd() == metadataDelimiter)
  if (end < 0) throw new FormatError('metadata block is not terminated by ' + metadataDelimiter, 1)
  return {
    metadata: lines.slice(1, end).join('\n'),
    body: lines.slice(end + 1).map((t, idx) => ({ line: end + 2 + idx, text: t })),
  }
}

function readFields(v: unknown): Ifield[] {
  if (v === undefined || v === null) throw new FormatError('metadata: missing required key fields')
  if (!Array.isArray(v)) throw new FormatError('metadata: fields must be a list')
  const fields: Ifield[] = []
  v.forEach((entry: unknown, idx) => {
    const context = 'fields[' + idx + ']'
    if (!isRecord(entry)) throw new FormatError(context + ' must be a mapping')
    const name = readScalar(entry, 'name', context)
    const type = entry['type']
    if (type === undefined || type === null) throw new FormatError(context + ': missing required key type')
    if (!isFieldType(type)) throw new FormatError(context + ": unknown field type '" + String(type) + "'")
    const required = entry['required'] ?? false
    if (typeof required !== 'boolean') throw new FormatError(context + ': required must be true or false')
    const options = entry['options'] ?? []
    if (!Array.isArray(options) || options.some((o) => typeof o !== 'string' && typeof o !== 'number'))
      throw new FormatError(context + ': options must be a list of strings')
    const field: Ifield = { name, type, required, options: options.map((o) => String(o)) }
    const issues = validateField(field, fields)
    if (issues.length) throw new FormatError(context + ': ' + new ValidationError(issues).message)
    fields.push(field)
  })
  return fields
}

function readItems(v: unknown): IitemMetadata[] {
  if (v === undefined || v === null) return []
  if (!Array.isArray(v)) throw new FormatError('metadata: items must be a list')
  return v.map((entry: unknown, idx) => {
    const context = 'items[' + idx + ']'
    if (!isRecord(entry)) throw new FormatError(context + ' must be a mapping')
    const item: IitemMetadata = {
      id: readScalar(entry, 'id', context),
      created_at: readTimestamp(entry, 'created_at', context),
      updated_at: readTimestamp(entry, 'updated_at', context),
    }
    if (item.updated_at.getTime() < item.created_at.getTime()) throw new FormatError(context + ': updated_at is before created_at')
    return item
  })
}

function readMetadata(source: string): Imetadata {
  let doc: unknown
  try {
    doc = parse(source)
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e)
    throw new FormatError('malformed metadata: ' + msg, 2)
  }
  if (!isRecord(doc)) throw new FormatError('metadata must be a mapping', 2)
  const c = doc['collection']
  if (c === undefined || c === null) throw new FormatError('metadata: missing required key collection')
  if (!isRecord(c)) throw new FormatError('metadata: collection must be a mapping')
  const header: Imetadata = {
    name: readScalar(c, 'name', 'collection'),
    type: readScalar(c, 'type', 'collection'),
    created_at: readTimestamp(c, 'created_at', 'collection'),
    updated_at: readTimestamp(c, 'updated_at', 'collection'),
    fields: readFields(doc['fields']),
    items: readItems(doc['items']),
  }
  if (header.name.trim().length == 0) throw new FormatError('collection: name must not be empty')
  if (header.updated_at.getTime() < header.created_at.getTime())
    throw new FormatError('collection: updated_at is before created_at')
  return header
}

// Only spaces and tabs pad a cell. Other whitespace is content
function trimPadding(text: string): string {
  return text.replace(/^[ \t]+|[ \t]+$/g, '')
}

/** Splits a table line at unescaped pipes. Returns undefined if the line is not closed by a pipe */
function splitRow(text: string): string[] | undefined {
  const line = trimPadding(text)
  const cells: string[] = []
  let current = ''
  for (let i = 1; i < line.length; i++) {
    const ch = line[i]
    if (ch == '\\' && i + 1 < line.length) {
      current += ch + line[i + 1]
      i++
    } else if (ch == '|') {
      cells.push(trimPadding(current))
      current = ''
    } else current += ch
  }
  if (trimPadding(current).length > 0 || cells.length == 0) return undefined
  return cells
}

function isTableLine(text: string): boolean {
  return /^[ \t]*\|/.test(text)
}

function readTable(body: IsplitFile['body']): Itable | undefined {
  // the heading and any prose before the table are not part of the data
  const start = body.findIndex((l) => isTableLine(l.text))
  if (start < 0) return undefined
  const rest = body.slice(start).filter((l) => l.text.trim().length > 0)
  rest.forEach((l) => {
    if (!isTableLine(l.text)) throw new FormatError('unexpected text in table', l.line)
  })
  const [headerLine, separatorLine, ...rowLines] = rest
  const header = splitRow(headerLine.text)
  if (!header) throw new FormatError('table header is not closed by |', headerLine.line)
  if (!separatorLine) throw new FormatError('table has no separator row', headerLine.line)
  const separator = splitRow(separatorLine.text)
  if (!separator || separator.length != header.length || separator.some((c) => !separatorCell.test(c)))
    throw new FormatError('malformed table separator row', separatorLine.line)
  const rows = rowLines.map((l, idx) => {
    const cells = splitRow(l.text)
    if (!cells) throw new FormatError('row ' + (idx + 1) + ' is not closed by |', l.line)
    if (cells.length != header.length)
      throw new FormatError('row ' + (idx + 1) + ' has ' + cells.length + ' cells, expected ' + header.length, l.line)
    return { line: l.line, cells }
  })
  return { line: headerLine.line, header: header.map(unescapeCell), rows }
}

function checkColumns(table: Itable, fields: Ifield[]): void {
  const names = fields.map((f) => f.name)
  const unknown = table.header.filter((h) => !names.includes(h))
  if (unknown.length) throw new ValidationError(unknown.map((h) => ({ field: h, message: 'unknown column' })))
  if (table.header.length != names.length || table.header.some((h, idx) => h != names[idx]))
    throw new FormatError(
      'table columns [' + table.header.join(', ') + '] do not match the declared fields [' + names.join(', ') + ']',
      table.line
    )
}

/**
 * Reads and writes a collection as Markdown: YAML metadata between --- lines, a heading, and a table.
 * Item ids and item timestamps live in the metadata "items" list, one entry per table row.
 */
export class MarkdownSerializer implements ICollectionSerializer {
  constructor(private collectionOptions: IcollectionOptions = {}) {}

  render(collection: Collection): string {
    const data = collection.toData()
    const metadata = {
      collection: {
        name: data.name,
        type: data.type,
        created_at: data.created_at.toISOString(),
        updated_at: data.updated_at.toISOString(),
      },
      fields: data.fields.map((f) => ({ name: f.name, type: f.type, required: f.required, options: f.options })),
      items: data.items.map((i) => ({ id: i.id, created_at: i.created_at.toISOString(), updated_at: i.updated_at.toISOString() })),
    }
    let rc = metadataDelimiter + '\n' + stringify(metadata, { indentSeq: false, lineWidth: 0 }) + metadataDelimiter + '\n'
    rc += '\n# ' + data.name + '\n'
    if (data.fields.length > 0) rc += '\n' + this.renderTable(data.fields, data.items) + '\n'
    return rc
  }

  parse(text: string): Collection {
    const file = splitFile(text)
    const metadata = readMetadata(file.metadata)
    const table = readTable(file.body)
    const items: Iitem[] = []
    if (table) {
      checkColumns(table, metadata.fields)
      const issues: IvalidationIssue[] = []
      const ids = new Set<string>()
      table.rows.forEach((row, idx) => {
        const rowNo = idx + 1
        const data = this.decodeRow(metadata.fields, row, rowNo, issues)
        const m = metadata.items[idx]
        const id = m ? m.id : 'row-' + rowNo
        if (ids.has(id)) throw new FormatError("duplicate item id '" + id + "'", row.line)
        ids.add(id)
        items.push({
          id,
          data,
          created_at: m ? m.created_at : new Date(metadata.created_at.getTime()),
          updated_at: m ? m.updated_at : new Date(metadata.updated_at.getTime()),
        })
      })
      if (issues.length) throw new ValidationError(issues)
      if (metadata.items.length > table.rows.length)
        debug('ignoring ' + (metadata.items.length - table.rows.length) + ' item entries without a table row')
    }
    return Collection.fromData(
      {
        name: metadata.name,
        type: metadata.type,
        fields: metadata.fields,
        items,
        created_at: metadata.created_at,
        updated_at: metadata.updated_at,
      },
      this.collectionOptions
    )
  }

  /** Reads the metadata block and counts table rows without decoding cells */
  parseSummary(text: string): IcollectionHeader & { itemCount: number } {
    const file = splitFile(text)
    const { items, ...header } = readMetadata(file.metadata)
    debug('parseSummary ' + header.name + ': ' + items.length + ' item entries')
    const tableLines = file.body.filter((l) => isTableLine(l.text)).length
    return { ...header, itemCount: Math.max(0, tableLines - 2) }
  }

  encodeCell(field: Ifield, value: FieldValue | undefined): string {
    if (value === undefined) return ''
    if (value === '') return emptyStringCell
    return escapeCell(ConverterMap.getConverter(field).encode(value))
  }

  private renderTable(fields: Ifield[], items: Iitem[]): string {
    const lines: string[] = []
    lines.push(this.renderRow(fields.map((f) => escapeCell(f.name))))
    lines.push(this.renderRow(fields.map(() => '---')))
    items.forEach((item) => {
      lines.push(this.renderRow(fields.map((f) => this.encodeCell(f, item.data[f.name]))))
    })
    return lines.join('\n')
  }

  private renderRow(cells: string[]): string {
    return '| ' + cells.join(' | ') + ' |'
  }

  private decodeRow(fields: Ifield[], row: ItableRow, rowNo: number, issues: IvalidationIssue[]): ItemData {
    const data: ItemData = {}
    let decodeFailed = false
    fields.forEach((field, col) => {
      const cell = row.cells[col]
      if (cell.length == 0) return
      if (cell == emptyStringCell) {
        data[field.name] = ''
        return
      }
      const result = ConverterMap.getConverter(field).decode(field, unescapeCell(cell))
      if ('error' in result) {
        issues.push({ row: rowNo, field: field.name, message: result.error })
        decodeFailed = true
      } else data[field.name] = result.value
    })
    if (!decodeFailed) issues.push(...validateItemData(fields, data, rowNo))
    return data
  }
}
