import { describe, it, expect } from 'vitest'
import { parse } from 'yaml'
import { Collection } from '../../src/collection/collection.js'
import { FormatError, ValidationError } from '../../src/collection/errors.js'
import { MarkdownSerializer } from '../../src/persistence/markdownSerializer.js'
import { FieldType } from '../../src/shared/collection/index.js'
import { sequentialIds, steppingClock } from '../testhelper.js'

const serializer = new MarkdownSerializer()

const books = [
  '---',
  'collection:',
  '  name: Books',
  '  type: reading',
  "  created_at: '2024-01-15T10:30:00Z'",
  "  updated_at: '2024-01-16T08:00:00Z'",
  'fields:',
  '- name: title',
  '  type: text',
  '  required: true',
  '  options: []',
  '- name: read',
  '  type: boolean',
  '  required: false',
  '  options: []',
  '---',
  '',
  '# Books',
  '',
  '| title | read |',
  '| --- | --- |',
  '| Dune | ✓ |',
  '| Emma | ✗ |',
  '',
].join('\n')

function guitarPractice(): Collection {
  const c = new Collection('Guitar Practice', 'music', { clock: steppingClock(), idGenerator: sequentialIds() })
  c.addField({ name: 'song_name', type: FieldType.text, required: true })
  c.addField({ name: 'artist', type: FieldType.text })
  c.addField({ name: 'difficulty', type: FieldType.select, options: ['beginner', 'intermediate', 'advanced'] })
  c.addItem({ song_name: 'Wonderwall', artist: 'Oasis', difficulty: 'beginner' })
  return c
}

function allTypes(): Collection {
  const c = new Collection('All Types', 'test', { clock: steppingClock(), idGenerator: sequentialIds() })
  c.addField({ name: 'title', type: FieldType.text })
  c.addField({ name: 'count', type: FieldType.number })
  c.addField({ name: 'done', type: FieldType.boolean })
  c.addField({ name: 'when', type: FieldType.date })
  c.addField({ name: 'level', type: FieldType.select, options: ['low', 'high'] })
  c.addItem({ title: 'Pipe | and \\ back', count: 3, done: true, when: '2024-02-29', level: 'low' })
  c.addItem({ title: '', done: false })
  c.addItem({ title: ' padded ', count: -1.5 })
  c.addItem({ title: 'line1\nline2' })
  c.addItem({ title: '""' })
  return c
}

function formatError(text: string): FormatError {
  try {
    serializer.parse(text)
  } catch (e: unknown) {
    if (e instanceof FormatError) return e
    throw e
  }
  throw new Error('expected a FormatError')
}

function validationError(text: string): ValidationError {
  try {
    serializer.parse(text)
  } catch (e: unknown) {
    if (e instanceof ValidationError) return e
    throw e
  }
  throw new Error('expected a ValidationError')
}

describe('render', () => {
  // Test 1: the file has metadata, heading and table
  it('writes metadata, a heading and a table with one column per field', () => {
    const text = serializer.render(guitarPractice())
    expect(text.startsWith('---\ncollection:\n  name: Guitar Practice\n  type: music\n')).toBe(true)
    expect(
      text.endsWith(
        '---\n\n# Guitar Practice\n\n| song_name | artist | difficulty |\n| --- | --- | --- |\n| Wonderwall | Oasis | beginner |\n'
      )
    ).toBe(true)
  })

  it('keeps field definitions, ids and timestamps in the metadata', () => {
    const text = serializer.render(guitarPractice())
    const metadata = parse(text.split('---\n')[1])
    expect(metadata.collection).toEqual({
      name: 'Guitar Practice',
      type: 'music',
      created_at: '2024-03-01T10:00:00.000Z',
      updated_at: '2024-03-01T10:00:04.000Z',
    })
    expect(metadata.fields[2]).toEqual({
      name: 'difficulty',
      type: 'select',
      required: false,
      options: ['beginner', 'intermediate', 'advanced'],
    })
    expect(metadata.items).toEqual([
      { id: 'item-1', created_at: '2024-03-01T10:00:04.000Z', updated_at: '2024-03-01T10:00:04.000Z' },
    ])
  })

  it('escapes cells and marks empty strings', () => {
    const lines = serializer.render(allTypes()).split('\n')
    const start = lines.indexOf('| title | count | done | when | level |')
    expect(lines.slice(start + 1, start + 7)).toEqual([
      '| --- | --- | --- | --- | --- |',
      '| Pipe \\| and \\\\ back | 3 | ✓ | 2024-02-29 | low |',
      '| "" |  | ✗ |  |  |',
      '| \\spadded\\s | -1.5 |  |  |  |',
      '| line1\\nline2 |  |  |  |  |',
      '| \\"\\" |  |  |  |  |',
    ])
  })

  it('writes an empty table for fields without items and no table without fields', () => {
    const c = new Collection('Empty', 'misc')
    expect(serializer.render(c).endsWith('---\n\n# Empty\n')).toBe(true)
    c.addField({ name: 'note', type: FieldType.text })
    expect(serializer.render(c).endsWith('# Empty\n\n| note |\n| --- |\n')).toBe(true)
  })
})

describe('parse', () => {
  // Test 2: round trip
  it('reads back what it wrote', () => {
    for (const c of [guitarPractice(), allTypes(), new Collection('Empty', 'misc')]) {
      const copy = serializer.parse(serializer.render(c))
      expect(copy.toData()).toEqual(c.toData())
      expect(copy.isModified()).toBe(false)
    }
  })

  it('writes identical text for a collection read from text', () => {
    const text = serializer.render(allTypes())
    expect(serializer.render(serializer.parse(text))).toBe(text)
  })

  it('keeps whitespace other than spaces and tabs at the edges of a value', () => {
    const c = new Collection('Whitespace', 'test', { clock: steppingClock(), idGenerator: sequentialIds() })
    c.addField({ name: 'note', type: FieldType.text })
    c.addField({ name: 'lvl', type: FieldType.select, options: ['hi\u00A0', '\u3000lo'] })
    const values = ['a\u00A0', '\f', '\u3000x', '\uFEFFy', '\vz\v', '\u00A0']
    values.forEach((note) => c.addItem({ note }))
    c.addItem({ lvl: 'hi\u00A0' })
    c.addItem({ lvl: '\u3000lo' })

    const copy = serializer.parse(serializer.render(c))
    expect(copy.items.map((i) => i.data)).toEqual([
      ...values.map((note) => ({ note })),
      { lvl: 'hi\u00A0' },
      { lvl: '\u3000lo' },
    ])
    expect(copy.toData()).toEqual(c.toData())
  })

  it('distinguishes empty strings from absent values', () => {
    const c = serializer.parse(serializer.render(allTypes()))
    const second = c.items[1].data
    expect(second).toEqual({ title: '', done: false })
    expect('count' in second).toBe(false)
    expect(c.items[4].data).toEqual({ title: '""' })
  })

  // Test 3: hand-written files
  it('reads a file without item metadata', () => {
    const c = serializer.parse(books)
    expect(c.name).toBe('Books')
    expect(c.type).toBe('reading')
    expect(c.getField('title')).toEqual({ name: 'title', type: FieldType.text, required: true, options: [] })
    expect(c.items).toEqual([
      {
        id: 'row-1',
        data: { title: 'Dune', read: true },
        created_at: new Date('2024-01-15T10:30:00Z'),
        updated_at: new Date('2024-01-16T08:00:00Z'),
      },
      {
        id: 'row-2',
        data: { title: 'Emma', read: false },
        created_at: new Date('2024-01-15T10:30:00Z'),
        updated_at: new Date('2024-01-16T08:00:00Z'),
      },
    ])
  })

  it('accepts CRLF line endings, a byte order mark and prose before the table', () => {
    const text = '\uFEFF' + books.replace('# Books\n', '# Books\n\nMy reading list.\n').replace(/\n/g, '\r\n')
    expect(serializer.parse(text).items.map((i) => i.data['title'])).toEqual(['Dune', 'Emma'])
  })

  it('reads cells without padding and with aligned separators', () => {
    const text = books.replace('| --- | --- |', '|:---|---:|').replace('| Dune | ✓ |', '|Dune|✓|')
    expect(serializer.parse(text).items[0].data).toEqual({ title: 'Dune', read: true })
  })

  it('ignores item metadata entries without a row', () => {
    const text = books.replace(
      '---\n\n# Books',
      "items:\n- id: a\n  created_at: '2024-01-15T10:30:00Z'\n  updated_at: '2024-01-15T10:30:00Z'\n" +
        "- id: b\n  created_at: '2024-01-15T10:30:00Z'\n  updated_at: '2024-01-15T10:30:00Z'\n" +
        "- id: c\n  created_at: '2024-01-15T10:30:00Z'\n  updated_at: '2024-01-15T10:30:00Z'\n---\n\n# Books"
    )
    expect(serializer.parse(text).items.map((i) => i.id)).toEqual(['a', 'b'])
  })

  // Test 4: structure errors
  it('reports a missing metadata block', () => {
    const e = formatError('# Books\n\n| title |\n| --- |\n')
    expect(e.reason).toBe('missing metadata block')
    expect(e.line).toBe(1)
  })

  it('reports an unterminated metadata block', () => {
    expect(formatError('---\ncollection:\n  name: Books\n').reason).toBe('metadata block is not terminated by ---')
  })

  it('reports missing metadata keys', () => {
    expect(formatError(books.replace('  type: reading\n', '')).message).toBe('collection: missing required key type')
    expect(formatError(books.replace(/fields:[\s\S]*?---\n/, '---\n')).reason).toBe('metadata: missing required key fields')
  })

  it('reports unknown field types', () => {
    expect(formatError(books.replace('type: boolean', 'type: color')).reason).toBe("fields[1]: unknown field type 'color'")
  })

  it('reports rows with the wrong number of cells', () => {
    const e = formatError(books.replace('| Dune | ✓ |', '| Dune |'))
    expect(e.reason).toBe('row 1 has 1 cells, expected 2')
    expect(e.line).toBe(22)
    expect(e.message).toBe('line 22: row 1 has 1 cells, expected 2')
  })

  it('reports rows which are not closed', () => {
    expect(formatError(books.replace('| Emma | ✗ |', '| Emma | ✗')).reason).toBe('row 2 is not closed by |')
  })

  it('reports text after the table', () => {
    const e = formatError(books + '\nThe end.\n')
    expect(e.reason).toBe('unexpected text in table')
    expect(e.line).toBe(25)
  })

  it('reports a missing separator row', () => {
    expect(formatError(books.replace('| --- | --- |\n', '')).reason).toBe('malformed table separator row')
  })

  it('reports columns in the wrong order', () => {
    expect(formatError(books.replace('| title | read |', '| read | title |')).reason).toBe(
      'table columns [read, title] do not match the declared fields [title, read]'
    )
  })

  it('reports duplicate item ids', () => {
    const text = books.replace(
      '---\n\n# Books',
      "items:\n- id: a\n  created_at: '2024-01-15T10:30:00Z'\n  updated_at: '2024-01-15T10:30:00Z'\n" +
        "- id: a\n  created_at: '2024-01-15T10:30:00Z'\n  updated_at: '2024-01-15T10:30:00Z'\n---\n\n# Books"
    )
    expect(formatError(text).reason).toBe("duplicate item id 'a'")
  })

  // Test 5: data errors
  it('reports columns without a field', () => {
    const text = books.replace('| title | read |', '| title | rating |')
    expect(validationError(text).issues).toEqual([{ field: 'rating', message: 'unknown column' }])
  })

  it('reports cells which do not decode, with row and field', () => {
    const e = validationError(books.replace('| Emma | ✗ |', '| Emma | yes |'))
    expect(e.issues).toEqual([{ row: 2, field: 'read', message: "'yes' is not ✓ or ✗" }])
    expect(e.message).toBe("row 2: field 'read': 'yes' is not ✓ or ✗")
  })

  it('reports missing required values', () => {
    const e = validationError(books.replace('| Dune | ✓ |', '|  | ✓ |'))
    expect(e.issues).toEqual([{ row: 1, field: 'title', message: 'a value is required' }])
  })
})

describe('parseSummary', () => {
  it('reads the header and counts rows', () => {
    const summary = serializer.parseSummary(books)
    expect(summary.name).toBe('Books')
    expect(summary.fields.map((f) => f.name)).toEqual(['title', 'read'])
    expect(summary.itemCount).toBe(2)
    expect(summary.updated_at.toISOString()).toBe('2024-01-16T08:00:00.000Z')
  })

  it('counts no items without a table', () => {
    expect(serializer.parseSummary(serializer.render(new Collection('Empty', 'misc'))).itemCount).toBe(0)
  })
})
