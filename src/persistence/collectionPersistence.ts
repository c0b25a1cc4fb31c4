import * as fs from 'fs'
import { join } from 'path'
import Debug from 'debug'
import { Collection } from '../collection/collection.js'
import { FormatError, NotFoundError, ValidationError } from '../collection/errors.js'
import { LogLevelEnum, Logger } from '../collection/log.js'
import { AtomicFileWriter, tempFileSuffix } from './atomicFileWriter.js'
import { collectionFileExtension, collectionFileName, decodeFileStem } from './fileNames.js'
import { MarkdownSerializer } from './markdownSerializer.js'
import { CollectionListEntry, ICollectionPersistence, ICollectionSerializer } from './persistence.js'

const debug = Debug('collectionPersistence')
const log = new Logger('collectionPersistence')

function byName(a: CollectionListEntry, b: CollectionListEntry): number {
  if (a.name == b.name) return a.filename < b.filename ? -1 : 1
  return a.name < b.name ? -1 : 1
}

export class CollectionPersistence implements ICollectionPersistence {
  constructor(
    private dataDir: string,
    private serializer: ICollectionSerializer = new MarkdownSerializer(),
    private writer: AtomicFileWriter = new AtomicFileWriter()
  ) {}

  resolve(name: string): string {
    return join(this.dataDir, collectionFileName(name))
  }

  exists(name: string): boolean {
    return fs.existsSync(this.resolve(name))
  }

  /** Summaries of all collection files, sorted by name. Unreadable files are listed with their error */
  list(): CollectionListEntry[] {
    const rc: CollectionListEntry[] = []
    if (!fs.existsSync(this.dataDir)) return rc

    const files: fs.Dirent[] = fs.readdirSync(this.dataDir, { withFileTypes: true })
    files.forEach((de) => {
      // dot files include temp files left behind by an interrupted save
      if (!de.isFile() || de.name.startsWith('.') || de.name.endsWith(tempFileSuffix)) return
      if (!de.name.endsWith(collectionFileExtension)) return
      const filePath = join(this.dataDir, de.name)
      const src: string = fs.readFileSync(filePath, { encoding: 'utf8' })
      try {
        const summary = this.serializer.parseSummary(src)
        rc.push({
          name: summary.name,
          type: summary.type,
          filename: de.name,
          fieldCount: summary.fields.length,
          itemCount: summary.itemCount,
          created_at: summary.created_at,
          updated_at: summary.updated_at,
        })
      } catch (e: unknown) {
        if (!(e instanceof FormatError)) throw e
        log.log(LogLevelEnum.warn, 'Unable to read collection file ' + filePath + ': ' + e.reason)
        const stem = de.name.substring(0, de.name.length - collectionFileExtension.length)
        rc.push({ name: decodeFileStem(stem), filename: de.name, error: e.withPath(filePath) })
      }
    })
    debug('list: ' + rc.length + ' collections')
    return rc.sort(byName)
  }

  load(name: string): Collection {
    const filePath = this.resolve(name)
    if (!fs.existsSync(filePath)) throw new NotFoundError(name)
    const src: string = fs.readFileSync(filePath, { encoding: 'utf8' })
    let collection: Collection
    try {
      collection = this.serializer.parse(src)
    } catch (e: unknown) {
      if (e instanceof FormatError) throw e.withPath(filePath)
      throw e
    }
    if (collection.name != name)
      log.log(LogLevelEnum.warn, filePath + " contains collection '" + collection.name + "', expected '" + name + "'")
    debug('load: ' + filePath + ' items: ' + collection.items.length)
    return collection
  }

  /** Writes the collection atomically. updated_at is refreshed first if the collection changed */
  save(collection: Collection): void {
    const filePath = this.resolve(collection.name)
    if (!fs.existsSync(this.dataDir)) {
      fs.mkdirSync(this.dataDir, { recursive: true })
      debug('creating data directory: ' + this.dataDir)
    }
    this.checkCaseConflict(collection.name)
    if (collection.isModified()) collection.touch()
    this.writer.write(filePath, this.serializer.render(collection))
    collection.markSaved()
    log.log(LogLevelEnum.info, "Saved collection '" + collection.name + "' to " + filePath)
  }

  delete(name: string): void {
    const filePath = this.resolve(name)
    if (!fs.existsSync(filePath)) throw new NotFoundError(name)
    fs.unlinkSync(filePath)
    log.log(LogLevelEnum.info, "Deleted collection '" + name + "' (" + filePath + ')')
  }

  // Names differing only in case would share a file on case-insensitive file systems
  private checkCaseConflict(name: string): void {
    const filename = collectionFileName(name)
    const lower = filename.toLowerCase()
    const other = fs.readdirSync(this.dataDir).find((f) => f != filename && f.toLowerCase() == lower)
    if (other)
      throw new ValidationError({
        message: "collection name '" + name + "' conflicts with existing file " + other + ' (names differ only in case)',
      })
  }
}
