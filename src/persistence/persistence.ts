/**
 * Persistence interfaces for filesystem abstraction.
 * The CLI uses these interfaces; implementations handle the file format and filesystem I/O.
 */
import { IcollectionSummary, Ifield } from '../shared/collection/index.js'
import { Collection } from '../collection/collection.js'
import { FormatError } from '../collection/errors.js'

/** Collection-level metadata, without items */
export interface IcollectionHeader {
  name: string
  type: string
  created_at: Date
  updated_at: Date
  fields: Ifield[]
}

/** Converts a collection to its file text and back */
export interface ICollectionSerializer {
  render(collection: Collection): string
  parse(text: string): Collection
  parseSummary(text: string): IcollectionHeader & { itemCount: number }
}

/** A file in the data directory which could not be summarised */
export interface IunreadableCollection {
  name: string
  filename: string
  error: FormatError
}

export type CollectionListEntry = IcollectionSummary | IunreadableCollection

export function isUnreadable(entry: CollectionListEntry): entry is IunreadableCollection {
  return 'error' in entry
}

/** Persistence for named collections, one file per collection */
export interface ICollectionPersistence {
  resolve(name: string): string
  list(): CollectionListEntry[]
  exists(name: string): boolean
  load(name: string): Collection
  save(collection: Collection): void
  delete(name: string): void
}
