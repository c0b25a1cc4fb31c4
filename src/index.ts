export * from './shared/collection/index.js'
export { Collection } from './collection/collection.js'
export type { FieldInput, IcollectionOptions } from './collection/collection.js'
export { CollectionError, FormatError, NotFoundError, ValidationError } from './collection/errors.js'
export { ConverterMap } from './collection/convertermap.js'
export { LogLevelEnum, Logger } from './collection/log.js'
export { validateField, validateItemData } from './collection/validate.js'
export { Config } from './config.js'
export type { IconfigOptions, Iconfiguration } from './config.js'
export { AtomicFileWriter } from './persistence/atomicFileWriter.js'
export { CollectionPersistence } from './persistence/collectionPersistence.js'
export { collectionFileName, decodeFileStem, encodeFileStem } from './persistence/fileNames.js'
export { MarkdownSerializer } from './persistence/markdownSerializer.js'
export { isUnreadable } from './persistence/persistence.js'
export type {
  CollectionListEntry,
  ICollectionPersistence,
  ICollectionSerializer,
  IcollectionHeader,
  IunreadableCollection,
} from './persistence/persistence.js'
