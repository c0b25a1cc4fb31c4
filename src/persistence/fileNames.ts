import { ValidationError } from '../collection/errors.js'

export const collectionFileExtension = '.md'
const maxStemBytes = 240
const safeChar = /^[\p{L}\p{N} _\-.,()'&+=!~@]$/u
const deviceName = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])$/i

function percentEncode(ch: string): string {
  return Array.from(Buffer.from(ch, 'utf8'))
    .map((b) => '%' + b.toString(16).toUpperCase().padStart(2, '0'))
    .join('')
}

/**
 * Maps a collection name to a file name stem.
 * Every character which is unsafe in file names is percent-encoded, so the mapping is reversible and
 * two different names never share a file. Names are case-sensitive.
 */
export function encodeFileStem(name: string): string {
  if (name.length == 0) throw new ValidationError({ message: 'collection name must not be empty' })
  // lone surrogates would all encode as U+FFFD
  if (/\p{Surrogate}/u.test(name))
    throw new ValidationError({ message: 'collection name contains an unpaired surrogate character' })
  const chars = Array.from(name).map((ch) => (safeChar.test(ch) ? ch : percentEncode(ch)))
  if (chars[0] == '.') chars[0] = percentEncode('.')
  const last = chars.length - 1
  if (chars[last] == '.' || chars[last] == ' ') chars[last] = percentEncode(chars[last])
  let stem = chars.join('')
  if (deviceName.test(stem.split('.')[0])) stem = percentEncode(stem[0]) + stem.substring(1)
  if (Buffer.byteLength(stem, 'utf8') > maxStemBytes)
    throw new ValidationError({ message: "collection name '" + name + "' is too long for a file name" })
  return stem
}

/** Reverses encodeFileStem. Stems which were not written by encodeFileStem are returned as they are */
export function decodeFileStem(stem: string): string {
  try {
    return decodeURIComponent(stem)
  } catch {
    return stem
  }
}

export function collectionFileName(name: string): string {
  return encodeFileStem(name) + collectionFileExtension
}
