import { parse } from 'yaml'
import * as fs from 'fs'
import Debug from 'debug'
import { FormatError } from '../collection/errors.js'

const debug = Debug('configPersistence')

/** Contents of the optional YAML configuration file */
export interface IconfigFile {
  dataDir?: string
  logLevel?: string
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

export class ConfigPersistence {
  constructor(private configPath: string) {}

  read(): IconfigFile | undefined {
    if (!fs.existsSync(this.configPath)) {
      debug('no configuration file at ' + this.configPath)
      return undefined
    }
    const src: string = fs.readFileSync(this.configPath, { encoding: 'utf8' })
    let o: unknown
    try {
      o = parse(src)
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e)
      throw new FormatError('malformed configuration: ' + msg, undefined, this.configPath)
    }
    if (o === null || o === undefined) return {}
    if (!isRecord(o)) throw new FormatError('configuration must be a mapping', undefined, this.configPath)
    const rc: IconfigFile = {}
    const dataDir = o['dataDir']
    if (dataDir !== undefined) {
      if (typeof dataDir !== 'string') throw new FormatError('dataDir must be a string', undefined, this.configPath)
      rc.dataDir = dataDir
    }
    const logLevel = o['logLevel']
    if (logLevel !== undefined) {
      if (typeof logLevel !== 'string') throw new FormatError('logLevel must be a string', undefined, this.configPath)
      rc.logLevel = logLevel
    }
    return rc
  }
}
