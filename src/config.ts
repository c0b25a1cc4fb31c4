import * as os from 'os'
import { dirname, isAbsolute, join, resolve } from 'path'
import Debug from 'debug'
import { FormatError } from './collection/errors.js'
import { LogLevelEnum } from './collection/log.js'
import { ConfigPersistence } from './persistence/configPersistence.js'

declare global {
  namespace NodeJS {
    interface ProcessEnv {
      LISTICLES_DATA_DIR?: string
      LISTICLES_CONFIG?: string
    }
  }
}

const debug = Debug('config')
export const defaultDataDirName = 'listicles-data'

export interface Iconfiguration {
  dataDir: string
  logLevel: LogLevelEnum
  configPath: string
}

/** Values given on the command line; they win over everything else */
export interface IconfigOptions {
  dataDir?: string
  config?: string
  logLevel?: LogLevelEnum
}

function isLogLevel(v: string): v is LogLevelEnum {
  return Object.values(LogLevelEnum).some((l) => l === v)
}

function expandHome(p: string, home: string): string {
  if (p == '~') return home
  if (p.startsWith('~/')) return join(home, p.substring(2))
  return p
}

export class Config {
  static getDefaultConfigPath(home: string = os.homedir()): string {
    return join(home, '.config', 'listicles', 'config.yaml')
  }

  /**
   * Resolves the configuration. Precedence: command line, environment, configuration file, defaults.
   * Relative directories in the configuration file are relative to the file.
   */
  static resolve(options: IconfigOptions = {}, env: NodeJS.ProcessEnv = process.env, home: string = os.homedir()): Iconfiguration {
    const configPath = resolve(expandHome(options.config ?? env.LISTICLES_CONFIG ?? Config.getDefaultConfigPath(home), home))
    const file = new ConfigPersistence(configPath).read() ?? {}

    let dataDir: string
    if (options.dataDir) dataDir = resolve(expandHome(options.dataDir, home))
    else if (env.LISTICLES_DATA_DIR) dataDir = resolve(expandHome(env.LISTICLES_DATA_DIR, home))
    else if (file.dataDir) {
      const d = expandHome(file.dataDir, home)
      dataDir = isAbsolute(d) ? d : resolve(dirname(configPath), d)
    } else dataDir = join(home, defaultDataDirName)

    let logLevel = LogLevelEnum.info
    if (options.logLevel) logLevel = options.logLevel
    else if (file.logLevel) {
      if (!isLogLevel(file.logLevel))
        throw new FormatError(
          "unknown logLevel '" + file.logLevel + "', expected one of " + Object.values(LogLevelEnum).join(', '),
          undefined,
          configPath
        )
      logLevel = file.logLevel
    }
    debug('dataDir: ' + dataDir + ' logLevel: ' + logLevel)
    return { dataDir, logLevel, configPath }
  }
}
