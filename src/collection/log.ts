import Debug from 'debug'
import { format } from 'util'
import winston, { Logger as WinstonLogger } from 'winston'
import Transport from 'winston-transport'
export enum LogLevelEnum {
  verbose = 'verbose',
  info = 'info',
  warn = 'warn',
  error = 'error',
}
const debug = Debug('logger')
const underTest = process.env['VITEST'] !== undefined

interface IlogInfo {
  level?: string
  label?: string
  prefix?: string
  message?: unknown
  timestamp?: string
}

class DebugTransport extends Transport {
  constructor() {
    super()
  }
  // Winston transport contract: log(info, next)
  override log(info: IlogInfo, next?: () => void) {
    setImmediate(() => {
      const level = info.level ?? 'info'
      const label = info.label ?? info.prefix ?? ''
      const msg = typeof info.message !== 'undefined' ? String(info.message) : JSON.stringify(info)
      const prefix = label ? ` ${label}` : ''
      debug(`${level}${prefix}: ${msg}`)
      this.emit('logged', info)
    })
    if (next) next()
  }
}

let globalLevel: LogLevelEnum = LogLevelEnum.info
const loggers: Logger[] = []

/* Logger makes it easy to set a source file specific prefix.
 * Under the test runner, output is routed through debug() (quiet unless DEBUG includes 'logger')
 */
export class Logger {
  private logger: WinstonLogger

  static setLevel(level: LogLevelEnum): void {
    globalLevel = level
    loggers.forEach((l) => {
      l.logger.level = level
    })
  }

  constructor(private prefix: string) {
    const commonLabel = winston.format.label({ label: this.prefix })
    const format = !underTest
      ? winston.format.combine(
          winston.format.timestamp(),
          commonLabel,
          winston.format.printf((info) => {
            const i = info as IlogInfo
            const time = i.timestamp ?? ''
            const label = i.label ?? i.prefix ?? ''
            return `${time} ${i.level ?? ''}${label ? ' ' + label : ''}: ${String(i.message ?? '')}`
          })
        )
      : winston.format.combine(
          commonLabel,
          winston.format.printf((info) => {
            const i = info as IlogInfo
            const label = i.label ?? i.prefix ?? ''
            return `${i.level ?? ''}${label ? ' ' + label : ''}: ${String(i.message ?? '')}`
          })
        )

    // Console output goes to stderr so command output on stdout stays clean
    const loggerTransport = underTest
      ? new DebugTransport()
      : new winston.transports.Console({ stderrLevels: Object.values(LogLevelEnum) })
    this.logger = winston.createLogger({
      level: globalLevel,
      format: format,
      transports: [loggerTransport],
    })
    loggers.push(this)
  }

  log(level: LogLevelEnum, message: unknown, ...args: unknown[]) {
    const msg = format(message, ...args)
    this.logger.log({ level: level, message: msg, prefix: this.prefix })
  }
}
