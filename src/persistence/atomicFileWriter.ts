import * as fs from 'fs'
import { basename, dirname, join } from 'path'
import { randomBytes } from 'crypto'
import Debug from 'debug'

const debug = Debug('atomicFileWriter')
export const tempFileSuffix = '.tmp'

/**
 * Replaces a file in one step: the content goes to a temp file in the same directory, which is then renamed
 * over the target. If anything fails, the previous target stays as it was.
 */
export class AtomicFileWriter {
  write(target: string, content: string): void {
    const tmp = this.tempPathFor(target)
    try {
      this.writeTemp(tmp, content, this.modeFor(target))
      this.replace(tmp, target)
    } catch (e) {
      this.discard(tmp)
      throw e
    }
    debug('write: ' + target)
  }

  tempPathFor(target: string): string {
    const unique = process.pid + '.' + randomBytes(4).toString('hex')
    return join(dirname(target), '.' + basename(target) + '.' + unique + tempFileSuffix)
  }

  protected writeTemp(tmp: string, content: string, mode: number): void {
    const fd = fs.openSync(tmp, 'wx', mode)
    try {
      fs.writeFileSync(fd, content, { encoding: 'utf8' })
      fs.fsyncSync(fd)
    } finally {
      fs.closeSync(fd)
    }
  }

  protected replace(tmp: string, target: string): void {
    fs.renameSync(tmp, target)
  }

  protected discard(tmp: string): void {
    if (!fs.existsSync(tmp)) return
    try {
      fs.unlinkSync(tmp)
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e)
      debug('Unable to remove temp file ' + tmp + ': ' + msg)
    }
  }

  private modeFor(target: string): number {
    return fs.existsSync(target) ? fs.statSync(target).mode & 0o777 : 0o644
  }
}
