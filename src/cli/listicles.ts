#!/usr/bin/env node
import { createProgram } from './program.js'
import { LogLevelEnum, Logger } from '../collection/log.js'

const log = new Logger('listicles')

process.on('unhandledRejection', (reason) => {
  log.log(LogLevelEnum.error, 'Unhandled Rejection: ' + String(reason))
})

try {
  createProgram().parse(process.argv)
} catch (e: unknown) {
  const msg = e instanceof Error ? e.message : String(e)
  log.log(LogLevelEnum.error, msg)
  process.exitCode = 2
}
