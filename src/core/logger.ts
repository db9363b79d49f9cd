import { createWriteStream, mkdirSync, existsSync } from 'fs'
import { join } from 'path'
import type { WriteStream } from 'fs'

const LOG_NAME = 'gm8-loader.log'

let stream: WriteStream | null = null
let logDir = ''
let echo = true

function ts(): string { return new Date().toISOString().slice(11, 23) }

/**
 * Open `<dir>/gm8-loader.log`, truncating any previous run's log. `dir` is
 * used as given and created if missing. A second call closes the open file.
 */
export function initLogger(dir: string): void {
  logDir = dir
  if (!existsSync(logDir)) mkdirSync(logDir, { recursive: true })
  stream?.end()
  stream = createWriteStream(join(logDir, LOG_NAME), { flags: 'w' })
  stream.write(`=== gm8-loader started ${new Date().toISOString()} ===\n`)
}

/** Mirror log lines to the console (on by default). */
export function setConsoleOutput(enabled: boolean): void {
  echo = enabled
}

function write(level: string, msg: string): void {
  const line = `${ts()} [${level}] ${msg}\n`
  stream?.write(line)
}

export function log(msg: string): void {
  if (echo) console.log(`${ts()} ${msg}`)
  write('INFO', msg)
}

export function warn(msg: string): void {
  if (echo) console.warn(`${ts()} [WARN] ${msg}`)
  write('WARN', msg)
}

export function error(msg: string, err?: unknown): void {
  const detail = err ? ` ${err instanceof Error ? err.stack || err.message : String(err)}` : ''
  if (echo) console.error(`${ts()} [ERROR] ${msg}${detail}`)
  write('ERROR', `${msg}${detail}`)
}

/** Path of the open log file, or '' before `initLogger`. */
export function getLogPath(): string {
  return logDir ? join(logDir, LOG_NAME) : ''
}
