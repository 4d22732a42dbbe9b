import { dirname } from 'node:path'
import { mkdirSync, appendFileSync } from 'node:fs'
import { colorize, stripAnsi } from './colors'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

interface Logger {
  readonly debug: (msg: string) => void
  readonly info: (msg: string) => void
  readonly warn: (msg: string) => void
  readonly error: (msg: string) => void
  readonly success: (msg: string) => void
  readonly note: (msg: string) => void
  readonly section: (title: string) => void
  readonly json: (val: unknown) => void
  readonly setLevel: (lvl: LogLevel) => void
  readonly setJsonOnly: (on: boolean) => void
  readonly setNoEmoji: (on: boolean) => void
  readonly setNdjson: (on: boolean) => void
  readonly setTimestamps: (on: boolean) => void
  readonly setLogFile: (path: string | undefined) => void
  readonly setRedactors: (patterns: readonly (string | RegExp)[]) => void
}

const RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 }

let level: LogLevel = 'info'
let jsonOnly = false
let noEmoji = false
let ndjson = false
let timestampsOn = false
let logFilePath: string | undefined
let redactors: RegExp[] = []

// Synchronous so that every stage line is on disk before the next stage call.
function appendLogFile(line: string): void {
  if (!logFilePath) return
  try {
    mkdirSync(dirname(logFilePath), { recursive: true })
    appendFileSync(logFilePath, `${new Date().toISOString()} ${stripAnsi(line)}\n`, 'utf8')
  } catch { /* ignore file sink errors */ }
}

function applyRedaction(msg: string): string {
  if (redactors.length === 0) return msg
  let out = msg
  for (const r of redactors) out = out.replace(r, '******')
  return out
}

function enabled(kind: LogLevel): boolean {
  return RANK[kind] <= RANK[level]
}

function write(kind: LogLevel, msg: string): void {
  const redacted: string = applyRedaction(msg)
  // The log file records every level, whatever the console shows.
  appendLogFile(`[${kind}] ${redacted}`)
  if (jsonOnly || !enabled(kind)) return
  const prefix: string = noEmoji
    ? (kind === 'error' ? '[error]' : kind === 'warn' ? '[warn]' : kind === 'info' ? '[info]' : '[debug]')
    : (kind === 'error' ? '✖' : kind === 'warn' ? '⚠' : kind === 'info' ? 'ℹ' : '•')
  const ts: string = timestampsOn ? `${new Date().toISOString()} ` : ''
  const hasAnsi: boolean = redacted.includes('\u001b[')
  const colored: string = hasAnsi ? redacted : (kind === 'error'
    ? colorize('red', redacted)
    : kind === 'warn'
      ? colorize('yellow', redacted)
      : kind === 'info'
        ? colorize('cyan', redacted)
        : colorize('dim', redacted))
  // eslint-disable-next-line no-console
  console[kind === 'error' ? 'error' : 'log'](`${ts}${prefix} ${colored}`)
}

function enrichJson(val: unknown): unknown {
  if (!timestampsOn) return val
  if (val !== null && typeof val === 'object' && !Array.isArray(val)) {
    return { ts: new Date().toISOString(), ...val }
  }
  return val
}

export const logger: Logger = {
  debug: (msg: string): void => { write('debug', msg) },
  info: (msg: string): void => { write('info', msg) },
  warn: (msg: string): void => { write('warn', msg) },
  error: (msg: string): void => { write('error', msg) },
  success: (msg: string): void => { const text = `${noEmoji ? '[ok]' : '✓'} ${msg}`; write('info', colorize('green', text)) },
  note: (msg: string): void => { const text = `${noEmoji ? '[note]' : '✱'} ${msg}`; write('info', colorize('blue', text)) },
  section: (title: string): void => {
    if (jsonOnly || !enabled('info')) return
    const bar = '─'.repeat(Math.max(12, Math.min(60, title.length + 10)))
    // eslint-disable-next-line no-console
    console.log(`${colorize('cyan', bar)}\n${colorize('bold', title)}\n${colorize('cyan', bar)}`)
  },
  json: (val: unknown): void => {
    const v = enrichJson(val)
    const line: string = applyRedaction(ndjson ? JSON.stringify(v) : JSON.stringify(v, null, 2))
    appendLogFile(`[json] ${ndjson ? line : applyRedaction(JSON.stringify(v))}`)
    // eslint-disable-next-line no-console
    console.log(line)
  },
  setLevel: (lvl: LogLevel): void => { level = lvl },
  setJsonOnly: (on: boolean): void => { jsonOnly = on },
  setNoEmoji: (on: boolean): void => { noEmoji = on },
  setNdjson: (on: boolean): void => { ndjson = on; if (on) jsonOnly = true },
  setTimestamps: (on: boolean): void => { timestampsOn = on },
  setLogFile: (path: string | undefined): void => { logFilePath = path && path.length > 0 ? path : undefined },
  setRedactors: (patterns: readonly (string | RegExp)[]): void => {
    redactors = patterns
      .filter((p) => p instanceof RegExp || p.length > 0)
      .map((p) => p instanceof RegExp ? p : new RegExp(escapeRegExp(p), 'g'))
  }
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}
