import fs from 'fs'
import { Writable } from 'stream'
import pino, { type Logger } from 'pino'
import type { LogSeverity } from '../config/env'

export type AppLogger = Logger<'success'>

const levelMap: Record<number, string> = {
  10: 'TRACE',
  20: 'DEBUG',
  30: 'INFO',
  35: 'SUCCESS',
  40: 'WARN',
  50: 'ERROR',
  60: 'FATAL',
}

// Fields pino adds to every entry, not worth repeating on each line
const OMITTED_FIELDS = new Set(['level', 'time', 'msg', 'pid', 'hostname'])

/**
 * Render one pino JSON entry as a text line:
 * `2026-01-05T10:00:00.000Z INFO    [MQTT] Connected to broker {"broker":"..."}`
 *
 * Messages without a `[CATEGORY]` prefix are filed under SYSTEM. Generic
 * Fastify request chatter returns null and is dropped.
 */
export function formatLogLine(entry: string): string | null {
  let parsed: Record<string, unknown>
  try {
    parsed = JSON.parse(entry)
  } catch {
    return entry.trimEnd()
  }

  const rawMsg = typeof parsed.msg === 'string' ? parsed.msg : ''
  if (
    rawMsg === 'incoming request' ||
    rawMsg === 'request completed' ||
    rawMsg.startsWith('Server listening at')
  ) {
    return null
  }

  let category = 'SYSTEM'
  let msg = rawMsg
  // `[CATEGORY]` or `[CATEGORY:extra]`, optionally behind a success mark
  const categoryMatch = rawMsg.match(/^(✓\s*)?\[([A-Z0-9_]+)(?::[^\]]+)?\]\s*/)
  if (categoryMatch) {
    category = categoryMatch[2]
    msg = (categoryMatch[1] ?? '') + rawMsg.slice(categoryMatch[0].length)
  }

  const level = typeof parsed.level === 'number' ? levelMap[parsed.level] ?? String(parsed.level) : 'INFO'
  const time = new Date(typeof parsed.time === 'number' ? parsed.time : Date.now()).toISOString()

  const details: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(parsed)) {
    if (!OMITTED_FIELDS.has(key)) details[key] = value
  }
  const suffix = Object.keys(details).length > 0 ? ` ${JSON.stringify(details)}` : ''

  return `${time} ${level.padEnd(7)} [${category}] ${msg}${suffix}`
}

export function createLogStream(destination: NodeJS.WritableStream): Writable {
  return new Writable({
    write(chunk, encoding, callback) {
      const lines = chunk.toString().split('\n')
      for (const line of lines) {
        if (line.trim() === '') continue
        const formatted = formatLogLine(line)
        if (formatted !== null) destination.write(`${formatted}\n`)
      }
      callback()
    },
  })
}

/**
 * Append stream for `[logging] filename`. An unwritable file is fatal, like
 * any other configuration error.
 */
export function openLogFile(filename: string): fs.WriteStream {
  const stream = fs.createWriteStream(filename, { flags: 'a' })
  stream.on('error', err => {
    process.stderr.write(`Cannot write log file ${filename}: ${err.message}\n`)
    process.exit(1)
  })
  return stream
}

export interface LoggerOptions {
  severity: LogSeverity
  filename?: string
  destination?: NodeJS.WritableStream
}

/**
 * Build the process logger. Writes to `filename` (appending) when one is
 * configured, otherwise to stdout. Fastify receives the same instance.
 */
export function createLogger(options: LoggerOptions): AppLogger {
  const destination =
    options.destination ?? (options.filename ? openLogFile(options.filename) : process.stdout)

  return pino<'success'>(
    {
      level: options.severity,
      // Above info so successes stay visible at the default severity
      customLevels: {
        success: 35,
      },
    },
    createLogStream(destination)
  )
}
