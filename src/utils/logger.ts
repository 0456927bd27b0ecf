/**
 * Structured Logging
 *
 * One JSON object per line, tagged with service name and timestamp.
 * Cell text never goes into a log entry, only counts and positions.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogFields = Record<string, string | number | boolean | null>

interface StructuredLog extends LogFields {
  level: LogLevel
  event: string
}

const SERVICE = 'route-report-tables'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

let minimumLevel: LogLevel = 'info'

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level
}

export function getLogLevel(): LogLevel {
  return minimumLevel
}

function structuredLog(log: StructuredLog): void {
  if (LEVEL_ORDER[log.level] < LEVEL_ORDER[minimumLevel]) return

  const line = JSON.stringify({
    ...log,
    service: SERVICE,
    timestamp: new Date().toISOString(),
  })

  if (log.level === 'error') {
    console.error(line)
  } else {
    console.log(line)
  }
}

export const logger = {
  debug(event: string, fields: LogFields = {}): void {
    structuredLog({ ...fields, level: 'debug', event })
  },
  info(event: string, fields: LogFields = {}): void {
    structuredLog({ ...fields, level: 'info', event })
  },
  warn(event: string, fields: LogFields = {}): void {
    structuredLog({ ...fields, level: 'warn', event })
  },
  error(event: string, fields: LogFields = {}): void {
    structuredLog({ ...fields, level: 'error', event })
  },
}
