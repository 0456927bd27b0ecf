/**
 * Runtime Configuration
 *
 * Read once at document-generation start and passed down explicitly.
 *
 * @module config
 */

import { initializeSentry } from './utils/errorTracking'
import { logger, setLogLevel } from './utils/logger'
import type { LogLevel } from './utils/logger'

export interface ReportConfig {
  environment: string
  appVersion: string
  sentryDsn: string
  logLevel: LogLevel
  /** Keep rendering when a drawing call fails */
  continueOnError: boolean
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

function parseLogLevel(value: string | undefined): LogLevel {
  const normalised = (value ?? '').trim().toLowerCase()
  return LOG_LEVELS.find((level) => level === normalised) ?? 'info'
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ReportConfig {
  return {
    environment: env.NODE_ENV ?? 'development',
    appVersion: env.APP_VERSION ?? '1.0.0',
    sentryDsn: env.SENTRY_DSN ?? '',
    logLevel: parseLogLevel(env.LOG_LEVEL),
    continueOnError: (env.REPORT_CONTINUE_ON_ERROR ?? 'false').toLowerCase() === 'true',
  }
}

/**
 * Apply a config to the process: log level and Sentry. Call once at
 * start-up, before generating reports.
 */
export function configureReporting(config: ReportConfig = loadConfig()): ReportConfig {
  setLogLevel(config.logLevel)
  const sentryEnabled = initializeSentry(config)

  logger.info('reporting.configured', {
    environment: config.environment,
    logLevel: config.logLevel,
    sentryEnabled,
    continueOnError: config.continueOnError,
  })

  return config
}
