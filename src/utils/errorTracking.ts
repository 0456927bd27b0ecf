/**
 * Error Tracking (Sentry)
 *
 * Production monitoring for report generation.
 *
 * Rules:
 *   - No PII in error reports (names, addresses, phone numbers masked)
 *   - No cell or report content, only counts, positions and IDs
 */

import * as Sentry from '@sentry/node'
import type { ReportConfig } from '../config'

export type ErrorMetadata = Record<string, string | number | boolean>

export interface ErrorContext {
  /** Area of the pipeline the error came from */
  type: 'layout' | 'surface' | 'report' | 'unknown'
  metadata?: ErrorMetadata
}

// ============================================================
// INITIALISATION
// ============================================================

/**
 * Initialise Sentry error tracking.
 * Call once at process start-up.
 */
export function initializeSentry(config: ReportConfig): boolean {
  // Skip initialisation if no DSN configured (local dev, tests)
  if (!config.sentryDsn) {
    return false
  }

  Sentry.init({
    dsn: config.sentryDsn,
    environment: config.environment,
    release: `route-report-tables@${config.appVersion}`,
    tracesSampleRate: config.environment === 'production' ? 0.1 : 1.0,

    // Request bodies may carry route and contact data
    beforeSend(event) {
      if (event.request?.data) {
        event.request.data = '[FILTERED]'
      }
      return event
    },
  })

  return true
}

// ============================================================
// ERROR CAPTURE FUNCTIONS
// ============================================================

/**
 * Capture an error with consistent tagging.
 */
export function captureError(
  error: unknown,
  context: string,
  errorContext?: ErrorContext,
): void {
  Sentry.captureException(error, {
    tags: {
      report_type: errorContext?.type ?? 'unknown',
      report_context: context,
    },
    extra: errorContext?.metadata
      ? sanitizeMetadata(errorContext.metadata)
      : undefined,
    level: 'error',
  })
}

/**
 * Capture a warning: the document is still produced, but degraded.
 * E.g. a link region that could not be registered.
 */
export function captureWarning(
  message: string,
  context: string,
  metadata?: ErrorMetadata,
): void {
  Sentry.captureMessage(message, {
    tags: {
      report_type: 'surface',
      report_context: context,
    },
    extra: metadata ? sanitizeMetadata(metadata) : undefined,
    level: 'warning',
  })
}

// ============================================================
// PII FILTERING
// ============================================================

const PII_FIELDS = ['name', 'email', 'address', 'phone', 'url']

export function sanitizeMetadata(metadata: ErrorMetadata): ErrorMetadata {
  const sanitized: ErrorMetadata = {}

  for (const [key, value] of Object.entries(metadata)) {
    const isPii = PII_FIELDS.some((field) => key.toLowerCase().includes(field))
    sanitized[key] = isPii ? '[REDACTED]' : value
  }

  return sanitized
}
