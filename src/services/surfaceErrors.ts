/**
 * Surface failure policy: rethrow, or report and keep drawing.
 *
 * @module services/surfaceErrors
 */

import { captureWarning } from '../utils/errorTracking'
import type { ErrorMetadata } from '../utils/errorTracking'
import { logger } from '../utils/logger'

/**
 * Run a drawing call. With continueOnError the failure is logged and
 * sent to Sentry as a warning and false is returned; otherwise it
 * propagates.
 */
export function guardSurfaceCall(
  continueOnError: boolean,
  operation: string,
  metadata: ErrorMetadata,
  draw: () => void,
): boolean {
  try {
    draw()
    return true
  } catch (error) {
    if (!continueOnError) throw error

    const reason = error instanceof Error ? error.message : String(error)
    logger.warn('surface.call_failed', { ...metadata, operation, reason })
    captureWarning(`Drawing surface ${operation} failed: ${reason}`, 'table-render', metadata)
    return false
  }
}
