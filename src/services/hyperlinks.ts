/**
 * Hyperlink Regions
 *
 * A link's clickable area is the box around its rendered text, not the
 * cell: clicking the empty part of a cell does nothing.
 *
 * @module services/hyperlinks
 */

import type { DrawingSurface, FontMetricsProvider, FontStyle } from '../types/surface'
import type { WrappedLines } from '../types/table'
import { estimateAscent, estimateDescent, estimateTextWidth, measureWithFallback } from './fontMetrics'
import { guardSurfaceCall } from './surfaceErrors'

export interface HotZone {
  /** Bottom-left corner */
  x: number
  y: number
  width: number
  height: number
}

/**
 * Bounding box of link text drawn line by line from `x`, the first
 * baseline at `firstBaseline` and each following line `lineSpacing`
 * lower.
 */
export function linkHotZone(
  lines: WrappedLines,
  x: number,
  firstBaseline: number,
  lineSpacing: number,
  font: FontStyle,
  size: number,
  metrics: FontMetricsProvider,
): HotZone {
  const width = lines.reduce(
    (max, line) => Math.max(
      max,
      measureWithFallback(() => metrics.widthOf(line, font, size), () => estimateTextWidth(line, size)),
    ),
    0,
  )
  const ascent = measureWithFallback(() => metrics.ascentOf(font, size), () => estimateAscent(size))
  const descent = measureWithFallback(() => metrics.descentOf(font, size), () => estimateDescent(size))

  const lastBaseline = firstBaseline - (Math.max(lines.length, 1) - 1) * lineSpacing
  const top = firstBaseline + ascent
  const bottom = lastBaseline - descent

  return { x, y: bottom, width, height: top - bottom }
}

/**
 * Register a hot-zone on the surface's current page. Zero-width zones
 * (empty link text) are skipped. Returns whether a region was registered.
 */
export function registerLinkRegion(
  surface: DrawingSurface,
  url: string,
  zone: HotZone,
  continueOnError = false,
): boolean {
  if (zone.width <= 0 || zone.height <= 0) return false

  return guardSurfaceCall(
    continueOnError,
    'registerLink',
    { x: zone.x, y: zone.y, width: zone.width, height: zone.height },
    () => surface.registerLink(url, zone.x, zone.y, zone.width, zone.height),
  )
}
