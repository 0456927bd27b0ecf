/**
 * Font Metrics Providers
 *
 * pdf-lib backed metrics for embedded fonts, a provider derived from any
 * Drawing Surface, and the fixed-ratio estimate used when measuring fails.
 *
 * @module services/fontMetrics
 */

import type { PDFFont } from 'pdf-lib'
import type { DrawingSurface, FontMetricsProvider, FontStyle } from '../types/surface'

export interface FontSet {
  regular: PDFFont
  bold: PDFFont
}

/** Average glyph width as a fraction of the font size */
export const AVERAGE_CHAR_WIDTH = 0.5
const ASCENT_RATIO = 0.75
const DESCENT_RATIO = 0.25

// ============================================================
// ESTIMATES
// ============================================================

export function estimateTextWidth(text: string, size: number): number {
  return text.length * size * AVERAGE_CHAR_WIDTH
}

/** How many characters fit in maxWidth at this size, never less than 1 */
export function estimateCharsPerLine(maxWidth: number, size: number): number {
  return Math.max(1, Math.floor(maxWidth / (size * AVERAGE_CHAR_WIDTH)))
}

export function estimateAscent(size: number): number {
  return size * ASCENT_RATIO
}

export function estimateDescent(size: number): number {
  return size * DESCENT_RATIO
}

/**
 * Run a measurement, falling back to an estimate when the font cannot
 * measure the text (e.g. a glyph outside its encoding).
 */
export function measureWithFallback(measure: () => number, estimate: () => number): number {
  try {
    return measure()
  } catch {
    return estimate()
  }
}

// ============================================================
// PROVIDERS
// ============================================================

/**
 * Metrics read from embedded pdf-lib fonts. widthOf throws for glyphs
 * the font cannot encode.
 */
export function createPdfFontMetrics(fonts: FontSet): FontMetricsProvider {
  return {
    widthOf(text: string, font: FontStyle, size: number): number {
      return fonts[font].widthOfTextAtSize(text, size)
    },
    ascentOf(font: FontStyle, size: number): number {
      return fonts[font].heightAtSize(size, { descender: false })
    },
    descentOf(font: FontStyle, size: number): number {
      const pdfFont = fonts[font]
      return pdfFont.heightAtSize(size) - pdfFont.heightAtSize(size, { descender: false })
    },
  }
}

/**
 * Widths measured through the surface itself; vertical metrics estimated.
 */
export function surfaceMetrics(surface: DrawingSurface): FontMetricsProvider {
  return {
    widthOf: (text, font, size) => surface.measureText(text, font, size),
    ascentOf: (_font, size) => estimateAscent(size),
    descentOf: (_font, size) => estimateDescent(size),
  }
}

/** Pure estimates, no font data */
export const estimatedMetrics: FontMetricsProvider = {
  widthOf: (text, _font, size) => estimateTextWidth(text, size),
  ascentOf: (_font, size) => estimateAscent(size),
  descentOf: (_font, size) => estimateDescent(size),
}
