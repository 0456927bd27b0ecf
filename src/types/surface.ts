/**
 * Drawing Surface Types
 *
 * The low-level page drawing capability the table engine is built on.
 * Coordinates are PDF user space: points, origin at the bottom-left
 * corner of the page, y growing upwards.
 *
 * @module types/surface
 */

import type { RGB } from 'pdf-lib'

/** Colours are pdf-lib RGB values (see `rgb()`) */
export type Colour = RGB

/** The two faces every report embeds */
export type FontStyle = 'regular' | 'bold'

export interface RectOptions {
  /** Fill with the current fill colour */
  fill: boolean
  /** Outline with the current stroke colour */
  stroke: boolean
}

/**
 * Immediate-mode page drawing. No flow layout, no wrapping, no
 * pagination: every call draws exactly what it is told on the
 * current page.
 */
export interface DrawingSurface {
  setFillColour(colour: Colour): void
  setStrokeColour(colour: Colour): void
  /** (x, y) is the bottom-left corner of the rectangle */
  drawRect(x: number, y: number, width: number, height: number, options: RectOptions): void
  /** (x, y) is the start of the text baseline. Text uses the fill colour. */
  drawText(x: number, y: number, text: string, font: FontStyle, size: number): void
  measureText(text: string, font: FontStyle, size: number): number
  startNewPage(): void
  /** Register a clickable URI region on the current page */
  registerLink(url: string, x: number, y: number, width: number, height: number): void
}

/**
 * Font metrics the layout engine measures with. Injected per render;
 * a provider may throw (unknown glyph, font not loaded), in which case
 * the engine falls back to a character-count estimate.
 */
export interface FontMetricsProvider {
  widthOf(text: string, font: FontStyle, size: number): number
  /** Height above the baseline */
  ascentOf(font: FontStyle, size: number): number
  /** Depth below the baseline, as a positive number */
  descentOf(font: FontStyle, size: number): number
}
