/**
 * PDF Styles & Drawing Helpers
 *
 * Shared constants and utility functions for route report generation.
 * All measurements in PDF points (1 point = 1/72 inch).
 * A4 = 595.28 x 841.89 points.
 *
 * @module services/pdfStyles
 */
import { rgb } from 'pdf-lib'
import type { Colour, DrawingSurface, FontMetricsProvider } from '../types/surface'
import type { PageGeometry, TableStyle } from '../types/table'
import { estimateTextWidth, measureWithFallback } from './fontMetrics'

// ============================================================
// PAGE DIMENSIONS (A4)
// ============================================================

export const PAGE = {
  width: 595.28,
  height: 841.89,
  marginLeft: 40,
  marginRight: 40,
  marginTop: 40,
  marginBottom: 50,
} as const

/** Usable content width */
export const CONTENT_WIDTH = PAGE.width - PAGE.marginLeft - PAGE.marginRight

// ============================================================
// COLOURS
// ============================================================

export const COLOURS = {
  // Text
  text: rgb(0.13, 0.13, 0.15),
  muted: rgb(0.42, 0.42, 0.48),
  label: rgb(0.35, 0.35, 0.4),
  link: rgb(0.1, 0.35, 0.8),

  // Backgrounds
  white: rgb(1, 1, 1),
  rowAlt: rgb(0.96, 0.96, 0.97),
  headerBg: rgb(0.12, 0.14, 0.18),
  sectionBg: rgb(0.2, 0.23, 0.28),

  // UI
  accent: rgb(0.85, 0.33, 0.1),
  border: rgb(0.82, 0.82, 0.85),
  borderLight: rgb(0.88, 0.88, 0.9),

  // Risk levels
  riskCritical: rgb(0.75, 0.1, 0.1),
  riskHigh: rgb(0.88, 0.35, 0.05),
  riskMedium: rgb(0.88, 0.6, 0.05),
  riskLow: rgb(0.14, 0.6, 0.25),
} as const

// ============================================================
// FONT SIZES
// ============================================================

export const FONT = {
  title: 16,
  sectionHeader: 9,
  label: 7,
  value: 8,
  tableTitle: 8,
  tableHeader: 7,
  tableBody: 7,
  small: 5.5,
  pageNumber: 7,
} as const

// ============================================================
// SPACING
// ============================================================

export const SPACING = {
  sectionGap: 12,
  fieldRowGap: 14,
  sectionHeaderHeight: 18,
  sectionHeaderPadding: 5,
  tableTitleHeight: 16,
  tableHeaderHeight: 14,
  tableRowHeight: 12,
  pageHeaderHeight: 46,
  lineHeight: 1.3,
} as const

/** Where content starts on a page, below the header band */
export const CONTENT_TOP = PAGE.height - PAGE.marginTop - SPACING.pageHeaderHeight - SPACING.sectionGap

/** Page limits for tables in a report body */
export const REPORT_GEOMETRY: PageGeometry = {
  topY: CONTENT_TOP,
  bottomMargin: PAGE.marginBottom,
}

export const DEFAULT_TABLE_STYLE: TableStyle = {
  titleBackground: COLOURS.sectionBg,
  titleText: COLOURS.white,
  headerBackground: COLOURS.headerBg,
  headerText: COLOURS.white,
  rowBackground: COLOURS.white,
  altRowBackground: COLOURS.rowAlt,
  bodyText: COLOURS.text,
  linkText: COLOURS.link,
  border: COLOURS.borderLight,
  noteText: COLOURS.muted,

  titleSize: FONT.tableTitle,
  headerSize: FONT.tableHeader,
  bodySize: FONT.tableBody,
  noteSize: FONT.small,

  headerLineSpacing: FONT.tableHeader * SPACING.lineHeight,
  bodyLineSpacing: FONT.tableBody * SPACING.lineHeight,
  cellPadding: 3,
  verticalPadding: 5,
  minHeaderHeight: SPACING.tableHeaderHeight,
  minRowHeight: SPACING.tableRowHeight,
  titleHeight: SPACING.tableTitleHeight,
}

// ============================================================
// DRAWING HELPERS
// ============================================================

/**
 * Draw a section header bar with white uppercase text.
 * Returns the new Y position below the header.
 */
export function drawSectionHeader(
  surface: DrawingSurface,
  y: number,
  label: string,
): number {
  surface.setFillColour(COLOURS.sectionBg)
  surface.drawRect(PAGE.marginLeft, y - SPACING.sectionHeaderHeight, CONTENT_WIDTH, SPACING.sectionHeaderHeight, {
    fill: true,
    stroke: false,
  })

  // Accent left edge
  surface.setFillColour(COLOURS.accent)
  surface.drawRect(PAGE.marginLeft, y - SPACING.sectionHeaderHeight, 3, SPACING.sectionHeaderHeight, {
    fill: true,
    stroke: false,
  })

  surface.setFillColour(COLOURS.white)
  surface.drawText(
    PAGE.marginLeft + 8,
    y - SPACING.sectionHeaderHeight + SPACING.sectionHeaderPadding,
    label.toUpperCase(),
    'bold',
    FONT.sectionHeader,
  )

  return y - SPACING.sectionHeaderHeight - 6
}

/**
 * Draw a single label + value field on one line.
 * Value is truncated with an ellipsis if it exceeds the available width.
 */
export function drawField(
  surface: DrawingSurface,
  metrics: FontMetricsProvider,
  y: number,
  label: string,
  value: string,
  options?: {
    x?: number
    labelWidth?: number
    valueColour?: Colour
  },
): number {
  const x = options?.x ?? PAGE.marginLeft
  const labelWidth = options?.labelWidth ?? 130
  const maxWidth = PAGE.width - PAGE.marginRight - x - labelWidth

  surface.setFillColour(COLOURS.label)
  surface.drawText(x, y, label, 'regular', FONT.label)

  const fullValue = value || '—'
  let displayValue = fullValue
  const widthOf = (text: string): number => measureWithFallback(
    () => metrics.widthOf(text, 'bold', FONT.value),
    () => estimateTextWidth(text, FONT.value),
  )
  while (displayValue.length > 1 && widthOf(displayValue) > maxWidth) {
    displayValue = displayValue.slice(0, -1)
  }
  if (displayValue.length < fullValue.length && displayValue.length > 2) {
    displayValue = displayValue.slice(0, -1) + '…'
  }

  surface.setFillColour(options?.valueColour ?? COLOURS.text)
  surface.drawText(x + labelWidth, y, displayValue, 'bold', FONT.value)

  return y - SPACING.fieldRowGap
}

/**
 * Check if we need a new page to fit the required height.
 */
export function needsNewPage(y: number, requiredHeight: number, geometry: PageGeometry = REPORT_GEOMETRY): boolean {
  return y - requiredHeight < geometry.bottomMargin
}

export type RiskLevel = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW'

/**
 * Get the colour for a risk level.
 */
export function getRiskColour(level: RiskLevel): Colour {
  switch (level) {
    case 'CRITICAL': return COLOURS.riskCritical
    case 'HIGH': return COLOURS.riskHigh
    case 'MEDIUM': return COLOURS.riskMedium
    case 'LOW': return COLOURS.riskLow
  }
}

