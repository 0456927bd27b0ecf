/**
 * Row Height Calculation
 *
 * A row is as tall as its longest wrapped cell, never shorter than the
 * minimum row height. Recomputed for every row.
 *
 * @module services/rowHeight
 */

import type { FontMetricsProvider, FontStyle } from '../types/surface'
import type { Row, TableStyle, WrappedLines } from '../types/table'
import { wrapText } from './textWrap'

export interface RowMetricsOptions {
  font: FontStyle
  fontSize: number
  lineSpacing: number
  /** Horizontal inset on each side of the cell */
  cellPadding: number
  verticalPadding: number
  minRowHeight: number
  metrics?: FontMetricsProvider
}

export interface MeasuredRow {
  /** Wrapped lines per cell, in column order */
  lines: WrappedLines[]
  height: number
}

/** Width text may occupy inside a column */
export function textWidthForColumn(columnWidth: number, cellPadding: number): number {
  return Math.max(0, columnWidth - 2 * cellPadding)
}

/**
 * Wrap every cell of a row and compute the row height.
 */
export function measureRow(
  texts: readonly string[],
  columnWidths: readonly number[],
  options: RowMetricsOptions,
): MeasuredRow {
  const lines = texts.map((text, i) =>
    wrapText(
      text,
      options.font,
      options.fontSize,
      textWidthForColumn(columnWidths[i] ?? 0, options.cellPadding),
      options.metrics,
    ),
  )

  const maxLineCount = lines.reduce((max, cellLines) => Math.max(max, cellLines.length), 1)
  const height = Math.max(options.minRowHeight, maxLineCount * options.lineSpacing + options.verticalPadding)

  return { lines, height }
}

export function rowHeight(
  row: Row,
  columnWidths: readonly number[],
  options: RowMetricsOptions,
): number {
  return measureRow(row.map((cell) => cell.text), columnWidths, options).height
}

export function bodyRowOptions(style: TableStyle, metrics?: FontMetricsProvider): RowMetricsOptions {
  return {
    font: 'regular',
    fontSize: style.bodySize,
    lineSpacing: style.bodyLineSpacing,
    cellPadding: style.cellPadding,
    verticalPadding: style.verticalPadding,
    minRowHeight: style.minRowHeight,
    metrics,
  }
}

/** Header labels are set in bold and use the header minimum height */
export function headerRowOptions(style: TableStyle, metrics?: FontMetricsProvider): RowMetricsOptions {
  return {
    font: 'bold',
    fontSize: style.headerSize,
    lineSpacing: style.headerLineSpacing,
    cellPadding: style.cellPadding,
    verticalPadding: style.verticalPadding,
    minRowHeight: style.minHeaderHeight,
    metrics,
  }
}

export function headerRowHeight(
  headers: readonly string[],
  columnWidths: readonly number[],
  style: TableStyle,
  metrics?: FontMetricsProvider,
): number {
  return measureRow(headers, columnWidths, headerRowOptions(style, metrics)).height
}
