/**
 * Table Layout Engine
 *
 * Renders a TableSpec onto a Drawing Surface row by row: title bar,
 * header row, then body rows with word-wrapped cells. Rows are never
 * split; when one does not fit, a "continued" note is drawn, a new page
 * is started and the header row (and optionally the title) is drawn
 * again before the row.
 *
 * Rendering order per body row:
 *   1. Background fill (alternating by row parity)
 *   2. Cell borders
 *   3. Cell text (text/link left-aligned, numeric centred), link regions
 *
 * @module services/tableRenderer
 */

import type { FontMetricsProvider, FontStyle } from '../types/surface'
import type {
  Cell,
  LayoutContext,
  RenderSession,
  Row,
  TableRenderResult,
  TableSpec,
  TableStyle,
  WrappedLines,
} from '../types/table'
import { DEFAULT_TABLE_STYLE } from './pdfStyles'
import { estimateDescent, estimateTextWidth, measureWithFallback, surfaceMetrics } from './fontMetrics'
import { linkHotZone, registerLinkRegion } from './hyperlinks'
import { createRenderState, decideRowPlacement, rowFits, transition } from './pagination'
import type { PaginationEvent } from './pagination'
import { bodyRowOptions, headerRowOptions, measureRow } from './rowHeight'
import type { MeasuredRow } from './rowHeight'
import { guardSurfaceCall } from './surfaceErrors'
import { cellAlignment } from './tableCells'
import { logger } from '../utils/logger'

const DEFAULT_CONTINUATION_NOTE = 'Continued on next page'

export class TableSpecError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TableSpecError'
  }
}

// ============================================================
// SPEC VALIDATION
// ============================================================

export function validateTableSpec(spec: TableSpec): void {
  const columnCount = spec.headers.length

  if (columnCount === 0) {
    throw new TableSpecError('Table must have at least one column')
  }
  if (spec.columnWidths.length !== columnCount) {
    throw new TableSpecError(
      `Expected ${columnCount} column widths, got ${spec.columnWidths.length}`,
    )
  }
  spec.columnWidths.forEach((width, i) => {
    if (!Number.isFinite(width) || width <= 0) {
      throw new TableSpecError(`Column ${i} width must be a positive number, got ${width}`)
    }
  })
  spec.rows.forEach((row, i) => {
    if (row.length !== columnCount) {
      throw new TableSpecError(`Row ${i} has ${row.length} cells, expected ${columnCount}`)
    }
  })
}

export function resolveTableStyle(style?: Partial<TableStyle>): TableStyle {
  return { ...DEFAULT_TABLE_STYLE, ...style }
}

export function tableWidth(columnWidths: readonly number[]): number {
  return columnWidths.reduce((sum, width) => sum + width, 0)
}

// ============================================================
// GEOMETRY HELPERS
// ============================================================

/** Baseline of line `index` in a block vertically centred in the row */
export function lineBaseline(
  rowTop: number,
  rowHeight: number,
  lineCount: number,
  index: number,
  lineSpacing: number,
  fontSize: number,
): number {
  const topOffset = (rowHeight - lineCount * lineSpacing) / 2
  const lineBoxBottom = rowTop - topOffset - (index + 1) * lineSpacing
  return lineBoxBottom + (lineSpacing - fontSize) / 2 + estimateDescent(fontSize)
}

function measureWidth(session: RenderSession, text: string, font: FontStyle, size: number): number {
  return measureWithFallback(
    () => session.metrics.widthOf(text, font, size),
    () => estimateTextWidth(text, size),
  )
}

function advance(session: RenderSession, event: PaginationEvent): void {
  session.state.phase = transition(session.state.phase, event)
}

// ============================================================
// DRAWING
// ============================================================

function drawTitle(session: RenderSession, continuation: boolean): void {
  const { surface, style, cursor } = session
  const title = session.spec.title ?? ''
  const top = cursor.y

  surface.setFillColour(style.titleBackground)
  surface.drawRect(session.x, top - style.titleHeight, session.width, style.titleHeight, { fill: true, stroke: false })

  const text = continuation ? `${title} (continued)` : title
  const baseline = lineBaseline(top, style.titleHeight, 1, 0, style.titleSize, style.titleSize)
  surface.setFillColour(style.titleText)
  guardSurfaceCall(session.continueOnError, 'drawText', { part: 'title' }, () =>
    surface.drawText(session.x + style.cellPadding, baseline, text, 'bold', style.titleSize),
  )

  cursor.y = top - style.titleHeight
}

function drawCellLines(
  session: RenderSession,
  lines: WrappedLines,
  cell: Pick<Cell, 'kind'>,
  colX: number,
  colWidth: number,
  rowTop: number,
  rowHeight: number,
  text: { font: FontStyle; size: number; lineSpacing: number },
  metadata: { row: number; column: number },
): void {
  const { surface, style } = session
  const align = cellAlignment(cell)

  lines.forEach((line, i) => {
    const baseline = lineBaseline(rowTop, rowHeight, lines.length, i, text.lineSpacing, text.size)
    const x = align === 'center'
      ? colX + (colWidth - measureWidth(session, line, text.font, text.size)) / 2
      : colX + style.cellPadding
    guardSurfaceCall(session.continueOnError, 'drawText', metadata, () =>
      surface.drawText(x, baseline, line, text.font, text.size),
    )
  })
}

function drawCellBorders(session: RenderSession, rowTop: number, rowHeight: number): void {
  const { surface, style } = session
  surface.setStrokeColour(style.border)

  let colX = session.x
  for (const width of session.spec.columnWidths) {
    surface.drawRect(colX, rowTop - rowHeight, width, rowHeight, { fill: false, stroke: true })
    colX += width
  }
}

function drawHeaderRow(session: RenderSession): void {
  const { surface, style, cursor, spec } = session
  const measured = measureRow(spec.headers, spec.columnWidths, headerRowOptions(style, session.metrics))
  const rowTop = cursor.y

  surface.setFillColour(style.headerBackground)
  surface.drawRect(session.x, rowTop - measured.height, session.width, measured.height, { fill: true, stroke: false })
  drawCellBorders(session, rowTop, measured.height)

  surface.setFillColour(style.headerText)
  let colX = session.x
  spec.columnWidths.forEach((width, column) => {
    drawCellLines(
      session,
      measured.lines[column] ?? [''],
      { kind: 'text' },
      colX,
      width,
      rowTop,
      measured.height,
      { font: 'bold', size: style.headerSize, lineSpacing: style.headerLineSpacing },
      { row: -1, column },
    )
    colX += width
  })

  cursor.y = rowTop - measured.height
}

function drawBodyRow(session: RenderSession, row: Row, measured: MeasuredRow, index: number): void {
  const { surface, style, cursor, spec } = session
  const rowTop = cursor.y
  const rowHeight = measured.height
  const textStyle = { font: 'regular' as const, size: style.bodySize, lineSpacing: style.bodyLineSpacing }

  surface.setFillColour(index % 2 === 1 ? style.altRowBackground : style.rowBackground)
  surface.drawRect(session.x, rowTop - rowHeight, session.width, rowHeight, { fill: true, stroke: false })

  drawCellBorders(session, rowTop, rowHeight)

  let colX = session.x
  spec.columnWidths.forEach((width, column) => {
    const cell = row[column]
    const lines = measured.lines[column] ?? ['']
    if (!cell) {
      colX += width
      return
    }

    surface.setFillColour(cell.kind === 'link' ? style.linkText : style.bodyText)
    drawCellLines(session, lines, cell, colX, width, rowTop, rowHeight, textStyle, { row: index, column })

    if (cell.kind === 'link') {
      const zone = linkHotZone(
        lines,
        colX + style.cellPadding,
        lineBaseline(rowTop, rowHeight, lines.length, 0, textStyle.lineSpacing, textStyle.size),
        textStyle.lineSpacing,
        textStyle.font,
        textStyle.size,
        session.metrics,
      )
      registerLinkRegion(surface, cell.url, zone, session.continueOnError)
    }

    colX += width
  })

  cursor.y = rowTop - rowHeight
}

function drawContinuationNote(session: RenderSession): void {
  const { surface, style } = session
  const note = session.spec.continuationNote ?? DEFAULT_CONTINUATION_NOTE
  const noteWidth = measureWidth(session, note, 'regular', style.noteSize)
  const baseline = session.page.bottomMargin - style.noteSize - 2

  surface.setFillColour(style.noteText)
  guardSurfaceCall(session.continueOnError, 'drawText', { part: 'continuationNote' }, () =>
    surface.drawText(session.x + session.width - noteWidth, baseline, note, 'regular', style.noteSize),
  )
}

// ============================================================
// PAGINATION STEPS
// ============================================================

function moveToNewPage(session: RenderSession): void {
  session.surface.startNewPage()
  session.cursor.page += 1
  session.cursor.y = session.page.topY
  session.state.rowsOnCurrentPage = 0
  session.state.headersEmittedOnCurrentPage = false
  session.state.pageIsFresh = true
}

function emitHeaders(session: RenderSession, continuation: boolean): void {
  if (session.spec.title && (!continuation || session.spec.repeatTitle)) {
    drawTitle(session, continuation)
  }
  drawHeaderRow(session)
  session.state.headersEmittedOnCurrentPage = true
}

function breakPage(session: RenderSession): void {
  if (session.state.nextRowIndex < session.spec.rows.length) {
    drawContinuationNote(session)
  }
  moveToNewPage(session)
  advance(session, { type: 'pageStarted' })
}

// ============================================================
// PUBLIC API
// ============================================================

/**
 * Height the table needs on its first page: title, header row and first
 * body row, which are never separated.
 */
export function tableLeadHeight(spec: TableSpec, metrics: FontMetricsProvider): number {
  const style = resolveTableStyle(spec.style)
  const title = spec.title ? style.titleHeight : 0
  const header = measureRow(spec.headers, spec.columnWidths, headerRowOptions(style, metrics)).height
  const firstRow = spec.rows[0]
  const body = firstRow
    ? measureRow(firstRow.map((cell) => cell.text), spec.columnWidths, bodyRowOptions(style, metrics)).height
    : 0
  return title + header + body
}

/**
 * Render a table and report where it ended.
 *
 * `startY` is the top edge of the table. The first page counts as
 * page 1 of the result; `pageCount` includes every page started.
 */
export function layoutTable(
  context: LayoutContext,
  spec: TableSpec,
  startX: number,
  startY: number,
): TableRenderResult {
  validateTableSpec(spec)

  const style = resolveTableStyle(spec.style)
  const metrics = context.metrics ?? surfaceMetrics(context.surface)
  const session: RenderSession = {
    surface: context.surface,
    metrics,
    page: context.page,
    continueOnError: context.continueOnError ?? false,
    spec,
    style,
    x: startX,
    width: tableWidth(spec.columnWidths),
    cursor: { page: 1, y: startY },
    state: createRenderState(),
  }
  const { state, cursor } = session
  const rowOptions = bodyRowOptions(style, metrics)
  const measure = (row: Row): MeasuredRow =>
    measureRow(row.map((cell) => cell.text), spec.columnWidths, rowOptions)

  state.pageIsFresh = context.startsFresh ?? startY >= context.page.topY

  let pending: { index: number; measured: MeasuredRow } | null = null

  // Keep the header row with its first body row
  if (!state.pageIsFresh && !rowFits(cursor.y, tableLeadHeight(spec, metrics), context.page)) {
    moveToNewPage(session)
  }

  while (state.phase.kind !== 'done') {
    const phase = state.phase
    switch (phase.kind) {
      case 'idle':
        advance(session, { type: 'start' })
        break

      case 'headerPending':
        if (!state.headersEmittedOnCurrentPage) {
          emitHeaders(session, phase.continuation)
        }
        advance(session, { type: 'headersDrawn' })
        break

      case 'pageBreak':
        breakPage(session)
        break

      case 'bodyRendering': {
        const index = state.nextRowIndex
        const row = spec.rows[index]
        if (!row) {
          advance(session, { type: 'rowsExhausted' })
          break
        }

        const measured: MeasuredRow = pending?.index === index ? pending.measured : measure(row)
        pending = { index, measured }

        const placement = decideRowPlacement(cursor.y, measured.height, context.page, state)
        if (placement === 'break') {
          advance(session, { type: 'rowOverflows' })
          break
        }
        if (placement === 'force') {
          logger.warn('table.row_forced', {
            row: index,
            rowHeight: measured.height,
            available: cursor.y - context.page.bottomMargin,
          })
        }

        drawBodyRow(session, row, measured, index)
        state.nextRowIndex += 1
        state.rowsRenderedSoFar += 1
        state.rowsOnCurrentPage += 1
        advance(session, { type: 'rowFits' })
        break
      }
    }
  }

  logger.debug('table.rendered', {
    rows: state.rowsRenderedSoFar,
    pages: cursor.page,
    finalY: cursor.y,
  })

  return {
    finalY: cursor.y,
    pageCount: cursor.page,
    rowsRendered: state.rowsRenderedSoFar,
  }
}

/**
 * Render a table starting with its top-left corner at (startX, startY).
 * Returns the Y just below the last row, on whatever page it ended.
 */
export function renderTable(
  context: LayoutContext,
  spec: TableSpec,
  startX: number,
  startY: number,
): number {
  return layoutTable(context, spec, startX, startY).finalY
}
