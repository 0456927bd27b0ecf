/**
 * Table Layout Types
 *
 * Everything a caller hands to the table engine, plus the bookkeeping
 * the engine keeps for the length of one render call.
 *
 * @module types/table
 */

import type { Colour, DrawingSurface, FontMetricsProvider } from './surface'

// ============================================================
// CELLS & ROWS
// ============================================================

/** Plain text, left-aligned */
export interface TextCell {
  kind: 'text'
  text: string
}

/** Display text bound to a URL; the rendered text becomes clickable */
export interface LinkCell {
  kind: 'link'
  text: string
  url: string
}

/** Numeric value, centred in its column */
export interface NumericCell {
  kind: 'numeric'
  text: string
}

export type Cell = TextCell | LinkCell | NumericCell

export type Row = readonly Cell[]

/** Lines of one cell after wrapping to its column */
export type WrappedLines = string[]

// ============================================================
// TABLE SPEC
// ============================================================

export interface TableStyle {
  titleBackground: Colour
  titleText: Colour
  headerBackground: Colour
  headerText: Colour
  rowBackground: Colour
  altRowBackground: Colour
  bodyText: Colour
  linkText: Colour
  border: Colour
  noteText: Colour

  titleSize: number
  headerSize: number
  bodySize: number
  noteSize: number

  headerLineSpacing: number
  bodyLineSpacing: number
  /** Horizontal inset on both sides of every cell */
  cellPadding: number
  /** Extra height added to every row on top of its lines */
  verticalPadding: number
  minHeaderHeight: number
  minRowHeight: number
  titleHeight: number
}

export interface TableSpec {
  title?: string
  headers: readonly string[]
  rows: readonly Row[]
  columnWidths: readonly number[]
  style?: Partial<TableStyle>
  /** Draw the title again on continuation pages */
  repeatTitle?: boolean
  /** Footer text drawn at the bottom of a page the table continues from */
  continuationNote?: string
}

// ============================================================
// RENDER STATE
// ============================================================

/** Vertical limits of a page the table may draw on */
export interface PageGeometry {
  /** Y the cursor resets to on a new page */
  topY: number
  /** Rows may not extend below this Y; the continuation note lives under it */
  bottomMargin: number
}

export interface Cursor {
  /** 1 for the page the table starts on */
  page: number
  y: number
}

export type PaginationPhase =
  | { kind: 'idle' }
  | { kind: 'headerPending'; continuation: boolean }
  | { kind: 'bodyRendering' }
  | { kind: 'pageBreak' }
  | { kind: 'done' }

export interface RenderState {
  phase: PaginationPhase
  headersEmittedOnCurrentPage: boolean
  nextRowIndex: number
  rowsRenderedSoFar: number
  rowsOnCurrentPage: number
  /** True while nothing but table chrome sits above the cursor on this page */
  pageIsFresh: boolean
}

/** What the caller supplies for a render */
export interface LayoutContext {
  surface: DrawingSurface
  /** Defaults to measuring through the surface */
  metrics?: FontMetricsProvider
  page: PageGeometry
  /** Report surface failures and keep drawing instead of throwing */
  continueOnError?: boolean
  /**
   * Treat the start position as a fresh page even below `topY`: whatever
   * sits above it (a section heading) belongs with the table. Defaults to
   * `startY >= topY`.
   */
  startsFresh?: boolean
}

/** One render call's working set */
export interface RenderSession {
  surface: DrawingSurface
  metrics: FontMetricsProvider
  page: PageGeometry
  continueOnError: boolean
  spec: TableSpec
  style: TableStyle
  x: number
  width: number
  cursor: Cursor
  state: RenderState
}

export interface TableRenderResult {
  finalY: number
  pageCount: number
  rowsRendered: number
}
