/**
 * Table Pagination
 *
 * The pagination state machine for one table render:
 *
 *   idle → headerPending → bodyRendering → pageBreak → headerPending … → done
 *
 * Transitions are pure; the table renderer drives them and does the
 * drawing.
 *
 * @module services/pagination
 */

import type { PageGeometry, PaginationPhase, RenderState } from '../types/table'

export type PaginationEvent =
  | { type: 'start' }
  | { type: 'headersDrawn' }
  | { type: 'rowFits' }
  | { type: 'rowOverflows' }
  | { type: 'pageStarted' }
  | { type: 'rowsExhausted' }

export class PaginationError extends Error {
  constructor(phase: PaginationPhase, event: PaginationEvent) {
    super(`Invalid pagination transition: ${event.type} while ${phase.kind}`)
    this.name = 'PaginationError'
  }
}

export function transition(phase: PaginationPhase, event: PaginationEvent): PaginationPhase {
  switch (phase.kind) {
    case 'idle':
      if (event.type === 'start') return { kind: 'headerPending', continuation: false }
      break
    case 'headerPending':
      if (event.type === 'headersDrawn') return { kind: 'bodyRendering' }
      break
    case 'bodyRendering':
      if (event.type === 'rowFits') return phase
      if (event.type === 'rowOverflows') return { kind: 'pageBreak' }
      if (event.type === 'rowsExhausted') return { kind: 'done' }
      break
    case 'pageBreak':
      if (event.type === 'pageStarted') return { kind: 'headerPending', continuation: true }
      break
    case 'done':
      break
  }
  throw new PaginationError(phase, event)
}

export function createRenderState(): RenderState {
  return {
    phase: { kind: 'idle' },
    headersEmittedOnCurrentPage: false,
    nextRowIndex: 0,
    rowsRenderedSoFar: 0,
    rowsOnCurrentPage: 0,
    pageIsFresh: false,
  }
}

/**
 * - `fits`: draw the row here
 * - `break`: move to a new page first
 * - `force`: the row cannot fit even on an empty page; draw it here anyway
 */
export type RowPlacement = 'fits' | 'break' | 'force'

export function rowFits(cursorY: number, rowHeight: number, geometry: PageGeometry): boolean {
  return cursorY - rowHeight >= geometry.bottomMargin
}

export function decideRowPlacement(
  cursorY: number,
  rowHeight: number,
  geometry: PageGeometry,
  state: Pick<RenderState, 'rowsOnCurrentPage' | 'pageIsFresh'>,
): RowPlacement {
  if (rowFits(cursorY, rowHeight, geometry)) return 'fits'
  // A fresh page with no body rows is as much room as the row will ever get
  if (state.pageIsFresh && state.rowsOnCurrentPage === 0) return 'force'
  return 'break'
}
