/**
 * Table Cell Builders
 *
 * Callers build rows from these so the engine never has to guess which
 * column holds links or numbers.
 *
 * @module services/tableCells
 */

import type { Cell, LinkCell, NumericCell, TextCell } from '../types/table'

/** Anything a caller might put in a cell before it is typed */
export type CellValue = Cell | string | number | boolean | bigint | Date | null | undefined

export type CellAlignment = 'left' | 'center'

/** String form of any value; null and undefined become '' */
export function cellText(value: unknown): string {
  if (value == null) return ''
  if (typeof value === 'string') return value
  if (value instanceof Date) return value.toISOString()
  return String(value)
}

export function textCell(value: unknown): TextCell {
  return { kind: 'text', text: cellText(value) }
}

export function numericCell(value: unknown): NumericCell {
  return { kind: 'numeric', text: cellText(value) }
}

export function linkCell(text: unknown, url: string): LinkCell {
  return { kind: 'link', text: cellText(text), url }
}

function isCell(value: CellValue): value is Cell {
  return typeof value === 'object' && value !== null && !(value instanceof Date) && 'kind' in value
}

/**
 * Normalise a raw value into a cell. Numbers and bigints become numeric
 * cells, everything else text.
 */
export function toCell(value: CellValue): Cell {
  if (isCell(value)) return value
  if (typeof value === 'number' || typeof value === 'bigint') return numericCell(value)
  return textCell(value)
}

export function toRow(values: readonly CellValue[]): Cell[] {
  return values.map(toCell)
}

export function cellAlignment(cell: Pick<Cell, 'kind'>): CellAlignment {
  return cell.kind === 'numeric' ? 'center' : 'left'
}
