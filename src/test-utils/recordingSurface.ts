/**
 * In-memory DrawingSurface for tests. Records every call with the page
 * it landed on and measures text as a monospace font:
 * width = characters * size * 0.5.
 */

import type { Colour, DrawingSurface, FontStyle, RectOptions } from '../types/surface'

export type SurfaceOp =
  | { op: 'rect'; page: number; x: number; y: number; width: number; height: number; fill: Colour | null; stroke: Colour | null }
  | { op: 'text'; page: number; x: number; y: number; text: string; font: FontStyle; size: number; colour: Colour | null }
  | { op: 'link'; page: number; url: string; x: number; y: number; width: number; height: number }
  | { op: 'newPage'; page: number }

export type TextOp = Extract<SurfaceOp, { op: 'text' }>
export type LinkOp = Extract<SurfaceOp, { op: 'link' }>
export type RectOp = Extract<SurfaceOp, { op: 'rect' }>

export class RecordingSurface implements DrawingSurface {
  readonly ops: SurfaceOp[] = []
  page = 1
  private fill: Colour | null = null
  private stroke: Colour | null = null

  setFillColour(colour: Colour): void {
    this.fill = colour
  }

  setStrokeColour(colour: Colour): void {
    this.stroke = colour
  }

  drawRect(x: number, y: number, width: number, height: number, options: RectOptions): void {
    this.ops.push({
      op: 'rect',
      page: this.page,
      x,
      y,
      width,
      height,
      fill: options.fill ? this.fill : null,
      stroke: options.stroke ? this.stroke : null,
    })
  }

  drawText(x: number, y: number, text: string, font: FontStyle, size: number): void {
    this.ops.push({ op: 'text', page: this.page, x, y, text, font, size, colour: this.fill })
  }

  measureText(text: string, _font: FontStyle, size: number): number {
    return text.length * size * 0.5
  }

  startNewPage(): void {
    this.page += 1
    this.ops.push({ op: 'newPage', page: this.page })
  }

  registerLink(url: string, x: number, y: number, width: number, height: number): void {
    this.ops.push({ op: 'link', page: this.page, url, x, y, width, height })
  }

  get texts(): TextOp[] {
    return this.ops.filter((op): op is TextOp => op.op === 'text')
  }

  get links(): LinkOp[] {
    return this.ops.filter((op): op is LinkOp => op.op === 'link')
  }

  get rects(): RectOp[] {
    return this.ops.filter((op): op is RectOp => op.op === 'rect')
  }

  get newPageCount(): number {
    return this.ops.filter((op) => op.op === 'newPage').length
  }

  textsMatching(text: string): TextOp[] {
    return this.texts.filter((op) => op.text === text)
  }
}
