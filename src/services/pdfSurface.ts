/**
 * pdf-lib Drawing Surface
 *
 * The production DrawingSurface: draws onto pages of a pdf-lib
 * PDFDocument and registers URI link annotations. Not safe to share
 * between concurrent renders; it carries its own current page.
 *
 * @module services/pdfSurface
 */

import { PDFDocument, PDFString, StandardFonts, type PDFPage } from 'pdf-lib'
import type { Colour, DrawingSurface, FontMetricsProvider, FontStyle, RectOptions } from '../types/surface'
import { COLOURS, PAGE } from './pdfStyles'
import { createPdfFontMetrics, type FontSet } from './fontMetrics'

const BORDER_WIDTH = 0.5

export class PdfLibSurface implements DrawingSurface {
  readonly metrics: FontMetricsProvider
  private readonly pageList: PDFPage[] = []
  private page: PDFPage
  private fillColour: Colour = COLOURS.text
  private strokeColour: Colour = COLOURS.border

  constructor(
    readonly doc: PDFDocument,
    readonly fonts: FontSet,
    private readonly pageSize: [number, number] = [PAGE.width, PAGE.height],
  ) {
    this.metrics = createPdfFontMetrics(fonts)
    this.page = this.addPage()
  }

  /**
   * Create a document with Helvetica and Helvetica-Bold embedded and
   * one blank page.
   */
  static async create(pageSize?: [number, number]): Promise<PdfLibSurface> {
    const doc = await PDFDocument.create()
    const regular = await doc.embedFont(StandardFonts.Helvetica)
    const bold = await doc.embedFont(StandardFonts.HelveticaBold)
    return new PdfLibSurface(doc, { regular, bold }, pageSize)
  }

  /** Every page started so far, in order */
  get pages(): readonly PDFPage[] {
    return this.pageList
  }

  get currentPage(): PDFPage {
    return this.page
  }

  /** 1-based number of the current page */
  get pageNumber(): number {
    return this.pageList.length
  }

  private addPage(): PDFPage {
    const page = this.doc.addPage(this.pageSize)
    this.pageList.push(page)
    return page
  }

  setFillColour(colour: Colour): void {
    this.fillColour = colour
  }

  setStrokeColour(colour: Colour): void {
    this.strokeColour = colour
  }

  drawRect(x: number, y: number, width: number, height: number, options: RectOptions): void {
    if (!options.fill && !options.stroke) return

    this.page.drawRectangle({
      x,
      y,
      width,
      height,
      color: options.fill ? this.fillColour : undefined,
      borderColor: options.stroke ? this.strokeColour : undefined,
      borderWidth: options.stroke ? BORDER_WIDTH : 0,
    })
  }

  drawText(x: number, y: number, text: string, font: FontStyle, size: number): void {
    this.page.drawText(text, {
      x,
      y,
      size,
      font: this.fonts[font],
      color: this.fillColour,
    })
  }

  measureText(text: string, font: FontStyle, size: number): number {
    return this.metrics.widthOf(text, font, size)
  }

  startNewPage(): void {
    this.page = this.addPage()
  }

  registerLink(url: string, x: number, y: number, width: number, height: number): void {
    const annotation = this.doc.context.obj({
      Type: 'Annot',
      Subtype: 'Link',
      Rect: [x, y, x + width, y + height],
      Border: [0, 0, 0],
      A: {
        Type: 'Action',
        S: 'URI',
        URI: PDFString.of(url),
      },
    })
    this.page.node.addAnnot(this.doc.context.register(annotation))
  }
}
