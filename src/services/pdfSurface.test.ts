import { beforeEach, describe, expect, it, vi } from 'vitest'
import { PDFArray, PDFDict, PDFDocument, PDFName, PDFString } from 'pdf-lib'
import type { PDFPage } from 'pdf-lib'
import { PdfLibSurface } from './pdfSurface'
import { layoutTable, renderTable } from './tableRenderer'
import { linkCell, textCell } from './tableCells'
import { captureWarning } from '../utils/errorTracking'
import type { LayoutContext, PageGeometry, Row } from '../types/table'

vi.mock('../utils/errorTracking', () => ({
  captureWarning: vi.fn(),
}))

const GEOMETRY: PageGeometry = { topY: 800, bottomMargin: 50 }

function contextFor(surface: PdfLibSurface, continueOnError = false): LayoutContext {
  return { surface, metrics: surface.metrics, page: GEOMETRY, continueOnError }
}

function annotationsOf(page: PDFPage): PDFArray | undefined {
  return page.node.Annots()
}

function annotationUris(surface: PdfLibSurface): string[] {
  const uris: string[] = []
  for (const page of surface.pages) {
    const annots = annotationsOf(page)
    if (!annots) continue
    for (let i = 0; i < annots.size(); i++) {
      const annot = annots.lookup(i, PDFDict)
      const action = annot.lookup(PDFName.of('A'), PDFDict)
      uris.push(action.lookup(PDFName.of('URI'), PDFString).asString())
    }
  }
  return uris
}

describe('PdfLibSurface', () => {
  beforeEach(() => {
    vi.mocked(captureWarning).mockClear()
  })

  it('starts with one page and adds pages on demand', async () => {
    const surface = await PdfLibSurface.create()
    expect(surface.pageNumber).toBe(1)
    surface.startNewPage()
    expect(surface.pageNumber).toBe(2)
    expect(surface.doc.getPageCount()).toBe(2)
    expect(surface.currentPage).toBe(surface.pages[1])
  })

  it('measures with the embedded fonts', async () => {
    const surface = await PdfLibSurface.create()
    expect(surface.measureText('Route', 'regular', 10)).toBe(surface.fonts.regular.widthOfTextAtSize('Route', 10))
    expect(surface.measureText('Route', 'bold', 10)).toBeGreaterThan(surface.measureText('Route', 'regular', 10))
  })

  it('writes a URI annotation for each link region', async () => {
    const surface = await PdfLibSurface.create()
    surface.registerLink('https://maps.example/a', 10, 20, 30, 8)

    const annots = annotationsOf(surface.currentPage)
    expect(annots?.size()).toBe(1)
    expect(annotationUris(surface)).toEqual(['https://maps.example/a'])
  })

  it('puts every link of a multi-page table on the page its row landed on', async () => {
    const surface = await PdfLibSurface.create()
    const rows: Row[] = Array.from({ length: 120 }, (_, i) => [
      textCell(`Turn ${i + 1}`),
      linkCell('View on map', `https://maps.example/turn/${i + 1}`),
    ])

    const result = layoutTable(contextFor(surface), { headers: ['Turn', 'Map'], rows, columnWidths: [200, 200] }, 40, 800)

    expect(result.pageCount).toBeGreaterThan(1)
    expect(result.pageCount).toBe(surface.pages.length)
    expect(result.rowsRendered).toBe(120)

    const uris = annotationUris(surface)
    expect(uris).toHaveLength(120)
    expect(uris[0]).toBe('https://maps.example/turn/1')
    expect(uris[119]).toBe('https://maps.example/turn/120')

    const lastPageLinks = annotationsOf(surface.currentPage)
    expect(lastPageLinks?.size()).toBeGreaterThan(0)

    const bytes = await surface.doc.save()
    const reloaded = await PDFDocument.load(bytes)
    expect(reloaded.getPageCount()).toBe(result.pageCount)
  })

  it('fails on text the font cannot encode', async () => {
    const surface = await PdfLibSurface.create()
    const table = { headers: ['Status'], rows: [[textCell('✓ clear')]], columnWidths: [100] }

    expect(() => renderTable(contextFor(surface), table, 40, 800)).toThrow()
  })

  it('skips unencodable text and finishes when asked to continue', async () => {
    const surface = await PdfLibSurface.create()
    const table = { headers: ['Status'], rows: [[textCell('✓ clear')], [textCell('ok')]], columnWidths: [100] }

    const finalY = renderTable(contextFor(surface, true), table, 40, 800)

    expect(finalY).toBeLessThan(800)
    expect(captureWarning).toHaveBeenCalledTimes(1)
    const bytes = await surface.doc.save()
    expect(bytes.length).toBeGreaterThan(0)
  })
})
