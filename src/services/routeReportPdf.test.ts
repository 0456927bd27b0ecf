import { describe, expect, it, vi } from 'vitest'
import { PDFDocument } from 'pdf-lib'
import { drawTableSection, emergencyServicesTable, generateRouteReportPdf, mapUrl, sharpTurnsTable } from './routeReportPdf'
import { CONTENT_WIDTH } from './pdfStyles'
import { surfaceMetrics } from './fontMetrics'
import { textCell } from './tableCells'
import { tableWidth } from './tableRenderer'
import { captureError, captureWarning } from '../utils/errorTracking'
import { loadConfig } from '../config'
import { RecordingSurface } from '../test-utils/recordingSurface'
import type { EmergencyService, RouteRiskReport, SharpTurn } from '../types/route'
import type { LayoutContext, Row, TableSpec } from '../types/table'

vi.mock('../utils/errorTracking', () => ({
  captureError: vi.fn(),
  captureWarning: vi.fn(),
  initializeSentry: vi.fn(() => false),
}))

function turn(distanceFromStartKm: number, overrides: Partial<SharpTurn> = {}): SharpTurn {
  return {
    latitude: 51.5,
    longitude: -0.12,
    distanceFromStartKm,
    turnAngle: 92.4,
    turnDirection: 'LEFT',
    recommendedSpeed: 30,
    riskScore: 6.25,
    ...overrides,
  }
}

function service(distanceFromRouteKm: number, overrides: Partial<EmergencyService> = {}): EmergencyService {
  return {
    serviceType: 'HOSPITAL',
    name: 'Test General',
    phoneNumber: '000 0000',
    address: '1 Example Road',
    latitude: 52,
    longitude: 1,
    distanceFromRouteKm,
    ...overrides,
  }
}

function report(overrides: Partial<RouteRiskReport> = {}): RouteRiskReport {
  return {
    routeId: 'route-1',
    routeName: 'Test Route',
    fromAddress: 'Depot A',
    toAddress: 'Depot B',
    totalDistanceKm: 120.44,
    overallRisk: 'MEDIUM',
    sharpTurns: [],
    emergencyServices: [],
    ...overrides,
  }
}

describe('mapUrl', () => {
  it('formats coordinates to six decimals', () => {
    expect(mapUrl(51.5, -0.12)).toBe('https://www.google.com/maps?q=51.500000,-0.120000')
  })
})

describe('sharpTurnsTable', () => {
  it('orders turns by distance and fills the content width', () => {
    const spec = sharpTurnsTable([turn(12.34), turn(3, { turnDirection: 'HAIRPIN' })])

    expect(spec.title).toBe('Sharp Turns (2)')
    expect(tableWidth(spec.columnWidths)).toBeCloseTo(CONTENT_WIDTH)
    expect(spec.rows.map((row) => row[1]?.text)).toEqual(['3.0', '12.3'])
    expect(spec.rows[0]?.[3]).toEqual({ kind: 'text', text: 'Hairpin' })
    expect(spec.rows[0]?.[5]).toEqual({ kind: 'numeric', text: '6.3' })
    expect(spec.rows[0]?.[6]).toEqual({
      kind: 'link',
      text: 'View on map',
      url: 'https://www.google.com/maps?q=51.500000,-0.120000',
    })
  })
})

describe('emergencyServicesTable', () => {
  it('orders services by distance and marks missing phone numbers', () => {
    const spec = emergencyServicesTable([
      service(4.2),
      service(0.5, { serviceType: 'FIRE_STATION', name: 'Station 9', phoneNumber: null }),
    ])

    expect(tableWidth(spec.columnWidths)).toBeCloseTo(CONTENT_WIDTH)
    expect(spec.rows.map((row) => row.map((cell) => cell.text))).toEqual([
      ['Fire Station', 'Station 9', 'Not available', '0.5', '1 Example Road', 'View on map'],
      ['Hospital', 'Test General', '000 0000', '4.2', '1 Example Road', 'View on map'],
    ])
  })
})

describe('generateRouteReportPdf', () => {
  const generatedAt = new Date(Date.UTC(2024, 5, 1))

  it('produces a one-page report for an empty route', async () => {
    const bytes = await generateRouteReportPdf(report(), { generatedAt })
    const doc = await PDFDocument.load(bytes, { updateMetadata: false })

    expect(doc.getPageCount()).toBe(1)
    expect(doc.getTitle()).toBe('Route Risk Report Test Route')
    expect(doc.getCreator()).toBe('route-report-tables')
    expect(doc.getPages()[0]?.node.Annots()).toBeUndefined()
  })

  it('links every turn and service across several pages', async () => {
    const sharpTurns = Array.from({ length: 80 }, (_, i) => turn(i * 1.5, { latitude: 50 + i / 100 }))
    const emergencyServices = Array.from({ length: 6 }, (_, i) => service(i))
    const bytes = await generateRouteReportPdf(
      report({ sharpTurns, emergencyServices, notes: ['Avoid the pass after dark.', 'Fuel before the border.'] }),
      { generatedAt },
    )
    const doc = await PDFDocument.load(bytes)

    expect(doc.getPageCount()).toBeGreaterThan(1)
    const linkCount = doc.getPages().reduce((sum, page) => sum + (page.node.Annots()?.size() ?? 0), 0)
    expect(linkCount).toBe(86)
  })

  it('reports and rethrows a failed build', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined)

    await expect(generateRouteReportPdf(report({ fromAddress: '✓ Depot' }), { generatedAt })).rejects.toThrow()
    expect(captureError).toHaveBeenCalledWith(expect.any(Error), 'generateRouteReportPdf', {
      type: 'report',
      metadata: { routeId: 'route-1', sharpTurns: 0 },
    })
  })

  it('skips unencodable text and finishes when asked to continue', async () => {
    vi.mocked(captureWarning).mockClear()
    vi.spyOn(console, 'log').mockImplementation(() => undefined)

    const bytes = await generateRouteReportPdf(
      report({ routeName: 'Test ✓ Route', fromAddress: 'Depot ✓', notes: ['Road ✓ clear'] }),
      { generatedAt, continueOnError: true },
    )
    const doc = await PDFDocument.load(bytes)

    expect(doc.getPageCount()).toBe(1)
    // Route and From fields, the note line, and the route name in the page header
    expect(captureWarning).toHaveBeenCalledTimes(4)
    expect(captureWarning).toHaveBeenCalledWith(
      'Drawing surface drawText failed: WinAnsi cannot encode "✓" (0x2713)',
      'table-render',
      { part: 'notes' },
    )
  })

  it('takes the failure policy from the config', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    const config = { ...loadConfig({}), continueOnError: true }

    await expect(generateRouteReportPdf(report({ notes: ['Road ✓ clear'] }), { generatedAt, config }))
      .resolves.toBeInstanceOf(Uint8Array)
  })
})

describe('drawTableSection', () => {
  const style = {
    titleSize: 10,
    headerSize: 8,
    bodySize: 8,
    headerLineSpacing: 10,
    bodyLineSpacing: 10,
    cellPadding: 4,
    verticalPadding: 4,
    minHeaderHeight: 16,
    minRowHeight: 12,
    titleHeight: 20,
  }

  function section(rows: Row[]): TableSpec {
    return { title: 'Turns', headers: ['A'], rows, columnWidths: [100], style }
  }

  function contextFor(surface: RecordingSurface): LayoutContext {
    return { surface, page: { topY: 700, bottomMargin: 50 } }
  }

  it('moves the section bar with its table when the first row would not fit', () => {
    const surface = new RecordingSurface()
    const rows: Row[] = [[textCell('x')], [textCell('y')], [textCell('z')]]

    // Bar 24 + title 20 + header 16 + first row 14 do not fit between 120 and 50
    const y = drawTableSection(contextFor(surface), surfaceMetrics(surface), 120, 'Sharp Turns', section(rows), 'None.')

    expect(surface.newPageCount).toBe(1)
    expect(surface.textsMatching('SHARP TURNS').map((op) => op.page)).toEqual([2])
    expect(surface.textsMatching('A').map((op) => op.page)).toEqual([2])
    expect(y).toBe(700 - 24 - 20 - 16 - 3 * 14 - 12)
  })

  it('stays on the page when the lead fits', () => {
    const surface = new RecordingSurface()
    drawTableSection(contextFor(surface), surfaceMetrics(surface), 200, 'Sharp Turns', section([[textCell('x')]]), 'None.')

    expect(surface.newPageCount).toBe(0)
    expect(surface.textsMatching('SHARP TURNS').map((op) => op.page)).toEqual([1])
  })

  it('does not break again under a bar for a first row taller than the page', () => {
    const surface = new RecordingSurface()
    const huge = textCell('ab '.repeat(600))

    drawTableSection(contextFor(surface), surfaceMetrics(surface), 120, 'Sharp Turns', section([[huge]]), 'None.')

    expect(surface.newPageCount).toBe(1)
    expect(surface.textsMatching('SHARP TURNS').map((op) => op.page)).toEqual([2])
    expect(surface.textsMatching('A').map((op) => op.page)).toEqual([2])
  })
})
