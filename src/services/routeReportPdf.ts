/**
 * Route Risk Report PDF Generator
 *
 * Builds an A4 route risk report with pdf-lib. Runs in-process, no
 * network access.
 *
 * Layout:
 *   1. Route summary fields
 *   2. Sharp turns table (dynamic, overflows, map links)
 *   3. Emergency services table (dynamic, overflows, map links)
 *   4. Notes (free text, wrapped)
 *   Every page: header band and "Page i of N" footer, applied last.
 *
 * @module services/routeReportPdf
 */

import type { PDFPage } from 'pdf-lib'
import type { EmergencyService, RouteReportOptions, RouteRiskReport, SharpTurn } from '../types/route'
import type { Colour, FontMetricsProvider } from '../types/surface'
import type { LayoutContext, TableSpec } from '../types/table'
import type { ReportConfig } from '../config'
import { loadConfig } from '../config'
import type { FontSet } from './fontMetrics'
import {
  PAGE,
  CONTENT_TOP,
  CONTENT_WIDTH,
  COLOURS,
  FONT,
  SPACING,
  REPORT_GEOMETRY,
  drawField,
  drawSectionHeader,
  getRiskColour,
  needsNewPage,
} from './pdfStyles'
import { PdfLibSurface } from './pdfSurface'
import { linkCell, numericCell, textCell } from './tableCells'
import { guardSurfaceCall } from './surfaceErrors'
import { layoutTable, tableLeadHeight } from './tableRenderer'
import { wrapText } from './textWrap'
import { captureError } from '../utils/errorTracking'
import { logger } from '../utils/logger'

const REPORT_TITLE = 'ROUTE RISK ASSESSMENT REPORT'


const SERVICE_LABELS: Record<EmergencyService['serviceType'], string> = {
  HOSPITAL: 'Hospital',
  POLICE: 'Police',
  FIRE_STATION: 'Fire Station',
  AMBULANCE: 'Ambulance',
  FUEL_STATION: 'Fuel Station',
  OTHER: 'Other',
}

const DIRECTION_LABELS: Record<SharpTurn['turnDirection'], string> = {
  LEFT: 'Left',
  RIGHT: 'Right',
  HAIRPIN: 'Hairpin',
}

// ============================================================
// FORMATTING
// ============================================================

export function mapUrl(latitude: number, longitude: number): string {
  return `https://www.google.com/maps?q=${latitude.toFixed(6)},${longitude.toFixed(6)}`
}

function formatKm(value: number): string {
  return value.toFixed(1)
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10)
}

// ============================================================
// TABLE SPECS
// ============================================================

export function sharpTurnsTable(turns: readonly SharpTurn[]): TableSpec {
  const sorted = [...turns].sort((a, b) => a.distanceFromStartKm - b.distanceFromStartKm)
  const fixed = [25, 65, 55, 60, 65, 45]
  const used = fixed.reduce((sum, width) => sum + width, 0)

  return {
    title: `Sharp Turns (${turns.length})`,
    headers: ['#', 'Distance (km)', 'Angle (°)', 'Direction', 'Safe Speed (km/h)', 'Risk', 'Location'],
    columnWidths: [...fixed, CONTENT_WIDTH - used],
    repeatTitle: true,
    rows: sorted.map((turn, i) => [
      numericCell(i + 1),
      numericCell(formatKm(turn.distanceFromStartKm)),
      numericCell(Math.round(turn.turnAngle)),
      textCell(DIRECTION_LABELS[turn.turnDirection]),
      numericCell(turn.recommendedSpeed),
      numericCell(turn.riskScore.toFixed(1)),
      linkCell('View on map', mapUrl(turn.latitude, turn.longitude)),
    ]),
  }
}

export function emergencyServicesTable(services: readonly EmergencyService[]): TableSpec {
  const sorted = [...services].sort((a, b) => a.distanceFromRouteKm - b.distanceFromRouteKm)
  const addressWidth = CONTENT_WIDTH - (60 + 110 + 75 + 60 + 55)

  return {
    title: `Emergency Services (${services.length})`,
    headers: ['Type', 'Name', 'Phone', 'From Route (km)', 'Address', 'Location'],
    columnWidths: [60, 110, 75, 60, addressWidth, 55],
    repeatTitle: true,
    rows: sorted.map((service) => [
      textCell(SERVICE_LABELS[service.serviceType]),
      textCell(service.name),
      textCell(service.phoneNumber ?? 'Not available'),
      numericCell(formatKm(service.distanceFromRouteKm)),
      textCell(service.address),
      linkCell('View on map', mapUrl(service.latitude, service.longitude)),
    ]),
  }
}

// ============================================================
// SECTIONS
// ============================================================

/** Space under a section bar before its content starts */
const SECTION_HEADER_SPACE = SPACING.sectionHeaderHeight + 6

/**
 * Draw a section bar, first moving to a new page unless the bar and
 * `contentLead` points of content fit below `y`. Reports whether the
 * section starts a fresh page.
 */
function startSection(
  context: LayoutContext,
  y: number,
  label: string,
  contentLead: number,
): { y: number; freshPage: boolean } {
  let top = y
  let freshPage = false
  if (needsNewPage(top, SECTION_HEADER_SPACE + contentLead, context.page)) {
    context.surface.startNewPage()
    top = context.page.topY
    freshPage = true
  }
  return { y: drawSectionHeader(context.surface, top, label), freshPage }
}

/** Text drawn through the report's failure policy */
function drawReportText(context: LayoutContext, part: string, draw: () => void): void {
  guardSurfaceCall(context.continueOnError ?? false, 'drawText', { part }, draw)
}

function drawRouteSummary(
  context: LayoutContext,
  metrics: FontMetricsProvider,
  report: RouteRiskReport,
  y: number,
  generatedAt: Date,
): number {
  const { surface } = context
  const fields: Array<[string, string, Colour?]> = [
    ['Route', report.routeName],
    ['From', report.fromAddress],
    ['To', report.toAddress],
    ['Total Distance', `${formatKm(report.totalDistanceKm)} km`],
    ['Overall Risk', report.overallRisk, getRiskColour(report.overallRisk)],
    ['Generated', formatDate(generatedAt)],
  ]

  let cursor = drawSectionHeader(surface, y, 'Route Summary')
  for (const [label, value, valueColour] of fields) {
    const top = cursor
    drawReportText(context, 'summary', () => {
      drawField(surface, metrics, top, label, value, { valueColour })
    })
    cursor = top - SPACING.fieldRowGap
  }
  return cursor - SPACING.sectionGap
}

export function drawTableSection(
  context: LayoutContext,
  metrics: FontMetricsProvider,
  y: number,
  label: string,
  spec: TableSpec,
  emptyMessage: string,
): number {
  const { surface } = context

  if (spec.rows.length === 0) {
    const cursor = startSection(context, y, label, SPACING.fieldRowGap).y
    surface.setFillColour(COLOURS.muted)
    drawReportText(context, 'emptyMessage', () => {
      surface.drawText(PAGE.marginLeft + 4, cursor - FONT.value, emptyMessage, 'regular', FONT.value)
    })
    return cursor - SPACING.fieldRowGap - SPACING.sectionGap
  }

  const section = startSection(context, y, label, tableLeadHeight(spec, metrics))
  const tableContext: LayoutContext = { ...context, metrics, startsFresh: section.freshPage }
  return layoutTable(tableContext, spec, PAGE.marginLeft, section.y).finalY - SPACING.sectionGap
}

function drawNotes(
  context: LayoutContext,
  metrics: FontMetricsProvider,
  notes: readonly string[],
  y: number,
): number {
  const { surface } = context
  const lineHeight = FONT.value * SPACING.lineHeight
  let cursor = startSection(context, y, 'Notes', lineHeight).y

  for (const paragraph of notes) {
    const lines = wrapText(paragraph, 'regular', FONT.value, CONTENT_WIDTH, metrics)
    for (const line of lines) {
      if (needsNewPage(cursor, lineHeight, context.page)) {
        surface.startNewPage()
        cursor = context.page.topY
      }
      cursor -= lineHeight
      const baseline = cursor
      surface.setFillColour(COLOURS.text)
      drawReportText(context, 'notes', () => {
        surface.drawText(PAGE.marginLeft, baseline, line, 'regular', FONT.value)
      })
    }
    cursor -= lineHeight / 2
  }

  return cursor
}

// ============================================================
// PAGE CHROME (applied after all pages created)
// ============================================================

function drawPageHeader(
  page: PDFPage,
  fonts: FontSet,
  report: RouteRiskReport,
  pageNum: number,
  total: number,
  continueOnError: boolean,
): void {
  const y = PAGE.height - PAGE.marginTop

  page.drawRectangle({
    x: PAGE.marginLeft,
    y: y - SPACING.pageHeaderHeight,
    width: CONTENT_WIDTH,
    height: SPACING.pageHeaderHeight,
    color: COLOURS.headerBg,
  })

  page.drawText(REPORT_TITLE, {
    x: PAGE.marginLeft + 10,
    y: y - 20,
    size: 11,
    font: fonts.bold,
    color: COLOURS.white,
  })

  guardSurfaceCall(continueOnError, 'drawText', { part: 'pageHeader', page: pageNum }, () =>
    page.drawText(report.routeName || report.routeId, {
      x: PAGE.marginLeft + 10,
      y: y - 33,
      size: FONT.small,
      font: fonts.regular,
      color: COLOURS.borderLight,
    }),
  )

  const pageText = `Page ${pageNum} of ${total}`
  const pw = fonts.regular.widthOfTextAtSize(pageText, FONT.pageNumber)
  page.drawText(pageText, {
    x: PAGE.width - PAGE.marginRight - pw - 10,
    y: y - 33,
    size: FONT.pageNumber,
    font: fonts.regular,
    color: COLOURS.borderLight,
  })
}

function drawPageFooter(page: PDFPage, fonts: FontSet, generatedAt: Date): void {
  const y = PAGE.marginBottom - 28
  const text = `Route risk assessment · generated ${formatDate(generatedAt)}`
  const textWidth = fonts.regular.widthOfTextAtSize(text, FONT.small)

  page.drawLine({
    start: { x: PAGE.marginLeft, y: y + 10 },
    end: { x: PAGE.width - PAGE.marginRight, y: y + 10 },
    thickness: 0.3,
    color: COLOURS.borderLight,
  })

  page.drawText(text, {
    x: (PAGE.width - textWidth) / 2,
    y,
    size: FONT.small,
    font: fonts.regular,
    color: COLOURS.muted,
  })
}

function applyPageChrome(
  surface: PdfLibSurface,
  report: RouteRiskReport,
  generatedAt: Date,
  continueOnError: boolean,
): void {
  const total = surface.pages.length
  surface.pages.forEach((page, i) => {
    drawPageHeader(page, surface.fonts, report, i + 1, total, continueOnError)
    drawPageFooter(page, surface.fonts, generatedAt)
  })
}

// ============================================================
// MAIN GENERATOR
// ============================================================

/**
 * Generate a complete route risk report.
 * Returns raw PDF bytes.
 */
export async function generateRouteReportPdf(
  report: RouteRiskReport,
  options: RouteReportOptions = {},
): Promise<Uint8Array> {
  const startTime = Date.now()
  const generatedAt = options.generatedAt ?? new Date()

  try {
    return await buildReport(report, options, generatedAt, startTime)
  } catch (error) {
    logger.error('report.failed', {
      routeId: report.routeId,
      reason: error instanceof Error ? error.message : String(error),
    })
    captureError(error, 'generateRouteReportPdf', {
      type: 'report',
      metadata: { routeId: report.routeId, sharpTurns: report.sharpTurns.length },
    })
    throw error
  }
}

/** An explicit option wins over the config; the config defaults to the environment */
function resolveContinueOnError(options: RouteReportOptions): boolean {
  if (options.continueOnError !== undefined) return options.continueOnError
  const config: ReportConfig = options.config ?? loadConfig()
  return config.continueOnError
}

async function buildReport(
  report: RouteRiskReport,
  options: RouteReportOptions,
  generatedAt: Date,
  startTime: number,
): Promise<Uint8Array> {
  const surface = await PdfLibSurface.create()
  const { doc } = surface

  doc.setTitle(`Route Risk Report ${report.routeName}`)
  doc.setSubject('Route risk assessment')
  doc.setCreator('route-report-tables')
  doc.setCreationDate(generatedAt)

  const { metrics } = surface
  const continueOnError = resolveContinueOnError(options)
  const context: LayoutContext = {
    surface,
    metrics,
    page: REPORT_GEOMETRY,
    continueOnError,
  }

  let y = drawRouteSummary(context, metrics, report, CONTENT_TOP, generatedAt)
  y = drawTableSection(context, metrics, y, 'Sharp Turns', sharpTurnsTable(report.sharpTurns), 'No sharp turns recorded.')
  y = drawTableSection(
    context,
    metrics,
    y,
    'Emergency Services',
    emergencyServicesTable(report.emergencyServices),
    'No emergency services recorded.',
  )
  if (report.notes && report.notes.length > 0) {
    drawNotes(context, metrics, report.notes, y)
  }

  applyPageChrome(surface, report, generatedAt, continueOnError)

  const pdfBytes = await doc.save()

  logger.info('report.generated', {
    routeId: report.routeId,
    pages: surface.pages.length,
    sharpTurns: report.sharpTurns.length,
    emergencyServices: report.emergencyServices.length,
    bytes: pdfBytes.length,
    latencyMs: Date.now() - startTime,
  })

  return pdfBytes
}
