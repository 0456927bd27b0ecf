export type { Colour, DrawingSurface, FontMetricsProvider, FontStyle, RectOptions } from './types/surface'
export type {
  Cell,
  Cursor,
  LayoutContext,
  LinkCell,
  NumericCell,
  PageGeometry,
  PaginationPhase,
  RenderState,
  Row,
  TableRenderResult,
  TableSpec,
  TableStyle,
  TextCell,
  WrappedLines,
} from './types/table'
export type { EmergencyService, RouteReportOptions, RouteRiskReport, SharpTurn } from './types/route'

export { layoutTable, renderTable, resolveTableStyle, TableSpecError, validateTableSpec } from './services/tableRenderer'
export { wrapText } from './services/textWrap'
export { headerRowHeight, measureRow, rowHeight } from './services/rowHeight'
export { decideRowPlacement, transition } from './services/pagination'
export { linkHotZone, registerLinkRegion } from './services/hyperlinks'
export type { HotZone } from './services/hyperlinks'
export { cellText, linkCell, numericCell, textCell, toCell, toRow } from './services/tableCells'
export { createPdfFontMetrics, estimatedMetrics, surfaceMetrics } from './services/fontMetrics'
export { PdfLibSurface } from './services/pdfSurface'
export { DEFAULT_TABLE_STYLE, REPORT_GEOMETRY } from './services/pdfStyles'
export { generateRouteReportPdf } from './services/routeReportPdf'
export { configureReporting, loadConfig } from './config'
export type { ReportConfig } from './config'
export { initializeSentry } from './utils/errorTracking'
export { logger, setLogLevel } from './utils/logger'
