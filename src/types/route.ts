/**
 * Route Risk Report Types
 *
 * The data a route report is rendered from. Loading it (database,
 * spreadsheet uploads) and scoring the risks happen elsewhere; these
 * values arrive already computed.
 */

import type { ReportConfig } from '../config'
import type { RiskLevel } from '../services/pdfStyles'

export type TurnDirection = 'LEFT' | 'RIGHT' | 'HAIRPIN'

export type EmergencyServiceType =
  | 'HOSPITAL'
  | 'POLICE'
  | 'FIRE_STATION'
  | 'AMBULANCE'
  | 'FUEL_STATION'
  | 'OTHER'

export interface SharpTurn {
  latitude: number
  longitude: number
  distanceFromStartKm: number
  /** Degrees of heading change */
  turnAngle: number
  turnDirection: TurnDirection
  recommendedSpeed: number
  /** 0-10 */
  riskScore: number
}

export interface EmergencyService {
  serviceType: EmergencyServiceType
  name: string
  phoneNumber: string | null
  address: string
  latitude: number
  longitude: number
  distanceFromRouteKm: number
}

export interface RouteRiskReport {
  routeId: string
  routeName: string
  fromAddress: string
  toAddress: string
  totalDistanceKm: number
  overallRisk: RiskLevel
  sharpTurns: SharpTurn[]
  emergencyServices: EmergencyService[]
  /** Free-text paragraphs printed after the tables */
  notes?: string[]
}

export interface RouteReportOptions {
  generatedAt?: Date
  /** Overrides `config.continueOnError` */
  continueOnError?: boolean
  /** Defaults to `loadConfig()` */
  config?: ReportConfig
}
