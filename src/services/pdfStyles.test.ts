import { describe, expect, it } from 'vitest'
import { COLOURS, drawField, drawSectionHeader, getRiskColour, needsNewPage } from './pdfStyles'
import { estimatedMetrics } from './fontMetrics'
import { RecordingSurface } from '../test-utils/recordingSurface'

describe('drawField', () => {
  it('draws label and value on one line', () => {
    const surface = new RecordingSurface()
    const next = drawField(surface, estimatedMetrics, 500, 'From', 'Depot A')

    expect(next).toBe(486)
    expect(surface.texts.map(({ x, y, text, font }) => ({ x, y, text, font }))).toEqual([
      { x: 40, y: 500, text: 'From', font: 'regular' },
      { x: 170, y: 500, text: 'Depot A', font: 'bold' },
    ])
  })

  it('truncates long values with an ellipsis', () => {
    const surface = new RecordingSurface()
    // 385.28 points available at 4 points per bold character
    drawField(surface, estimatedMetrics, 500, 'To', 'a'.repeat(100))
    expect(surface.texts[1]?.text).toBe(`${'a'.repeat(95)}…`)
  })

  it('estimates widths the font cannot measure', () => {
    const surface = new RecordingSurface()
    const unmeasurable = {
      ...estimatedMetrics,
      widthOf: (): number => {
        throw new Error('WinAnsi cannot encode')
      },
    }
    drawField(surface, unmeasurable, 500, 'To', 'a'.repeat(100))
    expect(surface.texts[1]?.text).toBe(`${'a'.repeat(95)}…`)
  })

  it('shows a dash for empty values', () => {
    const surface = new RecordingSurface()
    drawField(surface, estimatedMetrics, 500, 'Notes', '')
    expect(surface.texts[1]?.text).toBe('—')
  })

  it('colours the value when asked', () => {
    const surface = new RecordingSurface()
    drawField(surface, estimatedMetrics, 500, 'Overall Risk', 'HIGH', { valueColour: getRiskColour('HIGH') })
    expect(surface.texts[1]?.colour).toBe(COLOURS.riskHigh)
  })
})

describe('drawSectionHeader', () => {
  it('draws an upper-case label inside the bar', () => {
    const surface = new RecordingSurface()
    const next = drawSectionHeader(surface, 700, 'Sharp Turns')

    expect(next).toBe(676)
    expect(surface.texts).toEqual([
      { op: 'text', page: 1, x: 48, y: 687, text: 'SHARP TURNS', font: 'bold', size: 9, colour: COLOURS.white },
    ])
  })
})

describe('needsNewPage', () => {
  it('compares against the bottom margin', () => {
    expect(needsNewPage(100, 50)).toBe(false)
    expect(needsNewPage(100, 51)).toBe(true)
    expect(needsNewPage(100, 51, { topY: 800, bottomMargin: 20 })).toBe(false)
  })
})
