/**
 * Word Wrapping
 *
 * Greedy, word-atomic line breaking against a maximum width. Words are
 * never split: a word wider than the column gets a line of its own and
 * overflows it.
 *
 * @module services/textWrap
 */

import type { FontMetricsProvider, FontStyle } from '../types/surface'
import type { WrappedLines } from '../types/table'
import { estimateCharsPerLine } from './fontMetrics'
import { logger } from '../utils/logger'

function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0)
}

function greedyWrap(words: string[], fits: (line: string) => boolean): WrappedLines {
  const lines: string[] = []
  let currentLine = ''

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word
    if (currentLine && !fits(testLine)) {
      lines.push(currentLine)
      currentLine = word
    } else {
      currentLine = testLine
    }
  }
  lines.push(currentLine)
  return lines
}

/**
 * Word-wrap text to fit within a maximum width.
 *
 * Without metrics, or when the provider throws, lines are filled by
 * character count at `maxWidth / (fontSize * 0.5)` characters.
 * Empty input gives a single empty line.
 */
export function wrapText(
  text: string,
  font: FontStyle,
  fontSize: number,
  maxWidth: number,
  metrics?: FontMetricsProvider,
): WrappedLines {
  const words = tokenize(text)
  if (words.length === 0) return ['']

  if (metrics) {
    try {
      return greedyWrap(words, (line) => metrics.widthOf(line, font, fontSize) <= maxWidth)
    } catch (error) {
      logger.warn('table.metrics_fallback', {
        font,
        fontSize,
        maxWidth,
        reason: error instanceof Error ? error.message : String(error),
      })
    }
  }

  const maxChars = estimateCharsPerLine(maxWidth, fontSize)
  return greedyWrap(words, (line) => line.length <= maxChars)
}
