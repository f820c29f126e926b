/**
 * Draw surfaces
 *
 * The text surface rasterises frame-space drawing onto a character grid and
 * repaints the terminal in place on every present.
 */

import type { BoundingBox } from '../vocabulary/detectionSchemas'
import type { DrawSurface } from './types'

const ANSI_CLEAR_SCREEN = '\x1b[2J'
const ANSI_CURSOR_HOME = '\x1b[H'

export type TextSurfaceOptions = {
  columns?: number
  rows?: number
  write?: (chunk: string) => void
}

export type TextSurface = DrawSurface & {
  /** Current grid, one string per row */
  snapshot: () => Array<string>
}

export function createTextSurface({
  columns = 80,
  rows = 24,
  write = (chunk) => {
    process.stdout.write(chunk)
  },
}: TextSurfaceOptions = {}): TextSurface {
  let frameWidth = 1
  let frameHeight = 1
  let presented = false

  const blankGrid = () => Array.from({ length: rows }, () => Array<string>(columns).fill(' '))
  let grid = blankGrid()

  const clamp = (value: number, max: number) => Math.min(max, Math.max(0, value))
  const toColumn = (x: number) => clamp(Math.floor((x / frameWidth) * columns), columns - 1)
  const toRow = (y: number) => clamp(Math.floor((y / frameHeight) * rows), rows - 1)

  const put = (row: number, column: number, char: string) => {
    if (row < 0 || row >= rows || column < 0 || column >= columns) return
    grid[row][column] = char
  }

  const writeText = (row: number, column: number, text: string) => {
    for (let i = 0; i < text.length; i++) {
      put(row, column + i, text[i])
    }
  }

  return {
    describe: `text ${columns}x${rows}`,

    beginFrame: (width, height) => {
      frameWidth = width > 0 ? width : 1
      frameHeight = height > 0 ? height : 1
      grid = blankGrid()
    },

    strokeRect: (box: BoundingBox, label?: string) => {
      const left = toColumn(box.originX)
      const right = toColumn(box.originX + box.width)
      const top = toRow(box.originY)
      const bottom = toRow(box.originY + box.height)

      for (let column = left; column <= right; column++) {
        put(top, column, '-')
        put(bottom, column, '-')
      }
      for (let row = top; row <= bottom; row++) {
        put(row, left, '|')
        put(row, right, '|')
      }
      put(top, left, '+')
      put(top, right, '+')
      put(bottom, left, '+')
      put(bottom, right, '+')

      if (label) {
        writeText(top, left + 1, label)
      }
    },

    drawText: (x, y, text) => {
      writeText(toRow(y), toColumn(x), text)
    },

    drawBanner: (text) => {
      const row = Math.min(1, rows - 1)
      const padded = ` ${text} `
      writeText(row, 0, '='.repeat(columns))
      writeText(row, Math.max(0, Math.floor((columns - padded.length) / 2)), padded)
    },

    present: () => {
      const prefix = presented ? ANSI_CURSOR_HOME : ANSI_CLEAR_SCREEN + ANSI_CURSOR_HOME
      presented = true
      write(prefix + grid.map((row) => row.join('')).join('\n') + '\n')
    },

    snapshot: () => grid.map((row) => row.join('')),
  }
}

/**
 * Headless surface: drawing calls are accepted and dropped
 */
export const createNullSurface = (): DrawSurface => ({
  describe: 'none',
  beginFrame: () => {},
  strokeRect: () => {},
  drawText: () => {},
  drawBanner: () => {},
  present: () => {},
})
