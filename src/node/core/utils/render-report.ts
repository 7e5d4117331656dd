import path from 'path'
import type { ReportRow, StatusGlyph } from '../../../shared/types'

export type RenderOptions = {
  /** Emit ANSI colour codes */
  color?: boolean
  /** Show the directory's base name instead of its full path */
  nameOnly?: boolean
  /** Truncate each line of the Last Commit column to this many characters */
  maxCommitWidth?: number
  /** Caption centred above the table */
  title?: string
}

const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  italic: '\x1b[3m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m'
}

const HEADERS: Array<{ title: string; ansi?: string }> = [
  { title: 'Directory', ansi: ANSI.cyan },
  { title: 'Branch', ansi: ANSI.magenta },
  { title: 'Status' },
  { title: 'Last Commit', ansi: ANSI.yellow },
  { title: 'Error', ansi: ANSI.red }
]

const GLYPH_SYMBOLS: Record<StatusGlyph, { symbol: string; ansi: string }> = {
  clean: { symbol: '✓', ansi: ANSI.green },
  ahead: { symbol: '↑', ansi: ANSI.yellow },
  'no-upstream': { symbol: '⚠', ansi: ANSI.yellow },
  dirty: { symbol: '✗', ansi: ANSI.red },
  error: { symbol: '?', ansi: ANSI.yellow }
}

type Cell = {
  lines: string[]
  ansi?: string
}

/**
 * Renders the rows as an ASCII table, one row per entry in the given order.
 */
export function renderReport(rows: ReportRow[], options: RenderOptions = {}): string {
  const header: Cell[] = HEADERS.map((h) => ({ lines: [h.title], ansi: h.ansi }))
  const body = rows.map((row) => toCells(row, options))

  const widths = HEADERS.map((_, column) =>
    Math.max(...[header, ...body].map((cells) => cellWidth(cells[column])))
  )
  const border = (fill: string): string => `+${widths.map((w) => fill.repeat(w + 2)).join('+')}+`
  const color = options.color ?? false

  const lines = [border('-'), ...renderCells(header, widths, color)]
  if (options.title) {
    lines.unshift(renderTitle(options.title, border('-').length, color))
  }
  if (body.length === 0) {
    lines.push(border('-'))
    return lines.join('\n')
  }

  lines.push(border('='))
  body.forEach((cells) => {
    lines.push(...renderCells(cells, widths, color), border('-'))
  })
  return lines.join('\n')
}

/**
 * Shortens `text` to at most `maxLength` characters, marking the cut with '...'.
 */
export function truncate(text: string, maxLength: number): string {
  const chars = Array.from(text)
  if (chars.length <= maxLength) return text
  return `${chars.slice(0, Math.max(0, maxLength - 3)).join('')}...`
}

function renderTitle(title: string, tableWidth: number, color: boolean): string {
  const indent = ' '.repeat(Math.max(0, Math.floor((tableWidth - textWidth(title)) / 2)))
  return color ? `${indent}${ANSI.italic}${title}${ANSI.reset}` : `${indent}${title}`
}

function toCells(row: ReportRow, options: RenderOptions): Cell[] {
  const glyph = GLYPH_SYMBOLS[row.glyph]
  const directory = options.nameOnly ? path.basename(row.directory) || row.directory : row.directory
  const commitLines = row.lastCommit.split('\n')
  const maxWidth = options.maxCommitWidth

  return [
    { lines: [directory] },
    { lines: [row.branch] },
    { lines: [glyph.symbol], ansi: `${ANSI.bold}${glyph.ansi}` },
    {
      lines:
        maxWidth === undefined ? commitLines : commitLines.map((line) => truncate(line, maxWidth))
    },
    { lines: [row.error] }
  ]
}

function renderCells(cells: Cell[], widths: number[], color: boolean): string[] {
  const height = Math.max(...cells.map((cell) => cell.lines.length))
  const lines: string[] = []

  for (let i = 0; i < height; i++) {
    const parts = cells.map((cell, column) => {
      const text = cell.lines[i] ?? ''
      const padding = ' '.repeat((widths[column] ?? 0) - textWidth(text))
      const painted = color && cell.ansi && text ? `${cell.ansi}${text}${ANSI.reset}` : text
      return `${painted}${padding}`
    })
    lines.push(`| ${parts.join(' | ')} |`)
  }

  return lines
}

function cellWidth(cell: Cell | undefined): number {
  return cell ? Math.max(...cell.lines.map(textWidth)) : 0
}

function textWidth(text: string): number {
  return Array.from(text).length
}
