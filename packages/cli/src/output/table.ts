import type { Report, ReportCell } from '@rigging/kernel'
import { enabledColor, type Theme } from './theme.js'

/**
 * renderTable — draw a Report as a box-drawn grid.
 *
 *   ╒════╤══════╕
 *   │ Id │ Name │
 *   ╞════╪══════╡
 *   │  1 │ dns  │
 *   ├────┼──────┤
 *   │  2 │ http │
 *   ╘════╧══════╛
 *
 * Numbers are right-aligned, everything else left-aligned. Colour is
 * applied after padding so widths are measured on plain text.
 */
export function renderTable(report: Report, theme: Theme): string {
  const cells = report.rows.map((row) => row.map(cellText))
  const widths = report.headers.map((header, i) =>
    Math.max(header.length, ...cells.map((row) => (row[i] ?? '').length)),
  )

  const rule = (left: string, fill: string, join: string, right: string): string =>
    left + widths.map((w) => fill.repeat(w + 2)).join(join) + right

  const line = (texts: ReadonlyArray<string>, paint: (text: string, i: number) => string): string =>
    '│' + widths.map((_w, i) => ' ' + paint(texts[i] ?? '', i) + ' ').join('│') + '│'

  const out: string[] = [rule('╒', '═', '╤', '╕')]
  out.push(line(report.headers, (text, i) => theme.blue(text.padEnd(widths[i] ?? 0))))
  out.push(rule('╞', '═', '╪', '╡'))

  report.rows.forEach((row, r) => {
    if (r > 0) out.push(rule('├', '─', '┼', '┤'))
    const texts = cells[r] ?? []
    out.push(
      line(texts, (text, i) => {
        const cell = row[i]
        const width = widths[i] ?? 0
        const padded = typeof cell === 'number' ? text.padStart(width) : text.padEnd(width)
        return typeof cell === 'boolean' ? enabledColor(theme, cell)(padded) : theme.text(padded)
      }),
    )
  })

  out.push(rule('╘', '═', '╧', '╛'))
  return out.join('\n')
}

function cellText(cell: ReportCell | undefined): string {
  if (cell === undefined) return ''
  if (typeof cell === 'boolean') return cell ? 'true' : 'false'
  return String(cell)
}
