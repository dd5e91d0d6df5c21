import pc from 'picocolors'
import type { CaptureResult, CaptureSuccess } from '../../core/types'
import type { Manifest } from '../../capture/manifest-writer'
import type { HistoryEntry, RunHistory } from '../run-history'

export interface CLIReporterOptions {
  showColors?: boolean
  maxTaskLength?: number
}

/**
 * CLI Reporter that displays capture results and run history in a human-readable format
 */
export class CLIReporter {
  private options: Required<CLIReporterOptions>

  constructor(options: CLIReporterOptions = {}) {
    this.options = {
      showColors: options.showColors ?? true,
      maxTaskLength: options.maxTaskLength ?? 50,
    }
  }

  /**
   * Generate the summary of one capture. Pass the manifest to list the captured states.
   */
  generate(result: CaptureResult, manifest?: Manifest): string {
    if (result.status === 'error') {
      return [this.colorize('✗ FAILED UI capture', 'red'), `Error: ${result.error}`].join('\n')
    }

    const lines: string[] = []

    lines.push(`${this.colorize('✓ SUCCESS', 'green')} UI capture for ${result.app} (run ${result.runId})`)
    lines.push('')
    lines.push(...this.formatDetails(result))

    if (result.timedOut) {
      lines.push(this.colorize('Agent timed out; results are partial', 'yellow'))
    }

    if (manifest && manifest.screenshots.length > 0) {
      lines.push('')
      lines.push('Captured UI states:')
      for (const screenshot of manifest.screenshots) {
        lines.push(`  • [${screenshot.step}] ${screenshot.name}`)
      }
    }

    return lines.join('\n')
  }

  print(result: CaptureResult, manifest?: Manifest): void {
    // eslint-disable-next-line no-console
    console.log(this.generate(result, manifest))
  }

  /**
   * Generate a table of previous runs followed by success and failure counts
   */
  generateHistory(history: RunHistory): string {
    if (history.entries.length === 0) {
      return 'No runs recorded yet'
    }

    const headers = ['Run', 'Status', 'App', 'Task', 'Shots']
    const rows = history.entries.map((entry) => this.formatHistoryRow(entry))
    const colWidths = this.calculateColumnWidths(headers, rows)

    const lines: string[] = []

    lines.push(this.formatRow(headers, colWidths))
    lines.push(this.formatSeparator(colWidths))
    for (const row of rows) {
      lines.push(this.formatRow(row, colWidths))
    }

    lines.push('')
    lines.push(`Runs: ${history.entries.length} total, ${history.succeeded} succeeded, ${history.failed} failed`)

    return lines.join('\n')
  }

  printHistory(history: RunHistory): void {
    // eslint-disable-next-line no-console
    console.log(this.generateHistory(history))
  }

  private formatDetails(result: CaptureSuccess): string[] {
    const lines = [
      `Screenshots: ${result.screenshots}`,
      `Output directory: ${result.outputDir}`,
      `Manifest: ${result.manifest}`,
      `Chrome profile: ${result.chromeProfile}`,
      `Login: ${this.formatLogin(result.login)}`,
    ]

    if (result.usage && result.usage.totalTokens > 0) {
      const { totalTokens, inputTokens, outputTokens, cachedTokens } = result.usage
      lines.push(`Tokens: ${totalTokens} (input ${inputTokens}, output ${outputTokens}, cached ${cachedTokens})`)
    }

    if (result.cost) {
      lines.push(`Estimated cost: $${result.cost.estimatedCostUsd.toFixed(4)}`)
    }

    return lines
  }

  private formatLogin(login: CaptureSuccess['login']): string {
    switch (login) {
      case 'verified':
        return this.colorize(login, 'green')
      case 'unverified':
        return this.colorize(login, 'yellow')
      case 'failed':
        return this.colorize(login, 'red')
      case 'skipped':
        return 'handled by agent'
    }
  }

  private formatHistoryRow(entry: HistoryEntry): string[] {
    if (entry.status === 'error') {
      return [entry.runId, this.colorize('FAILED', 'red'), '-', entry.error, '-']
    }

    const { manifest } = entry
    const status = manifest.timed_out ? this.colorize('PARTIAL', 'yellow') : this.colorize('OK', 'green')

    return [entry.runId, status, manifest.app, this.truncate(manifest.task), String(manifest.screenshots_count)]
  }

  private calculateColumnWidths(headers: string[], rows: string[][]): number[] {
    const widths = headers.map((header) => header.length)

    for (const row of rows) {
      row.forEach((cell, index) => {
        // Strip ANSI colors for width calculation
        const cleanCell = this.stripColors(cell)
        widths[index] = Math.max(widths[index] || 0, cleanCell.length)
      })
    }

    return widths
  }

  private formatRow(cells: string[], widths: number[]): string {
    return cells
      .map((cell, index) => {
        const cleanCell = this.stripColors(cell)
        const width = widths[index] || 0
        const padding = width - cleanCell.length
        return cell + ' '.repeat(Math.max(0, padding))
      })
      .join(' | ')
      .trimEnd()
  }

  private formatSeparator(widths: number[]): string {
    return widths.map((width) => '-'.repeat(width)).join('-+-')
  }

  private truncate(text: string): string {
    if (text.length <= this.options.maxTaskLength) {
      return text
    }
    return text.slice(0, this.options.maxTaskLength - 3) + '...'
  }

  private colorize(text: string, color: 'green' | 'red' | 'yellow'): string {
    if (!this.options.showColors) {
      return text
    }

    switch (color) {
      case 'green':
        return pc.green(text)
      case 'red':
        return pc.red(text)
      case 'yellow':
        return pc.yellow(text)
    }
  }

  private stripColors(text: string): string {
    // eslint-disable-next-line no-control-regex
    return text.replace(/\x1b\[[0-9;]*m/g, '')
  }
}
