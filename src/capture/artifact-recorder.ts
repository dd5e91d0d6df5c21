import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { AgentHistory, AgentScreenshot } from '../agent/types'
import type { BrowserPage } from '../browser/types'
import type { ScreenshotRecord, TokenUsage } from '../core/types'
import type { Logger } from '../logger'
import { normalizeUsage } from './cost'

export interface ArtifactRecorderOptions {
  outputDir: string
  logger: Logger
  now?: () => Date
}

export interface ExtractedArtifacts {
  screenshots: ScreenshotRecord[]
  usage: TokenUsage
}

export const FALLBACK_SCREENSHOT_NAME = 'final_state'

const BASE64_PATTERN = /^[A-Za-z0-9+/\s]+={0,2}\s*$/

function decodeScreenshot(entry: string | Uint8Array): Buffer {
  if (typeof entry !== 'string') {
    return Buffer.from(entry)
  }

  const payload = entry.replace(/^data:image\/\w+;base64,/, '')
  if (!BASE64_PATTERN.test(payload)) {
    throw new Error('screenshot is not valid base64')
  }
  return Buffer.from(payload, 'base64')
}

const padIndex = (index: number): string => String(index).padStart(2, '0')

/**
 * Turns an agent's execution history into files under the run's output
 * directory. A broken entry costs one screenshot, never the run. When the
 * history yields nothing, the live page is captured once instead.
 */
export class ArtifactRecorder {
  private readonly outputDir: string
  private readonly logger: Logger
  private readonly now: () => Date

  constructor(options: ArtifactRecorderOptions) {
    this.outputDir = options.outputDir
    this.logger = options.logger
    this.now = options.now ?? (() => new Date())
  }

  async extract(history: AgentHistory | undefined, page: BrowserPage | undefined): Promise<ExtractedArtifacts> {
    const recorded = history ? await this.saveHistoryScreenshots(this.readHistoryScreenshots(history)) : []
    if (history?.screenshots && recorded.length === 0) {
      this.logger.info('Agent history holds no usable screenshots, capturing the final state')
    }
    const screenshots = recorded.length > 0 ? recorded : await this.saveFallbackScreenshot(page)

    return { screenshots, usage: this.readUsage(history) }
  }

  private readHistoryScreenshots(history: AgentHistory): AgentScreenshot[] {
    try {
      return history.screenshots?.() ?? []
    } catch (error) {
      this.logger.warn(
        `Could not read screenshots from agent history: ${error instanceof Error ? error.message : String(error)}`,
      )
      return []
    }
  }

  private async saveHistoryScreenshots(entries: AgentScreenshot[]): Promise<ScreenshotRecord[]> {
    const records: ScreenshotRecord[] = []

    for (const [index, entry] of entries.entries()) {
      if (entry === null) continue

      const step = records.length
      const file = join(this.outputDir, `${padIndex(index)}_step_${index}.png`)

      try {
        await writeFile(file, decodeScreenshot(entry))
      } catch (error) {
        this.logger.warn(
          `Skipping screenshot ${index}: ${error instanceof Error ? error.message : String(error)}`,
        )
        continue
      }

      records.push({ step, name: `step_${index}`, timestamp: this.now().toISOString(), file })
      this.logger.debug(`Saved screenshot ${file}`)
    }

    return records
  }

  private async saveFallbackScreenshot(page: BrowserPage | undefined): Promise<ScreenshotRecord[]> {
    if (!page) {
      this.logger.warn('No page available for a final screenshot')
      return []
    }

    const file = join(this.outputDir, `00_${FALLBACK_SCREENSHOT_NAME}.png`)

    try {
      await writeFile(file, await page.screenshot())
    } catch (error) {
      this.logger.warn(`Final screenshot failed: ${error instanceof Error ? error.message : String(error)}`)
      return []
    }

    return [{ step: 0, name: FALLBACK_SCREENSHOT_NAME, timestamp: this.now().toISOString(), file }]
  }

  private readUsage(history: AgentHistory | undefined): TokenUsage {
    try {
      return normalizeUsage(history?.usage?.())
    } catch (error) {
      this.logger.warn(
        `Could not read token usage from agent history: ${error instanceof Error ? error.message : String(error)}`,
      )
      return normalizeUsage(undefined)
    }
  }
}
