import { readdir, access } from 'node:fs/promises'
import { join } from 'node:path'
import { readManifest, MANIFEST_FILENAME } from '../capture/manifest-writer'
import type { Manifest } from '../capture/manifest-writer'
import type { Logger } from '../logger'
import { logger as defaultLogger } from '../logger'

export type HistoryEntry =
  | { status: 'success'; runId: string; directory: string; manifest: Manifest }
  | { status: 'error'; runId: string; directory: string; error: string }

export interface RunHistory {
  entries: HistoryEntry[]
  succeeded: number
  failed: number
}

/**
 * Rebuilds the list of previous runs from the run directories under
 * `outputDir`. A directory without a readable manifest counts as a failed run.
 * Entries are sorted newest first by run id.
 */
export async function collectHistory(outputDir: string, logger: Logger = defaultLogger): Promise<RunHistory> {
  let names: string[]
  try {
    const dirents = await readdir(outputDir, { withFileTypes: true })
    names = dirents.filter((dirent) => dirent.isDirectory()).map((dirent) => dirent.name)
  } catch (error) {
    logger.debug(`No run history at ${outputDir}: ${error instanceof Error ? error.message : String(error)}`)
    return { entries: [], succeeded: 0, failed: 0 }
  }

  const entries = await Promise.all(names.map((name) => readEntry(join(outputDir, name), name)))
  entries.sort((a, b) => (a.runId < b.runId ? 1 : a.runId > b.runId ? -1 : 0))

  const succeeded = entries.filter((entry) => entry.status === 'success').length

  return { entries, succeeded, failed: entries.length - succeeded }
}

async function readEntry(directory: string, name: string): Promise<HistoryEntry> {
  const manifestPath = join(directory, MANIFEST_FILENAME)

  try {
    await access(manifestPath)
  } catch {
    return { status: 'error', runId: name, directory, error: 'No manifest written' }
  }

  try {
    const manifest = await readManifest(manifestPath)
    return { status: 'success', runId: manifest.run_id, directory, manifest }
  } catch (error) {
    return {
      status: 'error',
      runId: name,
      directory,
      error: `Unreadable manifest: ${error instanceof Error ? error.message : String(error)}`,
    }
  }
}
