import { describe, it, expect, beforeEach, afterEach } from '@jest/globals'
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { ZodError } from 'zod'
import { writeManifest, readManifest, buildManifest } from './manifest-writer'
import { AppRegistry } from '../apps'
import type { TaskRun } from '../core/types'

describe('manifest writer', () => {
  const finishedAt = new Date('2026-03-14T09:27:10.000Z')
  const now = () => finishedAt

  let outputDir: string
  let run: TaskRun

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'ui-capture-manifest-'))
    run = {
      id: '20260314_092653_a1b2c3d4',
      app: new AppRegistry().getApp('linear'),
      task: 'Create a project in Linear',
      credentials: { identity: 'qa@example.com', secret: 'test-secret' },
      screenshots: [
        { step: 0, name: 'step_0', timestamp: '2026-03-14T09:27:00.000Z', file: join(outputDir, '00_step_0.png') },
        { step: 1, name: 'step_2', timestamp: '2026-03-14T09:27:05.000Z', file: join(outputDir, '02_step_2.png') },
      ],
      usage: { inputTokens: 1000, outputTokens: 200, cachedTokens: 0, totalTokens: 1200 },
      cost: {
        estimatedCostUsd: 0.0006,
        pricing: { inputPerMillion: 0.2, outputPerMillion: 2.0, cachedPerMillion: 0.02 },
      },
      outputDir,
      profileDir: '/home/qa/.ui-capture-chrome',
      startedAt: new Date('2026-03-14T09:26:53.000Z'),
      timedOut: false,
      login: 'verified',
    }
  })

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true })
  })

  it('should write the manifest next to the screenshots', async () => {
    const manifestPath = await writeManifest(run, { now })

    expect(manifestPath).toBe(join(outputDir, 'manifest.json'))

    const written: unknown = JSON.parse(await readFile(manifestPath, 'utf-8'))
    expect(written).toEqual({
      run_id: '20260314_092653_a1b2c3d4',
      task: 'Create a project in Linear',
      app: 'Linear',
      executed_at: '2026-03-14T09:27:10.000Z',
      timed_out: false,
      login: 'verified',
      screenshots_count: 2,
      screenshots: [
        { step: 0, name: 'step_0', timestamp: '2026-03-14T09:27:00.000Z', file: join(outputDir, '00_step_0.png') },
        { step: 1, name: 'step_2', timestamp: '2026-03-14T09:27:05.000Z', file: join(outputDir, '02_step_2.png') },
      ],
      token_usage: { input_tokens: 1000, output_tokens: 200, cached_tokens: 0, total_tokens: 1200 },
      cost: {
        estimated_cost_usd: 0.0006,
        pricing: { input_per_million: 0.2, output_per_million: 2.0, cached_per_million: 0.02 },
      },
      cookies_stored_in: '/home/qa/.ui-capture-chrome',
    })
  })

  it('should never write the secret', async () => {
    const manifestPath = await writeManifest(run)

    expect(await readFile(manifestPath, 'utf-8')).not.toContain('test-secret')
  })

  it('should read back what it wrote', async () => {
    const manifestPath = await writeManifest(run, { now })

    await expect(readManifest(manifestPath)).resolves.toEqual(buildManifest(run, finishedAt))
  })

  it('should stamp executed_at when the manifest is written, not when the run started', async () => {
    const manifest = await readManifest(await writeManifest(run, { now }))

    expect(manifest.executed_at).toBe('2026-03-14T09:27:10.000Z')
    for (const screenshot of manifest.screenshots) {
      expect(Date.parse(manifest.executed_at)).toBeGreaterThanOrEqual(Date.parse(screenshot.timestamp))
    }
  })

  it('should omit cost when accounting is disabled', async () => {
    const manifestPath = await writeManifest({ ...run, cost: undefined })
    const manifest = await readManifest(manifestPath)

    expect(manifest.cost).toBeUndefined()
    expect(manifest.token_usage?.total_tokens).toBe(1200)
  })

  it('should overwrite an existing manifest', async () => {
    await writeManifest(run)
    const manifestPath = await writeManifest({ ...run, timedOut: true, screenshots: [] })
    const manifest = await readManifest(manifestPath)

    expect(manifest.timed_out).toBe(true)
    expect(manifest.screenshots_count).toBe(0)
  })

  it('should reject a manifest with the wrong shape', async () => {
    const manifestPath = join(outputDir, 'manifest.json')
    await writeFile(manifestPath, JSON.stringify({ task: 'x', app: 'Linear' }))

    await expect(readManifest(manifestPath)).rejects.toThrow(ZodError)
  })
})
