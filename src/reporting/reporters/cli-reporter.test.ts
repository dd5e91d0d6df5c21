import { describe, it, expect } from '@jest/globals'
import { CLIReporter } from './cli-reporter'
import type { CaptureSuccess } from '../../core/types'
import type { Manifest } from '../../capture/manifest-writer'
import type { RunHistory } from '../run-history'

describe('CLIReporter', () => {
  const reporter = new CLIReporter({ showColors: false })

  const createSuccess = (overrides: Partial<CaptureSuccess> = {}): CaptureSuccess => ({
    status: 'success',
    runId: '20260314_092653_a1b2c3d4',
    app: 'GitHub',
    screenshots: 2,
    outputDir: '/work/outputs/20260314_092653_a1b2c3d4',
    manifest: '/work/outputs/20260314_092653_a1b2c3d4/manifest.json',
    chromeProfile: '/home/qa/.ui-capture-chrome',
    timedOut: false,
    login: 'verified',
    ...overrides,
  })

  const createManifest = (overrides: Partial<Manifest> = {}): Manifest => ({
    run_id: '20260314_092653_a1b2c3d4',
    task: 'Create an issue in GitHub',
    app: 'GitHub',
    executed_at: '2026-03-14T09:26:53.000Z',
    timed_out: false,
    login: 'verified',
    screenshots_count: 2,
    screenshots: [
      { step: 0, name: 'step_0', timestamp: '2026-03-14T09:27:00.000Z', file: '/work/00_step_0.png' },
      { step: 1, name: 'step_3', timestamp: '2026-03-14T09:27:09.000Z', file: '/work/03_step_3.png' },
    ],
    cookies_stored_in: '/home/qa/.ui-capture-chrome',
    ...overrides,
  })

  describe('generate', () => {
    it('should summarize a successful capture', () => {
      const output = reporter.generate(createSuccess())

      expect(output.split('\n')).toEqual([
        '✓ SUCCESS UI capture for GitHub (run 20260314_092653_a1b2c3d4)',
        '',
        'Screenshots: 2',
        'Output directory: /work/outputs/20260314_092653_a1b2c3d4',
        'Manifest: /work/outputs/20260314_092653_a1b2c3d4/manifest.json',
        'Chrome profile: /home/qa/.ui-capture-chrome',
        'Login: verified',
      ])
    })

    it('should list the captured states from the manifest', () => {
      const lines = reporter.generate(createSuccess(), createManifest()).split('\n')

      expect(lines.slice(-3)).toEqual(['Captured UI states:', '  • [0] step_0', '  • [1] step_3'])
    })

    it('should show token usage and cost when present', () => {
      const output = reporter.generate(
        createSuccess({
          usage: { inputTokens: 1000, outputTokens: 200, cachedTokens: 100, totalTokens: 1300 },
          cost: {
            estimatedCostUsd: 0.000602,
            pricing: { inputPerMillion: 0.2, outputPerMillion: 2.0, cachedPerMillion: 0.02 },
          },
        }),
      )

      expect(output).toContain('\nTokens: 1300 (input 1000, output 200, cached 100)\n')
      expect(output.endsWith('\nEstimated cost: $0.0006')).toBe(true)
    })

    it('should flag a timed out run', () => {
      const output = reporter.generate(createSuccess({ timedOut: true, login: 'skipped' }))

      expect(output).toContain('\nLogin: handled by agent\n')
      expect(output.endsWith('\nAgent timed out; results are partial')).toBe(true)
    })

    it('should show the error of a failed capture', () => {
      expect(reporter.generate({ status: 'error', error: 'Unknown app: trello' })).toBe(
        '✗ FAILED UI capture\nError: Unknown app: trello',
      )
    })

    it('should color the status when colors are enabled', () => {
      const output = new CLIReporter({ showColors: true }).generate({ status: 'error', error: 'boom' })

      expect(output).toContain('FAILED UI capture')
    })
  })

  describe('generateHistory', () => {
    it('should say when there is no history', () => {
      expect(reporter.generateHistory({ entries: [], succeeded: 0, failed: 0 })).toBe('No runs recorded yet')
    })

    it('should render a table with counts', () => {
      const history: RunHistory = {
        entries: [
          {
            status: 'success',
            runId: '20260314_092653_a1b2c3d4',
            directory: '/work/outputs/20260314_092653_a1b2c3d4',
            manifest: createManifest({ screenshots_count: 3 }),
          },
          {
            status: 'error',
            runId: '20260313_080000_deadbeef',
            directory: '/work/outputs/20260313_080000_deadbeef',
            error: 'No manifest written',
          },
        ],
        succeeded: 1,
        failed: 1,
      }

      expect(reporter.generateHistory(history).split('\n')).toEqual([
        ['Run'.padEnd(24), 'Status', 'App'.padEnd(6), 'Task'.padEnd(25), 'Shots'].join(' | '),
        ['-'.repeat(24), '-'.repeat(6), '-'.repeat(6), '-'.repeat(25), '-'.repeat(5)].join('-+-'),
        ['20260314_092653_a1b2c3d4', 'OK'.padEnd(6), 'GitHub', 'Create an issue in GitHub', '3'].join(' | '),
        ['20260313_080000_deadbeef', 'FAILED', '-'.padEnd(6), 'No manifest written'.padEnd(25), '-'].join(' | '),
        '',
        'Runs: 2 total, 1 succeeded, 1 failed',
      ])
    })

    it('should mark timed out runs as partial and truncate long tasks', () => {
      const history: RunHistory = {
        entries: [
          {
            status: 'success',
            runId: '20260314_092653_a1b2c3d4',
            directory: '/work/outputs/20260314_092653_a1b2c3d4',
            manifest: createManifest({ timed_out: true, task: 'x'.repeat(60) }),
          },
        ],
        succeeded: 1,
        failed: 0,
      }

      const row = reporter.generateHistory(history).split('\n')[2]

      expect(row).toBe(['20260314_092653_a1b2c3d4', 'PARTIAL', 'GitHub', `${'x'.repeat(47)}...`, '2'].join(' | '))
    })
  })
})
