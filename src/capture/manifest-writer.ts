import { readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import type { TaskRun } from '../core/types'

export const MANIFEST_FILENAME = 'manifest.json'

const ScreenshotEntrySchema = z.object({
  step: z.number().int().nonnegative(),
  name: z.string(),
  timestamp: z.string(),
  file: z.string(),
})

const TokenUsageEntrySchema = z.object({
  input_tokens: z.number().int().nonnegative(),
  output_tokens: z.number().int().nonnegative(),
  cached_tokens: z.number().int().nonnegative(),
  total_tokens: z.number().int().nonnegative(),
})

const CostEntrySchema = z.object({
  estimated_cost_usd: z.number().nonnegative(),
  pricing: z.object({
    input_per_million: z.number(),
    output_per_million: z.number(),
    cached_per_million: z.number(),
  }),
})

// On-disk layout of manifest.json
export const ManifestSchema = z.object({
  run_id: z.string(),
  task: z.string(),
  app: z.string(),
  executed_at: z.string(),
  timed_out: z.boolean(),
  login: z.enum(['verified', 'unverified', 'failed', 'skipped']),
  screenshots_count: z.number().int().nonnegative(),
  screenshots: z.array(ScreenshotEntrySchema),
  token_usage: TokenUsageEntrySchema.optional(),
  cost: CostEntrySchema.optional(),
  cookies_stored_in: z.string(),
})

export type Manifest = z.infer<typeof ManifestSchema>

export interface WriteManifestOptions {
  /** Clock for `executed_at`, read when the manifest is written */
  now?: () => Date
}

export function buildManifest(run: TaskRun, executedAt: Date): Manifest {
  return {
    run_id: run.id,
    task: run.task,
    app: run.app.name,
    executed_at: executedAt.toISOString(),
    timed_out: run.timedOut,
    login: run.login,
    screenshots_count: run.screenshots.length,
    screenshots: run.screenshots.map(({ step, name, timestamp, file }) => ({ step, name, timestamp, file })),
    token_usage: {
      input_tokens: run.usage.inputTokens,
      output_tokens: run.usage.outputTokens,
      cached_tokens: run.usage.cachedTokens,
      total_tokens: run.usage.totalTokens,
    },
    cost: run.cost
      ? {
          estimated_cost_usd: run.cost.estimatedCostUsd,
          pricing: {
            input_per_million: run.cost.pricing.inputPerMillion,
            output_per_million: run.cost.pricing.outputPerMillion,
            cached_per_million: run.cost.pricing.cachedPerMillion,
          },
        }
      : undefined,
    cookies_stored_in: run.profileDir,
  }
}

/**
 * Writes `<outputDir>/manifest.json`, replacing any existing file
 * @returns Path of the manifest
 */
export async function writeManifest(run: TaskRun, options: WriteManifestOptions = {}): Promise<string> {
  const now = options.now ?? (() => new Date())
  const manifestPath = join(run.outputDir, MANIFEST_FILENAME)
  await writeFile(manifestPath, JSON.stringify(buildManifest(run, now()), null, 2))
  return manifestPath
}

export async function readManifest(manifestPath: string): Promise<Manifest> {
  const content = await readFile(manifestPath, 'utf-8')
  return ManifestSchema.parse(JSON.parse(content))
}
