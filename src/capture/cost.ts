import type { AgentUsage } from '../agent/types'
import type { CostEstimate, Pricing, TokenUsage } from '../core/types'

export const DEFAULT_PRICING: Pricing = {
  inputPerMillion: 0.2,
  outputPerMillion: 2.0,
  cachedPerMillion: 0.02,
}

export function emptyUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0, cachedTokens: 0, totalTokens: 0 }
}

/**
 * Estimated cost in USD for the given token counts.
 * Linear in every count; zero tokens cost zero.
 */
export function calculateCost(
  inputTokens: number,
  outputTokens: number,
  cachedTokens: number,
  pricing: Pricing = DEFAULT_PRICING,
): number {
  return (
    (inputTokens / 1e6) * pricing.inputPerMillion +
    (outputTokens / 1e6) * pricing.outputPerMillion +
    (cachedTokens / 1e6) * pricing.cachedPerMillion
  )
}

export function estimateCost(usage: TokenUsage, pricing: Pricing = DEFAULT_PRICING): CostEstimate {
  return {
    estimatedCostUsd: calculateCost(usage.inputTokens, usage.outputTokens, usage.cachedTokens, pricing),
    pricing: { ...pricing },
  }
}

const count = (...values: Array<number | undefined>): number => {
  const value = values.find((candidate) => typeof candidate === 'number' && Number.isFinite(candidate))
  return value !== undefined && value > 0 ? Math.floor(value) : 0
}

/**
 * Normalizes agent-reported usage. Missing or malformed counts become zero.
 */
export function normalizeUsage(reported: AgentUsage | undefined): TokenUsage {
  if (!reported) return emptyUsage()

  const inputTokens = count(reported.inputTokens, reported.input_tokens)
  const outputTokens = count(reported.outputTokens, reported.output_tokens)
  const cachedTokens = count(reported.cachedTokens, reported.cached_tokens)

  return { inputTokens, outputTokens, cachedTokens, totalTokens: inputTokens + outputTokens + cachedTokens }
}

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  const inputTokens = a.inputTokens + b.inputTokens
  const outputTokens = a.outputTokens + b.outputTokens
  const cachedTokens = a.cachedTokens + b.cachedTokens
  return { inputTokens, outputTokens, cachedTokens, totalTokens: inputTokens + outputTokens + cachedTokens }
}
