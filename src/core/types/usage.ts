import type { Pricing } from './capture-config'

export interface TokenUsage {
  inputTokens: number
  outputTokens: number
  cachedTokens: number
  totalTokens: number // input + output + cached
}

export interface CostEstimate {
  estimatedCostUsd: number
  pricing: Pricing
}
