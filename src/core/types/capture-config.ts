import { z } from 'zod'
import { AppProfileInputSchema } from './app-profile'

export const LoginModeSchema = z.enum(['auto', 'agent', 'sequencer'])

export type LoginMode = z.infer<typeof LoginModeSchema>

export const LoginConfigSchema = z.object({
  identity: z.string().default(''),
  secretEnv: z.string().min(1).default('PASSWORD'),
  requireSecret: z.boolean().default(false),
  mode: LoginModeSchema.default('auto'),
  settleDelayMs: z.number().int().nonnegative().default(2000),
  checkIntervalMs: z.number().int().positive().default(2000),
  agentMfaWaitSeconds: z.number().int().positive().default(15), // Told to the agent in the instruction
})

export type LoginConfig = z.infer<typeof LoginConfigSchema>

export const AgentConfigSchema = z.object({
  module: z.string().optional(), // Path or package exporting createAgent()
  model: z.string().default('browser-use-llm'),
  options: z.record(z.string(), z.unknown()).default({}),
})

export type AgentConfig = z.infer<typeof AgentConfigSchema>

export const TimeoutConfigSchema = z.object({
  agentSeconds: z.number().positive().default(180),
  complexAgentSeconds: z.number().positive().default(300),
  cleanupMs: z.number().int().positive().default(10000),
})

export type TimeoutConfig = z.infer<typeof TimeoutConfigSchema>

// Rates in USD per million tokens
export const PricingSchema = z.object({
  inputPerMillion: z.number().nonnegative().default(0.2),
  outputPerMillion: z.number().nonnegative().default(2.0),
  cachedPerMillion: z.number().nonnegative().default(0.02),
})

export type Pricing = z.infer<typeof PricingSchema>

export const CostConfigSchema = z.object({
  enabled: z.boolean().default(true),
  pricing: PricingSchema.default({}),
})

export type CostConfig = z.infer<typeof CostConfigSchema>

export const BrowserConfigSchema = z.object({
  profileDir: z.string().optional(), // Defaults to ~/.ui-capture-chrome
  executablePath: z.string().optional(),
  headless: z.boolean().default(false),
  chromeFlags: z.array(z.string()).default(['--no-first-run', '--no-default-browser-check']),
})

export type BrowserConfig = z.infer<typeof BrowserConfigSchema>

// Main configuration object
export const CaptureConfigSchema = z.object({
  outputDir: z.string().default('./outputs'),
  logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default('info'),
  browser: BrowserConfigSchema.default({}),
  login: LoginConfigSchema.default({}),
  agent: AgentConfigSchema.default({}),
  timeouts: TimeoutConfigSchema.default({}),
  cost: CostConfigSchema.default({}),
  apps: z.record(z.string(), AppProfileInputSchema).optional(),
})

export type CaptureConfig = z.infer<typeof CaptureConfigSchema>
export type CaptureConfigInput = z.input<typeof CaptureConfigSchema>
