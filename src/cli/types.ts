/**
 * CLI command definitions and interfaces
 */

export interface BaseArgs {
  config?: string
  verbose?: boolean
  quiet?: boolean
  headless?: boolean
  outputDir?: string
}

export interface RunArgs extends BaseArgs {
  task?: string[]
  app?: string
}

export interface HistoryArgs extends BaseArgs {
  json?: boolean
}

export interface PrintConfigArgs extends BaseArgs {
  format?: string
}
