import type { BaseArgs } from './types'

/**
 * Maps global CLI flags onto configuration keys. Only flags that were given
 * appear, so they override the file and environment without resetting them.
 */
export function toConfigOverrides(args: BaseArgs): Record<string, unknown> {
  const overrides: Record<string, unknown> = {}

  if (args.outputDir) {
    overrides.outputDir = args.outputDir
  }

  if (args.headless !== undefined) {
    overrides.browser = { headless: args.headless }
  }

  if (args.verbose) {
    overrides.logLevel = 'debug'
  } else if (args.quiet) {
    overrides.logLevel = 'warn'
  }

  return overrides
}
