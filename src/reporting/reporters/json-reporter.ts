import type { CaptureResult } from '../../core/types'

export interface JSONReporterOptions {
  prettyPrint?: boolean
}

/**
 * JSON Reporter that outputs the capture result for scripts and CI tools
 */
export class JSONReporter {
  private options: Required<JSONReporterOptions>

  constructor(options: JSONReporterOptions = {}) {
    this.options = {
      prettyPrint: options.prettyPrint ?? true,
    }
  }

  generate(result: CaptureResult): string {
    if (this.options.prettyPrint) {
      return JSON.stringify(result, null, 2)
    }

    return JSON.stringify(result)
  }

  print(result: CaptureResult): void {
    // eslint-disable-next-line no-console
    console.log(this.generate(result))
  }
}
