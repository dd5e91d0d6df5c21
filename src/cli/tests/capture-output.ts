/* eslint-disable no-console */
import { jest } from '@jest/globals'
import { logger } from '../../logger'

/**
 * Collects console and logger output while a command runs. The logger module
 * must be mocked by the calling test file.
 */
export const captureOutput = () => {
  const originalLog = console.log
  const originalError = console.error
  const logs: string[] = []
  const errors: string[] = []

  const mockedLogger = jest.mocked(logger)

  mockedLogger.info.mockImplementation((message: unknown, ...args: unknown[]) => {
    logs.push([message, ...args].map(String).join(' '))
  })
  mockedLogger.warn.mockImplementation((message: unknown, ...args: unknown[]) => {
    logs.push([message, ...args].map(String).join(' '))
  })
  mockedLogger.debug.mockImplementation(() => undefined)
  mockedLogger.error.mockImplementation((message: unknown, ...args: unknown[]) => {
    errors.push([message, ...args].map(String).join(' '))
  })

  console.log = (...args: unknown[]) => {
    logs.push(args.map(String).join(' '))
  }

  console.error = (...args: unknown[]) => {
    errors.push(args.map(String).join(' '))
  }

  return {
    getLogs: () => logs.join('\n'),
    getLogLines: () => [...logs],
    getErrors: () => errors.join('\n'),
    restore: () => {
      console.log = originalLog
      console.error = originalError

      mockedLogger.info.mockReset()
      mockedLogger.error.mockReset()
      mockedLogger.warn.mockReset()
      mockedLogger.debug.mockReset()
    },
  }
}
