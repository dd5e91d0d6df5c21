import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals'
import { launch } from 'chrome-launcher'
import CDP from 'chrome-remote-interface'
import { mkdtemp, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { ChromeLauncher, ChromePage, BrowserLaunchError } from './chrome-session'
import { LoginSequencer } from '../login/login-sequencer'
import { AppRegistry } from '../apps'

/* eslint-disable @typescript-eslint/no-explicit-any */

jest.mock('chrome-launcher', () => ({
  launch: jest.fn(),
}))

jest.mock('chrome-remote-interface', () => jest.fn())

jest.mock('../logger', () => ({
  logger: {
    debug: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
  },
}))

const mockLaunch = jest.mocked(launch)
const mockCDP = jest.mocked(CDP)

const createMockClient = () => ({
  Page: {
    enable: jest.fn(() => Promise.resolve({})),
    navigate: jest.fn((_params: { url: string }) => Promise.resolve<{ errorText?: string }>({})),
    loadEventFired: jest.fn(() => Promise.resolve({ timestamp: 1 })),
    captureScreenshot: jest.fn((_params: { format: string }) => Promise.resolve({ data: 'iVBORw0KGgo=' })),
  },
  Runtime: {
    enable: jest.fn(() => Promise.resolve({})),
    evaluate: jest.fn((_params: { expression: string }) =>
      Promise.resolve<{ result: { value?: unknown }; exceptionDetails?: { text: string } }>({
        result: { value: true },
      }),
    ),
  },
  Input: {
    insertText: jest.fn((_params: { text: string }) => Promise.resolve({})),
  },
  close: jest.fn(() => Promise.resolve()),
})

type MockClient = ReturnType<typeof createMockClient>

const asClient = (client: MockClient): CDP.Client => client as any

describe('ChromePage', () => {
  let client: MockClient
  let page: ChromePage

  beforeEach(() => {
    jest.clearAllMocks()
    client = createMockClient()
    page = new ChromePage(asClient(client), { networkIdleMs: 0, pollIntervalMs: 0, networkIdleTimeoutMs: 1000 })
  })

  it('should navigate and wait for the load event', async () => {
    await page.navigate('https://github.com/login')

    expect(client.Page.navigate).toHaveBeenCalledWith({ url: 'https://github.com/login' })
    expect(client.Page.loadEventFired).toHaveBeenCalledTimes(1)
    expect(client.Runtime.evaluate).not.toHaveBeenCalled()
  })

  it('should poll resource timings when waiting for network idle', async () => {
    client.Runtime.evaluate.mockResolvedValue({ result: { value: 12 } })

    await page.navigate('https://github.com/login', { waitForNetworkIdle: true })

    expect(client.Runtime.evaluate).toHaveBeenCalledTimes(2)
    expect(client.Runtime.evaluate.mock.calls[0]?.[0].expression).toBe(
      "performance.getEntriesByType('resource').length",
    )
  })

  it('should reject when navigation reports an error', async () => {
    client.Page.navigate.mockResolvedValue({ errorText: 'net::ERR_NAME_NOT_RESOLVED' })

    await expect(page.navigate('https://nowhere.invalid')).rejects.toThrow(
      'Navigation to https://nowhere.invalid failed: net::ERR_NAME_NOT_RESOLVED',
    )
  })

  it('should focus the element and insert text when filling', async () => {
    await page.fill("input[name='login']", 'qa@example.com')

    expect(client.Runtime.evaluate.mock.calls[0]?.[0].expression).toContain(`"input[name='login']"`)
    expect(client.Input.insertText).toHaveBeenCalledWith({ text: 'qa@example.com' })
  })

  it('should throw when the element to fill is missing', async () => {
    client.Runtime.evaluate.mockResolvedValue({ result: { value: false } })

    await expect(page.fill('#missing', 'value')).rejects.toThrow('Element not found: #missing')
    expect(client.Input.insertText).not.toHaveBeenCalled()
  })

  it('should throw when the element to click is missing', async () => {
    client.Runtime.evaluate.mockResolvedValue({ result: { value: false } })

    await expect(page.click('#submit')).rejects.toThrow('Element not found: #submit')
  })

  it('should surface exceptions thrown in the page', async () => {
    client.Runtime.evaluate.mockResolvedValue({ result: {}, exceptionDetails: { text: 'Uncaught' } })

    await expect(page.evaluate('boom()')).rejects.toThrow('Evaluation failed: Uncaught')
  })

  it('should decode the captured screenshot', async () => {
    const buffer = await page.screenshot()

    expect(client.Page.captureScreenshot).toHaveBeenCalledWith({ format: 'png' })
    expect(buffer.equals(Buffer.from('iVBORw0KGgo=', 'base64'))).toBe(true)
  })

  it('should give up on a page whose load event never fires', async () => {
    client.Page.loadEventFired.mockReturnValue(new Promise<{ timestamp: number }>(() => undefined))
    const slowPage = new ChromePage(asClient(client), { loadTimeoutMs: 20, pollIntervalMs: 0 })

    await expect(slowPage.navigate('https://github.com/login')).rejects.toThrow(
      'Navigation to https://github.com/login did not finish loading within 20ms',
    )
  })

  it('should let the login sequence fail instead of hanging on a page that never loads', async () => {
    client.Page.loadEventFired.mockReturnValue(new Promise<{ timestamp: number }>(() => undefined))
    const slowPage = new ChromePage(asClient(client), { loadTimeoutMs: 20, pollIntervalMs: 0 })
    const sequencer = new LoginSequencer({ settleDelayMs: 0, checkIntervalMs: 1 })

    const outcome = await sequencer.login(slowPage, new AppRegistry().getApp('github'), {
      identity: 'qa@example.com',
      secret: 'test-secret',
    })

    expect(outcome).toBe('failed')
    expect(client.Input.insertText).not.toHaveBeenCalled()
  })
})

describe('ChromeLauncher', () => {
  let profileDir: string
  let client: MockClient
  const kill = jest.fn(() => Promise.resolve())

  beforeEach(async () => {
    jest.clearAllMocks()
    profileDir = join(await mkdtemp(join(tmpdir(), 'ui-capture-profile-')), 'chrome')
    client = createMockClient()

    mockLaunch.mockResolvedValue({
      pid: 4321,
      port: 9222,
      process: {} as any,
      remoteDebuggingPipes: null,
      kill,
    } as any)
    mockCDP.mockResolvedValue(asClient(client) as never)
  })

  afterEach(async () => {
    await rm(join(profileDir, '..'), { recursive: true, force: true })
  })

  it('should launch Chrome against the profile directory', async () => {
    const launcher = new ChromeLauncher()

    const session = await launcher.launch({
      profileDir,
      executablePath: '/opt/chrome/chrome',
      headless: false,
      chromeFlags: ['--no-first-run'],
    })

    expect(mockLaunch).toHaveBeenCalledWith({
      chromePath: '/opt/chrome/chrome',
      userDataDir: profileDir,
      chromeFlags: ['--no-first-run'],
      logLevel: 'error',
    })
    expect(mockCDP).toHaveBeenCalledWith({ port: 9222 })
    expect(session.port).toBe(9222)
    expect(session.cdpUrl).toBe('http://127.0.0.1:9222')
    expect(session.profileDir).toBe(profileDir)
    await expect(session.getCurrentPage()).resolves.toBeInstanceOf(ChromePage)
  })

  it('should add the headless flag when requested', async () => {
    await new ChromeLauncher().launch({ profileDir, headless: true, chromeFlags: ['--no-first-run'] })

    expect(mockLaunch).toHaveBeenCalledWith(
      expect.objectContaining({ chromeFlags: ['--no-first-run', '--headless=new'] }),
    )
  })

  it('should wrap launch failures in BrowserLaunchError', async () => {
    mockLaunch.mockRejectedValue(new Error('No Chrome installations found'))

    await expect(new ChromeLauncher().launch({ profileDir, headless: true, chromeFlags: [] })).rejects.toThrow(
      new BrowserLaunchError('Failed to launch Chrome: No Chrome installations found'),
    )
  })

  it('should kill Chrome when the DevTools connection fails', async () => {
    mockCDP.mockRejectedValue(new Error('ECONNREFUSED') as never)

    await expect(new ChromeLauncher().launch({ profileDir, headless: true, chromeFlags: [] })).rejects.toThrow(
      'Failed to connect to Chrome on port 9222: ECONNREFUSED',
    )
    expect(kill).toHaveBeenCalledTimes(1)
  })

  it('should close the client and kill Chrome on close', async () => {
    const session = await new ChromeLauncher().launch({ profileDir, headless: true, chromeFlags: [] })

    await session.close()

    expect(client.close).toHaveBeenCalledTimes(1)
    expect(kill).toHaveBeenCalledTimes(1)
  })
})
