import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { configureRuntime } from '@/config/runtime'

import {
  recordException,
  recordNetworkBreadcrumb,
  scrubTelemetryData,
  setTelemetrySink,
  type TelemetrySink,
} from '../telemetry'

describe('telemetry', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(5_000)
    configureRuntime({ debug: false })
  })

  afterEach(() => {
    setTelemetrySink(null)
    configureRuntime({})
    vi.unstubAllGlobals()
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  it('scrubs session material, nested objects included', () => {
    expect(
      scrubTelemetryData({
        userId: '@me:test',
        accessToken: 'test-token',
        login: { password: 'test-secret', homeserver: 'https://matrix.test' },
        session: null,
      }),
    ).toEqual({
      userId: '@me:test',
      accessToken: '[redacted]',
      login: { password: '[redacted]', homeserver: 'https://matrix.test' },
      session: null,
    })
  })

  it('sends scrubbed breadcrumbs to the installed sink', () => {
    const sink = {
      addBreadcrumb: vi.fn<NonNullable<TelemetrySink['addBreadcrumb']>>(),
      captureException: vi.fn<NonNullable<TelemetrySink['captureException']>>(),
    }
    setTelemetrySink(sink)

    recordNetworkBreadcrumb('api', { message: 'Matrix login succeeded', data: { userId: '@me:test', accessToken: 'test-token' } })
    const failure = new Error('boom')
    recordException(failure, { scope: 'sync.loop', session: 'test-session' })

    expect(sink.addBreadcrumb).toHaveBeenCalledWith({
      message: 'Matrix login succeeded',
      category: 'network.api',
      level: 'info',
      data: { userId: '@me:test', accessToken: '[redacted]' },
      timestamp: 5,
    })
    expect(sink.captureException).toHaveBeenCalledWith(failure, {
      extra: { scope: 'sync.loop', session: '[redacted]' },
    })
  })

  it('falls back to a global Sentry client, then to debug logging', () => {
    const addBreadcrumb = vi.fn()
    vi.stubGlobal('Sentry', { addBreadcrumb })
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})

    recordNetworkBreadcrumb('sync', { message: 'Sync connected', level: 'warning' })
    expect(addBreadcrumb).toHaveBeenCalledWith(expect.objectContaining({ category: 'network.sync', level: 'warning' }))

    vi.unstubAllGlobals()
    recordNetworkBreadcrumb('sync', { message: 'Sync connected' })
    expect(debug).not.toHaveBeenCalled()

    configureRuntime({ debug: true })
    recordNetworkBreadcrumb('sync', { message: 'Sync connected', data: { accountId: 'matrix:@me:test' } })
    expect(debug).toHaveBeenCalledWith('[network.sync]', 'Sync connected', { accountId: 'matrix:@me:test' })
  })
})
