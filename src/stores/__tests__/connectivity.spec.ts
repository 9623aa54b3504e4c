import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createPinia, setActivePinia } from 'pinia'

import { useConnectivityStore } from '../connectivity'

describe('connectivity store', () => {
  beforeEach(() => {
    setActivePinia(createPinia())
    vi.useFakeTimers()
    vi.setSystemTime(5_000)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('tracks online state and clears degradation on recovery', () => {
    const store = useConnectivityStore()
    expect(store.status).toBe('online')

    store.markDegraded('Sync for matrix:@me:test is retrying')
    expect(store.status).toBe('degraded')
    expect(store.isDegraded).toBe(true)

    vi.setSystemTime(6_000)
    store.updateOnline(false)
    expect(store.status).toBe('offline')
    expect(store.lastChangeAt).toBe(6_000)

    vi.setSystemTime(7_000)
    store.updateOnline(true)
    expect(store.status).toBe('online')
    expect(store.degradedMessage).toBeNull()
    expect(store.lastChangeAt).toBe(7_000)
  })

  it('keeps per-account badges apart', () => {
    const store = useConnectivityStore()

    store.updateAccount('matrix:@me:test', { state: 'backoff', attempt: 2, lastError: 'timeout' })
    store.updateAccount('telegram:777', { state: 'syncing' })

    expect(store.accountStatus('matrix:@me:test')).toMatchObject({ state: 'backoff', attempt: 2, lastError: 'timeout' })
    expect(store.accountStatus('telegram:777')).toMatchObject({ state: 'syncing', attempt: 0 })

    store.forgetAccount('matrix:@me:test')
    expect(store.accountStatus('matrix:@me:test')).toEqual({
      state: 'disconnected',
      attempt: 0,
      lastError: null,
      needsRelogin: false,
      lastSyncedAt: null,
      nextRetryAt: null,
    })
  })
})
