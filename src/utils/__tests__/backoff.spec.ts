import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { computeBackoffDelay, sleep } from '../backoff'
import { CancelledError } from '../errors'

const policy = { initialIntervalMs: 1_000, multiplier: 2, maxIntervalMs: 30_000 }

describe('backoff', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('grows geometrically up to the ceiling', () => {
    expect([0, 1, 2, 3, 4, 5, 6].map((attempt) => computeBackoffDelay(policy, attempt))).toEqual([
      1_000, 2_000, 4_000, 8_000, 16_000, 30_000, 30_000,
    ])
    expect(computeBackoffDelay(policy, -1)).toBe(1_000)
  })

  it('sleeps for the requested time', async () => {
    let done = false
    const pending = sleep(500).then(() => {
      done = true
    })

    await vi.advanceTimersByTimeAsync(499)
    expect(done).toBe(false)
    await vi.advanceTimersByTimeAsync(1)
    await pending
    expect(done).toBe(true)
  })

  it('rejects when cancelled', async () => {
    const controller = new AbortController()
    const pending = sleep(10_000, { signal: controller.signal })

    controller.abort()

    await expect(pending).rejects.toBeInstanceOf(CancelledError)
    expect(vi.getTimerCount()).toBe(0)
  })

  it('resolves early when woken', async () => {
    const wake = new AbortController()
    const pending = sleep(10_000, { wake: wake.signal })

    wake.abort()

    await expect(pending).resolves.toBeUndefined()
    expect(vi.getTimerCount()).toBe(0)
  })

  it('rejects immediately on an aborted signal', async () => {
    const controller = new AbortController()
    controller.abort()

    await expect(sleep(10, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError)
  })
})
