import type { BackoffPolicy } from '@/config/runtime'
import { CancelledError } from '@/utils/errors'

/** `attempt` is zero-based: the first retry waits `initialIntervalMs`. */
export const computeBackoffDelay = (policy: BackoffPolicy, attempt: number) =>
  Math.min(
    policy.initialIntervalMs * Math.pow(policy.multiplier, Math.max(0, attempt)),
    policy.maxIntervalMs,
  )

interface SleepOptions {
  /** Rejects with `CancelledError` when aborted. */
  signal?: AbortSignal
  /** Resolves early when aborted. */
  wake?: AbortSignal
}

export const sleep = (ms: number, options: SleepOptions = {}) =>
  new Promise<void>((resolve, reject) => {
    const { signal, wake } = options
    if (signal?.aborted) {
      reject(new CancelledError())
      return
    }
    if (wake?.aborted || ms <= 0) {
      resolve()
      return
    }

    const cleanup = () => {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
      wake?.removeEventListener('abort', onWake)
    }
    const onAbort = () => {
      cleanup()
      reject(new CancelledError())
    }
    const onWake = () => {
      cleanup()
      resolve()
    }
    const timer = setTimeout(() => {
      cleanup()
      resolve()
    }, ms)

    signal?.addEventListener('abort', onAbort, { once: true })
    wake?.addEventListener('abort', onWake, { once: true })
  })

/**
 * Settles like `work`, or rejects with `CancelledError` as soon as `signal`
 * aborts. A result that arrives after the abort is dropped.
 */
export const raceAbort = <T>(work: Promise<T>, signal: AbortSignal) =>
  new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(new CancelledError())
    }
    if (signal.aborted) {
      onAbort()
    } else {
      signal.addEventListener('abort', onAbort, { once: true })
    }
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(err)
      },
    )
  })
