export interface BackoffPolicy {
  initialIntervalMs: number
  multiplier: number
  maxIntervalMs: number
}

export interface RuntimeConfig {
  debug: boolean
  storage: {
    dataDir: string | null
  }
  sync: {
    backoff: BackoffPolicy
    maxRetries: number
    historyPageSize: number
    longPollTimeoutMs: number
  }
  outbound: {
    backoff: BackoffPolicy
    maxAttempts: number
    reconciliationTimeoutMs: number
  }
  presence: {
    typingTtlMs: number
    typingThrottleMs: number
  }
  telegram: {
    apiId: number | null
    apiHash: string | null
  }
}

export type RuntimeOverrides = {
  [K in keyof RuntimeConfig]?: RuntimeConfig[K] extends object
    ? { [P in keyof RuntimeConfig[K]]?: RuntimeConfig[K][P] }
    : RuntimeConfig[K]
}

type Env = Record<string, string | undefined>

const readNumber = (raw: string | undefined, fallback: number): number => {
  if (!raw) {
    return fallback
  }
  const parsed = Number(raw.trim())
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback
}

const readFlag = (raw: string | undefined): boolean => {
  if (!raw) {
    return false
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase())
}

const sanitizeDir = (raw?: string | null): string | null => {
  if (!raw) {
    return null
  }
  const trimmed = raw.trim()
  return trimmed.length ? trimmed : null
}

const fromEnv = (env: Env): RuntimeConfig => {
  const apiId = readNumber(env.TELEGRAM_API_ID ?? env.API_ID, 0)
  const apiHash = (env.TELEGRAM_API_HASH ?? env.API_HASH ?? '').trim()

  return {
    debug: readFlag(env.UNICHAT_DEBUG) || env.NODE_ENV === 'development',
    storage: {
      dataDir: sanitizeDir(env.UNICHAT_DATA_DIR),
    },
    sync: {
      backoff: {
        initialIntervalMs: readNumber(env.UNICHAT_SYNC_BACKOFF_INITIAL_MS, 1_000),
        multiplier: readNumber(env.UNICHAT_SYNC_BACKOFF_MULTIPLIER, 2),
        maxIntervalMs: readNumber(env.UNICHAT_SYNC_BACKOFF_MAX_MS, 30_000),
      },
      maxRetries: readNumber(env.UNICHAT_SYNC_MAX_RETRIES, 8),
      historyPageSize: readNumber(env.UNICHAT_HISTORY_PAGE_SIZE, 20),
      longPollTimeoutMs: readNumber(env.UNICHAT_LONG_POLL_MS, 30_000),
    },
    outbound: {
      backoff: {
        initialIntervalMs: readNumber(env.UNICHAT_SEND_BACKOFF_INITIAL_MS, 500),
        multiplier: readNumber(env.UNICHAT_SEND_BACKOFF_MULTIPLIER, 2),
        maxIntervalMs: readNumber(env.UNICHAT_SEND_BACKOFF_MAX_MS, 8_000),
      },
      maxAttempts: Math.max(1, readNumber(env.UNICHAT_SEND_MAX_ATTEMPTS, 5)),
      reconciliationTimeoutMs: readNumber(env.UNICHAT_RECONCILE_TIMEOUT_MS, 60_000),
    },
    presence: {
      typingTtlMs: 30_000,
      typingThrottleMs: 1_500,
    },
    telegram: {
      apiId: apiId > 0 ? apiId : null,
      apiHash: apiHash.length ? apiHash : null,
    },
  }
}

let overrides: RuntimeOverrides = {}
let cached: RuntimeConfig | null = null

const merge = (base: RuntimeConfig, patch: RuntimeOverrides): RuntimeConfig => ({
  debug: patch.debug ?? base.debug,
  storage: { ...base.storage, ...patch.storage },
  sync: { ...base.sync, ...patch.sync },
  outbound: { ...base.outbound, ...patch.outbound },
  presence: { ...base.presence, ...patch.presence },
  telegram: { ...base.telegram, ...patch.telegram },
})

export const getRuntimeConfig = (): RuntimeConfig => {
  if (!cached) {
    cached = merge(fromEnv(process.env), overrides)
  }
  return cached
}

/**
 * Replaces programmatic overrides (layered over environment variables).
 * Pass `{}` to go back to the environment defaults.
 */
export const configureRuntime = (next: RuntimeOverrides) => {
  overrides = next
  cached = null
}
