import { getRuntimeConfig } from '@/config/runtime'

export type BreadcrumbLevel = 'info' | 'warning' | 'error'

export interface Breadcrumb {
  message: string
  category: string
  level: BreadcrumbLevel
  data: Record<string, unknown>
  /** Unix seconds. */
  timestamp: number
}

/** Anything shaped like a Sentry client. */
export interface TelemetrySink {
  addBreadcrumb?: (breadcrumb: Breadcrumb) => void
  captureException?: (error: unknown, context: { extra: Record<string, unknown> }) => void
}

interface BreadcrumbPayload {
  message: string
  category?: string
  level?: BreadcrumbLevel
  data?: Record<string, unknown>
}

const REDACTED = '[redacted]'
const SECRET_FIELDS = new Set(['accessToken', 'access_token', 'password', 'apiHash', 'session', 'phoneCode', 'key'])

let installedSink: TelemetrySink | null = null

/** Routes breadcrumbs and exceptions to `sink`; `null` falls back to a global `Sentry`. */
export const setTelemetrySink = (sink: TelemetrySink | null) => {
  installedSink = sink
}

const activeSink = (): TelemetrySink | undefined =>
  installedSink ?? (globalThis as unknown as { Sentry?: TelemetrySink }).Sentry

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype

/** Session material never leaves the process through telemetry. */
export const scrubTelemetryData = (data: Record<string, unknown>): Record<string, unknown> => {
  const scrubbed: Record<string, unknown> = {}
  for (const [field, value] of Object.entries(data)) {
    if (SECRET_FIELDS.has(field) && value !== undefined && value !== null) {
      scrubbed[field] = REDACTED
    } else {
      scrubbed[field] = isPlainObject(value) ? scrubTelemetryData(value) : value
    }
  }
  return scrubbed
}

export const recordBreadcrumb = (payload: BreadcrumbPayload) => {
  const breadcrumb: Breadcrumb = {
    message: payload.message,
    category: payload.category ?? 'chat',
    level: payload.level ?? 'info',
    data: scrubTelemetryData(payload.data ?? {}),
    timestamp: Date.now() / 1000,
  }
  const sink = activeSink()
  if (sink?.addBreadcrumb) {
    sink.addBreadcrumb(breadcrumb)
  } else if (getRuntimeConfig().debug) {
    console.debug(`[${breadcrumb.category}]`, breadcrumb.message, breadcrumb.data)
  }
}

/** `api` covers request/response traffic, `sync` the per-account event streams. */
export const recordNetworkBreadcrumb = (channel: 'api' | 'sync', payload: BreadcrumbPayload) => {
  recordBreadcrumb({
    ...payload,
    category: payload.category ?? `network.${channel}`,
  })
}

export const recordException = (error: unknown, context: Record<string, unknown> = {}) => {
  const extra = scrubTelemetryData(context)
  const sink = activeSink()
  if (sink?.captureException) {
    sink.captureException(error, { extra })
  } else if (getRuntimeConfig().debug) {
    console.error('[telemetry:error]', error, extra)
  }
}
