import { ofetch } from 'ofetch'

import { recordNetworkBreadcrumb } from '@/utils/telemetry'

export type MatrixHttpClient = ReturnType<typeof ofetch.create>

const normalizeHeaders = (headers?: HeadersInit): Record<string, string> => {
  if (!headers) {
    return {}
  }

  if (headers instanceof Headers) {
    return Object.fromEntries(headers.entries())
  }

  if (Array.isArray(headers)) {
    return Object.fromEntries(headers)
  }

  return { ...headers }
}

export const normalizeHomeserver = (raw: string) => {
  const trimmed = raw.trim().replace(/\/+$/, '')
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed
  }
  return `https://${trimmed}`
}

export const encodeSegment = (value: string) => encodeURIComponent(value)

export const createMatrixHttpClient = (
  homeserver: string,
  tokenAccessor: () => string | null,
): MatrixHttpClient =>
  ofetch.create({
    baseURL: `${normalizeHomeserver(homeserver)}/_matrix/client/v3`,
    retry: 0,
    onRequest({ options }) {
      const headers = normalizeHeaders(options.headers)
      const token = tokenAccessor()

      if (token && !headers.authorization) {
        headers.authorization = `Bearer ${token}`
      }

      if (!headers.accept) {
        headers.accept = 'application/json'
      }

      options.headers = new Headers(headers)
    },
    onResponseError({ response, options }) {
      const method = (options.method ?? 'GET').toUpperCase()
      // No query string: it carries sync cursors.
      const url = response.url.split('?')[0] ?? response.url

      recordNetworkBreadcrumb('api', {
        message: `${method} ${url} failed`,
        level: response.status >= 500 ? 'error' : 'warning',
        data: {
          status: response.status,
          statusText: response.statusText,
          method,
          url,
        },
      })
    },
  })
