import { FetchError } from 'ofetch'

export type ChatErrorKind =
  | 'auth'
  | 'transient'
  | 'permanent'
  | 'decryption'
  | 'reconciliation'
  | 'cancelled'

interface ChatErrorOptions {
  code?: string | null
  cause?: unknown
}

export class ChatError extends Error {
  readonly kind: ChatErrorKind
  readonly code: string | null

  constructor(kind: ChatErrorKind, message: string, options: ChatErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = 'ChatError'
    this.kind = kind
    this.code = options.code ?? null
  }
}

export class AuthError extends ChatError {
  constructor(message: string, options?: ChatErrorOptions) {
    super('auth', message, options)
    this.name = 'AuthError'
  }
}

export class TransientNetworkError extends ChatError {
  readonly retryAfterMs: number | null

  constructor(message: string, options: ChatErrorOptions & { retryAfterMs?: number | null } = {}) {
    super('transient', message, options)
    this.name = 'TransientNetworkError'
    this.retryAfterMs = options.retryAfterMs ?? null
  }
}

export class PermanentProtocolError extends ChatError {
  constructor(message: string, options?: ChatErrorOptions) {
    super('permanent', message, options)
    this.name = 'PermanentProtocolError'
  }
}

export type DecryptionFailureReason = 'missing_key' | 'unsupported_algorithm' | 'bad_ciphertext'

export class DecryptionFailedError extends ChatError {
  readonly reason: DecryptionFailureReason

  constructor(reason: DecryptionFailureReason, message?: string) {
    super('decryption', message ?? `Unable to decrypt message (${reason})`, { code: reason })
    this.name = 'DecryptionFailedError'
    this.reason = reason
  }
}

export class ReconciliationConflictError extends ChatError {
  constructor(message = 'Server never acknowledged this message') {
    super('reconciliation', message, { code: 'reconciliation_conflict' })
    this.name = 'ReconciliationConflictError'
  }
}

export class CancelledError extends ChatError {
  constructor(message = 'Operation cancelled') {
    super('cancelled', message, { code: 'cancelled' })
    this.name = 'CancelledError'
  }
}

const stringifyFallback = (value: unknown): string => {
  try {
    return JSON.stringify(value)
  } catch {
    return 'Unexpected error'
  }
}

export const extractErrorMessage = (err: unknown): string => {
  if (!err) {
    return ''
  }

  if (err instanceof FetchError) {
    const data: unknown = err.data
    if (data && typeof data === 'object') {
      const payload = data as { error?: unknown; message?: unknown }
      if (typeof payload.error === 'string' && payload.error.length) {
        return payload.error
      }
      if (typeof payload.message === 'string' && payload.message.length) {
        return payload.message
      }
    }
    return err.message
  }

  if (err instanceof Error) {
    return err.message
  }

  if (typeof err === 'string') {
    return err
  }

  if (typeof err === 'object') {
    const maybeError = err as { message?: unknown }
    if (typeof maybeError.message === 'string') {
      return maybeError.message
    }
  }

  return stringifyFallback(err)
}

const AUTH_ERRCODES = new Set(['M_UNKNOWN_TOKEN', 'M_MISSING_TOKEN', 'M_USER_DEACTIVATED'])

const readErrcode = (data: unknown): { errcode: string | null; retryAfterMs: number | null } => {
  if (!data || typeof data !== 'object') {
    return { errcode: null, retryAfterMs: null }
  }
  const payload = data as { errcode?: unknown; retry_after_ms?: unknown }
  return {
    errcode: typeof payload.errcode === 'string' ? payload.errcode : null,
    retryAfterMs: typeof payload.retry_after_ms === 'number' ? payload.retry_after_ms : null,
  }
}

export const isCancellation = (err: unknown, signal?: AbortSignal | null): boolean => {
  if (signal?.aborted) {
    return true
  }
  if (err instanceof CancelledError) {
    return true
  }
  return err instanceof Error && err.name === 'AbortError'
}

interface ClassifyOptions {
  signal?: AbortSignal | null
  /** Treat 403 as an auth failure (login endpoints answer bad passwords with 403). */
  forbiddenIsAuth?: boolean
}

/**
 * Maps anything thrown by an HTTP call into the chat error taxonomy.
 */
export const classifyHttpError = (err: unknown, options: ClassifyOptions = {}): ChatError => {
  if (err instanceof ChatError) {
    return err
  }

  if (isCancellation(err, options.signal)) {
    return new CancelledError()
  }

  const message = extractErrorMessage(err) || 'Request failed'

  if (err instanceof FetchError) {
    const status = err.status ?? err.response?.status
    const { errcode, retryAfterMs } = readErrcode(err.data)

    if (typeof status !== 'number') {
      return new TransientNetworkError(message, { cause: err })
    }
    if (status === 401 || (errcode && AUTH_ERRCODES.has(errcode))) {
      return new AuthError(message, { code: errcode, cause: err })
    }
    if (status === 403 && options.forbiddenIsAuth) {
      return new AuthError(message, { code: errcode, cause: err })
    }
    if (status === 408 || status === 429 || status >= 500) {
      return new TransientNetworkError(message, { code: errcode, cause: err, retryAfterMs })
    }
    return new PermanentProtocolError(message, { code: errcode, cause: err })
  }

  return new TransientNetworkError(message, { cause: err })
}
