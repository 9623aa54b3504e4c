import { defineStore } from 'pinia'
import { watch } from 'vue'

import { getRuntimeConfig } from '@/config/runtime'
import { useAccountStore } from '@/stores/accounts'
import { useConnectivityStore, type AccountStatus } from '@/stores/connectivity'
import {
  useConversationStore,
  type ApplyContext,
  type StoreEvent,
  type StoreMessageEvent,
} from '@/stores/conversations'
import { useEncryptionStore } from '@/stores/encryption'
import { usePresenceStore } from '@/stores/presence'
import type { BackendAdapter, NormalizedEvent } from '@/types/backend'
import { conversationIdFor, type AccountId, type ConversationId } from '@/types/chat'
import { computeBackoffDelay, sleep } from '@/utils/backoff'
import {
  AuthError,
  CancelledError,
  ChatError,
  TransientNetworkError,
  extractErrorMessage,
  isCancellation,
} from '@/utils/errors'
import { KeyedMutex } from '@/utils/mutex'
import { recordException, recordNetworkBreadcrumb } from '@/utils/telemetry'

interface SyncWaiter {
  resolve: () => void
  reject: (err: unknown) => void
}

interface AccountRuntime {
  accountId: AccountId
  adapter: BackendAdapter
  controller: AbortController
  wake: AbortController
  selfUserId: string
  caughtUp: boolean
  loop: Promise<void> | null
}

type MessageNormalizedEvent = Extract<NormalizedEvent, { type: 'message' }>

const toChatError = (err: unknown): ChatError =>
  err instanceof ChatError
    ? err
    : new TransientNetworkError(extractErrorMessage(err) || 'Sync failed', { cause: err })

const conversationKeyOf = (event: NormalizedEvent): string | null => {
  switch (event.type) {
    case 'conversation':
      return event.update.nativeId
    case 'presence':
    case 'room_key':
    case 'device':
      return null
    default:
      return event.conversationNativeId
  }
}

export const useSyncStore = defineStore('sync', () => {
  const accountStore = useAccountStore()
  const connectivityStore = useConnectivityStore()
  const conversationStore = useConversationStore()
  const encryptionStore = useEncryptionStore()
  const presenceStore = usePresenceStore()

  const runtimes = new Map<AccountId, AccountRuntime>()
  const waiters = new Map<AccountId, Set<SyncWaiter>>()
  const mutex = new KeyedMutex()

  const statusOf = (accountId: AccountId) => connectivityStore.accountStatus(accountId)

  const refreshDegraded = () => {
    const struggling = Object.values(connectivityStore.accounts).filter((status) => status.state === 'backoff')
    connectivityStore.markDegraded(struggling.length ? 'Reconnecting to chat servers…' : null)
  }

  const setStatus = (accountId: AccountId, patch: Partial<AccountStatus>) => {
    connectivityStore.updateAccount(accountId, patch)
    refreshDegraded()
    if (patch.state === 'syncing') {
      const pending = waiters.get(accountId)
      waiters.delete(accountId)
      for (const waiter of pending ?? []) {
        waiter.resolve()
      }
    }
  }

  /** Resolves once the account's ingestion loop has caught up with the server. */
  const waitUntilSyncing = (accountId: AccountId, signal?: AbortSignal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError())
        return
      }
      if (statusOf(accountId).state === 'syncing') {
        resolve()
        return
      }

      const bucket = waiters.get(accountId) ?? new Set<SyncWaiter>()
      const waiter: SyncWaiter = {
        resolve: () => {
          signal?.removeEventListener('abort', onAbort)
          resolve()
        },
        reject,
      }
      const onAbort = () => {
        bucket.delete(waiter)
        reject(new CancelledError())
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      bucket.add(waiter)
      waiters.set(accountId, bucket)
    })

  const contextFor = (runtime: AccountRuntime, live: boolean): ApplyContext => ({
    accountId: runtime.accountId,
    backend: runtime.adapter.backend,
    selfUserId: runtime.selfUserId,
    live,
  })

  const requestMissingKey = (runtime: AccountRuntime, event: MessageNormalizedEvent) => {
    if (event.content.kind !== 'ciphertext') {
      return
    }
    encryptionStore
      .requestRoomKey(runtime.accountId, runtime.adapter, event.content.payload, runtime.controller.signal)
      .catch((err) => {
        if (!isCancellation(err, runtime.controller.signal)) {
          recordException(err, { scope: 'sync.requestRoomKey', accountId: runtime.accountId })
        }
      })
  }

  /** Decrypts ciphertext messages; a decrypted edit replaces the message event. */
  const prepareMessage = (runtime: AccountRuntime, event: MessageNormalizedEvent): StoreEvent | null => {
    const conversationId = conversationIdFor(runtime.accountId, event.conversationNativeId)
    if (conversationStore.findMessageByNativeId(conversationId, event.nativeId)) {
      return null
    }

    const base = {
      type: 'message' as const,
      conversationNativeId: event.conversationNativeId,
      nativeId: event.nativeId,
      senderId: event.senderId,
      timestamp: event.timestamp,
      transactionId: event.transactionId,
    }
    if (event.content.kind === 'text') {
      const plain: StoreMessageEvent = { ...base, content: event.content, delivery: { state: 'sent' }, ciphertext: null }
      return plain
    }

    const { payload } = event.content
    const result = encryptionStore.decrypt(runtime.accountId, payload)
    if (!result.ok) {
      if (result.reason === 'missing_key') {
        requestMissingKey(runtime, event)
      }
      const placeholder: StoreMessageEvent = {
        ...base,
        content: { kind: 'encrypted', algorithm: payload.algorithm, sessionId: payload.sessionId },
        delivery: { state: 'decryption_failed', reason: result.reason },
        ciphertext: payload,
      }
      return placeholder
    }
    if (result.plain.kind === 'edit') {
      return {
        type: 'edit',
        conversationNativeId: event.conversationNativeId,
        nativeId: event.nativeId,
        targetNativeId: result.plain.targetNativeId,
        senderId: event.senderId,
        body: result.plain.body,
        timestamp: event.timestamp,
      }
    }
    const decrypted: StoreMessageEvent = {
      ...base,
      content: { kind: 'text', body: result.plain.body, format: result.plain.format },
      delivery: { state: 'sent' },
      ciphertext: null,
    }
    return decrypted
  }

  const translateAll = (runtime: AccountRuntime, natives: unknown[]) => {
    const events: NormalizedEvent[] = []
    for (const native of natives) {
      try {
        events.push(...runtime.adapter.translate(native))
      } catch (err) {
        recordException(err, { scope: 'sync.translate', accountId: runtime.accountId })
      }
    }
    return events
  }

  const applyToConversation = (runtime: AccountRuntime, nativeId: string, events: NormalizedEvent[], live: boolean) => {
    const ctx = contextFor(runtime, live)
    const conversationId = conversationIdFor(runtime.accountId, nativeId)
    return mutex.run(conversationId, () =>
      conversationStore.batch(() => {
        for (const event of events) {
          switch (event.type) {
            case 'message': {
              const prepared = prepareMessage(runtime, event)
              if (prepared) {
                conversationStore.applyEvent(ctx, prepared)
              }
              break
            }
            case 'typing':
              presenceStore.applyTyping({
                conversationId,
                accountId: runtime.accountId,
                selfUserId: runtime.selfUserId,
                started: event.started,
                stopped: event.stopped,
                exhaustive: event.exhaustive,
              })
              break
            case 'presence':
            case 'room_key':
              break
            default:
              conversationStore.applyEvent(ctx, event)
          }
        }
      }),
    )
  }

  /**
   * Retries undecrypted messages, either of one session (after its key
   * arrived) or all of them.
   */
  const retryDecryption = async (accountId: AccountId, sessionId?: string) => {
    const runtime = runtimes.get(accountId)
    const pending = conversationStore.pendingCiphertexts(accountId, sessionId)
    let decrypted = 0

    await Promise.all(
      pending.map((entry) =>
        mutex.run(entry.conversationId, () => {
          const message = conversationStore.findMessage(entry.messageId)
          if (!message) {
            return
          }
          const result = encryptionStore.decrypt(accountId, entry.payload)
          if (!result.ok) {
            conversationStore.resolveCiphertext(entry.messageId, result)
            return
          }
          decrypted += 1
          if (result.plain.kind === 'text') {
            conversationStore.resolveCiphertext(entry.messageId, {
              ok: true,
              content: { kind: 'text', body: result.plain.body, format: result.plain.format },
            })
            return
          }

          const sender = conversationStore.getParticipant(message.senderId)
          const conversation = conversationStore.getConversation(entry.conversationId)?.conversation
          if (!sender || !conversation || !message.nativeId) {
            return
          }
          const { targetNativeId, body } = result.plain
          const nativeId = message.nativeId
          conversationStore.batch(() => {
            conversationStore.removeMessage(entry.messageId)
            conversationStore.applyEvent(
              {
                accountId,
                backend: conversation.backend,
                selfUserId: runtime?.selfUserId ?? '',
                live: false,
              },
              {
                type: 'edit',
                conversationNativeId: conversation.nativeId,
                nativeId,
                targetNativeId,
                senderId: sender.nativeId,
                body,
                timestamp: message.timestamp,
              },
            )
          })
        }),
      ),
    )
    return decrypted
  }

  /** Applies normalized events; account-level events first, then per conversation in delivery order. */
  const applyEvents = async (runtime: AccountRuntime, events: NormalizedEvent[], live: boolean) => {
    const byConversation = new Map<string, NormalizedEvent[]>()
    const newSessions = new Set<string>()

    for (const event of events) {
      switch (event.type) {
        case 'room_key': {
          const sessionId = encryptionStore.addRoomKey(runtime.accountId, event.key)
          if (sessionId) {
            newSessions.add(sessionId)
          }
          continue
        }
        case 'presence':
          presenceStore.applyPresence(runtime.accountId, event.userId, event.state, event.lastActiveAt)
          continue
        case 'device':
          conversationStore.recordDevice(
            runtime.accountId,
            event.userId,
            event.deviceId,
            encryptionStore.trustOf(runtime.accountId, event.userId, event.deviceId),
          )
          continue
        default: {
          const key = conversationKeyOf(event)
          if (key === null) {
            continue
          }
          const queue = byConversation.get(key) ?? []
          queue.push(event)
          byConversation.set(key, queue)
        }
      }
    }

    await Promise.all(
      [...byConversation].map(([nativeId, queue]) => applyToConversation(runtime, nativeId, queue, live)),
    )
    for (const sessionId of newSessions) {
      await retryDecryption(runtime.accountId, sessionId)
    }
  }

  const persistSession = (runtime: AccountRuntime) => {
    const session = runtime.adapter.currentSession()
    if (session) {
      accountStore.updateSession(runtime.accountId, session)
    }
  }

  const ingest = async (runtime: AccountRuntime) => {
    const { accountId, adapter, controller } = runtime
    const { signal } = controller
    const account = accountStore.getAccount(accountId)
    if (!account) {
      throw new AuthError(`No stored session for ${accountId}`)
    }

    const profile = await adapter.connect(account.session, signal)
    runtime.selfUserId = profile.userId
    accountStore.updateProfile(accountId, profile)
    encryptionStore.load(accountId)

    const cursor = accountStore.loadCursor(accountId)
    adapter.resume(cursor)

    const listed = await adapter.listConversations(signal)
    await applyEvents(
      runtime,
      listed.map((update) => ({ type: 'conversation', update })),
      false,
    )

    let first = true
    for await (const batch of adapter.streamEvents(signal)) {
      if (signal.aborted) {
        break
      }
      // A first sync without a cursor is backfill and does not count as unread.
      const live = !(first && cursor === null)
      await applyEvents(runtime, translateAll(runtime, batch.events), live)
      if (signal.aborted) {
        break
      }
      if (batch.cursor !== null) {
        accountStore.saveCursor(accountId, batch.cursor)
      }
      persistSession(runtime)

      if (first) {
        first = false
        runtime.caughtUp = true
        recordNetworkBreadcrumb('sync', {
          message: 'Account caught up',
          data: { accountId, backend: adapter.backend },
        })
        setStatus(accountId, { state: 'syncing', attempt: 0, lastError: null, needsRelogin: false, nextRetryAt: null })
      }
      setStatus(accountId, { lastSyncedAt: Date.now() })
    }

    if (!signal.aborted) {
      throw new TransientNetworkError('Event stream ended')
    }
  }

  const runLoop = async (runtime: AccountRuntime) => {
    const { accountId, controller } = runtime
    const { signal } = controller
    const { backoff, maxRetries } = getRuntimeConfig().sync
    let failures = 0

    while (!signal.aborted) {
      setStatus(accountId, { state: 'connecting', attempt: failures, nextRetryAt: null })
      runtime.caughtUp = false

      try {
        await ingest(runtime)
      } catch (err) {
        if (isCancellation(err, signal)) {
          break
        }

        const error = toChatError(err)
        const message = extractErrorMessage(error)
        recordNetworkBreadcrumb('sync', {
          message: 'Sync loop failed',
          level: 'warning',
          data: { accountId, kind: error.kind, error: message },
        })

        if (error instanceof AuthError) {
          setStatus(accountId, { state: 'disconnected', lastError: message, needsRelogin: true, nextRetryAt: null })
          runtimes.delete(accountId)
          await runtime.adapter.disconnect().catch((disconnectErr) => {
            console.warn('Adapter disconnect failed after auth error', disconnectErr)
          })
          return
        }

        failures = runtime.caughtUp ? 1 : failures + 1
        if (error.kind === 'permanent' || failures >= maxRetries) {
          setStatus(accountId, { state: 'disconnected', attempt: failures, lastError: message, nextRetryAt: null })
          runtimes.delete(accountId)
          await runtime.adapter.disconnect().catch((disconnectErr) => {
            console.warn('Adapter disconnect failed after sync gave up', disconnectErr)
          })
          return
        }

        const retryAfter = error instanceof TransientNetworkError ? (error.retryAfterMs ?? 0) : 0
        const delay = Math.max(computeBackoffDelay(backoff, failures - 1), retryAfter)
        setStatus(accountId, {
          state: 'backoff',
          attempt: failures,
          lastError: message,
          nextRetryAt: Date.now() + delay,
        })

        try {
          await sleep(delay, { signal, wake: runtime.wake.signal })
        } catch (sleepErr) {
          if (isCancellation(sleepErr, signal)) {
            break
          }
          throw sleepErr
        }
        runtime.wake = new AbortController()
      }
    }
  }

  const wake = (accountId?: AccountId) => {
    for (const runtime of runtimes.values()) {
      if (!accountId || runtime.accountId === accountId) {
        runtime.wake.abort()
      }
    }
  }

  watch(
    () => connectivityStore.online,
    (online) => {
      if (online) {
        wake()
      }
    },
    { flush: 'sync' },
  )

  /** Starts the ingestion loop for a stored account. No-op when it already runs. */
  const start = (accountId: AccountId, adapter: BackendAdapter) => {
    if (runtimes.has(accountId)) {
      return
    }
    const account = accountStore.getAccount(accountId)
    const runtime: AccountRuntime = {
      accountId,
      adapter,
      controller: new AbortController(),
      wake: new AbortController(),
      selfUserId: account?.session.userId ?? '',
      caughtUp: false,
      loop: null,
    }
    runtimes.set(accountId, runtime)
    setStatus(accountId, { needsRelogin: false, lastError: null })

    runtime.loop = runLoop(runtime).catch((err) => {
      recordException(err, { scope: 'sync.loop', accountId })
      setStatus(accountId, { state: 'disconnected', lastError: extractErrorMessage(err) })
      if (runtimes.get(accountId) === runtime) {
        runtimes.delete(accountId)
      }
    })
  }

  /** Aborts the account's loop and every call in flight under its signal. */
  const stop = async (accountId: AccountId) => {
    const runtime = runtimes.get(accountId)
    if (!runtime) {
      return
    }
    runtimes.delete(accountId)
    setStatus(accountId, { state: 'disconnected', nextRetryAt: null })
    runtime.controller.abort()
    await runtime.loop
    try {
      await runtime.adapter.disconnect()
    } catch (err) {
      console.warn(`Adapter disconnect failed for ${accountId}`, err)
    }
  }

  const forget = (accountId: AccountId) => {
    const pending = waiters.get(accountId)
    waiters.delete(accountId)
    for (const waiter of pending ?? []) {
      waiter.reject(new CancelledError('Account removed'))
    }
    connectivityStore.forgetAccount(accountId)
  }

  const adapterFor = (accountId: AccountId) => runtimes.get(accountId)?.adapter ?? null

  const signalFor = (accountId: AccountId) => runtimes.get(accountId)?.controller.signal ?? null

  const selfUserIdOf = (accountId: AccountId) => runtimes.get(accountId)?.selfUserId ?? null

  const isRunning = (accountId: AccountId) => runtimes.has(accountId)

  const runExclusive = <T>(conversationId: ConversationId, task: () => Promise<T> | T) => mutex.run(conversationId, task)

  /**
   * Fetches one page of older messages. Returns how many events the page
   * carried; 0 once history is exhausted.
   */
  const loadMore = async (conversationId: ConversationId) => {
    const view = conversationStore.getConversation(conversationId)
    if (!view) {
      return 0
    }
    const { accountId, nativeId } = view.conversation
    const runtime = runtimes.get(accountId)
    if (!runtime) {
      throw new AuthError(`${accountId} is not connected`)
    }
    const history = conversationStore.historyState(conversationId)
    if (!history || history.exhausted) {
      return 0
    }

    const { signal } = runtime.controller
    const limit = getRuntimeConfig().sync.historyPageSize
    for await (const page of runtime.adapter.fetchHistory(nativeId, history.token, limit, signal)) {
      if (signal.aborted) {
        throw new CancelledError()
      }
      const events = translateAll(runtime, page.events)
      await applyEvents(runtime, events, false)
      conversationStore.setHistoryState(conversationId, {
        token: page.nextToken,
        exhausted: page.nextToken === null,
      })
      return page.events.length
    }

    conversationStore.setHistoryState(conversationId, { token: null, exhausted: true })
    return 0
  }

  return {
    start,
    stop,
    forget,
    wake,
    waitUntilSyncing,
    adapterFor,
    signalFor,
    selfUserIdOf,
    isRunning,
    loadMore,
    retryDecryption,
    runExclusive,
  }
})
