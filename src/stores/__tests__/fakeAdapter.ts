import { vi } from 'vitest'

import type {
  AccountProfile,
  BackendAdapter,
  ConversationUpdate,
  EncryptionCapability,
  HistoryPage,
  NormalizedEvent,
  SessionData,
  SyncBatch,
} from '@/types/backend'
import type { BackendKind } from '@/types/chat'

type Feed = { batch: SyncBatch<NormalizedEvent> } | { error: unknown }

interface FakeBackendOptions {
  backend?: BackendKind
  userId?: string
  encryption?: boolean
}

/**
 * In-process backend whose event stream is driven by the test. The adapter
 * "translates" by passing normalized events straight through.
 */
export const createFakeBackend = (options: FakeBackendOptions = {}) => {
  const backend = options.backend ?? 'matrix'
  const userId = options.userId ?? '@me:test'
  const session: SessionData =
    backend === 'matrix'
      ? { backend: 'matrix', homeserver: 'https://matrix.test', userId, deviceId: 'DEVICE', accessToken: 'test-token' }
      : { backend: 'telegram', apiId: 1, apiHash: 'test-hash', userId, session: 'test-session' }
  const profile: AccountProfile = { userId, displayName: 'Me', avatarUrl: null }

  const feed: Feed[] = []
  let waiting: ((next: Feed) => void) | null = null
  const resumed: Array<string | null> = []
  const conversations: ConversationUpdate[] = []
  // `before` token ('start' for the first page) -> page
  const history = new Map<string, HistoryPage<NormalizedEvent>>()
  let sequence = 0

  const push = (next: Feed) => {
    const waiter = waiting
    if (waiter) {
      waiting = null
      waiter(next)
      return
    }
    feed.push(next)
  }

  const nextFeed = (signal: AbortSignal) =>
    new Promise<Feed | null>((resolve) => {
      const queued = feed.shift()
      if (queued) {
        resolve(queued)
        return
      }
      if (signal.aborted) {
        resolve(null)
        return
      }
      const onAbort = () => {
        if (waiting === settle) {
          waiting = null
        }
        resolve(null)
      }
      const settle = (next: Feed) => {
        signal.removeEventListener('abort', onAbort)
        resolve(next)
      }
      waiting = settle
      signal.addEventListener('abort', onAbort, { once: true })
    })

  async function* stream(signal: AbortSignal): AsyncGenerator<SyncBatch<NormalizedEvent>> {
    while (!signal.aborted) {
      const next = await nextFeed(signal)
      if (!next) {
        return
      }
      if ('error' in next) {
        throw next.error
      }
      yield next.batch
    }
  }

  async function* historyPages(
    _conversationNativeId: string,
    before: string | null,
  ): AsyncGenerator<HistoryPage<NormalizedEvent>> {
    const page = history.get(before ?? 'start')
    if (page) {
      yield page
    }
  }

  const encryption = {
    sendEncrypted: vi.fn<EncryptionCapability['sendEncrypted']>(async () => `$enc${++sequence}`),
    shareRoomKey: vi.fn<EncryptionCapability['shareRoomKey']>(async () => {}),
    requestRoomKey: vi.fn<EncryptionCapability['requestRoomKey']>(async () => {}),
  }

  const mocks = {
    login: vi.fn<BackendAdapter['login']>(async () => ({ session, profile })),
    connect: vi.fn<BackendAdapter['connect']>(async () => profile),
    listConversations: vi.fn<BackendAdapter['listConversations']>(async () => [...conversations]),
    send: vi.fn<BackendAdapter['send']>(async () => `$sent${++sequence}`),
    edit: vi.fn<BackendAdapter['edit']>(async () => `$edit${++sequence}`),
    react: vi.fn<BackendAdapter['react']>(async () => `$react${++sequence}`),
    redact: vi.fn<BackendAdapter['redact']>(async () => {}),
    markRead: vi.fn<BackendAdapter['markRead']>(async () => {}),
    setTyping: vi.fn<BackendAdapter['setTyping']>(async () => {}),
    disconnect: vi.fn<BackendAdapter['disconnect']>(async () => {}),
    logout: vi.fn<BackendAdapter['logout']>(async () => {}),
  }

  const adapter: BackendAdapter<NormalizedEvent> = {
    backend,
    ...(options.encryption ? { encryption } : {}),
    ...mocks,
    resume: (cursor) => {
      resumed.push(cursor)
    },
    streamEvents: (signal) => stream(signal),
    translate: (native) => [native],
    fetchHistory: (conversationNativeId, before) => historyPages(conversationNativeId, before),
    currentSession: () => session,
  }

  return {
    adapter,
    session,
    profile,
    resumed,
    conversations,
    history,
    encryption,
    ...mocks,
    emit: (events: NormalizedEvent[], cursor: string | null = null) => push({ batch: { events, cursor } }),
    fail: (error: unknown) => push({ error }),
  }
}

export type FakeBackend = ReturnType<typeof createFakeBackend>

export const textMessage = (
  conversationNativeId: string,
  nativeId: string,
  timestamp: number,
  overrides: { senderId?: string; body?: string; transactionId?: string | null } = {},
): NormalizedEvent => ({
  type: 'message',
  conversationNativeId,
  nativeId,
  senderId: overrides.senderId ?? '@alice:test',
  timestamp,
  transactionId: overrides.transactionId ?? null,
  content: { kind: 'text', body: overrides.body ?? `body of ${nativeId}`, format: 'plain' },
})
