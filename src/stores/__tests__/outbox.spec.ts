import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createPinia, setActivePinia } from 'pinia'

import { configureRuntime } from '@/config/runtime'
import type { NormalizedEvent } from '@/types/backend'
import { PermanentProtocolError, TransientNetworkError } from '@/utils/errors'
import { SECRETBOX_ALGORITHM } from '@/utils/roomKeys'
import { createMemoryStorage, setStorageAdapter } from '@/utils/storage'

import { useAccountStore } from '../accounts'
import { useConversationStore } from '../conversations'
import { useEncryptionStore } from '../encryption'
import { useOutboxStore } from '../outbox'
import { useSyncStore } from '../sync'
import { createFakeBackend, textMessage } from './fakeAdapter'

const roomId = '!room:test'
const conversationId = 'matrix:@me:test/!room:test'

const outboundConfig = (reconciliationTimeoutMs = 60_000) => ({
  outbound: {
    backoff: { initialIntervalMs: 1, multiplier: 1, maxIntervalMs: 1 },
    maxAttempts: 3,
    reconciliationTimeoutMs,
  },
})

const connect = async (fake = createFakeBackend(), events: NormalizedEvent[] = []) => {
  const accountStore = useAccountStore()
  const syncStore = useSyncStore()
  const accountId = accountStore.upsertAccount(fake.session, fake.profile)
  syncStore.start(accountId, fake.adapter)
  fake.emit([{ type: 'conversation', update: { nativeId: roomId } }, ...events], 's1')
  await syncStore.waitUntilSyncing(accountId)
  return { fake, accountId, accountStore, syncStore }
}

describe('outbox store', () => {
  beforeEach(() => {
    setActivePinia(createPinia())
    setStorageAdapter(createMemoryStorage())
    configureRuntime(outboundConfig())
    vi.restoreAllMocks()
  })

  afterEach(async () => {
    const syncStore = useSyncStore()
    await syncStore.stop('matrix:@me:test')
    await syncStore.stop('telegram:777')
    configureRuntime({})
    setStorageAdapter(null)
    vi.restoreAllMocks()
  })

  it('holds a send while the account is offline and delivers it once syncing', async () => {
    const fake = createFakeBackend({ backend: 'telegram', userId: '777' })
    const accountStore = useAccountStore()
    const syncStore = useSyncStore()
    const conversations = useConversationStore()
    const outbox = useOutboxStore()
    const accountId = accountStore.upsertAccount(fake.session, fake.profile)
    const chatId = 'telegram:777/C123'
    conversations.applyConversationUpdate(
      { accountId, backend: 'telegram', selfUserId: '777' },
      { nativeId: 'C123', displayName: 'Support' },
    )

    const receipt = outbox.submitIntent({ type: 'send', conversationId: chatId, body: 'hello' })

    expect(receipt).toMatchObject({ ok: true, messageId: `${chatId}/~1`, error: null })
    expect(conversations.findMessage(`${chatId}/~1`)?.delivery).toEqual({ state: 'pending' })
    expect(outbox.pendingCount).toBe(1)
    expect(fake.send).not.toHaveBeenCalled()

    fake.send.mockResolvedValueOnce('9001')
    syncStore.start(accountId, fake.adapter)
    fake.emit([], 's1')

    await vi.waitFor(() => expect(outbox.pendingCount).toBe(0))
    expect(fake.send).toHaveBeenCalledWith(
      'C123',
      { body: 'hello', format: 'plain' },
      expect.any(String),
      expect.any(AbortSignal),
    )
    expect(conversations.findMessage(`${chatId}/~1`)).toBeNull()

    fake.emit([textMessage('C123', '9001', 5_000, { senderId: '777', body: 'hello' })], 's2')
    await vi.waitFor(() => expect(accountStore.loadCursor(accountId)).toBe('s2'))

    const messages = conversations.getConversation(chatId)?.messages ?? []
    expect(messages).toHaveLength(1)
    expect(messages[0]).toMatchObject({
      id: `${chatId}/9001`,
      nativeId: '9001',
      timestamp: 5_000,
      content: { kind: 'text', body: 'hello', format: 'plain' },
      delivery: { state: 'sent' },
    })
  })

  it('stops accepting the provisional id once the send is reconciled', async () => {
    const { fake } = await connect()
    const conversations = useConversationStore()
    const outbox = useOutboxStore()
    fake.send.mockResolvedValueOnce('$s1')

    const provisionalId = outbox.submitIntent({ type: 'send', conversationId, body: 'hello' }).messageId ?? ''
    await vi.waitFor(() => expect(outbox.pendingCount).toBe(0))

    expect(conversations.findMessage(provisionalId)).toBeNull()
    expect(conversations.findMessage(`${conversationId}/$s1`)?.delivery).toEqual({ state: 'sent' })
    expect(outbox.submitIntent({ type: 'edit', conversationId, messageId: provisionalId, body: 'hello!' })).toEqual({
      ok: false,
      commandId: null,
      messageId: null,
      error: 'Only your own text messages can be edited.',
    })
    expect(fake.edit).not.toHaveBeenCalled()
  })

  it('requeues in-flight sends on disconnect and drops their late results', async () => {
    const { fake, accountId, syncStore } = await connect()
    const conversations = useConversationStore()
    const outbox = useOutboxStore()
    let lateAck: (nativeId: string) => void = () => {}
    fake.send.mockImplementationOnce(
      () =>
        new Promise<string>((resolve) => {
          lateAck = resolve
        }),
    )

    const first = outbox.submitIntent({ type: 'send', conversationId, body: 'first' }).messageId ?? ''
    await vi.waitFor(() => expect(fake.send).toHaveBeenCalledTimes(1))

    await syncStore.stop(accountId)
    await vi.waitFor(() => expect(outbox.queue.map((entry) => entry.status)).toEqual(['queued']))
    expect(outbox.queue[0]?.attempts).toBe(0)

    lateAck('$late')
    const second = outbox.submitIntent({ type: 'send', conversationId, body: 'second' }).messageId ?? ''
    await Promise.resolve()
    expect(conversations.findMessage(`${conversationId}/$late`)).toBeNull()
    expect(conversations.findMessage(first)?.delivery).toEqual({ state: 'pending' })

    syncStore.start(accountId, fake.adapter)
    fake.emit([], 's2')

    await vi.waitFor(() => expect(outbox.pendingCount).toBe(0))
    expect(fake.send.mock.calls.map(([, content]) => content.body)).toEqual(['first', 'first', 'second'])
    expect(fake.send.mock.calls[1]?.[2]).toBe(fake.send.mock.calls[0]?.[2])
    expect(conversations.findMessage(first)).toBeNull()
    expect(conversations.findMessage(second)).toBeNull()
    expect(
      conversations.getConversation(conversationId)?.messages.map((entry) => [entry.nativeId, entry.content]),
    ).toEqual([
      ['$sent1', { kind: 'text', body: 'first', format: 'plain' }],
      ['$sent2', { kind: 'text', body: 'second', format: 'plain' }],
    ])
  })

  it('retries transient failures up to the attempt limit, then marks the message failed', async () => {
    const { fake } = await connect()
    const conversations = useConversationStore()
    const outbox = useOutboxStore()
    fake.send.mockRejectedValue(new TransientNetworkError('timeout'))

    const receipt = outbox.submitIntent({ type: 'send', conversationId, body: 'hello' })
    const messageId = receipt.messageId ?? ''

    await vi.waitFor(() =>
      expect(conversations.findMessage(messageId)?.delivery).toEqual({ state: 'failed', reason: 'timeout' }),
    )
    expect(fake.send).toHaveBeenCalledTimes(3)
    expect(outbox.queue).toHaveLength(1)
    expect(outbox.queue[0]).toMatchObject({ status: 'failed', attempts: 3, error: 'timeout' })
    expect(outbox.hasFailures).toBe(true)

    fake.send.mockResolvedValueOnce('$s9')
    expect(outbox.submitIntent({ type: 'resend', conversationId, messageId }).ok).toBe(true)

    await vi.waitFor(() =>
      expect(conversations.findMessage(`${conversationId}/$s9`)?.delivery).toEqual({ state: 'sent' }),
    )
    expect(conversations.findMessage(messageId)).toBeNull()
    expect(outbox.queue).toEqual([])
  })

  it('fails at once on a permanent error and lets the user discard the message', async () => {
    const { fake } = await connect()
    const conversations = useConversationStore()
    const outbox = useOutboxStore()
    fake.send.mockRejectedValueOnce(new PermanentProtocolError('M_FORBIDDEN'))

    const receipt = outbox.submitIntent({ type: 'send', conversationId, body: 'hello' })
    const messageId = receipt.messageId ?? ''

    await vi.waitFor(() =>
      expect(conversations.findMessage(messageId)?.delivery).toEqual({ state: 'failed', reason: 'M_FORBIDDEN' }),
    )
    expect(fake.send).toHaveBeenCalledTimes(1)

    expect(outbox.submitIntent({ type: 'discard', conversationId, messageId }).ok).toBe(true)
    expect(conversations.findMessage(messageId)).toBeNull()
    expect(outbox.queue).toEqual([])
  })

  it('fails a send the server never acknowledges within the reconciliation window', async () => {
    configureRuntime(outboundConfig(20))
    const { fake } = await connect()
    const conversations = useConversationStore()
    const outbox = useOutboxStore()
    fake.send.mockImplementationOnce(() => new Promise<string>(() => {}))

    const receipt = outbox.submitIntent({ type: 'send', conversationId, body: 'hello' })

    await vi.waitFor(() =>
      expect(conversations.findMessage(receipt.messageId ?? '')?.delivery).toEqual({
        state: 'failed',
        reason: 'reconciliation_conflict',
      }),
    )
    expect(fake.send).toHaveBeenCalledTimes(1)
  })

  it('holds an edit of an unsent message until the send is acknowledged', async () => {
    const { fake } = await connect()
    const conversations = useConversationStore()
    const outbox = useOutboxStore()
    let acknowledge: (nativeId: string) => void = () => {}
    fake.send.mockImplementationOnce(
      () =>
        new Promise<string>((resolve) => {
          acknowledge = resolve
        }),
    )

    const sent = outbox.submitIntent({ type: 'send', conversationId, body: 'helo' })
    const provisionalId = sent.messageId ?? ''
    const edited = outbox.submitIntent({ type: 'edit', conversationId, messageId: provisionalId, body: 'hello' })

    expect(edited.ok).toBe(true)
    expect(conversations.findMessage(provisionalId)?.content).toEqual({ kind: 'text', body: 'hello', format: 'plain' })

    await vi.waitFor(() => expect(fake.send).toHaveBeenCalledTimes(1))
    expect(fake.edit).not.toHaveBeenCalled()

    acknowledge('$s1')
    await vi.waitFor(() => expect(outbox.pendingCount).toBe(0))
    expect(fake.edit).toHaveBeenCalledWith(roomId, '$s1', 'hello', expect.any(String), expect.any(AbortSignal))

    const message = conversations.findMessage(`${conversationId}/$s1`)
    expect(message?.content).toEqual({ kind: 'text', body: 'hello', format: 'plain' })
    expect(message?.edits.map((edit) => edit.nativeId)).toEqual(['$edit1'])
  })

  it('rolls back an optimistic reaction the server rejected', async () => {
    const { fake } = await connect(createFakeBackend(), [textMessage(roomId, '$m1', 1_000)])
    const conversations = useConversationStore()
    const outbox = useOutboxStore()
    const messageId = `${conversationId}/$m1`
    fake.react.mockRejectedValueOnce(new PermanentProtocolError('M_FORBIDDEN'))

    expect(outbox.submitIntent({ type: 'react', conversationId, messageId, key: '👍' }).ok).toBe(true)
    expect(conversations.findMessage(messageId)?.reactions).toEqual([
      { key: '👍', count: 1, senders: ['matrix:@me:test/@me:test'], reactedBySelf: true },
    ])

    await vi.waitFor(() => expect(conversations.findMessage(messageId)?.reactions).toEqual([]))
    expect(outbox.queue).toEqual([])
  })

  it('redacts a message after the server accepts the delete', async () => {
    const { fake } = await connect(createFakeBackend(), [textMessage(roomId, '$m1', 1_000)])
    const conversations = useConversationStore()
    const outbox = useOutboxStore()
    const messageId = `${conversationId}/$m1`

    expect(outbox.submitIntent({ type: 'delete', conversationId, messageId }).ok).toBe(true)

    await vi.waitFor(() => expect(conversations.findMessage(messageId)?.content).toEqual({ kind: 'redacted' }))
    expect(fake.redact).toHaveBeenCalledWith(roomId, '$m1', expect.any(String), expect.any(AbortSignal))
  })

  it('resets unread on mark_read and sends a receipt for the newest message', async () => {
    const { fake, accountId, accountStore } = await connect()
    const conversations = useConversationStore()
    const outbox = useOutboxStore()
    fake.emit([textMessage(roomId, '$m2', 2_000)], 's2')
    await vi.waitFor(() => expect(accountStore.loadCursor(accountId)).toBe('s2'))
    expect(conversations.getConversation(conversationId)?.conversation.unreadCount).toBe(1)

    outbox.submitIntent({ type: 'mark_read', conversationId })

    expect(conversations.getConversation(conversationId)?.conversation.unreadCount).toBe(0)
    await vi.waitFor(() => expect(fake.markRead).toHaveBeenCalledWith(roomId, '$m2', expect.any(AbortSignal)))
  })

  it('throttles repeated typing notices', async () => {
    const { fake } = await connect()
    const outbox = useOutboxStore()

    expect(outbox.submitIntent({ type: 'typing', conversationId, typing: true }).commandId).not.toBeNull()
    expect(outbox.submitIntent({ type: 'typing', conversationId, typing: true }).commandId).toBeNull()

    await vi.waitFor(() => expect(fake.setTyping).toHaveBeenCalledTimes(1))
    expect(fake.setTyping).toHaveBeenCalledWith(roomId, true, expect.any(AbortSignal))
  })

  it('encrypts sends to encrypted conversations', async () => {
    const { fake, accountId } = await connect(createFakeBackend({ encryption: true }), [
      { type: 'conversation', update: { nativeId: roomId, encrypted: true } },
    ])
    const outbox = useOutboxStore()
    const encryption = useEncryptionStore()

    outbox.submitIntent({ type: 'send', conversationId, body: 'hello' })

    await vi.waitFor(() => expect(outbox.pendingCount).toBe(0))
    expect(fake.send).not.toHaveBeenCalled()
    expect(fake.encryption.shareRoomKey).toHaveBeenCalledTimes(1)

    const payload = fake.encryption.sendEncrypted.mock.calls[0]?.[1]
    expect(payload?.algorithm).toBe(SECRETBOX_ALGORITHM)
    expect(payload && encryption.decrypt(accountId, payload)).toEqual({
      ok: true,
      plain: { kind: 'text', body: 'hello', format: 'plain' },
    })
    expect(useConversationStore().findMessage(`${conversationId}/$enc1`)?.delivery).toEqual({ state: 'sent' })
  })

  it('rejects empty messages and unknown conversations', () => {
    const outbox = useOutboxStore()

    expect(outbox.submitIntent({ type: 'send', conversationId: 'matrix:@me:test/!nowhere:test', body: 'hi' })).toEqual({
      ok: false,
      commandId: null,
      messageId: null,
      error: 'Unknown conversation matrix:@me:test/!nowhere:test',
    })

    const accountStore = useAccountStore()
    const fake = createFakeBackend()
    accountStore.upsertAccount(fake.session, fake.profile)
    useConversationStore().applyConversationUpdate(
      { accountId: 'matrix:@me:test', backend: 'matrix', selfUserId: '@me:test' },
      { nativeId: roomId },
    )
    expect(outbox.submitIntent({ type: 'send', conversationId, body: '   ' }).error).toBe('Message cannot be empty.')
  })
})
