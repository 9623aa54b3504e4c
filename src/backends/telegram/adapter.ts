import nacl from 'tweetnacl'
import naclUtil from 'tweetnacl-util'

import { createMessageIndex, dateOf, ptsOf, translateTelegramEvent } from '@/backends/telegram/translate'
import type {
  TelegramNativeEvent,
  TelegramTransport,
  TelegramTransportFactory,
  TelegramUpdateState,
} from '@/backends/telegram/types'
import { getRuntimeConfig } from '@/config/runtime'
import type {
  BackendAdapter,
  ConversationUpdate,
  HistoryPage,
  SyncBatch,
  TelegramSessionData,
} from '@/types/backend'
import { raceAbort } from '@/utils/backoff'
import { AsyncChannel } from '@/utils/channel'
import {
  AuthError,
  CancelledError,
  ChatError,
  PermanentProtocolError,
  TransientNetworkError,
  extractErrorMessage,
  isCancellation,
} from '@/utils/errors'
import { recordNetworkBreadcrumb } from '@/utils/telemetry'

const DIALOG_LIMIT = 100

const defaultTransportFactory: TelegramTransportFactory = async () => {
  const { createGramTransport } = await import('@/backends/telegram/gram')
  return createGramTransport()
}

const classifyTransportError = (err: unknown, signal?: AbortSignal): ChatError => {
  if (err instanceof ChatError) {
    return err
  }
  if (isCancellation(err, signal)) {
    return new CancelledError()
  }
  return new TransientNetworkError(extractErrorMessage(err) || 'Telegram request failed', { cause: err })
}

const encodeCursor = (state: TelegramUpdateState) => JSON.stringify(state)

export const parseTelegramCursor = (raw: string | null): TelegramUpdateState | null => {
  if (!raw) {
    return null
  }
  try {
    const parsed: unknown = JSON.parse(raw)
    if (!parsed || typeof parsed !== 'object') {
      return null
    }
    const { pts, qts, date } = parsed as Record<string, unknown>
    if (typeof pts !== 'number' || typeof qts !== 'number' || typeof date !== 'number') {
      return null
    }
    return { pts, qts, date }
  } catch (err) {
    console.warn('Ignoring malformed Telegram sync cursor', err)
    return null
  }
}

const advanceState = (state: TelegramUpdateState, events: TelegramNativeEvent[]): TelegramUpdateState =>
  events.reduce<TelegramUpdateState>(
    (next, event) => ({
      pts: Math.max(next.pts, ptsOf(event) ?? 0),
      qts: next.qts,
      date: Math.max(next.date, dateOf(event) ?? 0),
    }),
    state,
  )

const parseMessageId = (raw: string) => {
  const id = Number(raw)
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new PermanentProtocolError(`"${raw}" is not a Telegram message id`)
  }
  return id
}

/** Same transaction, same random id: a retried send is deduplicated by the server. */
export const randomIdFor = (transactionId: string) => {
  const digest = nacl.hash(naclUtil.decodeUTF8(transactionId))
  let value = 0n
  for (const byte of digest.subarray(0, 8)) {
    value = (value << 8n) | BigInt(byte)
  }
  return BigInt.asIntN(64, value).toString()
}

interface TelegramAdapterOptions {
  transportFactory?: TelegramTransportFactory
}

export const createTelegramAdapter = (
  options: TelegramAdapterOptions = {},
): BackendAdapter<TelegramNativeEvent> => {
  const transportFactory = options.transportFactory ?? defaultTransportFactory
  let transport: TelegramTransport | null = null
  let session: TelegramSessionData | null = null
  let cursor: string | null = null
  let streamOpened = false
  const index = createMessageIndex()

  // MTProto calls take no signal; an abort abandons the call and drops its result.
  const call = async <T>(run: () => Promise<T>, signal?: AbortSignal): Promise<T> => {
    if (signal?.aborted) {
      throw new CancelledError()
    }
    try {
      return await (signal ? raceAbort(run(), signal) : run())
    } catch (err) {
      throw classifyTransportError(err, signal)
    }
  }

  const connected = () => {
    if (!transport || !session) {
      throw new AuthError('Telegram account is not connected')
    }
    return transport
  }

  const obtainTransport = async () => {
    if (!transport) {
      transport = await transportFactory()
    }
    return transport
  }

  async function* updateStream(signal: AbortSignal): AsyncGenerator<SyncBatch<TelegramNativeEvent>> {
    const client = connected()
    const channel = new AsyncChannel<TelegramNativeEvent>()
    // Subscribe before catching up so no update falls in between.
    const unsubscribe = client.onUpdate((event) => channel.push(event))
    const onAbort = () => channel.close()
    signal.addEventListener('abort', onAbort, { once: true })

    try {
      const resumed = parseTelegramCursor(cursor)
      let state: TelegramUpdateState

      if (resumed) {
        state = resumed
        let final = false
        while (!final && !signal.aborted) {
          const from = state
          const difference = await call(() => client.getDifference(from), signal)
          state = difference.state
          final = difference.final
          yield { events: difference.events, cursor: encodeCursor(state) }
        }
      } else {
        state = await call(() => client.getState(), signal)
        const dialogs = await call(() => client.getDialogs(DIALOG_LIMIT), signal)
        yield {
          events: dialogs.map((dialog) => ({ kind: 'dialog' as const, dialog })),
          cursor: encodeCursor(state),
        }
      }

      for await (const first of channel) {
        const events = [first, ...channel.drain()]
        state = advanceState(state, events)
        cursor = encodeCursor(state)
        yield { events, cursor }
      }
    } finally {
      signal.removeEventListener('abort', onAbort)
      unsubscribe()
      channel.close()
    }
  }

  async function* historyStream(
    chatId: string,
    before: string | null,
    limit: number,
    signal: AbortSignal,
  ): AsyncGenerator<HistoryPage<TelegramNativeEvent>> {
    const client = connected()
    let beforeId = before ? parseMessageId(before) : null

    while (!signal.aborted) {
      const offset = beforeId
      const messages = await call(() => client.getHistory(chatId, offset, limit), signal)
      const oldest = messages.reduce<number | null>(
        (lowest, message) => (lowest === null || message.id < lowest ? message.id : lowest),
        null,
      )
      const nextToken = messages.length >= limit && oldest !== null ? String(oldest) : null
      yield {
        events: messages.map((message) => ({ kind: 'new_message' as const, message, pts: null })),
        nextToken,
      }
      if (oldest === null || nextToken === null) {
        return
      }
      beforeId = oldest
    }
  }

  return {
    backend: 'telegram',

    async login(request, signal) {
      if (request.backend !== 'telegram') {
        throw new PermanentProtocolError('Telegram adapter cannot handle a Matrix login')
      }
      const config = getRuntimeConfig().telegram
      const apiId = request.apiId ?? config.apiId
      const apiHash = request.apiHash ?? config.apiHash
      if (!apiId || !apiHash) {
        throw new PermanentProtocolError(
          'Telegram API credentials are missing (TELEGRAM_API_ID / TELEGRAM_API_HASH)',
        )
      }

      const client = await obtainTransport()
      const self = await call(
        () =>
          client.signIn(
            { apiId, apiHash, session: '' },
            {
              phoneNumber: request.phoneNumber,
              phoneCode: request.phoneCode,
              password: request.password,
            },
          ),
        signal,
      )

      session = {
        backend: 'telegram',
        apiId,
        apiHash,
        userId: self.userId,
        session: client.exportSession(),
      }
      recordNetworkBreadcrumb('api', {
        message: 'Telegram login succeeded',
        data: { userId: self.userId },
      })
      return {
        session,
        profile: { userId: self.userId, displayName: self.displayName, avatarUrl: null },
      }
    },

    async connect(stored, signal) {
      if (stored.backend !== 'telegram') {
        throw new PermanentProtocolError('Telegram adapter cannot resume a Matrix session')
      }
      const client = await obtainTransport()
      const self = await call(
        () => client.connect({ apiId: stored.apiId, apiHash: stored.apiHash, session: stored.session }),
        signal,
      )
      if (self.userId !== stored.userId) {
        throw new AuthError(`Telegram session belongs to ${self.userId}, expected ${stored.userId}`)
      }
      session = { ...stored, session: client.exportSession() }
      return { userId: self.userId, displayName: self.displayName, avatarUrl: null }
    },

    resume(next) {
      cursor = next
      streamOpened = false
    },

    streamEvents(signal) {
      if (streamOpened) {
        throw new PermanentProtocolError('Telegram update stream already opened; resume() first')
      }
      streamOpened = true
      return updateStream(signal)
    },

    translate(native) {
      return translateTelegramEvent(native, session?.userId ?? '', index)
    },

    async listConversations(signal) {
      const client = connected()
      const dialogs = await call(() => client.getDialogs(DIALOG_LIMIT), signal)
      const updates: ConversationUpdate[] = []
      for (const dialog of dialogs) {
        for (const event of translateTelegramEvent({ kind: 'dialog', dialog }, session?.userId ?? '', index)) {
          if (event.type === 'conversation') {
            updates.push(event.update)
          }
        }
      }
      return updates
    },

    fetchHistory(chatId, before, limit, signal) {
      return historyStream(chatId, before, limit, signal)
    },

    async send(chatId, content, transactionId, signal) {
      const client = connected()
      const randomId = randomIdFor(transactionId)
      // The echo can arrive before the call returns.
      index.transactionByRandomId.set(randomId, transactionId)
      try {
        const message = await call(() => client.sendMessage(chatId, content.body, randomId), signal)
        // Updates are translated when the sync loop drains them, possibly after this returns.
        if (!index.chatByMessageId.has(message.id)) {
          index.transactionByMessageId.set(message.id, transactionId)
        }
        index.chatByMessageId.set(message.id, message.chatId)
        return String(message.id)
      } finally {
        index.transactionByRandomId.delete(randomId)
      }
    },

    async edit(chatId, targetNativeId, body, _transactionId, signal) {
      const client = connected()
      const messageId = parseMessageId(targetNativeId)
      const message = await call(() => client.editMessage(chatId, messageId, body), signal)
      return `${message.id}:${message.editDate ?? message.date}`
    },

    async react(chatId, targetNativeId, key, _transactionId, signal) {
      const client = connected()
      const messageId = parseMessageId(targetNativeId)
      await call(() => client.sendReaction(chatId, messageId, key), signal)
      return `${messageId}:${key}`
    },

    async redact(chatId, targetNativeId, _transactionId, signal) {
      const client = connected()
      const messageId = parseMessageId(targetNativeId)
      await call(() => client.deleteMessages(chatId, [messageId]), signal)
    },

    async markRead(chatId, upToNativeId, signal) {
      const client = connected()
      const maxId = upToNativeId ? parseMessageId(upToNativeId) : 0
      await call(() => client.readHistory(chatId, maxId), signal)
    },

    async setTyping(chatId, typing, signal) {
      const client = connected()
      await call(() => client.setTyping(chatId, typing), signal)
    },

    currentSession() {
      if (!session) {
        return null
      }
      return transport ? { ...session, session: transport.exportSession() } : session
    },

    async disconnect() {
      streamOpened = false
      const client = transport
      transport = null
      if (client) {
        await client.disconnect()
      }
    },

    async logout(signal) {
      const client = connected()
      await call(() => client.logOut(), signal)
      transport = null
      session = null
      cursor = null
      streamOpened = false
      index.chatByMessageId.clear()
      index.transactionByRandomId.clear()
      index.transactionByMessageId.clear()
    },
  }
}
