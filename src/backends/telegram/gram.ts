import bigInt from 'big-integer'
import { Api, TelegramClient, errors, sessions, utils } from 'telegram'

import type {
  TelegramCredentials,
  TelegramDialogData,
  TelegramMessageData,
  TelegramNativeEvent,
  TelegramSelf,
  TelegramTransport,
  TelegramUpdateState,
} from '@/backends/telegram/types'
import type { ReactionCount } from '@/types/backend'
import {
  AuthError,
  ChatError,
  PermanentProtocolError,
  TransientNetworkError,
  extractErrorMessage,
} from '@/utils/errors'

const CONNECTION_RETRIES = 5
const DIALOG_REFRESH_LIMIT = 200

const classifyGramError = (err: unknown): ChatError => {
  if (err instanceof ChatError) {
    return err
  }
  if (err instanceof errors.FloodWaitError) {
    return new TransientNetworkError(`Telegram asked to wait ${err.seconds}s`, {
      code: 'FLOOD_WAIT',
      retryAfterMs: err.seconds * 1000,
      cause: err,
    })
  }
  if (err instanceof errors.RPCError) {
    const code = err.code ?? 0
    if (code === 401) {
      return new AuthError(err.errorMessage, { code: err.errorMessage, cause: err })
    }
    if (code === 420 || code >= 500 || code < 0) {
      return new TransientNetworkError(err.errorMessage, { code: err.errorMessage, cause: err })
    }
    return new PermanentProtocolError(err.errorMessage, { code: err.errorMessage, cause: err })
  }
  return new TransientNetworkError(extractErrorMessage(err) || 'Telegram request failed', { cause: err })
}

const guard = async <T>(run: () => Promise<T>): Promise<T> => {
  try {
    return await run()
  } catch (err) {
    throw classifyGramError(err)
  }
}

const displayNameOf = (user: Api.User) =>
  [user.firstName, user.lastName].filter((part) => Boolean(part)).join(' ') ||
  user.username ||
  user.id.toString()

const toMessageData = (message: Api.Message, selfUserId: string): TelegramMessageData => {
  const chatId = utils.getPeerId(message.peerId)
  const senderId = message.fromId
    ? utils.getPeerId(message.fromId)
    : message.out
      ? selfUserId
      : chatId
  return {
    id: message.id,
    chatId,
    senderId,
    out: Boolean(message.out),
    date: message.date,
    editDate: message.editDate ?? null,
    text: message.message ?? '',
  }
}

const toReactionCounts = (reactions: Api.MessageReactions): ReactionCount[] =>
  reactions.results.flatMap((result) =>
    result.reaction instanceof Api.ReactionEmoji
      ? [
          {
            key: result.reaction.emoticon,
            count: result.count,
            reactedBySelf: result.chosenOrder !== undefined,
          },
        ]
      : [],
  )

const toUpdateEvents = (update: unknown, selfUserId: string): TelegramNativeEvent[] => {
  if (update instanceof Api.UpdateNewMessage || update instanceof Api.UpdateNewChannelMessage) {
    const { message } = update
    if (!(message instanceof Api.Message)) {
      return []
    }
    return [
      {
        kind: 'new_message',
        message: toMessageData(message, selfUserId),
        pts: update instanceof Api.UpdateNewMessage ? update.pts : null,
      },
    ]
  }

  if (update instanceof Api.UpdateEditMessage || update instanceof Api.UpdateEditChannelMessage) {
    const { message } = update
    if (!(message instanceof Api.Message)) {
      return []
    }
    return [
      {
        kind: 'edit_message',
        message: toMessageData(message, selfUserId),
        pts: update instanceof Api.UpdateEditMessage ? update.pts : null,
      },
    ]
  }

  if (update instanceof Api.UpdateMessageID) {
    return [{ kind: 'message_id', messageId: update.id, randomId: update.randomId.toString() }]
  }

  if (update instanceof Api.UpdateDeleteMessages) {
    return [{ kind: 'delete_messages', chatId: null, messageIds: update.messages, pts: update.pts }]
  }

  if (update instanceof Api.UpdateDeleteChannelMessages) {
    const chatId = utils.getPeerId(new Api.PeerChannel({ channelId: update.channelId }))
    return [{ kind: 'delete_messages', chatId, messageIds: update.messages, pts: null }]
  }

  if (update instanceof Api.UpdateReadHistoryInbox || update instanceof Api.UpdateReadHistoryOutbox) {
    return [
      {
        kind: 'read_history',
        chatId: utils.getPeerId(update.peer),
        maxId: update.maxId,
        outbox: update instanceof Api.UpdateReadHistoryOutbox,
        pts: update.pts,
      },
    ]
  }

  if (update instanceof Api.UpdateReadChannelInbox) {
    const chatId = utils.getPeerId(new Api.PeerChannel({ channelId: update.channelId }))
    return [{ kind: 'read_history', chatId, maxId: update.maxId, outbox: false, pts: null }]
  }

  if (update instanceof Api.UpdateUserTyping) {
    const userId = update.userId.toString()
    return [
      {
        kind: 'typing',
        chatId: userId,
        userId,
        typing: !(update.action instanceof Api.SendMessageCancelAction),
      },
    ]
  }

  if (update instanceof Api.UpdateChatUserTyping) {
    return [
      {
        kind: 'typing',
        chatId: utils.getPeerId(new Api.PeerChat({ chatId: update.chatId })),
        userId: utils.getPeerId(update.fromId),
        typing: !(update.action instanceof Api.SendMessageCancelAction),
      },
    ]
  }

  if (update instanceof Api.UpdateUserStatus) {
    const { status } = update
    return [
      {
        kind: 'user_status',
        userId: update.userId.toString(),
        online: status instanceof Api.UserStatusOnline,
        lastSeenAt: status instanceof Api.UserStatusOffline ? status.wasOnline : null,
      },
    ]
  }

  if (update instanceof Api.UpdateMessageReactions) {
    return [
      {
        kind: 'reactions',
        chatId: utils.getPeerId(update.peer),
        messageId: update.msgId,
        reactions: toReactionCounts(update.reactions),
      },
    ]
  }

  if (update instanceof Api.UpdateShortMessage) {
    const chatId = update.userId.toString()
    return [
      {
        kind: 'new_message',
        message: {
          id: update.id,
          chatId,
          senderId: update.out ? selfUserId : chatId,
          out: Boolean(update.out),
          date: update.date,
          editDate: null,
          text: update.message,
        },
        pts: update.pts,
      },
    ]
  }

  if (update instanceof Api.UpdateShortChatMessage) {
    return [
      {
        kind: 'new_message',
        message: {
          id: update.id,
          chatId: utils.getPeerId(new Api.PeerChat({ chatId: update.chatId })),
          senderId: update.fromId.toString(),
          out: Boolean(update.out),
          date: update.date,
          editDate: null,
          text: update.message,
        },
        pts: update.pts,
      },
    ]
  }

  return []
}

const sentMessageOf = (
  result: Api.TypeUpdates,
  chatId: string,
  text: string,
  randomId: string,
  selfUserId: string,
): TelegramMessageData => {
  if (result instanceof Api.UpdateShortSentMessage) {
    return { id: result.id, chatId, senderId: selfUserId, out: true, date: result.date, editDate: null, text }
  }
  if (result instanceof Api.Updates || result instanceof Api.UpdatesCombined) {
    const assigned = result.updates.find(
      (update): update is Api.UpdateMessageID =>
        update instanceof Api.UpdateMessageID && update.randomId.toString() === randomId,
    )
    if (assigned) {
      for (const update of result.updates) {
        if (
          (update instanceof Api.UpdateNewMessage || update instanceof Api.UpdateNewChannelMessage) &&
          update.message instanceof Api.Message &&
          update.message.id === assigned.id
        ) {
          return toMessageData(update.message, selfUserId)
        }
      }
      return { id: assigned.id, chatId, senderId: selfUserId, out: true, date: result.date, editDate: null, text }
    }
  }
  throw new PermanentProtocolError('Telegram did not report the id of the sent message')
}

/** MTProto transport backed by GramJS. */
export const createGramTransport = (): TelegramTransport => {
  let client: TelegramClient | null = null
  let stringSession: sessions.StringSession | null = null
  let selfUserId = ''
  const peers = new Map<string, Api.TypeInputPeer>()
  const listeners = new Set<(event: TelegramNativeEvent) => void>()

  const dispatch = (update: unknown) => {
    for (const event of toUpdateEvents(update, selfUserId)) {
      for (const listener of listeners) {
        listener(event)
      }
    }
  }

  const active = () => {
    if (!client) {
      throw new AuthError('Telegram client is not connected')
    }
    return client
  }

  const prepare = (credentials: TelegramCredentials) => {
    stringSession = new sessions.StringSession(credentials.session)
    const next = new TelegramClient(stringSession, credentials.apiId, credentials.apiHash, {
      connectionRetries: CONNECTION_RETRIES,
    })
    next.addEventHandler(dispatch)
    client = next
    return next
  }

  const readSelf = async (telegram: TelegramClient): Promise<TelegramSelf> => {
    const me = await telegram.getMe()
    if (!(me instanceof Api.User)) {
      throw new AuthError('Telegram did not return the signed-in user')
    }
    selfUserId = me.id.toString()
    return { userId: selfUserId, displayName: displayNameOf(me) }
  }

  const toDialogs = async (limit: number): Promise<TelegramDialogData[]> => {
    const dialogs = await active().getDialogs({ limit })
    const result: TelegramDialogData[] = []
    for (const dialog of dialogs) {
      const chatId = utils.getPeerId(dialog.inputEntity)
      peers.set(chatId, dialog.inputEntity)
      result.push({
        chatId,
        kind: dialog.isUser ? 'user' : dialog.isChannel && !dialog.isGroup ? 'channel' : 'group',
        title: dialog.title ?? dialog.name ?? chatId,
        unreadCount: dialog.unreadCount,
        lastMessageAt: dialog.date || null,
      })
    }
    return result
  }

  const resolvePeer = async (chatId: string): Promise<Api.TypeInputPeer> => {
    const cached = peers.get(chatId)
    if (cached) {
      return cached
    }
    await toDialogs(DIALOG_REFRESH_LIMIT)
    const refreshed = peers.get(chatId)
    if (!refreshed) {
      throw new PermanentProtocolError(`Unknown Telegram chat ${chatId}`)
    }
    return refreshed
  }

  const toMessages = (list: Iterable<unknown>) => {
    const messages: TelegramMessageData[] = []
    for (const entry of list) {
      if (entry instanceof Api.Message) {
        messages.push(toMessageData(entry, selfUserId))
      }
    }
    return messages
  }

  return {
    connect: (credentials) =>
      guard(async () => {
        const telegram = client ?? prepare(credentials)
        if (!telegram.connected) {
          await telegram.connect()
        }
        if (!(await telegram.checkAuthorization())) {
          throw new AuthError('Telegram session is no longer authorized')
        }
        return readSelf(telegram)
      }),

    signIn: (credentials, prompts) =>
      guard(async () => {
        const telegram = prepare(credentials)
        const outcome: { error: Error | null } = { error: null }
        await telegram.start({
          phoneNumber: prompts.phoneNumber,
          phoneCode: () => prompts.phoneCode(),
          password: async (hint?: string) => {
            if (!prompts.password) {
              throw new AuthError('Two-step verification password required')
            }
            return prompts.password(hint)
          },
          onError: async (err: Error) => {
            outcome.error = err
            return true
          },
        })
        if (outcome.error) {
          throw outcome.error instanceof ChatError
            ? outcome.error
            : new AuthError(outcome.error.message, { cause: outcome.error })
        }
        return readSelf(telegram)
      }),

    exportSession() {
      return stringSession ? stringSession.save() : ''
    },

    getDialogs: (limit) => guard(() => toDialogs(limit)),

    getHistory: (chatId, beforeMessageId, limit) =>
      guard(async () => {
        const peer = await resolvePeer(chatId)
        const list = await active().getMessages(peer, { limit, offsetId: beforeMessageId ?? 0 })
        return toMessages(list)
      }),

    sendMessage: (chatId, text, randomId) =>
      guard(async () => {
        const peer = await resolvePeer(chatId)
        const result = await active().invoke(
          new Api.messages.SendMessage({ peer, message: text, randomId: bigInt(randomId) }),
        )
        if (result instanceof Api.Updates || result instanceof Api.UpdatesCombined) {
          for (const update of result.updates) {
            dispatch(update)
          }
        }
        return sentMessageOf(result, chatId, text, randomId, selfUserId)
      }),

    editMessage: (chatId, messageId, text) =>
      guard(async () => {
        const peer = await resolvePeer(chatId)
        const edited = await active().editMessage(peer, { message: messageId, text })
        return toMessageData(edited, selfUserId)
      }),

    deleteMessages: (chatId, messageIds) =>
      guard(async () => {
        const peer = await resolvePeer(chatId)
        await active().deleteMessages(peer, messageIds, { revoke: true })
      }),

    sendReaction: (chatId, messageId, emoticon) =>
      guard(async () => {
        const peer = await resolvePeer(chatId)
        await active().invoke(
          new Api.messages.SendReaction({
            peer,
            msgId: messageId,
            reaction: [new Api.ReactionEmoji({ emoticon })],
          }),
        )
      }),

    readHistory: (chatId, maxId) =>
      guard(async () => {
        const peer = await resolvePeer(chatId)
        if (peer instanceof Api.InputPeerChannel) {
          await active().invoke(new Api.channels.ReadHistory({ channel: peer, maxId }))
        } else {
          await active().invoke(new Api.messages.ReadHistory({ peer, maxId }))
        }
      }),

    setTyping: (chatId, typing) =>
      guard(async () => {
        const peer = await resolvePeer(chatId)
        await active().invoke(
          new Api.messages.SetTyping({
            peer,
            action: typing ? new Api.SendMessageTypingAction() : new Api.SendMessageCancelAction(),
          }),
        )
      }),

    getState: () =>
      guard(async () => {
        const state = await active().invoke(new Api.updates.GetState())
        return { pts: state.pts, qts: state.qts, date: state.date }
      }),

    getDifference: (state: TelegramUpdateState) =>
      guard(async () => {
        const difference = await active().invoke(
          new Api.updates.GetDifference({ pts: state.pts, qts: state.qts, date: state.date }),
        )

        if (difference instanceof Api.updates.DifferenceEmpty) {
          return { events: [], state: { ...state, date: difference.date }, final: true }
        }

        if (difference instanceof Api.updates.DifferenceTooLong) {
          const dialogs = await toDialogs(DIALOG_REFRESH_LIMIT)
          return {
            events: dialogs.map((dialog) => ({ kind: 'dialog' as const, dialog })),
            state: { ...state, pts: difference.pts },
            final: true,
          }
        }

        const next =
          difference instanceof Api.updates.DifferenceSlice
            ? difference.intermediateState
            : difference.state
        const events: TelegramNativeEvent[] = [
          ...toMessages(difference.newMessages).map((message) => ({
            kind: 'new_message' as const,
            message,
            pts: null,
          })),
          ...difference.otherUpdates.flatMap((update) => toUpdateEvents(update, selfUserId)),
        ]
        return {
          events,
          state: { pts: next.pts, qts: next.qts, date: next.date },
          final: !(difference instanceof Api.updates.DifferenceSlice),
        }
      }),

    onUpdate(listener) {
      listeners.add(listener)
      return () => {
        listeners.delete(listener)
      }
    },

    disconnect: () =>
      guard(async () => {
        const telegram = client
        client = null
        if (telegram) {
          await telegram.disconnect()
        }
      }),

    logOut: () =>
      guard(async () => {
        await active().invoke(new Api.auth.LogOut())
        const telegram = client
        client = null
        stringSession = null
        peers.clear()
        if (telegram) {
          await telegram.disconnect()
        }
      }),
  }
}
