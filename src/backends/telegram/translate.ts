import type { TelegramMessageData, TelegramNativeEvent } from '@/backends/telegram/types'
import type { NormalizedEvent } from '@/types/backend'

const toMillis = (seconds: number) => seconds * 1000

export interface TelegramMessageIndex {
  /** Resolves deletions of private and basic-group messages, whose updates omit the chat. */
  chatByMessageId: Map<number, string>
  /** Random id of a send in flight -> its transaction id. */
  transactionByRandomId: Map<string, string>
  /** Server id of an own message whose echo is still due -> its transaction id. */
  transactionByMessageId: Map<number, string>
}

export const createMessageIndex = (): TelegramMessageIndex => ({
  chatByMessageId: new Map(),
  transactionByRandomId: new Map(),
  transactionByMessageId: new Map(),
})

const messageEvent = (message: TelegramMessageData, transactionId: string | null): NormalizedEvent => ({
  type: 'message',
  conversationNativeId: message.chatId,
  nativeId: String(message.id),
  senderId: message.senderId,
  timestamp: toMillis(message.date),
  transactionId,
  content: { kind: 'text', body: message.text, format: 'plain' },
})

export const translateTelegramEvent = (
  native: TelegramNativeEvent,
  selfUserId: string,
  index: TelegramMessageIndex,
): NormalizedEvent[] => {
  switch (native.kind) {
    case 'dialog': {
      const { dialog } = native
      return [
        {
          type: 'conversation',
          update: {
            nativeId: dialog.chatId,
            displayName: dialog.title,
            membership: 'joined',
            encrypted: false,
            unreadCount: dialog.unreadCount,
            ...(dialog.lastMessageAt !== null ? { lastActivityAt: toMillis(dialog.lastMessageAt) } : {}),
            ...(dialog.kind === 'user'
              ? { participants: [{ nativeId: dialog.chatId, displayName: dialog.title }] }
              : {}),
          },
        },
      ]
    }
    case 'new_message': {
      const { message } = native
      index.chatByMessageId.set(message.id, message.chatId)
      const transactionId = index.transactionByMessageId.get(message.id) ?? null
      index.transactionByMessageId.delete(message.id)
      return [messageEvent(message, transactionId)]
    }
    case 'message_id': {
      const transactionId = index.transactionByRandomId.get(native.randomId)
      if (transactionId) {
        index.transactionByMessageId.set(native.messageId, transactionId)
      }
      return []
    }
    case 'edit_message': {
      const { message } = native
      index.chatByMessageId.set(message.id, message.chatId)
      const editedAt = message.editDate ?? message.date
      return [
        {
          type: 'edit',
          conversationNativeId: message.chatId,
          nativeId: `${message.id}:${editedAt}`,
          targetNativeId: String(message.id),
          senderId: message.senderId,
          body: message.text,
          timestamp: toMillis(editedAt),
        },
      ]
    }
    case 'delete_messages': {
      const events: NormalizedEvent[] = []
      for (const messageId of native.messageIds) {
        const chatId = native.chatId ?? index.chatByMessageId.get(messageId)
        if (!chatId) {
          continue
        }
        events.push({
          type: 'redaction',
          conversationNativeId: chatId,
          nativeId: `${messageId}:deleted`,
          targetNativeId: String(messageId),
        })
      }
      return events
    }
    case 'read_history':
      return [
        {
          type: 'receipt',
          conversationNativeId: native.chatId,
          // Outbox reads come from the chat partner; inbox reads are our own.
          userId: native.outbox ? native.chatId : selfUserId,
          upToNativeId: String(native.maxId),
        },
      ]
    case 'typing':
      return [
        {
          type: 'typing',
          conversationNativeId: native.chatId,
          started: native.typing ? [native.userId] : [],
          stopped: native.typing ? [] : [native.userId],
          exhaustive: false,
        },
      ]
    case 'user_status':
      return [
        {
          type: 'presence',
          userId: native.userId,
          state: native.online ? 'online' : 'offline',
          lastActiveAt: native.lastSeenAt !== null ? toMillis(native.lastSeenAt) : null,
        },
      ]
    case 'reactions':
      return [
        {
          type: 'reaction_summary',
          conversationNativeId: native.chatId,
          targetNativeId: String(native.messageId),
          reactions: native.reactions,
        },
      ]
  }
}

export const ptsOf = (native: TelegramNativeEvent): number | null =>
  'pts' in native ? native.pts : null

export const dateOf = (native: TelegramNativeEvent): number | null => {
  if (native.kind === 'new_message' || native.kind === 'edit_message') {
    return native.message.editDate ?? native.message.date
  }
  return null
}
