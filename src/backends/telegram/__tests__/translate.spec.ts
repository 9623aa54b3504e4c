import { describe, expect, it } from 'vitest'

import { createMessageIndex, translateTelegramEvent } from '../translate'
import type { TelegramMessageData } from '../types'

const self = '777'

const message = (overrides: Partial<TelegramMessageData> = {}): TelegramMessageData => ({
  id: 41,
  chatId: 'C123',
  senderId: '42',
  out: false,
  date: 1_700_000_000,
  editDate: null,
  text: 'hello',
  ...overrides,
})

describe('telegram translation', () => {
  it('turns dialogs into conversations', () => {
    expect(
      translateTelegramEvent(
        {
          kind: 'dialog',
          dialog: { chatId: '42', kind: 'user', title: 'Alice', unreadCount: 2, lastMessageAt: 1_700_000_000 },
        },
        self,
        createMessageIndex(),
      ),
    ).toEqual([
      {
        type: 'conversation',
        update: {
          nativeId: '42',
          displayName: 'Alice',
          membership: 'joined',
          encrypted: false,
          unreadCount: 2,
          lastActivityAt: 1_700_000_000_000,
          participants: [{ nativeId: '42', displayName: 'Alice' }],
        },
      },
    ])

    const [group] = translateTelegramEvent(
      { kind: 'dialog', dialog: { chatId: '-100', kind: 'channel', title: 'News', unreadCount: 0, lastMessageAt: null } },
      self,
      createMessageIndex(),
    )
    expect(group).toEqual({
      type: 'conversation',
      update: { nativeId: '-100', displayName: 'News', membership: 'joined', encrypted: false, unreadCount: 0 },
    })
  })

  it('translates messages and versioned edits', () => {
    expect(translateTelegramEvent({ kind: 'new_message', message: message(), pts: 5 }, self, createMessageIndex())).toEqual([
      {
        type: 'message',
        conversationNativeId: 'C123',
        nativeId: '41',
        senderId: '42',
        timestamp: 1_700_000_000_000,
        transactionId: null,
        content: { kind: 'text', body: 'hello', format: 'plain' },
      },
    ])

    expect(
      translateTelegramEvent(
        { kind: 'edit_message', message: message({ text: 'hello!', editDate: 1_700_000_060 }), pts: 6 },
        self,
        createMessageIndex(),
      ),
    ).toEqual([
      {
        type: 'edit',
        conversationNativeId: 'C123',
        nativeId: '41:1700000060',
        targetNativeId: '41',
        senderId: '42',
        body: 'hello!',
        timestamp: 1_700_000_060_000,
      },
    ])
  })

  it('resolves deletions without a chat from messages seen earlier', () => {
    const index = createMessageIndex()
    translateTelegramEvent({ kind: 'new_message', message: message(), pts: 5 }, self, index)

    expect(
      translateTelegramEvent({ kind: 'delete_messages', chatId: null, messageIds: [41, 99], pts: 7 }, self, index),
    ).toEqual([{ type: 'redaction', conversationNativeId: 'C123', nativeId: '41:deleted', targetNativeId: '41' }])
  })

  it('attributes read receipts by direction', () => {
    expect(
      translateTelegramEvent({ kind: 'read_history', chatId: '42', maxId: 41, outbox: true, pts: 8 }, self, createMessageIndex()),
    ).toEqual([{ type: 'receipt', conversationNativeId: '42', userId: '42', upToNativeId: '41' }])
    expect(
      translateTelegramEvent({ kind: 'read_history', chatId: '42', maxId: 40, outbox: false, pts: 9 }, self, createMessageIndex()),
    ).toEqual([{ type: 'receipt', conversationNativeId: '42', userId: '777', upToNativeId: '40' }])
  })

  it('translates typing, status and reaction counts', () => {
    expect(
      translateTelegramEvent({ kind: 'typing', chatId: '42', userId: '42', typing: false }, self, createMessageIndex()),
    ).toEqual([{ type: 'typing', conversationNativeId: '42', started: [], stopped: ['42'], exhaustive: false }])
    expect(
      translateTelegramEvent({ kind: 'user_status', userId: '42', online: false, lastSeenAt: 1_700_000_000 }, self, createMessageIndex()),
    ).toEqual([{ type: 'presence', userId: '42', state: 'offline', lastActiveAt: 1_700_000_000_000 }])
    expect(
      translateTelegramEvent(
        { kind: 'reactions', chatId: '42', messageId: 41, reactions: [{ key: '🔥', count: 3, reactedBySelf: true }] },
        self,
        createMessageIndex(),
      ),
    ).toEqual([
      {
        type: 'reaction_summary',
        conversationNativeId: '42',
        targetNativeId: '41',
        reactions: [{ key: '🔥', count: 3, reactedBySelf: true }],
      },
    ])
  })

  it('tags the echo of an own send with its transaction id once', () => {
    const index = createMessageIndex()
    index.transactionByRandomId.set('-12345', 'txn-1')
    const echo = { kind: 'new_message' as const, message: message({ id: 50, senderId: self, out: true }), pts: 6 }

    expect(translateTelegramEvent({ kind: 'message_id', messageId: 50, randomId: '-12345' }, self, index)).toEqual([])
    expect(translateTelegramEvent({ kind: 'message_id', messageId: 51, randomId: '999' }, self, index)).toEqual([])
    expect(translateTelegramEvent(echo, self, index)).toEqual([
      {
        type: 'message',
        conversationNativeId: 'C123',
        nativeId: '50',
        senderId: self,
        timestamp: 1_700_000_000_000,
        transactionId: 'txn-1',
        content: { kind: 'text', body: 'hello', format: 'plain' },
      },
    ])
    expect(translateTelegramEvent(echo, self, index)[0]).toMatchObject({ nativeId: '50', transactionId: null })
    expect(index.transactionByMessageId.size).toBe(0)
  })
})
