import { describe, expect, it } from 'vitest'

import { flattenSyncResponse, translateMatrixEvent } from '../translate'
import type { MatrixEvent, MatrixNativeEvent } from '../types'

const roomId = '!room:test'
const self = '@me:test'

const timeline = (event: Partial<MatrixEvent> & Pick<MatrixEvent, 'type' | 'content'>): MatrixNativeEvent => ({
  kind: 'timeline',
  roomId,
  event: { event_id: '$e1', sender: '@alice:test', origin_server_ts: 1_000, ...event },
})

describe('matrix translation', () => {
  it('flattens sync responses with to-device events first', () => {
    const events = flattenSyncResponse(
      {
        next_batch: 's2',
        rooms: {
          join: {
            [roomId]: {
              summary: { 'm.heroes': ['@alice:test'] },
              timeline: { events: [{ type: 'm.room.message', content: {} }] },
              ephemeral: { events: [{ type: 'm.typing', content: {} }] },
              unread_notifications: { notification_count: 4 },
            },
          },
          leave: { '!old:test': {} },
        },
        to_device: { events: [{ type: 'm.room_key', content: {} }] },
        presence: { events: [{ type: 'm.presence', content: {} }] },
      },
      true,
    )

    expect(events.map((event) => event.kind)).toEqual(['to_device', 'room', 'timeline', 'ephemeral', 'room', 'presence'])
    expect(events[1]).toEqual({ kind: 'room', roomId, membership: 'joined', heroes: ['@alice:test'], unreadCount: 4 })
    expect(events[4]).toEqual({ kind: 'room', roomId: '!old:test', membership: 'left', heroes: [], unreadCount: null })
  })

  it('only carries unread counts on the initial sync', () => {
    const [room] = flattenSyncResponse(
      { next_batch: 's3', rooms: { join: { [roomId]: { unread_notifications: { notification_count: 4 } } } } },
      false,
    )

    expect(room).toMatchObject({ kind: 'room', unreadCount: null })
  })

  it('names rooms from heroes until an explicit name arrives', () => {
    expect(
      translateMatrixEvent({ kind: 'room', roomId, membership: 'joined', heroes: ['@alice:test', '@bob:test'], unreadCount: 2 }, self),
    ).toEqual([
      {
        type: 'conversation',
        update: { nativeId: roomId, membership: 'joined', fallbackName: '@alice:test, @bob:test', unreadCount: 2 },
      },
    ])
    expect(
      translateMatrixEvent(
        { kind: 'state', roomId, event: { type: 'm.room.name', state_key: '', content: { name: 'Design' } } },
        self,
      ),
    ).toEqual([{ type: 'conversation', update: { nativeId: roomId, displayName: 'Design' } }])
    expect(
      translateMatrixEvent(
        { kind: 'state', roomId, event: { type: 'm.room.encryption', state_key: '', content: {} } },
        self,
      ),
    ).toEqual([{ type: 'conversation', update: { nativeId: roomId, encrypted: true } }])
  })

  it('tracks membership changes', () => {
    const member = (userId: string, membership: string): MatrixNativeEvent => ({
      kind: 'state',
      roomId,
      event: { type: 'm.room.member', state_key: userId, content: { membership, displayname: 'Someone' } },
    })

    expect(translateMatrixEvent(member('@bob:test', 'join'), self)).toEqual([
      {
        type: 'conversation',
        update: { nativeId: roomId, participants: [{ nativeId: '@bob:test', displayName: 'Someone', avatarUrl: null }] },
      },
    ])
    expect(translateMatrixEvent(member(self, 'join'), self)).toMatchObject([
      { type: 'conversation', update: { membership: 'joined' } },
    ])
    expect(translateMatrixEvent(member('@bob:test', 'ban'), self)).toEqual([
      { type: 'conversation', update: { nativeId: roomId, removedParticipants: ['@bob:test'] } },
    ])
    expect(translateMatrixEvent(member(self, 'leave'), self)).toEqual([
      { type: 'conversation', update: { nativeId: roomId, removedParticipants: [self], membership: 'left' } },
    ])
  })

  it('translates messages and edits', () => {
    expect(
      translateMatrixEvent(
        timeline({ type: 'm.room.message', content: { msgtype: 'm.emote', body: 'waves' }, unsigned: { transaction_id: 'txn-1' } }),
        self,
      ),
    ).toEqual([
      {
        type: 'message',
        conversationNativeId: roomId,
        nativeId: '$e1',
        senderId: '@alice:test',
        timestamp: 1_000,
        transactionId: 'txn-1',
        content: { kind: 'text', body: 'waves', format: 'emote' },
      },
    ])

    expect(
      translateMatrixEvent(
        timeline({
          event_id: '$e2',
          type: 'm.room.message',
          content: {
            msgtype: 'm.text',
            body: '* fixed',
            'm.new_content': { msgtype: 'm.text', body: 'fixed' },
            'm.relates_to': { rel_type: 'm.replace', event_id: '$e1' },
          },
        }),
        self,
      ),
    ).toEqual([
      {
        type: 'edit',
        conversationNativeId: roomId,
        nativeId: '$e2',
        targetNativeId: '$e1',
        senderId: '@alice:test',
        body: 'fixed',
        timestamp: 1_000,
      },
    ])
  })

  it('turns already-redacted messages into a redaction', () => {
    expect(
      translateMatrixEvent(
        timeline({ type: 'm.room.message', content: {}, unsigned: { redacted_because: { event_id: '$r1' } } }),
        self,
      ),
    ).toMatchObject([
      { type: 'message', nativeId: '$e1', content: { kind: 'text', body: '' } },
      { type: 'redaction', nativeId: '$r1', targetNativeId: '$e1' },
    ])
  })

  it('keeps ciphertext opaque and notes the sending device', () => {
    expect(
      translateMatrixEvent(
        timeline({
          type: 'm.room.encrypted',
          content: {
            algorithm: 'm.megolm.v1.aes-sha2',
            session_id: 'session-1',
            ciphertext: 'opaque',
            sender_key: 'curve-key',
            device_id: 'ALICEDEV',
          },
        }),
        self,
      ),
    ).toEqual([
      {
        type: 'message',
        conversationNativeId: roomId,
        nativeId: '$e1',
        senderId: '@alice:test',
        timestamp: 1_000,
        transactionId: null,
        content: {
          kind: 'ciphertext',
          payload: {
            algorithm: 'm.megolm.v1.aes-sha2',
            roomId,
            sessionId: 'session-1',
            ciphertext: 'opaque',
            senderKey: 'curve-key',
            deviceId: 'ALICEDEV',
          },
        },
      },
      { type: 'device', userId: '@alice:test', deviceId: 'ALICEDEV' },
    ])
  })

  it('translates reactions and redactions', () => {
    expect(
      translateMatrixEvent(
        timeline({
          event_id: '$r1',
          type: 'm.reaction',
          content: { 'm.relates_to': { rel_type: 'm.annotation', event_id: '$e1', key: '👍' } },
        }),
        self,
      ),
    ).toEqual([
      {
        type: 'reaction',
        conversationNativeId: roomId,
        nativeId: '$r1',
        targetNativeId: '$e1',
        senderId: '@alice:test',
        key: '👍',
      },
    ])
    expect(
      translateMatrixEvent(timeline({ event_id: '$x1', type: 'm.room.redaction', redacts: '$r1', content: {} }), self),
    ).toEqual([{ type: 'redaction', conversationNativeId: roomId, nativeId: '$x1', targetNativeId: '$r1' }])
    expect(translateMatrixEvent(timeline({ type: 'm.sticker', content: {} }), self)).toEqual([])
  })

  it('translates typing and read receipts', () => {
    expect(
      translateMatrixEvent(
        { kind: 'ephemeral', roomId, event: { type: 'm.typing', content: { user_ids: ['@alice:test', 7] } } },
        self,
      ),
    ).toEqual([{ type: 'typing', conversationNativeId: roomId, started: ['@alice:test'], stopped: [], exhaustive: true }])

    expect(
      translateMatrixEvent(
        {
          kind: 'ephemeral',
          roomId,
          event: {
            type: 'm.receipt',
            content: {
              $e1: { 'm.read': { '@alice:test': { ts: 1 } }, 'm.read.private': { [self]: { ts: 2 } } },
            },
          },
        },
        self,
      ),
    ).toEqual([
      { type: 'receipt', conversationNativeId: roomId, userId: '@alice:test', upToNativeId: '$e1' },
      { type: 'receipt', conversationNativeId: roomId, userId: self, upToNativeId: '$e1' },
    ])
  })

  it('translates presence relative to now', () => {
    expect(
      translateMatrixEvent(
        { kind: 'presence', event: { type: 'm.presence', sender: '@alice:test', content: { presence: 'unavailable', last_active_ago: 5_000 } } },
        self,
        100_000,
      ),
    ).toEqual([{ type: 'presence', userId: '@alice:test', state: 'unavailable', lastActiveAt: 95_000 }])
  })

  it('extracts room keys from to-device events', () => {
    const content = { algorithm: 'm.megolm.v1.aes-sha2', room_id: roomId, session_id: 'session-1', session_key: 'test-key' }

    expect(translateMatrixEvent({ kind: 'to_device', event: { type: 'm.forwarded_room_key', content } }, self)).toEqual([
      {
        type: 'room_key',
        key: { algorithm: 'm.megolm.v1.aes-sha2', roomId, sessionId: 'session-1', sessionKey: 'test-key', senderKey: null },
      },
    ])
    expect(
      translateMatrixEvent({ kind: 'to_device', event: { type: 'm.room_key', content: { algorithm: 'x' } } }, self),
    ).toEqual([])
  })
})
