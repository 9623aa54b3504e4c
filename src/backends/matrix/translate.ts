import type { MatrixEvent, MatrixNativeEvent, MatrixSyncResponse } from '@/backends/matrix/types'
import type { ConversationUpdate, NormalizedEvent, PresenceState } from '@/types/backend'
import type { MessageFormat } from '@/types/chat'

const asString = (value: unknown): string | null =>
  typeof value === 'string' && value.length ? value : null

const asRecord = (value: unknown): Record<string, unknown> | null =>
  value && typeof value === 'object' && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : null

const formatForMsgtype = (msgtype: unknown): MessageFormat => {
  switch (msgtype) {
    case 'm.emote':
      return 'emote'
    case 'm.notice':
      return 'notice'
    default:
      return 'plain'
  }
}

/**
 * Splits a `/sync` response into stream units. To-device events come first so
 * room keys land before the ciphertext they unlock.
 */
export const flattenSyncResponse = (
  response: MatrixSyncResponse,
  initial: boolean,
): MatrixNativeEvent[] => {
  const events: MatrixNativeEvent[] = []

  for (const event of response.to_device?.events ?? []) {
    events.push({ kind: 'to_device', event })
  }

  for (const [roomId, room] of Object.entries(response.rooms?.join ?? {})) {
    events.push({
      kind: 'room',
      roomId,
      membership: 'joined',
      heroes: room.summary?.['m.heroes'] ?? [],
      unreadCount: initial ? (room.unread_notifications?.notification_count ?? 0) : null,
    })
    for (const event of room.state?.events ?? []) {
      events.push({ kind: 'state', roomId, event })
    }
    for (const event of room.timeline?.events ?? []) {
      events.push({ kind: 'timeline', roomId, event })
    }
    for (const event of room.ephemeral?.events ?? []) {
      events.push({ kind: 'ephemeral', roomId, event })
    }
  }

  for (const [roomId, room] of Object.entries(response.rooms?.invite ?? {})) {
    events.push({ kind: 'room', roomId, membership: 'invited', heroes: [], unreadCount: null })
    for (const event of room.invite_state?.events ?? []) {
      events.push({ kind: 'state', roomId, event })
    }
  }

  for (const [roomId, room] of Object.entries(response.rooms?.leave ?? {})) {
    events.push({ kind: 'room', roomId, membership: 'left', heroes: [], unreadCount: null })
    for (const event of room.timeline?.events ?? []) {
      events.push({ kind: 'timeline', roomId, event })
    }
  }

  for (const event of response.presence?.events ?? []) {
    events.push({ kind: 'presence', event })
  }

  return events
}

const conversation = (update: ConversationUpdate): NormalizedEvent => ({
  type: 'conversation',
  update,
})

const translateState = (roomId: string, event: MatrixEvent, selfUserId: string): NormalizedEvent[] => {
  const { content } = event

  switch (event.type) {
    case 'm.room.name': {
      const name = asString(content.name)
      return name ? [conversation({ nativeId: roomId, displayName: name })] : []
    }
    case 'm.room.encryption':
      return [conversation({ nativeId: roomId, encrypted: true })]
    case 'm.room.member': {
      const userId = event.state_key
      if (!userId) {
        return []
      }
      const membership = content.membership
      if (membership === 'join') {
        return [
          conversation({
            nativeId: roomId,
            participants: [
              {
                nativeId: userId,
                displayName: asString(content.displayname) ?? userId,
                avatarUrl: asString(content.avatar_url),
              },
            ],
            ...(userId === selfUserId ? { membership: 'joined' as const } : {}),
          }),
        ]
      }
      if (membership === 'invite' && userId === selfUserId) {
        return [conversation({ nativeId: roomId, membership: 'invited' })]
      }
      if (membership === 'leave' || membership === 'ban') {
        return [
          conversation({
            nativeId: roomId,
            removedParticipants: [userId],
            ...(userId === selfUserId ? { membership: 'left' as const } : {}),
          }),
        ]
      }
      return []
    }
    default:
      return []
  }
}

const translateTimeline = (roomId: string, event: MatrixEvent, selfUserId: string): NormalizedEvent[] => {
  const eventId = event.event_id
  const senderId = event.sender
  if (!eventId || !senderId) {
    return []
  }
  const timestamp = event.origin_server_ts ?? 0
  const { content } = event
  const relation = asRecord(content['m.relates_to'])

  switch (event.type) {
    case 'm.room.message': {
      const target = asString(relation?.event_id)
      if (relation?.rel_type === 'm.replace' && target) {
        const replacement = asRecord(content['m.new_content']) ?? content
        return [
          {
            type: 'edit',
            conversationNativeId: roomId,
            nativeId: eventId,
            targetNativeId: target,
            senderId,
            body: asString(replacement.body) ?? '',
            timestamp,
          },
        ]
      }

      const body = asString(content.body)
      const message: NormalizedEvent = {
        type: 'message',
        conversationNativeId: roomId,
        nativeId: eventId,
        senderId,
        timestamp,
        transactionId: event.unsigned?.transaction_id ?? null,
        content: { kind: 'text', body: body ?? '', format: formatForMsgtype(content.msgtype) },
      }
      const redactedBy = event.unsigned?.redacted_because
      if (body !== null || !redactedBy) {
        return [message]
      }
      return [
        message,
        {
          type: 'redaction',
          conversationNativeId: roomId,
          nativeId: redactedBy.event_id ?? `${eventId}:redaction`,
          targetNativeId: eventId,
        },
      ]
    }
    case 'm.room.encrypted': {
      const deviceId = asString(content.device_id)
      const events: NormalizedEvent[] = [
        {
          type: 'message',
          conversationNativeId: roomId,
          nativeId: eventId,
          senderId,
          timestamp,
          transactionId: event.unsigned?.transaction_id ?? null,
          content: {
            kind: 'ciphertext',
            payload: {
              algorithm: asString(content.algorithm) ?? 'unknown',
              roomId,
              sessionId: asString(content.session_id) ?? '',
              ciphertext: asString(content.ciphertext) ?? '',
              senderKey: asString(content.sender_key),
              deviceId,
            },
          },
        },
      ]
      if (deviceId) {
        events.push({ type: 'device', userId: senderId, deviceId })
      }
      return events
    }
    case 'm.reaction': {
      const target = asString(relation?.event_id)
      const key = asString(relation?.key)
      if (relation?.rel_type !== 'm.annotation' || !target || !key) {
        return []
      }
      return [
        {
          type: 'reaction',
          conversationNativeId: roomId,
          nativeId: eventId,
          targetNativeId: target,
          senderId,
          key,
        },
      ]
    }
    case 'm.room.redaction': {
      const target = event.redacts ?? asString(content.redacts)
      return target
        ? [{ type: 'redaction', conversationNativeId: roomId, nativeId: eventId, targetNativeId: target }]
        : []
    }
    default:
      return event.state_key !== undefined ? translateState(roomId, event, selfUserId) : []
  }
}

const translateEphemeral = (roomId: string, event: MatrixEvent): NormalizedEvent[] => {
  if (event.type === 'm.typing') {
    const userIds = Array.isArray(event.content.user_ids)
      ? event.content.user_ids.filter((value): value is string => typeof value === 'string')
      : []
    return [{ type: 'typing', conversationNativeId: roomId, started: userIds, stopped: [], exhaustive: true }]
  }

  if (event.type === 'm.receipt') {
    const receipts: NormalizedEvent[] = []
    for (const [eventId, byType] of Object.entries(event.content)) {
      const types = asRecord(byType)
      for (const receiptType of ['m.read', 'm.read.private']) {
        const readers = asRecord(types?.[receiptType])
        for (const userId of Object.keys(readers ?? {})) {
          receipts.push({ type: 'receipt', conversationNativeId: roomId, userId, upToNativeId: eventId })
        }
      }
    }
    return receipts
  }

  return []
}

const presenceStates: PresenceState[] = ['online', 'offline', 'unavailable']

const translatePresence = (event: MatrixEvent, now: number): NormalizedEvent[] => {
  if (event.type !== 'm.presence' || !event.sender) {
    return []
  }
  const raw = event.content.presence
  const state = presenceStates.find((candidate) => candidate === raw) ?? 'offline'
  const ago = event.content.last_active_ago
  return [
    {
      type: 'presence',
      userId: event.sender,
      state,
      lastActiveAt: typeof ago === 'number' ? now - ago : null,
    },
  ]
}

const translateToDevice = (event: MatrixEvent): NormalizedEvent[] => {
  if (event.type !== 'm.room_key' && event.type !== 'm.forwarded_room_key') {
    return []
  }
  const { content } = event
  const algorithm = asString(content.algorithm)
  const roomId = asString(content.room_id)
  const sessionId = asString(content.session_id)
  const sessionKey = asString(content.session_key)
  if (!algorithm || !roomId || !sessionId || !sessionKey) {
    return []
  }
  return [
    {
      type: 'room_key',
      key: { algorithm, roomId, sessionId, sessionKey, senderKey: asString(content.sender_key) },
    },
  ]
}

export const translateMatrixEvent = (
  native: MatrixNativeEvent,
  selfUserId: string,
  now: number = Date.now(),
): NormalizedEvent[] => {
  switch (native.kind) {
    case 'room':
      return [
        conversation({
          nativeId: native.roomId,
          membership: native.membership,
          ...(native.heroes.length ? { fallbackName: native.heroes.join(', ') } : {}),
          ...(native.unreadCount !== null ? { unreadCount: native.unreadCount } : {}),
        }),
      ]
    case 'state':
      return translateState(native.roomId, native.event, selfUserId)
    case 'timeline':
      return translateTimeline(native.roomId, native.event, selfUserId)
    case 'ephemeral':
      return translateEphemeral(native.roomId, native.event)
    case 'presence':
      return translatePresence(native.event, now)
    case 'to_device':
      return translateToDevice(native.event)
  }
}
