import {
  createMatrixHttpClient,
  encodeSegment,
  normalizeHomeserver,
  type MatrixHttpClient,
} from '@/backends/matrix/api'
import { flattenSyncResponse, translateMatrixEvent } from '@/backends/matrix/translate'
import type {
  MatrixJoinedMembersResponse,
  MatrixLoginResponse,
  MatrixMessagesResponse,
  MatrixNativeEvent,
  MatrixProfileResponse,
  MatrixSyncResponse,
  MatrixWhoAmIResponse,
} from '@/backends/matrix/types'
import { getRuntimeConfig } from '@/config/runtime'
import type {
  AccountProfile,
  BackendAdapter,
  EncryptionCapability,
  HistoryPage,
  LoginRequest,
  MatrixSessionData,
  OutgoingContent,
  SessionData,
  SyncBatch,
} from '@/types/backend'
import type { EncryptedPayload, MessageFormat } from '@/types/chat'
import { AuthError, PermanentProtocolError, classifyHttpError, extractErrorMessage } from '@/utils/errors'
import { recordNetworkBreadcrumb } from '@/utils/telemetry'

const MSGTYPES: Record<MessageFormat, string> = {
  plain: 'm.text',
  emote: 'm.emote',
  notice: 'm.notice',
}

const TYPING_TIMEOUT_MS = 30_000

export type MatrixAdapter = BackendAdapter<MatrixNativeEvent> & { encryption: EncryptionCapability }

export const createMatrixAdapter = (): MatrixAdapter => {
  let session: MatrixSessionData | null = null
  let http: MatrixHttpClient | null = null
  let cursor: string | null = null
  let streamOpened = false
  let toDeviceCounter = 0
  const prevBatchByRoom = new Map<string, string>()

  const connected = () => {
    if (!session || !http) {
      throw new AuthError('Matrix account is not connected')
    }
    return { session, http }
  }

  const request = async <T>(
    run: (client: MatrixHttpClient) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> => {
    const { http: client } = connected()
    try {
      return await run(client)
    } catch (err) {
      throw classifyHttpError(err, { signal })
    }
  }

  const nextToDeviceTxn = () => `td-${Date.now()}-${++toDeviceCounter}`

  const sendRoomEvent = async (
    roomId: string,
    eventType: string,
    transactionId: string,
    content: Record<string, unknown>,
    signal: AbortSignal,
  ) => {
    const response = await request(
      (client) =>
        client<{ event_id: string }>(
          `/rooms/${encodeSegment(roomId)}/send/${encodeSegment(eventType)}/${encodeSegment(transactionId)}`,
          { method: 'PUT', body: content, signal },
        ),
      signal,
    )
    if (!response?.event_id) {
      throw new PermanentProtocolError(`Homeserver did not return an event id for ${eventType}`)
    }
    return response.event_id
  }

  const fetchProfile = async (
    client: MatrixHttpClient,
    userId: string,
    signal?: AbortSignal,
  ): Promise<AccountProfile> => {
    try {
      const profile = await client<MatrixProfileResponse>(`/profile/${encodeSegment(userId)}`, {
        signal,
      })
      return {
        userId,
        displayName: profile.displayname || userId,
        avatarUrl: profile.avatar_url ?? null,
      }
    } catch (err) {
      console.warn('Unable to load Matrix profile', extractErrorMessage(err))
      return { userId, displayName: userId, avatarUrl: null }
    }
  }

  async function* syncStream(signal: AbortSignal): AsyncGenerator<SyncBatch<MatrixNativeEvent>> {
    let since = cursor
    const { longPollTimeoutMs } = getRuntimeConfig().sync

    while (!signal.aborted) {
      const query: Record<string, string | number> = since
        ? { since, timeout: longPollTimeoutMs }
        : { timeout: 0 }
      const response = await request(
        (client) => client<MatrixSyncResponse>('/sync', { query, signal }),
        signal,
      )

      for (const [roomId, room] of Object.entries(response.rooms?.join ?? {})) {
        const prevBatch = room.timeline?.prev_batch
        if (prevBatch && !prevBatchByRoom.has(roomId)) {
          prevBatchByRoom.set(roomId, prevBatch)
        }
      }

      const events = flattenSyncResponse(response, since === null)
      since = response.next_batch
      cursor = since
      yield { events, cursor: response.next_batch }
    }
  }

  async function* historyStream(
    roomId: string,
    before: string | null,
    limit: number,
    signal: AbortSignal,
  ): AsyncGenerator<HistoryPage<MatrixNativeEvent>> {
    let from = before ?? prevBatchByRoom.get(roomId) ?? null

    while (!signal.aborted) {
      const query: Record<string, string | number> = { dir: 'b', limit }
      if (from) {
        query.from = from
      }
      const page = await request(
        (client) =>
          client<MatrixMessagesResponse>(`/rooms/${encodeSegment(roomId)}/messages`, {
            query,
            signal,
          }),
        signal,
      )
      const nextToken = page.chunk.length && page.end ? page.end : null
      yield {
        events: page.chunk.map((event) => ({ kind: 'timeline' as const, roomId, event })),
        nextToken,
      }
      if (!nextToken) {
        return
      }
      from = nextToken
    }
  }

  const encryption: EncryptionCapability = {
    async sendEncrypted(roomId: string, payload: EncryptedPayload, transactionId: string, signal: AbortSignal) {
      const { session: active } = connected()
      return sendRoomEvent(
        roomId,
        'm.room.encrypted',
        transactionId,
        {
          algorithm: payload.algorithm,
          ciphertext: payload.ciphertext,
          session_id: payload.sessionId,
          sender_key: payload.senderKey ?? active.deviceId,
          device_id: active.deviceId,
        },
        signal,
      )
    },

    async shareRoomKey(roomId, key, signal) {
      const members = await request(
        (client) =>
          client<MatrixJoinedMembersResponse>(`/rooms/${encodeSegment(roomId)}/joined_members`, {
            signal,
          }),
        signal,
      )
      const content = {
        algorithm: key.algorithm,
        room_id: key.roomId,
        session_id: key.sessionId,
        session_key: key.sessionKey,
      }
      const messages = Object.fromEntries(
        Object.keys(members.joined ?? {}).map((userId) => [userId, { '*': content }]),
      )
      await request(
        (client) =>
          client(`/sendToDevice/m.room_key/${encodeSegment(nextToDeviceTxn())}`, {
            method: 'PUT',
            body: { messages },
            signal,
          }),
        signal,
      )
      recordNetworkBreadcrumb('sync', {
        message: 'Shared room key',
        data: { roomId, sessionId: key.sessionId, recipients: Object.keys(messages).length },
      })
    },

    async requestRoomKey(payload, signal) {
      const { session: active } = connected()
      const requestId = nextToDeviceTxn()
      await request(
        (client) =>
          client(`/sendToDevice/m.room_key_request/${encodeSegment(requestId)}`, {
            method: 'PUT',
            body: {
              messages: {
                [active.userId]: {
                  '*': {
                    action: 'request',
                    request_id: requestId,
                    requesting_device_id: active.deviceId,
                    body: {
                      algorithm: payload.algorithm,
                      room_id: payload.roomId,
                      session_id: payload.sessionId,
                      sender_key: payload.senderKey ?? null,
                    },
                  },
                },
              },
            },
            signal,
          }),
        signal,
      )
    },
  }

  return {
    backend: 'matrix',
    encryption,

    async login(loginRequest: LoginRequest, signal?: AbortSignal) {
      if (loginRequest.backend !== 'matrix') {
        throw new PermanentProtocolError('Matrix adapter cannot handle a Telegram login')
      }
      const anonymous = createMatrixHttpClient(loginRequest.homeserver, () => null)
      let response: MatrixLoginResponse
      try {
        response = await anonymous<MatrixLoginResponse>('/login', {
          method: 'POST',
          body: {
            type: 'm.login.password',
            identifier: { type: 'm.id.user', user: loginRequest.username },
            password: loginRequest.password,
            initial_device_display_name: loginRequest.deviceName ?? 'unichat',
          },
          signal,
        })
      } catch (err) {
        throw classifyHttpError(err, { signal, forbiddenIsAuth: true })
      }

      const homeserver = normalizeHomeserver(
        response.well_known?.['m.homeserver']?.base_url ?? loginRequest.homeserver,
      )
      const nextSession: MatrixSessionData = {
        backend: 'matrix',
        homeserver,
        userId: response.user_id,
        deviceId: response.device_id,
        accessToken: response.access_token,
      }
      const authed = createMatrixHttpClient(homeserver, () => nextSession.accessToken)
      const profile = await fetchProfile(authed, nextSession.userId, signal)

      recordNetworkBreadcrumb('api', {
        message: 'Matrix login succeeded',
        data: { homeserver, userId: nextSession.userId, deviceId: nextSession.deviceId },
      })
      return { session: nextSession, profile }
    },

    async connect(stored: SessionData, signal: AbortSignal) {
      if (stored.backend !== 'matrix') {
        throw new PermanentProtocolError('Matrix adapter cannot resume a Telegram session')
      }
      const client = createMatrixHttpClient(stored.homeserver, () => stored.accessToken)
      let whoami: MatrixWhoAmIResponse
      try {
        whoami = await client<MatrixWhoAmIResponse>('/account/whoami', { signal })
      } catch (err) {
        throw classifyHttpError(err, { signal })
      }
      if (whoami.user_id !== stored.userId) {
        throw new AuthError(`Access token belongs to ${whoami.user_id}, expected ${stored.userId}`)
      }

      session = stored
      http = client
      return fetchProfile(client, stored.userId, signal)
    },

    resume(next) {
      cursor = next
      streamOpened = false
    },

    streamEvents(signal) {
      if (streamOpened) {
        throw new PermanentProtocolError('Matrix event stream already opened; resume() first')
      }
      streamOpened = true
      return syncStream(signal)
    },

    translate(native) {
      return translateMatrixEvent(native, session?.userId ?? '')
    },

    async listConversations(signal) {
      const response = await request(
        (client) => client<{ joined_rooms: string[] }>('/joined_rooms', { signal }),
        signal,
      )
      return (response.joined_rooms ?? []).map((roomId) => ({
        nativeId: roomId,
        membership: 'joined' as const,
      }))
    },

    fetchHistory(roomId, before, limit, signal) {
      return historyStream(roomId, before, limit, signal)
    },

    send(roomId, content: OutgoingContent, transactionId, signal) {
      return sendRoomEvent(
        roomId,
        'm.room.message',
        transactionId,
        { msgtype: MSGTYPES[content.format], body: content.body },
        signal,
      )
    },

    edit(roomId, targetNativeId, body, transactionId, signal) {
      return sendRoomEvent(
        roomId,
        'm.room.message',
        transactionId,
        {
          msgtype: 'm.text',
          body: `* ${body}`,
          'm.new_content': { msgtype: 'm.text', body },
          'm.relates_to': { rel_type: 'm.replace', event_id: targetNativeId },
        },
        signal,
      )
    },

    react(roomId, targetNativeId, key, transactionId, signal) {
      return sendRoomEvent(
        roomId,
        'm.reaction',
        transactionId,
        { 'm.relates_to': { rel_type: 'm.annotation', event_id: targetNativeId, key } },
        signal,
      )
    },

    async redact(roomId, targetNativeId, transactionId, signal) {
      await request(
        (client) =>
          client(
            `/rooms/${encodeSegment(roomId)}/redact/${encodeSegment(targetNativeId)}/${encodeSegment(transactionId)}`,
            { method: 'PUT', body: {}, signal },
          ),
        signal,
      )
    },

    async markRead(roomId, upToNativeId, signal) {
      if (!upToNativeId) {
        return
      }
      await request(
        (client) =>
          client(
            `/rooms/${encodeSegment(roomId)}/receipt/m.read/${encodeSegment(upToNativeId)}`,
            { method: 'POST', body: {}, signal },
          ),
        signal,
      )
    },

    async setTyping(roomId, typing, signal) {
      const { session: active } = connected()
      await request(
        (client) =>
          client(`/rooms/${encodeSegment(roomId)}/typing/${encodeSegment(active.userId)}`, {
            method: 'PUT',
            body: typing ? { typing: true, timeout: TYPING_TIMEOUT_MS } : { typing: false },
            signal,
          }),
        signal,
      )
    },

    currentSession() {
      return session
    },

    async disconnect() {
      streamOpened = false
    },

    async logout(signal) {
      await request((client) => client('/logout', { method: 'POST', body: {}, signal }), signal)
      session = null
      http = null
      cursor = null
      streamOpened = false
      prevBatchByRoom.clear()
    },
  }
}
