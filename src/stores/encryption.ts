import { defineStore } from 'pinia'
import { ref } from 'vue'

import { useAccountStore, type EncryptionMaterial } from '@/stores/accounts'
import { useConversationStore } from '@/stores/conversations'
import type { BackendAdapter, OutgoingContent, RoomKey } from '@/types/backend'
import type { AccountId, DeviceTrust, EncryptedPayload, MessageFormat } from '@/types/chat'
import { DecryptionFailedError, PermanentProtocolError, type DecryptionFailureReason } from '@/utils/errors'
import { SECRETBOX_ALGORITHM, getCipher } from '@/utils/roomKeys'
import { recordBreadcrumb } from '@/utils/telemetry'

export type PlainEvent =
  | { kind: 'text'; body: string; format: MessageFormat }
  | { kind: 'edit'; targetNativeId: string; body: string }

export type DecryptResult = { ok: true; plain: PlainEvent } | { ok: false; reason: DecryptionFailureReason }

const FORMAT_BY_MSGTYPE: Record<string, MessageFormat> = {
  'm.text': 'plain',
  'm.emote': 'emote',
  'm.notice': 'notice',
}

const MSGTYPE_BY_FORMAT: Record<MessageFormat, string> = {
  plain: 'm.text',
  emote: 'm.emote',
  notice: 'm.notice',
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value)

/**
 * The cleartext of an encrypted room event: `{ type, content }` as JSON.
 * With `replaces` the event edits that message.
 */
export const encodePlaintext = (content: OutgoingContent, replaces?: string) => {
  const msgtype = MSGTYPE_BY_FORMAT[content.format]
  if (!replaces) {
    return JSON.stringify({ type: 'm.room.message', content: { msgtype, body: content.body } })
  }
  return JSON.stringify({
    type: 'm.room.message',
    content: {
      msgtype,
      body: `* ${content.body}`,
      'm.new_content': { msgtype, body: content.body },
      'm.relates_to': { rel_type: 'm.replace', event_id: replaces },
    },
  })
}

export const decodePlaintext = (plaintext: string): PlainEvent => {
  let parsed: unknown
  try {
    parsed = JSON.parse(plaintext)
  } catch {
    throw new DecryptionFailedError('bad_ciphertext', 'Decrypted payload is not JSON')
  }
  if (!isRecord(parsed) || parsed.type !== 'm.room.message' || !isRecord(parsed.content)) {
    throw new DecryptionFailedError('bad_ciphertext', 'Decrypted payload is not a room message')
  }

  const { content } = parsed
  const relation = content['m.relates_to']
  const replacement = content['m.new_content']
  if (
    isRecord(relation) &&
    relation.rel_type === 'm.replace' &&
    typeof relation.event_id === 'string' &&
    isRecord(replacement) &&
    typeof replacement.body === 'string'
  ) {
    return { kind: 'edit', targetNativeId: relation.event_id, body: replacement.body }
  }

  if (typeof content.body !== 'string') {
    throw new DecryptionFailedError('bad_ciphertext', 'Decrypted message has no body')
  }
  const msgtype = typeof content.msgtype === 'string' ? content.msgtype : 'm.text'
  return { kind: 'text', body: content.body, format: FORMAT_BY_MSGTYPE[msgtype] ?? 'plain' }
}

interface AccountKeys {
  inbound: Map<string, RoomKey>
  outbound: Map<string, string>
  trust: Map<string, Map<string, DeviceTrust>>
}

export const useEncryptionStore = defineStore('encryption', () => {
  const accountStore = useAccountStore()
  const conversationStore = useConversationStore()

  const keys = new Map<AccountId, AccountKeys>()
  const requestedSessions = new Set<string>()
  const lastRekeyAt = ref<Record<string, number>>({})

  const keysFor = (accountId: AccountId): AccountKeys => {
    const existing = keys.get(accountId)
    if (existing) {
      return existing
    }

    const material = accountStore.loadEncryption(accountId)
    const loaded: AccountKeys = {
      inbound: new Map(material.roomKeys.map((key) => [key.sessionId, key] as const)),
      outbound: new Map(Object.entries(material.outboundSessions)),
      trust: new Map(
        Object.entries(material.deviceTrust).map(
          ([userId, devices]) => [userId, new Map(Object.entries(devices))] as const,
        ),
      ),
    }
    keys.set(accountId, loaded)
    return loaded
  }

  const persist = (accountId: AccountId) => {
    const state = keysFor(accountId)
    const material: EncryptionMaterial = {
      roomKeys: [...state.inbound.values()],
      outboundSessions: Object.fromEntries(state.outbound),
      deviceTrust: Object.fromEntries(
        [...state.trust].map(([userId, devices]) => [userId, Object.fromEntries(devices)] as const),
      ),
    }
    accountStore.saveEncryption(accountId, material)
  }

  /** Replays persisted trust onto participants. */
  const load = (accountId: AccountId) => {
    const state = keysFor(accountId)
    for (const [userId, devices] of state.trust) {
      for (const [deviceId, trust] of devices) {
        conversationStore.recordDevice(accountId, userId, deviceId, trust)
      }
    }
  }

  const decrypt = (accountId: AccountId, payload: EncryptedPayload): DecryptResult => {
    const cipher = getCipher(payload.algorithm)
    if (!cipher) {
      return { ok: false, reason: 'unsupported_algorithm' }
    }
    const key = keysFor(accountId).inbound.get(payload.sessionId)
    if (!key || key.roomId !== payload.roomId) {
      return { ok: false, reason: 'missing_key' }
    }

    try {
      return { ok: true, plain: decodePlaintext(cipher.decrypt(key, payload.ciphertext)) }
    } catch (err) {
      if (err instanceof DecryptionFailedError) {
        return { ok: false, reason: err.reason }
      }
      throw err
    }
  }

  /**
   * Stores an incoming room key. Returns its session id when the key is new
   * so undecrypted messages of that session can be retried.
   */
  const addRoomKey = (accountId: AccountId, key: RoomKey): string | null => {
    const state = keysFor(accountId)
    const existing = state.inbound.get(key.sessionId)
    if (existing && existing.sessionKey === key.sessionKey && existing.roomId === key.roomId) {
      return null
    }
    state.inbound.set(key.sessionId, { ...key })
    requestedSessions.delete(`${accountId}|${key.sessionId}`)
    persist(accountId)
    recordBreadcrumb({
      message: 'Room key received',
      category: 'crypto',
      data: { accountId, roomId: key.roomId, algorithm: key.algorithm },
    })
    return key.sessionId
  }

  const requireEncryption = (adapter: BackendAdapter) => {
    if (!adapter.encryption) {
      throw new PermanentProtocolError(`${adapter.backend} does not support end-to-end encryption`)
    }
    return adapter.encryption
  }

  /** Starts a fresh outbound session for the room and shares its key with the members. */
  const rekey = async (accountId: AccountId, adapter: BackendAdapter, roomId: string, signal: AbortSignal) => {
    const encryption = requireEncryption(adapter)
    const cipher = getCipher(SECRETBOX_ALGORITHM)
    if (!cipher) {
      throw new PermanentProtocolError(`Cipher ${SECRETBOX_ALGORITHM} is not registered`)
    }

    const key = cipher.generateKey(roomId)
    await encryption.shareRoomKey(roomId, key, signal)

    const state = keysFor(accountId)
    state.inbound.set(key.sessionId, key)
    state.outbound.set(roomId, key.sessionId)
    persist(accountId)
    lastRekeyAt.value = { ...lastRekeyAt.value, [`${accountId}|${roomId}`]: Date.now() }
    return key.sessionId
  }

  const encrypt = async (
    accountId: AccountId,
    adapter: BackendAdapter,
    roomId: string,
    content: OutgoingContent,
    signal: AbortSignal,
    replaces?: string,
  ): Promise<EncryptedPayload> => {
    const state = keysFor(accountId)
    const current = state.outbound.get(roomId)
    const sessionId = current && state.inbound.has(current) ? current : await rekey(accountId, adapter, roomId, signal)
    const key = state.inbound.get(sessionId)
    const cipher = key ? getCipher(key.algorithm) : null
    if (!key || !cipher) {
      throw new PermanentProtocolError(`No usable outbound session for ${roomId}`)
    }
    return {
      algorithm: key.algorithm,
      roomId,
      sessionId,
      ciphertext: cipher.encrypt(key, encodePlaintext(content, replaces)),
    }
  }

  /** Asks the sender's devices for a missing key, once per session. */
  const requestRoomKey = async (
    accountId: AccountId,
    adapter: BackendAdapter,
    payload: EncryptedPayload,
    signal: AbortSignal,
  ) => {
    const marker = `${accountId}|${payload.sessionId}`
    if (!adapter.encryption || requestedSessions.has(marker)) {
      return false
    }
    requestedSessions.add(marker)
    try {
      await adapter.encryption.requestRoomKey(payload, signal)
      return true
    } catch (err) {
      requestedSessions.delete(marker)
      throw err
    }
  }

  /** Advisory only: trust never gates decryption or display. */
  const verifyDevice = (accountId: AccountId, userId: string, deviceId: string, trust: DeviceTrust = 'verified') => {
    const state = keysFor(accountId)
    const devices = state.trust.get(userId) ?? new Map<string, DeviceTrust>()
    devices.set(deviceId, trust)
    state.trust.set(userId, devices)
    persist(accountId)
    conversationStore.recordDevice(accountId, userId, deviceId, trust)
  }

  const trustOf = (accountId: AccountId, userId: string, deviceId: string): DeviceTrust =>
    keysFor(accountId).trust.get(userId)?.get(deviceId) ?? 'unverified'

  const hasRoomKey = (accountId: AccountId, sessionId: string) => keysFor(accountId).inbound.has(sessionId)

  const forget = (accountId: AccountId) => {
    keys.delete(accountId)
    for (const marker of [...requestedSessions]) {
      if (marker.startsWith(`${accountId}|`)) {
        requestedSessions.delete(marker)
      }
    }
  }

  return {
    lastRekeyAt,
    load,
    decrypt,
    addRoomKey,
    encrypt,
    rekey,
    requestRoomKey,
    verifyDevice,
    trustOf,
    hasRoomKey,
    forget,
  }
})
