import { defineStore } from 'pinia'
import { computed, ref } from 'vue'

import type { AccountProfile, RoomKey, SessionData } from '@/types/backend'
import { accountIdFor, type AccountId, type BackendKind, type DeviceTrust } from '@/types/chat'
import { readVersioned, writeVersioned, getStorage, type VersionedRecord } from '@/utils/storage'

const ACCOUNTS_KEY = 'unichat.accounts'
const SCHEMA_VERSION = 1

const cursorKey = (accountId: AccountId) => `unichat.cursor.${accountId}`
const cryptoKey = (accountId: AccountId) => `unichat.crypto.${accountId}`

export interface StoredAccount {
  id: AccountId
  backend: BackendKind
  profile: AccountProfile
  session: SessionData
  addedAt: number
}

export interface EncryptionMaterial {
  roomKeys: RoomKey[]
  /** roomId -> session id of the key used for outgoing messages. */
  outboundSessions: Record<string, string>
  /** userId -> deviceId -> trust. */
  deviceTrust: Record<string, Record<string, DeviceTrust>>
}

const emptyMaterial = (): EncryptionMaterial => ({
  roomKeys: [],
  outboundSessions: {},
  deviceTrust: {},
})

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value)

const readString = (value: unknown): string | null => (typeof value === 'string' && value.length ? value : null)

const sanitizeSession = (value: unknown): SessionData | null => {
  if (!isRecord(value)) {
    return null
  }

  if (value.backend === 'matrix') {
    const homeserver = readString(value.homeserver)
    const userId = readString(value.userId)
    const deviceId = readString(value.deviceId)
    const accessToken = readString(value.accessToken)
    if (!homeserver || !userId || !deviceId || !accessToken) {
      return null
    }
    return { backend: 'matrix', homeserver, userId, deviceId, accessToken }
  }

  if (value.backend === 'telegram') {
    const userId = readString(value.userId)
    const apiHash = readString(value.apiHash)
    const session = readString(value.session)
    const apiId = typeof value.apiId === 'number' ? value.apiId : null
    if (!userId || !apiHash || !session || apiId === null) {
      return null
    }
    return { backend: 'telegram', apiId, apiHash, userId, session }
  }

  return null
}

const sanitizeProfile = (value: unknown, fallbackUserId: string): AccountProfile => {
  const profile = isRecord(value) ? value : {}
  return {
    userId: readString(profile.userId) ?? fallbackUserId,
    displayName: readString(profile.displayName) ?? fallbackUserId,
    avatarUrl: readString(profile.avatarUrl),
  }
}

const sanitizeRoomKey = (value: unknown): RoomKey | null => {
  if (!isRecord(value)) {
    return null
  }
  const algorithm = readString(value.algorithm)
  const roomId = readString(value.roomId)
  const sessionId = readString(value.sessionId)
  const sessionKey = readString(value.sessionKey)
  if (!algorithm || !roomId || !sessionId || !sessionKey) {
    return null
  }
  return { algorithm, roomId, sessionId, sessionKey, senderKey: readString(value.senderKey) }
}

const isTrust = (value: unknown): value is DeviceTrust =>
  value === 'verified' || value === 'unverified' || value === 'blocked'

const sanitizeMaterial = (record: VersionedRecord | null): EncryptionMaterial => {
  if (!record) {
    return emptyMaterial()
  }

  const roomKeys: RoomKey[] = []
  if (Array.isArray(record.roomKeys)) {
    for (const entry of record.roomKeys) {
      const key = sanitizeRoomKey(entry)
      if (key) {
        roomKeys.push(key)
      }
    }
  }

  const outboundSessions: Record<string, string> = {}
  if (isRecord(record.outboundSessions)) {
    for (const [roomId, sessionId] of Object.entries(record.outboundSessions)) {
      if (typeof sessionId === 'string') {
        outboundSessions[roomId] = sessionId
      }
    }
  }

  const deviceTrust: Record<string, Record<string, DeviceTrust>> = {}
  if (isRecord(record.deviceTrust)) {
    for (const [userId, devices] of Object.entries(record.deviceTrust)) {
      if (!isRecord(devices)) {
        continue
      }
      const trusted: Record<string, DeviceTrust> = {}
      for (const [deviceId, trust] of Object.entries(devices)) {
        if (isTrust(trust)) {
          trusted[deviceId] = trust
        }
      }
      deviceTrust[userId] = trusted
    }
  }

  return { roomKeys, outboundSessions, deviceTrust }
}

export const useAccountStore = defineStore('accounts', () => {
  const accounts = ref<StoredAccount[]>([])
  const hydrated = ref(false)
  // Raw persisted entries keep fields this schema does not know about.
  const rawEntries = new Map<AccountId, Record<string, unknown>>()
  let document: VersionedRecord | null = null

  const accountIds = computed(() => accounts.value.map((account) => account.id))

  const persist = () => {
    const entries = accounts.value.map((account) => ({
      ...(rawEntries.get(account.id) ?? {}),
      id: account.id,
      backend: account.backend,
      profile: account.profile,
      session: account.session,
      addedAt: account.addedAt,
    }))
    writeVersioned(ACCOUNTS_KEY, SCHEMA_VERSION, { accounts: entries }, document)
    document = readVersioned(ACCOUNTS_KEY)
  }

  const hydrate = () => {
    document = readVersioned(ACCOUNTS_KEY)
    rawEntries.clear()
    const restored: StoredAccount[] = []

    const entries = document && Array.isArray(document.accounts) ? document.accounts : []
    for (const entry of entries) {
      if (!isRecord(entry)) {
        continue
      }
      const session = sanitizeSession(entry.session)
      if (!session) {
        console.warn('Skipping stored account with unusable session material')
        continue
      }
      const id = accountIdFor(session.backend, session.userId)
      rawEntries.set(id, entry)
      restored.push({
        id,
        backend: session.backend,
        profile: sanitizeProfile(entry.profile, session.userId),
        session,
        addedAt: typeof entry.addedAt === 'number' ? entry.addedAt : Date.now(),
      })
    }

    accounts.value = restored
    hydrated.value = true
    return restored
  }

  const getAccount = (accountId: AccountId) =>
    accounts.value.find((account) => account.id === accountId) ?? null

  const upsertAccount = (session: SessionData, profile: AccountProfile): AccountId => {
    const id = accountIdFor(session.backend, session.userId)
    const existing = getAccount(id)
    const next: StoredAccount = {
      id,
      backend: session.backend,
      profile,
      session,
      addedAt: existing?.addedAt ?? Date.now(),
    }
    accounts.value = existing
      ? accounts.value.map((account) => (account.id === id ? next : account))
      : [...accounts.value, next]
    persist()
    return id
  }

  const updateSession = (accountId: AccountId, session: SessionData) => {
    const existing = getAccount(accountId)
    if (!existing || JSON.stringify(existing.session) === JSON.stringify(session)) {
      return
    }
    accounts.value = accounts.value.map((account) =>
      account.id === accountId ? { ...account, session } : account,
    )
    persist()
  }

  const updateProfile = (accountId: AccountId, profile: AccountProfile) => {
    if (!getAccount(accountId)) {
      return
    }
    accounts.value = accounts.value.map((account) =>
      account.id === accountId ? { ...account, profile } : account,
    )
    persist()
  }

  const loadCursor = (accountId: AccountId): string | null => {
    const record = readVersioned(cursorKey(accountId))
    return record && typeof record.cursor === 'string' ? record.cursor : null
  }

  const saveCursor = (accountId: AccountId, cursor: string | null) => {
    const key = cursorKey(accountId)
    writeVersioned(key, SCHEMA_VERSION, { cursor, savedAt: Date.now() }, readVersioned(key))
  }

  const loadEncryption = (accountId: AccountId): EncryptionMaterial =>
    sanitizeMaterial(readVersioned(cryptoKey(accountId)))

  const saveEncryption = (accountId: AccountId, material: EncryptionMaterial) => {
    const key = cryptoKey(accountId)
    writeVersioned(
      key,
      SCHEMA_VERSION,
      {
        roomKeys: material.roomKeys,
        outboundSessions: material.outboundSessions,
        deviceTrust: material.deviceTrust,
      },
      readVersioned(key),
    )
  }

  /** Drops the account together with its cursor and key material. */
  const removeAccount = (accountId: AccountId) => {
    accounts.value = accounts.value.filter((account) => account.id !== accountId)
    rawEntries.delete(accountId)
    persist()
    const storage = getStorage()
    storage.removeItem(cursorKey(accountId))
    storage.removeItem(cryptoKey(accountId))
  }

  return {
    accounts,
    accountIds,
    hydrated,
    hydrate,
    getAccount,
    upsertAccount,
    updateSession,
    updateProfile,
    loadCursor,
    saveCursor,
    loadEncryption,
    saveEncryption,
    removeAccount,
  }
})
