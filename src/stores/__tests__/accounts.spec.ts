import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createPinia, setActivePinia } from 'pinia'

import type { MatrixSessionData } from '@/types/backend'
import { createMemoryStorage, setStorageAdapter, type StorageAdapter } from '@/utils/storage'

import { useAccountStore } from '../accounts'

const session: MatrixSessionData = {
  backend: 'matrix',
  homeserver: 'https://matrix.test',
  userId: '@me:test',
  deviceId: 'DEVICE',
  accessToken: 'test-token',
}
const profile = { userId: '@me:test', displayName: 'Me', avatarUrl: null }

describe('account store', () => {
  let storage: StorageAdapter

  beforeEach(() => {
    setActivePinia(createPinia())
    storage = createMemoryStorage()
    setStorageAdapter(storage)
    vi.restoreAllMocks()
  })

  afterEach(() => {
    setStorageAdapter(null)
    vi.restoreAllMocks()
  })

  it('persists accounts and restores them in a new session', () => {
    const accountId = useAccountStore().upsertAccount(session, profile)
    expect(accountId).toBe('matrix:@me:test')

    setActivePinia(createPinia())
    const restored = useAccountStore().hydrate()

    expect(restored).toHaveLength(1)
    expect(restored[0]).toMatchObject({ id: 'matrix:@me:test', backend: 'matrix', session, profile })
  })

  it('keeps fields it does not know about when rewriting the document', () => {
    storage.setItem(
      'unichat.accounts',
      JSON.stringify({
        schemaVersion: 2,
        extra: 'keep',
        accounts: [
          { id: 'matrix:@me:test', session, profile, addedAt: 10, pinnedColor: 'teal' },
          { session: { backend: 'matrix' } },
        ],
      }),
    )
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const store = useAccountStore()

    expect(store.hydrate().map((account) => account.id)).toEqual(['matrix:@me:test'])
    expect(warn).toHaveBeenCalledTimes(1)

    store.updateProfile('matrix:@me:test', { ...profile, displayName: 'Renamed' })

    expect(JSON.parse(storage.getItem('unichat.accounts') ?? '{}')).toMatchObject({
      schemaVersion: 2,
      extra: 'keep',
      accounts: [{ id: 'matrix:@me:test', addedAt: 10, pinnedColor: 'teal', profile: { displayName: 'Renamed' } }],
    })
  })

  it('stores the sync cursor per account', () => {
    const store = useAccountStore()

    expect(store.loadCursor('matrix:@me:test')).toBeNull()
    store.saveCursor('matrix:@me:test', 's42')

    expect(store.loadCursor('matrix:@me:test')).toBe('s42')
    expect(store.loadCursor('telegram:777')).toBeNull()
  })

  it('drops cursor and key material with the account', () => {
    const store = useAccountStore()
    const accountId = store.upsertAccount(session, profile)
    store.saveCursor(accountId, 's1')
    store.saveEncryption(accountId, {
      roomKeys: [{ algorithm: 'test.alg', roomId: '!room:test', sessionId: 'session-1', sessionKey: 'test-key' }],
      outboundSessions: { '!room:test': 'session-1' },
      deviceTrust: { '@bob:test': { BOBDEV: 'verified' } },
    })
    expect(store.loadEncryption(accountId).roomKeys).toHaveLength(1)

    store.removeAccount(accountId)

    expect(store.accounts).toEqual([])
    expect(store.loadCursor(accountId)).toBeNull()
    expect(storage.getItem(`unichat.crypto.${accountId}`)).toBeNull()
    expect(store.loadEncryption(accountId)).toEqual({ roomKeys: [], outboundSessions: {}, deviceTrust: {} })
  })

  it('ignores malformed key material entries', () => {
    storage.setItem(
      'unichat.crypto.matrix:@me:test',
      JSON.stringify({
        schemaVersion: 1,
        roomKeys: [{ algorithm: 'test.alg' }, { algorithm: 'test.alg', roomId: '!r:test', sessionId: 's', sessionKey: 'k' }],
        deviceTrust: { '@bob:test': { GOOD: 'blocked', BAD: 'maybe' } },
      }),
    )

    expect(useAccountStore().loadEncryption('matrix:@me:test')).toEqual({
      roomKeys: [{ algorithm: 'test.alg', roomId: '!r:test', sessionId: 's', sessionKey: 'k', senderKey: null }],
      outboundSessions: {},
      deviceTrust: { '@bob:test': { GOOD: 'blocked' } },
    })
  })
})
