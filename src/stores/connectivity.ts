import { defineStore } from 'pinia'
import { computed, ref } from 'vue'

import type { AccountId } from '@/types/chat'

export type SyncState = 'disconnected' | 'connecting' | 'syncing' | 'backoff'

export interface AccountStatus {
  state: SyncState
  attempt: number
  lastError: string | null
  needsRelogin: boolean
  lastSyncedAt: number | null
  nextRetryAt: number | null
}

const idleStatus = (): AccountStatus => ({
  state: 'disconnected',
  attempt: 0,
  lastError: null,
  needsRelogin: false,
  lastSyncedAt: null,
  nextRetryAt: null,
})

export const useConnectivityStore = defineStore('connectivity', () => {
  const online = ref(true)
  const degradedMessage = ref<string | null>(null)
  const lastOfflineAt = ref<number | null>(null)
  const lastOnlineAt = ref<number | null>(Date.now())
  const accounts = ref<Record<AccountId, AccountStatus>>({})

  const isDegraded = computed(() => !online.value || Boolean(degradedMessage.value))
  const status = computed<'online' | 'offline' | 'degraded'>(() => {
    if (!online.value) {
      return 'offline'
    }
    if (degradedMessage.value) {
      return 'degraded'
    }
    return 'online'
  })

  const lastChangeAt = computed(() => {
    if (!online.value) {
      return lastOfflineAt.value
    }
    return lastOnlineAt.value
  })

  /** The host reports network reachability; there is no browser to listen to. */
  const updateOnline = (nextOnline: boolean) => {
    if (online.value === nextOnline) {
      return
    }

    online.value = nextOnline

    if (nextOnline) {
      degradedMessage.value = null
      lastOnlineAt.value = Date.now()
    } else {
      lastOfflineAt.value = Date.now()
    }
  }

  const markDegraded = (message: string | null) => {
    degradedMessage.value = message
  }

  const accountStatus = (accountId: AccountId): AccountStatus => accounts.value[accountId] ?? idleStatus()

  const updateAccount = (accountId: AccountId, patch: Partial<AccountStatus>) => {
    accounts.value = {
      ...accounts.value,
      [accountId]: { ...accountStatus(accountId), ...patch },
    }
  }

  const forgetAccount = (accountId: AccountId) => {
    const { [accountId]: _removed, ...rest } = accounts.value
    accounts.value = rest
  }

  return {
    online,
    degradedMessage,
    accounts,
    status,
    isDegraded,
    lastChangeAt,
    updateOnline,
    markDegraded,
    accountStatus,
    updateAccount,
    forgetAccount,
  }
})
