import { createBackendAdapter } from '@/backends'
import { useAccountStore } from '@/stores/accounts'
import { useConnectivityStore } from '@/stores/connectivity'
import { useConversationStore } from '@/stores/conversations'
import { useEncryptionStore } from '@/stores/encryption'
import { useOutboxStore } from '@/stores/outbox'
import { usePresenceStore } from '@/stores/presence'
import { useSyncStore } from '@/stores/sync'
import type { LoginRequest } from '@/types/backend'
import type {
  AccountId,
  ConversationId,
  ConversationView,
  DeviceTrust,
  Intent,
  IntentReceipt,
  StoreSnapshot,
} from '@/types/chat'
import { AsyncChannel } from '@/utils/channel'
import { AuthError, PermanentProtocolError } from '@/utils/errors'
import { recordBreadcrumb } from '@/utils/telemetry'

export interface ChatSubscription {
  /** The state at subscription time. */
  snapshot: StoreSnapshot
  /** Ids of conversations that changed since; coalesced while unread. */
  changes: AsyncIterableIterator<ConversationId>
  close(): void
}

const belongsTo = (conversationId: ConversationId, accountId?: AccountId) =>
  !accountId || conversationId.startsWith(`${accountId}/`)

const filterSnapshot = (snapshot: StoreSnapshot, accountId?: AccountId): StoreSnapshot => {
  if (!accountId) {
    return snapshot
  }
  const conversations = new Map<ConversationId, ConversationView>()
  for (const [id, view] of snapshot.conversations) {
    if (belongsTo(id, accountId)) {
      conversations.set(id, view)
    }
  }
  return Object.freeze({ version: snapshot.version, conversations })
}

export const useChatClient = () => {
  const accountStore = useAccountStore()
  const connectivityStore = useConnectivityStore()
  const conversationStore = useConversationStore()
  const encryptionStore = useEncryptionStore()
  const outboxStore = useOutboxStore()
  const presenceStore = usePresenceStore()
  const syncStore = useSyncStore()

  const subscribe = (accountId?: AccountId): ChatSubscription => {
    const changes = new AsyncChannel<ConversationId>({ coalesce: true })
    const unsubscribe = conversationStore.onCommit((changed) => {
      for (const conversationId of changed) {
        if (belongsTo(conversationId, accountId)) {
          changes.push(conversationId)
        }
      }
    })

    return {
      snapshot: filterSnapshot(conversationStore.snapshot, accountId),
      changes,
      close: () => {
        unsubscribe()
        changes.close()
      },
    }
  }

  const getConversation = (conversationId: ConversationId): ConversationView | null =>
    conversationStore.getConversation(conversationId)

  /** Most recently active first. */
  const listConversations = (accountId?: AccountId): ConversationView[] =>
    [...filterSnapshot(conversationStore.snapshot, accountId).conversations.values()].sort(
      (a, b) => b.conversation.lastActivityAt - a.conversation.lastActivityAt,
    )

  const submitIntent = (intent: Intent): IntentReceipt => outboxStore.submitIntent(intent)

  const login = async (request: LoginRequest, signal?: AbortSignal): Promise<AccountId> => {
    const adapter = createBackendAdapter(request.backend)
    const result = await adapter.login(request, signal)
    const accountId = accountStore.upsertAccount(result.session, result.profile)
    recordBreadcrumb({ message: 'Account added', category: 'accounts', data: { accountId } })
    syncStore.start(accountId, adapter)
    return accountId
  }

  /** Loads persisted accounts and starts syncing each of them. */
  const restore = (): AccountId[] => {
    const restored = accountStore.hydrate()
    for (const account of restored) {
      if (!syncStore.isRunning(account.id)) {
        syncStore.start(account.id, createBackendAdapter(account.backend))
      }
    }
    return restored.map((account) => account.id)
  }

  const connect = (accountId: AccountId) => {
    const account = accountStore.getAccount(accountId)
    if (!account) {
      throw new AuthError(`${accountId} has no stored session; log in first`)
    }
    if (!syncStore.isRunning(accountId)) {
      syncStore.start(accountId, createBackendAdapter(account.backend))
    }
  }

  const disconnect = (accountId: AccountId) => syncStore.stop(accountId)

  /** Ends the server session and drops every local trace of the account. */
  const logout = async (accountId: AccountId) => {
    const adapter = syncStore.adapterFor(accountId)
    outboxStore.cancelAccount(accountId)
    if (adapter) {
      try {
        await adapter.logout(new AbortController().signal)
      } catch (err) {
        console.warn(`Server-side logout failed for ${accountId}; removing local session anyway`, err)
      }
    }
    await syncStore.stop(accountId)
    syncStore.forget(accountId)
    presenceStore.forgetAccount(accountId)
    encryptionStore.forget(accountId)
    conversationStore.removeAccount(accountId)
    accountStore.removeAccount(accountId)
  }

  const loadMore = (conversationId: ConversationId) => syncStore.loadMore(conversationId)

  const verifyDevice = (accountId: AccountId, userId: string, deviceId: string, trust: DeviceTrust = 'verified') =>
    encryptionStore.verifyDevice(accountId, userId, deviceId, trust)

  /** Rotates the outbound room key of an encrypted conversation. */
  const rekey = async (conversationId: ConversationId) => {
    const view = conversationStore.getConversation(conversationId)
    if (!view) {
      throw new PermanentProtocolError(`Unknown conversation ${conversationId}`)
    }
    const { accountId, nativeId } = view.conversation
    const adapter = syncStore.adapterFor(accountId)
    const signal = syncStore.signalFor(accountId)
    if (!adapter || !signal) {
      throw new AuthError(`${accountId} is not connected`)
    }
    return encryptionStore.rekey(accountId, adapter, nativeId, signal)
  }

  const accountStatus = (accountId: AccountId) => connectivityStore.accountStatus(accountId)

  const setOnline = (online: boolean) => connectivityStore.updateOnline(online)

  /** Overall link state: `degraded` while any account is backing off. */
  const connectivity = () => ({
    status: connectivityStore.status,
    message: connectivityStore.degradedMessage,
    since: connectivityStore.lastChangeAt,
  })

  return {
    subscribe,
    getConversation,
    listConversations,
    submitIntent,
    login,
    restore,
    connect,
    disconnect,
    logout,
    loadMore,
    verifyDevice,
    rekey,
    accountStatus,
    setOnline,
    connectivity,
  }
}

export type ChatClient = ReturnType<typeof useChatClient>
