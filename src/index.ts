import { createPinia, setActivePinia, type Pinia } from 'pinia'

import { useChatClient } from '@/composables/useChatClient'

export { useChatClient, type ChatClient, type ChatSubscription } from '@/composables/useChatClient'
export { registerBackend, resetBackends, type BackendAdapterFactory } from '@/backends'
export { createMatrixAdapter } from '@/backends/matrix/adapter'
export { createTelegramAdapter } from '@/backends/telegram/adapter'
export { configureRuntime, getRuntimeConfig, type RuntimeConfig } from '@/config/runtime'
export { useAccountStore } from '@/stores/accounts'
export { useConnectivityStore, type AccountStatus, type SyncState } from '@/stores/connectivity'
export { useConversationStore } from '@/stores/conversations'
export { useEncryptionStore } from '@/stores/encryption'
export { useOutboxStore } from '@/stores/outbox'
export { usePresenceStore } from '@/stores/presence'
export { useSyncStore } from '@/stores/sync'
export * from '@/types/backend'
export * from '@/types/chat'
export * from '@/utils/errors'
export { createFileStorage, createMemoryStorage, setStorageAdapter, type StorageAdapter } from '@/utils/storage'
export { registerCipher, type RoomKeyCipher } from '@/utils/roomKeys'
export { setTelemetrySink, type Breadcrumb, type TelemetrySink } from '@/utils/telemetry'

/** Entry point for callers outside a Vue app: binds a Pinia instance and returns the client. */
export const createChatClient = (pinia: Pinia = createPinia()) => {
  setActivePinia(pinia)
  return useChatClient()
}
