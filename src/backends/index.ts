import { createMatrixAdapter } from '@/backends/matrix/adapter'
import { createTelegramAdapter } from '@/backends/telegram/adapter'
import type { BackendAdapter } from '@/types/backend'
import type { BackendKind } from '@/types/chat'

export type BackendAdapterFactory = () => BackendAdapter

const defaultFactories: Record<BackendKind, BackendAdapterFactory> = {
  matrix: () => createMatrixAdapter(),
  telegram: () => createTelegramAdapter(),
}

const factories = new Map<BackendKind, BackendAdapterFactory>([
  ['matrix', defaultFactories.matrix],
  ['telegram', defaultFactories.telegram],
])

/** Replaces the adapter used for new accounts of `backend`. */
export const registerBackend = (backend: BackendKind, factory: BackendAdapterFactory) => {
  factories.set(backend, factory)
}

export const resetBackends = () => {
  factories.set('matrix', defaultFactories.matrix)
  factories.set('telegram', defaultFactories.telegram)
}

export const createBackendAdapter = (backend: BackendKind): BackendAdapter => {
  const factory = factories.get(backend) ?? defaultFactories[backend]
  return factory()
}
