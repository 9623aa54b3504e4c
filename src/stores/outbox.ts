import { defineStore } from 'pinia'
import { computed, ref } from 'vue'

import { getRuntimeConfig } from '@/config/runtime'
import { useAccountStore } from '@/stores/accounts'
import { useConversationStore } from '@/stores/conversations'
import { useEncryptionStore } from '@/stores/encryption'
import { usePresenceStore } from '@/stores/presence'
import { useSyncStore } from '@/stores/sync'
import type { BackendAdapter } from '@/types/backend'
import {
  isProvisionalId,
  type AccountId,
  type Conversation,
  type ConversationId,
  type Intent,
  type IntentReceipt,
  type MessageFormat,
  type MessageId,
} from '@/types/chat'
import { computeBackoffDelay, raceAbort, sleep } from '@/utils/backoff'
import {
  CancelledError,
  ChatError,
  PermanentProtocolError,
  ReconciliationConflictError,
  TransientNetworkError,
  extractErrorMessage,
  isCancellation,
} from '@/utils/errors'
import { KeyedMutex } from '@/utils/mutex'
import { recordException, recordNetworkBreadcrumb } from '@/utils/telemetry'

const MAX_CONTENT_LENGTH = 32_000

export type CommandKind = 'send' | 'edit' | 'react' | 'delete' | 'mark_read' | 'typing'

export type CommandStatus = 'queued' | 'sending' | 'failed'

export interface OutboundCommand {
  id: string
  kind: CommandKind
  accountId: AccountId
  conversationId: ConversationId
  messageId: MessageId | null
  transactionId: string
  status: CommandStatus
  attempts: number
  error: string | null
  createdAt: number
}

type CommandPayload =
  | { kind: 'send'; body: string; format: MessageFormat }
  | { kind: 'edit'; body: string; localKey: string }
  | { kind: 'react'; key: string }
  | { kind: 'delete' }
  | { kind: 'mark_read'; upToNativeId: string | null }
  | { kind: 'typing'; typing: boolean }

interface CommandRuntime {
  payload: CommandPayload
  controller: AbortController
  /** Time spent attempting and backing off; offline waits do not count. */
  activeMs: number
}

interface ReconcileWaiter {
  resolve: (serverId: MessageId) => void
  reject: (err: unknown) => void
}

const createRequestId = () =>
  typeof crypto !== 'undefined' && typeof crypto.randomUUID === 'function'
    ? crypto.randomUUID()
    : `${Date.now().toString(36)}${Math.random().toString(16).slice(2, 10)}`

const validateContent = (content: string) => {
  const trimmed = content.trim()
  if (!trimmed.length) {
    return 'Message cannot be empty.'
  }
  if (trimmed.length > MAX_CONTENT_LENGTH) {
    return `Messages are limited to ${MAX_CONTENT_LENGTH.toLocaleString()} characters.`
  }
  return null
}

const rejected = (error: string): IntentReceipt => ({ ok: false, commandId: null, messageId: null, error })

/**
 * Fails with `ReconciliationConflictError` once `budgetMs` runs out, and with
 * `CancelledError` as soon as `parent` aborts. Late results are discarded.
 */
const withDeadline = async <T>(
  budgetMs: number | null,
  parent: AbortSignal,
  run: (signal: AbortSignal) => Promise<T>,
): Promise<T> => {
  if (budgetMs === null) {
    return raceAbort(run(parent), parent)
  }
  if (budgetMs <= 0) {
    throw new ReconciliationConflictError()
  }

  const controller = new AbortController()
  const signal = AbortSignal.any([parent, controller.signal])
  let timer: ReturnType<typeof setTimeout> | undefined
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(new ReconciliationConflictError())
    }, budgetMs)
  })

  try {
    return await Promise.race([raceAbort(run(signal), parent), deadline])
  } finally {
    clearTimeout(timer)
  }
}

export const useOutboxStore = defineStore('outbox', () => {
  const accountStore = useAccountStore()
  const conversationStore = useConversationStore()
  const encryptionStore = useEncryptionStore()
  const presenceStore = usePresenceStore()
  const syncStore = useSyncStore()

  const queue = ref<OutboundCommand[]>([])
  const lastError = ref<string | null>(null)
  const runtimes = new Map<string, CommandRuntime>()
  const lanes = new KeyedMutex()

  // Provisional id -> commands waiting for its server id, until reconciliation completes.
  const reconciling = new Map<MessageId, Set<ReconcileWaiter>>()

  const pendingCount = computed(() => queue.value.filter((entry) => entry.status !== 'failed').length)
  const hasFailures = computed(() => queue.value.some((entry) => entry.status === 'failed'))

  const findCommand = (id: string) => queue.value.find((entry) => entry.id === id) ?? null

  const updateCommand = (id: string, patch: Partial<OutboundCommand>) => {
    queue.value = queue.value.map((entry) => (entry.id === id ? { ...entry, ...patch } : entry))
  }

  const removeCommand = (id: string) => {
    queue.value = queue.value.filter((entry) => entry.id !== id)
    runtimes.delete(id)
  }

  /** Points queued commands at the server id; the provisional id stops resolving. */
  const retarget = (provisionalId: MessageId, serverId: MessageId) => {
    queue.value = queue.value.map((entry) =>
      entry.messageId === provisionalId ? { ...entry, messageId: serverId } : entry,
    )
  }

  const settleReconciliation = (provisionalId: MessageId, outcome: { serverId: MessageId } | { error: unknown }) => {
    const waiters = reconciling.get(provisionalId)
    reconciling.delete(provisionalId)
    for (const waiter of waiters ?? []) {
      if ('serverId' in outcome) {
        waiter.resolve(outcome.serverId)
      } else {
        waiter.reject(outcome.error)
      }
    }
  }

  /** Native id of the target, waiting for a provisional target to reconcile first. */
  const resolveTargetNativeId = async (messageId: MessageId, signal: AbortSignal) => {
    let current = messageId
    if (isProvisionalId(current)) {
      const waiters = reconciling.get(current)
      if (!waiters) {
        throw new PermanentProtocolError('Target message was never sent')
      }
      current = await new Promise<MessageId>((resolve, reject) => {
        const onAbort = () => {
          waiters.delete(waiter)
          reject(new CancelledError())
        }
        const waiter: ReconcileWaiter = {
          resolve: (serverId) => {
            signal.removeEventListener('abort', onAbort)
            resolve(serverId)
          },
          reject: (err) => {
            signal.removeEventListener('abort', onAbort)
            reject(err)
          },
        }
        if (signal.aborted) {
          reject(new CancelledError())
          return
        }
        signal.addEventListener('abort', onAbort, { once: true })
        waiters.add(waiter)
      })
    }

    const nativeId = conversationStore.findMessage(current)?.nativeId
    if (!nativeId) {
      throw new PermanentProtocolError('Target message no longer exists')
    }
    return { messageId: current, nativeId }
  }

  const conversationOf = (conversationId: ConversationId): Conversation => {
    const view = conversationStore.getConversation(conversationId)
    if (!view) {
      throw new PermanentProtocolError(`Unknown conversation ${conversationId}`)
    }
    return view.conversation
  }

  const perform = async (
    command: OutboundCommand,
    runtime: CommandRuntime,
    adapter: BackendAdapter,
    signal: AbortSignal,
  ) => {
    const conversation = conversationOf(command.conversationId)
    const { payload } = runtime

    switch (payload.kind) {
      case 'send': {
        const content = { body: payload.body, format: payload.format }
        let nativeId: string
        if (conversation.encrypted && adapter.encryption) {
          const encrypted = await encryptionStore.encrypt(
            command.accountId,
            adapter,
            conversation.nativeId,
            content,
            signal,
          )
          nativeId = await adapter.encryption.sendEncrypted(conversation.nativeId, encrypted, command.transactionId, signal)
        } else {
          nativeId = await adapter.send(conversation.nativeId, content, command.transactionId, signal)
        }
        if (signal.aborted) {
          throw new CancelledError()
        }

        const provisionalId = command.messageId
        if (!provisionalId) {
          return
        }
        const serverId = await syncStore.runExclusive(command.conversationId, () => {
          if (signal.aborted) {
            throw new CancelledError()
          }
          return conversationStore.reconcileProvisional(command.conversationId, provisionalId, nativeId)
        })
        if (serverId) {
          retarget(provisionalId, serverId)
          settleReconciliation(provisionalId, { serverId })
        } else {
          settleReconciliation(provisionalId, { error: new CancelledError('Message was discarded') })
        }
        return
      }
      case 'edit': {
        if (!command.messageId) {
          return
        }
        const target = await resolveTargetNativeId(command.messageId, signal)
        let editId: string
        if (conversation.encrypted && adapter.encryption) {
          const encrypted = await encryptionStore.encrypt(
            command.accountId,
            adapter,
            conversation.nativeId,
            { body: payload.body, format: 'plain' },
            signal,
            target.nativeId,
          )
          editId = await adapter.encryption.sendEncrypted(conversation.nativeId, encrypted, command.transactionId, signal)
        } else {
          editId = await adapter.edit(conversation.nativeId, target.nativeId, payload.body, command.transactionId, signal)
        }
        if (signal.aborted) {
          throw new CancelledError()
        }
        conversationStore.settleLocalEdit(target.messageId, payload.localKey, editId)
        return
      }
      case 'react': {
        if (!command.messageId) {
          return
        }
        const target = await resolveTargetNativeId(command.messageId, signal)
        await adapter.react(conversation.nativeId, target.nativeId, payload.key, command.transactionId, signal)
        return
      }
      case 'delete': {
        if (!command.messageId) {
          return
        }
        const target = await resolveTargetNativeId(command.messageId, signal)
        await adapter.redact(conversation.nativeId, target.nativeId, command.transactionId, signal)
        if (signal.aborted) {
          throw new CancelledError()
        }
        conversationStore.applyLocalRedaction(target.messageId, `~redact:${command.transactionId}`)
        return
      }
      case 'mark_read':
        await adapter.markRead(conversation.nativeId, payload.upToNativeId, signal)
        return
      case 'typing':
        await adapter.setTyping(conversation.nativeId, payload.typing, signal)
        return
    }
  }

  const failureReason = (err: unknown) =>
    err instanceof ReconciliationConflictError ? 'reconciliation_conflict' : extractErrorMessage(err) || 'Send failed'

  const applyFailure = (command: OutboundCommand, runtime: CommandRuntime, err: unknown) => {
    const reason = failureReason(err)
    updateCommand(command.id, { status: 'failed', error: reason })
    lastError.value = reason
    recordNetworkBreadcrumb('api', {
      message: 'Outbound command failed',
      level: 'warning',
      data: { kind: command.kind, accountId: command.accountId, attempts: command.attempts, error: reason },
    })

    const { payload } = runtime
    const { messageId } = command
    switch (payload.kind) {
      case 'send':
        if (messageId) {
          conversationStore.setDelivery(messageId, { state: 'failed', reason })
          settleReconciliation(messageId, { error: new PermanentProtocolError('Target message was not sent') })
        }
        break
      case 'edit':
        if (messageId) {
          conversationStore.settleLocalEdit(messageId, payload.localKey, null)
        }
        removeCommand(command.id)
        break
      case 'react':
        if (messageId) {
          conversationStore.applyLocalReaction(messageId, payload.key, false)
        }
        removeCommand(command.id)
        break
      case 'typing':
        removeCommand(command.id)
        break
      default:
        break
    }
  }

  type AttemptOutcome = 'done' | 'cancelled' | 'requeue' | ChatError

  const attemptOnce = async (
    command: OutboundCommand,
    runtime: CommandRuntime,
    adapter: BackendAdapter,
    accountSignal: AbortSignal,
  ): Promise<AttemptOutcome> => {
    const commandSignal = runtime.controller.signal
    const signal = AbortSignal.any([commandSignal, accountSignal])
    const { reconciliationTimeoutMs } = getRuntimeConfig().outbound
    const budget = runtime.payload.kind === 'send' ? reconciliationTimeoutMs - runtime.activeMs : null
    const startedAt = Date.now()

    try {
      await withDeadline(budget, signal, (attemptSignal) => perform(command, runtime, adapter, attemptSignal))
      return 'done'
    } catch (err) {
      if (commandSignal.aborted) {
        return 'cancelled'
      }
      if (accountSignal.aborted && !(err instanceof ReconciliationConflictError)) {
        return 'requeue'
      }
      return err instanceof ChatError
        ? err
        : new TransientNetworkError(extractErrorMessage(err) || 'Request failed', { cause: err })
    } finally {
      runtime.activeMs += Date.now() - startedAt
    }
  }

  const execute = async (commandId: string) => {
    const { maxAttempts, backoff } = getRuntimeConfig().outbound

    while (true) {
      const command = findCommand(commandId)
      const runtime = runtimes.get(commandId)
      if (!command || !runtime) {
        return
      }
      const commandSignal = runtime.controller.signal

      try {
        await syncStore.waitUntilSyncing(command.accountId, commandSignal)
        const adapter = syncStore.adapterFor(command.accountId)
        const accountSignal = syncStore.signalFor(command.accountId)
        if (!adapter || !accountSignal) {
          // Status still reads syncing while the account shuts down.
          await sleep(backoff.initialIntervalMs, { signal: commandSignal })
          continue
        }

        const attempts = command.attempts + 1
        updateCommand(commandId, { status: 'sending', attempts, error: null })
        const outcome = await attemptOnce({ ...command, attempts }, runtime, adapter, accountSignal)
        if (outcome === 'done') {
          removeCommand(commandId)
          return
        }
        if (outcome === 'cancelled') {
          return
        }
        if (outcome === 'requeue') {
          // Disconnected mid-flight; the attempt does not count.
          updateCommand(commandId, { status: 'queued', attempts: command.attempts })
          continue
        }

        if (outcome.kind !== 'transient' || attempts >= maxAttempts) {
          applyFailure({ ...command, attempts }, runtime, outcome)
          return
        }

        updateCommand(commandId, { status: 'queued', error: extractErrorMessage(outcome) })
        const retryAfter = outcome instanceof TransientNetworkError ? (outcome.retryAfterMs ?? 0) : 0
        const delay = Math.max(computeBackoffDelay(backoff, attempts - 1), retryAfter)
        const sleepStartedAt = Date.now()
        await sleep(delay, { signal: AbortSignal.any([commandSignal, accountSignal]) }).catch((err) => {
          if (!isCancellation(err)) {
            throw err
          }
        })
        runtime.activeMs += Date.now() - sleepStartedAt
      } catch (err) {
        if (isCancellation(err, commandSignal)) {
          return
        }
        throw err
      }
    }
  }

  const schedule = (command: OutboundCommand, laned: boolean) => {
    const run = () =>
      execute(command.id).catch((err) => {
        recordException(err, { scope: 'outbox.execute', kind: command.kind })
        const runtime = runtimes.get(command.id)
        const current = findCommand(command.id)
        if (runtime && current) {
          applyFailure(current, runtime, err)
        }
      })

    if (laned) {
      lanes.run(command.conversationId, run).catch((err) => {
        console.warn('Outbound lane failed', err)
      })
    } else {
      run().catch((err) => {
        console.warn('Outbound command failed', err)
      })
    }
  }

  const enqueue = (
    conversation: Conversation,
    payload: CommandPayload,
    messageId: MessageId | null,
    transactionId = createRequestId(),
  ) => {
    const command: OutboundCommand = {
      id: createRequestId(),
      kind: payload.kind,
      accountId: conversation.accountId,
      conversationId: conversation.id,
      messageId,
      transactionId,
      status: 'queued',
      attempts: 0,
      error: null,
      createdAt: Date.now(),
    }
    runtimes.set(command.id, { payload, controller: new AbortController(), activeMs: 0 })
    queue.value = [...queue.value, command]
    schedule(command, payload.kind !== 'typing' && payload.kind !== 'mark_read')
    return command
  }

  const findSendCommand = (messageId: MessageId) =>
    queue.value.find((entry) => entry.kind === 'send' && entry.messageId === messageId) ?? null

  const discard = (messageId: MessageId): IntentReceipt => {
    const message = conversationStore.findMessage(messageId)
    if (!message || message.delivery.state !== 'failed' || !isProvisionalId(messageId)) {
      return rejected('Only failed messages can be discarded.')
    }
    const command = findSendCommand(messageId)
    if (command) {
      runtimes.get(command.id)?.controller.abort()
      removeCommand(command.id)
    }
    settleReconciliation(messageId, { error: new CancelledError('Message was discarded') })
    conversationStore.removeMessage(messageId)
    return { ok: true, commandId: command?.id ?? null, messageId, error: null }
  }

  const resend = (messageId: MessageId): IntentReceipt => {
    const message = conversationStore.findMessage(messageId)
    const command = findSendCommand(messageId)
    if (!message || message.delivery.state !== 'failed' || !command) {
      return rejected('Only failed messages can be resent.')
    }
    updateCommand(command.id, { status: 'queued', attempts: 0, error: null })
    const runtime = runtimes.get(command.id)
    if (runtime) {
      runtime.activeMs = 0
      runtime.controller = new AbortController()
    }
    reconciling.set(messageId, reconciling.get(messageId) ?? new Set())
    conversationStore.setDelivery(messageId, { state: 'pending' })
    schedule(command, true)
    return { ok: true, commandId: command.id, messageId, error: null }
  }

  /**
   * Applies the optimistic effect of an intent synchronously and queues the
   * server call. The receipt carries the provisional message id for sends.
   */
  const submitIntent = (intent: Intent): IntentReceipt => {
    const view = conversationStore.getConversation(intent.conversationId)
    if (!view) {
      return rejected(`Unknown conversation ${intent.conversationId}`)
    }
    const { conversation } = view
    if (!accountStore.getAccount(conversation.accountId)) {
      return rejected(`Account ${conversation.accountId} is signed out`)
    }

    switch (intent.type) {
      case 'send': {
        const validationError = validateContent(intent.body)
        if (validationError) {
          return rejected(validationError)
        }
        const body = intent.body.replace(/\s+$/, '')
        const format = intent.format ?? 'plain'
        const transactionId = createRequestId()
        const provisional = conversationStore.addProvisional(conversation.id, { body, format, transactionId })
        if (!provisional) {
          return rejected('Conversation is not available')
        }
        reconciling.set(provisional.id, new Set())
        const command = enqueue(conversation, { kind: 'send', body, format }, provisional.id, transactionId)
        return { ok: true, commandId: command.id, messageId: provisional.id, error: null }
      }
      case 'edit': {
        const validationError = validateContent(intent.body)
        if (validationError) {
          return rejected(validationError)
        }
        const { messageId } = intent
        const target = conversationStore.findMessage(messageId)
        if (!target || !target.fromSelf || target.content.kind !== 'text') {
          return rejected('Only your own text messages can be edited.')
        }
        const localKey = `~edit:${createRequestId()}`
        conversationStore.applyLocalEdit(messageId, localKey, intent.body)
        const command = enqueue(conversation, { kind: 'edit', body: intent.body, localKey }, messageId)
        return { ok: true, commandId: command.id, messageId, error: null }
      }
      case 'react': {
        const { messageId } = intent
        if (!conversationStore.findMessage(messageId)) {
          return rejected('Message not found.')
        }
        if (!conversationStore.applyLocalReaction(messageId, intent.key, true)) {
          return rejected('Reaction already present.')
        }
        const command = enqueue(conversation, { kind: 'react', key: intent.key }, messageId)
        return { ok: true, commandId: command.id, messageId, error: null }
      }
      case 'delete': {
        const { messageId } = intent
        const target = conversationStore.findMessage(messageId)
        if (!target) {
          return rejected('Message not found.')
        }
        if (target.delivery.state === 'failed' && isProvisionalId(messageId)) {
          return discard(messageId)
        }
        if (target.content.kind === 'redacted') {
          return rejected('Message is already deleted.')
        }
        const command = enqueue(conversation, { kind: 'delete' }, messageId)
        return { ok: true, commandId: command.id, messageId, error: null }
      }
      case 'mark_read': {
        const upToNativeId = conversationStore.markRead(conversation.id)
        const command = enqueue(conversation, { kind: 'mark_read', upToNativeId }, null)
        return { ok: true, commandId: command.id, messageId: null, error: null }
      }
      case 'typing': {
        if (!presenceStore.shouldSendTyping(conversation.id, intent.typing)) {
          return { ok: true, commandId: null, messageId: null, error: null }
        }
        const command = enqueue(conversation, { kind: 'typing', typing: intent.typing }, null)
        return { ok: true, commandId: command.id, messageId: null, error: null }
      }
      case 'resend':
        return resend(intent.messageId)
      case 'discard':
        return discard(intent.messageId)
    }
  }

  /** Aborts and drops every command of the account. */
  const cancelAccount = (accountId: AccountId) => {
    for (const command of queue.value.filter((entry) => entry.accountId === accountId)) {
      runtimes.get(command.id)?.controller.abort()
      removeCommand(command.id)
      if (command.kind === 'send' && command.messageId) {
        settleReconciliation(command.messageId, { error: new CancelledError('Account signed out') })
      }
    }
  }

  return {
    queue,
    lastError,
    pendingCount,
    hasFailures,
    submitIntent,
    cancelAccount,
  }
})
