import { defineStore } from 'pinia'
import { computed, shallowRef } from 'vue'

import type { ConversationUpdate, NormalizedEvent, ParticipantUpdate, ReactionCount } from '@/types/backend'
import {
  conversationIdFor,
  messageIdFor,
  participantIdFor,
  provisionalIdFor,
  type AccountId,
  type BackendKind,
  type Conversation,
  type ConversationId,
  type ConversationView,
  type DeliveryState,
  type DeviceTrust,
  type EncryptedPayload,
  type Message,
  type MessageContent,
  type MessageEdit,
  type MessageFormat,
  type MessageId,
  type Participant,
  type ParticipantId,
  type ReactionSummary,
  type StoreSnapshot,
} from '@/types/chat'
import { groupMessages } from '@/utils/grouping'
import { recordException } from '@/utils/telemetry'

export interface ApplyContext {
  accountId: AccountId
  backend: BackendKind
  selfUserId: string
  /** Live traffic counts toward unread; backfill and history do not. */
  live: boolean
}

export interface StoreMessageEvent {
  type: 'message'
  conversationNativeId: string
  nativeId: string
  senderId: string
  timestamp: number
  transactionId: string | null
  content: MessageContent
  delivery: DeliveryState
  ciphertext: EncryptedPayload | null
}

type RelationEvent = Extract<NormalizedEvent, { type: 'edit' | 'reaction' | 'reaction_summary' | 'redaction' }>

export type StoreEvent =
  | StoreMessageEvent
  | RelationEvent
  | Extract<NormalizedEvent, { type: 'conversation' | 'receipt' | 'device' }>

export type ApplyOutcome = 'applied' | 'duplicate' | 'buffered' | 'ignored'

export type CiphertextOutcome =
  | { ok: true; content: MessageContent }
  | { ok: false; reason: string }

interface ReactionState {
  senders: Set<ParticipantId>
  reported: { count: number; reactedBySelf: boolean } | null
}

interface ConversationRecord {
  conversation: Conversation
  selfParticipantId: ParticipantId
  messages: Message[]
  byId: Map<MessageId, Message>
  baseContent: Map<MessageId, MessageContent>
  idByNativeId: Map<string, MessageId>
  idByTransaction: Map<string, MessageId>
  appliedRelations: Set<string>
  pendingRelations: Map<string, RelationEvent[]>
  reactions: Map<MessageId, Map<string, ReactionState>>
  reactionIndex: Map<string, { messageId: MessageId; key: string; senderId: ParticipantId }>
  // Edit native id -> native id of the message it replaced.
  editIndex: Map<string, string>
  typing: ParticipantId[]
  named: boolean
  provisionalSequence: number
  history: { token: string | null; exhausted: boolean }
  version: number
}

interface CiphertextRef {
  accountId: AccountId
  payload: EncryptedPayload
}

export interface PendingCiphertext {
  messageId: MessageId
  conversationId: ConversationId
  payload: EncryptedPayload
}

export interface HistoryState {
  token: string | null
  exhausted: boolean
}

type CommitListener = (changed: ConversationId[]) => void

const compareMessages = (a: Pick<Message, 'timestamp' | 'id'>, b: Pick<Message, 'timestamp' | 'id'>) => {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp - b.timestamp
  }
  if (a.id === b.id) {
    return 0
  }
  return a.id < b.id ? -1 : 1
}

const compareEdits = (a: MessageEdit, b: MessageEdit) => {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp - b.timestamp
  }
  if (a.nativeId === b.nativeId) {
    return 0
  }
  return a.nativeId < b.nativeId ? -1 : 1
}

const insertionIndex = (messages: Message[], message: Message) => {
  let low = 0
  let high = messages.length
  while (low < high) {
    const mid = (low + high) >>> 1
    const candidate = messages[mid]
    if (candidate && compareMessages(candidate, message) <= 0) {
      low = mid + 1
    } else {
      high = mid
    }
  }
  return low
}

const renderContent = (base: MessageContent, edits: MessageEdit[]): MessageContent => {
  const latest = edits[edits.length - 1]
  if (base.kind !== 'text' || !latest) {
    return base
  }
  return { kind: 'text', body: latest.body, format: base.format }
}

const sameMembers = (a: readonly string[], b: readonly string[]) =>
  a.length === b.length && a.every((value, index) => value === b[index])

export const useConversationStore = defineStore('conversations', () => {
  const records = new Map<ConversationId, ConversationRecord>()
  const participants = new Map<ParticipantId, Participant>()
  const conversationsByParticipant = new Map<ParticipantId, Set<ConversationId>>()
  const messageIndex = new Map<MessageId, ConversationId>()
  const ciphertexts = new Map<MessageId, CiphertextRef>()
  const ciphertextsBySession = new Map<string, Set<MessageId>>()
  const listeners = new Set<CommitListener>()

  const snapshot = shallowRef<StoreSnapshot>(
    Object.freeze({ version: 0, conversations: new Map<ConversationId, ConversationView>() }),
  )
  const version = computed(() => snapshot.value.version)

  const dirty = new Set<ConversationId>()
  let depth = 0

  const touch = (record: ConversationRecord) => {
    dirty.add(record.conversation.id)
  }

  const buildView = (record: ConversationRecord): ConversationView => {
    const members: Participant[] = []
    for (const id of record.conversation.participantIds) {
      const participant = participants.get(id)
      if (participant) {
        members.push(participant)
      }
    }
    return Object.freeze({
      conversation: Object.freeze({
        ...record.conversation,
        participantIds: [...record.conversation.participantIds],
      }),
      messages: Object.freeze([...record.messages]),
      groups: Object.freeze(groupMessages(record.messages)),
      participants: Object.freeze(members),
      typing: Object.freeze([...record.typing]),
      hasMoreHistory: !record.history.exhausted,
      version: record.version,
    })
  }

  const commit = () => {
    if (!dirty.size) {
      return
    }
    const changed = [...dirty]
    dirty.clear()

    const conversations = new Map(snapshot.value.conversations)
    for (const id of changed) {
      const record = records.get(id)
      if (!record) {
        conversations.delete(id)
        continue
      }
      record.version += 1
      conversations.set(id, buildView(record))
    }
    snapshot.value = Object.freeze({ version: snapshot.value.version + 1, conversations })

    for (const listener of listeners) {
      try {
        listener(changed)
      } catch (err) {
        recordException(err, { scope: 'conversations.commit' })
      }
    }
  }

  /** Groups writes into one snapshot swap; nests. */
  const batch = <T>(write: () => T): T => {
    depth += 1
    try {
      return write()
    } finally {
      depth -= 1
      if (depth === 0) {
        commit()
      }
    }
  }

  const onCommit = (listener: CommitListener) => {
    listeners.add(listener)
    return () => {
      listeners.delete(listener)
    }
  }

  const linkParticipant = (record: ConversationRecord, participantId: ParticipantId) => {
    if (!record.conversation.participantIds.includes(participantId)) {
      record.conversation.participantIds = [...record.conversation.participantIds, participantId]
      touch(record)
    }
    let memberships = conversationsByParticipant.get(participantId)
    if (!memberships) {
      memberships = new Set()
      conversationsByParticipant.set(participantId, memberships)
    }
    memberships.add(record.conversation.id)
  }

  const touchParticipantConversations = (participantId: ParticipantId) => {
    for (const conversationId of conversationsByParticipant.get(participantId) ?? []) {
      const record = records.get(conversationId)
      if (record) {
        touch(record)
      }
    }
  }

  const upsertParticipant = (
    accountId: AccountId,
    nativeUserId: string,
    patch: Omit<ParticipantUpdate, 'nativeId'> = {},
  ): ParticipantId => {
    const id = participantIdFor(accountId, nativeUserId)
    const existing = participants.get(id)
    if (!existing) {
      participants.set(
        id,
        Object.freeze({
          id,
          accountId,
          nativeId: nativeUserId,
          displayName: patch.displayName || nativeUserId,
          avatarUrl: patch.avatarUrl ?? null,
          devices: [],
        }),
      )
      return id
    }

    const displayName = patch.displayName || existing.displayName
    const avatarUrl = patch.avatarUrl === undefined ? existing.avatarUrl : patch.avatarUrl
    if (displayName !== existing.displayName || avatarUrl !== existing.avatarUrl) {
      participants.set(id, Object.freeze({ ...existing, displayName, avatarUrl }))
      touchParticipantConversations(id)
    }
    return id
  }

  const createRecord = (ctx: Pick<ApplyContext, 'accountId' | 'backend' | 'selfUserId'>, nativeId: string) => {
    const id = conversationIdFor(ctx.accountId, nativeId)
    const record: ConversationRecord = {
      conversation: {
        id,
        accountId: ctx.accountId,
        backend: ctx.backend,
        nativeId,
        displayName: nativeId,
        participantIds: [],
        lastActivityAt: 0,
        unreadCount: 0,
        encrypted: false,
        membership: 'joined',
      },
      selfParticipantId: participantIdFor(ctx.accountId, ctx.selfUserId),
      messages: [],
      byId: new Map(),
      baseContent: new Map(),
      idByNativeId: new Map(),
      idByTransaction: new Map(),
      appliedRelations: new Set(),
      pendingRelations: new Map(),
      reactions: new Map(),
      reactionIndex: new Map(),
      editIndex: new Map(),
      typing: [],
      named: false,
      provisionalSequence: 0,
      history: { token: null, exhausted: false },
      version: 0,
    }
    records.set(id, record)
    touch(record)
    return record
  }

  const ensureRecord = (ctx: Pick<ApplyContext, 'accountId' | 'backend' | 'selfUserId'>, nativeId: string) =>
    records.get(conversationIdFor(ctx.accountId, nativeId)) ?? createRecord(ctx, nativeId)

  const applyConversationUpdate = (ctx: Pick<ApplyContext, 'accountId' | 'backend' | 'selfUserId'>, update: ConversationUpdate) =>
    batch(() => {
      const existing = records.get(conversationIdFor(ctx.accountId, update.nativeId))
      const record = existing ?? createRecord(ctx, update.nativeId)
      const { conversation } = record

      if (!existing && update.unreadCount !== undefined) {
        conversation.unreadCount = Math.max(0, update.unreadCount)
      }
      if (update.displayName) {
        record.named = true
        conversation.displayName = update.displayName
      } else if (update.fallbackName && !record.named) {
        conversation.displayName = update.fallbackName
      }
      if (update.encrypted !== undefined) {
        conversation.encrypted = conversation.encrypted || update.encrypted
      }
      if (update.membership) {
        conversation.membership = update.membership
      }
      if (update.lastActivityAt !== undefined) {
        conversation.lastActivityAt = Math.max(conversation.lastActivityAt, update.lastActivityAt)
      }
      for (const participant of update.participants ?? []) {
        const { nativeId, ...patch } = participant
        linkParticipant(record, upsertParticipant(ctx.accountId, nativeId, patch))
      }
      if (update.removedParticipants?.length) {
        const removed = new Set(update.removedParticipants.map((id) => participantIdFor(ctx.accountId, id)))
        conversation.participantIds = conversation.participantIds.filter((id) => !removed.has(id))
        for (const id of removed) {
          conversationsByParticipant.get(id)?.delete(conversation.id)
        }
      }
      touch(record)
      return conversation.id
    })

  const indexMessage = (record: ConversationRecord, message: Message, content: MessageContent) => {
    record.byId.set(message.id, message)
    record.baseContent.set(message.id, content)
    messageIndex.set(message.id, record.conversation.id)
    if (message.nativeId) {
      record.idByNativeId.set(message.nativeId, message.id)
    }
    record.messages.splice(insertionIndex(record.messages, message), 0, message)
    if (message.timestamp > record.conversation.lastActivityAt) {
      record.conversation.lastActivityAt = message.timestamp
    }
    touch(record)
  }

  const unindexMessage = (record: ConversationRecord, messageId: MessageId) => {
    const message = record.byId.get(messageId)
    if (!message) {
      return null
    }
    record.byId.delete(messageId)
    record.baseContent.delete(messageId)
    record.reactions.delete(messageId)
    messageIndex.delete(messageId)
    if (message.nativeId && record.idByNativeId.get(message.nativeId) === messageId) {
      record.idByNativeId.delete(message.nativeId)
    }
    if (message.transactionId && record.idByTransaction.get(message.transactionId) === messageId) {
      record.idByTransaction.delete(message.transactionId)
    }
    const index = record.messages.findIndex((entry) => entry.id === messageId)
    if (index >= 0) {
      record.messages.splice(index, 1)
    }
    dropCiphertext(messageId)
    touch(record)
    return message
  }

  const replaceMessage = (record: ConversationRecord, next: Message) => {
    const previous = record.byId.get(next.id)
    record.byId.set(next.id, Object.freeze(next))
    const index = previous ? record.messages.indexOf(previous) : -1
    if (index >= 0 && previous && previous.timestamp === next.timestamp) {
      record.messages[index] = record.byId.get(next.id) ?? next
    } else {
      if (index >= 0) {
        record.messages.splice(index, 1)
      }
      const frozen = record.byId.get(next.id) ?? next
      record.messages.splice(insertionIndex(record.messages, frozen), 0, frozen)
    }
    touch(record)
  }

  const summarizeReactions = (record: ConversationRecord, messageId: MessageId): ReactionSummary[] => {
    const states = record.reactions.get(messageId)
    if (!states) {
      return []
    }
    const summaries: ReactionSummary[] = []
    for (const [key, state] of states) {
      const count = state.reported?.count ?? state.senders.size
      if (count <= 0) {
        continue
      }
      summaries.push({
        key,
        count,
        senders: [...state.senders],
        reactedBySelf: state.reported?.reactedBySelf ?? state.senders.has(record.selfParticipantId),
      })
    }
    return summaries
  }

  const refreshReactions = (record: ConversationRecord, messageId: MessageId) => {
    const message = record.byId.get(messageId)
    if (message) {
      replaceMessage(record, { ...message, reactions: summarizeReactions(record, messageId) })
    }
  }

  const renderEdits = (record: ConversationRecord, target: Message, edits: MessageEdit[]) => {
    const base = record.baseContent.get(target.id) ?? target.content
    replaceMessage(record, {
      ...target,
      edits,
      editedAt: edits[edits.length - 1]?.timestamp ?? null,
      content: renderContent(base, edits),
    })
  }

  const registerCiphertext = (accountId: AccountId, messageId: MessageId, payload: EncryptedPayload) => {
    ciphertexts.set(messageId, { accountId, payload })
    const key = `${accountId}|${payload.sessionId}`
    let bucket = ciphertextsBySession.get(key)
    if (!bucket) {
      bucket = new Set()
      ciphertextsBySession.set(key, bucket)
    }
    bucket.add(messageId)
  }

  function dropCiphertext(messageId: MessageId) {
    const ref = ciphertexts.get(messageId)
    if (!ref) {
      return
    }
    ciphertexts.delete(messageId)
    const key = `${ref.accountId}|${ref.payload.sessionId}`
    const bucket = ciphertextsBySession.get(key)
    bucket?.delete(messageId)
    if (bucket && !bucket.size) {
      ciphertextsBySession.delete(key)
    }
  }

  const bufferRelation = (record: ConversationRecord, event: RelationEvent) => {
    const queue = record.pendingRelations.get(event.targetNativeId) ?? []
    const alreadyQueued =
      'nativeId' in event && queue.some((entry) => 'nativeId' in entry && entry.nativeId === event.nativeId)
    if (!alreadyQueued) {
      queue.push(event)
    }
    record.pendingRelations.set(event.targetNativeId, queue)
    return 'buffered' as const
  }

  const flushRelations = (record: ConversationRecord, ctx: ApplyContext, nativeId: string) => {
    const queue = record.pendingRelations.get(nativeId)
    if (!queue) {
      return
    }
    record.pendingRelations.delete(nativeId)
    for (const event of queue) {
      applyRelation(record, ctx, event)
    }
  }

  const adoptProvisional = (
    record: ConversationRecord,
    provisionalId: MessageId,
    nativeId: string,
    timestamp: number | null,
  ): Message | null => {
    const provisional = record.byId.get(provisionalId)
    if (!provisional) {
      return null
    }
    const content = record.baseContent.get(provisionalId) ?? provisional.content
    const states = record.reactions.get(provisionalId)
    unindexMessage(record, provisionalId)

    const message: Message = Object.freeze<Message>({
      ...provisional,
      id: messageIdFor(record.conversation.id, nativeId),
      nativeId,
      timestamp: timestamp ?? provisional.timestamp,
      delivery: { state: 'sent' },
    })
    indexMessage(record, message, content)
    if (states) {
      record.reactions.set(message.id, states)
    }
    return message
  }

  const applyMessage = (record: ConversationRecord, ctx: ApplyContext, event: StoreMessageEvent): ApplyOutcome => {
    const existingId = record.idByNativeId.get(event.nativeId)
    if (existingId) {
      const existing = record.byId.get(existingId)
      // A message renamed from its provisional id carries the local clock; the echo has the server's.
      if (existing && existing.fromSelf && existing.transactionId && existing.timestamp !== event.timestamp) {
        replaceMessage(record, { ...existing, timestamp: event.timestamp })
      }
      return 'duplicate'
    }

    const provisionalId = event.transactionId ? record.idByTransaction.get(event.transactionId) : undefined
    if (provisionalId && adoptProvisional(record, provisionalId, event.nativeId, event.timestamp)) {
      flushRelations(record, ctx, event.nativeId)
      return 'applied'
    }

    const senderId = upsertParticipant(ctx.accountId, event.senderId)
    linkParticipant(record, senderId)
    const fromSelf = event.senderId === ctx.selfUserId
    const message: Message = Object.freeze({
      id: messageIdFor(record.conversation.id, event.nativeId),
      conversationId: record.conversation.id,
      nativeId: event.nativeId,
      transactionId: event.transactionId,
      senderId,
      fromSelf,
      timestamp: event.timestamp,
      content: event.content,
      edits: [],
      editedAt: null,
      reactions: [],
      delivery: event.delivery,
    })
    indexMessage(record, message, event.content)
    if (event.ciphertext) {
      registerCiphertext(ctx.accountId, message.id, event.ciphertext)
    }
    if (ctx.live && !fromSelf) {
      record.conversation.unreadCount += 1
    }
    flushRelations(record, ctx, event.nativeId)
    return 'applied'
  }

  const applyEdit = (
    record: ConversationRecord,
    ctx: ApplyContext,
    event: Extract<RelationEvent, { type: 'edit' }>,
  ): ApplyOutcome => {
    if (record.appliedRelations.has(event.nativeId)) {
      return 'duplicate'
    }
    const targetId = record.idByNativeId.get(event.targetNativeId)
    const target = targetId ? record.byId.get(targetId) : undefined
    if (!target) {
      return bufferRelation(record, event)
    }
    record.appliedRelations.add(event.nativeId)
    if (target.content.kind === 'redacted' || target.senderId !== participantIdFor(ctx.accountId, event.senderId)) {
      return 'ignored'
    }

    const edits = [
      ...target.edits.filter((edit) => edit.nativeId !== event.nativeId),
      { nativeId: event.nativeId, body: event.body, timestamp: event.timestamp },
    ].sort(compareEdits)
    record.editIndex.set(event.nativeId, event.targetNativeId)
    renderEdits(record, target, edits)
    return 'applied'
  }

  const applyReaction = (
    record: ConversationRecord,
    ctx: ApplyContext,
    event: Extract<RelationEvent, { type: 'reaction' }>,
  ): ApplyOutcome => {
    if (record.appliedRelations.has(event.nativeId)) {
      return 'duplicate'
    }
    const targetId = record.idByNativeId.get(event.targetNativeId)
    const target = targetId ? record.byId.get(targetId) : undefined
    if (!target) {
      return bufferRelation(record, event)
    }
    record.appliedRelations.add(event.nativeId)
    if (target.content.kind === 'redacted') {
      return 'ignored'
    }

    const senderId = upsertParticipant(ctx.accountId, event.senderId)
    const states = record.reactions.get(target.id) ?? new Map<string, ReactionState>()
    const state = states.get(event.key) ?? { senders: new Set<ParticipantId>(), reported: null }
    if (!state.senders.has(senderId) && state.reported) {
      state.reported = {
        count: state.reported.count + 1,
        reactedBySelf: state.reported.reactedBySelf || senderId === record.selfParticipantId,
      }
    }
    state.senders.add(senderId)
    states.set(event.key, state)
    record.reactions.set(target.id, states)
    record.reactionIndex.set(event.nativeId, { messageId: target.id, key: event.key, senderId })
    refreshReactions(record, target.id)
    return 'applied'
  }

  const applyReactionCounts = (record: ConversationRecord, messageId: MessageId, counts: ReactionCount[]) => {
    const previous = record.reactions.get(messageId)
    const states = new Map<string, ReactionState>()
    for (const entry of counts) {
      states.set(entry.key, {
        senders: previous?.get(entry.key)?.senders ?? new Set<ParticipantId>(),
        reported: { count: entry.count, reactedBySelf: entry.reactedBySelf },
      })
    }
    record.reactions.set(messageId, states)
    refreshReactions(record, messageId)
  }

  const applyRedaction = (
    record: ConversationRecord,
    event: Extract<RelationEvent, { type: 'redaction' }>,
  ): ApplyOutcome => {
    if (record.appliedRelations.has(event.nativeId)) {
      return 'duplicate'
    }

    const reaction = record.reactionIndex.get(event.targetNativeId)
    if (reaction) {
      record.appliedRelations.add(event.nativeId)
      record.reactionIndex.delete(event.targetNativeId)
      const state = record.reactions.get(reaction.messageId)?.get(reaction.key)
      if (state) {
        state.senders.delete(reaction.senderId)
        if (state.reported) {
          state.reported = {
            count: Math.max(0, state.reported.count - 1),
            reactedBySelf: state.reported.reactedBySelf && reaction.senderId !== record.selfParticipantId,
          }
        }
      }
      refreshReactions(record, reaction.messageId)
      return 'applied'
    }

    const editedNativeId = record.editIndex.get(event.targetNativeId)
    if (editedNativeId !== undefined) {
      record.appliedRelations.add(event.nativeId)
      record.editIndex.delete(event.targetNativeId)
      const editedId = record.idByNativeId.get(editedNativeId)
      const edited = editedId ? record.byId.get(editedId) : undefined
      if (!edited || edited.content.kind === 'redacted') {
        return 'ignored'
      }
      renderEdits(
        record,
        edited,
        edited.edits.filter((edit) => edit.nativeId !== event.targetNativeId),
      )
      return 'applied'
    }

    const targetId = record.idByNativeId.get(event.targetNativeId)
    const target = targetId ? record.byId.get(targetId) : undefined
    if (!target) {
      // A relation that was seen but never took effect leaves nothing to undo.
      if (record.appliedRelations.has(event.targetNativeId)) {
        record.appliedRelations.add(event.nativeId)
        return 'ignored'
      }
      return bufferRelation(record, event)
    }
    record.appliedRelations.add(event.nativeId)
    if (target.content.kind === 'redacted') {
      return 'duplicate'
    }

    const redacted: MessageContent = { kind: 'redacted' }
    record.baseContent.set(target.id, redacted)
    record.reactions.delete(target.id)
    dropCiphertext(target.id)
    const delivery: DeliveryState =
      target.delivery.state === 'decryption_failed' ? { state: 'sent' } : target.delivery
    replaceMessage(record, { ...target, content: redacted, edits: [], editedAt: null, reactions: [], delivery })
    return 'applied'
  }

  /** Replays relations that arrived before the edit or reaction they target. */
  function settleRelation(record: ConversationRecord, ctx: ApplyContext, nativeId: string, outcome: ApplyOutcome) {
    if (outcome === 'applied' || outcome === 'ignored') {
      flushRelations(record, ctx, nativeId)
    }
    return outcome
  }

  function applyRelation(record: ConversationRecord, ctx: ApplyContext, event: RelationEvent): ApplyOutcome {
    switch (event.type) {
      case 'edit':
        return settleRelation(record, ctx, event.nativeId, applyEdit(record, ctx, event))
      case 'reaction':
        return settleRelation(record, ctx, event.nativeId, applyReaction(record, ctx, event))
      case 'redaction':
        return applyRedaction(record, event)
      case 'reaction_summary': {
        const targetId = record.idByNativeId.get(event.targetNativeId)
        if (!targetId) {
          return bufferRelation(record, event)
        }
        applyReactionCounts(record, targetId, event.reactions)
        return 'applied'
      }
    }
  }

  const applyReceipt = (
    record: ConversationRecord,
    ctx: ApplyContext,
    event: Extract<StoreEvent, { type: 'receipt' }>,
  ): ApplyOutcome => {
    const targetId = record.idByNativeId.get(event.upToNativeId)
    const target = targetId ? record.byId.get(targetId) : undefined

    if (event.userId === ctx.selfUserId) {
      const unreadAfter = target
        ? record.messages.filter((message) => !message.fromSelf && compareMessages(message, target) > 0).length
        : 0
      const next = Math.min(record.conversation.unreadCount, unreadAfter)
      if (next !== record.conversation.unreadCount) {
        record.conversation.unreadCount = next
        touch(record)
      }
      return 'applied'
    }

    if (!target) {
      return 'ignored'
    }
    for (const message of [...record.messages]) {
      if (compareMessages(message, target) > 0) {
        break
      }
      if (message.fromSelf && message.delivery.state === 'sent') {
        replaceMessage(record, { ...message, delivery: { state: 'delivered' } })
      }
    }
    return 'applied'
  }

  const recordDevice = (accountId: AccountId, nativeUserId: string, deviceId: string, trust?: DeviceTrust) =>
    batch(() => {
      const id = upsertParticipant(accountId, nativeUserId)
      const participant = participants.get(id)
      if (!participant) {
        return
      }
      const existing = participant.devices.find((device) => device.deviceId === deviceId)
      if (existing && (trust === undefined || existing.trust === trust)) {
        return
      }
      const devices = existing
        ? participant.devices.map((device) =>
            device.deviceId === deviceId ? { deviceId, trust: trust ?? device.trust } : device,
          )
        : [...participant.devices, { deviceId, trust: trust ?? 'unverified' }]
      participants.set(id, Object.freeze({ ...participant, devices }))
      touchParticipantConversations(id)
    })

  const applyEvent = (ctx: ApplyContext, event: StoreEvent): ApplyOutcome =>
    batch(() => {
      switch (event.type) {
        case 'conversation':
          applyConversationUpdate(ctx, event.update)
          return 'applied'
        case 'device':
          recordDevice(ctx.accountId, event.userId, event.deviceId)
          return 'applied'
        case 'message':
          return applyMessage(ensureRecord(ctx, event.conversationNativeId), ctx, event)
        case 'receipt':
          return applyReceipt(ensureRecord(ctx, event.conversationNativeId), ctx, event)
        default:
          return applyRelation(ensureRecord(ctx, event.conversationNativeId), ctx, event)
      }
    })

  const contextFor = (record: ConversationRecord): ApplyContext => ({
    accountId: record.conversation.accountId,
    backend: record.conversation.backend,
    selfUserId: record.selfParticipantId.slice(record.conversation.accountId.length + 1),
    live: true,
  })

  const recordFor = (conversationId: ConversationId) => records.get(conversationId) ?? null

  const recordForMessage = (messageId: MessageId) => {
    const conversationId = messageIndex.get(messageId)
    return conversationId ? recordFor(conversationId) : null
  }

  const addProvisional = (
    conversationId: ConversationId,
    draft: { body: string; format: MessageFormat; transactionId: string },
  ): Message | null =>
    batch(() => {
      const record = recordFor(conversationId)
      if (!record) {
        return null
      }
      record.provisionalSequence += 1
      const selfNativeId = record.selfParticipantId.slice(record.conversation.accountId.length + 1)
      linkParticipant(record, upsertParticipant(record.conversation.accountId, selfNativeId))
      const content: MessageContent = { kind: 'text', body: draft.body, format: draft.format }
      const latest = record.messages[record.messages.length - 1]
      const message: Message = Object.freeze<Message>({
        id: provisionalIdFor(conversationId, record.provisionalSequence),
        conversationId,
        nativeId: null,
        transactionId: draft.transactionId,
        senderId: record.selfParticipantId,
        fromSelf: true,
        timestamp: Math.max(Date.now(), latest?.timestamp ?? 0),
        content,
        edits: [],
        editedAt: null,
        reactions: [],
        delivery: { state: 'pending' },
      })
      indexMessage(record, message, content)
      record.idByTransaction.set(draft.transactionId, message.id)
      return message
    })

  /**
   * Settles a provisional message against the server id returned by a send.
   * Returns the surviving server MessageId, or null when the provisional
   * message was discarded and no server copy arrived.
   */
  const reconcileProvisional = (
    conversationId: ConversationId,
    provisionalId: MessageId,
    nativeId: string,
  ): MessageId | null =>
    batch(() => {
      const record = recordFor(conversationId)
      if (!record) {
        return null
      }
      const serverId = record.idByNativeId.get(nativeId)
      if (!record.byId.has(provisionalId)) {
        return serverId ?? null
      }
      if (serverId) {
        const provisional = record.byId.get(provisionalId)
        const server = record.byId.get(serverId)
        unindexMessage(record, provisionalId)
        if (provisional && server && server.delivery.state !== 'delivered') {
          replaceMessage(record, { ...server, transactionId: provisional.transactionId, delivery: { state: 'sent' } })
        }
        return serverId
      }
      const adopted = adoptProvisional(record, provisionalId, nativeId, null)
      if (!adopted) {
        return null
      }
      flushRelations(record, contextFor(record), nativeId)
      return adopted.id
    })

  const setDelivery = (messageId: MessageId, delivery: DeliveryState) =>
    batch(() => {
      const record = recordForMessage(messageId)
      const message = record?.byId.get(messageId)
      if (!record || !message) {
        return false
      }
      replaceMessage(record, { ...message, delivery })
      return true
    })

  const removeMessage = (messageId: MessageId) =>
    batch(() => {
      const record = recordForMessage(messageId)
      return record ? unindexMessage(record, messageId) !== null : false
    })

  const applyLocalEdit = (messageId: MessageId, localKey: string, body: string) =>
    batch(() => {
      const record = recordForMessage(messageId)
      const target = record?.byId.get(messageId)
      if (!record || !target || target.content.kind === 'redacted') {
        return false
      }
      const newest = target.edits[target.edits.length - 1]
      const edits = [
        ...target.edits,
        { nativeId: localKey, body, timestamp: Math.max(Date.now(), (newest?.timestamp ?? 0) + 1) },
      ]
      renderEdits(record, target, edits)
      return true
    })

  /** Swaps a local edit for its server id, or drops it when `nativeId` is null. */
  const settleLocalEdit = (messageId: MessageId, localKey: string, nativeId: string | null) =>
    batch(() => {
      const record = recordForMessage(messageId)
      const target = record?.byId.get(messageId)
      if (!record || !target) {
        return
      }
      const local = target.edits.find((edit) => edit.nativeId === localKey)
      const edits = target.edits.filter((edit) => edit.nativeId !== localKey)
      if (!local || !nativeId || record.appliedRelations.has(nativeId)) {
        renderEdits(record, target, edits)
        return
      }
      record.appliedRelations.add(nativeId)
      if (target.nativeId) {
        record.editIndex.set(nativeId, target.nativeId)
      }
      renderEdits(record, target, [...edits, { ...local, nativeId }].sort(compareEdits))
      flushRelations(record, contextFor(record), nativeId)
    })

  const applyLocalReaction = (messageId: MessageId, key: string, present: boolean) =>
    batch(() => {
      const record = recordForMessage(messageId)
      const target = record?.byId.get(messageId)
      if (!record || !target || target.content.kind === 'redacted') {
        return false
      }
      const self = record.selfParticipantId
      const states = record.reactions.get(messageId) ?? new Map<string, ReactionState>()
      const state = states.get(key) ?? { senders: new Set<ParticipantId>(), reported: null }
      const had = state.senders.has(self) || Boolean(state.reported?.reactedBySelf)
      if (had === present) {
        return false
      }
      if (present) {
        state.senders.add(self)
      } else {
        state.senders.delete(self)
      }
      if (state.reported) {
        state.reported = {
          count: Math.max(0, state.reported.count + (present ? 1 : -1)),
          reactedBySelf: present,
        }
      }
      states.set(key, state)
      record.reactions.set(messageId, states)
      refreshReactions(record, messageId)
      return true
    })

  /** Local redaction after the server accepted a delete. */
  const applyLocalRedaction = (messageId: MessageId, redactionNativeId: string) =>
    batch(() => {
      const record = recordForMessage(messageId)
      const target = record?.byId.get(messageId)
      if (!record || !target?.nativeId) {
        return
      }
      applyRedaction(record, {
        type: 'redaction',
        conversationNativeId: record.conversation.nativeId,
        nativeId: redactionNativeId,
        targetNativeId: target.nativeId,
      })
    })

  /** Resets unread; returns the newest server-acknowledged native id. */
  const markRead = (conversationId: ConversationId): string | null =>
    batch(() => {
      const record = recordFor(conversationId)
      if (!record) {
        return null
      }
      if (record.conversation.unreadCount !== 0) {
        record.conversation.unreadCount = 0
        touch(record)
      }
      for (let index = record.messages.length - 1; index >= 0; index -= 1) {
        const nativeId = record.messages[index]?.nativeId
        if (nativeId) {
          return nativeId
        }
      }
      return null
    })

  const pendingCiphertexts = (accountId: AccountId, sessionId?: string): PendingCiphertext[] => {
    const ids = sessionId
      ? [...(ciphertextsBySession.get(`${accountId}|${sessionId}`) ?? [])]
      : [...ciphertexts.entries()].filter(([, ref]) => ref.accountId === accountId).map(([id]) => id)
    const pending: PendingCiphertext[] = []
    for (const messageId of ids) {
      const ref = ciphertexts.get(messageId)
      const conversationId = messageIndex.get(messageId)
      if (ref && conversationId) {
        pending.push({ messageId, conversationId, payload: ref.payload })
      }
    }
    return pending
  }

  const resolveCiphertext = (messageId: MessageId, outcome: CiphertextOutcome) =>
    batch(() => {
      const record = recordForMessage(messageId)
      const message = record?.byId.get(messageId)
      if (!record || !message) {
        return
      }
      if (!outcome.ok) {
        if (message.delivery.state !== 'decryption_failed' || message.delivery.reason !== outcome.reason) {
          replaceMessage(record, { ...message, delivery: { state: 'decryption_failed', reason: outcome.reason } })
        }
        return
      }
      dropCiphertext(messageId)
      record.baseContent.set(messageId, outcome.content)
      replaceMessage(record, {
        ...message,
        content: renderContent(outcome.content, message.edits),
        delivery: message.delivery.state === 'decryption_failed' ? { state: 'sent' } : message.delivery,
      })
    })

  const setTyping = (conversationId: ConversationId, typing: ParticipantId[]) =>
    batch(() => {
      const record = recordFor(conversationId)
      if (!record || sameMembers(record.typing, typing)) {
        return
      }
      record.typing = [...typing]
      touch(record)
    })

  const historyState = (conversationId: ConversationId): HistoryState | null => {
    const record = recordFor(conversationId)
    return record ? { ...record.history } : null
  }

  const setHistoryState = (conversationId: ConversationId, next: HistoryState) =>
    batch(() => {
      const record = recordFor(conversationId)
      if (!record) {
        return
      }
      if (record.history.exhausted !== next.exhausted) {
        touch(record)
      }
      record.history = { ...next }
    })

  const removeAccount = (accountId: AccountId) =>
    batch(() => {
      for (const [id, record] of records) {
        if (record.conversation.accountId !== accountId) {
          continue
        }
        for (const messageId of record.byId.keys()) {
          messageIndex.delete(messageId)
          dropCiphertext(messageId)
        }
        records.delete(id)
        dirty.add(id)
      }
      for (const [id, participant] of participants) {
        if (participant.accountId === accountId) {
          participants.delete(id)
          conversationsByParticipant.delete(id)
        }
      }
    })

  const getConversation = (conversationId: ConversationId): ConversationView | null =>
    snapshot.value.conversations.get(conversationId) ?? null

  const findMessage = (messageId: MessageId): Message | null =>
    recordForMessage(messageId)?.byId.get(messageId) ?? null

  const findMessageByNativeId = (conversationId: ConversationId, nativeId: string): Message | null => {
    const record = recordFor(conversationId)
    const id = record?.idByNativeId.get(nativeId)
    return id ? (record?.byId.get(id) ?? null) : null
  }

  const getParticipant = (participantId: ParticipantId): Participant | null =>
    participants.get(participantId) ?? null

  const conversationIds = (accountId?: AccountId): ConversationId[] =>
    [...records.values()]
      .filter((record) => !accountId || record.conversation.accountId === accountId)
      .map((record) => record.conversation.id)

  const pendingRelationCount = (conversationId: ConversationId) => {
    const record = recordFor(conversationId)
    if (!record) {
      return 0
    }
    let count = 0
    for (const queue of record.pendingRelations.values()) {
      count += queue.length
    }
    return count
  }

  return {
    snapshot,
    version,
    batch,
    onCommit,
    applyEvent,
    applyConversationUpdate,
    addProvisional,
    reconcileProvisional,
    setDelivery,
    removeMessage,
    applyLocalEdit,
    settleLocalEdit,
    applyLocalReaction,
    applyLocalRedaction,
    markRead,
    recordDevice,
    pendingCiphertexts,
    resolveCiphertext,
    setTyping,
    historyState,
    setHistoryState,
    removeAccount,
    getConversation,
    findMessage,
    findMessageByNativeId,
    getParticipant,
    conversationIds,
    pendingRelationCount,
  }
})
