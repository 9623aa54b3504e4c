export type BackendKind = 'matrix' | 'telegram'

export type AccountId = string
export type ConversationId = string
export type MessageId = string
export type ParticipantId = string

export type Membership = 'joined' | 'invited' | 'left' | 'archived'

export interface Conversation {
  id: ConversationId
  accountId: AccountId
  backend: BackendKind
  nativeId: string
  displayName: string
  participantIds: ParticipantId[]
  lastActivityAt: number
  unreadCount: number
  encrypted: boolean
  membership: Membership
}

export type DeviceTrust = 'verified' | 'unverified' | 'blocked'

export interface ParticipantDevice {
  deviceId: string
  trust: DeviceTrust
}

export interface Participant {
  id: ParticipantId
  accountId: AccountId
  nativeId: string
  displayName: string
  avatarUrl: string | null
  devices: ParticipantDevice[]
}

export interface EncryptedPayload {
  algorithm: string
  roomId: string
  sessionId: string
  ciphertext: string
  senderKey?: string | null
  deviceId?: string | null
}

export type MessageFormat = 'plain' | 'emote' | 'notice'

export type MessageContent =
  | { kind: 'text'; body: string; format: MessageFormat }
  | { kind: 'encrypted'; algorithm: string; sessionId: string }
  | { kind: 'redacted' }

export type DeliveryState =
  | { state: 'pending' }
  | { state: 'sent' }
  | { state: 'delivered' }
  | { state: 'failed'; reason: string }
  | { state: 'decryption_failed'; reason: string }

export interface MessageEdit {
  nativeId: string
  body: string
  timestamp: number
}

export interface ReactionSummary {
  key: string
  count: number
  senders: ParticipantId[]
  reactedBySelf: boolean
}

export interface Message {
  id: MessageId
  conversationId: ConversationId
  nativeId: string | null
  transactionId: string | null
  senderId: ParticipantId
  fromSelf: boolean
  timestamp: number
  content: MessageContent
  edits: MessageEdit[]
  editedAt: number | null
  reactions: ReactionSummary[]
  delivery: DeliveryState
}

export interface MessageGroup {
  senderId: ParticipantId
  fromSelf: boolean
  messageIds: MessageId[]
}

export interface ConversationView {
  conversation: Readonly<Conversation>
  messages: readonly Readonly<Message>[]
  groups: readonly MessageGroup[]
  participants: readonly Readonly<Participant>[]
  typing: readonly ParticipantId[]
  hasMoreHistory: boolean
  version: number
}

export interface StoreSnapshot {
  version: number
  conversations: ReadonlyMap<ConversationId, ConversationView>
}

export type Intent =
  | { type: 'send'; conversationId: ConversationId; body: string; format?: MessageFormat }
  | { type: 'edit'; conversationId: ConversationId; messageId: MessageId; body: string }
  | { type: 'react'; conversationId: ConversationId; messageId: MessageId; key: string }
  | { type: 'delete'; conversationId: ConversationId; messageId: MessageId }
  | { type: 'mark_read'; conversationId: ConversationId }
  | { type: 'resend'; conversationId: ConversationId; messageId: MessageId }
  | { type: 'discard'; conversationId: ConversationId; messageId: MessageId }
  | { type: 'typing'; conversationId: ConversationId; typing: boolean }

export interface IntentReceipt {
  ok: boolean
  commandId: string | null
  messageId: MessageId | null
  error: string | null
}

export const accountIdFor = (backend: BackendKind, nativeUserId: string): AccountId =>
  `${backend}:${nativeUserId}`

export const conversationIdFor = (accountId: AccountId, nativeId: string): ConversationId =>
  `${accountId}/${nativeId}`

export const messageIdFor = (conversationId: ConversationId, nativeId: string): MessageId =>
  `${conversationId}/${nativeId}`

export const provisionalIdFor = (conversationId: ConversationId, sequence: number): MessageId =>
  `${conversationId}/~${sequence}`

export const participantIdFor = (accountId: AccountId, nativeUserId: string): ParticipantId =>
  `${accountId}/${nativeUserId}`

export const isProvisionalId = (id: MessageId) => /\/~\d+$/.test(id)
