import type { BackendKind, EncryptedPayload, Membership, MessageFormat } from '@/types/chat'

export interface MatrixLoginRequest {
  backend: 'matrix'
  homeserver: string
  username: string
  password: string
  deviceName?: string
}

export interface TelegramLoginRequest {
  backend: 'telegram'
  phoneNumber: string
  apiId?: number
  apiHash?: string
  phoneCode: () => Promise<string>
  password?: (hint?: string) => Promise<string>
}

export type LoginRequest = MatrixLoginRequest | TelegramLoginRequest

export interface MatrixSessionData {
  backend: 'matrix'
  homeserver: string
  userId: string
  deviceId: string
  accessToken: string
}

export interface TelegramSessionData {
  backend: 'telegram'
  apiId: number
  apiHash: string
  userId: string
  session: string
}

export type SessionData = MatrixSessionData | TelegramSessionData

export interface AccountProfile {
  userId: string
  displayName: string
  avatarUrl: string | null
}

export interface LoginResult {
  session: SessionData
  profile: AccountProfile
}

export interface ParticipantUpdate {
  nativeId: string
  displayName?: string
  avatarUrl?: string | null
}

export interface ConversationUpdate {
  nativeId: string
  displayName?: string
  /** Used only while the conversation has no explicit name. */
  fallbackName?: string
  participants?: ParticipantUpdate[]
  removedParticipants?: string[]
  encrypted?: boolean
  membership?: Membership
  lastActivityAt?: number
  unreadCount?: number
}

export interface RoomKey {
  algorithm: string
  roomId: string
  sessionId: string
  sessionKey: string
  senderKey?: string | null
}

export type PresenceState = 'online' | 'offline' | 'unavailable'

export type NativeMessageContent =
  | { kind: 'text'; body: string; format: MessageFormat }
  | { kind: 'ciphertext'; payload: EncryptedPayload }

export interface ReactionCount {
  key: string
  count: number
  reactedBySelf: boolean
}

export type NormalizedEvent =
  | { type: 'conversation'; update: ConversationUpdate }
  | {
      type: 'message'
      conversationNativeId: string
      nativeId: string
      senderId: string
      timestamp: number
      transactionId: string | null
      content: NativeMessageContent
    }
  | {
      type: 'edit'
      conversationNativeId: string
      nativeId: string
      targetNativeId: string
      senderId: string
      body: string
      timestamp: number
    }
  | {
      type: 'reaction'
      conversationNativeId: string
      nativeId: string
      targetNativeId: string
      senderId: string
      key: string
    }
  | {
      type: 'reaction_summary'
      conversationNativeId: string
      targetNativeId: string
      reactions: ReactionCount[]
    }
  | { type: 'redaction'; conversationNativeId: string; nativeId: string; targetNativeId: string }
  | { type: 'receipt'; conversationNativeId: string; userId: string; upToNativeId: string }
  | {
      type: 'typing'
      conversationNativeId: string
      started: string[]
      stopped: string[]
      /** `started` is the complete set of typing users. */
      exhaustive: boolean
    }
  | { type: 'presence'; userId: string; state: PresenceState; lastActiveAt: number | null }
  | { type: 'room_key'; key: RoomKey }
  | { type: 'device'; userId: string; deviceId: string }

export interface SyncBatch<TNative> {
  events: TNative[]
  cursor: string | null
}

export interface HistoryPage<TNative> {
  events: TNative[]
  nextToken: string | null
}

export interface OutgoingContent {
  body: string
  format: MessageFormat
}

export interface EncryptionCapability {
  sendEncrypted(
    conversationNativeId: string,
    payload: EncryptedPayload,
    transactionId: string,
    signal: AbortSignal,
  ): Promise<string>
  shareRoomKey(conversationNativeId: string, key: RoomKey, signal: AbortSignal): Promise<void>
  requestRoomKey(payload: EncryptedPayload, signal: AbortSignal): Promise<void>
}

/**
 * Capability set every messaging backend implements. `TNative` is the
 * variant's own wire event type; the sync engine only ever sees it through
 * {@link BackendAdapter.translate}.
 *
 * Every rejected promise carries a classified `ChatError`
 * (auth, transient or permanent).
 */
export interface BackendAdapter<TNative = unknown> {
  readonly backend: BackendKind
  readonly encryption?: EncryptionCapability

  login(request: LoginRequest, signal?: AbortSignal): Promise<LoginResult>
  connect(session: SessionData, signal: AbortSignal): Promise<AccountProfile>
  /** Sets where the next {@link BackendAdapter.streamEvents} call starts. */
  resume(cursor: string | null): void
  /** Infinite and single-use: a second call needs a fresh `resume`. */
  streamEvents(signal: AbortSignal): AsyncIterable<SyncBatch<TNative>>
  translate(native: TNative): NormalizedEvent[]
  listConversations(signal: AbortSignal): Promise<ConversationUpdate[]>
  fetchHistory(
    conversationNativeId: string,
    before: string | null,
    limit: number,
    signal: AbortSignal,
  ): AsyncIterable<HistoryPage<TNative>>
  send(
    conversationNativeId: string,
    content: OutgoingContent,
    transactionId: string,
    signal: AbortSignal,
  ): Promise<string>
  edit(
    conversationNativeId: string,
    targetNativeId: string,
    body: string,
    transactionId: string,
    signal: AbortSignal,
  ): Promise<string>
  react(
    conversationNativeId: string,
    targetNativeId: string,
    key: string,
    transactionId: string,
    signal: AbortSignal,
  ): Promise<string>
  redact(
    conversationNativeId: string,
    targetNativeId: string,
    transactionId: string,
    signal: AbortSignal,
  ): Promise<void>
  markRead(conversationNativeId: string, upToNativeId: string | null, signal: AbortSignal): Promise<void>
  setTyping(conversationNativeId: string, typing: boolean, signal: AbortSignal): Promise<void>
  /** Latest persistable session material; some backends rotate it while connected. */
  currentSession(): SessionData | null
  disconnect(): Promise<void>
  logout(signal: AbortSignal): Promise<void>
}
