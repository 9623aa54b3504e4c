import type { ReactionCount } from '@/types/backend'

export type TelegramChatKind = 'user' | 'group' | 'channel'

export interface TelegramDialogData {
  chatId: string
  kind: TelegramChatKind
  title: string
  unreadCount: number
  lastMessageAt: number | null
}

export interface TelegramMessageData {
  id: number
  chatId: string
  senderId: string
  out: boolean
  /** Unix seconds, as sent by the server. */
  date: number
  editDate: number | null
  text: string
}

/** Telegram update-state triple; serialized as the sync cursor. */
export interface TelegramUpdateState {
  pts: number
  qts: number
  date: number
}

export type TelegramNativeEvent =
  | { kind: 'dialog'; dialog: TelegramDialogData }
  | { kind: 'new_message'; message: TelegramMessageData; pts: number | null }
  /** Server id assigned to an outgoing message, keyed by the random id it was sent with. */
  | { kind: 'message_id'; messageId: number; randomId: string }
  | { kind: 'edit_message'; message: TelegramMessageData; pts: number | null }
  | { kind: 'delete_messages'; chatId: string | null; messageIds: number[]; pts: number | null }
  | { kind: 'read_history'; chatId: string; maxId: number; outbox: boolean; pts: number | null }
  | { kind: 'typing'; chatId: string; userId: string; typing: boolean }
  | { kind: 'user_status'; userId: string; online: boolean; lastSeenAt: number | null }
  | { kind: 'reactions'; chatId: string; messageId: number; reactions: ReactionCount[] }

export interface TelegramCredentials {
  apiId: number
  apiHash: string
  session: string
}

export interface TelegramSelf {
  userId: string
  displayName: string
}

export interface TelegramAuthPrompts {
  phoneNumber: string
  phoneCode: () => Promise<string>
  password?: (hint?: string) => Promise<string>
}

export interface TelegramDifference {
  events: TelegramNativeEvent[]
  state: TelegramUpdateState
  final: boolean
}

/**
 * The slice of an MTProto client the adapter needs. Chat ids are the
 * client's marked peer ids, as strings.
 */
export interface TelegramTransport {
  connect(credentials: TelegramCredentials): Promise<TelegramSelf>
  signIn(credentials: TelegramCredentials, prompts: TelegramAuthPrompts): Promise<TelegramSelf>
  exportSession(): string
  getDialogs(limit: number): Promise<TelegramDialogData[]>
  getHistory(chatId: string, beforeMessageId: number | null, limit: number): Promise<TelegramMessageData[]>
  /** `randomId` is a signed 64-bit integer in decimal; the server drops repeats. */
  sendMessage(chatId: string, text: string, randomId: string): Promise<TelegramMessageData>
  editMessage(chatId: string, messageId: number, text: string): Promise<TelegramMessageData>
  deleteMessages(chatId: string, messageIds: number[]): Promise<void>
  sendReaction(chatId: string, messageId: number, emoticon: string): Promise<void>
  readHistory(chatId: string, maxId: number): Promise<void>
  setTyping(chatId: string, typing: boolean): Promise<void>
  getState(): Promise<TelegramUpdateState>
  getDifference(state: TelegramUpdateState): Promise<TelegramDifference>
  onUpdate(listener: (event: TelegramNativeEvent) => void): () => void
  disconnect(): Promise<void>
  logOut(): Promise<void>
}

export type TelegramTransportFactory = () => Promise<TelegramTransport>
