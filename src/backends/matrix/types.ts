import type { Membership } from '@/types/chat'

export interface MatrixEvent {
  type: string
  event_id?: string
  sender?: string
  origin_server_ts?: number
  state_key?: string
  redacts?: string
  content: Record<string, unknown>
  unsigned?: {
    transaction_id?: string
    redacted_because?: { event_id?: string }
    age?: number
  }
}

export interface MatrixRoomSummary {
  'm.heroes'?: string[]
  'm.joined_member_count'?: number
}

export interface MatrixJoinedRoom {
  summary?: MatrixRoomSummary
  state?: { events: MatrixEvent[] }
  timeline?: { events: MatrixEvent[]; limited?: boolean; prev_batch?: string }
  ephemeral?: { events: MatrixEvent[] }
  unread_notifications?: { notification_count?: number; highlight_count?: number }
}

export interface MatrixInvitedRoom {
  invite_state?: { events: MatrixEvent[] }
}

export interface MatrixSyncResponse {
  next_batch: string
  rooms?: {
    join?: Record<string, MatrixJoinedRoom>
    invite?: Record<string, MatrixInvitedRoom>
    leave?: Record<string, MatrixJoinedRoom>
  }
  presence?: { events: MatrixEvent[] }
  to_device?: { events: MatrixEvent[] }
}

export interface MatrixLoginResponse {
  user_id: string
  access_token: string
  device_id: string
  home_server?: string
  well_known?: { 'm.homeserver'?: { base_url?: string } }
}

export interface MatrixWhoAmIResponse {
  user_id: string
  device_id?: string
}

export interface MatrixProfileResponse {
  displayname?: string | null
  avatar_url?: string | null
}

export interface MatrixMessagesResponse {
  start: string
  end?: string
  chunk: MatrixEvent[]
  state?: MatrixEvent[]
}

export interface MatrixJoinedMembersResponse {
  joined: Record<string, { display_name?: string | null; avatar_url?: string | null }>
}

/** One unit of the Matrix event stream, flattened out of a `/sync` response. */
export type MatrixNativeEvent =
  | {
      kind: 'room'
      roomId: string
      membership: Membership
      heroes: string[]
      unreadCount: number | null
    }
  | { kind: 'state'; roomId: string; event: MatrixEvent }
  | { kind: 'timeline'; roomId: string; event: MatrixEvent }
  | { kind: 'ephemeral'; roomId: string; event: MatrixEvent }
  | { kind: 'presence'; event: MatrixEvent }
  | { kind: 'to_device'; event: MatrixEvent }
