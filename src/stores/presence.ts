import { defineStore } from 'pinia'
import { ref } from 'vue'

import { getRuntimeConfig } from '@/config/runtime'
import { useConversationStore } from '@/stores/conversations'
import type { PresenceState } from '@/types/backend'
import { participantIdFor, type AccountId, type ConversationId, type ParticipantId } from '@/types/chat'

export interface PresenceEntry {
  state: PresenceState
  lastActiveAt: number | null
  updatedAt: number
}

interface TypingNotice {
  conversationId: ConversationId
  accountId: AccountId
  selfUserId: string
  started: string[]
  stopped: string[]
  exhaustive: boolean
}

export const usePresenceStore = defineStore('presence', () => {
  const conversationStore = useConversationStore()

  const presence = ref<Record<ParticipantId, PresenceEntry>>({})
  const typingExpiry = new Map<ConversationId, Map<ParticipantId, number>>()
  const typingTimers = new Map<ConversationId, ReturnType<typeof setTimeout>>()
  const outgoingTyping = new Map<ConversationId, { typing: boolean; sentAt: number }>()

  const publishTyping = (conversationId: ConversationId, now = Date.now()) => {
    const entries = typingExpiry.get(conversationId)
    const active: ParticipantId[] = []
    let nextExpiry = Number.POSITIVE_INFINITY

    for (const [participantId, expiresAt] of entries ?? []) {
      if (expiresAt <= now) {
        entries?.delete(participantId)
        continue
      }
      active.push(participantId)
      nextExpiry = Math.min(nextExpiry, expiresAt)
    }
    active.sort()
    conversationStore.setTyping(conversationId, active)

    const timer = typingTimers.get(conversationId)
    if (timer) {
      clearTimeout(timer)
      typingTimers.delete(conversationId)
    }
    if (Number.isFinite(nextExpiry)) {
      typingTimers.set(
        conversationId,
        setTimeout(() => {
          typingTimers.delete(conversationId)
          publishTyping(conversationId)
        }, nextExpiry - now),
      )
    } else {
      typingExpiry.delete(conversationId)
    }
  }

  const applyTyping = (notice: TypingNotice) => {
    const now = Date.now()
    const expiresAt = now + getRuntimeConfig().presence.typingTtlMs
    const entries = notice.exhaustive
      ? new Map<ParticipantId, number>()
      : (typingExpiry.get(notice.conversationId) ?? new Map<ParticipantId, number>())

    for (const userId of notice.started) {
      if (userId !== notice.selfUserId) {
        entries.set(participantIdFor(notice.accountId, userId), expiresAt)
      }
    }
    for (const userId of notice.stopped) {
      entries.delete(participantIdFor(notice.accountId, userId))
    }
    typingExpiry.set(notice.conversationId, entries)
    publishTyping(notice.conversationId, now)
  }

  const applyPresence = (accountId: AccountId, userId: string, state: PresenceState, lastActiveAt: number | null) => {
    presence.value = {
      ...presence.value,
      [participantIdFor(accountId, userId)]: { state, lastActiveAt, updatedAt: Date.now() },
    }
  }

  const presenceOf = (participantId: ParticipantId): PresenceEntry | null => presence.value[participantId] ?? null

  /**
   * Whether a local typing change should reach the server. Repeated "typing"
   * notices are throttled; a stop is sent only after a start.
   */
  const shouldSendTyping = (conversationId: ConversationId, typing: boolean, now = Date.now()) => {
    const last = outgoingTyping.get(conversationId)
    if (typing) {
      if (last?.typing && now - last.sentAt < getRuntimeConfig().presence.typingThrottleMs) {
        return false
      }
    } else if (!last?.typing) {
      return false
    }
    outgoingTyping.set(conversationId, { typing, sentAt: now })
    return true
  }

  const forgetAccount = (accountId: AccountId) => {
    const prefix = `${accountId}/`
    for (const conversationId of [...typingExpiry.keys(), ...typingTimers.keys(), ...outgoingTyping.keys()]) {
      if (!conversationId.startsWith(prefix)) {
        continue
      }
      const timer = typingTimers.get(conversationId)
      if (timer) {
        clearTimeout(timer)
      }
      typingTimers.delete(conversationId)
      typingExpiry.delete(conversationId)
      outgoingTyping.delete(conversationId)
    }
    presence.value = Object.fromEntries(
      Object.entries(presence.value).filter(([participantId]) => !participantId.startsWith(prefix)),
    )
  }

  return {
    presence,
    applyTyping,
    applyPresence,
    presenceOf,
    shouldSendTyping,
    forgetAccount,
  }
})
