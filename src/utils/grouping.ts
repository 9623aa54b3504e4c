import type { Message, MessageGroup } from '@/types/chat'

/** Consecutive messages from one sender collapse into a single run. */
export const groupMessages = (messages: readonly Message[]): MessageGroup[] => {
  const groups: MessageGroup[] = []
  let current: MessageGroup | null = null

  for (const message of messages) {
    if (current && current.senderId === message.senderId) {
      current.messageIds.push(message.id)
      continue
    }
    current = {
      senderId: message.senderId,
      fromSelf: message.fromSelf,
      messageIds: [message.id],
    }
    groups.push(current)
  }

  return groups
}
