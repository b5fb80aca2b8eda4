// Domain types shared by the cache store, gateway, reconciler and view state.

export interface Message {
  id: string
  threadId: string
  fromAddress: string | null
  toAddress: string | null
  subject: string | null
  snippet: string | null
  bodyPlain: string | null
  bodyHtml: string | null
  /** Milliseconds since epoch. The only sort key. */
  internalDate: number
  isRead: boolean
  /** Label set at the moment this value was produced (cache read or remote fetch). */
  labelIds: string[]
}

export type LabelType = 'system' | 'user'

export interface Label {
  id: string
  name: string
  type: LabelType
  colorForeground: string | null
  colorBackground: string | null
}

/** A label as read back from the cache, with its display name. */
export interface CachedLabel extends Label {
  displayName: string
}

/** One row of a remote per-label listing. */
export interface ListingEntry {
  id: string
  internalDate: number
  /** Present when the gateway knows the remote read state without a full fetch. */
  unread?: boolean
}

export interface MessageListing {
  entries: ListingEntry[]
  /** False when the remote had more pages than were fetched. */
  complete: boolean
}

export const INBOX = 'INBOX'
export const TRASH = 'TRASH'
export const UNREAD = 'UNREAD'

/** Deep copy of a message. Snapshots must not share the labelIds array with live values. */
export function cloneMessage(message: Message): Message {
  return { ...message, labelIds: [...message.labelIds] }
}
