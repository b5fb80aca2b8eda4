// Shared fixtures for tests: an in-memory cache, an in-process fake of the remote
// mailbox, message/label builders and a logger that records lines.

import { NotFoundError, type ApiError, type AuthError } from './api-utils.js'
import { CacheStore } from './cache-store.js'
import { IN_MEMORY, openDatabase } from './db.js'
import type { CachedDateLookup, RemoteGateway } from './gmail-gateway.js'
import type { Logger } from './logger.js'
import { cloneMessage, INBOX, TRASH, UNREAD, type Label, type Message, type MessageListing } from './types.js'

export function createTestStore(): CacheStore {
  return new CacheStore(openDatabase(IN_MEMORY))
}

export function makeLabel(id: string, name = id, type: Label['type'] = id === id.toUpperCase() ? 'system' : 'user'): Label {
  return { id, name, type, colorForeground: null, colorBackground: null }
}

export function makeMessage(id: string, overrides: Partial<Message> = {}): Message {
  return {
    id,
    threadId: `t-${id}`,
    fromAddress: 'Alice <alice@example.com>',
    toAddress: 'bob@example.com',
    subject: `Subject ${id}`,
    snippet: `Snippet for ${id}`,
    bodyPlain: `Body of ${id}`,
    bodyHtml: null,
    internalDate: 1_700_000_000_000,
    isRead: false,
    labelIds: [INBOX],
    ...overrides,
  }
}

export interface RecordingLogger extends Logger {
  lines: string[]
}

export function recordingLogger(): RecordingLogger {
  const lines: string[] = []
  return {
    lines,
    debug: (msg) => lines.push(`debug ${msg}`),
    info: (msg) => lines.push(`info ${msg}`),
    warn: (msg) => lines.push(`warn ${msg}`),
    error: (msg, err) => lines.push(`error ${msg}${err instanceof Error ? `: ${err.message}` : ''}`),
  }
}

// ---------------------------------------------------------------------------
// Fake remote mailbox
// ---------------------------------------------------------------------------

type FakeResult = void | AuthError | ApiError

/**
 * In-process stand-in for the remote mailbox. `messages` holds the remote truth;
 * mutations edit label sets the way the server does. Set `fail[method]` to make a
 * method return an error, and use holdMutations() to delay mutating calls.
 */
export class FakeGateway implements RemoteGateway {
  labels: Label[] = [makeLabel(INBOX), makeLabel(TRASH)]
  messages = new Map<string, Message>()
  pageSize = 100
  calls: string[] = []
  fail: Partial<Record<keyof RemoteGateway, AuthError | ApiError>> = {}
  /** Per-id getMessage failures. */
  failGet = new Map<string, AuthError | ApiError>()
  /** `id=date` answers of the caller's cache lookup for listed ids, `none` when not cached. */
  cachedLookups: string[] = []

  private trashed = new Map<string, string[]>()
  private hold: Promise<void> | null = null

  /** Put messages on the remote. isRead follows the UNREAD label, as on the server. */
  add(...messages: Message[]) {
    for (const m of messages) {
      this.messages.set(m.id, { ...cloneMessage(m), isRead: !m.labelIds.includes(UNREAD) })
    }
  }

  /** Delay every mutating call until the returned function is called. */
  holdMutations(): () => void {
    let release = () => {}
    this.hold = new Promise<void>((resolve) => {
      release = () => {
        this.hold = null
        resolve()
      }
    })
    return release
  }

  async listLabels() {
    this.calls.push('listLabels')
    return this.fail.listLabels ?? this.labels.map((l) => ({ ...l }))
  }

  async listMessages(labelId: string, cachedDate?: CachedDateLookup): Promise<MessageListing | AuthError | ApiError> {
    this.calls.push(`listMessages ${labelId}`)
    if (this.fail.listMessages) return this.fail.listMessages
    const matching = [...this.messages.values()]
      .filter((m) => m.labelIds.includes(labelId))
      .sort((a, b) => b.internalDate - a.internalDate)
    if (cachedDate) {
      for (const m of matching.slice(0, this.pageSize)) {
        this.cachedLookups.push(`${m.id}=${cachedDate(m.id) ?? 'none'}`)
      }
    }
    return {
      entries: matching.slice(0, this.pageSize).map((m) => ({
        id: m.id,
        internalDate: m.internalDate,
        unread: m.labelIds.includes(UNREAD),
      })),
      complete: matching.length <= this.pageSize,
    }
  }

  async getMessage(id: string) {
    this.calls.push(`getMessage ${id}`)
    const failure = this.failGet.get(id) ?? this.fail.getMessage
    if (failure) return failure
    const message = this.messages.get(id)
    if (!message) return new NotFoundError({ resource: `Message ${id}` })
    return cloneMessage(message)
  }

  async trash(id: string) {
    return this.mutate('trash', id, (m) => {
      this.trashed.set(id, m.labelIds)
      m.labelIds = [TRASH]
    })
  }

  async untrash(id: string) {
    return this.mutate('untrash', id, (m) => {
      if (!m.labelIds.includes(TRASH)) return
      m.labelIds = this.trashed.get(id) ?? [INBOX]
      this.trashed.delete(id)
    })
  }

  async archive(id: string) {
    return this.mutate('archive', id, (m) => {
      m.labelIds = m.labelIds.filter((l) => l !== INBOX)
    })
  }

  async unarchive(id: string) {
    return this.mutate('unarchive', id, (m) => {
      if (!m.labelIds.includes(INBOX)) m.labelIds = [...m.labelIds, INBOX]
    })
  }

  async markRead(id: string) {
    return this.mutate('markRead', id, (m) => {
      m.labelIds = m.labelIds.filter((l) => l !== UNREAD)
      m.isRead = true
    })
  }

  async markUnread(id: string) {
    return this.mutate('markUnread', id, (m) => {
      if (!m.labelIds.includes(UNREAD)) m.labelIds = [...m.labelIds, UNREAD]
      m.isRead = false
    })
  }

  private async mutate(method: keyof RemoteGateway, id: string, apply: (m: Message) => void): Promise<FakeResult> {
    this.calls.push(`${method} ${id}`)
    if (this.hold) await this.hold
    const failure = this.fail[method]
    if (failure) return failure
    const message = this.messages.get(id)
    // Unknown ids settle silently, like the idempotent server calls
    if (message) apply(message)
  }
}
