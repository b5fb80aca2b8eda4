// In-memory projection the presentation layer reads and drives.
// Holds the label list, the visible (paged) message list, the selection and its thread,
// an optional search, the action journal and a transient status line.
// Commands run synchronously against the view and the cache; remote calls go to the
// RemoteQueue and are never awaited here.

import { errorMessage } from './api-utils.js'
import type { CacheStore } from './cache-store.js'
import type { RemoteGateway } from './gmail-gateway.js'
import type { Logger } from './logger.js'
import type { RemoteQueue } from './remote-queue.js'
import { describeSyncStatus, type SyncStateCell } from './sync-state.js'
import { cloneMessage, INBOX, type CachedLabel, type Message } from './types.js'
import { ActionJournal, describeAction, type UndoableAction } from './undo.js'

export interface CommandResult {
  ok: boolean
  description: string
}

export interface ViewStateOptions {
  cache: CacheStore
  gateway: RemoteGateway
  remote: RemoteQueue
  syncState: SyncStateCell
  logger: Logger
  /** Rows loaded per page of a label listing. */
  pageSize?: number
  searchLimit?: number
  /** Called whenever the user selects a label (the session asks the reconciler to sync it first). */
  onLabelSelected?: (labelId: string) => void
}

/** Load the next page once the selection is this close to the end of the list. */
const LOAD_MORE_THRESHOLD = 5

const ok = (description: string): CommandResult => ({ ok: true, description })
const fail = (description: string): CommandResult => ({ ok: false, description })

export class ViewState {
  readonly journal = new ActionJournal()

  private cache: CacheStore
  private gateway: RemoteGateway
  private remote: RemoteQueue
  private syncState: SyncStateCell
  private logger: Logger
  private pageSize: number
  private searchLimit: number
  private onLabelSelected: ((labelId: string) => void) | undefined

  private _labels: CachedLabel[] = []
  private _currentLabelId: string | null = null
  private _messages: Message[] = []
  private _selectedIndex = 0
  private _thread: Message[] = []
  private _searchTerm: string | null = null
  private _status: string | null = null
  /** Offset of the last page loaded into the list. */
  private offset = 0
  private exhausted = false

  constructor(options: ViewStateOptions) {
    this.cache = options.cache
    this.gateway = options.gateway
    this.remote = options.remote
    this.syncState = options.syncState
    this.logger = options.logger
    this.pageSize = options.pageSize ?? 50
    this.searchLimit = options.searchLimit ?? 100
    this.onLabelSelected = options.onLabelSelected
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  get labels(): readonly CachedLabel[] {
    return this._labels
  }

  get currentLabelId(): string | null {
    return this._currentLabelId
  }

  get messages(): readonly Message[] {
    return this._messages
  }

  get selectedIndex(): number {
    return this._selectedIndex
  }

  get selected(): Message | undefined {
    return this._messages[this._selectedIndex]
  }

  get thread(): readonly Message[] {
    return this._thread
  }

  get searchTerm(): string | null {
    return this._searchTerm
  }

  get status(): string | null {
    return this._status
  }

  get canUndo(): boolean {
    return this.journal.canUndo
  }

  syncStatusText(now = Date.now()): string {
    return describeSyncStatus(this.syncState.read(), now)
  }

  // ---------------------------------------------------------------------------
  // Navigation
  // ---------------------------------------------------------------------------

  /** Load labels and show INBOX, or the first label when there is no INBOX. */
  init(): CommandResult {
    this._status = null
    const labels = this.cache.listLabels()
    if (labels instanceof Error) return fail(`Failed to load labels: ${labels.message}`)
    this._labels = labels

    const first = labels.find((l) => l.id === INBOX) ?? labels[0]
    if (!first) {
      this._messages = []
      this._thread = []
      return ok('No labels cached yet')
    }
    return this.selectLabel(first.id)
  }

  selectLabel(labelId: string): CommandResult {
    this._status = null
    this._currentLabelId = labelId
    this._searchTerm = null
    this._selectedIndex = 0
    this.offset = 0
    this.onLabelSelected?.(labelId)

    const page = this.cache.queryByLabel(labelId, { limit: this.pageSize, offset: 0 })
    if (page instanceof Error) {
      this._messages = []
      this._thread = []
      return fail(`Failed to load ${labelId}: ${page.message}`)
    }
    this._messages = page
    this.exhausted = page.length < this.pageSize
    this.refreshThread()

    const name = this._labels.find((l) => l.id === labelId)?.displayName ?? labelId
    return ok(`Showing ${name}`)
  }

  selectMessage(index: number): CommandResult {
    this._status = null
    const message = this._messages[index]
    if (!message) return fail(`No message at position ${index}`)
    this._selectedIndex = index
    this.refreshThread()
    return ok(`Selected ${message.subject ?? '(no subject)'}`)
  }

  /** Move the selection by `delta` rows, loading the next page near the end of the list. */
  moveSelection(delta: number): CommandResult {
    this._status = null
    if (this._messages.length === 0) return fail('No messages')

    const last = this._messages.length - 1
    this._selectedIndex = Math.min(Math.max(this._selectedIndex + delta, 0), last)

    if (delta > 0 && this._selectedIndex >= this._messages.length - LOAD_MORE_THRESHOLD) {
      const loaded = this.loadMore()
      if (loaded instanceof Error) {
        this.logger.warn(`Load more failed: ${loaded.message}`)
      }
    }
    this.refreshThread()
    return ok(`Selected ${this._selectedIndex + 1} of ${this._messages.length}`)
  }

  /** Replace the list with ranked full-text results. An empty term clears the search. */
  search(term: string): CommandResult {
    this._status = null
    const trimmed = term.trim()
    if (!trimmed) {
      this._searchTerm = null
      if (this._currentLabelId) {
        const shown = this.selectLabel(this._currentLabelId)
        return shown.ok ? ok('Search cleared') : shown
      }
      this._messages = []
      this._thread = []
      return ok('Search cleared')
    }

    const results = this.cache.search(trimmed, { limit: this.searchLimit })
    if (results instanceof Error) return fail(`Search failed: ${results.message}`)
    this._searchTerm = trimmed
    this._messages = results
    this._selectedIndex = 0
    this.exhausted = true
    this.refreshThread()
    return ok(`${results.length} result${results.length === 1 ? '' : 's'} for "${trimmed}"`)
  }

  /**
   * Re-query after the cache changed underneath the view (sync).
   * Keeps the selected message selected when it is still listed, else clamps the index.
   * Does not touch the status line.
   */
  reload(): CommandResult {
    const labels = this.cache.listLabels()
    if (labels instanceof Error) return fail(`Failed to reload labels: ${labels.message}`)
    this._labels = labels

    if (this._currentLabelId && !labels.some((l) => l.id === this._currentLabelId)) {
      this._currentLabelId = (labels.find((l) => l.id === INBOX) ?? labels[0])?.id ?? null
      this._searchTerm = null
      this.offset = 0
    }
    if (this._currentLabelId === null) {
      const first = labels.find((l) => l.id === INBOX) ?? labels[0]
      if (!first) return ok('No labels cached yet')
      this._currentLabelId = first.id
    }

    const selectedId = this.selected?.id
    let rows: Message[] | Error
    if (this._searchTerm) {
      rows = this.cache.search(this._searchTerm, { limit: this.searchLimit })
    } else {
      rows = this.cache.queryByLabel(this._currentLabelId, { limit: this.offset + this.pageSize, offset: 0 })
      if (!(rows instanceof Error)) {
        // Paged past the end: fall back to the pages that still have rows
        if (rows.length <= this.offset) {
          this.offset = Math.max(0, Math.ceil(rows.length / this.pageSize) - 1) * this.pageSize
        }
        this.exhausted = rows.length < this.offset + this.pageSize
      }
    }
    if (rows instanceof Error) return fail(`Reload failed: ${rows.message}`)

    this._messages = rows
    const keep = selectedId === undefined ? -1 : rows.findIndex((m) => m.id === selectedId)
    if (keep >= 0) {
      this._selectedIndex = keep
    } else {
      this._selectedIndex = Math.min(this._selectedIndex, Math.max(rows.length - 1, 0))
    }
    this.refreshThread()
    return ok(`Reloaded ${rows.length} message${rows.length === 1 ? '' : 's'}`)
  }

  // ---------------------------------------------------------------------------
  // Actions
  // ---------------------------------------------------------------------------

  /** Toggle the selected message's read flag. */
  markRead(): CommandResult {
    this._status = null
    const message = this.selected
    if (!message) return fail('No message selected')

    const isRead = !message.isRead
    const stored = this.cache.setRead(message.id, isRead)
    if (stored instanceof Error) return fail(`Mark read failed: ${stored.message}`)

    this._messages[this._selectedIndex] = { ...message, isRead }
    const id = message.id
    this.remote.submit(id, isRead ? 'markRead' : 'markUnread', () =>
      isRead ? this.gateway.markRead(id) : this.gateway.markUnread(id),
    )
    this.refreshThread()
    return ok(isRead ? 'Marked as read' : 'Marked as unread')
  }

  /** Delete the selected message (or `messageId`): gone locally now, trashed remotely later. */
  delete(messageId?: string): CommandResult {
    this._status = null
    const target = this.resolveTarget(messageId)
    if (target instanceof Error) return fail(target.message)
    if (!target) return fail('No message selected')

    const { message, index } = target
    const labelId = this._currentLabelId ?? INBOX
    const snapshot = cloneMessage(message)
    const selectedBefore = this._selectedIndex

    if (index >= 0) this.removeRow(index)
    this.journal.record({ kind: 'delete', message: snapshot, labelId, originalIndex: index })

    const removed = this.cache.removeMessage(message.id)
    if (removed instanceof Error) {
      this.journal.undoLast()
      if (index >= 0) this._messages.splice(index, 0, snapshot)
      this._selectedIndex = selectedBefore
      return fail(`Delete failed: ${removed.message}`)
    }

    const id = message.id
    this.remote.submit(id, 'trash', () => this.gateway.trash(id))
    this.refreshThread()
    return ok('Deleted')
  }

  /** Archive the selected message (or `messageId`): INBOX label removed locally now, remotely later. */
  archive(messageId?: string): CommandResult {
    this._status = null
    const target = this.resolveTarget(messageId)
    if (target instanceof Error) return fail(target.message)
    if (!target) return fail('No message selected')

    const { message, index } = target
    // Nothing to strip, so nothing to record: undo must not add INBOX it never had
    if (!message.labelIds.includes(INBOX)) return fail('Not in Inbox')

    const snapshot = cloneMessage(message)
    const selectedBefore = this._selectedIndex
    const withoutInbox = { ...message, labelIds: message.labelIds.filter((l) => l !== INBOX) }

    if (index >= 0) {
      if (this.viewingInbox) this.removeRow(index)
      else this._messages[index] = withoutInbox
    }
    this.journal.record({ kind: 'archive', message: snapshot, originalIndex: index })

    const stripped = this.cache.removeLabel(message.id, INBOX)
    if (stripped instanceof Error) {
      this.journal.undoLast()
      if (index >= 0) {
        if (this.viewingInbox) this._messages.splice(index, 0, snapshot)
        else this._messages[index] = snapshot
      }
      this._selectedIndex = selectedBefore
      return fail(`Archive failed: ${stripped.message}`)
    }

    const id = message.id
    this.remote.submit(id, 'archive', () => this.gateway.archive(id))
    this.refreshThread()
    return ok('Archived')
  }

  /**
   * Reverse the most recent delete or archive: view first, then cache, then a queued
   * remote call. A cache failure rolls the view back; the entry stays consumed either way.
   */
  undo(): CommandResult {
    const action = this.journal.undoLast()
    if (!action) {
      this._status = 'Nothing to undo'
      return ok('Nothing to undo')
    }

    const result = action.kind === 'delete' ? this.undoDelete(action) : this.undoArchive(action)
    if (result instanceof Error) {
      this._status = `Undo ${describeAction(action)} failed: ${result.message}`
      this.logger.error(
        `Undo ${describeAction(action)} of ${action.message.id} (row ${action.originalIndex}) failed`,
        result,
      )
      return fail(this._status)
    }

    this._status = `Undone: ${describeAction(action)}`
    this.refreshThread()
    return ok(this._status)
  }

  private undoDelete(action: Extract<UndoableAction, { kind: 'delete' }>): void | Error {
    const restored = cloneMessage(action.message)
    const rowsBefore = this._messages
    const selectedBefore = this._selectedIndex
    // A sync pass may have listed the message again since the delete
    this._messages = [restored, ...rowsBefore.filter((m) => m.id !== restored.id)]
    this._selectedIndex = 0

    const written = this.cache.upsertMessages([cloneMessage(action.message)], action.labelId)
    if (written instanceof Error) {
      this._messages = rowsBefore
      this._selectedIndex = selectedBefore
      return written
    }

    const id = action.message.id
    this.remote.submit(id, 'untrash', () => this.gateway.untrash(id))
  }

  private undoArchive(action: Extract<UndoableAction, { kind: 'archive' }>): void | Error {
    const restored = cloneMessage(action.message)
    const selectedBefore = this._selectedIndex
    const existing = this._messages.findIndex((m) => m.id === restored.id)
    const previous = existing >= 0 ? this._messages[existing] : undefined

    let inserted = false
    if (existing >= 0) {
      this._messages[existing] = restored
    } else if (this.viewingInbox) {
      this._messages.unshift(restored)
      this._selectedIndex = 0
      inserted = true
    }

    const added = this.cache.addLabel(restored.id, INBOX)
    if (added instanceof Error) {
      if (inserted) this._messages.shift()
      if (previous) this._messages[existing] = previous
      this._selectedIndex = selectedBefore
      return added
    }

    const id = restored.id
    this.remote.submit(id, 'unarchive', () => this.gateway.unarchive(id))
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private get viewingInbox(): boolean {
    return this._currentLabelId === INBOX && this._searchTerm === null
  }

  private resolveTarget(messageId?: string): { message: Message; index: number } | undefined | Error {
    if (messageId === undefined) {
      const message = this.selected
      return message ? { message, index: this._selectedIndex } : undefined
    }
    const index = this._messages.findIndex((m) => m.id === messageId)
    const listed = this._messages[index]
    if (listed) return { message: listed, index }

    const cached = this.cache.getMessage(messageId)
    if (cached instanceof Error) return cached
    if (!cached) return new Error(`Message ${messageId} not found`)
    return { message: cached, index: -1 }
  }

  private removeRow(index: number) {
    this._messages.splice(index, 1)
    if (this._selectedIndex > index || this._selectedIndex >= this._messages.length) {
      this._selectedIndex = Math.max(this._selectedIndex - 1, 0)
    }
  }

  private loadMore(): void | Error {
    if (this._searchTerm !== null || this.exhausted || this._currentLabelId === null) return
    const nextOffset = this.offset + this.pageSize
    const page = this.cache.queryByLabel(this._currentLabelId, { limit: this.pageSize, offset: nextOffset })
    if (page instanceof Error) return page
    this.exhausted = page.length < this.pageSize
    if (page.length === 0) return
    this.offset = nextOffset
    const known = new Set(this._messages.map((m) => m.id))
    this._messages.push(...page.filter((m) => !known.has(m.id)))
  }

  private refreshThread() {
    const message = this.selected
    if (!message) {
      this._thread = []
      return
    }
    const thread = this.cache.queryThread(message.threadId)
    if (thread instanceof Error) {
      this.logger.warn(`Thread ${message.threadId} unavailable: ${errorMessage(thread)}`)
      this._thread = [message]
      return
    }
    this._thread = thread
  }
}
