// Background reconciliation of the local cache against the remote mailbox.
// Each pass refreshes labels, then diffs every label's remote listing against the
// cache: fetch what is missing or stale, re-assert what is present, and strip the
// label from local messages the remote no longer lists. Passes never overlap.
// Emits 'changed' after each label whose diff touched the cache, and at the end of every pass.

import { EventEmitter } from 'node:events'
import { AuthError, errorMessage, StorageError } from './api-utils.js'
import type { CacheStore } from './cache-store.js'
import type { RemoteGateway } from './gmail-gateway.js'
import type { Logger } from './logger.js'
import type { SyncErrorKind, SyncStateCell } from './sync-state.js'
import { INBOX, type Label, type MessageListing } from './types.js'

export interface ReconcilerOptions {
  cache: CacheStore
  gateway: RemoteGateway
  syncState: SyncStateCell
  logger: Logger
  intervalMs?: number
  /** Local entries scanned per label when detecting remote removals. */
  removalWindow?: number
  /** Restrict syncing to these label ids. */
  syncLabels?: string[]
}

export interface SyncFailure {
  kind: SyncErrorKind
  labelId: string | null
  messageId: string | null
  error: Error
}

export interface SyncOutcome {
  ok: boolean
  changed: boolean
  failures: SyncFailure[]
}

interface LabelDiff {
  changed: boolean
  fetched: number
  removed: number
}

export class Reconciler extends EventEmitter {
  private cache: CacheStore
  private gateway: RemoteGateway
  private syncState: SyncStateCell
  private logger: Logger
  private intervalMs: number
  private removalWindow: number
  private syncLabels: string[] | undefined

  private inFlight: Promise<SyncOutcome> | null = null
  private timer: NodeJS.Timeout | null = null
  private running = false
  private priorityLabel: string | null = null

  constructor(options: ReconcilerOptions) {
    super()
    this.cache = options.cache
    this.gateway = options.gateway
    this.syncState = options.syncState
    this.logger = options.logger
    this.intervalMs = options.intervalMs ?? 30_000
    this.removalWindow = options.removalWindow ?? 200
    this.syncLabels = options.syncLabels
  }

  get isRunning() {
    return this.running
  }

  // ---------------------------------------------------------------------------
  // Scheduling
  // ---------------------------------------------------------------------------

  /** Run a pass now, then one every interval until stop(). */
  start(): void {
    if (this.running) return
    this.running = true
    this.loop()
  }

  stop(): void {
    this.running = false
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
  }

  /** Sync `labelId` first on the next pass. */
  prioritize(labelId: string): void {
    this.priorityLabel = labelId
  }

  /** Run one pass. A call during a pass returns the pass already in flight. */
  syncNow(): Promise<SyncOutcome> {
    if (this.inFlight) return this.inFlight
    const pass = this.runPass().finally(() => {
      this.inFlight = null
    })
    this.inFlight = pass
    return pass
  }

  /** Resolves once no pass is running. */
  async settled(): Promise<void> {
    if (this.inFlight) await this.inFlight
  }

  private loop() {
    void this.syncNow()
      .catch((err: unknown) => {
        // A throwing 'changed' listener lands here; the schedule carries on
        this.logger.error('Sync pass threw', err)
      })
      .then(() => {
        if (!this.running) return
        this.timer = setTimeout(() => this.loop(), this.intervalMs)
      })
  }

  // ---------------------------------------------------------------------------
  // Pass
  // ---------------------------------------------------------------------------

  private async runPass(): Promise<SyncOutcome> {
    const failures: SyncFailure[] = []
    let changed = false

    try {
      this.syncState.update((s) => {
        s.phase = { kind: 'syncing', labelId: null }
      })

      const labels = await this.gateway.listLabels()
      if (labels instanceof AuthError) return this.abortForAuth(labels, changed)
      if (labels instanceof Error) {
        failures.push({ kind: 'remote', labelId: null, messageId: null, error: labels })
        return this.finish(failures, changed)
      }

      const replaced = this.cache.replaceLabels(labels)
      if (replaced instanceof Error) {
        failures.push({ kind: 'storage', labelId: null, messageId: null, error: replaced })
        return this.finish(failures, changed)
      }

      for (const labelId of this.labelsToSync(labels)) {
        this.syncState.update((s) => {
          s.phase = { kind: 'syncing', labelId }
        })

        const diff = await this.syncLabel(labelId, failures)
        if (diff instanceof AuthError) return this.abortForAuth(diff, changed)

        this.syncState.update((s) => {
          s.syncedLabels.add(labelId)
        })
        if (diff.changed) {
          changed = true
          this.emit('changed')
        }
      }
      return this.finish(failures, changed)
    } catch (err) {
      // Anything thrown here is a bug in a collaborator; record it like any other failure
      const error = err instanceof Error ? err : new Error(String(err))
      failures.push({ kind: 'storage', labelId: null, messageId: null, error })
      return this.finish(failures, changed)
    }
  }

  /** Priority label first, then INBOX, then the rest in remote order. */
  private labelsToSync(labels: Label[]): string[] {
    const priority = this.priorityLabel
    this.priorityLabel = null

    const allowed = this.syncLabels
    const ids = labels
      .map((l) => l.id)
      .filter((id) => !allowed || allowed.includes(id) || id === priority)

    const ordered = [
      ...ids.filter((id) => id === INBOX),
      ...ids.filter((id) => id !== INBOX),
    ]
    if (priority && ordered.includes(priority)) {
      return [priority, ...ordered.filter((id) => id !== priority)]
    }
    return ordered
  }

  private async syncLabel(labelId: string, failures: SyncFailure[]): Promise<LabelDiff | AuthError> {
    const diff: LabelDiff = { changed: false, fetched: 0, removed: 0 }
    const record = (kind: SyncErrorKind, messageId: string | null, error: Error) => {
      failures.push({ kind, labelId, messageId, error })
      this.logger.warn(`Sync ${labelId}${messageId ? ` ${messageId}` : ''}: ${error.message}`)
    }

    const listing = await this.gateway.listMessages(labelId, (id) => {
      // A failed lookup only costs a remote fetch; the loop below records the error
      const date = this.cache.getMessageDate(id)
      return date instanceof StorageError ? undefined : date
    })
    if (listing instanceof AuthError) return listing
    if (listing instanceof Error) {
      record('remote', null, listing)
      return diff
    }

    const remoteIds = new Set<string>()
    let oldestRemote = Number.POSITIVE_INFINITY

    for (const entry of listing.entries) {
      remoteIds.add(entry.id)
      oldestRemote = Math.min(oldestRemote, entry.internalDate)

      const localDate = this.cache.getMessageDate(entry.id)
      if (localDate instanceof StorageError) {
        record('storage', entry.id, localDate)
        continue
      }

      if (localDate === undefined || localDate < entry.internalDate) {
        const message = await this.gateway.getMessage(entry.id)
        if (message instanceof AuthError) return message
        if (message instanceof Error) {
          record('remote', entry.id, message)
          continue
        }
        const written = this.cache.upsertMessages([message], labelId)
        if (written instanceof Error) {
          record('storage', entry.id, written)
          continue
        }
        diff.fetched++
        diff.changed = true
        continue
      }

      const added = this.cache.addLabel(entry.id, labelId)
      if (added instanceof Error) {
        record('storage', entry.id, added)
        continue
      }
      if (added) diff.changed = true

      if (entry.unread !== undefined) {
        const flipped = this.cache.setRead(entry.id, !entry.unread)
        if (flipped instanceof Error) {
          record('storage', entry.id, flipped)
          continue
        }
        if (flipped) diff.changed = true
      }
    }

    const removed = this.removeMissing(labelId, listing, remoteIds, oldestRemote, record)
    diff.removed = removed
    if (removed > 0) diff.changed = true

    this.logger.debug(
      `Sync ${labelId}: ${listing.entries.length} remote, complete=${listing.complete}, fetched=${diff.fetched}, removed=${diff.removed}`,
    )
    return diff
  }

  /**
   * Strip `labelId` from local messages the remote no longer lists.
   * Only a complete, non-empty listing is trusted, and only local messages no older
   * than the oldest remote entry are considered: older ones may simply be past the page.
   */
  private removeMissing(
    labelId: string,
    listing: MessageListing,
    remoteIds: Set<string>,
    oldestRemote: number,
    record: (kind: SyncErrorKind, messageId: string | null, error: Error) => void,
  ): number {
    if (!listing.complete || listing.entries.length === 0) return 0

    const local = this.cache.labelDates(labelId, this.removalWindow)
    if (local instanceof Error) {
      record('storage', null, local)
      return 0
    }

    let removed = 0
    for (const { id, internalDate } of local) {
      if (internalDate < oldestRemote || remoteIds.has(id)) continue
      const result = this.cache.removeLabel(id, labelId)
      if (result instanceof Error) {
        record('storage', id, result)
        continue
      }
      if (result) {
        removed++
        this.logger.debug(`Removal: ${id} no longer in ${labelId}`)
      }
    }
    return removed
  }

  private finish(failures: SyncFailure[], changed: boolean): SyncOutcome {
    const first = failures[0]
    this.syncState.update((s) => {
      if (first) {
        s.phase = { kind: 'error', message: errorMessage(first.error), errorKind: first.kind }
      } else {
        s.phase = { kind: 'idle' }
        s.lastSuccessAt = Date.now()
      }
    })
    if (first) {
      this.logger.error(`Sync pass finished with ${failures.length} failure(s)`, first.error)
    }
    this.emit('changed')
    return { ok: !first, changed, failures }
  }

  private abortForAuth(error: AuthError, changed: boolean): SyncOutcome {
    this.stop()
    this.syncState.update((s) => {
      s.phase = { kind: 'error', message: error.message, errorKind: 'auth' }
    })
    this.logger.error('Sync stopped: authentication failed', error)
    this.emit('changed')
    return { ok: false, changed, failures: [{ kind: 'auth', labelId: null, messageId: null, error }] }
  }
}
