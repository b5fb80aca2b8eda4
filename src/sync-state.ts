// Shared sync state: the one value both the reconciler (writer) and the view (reader) touch.
// Owned explicitly and passed to both; all access goes through read()/update(), so a
// reader never sees a half-applied transition.

export type SyncErrorKind = 'storage' | 'remote' | 'auth'

export type SyncPhase =
  | { kind: 'idle' }
  | { kind: 'syncing'; labelId: string | null }
  | { kind: 'error'; message: string; errorKind: SyncErrorKind }

export interface SyncState {
  phase: SyncPhase
  /** ms since epoch of the last pass that finished without errors. */
  lastSuccessAt: number | null
  /** Labels that have completed at least one sync. */
  syncedLabels: ReadonlySet<string>
}

export interface MutableSyncState {
  phase: SyncPhase
  lastSuccessAt: number | null
  syncedLabels: Set<string>
}

export class SyncStateCell {
  private state: MutableSyncState = {
    phase: { kind: 'idle' },
    lastSuccessAt: null,
    syncedLabels: new Set(),
  }

  /** Frozen copy of the current state. */
  read(): Readonly<SyncState> {
    return Object.freeze({
      phase: Object.freeze({ ...this.state.phase }),
      lastSuccessAt: this.state.lastSuccessAt,
      syncedLabels: new Set(this.state.syncedLabels),
    })
  }

  /** Apply a mutation in one step. */
  update(fn: (state: MutableSyncState) => void): void {
    const draft: MutableSyncState = {
      phase: this.state.phase,
      lastSuccessAt: this.state.lastSuccessAt,
      syncedLabels: new Set(this.state.syncedLabels),
    }
    fn(draft)
    this.state = draft
  }
}

// ---------------------------------------------------------------------------
// Status text
// ---------------------------------------------------------------------------

/** "just now", "5m ago", "3h ago", "2d ago", or a short date. */
export function formatAgo(timestamp: number, now = Date.now()): string {
  const diffMs = now - timestamp
  const diffMins = Math.floor(diffMs / 60000)
  const diffHours = Math.floor(diffMs / 3600000)
  const diffDays = Math.floor(diffMs / 86400000)

  if (diffMins < 1) return 'just now'
  if (diffMins < 60) return `${diffMins}m ago`
  if (diffHours < 24) return `${diffHours}h ago`
  if (diffDays < 7) return `${diffDays}d ago`
  return new Date(timestamp).toLocaleDateString(undefined, { month: 'short', day: 'numeric' })
}

export function describeSyncStatus(state: Readonly<SyncState>, now = Date.now()): string {
  const { phase } = state
  switch (phase.kind) {
    case 'syncing':
      return phase.labelId ? `Syncing ${phase.labelId}...` : 'Syncing...'
    case 'error':
      return phase.errorKind === 'auth'
        ? `Sign-in required: ${phase.message}`
        : `Sync error: ${phase.message}`
    case 'idle':
      return state.lastSuccessAt === null ? 'Not synced yet' : `Synced ${formatAgo(state.lastSuccessAt, now)}`
  }
}
