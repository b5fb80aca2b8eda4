// Public API of mailmirror.

export { createMailSession, type MailSession, type MailSessionOptions } from './session.js'
export { CacheStore, toFtsQuery, toTitleCase, type CacheStats, type PageOptions } from './cache-store.js'
export { openDatabase, IN_MEMORY } from './db.js'
export { GmailGateway, type RemoteGateway } from './gmail-gateway.js'
export { TokenFileCredentials, type CredentialProvider } from './auth.js'
export { Reconciler, type ReconcilerOptions, type SyncFailure, type SyncOutcome } from './reconciler.js'
export { RemoteQueue, type RemoteTask } from './remote-queue.js'
export { SyncStateCell, describeSyncStatus, formatAgo, type SyncPhase, type SyncState, type SyncErrorKind } from './sync-state.js'
export { ActionJournal, describeAction, type UndoableAction, type ActionKind } from './undo.js'
export { ViewState, type CommandResult, type ViewStateOptions } from './view-state.js'
export { loadConfig, parseConfig, resolveDataDir, type MailConfig } from './config.js'
export { createLogger, silentLogger, type Logger, type LogLevel } from './logger.js'
export {
  AuthError,
  ApiError,
  NotFoundError,
  StorageError,
  ConfigError,
  type RemoteError,
} from './api-utils.js'
export * from './types.js'
