// Wires config, logger, database, gateway, reconciler and view into one session.
// The presentation layer calls start() once, reads and drives `view`, and calls close()
// on exit: close() stops the sync timer, waits for queued remote calls, then closes the db.

import { ConfigError, type AuthError } from './api-utils.js'
import { TokenFileCredentials, type CredentialProvider } from './auth.js'
import { CacheStore } from './cache-store.js'
import { loadConfig, type MailConfig } from './config.js'
import { openDatabase } from './db.js'
import { GmailGateway, type RemoteGateway } from './gmail-gateway.js'
import { createLogger, type Logger } from './logger.js'
import { Reconciler } from './reconciler.js'
import { RemoteQueue } from './remote-queue.js'
import { SyncStateCell } from './sync-state.js'
import { ViewState } from './view-state.js'

export interface MailSession {
  config: MailConfig
  logger: Logger
  cache: CacheStore
  gateway: RemoteGateway
  remote: RemoteQueue
  syncState: SyncStateCell
  reconciler: Reconciler
  view: ViewState
  /** Load the view from the cache and start background sync. */
  start(): void
  close(): Promise<void>
}

export interface MailSessionOptions {
  /** Config object, or a data directory to load config.json from. */
  config?: MailConfig
  dataDir?: string
  logger?: Logger
  /** Remote gateway to use instead of Gmail (tests, other providers). */
  gateway?: RemoteGateway
  credentials?: CredentialProvider
}

/**
 * Build a session. Returns ConfigError for an invalid config.json and AuthError when
 * no gateway is given and credentials cannot be loaded.
 */
export async function createMailSession(
  options: MailSessionOptions = {},
): Promise<MailSession | ConfigError | AuthError> {
  const config = options.config ?? loadConfig(options.dataDir)
  if (config instanceof ConfigError) return config

  const logger = options.logger ?? createLogger({ debug: config.debug, logFile: config.logFile })

  let gateway = options.gateway
  if (!gateway) {
    const credentials = options.credentials ?? new TokenFileCredentials({ dataDir: config.dataDir, logger })
    const auth = await credentials.getAuth()
    if (auth instanceof Error) return auth
    gateway = new GmailGateway({ auth, pageSize: config.pageSize })
  }

  const cache = new CacheStore(openDatabase(config.dbPath))
  const syncState = new SyncStateCell()
  const remote = new RemoteQueue({ logger })
  const reconciler = new Reconciler({
    cache,
    gateway,
    syncState,
    logger,
    intervalMs: config.syncIntervalMs,
    removalWindow: config.removalWindow,
    syncLabels: config.syncLabels,
  })
  const view = new ViewState({
    cache,
    gateway,
    remote,
    syncState,
    logger,
    pageSize: config.viewPageSize,
    onLabelSelected: (labelId) => reconciler.prioritize(labelId),
  })

  const onChanged = () => {
    const result = view.reload()
    if (!result.ok) logger.warn(result.description)
  }

  let closed = false

  return {
    config,
    logger,
    cache,
    gateway,
    remote,
    syncState,
    reconciler,
    view,
    start() {
      const loaded = view.init()
      if (!loaded.ok) logger.warn(loaded.description)
      reconciler.on('changed', onChanged)
      reconciler.start()
      logger.info(`Session started, syncing every ${config.syncIntervalMs}ms`)
    },
    async close() {
      if (closed) return
      closed = true
      reconciler.stop()
      reconciler.off('changed', onChanged)
      await remote.drain()
      // Let an in-flight pass finish before the database goes away
      await reconciler.settled()
      cache.close()
      logger.info('Session closed')
    },
  }
}
