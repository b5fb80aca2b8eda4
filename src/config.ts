// Configuration for mailmirror.
// Reads config.json from the data directory (default ~/.mailmirror, overridable via
// MAILMIRROR_HOME) and validates it with zod. A missing file yields the defaults;
// unparseable or invalid content yields a ConfigError value.

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import { ConfigError } from './api-utils.js'
import { IN_MEMORY } from './db.js'

export const CONFIG_FILE = 'config.json'

export function resolveDataDir(explicit?: string): string {
  if (explicit) return explicit
  const fromEnv = process.env.MAILMIRROR_HOME
  if (fromEnv) return fromEnv
  return path.join(os.homedir(), '.mailmirror')
}

const configSchema = z.object({
  /** Cache database path. Relative paths resolve against the data directory. */
  dbPath: z.string().min(1).default('cache.db'),
  syncIntervalMs: z.number().int().min(1000).default(30_000),
  /** Entries requested per label listing. */
  pageSize: z.number().int().min(1).max(500).default(100),
  /** Local entries scanned when detecting remote removals. */
  removalWindow: z.number().int().min(1).default(200),
  viewPageSize: z.number().int().min(1).default(50),
  /** Only these labels are synced when set. */
  syncLabels: z.array(z.string().min(1)).optional(),
  debug: z.boolean().default(false),
  logFile: z.string().min(1).optional(),
}).strict()

export type MailConfig = z.infer<typeof configSchema> & { dataDir: string }

/** Validate an already-parsed config object. Paths are resolved against dataDir. */
export function parseConfig(raw: unknown, dataDir: string): MailConfig | ConfigError {
  const result = configSchema.safeParse(raw)
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    return new ConfigError({ file: CONFIG_FILE, reason })
  }
  const config = result.data
  return {
    ...config,
    dataDir,
    dbPath: config.dbPath === IN_MEMORY ? IN_MEMORY : path.resolve(dataDir, config.dbPath),
    logFile: config.logFile ? path.resolve(dataDir, config.logFile) : undefined,
  }
}

export function loadConfig(dataDir = resolveDataDir()): MailConfig | ConfigError {
  const configPath = path.join(dataDir, CONFIG_FILE)
  if (!fs.existsSync(configPath)) return parseConfig({}, dataDir)

  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'))
  } catch (err) {
    return new ConfigError({
      file: CONFIG_FILE,
      reason: err instanceof Error ? err.message : String(err),
      cause: err,
    })
  }
  return parseConfig(raw, dataDir)
}
