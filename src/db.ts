// SQLite connection setup for mailmirror.
// Opens the single cache database (default ~/.mailmirror/cache.db), applies
// pragmas, and runs idempotent schema setup from src/schema.sql on every open.
// Schema failure here is fatal: openDatabase throws instead of returning an error value.

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import Database from 'better-sqlite3'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

export const IN_MEMORY = ':memory:'

/**
 * Open (or create) the cache database and apply the schema.
 * Pass ':memory:' for a throwaway database (tests).
 */
export function openDatabase(dbPath: string): Database.Database {
  const inMemory = dbPath === IN_MEMORY
  if (!inMemory) {
    const dir = path.dirname(dbPath)
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 })
    }
  }

  const db = new Database(dbPath)

  // WAL mode: concurrent readers + single writer, persists on the DB file.
  // busy_timeout: wait up to 5s for locks to clear instead of failing instantly.
  if (!inMemory) {
    db.pragma('journal_mode = WAL')
    db.pragma('synchronous = NORMAL')
  }
  db.pragma('busy_timeout = 5000')
  // Association rows cascade with their message or label.
  db.pragma('foreign_keys = ON')

  try {
    db.exec(readSchema())
  } catch (err) {
    db.close()
    throw new Error(`Failed to initialize cache schema at ${dbPath}`, { cause: err })
  }

  if (!inMemory) secureDatabase(dbPath)

  return db
}

function readSchema(): string {
  // From source (vitest), __dirname is src/.
  // From dist, __dirname is dist/ and schema.sql is at ../src/schema.sql
  let schemaPath = path.join(__dirname, 'schema.sql')
  if (!fs.existsSync(schemaPath)) {
    schemaPath = path.join(__dirname, '..', 'src', 'schema.sql')
  }
  return fs.readFileSync(schemaPath, 'utf-8')
}

/**
 * Set restrictive permissions on database files.
 * SQLite WAL mode creates additional -wal and -shm files that also need protection.
 */
function secureDatabase(dbPath: string): void {
  const filesToSecure = [dbPath, `${dbPath}-wal`, `${dbPath}-shm`]

  for (const filePath of filesToSecure) {
    if (fs.existsSync(filePath)) {
      fs.chmodSync(filePath, 0o600)
    }
  }
}
