// SQLite-backed cache of messages, labels and their associations.
// Uses better-sqlite3 for synchronous reads and writes; every logical write runs in
// one transaction, and the FTS5 shadow table is kept current by triggers inside that
// same transaction (see schema.sql), so readers never see a row without its index entry.
// Knows nothing about sync or undo. All methods return StorageError values on failure.

import type Database from 'better-sqlite3'
import { storageBoundary, type StorageError } from './api-utils.js'
import { INBOX, type CachedLabel, type Label, type LabelType, type Message } from './types.js'

// Row shapes for typed .prepare() queries
interface MessageRow {
  id: string
  thread_id: string
  from_address: string | null
  to_address: string | null
  subject: string | null
  snippet: string | null
  body_plain: string | null
  body_html: string | null
  internal_date: number
  is_read: number
  label_ids: string | null
}

interface LabelRow {
  id: string
  name: string
  type: string
  color_foreground: string | null
  color_background: string | null
}

interface DateRow { id: string; internal_date: number }
interface CountRow { count: number }

export interface CacheStats {
  messages: number
  labels: number
  associations: number
  indexedMessages: number
}

export interface PageOptions {
  limit?: number
  offset?: number
}

const LABEL_SEPARATOR = '\u001f'

const MESSAGE_COLUMNS = `
  m.id, m.thread_id, m.from_address, m.to_address, m.subject, m.snippet,
  m.body_plain, m.body_html, m.internal_date, m.is_read,
  (SELECT group_concat(ml2.label_id, char(31)) FROM message_labels ml2 WHERE ml2.message_id = m.id) AS label_ids`

export class CacheStore {
  private db: Database.Database

  constructor(db: Database.Database) {
    this.db = db
  }

  // ---------------------------------------------------------------------------
  // Labels
  // ---------------------------------------------------------------------------

  /**
   * Replace the label table with `labels`. Labels absent from the new set are
   * deleted (their associations cascade); surviving labels keep their associations.
   * An empty list is treated as a bad listing and deletes nothing.
   */
  replaceLabels(labels: Label[]): void | StorageError {
    return storageBoundary('replaceLabels', () => {
      const upsert = this.db.prepare<[string, string, string, string | null, string | null]>(
        `INSERT INTO labels (id, name, type, color_foreground, color_background)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET name = excluded.name, type = excluded.type,
           color_foreground = excluded.color_foreground, color_background = excluded.color_background`,
      )
      const prune = this.db.prepare<[string]>(
        'DELETE FROM labels WHERE id NOT IN (SELECT value FROM json_each(?))',
      )
      const tx = this.db.transaction((items: Label[]) => {
        for (const label of items) {
          upsert.run(label.id, label.name, label.type, label.colorForeground, label.colorBackground)
        }
        if (items.length > 0) {
          prune.run(JSON.stringify(items.map((l) => l.id)))
        }
      })
      tx(labels)
    })
  }

  /** All labels, INBOX first, then by name. */
  listLabels(): CachedLabel[] | StorageError {
    return storageBoundary('listLabels', () => {
      const rows = this.db
        .prepare<[], LabelRow>('SELECT id, name, type, color_foreground, color_background FROM labels ORDER BY name ASC')
        .all()
      const labels = rows.map(rowToLabel)
      return [
        ...labels.filter((l) => l.id === INBOX),
        ...labels.filter((l) => l.id !== INBOX),
      ]
    })
  }

  // ---------------------------------------------------------------------------
  // Message writes
  // ---------------------------------------------------------------------------

  /**
   * Insert or replace each message by id, one transaction per message.
   * Each message is associated with `contextLabelId` and its embedded labels, limited to
   * labels the label table knows about. Re-applying an identical snapshot only refreshes cached_at.
   */
  upsertMessages(messages: Message[], contextLabelId: string): number | StorageError {
    return storageBoundary('upsertMessages', () => {
      const upsert = this.db.prepare<[string, string, string | null, string | null, string | null, string | null, string | null, string | null, number, number, number]>(
        `INSERT INTO messages (id, thread_id, from_address, to_address, subject, snippet,
           body_plain, body_html, internal_date, is_read, cached_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           thread_id = excluded.thread_id, from_address = excluded.from_address,
           to_address = excluded.to_address, subject = excluded.subject, snippet = excluded.snippet,
           body_plain = excluded.body_plain, body_html = excluded.body_html,
           internal_date = excluded.internal_date, is_read = excluded.is_read,
           cached_at = excluded.cached_at`,
      )
      const associateKnown = this.db.prepare<[string, string]>(
        'INSERT OR IGNORE INTO message_labels (message_id, label_id) SELECT ?, id FROM labels WHERE id = ?',
      )
      const write = this.db.transaction((message: Message) => {
        upsert.run(
          message.id, message.threadId, message.fromAddress, message.toAddress,
          message.subject, message.snippet, message.bodyPlain, message.bodyHtml,
          message.internalDate, message.isRead ? 1 : 0, Date.now(),
        )
        for (const labelId of new Set([contextLabelId, ...message.labelIds])) {
          associateKnown.run(message.id, labelId)
        }
      })

      for (const message of messages) {
        write(message)
      }
      return messages.length
    })
  }

  /** Delete a message, its associations and its index entry. Absent ids are a no-op. */
  removeMessage(id: string): boolean | StorageError {
    return storageBoundary('removeMessage', () => {
      const tx = this.db.transaction((messageId: string) => {
        this.db.prepare<[string]>('DELETE FROM message_labels WHERE message_id = ?').run(messageId)
        return this.db.prepare<[string]>('DELETE FROM messages WHERE id = ?').run(messageId).changes > 0
      })
      return tx(id)
    })
  }

  /** Returns true when the association was newly added. */
  addLabel(messageId: string, labelId: string): boolean | StorageError {
    return storageBoundary('addLabel', () => {
      return this.db
        .prepare<[string, string]>('INSERT OR IGNORE INTO message_labels (message_id, label_id) VALUES (?, ?)')
        .run(messageId, labelId).changes > 0
    })
  }

  /** Returns true when an association was removed. */
  removeLabel(messageId: string, labelId: string): boolean | StorageError {
    return storageBoundary('removeLabel', () => {
      return this.db
        .prepare<[string, string]>('DELETE FROM message_labels WHERE message_id = ? AND label_id = ?')
        .run(messageId, labelId).changes > 0
    })
  }

  /** Returns true when the stored flag changed. */
  setRead(id: string, isRead: boolean): boolean | StorageError {
    return storageBoundary('setRead', () => {
      return this.db
        .prepare<[number, string, number]>('UPDATE messages SET is_read = ? WHERE id = ? AND is_read != ?')
        .run(isRead ? 1 : 0, id, isRead ? 1 : 0).changes > 0
    })
  }

  // ---------------------------------------------------------------------------
  // Message reads
  // ---------------------------------------------------------------------------

  getMessage(id: string): Message | undefined | StorageError {
    return storageBoundary('getMessage', () => {
      const row = this.db
        .prepare<[string], MessageRow>(`SELECT ${MESSAGE_COLUMNS} FROM messages m WHERE m.id = ?`)
        .get(id)
      return row ? rowToMessage(row) : undefined
    })
  }

  getMessageDate(id: string): number | undefined | StorageError {
    return storageBoundary('getMessageDate', () => {
      const row = this.db
        .prepare<[string], { internal_date: number }>('SELECT internal_date FROM messages WHERE id = ?')
        .get(id)
      return row?.internal_date
    })
  }

  /** Messages carrying `labelId`, newest first. */
  queryByLabel(labelId: string, { limit = -1, offset = 0 }: PageOptions = {}): Message[] | StorageError {
    return storageBoundary('queryByLabel', () => {
      const rows = this.db
        .prepare<[string, number, number], MessageRow>(
          `SELECT ${MESSAGE_COLUMNS}
           FROM messages m
           JOIN message_labels ml ON ml.message_id = m.id
           WHERE ml.label_id = ?
           ORDER BY m.internal_date DESC, m.id ASC
           LIMIT ? OFFSET ?`,
        )
        .all(labelId, limit, offset)
      return rows.map(rowToMessage)
    })
  }

  /** (id, internal_date) pairs for the newest `limit` messages under a label. */
  labelDates(labelId: string, limit: number): Array<{ id: string; internalDate: number }> | StorageError {
    return storageBoundary('labelDates', () => {
      const rows = this.db
        .prepare<[string, number], DateRow>(
          `SELECT m.id, m.internal_date
           FROM messages m
           JOIN message_labels ml ON ml.message_id = m.id
           WHERE ml.label_id = ?
           ORDER BY m.internal_date DESC
           LIMIT ?`,
        )
        .all(labelId, limit)
      return rows.map((r) => ({ id: r.id, internalDate: r.internal_date }))
    })
  }

  /** Every message sharing `threadId`, newest first. */
  queryThread(threadId: string): Message[] | StorageError {
    return storageBoundary('queryThread', () => {
      const rows = this.db
        .prepare<[string], MessageRow>(
          `SELECT ${MESSAGE_COLUMNS} FROM messages m WHERE m.thread_id = ? ORDER BY m.internal_date DESC, m.id ASC`,
        )
        .all(threadId)
      return rows.map(rowToMessage)
    })
  }

  /** Full-text search over subject, from, snippet and plain body, in FTS5 rank order. */
  search(term: string, { limit = 100 }: { limit?: number } = {}): Message[] | StorageError {
    const query = toFtsQuery(term)
    if (!query) return []
    return storageBoundary('search', () => {
      const rows = this.db
        .prepare<[string, number], MessageRow>(
          `SELECT ${MESSAGE_COLUMNS}
           FROM messages_fts
           JOIN messages m ON m.rowid = messages_fts.rowid
           WHERE messages_fts MATCH ?
           ORDER BY messages_fts.rank, m.internal_date DESC
           LIMIT ?`,
        )
        .all(query, limit)
      return rows.map(rowToMessage)
    })
  }

  // ---------------------------------------------------------------------------
  // Housekeeping
  // ---------------------------------------------------------------------------

  stats(): CacheStats | StorageError {
    return storageBoundary('stats', () => {
      const count = (sql: string) => this.db.prepare<[], CountRow>(sql).get()?.count ?? 0
      return {
        messages: count('SELECT count(*) AS count FROM messages'),
        labels: count('SELECT count(*) AS count FROM labels'),
        associations: count('SELECT count(*) AS count FROM message_labels'),
        indexedMessages: count('SELECT count(*) AS count FROM messages_fts_docsize'),
      }
    })
  }

  close() {
    this.db.close()
  }
}

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function rowToMessage(row: MessageRow): Message {
  return {
    id: row.id,
    threadId: row.thread_id,
    fromAddress: row.from_address,
    toAddress: row.to_address,
    subject: row.subject,
    snippet: row.snippet,
    bodyPlain: row.body_plain,
    bodyHtml: row.body_html,
    internalDate: row.internal_date,
    isRead: row.is_read === 1,
    labelIds: row.label_ids ? row.label_ids.split(LABEL_SEPARATOR).sort() : [],
  }
}

function rowToLabel(row: LabelRow): CachedLabel {
  const type: LabelType = row.type === 'system' ? 'system' : 'user'
  return {
    id: row.id,
    name: row.name,
    type,
    colorForeground: row.color_foreground,
    colorBackground: row.color_background,
    displayName: toTitleCase(row.name),
  }
}

/** "CATEGORY_SOCIAL" -> "Category Social", "work/projects" -> "Work/Projects". */
export function toTitleCase(name: string): string {
  return name
    .replace(/_/g, ' ')
    .toLowerCase()
    .replace(/(^|[\s/-])(\p{L})/gu, (_match, sep: string, letter: string) => sep + letter.toUpperCase())
}

/**
 * Build an FTS5 MATCH expression from free text: every token becomes a quoted
 * prefix phrase, AND-ed together. Tokens with no letters or digits are dropped.
 */
export function toFtsQuery(term: string): string {
  return term
    .trim()
    .split(/\s+/)
    .filter((token) => /[\p{L}\p{N}]/u.test(token))
    .map((token) => `"${token.replace(/"/g, '""')}"*`)
    .join(' ')
}
