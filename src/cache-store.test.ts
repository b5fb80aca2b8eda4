// Tests for the SQLite cache store against an in-memory database.

import { describe, expect, test } from 'vitest'
import { StorageError } from './api-utils.js'
import { toFtsQuery, toTitleCase } from './cache-store.js'
import { createTestStore, makeLabel, makeMessage } from './test-helpers.js'

function storeWithLabels(...ids: string[]) {
  const store = createTestStore()
  store.replaceLabels(ids.map((id) => makeLabel(id)))
  return store
}

// ---------------------------------------------------------------------------
// Upsert and label queries
// ---------------------------------------------------------------------------

describe('upsertMessages', () => {
  test('stores the message with its known labels', () => {
    const store = storeWithLabels('INBOX', 'WORK')
    store.upsertMessages([makeMessage('m1', { labelIds: ['INBOX', 'WORK'] })], 'INBOX')

    expect(store.queryByLabel('WORK')).toEqual([makeMessage('m1', { labelIds: ['INBOX', 'WORK'] })])
  })

  test('ignores embedded labels the label table does not know', () => {
    const store = storeWithLabels('INBOX')
    store.upsertMessages([makeMessage('m1', { labelIds: ['INBOX', 'GHOST'] })], 'INBOX')

    expect(store.getMessage('m1')).toEqual(makeMessage('m1', { labelIds: ['INBOX'] }))
  })

  test('associates the context label even when the message does not list it', () => {
    const store = storeWithLabels('INBOX', 'WORK')
    store.upsertMessages([makeMessage('m1', { labelIds: ['INBOX'] })], 'WORK')

    expect(store.queryByLabel('WORK').map((m) => m.id)).toEqual(['m1'])
  })

  test('stores the message when the context label is no longer known', () => {
    const store = storeWithLabels('INBOX')
    expect(store.upsertMessages([makeMessage('m1', { labelIds: ['INBOX'] })], 'GONE')).toBe(1)

    expect(store.getMessage('m1')).toEqual(makeMessage('m1', { labelIds: ['INBOX'] }))
  })

  test('is idempotent for an identical snapshot', () => {
    const store = storeWithLabels('INBOX', 'WORK')
    const message = makeMessage('m1', { labelIds: ['INBOX', 'WORK'] })

    expect(store.upsertMessages([message], 'INBOX')).toBe(1)
    const statsOnce = store.stats()
    const rowsOnce = store.queryByLabel('INBOX')

    store.upsertMessages([message], 'INBOX')
    expect(store.stats()).toEqual(statsOnce)
    expect(store.queryByLabel('INBOX')).toEqual(rowsOnce)
    expect(store.stats()).toEqual({ messages: 1, labels: 2, associations: 2, indexedMessages: 1 })
  })

  test('replaces changed fields in place', () => {
    const store = storeWithLabels('INBOX')
    store.upsertMessages([makeMessage('m1')], 'INBOX')
    store.upsertMessages([makeMessage('m1', { subject: 'Edited', isRead: true })], 'INBOX')

    expect(store.getMessage('m1')).toEqual(makeMessage('m1', { subject: 'Edited', isRead: true }))
  })
})

describe('queryByLabel', () => {
  test('orders newest first and pages with limit and offset', () => {
    const store = storeWithLabels('INBOX')
    store.upsertMessages(
      [
        makeMessage('m1', { internalDate: 1000 }),
        makeMessage('m2', { internalDate: 3000 }),
        makeMessage('m3', { internalDate: 2000 }),
      ],
      'INBOX',
    )

    expect(store.queryByLabel('INBOX').map((m) => m.id)).toEqual(['m2', 'm3', 'm1'])
    expect(store.queryByLabel('INBOX', { limit: 2, offset: 1 }).map((m) => m.id)).toEqual(['m3', 'm1'])
  })

  test('returns an empty list for a label with no messages', () => {
    const store = storeWithLabels('INBOX', 'WORK')
    store.upsertMessages([makeMessage('m1')], 'INBOX')
    expect(store.queryByLabel('WORK')).toEqual([])
  })
})

describe('labelDates', () => {
  test('returns id and date pairs, newest first, up to the limit', () => {
    const store = storeWithLabels('INBOX')
    store.upsertMessages(
      [makeMessage('a', { internalDate: 10 }), makeMessage('b', { internalDate: 30 }), makeMessage('c', { internalDate: 20 })],
      'INBOX',
    )
    expect(store.labelDates('INBOX', 2)).toEqual([
      { id: 'b', internalDate: 30 },
      { id: 'c', internalDate: 20 },
    ])
  })
})

// ---------------------------------------------------------------------------
// Association edits and removal
// ---------------------------------------------------------------------------

describe('associations', () => {
  test('addLabel and removeLabel are idempotent and report changes', () => {
    const store = storeWithLabels('INBOX', 'WORK')
    store.upsertMessages([makeMessage('m1')], 'INBOX')

    expect(store.addLabel('m1', 'WORK')).toBe(true)
    expect(store.addLabel('m1', 'WORK')).toBe(false)
    expect(store.getMessage('m1')).toEqual(makeMessage('m1', { labelIds: ['INBOX', 'WORK'] }))

    expect(store.removeLabel('m1', 'WORK')).toBe(true)
    expect(store.removeLabel('m1', 'WORK')).toBe(false)
    expect(store.queryByLabel('WORK')).toEqual([])
  })

  test('removeLabel keeps the message itself', () => {
    const store = storeWithLabels('INBOX')
    store.upsertMessages([makeMessage('m1')], 'INBOX')
    store.removeLabel('m1', 'INBOX')

    expect(store.getMessage('m1')).toEqual(makeMessage('m1', { labelIds: [] }))
  })

  test('setRead reports whether the flag changed', () => {
    const store = storeWithLabels('INBOX')
    store.upsertMessages([makeMessage('m1')], 'INBOX')

    expect(store.setRead('m1', true)).toBe(true)
    expect(store.setRead('m1', true)).toBe(false)
    expect(store.getMessage('m1')).toEqual(makeMessage('m1', { isRead: true }))
  })

  test('removeMessage deletes the row, its associations and its index entry', () => {
    const store = storeWithLabels('INBOX', 'WORK')
    store.upsertMessages([makeMessage('m1', { labelIds: ['INBOX', 'WORK'] }), makeMessage('m2')], 'INBOX')

    expect(store.removeMessage('m1')).toBe(true)
    expect(store.getMessage('m1')).toBeUndefined()
    expect(store.stats()).toEqual({ messages: 1, labels: 2, associations: 1, indexedMessages: 1 })
  })

  test('removeMessage of an absent id is a no-op', () => {
    const store = storeWithLabels('INBOX')
    expect(store.removeMessage('missing')).toBe(false)
    expect(store.getMessageDate('missing')).toBeUndefined()
  })
})

// ---------------------------------------------------------------------------
// Labels
// ---------------------------------------------------------------------------

describe('labels', () => {
  test('listLabels puts INBOX first, then sorts by name, with display names', () => {
    const store = createTestStore()
    store.replaceLabels([
      makeLabel('Label_2', 'work/projects', 'user'),
      makeLabel('CATEGORY_SOCIAL'),
      makeLabel('INBOX'),
    ])

    const labels = store.listLabels()
    expect(labels instanceof Error ? labels : labels.map((l) => [l.id, l.displayName])).toEqual([
      ['INBOX', 'Inbox'],
      ['CATEGORY_SOCIAL', 'Category Social'],
      ['Label_2', 'Work/Projects'],
    ])
  })

  test('replaceLabels drops missing labels and cascades their associations', () => {
    const store = storeWithLabels('INBOX', 'WORK')
    store.upsertMessages([makeMessage('m1', { labelIds: ['INBOX', 'WORK'] })], 'INBOX')

    store.replaceLabels([makeLabel('INBOX', 'Inbox renamed')])

    const labels = store.listLabels()
    expect(labels instanceof Error ? labels : labels.map((l) => l.name)).toEqual(['Inbox renamed'])
    expect(store.getMessage('m1')).toEqual(makeMessage('m1', { labelIds: ['INBOX'] }))
  })

  test('replaceLabels with an empty list deletes nothing', () => {
    const store = storeWithLabels('INBOX', 'WORK')
    store.replaceLabels([])
    const stats = store.stats()
    expect(stats instanceof Error ? stats : stats.labels).toBe(2)
  })

  test('toTitleCase', () => {
    expect(toTitleCase('CATEGORY_PROMOTIONS')).toBe('Category Promotions')
    expect(toTitleCase('receipts-2024')).toBe('Receipts-2024')
  })
})

// ---------------------------------------------------------------------------
// Threads and full-text search
// ---------------------------------------------------------------------------

describe('queryThread', () => {
  test('returns every message in the thread and no others, newest first', () => {
    const store = storeWithLabels('INBOX')
    store.upsertMessages(
      [
        makeMessage('m1', { threadId: 't1', internalDate: 1000 }),
        makeMessage('m2', { threadId: 't1', internalDate: 2000 }),
        makeMessage('m3', { threadId: 't2', internalDate: 3000 }),
      ],
      'INBOX',
    )
    expect(store.queryThread('t1').map((m) => m.id)).toEqual(['m2', 'm1'])
    expect(store.queryThread('t3')).toEqual([])
  })
})

describe('search', () => {
  test('finds a message by exact subject and by snippet', () => {
    const store = storeWithLabels('INBOX')
    store.upsertMessages(
      [
        makeMessage('m1', { subject: 'Quarterly budget review', snippet: 'numbers attached' }),
        makeMessage('m2', { subject: 'Lunch', snippet: 'tacos on friday' }),
      ],
      'INBOX',
    )

    expect(store.search('Quarterly budget review').map((m) => m.id)).toEqual(['m1'])
    expect(store.search('tacos on friday').map((m) => m.id)).toEqual(['m2'])
  })

  test('matches token prefixes', () => {
    const store = storeWithLabels('INBOX')
    store.upsertMessages([makeMessage('m1', { subject: 'Quarterly budget review' })], 'INBOX')
    expect(store.search('budg quart').map((m) => m.id)).toEqual(['m1'])
  })

  test('follows rewrites and deletes of the message', () => {
    const store = storeWithLabels('INBOX')
    store.upsertMessages([makeMessage('m1', { subject: 'Quarterly budget review' })], 'INBOX')
    store.upsertMessages([makeMessage('m1', { subject: 'Offsite agenda' })], 'INBOX')

    expect(store.search('budget')).toEqual([])
    expect(store.search('offsite').map((m) => m.id)).toEqual(['m1'])

    store.removeMessage('m1')
    expect(store.search('offsite')).toEqual([])
  })

  test('returns nothing for empty or punctuation-only terms', () => {
    const store = storeWithLabels('INBOX')
    store.upsertMessages([makeMessage('m1')], 'INBOX')
    expect(store.search('')).toEqual([])
    expect(store.search('   ')).toEqual([])
    expect(store.search('-- !!')).toEqual([])
  })

  test('toFtsQuery quotes each token as a prefix phrase', () => {
    expect(toFtsQuery('  budget  rev ')).toBe('"budget"* "rev"*')
    expect(toFtsQuery('a"b')).toBe('"a""b"*')
    expect(toFtsQuery('AND OR')).toBe('"AND"* "OR"*')
  })
})

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

test('returns StorageError values instead of throwing', () => {
  const store = storeWithLabels('INBOX')
  store.close()
  expect(store.getMessage('m1')).toBeInstanceOf(StorageError)
  expect(store.upsertMessages([makeMessage('m1')], 'INBOX')).toBeInstanceOf(StorageError)
})
