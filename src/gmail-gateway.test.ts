// Tests for parsing raw Gmail API payloads and assembling listings. No network.

import { describe, expect, test } from 'vitest'
import { AuthError } from './api-utils.js'
import { GmailGateway } from './gmail-gateway.js'
import type { ListingEntry } from './types.js'

const b64url = (s: string) => Buffer.from(s).toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '')

describe('parseRawMessage', () => {
  test('reads headers, flags and both bodies of a multipart message', () => {
    const message = GmailGateway.parseRawMessage({
      id: 'm1',
      threadId: 't1',
      internalDate: '1700000000000',
      snippet: 'See you at 10',
      labelIds: ['INBOX', 'UNREAD'],
      payload: {
        mimeType: 'multipart/alternative',
        headers: [
          { name: 'From', value: 'Alice <alice@example.com>' },
          { name: 'To', value: 'bob@example.com' },
          { name: 'Subject', value: 'Standup' },
        ],
        parts: [
          { mimeType: 'text/plain', body: { data: b64url('See you at 10') } },
          { mimeType: 'text/html', body: { data: b64url('<p>See you at 10</p>') } },
        ],
      },
    })

    expect(message).toEqual({
      id: 'm1',
      threadId: 't1',
      fromAddress: 'Alice <alice@example.com>',
      toAddress: 'bob@example.com',
      subject: 'Standup',
      snippet: 'See you at 10',
      bodyPlain: 'See you at 10',
      bodyHtml: '<p>See you at 10</p>',
      internalDate: 1700000000000,
      isRead: false,
      labelIds: ['INBOX', 'UNREAD'],
    })
  })

  test('treats a single-part html body as html only', () => {
    const message = GmailGateway.parseRawMessage({
      id: 'm2',
      labelIds: ['INBOX'],
      payload: { mimeType: 'text/html', body: { data: b64url('<b>hi</b>') } },
    })
    expect(message.bodyHtml).toBe('<b>hi</b>')
    expect(message.bodyPlain).toBeNull()
    expect(message.isRead).toBe(true)
    expect(message.threadId).toBe('m2')
    expect(message.subject).toBeNull()
  })

  test('finds bodies in nested parts and skips text attachments', () => {
    const message = GmailGateway.parseRawMessage({
      id: 'm3',
      payload: {
        mimeType: 'multipart/mixed',
        parts: [
          { mimeType: 'text/plain', filename: 'notes.txt', body: { data: b64url('attachment') } },
          {
            mimeType: 'multipart/alternative',
            parts: [{ mimeType: 'text/plain', body: { data: b64url('real body') } }],
          },
        ],
      },
    })
    expect(message.bodyPlain).toBe('real body')
    expect(message.bodyHtml).toBeNull()
  })
})

describe('parseListingEntry', () => {
  test('reads id, timestamp and unread flag', () => {
    expect(GmailGateway.parseListingEntry({ id: 'm1', internalDate: '42', labelIds: ['UNREAD'] })).toEqual({
      id: 'm1',
      internalDate: 42,
      unread: true,
    })
    expect(GmailGateway.parseListingEntry({ internalDate: '42' })).toBeNull()
  })
})

describe('assembleListing', () => {
  const cached = new Map([['a', 100]])

  test('looks up only ids the cache does not hold', async () => {
    const hydrated: string[] = []
    const listing = await GmailGateway.assembleListing({
      ids: ['a', 'b'],
      hasMore: false,
      unreadIds: new Set(['a']),
      cachedDate: (id) => cached.get(id),
      hydrate: async (id): Promise<ListingEntry> => {
        hydrated.push(id)
        return { id, internalDate: 50, unread: false }
      },
    })

    expect(hydrated).toEqual(['b'])
    expect(listing).toEqual({
      entries: [
        { id: 'a', internalDate: 100, unread: true },
        { id: 'b', internalDate: 50, unread: false },
      ],
      complete: true,
    })
  })

  test('leaves read state unknown without an unread listing', async () => {
    const listing = await GmailGateway.assembleListing({
      ids: ['a'],
      hasMore: false,
      cachedDate: (id) => cached.get(id),
      hydrate: async () => null,
    })
    expect(listing).toStrictEqual({ entries: [{ id: 'a', internalDate: 100, unread: undefined }], complete: true })
  })

  test('a skipped lookup or a further page makes the listing partial', async () => {
    const skipped = await GmailGateway.assembleListing({ ids: ['a', 'b'], hasMore: false, hydrate: async () => null })
    expect(skipped).toEqual({ entries: [], complete: false })

    const paged = await GmailGateway.assembleListing({
      ids: ['a'],
      hasMore: true,
      cachedDate: (id) => cached.get(id),
      hydrate: async () => null,
    })
    expect(paged instanceof Error ? paged : paged.complete).toBe(false)
  })

  test('an auth failure during lookup aborts the listing', async () => {
    const listing = await GmailGateway.assembleListing({
      ids: ['x'],
      hasMore: false,
      hydrate: async () => new AuthError({ account: 'me', reason: 'revoked' }),
    })
    expect(listing).toBeInstanceOf(AuthError)
  })
})

describe('parseRawLabels', () => {
  test('maps type and colors and drops labels without ids', () => {
    expect(
      GmailGateway.parseRawLabels([
        { id: 'INBOX', name: 'INBOX', type: 'system' },
        { id: 'Label_1', name: 'Work', type: 'user', color: { textColor: '#000000', backgroundColor: '#16a765' } },
        { name: 'orphan' },
      ]),
    ).toEqual([
      { id: 'INBOX', name: 'INBOX', type: 'system', colorForeground: null, colorBackground: null },
      { id: 'Label_1', name: 'Work', type: 'user', colorForeground: '#000000', colorBackground: '#16a765' },
    ])
  })
})
