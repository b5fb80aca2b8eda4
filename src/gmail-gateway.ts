// Remote gateway for mailmirror.
// RemoteGateway is the operation surface the reconciler and the remote queue call;
// GmailGateway implements it over the googleapis Gmail v1 SDK.
// Every method returns its value or an error value (AuthError, ApiError, NotFoundError),
// never throws. Mutations are label-set edits and are idempotent on the server.

import { google, type gmail_v1 } from 'googleapis'
import type { OAuth2Client } from 'google-auth-library'
import * as errore from 'errore'
import {
  withRetry,
  mapConcurrent,
  errorMessage,
  errorStatus,
  isAuthLikeError,
  AuthError,
  ApiError,
  NotFoundError,
} from './api-utils.js'
import { INBOX, UNREAD, type Label, type ListingEntry, type Message, type MessageListing } from './types.js'

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export type CachedDateLookup = (id: string) => number | undefined

export interface RemoteGateway {
  listLabels(): Promise<Label[] | AuthError | ApiError>
  /**
   * Newest entries under a label, with timestamps. `complete` is false when more pages exist.
   * Ids for which `cachedDate` returns a timestamp may be reported with that timestamp
   * instead of being looked up remotely.
   */
  listMessages(labelId: string, cachedDate?: CachedDateLookup): Promise<MessageListing | AuthError | ApiError>
  getMessage(id: string): Promise<Message | NotFoundError | AuthError | ApiError>
  trash(id: string): Promise<void | AuthError | ApiError>
  untrash(id: string): Promise<void | AuthError | ApiError>
  /** Remove the INBOX label. */
  archive(id: string): Promise<void | AuthError | ApiError>
  /** Add the INBOX label back. */
  unarchive(id: string): Promise<void | AuthError | ApiError>
  markRead(id: string): Promise<void | AuthError | ApiError>
  markUnread(id: string): Promise<void | AuthError | ApiError>
}

/** Boundary helper: wrap a googleapis SDK call, converting auth-like errors to AuthError values.
 *  Non-auth errors are wrapped in ApiError so they remain error values (no throwing).
 *  Original error is preserved as `cause` for debugging. */
function gmailBoundary<T>(account: string, fn: () => Promise<T>) {
  return errore.tryAsync({
    try: fn,
    catch: (err) => isAuthLikeError(err)
      ? new AuthError({ account, reason: errorMessage(err), cause: err })
      : new ApiError({ reason: errorMessage(err), cause: err }),
  })
}

function decodeBase64Url(encoded: string) {
  const base64 = encoded.replace(/-/g, '+').replace(/_/g, '/')
  return Buffer.from(base64, 'base64').toString('utf-8')
}

// ---------------------------------------------------------------------------
// Gmail implementation
// ---------------------------------------------------------------------------

export class GmailGateway implements RemoteGateway {
  private gmail: gmail_v1.Gmail
  private account: string
  private pageSize: number

  constructor({ auth, account = 'me', pageSize = 100 }: { auth: OAuth2Client; account?: string; pageSize?: number }) {
    this.gmail = google.gmail({ version: 'v1', auth })
    this.account = account
    this.pageSize = pageSize
  }

  async listLabels(): Promise<Label[] | AuthError | ApiError> {
    const res = await gmailBoundary(this.account, () =>
      withRetry(() => this.gmail.users.labels.list({ userId: 'me' })),
    )
    if (res instanceof Error) return res
    return GmailGateway.parseRawLabels(res.data.labels ?? [])
  }

  async listMessages(labelId: string, cachedDate?: CachedDateLookup): Promise<MessageListing | AuthError | ApiError> {
    const page = await this.listIds([labelId])
    if (page instanceof Error) return page

    // Read state for the whole page in one call: an unread entry of the page is also
    // among the newest pageSize unread messages of the label.
    const unread = labelId === UNREAD ? page : await this.listIds([labelId, UNREAD])
    if (unread instanceof AuthError) return unread

    return GmailGateway.assembleListing({
      ids: page.ids,
      hasMore: page.hasMore,
      unreadIds: unread instanceof Error ? undefined : new Set(unread.ids),
      cachedDate,
      hydrate: (id) => this.hydrateEntry(id),
    })
  }

  private async listIds(labelIds: string[]): Promise<{ ids: string[]; hasMore: boolean } | AuthError | ApiError> {
    const res = await gmailBoundary(this.account, () =>
      withRetry(() =>
        this.gmail.users.messages.list({
          userId: 'me',
          labelIds,
          maxResults: this.pageSize,
        }),
      ),
    )
    if (res instanceof Error) return res
    const ids = (res.data.messages ?? [])
      .map((m) => m.id)
      .filter((id): id is string => typeof id === 'string' && id.length > 0)
    return { ids, hasMore: Boolean(res.data.nextPageToken) }
  }

  /** messages.list carries no timestamps: look one id up with format=minimal. */
  private async hydrateEntry(id: string): Promise<ListingEntry | null | AuthError> {
    const detail = await gmailBoundary(this.account, () =>
      withRetry(() => this.gmail.users.messages.get({ userId: 'me', id, format: 'minimal' })),
    )
    if (detail instanceof AuthError) return detail
    if (detail instanceof Error) return null
    return GmailGateway.parseListingEntry(detail.data)
  }

  async getMessage(id: string): Promise<Message | NotFoundError | AuthError | ApiError> {
    const res = await gmailBoundary(this.account, () =>
      withRetry(() => this.gmail.users.messages.get({ userId: 'me', id, format: 'full' })),
    )
    if (res instanceof ApiError && errorStatus(res.cause) === 404) {
      return new NotFoundError({ resource: `Message ${id}` })
    }
    if (res instanceof Error) return res
    return GmailGateway.parseRawMessage(res.data)
  }

  async trash(id: string) {
    return this.call(() => this.gmail.users.messages.trash({ userId: 'me', id }))
  }

  async untrash(id: string) {
    return this.call(() => this.gmail.users.messages.untrash({ userId: 'me', id }))
  }

  async archive(id: string) {
    return this.modify(id, { removeLabelIds: [INBOX] })
  }

  async unarchive(id: string) {
    return this.modify(id, { addLabelIds: [INBOX] })
  }

  async markRead(id: string) {
    return this.modify(id, { removeLabelIds: [UNREAD] })
  }

  async markUnread(id: string) {
    return this.modify(id, { addLabelIds: [UNREAD] })
  }

  private async modify(id: string, requestBody: gmail_v1.Schema$ModifyMessageRequest) {
    return this.call(() => this.gmail.users.messages.modify({ userId: 'me', id, requestBody }))
  }

  private async call<T>(fn: () => Promise<T>): Promise<void | AuthError | ApiError> {
    const res = await gmailBoundary(this.account, () => withRetry(fn))
    if (res instanceof Error) return res
  }

  // =========================================================================
  // Static parsing (pure, tested without network)
  // =========================================================================

  /**
   * Build a listing from one page of ids. Ids the cache already holds keep their cached
   * timestamp and take read state from `unreadIds`; the rest are hydrated.
   * Auth errors abort, other hydration failures skip the entry and make the listing partial.
   */
  static async assembleListing({
    ids,
    hasMore,
    unreadIds,
    cachedDate,
    hydrate,
  }: {
    ids: string[]
    hasMore: boolean
    unreadIds?: Set<string>
    cachedDate?: CachedDateLookup
    hydrate: (id: string) => Promise<ListingEntry | null | AuthError>
  }): Promise<MessageListing | AuthError> {
    const resolved = await mapConcurrent(ids, async (id): Promise<ListingEntry | null | AuthError> => {
      const known = cachedDate?.(id)
      if (known !== undefined) return { id, internalDate: known, unread: unreadIds?.has(id) }
      return hydrate(id)
    })
    if (resolved instanceof Error) return resolved

    const entries = resolved.filter((e): e is ListingEntry => e !== null)
    return {
      entries,
      // A skipped entry makes the listing partial: absence no longer means removal
      complete: !hasMore && entries.length === ids.length,
    }
  }

  static parseListingEntry(raw: gmail_v1.Schema$Message): ListingEntry | null {
    if (!raw.id) return null
    return {
      id: raw.id,
      internalDate: Number(raw.internalDate ?? 0) || 0,
      unread: (raw.labelIds ?? []).includes(UNREAD),
    }
  }

  /** Parse a raw gmail_v1.Schema$Message (format: full) into a Message. */
  static parseRawMessage(message: gmail_v1.Schema$Message): Message {
    const headers = message.payload?.headers ?? []
    const labelIds = message.labelIds ?? []

    const getHeader = (name: string) =>
      headers.find((h) => h.name?.toLowerCase() === name.toLowerCase())?.value ?? null

    const { plain, html } = GmailGateway.extractBodies(message.payload ?? {})

    return {
      id: message.id ?? '',
      threadId: message.threadId ?? message.id ?? '',
      fromAddress: getHeader('from'),
      toAddress: getHeader('to'),
      subject: getHeader('subject'),
      snippet: message.snippet ?? null,
      bodyPlain: plain,
      bodyHtml: html,
      internalDate: Number(message.internalDate ?? 0) || 0,
      isRead: !labelIds.includes(UNREAD),
      labelIds,
    }
  }

  /** Parse raw gmail_v1.Schema$Label[] from labels.list. Labels without an id are dropped. */
  static parseRawLabels(rawLabels: gmail_v1.Schema$Label[]): Label[] {
    return rawLabels
      .filter((label) => !!label.id)
      .map((label): Label => ({
        id: label.id ?? '',
        name: label.name ?? label.id ?? '',
        type: label.type === 'system' ? 'system' : 'user',
        colorForeground: label.color?.textColor ?? null,
        colorBackground: label.color?.backgroundColor ?? null,
      }))
  }

  // =========================================================================
  // Private static: body extraction
  // =========================================================================

  private static extractBodies(payload: gmail_v1.Schema$MessagePart): {
    plain: string | null
    html: string | null
  } {
    if (payload.body?.data && !payload.parts) {
      const body = decodeBase64Url(payload.body.data)
      return payload.mimeType === 'text/html'
        ? { plain: null, html: body }
        : { plain: body, html: null }
    }

    const parts = payload.parts ?? []
    const plain = GmailGateway.findBodyPart(parts, 'text/plain')
    const html = GmailGateway.findBodyPart(parts, 'text/html')
    return {
      plain: plain ? decodeBase64Url(plain) : null,
      html: html ? decodeBase64Url(html) : null,
    }
  }

  private static findBodyPart(parts: gmail_v1.Schema$MessagePart[], mimeType: string): string | null {
    for (const part of parts) {
      // Attachments that happen to be text/* are not bodies
      if (part.mimeType === mimeType && part.body?.data && !part.filename) {
        return part.body.data
      }
      if (part.parts) {
        const found = GmailGateway.findBodyPart(part.parts, mimeType)
        if (found) return found
      }
    }
    return null
  }
}
