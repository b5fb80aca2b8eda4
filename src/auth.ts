// OAuth2 credentials for mailmirror.
// TokenFileCredentials reads the OAuth client secret (credentials.json, the file the
// Google Cloud console downloads) and the user's tokens (tokens.json) from the data
// directory, refreshes expired access tokens and writes the merged tokens back.
// Obtaining the first token (browser consent flow) is left to the embedding app.

import fs from 'node:fs'
import path from 'node:path'
import { OAuth2Client, type Credentials } from 'google-auth-library'
import * as errore from 'errore'
import { z } from 'zod'
import { AuthError, ConfigError, errorMessage } from './api-utils.js'
import { silentLogger, type Logger } from './logger.js'

export const CLIENT_SECRET_FILE = 'credentials.json'
export const TOKENS_FILE = 'tokens.json'

export interface CredentialProvider {
  getAuth(): Promise<OAuth2Client | AuthError>
}

// ---------------------------------------------------------------------------
// File schemas
// ---------------------------------------------------------------------------

const clientSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
})

const clientSecretSchema = z
  .object({ installed: clientSchema.optional(), web: clientSchema.optional() })
  .refine((file) => file.installed || file.web, { message: 'expected an "installed" or "web" client' })

const tokensSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  token_type: z.string().nullish(),
  id_token: z.string().nullish(),
  scope: z.string().optional(),
})

function readJsonFile<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | ConfigError {
  const file = path.basename(filePath)
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'))
  } catch (err) {
    return new ConfigError({ file, reason: errorMessage(err), cause: err })
  }
  const result = schema.safeParse(raw)
  if (!result.success) {
    return new ConfigError({ file, reason: result.error.issues.map((i) => i.message).join('; ') })
  }
  return result.data
}

// ---------------------------------------------------------------------------
// Token file provider
// ---------------------------------------------------------------------------

export class TokenFileCredentials implements CredentialProvider {
  private dataDir: string
  private account: string
  private logger: Logger
  private client: OAuth2Client | null = null

  constructor({ dataDir, account = 'me', logger = silentLogger }: { dataDir: string; account?: string; logger?: Logger }) {
    this.dataDir = dataDir
    this.account = account
    this.logger = logger
  }

  get tokensPath() {
    return path.join(this.dataDir, TOKENS_FILE)
  }

  get clientSecretPath() {
    return path.join(this.dataDir, CLIENT_SECRET_FILE)
  }

  /**
   * Authenticated client, refreshed if the stored access token has expired.
   * Missing or invalid files are reported as AuthError so callers handle one kind.
   */
  async getAuth(): Promise<OAuth2Client | AuthError> {
    if (this.client) return this.client

    const secret = readJsonFile(this.clientSecretPath, clientSecretSchema)
    if (secret instanceof Error) return this.fail(secret.message, secret)
    const app = secret.installed ?? secret.web
    if (!app) return this.fail(`${CLIENT_SECRET_FILE} has no client`)

    if (!fs.existsSync(this.tokensPath)) {
      return this.fail(`No tokens at ${this.tokensPath}. Complete the OAuth consent flow first.`)
    }
    const tokens = readJsonFile(this.tokensPath, tokensSchema)
    if (tokens instanceof Error) return this.fail(tokens.message, tokens)

    const client = new OAuth2Client({
      clientId: app.client_id,
      clientSecret: app.client_secret,
      redirectUri: app.redirect_uris?.[0],
    })
    client.setCredentials(tokens)

    const refreshed = await this.refreshIfExpired(client, tokens)
    if (refreshed instanceof Error) return refreshed

    // Persist tokens the library refreshes on its own later in the session
    client.on('tokens', (credentials) => {
      this.saveTokens({ ...client.credentials, ...credentials })
    })

    this.client = client
    return client
  }

  /** Delete stored tokens and forget the cached client. */
  clearTokens(): void {
    this.client = null
    if (fs.existsSync(this.tokensPath)) {
      fs.rmSync(this.tokensPath)
    }
  }

  saveTokens(tokens: Credentials): void {
    fs.mkdirSync(this.dataDir, { recursive: true, mode: 0o700 })
    fs.writeFileSync(this.tokensPath, JSON.stringify(tokens, null, 2), { mode: 0o600 })
  }

  private async refreshIfExpired(client: OAuth2Client, tokens: Credentials): Promise<void | AuthError> {
    if (!tokens.expiry_date || tokens.expiry_date >= Date.now()) return
    if (!tokens.refresh_token) return this.fail('Access token expired and no refresh_token is stored')

    this.logger.info(`Token expired for ${this.account}, refreshing`)
    const res = await errore.tryAsync({
      try: () => client.refreshAccessToken(),
      catch: (err) => this.fail(errorMessage(err), err),
    })
    if (res instanceof Error) return res

    // Merge: Google often omits refresh_token from refresh responses
    const merged = { ...tokens, ...res.credentials }
    client.setCredentials(merged)
    this.saveTokens(merged)
  }

  private fail(reason: string, cause?: unknown): AuthError {
    return new AuthError({ account: this.account, reason, cause })
  }
}
