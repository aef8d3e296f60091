import path from 'path'
import { OAuthTokensSchema, type OAuthTokens } from '@modelcontextprotocol/sdk/shared/auth.js'
import { OAuthFlowError, errorFromResponse } from './errors'
import { deleteFile, getServerUrlHash, readJsonFile, writeJsonFile } from './mcp-auth-config'
import { StoredTokenSchema, type ClientCredentials, type FetchFn, type ServerMetadata, type StoredToken } from './types'
import { DEBUG, debugLog, fetchWithTimeout, log } from './utils'

/** Tokens this close to expiry are refreshed before use */
export const REFRESH_BUFFER_SECONDS = 60

export interface TokenManagerOptions {
  /** Directory holding one token file per server */
  storageDir: string
  fetchFn?: FetchFn
  timeoutMs?: number
  /** Clock, overridable in tests */
  now?: () => Date
}

export interface ExchangeCodeParams {
  metadata: ServerMetadata
  client: ClientCredentials
  code: string
  redirectUri: string
  codeVerifier: string
  serverUrl: string
  signal?: AbortSignal
}

export interface RefreshTokenParams {
  metadata: ServerMetadata
  client: ClientCredentials
  stored: StoredToken
  signal?: AbortSignal
}

export interface GetValidTokenParams {
  metadata: ServerMetadata
  client: ClientCredentials
  serverUrl: string
  signal?: AbortSignal
}

/**
 * Token file name for a server: URL-reserved characters become `_`
 */
export function tokenFileName(serverUrl: string): string {
  return `${serverUrl.replace(/:\/\//g, '_').replace(/[/:?&#=]/g, '_')}.json`
}

/**
 * Exchanges, refreshes and persists OAuth tokens, one JSON file per server URL
 */
export class TokenManager {
  private readonly storageDir: string
  private readonly fetchFn?: FetchFn
  private readonly timeoutMs?: number
  private readonly now: () => Date

  constructor(options: TokenManagerOptions) {
    this.storageDir = options.storageDir
    this.fetchFn = options.fetchFn
    this.timeoutMs = options.timeoutMs
    this.now = options.now ?? (() => new Date())
  }

  getTokenFilePath(serverUrl: string): string {
    return path.join(this.storageDir, tokenFileName(serverUrl))
  }

  async exchangeCodeForToken(params: ExchangeCodeParams): Promise<StoredToken> {
    const { metadata, client, code, redirectUri, codeVerifier, serverUrl, signal } = params
    log('Exchanging authorization code for access token')

    const form = new URLSearchParams({
      grant_type: 'authorization_code',
      client_id: client.client_id,
      code,
      redirect_uri: redirectUri,
      code_verifier: codeVerifier,
    })
    if (client.client_secret) {
      form.set('client_secret', client.client_secret)
    }

    const tokens = await this.postTokenRequest(metadata.token_endpoint, form, 'token_exchange', 'Token exchange', signal)
    const storedToken = this.createStoredToken(tokens, serverUrl, 'token_exchange')
    log('Successfully exchanged authorization code for access token')

    await this.saveToken(storedToken)
    return storedToken
  }

  async refreshToken(params: RefreshTokenParams): Promise<StoredToken> {
    const { metadata, client, stored, signal } = params
    if (!stored.refresh_token) {
      throw new OAuthFlowError('token_refresh', 'No refresh token available')
    }

    log('Refreshing access token using refresh token')

    const form = new URLSearchParams({
      grant_type: 'refresh_token',
      client_id: client.client_id,
      refresh_token: stored.refresh_token,
    })
    if (client.client_secret) {
      form.set('client_secret', client.client_secret)
    }
    if (stored.scope) {
      form.set('scope', stored.scope)
    }

    const tokens = await this.postTokenRequest(metadata.token_endpoint, form, 'token_refresh', 'Token refresh', signal)
    log('Successfully refreshed access token')

    const refreshed = this.createStoredToken(tokens, stored.server_url, 'token_refresh')
    const updated: StoredToken = {
      ...refreshed,
      refresh_token: refreshed.refresh_token ?? stored.refresh_token,
      scope: refreshed.scope ?? stored.scope,
      created_at: stored.created_at,
    }

    await this.saveToken(updated)
    return updated
  }

  async loadToken(serverUrl: string): Promise<StoredToken | undefined> {
    const tokenFile = this.getTokenFilePath(serverUrl)
    const token = await readJsonFile(tokenFile, StoredTokenSchema)
    if (DEBUG) await debugLog(getServerUrlHash(serverUrl), 'Loaded stored token', { found: !!token, tokenFile })
    return token
  }

  async saveToken(token: StoredToken): Promise<void> {
    const tokenFile = this.getTokenFilePath(token.server_url)
    if (DEBUG) {
      await debugLog(getServerUrlHash(token.server_url), 'Saving token', {
        tokenFile,
        hasRefreshToken: !!token.refresh_token,
        expiresAt: token.expires_at,
      })
    }
    await writeJsonFile(tokenFile, token)
  }

  async deleteToken(serverUrl: string): Promise<void> {
    if (await deleteFile(this.getTokenFilePath(serverUrl))) {
      log(`Deleted stored token for server: ${serverUrl}`)
    }
  }

  /**
   * True when the token expires within `bufferSeconds`. Tokens without expiry never expire.
   */
  isTokenExpired(token: StoredToken, bufferSeconds: number): boolean {
    if (!token.expires_at) {
      return false
    }
    return this.now().getTime() + bufferSeconds * 1000 >= Date.parse(token.expires_at)
  }

  /**
   * Returns the stored access token, refreshing it first when it is about to expire
   */
  async getValidToken(params: GetValidTokenParams): Promise<string> {
    const { metadata, client, serverUrl, signal } = params
    const stored = await this.loadToken(serverUrl)
    if (!stored) {
      throw new OAuthFlowError('token_storage', 'No stored token found')
    }

    if (!this.isTokenExpired(stored, REFRESH_BUFFER_SECONDS)) {
      return stored.access_token
    }

    log('Access token is expired or will expire soon, refreshing...')
    const refreshed = await this.refreshToken({ metadata, client, stored, signal })
    return refreshed.access_token
  }

  private async postTokenRequest(
    tokenEndpoint: string,
    form: URLSearchParams,
    kind: 'token_exchange' | 'token_refresh',
    action: string,
    signal?: AbortSignal,
  ): Promise<OAuthTokens> {
    const response = await fetchWithTimeout(
      tokenEndpoint,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' },
        body: form.toString(),
      },
      { fetchFn: this.fetchFn, timeoutMs: this.timeoutMs, signal },
    )

    if (!response.ok) {
      const error = await errorFromResponse(kind, action, response)
      log(`${action} failed: ${response.status} - ${error.body}`)
      throw error
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      throw new OAuthFlowError('json', `${action} response is not valid JSON`, { cause: error })
    }

    const parsed = OAuthTokensSchema.safeParse(body)
    if (!parsed.success) {
      throw new OAuthFlowError(kind, `Invalid ${action.toLowerCase()} response: ${parsed.error.message}`, { cause: parsed.error })
    }
    return parsed.data
  }

  private createStoredToken(tokens: OAuthTokens, serverUrl: string, kind: 'token_exchange' | 'token_refresh'): StoredToken {
    const now = this.now()
    const timestamp = now.toISOString()

    let expiresAt: string | undefined
    if (tokens.expires_in !== undefined) {
      const expiry = new Date(now.getTime() + tokens.expires_in * 1000)
      if (Number.isNaN(expiry.getTime())) {
        throw new OAuthFlowError(kind, `Token response has an unusable expires_in: ${tokens.expires_in}`)
      }
      expiresAt = expiry.toISOString()
    }

    return {
      access_token: tokens.access_token,
      token_type: tokens.token_type,
      refresh_token: tokens.refresh_token,
      scope: tokens.scope,
      expires_at: expiresAt,
      server_url: serverUrl,
      created_at: timestamp,
      updated_at: timestamp,
    }
  }
}
