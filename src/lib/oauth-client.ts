import { z } from 'zod'
import { launchBrowser as defaultLaunchBrowser } from './browser'
import { CALLBACK_PATH, CallbackServer } from './callback-server'
import { registerClient } from './client-registration'
import { CoordinationManager, type CoordinationOptions } from './coordination'
import { OAuthFlowError, isOAuthFlowError } from './errors'
import { deleteClientInfo, getConfigDir, getServerUrlHash, readClientInfo, writeClientInfo } from './mcp-auth-config'
import { generatePkceChallenge, generateState, statesMatch } from './pkce'
import { discoverServerMetadata } from './server-metadata'
import { TokenManager } from './token-manager'
import {
  ClientCredentialsSchema,
  ServerMetadataSchema,
  type AuthPhase,
  type AuthorizationSession,
  type BrowserLauncher,
  type ClientCredentials,
  type FetchFn,
  type IsProcessAlive,
  type ServerMetadata,
  type StoredClientInfo,
} from './types'
import { DEBUG, debugLog, findAvailablePort, log, MAX_AUTH_TIMEOUT_SECS } from './utils'

export const DEFAULT_AUTH_TIMEOUT_SECS = 300
export const DEFAULT_CLIENT_NAME = 'MCP OAuth Proxy'

const OAuthConfigSchema = z.object({
  serverUrl: z.string().url(),
  /** Directory for tokens, client info and lock files; defaults to the config dir */
  authDir: z.string().min(1).optional(),
  serverMetadata: ServerMetadataSchema.optional(),
  staticClientInfo: ClientCredentialsSchema.optional(),
  /** Preferred callback port; 0 or unset lets the OS pick */
  callbackPort: z.number().int().min(0).max(65535).optional(),
  callbackHost: z.string().min(1).default('localhost'),
  authTimeoutSecs: z.number().int().positive().max(MAX_AUTH_TIMEOUT_SECS).default(DEFAULT_AUTH_TIMEOUT_SECS),
  scope: z.string().min(1).optional(),
  clientName: z.string().min(1).default(DEFAULT_CLIENT_NAME),
})

export type OAuthConfigInput = z.input<typeof OAuthConfigSchema>

export type OAuthConfig = Readonly<Omit<z.output<typeof OAuthConfigSchema>, 'authDir'> & { authDir: string }>

/**
 * Validates the configuration once, before any flow starts, and freezes it
 */
export function createOAuthConfig(input: OAuthConfigInput): OAuthConfig {
  const parsed = OAuthConfigSchema.safeParse(input)
  if (!parsed.success) {
    throw new OAuthFlowError('invalid_configuration', `Invalid OAuth configuration: ${parsed.error.message}`, { cause: parsed.error })
  }
  return Object.freeze({ ...parsed.data, authDir: parsed.data.authDir ?? getConfigDir() })
}

export interface OAuthClientDependencies {
  fetchFn?: FetchFn
  launchBrowser?: BrowserLauncher
  isProcessAlive?: IsProcessAlive
  /** Per-request HTTP timeout */
  httpTimeoutMs?: number
  /** Interface the callback listener binds */
  listenHost?: string
  coordination?: Pick<CoordinationOptions, 'pollIntervalMs' | 'maxWaitMs' | 'maxLockAgeMs'>
}

export interface GetAccessTokenOptions {
  /** Aborts HTTP requests, the coordination wait and the callback wait */
  signal?: AbortSignal
}

function redirectPort(redirectUri: string): number | undefined {
  const port = Number.parseInt(new URL(redirectUri).port, 10)
  return Number.isInteger(port) ? port : undefined
}

/**
 * OAuth 2.1 client for one remote MCP server.
 *
 * `getAccessToken()` runs discovery, registration, the token cache, cross-process
 * coordination and the interactive browser flow, in that order, stopping at the first step
 * that yields a usable token.
 */
export class OAuthClient {
  readonly config: OAuthConfig
  readonly serverUrlHash: string
  private readonly tokenManager: TokenManager
  private readonly coordination: CoordinationManager
  private readonly fetchFn?: FetchFn
  private readonly launchBrowser: BrowserLauncher
  private readonly httpTimeoutMs?: number
  private readonly listenHost?: string
  private metadata?: ServerMetadata
  private client?: ClientCredentials
  private registeredPort?: number
  private currentPhase: AuthPhase = 'no_token'

  constructor(config: OAuthConfigInput, dependencies: OAuthClientDependencies = {}) {
    this.config = createOAuthConfig(config)
    this.serverUrlHash = getServerUrlHash(this.config.serverUrl)
    this.metadata = this.config.serverMetadata
    this.fetchFn = dependencies.fetchFn
    this.launchBrowser = dependencies.launchBrowser ?? defaultLaunchBrowser
    this.httpTimeoutMs = dependencies.httpTimeoutMs
    this.listenHost = dependencies.listenHost
    this.tokenManager = new TokenManager({
      storageDir: this.config.authDir,
      fetchFn: dependencies.fetchFn,
      timeoutMs: dependencies.httpTimeoutMs,
    })
    this.coordination = new CoordinationManager({
      authDir: this.config.authDir,
      serverUrlHash: this.serverUrlHash,
      isProcessAlive: dependencies.isProcessAlive,
      ...dependencies.coordination,
    })
  }

  get serverUrl(): string {
    return this.config.serverUrl
  }

  /** Last stage `getAccessToken()` reached */
  get phase(): AuthPhase {
    return this.currentPhase
  }

  /**
   * Returns a valid access token, running the interactive flow if nothing usable is stored
   */
  async getAccessToken(options: GetAccessTokenOptions = {}): Promise<string> {
    const { signal } = options
    log(`Getting access token for server: ${this.config.serverUrl}`)

    const metadata = await this.resolveMetadata(signal)
    const client = await this.resolveClient(metadata, signal)

    this.setPhase('checking_cache')
    const cached = await this.tryStoredToken(metadata, client, signal)
    if (cached) {
      log('Using existing valid access token')
      this.setPhase('valid')
      return cached
    }

    log('Starting new OAuth authorization flow...')
    return this.startOAuthFlow(metadata, client, signal)
  }

  /**
   * Forces a new authorization on the next `getAccessToken()`
   */
  async clearTokens(): Promise<void> {
    await this.tokenManager.deleteToken(this.config.serverUrl)
    this.currentPhase = 'no_token'
  }

  /**
   * Forgets the dynamically registered client so the next flow registers again
   */
  async clearClientInfo(): Promise<void> {
    await deleteClientInfo(this.config.authDir, this.serverUrlHash)
    this.client = undefined
    this.registeredPort = undefined
  }

  async hasStoredToken(): Promise<boolean> {
    try {
      return (await this.tokenManager.loadToken(this.config.serverUrl)) !== undefined
    } catch {
      return false
    }
  }

  buildAuthorizationUrl(metadata: ServerMetadata, clientId: string, session: AuthorizationSession): string {
    const url = new URL(metadata.authorization_endpoint)
    url.searchParams.append('response_type', 'code')
    url.searchParams.append('client_id', clientId)
    url.searchParams.append('redirect_uri', session.redirectUri)
    url.searchParams.append('state', session.state)
    url.searchParams.append('code_challenge', session.pkce.code_challenge)
    url.searchParams.append('code_challenge_method', session.pkce.code_challenge_method)
    if (this.config.scope) {
      url.searchParams.append('scope', this.config.scope)
    }
    return url.toString()
  }

  private setPhase(phase: AuthPhase) {
    this.currentPhase = phase
  }

  private async resolveMetadata(signal?: AbortSignal): Promise<ServerMetadata> {
    if (this.metadata) {
      return this.metadata
    }
    this.setPhase('discovering')
    log('Discovering OAuth server metadata...')
    this.metadata = await discoverServerMetadata(this.config.serverUrl, {
      fetchFn: this.fetchFn,
      timeoutMs: this.httpTimeoutMs,
      signal,
    })
    return this.metadata
  }

  private async resolveClient(metadata: ServerMetadata, signal?: AbortSignal): Promise<ClientCredentials> {
    if (this.config.staticClientInfo) {
      log('Using static OAuth client credentials')
      return this.config.staticClientInfo
    }
    if (this.client) {
      return this.client
    }

    const stored = await this.loadStoredClient()
    if (stored) {
      log(`Using stored OAuth client registration: ${stored.client_id}`)
      this.client = { client_id: stored.client_id, client_secret: stored.client_secret }
      this.registeredPort = redirectPort(stored.redirect_uri)
      return this.client
    }

    if (!metadata.registration_endpoint) {
      throw new OAuthFlowError(
        'invalid_configuration',
        'No static client info provided and server does not support dynamic registration',
      )
    }

    this.setPhase('registering')
    log('Using dynamic client registration')

    // The listener is not running yet: register with a port that is free now and prefer it later
    const port = await findAvailablePort(this.config.callbackPort || undefined)
    const redirectUri = `http://${this.config.callbackHost}:${port}${CALLBACK_PATH}`
    const registration = await registerClient(metadata, redirectUri, {
      clientName: this.config.clientName,
      fetchFn: this.fetchFn,
      timeoutMs: this.httpTimeoutMs,
      signal,
    })

    await writeClientInfo(this.config.authDir, this.serverUrlHash, { ...registration, redirect_uri: redirectUri })
    this.client = { client_id: registration.client_id, client_secret: registration.client_secret }
    this.registeredPort = port
    return this.client
  }

  /**
   * Stored registration, unless it no longer matches the configured callback host or port
   */
  private async loadStoredClient(): Promise<StoredClientInfo | undefined> {
    let stored: StoredClientInfo | undefined
    try {
      stored = await readClientInfo(this.config.authDir, this.serverUrlHash)
    } catch (error) {
      log(`Ignoring unreadable client registration: ${error instanceof Error ? error.message : String(error)}`)
      return undefined
    }
    if (!stored) {
      return undefined
    }

    const redirect = new URL(stored.redirect_uri)
    const storedPort = redirectPort(stored.redirect_uri)
    const { callbackPort, callbackHost } = this.config
    if (callbackPort && storedPort !== callbackPort) {
      log(
        `Warning! Callback port ${callbackPort} conflicts with existing client registration port ${storedPort}. Registering a new client.`,
      )
      return undefined
    }
    if (redirect.hostname !== callbackHost) {
      log(`Callback host ${callbackHost} differs from registered host ${redirect.hostname}. Registering a new client.`)
      return undefined
    }
    return stored
  }

  /**
   * Stored token (refreshed if needed), or undefined when none is usable.
   * Only cancellation propagates.
   */
  private async tryStoredToken(metadata: ServerMetadata, client: ClientCredentials, signal?: AbortSignal): Promise<string | undefined> {
    try {
      return await this.tokenManager.getValidToken({ metadata, client, serverUrl: this.config.serverUrl, signal })
    } catch (error) {
      if (isOAuthFlowError(error, 'cancelled')) {
        throw error
      }
      log(`Could not get valid existing token: ${error instanceof Error ? error.message : String(error)}`)
      return undefined
    }
  }

  private createSession(redirectUri: string): AuthorizationSession {
    return {
      state: generateState(),
      pkce: generatePkceChallenge(),
      redirectUri,
      expiresAt: Date.now() + this.config.authTimeoutSecs * 1000,
    }
  }

  private async openBrowser(url: string): Promise<void> {
    try {
      await this.launchBrowser(url)
    } catch (error) {
      log(`Could not open browser. Please visit this URL to authorize:\n${url}`)
      if (DEBUG) await debugLog(this.serverUrlHash, 'Browser launcher failed', error)
    }
  }

  private async startOAuthFlow(metadata: ServerMetadata, client: ClientCredentials, signal?: AbortSignal): Promise<string> {
    const peer = await this.coordination.checkLockfile()
    if (peer) {
      this.setPhase('coordinating')
      log(`Another instance is handling authentication on port ${peer.port} (pid: ${peer.pid})`)

      if (await this.coordination.waitForAuthentication(peer.port, signal)) {
        log('Authentication completed by another instance')
        const token = await this.tryStoredToken(metadata, client, signal)
        if (token) {
          this.setPhase('valid')
          return token
        }
        log('Proceeding with our own auth flow')
      }
    }

    this.setPhase('awaiting_authorization')
    const callbackServer = await CallbackServer.start({
      preferredPort: this.config.callbackPort || this.registeredPort,
      listenHost: this.listenHost,
    })
    const unregisterExitCleanup = this.coordination.registerExitCleanup()

    try {
      await this.coordination.createLockfile(callbackServer.port)

      const session = this.createSession(callbackServer.callbackUrl(this.config.callbackHost))
      const authorizationUrl = this.buildAuthorizationUrl(metadata, client.client_id, session)
      if (DEBUG) await debugLog(this.serverUrlHash, 'Authorization URL', authorizationUrl)

      log('Opening browser for OAuth authorization...')
      await this.openBrowser(authorizationUrl)

      const response = await callbackServer.waitForCallback(session.expiresAt - Date.now(), signal)

      if (!statesMatch(session.state, response.state)) {
        throw new OAuthFlowError('csrf', 'State parameter mismatch - possible CSRF attack')
      }

      log('Authorization successful, exchanging code for tokens...')
      this.setPhase('exchanging_code')
      const storedToken = await this.tokenManager.exchangeCodeForToken({
        metadata,
        client,
        code: response.code,
        redirectUri: session.redirectUri,
        codeVerifier: session.pkce.code_verifier,
        serverUrl: this.config.serverUrl,
        signal,
      })

      this.setPhase('valid')
      log('OAuth flow completed successfully!')
      return storedToken.access_token
    } finally {
      callbackServer.close()
      unregisterExitCleanup()
      await this.coordination.deleteLockfile()
    }
  }
}
