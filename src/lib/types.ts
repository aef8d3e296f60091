import { z } from 'zod'

/**
 * PKCE parameters for one authorization attempt
 */
export interface PkceChallenge {
  code_verifier: string
  code_challenge: string
  code_challenge_method: 'S256'
}

/**
 * OAuth 2.0 Authorization Server Metadata (RFC 8414). Unknown fields are preserved.
 */
export const ServerMetadataSchema = z
  .object({
    issuer: z.string(),
    authorization_endpoint: z.string().url(),
    token_endpoint: z.string().url(),
    registration_endpoint: z.string().url().optional(),
    jwks_uri: z.string().url().optional(),
    response_types_supported: z.array(z.string()).optional(),
    grant_types_supported: z.array(z.string()).optional(),
    token_endpoint_auth_methods_supported: z.array(z.string()).optional(),
    scopes_supported: z.array(z.string()).optional(),
    code_challenge_methods_supported: z.array(z.string()).optional(),
  })
  .passthrough()

export type ServerMetadata = z.infer<typeof ServerMetadataSchema>

export const ClientCredentialsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().optional(),
})

export type ClientCredentials = z.infer<typeof ClientCredentialsSchema>

/**
 * Dynamic Client Registration response (RFC 7591)
 */
export const ClientRegistrationResponseSchema = z
  .object({
    client_id: z.string().min(1),
    client_secret: z.string().optional(),
    client_id_issued_at: z.number().optional(),
    client_secret_expires_at: z.number().optional(),
    redirect_uris: z.array(z.string()).optional(),
  })
  .passthrough()

export type ClientRegistrationResponse = z.infer<typeof ClientRegistrationResponseSchema>

/**
 * Registration result persisted next to the tokens, with the redirect URI it was registered for
 */
export const StoredClientInfoSchema = ClientRegistrationResponseSchema.extend({
  redirect_uri: z.string().url(),
})

export type StoredClientInfo = z.infer<typeof StoredClientInfoSchema>

export const StoredTokenSchema = z.object({
  access_token: z.string(),
  token_type: z.string(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
  /** ISO-8601; absent means the token never expires */
  expires_at: z.string().datetime({ offset: true }).optional(),
  server_url: z.string(),
  created_at: z.string().datetime({ offset: true }),
  updated_at: z.string().datetime({ offset: true }),
})

export type StoredToken = z.infer<typeof StoredTokenSchema>

export const LockfileDataSchema = z.object({
  pid: z.number().int().positive(),
  port: z.number().int().min(0).max(65535),
  /** Unix seconds */
  timestamp: z.number().int().nonnegative(),
  server_url_hash: z.string(),
})

export type LockfileData = z.infer<typeof LockfileDataSchema>

export interface AuthorizationResponse {
  code: string
  state: string
}

/**
 * In-memory record of an authorization attempt, from URL emission until the callback or timeout
 */
export interface AuthorizationSession {
  state: string
  pkce: PkceChallenge
  redirectUri: string
  expiresAt: number
}

/**
 * Stages `OAuthClient.getAccessToken()` moves through
 */
export type AuthPhase =
  | 'no_token'
  | 'discovering'
  | 'registering'
  | 'checking_cache'
  | 'coordinating'
  | 'awaiting_authorization'
  | 'exchanging_code'
  | 'valid'

/** Opens the authorization URL for the user. Must not throw. */
export type BrowserLauncher = (url: string) => Promise<void>

/** Reports whether an OS process is still running */
export type IsProcessAlive = (pid: number) => Promise<boolean>

export type FetchFn = typeof fetch

/**
 * Shared options for the HTTP-backed components
 */
export interface HttpOptions {
  /** Defaults to the global fetch */
  fetchFn?: FetchFn
  /** Per-request timeout in milliseconds */
  timeoutMs?: number
  signal?: AbortSignal
}

// Transport strategy types
export type TransportStrategy = 'sse-only' | 'http-only' | 'sse-first' | 'http-first'
