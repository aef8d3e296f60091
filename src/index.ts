export { OAuthClient, createOAuthConfig, DEFAULT_AUTH_TIMEOUT_SECS, DEFAULT_CLIENT_NAME } from './lib/oauth-client'
export type { OAuthConfig, OAuthConfigInput, OAuthClientDependencies, GetAccessTokenOptions } from './lib/oauth-client'

export { generatePkceChallenge, generateCodeChallenge, verifyPkceChallenge, generateState, statesMatch } from './lib/pkce'
export { discoverServerMetadata, buildFallbackMetadata, WELL_KNOWN_PATH } from './lib/server-metadata'
export { registerClient, buildRegistrationRequest } from './lib/client-registration'
export type { RegisterClientOptions } from './lib/client-registration'
export { CallbackServer, CALLBACK_PATH, parseCallbackQuery } from './lib/callback-server'
export type { CallbackServerOptions } from './lib/callback-server'
export { CoordinationManager, isPidRunning } from './lib/coordination'
export type { CoordinationOptions } from './lib/coordination'
export { TokenManager, tokenFileName, REFRESH_BUFFER_SECONDS } from './lib/token-manager'
export type { TokenManagerOptions, ExchangeCodeParams, RefreshTokenParams, GetValidTokenParams } from './lib/token-manager'
export { launchBrowser } from './lib/browser'
export { OAuthFlowError, isOAuthFlowError } from './lib/errors'
export type { OAuthErrorKind } from './lib/errors'
export { getConfigDir, getServerUrlHash } from './lib/mcp-auth-config'
export { connectToRemoteServer, createAuthorizedFetch, mcpProxy, MAX_AUTH_TIMEOUT_SECS } from './lib/utils'
export type { RemoteConnectionOptions, AuthorizedFetchOptions, TransportFetch } from './lib/utils'
export * from './lib/types'
