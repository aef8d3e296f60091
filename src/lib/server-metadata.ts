import { OAuthFlowError } from './errors'
import { ServerMetadataSchema, type HttpOptions, type ServerMetadata } from './types'
import { fetchWithTimeout, log } from './utils'

export const WELL_KNOWN_PATH = '/.well-known/oauth-authorization-server'

function trimTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '')
}

/**
 * Metadata synthesized from the server URL when discovery is unavailable
 */
export function buildFallbackMetadata(serverBaseUrl: string): ServerMetadata {
  const base = trimTrailingSlashes(serverBaseUrl)
  log(`Constructing fallback OAuth metadata for: ${base}`)

  return {
    issuer: base,
    authorization_endpoint: `${base}/oauth/authorize`,
    token_endpoint: `${base}/oauth/token`,
    registration_endpoint: `${base}/oauth/register`,
    jwks_uri: `${base}/oauth/jwks`,
    response_types_supported: ['code'],
    grant_types_supported: ['authorization_code', 'refresh_token'],
    token_endpoint_auth_methods_supported: ['client_secret_basic', 'client_secret_post', 'none'],
    scopes_supported: ['mcp', 'openid'],
    code_challenge_methods_supported: ['S256', 'plain'],
  }
}

/**
 * Discovers authorization server metadata (RFC 8414).
 *
 * A missing or broken well-known endpoint is normal for MCP servers: any network failure or
 * non-2xx status yields the fallback metadata. Only a 2xx with an unusable body, or the
 * caller cancelling, is an error.
 */
export async function discoverServerMetadata(serverBaseUrl: string, options: HttpOptions = {}): Promise<ServerMetadata> {
  const wellKnownUrl = `${trimTrailingSlashes(serverBaseUrl)}${WELL_KNOWN_PATH}`
  log(`Discovering OAuth server metadata from: ${wellKnownUrl}`)

  let response: Response
  try {
    response = await fetchWithTimeout(wellKnownUrl, { method: 'GET', headers: { Accept: 'application/json' } }, options)
  } catch (error) {
    if (options.signal?.aborted) {
      throw error
    }
    log(`OAuth metadata discovery request failed: ${error instanceof Error ? error.message : String(error)}`)
    return buildFallbackMetadata(serverBaseUrl)
  }

  if (!response.ok) {
    log(`OAuth metadata discovery failed with status: ${response.status}`)
    return buildFallbackMetadata(serverBaseUrl)
  }

  let body: unknown
  try {
    body = await response.json()
  } catch (error) {
    throw new OAuthFlowError('json', `OAuth metadata from ${wellKnownUrl} is not valid JSON`, { cause: error })
  }

  const parsed = ServerMetadataSchema.safeParse(body)
  if (!parsed.success) {
    throw new OAuthFlowError('json', `Invalid OAuth metadata from ${wellKnownUrl}: ${parsed.error.message}`, { cause: parsed.error })
  }
  return parsed.data
}
