import { OAuthFlowError, errorFromResponse } from './errors'
import { ClientRegistrationResponseSchema, type ClientRegistrationResponse, type HttpOptions, type ServerMetadata } from './types'
import { fetchWithTimeout, log, MCP_OAUTH_PROXY_VERSION } from './utils'

export const SOFTWARE_ID = 'mcp-oauth-proxy'
export const MCP_PROTOCOL_VERSION = '2024-11-05'

export interface RegisterClientOptions extends HttpOptions {
  clientName?: string
  softwareVersion?: string
}

/**
 * RFC 7591 registration request body
 */
export function buildRegistrationRequest(redirectUri: string, options: RegisterClientOptions = {}): Record<string, unknown> {
  return {
    redirect_uris: [redirectUri],
    ...(options.clientName ? { client_name: options.clientName } : {}),
    scope: 'mcp',
    grant_types: ['authorization_code', 'refresh_token'],
    response_types: ['code'],
    token_endpoint_auth_method: 'none',
    software_id: SOFTWARE_ID,
    software_version: options.softwareVersion ?? MCP_OAUTH_PROXY_VERSION,
    mcp_version: MCP_PROTOCOL_VERSION,
    application_type: 'native',
  }
}

/**
 * Registers this proxy as an OAuth client (RFC 7591 dynamic client registration)
 * @param metadata Resolved authorization server metadata
 * @param redirectUri The callback URI the authorization server will redirect to
 */
export async function registerClient(
  metadata: ServerMetadata,
  redirectUri: string,
  options: RegisterClientOptions = {},
): Promise<ClientRegistrationResponse> {
  const registrationEndpoint = metadata.registration_endpoint
  if (!registrationEndpoint) {
    throw new OAuthFlowError('client_registration', 'Server does not support dynamic client registration')
  }

  log(`Registering OAuth client with server at: ${registrationEndpoint}`)

  const response = await fetchWithTimeout(
    registrationEndpoint,
    {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify(buildRegistrationRequest(redirectUri, options)),
    },
    options,
  )

  if (!response.ok) {
    const error = await errorFromResponse('client_registration', 'Registration', response)
    log(`Client registration failed: ${response.status} - ${error.body}`)
    throw error
  }

  let body: unknown
  try {
    body = await response.json()
  } catch (error) {
    throw new OAuthFlowError('json', 'Registration response is not valid JSON', { cause: error })
  }

  const parsed = ClientRegistrationResponseSchema.safeParse(body)
  if (!parsed.success) {
    throw new OAuthFlowError('client_registration', `Invalid registration response: ${parsed.error.message}`, { cause: parsed.error })
  }

  log(`Successfully registered OAuth client: ${parsed.data.client_id}`)
  return parsed.data
}
