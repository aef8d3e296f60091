import { describe, it, expect, vi, beforeEach } from 'vitest'
import { buildRegistrationRequest, registerClient } from './client-registration'
import { buildFallbackMetadata } from './server-metadata'
import type { FetchFn, ServerMetadata } from './types'

const REDIRECT_URI = 'http://localhost:8765/callback'

describe('buildRegistrationRequest', () => {
  it('should describe a native public client', () => {
    expect(buildRegistrationRequest(REDIRECT_URI, { clientName: 'Test Proxy', softwareVersion: '9.9.9' })).toEqual({
      redirect_uris: [REDIRECT_URI],
      client_name: 'Test Proxy',
      scope: 'mcp',
      grant_types: ['authorization_code', 'refresh_token'],
      response_types: ['code'],
      token_endpoint_auth_method: 'none',
      software_id: 'mcp-oauth-proxy',
      software_version: '9.9.9',
      mcp_version: '2024-11-05',
      application_type: 'native',
    })
  })

  it('should omit client_name when none is given', () => {
    expect(buildRegistrationRequest(REDIRECT_URI)).not.toHaveProperty('client_name')
  })
})

describe('registerClient', () => {
  const fetchFn = vi.fn<FetchFn>()
  const metadata = buildFallbackMetadata('https://mcp.example.com')

  beforeEach(() => {
    fetchFn.mockReset()
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  it('should POST the request as JSON and return the credentials', async () => {
    fetchFn.mockResolvedValue(
      new Response(JSON.stringify({ client_id: 'client-abc', client_secret: 'test-secret', client_id_issued_at: 1700000000 }), {
        status: 201,
      }),
    )

    const registration = await registerClient(metadata, REDIRECT_URI, { fetchFn, clientName: 'Test Proxy' })

    expect(registration.client_id).toBe('client-abc')
    expect(registration.client_secret).toBe('test-secret')
    expect(registration.client_id_issued_at).toBe(1700000000)

    const [url, init] = fetchFn.mock.calls[0]
    expect(url).toBe('https://mcp.example.com/oauth/register')
    expect(init?.method).toBe('POST')
    expect(JSON.parse(String(init?.body))).toMatchObject({ redirect_uris: [REDIRECT_URI], client_name: 'Test Proxy' })
  })

  it('should fail when the server has no registration endpoint', async () => {
    const withoutRegistration: ServerMetadata = { ...metadata, registration_endpoint: undefined }

    await expect(registerClient(withoutRegistration, REDIRECT_URI, { fetchFn })).rejects.toMatchObject({
      kind: 'client_registration',
      message: 'Server does not support dynamic client registration',
    })
    expect(fetchFn).not.toHaveBeenCalled()
  })

  it('should report the status and body of a rejected registration', async () => {
    fetchFn.mockResolvedValue(new Response('invalid_redirect_uri', { status: 400 }))

    await expect(registerClient(metadata, REDIRECT_URI, { fetchFn })).rejects.toMatchObject({
      kind: 'client_registration',
      status: 400,
      body: 'invalid_redirect_uri',
      message: 'Registration failed with status 400: invalid_redirect_uri',
    })
  })

  it('should reject a response without client_id', async () => {
    fetchFn.mockResolvedValue(new Response(JSON.stringify({ client_secret: 'test-secret' }), { status: 200 }))

    await expect(registerClient(metadata, REDIRECT_URI, { fetchFn })).rejects.toMatchObject({ kind: 'client_registration' })
  })

  it('should reject a body that is not JSON', async () => {
    fetchFn.mockResolvedValue(new Response('ok', { status: 200 }))

    await expect(registerClient(metadata, REDIRECT_URI, { fetchFn })).rejects.toMatchObject({ kind: 'json' })
  })
})
