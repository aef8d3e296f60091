import { describe, it, expect, vi, beforeEach } from 'vitest'
import { buildFallbackMetadata, discoverServerMetadata } from './server-metadata'
import type { FetchFn } from './types'

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

describe('buildFallbackMetadata', () => {
  it('should derive endpoints from the base URL with trailing slashes removed', () => {
    const metadata = buildFallbackMetadata('https://x.com/auth/')
    expect(metadata).toEqual({
      issuer: 'https://x.com/auth',
      authorization_endpoint: 'https://x.com/auth/oauth/authorize',
      token_endpoint: 'https://x.com/auth/oauth/token',
      registration_endpoint: 'https://x.com/auth/oauth/register',
      jwks_uri: 'https://x.com/auth/oauth/jwks',
      response_types_supported: ['code'],
      grant_types_supported: ['authorization_code', 'refresh_token'],
      token_endpoint_auth_methods_supported: ['client_secret_basic', 'client_secret_post', 'none'],
      scopes_supported: ['mcp', 'openid'],
      code_challenge_methods_supported: ['S256', 'plain'],
    })
  })
})

describe('discoverServerMetadata', () => {
  const fetchFn = vi.fn<FetchFn>()

  beforeEach(() => {
    fetchFn.mockReset()
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  it('should request the well-known document under the base URL', async () => {
    fetchFn.mockResolvedValue(
      jsonResponse({
        issuer: 'https://auth.example.com',
        authorization_endpoint: 'https://auth.example.com/authorize',
        token_endpoint: 'https://auth.example.com/token',
        registration_endpoint: 'https://auth.example.com/register',
        service_documentation: 'https://auth.example.com/docs',
      }),
    )

    const metadata = await discoverServerMetadata('https://x.com/auth/', { fetchFn })

    expect(fetchFn).toHaveBeenCalledTimes(1)
    expect(fetchFn.mock.calls[0][0]).toBe('https://x.com/auth/.well-known/oauth-authorization-server')
    expect(metadata.authorization_endpoint).toBe('https://auth.example.com/authorize')
    expect(metadata.registration_endpoint).toBe('https://auth.example.com/register')
    expect(metadata.service_documentation).toBe('https://auth.example.com/docs')
  })

  it('should fall back when the server answers 404', async () => {
    fetchFn.mockResolvedValue(new Response('not found', { status: 404 }))

    const metadata = await discoverServerMetadata('https://x.com/auth/', { fetchFn })

    expect(metadata.authorization_endpoint).toBe('https://x.com/auth/oauth/authorize')
    expect(metadata.token_endpoint).toBe('https://x.com/auth/oauth/token')
  })

  it('should fall back when the request fails', async () => {
    fetchFn.mockRejectedValue(new TypeError('fetch failed'))

    const metadata = await discoverServerMetadata('https://mcp.example.com', { fetchFn })

    expect(metadata.issuer).toBe('https://mcp.example.com')
    expect(metadata.registration_endpoint).toBe('https://mcp.example.com/oauth/register')
  })

  it('should reject a 2xx response that is not valid JSON', async () => {
    fetchFn.mockResolvedValue(new Response('<html>', { status: 200 }))

    await expect(discoverServerMetadata('https://mcp.example.com', { fetchFn })).rejects.toMatchObject({ kind: 'json' })
  })

  it('should reject a 2xx response without the required endpoints', async () => {
    fetchFn.mockResolvedValue(jsonResponse({ issuer: 'https://mcp.example.com' }))

    await expect(discoverServerMetadata('https://mcp.example.com', { fetchFn })).rejects.toMatchObject({ kind: 'json' })
  })

  it('should not fall back when the caller cancelled', async () => {
    const controller = new AbortController()
    controller.abort()

    await expect(discoverServerMetadata('https://mcp.example.com', { fetchFn, signal: controller.signal })).rejects.toMatchObject({
      kind: 'cancelled',
    })
    expect(fetchFn).not.toHaveBeenCalled()
  })
})
