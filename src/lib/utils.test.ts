import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest'
import type { FetchFn } from './types'
import { createAuthorizedFetch, fetchWithTimeout, findAvailablePort, parseCommandLineArgs, sleep, substituteEnvVars } from './utils'

const USAGE = 'Usage: mcp-oauth-proxy <https://server-url> [callback-port]'

function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  return undefined
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {})
})

describe('parseCommandLineArgs', () => {
  it('should parse the server URL, port and flags', () => {
    const options = parseCommandLineArgs(
      ['https://mcp.example.com/sse', '4000', '--header', 'Authorization:Bearer ${TOKEN}', '--transport', 'sse-only', '--scope', 'mcp', '--clean'],
      USAGE,
      { TOKEN: 'test-token' },
    )

    expect(options).toEqual({
      serverUrl: 'https://mcp.example.com/sse',
      callbackPort: 4000,
      headers: { Authorization: 'Bearer test-token' },
      transportStrategy: 'sse-only',
      host: 'localhost',
      scope: 'mcp',
      authTimeoutSecs: undefined,
      staticClientInfo: undefined,
      clean: true,
      debug: false,
    })
  })

  it('should default to http-first and ignore an unknown transport', () => {
    const options = parseCommandLineArgs(['https://mcp.example.com', '--transport', 'carrier-pigeon'], USAGE, {})
    expect(options.transportStrategy).toBe('http-first')
    expect(options.callbackPort).toBeUndefined()
  })

  it('should read the callback host, timeout and debug flag', () => {
    const options = parseCommandLineArgs(['https://mcp.example.com', '--host', '127.0.0.1', '--auth-timeout', '60', '--debug'], USAGE, {})
    expect(options.host).toBe('127.0.0.1')
    expect(options.authTimeoutSecs).toBe(60)
    expect(options.debug).toBe(true)
  })

  it('should reject an auth timeout too large for a timer', () => {
    expect(() => parseCommandLineArgs(['https://mcp.example.com', '--auth-timeout', '3000000'], USAGE, {})).toThrow(
      'Invalid --auth-timeout: 3000000',
    )
    expect(parseCommandLineArgs(['https://mcp.example.com', '--auth-timeout', '2147483'], USAGE, {}).authTimeoutSecs).toBe(2_147_483)
  })

  it('should refuse plain HTTP for remote hosts', () => {
    expect(() => parseCommandLineArgs(['http://mcp.example.com'], USAGE, {})).toThrow(
      'Non-HTTPS URLs are only allowed for localhost or when --allow-http flag is provided',
    )
    expect(parseCommandLineArgs(['http://mcp.example.com', '--allow-http'], USAGE, {}).serverUrl).toBe('http://mcp.example.com')
    expect(parseCommandLineArgs(['http://localhost:3000/mcp'], USAGE, {}).serverUrl).toBe('http://localhost:3000/mcp')
  })

  it('should require a server URL', () => {
    expect(() => parseCommandLineArgs(['--clean'], USAGE, {})).toThrow(USAGE)
  })

  it('should reject an invalid callback port', () => {
    expect(() => parseCommandLineArgs(['https://mcp.example.com', 'abc'], USAGE, {})).toThrow('Invalid callback port: abc')
  })

  it('should validate static client info', () => {
    const options = parseCommandLineArgs(
      ['https://mcp.example.com', '--static-oauth-client-info', '{"client_id":"static-client","client_secret":"test-secret"}'],
      USAGE,
      {},
    )
    expect(options.staticClientInfo).toEqual({ client_id: 'static-client', client_secret: 'test-secret' })

    expect(captureError(() => parseCommandLineArgs(['https://mcp.example.com', '--static-oauth-client-info', '{'], USAGE, {}))).toMatchObject({
      kind: 'invalid_configuration',
    })
    expect(
      captureError(() => parseCommandLineArgs(['https://mcp.example.com', '--static-oauth-client-info', '{"client_secret":"x"}'], USAGE, {})),
    ).toMatchObject({ kind: 'invalid_configuration' })
  })
})

describe('substituteEnvVars', () => {
  it('should replace known variables and blank unknown ones', () => {
    expect(substituteEnvVars({ 'X-Api-Key': '${API_KEY}', 'X-Other': 'a-${MISSING}-b' }, { API_KEY: 'test-key' })).toEqual({
      'X-Api-Key': 'test-key',
      'X-Other': 'a--b',
    })
  })
})

describe('createAuthorizedFetch', () => {
  const SERVER = 'https://mcp.example.com/mcp'

  function sentAuthorization(fetchFn: Mock<FetchFn>, call: number): string | null {
    return new Headers(fetchFn.mock.calls[call][1]?.headers).get('Authorization')
  }

  it('should attach the current token to every request and keep other headers', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response('ok'))
    const authorize = vi.fn<() => Promise<string>>().mockResolvedValueOnce('tok-1').mockResolvedValueOnce('tok-2')
    const invalidate = vi.fn<() => Promise<void>>(async () => {})
    const authorizedFetch = createAuthorizedFetch({ authorize, invalidate, fetchFn })

    await authorizedFetch(SERVER, { method: 'POST', headers: { 'X-Custom': 'a' } })
    await authorizedFetch(SERVER, { method: 'POST' })

    expect(sentAuthorization(fetchFn, 0)).toBe('Bearer tok-1')
    expect(new Headers(fetchFn.mock.calls[0][1]?.headers).get('X-Custom')).toBe('a')
    expect(sentAuthorization(fetchFn, 1)).toBe('Bearer tok-2')
    expect(invalidate).not.toHaveBeenCalled()
  })

  it('should clear the token and retry once after a 401', async () => {
    const fetchFn = vi
      .fn<FetchFn>()
      .mockResolvedValueOnce(new Response('unauthorized', { status: 401 }))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }))
    const authorize = vi.fn<() => Promise<string>>().mockResolvedValueOnce('expired-token').mockResolvedValueOnce('fresh-token')
    const invalidate = vi.fn<() => Promise<void>>(async () => {})
    const authorizedFetch = createAuthorizedFetch({ authorize, invalidate, fetchFn })

    const response = await authorizedFetch(SERVER, { method: 'POST', body: '{}' })

    expect(response.status).toBe(200)
    expect(invalidate).toHaveBeenCalledTimes(1)
    expect(fetchFn).toHaveBeenCalledTimes(2)
    expect(sentAuthorization(fetchFn, 1)).toBe('Bearer fresh-token')
    expect(fetchFn.mock.calls[1][1]?.body).toBe('{}')
  })

  it('should return the second 401 without retrying again', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response('unauthorized', { status: 401 }))
    const invalidate = vi.fn<() => Promise<void>>(async () => {})
    const authorizedFetch = createAuthorizedFetch({ authorize: async () => 'tok', invalidate, fetchFn })

    const response = await authorizedFetch(SERVER)

    expect(response.status).toBe(401)
    expect(invalidate).toHaveBeenCalledTimes(1)
    expect(fetchFn).toHaveBeenCalledTimes(2)
  })

  it('should share one token lookup between concurrent requests', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response('ok'))
    const authorize = vi.fn<() => Promise<string>>(async () => 'tok-1')
    const authorizedFetch = createAuthorizedFetch({ authorize, invalidate: async () => {}, fetchFn })

    await Promise.all([authorizedFetch(SERVER), authorizedFetch(SERVER)])

    expect(authorize).toHaveBeenCalledTimes(1)
    expect(sentAuthorization(fetchFn, 0)).toBe('Bearer tok-1')
    expect(sentAuthorization(fetchFn, 1)).toBe('Bearer tok-1')
  })
})

describe('fetchWithTimeout', () => {
  it('should time out a request that never answers', async () => {
    const fetchFn = vi.fn<FetchFn>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')))
        }),
    )

    await expect(fetchWithTimeout('https://mcp.example.com/slow', {}, { fetchFn, timeoutMs: 20 })).rejects.toMatchObject({
      kind: 'http',
      message: 'Request to https://mcp.example.com/slow timed out after 20ms',
    })
  })

  it('should wrap network failures', async () => {
    const fetchFn = vi.fn<FetchFn>().mockRejectedValue(new TypeError('fetch failed'))

    await expect(fetchWithTimeout('https://mcp.example.com/', {}, { fetchFn })).rejects.toMatchObject({
      kind: 'http',
      message: 'HTTP request to https://mcp.example.com/ failed: fetch failed',
    })
  })

  it('should report cancellation', async () => {
    const controller = new AbortController()
    const fetchFn = vi.fn<FetchFn>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')))
        }),
    )

    const pending = fetchWithTimeout('https://mcp.example.com/', {}, { fetchFn, signal: controller.signal })
    controller.abort()

    await expect(pending).rejects.toMatchObject({ kind: 'cancelled' })
  })
})

describe('sleep', () => {
  it('should reject when cancelled', async () => {
    const controller = new AbortController()
    const pending = sleep(10_000, controller.signal)
    controller.abort()

    await expect(pending).rejects.toMatchObject({ kind: 'cancelled' })
  })
})

describe('findAvailablePort', () => {
  it('should return a bindable port', async () => {
    const port = await findAvailablePort()
    expect(port).toBeGreaterThan(0)
    expect(port).toBeLessThanOrEqual(65535)
  })
})
