import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js'
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js'
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js'
import { isInitializeRequest, type JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js'
import net from 'net'
import fs from 'fs/promises'
import path from 'path'
import packageJson from '../../package.json'
import { OAuthFlowError, toRequestError } from './errors'
import { getConfigDir } from './mcp-auth-config'
import { ClientCredentialsSchema, type ClientCredentials, type FetchFn, type HttpOptions, type TransportStrategy } from './types'

// Connection constants
export const REASON_TRANSPORT_FALLBACK = 'falling-back-to-alternate-transport'

export const MCP_OAUTH_PROXY_VERSION: string = packageJson.version

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000

/** Largest callback wait that fits in a setTimeout delay */
export const MAX_AUTH_TIMEOUT_SECS = 2_147_483

const pid = process.pid

export let DEBUG = false

export function setDebug(enabled: boolean) {
  DEBUG = enabled
}

export function log(str: string, ...rest: unknown[]) {
  // Using stderr so that it doesn't interfere with stdout
  console.error(`[${pid}] ${str}`, ...rest)
}

function formatLogArg(arg: unknown): string {
  if (arg instanceof Error) return arg.stack ?? arg.message
  if (typeof arg === 'object') return JSON.stringify(arg)
  return String(arg)
}

/**
 * Writes to stderr and to `{config dir}/{serverUrlHash}_debug.log`. No-op unless DEBUG is on.
 */
export async function debugLog(serverUrlHash: string, message: string, ...args: unknown[]): Promise<void> {
  if (!DEBUG) return

  const formattedMessage = `[${new Date().toISOString()}][${pid}] ${message}`
  console.error(formattedMessage, ...args)

  try {
    const configDir = getConfigDir()
    await fs.mkdir(configDir, { recursive: true })
    const logPath = path.join(configDir, `${serverUrlHash}_debug.log`)
    await fs.appendFile(logPath, `${formattedMessage} ${args.map(formatLogArg).join(' ')}\n`, { encoding: 'utf8' })
  } catch (error) {
    // Fall back to console only
    console.error(`[DEBUG LOG ERROR] ${error}`)
  }
}

/**
 * fetch with a per-request timeout that also follows the caller's abort signal
 */
export async function fetchWithTimeout(url: string, init: RequestInit, options: HttpOptions = {}): Promise<Response> {
  const { fetchFn = fetch, timeoutMs = DEFAULT_HTTP_TIMEOUT_MS, signal } = options
  if (signal?.aborted) {
    throw new OAuthFlowError('cancelled', `Request to ${url} was cancelled`)
  }

  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  const onAbort = () => controller.abort()
  signal?.addEventListener('abort', onAbort, { once: true })

  try {
    return await fetchFn(url, { ...init, signal: controller.signal })
  } catch (error) {
    if (controller.signal.aborted && !signal?.aborted) {
      throw new OAuthFlowError('http', `Request to ${url} timed out after ${timeoutMs}ms`, { cause: error })
    }
    throw toRequestError(error, url, signal)
  } finally {
    clearTimeout(timeout)
    signal?.removeEventListener('abort', onAbort)
  }
}

/**
 * Resolves after `ms`, or rejects with a `cancelled` error when the signal fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OAuthFlowError('cancelled', 'Operation was cancelled'))
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      reject(new OAuthFlowError('cancelled', 'Operation was cancelled'))
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Creates a bidirectional proxy between two transports
 * @param params The transport connections to proxy between
 */
export function mcpProxy({ transportToClient, transportToServer }: { transportToClient: Transport; transportToServer: Transport }) {
  let transportToClientClosed = false
  let transportToServerClosed = false

  transportToClient.onmessage = (message: JSONRPCMessage) => {
    log('[Local→Remote]', describeMessage(message))
    if (isInitializeRequest(message)) {
      const { clientInfo } = message.params
      clientInfo.name = `${clientInfo.name} (via mcp-oauth-proxy ${MCP_OAUTH_PROXY_VERSION})`
      log(JSON.stringify(message, null, 2))
    }
    transportToServer.send(message).catch(onServerError)
  }

  transportToServer.onmessage = (message: JSONRPCMessage) => {
    log('[Remote→Local]', describeMessage(message))
    transportToClient.send(message).catch(onClientError)
  }

  transportToClient.onclose = () => {
    if (transportToServerClosed) {
      return
    }

    transportToClientClosed = true
    transportToServer.close().catch(onServerError)
  }

  transportToServer.onclose = () => {
    if (transportToClientClosed) {
      return
    }
    transportToServerClosed = true
    transportToClient.close().catch(onClientError)
  }

  transportToClient.onerror = onClientError
  transportToServer.onerror = onServerError

  function onClientError(error: Error) {
    log('Error from local client:', error)
  }

  function onServerError(error: Error) {
    log('Error from remote server:', error)
  }
}

function describeMessage(message: JSONRPCMessage): string {
  if ('method' in message && typeof message.method === 'string') return message.method
  if ('id' in message) return String(message.id)
  return 'unknown'
}

export interface RemoteConnectionOptions {
  serverUrl: string
  /** Extra headers sent with every request */
  headers: Record<string, string>
  /** Returns the bearer token to attach; called for every request */
  authorize: () => Promise<string>
  /** Forgets the stored token so the next authorize() runs a new flow */
  invalidate: () => Promise<void>
  transportStrategy?: TransportStrategy
}

export type TransportFetch = (url: string | URL, init?: RequestInit) => Promise<Response>

export interface AuthorizedFetchOptions {
  authorize: () => Promise<string>
  invalidate: () => Promise<void>
  fetchFn?: FetchFn
}

/**
 * fetch for the MCP transports that attaches a current bearer token to every request.
 * A 401 clears the stored token and the request is sent once more with a new one.
 */
export function createAuthorizedFetch({ authorize, invalidate, fetchFn = fetch }: AuthorizedFetchOptions): TransportFetch {
  // Concurrent requests share one token lookup, so an expiring token is refreshed once
  let pending: Promise<string> | undefined
  const currentToken = () => {
    if (!pending) {
      pending = authorize().finally(() => {
        pending = undefined
      })
    }
    return pending
  }

  const send = async (url: string | URL, init: RequestInit | undefined) => {
    const headers = new Headers(init?.headers)
    headers.set('Authorization', `Bearer ${await currentToken()}`)
    return fetchFn(url, { ...init, headers })
  }

  return async (url, init) => {
    const response = await send(url, init)
    if (response.status !== 401) {
      return response
    }

    log('Remote server rejected the access token. Clearing it and authorizing again...')
    await response.body?.cancel()
    await invalidate()
    return send(url, init)
  }
}

function isTransportMismatch(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.message.includes('405') ||
      error.message.includes('Method Not Allowed') ||
      error.message.includes('404') ||
      error.message.includes('Not Found'))
  )
}

/**
 * Creates and connects to a remote server. The transports fetch through
 * createAuthorizedFetch, so tokens refreshed during the session are picked up.
 * @param client The client to connect with, or null when only the transport is needed
 * @param options Connection options
 * @param recursionReasons Set of reasons for recursive calls (internal use)
 * @returns The connected transport
 */
export async function connectToRemoteServer(
  client: Client | null,
  options: RemoteConnectionOptions,
  recursionReasons: Set<string> = new Set(),
): Promise<Transport> {
  const { serverUrl, headers, authorize, invalidate, transportStrategy = 'http-first' } = options
  log(`Connecting to remote server: ${serverUrl}`)
  const url = new URL(serverUrl)

  // Authorize before connecting so auth failures surface as themselves, not as transport errors
  await authorize()
  const requestInit: RequestInit = { headers }
  const authorizedFetch = createAuthorizedFetch({ authorize, invalidate })

  log(`Using transport strategy: ${transportStrategy}`)
  const shouldAttemptFallback = transportStrategy === 'http-first' || transportStrategy === 'sse-first'

  const sseTransport = transportStrategy === 'sse-only' || transportStrategy === 'sse-first'
  const transport = sseTransport
    ? new SSEClientTransport(url, { requestInit, fetch: authorizedFetch })
    : new StreamableHTTPClientTransport(url, { requestInit, fetch: authorizedFetch })

  try {
    if (client) {
      await client.connect(transport)
    } else {
      await transport.start()
      if (!sseTransport) {
        // transport.start() sends nothing over Streamable HTTP, so check with a throwaway client
        // to find out whether the server speaks it at all
        const testTransport = new StreamableHTTPClientTransport(url, { requestInit, fetch: authorizedFetch })
        const testClient = new Client({ name: 'mcp-oauth-proxy-fallback-test', version: '0.0.0' }, { capabilities: {} })
        await testClient.connect(testTransport)
        await testClient.close()
      }
    }
    log(`Connected to remote server using ${transport.constructor.name}`)

    return transport
  } catch (error) {
    if (shouldAttemptFallback && isTransportMismatch(error)) {
      log(`Received error: ${error instanceof Error ? error.message : String(error)}`)

      if (recursionReasons.has(REASON_TRANSPORT_FALLBACK)) {
        const errorMessage = `Already attempted transport fallback. Giving up.`
        log(errorMessage)
        throw new Error(errorMessage)
      }

      log(`Recursively reconnecting for reason: ${REASON_TRANSPORT_FALLBACK}`)
      recursionReasons.add(REASON_TRANSPORT_FALLBACK)

      return connectToRemoteServer(client, { ...options, transportStrategy: sseTransport ? 'http-only' : 'sse-only' }, recursionReasons)
    }
    log('Connection error:', error)
    throw error
  }
}

/**
 * Finds an available port on the local machine
 * @param preferredPort Optional preferred port to try first
 * @returns A promise that resolves to an available port number
 */
export async function findAvailablePort(preferredPort?: number): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = net.createServer()

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        // If preferred port is in use, get a random port
        server.listen(0, '127.0.0.1')
      } else {
        reject(err)
      }
    })

    server.on('listening', () => {
      const address = server.address()
      if (address === null || typeof address === 'string') {
        server.close(() => reject(new Error('Could not determine the listening port')))
        return
      }
      server.close(() => {
        resolve(address.port)
      })
    })

    // Try preferred port first, or get a random port
    server.listen(preferredPort || 0, '127.0.0.1')
  })
}

export interface CommandLineOptions {
  serverUrl: string
  callbackPort?: number
  headers: Record<string, string>
  transportStrategy: TransportStrategy
  host: string
  scope?: string
  authTimeoutSecs?: number
  staticClientInfo?: ClientCredentials
  clean: boolean
  debug: boolean
}

const TRANSPORT_STRATEGIES: readonly TransportStrategy[] = ['sse-only', 'http-only', 'sse-first', 'http-first']

function isTransportStrategy(value: string): value is TransportStrategy {
  return TRANSPORT_STRATEGIES.some((strategy) => strategy === value)
}

function parseStaticClientInfo(value: string): ClientCredentials {
  let raw: unknown
  try {
    raw = JSON.parse(value)
  } catch (error) {
    throw new OAuthFlowError('invalid_configuration', '--static-oauth-client-info must be valid JSON', { cause: error })
  }
  const parsed = ClientCredentialsSchema.safeParse(raw)
  if (!parsed.success) {
    throw new OAuthFlowError('invalid_configuration', `Invalid --static-oauth-client-info: ${parsed.error.message}`)
  }
  return parsed.data
}

/**
 * Replaces `${VAR}` in header values with the environment value, or an empty string when unset
 */
export function substituteEnvVars(headers: Record<string, string>, env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(headers)) {
    result[key] = value.replace(/\$\{([^}]+)}/g, (match: string, envVarName: string) => {
      const envVarValue = env[envVarName]

      if (envVarValue !== undefined) {
        log(`Replacing ${match} with environment value in header '${key}'`)
        return envVarValue
      } else {
        log(`Warning: Environment variable '${envVarName}' not found for header '${key}'.`)
        return ''
      }
    })
  }
  return result
}

/**
 * Parses command line arguments for the proxy
 * @param args Command line arguments
 * @param usage Usage message to show on error
 */
export function parseCommandLineArgs(args: string[], usage: string, env: NodeJS.ProcessEnv = process.env): CommandLineOptions {
  const headers: Record<string, string> = {}
  const positional: string[] = []
  let transportStrategy: TransportStrategy = 'http-first'
  let host = 'localhost'
  let scope: string | undefined
  let authTimeoutSecs: number | undefined
  let staticClientInfo: ClientCredentials | undefined
  let allowHttp = false
  let clean = false
  let debug = false

  const takeValue = (flag: string, index: number): string => {
    const value = args[index + 1]
    if (value === undefined) {
      throw new Error(`Missing value for ${flag}\n${usage}`)
    }
    return value
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    switch (arg) {
      case '--header': {
        const value = takeValue(arg, i++)
        const match = value.match(/^([A-Za-z0-9_-]+):(.*)$/)
        if (match) {
          headers[match[1]] = match[2]
        } else {
          log(`Warning: ignoring invalid header argument: ${value}`)
        }
        break
      }
      case '--transport': {
        const strategy = takeValue(arg, i++)
        if (isTransportStrategy(strategy)) {
          transportStrategy = strategy
          log(`Using transport strategy: ${transportStrategy}`)
        } else {
          log(`Warning: Ignoring invalid transport strategy: ${strategy}. Valid values are: ${TRANSPORT_STRATEGIES.join(', ')}`)
        }
        break
      }
      case '--host':
        host = takeValue(arg, i++)
        log(`Using callback hostname: ${host}`)
        break
      case '--scope':
        scope = takeValue(arg, i++)
        break
      case '--auth-timeout': {
        const value = takeValue(arg, i++)
        authTimeoutSecs = Number.parseInt(value, 10)
        if (!Number.isInteger(authTimeoutSecs) || authTimeoutSecs <= 0 || authTimeoutSecs > MAX_AUTH_TIMEOUT_SECS) {
          throw new Error(`Invalid --auth-timeout: ${value}\n${usage}`)
        }
        break
      }
      case '--static-oauth-client-info':
        staticClientInfo = parseStaticClientInfo(takeValue(arg, i++))
        break
      case '--allow-http':
        allowHttp = true
        break
      case '--clean':
        clean = true
        break
      case '--debug':
        debug = true
        break
      default:
        positional.push(arg)
    }
  }

  const [serverUrl, portArg] = positional
  if (!serverUrl) {
    throw new Error(usage)
  }

  const url = new URL(serverUrl)
  const isLocalhost = (url.hostname === 'localhost' || url.hostname === '127.0.0.1') && url.protocol === 'http:'

  if (!(url.protocol === 'https:' || isLocalhost || allowHttp)) {
    throw new Error(`Non-HTTPS URLs are only allowed for localhost or when --allow-http flag is provided\n${usage}`)
  }

  let callbackPort: number | undefined
  if (portArg !== undefined) {
    callbackPort = Number.parseInt(portArg, 10)
    if (!Number.isInteger(callbackPort) || callbackPort < 0 || callbackPort > 65535) {
      throw new Error(`Invalid callback port: ${portArg}\n${usage}`)
    }
    log(`Using specified callback port: ${callbackPort}`)
  }

  if (Object.keys(headers).length > 0) {
    log(`Using custom headers: ${JSON.stringify(Object.keys(headers))}`)
  }

  return {
    serverUrl,
    callbackPort,
    headers: substituteEnvVars(headers, env),
    transportStrategy,
    host,
    scope,
    authTimeoutSecs,
    staticClientInfo,
    clean,
    debug,
  }
}

/**
 * Sets up signal handlers for graceful shutdown
 * @param cleanup Cleanup function to run on shutdown
 */
export function setupSignalHandlers(cleanup: () => Promise<void>) {
  process.on('SIGINT', async () => {
    log('\nShutting down...')
    await cleanup()
    process.exit(0)
  })

  // Keep the process alive
  process.stdin.resume()
  process.stdin.on('end', async () => {
    log('\nShutting down...')
    await cleanup()
    process.exit(0)
  })
}
