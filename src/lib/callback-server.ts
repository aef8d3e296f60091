import express from 'express'
import type { Server } from 'http'
import { OAuthFlowError } from './errors'
import type { AuthorizationResponse } from './types'
import { log } from './utils'

export const CALLBACK_PATH = '/callback'

export interface CallbackServerOptions {
  /** Port to try first; 0 or undefined lets the OS choose. A busy preferred port falls back to 0. */
  preferredPort?: number
  /** Interface to bind, 127.0.0.1 by default */
  listenHost?: string
  path?: string
}

type CallbackOutcome = { ok: true; response: AuthorizationResponse } | { ok: false; error: OAuthFlowError }

const callbackPage = `<!DOCTYPE html>
<html>
  <head>
    <title>Authorization Successful</title>
    <meta http-equiv="refresh" content="2;url=/success">
  </head>
  <body>
    <h2>Authorization successful!</h2>
    <p>You may close this window and return to your MCP client.</p>
  </body>
</html>
`

const successPage = `<!DOCTYPE html>
<html>
  <head>
    <title>Authorization Complete</title>
  </head>
  <body>
    <h1>Authorization complete</h1>
    <p>You may close this window and return to your MCP client.</p>
    <script>
      // Closes the window when the browser allows it, otherwise the message above stays
      window.close();
    </script>
  </body>
</html>
`

function firstQueryValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0]
  return undefined
}

/**
 * Turns the redirect's query parameters into the outcome delivered to the waiting flow
 */
export function parseCallbackQuery(query: Record<string, unknown>): CallbackOutcome {
  const error = firstQueryValue(query.error)
  if (error !== undefined) {
    const description = firstQueryValue(query.error_description) ?? 'No description provided'
    return {
      ok: false,
      error: new OAuthFlowError('authorization_denied', `Authorization error: ${error} - ${description}`, { body: error }),
    }
  }

  const code = firstQueryValue(query.code)
  const state = firstQueryValue(query.state)
  if (code === undefined) {
    return { ok: false, error: new OAuthFlowError('missing_parameter', 'Missing authorization code in callback') }
  }
  if (state === undefined) {
    return { ok: false, error: new OAuthFlowError('missing_parameter', 'Missing state parameter in callback') }
  }
  return { ok: true, response: { code, state } }
}

function listen(app: express.Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host)
    server.once('listening', () => resolve(server))
    server.once('error', reject)
  })
}

/**
 * One-shot local HTTP listener that captures the authorization redirect.
 *
 * The first request to the callback path settles the outcome; later requests still get the
 * static page but change nothing. The listener lives for a single authorization attempt.
 */
export class CallbackServer {
  private closed = false

  private constructor(
    private readonly server: Server,
    readonly port: number,
    readonly path: string,
    private readonly outcome: Promise<CallbackOutcome>,
  ) {}

  static async start(options: CallbackServerOptions = {}): Promise<CallbackServer> {
    const path = options.path ?? CALLBACK_PATH
    const listenHost = options.listenHost ?? '127.0.0.1'
    const preferredPort = options.preferredPort ?? 0

    let deliver: (outcome: CallbackOutcome) => void = () => {}
    const outcome = new Promise<CallbackOutcome>((resolve) => {
      let settled = false
      deliver = (value) => {
        if (settled) return
        settled = true
        resolve(value)
      }
    })

    const app = express()

    app.get(path, (req, res) => {
      const result = parseCallbackQuery(req.query)
      if (result.ok) {
        log('Auth code received, resolving promise')
      } else {
        log(`OAuth callback rejected: ${result.error.message}`)
      }
      deliver(result)
      res.send(callbackPage)
    })

    app.get('/success', (_req, res) => {
      res.send(successPage)
    })

    let server: Server
    try {
      server = await listen(app, preferredPort, listenHost)
    } catch (error) {
      if (preferredPort !== 0 && error instanceof Error && 'code' in error && error.code === 'EADDRINUSE') {
        log(`Callback port ${preferredPort} is in use, using a random port`)
        server = await listen(app, 0, listenHost).catch((retryError: unknown) => {
          throw new OAuthFlowError('callback_server', 'Failed to start OAuth callback server', { cause: retryError })
        })
      } else {
        throw new OAuthFlowError('callback_server', `Failed to bind OAuth callback server to port ${preferredPort}`, { cause: error })
      }
    }

    const address = server.address()
    if (address === null || typeof address === 'string') {
      server.close()
      throw new OAuthFlowError('callback_server', 'Could not determine the callback server port')
    }

    log(`OAuth callback server running at http://${listenHost}:${address.port}${path}`)
    return new CallbackServer(server, address.port, path, outcome)
  }

  callbackUrl(host: string): string {
    return `http://${host}:${this.port}${this.path}`
  }

  /**
   * Waits for the redirect, bounded by `timeoutMs`, then shuts the listener down whatever happened
   */
  async waitForCallback(timeoutMs: number, signal?: AbortSignal): Promise<AuthorizationResponse> {
    let timer: NodeJS.Timeout | undefined
    let onAbort: (() => void) | undefined

    const timedOut = new Promise<CallbackOutcome>((resolve) => {
      timer = setTimeout(() => {
        resolve({ ok: false, error: new OAuthFlowError('auth_timeout', `Authorization timed out after ${Math.round(timeoutMs / 1000)}s`) })
      }, timeoutMs)
    })

    const cancelled = new Promise<CallbackOutcome>((resolve) => {
      if (!signal) return
      onAbort = () => resolve({ ok: false, error: new OAuthFlowError('cancelled', 'Authorization was cancelled') })
      if (signal.aborted) {
        onAbort()
      } else {
        signal.addEventListener('abort', onAbort, { once: true })
      }
    })

    try {
      const result = await Promise.race([this.outcome, timedOut, cancelled])
      if (!result.ok) {
        throw result.error
      }
      log('Received OAuth authorization response')
      return result.response
    } finally {
      clearTimeout(timer)
      if (onAbort) signal?.removeEventListener('abort', onAbort)
      this.close()
    }
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    this.server.close()
    this.server.closeAllConnections()
  }
}
