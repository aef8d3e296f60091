/**
 * Error kinds raised by the OAuth engine.
 *
 * Discovery and browser-launch failures never surface here: they are recovered where they
 * happen. Everything else aborts the current `getAccessToken()` attempt.
 */
export type OAuthErrorKind =
  | 'http'
  | 'json'
  | 'io'
  | 'client_registration'
  | 'callback_server'
  | 'csrf'
  | 'token_exchange'
  | 'token_refresh'
  | 'token_storage'
  | 'auth_timeout'
  | 'invalid_configuration'
  | 'missing_parameter'
  | 'authorization_denied'
  | 'cancelled'

export interface OAuthFlowErrorOptions {
  /** HTTP status of the response that caused the error */
  status?: number
  /** Raw response body, kept for diagnostics */
  body?: string
  cause?: unknown
}

export class OAuthFlowError extends Error {
  readonly kind: OAuthErrorKind
  readonly status?: number
  readonly body?: string

  constructor(kind: OAuthErrorKind, message: string, options: OAuthFlowErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'OAuthFlowError'
    this.kind = kind
    this.status = options.status
    this.body = options.body
  }
}

export function isOAuthFlowError(value: unknown, kind?: OAuthErrorKind): value is OAuthFlowError {
  return value instanceof OAuthFlowError && (kind === undefined || value.kind === kind)
}

/**
 * Builds the error for a non-2xx response, reading the body for the message
 */
export async function errorFromResponse(kind: OAuthErrorKind, action: string, response: Response): Promise<OAuthFlowError> {
  const body = await response.text().catch(() => '')
  return new OAuthFlowError(kind, `${action} failed with status ${response.status}: ${body}`, {
    status: response.status,
    body,
  })
}

/**
 * Wraps anything thrown by a fetch call. Abort errors caused by the caller become `cancelled`.
 */
export function toRequestError(error: unknown, url: string, signal?: AbortSignal): OAuthFlowError {
  if (error instanceof OAuthFlowError) {
    return error
  }
  if (signal?.aborted) {
    return new OAuthFlowError('cancelled', `Request to ${url} was cancelled`, { cause: error })
  }
  const message = error instanceof Error ? error.message : String(error)
  return new OAuthFlowError('http', `HTTP request to ${url} failed: ${message}`, { cause: error })
}
