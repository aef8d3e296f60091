import crypto from 'crypto'
import type { PkceChallenge } from './types'

const VERIFIER_BYTES = 32
const STATE_BYTES = 32

/**
 * Generates a fresh PKCE verifier/challenge pair. The method is always S256.
 */
export function generatePkceChallenge(): PkceChallenge {
  const code_verifier = crypto.randomBytes(VERIFIER_BYTES).toString('base64url')
  return {
    code_verifier,
    code_challenge: generateCodeChallenge(code_verifier),
    code_challenge_method: 'S256',
  }
}

/**
 * base64url(SHA-256(verifier)) without padding
 */
export function generateCodeChallenge(codeVerifier: string): string {
  return crypto.createHash('sha256').update(codeVerifier).digest('base64url')
}

export function verifyPkceChallenge(codeVerifier: string, codeChallenge: string): boolean {
  return generateCodeChallenge(codeVerifier) === codeChallenge
}

/**
 * Random `state` value for the authorization request
 */
export function generateState(): string {
  return crypto.randomBytes(STATE_BYTES).toString('base64url')
}

/**
 * Byte-for-byte comparison of two state values in constant time
 */
export function statesMatch(expected: string, received: string): boolean {
  const a = Buffer.from(expected, 'utf-8')
  const b = Buffer.from(received, 'utf-8')
  return a.length === b.length && crypto.timingSafeEqual(a, b)
}
