import crypto from 'crypto'
import path from 'path'
import os from 'os'
import fs from 'fs/promises'
import type { z } from 'zod'
import { OAuthFlowError } from './errors'
import { StoredClientInfoSchema, type StoredClientInfo } from './types'

/**
 * Authentication storage for the proxy.
 *
 * The auth directory is `MCP_OAUTH_PROXY_CONFIG_DIR` or `~/.mcp-auth`. Files in it:
 * - {server_hash}_client_info.json: dynamic registration result (client_id, secret, redirect_uri)
 * - {server_hash}_lock.json: advisory lock held while an interactive authorization runs
 * - {server_hash}_debug.log: debug log, only written with --debug
 * - {token file name}.json: the stored token, named after the server URL (see tokenFileName)
 *
 * JSON files are written with 2-space indentation.
 */

export const CLIENT_INFO_FILE = 'client_info.json'
export const LOCK_FILE = 'lock.json'

export function getConfigDir(): string {
  return process.env.MCP_OAUTH_PROXY_CONFIG_DIR || path.join(os.homedir(), '.mcp-auth')
}

/**
 * Generates a hash for the server URL to use in filenames
 */
export function getServerUrlHash(serverUrl: string): string {
  return crypto.createHash('md5').update(serverUrl).digest('hex')
}

export function getServerFilePath(authDir: string, serverUrlHash: string, filename: string): string {
  return path.join(authDir, `${serverUrlHash}_${filename}`)
}

export async function ensureDir(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true })
  } catch (error) {
    throw new OAuthFlowError('io', `Failed to create auth directory ${dir}`, { cause: error })
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

/**
 * Reads a JSON file and validates it with the schema
 * @returns The parsed content, or undefined if the file doesn't exist
 */
export async function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<z.output<S> | undefined> {
  let content: string
  try {
    content = await fs.readFile(filePath, 'utf-8')
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined
    }
    throw new OAuthFlowError('io', `Failed to read ${filePath}`, { cause: error })
  }

  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    throw new OAuthFlowError('json', `Invalid JSON in ${filePath}`, { cause: error })
  }

  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    throw new OAuthFlowError('json', `Unexpected content in ${filePath}: ${parsed.error.message}`, { cause: parsed.error })
  }
  return parsed.data
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath))
  try {
    await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8')
  } catch (error) {
    throw new OAuthFlowError('io', `Failed to write ${filePath}`, { cause: error })
  }
}

/**
 * Deletes a file if it exists
 * @returns True if a file was removed
 */
export async function deleteFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath)
    return true
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false
    }
    throw new OAuthFlowError('io', `Failed to delete ${filePath}`, { cause: error })
  }
}

export async function readClientInfo(authDir: string, serverUrlHash: string): Promise<StoredClientInfo | undefined> {
  return readJsonFile(getServerFilePath(authDir, serverUrlHash, CLIENT_INFO_FILE), StoredClientInfoSchema)
}

export async function writeClientInfo(authDir: string, serverUrlHash: string, clientInfo: StoredClientInfo): Promise<void> {
  await writeJsonFile(getServerFilePath(authDir, serverUrlHash, CLIENT_INFO_FILE), clientInfo)
}

export async function deleteClientInfo(authDir: string, serverUrlHash: string): Promise<boolean> {
  return deleteFile(getServerFilePath(authDir, serverUrlHash, CLIENT_INFO_FILE))
}
