import { rmSync } from 'fs'
import { deleteFile, ensureDir, getServerFilePath, LOCK_FILE, readJsonFile, writeJsonFile } from './mcp-auth-config'
import { LockfileDataSchema, type IsProcessAlive, type LockfileData } from './types'
import { DEBUG, debugLog, log, sleep } from './utils'

export const POLL_INTERVAL_MS = 2_000
export const MAX_WAIT_MS = 5 * 60 * 1000
export const MAX_LOCK_AGE_MS = 30 * 60 * 1000

/**
 * Checks if a process with the given PID is running
 * @param pid The process ID to check
 * @returns True if the process is running, false otherwise
 */
export async function isPidRunning(pid: number): Promise<boolean> {
  try {
    process.kill(pid, 0) // Doesn't kill the process, just checks if it exists
    return true
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return err instanceof Error && 'code' in err && err.code === 'EPERM'
  }
}

export interface CoordinationOptions {
  authDir: string
  serverUrlHash: string
  isProcessAlive?: IsProcessAlive
  pollIntervalMs?: number
  maxWaitMs?: number
  maxLockAgeMs?: number
  /** Clock in milliseconds, overridable in tests */
  now?: () => number
}

/**
 * Advisory lock shared by every proxy process that targets the same server, so only one of
 * them opens a browser at a time.
 *
 * The lock is a plain file checked for existence and staleness, not an exclusive create: two
 * processes can both see "no lock" and both start a flow. That window is accepted.
 */
export class CoordinationManager {
  readonly lockFilePath: string
  private readonly serverUrlHash: string
  private readonly authDir: string
  private readonly isProcessAlive: IsProcessAlive
  private readonly pollIntervalMs: number
  private readonly maxWaitMs: number
  private readonly maxLockAgeMs: number
  private readonly now: () => number

  constructor(options: CoordinationOptions) {
    this.authDir = options.authDir
    this.serverUrlHash = options.serverUrlHash
    this.lockFilePath = getServerFilePath(options.authDir, options.serverUrlHash, LOCK_FILE)
    this.isProcessAlive = options.isProcessAlive ?? isPidRunning
    this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS
    this.maxWaitMs = options.maxWaitMs ?? MAX_WAIT_MS
    this.maxLockAgeMs = options.maxLockAgeMs ?? MAX_LOCK_AGE_MS
    this.now = options.now ?? Date.now
  }

  /**
   * Returns the lock held by a live peer. Stale or unreadable lock files are deleted and
   * reported as absent.
   */
  async checkLockfile(): Promise<LockfileData | undefined> {
    let lockData: LockfileData | undefined
    try {
      lockData = await readJsonFile(this.lockFilePath, LockfileDataSchema)
    } catch (error) {
      log('Found unreadable lockfile, deleting it')
      if (DEBUG) await debugLog(this.serverUrlHash, 'Unreadable lockfile', error)
      await this.deleteLockfile()
      return undefined
    }

    if (!lockData) {
      if (DEBUG) await debugLog(this.serverUrlHash, 'No lockfile found', { path: this.lockFilePath })
      return undefined
    }

    if (await this.isLockValid(lockData)) {
      return lockData
    }

    log('Found invalid lockfile, deleting it')
    await this.deleteLockfile()
    return undefined
  }

  /**
   * A lock is valid while it is younger than 30 minutes and its process is running
   */
  async isLockValid(lockData: LockfileData): Promise<boolean> {
    if (DEBUG) await debugLog(this.serverUrlHash, 'Checking if lockfile is valid', lockData)

    const age = this.now() - lockData.timestamp * 1000
    if (age >= this.maxLockAgeMs) {
      log('Lockfile is too old')
      if (DEBUG) await debugLog(this.serverUrlHash, 'Lockfile is too old', { age, maxAge: this.maxLockAgeMs })
      return false
    }

    if (!(await this.isProcessAlive(lockData.pid))) {
      log('Process from lockfile is not running')
      if (DEBUG) await debugLog(this.serverUrlHash, 'Process from lockfile is not running', { pid: lockData.pid })
      return false
    }

    return true
  }

  async createLockfile(port: number): Promise<void> {
    await ensureDir(this.authDir)
    const lockData: LockfileData = {
      pid: process.pid,
      port,
      timestamp: Math.floor(this.now() / 1000),
      server_url_hash: this.serverUrlHash,
    }
    log(`Creating lockfile for server ${this.serverUrlHash} with process ${process.pid} on port ${port}`)
    await writeJsonFile(this.lockFilePath, lockData)
  }

  /**
   * Best effort: failures are logged and swallowed
   */
  async deleteLockfile(): Promise<void> {
    try {
      if (await deleteFile(this.lockFilePath)) {
        if (DEBUG) await debugLog(this.serverUrlHash, 'Deleted lockfile', { path: this.lockFilePath })
      }
    } catch (error) {
      log(`Error deleting lockfile: ${error instanceof Error ? error.message : String(error)}`)
    }
  }

  /**
   * Waits for the peer on `port` to finish.
   * @returns True once the lock disappears; false if another port takes the lock or the wait times out
   */
  async waitForAuthentication(port: number, signal?: AbortSignal): Promise<boolean> {
    log(`Waiting for authentication from the server on port ${port}...`)
    const maxPolls = Math.max(1, Math.floor(this.maxWaitMs / this.pollIntervalMs))

    for (let attempt = 1; attempt <= maxPolls; attempt++) {
      await sleep(this.pollIntervalMs, signal)

      const lockData = await this.checkLockfile()
      if (!lockData) {
        log('Lockfile disappeared, authentication may be complete')
        return true
      }
      if (lockData.port !== port) {
        log('Lockfile now names a different port, giving up coordination')
        return false
      }
      if (DEBUG) await debugLog(this.serverUrlHash, `Poll ${attempt}/${maxPolls}: authentication still in progress`)
    }

    log('Timed out waiting for authentication to complete, proceeding with own auth')
    return false
  }

  async waitAndCleanup(port: number, signal?: AbortSignal): Promise<boolean> {
    try {
      return await this.waitForAuthentication(port, signal)
    } finally {
      await this.deleteLockfile()
    }
  }

  /**
   * Removes the lock synchronously if the process exits mid-flow.
   * @returns A function that unregisters the hook
   */
  registerExitCleanup(): () => void {
    const onExit = () => {
      try {
        rmSync(this.lockFilePath, { force: true })
      } catch (error) {
        // Synchronous 'exit' handler: nothing left to report to
        if (DEBUG) console.error(`[DEBUG] Error removing lockfile on exit:`, error)
      }
    }
    process.once('exit', onExit)
    return () => {
      process.removeListener('exit', onExit)
    }
  }
}
