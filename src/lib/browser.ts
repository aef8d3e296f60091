import open from 'open'
import { log } from './utils'

/**
 * Opens the authorization URL in the user's browser. The URL is always printed to stderr
 * first, so a failed launch leaves the user with something to copy.
 */
export async function launchBrowser(url: string): Promise<void> {
  log(`\nPlease authorize this client by visiting:\n${url}\n`)

  try {
    await open(url)
    log('Browser opened automatically.')
  } catch (error) {
    log('Could not open browser automatically. Please copy and paste the URL above into your browser.')
    log(`Browser launch error: ${error instanceof Error ? error.message : String(error)}`)
  }
}
