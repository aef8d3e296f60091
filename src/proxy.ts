#!/usr/bin/env node

/**
 * MCP Proxy with OAuth support
 * A bidirectional proxy between a local STDIO MCP client and a remote MCP server that requires
 * OAuth 2.1 authorization.
 *
 * Run with: npx mcp-oauth-proxy https://example.remote/server [callback-port] [options]
 *
 * Options:
 * --clean: Deletes stored tokens and client registration first, ensuring a fresh session
 * --debug: Writes verbose logs to stderr and to the auth directory
 *
 * If callback-port is not specified, an available port will be automatically selected.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { OAuthClient } from './lib/oauth-client'
import { connectToRemoteServer, log, mcpProxy, parseCommandLineArgs, setDebug, setupSignalHandlers, type CommandLineOptions } from './lib/utils'

const USAGE = `Usage: mcp-oauth-proxy <https://server-url> [callback-port] [--header Name:Value] [--host hostname]
  [--transport http-first|sse-first|http-only|sse-only] [--allow-http] [--scope scope]
  [--auth-timeout seconds] [--static-oauth-client-info json] [--clean] [--debug]`

const VPN_HINT = `You may be behind a VPN!

If you are behind a VPN, you can try setting the NODE_EXTRA_CA_CERTS environment variable to point
to the CA certificate file. If using claude_desktop_config.json, this might look like:

{
  "mcpServers": {
    "\${mcpServerName}": {
      "command": "npx",
      "args": [
        "mcp-oauth-proxy",
        "https://remote.mcp.server/sse"
      ],
      "env": {
        "NODE_EXTRA_CA_CERTS": "\${your CA certificate file path}.pem"
      }
    }
  }
}
`

/**
 * Main function to run the proxy
 */
async function runProxy(options: CommandLineOptions) {
  const { serverUrl, headers, transportStrategy, clean } = options

  const oauthClient = new OAuthClient({
    serverUrl,
    callbackPort: options.callbackPort,
    callbackHost: options.host,
    scope: options.scope,
    authTimeoutSecs: options.authTimeoutSecs,
    staticClientInfo: options.staticClientInfo,
  })

  if (clean) {
    log('Clean mode: removing stored tokens and client registration')
    await oauthClient.clearTokens()
    await oauthClient.clearClientInfo()
  }

  // Create the STDIO transport for local connections
  const localTransport = new StdioServerTransport()

  try {
    const remoteTransport = await connectToRemoteServer(null, {
      serverUrl,
      headers,
      transportStrategy,
      authorize: () => oauthClient.getAccessToken(),
      invalidate: () => oauthClient.clearTokens(),
    })

    // Set up bidirectional proxy between local and remote transports
    mcpProxy({
      transportToClient: localTransport,
      transportToServer: remoteTransport,
    })

    // Start the local STDIO server
    await localTransport.start()
    log('Local STDIO server running')
    log(`Proxy established successfully between local STDIO and remote ${remoteTransport.constructor.name}`)
    log('Press Ctrl+C to exit')

    setupSignalHandlers(async () => {
      await remoteTransport.close()
      await localTransport.close()
    })
  } catch (error) {
    log('Fatal error:', error)
    if (error instanceof Error && error.message.includes('self-signed certificate in certificate chain')) {
      log(VPN_HINT)
    }
    process.exit(1)
  }
}

async function main() {
  const options = parseCommandLineArgs(process.argv.slice(2), USAGE)
  setDebug(options.debug)
  await runProxy(options)
}

main().catch((error: unknown) => {
  log('Fatal error:', error)
  process.exit(1)
})
