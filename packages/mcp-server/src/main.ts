/**
 * Stdio entry point.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { createLogger } from './logger'
import { createMatchRegistry } from './matchRegistry'
import { createServer, SERVER_NAME } from './server'

async function main(): Promise<void> {
  const logger = createLogger()
  const registry = createMatchRegistry({ logger })
  const server = createServer({ registry, logger })

  const transport = new StdioServerTransport()
  await server.connect(transport)

  // stdout carries the MCP protocol
  logger.info('System', '-', `${SERVER_NAME} running on stdio`)
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error)
  process.exit(1)
})
