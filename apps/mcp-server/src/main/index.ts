/**
 * Process entry point: loads configuration, builds the pipeline and serves
 * MCP over stdio. Stdout carries the protocol, so all logging goes to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { StubFieldExtractor } from '@trid-check/core'
import { DocumentGateway, loadGatewayConfig } from '@trid-check/integrations'
import { DisclosureService } from './disclosure-service.js'
import { createServer, SERVER_NAME, SERVER_VERSION } from './server.js'

async function main(): Promise<void> {
  const config = loadGatewayConfig()
  if (!config.ok) {
    console.error(`[mcp-server] Configuration error: ${config.error.message}`)
    process.exit(1)
  }

  const extractor = new StubFieldExtractor()
  const service = new DisclosureService(new DocumentGateway(config.value), extractor)
  const server = createServer(service)

  await server.connect(new StdioServerTransport())
  console.error(
    `[mcp-server] ${SERVER_NAME} v${SERVER_VERSION} ready on stdio ` +
      `(extractor: ${extractor.name}, allowed domains: ${[...config.value.allowedDomains].join(', ')})`,
  )
}

main().catch((e) => {
  console.error('[mcp-server] Fatal:', e instanceof Error ? e.message : e)
  process.exit(1)
})
