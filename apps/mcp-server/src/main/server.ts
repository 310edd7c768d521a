/**
 * MCP server wiring: registers the tool, resource and prompt handlers on an
 * SDK Server. The transport is attached by the caller.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import {
  CallToolRequestSchema,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js'
import { TRID_TOOLS, executeTool } from './tools.js'
import { RESOURCES, RESOURCE_TEMPLATES, readResource } from './resources.js'
import { PROMPTS, getPrompt } from './prompts.js'
import type { DisclosureService } from './disclosure-service.js'

export const SERVER_NAME = 'trid-compliance'
export const SERVER_VERSION = '0.1.0'

export function createServer(service: DisclosureService): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {}, resources: {}, prompts: {} } },
  )

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TRID_TOOLS }))
  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    executeTool(service, request.params.name, request.params.arguments),
  )

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({ resources: RESOURCES }))
  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => ({
    resourceTemplates: RESOURCE_TEMPLATES,
  }))
  server.setRequestHandler(ReadResourceRequestSchema, async (request) => readResource(request.params.uri))

  server.setRequestHandler(ListPromptsRequestSchema, async () => ({ prompts: PROMPTS }))
  server.setRequestHandler(GetPromptRequestSchema, async (request) =>
    getPrompt(request.params.name, request.params.arguments),
  )

  return server
}
