/**
 * Tool definitions, argument validation, and executor for the MCP boundary.
 *
 * Defines the four tools (hello, parse_loan_estimate, parse_closing_disclosure,
 * compare_le_cd). Failures are returned as isError results carrying a JSON
 * error envelope, never thrown, so every call gets a tool result.
 */

import { z } from 'zod'
import { v4 as uuidv4 } from 'uuid'
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js'
import {
  Ok,
  Err,
  TridError,
  mapResult,
  schemaViolationFrom,
  serializeLoanEstimate,
  serializeClosingDisclosure,
  serializeComplianceReport,
} from '@trid-check/core'
import type { Result } from '@trid-check/core'
import type { DisclosureService } from './disclosure-service.js'

const DOWNLOAD_ANNOTATIONS = {
  openWorldHint: true,
  readOnlyHint: true,
  destructiveHint: false,
} as const

export const TRID_TOOLS: Tool[] = [
  {
    name: 'hello',
    description: 'Simple greeting tool for testing MCP connectivity',
    inputSchema: {
      type: 'object' as const,
      properties: {
        name: { type: 'string', description: 'Name to greet (default: World)' },
      },
    },
  },
  {
    name: 'parse_loan_estimate',
    description:
      'REQUIRES APPROVAL: Downloads an external PDF document. ' +
      'Parses a Loan Estimate PDF into structured loan terms and cost lines. ' +
      'Only allow-listed HTTPS hosts; size and time limited.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        pdf_url: { type: 'string', description: 'HTTPS URL of the Loan Estimate PDF on an allow-listed host' },
      },
      required: ['pdf_url'],
    },
    annotations: { title: 'Parse Loan Estimate', ...DOWNLOAD_ANNOTATIONS },
  },
  {
    name: 'parse_closing_disclosure',
    description:
      'REQUIRES APPROVAL: Downloads an external PDF document. ' +
      'Parses a Closing Disclosure PDF into structured loan terms, cost lines and cash to close.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        pdf_url: { type: 'string', description: 'HTTPS URL of the Closing Disclosure PDF on an allow-listed host' },
      },
      required: ['pdf_url'],
    },
    annotations: { title: 'Parse Closing Disclosure', ...DOWNLOAD_ANNOTATIONS },
  },
  {
    name: 'compare_le_cd',
    description:
      'REQUIRES APPROVAL: Downloads and compares two PDF documents. ' +
      'Checks a Closing Disclosure against its Loan Estimate for TRID zero-tolerance, ' +
      '10% tolerance and APR accuracy violations.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        loan_estimate_url: { type: 'string', description: 'HTTPS URL of the Loan Estimate PDF' },
        closing_disclosure_url: { type: 'string', description: 'HTTPS URL of the Closing Disclosure PDF' },
      },
      required: ['loan_estimate_url', 'closing_disclosure_url'],
    },
    annotations: { title: 'Compare Loan Estimate and Closing Disclosure', ...DOWNLOAD_ANNOTATIONS },
  },
]

// ── Argument schemas ──

const url = (name: string) => z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`)

const HelloArgsSchema = z.object({ name: z.string().default('World') })
const PdfUrlArgsSchema = z.object({ pdf_url: url('pdf_url') })
const CompareArgsSchema = z.object({
  loan_estimate_url: url('loan_estimate_url'),
  closing_disclosure_url: url('closing_disclosure_url'),
})

function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): Result<z.output<S>> {
  const parsed = schema.safeParse(args ?? {})
  return parsed.success ? Ok(parsed.data) : Err(schemaViolationFrom(parsed.error))
}

const pretty = (value: unknown): string => JSON.stringify(value, null, 2)

// ── Handlers ──

type ToolHandler = (service: DisclosureService, args: unknown) => Promise<Result<string>>

const HANDLERS: Record<string, ToolHandler> = {
  async hello(_service, args) {
    return mapResult(parseArgs(HelloArgsSchema, args), ({ name }) => `Hello, ${name}! MCP server is working correctly.`)
  },

  async parse_loan_estimate(service, args) {
    const parsed = parseArgs(PdfUrlArgsSchema, args)
    if (!parsed.ok) return parsed
    const le = await service.loadLoanEstimate(parsed.value.pdf_url)
    return mapResult(le, (value) => pretty(serializeLoanEstimate(value)))
  },

  async parse_closing_disclosure(service, args) {
    const parsed = parseArgs(PdfUrlArgsSchema, args)
    if (!parsed.ok) return parsed
    const cd = await service.loadClosingDisclosure(parsed.value.pdf_url)
    return mapResult(cd, (value) => pretty(serializeClosingDisclosure(value)))
  },

  async compare_le_cd(service, args) {
    const parsed = parseArgs(CompareArgsSchema, args)
    if (!parsed.ok) return parsed
    const report = await service.compare(parsed.value.loan_estimate_url, parsed.value.closing_disclosure_url)
    return mapResult(report, (value) => pretty(serializeComplianceReport(value)))
  },
}

// ── Envelope ──

export interface ToolErrorEnvelope {
  error: {
    kind: string
    reason: string | null
    field: string | null
    message: string
  }
}

function errorResult(envelope: ToolErrorEnvelope): CallToolResult {
  return { isError: true, content: [{ type: 'text', text: pretty(envelope) }] }
}

export function toolErrorResult(error: TridError): CallToolResult {
  return errorResult({
    error: {
      kind: error.code,
      reason: error.reason ?? null,
      field: error.field ?? null,
      message: error.message,
    },
  })
}

/**
 * Execute a tool call. Always returns a result (never throws). Unknown names
 * are rejected before any document is touched.
 */
export async function executeTool(
  service: DisclosureService,
  name: string,
  args: Record<string, unknown> | undefined,
): Promise<CallToolResult> {
  const requestId = uuidv4().slice(0, 8)
  const started = Date.now()
  const elapsed = () => Date.now() - started

  const handler = Object.prototype.hasOwnProperty.call(HANDLERS, name) ? HANDLERS[name] : undefined
  if (!handler) {
    console.error(`[tools] ${requestId} rejected unknown tool "${name}"`)
    return toolErrorResult(TridError.unknownOperation(name))
  }

  try {
    const result = await handler(service, args)
    if (!result.ok) {
      const { code, reason } = result.error
      console.error(`[tools] ${requestId} ${name} failed: ${code}${reason ? `/${reason}` : ''} (${elapsed()}ms)`)
      return toolErrorResult(result.error)
    }
    console.error(`[tools] ${requestId} ${name} ok (${elapsed()}ms)`)
    return { content: [{ type: 'text', text: result.value }] }
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e)
    console.error(`[tools] ${requestId} ${name} crashed (${elapsed()}ms):`, message)
    return errorResult({ error: { kind: 'INTERNAL', reason: null, field: null, message } })
  }
}
