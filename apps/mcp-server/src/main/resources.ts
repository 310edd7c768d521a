/**
 * Read-only reference resources: disclosure field catalogues and the
 * mortgage glossary.
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js'
import type { Resource, ResourceTemplate, ReadResourceResult } from '@modelcontextprotocol/sdk/types.js'
import {
  GLOSSARY,
  lookupGlossaryTerm,
  loanEstimateSchemaDocument,
  closingDisclosureSchemaDocument,
} from '@trid-check/core'

export const LOAN_ESTIMATE_SCHEMA_URI = 'trid://schemas/loan-estimate'
export const CLOSING_DISCLOSURE_SCHEMA_URI = 'trid://schemas/closing-disclosure'
export const GLOSSARY_URI = 'trid://glossary'
const GLOSSARY_TERM_PREFIX = `${GLOSSARY_URI}/`

export const RESOURCES: Resource[] = [
  {
    uri: LOAN_ESTIMATE_SCHEMA_URI,
    name: 'Loan Estimate Schema',
    description: 'Loan Estimate fields, bounds and the TRID tolerance buckets',
    mimeType: 'application/json',
  },
  {
    uri: CLOSING_DISCLOSURE_SCHEMA_URI,
    name: 'Closing Disclosure Schema',
    description: 'Closing Disclosure fields and bounds',
    mimeType: 'application/json',
  },
  {
    uri: GLOSSARY_URI,
    name: 'Mortgage Glossary',
    description: 'Mortgage terminology definitions',
    mimeType: 'application/json',
  },
]

export const RESOURCE_TEMPLATES: ResourceTemplate[] = [
  {
    uriTemplate: `${GLOSSARY_URI}/{term}`,
    name: 'Glossary Term',
    description: 'Definition of a single mortgage term (case-insensitive)',
    mimeType: 'text/plain',
  },
]

function json(uri: string, value: unknown): ReadResourceResult {
  return { contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(value, null, 2) }] }
}

export function readResource(uri: string): ReadResourceResult {
  if (uri === LOAN_ESTIMATE_SCHEMA_URI) return json(uri, loanEstimateSchemaDocument())
  if (uri === CLOSING_DISCLOSURE_SCHEMA_URI) return json(uri, closingDisclosureSchemaDocument())
  if (uri === GLOSSARY_URI) return json(uri, GLOSSARY)

  if (uri.startsWith(GLOSSARY_TERM_PREFIX)) {
    const term = decodeTerm(uri.slice(GLOSSARY_TERM_PREFIX.length))
    if (term) {
      return { contents: [{ uri, mimeType: 'text/plain', text: lookupGlossaryTerm(term).text }] }
    }
  }

  throw new McpError(ErrorCode.InvalidParams, `Unknown resource: ${uri}`)
}

function decodeTerm(raw: string): string {
  try {
    return decodeURIComponent(raw).trim()
  } catch {
    return ''
  }
}
