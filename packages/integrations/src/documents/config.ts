/**
 * Ingestion gateway configuration: allow-list, size and time limits.
 *
 * Built once at process start and handed to each DocumentGateway, so gateways
 * with different policies can coexist.
 */

import { z } from 'zod'
import { Ok, Err, schemaViolationFrom } from '@trid-check/core'
import type { Result } from '@trid-check/core'

export const DEFAULT_ALLOWED_DOMAINS = ['storage.googleapis.com', 's3.amazonaws.com']
export const DEFAULT_MAX_PDF_BYTES = 10 * 1024 * 1024
export const DEFAULT_TIMEOUT_SECONDS = 30
export const DEFAULT_MAX_REDIRECTS = 5
/** Longest delay a Node timer holds (2^31 - 1 ms); larger values fire at once. */
export const MAX_TIMEOUT_MS = 2_147_483_647
export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMEOUT_MS / 1000)

export interface GatewayConfig {
  /** Exact host strings (with port when non-default); no wildcard or subdomain matching. */
  readonly allowedDomains: ReadonlySet<string>
  readonly maxPdfBytes: number
  readonly timeoutMs: number
  /** Redirect hops followed, each re-validated like the first URL. */
  readonly maxRedirects: number
}

export interface GatewayConfigInput {
  allowedDomains?: Iterable<string>
  maxPdfBytes?: number
  timeoutSeconds?: number
  maxRedirects?: number
}

export function parseDomainList(raw: string): string[] {
  return raw
    .split(',')
    .map((d) => d.trim().toLowerCase())
    .filter(Boolean)
}

export function createGatewayConfig(input: GatewayConfigInput = {}): GatewayConfig {
  const domains = [...(input.allowedDomains ?? DEFAULT_ALLOWED_DOMAINS)].map((d) => d.trim().toLowerCase())
  return Object.freeze({
    allowedDomains: new Set(domains.filter(Boolean)),
    maxPdfBytes: input.maxPdfBytes ?? DEFAULT_MAX_PDF_BYTES,
    timeoutMs: Math.min(Math.round((input.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS) * 1000), MAX_TIMEOUT_MS),
    maxRedirects: input.maxRedirects ?? DEFAULT_MAX_REDIRECTS,
  })
}

// Unset and blank variables both fall back to defaults.
const blankToUndefined = (v: unknown): unknown => (typeof v === 'string' && v.trim() === '' ? undefined : v)

const GatewayEnvSchema = z.object({
  ALLOWED_DOMAINS: z
    .preprocess(blankToUndefined, z.string().optional())
    .transform((raw) => (raw === undefined ? undefined : parseDomainList(raw)))
    .refine((domains) => domains === undefined || domains.length > 0, 'must name at least one host'),
  MAX_PDF_SIZE: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
  DOWNLOAD_TIMEOUT: z.preprocess(
    blankToUndefined,
    z.coerce.number().positive().max(MAX_TIMEOUT_SECONDS, `must be at most ${MAX_TIMEOUT_SECONDS} seconds`).optional(),
  ),
})

/** Read ALLOWED_DOMAINS, MAX_PDF_SIZE (bytes) and DOWNLOAD_TIMEOUT (seconds). */
export function loadGatewayConfig(env: Record<string, string | undefined> = process.env): Result<GatewayConfig> {
  const parsed = GatewayEnvSchema.safeParse(env)
  if (!parsed.success) return Err(schemaViolationFrom(parsed.error))

  return Ok(
    createGatewayConfig({
      allowedDomains: parsed.data.ALLOWED_DOMAINS,
      maxPdfBytes: parsed.data.MAX_PDF_SIZE,
      timeoutSeconds: parsed.data.DOWNLOAD_TIMEOUT,
    }),
  )
}
