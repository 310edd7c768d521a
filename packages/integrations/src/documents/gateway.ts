/**
 * Ingestion gateway: validates a caller-supplied document URL and downloads
 * the PDF under the configured safety limits.
 *
 * Static checks (scheme, host allow-list, .pdf path) run before any network
 * access. Redirects are followed by hand so every hop passes the same checks.
 * Payloads stay in memory; a failed download is reported, never retried.
 */

import { Ok, Err, TridError } from '@trid-check/core'
import type { Result } from '@trid-check/core'
import type { GatewayConfig } from './config.js'

export const PDF_MAGIC = new Uint8Array([0x25, 0x50, 0x44, 0x46]) // %PDF

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308])

export function hasPdfMagic(bytes: Uint8Array): boolean {
  if (bytes.byteLength < PDF_MAGIC.byteLength) return false
  return PDF_MAGIC.every((b, i) => bytes[i] === b)
}

function concatChunks(chunks: Uint8Array[], size: number): Uint8Array {
  const out = new Uint8Array(size)
  let offset = 0
  for (const chunk of chunks) {
    out.set(chunk, offset)
    offset += chunk.byteLength
  }
  return out
}

export class DocumentGateway {
  constructor(private readonly config: GatewayConfig) {}

  /** Scheme → host → extension, short-circuiting on the first failure. */
  validateReference(reference: string): Result<URL> {
    let url: URL
    try {
      url = new URL(reference)
    } catch {
      return Err(TridError.security('INSECURE_SCHEME', 'Only HTTPS URLs allowed, got an invalid or scheme-less URL'))
    }

    if (url.protocol !== 'https:') {
      return Err(TridError.security('INSECURE_SCHEME', `Only HTTPS URLs allowed, got: ${url.protocol.slice(0, -1)}`))
    }

    if (url.username || url.password) {
      return Err(TridError.security('DOMAIN_NOT_ALLOWED', 'Credentials are not allowed in document URLs'))
    }

    if (!this.config.allowedDomains.has(url.host)) {
      return Err(
        TridError.security(
          'DOMAIN_NOT_ALLOWED',
          `Domain not allowed: ${url.host}. Allowed: ${[...this.config.allowedDomains].join(', ')}`,
        ),
      )
    }

    if (!url.pathname.toLowerCase().endsWith('.pdf')) {
      return Err(TridError.security('NOT_PDF_PATH', 'Only PDF files allowed'))
    }

    return Ok(url)
  }

  /**
   * Download the PDF at `reference`. One timer bounds the whole operation,
   * including redirect hops and the body read. Aborting `signal` cancels it.
   */
  async fetchDocument(reference: string, signal?: AbortSignal): Promise<Result<Uint8Array>> {
    const validated = this.validateReference(reference)
    if (!validated.ok) {
      console.warn(`[gateway] rejected reference: ${validated.error.reason}`)
      return validated
    }
    if (signal?.aborted) return Err(TridError.transport('CANCELLED', 'Download cancelled'))

    const controller = new AbortController()
    let timedOut = false
    const timeout = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, this.config.timeoutMs)
    const onCancel = () => controller.abort()
    signal?.addEventListener('abort', onCancel, { once: true })

    try {
      return await this.download(validated.value, controller.signal)
    } catch (e) {
      if (timedOut) {
        return Err(TridError.transport('TIMEOUT', `Download timed out after ${this.config.timeoutMs / 1000}s`))
      }
      if (signal?.aborted) {
        return Err(TridError.transport('CANCELLED', 'Download cancelled'))
      }
      const message = e instanceof Error ? e.message : String(e)
      console.warn(`[gateway] fetch from ${validated.value.host} failed: ${message}`)
      return Err(TridError.transport('NETWORK', `Download failed: ${message}`))
    } finally {
      clearTimeout(timeout)
      signal?.removeEventListener('abort', onCancel)
    }
  }

  private async download(url: URL, signal: AbortSignal): Promise<Result<Uint8Array>> {
    let current = url
    for (let hops = 0; ; hops++) {
      const res = await fetch(current, { redirect: 'manual', signal })

      if (!REDIRECT_STATUSES.has(res.status)) {
        if (!res.ok) {
          await res.body?.cancel()
          return Err(TridError.transport('HTTP_STATUS', `HTTP ${res.status} from ${current.host}`))
        }
        return this.readPdf(res)
      }

      await res.body?.cancel()
      const location = res.headers.get('location')
      if (!location) {
        return Err(TridError.transport('HTTP_STATUS', `HTTP ${res.status} from ${current.host} without a Location header`))
      }
      if (hops >= this.config.maxRedirects) {
        return Err(TridError.transport('TOO_MANY_REDIRECTS', `More than ${this.config.maxRedirects} redirects`))
      }

      const next = this.validateReference(resolveLocation(location, current))
      if (!next.ok) {
        console.warn(`[gateway] rejected redirect from ${current.host}: ${next.error.reason}`)
        return next
      }
      current = next.value
    }
  }

  private async readPdf(res: Response): Promise<Result<Uint8Array>> {
    const max = this.config.maxPdfBytes
    const declared = Number(res.headers.get('content-length'))
    if (Number.isFinite(declared) && declared > max) {
      await res.body?.cancel()
      return Err(TridError.format('PAYLOAD_TOO_LARGE', `PDF too large: ${declared} bytes (max: ${max})`))
    }

    const chunks: Uint8Array[] = []
    let size = 0
    if (res.body) {
      const reader = res.body.getReader()
      for (;;) {
        const { done, value } = await reader.read()
        if (done) break
        const chunk: Uint8Array = value
        size += chunk.byteLength
        if (size > max) {
          await reader.cancel()
          return Err(TridError.format('PAYLOAD_TOO_LARGE', `PDF too large: more than ${max} bytes (max: ${max})`))
        }
        chunks.push(chunk)
      }
    }

    const pdf = concatChunks(chunks, size)
    if (!hasPdfMagic(pdf)) {
      return Err(TridError.format('NOT_PDF_CONTENT', 'File does not appear to be a valid PDF'))
    }
    return Ok(pdf)
  }
}

/** Resolve a Location header against the URL that sent it; unparseable targets fail the scheme check. */
function resolveLocation(location: string, base: URL): string {
  try {
    return new URL(location, base).toString()
  } catch {
    return location
  }
}
