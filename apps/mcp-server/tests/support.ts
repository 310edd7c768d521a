import { vi } from 'vitest'
import { StubFieldExtractor } from '@trid-check/core'
import type { FieldExtractor } from '@trid-check/core'
import { DocumentGateway, createGatewayConfig } from '@trid-check/integrations'
import { DisclosureService } from '../src/main/disclosure-service.js'

export const LE_URL = 'https://storage.googleapis.com/loans/le.pdf'
export const CD_URL = 'https://storage.googleapis.com/loans/cd.pdf'

export function pdfBytes(): Uint8Array {
  return new TextEncoder().encode('%PDF-1.7\n%test document\n')
}

/** Serve a PDF for every request; returns the mock for call assertions. */
export function stubPdfFetch() {
  const fetchMock = vi.fn(async () => new Response(pdfBytes()))
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

export function createService(extractor: FieldExtractor = new StubFieldExtractor()): DisclosureService {
  return new DisclosureService(new DocumentGateway(createGatewayConfig()), extractor)
}
