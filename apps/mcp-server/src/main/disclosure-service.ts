/**
 * Disclosure service: runs the document pipeline behind each tool:
 * gateway download → field extraction → validated entity → comparison.
 *
 * Every failure aborts the whole operation; no partial result is returned.
 */

import {
  Ok,
  parseLoanEstimate,
  parseClosingDisclosure,
  compareDisclosures,
} from '@trid-check/core'
import type {
  Result,
  LoanEstimate,
  ClosingDisclosure,
  ComplianceReport,
  FieldExtractor,
} from '@trid-check/core'
import { fetchBoth } from '@trid-check/integrations'
import type { DocumentGateway } from '@trid-check/integrations'

export class DisclosureService {
  constructor(
    private readonly gateway: DocumentGateway,
    private readonly extractor: FieldExtractor,
  ) {}

  async loadLoanEstimate(pdfUrl: string): Promise<Result<LoanEstimate>> {
    const pdf = await this.gateway.fetchDocument(pdfUrl)
    if (!pdf.ok) return pdf
    return parseLoanEstimate(await this.extractor.extractLoanEstimate(pdf.value))
  }

  async loadClosingDisclosure(pdfUrl: string): Promise<Result<ClosingDisclosure>> {
    const pdf = await this.gateway.fetchDocument(pdfUrl)
    if (!pdf.ok) return pdf
    return parseClosingDisclosure(await this.extractor.extractClosingDisclosure(pdf.value))
  }

  /** Both documents are downloaded concurrently; the first failure cancels the other. */
  async compare(loanEstimateUrl: string, closingDisclosureUrl: string): Promise<Result<ComplianceReport>> {
    const pdfs = await fetchBoth(this.gateway, [loanEstimateUrl, closingDisclosureUrl])
    if (!pdfs.ok) return pdfs
    const [lePdf, cdPdf] = pdfs.value

    const le = parseLoanEstimate(await this.extractor.extractLoanEstimate(lePdf))
    if (!le.ok) return le
    const cd = parseClosingDisclosure(await this.extractor.extractClosingDisclosure(cdPdf))
    if (!cd.ok) return cd

    return Ok(compareDisclosures(le.value, cd.value))
  }
}
