/**
 * Field extraction contract: turns raw document bytes into a flat field map.
 *
 * The map is untyped on purpose; it only becomes a disclosure entity through
 * parseLoanEstimate / parseClosingDisclosure.
 */

export type ExtractedFields = Record<string, unknown>

export interface FieldExtractor {
  readonly name: string
  extractLoanEstimate(pdf: Uint8Array): Promise<ExtractedFields>
  extractClosingDisclosure(pdf: Uint8Array): Promise<ExtractedFields>
}

const STUB_LOAN_ESTIMATE: ExtractedFields = {
  loan_amount: 300000.0,
  interest_rate: 6.5,
  apr: 6.73,
  monthly_payment: 1896.2,
  origination_charges: 1500.0,
  services_cannot_shop: 800.0,
  services_can_shop: 1200.0,
  taxes_and_gov_fees: 2500.0,
  prepaids: 3000.0,
  initial_escrow: 2400.0,
  other_costs: 600.0,
  lender_name: 'Example Bank',
  loan_term_months: 360,
  tolerance_buckets: {
    origination_charges: 'zero',
    services_cannot_shop: 'zero',
    services_can_shop: '10_percent',
  },
}

const STUB_CLOSING_DISCLOSURE: ExtractedFields = {
  loan_amount: 300000.0,
  interest_rate: 6.5,
  apr: 6.75,
  monthly_payment: 1896.2,
  origination_charges: 1500.0,
  services_cannot_shop: 850.0,
  services_can_shop: 1250.0,
  taxes_and_gov_fees: 2500.0,
  prepaids: 3000.0,
  initial_escrow: 2400.0,
  other_costs: 600.0,
  cash_to_close: 15000.0,
  closing_date: '2025-06-15',
}

/**
 * Canned extractor. Ignores the bytes and returns fixed field maps until a
 * real PDF field extractor is plugged in behind FieldExtractor.
 */
export class StubFieldExtractor implements FieldExtractor {
  readonly name = 'stub'

  async extractLoanEstimate(_pdf: Uint8Array): Promise<ExtractedFields> {
    return structuredClone(STUB_LOAN_ESTIMATE)
  }

  async extractClosingDisclosure(_pdf: Uint8Array): Promise<ExtractedFields> {
    return structuredClone(STUB_CLOSING_DISCLOSURE)
  }
}
