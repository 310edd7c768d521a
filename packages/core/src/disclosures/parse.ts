/**
 * Validating constructors for disclosure entities.
 *
 * The only path from an untyped extracted field map to a typed entity.
 * Validation is all-or-nothing: the entity is either fully valid and frozen,
 * or not built at all.
 */

import { Ok, Err, schemaViolationFrom } from '../common/index.js'
import type { Result } from '../common/index.js'
import { TOLERANCE_TABLE, normalizeBucketTag } from '../tolerance/table.js'
import type { ToleranceBucket } from '../tolerance/table.js'
import { isCostLine } from './cost-lines.js'
import type { CostLine, CostLines } from './cost-lines.js'
import { LoanEstimateFieldsSchema, ClosingDisclosureFieldsSchema } from './schemas.js'
import type { LoanEstimate, ClosingDisclosure } from './schemas.js'

function pickCostLines(fields: CostLines): CostLines {
  return Object.freeze({
    origination_charges: fields.origination_charges,
    services_cannot_shop: fields.services_cannot_shop,
    services_can_shop: fields.services_can_shop,
    taxes_and_gov_fees: fields.taxes_and_gov_fees,
    prepaids: fields.prepaids,
    initial_escrow: fields.initial_escrow,
    other_costs: fields.other_costs,
  })
}

/** Canonical assignment with any recognised advisory tags layered on top. */
function resolveAdvisoryBuckets(
  tags: Record<string, string> | undefined,
): Readonly<Record<CostLine, ToleranceBucket>> {
  const buckets: Record<CostLine, ToleranceBucket> = { ...TOLERANCE_TABLE }
  for (const [line, tag] of Object.entries(tags ?? {})) {
    const bucket = normalizeBucketTag(tag)
    if (isCostLine(line) && bucket) buckets[line] = bucket
  }
  return Object.freeze(buckets)
}

export function parseLoanEstimate(fields: unknown): Result<LoanEstimate> {
  const parsed = LoanEstimateFieldsSchema.safeParse(fields)
  if (!parsed.success) return Err(schemaViolationFrom(parsed.error))

  const data = parsed.data
  return Ok(
    Object.freeze({
      loanAmount: data.loan_amount,
      interestRate: data.interest_rate,
      apr: data.apr,
      monthlyPayment: data.monthly_payment,
      costs: pickCostLines(data),
      lenderName: data.lender_name ?? null,
      loanTermMonths: data.loan_term_months,
      propertyAddress: data.property_address ?? null,
      borrowerName: data.borrower_name ?? null,
      toleranceBuckets: resolveAdvisoryBuckets(data.tolerance_buckets),
    }),
  )
}

export function parseClosingDisclosure(fields: unknown): Result<ClosingDisclosure> {
  const parsed = ClosingDisclosureFieldsSchema.safeParse(fields)
  if (!parsed.success) return Err(schemaViolationFrom(parsed.error))

  const data = parsed.data
  return Ok(
    Object.freeze({
      loanAmount: data.loan_amount,
      interestRate: data.interest_rate,
      apr: data.apr,
      monthlyPayment: data.monthly_payment,
      costs: pickCostLines(data),
      cashToClose: data.cash_to_close,
      closingDate: data.closing_date ?? null,
    }),
  )
}
