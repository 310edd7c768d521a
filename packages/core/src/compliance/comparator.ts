/**
 * Compliance comparator: pure Loan Estimate vs Closing Disclosure tolerance check.
 * No I/O; identical inputs always give an identical report.
 */

import type { CostLine } from '../disclosures/cost-lines.js'
import type { LoanEstimate, ClosingDisclosure } from '../disclosures/schemas.js'
import { linesInBucket, findBucketMismatches } from '../tolerance/table.js'
import {
  ZERO_TOLERANCE_ALLOWANCE,
  TEN_PERCENT_RATE,
  TEN_PERCENT_WARNING_RATIO,
  APR_TOLERANCE,
  MONEY_SCALE,
  APR_SCALE,
} from './schemas.js'
import type { ComplianceReport, Violation } from './schemas.js'

export const FEE_DISPLAY_NAMES: Record<CostLine, string> = {
  origination_charges: 'Origination Charges',
  services_cannot_shop: 'Services Borrower Cannot Shop',
  services_can_shop: 'Services Borrower Can Shop',
  taxes_and_gov_fees: 'Taxes and Government Fees',
  prepaids: 'Prepaids',
  initial_escrow: 'Initial Escrow Payment at Closing',
  other_costs: 'Other Costs',
}

const usd = (value: number): string => value.toFixed(2)

const toMoneyUnits = (dollars: number): number => Math.round(dollars * MONEY_SCALE)
const toAprUnits = (points: number): number => Math.round(points * APR_SCALE)

const ALLOWANCE_UNITS = toMoneyUnits(ZERO_TOLERANCE_ALLOWANCE)
const APR_TOLERANCE_UNITS = toAprUnits(APR_TOLERANCE)
// diff > rate * le  <=>  diff * RATE_DENOMINATOR > le
const RATE_DENOMINATOR = Math.round(1 / TEN_PERCENT_RATE)
// diff > ratio * limit  <=>  diff * RATE_DENOMINATOR * 10 > le * WARNING_TENTHS
const WARNING_TENTHS = Math.round(TEN_PERCENT_WARNING_RATIO * 10)

export function compareDisclosures(le: LoanEstimate, cd: ClosingDisclosure): ComplianceReport {
  const violations: Violation[] = []
  const warnings: string[] = []

  for (const mismatch of findBucketMismatches(le.toleranceBuckets)) {
    warnings.push(
      `Loan Estimate labels ${mismatch.line} as ${mismatch.advisory}; ` +
        `evaluated as ${mismatch.regulatory}`,
    )
  }

  // ── Zero tolerance: no increase beyond one cent of rounding ──

  let zeroToleranceUnits = 0
  for (const line of linesInBucket('zero_tolerance')) {
    const leAmount = le.costs[line]
    const cdAmount = cd.costs[line]
    const deltaUnits = toMoneyUnits(cdAmount) - toMoneyUnits(leAmount)
    zeroToleranceUnits += Math.max(0, deltaUnits)

    if (deltaUnits > ALLOWANCE_UNITS) {
      const fee = FEE_DISPLAY_NAMES[line]
      const delta = deltaUnits / MONEY_SCALE
      violations.push({
        type: 'zero_tolerance',
        fee,
        leAmount,
        cdAmount,
        amountOver: delta,
        description: `${fee} increased by $${usd(delta)} (zero tolerance - no increase allowed)`,
      })
    }
  }

  // ── 10% tolerance: aggregate increase capped at 10% of the LE baseline ──

  let tenPercentDiffUnits = 0
  let tenPercentLimitUnits = 0
  for (const line of linesInBucket('ten_percent_tolerance')) {
    const leAmount = le.costs[line]
    const cdAmount = cd.costs[line]
    const leUnits = toMoneyUnits(leAmount)
    const diffUnits = Math.max(0, toMoneyUnits(cdAmount) - leUnits)
    tenPercentDiffUnits += diffUnits
    tenPercentLimitUnits += leUnits

    const limit = leUnits / (MONEY_SCALE * RATE_DENOMINATOR)
    const diff = diffUnits / MONEY_SCALE

    if (diffUnits * RATE_DENOMINATOR > leUnits) {
      const over = (diffUnits * RATE_DENOMINATOR - leUnits) / (MONEY_SCALE * RATE_DENOMINATOR)
      violations.push({
        type: '10_percent_tolerance',
        fee: FEE_DISPLAY_NAMES[line],
        leAmount,
        cdAmount,
        amountOver: over,
        limit,
        description: `10% tolerance exceeded by $${usd(over)}`,
      })
    } else if (diffUnits * RATE_DENOMINATOR * 10 > leUnits * WARNING_TENTHS) {
      warnings.push(
        `Services borrower can shop increased by $${usd(diff)}, ` +
          `approaching 10% limit of $${usd(limit)}`,
      )
    }
  }
  const tenPercentDiff = tenPercentDiffUnits / MONEY_SCALE
  const tenPercentLimit = tenPercentLimitUnits / (MONEY_SCALE * RATE_DENOMINATOR)

  // ── APR accuracy: symmetric, fixed 0.125 point threshold ──

  const aprDiffUnits = Math.abs(toAprUnits(cd.apr) - toAprUnits(le.apr))
  const aprDiff = aprDiffUnits / APR_SCALE
  if (aprDiffUnits > APR_TOLERANCE_UNITS) {
    violations.push({
      type: 'apr_accuracy',
      fee: 'APR',
      leAmount: le.apr,
      cdAmount: cd.apr,
      amountOver: (aprDiffUnits - APR_TOLERANCE_UNITS) / APR_SCALE,
      description: `APR changed by ${aprDiff.toFixed(3)}% (max allowed: ${APR_TOLERANCE}%)`,
    })
  }

  const isCompliant = violations.length === 0
  const summary = isCompliant
    ? `✓ COMPLIANT: Closing Disclosure is within TRID tolerance limits. ` +
      `Zero-tolerance items: no increase. ` +
      `10% tolerance items: $${usd(tenPercentDiff)} increase (limit: $${usd(tenPercentLimit)}). ` +
      `APR change: ${aprDiff.toFixed(3)}% (limit: ${APR_TOLERANCE}%).`
    : `✗ NOT COMPLIANT: ${violations.length} violation(s) found. Review required before closing.`

  return {
    isCompliant,
    violations,
    warnings,
    zeroToleranceDiff: zeroToleranceUnits / MONEY_SCALE,
    tenPercentDiff,
    tenPercentLimit,
    summary,
  }
}
