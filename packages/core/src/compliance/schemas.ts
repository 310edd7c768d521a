/**
 * Compliance report types and the fixed regulatory thresholds.
 */

export const ZERO_TOLERANCE_ALLOWANCE = 0.01
export const TEN_PERCENT_RATE = 0.10
/** Advisory only: fraction of the 10% limit past which a warning is raised. */
export const TEN_PERCENT_WARNING_RATIO = 0.8
/** Percentage points. */
export const APR_TOLERANCE = 0.125

/**
 * Comparisons run on integers so binary float noise cannot cross a boundary.
 * Dollar amounts are scaled to ten-thousandths of a dollar, APRs to
 * hundred-thousandths of a point.
 */
export const MONEY_SCALE = 10_000
export const APR_SCALE = 100_000

export type ViolationType = 'zero_tolerance' | '10_percent_tolerance' | 'apr_accuracy'

export interface Violation {
  type: ViolationType
  fee: string
  leAmount: number
  cdAmount: number
  /** Dollars, or percentage points for APR. */
  amountOver: number
  limit?: number
  description: string
}

export interface ComplianceReport {
  isCompliant: boolean
  /** Detection order: zero-tolerance lines, then the 10% line, then APR. */
  violations: Violation[]
  warnings: string[]
  zeroToleranceDiff: number
  tenPercentDiff: number
  tenPercentLimit: number
  summary: string
}
