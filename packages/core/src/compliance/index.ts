/**
 * Compliance module: TRID tolerance comparison of a Loan Estimate
 * against its Closing Disclosure.
 */

export { compareDisclosures, FEE_DISPLAY_NAMES } from './comparator.js'

export {
  ZERO_TOLERANCE_ALLOWANCE,
  TEN_PERCENT_RATE,
  TEN_PERCENT_WARNING_RATIO,
  APR_TOLERANCE,
  MONEY_SCALE,
  APR_SCALE,
} from './schemas.js'
export type { ComplianceReport, Violation, ViolationType } from './schemas.js'

export { serializeComplianceReport } from './serialization.js'
export type { SerializedComplianceReport, SerializedViolation } from './serialization.js'
