/**
 * Disclosure documents: Loan Estimate and Closing Disclosure models,
 * their validating constructors and wire serialisation.
 */

export { COST_LINES, isCostLine, totalClosingCosts } from './cost-lines.js'
export type { CostLine, CostLines } from './cost-lines.js'

export {
  LoanEstimateFieldsSchema,
  ClosingDisclosureFieldsSchema,
  MIN_LOAN_AMOUNT,
  MAX_LOAN_AMOUNT,
  DEFAULT_LOAN_TERM_MONTHS,
} from './schemas.js'
export type {
  LoanEstimate,
  ClosingDisclosure,
  LoanEstimateFields,
  ClosingDisclosureFields,
} from './schemas.js'

export { parseLoanEstimate, parseClosingDisclosure } from './parse.js'

export { serializeLoanEstimate, serializeClosingDisclosure } from './serialization.js'
export type { SerializedLoanEstimate, SerializedClosingDisclosure } from './serialization.js'
