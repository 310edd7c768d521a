/**
 * Wire shapes for disclosure entities: snake_case, matching the field map keys.
 */

import { totalClosingCosts } from './cost-lines.js'
import type { CostLine, CostLines } from './cost-lines.js'
import type { ToleranceBucket } from '../tolerance/table.js'
import type { LoanEstimate, ClosingDisclosure } from './schemas.js'

interface SerializedLoanTerms extends Record<CostLine, number> {
  loan_amount: number
  interest_rate: number
  apr: number
  monthly_payment: number
  total_closing_costs: number
}

export interface SerializedLoanEstimate extends SerializedLoanTerms {
  lender_name: string | null
  loan_term_months: number
  property_address: string | null
  borrower_name: string | null
  tolerance_buckets: Record<CostLine, ToleranceBucket>
}

export interface SerializedClosingDisclosure extends SerializedLoanTerms {
  cash_to_close: number
  closing_date: string | null
}

function serializeLoanTerms(doc: {
  loanAmount: number
  interestRate: number
  apr: number
  monthlyPayment: number
  costs: CostLines
}): SerializedLoanTerms {
  return {
    loan_amount: doc.loanAmount,
    interest_rate: doc.interestRate,
    apr: doc.apr,
    monthly_payment: doc.monthlyPayment,
    total_closing_costs: totalClosingCosts(doc.costs),
    ...doc.costs,
  }
}

export function serializeLoanEstimate(le: LoanEstimate): SerializedLoanEstimate {
  return {
    ...serializeLoanTerms(le),
    lender_name: le.lenderName,
    loan_term_months: le.loanTermMonths,
    property_address: le.propertyAddress,
    borrower_name: le.borrowerName,
    tolerance_buckets: { ...le.toleranceBuckets },
  }
}

export function serializeClosingDisclosure(cd: ClosingDisclosure): SerializedClosingDisclosure {
  return {
    ...serializeLoanTerms(cd),
    cash_to_close: cd.cashToClose,
    closing_date: cd.closingDate,
  }
}
