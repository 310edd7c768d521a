/**
 * Field catalogues for the two disclosure documents, served as reference
 * resources. Bounds mirror the zod schemas in disclosures/schemas.ts.
 */

import { COST_LINES } from '../disclosures/cost-lines.js'
import { MIN_LOAN_AMOUNT, MAX_LOAN_AMOUNT, DEFAULT_LOAN_TERM_MONTHS } from '../disclosures/schemas.js'
import { TOLERANCE_BUCKETS, linesInBucket } from '../tolerance/table.js'
import type { ToleranceBucket } from '../tolerance/table.js'
import type { CostLine } from '../disclosures/cost-lines.js'

export interface FieldSpec {
  type: 'currency' | 'percentage' | 'integer' | 'string' | 'date' | 'mapping'
  required: boolean
  min?: number
  exclusiveMin?: boolean
  max?: number
  exclusiveMax?: boolean
  default?: number | string
  description: string
}

const LOAN_TERM_FIELDS: Record<string, FieldSpec> = {
  loan_amount: {
    type: 'currency',
    required: true,
    min: MIN_LOAN_AMOUNT,
    max: MAX_LOAN_AMOUNT,
    exclusiveMax: true,
    description: 'Total loan amount in USD',
  },
  interest_rate: { type: 'percentage', required: true, min: 0, max: 100, description: 'Note rate in percent' },
  apr: { type: 'percentage', required: true, min: 0, max: 100, description: 'Annual Percentage Rate' },
  monthly_payment: {
    type: 'currency',
    required: true,
    min: 0,
    exclusiveMin: true,
    description: 'Monthly principal and interest, greater than zero',
  },
}

function costLineFields(): Record<string, FieldSpec> {
  const fields: Record<string, FieldSpec> = {}
  for (const line of COST_LINES) {
    fields[line] = { type: 'currency', required: false, min: 0, default: 0, description: `Closing cost line ${line}` }
  }
  return fields
}

function toleranceRules(): Record<ToleranceBucket, CostLine[]> {
  return {
    zero_tolerance: linesInBucket('zero_tolerance'),
    ten_percent_tolerance: linesInBucket('ten_percent_tolerance'),
    unlimited_tolerance: linesInBucket('unlimited_tolerance'),
  }
}

export function loanEstimateSchemaDocument(): Record<string, unknown> {
  return {
    schema: 'Loan Estimate',
    fields: {
      ...LOAN_TERM_FIELDS,
      ...costLineFields(),
      lender_name: { type: 'string', required: false, description: 'Creditor name' },
      loan_term_months: {
        type: 'integer',
        required: false,
        min: 1,
        max: 480,
        default: DEFAULT_LOAN_TERM_MONTHS,
        description: 'Loan term in months',
      },
      property_address: { type: 'string', required: false, description: 'Subject property' },
      borrower_name: { type: 'string', required: false, description: 'Primary borrower' },
      tolerance_buckets: {
        type: 'mapping',
        required: false,
        description: `Advisory cost line to bucket labels (${TOLERANCE_BUCKETS.join(', ')}); display only`,
      },
    },
    tolerance_rules: toleranceRules(),
  }
}

export function closingDisclosureSchemaDocument(): Record<string, unknown> {
  return {
    schema: 'Closing Disclosure',
    fields: {
      ...LOAN_TERM_FIELDS,
      ...costLineFields(),
      cash_to_close: { type: 'currency', required: true, description: 'Cash due from borrower at closing' },
      closing_date: { type: 'date', required: false, description: 'Closing date, YYYY-MM-DD' },
    },
  }
}
