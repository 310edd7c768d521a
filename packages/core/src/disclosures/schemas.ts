/**
 * Zod schemas for the flat field maps a Field Extractor yields, and the typed
 * disclosure entities built from them.
 */

import { z } from 'zod'
import { CurrencySchema, PercentageSchema, DateStringSchema } from '../common/index.js'
import { isCostLine } from './cost-lines.js'
import type { CostLine, CostLines } from './cost-lines.js'
import { normalizeBucketTag } from '../tolerance/table.js'
import type { ToleranceBucket } from '../tolerance/table.js'

export const MIN_LOAN_AMOUNT = 1_000
export const MAX_LOAN_AMOUNT = 100_000_000
export const DEFAULT_LOAN_TERM_MONTHS = 360

const LoanAmountSchema = z
  .number()
  .finite()
  .min(MIN_LOAN_AMOUNT, 'Loan amount too small (< $1,000)')
  .lt(MAX_LOAN_AMOUNT, 'Loan amount must be below $100,000,000')

// Empty sections are omitted by extraction, so lines default to zero.
const CostLineSchema = CurrencySchema.default(0)

const LoanTermsFields = {
  loan_amount: LoanAmountSchema,
  interest_rate: PercentageSchema,
  apr: PercentageSchema,
  monthly_payment: z.number().finite().positive(),
}

const CostLineFields = {
  origination_charges: CostLineSchema,
  services_cannot_shop: CostLineSchema,
  services_can_shop: CostLineSchema,
  taxes_and_gov_fees: CostLineSchema,
  prepaids: CostLineSchema,
  initial_escrow: CostLineSchema,
  other_costs: CostLineSchema,
}

const ToleranceBucketsFieldSchema = z
  .record(z.string())
  .superRefine((buckets, ctx) => {
    for (const [line, tag] of Object.entries(buckets)) {
      if (!isCostLine(line)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown cost line: ${line}`,
          path: [line],
        })
      } else if (normalizeBucketTag(tag) === null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown tolerance bucket: ${tag}`,
          path: [line],
        })
      }
    }
  })

export const LoanEstimateFieldsSchema = z.object({
  ...LoanTermsFields,
  ...CostLineFields,
  lender_name: z.string().nullable().optional(),
  loan_term_months: z.number().int().min(1).max(480).default(DEFAULT_LOAN_TERM_MONTHS),
  property_address: z.string().nullable().optional(),
  borrower_name: z.string().nullable().optional(),
  tolerance_buckets: ToleranceBucketsFieldSchema.optional(),
})

export type LoanEstimateFields = z.input<typeof LoanEstimateFieldsSchema>

export const ClosingDisclosureFieldsSchema = z.object({
  ...LoanTermsFields,
  ...CostLineFields,
  cash_to_close: z.number().finite(),
  closing_date: DateStringSchema.nullable().optional(),
})

export type ClosingDisclosureFields = z.input<typeof ClosingDisclosureFieldsSchema>

// ── Entities ──

interface LoanTerms {
  readonly loanAmount: number
  readonly interestRate: number
  readonly apr: number
  readonly monthlyPayment: number
  readonly costs: CostLines
}

export interface LoanEstimate extends LoanTerms {
  readonly lenderName: string | null
  readonly loanTermMonths: number
  readonly propertyAddress: string | null
  readonly borrowerName: string | null
  /** Display metadata only. The comparator reads the regulatory table instead. */
  readonly toleranceBuckets: Readonly<Record<CostLine, ToleranceBucket>>
}

export interface ClosingDisclosure extends LoanTerms {
  readonly cashToClose: number
  readonly closingDate: string | null
}
