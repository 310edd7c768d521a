/**
 * Wire shape for compliance reports.
 */

import type { ComplianceReport, Violation, ViolationType } from './schemas.js'

export interface SerializedViolation {
  type: ViolationType
  fee: string
  le_amount: number
  cd_amount: number
  amount_over: number
  limit?: number
  description: string
}

export interface SerializedComplianceReport {
  is_compliant: boolean
  violations: SerializedViolation[]
  warnings: string[]
  zero_tolerance_diff: number
  ten_percent_diff: number
  ten_percent_limit: number
  summary: string
}

function serializeViolation(v: Violation): SerializedViolation {
  const out: SerializedViolation = {
    type: v.type,
    fee: v.fee,
    le_amount: v.leAmount,
    cd_amount: v.cdAmount,
    amount_over: v.amountOver,
    description: v.description,
  }
  if (v.limit !== undefined) out.limit = v.limit
  return out
}

export function serializeComplianceReport(report: ComplianceReport): SerializedComplianceReport {
  return {
    is_compliant: report.isCompliant,
    violations: report.violations.map(serializeViolation),
    warnings: [...report.warnings],
    zero_tolerance_diff: report.zeroToleranceDiff,
    ten_percent_diff: report.tenPercentDiff,
    ten_percent_limit: report.tenPercentLimit,
    summary: report.summary,
  }
}
