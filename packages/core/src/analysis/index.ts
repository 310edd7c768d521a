/**
 * Analysis module: prompt workflows for Loan Estimate review.
 */

export {
  buildLoanEstimateAnalysisPrompt,
  buildLoanComparisonPrompt,
  validateAnalysisType,
} from './prompt-builder.js'

export type { AnalysisType, AnalysisPrompt } from './prompt-builder.js'
