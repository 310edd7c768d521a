/**
 * Guided analysis prompts a calling agent can request.
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js'
import type { Prompt, GetPromptResult } from '@modelcontextprotocol/sdk/types.js'
import { buildLoanEstimateAnalysisPrompt, buildLoanComparisonPrompt } from '@trid-check/core'
import type { AnalysisPrompt } from '@trid-check/core'

export const PROMPTS: Prompt[] = [
  {
    name: 'analyze_loan_estimate',
    description: 'Structured workflow for analyzing a Loan Estimate',
    arguments: [
      {
        name: 'analysis_type',
        description: 'Type of analysis: quick, comprehensive, or compliance (default: comprehensive)',
        required: false,
      },
    ],
  },
  {
    name: 'compare_loan_options',
    description: 'Side-by-side comparison of several loan offers',
  },
]

function toResult(prompt: AnalysisPrompt): GetPromptResult {
  return {
    description: prompt.description,
    messages: [{ role: 'user', content: { type: 'text', text: prompt.text } }],
  }
}

export function getPrompt(name: string, args: Record<string, string> | undefined): GetPromptResult {
  switch (name) {
    case 'analyze_loan_estimate':
      return toResult(buildLoanEstimateAnalysisPrompt(args ?? {}))
    case 'compare_loan_options':
      return toResult(buildLoanComparisonPrompt())
    default:
      throw new McpError(ErrorCode.InvalidParams, `Unknown prompt: ${name}`)
  }
}
