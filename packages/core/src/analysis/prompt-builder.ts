/**
 * Analysis prompt builder: guided workflows a calling agent can request
 * for reviewing Loan Estimates and comparing loan offers.
 */

const VALID_ANALYSIS_TYPES = ['quick', 'comprehensive', 'compliance'] as const
export type AnalysisType = typeof VALID_ANALYSIS_TYPES[number]

export function validateAnalysisType(input: unknown): AnalysisType {
  const s = typeof input === 'string' ? input.trim().toLowerCase() : ''
  const match = VALID_ANALYSIS_TYPES.find((t) => t === s)
  return match ?? 'comprehensive'
}

const ANALYSIS_INSTRUCTIONS: Record<AnalysisType, string> = {
  quick: `Review this Loan Estimate and provide a brief summary:

1. Key loan terms (amount, rate, APR, monthly payment)
2. Total closing costs
3. Any unusual items that stand out

Keep response concise (3-4 sentences).`,
  comprehensive: `Perform a comprehensive Loan Estimate analysis:

## 1. Loan Terms Analysis
- Loan amount and property value (LTV ratio)
- Interest rate competitiveness
- APR vs interest rate (are fees reasonable?)
- Monthly payment affordability
- Loan term appropriateness

## 2. Closing Costs Breakdown
Review each section:
- Origination charges (A): Are points/fees justified?
- Services borrower cannot shop (B): Reasonable for market?
- Services borrower can shop (C): Opportunity to save?
- Taxes and government fees (E): Accurate for jurisdiction?
- Prepaids (F): Correctly calculated?
- Initial escrow (G): Sufficient cushion?
- Other costs (H): Any surprises?

## 3. Tolerance Bucket Analysis
- Identify all zero-tolerance fees
- Identify 10% tolerance fees
- Explain what can change before closing

## 4. Red Flags & Concerns
- Unusually high fees
- Missing disclosures
- APR significantly higher than rate

## 5. Borrower Questions
Suggest 3-5 questions borrower should ask lender

## 6. Recommendations
- Should borrower shop around?
- Are there opportunities to negotiate?
- Overall assessment: good/fair/poor deal?

Format as a detailed report suitable for borrower consultation.`,
  compliance: `TRID Compliance Review Checklist:

## Required Disclosures
- [ ] Loan terms clearly stated
- [ ] Itemization of closing costs
- [ ] Cash to close calculation
- [ ] Comparisons section
- [ ] Other considerations section
- [ ] Contact information

## Timing Compliance
- [ ] Provided within 3 business days of application
- [ ] At least 7 business days before closing
- [ ] Received by borrower (not just sent)

## Accuracy Requirements
- [ ] APR within 0.125% of final APR
- [ ] Tolerance buckets correctly assigned
- [ ] All required fees disclosed

## Consumer Protections
- [ ] Loan features clearly explained
- [ ] Risks disclosed (balloon, prepayment penalty, etc.)
- [ ] Ability to repay considered

Provide compliance assessment with any deficiencies noted.`,
}

export interface AnalysisPrompt {
  description: string
  text: string
}

export function buildLoanEstimateAnalysisPrompt(inputs: Record<string, unknown>): AnalysisPrompt {
  const analysisType = validateAnalysisType(inputs.analysis_type)
  return {
    description: `Loan Estimate analysis (${analysisType})`,
    text: ANALYSIS_INSTRUCTIONS[analysisType],
  }
}

export function buildLoanComparisonPrompt(): AnalysisPrompt {
  return {
    description: 'Side-by-side comparison of loan offers',
    text: `Compare these loan options side by side:

## Comparison Factors
1. **Interest Rate & APR**: Which is truly cheaper?
2. **Closing Costs**: Upfront vs ongoing costs
3. **Monthly Payment**: Affordability over loan term
4. **Loan Features**: ARM vs fixed, prepayment penalties, etc.
5. **Break-even Analysis**: If paying points, when do you break even?
6. **Total Cost**: What's paid over full loan term?
7. **Flexibility**: Refinance options, portability

## Recommendation
Based on:
- Borrower's likely time in home
- Financial situation
- Risk tolerance
- Market conditions

Which loan is the best choice and why?`,
  }
}
