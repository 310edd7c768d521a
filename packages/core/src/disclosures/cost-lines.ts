/**
 * The seven closing-cost lines shared by the Loan Estimate and Closing Disclosure.
 */

/** Fixed enumeration order, also the order violations are detected in. */
export const COST_LINES = [
  'origination_charges',
  'services_cannot_shop',
  'services_can_shop',
  'taxes_and_gov_fees',
  'prepaids',
  'initial_escrow',
  'other_costs',
] as const

export type CostLine = typeof COST_LINES[number]

export type CostLines = Readonly<Record<CostLine, number>>

export function isCostLine(name: string): name is CostLine {
  return COST_LINES.some((line) => line === name)
}

/** Sum of the seven stored lines. Computed on every call, never cached. */
export function totalClosingCosts(costs: CostLines): number {
  return COST_LINES.reduce((sum, line) => sum + costs[line], 0)
}
