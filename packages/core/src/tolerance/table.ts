/**
 * Regulatory tolerance buckets for the closing-cost lines.
 *
 * TOLERANCE_TABLE is the single source of truth for the comparator. Bucket tags
 * carried on a Loan Estimate are display metadata and never feed back into it.
 */

import { COST_LINES } from '../disclosures/cost-lines.js'
import type { CostLine } from '../disclosures/cost-lines.js'

export const TOLERANCE_BUCKETS = ['zero_tolerance', 'ten_percent_tolerance', 'unlimited_tolerance'] as const
export type ToleranceBucket = typeof TOLERANCE_BUCKETS[number]

export const TOLERANCE_TABLE: Readonly<Record<CostLine, ToleranceBucket>> = Object.freeze({
  origination_charges: 'zero_tolerance',
  services_cannot_shop: 'zero_tolerance',
  services_can_shop: 'ten_percent_tolerance',
  taxes_and_gov_fees: 'unlimited_tolerance',
  prepaids: 'unlimited_tolerance',
  initial_escrow: 'unlimited_tolerance',
  other_costs: 'unlimited_tolerance',
})

const TAG_ALIASES: Record<string, ToleranceBucket> = {
  zero: 'zero_tolerance',
  zero_tolerance: 'zero_tolerance',
  '10_percent': 'ten_percent_tolerance',
  '10_percent_tolerance': 'ten_percent_tolerance',
  ten_percent: 'ten_percent_tolerance',
  ten_percent_tolerance: 'ten_percent_tolerance',
  unlimited: 'unlimited_tolerance',
  unlimited_tolerance: 'unlimited_tolerance',
}

export function bucketOf(line: CostLine): ToleranceBucket {
  return TOLERANCE_TABLE[line]
}

/** Lines assigned to `bucket`, in the fixed cost-line enumeration order. */
export function linesInBucket(bucket: ToleranceBucket): CostLine[] {
  return COST_LINES.filter((line) => TOLERANCE_TABLE[line] === bucket)
}

/** Map an upstream tag (canonical or short alias, any case) to a bucket; null if unrecognised. */
export function normalizeBucketTag(tag: string): ToleranceBucket | null {
  const key = tag.trim().toLowerCase()
  return Object.prototype.hasOwnProperty.call(TAG_ALIASES, key) ? TAG_ALIASES[key] : null
}

export interface BucketMismatch {
  line: CostLine
  advisory: ToleranceBucket
  regulatory: ToleranceBucket
}

/** Lines where advisory metadata disagrees with the regulatory table. */
export function findBucketMismatches(
  advisory: Readonly<Record<CostLine, ToleranceBucket>>,
): BucketMismatch[] {
  const mismatches: BucketMismatch[] = []
  for (const line of COST_LINES) {
    if (advisory[line] !== TOLERANCE_TABLE[line]) {
      mismatches.push({ line, advisory: advisory[line], regulatory: TOLERANCE_TABLE[line] })
    }
  }
  return mismatches
}
