/**
 * Tolerance classifier: assigns each cost line to its regulatory bucket.
 */

export {
  TOLERANCE_BUCKETS,
  TOLERANCE_TABLE,
  bucketOf,
  linesInBucket,
  normalizeBucketTag,
  findBucketMismatches,
} from './table.js'

export type { ToleranceBucket, BucketMismatch } from './table.js'
