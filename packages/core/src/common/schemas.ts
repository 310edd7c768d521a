/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'
import { TridError } from './errors.js'

/** Non-negative dollar amount. */
export const CurrencySchema = z.number().finite().nonnegative()

/** Percentage expressed in points (6.5 means 6.5%). */
export const PercentageSchema = z.number().finite().min(0).max(100)

export const DateStringSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD')

/**
 * Convert the first Zod issue into a schema violation naming the offending field.
 */
export function schemaViolationFrom(error: z.ZodError): TridError {
  const issue = error.issues[0]
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)'
  const message = issue ? `Invalid ${field}: ${issue.message}` : `Invalid ${field}`
  return TridError.schema(field, message)
}
