/**
 * Common utilities: shared types, Result pattern, error handling.
 */

export { Ok, Err, unwrap, isOk, isErr, mapResult } from './result.js'
export type { Result } from './result.js'

export { TridError } from './errors.js'
export type { ErrorCode, ErrorReason, SecurityReason, FormatReason, TransportReason } from './errors.js'

export { CurrencySchema, PercentageSchema, DateStringSchema, schemaViolationFrom } from './schemas.js'
