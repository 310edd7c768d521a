/**
 * Typed error class for compliance engine operations.
 */

export type ErrorCode =
  | 'SCHEMA_VIOLATION'
  | 'SECURITY_VIOLATION'
  | 'FORMAT_VIOLATION'
  | 'TRANSPORT_FAILURE'
  | 'UNKNOWN_OPERATION'

export type SecurityReason = 'INSECURE_SCHEME' | 'DOMAIN_NOT_ALLOWED' | 'NOT_PDF_PATH'

export type FormatReason = 'PAYLOAD_TOO_LARGE' | 'NOT_PDF_CONTENT'

export type TransportReason = 'TIMEOUT' | 'HTTP_STATUS' | 'NETWORK' | 'CANCELLED' | 'TOO_MANY_REDIRECTS'

export type ErrorReason = SecurityReason | FormatReason | TransportReason

export class TridError extends Error {
  readonly code: ErrorCode
  readonly reason?: ErrorReason
  /** Offending field or argument, for schema violations. */
  readonly field?: string

  constructor(code: ErrorCode, message: string, details: { reason?: ErrorReason; field?: string } = {}) {
    super(message)
    this.name = 'TridError'
    this.code = code
    this.reason = details.reason
    this.field = details.field
  }

  static schema(field: string, message: string): TridError {
    return new TridError('SCHEMA_VIOLATION', message, { field })
  }

  static security(reason: SecurityReason, message: string): TridError {
    return new TridError('SECURITY_VIOLATION', message, { reason })
  }

  static format(reason: FormatReason, message: string): TridError {
    return new TridError('FORMAT_VIOLATION', message, { reason })
  }

  static transport(reason: TransportReason, message: string): TridError {
    return new TridError('TRANSPORT_FAILURE', message, { reason })
  }

  static unknownOperation(name: string): TridError {
    return new TridError('UNKNOWN_OPERATION', `Unknown tool: ${name}`)
  }
}
