import { describe, it, expect } from 'vitest'
import { Ok, Err, unwrap, isOk, isErr, mapResult, TridError } from '../../src/common/index.js'

describe('Result', () => {
  it('Ok wraps a value', () => {
    const result = Ok(42)
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value).toBe(42)
  })

  it('Err wraps an error', () => {
    const result = Err(TridError.schema('apr', 'Invalid apr'))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('SCHEMA_VIOLATION')
      expect(result.error.field).toBe('apr')
    }
  })

  it('unwrap returns value for Ok', () => {
    expect(unwrap(Ok('hello'))).toBe('hello')
  })

  it('unwrap throws the TridError for Err', () => {
    expect(() => unwrap(Err(TridError.unknownOperation('nope')))).toThrow('Unknown tool: nope')
  })

  it('unwrap throws with stringified error for non-Error', () => {
    expect(() => unwrap(Err('string error'))).toThrow('string error')
  })

  it('isOk and isErr narrow', () => {
    expect(isOk(Ok(10))).toBe(true)
    expect(isErr(Ok(10))).toBe(false)
    expect(isErr(Err('fail'))).toBe(true)
  })

  it('mapResult transforms Ok and passes Err through', () => {
    const doubled = mapResult(Ok(21), (n) => n * 2)
    expect(doubled).toEqual({ ok: true, value: 42 })

    const failure = Err(TridError.format('NOT_PDF_CONTENT', 'not a pdf'))
    const mapped = mapResult(failure, (n: number) => n * 2)
    expect(mapped).toBe(failure)
  })
})

describe('TridError', () => {
  it('carries code and reason from the factories', () => {
    const security = TridError.security('DOMAIN_NOT_ALLOWED', 'Domain not allowed: evil.example')
    expect(security).toBeInstanceOf(Error)
    expect(security.name).toBe('TridError')
    expect(security.code).toBe('SECURITY_VIOLATION')
    expect(security.reason).toBe('DOMAIN_NOT_ALLOWED')
    expect(security.field).toBeUndefined()

    const transport = TridError.transport('TIMEOUT', 'Download timed out after 30s')
    expect(transport.code).toBe('TRANSPORT_FAILURE')
    expect(transport.reason).toBe('TIMEOUT')
    expect(transport.message).toBe('Download timed out after 30s')
  })
})
