import { describe, it, expect } from 'vitest'
import {
  createGatewayConfig,
  loadGatewayConfig,
  parseDomainList,
  DEFAULT_MAX_PDF_BYTES,
} from '../src/documents/config.js'

describe('parseDomainList', () => {
  it('trims, lower-cases and drops blanks', () => {
    expect(parseDomainList(' Example.com , ,docs.example.com:8443 ')).toEqual([
      'example.com',
      'docs.example.com:8443',
    ])
  })
})

describe('createGatewayConfig', () => {
  it('fills defaults', () => {
    const config = createGatewayConfig()
    expect([...config.allowedDomains]).toEqual(['storage.googleapis.com', 's3.amazonaws.com'])
    expect(config.maxPdfBytes).toBe(DEFAULT_MAX_PDF_BYTES)
    expect(config.timeoutMs).toBe(30_000)
    expect(config.maxRedirects).toBe(5)
  })

  it('converts the timeout to milliseconds', () => {
    expect(createGatewayConfig({ timeoutSeconds: 0.25 }).timeoutMs).toBe(250)
  })

  it('caps the timeout at the longest timer delay', () => {
    expect(createGatewayConfig({ timeoutSeconds: 3_000_000 }).timeoutMs).toBe(2_147_483_647)
  })

  it('is frozen', () => {
    expect(Object.isFrozen(createGatewayConfig())).toBe(true)
  })
})

describe('loadGatewayConfig', () => {
  it('uses defaults for an empty environment', () => {
    const result = loadGatewayConfig({})
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.maxPdfBytes).toBe(10_485_760)
    expect(result.value.timeoutMs).toBe(30_000)
    expect(result.value.allowedDomains.has('s3.amazonaws.com')).toBe(true)
  })

  it('treats blank variables as unset', () => {
    const result = loadGatewayConfig({ ALLOWED_DOMAINS: '  ', MAX_PDF_SIZE: '', DOWNLOAD_TIMEOUT: '' })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.allowedDomains.size).toBe(2)
    expect(result.value.maxPdfBytes).toBe(10_485_760)
  })

  it('reads every variable', () => {
    const result = loadGatewayConfig({
      ALLOWED_DOMAINS: 'docs.example.com, files.example.org',
      MAX_PDF_SIZE: '2048',
      DOWNLOAD_TIMEOUT: '2.5',
    })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect([...result.value.allowedDomains]).toEqual(['docs.example.com', 'files.example.org'])
    expect(result.value.maxPdfBytes).toBe(2048)
    expect(result.value.timeoutMs).toBe(2500)
  })

  it('rejects an allow-list with no hosts', () => {
    const result = loadGatewayConfig({ ALLOWED_DOMAINS: ' , ' })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('SCHEMA_VIOLATION')
    expect(result.error.field).toBe('ALLOWED_DOMAINS')
    expect(result.error.message).toBe('Invalid ALLOWED_DOMAINS: must name at least one host')
  })

  it('rejects a non-numeric size', () => {
    const result = loadGatewayConfig({ MAX_PDF_SIZE: 'ten megabytes' })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.field).toBe('MAX_PDF_SIZE')
  })

  it('rejects a fractional size', () => {
    const result = loadGatewayConfig({ MAX_PDF_SIZE: '10.5' })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.field).toBe('MAX_PDF_SIZE')
  })

  it('rejects a timeout longer than a timer can hold', () => {
    const result = loadGatewayConfig({ DOWNLOAD_TIMEOUT: '3000000' })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.field).toBe('DOWNLOAD_TIMEOUT')
    expect(result.error.message).toBe('Invalid DOWNLOAD_TIMEOUT: must be at most 2147483 seconds')
  })

  it('accepts the longest timeout a timer can hold', () => {
    const result = loadGatewayConfig({ DOWNLOAD_TIMEOUT: '2147483' })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.timeoutMs).toBe(2_147_483_000)
  })

  it('rejects a non-positive timeout', () => {
    const result = loadGatewayConfig({ DOWNLOAD_TIMEOUT: '0' })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.field).toBe('DOWNLOAD_TIMEOUT')
  })
})
