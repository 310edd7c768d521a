/**
 * @trid-check/core
 *
 * Framework-agnostic TRID tolerance engine.
 * Provides disclosure models, tolerance classification, compliance comparison,
 * field extraction contracts and reference content. No I/O.
 */

export * from './common/index.js'
export * from './disclosures/index.js'
export * from './tolerance/index.js'
export * from './compliance/index.js'
export * from './extraction/index.js'
export * from './reference/index.js'
export * from './analysis/index.js'
