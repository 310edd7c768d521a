export { StubFieldExtractor } from './extractor.js'
export type { FieldExtractor, ExtractedFields } from './extractor.js'
