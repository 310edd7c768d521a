/**
 * Reference content: glossary and disclosure field catalogues.
 */

export { GLOSSARY, glossaryTerms, lookupGlossaryTerm } from './glossary.js'
export { loanEstimateSchemaDocument, closingDisclosureSchemaDocument } from './disclosure-schemas.js'
export type { FieldSpec } from './disclosure-schemas.js'
