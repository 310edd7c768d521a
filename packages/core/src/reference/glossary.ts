/**
 * Mortgage terminology served to calling agents.
 */

export const GLOSSARY: Readonly<Record<string, string>> = {
  APR: 'Annual Percentage Rate - The cost of credit as a yearly rate, including interest and certain fees.',
  TRID: 'TILA-RESPA Integrated Disclosure - Federal regulation requiring specific mortgage disclosures.',
  LE: 'Loan Estimate - Initial disclosure provided within 3 days of application.',
  CD: 'Closing Disclosure - Final disclosure provided at least 3 days before closing.',
  MISMO: 'Mortgage Industry Standards Maintenance Organization - Sets data standards.',
  ESCROW: 'Funds held by third party for taxes and insurance.',
  ORIGINATION: 'Process of creating a new loan; includes lender fees.',
  TOLERANCE: 'Limits on how much fees can increase from LE to CD.',
}

export function glossaryTerms(): string[] {
  return Object.keys(GLOSSARY)
}

/** Case-insensitive lookup. Unknown terms answer with the available list. */
export function lookupGlossaryTerm(term: string): { found: boolean; text: string } {
  const key = term.trim().toUpperCase()
  const definition = Object.prototype.hasOwnProperty.call(GLOSSARY, key) ? GLOSSARY[key] : undefined
  if (definition) return { found: true, text: `${key}: ${definition}` }
  return {
    found: false,
    text: `Term not found: ${term}. Available terms: ${glossaryTerms().join(', ')}`,
  }
}
