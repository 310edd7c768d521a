import { Ok, Err } from '@trid-check/core'
import type { Result, TridError } from '@trid-check/core'
import type { DocumentGateway } from './gateway.js'

/**
 * Validate both references, then download them concurrently. The first
 * failure aborts the sibling download and is the error reported.
 */
export async function fetchBoth(
  gateway: DocumentGateway,
  references: readonly [string, string],
): Promise<Result<[Uint8Array, Uint8Array]>> {
  for (const ref of references) {
    const validated = gateway.validateReference(ref)
    if (!validated.ok) return validated
  }

  const controller = new AbortController()
  const failure: { error?: TridError } = {}

  const fetchOne = async (ref: string): Promise<Uint8Array | undefined> => {
    const result = await gateway.fetchDocument(ref, controller.signal)
    if (result.ok) return result.value
    if (!failure.error) {
      failure.error = result.error
      controller.abort()
    }
    return undefined
  }

  const [first, second] = await Promise.all([fetchOne(references[0]), fetchOne(references[1])])
  if (failure.error) return Err(failure.error)
  if (!first || !second) {
    throw new Error('fetchBoth: download settled without a payload or an error')
  }
  return Ok([first, second])
}
