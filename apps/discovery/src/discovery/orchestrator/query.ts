import { z } from 'zod'
import { DiscoveryError, ERROR_CODES } from '../errors.js'
import type { CertificationQuery } from '../types.js'
import { isValidUrl } from '../utils/url.js'

const nonEmpty = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .trim()
    .min(1, `${field} must not be empty`)

export const certificationQuerySchema = z.object({
  name: nonEmpty('name'),
  issuingBody: nonEmpty('issuingBody'),
  region: nonEmpty('region'),
  officialLink: nonEmpty('officialLink').refine(isValidUrl, 'officialLink must be an absolute http(s) URL'),
  description: z.string().trim().optional(),
})

/**
 * Validate a certification descriptor and freeze it for the run.
 *
 * @throws DiscoveryError INVALID_QUERY listing every problem
 */
export function validateQuery(input: unknown): CertificationQuery {
  const parsed = certificationQuerySchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => issue.message)
    throw new DiscoveryError(ERROR_CODES.INVALID_QUERY, `Invalid certification query: ${issues.join('; ')}`, {
      issues,
    })
  }
  return Object.freeze(parsed.data)
}
