/**
 * Company number normalization.
 * Every lookup, cache key and graph cross-reference goes through here first.
 */

import { InvalidInputError } from './errors.ts'

const DIGITS_ONLY = /^\d{1,8}$/
// Scottish (SC), Northern Irish (NI), LLP (OC, SO, NC), R0 etc.
const PREFIXED = /^([A-Z][A-Z0-9])(\d{1,6})$/
// Already in registry form, including letter-suffixed numbers such as IP28746R
const CANONICAL = /^[A-Z0-9]{8}$/

/**
 * Normalize to the registry's 8-character form.
 * - Strip whitespace, uppercase
 * - Digits only: left-pad to 8
 * - Two-character prefix: keep it, pad the digits to 6
 * - Any other 8 letters and digits: unchanged
 */
export function normalizeCompanyNumber(input: string): string {
  const normalized = tryNormalizeCompanyNumber(input)
  if (!normalized) {
    throw new InvalidInputError(`Invalid company number: "${input}"`)
  }
  return normalized
}

export function tryNormalizeCompanyNumber(input: string | null | undefined): string | null {
  if (!input) return null

  const cleaned = input.replace(/\s+/g, '').toUpperCase()

  if (DIGITS_ONLY.test(cleaned)) {
    return cleaned.padStart(8, '0')
  }

  const match = cleaned.match(PREFIXED)
  if (match) {
    return match[1] + match[2].padStart(6, '0')
  }

  if (CANONICAL.test(cleaned)) {
    return cleaned
  }

  return null
}
