/**
 * URL Normalization Utilities
 *
 * Dedup key rules for discovered pages:
 * 1. Scheme, lowercase host, path only (query and fragment dropped)
 * 2. Trailing slash ignored (except the root path)
 * 3. Default ports dropped
 * 4. Relative URLs resolved against the site root
 */

import { get as getPublicSuffixDomain } from 'psl'

/**
 * Normalize a URL into the key used to deduplicate pages.
 *
 * @throws TypeError if the URL cannot be parsed
 */
export function normalizeUrl(url: string, base?: string): string {
  const parsed = base ? new URL(url, base) : new URL(url)

  parsed.hostname = parsed.hostname.toLowerCase()
  parsed.search = ''
  parsed.hash = ''

  if (parsed.pathname !== '/' && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.replace(/\/+$/, '') || '/'
  }

  return parsed.toString()
}

/**
 * Like normalizeUrl, but returns null instead of throwing.
 */
export function tryNormalizeUrl(url: string, base?: string): string | null {
  try {
    return normalizeUrl(url, base)
  } catch {
    return null
  }
}

/**
 * Validate that a URL is absolute and uses http or https.
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return parsed.protocol === 'http:' || parsed.protocol === 'https:'
  } catch {
    return false
  }
}

export function isHttps(url: string): boolean {
  try {
    return new URL(url).protocol === 'https:'
  } catch {
    return false
  }
}

export function getHost(url: string): string {
  return new URL(url).host.toLowerCase()
}

/**
 * Lowercased path of a URL, or '' when it cannot be parsed.
 */
export function getPath(url: string): string {
  try {
    return decodeURIComponent(new URL(url).pathname).toLowerCase()
  } catch {
    return ''
  }
}

/**
 * Extract the registrable domain (eTLD+1) from a URL, so that
 * www.fssai.gov.in and foscos.fssai.gov.in count as one site.
 */
export function getRegistrableDomain(url: string): string {
  const hostname = new URL(url).hostname.toLowerCase()
  return getPublicSuffixDomain(hostname) ?? hostname
}

/**
 * True when the URL belongs to the given registrable domain.
 */
export function isSameSite(url: string, registrableDomain: string): boolean {
  try {
    return getRegistrableDomain(url) === registrableDomain
  } catch {
    return false
  }
}
