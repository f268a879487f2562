/**
 * Certification Relevance
 *
 * How strongly a page's text refers to the certification being searched
 * for. Added as a bonus to every category score and reused by the quality
 * scorer's relevance dimension.
 */

import type { CertificationQuery } from '../types.js'
import type { SignalWeights } from './signals.js'

/** Issuing-body words too common to identify a body */
const GENERIC_BODY_WORDS = new Set(['authority', 'administration', 'department', 'ministry'])

export interface RelevanceTerms {
  name: string
  /** Uppercase runs of 2+ letters in the issuing body, lowercased */
  acronyms: string[]
  /** Issuing-body words of 4+ characters, lowercased */
  bodyKeywords: string[]
  region: string
}

export interface RelevanceBreakdown {
  score: number
  nameMatch: boolean
  acronyms: string[]
  bodyKeywords: string[]
  regionMatch: boolean
}

export function relevanceTerms(query: CertificationQuery): RelevanceTerms {
  return {
    name: query.name.trim().toLowerCase(),
    acronyms: issuingBodyAcronyms(query.issuingBody),
    bodyKeywords: issuingBodyKeywords(query.issuingBody),
    region: query.region.trim().toLowerCase(),
  }
}

/**
 * Acronyms are read before lowercasing: "Food Safety Authority (FSA)" gives ['fsa'].
 */
export function issuingBodyAcronyms(issuingBody: string): string[] {
  return unique(Array.from(issuingBody.matchAll(/\b[A-Z]{2,}\b/g), match => match[0].toLowerCase()))
}

export function issuingBodyKeywords(issuingBody: string): string[] {
  return unique(Array.from(issuingBody.matchAll(/\b\w{4,}\b/g), match => match[0].toLowerCase())).filter(
    word => !GENERIC_BODY_WORDS.has(word)
  )
}

/**
 * Score lowercased page text against the query terms.
 */
export function certificationRelevance(
  text: string,
  terms: RelevanceTerms,
  weights: SignalWeights
): RelevanceBreakdown {
  const nameMatch = terms.name.length > 0 && text.includes(terms.name)
  const acronyms = terms.acronyms.filter(acronym => text.includes(acronym))
  const bodyKeywords = terms.bodyKeywords.filter(word => text.includes(word))
  const regionMatch = terms.region.length > 0 && text.includes(terms.region)

  const score =
    (nameMatch ? weights.nameMatch : 0) +
    acronyms.length * weights.acronym +
    bodyKeywords.length * weights.bodyKeyword +
    (regionMatch ? weights.regionMatch : 0)

  return { score, nameMatch, acronyms, bodyKeywords, regionMatch }
}

/**
 * Highest relevance any page could reach for this query.
 */
export function maxRelevance(terms: RelevanceTerms, weights: SignalWeights): number {
  return (
    (terms.name ? weights.nameMatch : 0) +
    terms.acronyms.length * weights.acronym +
    terms.bodyKeywords.length * weights.bodyKeyword +
    (terms.region ? weights.regionMatch : 0)
  )
}

function unique(values: string[]): string[] {
  return [...new Set(values)]
}
