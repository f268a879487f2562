/**
 * Categorization Signal Table
 *
 * Every category is bound to a vocabulary (patterns + exact keywords) loaded
 * from vocabulary.json, and every signal to a fixed weight. The vocabulary
 * file is validated on load: a missing or misspelled category key fails fast.
 */

import { z } from 'zod'
import type { ContentCategory } from '../types.js'
import rawVocabulary from './vocabulary.json' with { type: 'json' }

export interface SignalWeights {
  /** Per distinct vocabulary pattern found in the page text */
  pattern: number
  /** Per exact keyword present in the page text */
  keyword: number
  /** Per distinct vocabulary pattern found in the URL path */
  urlPath: number
  /** Per distinct vocabulary pattern found in the title */
  title: number
  /** Certification relevance bonus, added to every category */
  nameMatch: number
  acronym: number
  bodyKeyword: number
  regionMatch: number
}

export const DEFAULT_SIGNAL_WEIGHTS: Readonly<SignalWeights> = Object.freeze({
  pattern: 3,
  keyword: 5,
  urlPath: 8,
  title: 6,
  nameMatch: 5,
  acronym: 3,
  bodyKeyword: 1,
  regionMatch: 2,
})

/** The best score must exceed this for a page to be categorized */
export const DEFAULT_THRESHOLD = 10

/** Score at which confidence reaches 100 */
export const DEFAULT_CONFIDENCE_CEILING = 50

// ═══════════════════════════════════════════════════════════════════════════════
// Content-type indicators
// ═══════════════════════════════════════════════════════════════════════════════

export const INDICATOR_GROUPS = ['form', 'document', 'guideline', 'schedule', 'contact', 'overview'] as const

export type IndicatorGroup = (typeof INDICATOR_GROUPS)[number]

export interface IndicatorDefinition {
  /** Substrings; any one present counts the group once */
  terms: readonly string[]
  weight: number
  categories: readonly ContentCategory[]
}

export const CONTENT_TYPE_INDICATORS: Readonly<Record<IndicatorGroup, IndicatorDefinition>> = {
  form: {
    terms: ['form', 'application', 'submit', 'fill', 'complete'],
    weight: 4,
    categories: ['application_forms'],
  },
  document: {
    terms: ['.pdf', 'pdf', 'document', 'download'],
    weight: 3,
    categories: ['application_forms', 'training_materials'],
  },
  guideline: {
    terms: ['guideline', 'procedure', 'manual', 'instruction'],
    weight: 3,
    categories: ['audit_guidelines'],
  },
  schedule: {
    terms: ['schedule', 'tariff', 'timetable'],
    weight: 3,
    categories: ['fee_structures'],
  },
  contact: {
    terms: ['contact', 'address', 'phone', 'email', 'location'],
    weight: 2,
    categories: ['regional_offices'],
  },
  overview: {
    terms: ['overview', 'introduction', 'about', 'what is', 'definition'],
    weight: 2,
    categories: ['main_certification_pages'],
  },
}

// ═══════════════════════════════════════════════════════════════════════════════
// Vocabulary
// ═══════════════════════════════════════════════════════════════════════════════

export interface CategoryVocabulary {
  description: string
  /** Case-insensitive regular expressions */
  patterns: RegExp[]
  /** Lowercase substrings */
  keywords: string[]
}

const vocabularyEntrySchema = z.object({
  description: z.string().min(1),
  patterns: z.array(z.string().min(1)).min(1),
  keywords: z.array(z.string().min(1)).min(1),
})

const vocabularySchema = z
  .object({
    main_certification_pages: vocabularyEntrySchema,
    application_forms: vocabularyEntrySchema,
    training_materials: vocabularyEntrySchema,
    audit_guidelines: vocabularyEntrySchema,
    fee_structures: vocabularyEntrySchema,
    regional_offices: vocabularyEntrySchema,
  })
  .strict()

export type VocabularySource = z.input<typeof vocabularySchema>

/**
 * Validate and compile a vocabulary document.
 *
 * @throws ZodError on unknown or missing categories, SyntaxError on a bad pattern
 */
export function compileVocabulary(source: unknown): Record<ContentCategory, CategoryVocabulary> {
  const parsed = vocabularySchema.parse(source)

  return {
    main_certification_pages: compileEntry(parsed.main_certification_pages),
    application_forms: compileEntry(parsed.application_forms),
    training_materials: compileEntry(parsed.training_materials),
    audit_guidelines: compileEntry(parsed.audit_guidelines),
    fee_structures: compileEntry(parsed.fee_structures),
    regional_offices: compileEntry(parsed.regional_offices),
  }
}

function compileEntry(entry: z.output<typeof vocabularyEntrySchema>): CategoryVocabulary {
  return {
    description: entry.description,
    patterns: entry.patterns.map(pattern => new RegExp(pattern, 'i')),
    keywords: entry.keywords.map(keyword => keyword.toLowerCase()),
  }
}

export const DEFAULT_VOCABULARY = compileVocabulary(rawVocabulary)
