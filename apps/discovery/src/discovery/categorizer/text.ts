import * as cheerio from 'cheerio'
import type { PageContent, PageMetadata } from '../types.js'

/**
 * Visible text of an HTML document (scripts and styles dropped).
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html)
  $('script, style, noscript, template').remove()
  return $.root().text()
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

export interface TextSource {
  title: string
  description: string
  content?: PageContent
  metadata: PageMetadata
}

/**
 * Lowercased text every text signal is matched against: title, description,
 * body (markdown, else html stripped to text) and metadata title/description.
 */
export function buildTextBasis(source: TextSource): string {
  const parts: string[] = [source.title, source.description]

  const body = bodyText(source.content)
  if (body) parts.push(body)

  for (const key of ['title', 'description']) {
    const value = source.metadata[key]
    if (typeof value === 'string') parts.push(value)
  }

  return collapseWhitespace(parts.join(' ')).toLowerCase()
}

/**
 * Body text of fetched content, or '' when nothing was fetched.
 */
export function bodyText(content: PageContent | undefined): string {
  if (!content) return ''
  if (content.markdown) return content.markdown
  if (content.html) return htmlToText(content.html)
  if (content.rawHtml) return htmlToText(content.rawHtml)
  return ''
}
