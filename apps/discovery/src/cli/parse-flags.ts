import type { DiscoverCommandArgs } from './commands/discover.js'

export type FlagKind = 'string' | 'integer' | 'boolean'

export type FlagTable = Readonly<Record<string, FlagKind>>

export const DISCOVER_FLAGS: FlagTable = {
  name: 'string',
  'issuing-body': 'string',
  region: 'string',
  url: 'string',
  description: 'string',
  out: 'string',
  search: 'string',
  'auto-search': 'boolean',
  'no-crawl': 'boolean',
  summary: 'boolean',
  'max-pages': 'integer',
  timeout: 'integer',
  verbose: 'boolean',
  help: 'boolean',
}

export interface ParsedFlags {
  strings: Map<string, string>
  integers: Map<string, number>
  switches: Set<string>
  /** One message per unknown flag or bad value */
  errors: string[]
}

/**
 * Parse `--key value` pairs against a flag table. Consecutive non-flag
 * tokens join into one value, so names with spaces need no quoting.
 * Tokens before the first flag are ignored.
 */
export function parseFlags(argv: string[], table: FlagTable): ParsedFlags {
  const parsed: ParsedFlags = {
    strings: new Map(),
    integers: new Map(),
    switches: new Set(),
    errors: [],
  }

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }
    i = j - 1
    const value = valueTokens.join(' ')

    if (!Object.hasOwn(table, key)) {
      parsed.errors.push(`Unknown flag --${key}`)
      continue
    }

    switch (table[key]) {
      case 'boolean':
        if (value) {
          parsed.errors.push(`--${key} takes no value, got "${value}"`)
        } else {
          parsed.switches.add(key)
        }
        break
      case 'string':
        if (value) {
          parsed.strings.set(key, value)
        } else {
          parsed.errors.push(`--${key} needs a value`)
        }
        break
      case 'integer':
        if (/^\d+$/.test(value)) {
          parsed.integers.set(key, Number.parseInt(value, 10))
        } else {
          parsed.errors.push(`--${key} expects a whole number, got "${value}"`)
        }
        break
    }
  }

  return parsed
}

/**
 * Missing required flags come back as '' and are reported by the command.
 */
export function discoverArgsFrom(parsed: ParsedFlags): DiscoverCommandArgs {
  const { strings, integers, switches } = parsed
  return {
    name: strings.get('name') ?? '',
    issuingBody: strings.get('issuing-body') ?? '',
    region: strings.get('region') ?? '',
    url: strings.get('url') ?? '',
    description: strings.get('description'),
    out: strings.get('out'),
    crawl: !switches.has('no-crawl'),
    search: strings.get('search'),
    autoSearch: switches.has('auto-search'),
    maxPages: integers.get('max-pages'),
    timeoutSeconds: integers.get('timeout'),
    summary: switches.has('summary'),
  }
}
