import { writeFile } from 'node:fs/promises'
import { loggers } from '../../config/logger.js'
import { loadDiscoveryConfig, withOverrides } from '../../config/discovery-config.js'
import type { DiscoveryConfig } from '../../config/discovery-config.js'
import { DiscoveryError, classifyError } from '../../discovery/errors.js'
import { exportJson, summarize } from '../../discovery/export.js'
import type { DiscoverySummary } from '../../discovery/export.js'
import { FirecrawlClient } from '../../discovery/fetch/firecrawl-client.js'
import { buildSearchTerm } from '../../discovery/mapper/structure-mapper.js'
import { DiscoveryOrchestrator } from '../../discovery/orchestrator/orchestrator.js'
import type { ScrapingCapability } from '../../discovery/types.js'
import type { Clock } from '../../discovery/utils/clock.js'

const log = loggers.cli

export interface DiscoverCommandArgs {
  name: string
  issuingBody: string
  region: string
  url: string
  description?: string
  /** Write the export document here instead of stdout */
  out?: string
  crawl: boolean
  search?: string
  /** Derive the filtered-map search term from the query */
  autoSearch: boolean
  maxPages?: number
  timeoutSeconds?: number
  /** Print only the summary */
  summary: boolean
}

export interface DiscoverCommandDeps {
  env?: NodeJS.ProcessEnv
  capability?: ScrapingCapability
  clock?: Clock
  print?: (text: string) => void
  writeOutput?: (path: string, contents: string) => Promise<void>
}

/**
 * @returns process exit code: 0 done, 2 bad input, 1 run failed
 */
export async function runDiscoverCommand(
  args: DiscoverCommandArgs,
  deps: DiscoverCommandDeps = {}
): Promise<number> {
  const print = deps.print ?? ((text: string) => console.log(text))
  const writeOutput = deps.writeOutput ?? ((path: string, contents: string) => writeFile(path, contents, 'utf8'))

  for (const [flag, value] of [
    ['--name <name>', args.name],
    ['--issuing-body <body>', args.issuingBody],
    ['--region <region>', args.region],
    ['--url <officialLink>', args.url],
  ] as const) {
    if (!value) {
      console.error(`Missing ${flag}`)
      return 2
    }
  }

  let config: DiscoveryConfig
  try {
    config = withOverrides(loadDiscoveryConfig(deps.env), {
      maxPages: args.maxPages,
      timeoutSeconds: args.timeoutSeconds,
    })
  } catch (error) {
    if (error instanceof DiscoveryError) {
      console.error(error.message)
      return 2
    }
    throw error
  }

  const capability = deps.capability ?? firecrawlFrom(config)
  if (!capability) {
    console.error('FIRECRAWL_API_KEY is not set')
    return 2
  }

  const query = {
    name: args.name,
    issuingBody: args.issuingBody,
    region: args.region,
    officialLink: args.url,
    description: args.description,
  }
  const search = args.search ?? (args.autoSearch ? buildSearchTerm(query) : undefined)

  const orchestrator = new DiscoveryOrchestrator({ config, capability, clock: deps.clock })

  try {
    const result = await orchestrator.run(query, { crawl: args.crawl, search })
    const summary = summarize(result)

    if (args.out) {
      await writeOutput(args.out, `${exportJson(result)}\n`)
      print(formatSummary(summary))
      print(`Export written to ${args.out}`)
    } else if (args.summary) {
      print(formatSummary(summary))
    } else {
      print(exportJson(result))
    }
    return 0
  } catch (error) {
    const classified = classifyError(error)
    log.error('Discovery command failed', { code: classified.code }, error)
    console.error(`${classified.code}: ${classified.message}`)
    return classified.category === 'validation' ? 2 : 1
  }
}

function firecrawlFrom(config: DiscoveryConfig): FirecrawlClient | null {
  if (!config.firecrawlApiKey) {
    return null
  }
  return new FirecrawlClient({ apiKey: config.firecrawlApiKey, baseUrl: config.firecrawlBaseUrl })
}

export function formatSummary(summary: DiscoverySummary): string {
  const { certification, stats } = summary
  const lines = [
    `${certification.name} (${certification.issuingBody}, ${certification.region})`,
    `  pages discovered: ${stats.totalPagesDiscovered}, relevant: ${stats.relevantPagesFound}, categories: ${stats.categoriesFound}`,
    `  quality: ${summary.qualityScore}/100 in ${stats.durationSeconds}s`,
  ]
  for (const [category, count] of Object.entries(summary.contentSummary)) {
    lines.push(`  ${category}: ${count}`)
  }
  if (summary.degraded) lines.push('  structure degraded: crawl did not complete')
  if (summary.truncated) lines.push('  truncated: run deadline reached')
  return lines.join('\n')
}
