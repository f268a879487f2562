#!/usr/bin/env node
import '../env.js'
import { setLogLevel } from '@certmap/logger'
import { runDiscoverCommand } from './commands/discover.js'
import { DISCOVER_FLAGS, discoverArgsFrom, parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.log('certmap discovery CLI')
  console.log('')
  console.log('Commands:')
  console.log(
    '  discover --name "<name>" --issuing-body "<body>" --region "<region>" --url <officialLink>'
  )
  console.log('           [--description "<text>"] [--out <file>] [--summary] [--no-crawl]')
  console.log('           [--search "<terms>" | --auto-search] [--max-pages <n>] [--timeout <seconds>]')
  console.log('           [--verbose]')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  let exitCode = 2

  switch (command) {
    case 'discover': {
      const parsed = parseFlags(rest, DISCOVER_FLAGS)
      if (parsed.switches.has('help')) {
        printHelp()
        process.exit(0)
      }
      if (parsed.errors.length > 0) {
        parsed.errors.forEach(message => console.error(message))
        printHelp()
        process.exit(2)
      }

      // Logs share stdout with the export document
      setLogLevel(parsed.switches.has('verbose') ? 'debug' : 'warn')
      exitCode = await runDiscoverCommand(discoverArgsFrom(parsed))
      break
    }
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch(error => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})
