import '../env.js'
import { loggers } from '../config/logger.js'
import { HarvesterError } from '../errors.js'
import { runPageCommand } from './commands/page.js'
import { runRunCommand } from './commands/run.js'
import { asString, parseFlags } from './parse-flags.js'

const log = loggers.cli

function printHelp(): void {
  console.log('planwatch')
  console.log('')
  console.log('Commands:')
  console.log('  run [--source <path|url>] [--out-dir <dir>]')
  console.log('  page --url <product-url> [--price-selector "<css>"]')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }

  let exitCode = 2

  switch (command) {
    case 'run':
      exitCode = await runRunCommand({
        source: asString(flags.source),
        outDir: asString(flags['out-dir']),
      })
      break
    case 'page':
      exitCode = await runPageCommand({
        url: asString(flags.url),
        priceSelector: asString(flags['price-selector']) || undefined,
      })
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch((error: unknown) => {
  log.fatal('Run aborted', {}, error)
  process.exit(error instanceof HarvesterError ? error.exitCode : 1)
})
