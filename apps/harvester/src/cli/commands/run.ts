import { resolve } from 'node:path'
import { loadSettings, type Settings } from '../../config/settings.js'
import { runScrape } from '../../scraper/index.js'
import { HttpClient } from '../../scraper/fetch/http-client.js'

export interface RunCommandArgs {
  /** Overrides SOURCE_PATH */
  source?: string
  /** Overrides REPORT_DIR */
  outDir?: string
  now?: Date
}

export async function runRunCommand(
  args: RunCommandArgs,
  settings: Settings = loadSettings()
): Promise<number> {
  const source = args.source || settings.sourcePath
  const outDir = resolve(args.outDir || settings.reportDir)

  const result = await runScrape({
    source,
    outDir,
    client: new HttpClient({ userAgent: settings.userAgent }),
    pricingUrlTemplate: settings.pricingUrlTemplate,
    now: args.now,
  })

  console.log(result.reportPath)
  return 0
}
