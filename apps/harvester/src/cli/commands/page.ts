import { loggers } from '../../config/logger.js'
import { loadSettings, type Settings } from '../../config/settings.js'
import { identifyCarrier } from '../../scraper/carriers.js'
import { HttpClient } from '../../scraper/fetch/http-client.js'
import { KEEP_IT, RETURN_IT } from '../../scraper/payload.js'
import { extractPagePrice, extractPlanPricing, loadHtml } from '../../scraper/page/extract.js'
import { extractSku } from '../../scraper/sku.js'

export interface PageCommandArgs {
  url: string
  /** CSS selector of an extra price element to read, e.g. the gift card line */
  priceSelector?: string
}

/**
 * Fetch one product page and print the plan prices it shows as JSON.
 */
export async function runPageCommand(
  args: PageCommandArgs,
  settings: Settings = loadSettings()
): Promise<number> {
  if (!args.url) {
    console.error('Missing --url <product-url>')
    return 2
  }

  const client = new HttpClient({ userAgent: settings.userAgent })
  const response = await client.getText(args.url)
  if (!response.ok) {
    loggers.page.error('Failed to load product page', {
      url: args.url,
      statusCode: response.statusCode,
    })
    return 1
  }

  const $ = loadHtml(response.body)
  const summary = {
    url: args.url,
    carrier: identifyCarrier(args.url),
    sku: extractSku(args.url),
    keepIt: extractPlanPricing($, KEEP_IT),
    returnIt: extractPlanPricing($, RETURN_IT),
    ...(args.priceSelector ? { price: extractPagePrice($, args.priceSelector) } : {}),
  }

  console.log(JSON.stringify(summary, null, 2))
  return 0
}
