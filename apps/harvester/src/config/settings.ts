import { z } from 'zod'
import { ConfigError } from '../errors.js'

/**
 * Pricing endpoint. The query string is pre-signed by the retailer and
 * breaks whenever they rotate signing keys; override it through
 * PRICING_API_URL_TEMPLATE when that happens.
 */
export const DEFAULT_PRICING_API_URL_TEMPLATE =
  'https://www.bestbuy.ca/api/cellphones-plans-pricing/sku/{sku}?api-version=2022-05-01&sp=%2Ftriggers%2Fmanual%2Frun&sv=1.0&sig=qqpzPnL_WPQXWUV73BbXlPLU0EGP_ZfI0vsIJFccWOE'

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36'

const settingsSchema = z.object({
  SOURCE_PATH: z.string().trim().min(1).default('./bestbuymobile.xml'),
  PRICING_API_URL_TEMPLATE: z
    .string()
    .url()
    .refine(value => value.includes('{sku}'), 'must contain a {sku} placeholder')
    .default(DEFAULT_PRICING_API_URL_TEMPLATE),
  SCRAPER_USER_AGENT: z.string().trim().min(1).default(DEFAULT_USER_AGENT),
  REPORT_DIR: z.string().trim().min(1).default('.'),
})

export interface Settings {
  sourcePath: string
  pricingUrlTemplate: string
  userAgent: string
  reportDir: string
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.safeParse({
    SOURCE_PATH: emptyToUndefined(env.SOURCE_PATH),
    PRICING_API_URL_TEMPLATE: emptyToUndefined(env.PRICING_API_URL_TEMPLATE),
    SCRAPER_USER_AGENT: emptyToUndefined(env.SCRAPER_USER_AGENT),
    REPORT_DIR: emptyToUndefined(env.REPORT_DIR),
  })

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    )
  }

  return {
    sourcePath: parsed.data.SOURCE_PATH,
    pricingUrlTemplate: parsed.data.PRICING_API_URL_TEMPLATE,
    userAgent: parsed.data.SCRAPER_USER_AGENT,
    reportDir: parsed.data.REPORT_DIR,
  }
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value
}
