/**
 * Scrape run: source list -> sequential pricing fetches -> CSV report.
 */

import { mkdir } from 'node:fs/promises'
import { join } from 'node:path'
import type { ILogger } from '@planwatch/logger'
import { logger } from '../config/logger.js'
import { writeReport, reportFileName } from '../report/writer.js'
import { loadSource } from '../source/loader.js'
import type { HttpClient } from './fetch/http-client.js'
import { PricingFetcher } from './pricing-fetcher.js'
import type { Carrier, Phone, SourceGroup } from './types.js'

export interface CarrierFetcher {
  fetchCarrier(url: string, phoneName: string): Promise<Carrier>
}

/**
 * Phones and their carriers are processed one at a time, in source order.
 */
export async function scrapePhones(
  groups: readonly SourceGroup[],
  fetcher: CarrierFetcher
): Promise<Phone[]> {
  const phones: Phone[] = []
  for (const group of groups) {
    const carriers: Carrier[] = []
    for (const url of group.urls) {
      carriers.push(await fetcher.fetchCarrier(url, group.phone))
    }
    phones.push({ name: group.phone, carriers })
  }
  return phones
}

export interface RunScrapeOptions {
  /** Local path or http(s) URL of the phone list */
  source: string
  outDir: string
  client: HttpClient
  fetcher?: CarrierFetcher
  pricingUrlTemplate?: string
  now?: Date
  logger?: ILogger
}

export interface RunScrapeResult {
  reportPath: string
  phones: Phone[]
  rows: number
}

export async function runScrape(options: RunScrapeOptions): Promise<RunScrapeResult> {
  const log = options.logger ?? logger
  const startedAt = Date.now()

  const groups = await loadSource(options.source, { client: options.client })
  log.info('Loaded source list', {
    source: options.source,
    phones: groups.length,
    urls: groups.reduce((sum, group) => sum + group.urls.length, 0),
  })

  // Before any pricing request is made
  await mkdir(options.outDir, { recursive: true })

  const fetcher =
    options.fetcher ??
    new PricingFetcher({ client: options.client, urlTemplate: options.pricingUrlTemplate })
  const phones = await scrapePhones(groups, fetcher)

  const reportPath = join(options.outDir, reportFileName(options.now ?? new Date()))
  const rows = await writeReport(phones, reportPath)

  log.info('All data has been written to the CSV report', {
    reportPath,
    rows,
    durationMs: Date.now() - startedAt,
  })

  return { reportPath, phones, rows }
}

export { HttpClient } from './fetch/http-client.js'
export { PricingFetcher } from './pricing-fetcher.js'
