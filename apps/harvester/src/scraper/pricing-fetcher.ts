/**
 * Pricing Fetcher
 *
 * Product URL -> SKU -> pricing API -> Carrier with at most one Offer.
 *
 * Outcomes:
 * - 2xx with a decodable body: one normalized Offer
 * - non-2xx: no Offers, not retried
 * - undecodable body: one sentinel Offer, not retried
 * - transport failure: retried with a fixed delay, then one sentinel Offer
 */

import type { ILogger } from '@planwatch/logger'
import { loggers } from '../config/logger.js'
import { DEFAULT_PRICING_API_URL_TEMPLATE } from '../config/settings.js'
import { identifyCarrier } from './carriers.js'
import type { HttpClient, TextResponse } from './fetch/http-client.js'
import { normalizeOffer, sentinelOffer } from './normalize.js'
import { decodePricingPayload } from './payload.js'
import { buildPricingUrl, extractSku } from './sku.js'
import type { Carrier } from './types.js'

export const MAX_ATTEMPTS = 3
export const RETRY_DELAY_MS = 2000

export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms))

export interface PricingFetcherOptions {
  client: HttpClient

  /** Endpoint with a `{sku}` placeholder */
  urlTemplate?: string

  logger?: ILogger

  /** Waits out the retry delay; swapped in tests */
  sleep?: Sleep
}

export class PricingFetcher {
  private readonly client: HttpClient
  private readonly urlTemplate: string
  private readonly log: ILogger
  private readonly sleep: Sleep

  constructor(options: PricingFetcherOptions) {
    this.client = options.client
    this.urlTemplate = options.urlTemplate ?? DEFAULT_PRICING_API_URL_TEMPLATE
    this.log = options.logger ?? loggers.pricing
    this.sleep = options.sleep ?? sleep
  }

  async fetchCarrier(url: string, phoneName: string): Promise<Carrier> {
    const carrierName = identifyCarrier(url)
    const sku = extractSku(url)
    const apiUrl = buildPricingUrl(this.urlTemplate, sku)
    const context = { phone: phoneName, carrier: carrierName, sku }

    this.log.info('Started extracting pricing', context)

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      let response: TextResponse
      try {
        response = await this.client.getText(apiUrl)
      } catch (error) {
        if (attempt < MAX_ATTEMPTS) {
          this.log.warn('Pricing request failed, retrying', { ...context, attempt }, error)
          await this.sleep(RETRY_DELAY_MS)
        }
        continue
      }

      if (!response.ok) {
        this.log.error('Failed to load pricing', { ...context, statusCode: response.statusCode })
        return { name: carrierName, link: url, offers: [] }
      }

      const decoded = decodePricingPayload(response.body)
      if (!decoded.ok) {
        this.log.error('Unexpected pricing payload', {
          ...context,
          reason: decoded.reason,
          details: decoded.details,
        })
        return { name: carrierName, link: url, offers: [sentinelOffer()] }
      }

      return { name: carrierName, link: url, offers: [normalizeOffer(decoded.plans)] }
    }

    this.log.error(`Failed to load pricing after ${MAX_ATTEMPTS} attempts`, context)
    return { name: carrierName, link: url, offers: [sentinelOffer()] }
  }
}
