/**
 * Product-page price extraction.
 *
 * The pricing API is the primary source; these read the same numbers off the
 * rendered product page. Class names are the retailer's generated CSS module
 * names and change with their frontend builds.
 */

import * as cheerio from 'cheerio'
import { NOT_AVAILABLE, NO_GIFT_CARD } from '../types.js'

const SELECTORS = {
  pricingContainer: 'div.pricingContainer_3m_rC',
  monthlyPrice: 'div.monthlyPrice_35UnX',
  downPayment: 'div.downPayment_3g6Nz',
} as const

const GIFT_CARD_LABEL = 'Best Buy Gift Card'

export interface PlanPricing {
  monthly: string
  downPayment: string
}

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

/**
 * Text of the first element matching `selector` with the gift card label and
 * dollar signs removed. `"0"` when the element is missing or empty.
 */
export function extractPagePrice($: cheerio.CheerioAPI, selector: string): string {
  const node = $(selector).first()
  if (node.length === 0) {
    return NO_GIFT_CARD
  }
  const text = node.text().trim().split(GIFT_CARD_LABEL).join('').split('$').join('').trim()
  return text || NO_GIFT_CARD
}

/**
 * Monthly price and down payment shown on the plan button whose id ends with
 * `planType` (e.g. `keep-it`, `return-it`).
 */
export function extractPlanPricing($: cheerio.CheerioAPI, planType: string): PlanPricing {
  const button = $('button')
    .filter((_, element) => ($(element).attr('id') ?? '').endsWith(planType))
    .first()
  if (!planType || button.length === 0) {
    return { monthly: NOT_AVAILABLE, downPayment: NOT_AVAILABLE }
  }

  const container = button.find(SELECTORS.pricingContainer).first()
  if (container.length === 0) {
    return { monthly: NOT_AVAILABLE, downPayment: NOT_AVAILABLE }
  }

  const monthlyNode = container.find(SELECTORS.monthlyPrice).first()
  const downNode = container.find(SELECTORS.downPayment).first()

  return {
    monthly:
      monthlyNode.length > 0 ? stripDollar(monthlyNode.text().split('/mo.')[0]) : NOT_AVAILABLE,
    downPayment:
      downNode.length > 0 ? stripDollar(downNode.text().split('down')[0]) : NOT_AVAILABLE,
  }
}

function stripDollar(value: string): string {
  return value.split('$').join('').trim()
}
