/**
 * Pricing report model.
 *
 * Everything here is built once during a scrape pass and read once by the
 * report writer. Offer fields are already rendered as report cells.
 */

export const NOT_AVAILABLE = 'N/A'
export const NO_GIFT_CARD = '0'

export interface Offer {
  readonly priceAfterGiftCard: string
  readonly giftCard: string
  readonly totalPrice: string
  readonly monthlyPrice: string
  readonly downPayment: string
  /** Keep-it total minus the Bring It Back plan total */
  readonly bibPremium: string
  readonly bibMonthly: string
  /** Residual value owed or forgone at the end of a Bring It Back term */
  readonly downReturn: string
}

export interface Carrier {
  readonly name: string
  readonly link: string
  /** Empty when the pricing API answered with a non-2xx status */
  readonly offers: readonly Offer[]
}

export interface Phone {
  readonly name: string
  readonly carriers: readonly Carrier[]
}

/** One phone and its carrier product URLs, in source order */
export interface SourceGroup {
  readonly phone: string
  readonly urls: readonly string[]
}
