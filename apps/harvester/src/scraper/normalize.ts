/**
 * Pricing plans to a report Offer.
 *
 * Plan 0 is expected to be the keep-it installment plan, plan 1 (when
 * present) the return-it "Bring It Back" plan. Terms are 24 months.
 */

import { KEEP_IT, RETURN_IT, type PlanValue, type PricingPlan } from './payload.js'
import { NOT_AVAILABLE, NO_GIFT_CARD, type Offer } from './types.js'

export const FINANCING_MONTHS = 24

type MutableOffer = { -readonly [K in keyof Offer]: Offer[K] }

interface Baseline {
  monthly: number
  downPayment: number
}

export function sentinelOffer(): Offer {
  return {
    priceAfterGiftCard: NOT_AVAILABLE,
    giftCard: NO_GIFT_CARD,
    totalPrice: NOT_AVAILABLE,
    monthlyPrice: NOT_AVAILABLE,
    downPayment: NOT_AVAILABLE,
    bibPremium: NOT_AVAILABLE,
    bibMonthly: NOT_AVAILABLE,
    downReturn: NOT_AVAILABLE,
  }
}

export function normalizeOffer(plans: readonly PricingPlan[]): Offer {
  const first = plans.at(0)
  const second = plans.at(1)

  const offer: MutableOffer = sentinelOffer()
  if (!first) {
    return offer
  }

  offer.giftCard = renderRaw(first.giftCard, NO_GIFT_CARD)

  const baseline = resolveBaseline(first)
  let totalPrice: number | null = null
  if (baseline) {
    totalPrice = baseline.monthly * FINANCING_MONTHS + baseline.downPayment
    const giftCard = toNumber(first.giftCard)

    offer.monthlyPrice = renderRaw(first.monthly, NOT_AVAILABLE)
    offer.downPayment = renderRaw(first.downPayment, NOT_AVAILABLE)
    offer.totalPrice = totalPrice.toFixed(2)
    offer.priceAfterGiftCard = renderAmount(giftCard ? totalPrice - giftCard : totalPrice)
  }

  if (second && second.type === RETURN_IT) {
    offer.bibMonthly = renderRaw(second.monthly, NOT_AVAILABLE)
    offer.downReturn = renderRaw(second.residualValue, NOT_AVAILABLE)
    offer.bibPremium = computeBibPremium(totalPrice, second)
  }

  return offer
}

function resolveBaseline(plan: PricingPlan): Baseline | null {
  if (plan.type !== KEEP_IT) {
    return null
  }
  const monthly = toNumber(plan.monthly)
  const downPayment = toNumber(plan.downPayment)
  if (monthly === null || downPayment === null) {
    return null
  }
  return { monthly, downPayment }
}

/**
 * Premium is only priced when the return-it monthly is an actual number;
 * a string monthly (e.g. "Contact carrier") leaves it N/A.
 */
function computeBibPremium(totalPrice: number | null, plan: PricingPlan): string {
  if (totalPrice === null || typeof plan.monthly !== 'number' || !Number.isFinite(plan.monthly)) {
    return NOT_AVAILABLE
  }
  const downPayment = plan.downPayment === undefined || plan.downPayment === null ? 0 : toNumber(plan.downPayment)
  if (downPayment === null) {
    return NOT_AVAILABLE
  }
  return (totalPrice - plan.monthly * FINANCING_MONTHS - downPayment).toFixed(2)
}

export function toNumber(value: PlanValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.replace(/[$,\s]/g, ''))
    return Number.isFinite(parsed) ? parsed : null
  }
  return null
}

function renderRaw(value: PlanValue, fallback: string): string {
  if (value === undefined || value === null) {
    return fallback
  }
  return String(value)
}

/**
 * Unformatted amount: whole values keep a trailing `.0` (1030 gives
 * `1030.0`), fractional ones use the shortest round-trip form.
 */
export function renderAmount(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value)
}
