import { describe, expect, it } from 'vitest'
import { normalizeOffer, renderAmount, sentinelOffer, toNumber } from '../normalize.js'

describe('normalizeOffer', () => {
  it('derives totals from the keep-it plan', () => {
    expect(normalizeOffer([{ type: 'keep-it', monthly: 45.0, downPayment: 0, giftCard: 50 }])).toEqual({
      priceAfterGiftCard: '1030.0',
      giftCard: '50',
      totalPrice: '1080.00',
      monthlyPrice: '45',
      downPayment: '0',
      bibPremium: 'N/A',
      bibMonthly: 'N/A',
      downReturn: 'N/A',
    })
  })

  it('prices the Bring It Back premium from the return-it plan', () => {
    const offer = normalizeOffer([
      { type: 'keep-it', monthly: 45.0, downPayment: 0, giftCard: 50 },
      { type: 'return-it', monthly: 30.0, downPayment: 0, residualValue: 200 },
    ])

    expect(offer.bibPremium).toBe('360.00')
    expect(offer.bibMonthly).toBe('30')
    expect(offer.downReturn).toBe('200')
  })

  it('keeps fractional amounts unformatted after the gift card', () => {
    const offer = normalizeOffer([
      { type: 'keep-it', monthly: 52.5, downPayment: 99.99, giftCard: 100 },
      { type: 'return-it', monthly: 36.25, residualValue: 435 },
    ])

    expect(offer.totalPrice).toBe('1359.99')
    expect(offer.priceAfterGiftCard).toBe('1259.99')
    expect(offer.bibPremium).toBe('489.99')
  })

  it('leaves the premium N/A for a non-numeric return-it monthly', () => {
    const offer = normalizeOffer([
      { type: 'keep-it', monthly: 45.0, downPayment: 0, giftCard: 50 },
      { type: 'return-it', monthly: 'Contact carrier', downPayment: 0, residualValue: 200 },
    ])

    expect(offer.bibPremium).toBe('N/A')
    expect(offer.bibMonthly).toBe('Contact carrier')
    expect(offer.downReturn).toBe('200')
  })

  it('leaves the premium N/A when the return-it down payment is not numeric', () => {
    const offer = normalizeOffer([
      { type: 'keep-it', monthly: 45, downPayment: 0 },
      { type: 'return-it', monthly: 30, downPayment: 'varies' },
    ])

    expect(offer.bibPremium).toBe('N/A')
  })

  it('uses the total as-is without a gift card', () => {
    const offer = normalizeOffer([{ type: 'keep-it', monthly: 45, downPayment: 0, giftCard: null }])

    expect(offer.giftCard).toBe('0')
    expect(offer.priceAfterGiftCard).toBe('1080.0')
    expect(offer.totalPrice).toBe('1080.00')
  })

  it('accepts numeric strings in the keep-it plan', () => {
    const offer = normalizeOffer([{ type: 'keep-it', monthly: '45.00', downPayment: '$100', giftCard: 0 }])

    expect(offer.totalPrice).toBe('1180.00')
    expect(offer.monthlyPrice).toBe('45.00')
    expect(offer.downPayment).toBe('$100')
    expect(offer.giftCard).toBe('0')
    expect(offer.priceAfterGiftCard).toBe('1180.0')
  })

  it('leaves every derived field at its sentinel without a keep-it plan', () => {
    const offer = normalizeOffer([
      { type: 'trade-in', monthly: 40, downPayment: 0, giftCard: 25 },
      { type: 'return-it', monthly: 30, downPayment: 0, residualValue: 200 },
    ])

    expect(offer).toEqual({
      priceAfterGiftCard: 'N/A',
      giftCard: '25',
      totalPrice: 'N/A',
      monthlyPrice: 'N/A',
      downPayment: 'N/A',
      bibPremium: 'N/A',
      bibMonthly: '30',
      downReturn: '200',
    })
  })

  it('treats a keep-it plan without a usable monthly as missing', () => {
    const offer = normalizeOffer([{ type: 'keep-it', monthly: 'TBD', downPayment: 0 }])

    expect(offer.totalPrice).toBe('N/A')
    expect(offer.monthlyPrice).toBe('N/A')
  })

  it('returns the sentinel offer for an empty plan list', () => {
    expect(normalizeOffer([])).toEqual(sentinelOffer())
  })
})

describe('sentinelOffer', () => {
  it('fills every field', () => {
    expect(sentinelOffer()).toEqual({
      priceAfterGiftCard: 'N/A',
      giftCard: '0',
      totalPrice: 'N/A',
      monthlyPrice: 'N/A',
      downPayment: 'N/A',
      bibPremium: 'N/A',
      bibMonthly: 'N/A',
      downReturn: 'N/A',
    })
  })
})

describe('renderAmount', () => {
  it('adds .0 to whole numbers only', () => {
    expect(renderAmount(1030)).toBe('1030.0')
    expect(renderAmount(900.08)).toBe('900.08')
    expect(renderAmount(-20)).toBe('-20.0')
  })
})

describe('toNumber', () => {
  it('parses numbers and numeric strings', () => {
    expect(toNumber(12.5)).toBe(12.5)
    expect(toNumber(' 1,299.99 ')).toBe(1299.99)
    expect(toNumber('abc')).toBeNull()
    expect(toNumber('')).toBeNull()
    expect(toNumber(null)).toBeNull()
    expect(toNumber(undefined)).toBeNull()
  })
})
