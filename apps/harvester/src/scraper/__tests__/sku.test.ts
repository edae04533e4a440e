import { describe, expect, it } from 'vitest'
import { buildPricingUrl, extractSku } from '../sku.js'

describe('extractSku', () => {
  it('takes the last path segment without the query string', () => {
    expect(extractSku('https://www.bestbuy.ca/en-ca/product/galaxy-s24-with-koodo/17473015?intl=nosplash')).toBe(
      '17473015'
    )
    expect(extractSku('https://www.bestbuy.ca/en-ca/product/galaxy-s24-with-koodo/17473015')).toBe('17473015')
  })

  it('is empty for a trailing slash', () => {
    expect(extractSku('https://www.bestbuy.ca/en-ca/product/')).toBe('')
  })
})

describe('buildPricingUrl', () => {
  it('interpolates the sku into the template', () => {
    expect(buildPricingUrl('https://pricing.example.com/sku/{sku}?sig=test-signature', '17473015')).toBe(
      'https://pricing.example.com/sku/17473015?sig=test-signature'
    )
  })

  it('encodes characters that would change the path', () => {
    expect(buildPricingUrl('https://pricing.example.com/sku/{sku}', 'a/b c')).toBe(
      'https://pricing.example.com/sku/a%2Fb%20c'
    )
  })
})
