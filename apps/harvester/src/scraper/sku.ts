export const SKU_PLACEHOLDER = '{sku}'

/**
 * Last path segment of a product URL without its query string.
 * `.../galaxy-s24-with-koodo/17473015?intl=nosplash` gives `17473015`.
 */
export function extractSku(url: string): string {
  const lastSegment = url.split('/').pop() ?? ''
  return lastSegment.split('?')[0]
}

export function buildPricingUrl(template: string, sku: string): string {
  return template.split(SKU_PLACEHOLDER).join(encodeURIComponent(sku))
}
