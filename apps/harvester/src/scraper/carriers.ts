export const UNKNOWN_CARRIER = 'Unknown'

/** URL substring to carrier label. Order matters: first match wins. */
export const CARRIER_PATTERNS: ReadonlyArray<readonly [pattern: string, label: string]> = [
  ['telus', 'Telus'],
  ['koodo', 'Koodo'],
  ['rogers', 'Rogers'],
  ['fido', 'Fido'],
  ['freedom-mobile', 'Freedom Mobile'],
  ['bell', 'Bell'],
  ['virgin-plus', 'Virgin Plus'],
]

/** Row order for every phone in the report */
export const CARRIER_ORDER = [
  'Fido',
  'Rogers',
  'Virgin Plus',
  'Bell',
  'Koodo',
  'Telus',
  'Freedom Mobile',
] as const

export function identifyCarrier(url: string): string {
  const lower = url.toLowerCase()
  for (const [pattern, label] of CARRIER_PATTERNS) {
    if (lower.includes(pattern)) {
      return label
    }
  }
  return UNKNOWN_CARRIER
}
