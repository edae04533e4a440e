/**
 * Report Writer
 *
 * One CSV per run. Every phone gets its carriers in CARRIER_ORDER; a carrier
 * the phone has no URL for is still listed, with `--` in every value cell.
 */

import { writeFile } from 'node:fs/promises'
import { stringify } from 'csv-stringify/sync'
import { loggers } from '../config/logger.js'
import { CARRIER_ORDER } from '../scraper/carriers.js'
import type { Carrier, Offer, Phone } from '../scraper/types.js'

export const REPORT_HEADER = [
  'Phone',
  'Carrier',
  'Price After GC',
  'Gift Card Amount',
  'Total Price',
  'Monthly Price',
  'Downpayment',
  'BIB Premium',
  'BIB Monthly Price',
  'BIB Downpayment',
  'Link',
] as const

export const PLACEHOLDER = '--'

const OFFER_COLUMNS: ReadonlyArray<keyof Offer> = [
  'priceAfterGiftCard',
  'giftCard',
  'totalPrice',
  'monthlyPrice',
  'downPayment',
  'bibPremium',
  'bibMonthly',
  'downReturn',
]

export type ReportRow = string[]

export function buildReportRows(phones: readonly Phone[]): ReportRow[] {
  const rows: ReportRow[] = []

  for (const phone of phones) {
    // Later URLs for the same carrier replace earlier ones
    const byName = new Map<string, Carrier>()
    for (const carrier of phone.carriers) {
      byName.set(carrier.name, carrier)
    }

    for (const carrierName of CARRIER_ORDER) {
      const carrier = byName.get(carrierName)
      if (!carrier) {
        rows.push([phone.name, carrierName, ...OFFER_COLUMNS.map(() => PLACEHOLDER), ''])
        continue
      }
      for (const offer of carrier.offers) {
        rows.push([phone.name, carrier.name, ...OFFER_COLUMNS.map(column => offer[column]), carrier.link])
      }
    }
  }

  return rows
}

/** Header plus rows as CSV text with CRLF record delimiters */
export function renderReport(rows: readonly ReportRow[]): string {
  return stringify([[...REPORT_HEADER], ...rows], { record_delimiter: 'windows' })
}

/**
 * Write the report as UTF-8 and return the number of data rows.
 */
export async function writeReport(phones: readonly Phone[], filePath: string): Promise<number> {
  const rows = buildReportRows(phones)
  await writeFile(filePath, renderReport(rows), 'utf-8')
  loggers.report.debug('Report written', { filePath, rows: rows.length })
  return rows.length
}

/** `bestbuy_YYYYMMDD_mobiles.csv`, using the local date */
export function reportFileName(date: Date): string {
  const year = String(date.getFullYear())
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  return `bestbuy_${year}${month}${day}_mobiles.csv`
}
