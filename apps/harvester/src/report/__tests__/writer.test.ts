import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { parse as parseCsv } from 'csv-parse/sync'
import { normalizeOffer, sentinelOffer } from '../../scraper/normalize.js'
import type { Carrier, Offer, Phone } from '../../scraper/types.js'
import {
  buildReportRows,
  renderReport,
  REPORT_HEADER,
  reportFileName,
  writeReport,
} from '../writer.js'

const KOODO_OFFER: Offer = normalizeOffer([
  { type: 'keep-it', monthly: 45.0, downPayment: 0, giftCard: 50 },
])

function carrier(name: string, link: string, offers: Offer[] = [sentinelOffer()]): Carrier {
  return { name, link, offers }
}

describe('buildReportRows', () => {
  it('emits seven rows per phone in canonical carrier order', () => {
    const phones: Phone[] = [
      {
        name: 'Pixel 9',
        carriers: [
          carrier('Koodo', 'https://example.com/pixel-9-with-koodo/1', [KOODO_OFFER]),
          carrier('Fido', 'https://example.com/pixel-9-with-fido/2'),
        ],
      },
      { name: 'iPhone 16', carriers: [] },
    ]

    const rows = buildReportRows(phones)

    expect(rows).toHaveLength(14)
    expect(rows.slice(0, 7).map(row => row[1])).toEqual([
      'Fido',
      'Rogers',
      'Virgin Plus',
      'Bell',
      'Koodo',
      'Telus',
      'Freedom Mobile',
    ])
    expect(rows[4]).toEqual([
      'Pixel 9',
      'Koodo',
      '1030.0',
      '50',
      '1080.00',
      '45',
      '0',
      'N/A',
      'N/A',
      'N/A',
      'https://example.com/pixel-9-with-koodo/1',
    ])
    expect(rows[7]).toEqual(['iPhone 16', 'Fido', '--', '--', '--', '--', '--', '--', '--', '--', ''])
  })

  it('drops carriers outside the canonical order', () => {
    const rows = buildReportRows([
      { name: 'Pixel 9', carriers: [carrier('Unknown', 'https://example.com/pixel-9-unlocked/3')] },
    ])

    expect(rows).toHaveLength(7)
    expect(rows.every(row => row[10] === '')).toBe(true)
  })

  it('emits no row for a carrier whose pricing request failed', () => {
    const rows = buildReportRows([
      { name: 'Pixel 9', carriers: [carrier('Bell', 'https://example.com/pixel-9-with-bell/4', [])] },
    ])

    expect(rows).toHaveLength(6)
    expect(rows.map(row => row[1])).not.toContain('Bell')
  })

  it('emits one row per offer', () => {
    const rows = buildReportRows([
      {
        name: 'Pixel 9',
        carriers: [
          carrier('Telus', 'https://example.com/pixel-9-with-telus/5', [KOODO_OFFER, sentinelOffer()]),
        ],
      },
    ])

    expect(rows).toHaveLength(8)
    expect(rows.filter(row => row[1] === 'Telus').map(row => row[2])).toEqual(['1030.0', 'N/A'])
  })

  it('keeps the later URL when a carrier is listed twice', () => {
    const rows = buildReportRows([
      {
        name: 'Pixel 9',
        carriers: [
          carrier('Rogers', 'https://example.com/pixel-9-with-rogers/6'),
          carrier('Rogers', 'https://example.com/pixel-9-with-rogers/7', [KOODO_OFFER]),
        ],
      },
    ])

    const rogers = rows.filter(row => row[1] === 'Rogers')
    expect(rogers).toHaveLength(1)
    expect(rogers[0][10]).toBe('https://example.com/pixel-9-with-rogers/7')
  })
})

describe('renderReport', () => {
  it('writes the header and CRLF-delimited records', () => {
    const text = renderReport([['Pixel 9', 'Fido', '--', '--', '--', '--', '--', '--', '--', '--', '']])

    expect(text).toBe(
      `${REPORT_HEADER.join(',')}\r\nPixel 9,Fido,--,--,--,--,--,--,--,--,\r\n`
    )
  })

  it('quotes cells that contain commas', () => {
    const text = renderReport([['Galaxy S24, 128GB', 'Bell', '', '', '', '', '', '', '', '', '']])

    expect(text.split('\r\n')[1]).toBe('"Galaxy S24, 128GB",Bell,,,,,,,,,')
  })
})

describe('reportFileName', () => {
  it('stamps the local date', () => {
    expect(reportFileName(new Date(2024, 0, 5))).toBe('bestbuy_20240105_mobiles.csv')
    expect(reportFileName(new Date(2025, 11, 31, 23, 59))).toBe('bestbuy_20251231_mobiles.csv')
  })
})

describe('writeReport', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'planwatch-report-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('writes a CSV that reads back to the same rows', async () => {
    const phones: Phone[] = [
      {
        name: 'Pixel 9',
        carriers: [carrier('Koodo', 'https://example.com/pixel-9-with-koodo/1', [KOODO_OFFER])],
      },
    ]
    const filePath = join(dir, reportFileName(new Date(2024, 0, 5)))

    const count = await writeReport(phones, filePath)

    expect(count).toBe(7)
    const records: string[][] = parseCsv(await readFile(filePath, 'utf-8'))
    expect(records[0]).toEqual([...REPORT_HEADER])
    expect(records.slice(1)).toEqual(buildReportRows(phones))
  })
})
