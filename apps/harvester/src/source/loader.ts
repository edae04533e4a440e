/**
 * Source Loader
 *
 * Reads the phone list from disk or over HTTP and groups carrier URLs by
 * phone. Two layouts are accepted:
 *
 * XML (the usual one): one element per phone under the root, tag name is the
 * phone name with underscores for spaces, one child element per URL.
 *
 *   <phones>
 *     <Galaxy_S24_128GB>
 *       <url>https://www.bestbuy.ca/en-ca/product/...-with-koodo/17473015</url>
 *     </Galaxy_S24_128GB>
 *   </phones>
 *
 * CSV with a `phone,url` header, one row per URL.
 *
 * Any failure here is fatal for the run.
 */

import { readFile } from 'node:fs/promises'
import { parse as parseCsv } from 'csv-parse/sync'
import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { z } from 'zod'
import type { ILogger } from '@planwatch/logger'
import { loggers } from '../config/logger.js'
import { SourceFetchError, SourceParseError } from '../errors.js'
import type { HttpClient } from '../scraper/fetch/http-client.js'
import type { SourceGroup } from '../scraper/types.js'

const REMOTE_SCHEMES = ['http://', 'https://']
const TEXT_NODE = '#text'
const ATTRIBUTES_NODE = ':@'

export type SourceFormat = 'xml' | 'csv'

export interface LoadSourceOptions {
  client: HttpClient
  logger?: ILogger
}

export function isRemoteSource(location: string): boolean {
  return REMOTE_SCHEMES.some(scheme => location.startsWith(scheme))
}

export async function loadSource(location: string, options: LoadSourceOptions): Promise<SourceGroup[]> {
  const log = options.logger ?? loggers.source
  const content = isRemoteSource(location)
    ? await fetchSource(location, options.client)
    : await readFile(location, 'utf-8')

  return parseSourceDocument(content, log)
}

async function fetchSource(location: string, client: HttpClient): Promise<string> {
  const response = await client.getText(location)
  if (!response.ok) {
    throw new SourceFetchError(location, response.statusCode, response.statusText)
  }
  return response.body
}

export function detectSourceFormat(content: string): SourceFormat {
  return stripBom(content).trimStart().startsWith('<') ? 'xml' : 'csv'
}

export function parseSourceDocument(content: string, log: ILogger = loggers.source): SourceGroup[] {
  if (stripBom(content).trim() === '') {
    throw new SourceParseError('document is empty')
  }
  return detectSourceFormat(content) === 'xml'
    ? parseXmlSource(stripBom(content), log)
    : parseCsvSource(content, log)
}

export function toPhoneName(raw: string): string {
  return raw.split('_').join(' ')
}

// ═══════════════════════════════════════════════════════════════════════════════
// XML
// ═══════════════════════════════════════════════════════════════════════════════

type OrderedNode = Record<string, unknown>

function parseXmlSource(content: string, log: ILogger): SourceGroup[] {
  const validation = XMLValidator.validate(content)
  if (validation !== true) {
    throw new SourceParseError(validation.err.msg, {
      line: validation.err.line,
      col: validation.err.col,
    })
  }

  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: true,
    ignoreDeclaration: true,
    parseTagValue: false,
    trimValues: true,
  })
  const tree: unknown = parser.parse(content)

  const root = elementNodes(Array.isArray(tree) ? tree : [])[0]
  if (!root) {
    throw new SourceParseError('document has no root element')
  }

  return elementNodes(root.children).map(phoneNode => {
    const phone = toPhoneName(phoneNode.name)
    const urls: string[] = []

    for (const urlNode of elementNodes(phoneNode.children)) {
      const url = textContent(urlNode.children)
      if (!url) {
        log.warn('Skipping empty URL element', { phone, element: urlNode.name })
        continue
      }
      urls.push(url)
    }

    return { phone, urls }
  })
}

interface ElementNode {
  name: string
  children: unknown[]
}

function isRecord(value: unknown): value is OrderedNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Element children of an ordered node list, skipping text and processing instructions */
function elementNodes(nodes: unknown[]): ElementNode[] {
  const elements: ElementNode[] = []
  for (const node of nodes) {
    if (!isRecord(node)) continue
    const name = Object.keys(node).find(
      key => key !== TEXT_NODE && key !== ATTRIBUTES_NODE && !key.startsWith('?')
    )
    if (!name) continue
    const children = node[name]
    elements.push({ name, children: Array.isArray(children) ? children : [] })
  }
  return elements
}

function textContent(nodes: unknown[]): string {
  return nodes
    .map(node => (isRecord(node) ? node[TEXT_NODE] : undefined))
    .filter(
      (value): value is string | number => typeof value === 'string' || typeof value === 'number'
    )
    .map(String)
    .join('')
    .trim()
}

// ═══════════════════════════════════════════════════════════════════════════════
// CSV
// ═══════════════════════════════════════════════════════════════════════════════

const REQUIRED_CSV_COLUMNS = ['phone', 'url']

const csvRowsSchema = z.array(
  z.object({
    phone: z.string(),
    url: z.string(),
  })
)

function parseCsvSource(content: string, log: ILogger): SourceGroup[] {
  let header: string[] = []
  let records: unknown
  try {
    records = parseCsv(content, {
      bom: true,
      columns: (raw: string[]) => {
        header = raw.map(column => column.trim().toLowerCase())
        return header
      },
      skip_empty_lines: true,
      trim: true,
    })
  } catch (error) {
    throw new SourceParseError(error instanceof Error ? error.message : String(error))
  }

  // Checked on the header so a header-only file with the wrong columns fails too
  const missing = REQUIRED_CSV_COLUMNS.filter(column => !header.includes(column))
  const rows = csvRowsSchema.safeParse(records)
  if (missing.length > 0 || !rows.success) {
    throw new SourceParseError('CSV source needs "phone" and "url" columns')
  }

  const groups = new Map<string, string[]>()
  for (const row of rows.data) {
    if (!row.phone) {
      log.warn('Skipping CSV row without a phone name', { url: row.url })
      continue
    }
    const phone = toPhoneName(row.phone)
    const urls = groups.get(phone) ?? []
    if (row.url) {
      urls.push(row.url)
    } else {
      log.warn('Skipping empty URL element', { phone })
    }
    groups.set(phone, urls)
  }

  return Array.from(groups, ([phone, urls]) => ({ phone, urls }))
}

function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content
}
