import { EnumLookupError } from '@pgx-graph/shared'
import { log } from '../lib/log.js'
import { DRUG_SUBTYPES } from './schema.js'

const quoted = (value: string) => `"${value}"`
const stripQuotes = (value: string) => value.replace(/"/g, '')
const countQuotes = (value: string) => value.split('"').length - 1

const lookup = (table: Readonly<Record<string, string>>, key: string): string | undefined =>
  Object.hasOwn(table, key) ? table[key] : undefined

/**
 * Re-emit a comma separated list as an MCF text list.
 *
 * Items may already be quoted and a quoted item may contain commas, so the
 * input is split on every comma and the quote count of each piece decides
 * whether it is a whole item (0 or 2), opens an item (1) or closes the item
 * being joined (1). Pieces with any other count are logged and dropped.
 *
 * @example formatTextList('test1,"Foo, Bar","test2"') // '"test1","Foo, Bar","test2"'
 */
export function formatTextList(text: string): string {
  if (!text) return ''
  const items: string[] = []
  let joining = ''

  for (const piece of text.split(',')) {
    const quotes = countQuotes(piece)
    if (quotes === 0 && joining) {
      joining += piece + ','
    } else if (quotes === 0 || quotes === 2) {
      const item = stripQuotes(piece).trim()
      if (item) items.push(quoted(item))
    } else if (quotes === 1 && joining) {
      items.push(joining.trimStart() + stripQuotes(piece).trimEnd() + '"')
      joining = ''
    } else if (quotes === 1) {
      joining = piece + ','
    } else {
      log.warn(`unexpected list format, dropping "${piece}" from: ${text}`)
    }
  }

  if (joining) {
    log.warn(`unterminated quoted item, dropping "${joining.slice(0, -1)}" from: ${text}`)
  }
  return items.join(',')
}

/** `111;222;333` -> `"111","222","333"` */
export function formatSemicolonList(text: string): string {
  if (!text) return ''
  return text
    .split(';')
    .map(v => v.trim())
    .filter(Boolean)
    .map(quoted)
    .join(',')
}

/**
 * `True` when `text` is exactly `trueValue`, otherwise empty. A missing
 * sentinel only means the flag is not asserted, so false is never emitted.
 */
export function formatBool(text: string, trueValue: string): string {
  return text === trueValue ? 'True' : ''
}

/**
 * Map a comma separated list of codes to `dcid:` enum references.
 * Throws `EnumLookupError` on the first code missing from `table`.
 */
export function translateEnums(codes: string, table: Readonly<Record<string, string>>, field: string): string {
  if (!codes) return ''
  return codes
    .split(',')
    .map(code => {
      const key = code.trim()
      const dcid = lookup(table, key)
      if (dcid === undefined) throw new EnumLookupError(key, field)
      return `dcid:${dcid}`
    })
    .join(',')
}

/**
 * Turn `"Source:value","Other:value"` cross-references into one
 * `property: "value"` line per source known to `table`. The value keeps any
 * colons after the first.
 */
export function translateXrefs(xrefs: string, table: Readonly<Record<string, string>>): string {
  if (!xrefs) return ''
  let out = ''
  for (const xref of xrefs.split(',')) {
    const pair = stripQuotes(xref).trim()
    if (!pair) continue
    const sep = pair.indexOf(':')
    if (sep === -1) {
      log.warn(`cross-reference without a value "${pair}" in: ${xrefs}`)
      continue
    }
    const source = pair.slice(0, sep)
    const prop = lookup(table, source)
    if (prop === undefined) {
      log.warn(`unrecognized cross-reference source "${source}" in: ${xrefs}`)
      continue
    }
    out += `${prop}: "${pair.slice(sep + 1).trim()}"\n`
  }
  return out
}

/**
 * `typeOf` value for a compound from its "Type" list: `dcs:Drug` when every
 * type is a drug sub-type, `dcs:ChemicalCompound` when none is, both otherwise.
 */
export function compoundType(types: string): string {
  const found = new Set<string>()
  for (const raw of types.split(',')) {
    const type = stripQuotes(raw).trim()
    if (!type) continue
    found.add(DRUG_SUBTYPES.includes(type) ? 'dcs:Drug' : 'dcs:ChemicalCompound')
  }
  if (found.size === 2) return 'dcs:ChemicalCompound,dcs:Drug'
  return found.has('dcs:Drug') ? 'dcs:Drug' : 'dcs:ChemicalCompound'
}
