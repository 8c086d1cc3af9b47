import path from 'node:path'
import AdmZip from 'adm-zip'
import { SOURCE_TABLES, type SourceTable } from '@pgx-graph/config'
import { PipelineError } from '@pgx-graph/shared'
import { log } from '../lib/log.js'

export const sourceUrl = (baseUrl: string, table: SourceTable) => `${baseUrl.replace(/\/+$/, '')}/${table}.zip`

/**
 * Fetch one PharmGKB archive and unpack it into `<rawDataDir>/<table>/`.
 * Each archive holds `<table>.tsv` next to its README and license files.
 * A single attempt is made.
 */
export async function downloadTable(
  baseUrl: string,
  table: SourceTable,
  rawDataDir: string,
  fetchImpl: typeof fetch = fetch,
): Promise<string> {
  const url = sourceUrl(baseUrl, table)
  const target = path.join(rawDataDir, table)
  log.debug(`GET ${url}`)

  const res = await fetchImpl(url)
  if (!res.ok) {
    throw new PipelineError(`download of ${url} failed: HTTP ${res.status}`)
  }
  const zip = new AdmZip(Buffer.from(await res.arrayBuffer()))
  zip.extractAllTo(target, true)
  return target
}

export async function downloadSources(
  baseUrl: string,
  rawDataDir: string,
  fetchImpl: typeof fetch = fetch,
): Promise<string[]> {
  const dirs: string[] = []
  for (const table of SOURCE_TABLES) {
    dirs.push(await downloadTable(baseUrl, table, rawDataDir, fetchImpl))
  }
  return dirs
}
