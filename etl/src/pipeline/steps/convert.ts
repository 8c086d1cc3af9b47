import fs from 'node:fs'
import path from 'node:path'
import { once } from 'node:events'
import type { WorkPaths } from '@pgx-graph/config'
import { emptyIdentifierMaps, type ConversionSummary } from '@pgx-graph/shared'
import { loadSourceTables, type SourceTables } from '../../load/records.js'
import { emitDrugNodes, emitGeneNodes, emitRelationNodes } from '../../mcf/emit.js'

async function writeBlocks(out: fs.WriteStream, blocks: Iterable<string>): Promise<number> {
  let count = 0
  for (const block of blocks) {
    // Blank line between node blocks
    if (!out.write(block + '\n')) await once(out, 'drain')
    count++
  }
  return count
}

/**
 * Write gene, drug, then relationship nodes for `tables` to `outputPath`.
 * The relationship pass only sees the identifier maps filled by the first two.
 */
export async function convertTables(tables: SourceTables, outputPath: string): Promise<ConversionSummary> {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true })
  const out = fs.createWriteStream(outputPath, 'utf-8')
  const summary: ConversionSummary = { geneNodes: 0, drugNodes: 0, relationNodes: 0, skippedRelations: 0 }
  const maps = emptyIdentifierMaps()
  let writeError: Error | undefined
  out.on('error', err => {
    writeError = err
  })

  try {
    summary.geneNodes = await writeBlocks(out, emitGeneNodes(tables.genes, maps))
    summary.drugNodes = await writeBlocks(out, emitDrugNodes(tables.drugs, maps))
    summary.relationNodes = await writeBlocks(
      out,
      emitRelationNodes(tables.relations, maps, {
        onSkip: () => {
          summary.skippedRelations++
        },
      }),
    )
  } finally {
    if (!out.closed) {
      out.end()
      await once(out, 'close')
    }
  }
  if (writeError) throw writeError
  return summary
}

export async function runConvert(paths: WorkPaths): Promise<ConversionSummary> {
  const tables = await loadSourceTables(paths)
  return convertTables(tables, paths.output)
}
