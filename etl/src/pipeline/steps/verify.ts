import fs from 'node:fs'
import { PipelineError, type ConversionSummary } from '@pgx-graph/shared'

export interface OutputCounts {
  blocks: number
  byType: Record<string, number>
}

/** Node blocks of an MCF document, split on blank lines. */
export function splitBlocks(mcf: string): string[] {
  return mcf
    .split(/\n[ \t]*\n/)
    .map(block => block.trim())
    .filter(Boolean)
}

export function countOutput(mcf: string): OutputCounts {
  const counts: OutputCounts = { blocks: 0, byType: {} }
  for (const [i, block] of splitBlocks(mcf).entries()) {
    const [head, ...rest] = block.split('\n')
    if (!head.startsWith('Node: ')) {
      throw new PipelineError(`block ${i + 1} does not start with a Node line: ${head}`)
    }
    const typeLine = rest.find(line => line.startsWith('typeOf: '))
    if (!typeLine) {
      throw new PipelineError(`block ${i + 1} (${head}) has no typeOf`)
    }
    const type = typeLine.slice('typeOf: '.length)
    counts.byType[type] = (counts.byType[type] ?? 0) + 1
    counts.blocks++
  }
  return counts
}

/**
 * Re-read the written file and check it holds exactly the blocks the
 * conversion reported.
 */
export function verifyOutput(outputPath: string, summary: ConversionSummary): OutputCounts {
  if (!fs.existsSync(outputPath)) {
    throw new PipelineError(`output not found: ${outputPath}`)
  }
  const counts = countOutput(fs.readFileSync(outputPath, 'utf-8'))
  const expected = summary.geneNodes + summary.drugNodes + summary.relationNodes
  if (counts.blocks !== expected) {
    throw new PipelineError(`output holds ${counts.blocks} node blocks, conversion wrote ${expected}`)
  }
  return counts
}
