import type { PipelineConfig } from './types.js'
import { downloadSources } from '../load/download.js'
import { runConvert } from './steps/convert.js'
import { verifyOutput } from './steps/verify.js'

export const pipelineConfig: PipelineConfig = {
  steps: [
    {
      id: 'download',
      name: 'Download PharmGKB tables',
      description: 'Fetch chemicals, drugs, genes and relationships archives and extract them into raw_data/',
      run: async ctx => {
        const dirs = await downloadSources(ctx.sourceBaseUrl, ctx.paths.rawData, ctx.fetch)
        return `${dirs.length} archives extracted`
      }
    },
    {
      id: 'convert',
      name: 'Convert tables to MCF',
      description: 'Resolve drug identifiers and write gene, drug and relationship nodes',
      run: async ctx => {
        ctx.summary = await runConvert(ctx.paths)
        const { geneNodes, drugNodes, relationNodes, skippedRelations } = ctx.summary
        return `${geneNodes} gene, ${drugNodes} drug, ${relationNodes} relationship nodes (${skippedRelations} relationships skipped)`
      }
    },
    {
      id: 'verify',
      name: 'Verify output',
      description: 'Re-read the MCF file and check its node blocks against the conversion summary',
      dependencies: ['convert'],
      run: async ctx => {
        if (!ctx.summary) throw new Error('verify needs the summary of a convert step in the same run')
        const counts = verifyOutput(ctx.paths.output, ctx.summary)
        return `${counts.blocks} node blocks`
      }
    }
  ]
}
