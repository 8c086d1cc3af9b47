import type { WorkPaths } from '@pgx-graph/config'
import type { ConversionSummary } from '@pgx-graph/shared'

export type StepId = 'download' | 'convert' | 'verify'

/** State shared by the steps of one run. */
export interface RunContext {
  paths: WorkPaths
  sourceBaseUrl: string
  fetch: typeof fetch
  // Set by the convert step
  summary?: ConversionSummary
}

export interface PipelineStep {
  id: StepId
  name: string
  description: string
  run: (ctx: RunContext) => Promise<string>
  dependencies?: StepId[]
}

export interface PipelineConfig {
  steps: PipelineStep[]
}

export interface BuildReport {
  success: boolean
  duration: number
  output: string
  steps: Array<{
    id: StepId
    success: boolean
    duration: number
    output?: string
    error?: string
  }>
  summary: ConversionSummary
}
