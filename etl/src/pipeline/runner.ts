import chalk from 'chalk'
import ora from 'ora'
import { resolveWorkPaths } from '@pgx-graph/config'
import { log } from '../lib/log.js'
import type { PipelineConfig, PipelineStep, BuildReport, RunContext, StepId } from './types.js'
import { pipelineConfig } from './config.js'

export interface RunnerOptions {
  workDir: string
  output?: string
  sourceBaseUrl: string
  fetch?: typeof fetch
  config?: PipelineConfig
}

export class PipelineRunner {
  private startTime = Date.now()
  private readonly config: PipelineConfig
  private readonly ctx: RunContext
  private report: BuildReport

  constructor(options: RunnerOptions) {
    this.config = options.config ?? pipelineConfig
    this.ctx = {
      paths: resolveWorkPaths(options.workDir, options.output),
      sourceBaseUrl: options.sourceBaseUrl,
      fetch: options.fetch ?? fetch
    }
    this.report = {
      success: false,
      duration: 0,
      output: this.ctx.paths.output,
      steps: [],
      summary: { geneNodes: 0, drugNodes: 0, relationNodes: 0, skippedRelations: 0 }
    }
  }

  async run(stepsToRun?: string[], skipSteps?: string[]): Promise<BuildReport> {
    this.startTime = Date.now()
    log.info(chalk.cyan('💊 PharmGKB MCF Pipeline'))
    log.info(chalk.cyan('='.repeat(50)))
    log.info('')

    const steps = this.filterSteps(this.config.steps, stepsToRun, skipSteps)

    for (const [i, step] of steps.entries()) {
      const stepStartTime = Date.now()
      const spinner = ora({
        text: `Step ${i + 1}/${steps.length}: ${step.name}`,
        color: 'cyan',
        isSilent: !log.isEnabled('info')
      }).start()

      try {
        const output = await step.run(this.ctx)
        this.report.steps.push({
          id: step.id,
          success: true,
          duration: Date.now() - stepStartTime,
          output
        })
        spinner.succeed(chalk.green(`✅ ${step.name}: ${output}`))
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        spinner.fail(chalk.red(`❌ ${step.name}`))
        log.error(`   ${message}`)

        this.report.steps.push({
          id: step.id,
          success: false,
          duration: Date.now() - stepStartTime,
          error: message
        })
        this.report.success = false
        this.report.duration = Date.now() - this.startTime
        return this.report
      }
    }

    if (this.ctx.summary) this.report.summary = this.ctx.summary
    this.report.success = true
    this.report.duration = Date.now() - this.startTime

    const { summary } = this.report
    log.info('')
    log.info(chalk.cyan('📊 CONVERSION SUMMARY'))
    log.info(chalk.cyan('='.repeat(50)))
    log.info(`🧬 Gene nodes: ${summary.geneNodes}`)
    log.info(`💊 Drug nodes: ${summary.drugNodes}`)
    log.info(`🔗 Relationship nodes: ${summary.relationNodes}`)
    log.info(`⚠️  Skipped relationships: ${summary.skippedRelations}`)
    log.info(`📄 Output: ${this.report.output}`)
    log.info(`⏱️  Execution time: ${(this.report.duration / 1000).toFixed(2)}s`)
    log.info(chalk.green('🎉 Pipeline completed successfully!'))

    return this.report
  }

  /**
   * Steps in pipeline order: the selected ones (all when `run` is empty)
   * minus `skip`, plus the dependencies of what remains unless skipped too.
   */
  filterSteps(steps: PipelineStep[], run?: string[], skip?: string[]): PipelineStep[] {
    const skipped = new Set(skip ?? [])
    const selected = new Set<StepId>(
      steps
        .filter(step => !run || run.length === 0 || run.includes(step.id))
        .filter(step => !skipped.has(step.id))
        .map(step => step.id)
    )

    // Add dependencies for selected steps
    const pending = [...selected]
    while (pending.length > 0) {
      const id = pending.pop()
      const step = steps.find(s => s.id === id)
      for (const dep of step?.dependencies ?? []) {
        if (!selected.has(dep) && !skipped.has(dep)) {
          selected.add(dep)
          pending.push(dep)
        }
      }
    }

    return steps.filter(step => selected.has(step.id))
  }
}
