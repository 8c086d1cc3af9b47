#!/usr/bin/env tsx
import 'dotenv/config'
import fs from 'node:fs'
import { Command } from 'commander'
import chalk from 'chalk'
import { env, resolveWorkPaths } from '@pgx-graph/config'
import { setLogLevel } from '../lib/log.js'
import { PipelineRunner } from './runner.js'

interface CommonOptions {
  workDir: string
  out: string
  verbose?: boolean
}

const splitList = (value: string) => value.split(',')

const runPipeline = async (options: CommonOptions, steps?: string[], skip?: string[]) => {
  if (options.verbose) setLogLevel('debug')
  const runner = new PipelineRunner({
    workDir: options.workDir,
    output: options.out,
    sourceBaseUrl: env.PGX_SOURCE_BASE_URL
  })
  const report = await runner.run(steps, skip)

  if (!report.success) {
    console.error(chalk.red('\n❌ Pipeline failed'))
    process.exit(1)
  }
}

const program = new Command()

program
  .name('pgx-graph')
  .description('PharmGKB drug-gene tables to MCF graph nodes')
  .version('0.1.0')
  .option('-w, --work-dir <dir>', 'Directory holding raw_data/ and conversion/', env.PGX_WORK_DIR)
  .option('-o, --out <file>', 'Output MCF file, relative to the work dir', env.PGX_OUTPUT)
  .option('--verbose', 'Verbose output')

program
  .command('build')
  .description('Run the full pipeline: download, convert, verify')
  .option('-s, --step <steps>', 'Run only specific step(s)', splitList)
  .option('--skip <steps>', 'Skip specific step(s)', splitList)
  .action(async (options: { step?: string[]; skip?: string[] }) => {
    await runPipeline(program.opts<CommonOptions>(), options.step, options.skip)
  })

program
  .command('download')
  .description('Download and extract the PharmGKB archives only')
  .action(async () => {
    await runPipeline(program.opts<CommonOptions>(), ['download'])
  })

program
  .command('convert')
  .description('Convert already downloaded tables and verify the output')
  .action(async () => {
    await runPipeline(program.opts<CommonOptions>(), ['convert', 'verify'])
  })

program
  .command('clean')
  .description('Remove downloaded tables and the output file')
  .action(() => {
    const opts = program.opts<CommonOptions>()
    const paths = resolveWorkPaths(opts.workDir, opts.out)
    console.log(chalk.yellow('🧹 Cleaning build artifacts...'))
    fs.rmSync(paths.rawData, { recursive: true, force: true })
    fs.rmSync(paths.output, { force: true })
    console.log(chalk.green('✅ Clean completed'))
  })

// Handle direct execution
if (import.meta.url === `file://${process.argv[1]}`) {
  program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red('❌'), error)
    process.exit(1)
  })
}
