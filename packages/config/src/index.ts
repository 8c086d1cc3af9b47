import { z } from 'zod'
import { PATHS, resolvePath } from './paths.js'

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

const schema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  // Directory holding raw_data/ and conversion/
  PGX_WORK_DIR: z.string().min(1).default(resolvePath(PATHS.workDir)),
  // Output file, relative to the work dir unless absolute
  PGX_OUTPUT: z.string().min(1).default(PATHS.output),
  PGX_SOURCE_BASE_URL: z.string().url().default('https://api.pharmgkb.org/v1/download/file/data'),
  PGX_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export type Env = z.infer<typeof schema>

export const parseEnv = (source: Record<string, string | undefined>): Env => schema.parse(source)

export const env = parseEnv(process.env)

export { PATHS, SOURCE_TABLES, resolvePath, resolveWorkPaths } from './paths.js'
export type { SourceTable, WorkPaths } from './paths.js'
