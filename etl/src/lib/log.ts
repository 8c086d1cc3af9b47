import chalk from 'chalk'
import { env, type LogLevel } from '@pgx-graph/config'

const ORDER: Record<LogLevel, number> = { silent: 0, error: 1, warn: 2, info: 3, debug: 4 }

let level: LogLevel = env.PGX_LOG_LEVEL

export const setLogLevel = (next: LogLevel) => {
  level = next
}

const enabled = (at: LogLevel) => ORDER[level] >= ORDER[at]

export const log = {
  error: (msg: string) => {
    if (enabled('error')) console.error(chalk.red(msg))
  },
  warn: (msg: string) => {
    if (enabled('warn')) console.warn(chalk.yellow(`[warn] ${msg}`))
  },
  info: (msg: string) => {
    if (enabled('info')) console.log(msg)
  },
  debug: (msg: string) => {
    if (enabled('debug')) console.log(chalk.gray(msg))
  },
  isEnabled: enabled,
}
