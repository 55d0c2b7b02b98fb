/**
 * Command-line run: env config → grant CSV → plan → markdown report.
 *
 * Returns a process exit code instead of exiting so it can be driven from
 * tests with an in-memory file reader and output sink.
 */

import { readFileSync } from 'node:fs'
import { loadConfig } from './config'
import { isPlannerError } from './model/errors'
import { parseGrantsCsv } from './intake/csv/grants'
import { planSales } from './rules/engine'
import { renderPlanMarkdown } from './report/format'
import { Logger, stderrSink } from './utils/logger'

export interface CliDependencies {
  readFile?: (path: string) => string
  write?: (text: string) => void
  /** Built from LOG_LEVEL when omitted, writing to stderr only. */
  logger?: Logger
  today?: () => string
}

export const EXIT_OK = 0
export const EXIT_FAILURE = 1

export function runCli(env: NodeJS.ProcessEnv, deps: CliDependencies = {}): number {
  const readFile = deps.readFile ?? ((path: string) => readFileSync(path, 'utf-8'))
  const write = deps.write ?? ((text: string) => { process.stdout.write(text) })
  let log = deps.logger ?? new Logger({ sink: stderrSink })

  try {
    const config = loadConfig(env)
    log = deps.logger ?? new Logger({ level: config.logLevel, sink: stderrSink })

    const imported = parseGrantsCsv(readFile(config.grantsCsvPath))
    for (const warning of imported.warnings) {
      log.warn('Grant CSV warning', { file: config.grantsCsvPath, warning })
    }
    if (imported.errors.length > 0) {
      log.error('Grant CSV rejected', { file: config.grantsCsvPath, errors: imported.errors })
      return EXIT_FAILURE
    }

    const outcome = planSales(
      {
        entries: imported.entries,
        currentTaxableIncome: config.currentTaxableIncome,
        bracketCeiling: config.bracketCeiling,
        taxYear: config.taxYear,
        saleDate: config.saleDate,
        manualAllocation: config.manualAllocation,
        onOverflow: config.onOverflow,
      },
      { logger: log, today: deps.today },
    )

    write(renderPlanMarkdown(outcome))
    return EXIT_OK
  } catch (err) {
    if (isPlannerError(err)) {
      log.error(err.message, { code: err.code, ...err.details })
      return EXIT_FAILURE
    }
    throw err
  }
}
