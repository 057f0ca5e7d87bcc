import chalk from 'chalk'
import { DEFAULT_GENERATOR_CONFIG } from '@/lib/dataset/constants'
import { writeDatasetCsv } from '@/lib/dataset/csv'
import { generateDataset } from '@/lib/dataset/generators'
import { summarizeDataset, validateDataset } from '@/lib/dataset/validation'
import { openReportDb } from '@/lib/db'
import {
  getBankFailureRates,
  getDimensionBreakdown,
  getFraudWatchlist,
  getKpiSummary,
  getRedFlagLedger,
} from '@/lib/db/reports'
import { detectInsights } from '@/lib/insights/detection'
import {
  formatBankFailures,
  formatBreakdown,
  formatInsights,
  formatKpis,
  formatSummary,
  formatValidation,
} from './output'

export interface GenerateOptions {
  rows: number
  output: string
  seed: number
  daysBack: number
  now?: Date
}

export interface ReportOptions {
  rows: number
  seed: number
  daysBack: number
  watchlistMin: number
  now?: Date
}

/**
 * Generates, validates and writes the dataset. Violations are reported but
 * do not stop the write. Returns the process exit code.
 */
export async function runGenerate(options: GenerateOptions): Promise<number> {
  console.log(`[generate] Generating ${options.rows} transactions (seed ${options.seed}, last ${options.daysBack} days)`)
  const t0 = Date.now()
  const dataset = generateDataset({
    count: options.rows,
    seed: options.seed,
    now: options.now,
    config: { daysBack: options.daysBack },
  })
  console.log(`[generate] Generated in ${((Date.now() - t0) / 1000).toFixed(2)}s`)

  const errors = validateDataset(dataset.records)
  const [first, ...rest] = formatValidation(errors)
  console.log(errors.length === 0 ? chalk.green(first) : chalk.yellow(first))
  for (const line of rest) console.log(line)

  const summary = summarizeDataset(dataset.records)
  console.log('')
  for (const line of formatSummary(summary, DEFAULT_GENERATOR_CONFIG.highValueThreshold)) console.log(line)

  try {
    await writeDatasetCsv(options.output, dataset.records)
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    console.error(chalk.red(`[generate] Failed to write ${options.output}: ${message}`))
    return 1
  }

  console.log('')
  console.log(chalk.blue(`Dataset saved to: ${options.output}`))
  return 0
}

export function runReport(options: ReportOptions): number {
  const dataset = generateDataset({
    count: options.rows,
    seed: options.seed,
    now: options.now,
    config: { daysBack: options.daysBack },
  })
  console.log(`[report] Loaded ${dataset.records.length} transactions (seed ${dataset.seed})`)

  const db = openReportDb(dataset.records)
  try {
    const section = (title: string, lines: string[]) => {
      console.log('')
      console.log(chalk.bold(title))
      for (const line of lines) console.log(line)
    }

    section('Key metrics', formatKpis(getKpiSummary(db)))
    section('By transaction type', formatBreakdown(getDimensionBreakdown(db, 'transaction_type')))
    section('Failure rate by sender bank', formatBankFailures(getBankFailureRates(db)))

    const ledger = getRedFlagLedger(db)
    const watchlist = getFraudWatchlist(db, options.watchlistMin)
    section('Review queues', [
      `  Weekend failures: ${ledger.length}`,
      `  Flagged above ${options.watchlistMin}: ${watchlist.length}`,
    ])

    section('Insights', formatInsights(detectInsights(db)))
  } finally {
    db.close()
  }
  return 0
}
