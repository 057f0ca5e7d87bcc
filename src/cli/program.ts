import { Command, InvalidArgumentError } from 'commander'
import chalk from 'chalk'
import { loadCliDefaults, type CliDefaults } from '@/lib/config'
import { runGenerate, runReport } from './commands'

function parseInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return parsed
}

export function fail(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error)
  console.error(chalk.red(`❌ ${message}`))
  process.exitCode = 1
}

export function createProgram(defaults: CliDefaults): Command {
  const program = new Command()

  program
    .name('paydata')
    .description('Synthetic payment transaction dataset generator')
    .version('0.1.0')

  program
    .command('generate')
    .description('Generate the dataset, validate it and write it as CSV')
    .option('-n, --num-rows <count>', 'Number of records to generate', parseInteger, defaults.rows)
    .option('-o, --output <path>', 'Output CSV file path', defaults.output)
    .option('-s, --seed <seed>', 'Random seed for reproducibility', parseInteger, defaults.seed)
    .option('-d, --days-back <days>', 'Length of the timestamp window in days', parseInteger, defaults.daysBack)
    .action(async (options: { numRows: number; output: string; seed: number; daysBack: number }) => {
      process.exitCode = await runGenerate({
        rows: options.numRows,
        output: options.output,
        seed: options.seed,
        daysBack: options.daysBack,
      })
    })

  program
    .command('report')
    .description('Generate the dataset in memory and print dashboard aggregations')
    .option('-n, --num-rows <count>', 'Number of records to generate', parseInteger, defaults.rows)
    .option('-s, --seed <seed>', 'Random seed for reproducibility', parseInteger, defaults.seed)
    .option('-d, --days-back <days>', 'Length of the timestamp window in days', parseInteger, defaults.daysBack)
    .option('--watchlist-min <amount>', 'Minimum amount for the fraud watchlist', parseInteger, 5000)
    .action((options: { numRows: number; seed: number; daysBack: number; watchlistMin: number }) => {
      process.exitCode = runReport({
        rows: options.numRows,
        seed: options.seed,
        daysBack: options.daysBack,
        watchlistMin: options.watchlistMin,
      })
    })

  return program
}

/** Loads defaults from the environment and runs one command. Every error ends in `fail`. */
export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<void> {
  try {
    const program = createProgram(loadCliDefaults(env))
    await program.parseAsync(argv)
  } catch (error) {
    fail(error)
  }
}
