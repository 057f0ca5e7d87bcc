import { z } from 'zod'

export interface CliDefaults {
  rows: number
  seed: number
  output: string
  daysBack: number
}

const envSchema = z.object({
  DATASET_ROWS: z.coerce.number().int().nonnegative().default(500),
  DATASET_SEED: z.coerce.number().int().nonnegative().default(42),
  DATASET_OUTPUT: z.string().min(1).default('data/transactions.csv'),
  DATASET_DAYS_BACK: z.coerce.number().int().positive().default(30),
})

export function loadCliDefaults(env: NodeJS.ProcessEnv = process.env): CliDefaults {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const details = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid environment configuration: ${details}`)
  }
  return {
    rows: result.data.DATASET_ROWS,
    seed: result.data.DATASET_SEED,
    output: result.data.DATASET_OUTPUT,
    daysBack: result.data.DATASET_DAYS_BACK,
  }
}
