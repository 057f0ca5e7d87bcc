import { z } from 'zod'
import { DEFAULT_GENERATOR_CONFIG, deepFreeze, type AmountRange, type GeneratorConfig } from './constants'
import { DEVICE_TYPES, NETWORK_TYPES, TRANSACTION_TYPES, type DeviceType, type TransactionType } from './types'

export class GeneratorConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid generator configuration: ${issues.join('; ')}`)
    this.name = 'GeneratorConfigError'
    this.issues = issues
  }
}

function weightedTableSchema<T extends z.ZodTypeAny>(option: T) {
  return z.object({
    options: z.array(option).min(1, 'needs at least one option'),
    weights: z.array(z.number().nonnegative('weights must be non-negative')),
  }).superRefine((table, ctx) => {
    if (table.options.length !== table.weights.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${table.options.length} options but ${table.weights.length} weights`,
      })
    }
    const total = table.weights.reduce((sum, w) => sum + w, 0)
    if (!(total > 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'weights must sum to a positive value' })
    }
  })
}

const rangeSchema = z.tuple([z.number().positive(), z.number().positive()])
  .refine(([min, max]) => min <= max, 'min must not exceed max')

const limitSchema = z.object({
  floor: z.number().positive().optional(),
  cap: z.number().positive().optional(),
})

const rateSchema = z.number().min(0).max(1)

const generatorConfigSchema = z.object({
  transactionTypes: weightedTableSchema(z.enum(TRANSACTION_TYPES)),
  devices: weightedTableSchema(z.enum(DEVICE_TYPES)),
  networks: weightedTableSchema(z.enum(NETWORK_TYPES)),
  ageGroups: weightedTableSchema(z.string().min(1)),
  states: weightedTableSchema(z.string().min(1)),
  banks: weightedTableSchema(z.string().min(1)),
  merchantCategories: z.object({
    'P2M': z.array(z.string().min(1)).min(1),
    'Bill Payment': z.array(z.string().min(1)).min(1),
    'Recharge': z.array(z.string().min(1)).min(1),
  }),
  amountRanges: z.object({ Android: rangeSchema, iOS: rangeSchema, Web: rangeSchema }),
  amountLimitsByType: z.object({
    'P2P': limitSchema,
    'P2M': limitSchema,
    'Bill Payment': limitSchema,
    'Recharge': limitSchema,
  }),
  amountSigma: z.number().positive(),
  baseFailureRate: rateSchema,
  weekendBillPayFailureRate: rateSchema,
  baseFraudRate: rateSchema,
  highValueFraudRate: rateSchema,
  highValueThreshold: z.number().positive(),
  daysBack: z.number().int().positive(),
})

/**
 * Clipping bounds for an amount: the device range, narrowed by the
 * transaction type's floor and cap.
 */
export function amountBounds(config: GeneratorConfig, device: DeviceType, type: TransactionType): AmountRange {
  const [deviceMin, deviceMax] = config.amountRanges[device]
  const limit = config.amountLimitsByType[type]
  const min = limit.floor !== undefined ? Math.max(deviceMin, limit.floor) : deviceMin
  const max = limit.cap !== undefined ? Math.min(deviceMax, limit.cap) : deviceMax
  return [min, max]
}

/**
 * Merges overrides onto the defaults and validates the result. The returned
 * config is a deep copy, frozen all the way down, so later changes to the
 * override objects cannot reach it.
 */
export function resolveGeneratorConfig(overrides: Partial<GeneratorConfig> = {}): GeneratorConfig {
  const result = generatorConfigSchema.safeParse({ ...DEFAULT_GENERATOR_CONFIG, ...overrides })
  if (!result.success) {
    throw new GeneratorConfigError(
      result.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    )
  }

  // zod returns fresh objects and arrays
  const config: GeneratorConfig = result.data

  const empty: string[] = []
  for (const device of DEVICE_TYPES) {
    for (const type of TRANSACTION_TYPES) {
      const [min, max] = amountBounds(config, device, type)
      if (min > max) empty.push(`amount range for ${device}/${type} is empty (${min} > ${max})`)
    }
  }
  if (empty.length > 0) throw new GeneratorConfigError(empty)

  return deepFreeze(config)
}
