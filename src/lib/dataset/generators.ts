// Deterministic transaction generator for the synthetic payment dataset

import type { GeneratorConfig } from './constants'
import { amountBounds, resolveGeneratorConfig } from './config'
import { RandomSource, randomSeed } from './random'
import { deriveTimeFields, truncateToSeconds } from './time'
import type { Dataset, DeviceType, Transaction, TransactionType } from './types'

export interface GeneratorOptions {
  seed?: number
  /** End of the timestamp window. Truncated to whole seconds. */
  now?: Date
  config?: Partial<GeneratorConfig>
}

export interface DatasetOptions extends GeneratorOptions {
  count?: number
}

export const DEFAULT_RECORD_COUNT = 500

function roundCurrency(amount: number): number {
  return Math.round(amount * 100) / 100
}

/**
 * Produces one transaction per call from a single seeded stream.
 *
 * Draw order per record: timestamp, type, device, amount (2 draws),
 * id (2 draws, repeated on collision), merchant category (non-P2P),
 * status, sender age, receiver age (P2P), state, sender bank,
 * receiver bank, network, fraud flag.
 */
export class TransactionGenerator {
  readonly seed: number
  readonly config: GeneratorConfig
  readonly windowEnd: Date
  private readonly random: RandomSource
  private readonly windowStartMs: number
  private readonly windowSeconds: number
  private readonly issuedIds = new Set<string>()

  constructor(options: GeneratorOptions = {}) {
    this.config = resolveGeneratorConfig(options.config)
    this.seed = options.seed ?? randomSeed()
    this.random = new RandomSource(this.seed)
    this.windowEnd = truncateToSeconds(options.now ?? new Date())
    this.windowSeconds = this.config.daysBack * 24 * 60 * 60
    this.windowStartMs = this.windowEnd.getTime() - this.windowSeconds * 1000
  }

  generateTransaction(): Transaction {
    const config = this.config

    // Timestamp first: the weekend flag drives the failure rate
    const timestamp = new Date(this.windowStartMs + this.random.integer(this.windowSeconds) * 1000)
    const time = deriveTimeFields(timestamp)
    const transactionType = this.random.weighted(config.transactionTypes)
    const deviceType = this.random.weighted(config.devices)

    // Amount before the fraud flag
    const amount = this.generateAmount(deviceType, transactionType)
    const transactionId = this.generateTransactionId()

    const isP2P = transactionType === 'P2P'
    const merchantCategory = transactionType === 'P2P'
      ? null
      : this.random.pick(config.merchantCategories[transactionType])

    const failureRate = transactionType === 'Bill Payment' && time.is_weekend === 1
      ? config.weekendBillPayFailureRate
      : config.baseFailureRate
    const status = this.random.bernoulli(failureRate) ? 'FAILED' : 'SUCCESS'

    const senderAgeGroup = this.random.weighted(config.ageGroups)
    const receiverAgeGroup = isP2P ? this.random.weighted(config.ageGroups) : null
    const senderState = this.random.weighted(config.states)
    const senderBank = this.random.weighted(config.banks)
    const receiverBank = this.random.weighted(config.banks)
    const networkType = this.random.weighted(config.networks)

    const fraudRate = amount > config.highValueThreshold ? config.highValueFraudRate : config.baseFraudRate
    const fraudFlag = this.random.bernoulli(fraudRate) ? 1 : 0

    return {
      transaction_id: transactionId,
      timestamp: timestamp.toISOString(),
      transaction_type: transactionType,
      merchant_category: merchantCategory,
      amount_inr: amount,
      transaction_status: status,
      sender_age_group: senderAgeGroup,
      receiver_age_group: receiverAgeGroup,
      sender_state: senderState,
      sender_bank: senderBank,
      receiver_bank: receiverBank,
      device_type: deviceType,
      network_type: networkType,
      fraud_flag: fraudFlag,
      ...time,
    }
  }

  /**
   * Right-skewed amount: log-normal centred on ln((min + max) / 4), clipped
   * to the device/type bounds.
   */
  private generateAmount(device: DeviceType, type: TransactionType): number {
    const [min, max] = amountBounds(this.config, device, type)
    const mu = Math.log((min + max) / 4)
    const raw = this.random.logNormal(mu, this.config.amountSigma)
    return roundCurrency(Math.min(max, Math.max(min, raw)))
  }

  private generateTransactionId(): string {
    let id = `TXN${this.random.hex(12)}`
    while (this.issuedIds.has(id)) {
      id = `TXN${this.random.hex(12)}`
    }
    this.issuedIds.add(id)
    return id
  }
}

export function generateDataset(options: DatasetOptions = {}): Dataset {
  const count = options.count ?? DEFAULT_RECORD_COUNT
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Record count must be a non-negative integer, got ${count}`)
  }

  const generator = new TransactionGenerator(options)
  const records: Transaction[] = []
  for (let i = 0; i < count; i++) {
    records.push(generator.generateTransaction())
  }

  // ISO strings in UTC sort by code unit; Array.prototype.sort is stable
  records.sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0))

  return {
    seed: generator.seed,
    generatedAt: generator.windowEnd.toISOString(),
    records,
  }
}
