import { DEFAULT_GENERATOR_CONFIG, type GeneratorConfig } from './constants'
import { amountBounds } from './config'
import { deriveTimeFields } from './time'
import type { DatasetSummary, Transaction } from './types'

function count(records: readonly Transaction[], predicate: (t: Transaction) => boolean): number {
  let n = 0
  for (const t of records) if (predicate(t)) n++
  return n
}

function rate(records: readonly Transaction[], predicate: (t: Transaction) => boolean): number | null {
  return records.length > 0 ? count(records, predicate) / records.length : null
}

const isFailed = (t: Transaction) => t.transaction_status === 'FAILED'
const isFlagged = (t: Transaction) => t.fraud_flag === 1

/**
 * Checks every row-level invariant of a generated table. Each rule reports
 * independently; an empty list means the table is valid.
 */
export function validateDataset(
  records: readonly Transaction[],
  config: GeneratorConfig = DEFAULT_GENERATOR_CONFIG,
): string[] {
  const errors: string[] = []
  const p2p = records.filter(t => t.transaction_type === 'P2P')
  const nonP2P = records.filter(t => t.transaction_type !== 'P2P')

  const p2pWithMerchant = count(p2p, t => t.merchant_category !== null)
  if (p2pWithMerchant > 0) {
    errors.push(`${p2pWithMerchant} P2P transactions have non-null merchant_category`)
  }

  const p2pWithoutReceiver = count(p2p, t => t.receiver_age_group === null)
  if (p2pWithoutReceiver > 0) {
    errors.push(`${p2pWithoutReceiver} P2P transactions have null receiver_age_group`)
  }

  const nonP2PWithReceiver = count(nonP2P, t => t.receiver_age_group !== null)
  if (nonP2PWithReceiver > 0) {
    errors.push(`${nonP2PWithReceiver} non-P2P transactions have non-null receiver_age_group`)
  }

  const nonP2PWithoutMerchant = count(nonP2P, t => t.merchant_category === null)
  if (nonP2PWithoutMerchant > 0) {
    errors.push(`${nonP2PWithoutMerchant} non-P2P transactions have null merchant_category`)
  }

  const outOfRange = count(records, t => {
    const [min, max] = amountBounds(config, t.device_type, t.transaction_type)
    return !(t.amount_inr >= min && t.amount_inr <= max)
  })
  if (outOfRange > 0) {
    errors.push(`${outOfRange} transactions have amount_inr outside their device/type range`)
  }

  const inconsistentTime = count(records, t => {
    const derived = deriveTimeFields(t.timestamp)
    return derived.hour_of_day !== t.hour_of_day
      || derived.day_of_week !== t.day_of_week
      || derived.is_weekend !== t.is_weekend
  })
  if (inconsistentTime > 0) {
    errors.push(`${inconsistentTime} transactions have derived time fields that disagree with timestamp`)
  }

  const seen = new Set<string>()
  let duplicates = 0
  for (const t of records) {
    if (seen.has(t.transaction_id)) duplicates++
    seen.add(t.transaction_id)
  }
  if (duplicates > 0) {
    errors.push(`${duplicates} transactions repeat an earlier transaction_id`)
  }

  return errors
}

export function summarizeDataset(
  records: readonly Transaction[],
  config: GeneratorConfig = DEFAULT_GENERATOR_CONFIG,
): DatasetSummary {
  const typeCounts = new Map<string, number>()
  const deviceTotals = new Map<string, { sum: number; n: number }>()
  let start: string | null = null
  let end: string | null = null

  for (const t of records) {
    typeCounts.set(t.transaction_type, (typeCounts.get(t.transaction_type) ?? 0) + 1)
    const device = deviceTotals.get(t.device_type) ?? { sum: 0, n: 0 }
    device.sum += t.amount_inr
    device.n++
    deviceTotals.set(t.device_type, device)
    if (start === null || t.timestamp < start) start = t.timestamp
    if (end === null || t.timestamp > end) end = t.timestamp
  }

  // Most frequent first
  const distribution = Object.fromEntries(
    [...typeCounts.entries()].sort((a, b) => b[1] - a[1])
  )
  const avgByDevice = Object.fromEntries(
    [...deviceTotals.entries()]
      .sort((a, b) => a[0].localeCompare(b[0]))
      .map(([device, { sum, n }]) => [device, sum / n])
  )

  const weekendBillPay = records.filter(t => t.transaction_type === 'Bill Payment' && t.is_weekend === 1)
  const highValue = records.filter(t => t.amount_inr > config.highValueThreshold)

  return {
    total_records: records.length,
    date_range: start !== null && end !== null ? { start, end } : null,
    transaction_type_distribution: distribution,
    overall_failure_rate: rate(records, isFailed),
    fraud_flag_rate: rate(records, isFlagged),
    weekend_billpay_failure_rate: rate(weekendBillPay, isFailed),
    high_value_fraud_rate: rate(highValue, isFlagged),
    avg_amount_by_device: avgByDevice,
    p2p_null_merchant_check: records.every(t => t.transaction_type !== 'P2P' || t.merchant_category === null),
    non_p2p_null_receiver_age_check: records.every(t => t.transaction_type === 'P2P' || t.receiver_age_group === null),
  }
}
