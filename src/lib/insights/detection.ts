import type Database from 'better-sqlite3'
import { DEFAULT_GENERATOR_CONFIG } from '@/lib/dataset/constants'
import { getBankFailureRates, getKpiSummary } from '@/lib/db/reports'
import { formatInr, formatPercent } from '@/lib/format'
import type { InsightCard } from './types'
import { rankInsights, scoreInsight } from './ranking'

interface SliceRow {
  total: number
  hits: number
}

interface DeviceAverage {
  device: string
  avg: number
  count: number
}

const MAX_LIFT = 5
const MIN_WEEKEND_FAILURE_PCT = 10
const MIN_WEEKEND_LIFT = 1.5
const MIN_FRAUD_LIFT = 2
const MIN_DEVICE_GAP = 1.25
const MIN_BANK_LIFT = 1.25
const MIN_BANK_SAMPLE = 20

function pct(row: SliceRow): number {
  return row.total > 0 ? (row.hits / row.total) * 100 : 0
}

function liftOf(value: number, baseline: number): number {
  if (baseline > 0) return value / baseline
  return value > 0 ? MAX_LIFT : 1
}

export function detectWeekendFailureSpike(db: Database.Database): InsightCard[] {
  const rows = db.prepare(`
    SELECT
      t.is_weekend as isWeekend,
      COUNT(*) as total,
      SUM(CASE WHEN t.transaction_status = 'FAILED' THEN 1 ELSE 0 END) as hits
    FROM transactions t
    WHERE t.transaction_type = 'Bill Payment'
    GROUP BY t.is_weekend
  `).all() as Array<SliceRow & { isWeekend: number }>

  const weekend = rows.find(r => r.isWeekend === 1)
  const weekday = rows.find(r => r.isWeekend === 0)
  if (!weekend || !weekday) return []

  const weekendRate = pct(weekend)
  const weekdayRate = pct(weekday)
  const lift = liftOf(weekendRate, weekdayRate)
  if (weekendRate < MIN_WEEKEND_FAILURE_PCT || lift < MIN_WEEKEND_LIFT) return []

  const card: InsightCard = {
    id: 'weekend-failure-bill-payment',
    type: 'weekend_failure_spike',
    severity: 'concerning',
    headline: `Bill Payment failures ${lift.toFixed(1)}x higher on weekends`,
    metric: `${formatPercent(weekendRate)} weekend vs ${formatPercent(weekdayRate)} weekday`,
    explanation: `${weekend.hits} of ${weekend.total} weekend Bill Payment transactions failed. Review biller gateway availability on Saturdays and Sundays.`,
    lift,
    score: 0,
    breakdown: [
      { label: 'Weekend', value: weekendRate },
      { label: 'Weekday', value: weekdayRate },
    ],
  }
  card.score = scoreInsight(card)
  return [card]
}

export function detectHighValueFraud(
  db: Database.Database,
  threshold = DEFAULT_GENERATOR_CONFIG.highValueThreshold
): InsightCard[] {
  const slice = (condition: string) => db.prepare(`
    SELECT COUNT(*) as total, COALESCE(SUM(t.fraud_flag), 0) as hits
    FROM transactions t
    WHERE ${condition}
  `).get(threshold) as SliceRow

  const highValue = slice('t.amount_inr > ?')
  const rest = slice('t.amount_inr <= ?')
  if (highValue.total === 0 || highValue.hits === 0) return []

  const highRate = pct(highValue)
  const restRate = pct(rest)
  const lift = liftOf(highRate, restRate)
  if (lift < MIN_FRAUD_LIFT) return []

  const card: InsightCard = {
    id: 'high-value-fraud',
    type: 'high_value_fraud',
    severity: 'concerning',
    headline: `Transactions above ${formatInr(threshold)} are flagged ${lift.toFixed(1)}x as often`,
    metric: `${formatPercent(highRate)} flagged vs ${formatPercent(restRate)} below threshold`,
    explanation: `${highValue.hits} of ${highValue.total} high-value transactions carry a fraud flag. Add step-up verification above ${formatInr(threshold)}.`,
    lift,
    score: 0,
    breakdown: [
      { label: 'High value', value: highRate },
      { label: 'Below threshold', value: restRate },
    ],
  }
  card.score = scoreInsight(card)
  return [card]
}

export function detectDeviceAmountGap(db: Database.Database): InsightCard[] {
  const rows = db.prepare(`
    SELECT t.device_type as device, AVG(t.amount_inr) as avg, COUNT(*) as count
    FROM transactions t
    GROUP BY t.device_type
    ORDER BY avg DESC
  `).all() as DeviceAverage[]

  if (rows.length < 2) return []
  const top = rows[0]
  const bottom = rows[rows.length - 1]
  const lift = liftOf(top.avg, bottom.avg)
  if (lift < MIN_DEVICE_GAP) return []

  const card: InsightCard = {
    id: `device-gap-${top.device.toLowerCase()}-${bottom.device.toLowerCase()}`,
    type: 'device_amount_gap',
    severity: 'informational',
    headline: `${top.device} transactions average ${lift.toFixed(1)}x the ${bottom.device} ticket size`,
    metric: `${formatInr(top.avg)} vs ${formatInr(bottom.avg)} average`,
    explanation: `Average amount by device: ${rows.map(r => `${r.device} ${formatInr(r.avg)}`).join(', ')}.`,
    lift,
    score: 0,
    breakdown: rows.map(r => ({ label: r.device, value: r.avg })),
  }
  card.score = scoreInsight(card)
  return [card]
}

export function detectBankFailureOutlier(db: Database.Database): InsightCard[] {
  const banks = getBankFailureRates(db)
  if (banks.length < 2) return []

  // Ascending by failure rate, so the worst bank is last
  const worst = banks[banks.length - 1]
  const overall = getKpiSummary(db).failureRate
  if (worst.total < MIN_BANK_SAMPLE || overall === 0) return []

  const lift = liftOf(worst.failureRate, overall)
  if (lift < MIN_BANK_LIFT) return []

  const card: InsightCard = {
    id: `bank-failure-${worst.bank.toLowerCase().replace(/\s+/g, '-')}`,
    type: 'bank_failure_outlier',
    severity: 'notable',
    headline: `${worst.bank} fails ${lift.toFixed(1)}x the overall rate`,
    metric: `${formatPercent(worst.failureRate)} vs ${formatPercent(overall)} overall`,
    explanation: `${worst.failed} of ${worst.total} transactions sent from ${worst.bank} failed.`,
    lift,
    score: 0,
    breakdown: banks.map(b => ({ label: b.bank, value: b.failureRate })),
  }
  card.score = scoreInsight(card)
  return [card]
}

export function detectInsights(db: Database.Database): InsightCard[] {
  return rankInsights([
    ...detectWeekendFailureSpike(db),
    ...detectHighValueFraud(db),
    ...detectDeviceAmountGap(db),
    ...detectBankFailureOutlier(db),
  ])
}
