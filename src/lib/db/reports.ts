import type Database from 'better-sqlite3'
import type { DeviceType, TransactionType } from '@/lib/dataset/types'

export interface ReportFilters {
  start_date?: string            // YYYY-MM-DD, inclusive
  end_date?: string              // YYYY-MM-DD, inclusive
  transaction_type?: TransactionType
  device_type?: DeviceType
  is_weekend?: boolean
}

export const REPORT_DIMENSIONS = [
  'transaction_type',
  'merchant_category',
  'device_type',
  'network_type',
  'sender_state',
  'sender_bank',
  'receiver_bank',
  'sender_age_group',
  'receiver_age_group',
  'day_of_week',
] as const

export type ReportDimension = typeof REPORT_DIMENSIONS[number]

export interface KpiSummary {
  totalVolume: number
  transactionCount: number
  failureRate: number
  fraudRate: number
}

export interface DimensionBreakdownRow {
  value: string
  count: number
  volume: number
  failureRate: number
  fraudRate: number
  avgAmount: number
}

export interface HourlyVolumeRow {
  hour: number
  dayType: 'Weekday' | 'Weekend'
  count: number
  volume: number
  failureRate: number
}

export interface BankFailureRow {
  bank: string
  total: number
  failed: number
  failureRate: number
}

export interface DailyVolumeRow {
  date: string
  count: number
  volume: number
  failed: number
}

export interface RedFlagRow {
  transaction_id: string
  timestamp: string
  merchant_category: string | null
  amount_inr: number
  sender_bank: string
}

export interface WatchlistRow {
  transaction_id: string
  amount_inr: number
  sender_age_group: string
  receiver_bank: string
}

export function isReportDimension(name: string): name is ReportDimension {
  return (REPORT_DIMENSIONS as readonly string[]).includes(name)
}

function buildWhere(filters: ReportFilters, extra: string[] = []): { where: string; params: unknown[] } {
  const conditions: string[] = [...extra]
  const params: unknown[] = []

  if (filters.start_date) {
    conditions.push('substr(t.timestamp, 1, 10) >= ?')
    params.push(filters.start_date)
  }
  if (filters.end_date) {
    conditions.push('substr(t.timestamp, 1, 10) <= ?')
    params.push(filters.end_date)
  }
  if (filters.transaction_type) {
    conditions.push('t.transaction_type = ?')
    params.push(filters.transaction_type)
  }
  if (filters.device_type) {
    conditions.push('t.device_type = ?')
    params.push(filters.device_type)
  }
  if (filters.is_weekend !== undefined) {
    conditions.push('t.is_weekend = ?')
    params.push(filters.is_weekend ? 1 : 0)
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : ''
  return { where, params }
}

const FAILURE_PCT = "100.0 * SUM(CASE WHEN t.transaction_status = 'FAILED' THEN 1 ELSE 0 END) / COUNT(*)"
const FRAUD_PCT = '100.0 * SUM(t.fraud_flag) / COUNT(*)'

export function getKpiSummary(db: Database.Database, filters: ReportFilters = {}): KpiSummary {
  const { where, params } = buildWhere(filters)

  const row = db.prepare(`
    SELECT
      COALESCE(SUM(t.amount_inr), 0) as totalVolume,
      COUNT(*) as transactionCount,
      COALESCE(${FAILURE_PCT}, 0) as failureRate,
      COALESCE(${FRAUD_PCT}, 0) as fraudRate
    FROM transactions t
    ${where}
  `).get(params) as KpiSummary

  return row
}

export function getDimensionBreakdown(
  db: Database.Database,
  dimension: ReportDimension,
  filters: ReportFilters = {}
): DimensionBreakdownRow[] {
  // Dimension is interpolated; only whitelisted column names get this far
  if (!isReportDimension(dimension)) throw new Error(`Unknown report dimension: ${dimension}`)
  const { where, params } = buildWhere(filters)

  return db.prepare(`
    SELECT
      COALESCE(t.${dimension}, 'N/A') as value,
      COUNT(*) as count,
      SUM(t.amount_inr) as volume,
      ${FAILURE_PCT} as failureRate,
      ${FRAUD_PCT} as fraudRate,
      AVG(t.amount_inr) as avgAmount
    FROM transactions t
    ${where}
    GROUP BY value
    ORDER BY count DESC, value ASC
  `).all(params) as DimensionBreakdownRow[]
}

export function getHourlyVolume(db: Database.Database, filters: ReportFilters = {}): HourlyVolumeRow[] {
  const { where, params } = buildWhere(filters)

  return db.prepare(`
    SELECT
      t.hour_of_day as hour,
      CASE WHEN t.is_weekend = 1 THEN 'Weekend' ELSE 'Weekday' END as dayType,
      COUNT(*) as count,
      SUM(t.amount_inr) as volume,
      ${FAILURE_PCT} as failureRate
    FROM transactions t
    ${where}
    GROUP BY hour, dayType
    ORDER BY hour ASC, dayType ASC
  `).all(params) as HourlyVolumeRow[]
}

export function getBankFailureRates(db: Database.Database, filters: ReportFilters = {}): BankFailureRow[] {
  const { where, params } = buildWhere(filters)

  return db.prepare(`
    SELECT
      t.sender_bank as bank,
      COUNT(*) as total,
      SUM(CASE WHEN t.transaction_status = 'FAILED' THEN 1 ELSE 0 END) as failed,
      ${FAILURE_PCT} as failureRate
    FROM transactions t
    ${where}
    GROUP BY bank
    ORDER BY failureRate ASC, bank ASC
  `).all(params) as BankFailureRow[]
}

export function getDailyVolume(db: Database.Database, filters: ReportFilters = {}): DailyVolumeRow[] {
  const { where, params } = buildWhere(filters)

  return db.prepare(`
    SELECT
      substr(t.timestamp, 1, 10) as date,
      COUNT(*) as count,
      SUM(t.amount_inr) as volume,
      SUM(CASE WHEN t.transaction_status = 'FAILED' THEN 1 ELSE 0 END) as failed
    FROM transactions t
    ${where}
    GROUP BY date
    ORDER BY date ASC
  `).all(params) as DailyVolumeRow[]
}

/** Failed transactions that happened on a weekend, newest first. */
export function getRedFlagLedger(db: Database.Database, filters: ReportFilters = {}): RedFlagRow[] {
  const { where, params } = buildWhere(
    { ...filters, is_weekend: undefined },
    ["t.transaction_status = 'FAILED'", 't.is_weekend = 1']
  )

  return db.prepare(`
    SELECT t.transaction_id, t.timestamp, t.merchant_category, t.amount_inr, t.sender_bank
    FROM transactions t
    ${where}
    ORDER BY t.timestamp DESC
  `).all(params) as RedFlagRow[]
}

/** Fraud-flagged transactions above `minAmount`, largest first. */
export function getFraudWatchlist(
  db: Database.Database,
  minAmount = 5000,
  filters: ReportFilters = {}
): WatchlistRow[] {
  const { where, params } = buildWhere(filters, ['t.fraud_flag = 1', 't.amount_inr > ?'])

  return db.prepare(`
    SELECT t.transaction_id, t.amount_inr, t.sender_age_group, t.receiver_bank
    FROM transactions t
    ${where}
    ORDER BY t.amount_inr DESC
  `).all([minAmount, ...params]) as WatchlistRow[]
}
