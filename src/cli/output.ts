import type { DatasetSummary } from '@/lib/dataset/types'
import type { BankFailureRow, DimensionBreakdownRow, KpiSummary } from '@/lib/db/reports'
import type { InsightCard } from '@/lib/insights/types'
import { formatInr, formatInrPrecise, formatPercent, formatRate } from '@/lib/format'

export function formatValidation(errors: string[]): string[] {
  if (errors.length === 0) return ['Data validation passed!']
  return ['Validation errors found:', ...errors.map(e => `  - ${e}`)]
}

export function formatSummary(summary: DatasetSummary, highValueThreshold: number): string[] {
  const range = summary.date_range
    ? `${summary.date_range.start.slice(0, 10)} to ${summary.date_range.end.slice(0, 10)}`
    : 'n/a'

  const lines = [
    'Dataset Summary:',
    `  Total records: ${summary.total_records}`,
    `  Date range: ${range}`,
    `  Overall failure rate: ${formatRate(summary.overall_failure_rate)}`,
    `  Overall fraud flag rate: ${formatRate(summary.fraud_flag_rate)}`,
    `  Weekend Bill Payment failure rate: ${formatRate(summary.weekend_billpay_failure_rate)}`,
    `  High-value (> ${formatInr(highValueThreshold)}) fraud rate: ${formatRate(summary.high_value_fraud_rate)}`,
    '  Transactions by type:',
  ]
  for (const [type, n] of Object.entries(summary.transaction_type_distribution)) {
    lines.push(`    ${type}: ${n}`)
  }
  lines.push('  Avg Amount by Device:')
  for (const [device, avg] of Object.entries(summary.avg_amount_by_device)) {
    lines.push(`    ${device}: ${formatInrPrecise(avg)}`)
  }
  return lines
}

export function formatKpis(kpis: KpiSummary): string[] {
  return [
    `  Total volume: ${formatInr(kpis.totalVolume)}`,
    `  Transactions: ${kpis.transactionCount}`,
    `  Failure rate: ${formatPercent(kpis.failureRate)}`,
    `  Fraud rate: ${formatPercent(kpis.fraudRate, 2)}`,
  ]
}

export function formatBreakdown(rows: DimensionBreakdownRow[]): string[] {
  return rows.map(r =>
    `  ${r.value}: ${r.count} txns, ${formatInr(r.volume)}, ${formatPercent(r.failureRate)} failed, ${formatPercent(r.fraudRate)} flagged`
  )
}

export function formatBankFailures(rows: BankFailureRow[]): string[] {
  return rows.map(r => `  ${r.bank}: ${r.failed}/${r.total} failed (${formatPercent(r.failureRate)})`)
}

export function formatInsights(cards: InsightCard[]): string[] {
  if (cards.length === 0) return ['  No insights detected']
  return cards.flatMap(card => [
    `  [${card.severity}] ${card.headline}`,
    `      ${card.metric}`,
  ])
}
