export type InsightSeverity = 'concerning' | 'notable' | 'favorable' | 'informational'

export type InsightType = 'weekend_failure_spike' | 'high_value_fraud' | 'device_amount_gap' | 'bank_failure_outlier'

export interface InsightBreakdown {
  label: string
  value: number
}

export interface InsightCard {
  id: string
  type: InsightType
  severity: InsightSeverity
  headline: string
  metric: string
  explanation: string
  lift: number
  score: number
  breakdown: InsightBreakdown[]
}
