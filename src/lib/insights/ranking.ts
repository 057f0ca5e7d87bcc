import type { InsightCard, InsightSeverity } from './types'

export function scoreLift(lift: number): number {
  if (lift >= 4) return 40
  if (lift >= 2.5) return 30
  if (lift >= 1.5) return 20
  return 10
}

export function scoreSeverity(severity: InsightSeverity): number {
  switch (severity) {
    case 'concerning': return 20
    case 'notable': return 15
    case 'informational': return 10
    case 'favorable': return 5
  }
}

export function scoreInsight(insight: Pick<InsightCard, 'lift' | 'severity'>): number {
  return scoreLift(insight.lift) + scoreSeverity(insight.severity)
}

export function rankInsights(insights: InsightCard[]): InsightCard[] {
  return [...insights].sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
}
