import type { Flag } from './types'

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const

export interface TimeFields {
  hour_of_day: number
  day_of_week: string
  is_weekend: Flag
}

// All derived fields are read in UTC so a table means the same thing on every machine
export function deriveTimeFields(timestamp: string | Date): TimeFields {
  const d = typeof timestamp === 'string' ? new Date(timestamp) : timestamp
  const day = d.getUTCDay()
  return {
    hour_of_day: d.getUTCHours(),
    day_of_week: WEEKDAYS[day],
    is_weekend: day === 0 || day === 6 ? 1 : 0,
  }
}

export function truncateToSeconds(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000)
}
