const inrRound = new Intl.NumberFormat('en-IN', {
  maximumFractionDigits: 0,
})

const inrPrecise = new Intl.NumberFormat('en-IN', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
})

export function formatInr(amount: number): string {
  return `INR ${inrRound.format(amount)}`
}

export function formatInrPrecise(amount: number): string {
  return `INR ${inrPrecise.format(amount)}`
}

// Takes a percentage (0-100), not a fraction
export function formatPercent(value: number, digits = 1): string {
  return `${value.toFixed(digits)}%`
}

export function formatRate(rate: number | null, digits = 1): string {
  return rate === null ? 'undefined' : formatPercent(rate * 100, digits)
}
