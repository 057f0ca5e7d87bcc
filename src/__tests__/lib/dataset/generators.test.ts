import { describe, it, expect } from 'vitest'
import { amountBounds, GeneratorConfigError } from '@/lib/dataset/config'
import { DEFAULT_GENERATOR_CONFIG } from '@/lib/dataset/constants'
import { TransactionGenerator, generateDataset } from '@/lib/dataset/generators'
import { deriveTimeFields } from '@/lib/dataset/time'

const NOW = new Date('2025-06-30T12:00:00.000Z')
const SEEDS = [1, 42, 1234, 99999]

describe('TransactionGenerator', () => {
  it('keeps drawing from its own copy of the tables', () => {
    const weights = [0.6, 0.3, 0.1]
    const generator = new TransactionGenerator({
      seed: 5,
      now: NOW,
      config: { devices: { options: ['Android', 'iOS', 'Web'], weights } },
    })
    weights.length = 1

    const devices = new Set<string>()
    for (let i = 0; i < 500; i++) devices.add(generator.generateTransaction().device_type)
    expect([...devices].sort()).toEqual(['Android', 'Web', 'iOS'])
  })

  it('fills every column, using null for absent fields', () => {
    const generator = new TransactionGenerator({ seed: 3, now: NOW })
    const t = generator.generateTransaction()
    expect(Object.keys(t)).toHaveLength(17)
    expect(t.transaction_id).toMatch(/^TXN[0-9A-F]{12}$/)
    if (t.transaction_type === 'P2P') {
      expect(t.merchant_category).toBeNull()
      expect(t.receiver_age_group).not.toBeNull()
    } else {
      expect(t.merchant_category).not.toBeNull()
      expect(t.receiver_age_group).toBeNull()
    }
  })

  it('truncates the window end to whole seconds', () => {
    const generator = new TransactionGenerator({ seed: 1, now: new Date('2025-06-30T12:00:00.987Z') })
    expect(generator.windowEnd.toISOString()).toBe('2025-06-30T12:00:00.000Z')
  })

  it('throws on malformed configuration before generating anything', () => {
    expect(() => new TransactionGenerator({
      config: { devices: { options: ['Android', 'iOS'], weights: [1] } },
    })).toThrow(GeneratorConfigError)
  })

  it('runs independent instances without interference', () => {
    const a = new TransactionGenerator({ seed: 8, now: NOW })
    const b = new TransactionGenerator({ seed: 8, now: NOW })
    const first = a.generateTransaction()
    new TransactionGenerator({ seed: 9, now: NOW }).generateTransaction()
    expect(b.generateTransaction()).toEqual(first)
  })
})

describe('generateDataset', () => {
  it('defaults to 500 records', () => {
    expect(generateDataset({ seed: 5, now: NOW }).records).toHaveLength(500)
  })

  it('holds the P2P nullability duality for every row', () => {
    for (const seed of SEEDS) {
      const { records } = generateDataset({ count: 1000, seed, now: NOW })
      for (const t of records) {
        const isP2P = t.transaction_type === 'P2P'
        expect(t.merchant_category === null).toBe(isP2P)
        expect(t.receiver_age_group !== null).toBe(isP2P)
      }
    }
  })

  it('keeps every amount inside its device/type bounds', () => {
    for (const seed of SEEDS) {
      const { records } = generateDataset({ count: 1000, seed, now: NOW })
      for (const t of records) {
        const [min, max] = amountBounds(DEFAULT_GENERATOR_CONFIG, t.device_type, t.transaction_type)
        expect(t.amount_inr).toBeGreaterThanOrEqual(min)
        expect(t.amount_inr).toBeLessThanOrEqual(max)
        expect(Math.round(t.amount_inr * 100) / 100).toBe(t.amount_inr)
      }
    }
  })

  it('never produces iOS amounts below 50 or above the type ceiling', () => {
    const caps = { 'P2P': 45000, 'P2M': 30000, 'Bill Payment': 45000, 'Recharge': 2000 }
    const { records } = generateDataset({ count: 5000, seed: 77, now: NOW })
    const ios = records.filter(t => t.device_type === 'iOS')
    expect(ios.length).toBeGreaterThan(0)
    for (const t of ios) {
      expect(t.amount_inr).toBeGreaterThanOrEqual(50)
      expect(t.amount_inr).toBeLessThanOrEqual(caps[t.transaction_type])
    }
  })

  it('derives hour, weekday and weekend flag from the timestamp', () => {
    const { records } = generateDataset({ count: 1000, seed: 42, now: NOW })
    for (const t of records) {
      const derived = deriveTimeFields(t.timestamp)
      expect(t.hour_of_day).toBe(derived.hour_of_day)
      expect(t.day_of_week).toBe(derived.day_of_week)
      expect(t.is_weekend).toBe(derived.is_weekend)
    }
  })

  it('places timestamps on whole seconds inside the trailing window', () => {
    const { records } = generateDataset({ count: 1000, seed: 42, now: NOW, config: { daysBack: 10 } })
    const start = NOW.getTime() - 10 * 24 * 60 * 60 * 1000
    for (const t of records) {
      const ms = new Date(t.timestamp).getTime()
      expect(ms).toBeGreaterThanOrEqual(start)
      expect(ms).toBeLessThanOrEqual(NOW.getTime())
      expect(ms % 1000).toBe(0)
    }
  })

  it('sorts records ascending by timestamp', () => {
    const { records } = generateDataset({ count: 1000, seed: 42, now: NOW })
    for (let i = 1; i < records.length; i++) {
      expect(records[i - 1].timestamp <= records[i].timestamp).toBe(true)
    }
  })

  it('is deterministic for a fixed seed and window', () => {
    const a = generateDataset({ count: 300, seed: 42, now: NOW })
    const b = generateDataset({ count: 300, seed: 42, now: NOW })
    expect(a).toEqual(b)
  })

  it('differs across seeds', () => {
    const a = generateDataset({ count: 50, seed: 1, now: NOW })
    const b = generateDataset({ count: 50, seed: 2, now: NOW })
    expect(a.records.map(t => t.transaction_id)).not.toEqual(b.records.map(t => t.transaction_id))
  })

  it('issues unique transaction ids', () => {
    const { records } = generateDataset({ count: 5000, seed: 42, now: NOW })
    expect(new Set(records.map(t => t.transaction_id)).size).toBe(5000)
  })

  it('draws merchant categories from the type subset', () => {
    const { records } = generateDataset({ count: 2000, seed: 42, now: NOW })
    for (const t of records) {
      if (t.transaction_type === 'P2M') {
        expect(['Food', 'Grocery', 'Fuel', 'Entertainment']).toContain(t.merchant_category)
      } else if (t.transaction_type !== 'P2P') {
        expect(t.merchant_category).toBe('Utilities')
      }
    }
  })

  it('reports the seed and window end', () => {
    const dataset = generateDataset({ count: 1, seed: 42, now: NOW })
    expect(dataset.seed).toBe(42)
    expect(dataset.generatedAt).toBe('2025-06-30T12:00:00.000Z')
  })

  it('draws and reports a seed when none is given', () => {
    const dataset = generateDataset({ count: 10, now: NOW })
    expect(Number.isInteger(dataset.seed)).toBe(true)
    expect(generateDataset({ count: 10, seed: dataset.seed, now: NOW })).toEqual(dataset)
  })

  it('returns an empty table for a count of zero', () => {
    expect(generateDataset({ count: 0, seed: 42, now: NOW }).records).toEqual([])
  })

  it('rejects negative or fractional counts', () => {
    expect(() => generateDataset({ count: -1 })).toThrow(RangeError)
    expect(() => generateDataset({ count: 2.5 })).toThrow('Record count must be a non-negative integer, got 2.5')
  })
})
