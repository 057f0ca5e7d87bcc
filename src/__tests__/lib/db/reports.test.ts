import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type Database from 'better-sqlite3'
import { openReportDb } from '@/lib/db'
import {
  getBankFailureRates,
  getDailyVolume,
  getDimensionBreakdown,
  getFraudWatchlist,
  getHourlyVolume,
  getKpiSummary,
  getRedFlagLedger,
  isReportDimension,
} from '@/lib/db/reports'
import type { Transaction } from '@/lib/dataset/types'
import { makeP2P, makeTransaction } from '../../fixtures'

describe('reports', () => {
  let db: Database.Database
  let rows: Transaction[]

  beforeEach(() => {
    rows = [
      makeTransaction({ timestamp: '2025-06-02T10:00:00.000Z', amount_inr: 500 }),
      makeTransaction({
        timestamp: '2025-06-02T10:30:00.000Z',
        merchant_category: 'Grocery',
        amount_inr: 1500,
        device_type: 'iOS',
        sender_bank: 'HDFC',
        transaction_status: 'FAILED',
      }),
      // Saturday
      makeTransaction({
        timestamp: '2025-06-07T10:15:00.000Z',
        transaction_type: 'Bill Payment',
        merchant_category: 'Utilities',
        amount_inr: 2000,
        transaction_status: 'FAILED',
      }),
      // Sunday
      makeP2P({
        timestamp: '2025-06-08T20:00:00.000Z',
        amount_inr: 60000,
        device_type: 'Web',
        sender_bank: 'ICICI',
        receiver_bank: 'Axis',
        sender_age_group: '18-25',
        fraud_flag: 1,
      }),
      makeP2P({
        timestamp: '2025-06-08T21:00:00.000Z',
        amount_inr: 8000,
        receiver_bank: 'HDFC',
        fraud_flag: 1,
      }),
      makeTransaction({
        timestamp: '2025-06-03T10:45:00.000Z',
        transaction_type: 'Recharge',
        merchant_category: 'Utilities',
        amount_inr: 200,
        sender_bank: 'HDFC',
      }),
    ]
    db = openReportDb(rows)
  })

  afterEach(() => {
    db.close()
  })

  describe('getKpiSummary', () => {
    it('computes totals and rates for all data', () => {
      const kpis = getKpiSummary(db)
      expect(kpis.totalVolume).toBe(72200)
      expect(kpis.transactionCount).toBe(6)
      expect(kpis.failureRate).toBeCloseTo(100 / 3, 6)
      expect(kpis.fraudRate).toBeCloseTo(100 / 3, 6)
    })

    it('filters by transaction type', () => {
      const kpis = getKpiSummary(db, { transaction_type: 'P2P' })
      expect(kpis.transactionCount).toBe(2)
      expect(kpis.totalVolume).toBe(68000)
      expect(kpis.failureRate).toBe(0)
      expect(kpis.fraudRate).toBe(100)
    })

    it('filters by inclusive date range', () => {
      expect(getKpiSummary(db, { start_date: '2025-06-03', end_date: '2025-06-07' }).transactionCount).toBe(2)
    })

    it('filters by weekend flag and device', () => {
      expect(getKpiSummary(db, { is_weekend: true }).transactionCount).toBe(3)
      expect(getKpiSummary(db, { is_weekend: false }).transactionCount).toBe(3)
      expect(getKpiSummary(db, { device_type: 'Android' }).transactionCount).toBe(4)
    })

    it('returns zeros for an empty table', () => {
      const empty = openReportDb()
      expect(getKpiSummary(empty)).toEqual({ totalVolume: 0, transactionCount: 0, failureRate: 0, fraudRate: 0 })
      empty.close()
    })
  })

  describe('getDimensionBreakdown', () => {
    it('groups by transaction type, most frequent first', () => {
      expect(getDimensionBreakdown(db, 'transaction_type')).toEqual([
        { value: 'P2M', count: 2, volume: 2000, failureRate: 50, fraudRate: 0, avgAmount: 1000 },
        { value: 'P2P', count: 2, volume: 68000, failureRate: 0, fraudRate: 100, avgAmount: 34000 },
        { value: 'Bill Payment', count: 1, volume: 2000, failureRate: 100, fraudRate: 0, avgAmount: 2000 },
        { value: 'Recharge', count: 1, volume: 200, failureRate: 0, fraudRate: 0, avgAmount: 200 },
      ])
    })

    it('labels missing merchant categories as N/A', () => {
      const values = getDimensionBreakdown(db, 'merchant_category').map(r => r.value)
      expect(values).toEqual(['N/A', 'Utilities', 'Food', 'Grocery'])
    })

    it('applies filters', () => {
      const rows = getDimensionBreakdown(db, 'device_type', { is_weekend: true })
      expect(rows.map(r => [r.value, r.count])).toEqual([['Android', 2], ['Web', 1]])
    })
  })

  describe('isReportDimension', () => {
    it('accepts whitelisted columns only', () => {
      expect(isReportDimension('sender_state')).toBe(true)
      expect(isReportDimension('amount_inr')).toBe(false)
      expect(isReportDimension('1; DROP TABLE transactions')).toBe(false)
    })
  })

  describe('getHourlyVolume', () => {
    it('splits each hour into weekday and weekend', () => {
      const hourly = getHourlyVolume(db)
      expect(hourly.map(r => [r.hour, r.dayType, r.count, r.volume])).toEqual([
        [10, 'Weekday', 3, 2200],
        [10, 'Weekend', 1, 2000],
        [20, 'Weekend', 1, 60000],
        [21, 'Weekend', 1, 8000],
      ])
      expect(hourly[0].failureRate).toBeCloseTo(100 / 3, 6)
      expect(hourly[1].failureRate).toBe(100)
    })
  })

  describe('getBankFailureRates', () => {
    it('orders sender banks by failure rate ascending', () => {
      const banks = getBankFailureRates(db)
      expect(banks.map(b => [b.bank, b.total, b.failed])).toEqual([
        ['ICICI', 1, 0],
        ['SBI', 3, 1],
        ['HDFC', 2, 1],
      ])
      expect(banks[2].failureRate).toBe(50)
    })
  })

  describe('getDailyVolume', () => {
    it('aggregates by UTC date', () => {
      expect(getDailyVolume(db)).toEqual([
        { date: '2025-06-02', count: 2, volume: 2000, failed: 1 },
        { date: '2025-06-03', count: 1, volume: 200, failed: 0 },
        { date: '2025-06-07', count: 1, volume: 2000, failed: 1 },
        { date: '2025-06-08', count: 2, volume: 68000, failed: 0 },
      ])
    })
  })

  describe('getRedFlagLedger', () => {
    it('lists failed weekend transactions', () => {
      expect(getRedFlagLedger(db)).toEqual([{
        transaction_id: rows[2].transaction_id,
        timestamp: '2025-06-07T10:15:00.000Z',
        merchant_category: 'Utilities',
        amount_inr: 2000,
        sender_bank: 'SBI',
      }])
    })

    it('ignores a weekday filter that would contradict the ledger', () => {
      expect(getRedFlagLedger(db, { is_weekend: false })).toHaveLength(1)
    })
  })

  describe('getFraudWatchlist', () => {
    it('lists flagged transactions above the minimum, largest first', () => {
      expect(getFraudWatchlist(db)).toEqual([
        { transaction_id: rows[3].transaction_id, amount_inr: 60000, sender_age_group: '18-25', receiver_bank: 'Axis' },
        { transaction_id: rows[4].transaction_id, amount_inr: 8000, sender_age_group: '26-35', receiver_bank: 'HDFC' },
      ])
    })

    it('honours a custom minimum and filters', () => {
      expect(getFraudWatchlist(db, 10000).map(r => r.amount_inr)).toEqual([60000])
      expect(getFraudWatchlist(db, 5000, { device_type: 'Web' })).toHaveLength(1)
      expect(getFraudWatchlist(db, 5000, { is_weekend: false })).toEqual([])
    })
  })
})
