// Static distribution tables for the synthetic payment dataset

import type { DeviceType, MerchantTransactionType, NetworkType, TransactionType } from './types'

export interface WeightedTable<T extends string = string> {
  options: readonly T[]
  weights: readonly number[]
}

export type AmountRange = readonly [min: number, max: number]

export interface AmountLimit {
  floor?: number
  cap?: number
}

export interface GeneratorConfig {
  transactionTypes: WeightedTable<TransactionType>
  devices: WeightedTable<DeviceType>
  networks: WeightedTable<NetworkType>
  ageGroups: WeightedTable
  states: WeightedTable
  banks: WeightedTable
  merchantCategories: Readonly<Record<MerchantTransactionType, readonly string[]>>
  amountRanges: Readonly<Record<DeviceType, AmountRange>>
  amountLimitsByType: Readonly<Record<TransactionType, AmountLimit>>
  amountSigma: number
  baseFailureRate: number
  weekendBillPayFailureRate: number
  baseFraudRate: number
  highValueFraudRate: number
  highValueThreshold: number
  daysBack: number
}

/** Freezes a value and every object or array reachable from it. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child)
    Object.freeze(value)
  }
  return value
}

export const DEFAULT_GENERATOR_CONFIG = deepFreeze<GeneratorConfig>({
  transactionTypes: {
    options: ['P2P', 'P2M', 'Bill Payment', 'Recharge'],
    weights: [0.35, 0.35, 0.20, 0.10],
  },
  devices: {
    options: ['Android', 'iOS', 'Web'],
    weights: [0.60, 0.30, 0.10],
  },
  networks: {
    options: ['4G', '5G', 'WiFi'],
    weights: [0.50, 0.30, 0.20],
  },
  // Skewed younger
  ageGroups: {
    options: ['18-25', '26-35', '36-45', '46-55', '56+'],
    weights: [0.25, 0.35, 0.20, 0.12, 0.08],
  },
  states: {
    options: [
      'Maharashtra', 'Karnataka', 'Tamil Nadu', 'Delhi', 'Gujarat',
      'Rajasthan', 'Uttar Pradesh', 'West Bengal', 'Telangana', 'Kerala',
    ],
    weights: [0.18, 0.15, 0.12, 0.12, 0.10, 0.08, 0.08, 0.07, 0.06, 0.04],
  },
  banks: {
    options: ['SBI', 'HDFC', 'ICICI', 'Axis', 'Yes Bank'],
    weights: [0.30, 0.25, 0.20, 0.15, 0.10],
  },
  merchantCategories: {
    'P2M': ['Food', 'Grocery', 'Fuel', 'Entertainment'],
    'Bill Payment': ['Utilities'],
    'Recharge': ['Utilities'],
  },
  // iOS and Web carry larger tickets than Android
  amountRanges: {
    Android: [10, 25000],
    iOS: [50, 45000],
    Web: [100, 75000],
  },
  amountLimitsByType: {
    'P2P': {},
    'P2M': { floor: 20, cap: 30000 },
    'Bill Payment': { floor: 100, cap: 50000 },
    'Recharge': { floor: 10, cap: 2000 },
  },
  amountSigma: 1.0,
  baseFailureRate: 0.05,
  weekendBillPayFailureRate: 0.20,
  baseFraudRate: 0.02,
  highValueFraudRate: 0.10,
  highValueThreshold: 50000,
  daysBack: 30,
})
