import { deriveTimeFields } from '@/lib/dataset/time'
import type { Transaction, TransactionRecord } from '@/lib/dataset/types'

let nextId = 1

// Monday 2025-06-02 10:00 UTC
const DEFAULT_TIMESTAMP = '2025-06-02T10:00:00.000Z'

/** A valid P2M record; derived time fields follow the timestamp unless overridden. */
export function makeTransaction(overrides: Partial<TransactionRecord> = {}): Transaction {
  const id = `TXNTEST${String(nextId++).padStart(5, '0')}`
  return {
    transaction_id: id,
    timestamp: DEFAULT_TIMESTAMP,
    transaction_type: 'P2M',
    merchant_category: 'Food',
    amount_inr: 500,
    transaction_status: 'SUCCESS',
    sender_age_group: '26-35',
    receiver_age_group: null,
    sender_state: 'Karnataka',
    sender_bank: 'SBI',
    receiver_bank: 'HDFC',
    device_type: 'Android',
    network_type: '4G',
    fraud_flag: 0,
    ...deriveTimeFields(overrides.timestamp ?? DEFAULT_TIMESTAMP),
    ...overrides,
  }
}

export function makeP2P(overrides: Partial<TransactionRecord> = {}): Transaction {
  return makeTransaction({
    transaction_type: 'P2P',
    merchant_category: null,
    receiver_age_group: '18-25',
    ...overrides,
  })
}
