export const TRANSACTION_TYPES = ['P2P', 'P2M', 'Bill Payment', 'Recharge'] as const
export const DEVICE_TYPES = ['Android', 'iOS', 'Web'] as const
export const NETWORK_TYPES = ['4G', '5G', 'WiFi'] as const
export const TRANSACTION_STATUSES = ['SUCCESS', 'FAILED'] as const

export type TransactionType = typeof TRANSACTION_TYPES[number]
export type MerchantTransactionType = Exclude<TransactionType, 'P2P'>
export type DeviceType = typeof DEVICE_TYPES[number]
export type NetworkType = typeof NETWORK_TYPES[number]
export type TransactionStatus = typeof TRANSACTION_STATUSES[number]
export type Flag = 0 | 1

export interface TransactionRecord {
  transaction_id: string
  timestamp: string              // ISO 8601, UTC
  transaction_type: TransactionType
  merchant_category: string | null
  amount_inr: number
  transaction_status: TransactionStatus
  sender_age_group: string
  receiver_age_group: string | null
  sender_state: string
  sender_bank: string
  receiver_bank: string
  device_type: DeviceType
  network_type: NetworkType
  fraud_flag: Flag
  hour_of_day: number
  day_of_week: string
  is_weekend: Flag
}

export type Transaction = Readonly<TransactionRecord>

// Column order of the persisted table
export const DATASET_COLUMNS = [
  'transaction_id',
  'timestamp',
  'transaction_type',
  'merchant_category',
  'amount_inr',
  'transaction_status',
  'sender_age_group',
  'receiver_age_group',
  'sender_state',
  'sender_bank',
  'receiver_bank',
  'device_type',
  'network_type',
  'fraud_flag',
  'hour_of_day',
  'day_of_week',
  'is_weekend',
] as const satisfies ReadonlyArray<keyof TransactionRecord>

export interface Dataset {
  seed: number
  generatedAt: string
  records: Transaction[]
}

export interface DatasetSummary {
  total_records: number
  date_range: { start: string; end: string } | null
  transaction_type_distribution: Record<string, number>
  overall_failure_rate: number | null
  fraud_flag_rate: number | null
  weekend_billpay_failure_rate: number | null
  high_value_fraud_rate: number | null
  avg_amount_by_device: Record<string, number>
  p2p_null_merchant_check: boolean
  non_p2p_null_receiver_age_check: boolean
}
