import type Database from 'better-sqlite3'

export function initializeSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS transactions (
      transaction_id TEXT PRIMARY KEY,
      timestamp TEXT NOT NULL,
      transaction_type TEXT NOT NULL CHECK (transaction_type IN ('P2P', 'P2M', 'Bill Payment', 'Recharge')),
      merchant_category TEXT,
      amount_inr REAL NOT NULL CHECK (amount_inr > 0),
      transaction_status TEXT NOT NULL CHECK (transaction_status IN ('SUCCESS', 'FAILED')),
      sender_age_group TEXT NOT NULL,
      receiver_age_group TEXT,
      sender_state TEXT NOT NULL,
      sender_bank TEXT NOT NULL,
      receiver_bank TEXT NOT NULL,
      device_type TEXT NOT NULL CHECK (device_type IN ('Android', 'iOS', 'Web')),
      network_type TEXT NOT NULL,
      fraud_flag INTEGER NOT NULL CHECK (fraud_flag IN (0, 1)),
      hour_of_day INTEGER NOT NULL CHECK (hour_of_day BETWEEN 0 AND 23),
      day_of_week TEXT NOT NULL,
      is_weekend INTEGER NOT NULL CHECK (is_weekend IN (0, 1))
    );

    CREATE INDEX IF NOT EXISTS idx_transactions_timestamp ON transactions(timestamp);
    CREATE INDEX IF NOT EXISTS idx_transactions_type ON transactions(transaction_type);
    CREATE INDEX IF NOT EXISTS idx_transactions_sender_bank ON transactions(sender_bank);
  `)
}
