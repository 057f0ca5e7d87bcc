import type Database from 'better-sqlite3'
import { DATASET_COLUMNS, type Transaction } from '@/lib/dataset/types'

export function insertTransactions(db: Database.Database, records: readonly Transaction[]): number {
  const placeholders = DATASET_COLUMNS.map(col => `@${col}`).join(', ')
  const insert = db.prepare(
    `INSERT INTO transactions (${DATASET_COLUMNS.join(', ')}) VALUES (${placeholders})`
  )

  const insertAll = db.transaction((rows: readonly Transaction[]) => {
    for (const row of rows) insert.run(row)
  })
  insertAll(records)
  return records.length
}

export function getTransactionCount(db: Database.Database): number {
  const row = db.prepare('SELECT COUNT(*) as count FROM transactions').get() as { count: number }
  return row.count
}
