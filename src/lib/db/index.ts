import Database from 'better-sqlite3'
import type { Transaction } from '@/lib/dataset/types'
import { initializeSchema } from './schema'
import { insertTransactions } from './transactions'

/**
 * Opens an in-memory report database, optionally loaded with a generated
 * table. Nothing touches disk; the database lives as long as the handle.
 */
export function openReportDb(records: readonly Transaction[] = []): Database.Database {
  const db = new Database(':memory:')
  initializeSchema(db)
  if (records.length > 0) insertTransactions(db, records)
  return db
}
