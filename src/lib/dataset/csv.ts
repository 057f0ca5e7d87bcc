import { mkdir, writeFile } from 'fs/promises'
import path from 'path'
import { DATASET_COLUMNS, type Transaction } from './types'

function formatCell(value: string | number | null): string {
  if (value === null) return ''
  const s = String(value)
  return /[",\n\r]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s
}

export function toCsv(records: readonly Transaction[]): string {
  const header = DATASET_COLUMNS.join(',')
  const rows = records.map(t => DATASET_COLUMNS.map(col => formatCell(t[col])).join(','))
  return [header, ...rows].join('\n') + '\n'
}

export async function writeDatasetCsv(filePath: string, records: readonly Transaction[]): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true })
  await writeFile(filePath, toCsv(records), 'utf8')
}
