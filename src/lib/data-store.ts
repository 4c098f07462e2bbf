/**
 * CSV-backed tabular store
 *
 * One file per logical data source, header row required. Parsed tables are
 * cached per source for the lifetime of the store (one run).
 */

import { readFile } from 'node:fs/promises'
import { parse } from 'csv-parse/sync'
import type { DataSource, Row, TabularStore } from '../types.js'
import { MissingDataSourceError, toError } from './errors.js'

export const DOMAIN_COLUMN = 'domain'

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

function toRow(record: Record<string, unknown>): Row {
  const row: Row = {}
  for (const [column, value] of Object.entries(record)) {
    row[column] = value === undefined || value === null ? '' : String(value)
  }
  return row
}

/**
 * Parse CSV text into rows keyed by header
 */
export function parseCsv(content: string): Row[] {
  const parsed: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    bom: true
  })

  if (!Array.isArray(parsed)) {
    return []
  }
  return parsed.filter(isRecord).map(toRow)
}

export class CsvTabularStore implements TabularStore {
  private readonly cache = new Map<DataSource, Promise<Row[]>>()

  /**
   * @param sources - data source handle -> absolute file path
   */
  constructor(private readonly sources: Record<DataSource, string>) {}

  sourcePath(source: DataSource): string | undefined {
    return this.sources[source]
  }

  load(source: DataSource): Promise<Row[]> {
    let pending = this.cache.get(source)
    if (!pending) {
      pending = this.read(source)
      this.cache.set(source, pending)
    }
    return pending
  }

  filterByLabels(rows: Row[], labels: readonly string[]): Row[] {
    return filterByLabels(rows, labels)
  }

  /** Drop cached tables */
  clear(): void {
    this.cache.clear()
  }

  private async read(source: DataSource): Promise<Row[]> {
    const filePath = this.sourcePath(source)
    if (!filePath) {
      throw new MissingDataSourceError(source)
    }

    let content: string
    try {
      content = await readFile(filePath, 'utf-8')
    } catch (err) {
      throw new MissingDataSourceError(source, filePath, toError(err))
    }

    return parseCsv(content)
  }
}

/**
 * Rows whose domain column matches one of the labels exactly (after trimming)
 */
export function filterByLabels(rows: Row[], labels: readonly string[]): Row[] {
  const wanted = new Set(labels)
  return rows.filter(row => {
    const value = row[DOMAIN_COLUMN]
    return value !== undefined && wanted.has(value.trim())
  })
}
