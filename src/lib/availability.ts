/**
 * Data availability checks
 *
 * A domain is available when its data source loads, carries a domain column,
 * and at least one row for the domain has a score in one of SCORE_COLUMNS.
 * Unavailability is a result, never an exception.
 */

import type { DomainSpec, Row, TabularStore } from '../types.js'
import { DOMAIN_COLUMN } from './data-store.js'
import { MissingDataSourceError, NoUsableDataError, toError, type DataError } from './errors.js'

/** Score columns in priority order */
export const SCORE_COLUMNS = [
  'percentile',
  'raw_score',
  'scaled_score',
  'standard_score',
  't_score',
  'score',
  'z',
  'composite_score'
] as const

const MISSING_VALUES = new Set(['', 'na', 'n/a', 'nan', 'null', '-'])

export type AvailabilityReason = 'missing-source' | 'no-domain-column' | 'no-usable-data'

export interface AvailabilityResult {
  available: boolean
  reason?: AvailabilityReason
  /** Why the domain is unavailable */
  error?: DataError
  /** Rows for the domain that carry at least one score */
  rows: Row[]
}

export function isMissingValue(value: string | undefined): boolean {
  return value === undefined || MISSING_VALUES.has(value.trim().toLowerCase())
}

/**
 * First non-missing score column of a row, or undefined
 */
export function scoreColumn(row: Row): string | undefined {
  return SCORE_COLUMNS.find(column => !isMissingValue(row[column]))
}

export function hasScore(row: Row): boolean {
  return scoreColumn(row) !== undefined
}

export class DataAvailabilityChecker {
  constructor(private readonly store: TabularStore) {}

  async hasData(spec: DomainSpec): Promise<boolean> {
    const result = await this.check(spec)
    return result.available
  }

  async check(spec: DomainSpec): Promise<AvailabilityResult> {
    let table: Row[]
    try {
      table = await this.store.load(spec.dataSource)
    } catch (err) {
      const error = err instanceof MissingDataSourceError
        ? err
        : new MissingDataSourceError(spec.dataSource, this.store.sourcePath(spec.dataSource), toError(err))
      return { available: false, reason: 'missing-source', error, rows: [] }
    }

    if (table.length > 0 && !(DOMAIN_COLUMN in table[0])) {
      return {
        available: false,
        reason: 'no-domain-column',
        error: new NoUsableDataError(spec.key, `data source "${spec.dataSource}" has no "${DOMAIN_COLUMN}" column`),
        rows: []
      }
    }

    const rows = this.store.filterByLabels(table, spec.labels).filter(hasScore)
    if (rows.length === 0) {
      return {
        available: false,
        reason: 'no-usable-data',
        error: new NoUsableDataError(spec.key, `no scored rows in "${spec.dataSource}"`),
        rows: []
      }
    }

    return { available: true, rows }
  }
}
