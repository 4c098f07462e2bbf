/**
 * Tests for availability.ts
 */

import { describe, it, expect } from 'vitest'
import { DataAvailabilityChecker, hasScore, isMissingValue, scoreColumn } from '../../src/lib/availability.js'
import { filterByLabels } from '../../src/lib/data-store.js'
import { MissingDataSourceError, NoUsableDataError } from '../../src/lib/errors.js'
import type { DataSource, DomainSpec, Row, TabularStore } from '../../src/types.js'

class MemoryStore implements TabularStore {
  constructor(private readonly tables: Record<DataSource, Row[]>) {}

  async load(source: DataSource): Promise<Row[]> {
    const table = this.tables[source]
    if (!table) {
      throw new MissingDataSourceError(source)
    }
    return table
  }

  filterByLabels(rows: Row[], labels: readonly string[]): Row[] {
    return filterByLabels(rows, labels)
  }

  sourcePath(): string | undefined {
    return undefined
  }
}

const memory: DomainSpec = {
  key: 'memory',
  labels: ['Memory'],
  sectionOrdinal: 5,
  dataSource: 'neurocog',
  raterCapable: false
}

describe('score helpers', () => {
  it('isMissingValue treats blanks and NA markers as missing', () => {
    expect(isMissingValue(undefined)).toBe(true)
    expect(isMissingValue('')).toBe(true)
    expect(isMissingValue(' NA ')).toBe(true)
    expect(isMissingValue('n/a')).toBe(true)
    expect(isMissingValue('0')).toBe(false)
  })

  it('scoreColumn follows priority order', () => {
    expect(scoreColumn({ percentile: '', scaled_score: '9', z: '0.1' })).toBe('scaled_score')
    expect(scoreColumn({ percentile: '45', scaled_score: '9' })).toBe('percentile')
    expect(scoreColumn({ domain: 'Memory' })).toBeUndefined()
    expect(hasScore({ t_score: '55' })).toBe(true)
  })
})

describe('DataAvailabilityChecker', () => {
  it('should report available with only scored rows', async () => {
    const checker = new DataAvailabilityChecker(new MemoryStore({
      neurocog: [
        { domain: 'Memory', test: 'a', percentile: '50' },
        { domain: 'Memory', test: 'b', percentile: 'NA' },
        { domain: 'Motor', test: 'c', percentile: '10' }
      ]
    }))

    const result = await checker.check(memory)
    expect(result.available).toBe(true)
    expect(result.reason).toBeUndefined()
    expect(result.rows.map(r => r.test)).toEqual(['a'])
    expect(await checker.hasData(memory)).toBe(true)
  })

  it('should report a missing source without throwing', async () => {
    const checker = new DataAvailabilityChecker(new MemoryStore({}))

    const result = await checker.check(memory)
    expect(result.available).toBe(false)
    expect(result.reason).toBe('missing-source')
    expect(result.error).toBeInstanceOf(MissingDataSourceError)
    expect(result.rows).toEqual([])
  })

  it('should wrap unexpected load failures', async () => {
    const store = new MemoryStore({})
    store.load = async () => {
      throw new Error('EACCES')
    }

    const result = await new DataAvailabilityChecker(store).check(memory)
    expect(result.reason).toBe('missing-source')
    expect(result.error).toBeInstanceOf(MissingDataSourceError)
    expect(result.error?.cause).toBeInstanceOf(Error)
  })

  it('should report a table without a domain column', async () => {
    const checker = new DataAvailabilityChecker(new MemoryStore({ neurocog: [{ test: 'a', percentile: '50' }] }))

    const result = await checker.check(memory)
    expect(result.reason).toBe('no-domain-column')
    expect(result.error?.message)
      .toBe('No usable data for domain "memory": data source "neurocog" has no "domain" column')
  })

  it('should report rows without scores as unusable', async () => {
    const checker = new DataAvailabilityChecker(new MemoryStore({
      neurocog: [{ domain: 'Memory', test: 'a', percentile: '' }]
    }))

    const result = await checker.check(memory)
    expect(result.available).toBe(false)
    expect(result.reason).toBe('no-usable-data')
    expect(result.error).toBeInstanceOf(NoUsableDataError)
    expect(result.error?.message).toBe('No usable data for domain "memory": no scored rows in "neurocog"')
  })

  it('should treat an empty table as no usable data', async () => {
    const checker = new DataAvailabilityChecker(new MemoryStore({ neurocog: [] }))
    expect((await checker.check(memory)).reason).toBe('no-usable-data')
  })
})
