/**
 * Tests for rater-expander.ts
 */

import { describe, it, expect } from 'vitest'
import { RaterExpander, normalizeRater } from '../../src/lib/rater-expander.js'
import type { DomainSpec, Row } from '../../src/types.js'

const adhd: DomainSpec = {
  key: 'adhd',
  labels: ['ADHD'],
  sectionOrdinal: 9,
  dataSource: 'neurobehav',
  raterCapable: true
}

const memory: DomainSpec = {
  key: 'memory',
  labels: ['Memory'],
  sectionOrdinal: 5,
  dataSource: 'neurocog',
  raterCapable: false
}

const row = (rater: string, extra: Row = {}): Row => ({ domain: 'ADHD', rater, t_score: '60', ...extra })

describe('normalizeRater', () => {
  it('should map aliases and default blanks to self', () => {
    expect(normalizeRater('Parent')).toBe('parent')
    expect(normalizeRater(' caregiver ')).toBe('parent')
    expect(normalizeRater('Self-Report')).toBe('self')
    expect(normalizeRater('clinician')).toBe('observer')
    expect(normalizeRater('')).toBe('self')
    expect(normalizeRater(undefined)).toBe('self')
    expect(normalizeRater('sibling')).toBeUndefined()
    expect(normalizeRater('constructor')).toBeUndefined()
  })
})

describe('RaterExpander', () => {
  describe('detectAgeClass', () => {
    it('should default to adult', () => {
      expect(new RaterExpander().detectAgeClass([row('self')])).toBe('adult')
    })

    it('should detect children from the age_group column', () => {
      expect(new RaterExpander().detectAgeClass([row('self', { age_group: 'Child' })])).toBe('child')
    })

    it('should detect children from pediatric tests', () => {
      const expander = new RaterExpander({ pediatricTests: ['basc3_trs_child'] })
      expect(expander.detectAgeClass([row('teacher', { test: 'basc3_trs_child' })])).toBe('child')
    })

    it('should prefer the configured subject age', () => {
      const rows = [row('self', { age_group: 'child' })]
      expect(new RaterExpander({ subjectAge: 34 }).detectAgeClass(rows)).toBe('adult')
      expect(new RaterExpander({ subjectAge: 11 }).detectAgeClass([])).toBe('child')
      expect(new RaterExpander({ subjectAge: 18 }).detectAgeClass([])).toBe('adult')
    })
  })

  describe('expand', () => {
    it('should return one default variant for single-artifact domains', () => {
      const rows = [{ domain: 'Memory', percentile: '50' }]
      expect(new RaterExpander().expand(memory, rows)).toEqual([{ rater: 'default', rows }])
    })

    it('should produce exactly the raters present for a child', () => {
      const rows = [
        row('teacher', { age_group: 'child' }),
        row('self', { age_group: 'child' }),
        row('teacher', { age_group: 'child', scale: 'b' })
      ]
      const variants = new RaterExpander().expand(adhd, rows)

      expect(variants.map(v => v.rater)).toEqual(['self', 'teacher'])
      expect(variants[1].rows).toHaveLength(2)
    })

    it('should drop raters that are not eligible for adults', () => {
      const variants = new RaterExpander({ subjectAge: 40 }).expand(adhd, [
        row('parent'),
        row('observer'),
        row('self')
      ])
      expect(variants.map(v => v.rater)).toEqual(['self', 'observer'])
    })

    it('should ignore unknown rater values', () => {
      const variants = new RaterExpander({ subjectAge: 40 }).expand(adhd, [row('sibling'), row('informant')])
      expect(variants.map(v => v.rater)).toEqual(['observer'])
    })

    it('should return nothing when no eligible rater has data', () => {
      expect(new RaterExpander({ subjectAge: 40 }).expand(adhd, [row('teacher')])).toEqual([])
    })
  })
})
