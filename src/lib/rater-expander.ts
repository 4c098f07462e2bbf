/**
 * Rater expansion
 *
 * Rater-capable domains fan out into one artifact per respondent category
 * that has data and is eligible for the subject's age class.
 */

import type { AgeClass, DomainSpec, RaterTag, Row, VariantTag } from '../types.js'
import { RATER_ORDER } from '../types.js'

export const RATER_COLUMN = 'rater'
export const AGE_GROUP_COLUMN = 'age_group'
export const TEST_COLUMN = 'test'

/** Subjects younger than this are classed as children */
export const ADULT_AGE = 18

export const ELIGIBLE_RATERS: Record<AgeClass, readonly RaterTag[]> = {
  adult: ['self', 'observer'],
  child: ['self', 'parent', 'teacher']
}

const PEDIATRIC_AGE_GROUPS = new Set(['child', 'pediatric', 'adolescent', 'youth'])

const RATER_ALIASES = new Map<string, RaterTag>([
  ['self', 'self'],
  ['self-report', 'self'],
  ['parent', 'parent'],
  ['caregiver', 'parent'],
  ['guardian', 'parent'],
  ['teacher', 'teacher'],
  ['observer', 'observer'],
  ['clinician', 'observer'],
  ['informant', 'observer'],
  ['other', 'observer']
])

export interface RaterVariant {
  rater: VariantTag
  rows: Row[]
}

export interface RaterExpanderOptions {
  /** Test identifiers normed on pediatric samples */
  pediatricTests?: readonly string[]
  /** Subject age in years; overrides detection when set */
  subjectAge?: number
}

/**
 * Map a raw rater value to a tag. Empty means self; unrecognised values
 * return undefined.
 */
export function normalizeRater(value: string | undefined): RaterTag | undefined {
  const normalized = (value ?? '').trim().toLowerCase()
  if (normalized === '') {
    return 'self'
  }
  return RATER_ALIASES.get(normalized)
}

export class RaterExpander {
  private readonly pediatricTests: Set<string>
  private readonly subjectAge?: number

  constructor(options: RaterExpanderOptions = {}) {
    this.pediatricTests = new Set(options.pediatricTests ?? [])
    this.subjectAge = options.subjectAge
  }

  detectAgeClass(rows: readonly Row[]): AgeClass {
    if (this.subjectAge !== undefined) {
      return this.subjectAge < ADULT_AGE ? 'child' : 'adult'
    }

    const pediatric = rows.some(row => {
      const ageGroup = (row[AGE_GROUP_COLUMN] ?? '').trim().toLowerCase()
      const test = (row[TEST_COLUMN] ?? '').trim()
      return PEDIATRIC_AGE_GROUPS.has(ageGroup) || this.pediatricTests.has(test)
    })
    return pediatric ? 'child' : 'adult'
  }

  /**
   * Variants to generate, in RATER_ORDER. Empty when a rater-capable domain
   * has no rows from an eligible rater.
   */
  expand(spec: DomainSpec, rows: Row[]): RaterVariant[] {
    if (!spec.raterCapable) {
      return [{ rater: 'default', rows }]
    }

    const eligible = new Set(ELIGIBLE_RATERS[this.detectAgeClass(rows)])
    const grouped = new Map<RaterTag, Row[]>()
    for (const row of rows) {
      const rater = normalizeRater(row[RATER_COLUMN])
      if (!rater || !eligible.has(rater)) continue
      const list = grouped.get(rater) ?? []
      list.push(row)
      grouped.set(rater, list)
    }

    const variants: RaterVariant[] = []
    for (const rater of RATER_ORDER) {
      const group = grouped.get(rater)
      if (group && group.length > 0) {
        variants.push({ rater, rows: group })
      }
    }
    return variants
  }
}
