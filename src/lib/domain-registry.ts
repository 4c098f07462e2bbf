/**
 * Domain Registry
 *
 * Static table of report sections. Maps every label a domain may carry in
 * the source data (canonical name plus legacy aliases) to one processing
 * key, a section ordinal and a data source.
 */

import type { AgeClass, DomainSpec } from '../types.js'
import { InvalidRegistryError, UnknownDomainError } from './errors.js'

export const DEFAULT_DOMAINS: readonly DomainSpec[] = [
  { key: 'iq', labels: ['General Cognitive Ability'], sectionOrdinal: 1, dataSource: 'neurocog', raterCapable: false },
  { key: 'academics', labels: ['Academic Skills'], sectionOrdinal: 2, dataSource: 'neurocog', raterCapable: false },
  { key: 'verbal', labels: ['Verbal/Language'], sectionOrdinal: 3, dataSource: 'neurocog', raterCapable: false },
  { key: 'spatial', labels: ['Visual Perception/Construction'], sectionOrdinal: 4, dataSource: 'neurocog', raterCapable: false },
  { key: 'memory', labels: ['Memory'], sectionOrdinal: 5, dataSource: 'neurocog', raterCapable: false },
  { key: 'executive', labels: ['Attention/Executive'], sectionOrdinal: 6, dataSource: 'neurocog', raterCapable: false },
  { key: 'motor', labels: ['Motor'], sectionOrdinal: 7, dataSource: 'neurocog', raterCapable: false },
  { key: 'social', labels: ['Social Cognition'], sectionOrdinal: 8, dataSource: 'neurocog', raterCapable: false },
  {
    key: 'adhd',
    labels: ['ADHD', 'ADHD Adult', 'ADHD Child'],
    sectionOrdinal: 9,
    dataSource: 'neurobehav',
    raterCapable: true
  },
  {
    key: 'emotion',
    labels: [
      'Behavioral/Emotional/Social',
      'Emotional/Behavioral/Personality',
      'Psychiatric Disorders',
      'Personality Disorders',
      'Substance Use',
      'Psychosocial Problems'
    ],
    sectionOrdinal: 10,
    dataSource: 'neurobehav',
    raterCapable: true,
    title: 'Emotional/Behavioral/Social/Personality'
  },
  { key: 'adaptive', labels: ['Adaptive Functioning'], sectionOrdinal: 11, dataSource: 'neurobehav', raterCapable: false },
  { key: 'daily_living', labels: ['Daily Living'], sectionOrdinal: 12, dataSource: 'neurocog', raterCapable: false },
  {
    key: 'validity',
    labels: ['Performance Validity', 'Symptom Validity'],
    sectionOrdinal: 13,
    dataSource: 'validity',
    raterCapable: false
  }
]

export interface ResolveAllResult {
  /** Matched specs, one per key, in section order */
  specs: DomainSpec[]
  /** Labels that matched nothing, in input order */
  unknown: string[]
}

/**
 * Validate a domain table. Throws InvalidRegistryError on the first violation.
 */
export function validateDomainTable(specs: readonly DomainSpec[]): void {
  const keys = new Set<string>()
  const ordinals = new Map<number, string>()
  const owners = new Map<string, DomainSpec[]>()

  for (const spec of specs) {
    if (!spec.key) {
      throw new InvalidRegistryError('Domain key must not be empty')
    }
    if (keys.has(spec.key)) {
      throw new InvalidRegistryError(`Duplicate domain key: "${spec.key}"`)
    }
    keys.add(spec.key)

    if (!Number.isInteger(spec.sectionOrdinal) || spec.sectionOrdinal < 0) {
      throw new InvalidRegistryError(`Domain "${spec.key}" has an invalid section ordinal: ${spec.sectionOrdinal}`)
    }
    const ordinalOwner = ordinals.get(spec.sectionOrdinal)
    if (ordinalOwner) {
      throw new InvalidRegistryError(
        `Section ordinal ${spec.sectionOrdinal} is used by both "${ordinalOwner}" and "${spec.key}"`
      )
    }
    ordinals.set(spec.sectionOrdinal, spec.key)

    if (spec.labels.length === 0 || spec.labels.some(label => label.trim() === '')) {
      throw new InvalidRegistryError(`Domain "${spec.key}" must have at least one non-empty label`)
    }

    for (const label of new Set(spec.labels)) {
      const existing = owners.get(label) ?? []
      existing.push(spec)
      owners.set(label, existing)
    }
  }

  // A shared alias is allowed only between specs restricted to different subject classes
  for (const [label, sharing] of owners) {
    if (sharing.length < 2) continue
    const classes = sharing.map(spec => spec.subjectClass)
    const distinct = new Set(classes)
    if (classes.includes(undefined) || distinct.size !== classes.length) {
      throw new InvalidRegistryError(
        `Label "${label}" is claimed by ${sharing.map(s => `"${s.key}"`).join(' and ')}`
      )
    }
  }
}

export class DomainRegistry {
  private readonly specs: readonly DomainSpec[]
  private readonly byKey = new Map<string, DomainSpec>()
  private readonly byLabel = new Map<string, DomainSpec[]>()

  constructor(specs: readonly DomainSpec[] = DEFAULT_DOMAINS) {
    validateDomainTable(specs)

    this.specs = Object.freeze(
      [...specs]
        .sort((a, b) => a.sectionOrdinal - b.sectionOrdinal)
        .map(spec => Object.freeze({ ...spec, labels: Object.freeze([...spec.labels]) }))
    )

    for (const spec of this.specs) {
      this.byKey.set(spec.key, spec)
      for (const label of spec.labels) {
        const list = this.byLabel.get(label) ?? []
        if (!list.includes(spec)) list.push(spec)
        this.byLabel.set(label, list)
      }
    }
  }

  /**
   * Exact label lookup. When a label is shared by class-restricted specs,
   * `subjectClass` picks one; otherwise the unrestricted spec wins, then the
   * lowest ordinal.
   */
  resolve(label: string, subjectClass?: AgeClass): DomainSpec | undefined {
    const candidates = this.byLabel.get(label)
    if (!candidates || candidates.length === 0) {
      return undefined
    }

    if (subjectClass) {
      const matching = candidates.find(spec => spec.subjectClass === subjectClass)
      if (matching) return matching
    }

    return candidates.find(spec => spec.subjectClass === undefined) ?? candidates[0]
  }

  /** All specs in section order */
  listSpecs(): readonly DomainSpec[] {
    return this.specs
  }

  get(key: string): DomainSpec | undefined {
    return this.byKey.get(key)
  }

  has(label: string): boolean {
    return this.byLabel.has(label)
  }

  keys(): string[] {
    return this.specs.map(spec => spec.key)
  }

  resolveAll(labels: Iterable<string>, subjectClass?: AgeClass): ResolveAllResult {
    const found = new Map<string, DomainSpec>()
    const unknown: string[] = []

    for (const label of labels) {
      const spec = this.resolve(label, subjectClass)
      if (spec) {
        found.set(spec.key, spec)
      } else if (!unknown.includes(label)) {
        unknown.push(label)
      }
    }

    return {
      specs: [...found.values()].sort((a, b) => a.sectionOrdinal - b.sectionOrdinal),
      unknown
    }
  }

  /**
   * Restrict to a subset given by key or label. Throws UnknownDomainError for
   * anything that matches neither.
   */
  select(keysOrLabels: Iterable<string>): DomainSpec[] {
    const selected = new Map<string, DomainSpec>()

    for (const token of keysOrLabels) {
      const spec = this.get(token) ?? this.resolve(token)
      if (!spec) {
        throw new UnknownDomainError(token, this.keys())
      }
      selected.set(spec.key, spec)
    }

    return [...selected.values()].sort((a, b) => a.sectionOrdinal - b.sectionOrdinal)
  }
}
