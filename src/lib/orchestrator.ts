/**
 * Generation Orchestrator
 *
 * Walks the registry in section order and, per domain:
 *   availability -> protection -> processing -> artifacts + markers
 *
 * Every domain ends with exactly one status. Per-domain errors become
 * outcomes; only setup errors (e.g. an unknown --domains entry) escape.
 */

import fs from 'node:fs'
import type {
  DomainOutcome,
  DomainProcessor,
  DomainSpec,
  GenerationStatus,
  Row,
  RunReport,
  VariantTag
} from '../types.js'
import { allVariantPaths, artifactPath, type ArtifactLayout } from './artifact-naming.js'
import type { DataAvailabilityChecker } from './availability.js'
import type { DomainRegistry } from './domain-registry.js'
import type { EditProtectionTracker } from './edit-protection.js'
import {
  NoUsableDataError,
  ProcessorFailureError,
  ProtectedEditConflictError,
  toError,
  wrapError,
  type NeuroreportError
} from './errors.js'
import type { RaterExpander } from './rater-expander.js'
import { createRunReport } from './run-report.js'

export type GenerationEvent =
  | { type: 'domain-start'; spec: DomainSpec; index: number; total: number }
  | { type: 'domain-done'; outcome: DomainOutcome }

export interface GenerationOptions {
  /** Bypass protection and replace every artifact of each processed domain */
  forceRegenerate?: boolean
  /** Refuse to overwrite hand-edited artifacts (default true) */
  protectEdits?: boolean
  /** Restrict the run to these keys or labels */
  domains?: string[]
  onProgress?: (event: GenerationEvent) => void
}

export interface OrchestratorDeps {
  registry: DomainRegistry
  checker: DataAvailabilityChecker
  tracker: EditProtectionTracker
  expander: RaterExpander
  processor: DomainProcessor
  layout: ArtifactLayout
  subject?: string
}

interface ProducedArtifact {
  rater: VariantTag
  path: string
  content: string
}

export class GenerationOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async run(options: GenerationOptions = {}): Promise<RunReport> {
    const { registry } = this.deps
    const startedAt = new Date()
    const specs = options.domains && options.domains.length > 0
      ? registry.select(options.domains)
      : registry.listSpecs()

    const outcomes: DomainOutcome[] = []
    for (let i = 0; i < specs.length; i++) {
      const spec = specs[i]
      options.onProgress?.({ type: 'domain-start', spec, index: i, total: specs.length })

      const outcome = await this.processDomain(spec, options)
      outcomes.push(outcome)
      options.onProgress?.({ type: 'domain-done', outcome })
    }

    return createRunReport(outcomes, {
      subject: this.deps.subject,
      startedAt,
      finishedAt: new Date()
    })
  }

  /**
   * Run one domain to a final outcome. Never throws.
   */
  async processDomain(spec: DomainSpec, options: GenerationOptions = {}): Promise<DomainOutcome> {
    const startTime = Date.now()
    const finish = (
      status: GenerationStatus,
      artifacts: string[],
      error?: NeuroreportError
    ): DomainOutcome => ({
      key: spec.key,
      sectionOrdinal: spec.sectionOrdinal,
      status,
      artifacts,
      code: error?.code,
      message: error?.message,
      durationMs: Date.now() - startTime
    })

    try {
      const { checker, tracker, expander, layout } = this.deps
      const force = options.forceRegenerate ?? false
      const protectEdits = options.protectEdits ?? true

      const availability = await checker.check(spec)
      if (!availability.available) {
        return finish('skipped', [], availability.error ?? new NoUsableDataError(spec.key, 'no data'))
      }

      if (spec.subjectClass) {
        const detected = expander.detectAgeClass(availability.rows)
        if (detected !== spec.subjectClass) {
          return finish('skipped', [], new NoUsableDataError(
            spec.key,
            `domain applies to ${spec.subjectClass} subjects, data is ${detected}`
          ))
        }
      }

      const variants = expander.expand(spec, availability.rows)
      if (variants.length === 0) {
        return finish('skipped', [], new NoUsableDataError(spec.key, 'no rows from an eligible rater'))
      }

      const possiblePaths = allVariantPaths(spec, layout)
      const existing = possiblePaths.filter(p => fs.existsSync(p))

      if (!force && protectEdits) {
        const edited = tracker.listProtected(existing)
        if (edited.length > 0) {
          return finish('protected', existing, new ProtectedEditConflictError(spec.key, edited))
        }
      }

      // Produce everything in memory first; a failure leaves prior files untouched
      const produced: ProducedArtifact[] = []
      for (const variant of variants) {
        const content = await this.produce(spec, variant.rater, variant.rows)
        produced.push({ rater: variant.rater, path: artifactPath(spec, variant.rater, layout), content })
      }

      const existedBefore = produced.some(a => existing.includes(a.path))
      this.commit(possiblePaths, produced)

      const status: GenerationStatus = force || !existedBefore ? 'generated' : 'cached'
      return finish(status, produced.map(a => a.path))
    } catch (err) {
      return finish('failed', [], wrapError(err, 'GENERATION_FAILED'))
    }
  }

  private async produce(spec: DomainSpec, rater: VariantTag, rows: Row[]): Promise<string> {
    let content: unknown
    try {
      content = await this.deps.processor.process({ spec, rows, rater })
    } catch (err) {
      throw new ProcessorFailureError(spec.key, rater, toError(err))
    }
    if (typeof content !== 'string') {
      throw new ProcessorFailureError(spec.key, rater, new Error(`processor returned ${typeof content}, expected text`))
    }
    return content
  }

  /**
   * Remove every artifact and marker of the domain that is not being
   * rewritten, then write the new artifacts followed by their markers.
   */
  private commit(possiblePaths: string[], produced: ProducedArtifact[]): void {
    const { tracker, layout } = this.deps
    const keep = new Set(produced.map(a => a.path))

    for (const stale of possiblePaths) {
      if (!keep.has(stale)) {
        tracker.clear(stale)
      }
    }

    fs.mkdirSync(layout.artifactsDir, { recursive: true })
    for (const artifact of produced) {
      fs.writeFileSync(artifact.path, artifact.content)
      tracker.markGenerated(artifact.path)
    }
  }
}
