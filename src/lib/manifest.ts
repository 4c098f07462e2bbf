/**
 * Manifest Builder
 *
 * The manifest is the ordered list of section artifacts the document
 * template includes, one Quarto include directive per artifact.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { DomainOutcome, GenerationStatus, RunReport } from '../types.js'

const INCLUDED_STATUSES: ReadonlySet<GenerationStatus> = new Set(['generated', 'cached', 'protected'])

/**
 * Existing artifacts of a domain the run did not select
 */
export type RetainedSection = Pick<DomainOutcome, 'key' | 'sectionOrdinal' | 'artifacts'>

export interface ManifestWriteResult {
  path: string
  entries: string[]
}

export class ManifestBuilder {
  constructor(readonly manifestPath: string) {}

  /**
   * Artifact paths in section order. Skipped and failed domains are left out;
   * retained sections fill in the domains a partial run did not process.
   */
  build(report: RunReport, retained: readonly RetainedSection[] = []): string[] {
    const processed = new Set(report.outcomes.map(outcome => outcome.key))
    const included = report.outcomes.filter(outcome => INCLUDED_STATUSES.has(outcome.status))
    const carried = retained.filter(section => !processed.has(section.key))

    return [...included, ...carried]
      .sort((a, b) => a.sectionOrdinal - b.sectionOrdinal)
      .flatMap(section => section.artifacts)
  }

  render(artifactPaths: readonly string[]): string {
    if (artifactPaths.length === 0) {
      return ''
    }
    const dir = path.dirname(this.manifestPath)
    const includes = artifactPaths.map(p => {
      const relative = path.relative(dir, p).split(path.sep).join('/')
      return `{{< include ${relative} >}}`
    })
    return includes.join('\n\n') + '\n'
  }

  /**
   * Write through a temp file and rename; on failure the previous manifest stays.
   */
  write(report: RunReport, retained: readonly RetainedSection[] = []): ManifestWriteResult {
    const entries = this.build(report, retained)
    const content = this.render(entries)
    const tmpPath = `${this.manifestPath}.${process.pid}.tmp`

    fs.mkdirSync(path.dirname(this.manifestPath), { recursive: true })
    try {
      fs.writeFileSync(tmpPath, content)
      fs.renameSync(tmpPath, this.manifestPath)
    } catch (err) {
      fs.rmSync(tmpPath, { force: true })
      throw err
    }

    return { path: this.manifestPath, entries }
  }
}
