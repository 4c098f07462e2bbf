/**
 * Edit protection via generation markers
 *
 * Every generated artifact gets a companion `<artifact>.generated` file.
 * An artifact is protected (hand-edited) when it exists and either has no
 * readable marker or the change detector reports a change since the marker
 * was written.
 */

import { createHash } from 'node:crypto'
import fs from 'node:fs'
import type { MarkerStrategy } from '../types.js'

export const MARKER_SUFFIX = '.generated'
const MARKER_HEADER = '# neuroreport generation marker'

export interface GenerationMarker {
  generatedAt: Date
  artifact: string
  sha256?: string
}

/**
 * Decides whether an artifact changed since its marker was written
 */
export interface ChangeDetector {
  readonly strategy: MarkerStrategy
  /** Extra fingerprint to store in the marker, if the strategy needs one */
  fingerprint(artifactPath: string): string | undefined
  hasChanged(artifactPath: string, marker: GenerationMarker): boolean
}

function modifiedAfter(artifactPath: string, generatedAt: Date): boolean {
  const { mtimeMs } = fs.statSync(artifactPath)
  return Math.floor(mtimeMs) > generatedAt.getTime()
}

export function hashFile(filePath: string): string {
  return createHash('sha256').update(fs.readFileSync(filePath)).digest('hex')
}

export class TimestampChangeDetector implements ChangeDetector {
  readonly strategy = 'timestamp'

  fingerprint(): undefined {
    return undefined
  }

  hasChanged(artifactPath: string, marker: GenerationMarker): boolean {
    return modifiedAfter(artifactPath, marker.generatedAt)
  }
}

/**
 * Compares sha256 of the artifact with the one stored in the marker.
 * Markers without a hash fall back to the timestamp comparison.
 */
export class ContentHashChangeDetector implements ChangeDetector {
  readonly strategy = 'content-hash'

  fingerprint(artifactPath: string): string {
    return hashFile(artifactPath)
  }

  hasChanged(artifactPath: string, marker: GenerationMarker): boolean {
    if (!marker.sha256) {
      return modifiedAfter(artifactPath, marker.generatedAt)
    }
    return hashFile(artifactPath) !== marker.sha256
  }
}

export function createChangeDetector(strategy: MarkerStrategy = 'timestamp'): ChangeDetector {
  return strategy === 'content-hash' ? new ContentHashChangeDetector() : new TimestampChangeDetector()
}

export function markerPathFor(artifactPath: string): string {
  return artifactPath + MARKER_SUFFIX
}

export function formatMarker(marker: GenerationMarker): string {
  const lines = [
    MARKER_HEADER,
    `generated_at: ${marker.generatedAt.toISOString()}`,
    `artifact: ${marker.artifact}`
  ]
  if (marker.sha256) {
    lines.push(`sha256: ${marker.sha256}`)
  }
  return lines.join('\n') + '\n'
}

/**
 * Parse marker text. Returns null when generated_at is absent or invalid.
 */
export function parseMarker(content: string): GenerationMarker | null {
  const fields = new Map<string, string>()
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) continue
    const sep = trimmed.indexOf(':')
    if (sep === -1) continue
    fields.set(trimmed.slice(0, sep).trim(), trimmed.slice(sep + 1).trim())
  }

  const raw = fields.get('generated_at')
  if (!raw) return null
  const generatedAt = new Date(raw)
  if (Number.isNaN(generatedAt.getTime())) return null

  return {
    generatedAt,
    artifact: fields.get('artifact') ?? '',
    sha256: fields.get('sha256') || undefined
  }
}

export interface EditProtectionOptions {
  detector?: ChangeDetector
  /** Clock used for generated_at */
  now?: () => Date
}

export class EditProtectionTracker {
  readonly detector: ChangeDetector
  private readonly now: () => Date

  constructor(options: EditProtectionOptions = {}) {
    this.detector = options.detector ?? new TimestampChangeDetector()
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Write the marker for an artifact that was just written
   */
  markGenerated(artifactPath: string): GenerationMarker {
    const marker: GenerationMarker = {
      generatedAt: this.now(),
      artifact: artifactPath,
      sha256: this.detector.fingerprint(artifactPath)
    }
    fs.writeFileSync(markerPathFor(artifactPath), formatMarker(marker))
    return marker
  }

  readMarker(artifactPath: string): GenerationMarker | null {
    let content: string
    try {
      content = fs.readFileSync(markerPathFor(artifactPath), 'utf-8')
    } catch {
      return null
    }
    return parseMarker(content)
  }

  isProtected(artifactPath: string): boolean {
    if (!fs.existsSync(artifactPath)) {
      return false
    }
    const marker = this.readMarker(artifactPath)
    if (!marker) {
      return true
    }
    return this.detector.hasChanged(artifactPath, marker)
  }

  /** Protected subset, order kept */
  listProtected(artifactPaths: Iterable<string>): string[] {
    return [...artifactPaths].filter(p => this.isProtected(p))
  }

  /**
   * Remove an artifact and its marker, ignoring files that are already gone
   */
  clear(artifactPath: string): void {
    fs.rmSync(artifactPath, { force: true })
    fs.rmSync(markerPathFor(artifactPath), { force: true })
  }
}
