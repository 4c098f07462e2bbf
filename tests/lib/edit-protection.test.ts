/**
 * Tests for edit-protection.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import {
  EditProtectionTracker,
  ContentHashChangeDetector,
  TimestampChangeDetector,
  createChangeDetector,
  formatMarker,
  hashFile,
  markerPathFor,
  parseMarker
} from '../../src/lib/edit-protection.js'

describe('marker format', () => {
  it('should format and parse a marker', () => {
    const generatedAt = new Date('2026-03-01T10:00:00.000Z')
    const text = formatMarker({ generatedAt, artifact: '/w/_02-05_memory.qmd' })

    expect(text).toBe([
      '# neuroreport generation marker',
      'generated_at: 2026-03-01T10:00:00.000Z',
      'artifact: /w/_02-05_memory.qmd',
      ''
    ].join('\n'))

    expect(parseMarker(text)).toEqual({
      generatedAt,
      artifact: '/w/_02-05_memory.qmd',
      sha256: undefined
    })
  })

  it('should keep the sha256 field', () => {
    const text = formatMarker({ generatedAt: new Date(0), artifact: 'a.qmd', sha256: 'abc123' })
    expect(text.endsWith('sha256: abc123\n')).toBe(true)
    expect(parseMarker(text)?.sha256).toBe('abc123')
  })

  it('should reject markers without a valid timestamp', () => {
    expect(parseMarker('artifact: a.qmd\n')).toBeNull()
    expect(parseMarker('generated_at: yesterday\n')).toBeNull()
    expect(parseMarker('')).toBeNull()
  })

  it('markerPathFor appends the suffix', () => {
    expect(markerPathFor('/w/_02-01_iq.qmd')).toBe('/w/_02-01_iq.qmd.generated')
  })
})

describe('EditProtectionTracker', () => {
  let tempDir: string
  let artifact: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'neuroreport-protect-test-'))
    artifact = path.join(tempDir, '_02-05_memory.qmd')
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should not protect a missing artifact', () => {
    expect(new EditProtectionTracker().isProtected(artifact)).toBe(false)
  })

  it('should protect an artifact without a marker', () => {
    fs.writeFileSync(artifact, 'hand written\n')
    expect(new EditProtectionTracker().isProtected(artifact)).toBe(true)
  })

  it('should not protect a freshly generated artifact', () => {
    const tracker = new EditProtectionTracker()
    fs.writeFileSync(artifact, 'generated\n')
    const marker = tracker.markGenerated(artifact)

    expect(fs.existsSync(markerPathFor(artifact))).toBe(true)
    expect(tracker.readMarker(artifact)?.generatedAt.getTime()).toBe(marker.generatedAt.getTime())
    expect(tracker.isProtected(artifact)).toBe(false)
  })

  it('should protect an artifact modified after its marker', () => {
    const tracker = new EditProtectionTracker()
    fs.writeFileSync(artifact, 'generated\n')
    tracker.markGenerated(artifact)

    const later = new Date(Date.now() + 60_000)
    fs.utimesSync(artifact, later, later)

    expect(tracker.isProtected(artifact)).toBe(true)
    expect(tracker.listProtected([artifact, path.join(tempDir, 'missing.qmd')])).toEqual([artifact])
  })

  it('should protect an artifact whose marker is unreadable', () => {
    fs.writeFileSync(artifact, 'generated\n')
    fs.writeFileSync(markerPathFor(artifact), 'garbage\n')
    expect(new EditProtectionTracker().isProtected(artifact)).toBe(true)
  })

  it('clear removes artifact and marker', () => {
    const tracker = new EditProtectionTracker()
    fs.writeFileSync(artifact, 'generated\n')
    tracker.markGenerated(artifact)

    tracker.clear(artifact)
    expect(fs.existsSync(artifact)).toBe(false)
    expect(fs.existsSync(markerPathFor(artifact))).toBe(false)
    expect(() => tracker.clear(artifact)).not.toThrow()
  })

  describe('content-hash strategy', () => {
    it('should store the hash and detect content changes only', () => {
      const tracker = new EditProtectionTracker({ detector: new ContentHashChangeDetector() })
      fs.writeFileSync(artifact, 'generated\n')
      const marker = tracker.markGenerated(artifact)
      expect(marker.sha256).toBe(hashFile(artifact))

      const later = new Date(Date.now() + 60_000)
      fs.utimesSync(artifact, later, later)
      expect(tracker.isProtected(artifact)).toBe(false)

      fs.writeFileSync(artifact, 'edited by hand\n')
      expect(tracker.isProtected(artifact)).toBe(true)
    })

    it('should fall back to timestamps for markers without a hash', () => {
      const detector = new ContentHashChangeDetector()
      fs.writeFileSync(artifact, 'generated\n')
      const past = new Date(Date.now() - 60_000)
      expect(detector.hasChanged(artifact, { generatedAt: past, artifact })).toBe(true)
    })
  })

  it('createChangeDetector picks by strategy', () => {
    expect(createChangeDetector('content-hash')).toBeInstanceOf(ContentHashChangeDetector)
    expect(createChangeDetector('timestamp')).toBeInstanceOf(TimestampChangeDetector)
    expect(createChangeDetector().strategy).toBe('timestamp')
  })
})
