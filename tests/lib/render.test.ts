/**
 * Tests for render.ts
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import {
  CommandEnrichmentService,
  QuartoRenderEngine,
  RenderCoordinator,
  formatExtension,
  relocateOutput,
  subjectFileLabel,
  type RenderEvent
} from '../../src/lib/render.js'
import { RenderFailureError } from '../../src/lib/errors.js'
import type { EnrichmentContext, RenderEngine, RenderResult } from '../../src/types.js'

const MISSING_COMMAND = 'neuroreport-test-command-that-does-not-exist'

describe('render helpers', () => {
  it('formatExtension maps known formats', () => {
    expect(formatExtension('typst')).toBe('.pdf')
    expect(formatExtension('revealjs')).toBe('.html')
    expect(formatExtension('markdown')).toBe('.markdown')
    expect(formatExtension('toString')).toBe('.toString')
  })

  it('subjectFileLabel keeps only file-name-safe characters', () => {
    expect(subjectFileLabel('Case-01')).toBe('Case-01')
    expect(subjectFileLabel('Doe, Jane')).toBe('Doe_Jane')
    expect(subjectFileLabel('Case 01/ß')).toBe('Case_01')
    expect(subjectFileLabel('  ')).toBe('subject')
    expect(subjectFileLabel(undefined)).toBe('subject')
  })
})

describe('relocateOutput', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'neuroreport-relocate-test-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should move the file and replace an earlier output', () => {
    const source = path.join(tempDir, 'template.pdf')
    const outputDir = path.join(tempDir, 'output')
    fs.writeFileSync(source, 'new')
    fs.mkdirSync(outputDir)
    fs.writeFileSync(path.join(outputDir, 'Case-01_neuropsych_report.pdf'), 'old')

    const target = relocateOutput(source, outputDir, 'Case-01')

    expect(target).toBe(path.join(outputDir, 'Case-01_neuropsych_report.pdf'))
    expect(fs.readFileSync(target, 'utf-8')).toBe('new')
    expect(fs.existsSync(source)).toBe(false)
  })
})

describe('RenderCoordinator', () => {
  let tempDir: string
  let outputDir: string
  let events: RenderEvent[]
  let delay: Mock<(ms: number) => Promise<void>>
  let enrichment: { trigger: Mock<(context: EnrichmentContext) => void> }

  const context = () => ({
    manifestPath: path.join(tempDir, '_02-00_domains.qmd'),
    workspaceRoot: tempDir,
    subject: 'Case-01'
  })

  /** Engine answering each call with the next scripted result; `true` writes a PDF */
  const scriptedEngine = (script: Array<true | RenderResult | Error>) => {
    let call = 0
    const engine: RenderEngine = {
      async render() {
        const step = script[Math.min(call++, script.length - 1)]
        if (step instanceof Error) throw step
        if (step !== true) return step
        const outputPath = path.join(tempDir, 'template.pdf')
        fs.writeFileSync(outputPath, `pdf ${call}`)
        return { success: true, outputPath }
      }
    }
    return { engine, calls: () => call }
  }

  const coordinator = (engine: RenderEngine, twoStage: boolean) => new RenderCoordinator({
    engine,
    enrichment,
    format: 'typst',
    outputDir,
    twoStage,
    waitMs: 30000,
    delay,
    onProgress: event => events.push(event)
  })

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'neuroreport-render-test-'))
    outputDir = path.join(tempDir, 'output')
    events = []
    delay = vi.fn(async (_ms: number) => {})
    enrichment = { trigger: vi.fn<(context: EnrichmentContext) => void>() }
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('two-stage', () => {
    it('should tolerate a failed first pass and deliver the second', async () => {
      const { engine, calls } = scriptedEngine([{ success: false, error: 'summaries missing' }, true])

      const outcome = await coordinator(engine, true).run(context())

      expect(calls()).toBe(2)
      expect(enrichment.trigger).toHaveBeenCalledWith({
        workspaceRoot: tempDir,
        subject: 'Case-01',
        manifestPath: path.join(tempDir, '_02-00_domains.qmd')
      })
      expect(delay).toHaveBeenCalledWith(30000)
      expect(outcome.passes).toEqual([
        { pass: 1, success: false, error: 'summaries missing' },
        { pass: 2, success: true, error: undefined }
      ])
      expect(outcome.outputPath).toBe(path.join(outputDir, 'Case-01_neuropsych_report.pdf'))
      expect(fs.readFileSync(outcome.outputPath, 'utf-8')).toBe('pdf 2')
    })

    it('should emit events in order', async () => {
      const { engine } = scriptedEngine([true])
      await coordinator(engine, true).run(context())

      expect(events.map(e => e.type)).toEqual([
        'enrichment-triggered',
        'pass-start',
        'pass-done',
        'waiting',
        'pass-start',
        'pass-done',
        'relocated'
      ])
    })

    it('should record an engine that throws on the first pass', async () => {
      const { engine } = scriptedEngine([new Error('engine crashed'), true])
      const outcome = await coordinator(engine, true).run(context())
      expect(outcome.passes[0]).toEqual({ pass: 1, success: false, error: 'engine crashed' })
    })

    it('should fail when the final pass fails', async () => {
      const { engine } = scriptedEngine([true, { success: false, error: 'exit 1' }])

      const run = coordinator(engine, true).run(context())
      await expect(run).rejects.toThrow(RenderFailureError)
      await expect(run).rejects.toThrow('Render pass 2 failed: exit 1')
      expect(fs.existsSync(outputDir)).toBe(false)
    })
  })

  describe('single pass', () => {
    it('should render once without enrichment or delay', async () => {
      const { engine, calls } = scriptedEngine([true])
      const outcome = await coordinator(engine, false).run(context())

      expect(calls()).toBe(1)
      expect(enrichment.trigger).not.toHaveBeenCalled()
      expect(delay).not.toHaveBeenCalled()
      expect(outcome.passes).toEqual([{ pass: 1, success: true, error: undefined }])
      expect(fs.existsSync(outcome.outputPath)).toBe(true)
    })

    it('should fail when the engine reports no output file', async () => {
      const { engine } = scriptedEngine([{ success: true }])
      await expect(coordinator(engine, false).run(context()))
        .rejects.toThrow('Render pass 1 failed: render engine reported no output file')
    })
  })
})

describe('external commands', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'neuroreport-command-test-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('QuartoRenderEngine reports a missing executable as a failed result', async () => {
    const engine = new QuartoRenderEngine({ command: MISSING_COMMAND, cwd: tempDir, timeoutMs: 5000 })
    const result = await engine.render({ manifestPath: path.join(tempDir, 'm.qmd'), format: 'typst' })

    expect(result.success).toBe(false)
    expect(result.error).toContain('ENOENT')
  })

  it('CommandEnrichmentService passes spawn errors to onError', async () => {
    const error = await new Promise<Error>(resolve => {
      new CommandEnrichmentService({ command: MISSING_COMMAND, onError: resolve }).trigger({
        workspaceRoot: tempDir,
        manifestPath: path.join(tempDir, 'm.qmd')
      })
    })
    expect(error.message).toContain('ENOENT')
  })
})
