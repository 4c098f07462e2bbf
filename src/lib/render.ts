/**
 * Render coordination
 *
 * Two-stage mode: trigger enrichment, render pass 1 (failure tolerated),
 * wait a fixed delay, render pass 2 (failure fatal), relocate the output.
 * Single mode runs only the final pass and the relocation.
 */

import { spawn, type ChildProcess } from 'node:child_process'
import fs from 'node:fs'
import path from 'node:path'
import type {
  EnrichmentContext,
  EnrichmentService,
  RenderEngine,
  RenderRequest,
  RenderResult
} from '../types.js'
import { RenderFailureError, toError } from './errors.js'
import { delay as sleep, withTimeout } from './timeout.js'

const STDERR_TAIL = 2000

/** Output extension per render format */
export const FORMAT_EXTENSIONS: Record<string, string> = {
  typst: '.pdf',
  pdf: '.pdf',
  html: '.html',
  docx: '.docx',
  odt: '.odt',
  revealjs: '.html'
}

export function formatExtension(format: string): string {
  return Object.hasOwn(FORMAT_EXTENSIONS, format) ? FORMAT_EXTENSIONS[format] : `.${format}`
}

function waitForExit(child: ChildProcess): Promise<{ code: number | null; stderr: string }> {
  return new Promise((resolve, reject) => {
    let stderr = ''
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL)
    })
    child.once('error', reject)
    child.once('close', code => resolve({ code, stderr: stderr.trim() }))
  })
}

// =============================================================================
// Render Engine
// =============================================================================

export interface QuartoRenderEngineOptions {
  /** Executable (default "quarto") */
  command?: string
  /** Document to render; defaults to the manifest itself */
  template?: string
  cwd: string
  timeoutMs?: number
}

/**
 * Runs `<command> render <input> --to <format>` and reports the file it produced
 */
export class QuartoRenderEngine implements RenderEngine {
  constructor(private readonly options: QuartoRenderEngineOptions) {}

  async render(request: RenderRequest): Promise<RenderResult> {
    const command = this.options.command ?? 'quarto'
    const input = this.options.template ?? request.manifestPath
    const args = ['render', input, '--to', request.format]

    try {
      const child = spawn(command, args, {
        cwd: this.options.cwd,
        stdio: ['ignore', 'ignore', 'pipe']
      })
      const { code, stderr } = await withTimeout(
        waitForExit(child),
        this.options.timeoutMs ?? 600_000,
        `${command} ${args.join(' ')}`,
        () => child.kill('SIGTERM')
      )

      if (code !== 0) {
        return {
          success: false,
          error: stderr ? `${command} exited with code ${code}: ${stderr}` : `${command} exited with code ${code}`
        }
      }
    } catch (err) {
      return { success: false, error: toError(err).message }
    }

    const parsed = path.parse(path.resolve(this.options.cwd, input))
    const outputPath = path.join(parsed.dir, parsed.name + formatExtension(request.format))
    if (!fs.existsSync(outputPath)) {
      return { success: false, error: `Expected output not found: ${outputPath}` }
    }
    return { success: true, outputPath }
  }
}

// =============================================================================
// Enrichment
// =============================================================================

export class NoopEnrichmentService implements EnrichmentService {
  trigger(): void {}
}

export interface CommandEnrichmentOptions {
  command: string
  args?: string[]
  /** Receives spawn errors; they surface as process warnings otherwise */
  onError?: (error: Error) => void
}

/**
 * Spawns the configured command detached and does not wait for it.
 * The subject label and manifest path are passed as environment variables.
 */
export class CommandEnrichmentService implements EnrichmentService {
  constructor(private readonly options: CommandEnrichmentOptions) {}

  trigger(context: EnrichmentContext): void {
    const child = spawn(this.options.command, this.options.args ?? [], {
      cwd: context.workspaceRoot,
      detached: true,
      stdio: 'ignore',
      env: {
        ...process.env,
        NEUROREPORT_SUBJECT: context.subject ?? '',
        NEUROREPORT_MANIFEST: context.manifestPath
      }
    })
    child.once('error', err => {
      if (this.options.onError) {
        this.options.onError(err)
      } else {
        process.emitWarning(`Enrichment command failed: ${err.message}`)
      }
    })
    child.unref()
  }
}

// =============================================================================
// Coordinator
// =============================================================================

export type RenderEvent =
  | { type: 'enrichment-triggered' }
  | { type: 'pass-start'; pass: number }
  | { type: 'pass-done'; pass: number; outputPath?: string }
  | { type: 'pass-failed'; pass: number; error: string }
  | { type: 'waiting'; ms: number }
  | { type: 'relocated'; outputPath: string }

export interface RenderPassRecord {
  pass: number
  success: boolean
  error?: string
}

export interface RenderOutcome {
  outputPath: string
  passes: RenderPassRecord[]
}

export interface RenderRunContext {
  manifestPath: string
  workspaceRoot: string
  subject?: string
}

export interface RenderCoordinatorOptions {
  engine: RenderEngine
  enrichment?: EnrichmentService
  format: string
  outputDir: string
  twoStage: boolean
  /** Wait between the passes */
  waitMs: number
  delay?: (ms: number) => Promise<void>
  onProgress?: (event: RenderEvent) => void
}

/**
 * File-name-safe form of a subject label
 */
export function subjectFileLabel(subject: string | undefined): string {
  const safe = (subject ?? '').trim().replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^_+|_+$/g, '')
  return safe || 'subject'
}

/**
 * Move the rendered file to `<outputDir>/<label>_neuropsych_report<ext>`,
 * replacing any earlier output for the same label.
 */
export function relocateOutput(sourcePath: string, outputDir: string, subject?: string): string {
  const target = path.join(outputDir, `${subjectFileLabel(subject)}_neuropsych_report${path.extname(sourcePath)}`)
  if (path.resolve(sourcePath) === path.resolve(target)) {
    return target
  }

  fs.mkdirSync(outputDir, { recursive: true })
  try {
    fs.renameSync(sourcePath, target)
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) {
      throw err
    }
    fs.copyFileSync(sourcePath, target)
    fs.unlinkSync(sourcePath)
  }
  return target
}

export class RenderCoordinator {
  private readonly enrichment: EnrichmentService
  private readonly delay: (ms: number) => Promise<void>

  constructor(private readonly options: RenderCoordinatorOptions) {
    this.enrichment = options.enrichment ?? new NoopEnrichmentService()
    this.delay = options.delay ?? sleep
  }

  async run(context: RenderRunContext): Promise<RenderOutcome> {
    const { twoStage, waitMs, onProgress } = this.options
    const passes: RenderPassRecord[] = []

    if (twoStage) {
      this.enrichment.trigger({
        workspaceRoot: context.workspaceRoot,
        subject: context.subject,
        manifestPath: context.manifestPath
      })
      onProgress?.({ type: 'enrichment-triggered' })

      const first = await this.renderPass(1, context.manifestPath)
      passes.push({ pass: 1, success: first.success, error: first.error })

      onProgress?.({ type: 'waiting', ms: waitMs })
      await this.delay(waitMs)
    }

    const finalPass = twoStage ? 2 : 1
    const final = await this.renderPass(finalPass, context.manifestPath)
    passes.push({ pass: finalPass, success: final.success, error: final.error })

    if (!final.success) {
      throw new RenderFailureError(finalPass, final.error ?? 'unknown error')
    }
    if (!final.outputPath) {
      throw new RenderFailureError(finalPass, 'render engine reported no output file')
    }

    const outputPath = relocateOutput(final.outputPath, this.options.outputDir, context.subject)
    onProgress?.({ type: 'relocated', outputPath })
    return { outputPath, passes }
  }

  private async renderPass(pass: number, manifestPath: string): Promise<RenderResult> {
    const { engine, format, onProgress } = this.options
    onProgress?.({ type: 'pass-start', pass })

    let result: RenderResult
    try {
      result = await engine.render({ manifestPath, format })
    } catch (err) {
      result = { success: false, error: toError(err).message }
    }

    if (result.success) {
      onProgress?.({ type: 'pass-done', pass, outputPath: result.outputPath })
    } else {
      onProgress?.({ type: 'pass-failed', pass, error: result.error ?? 'unknown error' })
    }
    return result
  }
}
