/**
 * Workflow
 *
 * Wires settings into the registry, store, orchestrator, manifest and
 * render coordinator, and runs them under the run lock.
 */

import fs from 'node:fs'
import type {
  DomainProcessor,
  EnrichmentService,
  RenderEngine,
  RunReport
} from '../types.js'
import { allVariantPaths } from './artifact-naming.js'
import { DataAvailabilityChecker } from './availability.js'
import {
  getWorkspaceRoot,
  loadConfig,
  resolveSettings,
  type WorkflowSettings
} from './config-loader.js'
import { CsvTabularStore } from './data-store.js'
import { DomainRegistry } from './domain-registry.js'
import { EditProtectionTracker, createChangeDetector } from './edit-protection.js'
import { NeuroreportError } from './errors.js'
import { ManifestBuilder, type RetainedSection } from './manifest.js'
import {
  GenerationOrchestrator,
  type GenerationEvent
} from './orchestrator.js'
import { MarkdownDomainProcessor, loadDomainProcessor } from './processor.js'
import { RaterExpander } from './rater-expander.js'
import {
  CommandEnrichmentService,
  NoopEnrichmentService,
  QuartoRenderEngine,
  RenderCoordinator,
  type RenderEvent,
  type RenderOutcome
} from './render.js'
import { withRunLock } from './run-lock.js'

export interface WorkflowOptions {
  /** Overrides subject.label */
  subject?: string
  force?: boolean
  /** Overrides generation.protect_edits */
  protectEdits?: boolean
  /** Overrides render.two_stage */
  twoStage?: boolean
  /** Overrides render.enabled */
  render?: boolean
  domains?: string[]
  onGenerationEvent?: (event: GenerationEvent) => void
  onRenderEvent?: (event: RenderEvent) => void

  // Collaborators; defaults are built from the settings
  registry?: DomainRegistry
  processor?: DomainProcessor
  engine?: RenderEngine
  enrichment?: EnrichmentService
  delay?: (ms: number) => Promise<void>
}

export interface GenerationResult {
  report: RunReport
  manifestPath: string
  manifestEntries: string[]
}

export interface WorkflowResult extends GenerationResult {
  render?: RenderOutcome
}

/**
 * Load config from the nearest .neuroreport/ and resolve it against its workspace
 */
export function loadWorkflowSettings(startDir: string = process.cwd()): WorkflowSettings {
  return resolveSettings(loadConfig(startDir), getWorkspaceRoot(startDir))
}

export async function createProcessor(settings: WorkflowSettings): Promise<DomainProcessor> {
  if (settings.processorModule) {
    return loadDomainProcessor(settings.processorModule)
  }
  return new MarkdownDomainProcessor()
}

export function createTracker(settings: WorkflowSettings): EditProtectionTracker {
  return new EditProtectionTracker({ detector: createChangeDetector(settings.markerStrategy) })
}

function createRenderCoordinator(
  settings: WorkflowSettings,
  twoStage: boolean,
  options: WorkflowOptions
): RenderCoordinator {
  const engine = options.engine ?? new QuartoRenderEngine({
    command: settings.render.command,
    template: settings.render.template,
    cwd: settings.workspaceRoot,
    timeoutMs: settings.render.timeoutMs
  })

  let enrichment = options.enrichment
  if (!enrichment) {
    enrichment = settings.enrichment.command
      ? new CommandEnrichmentService({ command: settings.enrichment.command, args: settings.enrichment.args })
      : new NoopEnrichmentService()
  }

  return new RenderCoordinator({
    engine,
    enrichment,
    format: settings.render.format,
    outputDir: settings.render.outputDir,
    twoStage,
    waitMs: settings.enrichment.waitMs,
    delay: options.delay,
    onProgress: options.onRenderEvent
  })
}

/**
 * Artifacts on disk for every domain outside the run's selection
 */
function retainedSections(
  registry: DomainRegistry,
  settings: WorkflowSettings,
  report: RunReport
): RetainedSection[] {
  const processed = new Set(report.outcomes.map(outcome => outcome.key))

  return registry.listSpecs()
    .filter(spec => !processed.has(spec.key))
    .map(spec => ({
      key: spec.key,
      sectionOrdinal: spec.sectionOrdinal,
      artifacts: allVariantPaths(spec, settings).filter(artifact => fs.existsSync(artifact))
    }))
    .filter(section => section.artifacts.length > 0)
}

async function generate(settings: WorkflowSettings, options: WorkflowOptions): Promise<GenerationResult> {
  const subject = options.subject ?? settings.subject
  const processor = options.processor ?? await createProcessor(settings)
  const registry = options.registry ?? new DomainRegistry()

  const orchestrator = new GenerationOrchestrator({
    registry,
    checker: new DataAvailabilityChecker(new CsvTabularStore(settings.sources)),
    tracker: createTracker(settings),
    expander: new RaterExpander({
      pediatricTests: settings.pediatricTests,
      subjectAge: settings.subjectAge
    }),
    processor,
    layout: settings,
    subject
  })

  const report = await orchestrator.run({
    forceRegenerate: options.force ?? false,
    protectEdits: options.protectEdits ?? settings.protectEdits,
    domains: options.domains,
    onProgress: options.onGenerationEvent
  })

  const retained = options.domains ? retainedSections(registry, settings, report) : []
  const manifest = new ManifestBuilder(settings.manifestPath).write(report, retained)
  return { report, manifestPath: manifest.path, manifestEntries: manifest.entries }
}

/**
 * Generation and manifest only
 */
export function runGeneration(
  settings: WorkflowSettings,
  options: WorkflowOptions = {}
): Promise<GenerationResult> {
  const subject = options.subject ?? settings.subject
  return withRunLock(settings.lockPath, subject, () => generate(settings, options))
}

/**
 * Generation, manifest and (unless disabled) render
 */
export function runWorkflow(
  settings: WorkflowSettings,
  options: WorkflowOptions = {}
): Promise<WorkflowResult> {
  const subject = options.subject ?? settings.subject

  return withRunLock(settings.lockPath, subject, async () => {
    const result = await generate(settings, options)
    if (!(options.render ?? settings.render.enabled)) {
      return result
    }

    const coordinator = createRenderCoordinator(settings, options.twoStage ?? settings.render.twoStage, options)
    const render = await coordinator.run({
      manifestPath: result.manifestPath,
      workspaceRoot: settings.workspaceRoot,
      subject
    })
    return { ...result, render }
  })
}

/**
 * Render the existing manifest without regenerating anything
 */
export function runRender(
  settings: WorkflowSettings,
  options: WorkflowOptions = {}
): Promise<RenderOutcome> {
  const subject = options.subject ?? settings.subject

  return withRunLock(settings.lockPath, subject, () => {
    if (!fs.existsSync(settings.manifestPath)) {
      throw new NeuroreportError(`Manifest not found: ${settings.manifestPath}`, 'MANIFEST_NOT_FOUND', {
        suggestion: 'Run "neuroreport generate" first'
      })
    }

    const coordinator = createRenderCoordinator(settings, options.twoStage ?? settings.render.twoStage, options)
    return coordinator.run({
      manifestPath: settings.manifestPath,
      workspaceRoot: settings.workspaceRoot,
      subject
    })
  })
}

export interface ProtectedArtifact {
  key: string
  path: string
}

/**
 * Artifacts edited by hand since they were generated, in section order
 */
export function listProtectedArtifacts(
  settings: WorkflowSettings,
  registry: DomainRegistry = new DomainRegistry()
): ProtectedArtifact[] {
  const tracker = createTracker(settings)
  const found: ProtectedArtifact[] = []

  for (const spec of registry.listSpecs()) {
    for (const artifact of tracker.listProtected(allVariantPaths(spec, settings))) {
      found.push({ key: spec.key, path: artifact })
    }
  }
  return found
}
