/**
 * neuroreport - Generation orchestration for multi-section clinical reports
 *
 * Main library exports for programmatic usage
 */

// Types
export type {
  AgeClass,
  DataSource,
  DomainOutcome,
  DomainProcessor,
  DomainSpec,
  EnrichmentContext,
  EnrichmentService,
  GenerationStatus,
  MarkerStrategy,
  NeuroreportConfig,
  ProcessInput,
  RaterTag,
  RenderEngine,
  RenderRequest,
  RenderResult,
  Row,
  RunReport,
  TabularStore,
  VariantTag
} from './types.js'

export { GENERATION_STATUSES, RATER_ORDER } from './types.js'

// Config utilities
export {
  loadConfig,
  findConfigDir,
  getWorkspaceRoot,
  configExists,
  createDefaultConfig,
  validateConfig,
  resolveSettings,
  DEFAULT_CONFIG
} from './lib/config-loader.js'
export type { WorkflowSettings } from './lib/config-loader.js'

// Registry
export { DomainRegistry, DEFAULT_DOMAINS, validateDomainTable } from './lib/domain-registry.js'
export type { ResolveAllResult } from './lib/domain-registry.js'

// Data
export { CsvTabularStore, filterByLabels, parseCsv } from './lib/data-store.js'
export {
  DataAvailabilityChecker,
  SCORE_COLUMNS,
  isMissingValue,
  scoreColumn
} from './lib/availability.js'
export type { AvailabilityResult, AvailabilityReason } from './lib/availability.js'

// Edit protection
export {
  EditProtectionTracker,
  TimestampChangeDetector,
  ContentHashChangeDetector,
  createChangeDetector,
  formatMarker,
  parseMarker,
  markerPathFor,
  MARKER_SUFFIX
} from './lib/edit-protection.js'
export type { ChangeDetector, GenerationMarker } from './lib/edit-protection.js'

// Rater expansion
export { RaterExpander, normalizeRater, ELIGIBLE_RATERS } from './lib/rater-expander.js'
export type { RaterVariant, RaterExpanderOptions } from './lib/rater-expander.js'

// Generation
export { artifactPath, allVariantPaths } from './lib/artifact-naming.js'
export type { ArtifactLayout } from './lib/artifact-naming.js'
export { GenerationOrchestrator } from './lib/orchestrator.js'
export type { GenerationEvent, GenerationOptions, OrchestratorDeps } from './lib/orchestrator.js'
export { MarkdownDomainProcessor, loadDomainProcessor } from './lib/processor.js'
export {
  createRunReport,
  formatRunReport,
  formatRunReportJson,
  hasFailures
} from './lib/run-report.js'
export { ManifestBuilder } from './lib/manifest.js'

// Render
export {
  RenderCoordinator,
  QuartoRenderEngine,
  CommandEnrichmentService,
  NoopEnrichmentService,
  relocateOutput,
  subjectFileLabel
} from './lib/render.js'
export type { RenderEvent, RenderOutcome, RenderPassRecord } from './lib/render.js'

// Run lock and workflow
export { RunLock, withRunLock } from './lib/run-lock.js'
export {
  loadWorkflowSettings,
  runWorkflow,
  runGeneration,
  runRender,
  listProtectedArtifacts
} from './lib/workflow.js'
export type { WorkflowOptions, WorkflowResult, GenerationResult } from './lib/workflow.js'

// Errors
export * from './lib/errors.js'
