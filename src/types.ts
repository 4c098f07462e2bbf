/**
 * neuroreport - Type Definitions
 */

// ============================================================================
// Domain Types
// ============================================================================

/**
 * Logical data source handle (e.g. 'neurocog', 'neurobehav', 'validity').
 * Resolved to a file through `data.sources` in the config.
 */
export type DataSource = string

/** Subject-age class; decides which respondent categories are eligible */
export type AgeClass = 'adult' | 'child'

/** Respondent category of a rating scale */
export type RaterTag = 'self' | 'parent' | 'teacher' | 'observer'

/** Variant of a domain artifact: a rater, or 'default' for single-artifact domains */
export type VariantTag = RaterTag | 'default'

/** Fixed rater order used for expansion and manifest output */
export const RATER_ORDER: readonly RaterTag[] = ['self', 'parent', 'teacher', 'observer']

export interface DomainSpec {
  /** Stable processing identifier (phenotype code) */
  key: string
  /** Canonical label first, then aliases, as they appear in the data's domain column */
  labels: readonly string[]
  /** Section position in the assembled document */
  sectionOrdinal: number
  dataSource: DataSource
  raterCapable: boolean
  /** Section heading; defaults to the first label */
  title?: string
  /** Restricts the spec to one subject class when it shares an alias with another spec */
  subjectClass?: AgeClass
}

/** One row of a tabular data source, keyed by column name */
export type Row = Record<string, string>

// ============================================================================
// Generation Types
// ============================================================================

export type GenerationStatus = 'generated' | 'cached' | 'protected' | 'skipped' | 'failed'

export const GENERATION_STATUSES: readonly GenerationStatus[] = [
  'generated',
  'cached',
  'protected',
  'skipped',
  'failed'
]

export interface DomainOutcome {
  key: string
  sectionOrdinal: number
  status: GenerationStatus
  /** Artifacts written this pass, or the existing ones for a protected domain */
  artifacts: string[]
  /** Error code behind a skipped/protected/failed status */
  code?: string
  /** Human-readable reason or failure message */
  message?: string
  durationMs: number
}

export interface RunReport {
  subject?: string
  startedAt: string
  finishedAt: string
  counts: Record<GenerationStatus, number>
  /** One entry per domain, in section order */
  outcomes: DomainOutcome[]
  failures: Array<{ key: string; message: string }>
}

// ============================================================================
// Collaborator Interfaces
// ============================================================================

/**
 * Tabular data store. `load` is expected to cache per source.
 */
export interface TabularStore {
  /** Absolute path of the file behind a source, or undefined if not configured */
  sourcePath(source: DataSource): string | undefined
  load(source: DataSource): Promise<Row[]>
  filterByLabels(rows: Row[], labels: readonly string[]): Row[]
}

export interface ProcessInput {
  spec: DomainSpec
  rows: Row[]
  rater: VariantTag
}

/**
 * Produces the content of one artifact. May throw.
 */
export interface DomainProcessor {
  process(input: ProcessInput): Promise<string> | string
}

export interface EnrichmentContext {
  workspaceRoot: string
  subject?: string
  manifestPath: string
}

/**
 * Out-of-process enrichment (text summarization). Fire-and-forget.
 */
export interface EnrichmentService {
  trigger(context: EnrichmentContext): void
}

export interface RenderRequest {
  manifestPath: string
  format: string
}

export interface RenderResult {
  success: boolean
  outputPath?: string
  error?: string
}

export interface RenderEngine {
  render(request: RenderRequest): Promise<RenderResult>
}

// ============================================================================
// Configuration Types
// ============================================================================

export type MarkerStrategy = 'timestamp' | 'content-hash'

export interface NeuroreportConfig {
  version: '1'
  /** Inherit from another config file */
  extends?: string

  subject?: {
    /** Opaque label used for the output file name */
    label?: string
    /** Years; overrides age-class detection from the data when set */
    age?: number
  }

  data?: {
    /** Directory the source files are resolved against (relative to the workspace) */
    dir?: string
    /** Data source handle -> file name */
    sources?: Record<string, string>
    /** Test identifiers normed on pediatric samples */
    pediatric_tests?: string[]
  }

  artifacts?: {
    dir?: string
    prefix?: string
    extension?: string
    manifest?: string
  }

  generation?: {
    protect_edits?: boolean
    marker_strategy?: MarkerStrategy
    /** Module path of a custom DomainProcessor */
    processor?: string
  }

  render?: {
    enabled?: boolean
    two_stage?: boolean
    command?: string
    /** Document rendered by the engine; includes the manifest. Defaults to the manifest itself. */
    template?: string
    format?: string
    output_dir?: string
    timeout_ms?: number
  }

  enrichment?: {
    command?: string
    args?: string[]
    wait_ms?: number
  }
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIArgs {
  _: string[]
  subject?: string
  path?: string
  verbose?: boolean
  quiet?: boolean
  json?: boolean
  force?: boolean
  'protect-edits'?: boolean
  'two-stage'?: boolean
  render?: boolean
  domains?: string
  strict?: boolean
}
