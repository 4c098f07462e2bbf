/**
 * neuroreport Error Hierarchy
 *
 * Typed error classes shared by the orchestration core and the CLI.
 *
 * Hierarchy:
 *   NeuroreportError (base)
 *   ├── ConfigError (configuration issues)
 *   │   ├── ConfigNotFoundError
 *   │   ├── InvalidConfigError
 *   │   ├── CircularExtendsError
 *   │   └── ExtendsDepthError
 *   ├── RegistryError (domain table issues)
 *   │   ├── InvalidRegistryError
 *   │   └── UnknownDomainError
 *   ├── DataError (per-domain data availability, non-fatal)
 *   │   ├── MissingDataSourceError
 *   │   └── NoUsableDataError
 *   ├── GenerationError (per-domain generation)
 *   │   ├── ProtectedEditConflictError
 *   │   ├── ProcessorFailureError
 *   │   └── ProcessorLoadError
 *   ├── RenderError
 *   │   └── RenderFailureError
 *   └── RunError
 *       └── ConcurrentRunDetectedError
 */

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: Error
}

/**
 * Base error class for all neuroreport errors
 */
export class NeuroreportError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'NeuroreportError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  /**
   * Convert to JSON for logging/debugging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends NeuroreportError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when a required config file (or an `extends` target) is missing
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(configPath: string) {
    super(`Config file not found: ${configPath}`, 'CONFIG_NOT_FOUND', {
      suggestion: 'Run "neuroreport init" to create .neuroreport/config.yaml',
      context: { configPath }
    })
    this.name = 'ConfigNotFoundError'
  }
}

export class InvalidConfigError extends ConfigError {
  constructor(message: string, field?: string) {
    super(message, 'INVALID_CONFIG', {
      suggestion: field ? `Check the "${field}" entry in .neuroreport/config.yaml` : undefined,
      context: field ? { field } : undefined
    })
    this.name = 'InvalidConfigError'
  }
}

export class CircularExtendsError extends ConfigError {
  constructor(configPath: string) {
    super(`Circular config inheritance detected: ${configPath}`, 'CIRCULAR_EXTENDS', {
      suggestion: 'Remove the "extends" cycle between config files',
      context: { configPath }
    })
    this.name = 'CircularExtendsError'
  }
}

export class ExtendsDepthError extends ConfigError {
  constructor(maxDepth: number) {
    super(`Config inheritance depth exceeded (max ${maxDepth})`, 'EXTENDS_DEPTH_EXCEEDED', {
      context: { maxDepth }
    })
    this.name = 'ExtendsDepthError'
  }
}

// =============================================================================
// Registry Errors
// =============================================================================

export class RegistryError extends NeuroreportError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'RegistryError'
  }
}

/**
 * Thrown at construction when the domain table breaks its own invariants
 */
export class InvalidRegistryError extends RegistryError {
  constructor(message: string) {
    super(message, 'INVALID_REGISTRY')
    this.name = 'InvalidRegistryError'
  }
}

export class UnknownDomainError extends RegistryError {
  constructor(label: string, knownKeys: string[]) {
    super(`Unknown domain: "${label}"`, 'UNKNOWN_DOMAIN', {
      suggestion: `Known domain keys: ${knownKeys.join(', ')}`,
      context: { label, knownKeys }
    })
    this.name = 'UnknownDomainError'
  }
}

// =============================================================================
// Data Errors
// =============================================================================

export class DataError extends NeuroreportError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'DataError'
  }
}

/**
 * A domain's backing data file is absent or cannot be read
 */
export class MissingDataSourceError extends DataError {
  constructor(source: string, filePath?: string, cause?: Error) {
    super(
      filePath
        ? `Data source "${source}" not found: ${filePath}`
        : `Data source "${source}" is not configured`,
      'MISSING_DATA_SOURCE',
      {
        suggestion: `Check data.sources.${source} in .neuroreport/config.yaml`,
        context: { source, filePath },
        cause
      }
    )
    this.name = 'MissingDataSourceError'
  }
}

/**
 * The data source loads but holds no measurable rows for the domain
 */
export class NoUsableDataError extends DataError {
  constructor(key: string, detail: string) {
    super(`No usable data for domain "${key}": ${detail}`, 'NO_USABLE_DATA', {
      context: { key, detail }
    })
    this.name = 'NoUsableDataError'
  }
}

// =============================================================================
// Generation Errors
// =============================================================================

export class GenerationError extends NeuroreportError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'GenerationError'
  }
}

/**
 * An existing artifact was edited by hand after it was generated
 */
export class ProtectedEditConflictError extends GenerationError {
  readonly artifacts: string[]

  constructor(key: string, artifacts: string[]) {
    super(
      `Domain "${key}" has hand-edited artifacts: ${artifacts.join(', ')}`,
      'PROTECTED_EDIT_CONFLICT',
      {
        suggestion: 'Re-run with --force to overwrite the edited files',
        context: { key, artifacts }
      }
    )
    this.name = 'ProtectedEditConflictError'
    this.artifacts = artifacts
  }
}

export class ProcessorFailureError extends GenerationError {
  constructor(key: string, rater: string, cause: Error) {
    super(
      rater === 'default'
        ? `Processor failed for domain "${key}": ${cause.message}`
        : `Processor failed for domain "${key}" (${rater}): ${cause.message}`,
      'PROCESSOR_FAILURE',
      { context: { key, rater }, cause }
    )
    this.name = 'ProcessorFailureError'
  }
}

/**
 * The configured processor module could not be imported. Fatal at setup.
 */
export class ProcessorLoadError extends GenerationError {
  constructor(modulePath: string, detail: string, cause?: Error) {
    super(`Cannot load domain processor "${modulePath}": ${detail}`, 'PROCESSOR_LOAD_FAILED', {
      suggestion: 'The module must export a DomainProcessor as default or createProcessor()',
      context: { modulePath },
      cause
    })
    this.name = 'ProcessorLoadError'
  }
}

// =============================================================================
// Render / Run Errors
// =============================================================================

export class RenderError extends NeuroreportError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'RenderError'
  }
}

export class RenderFailureError extends RenderError {
  readonly pass: number

  constructor(pass: number, detail: string, cause?: Error) {
    super(`Render pass ${pass} failed: ${detail}`, 'RENDER_FAILED', {
      suggestion: 'Run with --verbose to see the render engine output',
      context: { pass },
      cause
    })
    this.name = 'RenderFailureError'
    this.pass = pass
  }
}

export class RunError extends NeuroreportError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'RunError'
  }
}

export class ConcurrentRunDetectedError extends RunError {
  constructor(lockPath: string, holder?: string) {
    super(
      holder
        ? `Another run is in progress (${holder})`
        : 'Another run is in progress',
      'CONCURRENT_RUN',
      {
        suggestion: `If no other run is active, remove ${lockPath}`,
        context: { lockPath, holder }
      }
    )
    this.name = 'ConcurrentRunDetectedError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isNeuroreportError(error: unknown): error is NeuroreportError {
  return error instanceof NeuroreportError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isDataError(error: unknown): error is DataError {
  return error instanceof DataError
}

export function isGenerationError(error: unknown): error is GenerationError {
  return error instanceof GenerationError
}

export function isRenderError(error: unknown): error is RenderError {
  return error instanceof RenderError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isNeuroreportError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Wrap a generic error into a NeuroreportError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): NeuroreportError {
  if (isNeuroreportError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new NeuroreportError(error.message, defaultCode, { cause: error })
  }
  return new NeuroreportError(String(error), defaultCode)
}
