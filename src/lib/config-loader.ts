/**
 * neuroreport Config Loader
 *
 * Loads and merges configuration from .neuroreport/config.yaml files
 * with support for inheritance via "extends" field.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { MarkerStrategy, NeuroreportConfig } from '../types.js'
import {
  CircularExtendsError,
  ConfigNotFoundError,
  ExtendsDepthError,
  InvalidConfigError
} from './errors.js'

export const CONFIG_DIR = '.neuroreport'
export const CONFIG_FILE = 'config.yaml'
export const CONFIG_LOCAL_FILE = 'config.local.yaml'
export const LOCK_FILE = '.neuroreport.lock'
const MAX_SEARCH_DEPTH = 5
const MAX_EXTENDS_DEPTH = 10

type RawConfig = Record<string, unknown>

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
function expandEnvVars(str: string): string {
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return process.env[varName] || defaultValue
  })

  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return process.env[varName] || ''
  })

  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return process.env[varName] || ''
  })

  return str
}

function isPlainObject(value: unknown): value is RawConfig {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Recursively expand env vars in a parsed YAML value
 */
function expandEnvVarsInValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value)
  }
  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item))
  }
  if (isPlainObject(value)) {
    const result: RawConfig = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item)
    }
    return result
  }
  return value
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: NeuroreportConfig = {
  version: '1',
  data: {
    dir: 'data',
    sources: {
      neurocog: 'neurocog.csv',
      neurobehav: 'neurobehav.csv',
      validity: 'validity.csv'
    },
    pediatric_tests: []
  },
  artifacts: {
    dir: '.',
    prefix: '_02-',
    extension: '.qmd',
    manifest: '_02-00_domains.qmd'
  },
  generation: {
    protect_edits: true,
    marker_strategy: 'timestamp'
  },
  render: {
    enabled: true,
    two_stage: true,
    command: 'quarto',
    format: 'typst',
    output_dir: 'output',
    timeout_ms: 600_000
  },
  enrichment: {
    args: [],
    wait_ms: 30_000
  }
}

/**
 * Find the .neuroreport directory by searching up from the current directory
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)
  let depth = 0

  while (depth < MAX_SEARCH_DEPTH) {
    const configDir = path.join(currentDir, CONFIG_DIR)
    if (fs.existsSync(path.join(configDir, CONFIG_FILE))) {
      return configDir
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      break
    }

    currentDir = parentDir
    depth++
  }

  return null
}

/**
 * Workspace root: the directory holding .neuroreport/, or the start dir when there is none
 */
export function getWorkspaceRoot(startDir: string = process.cwd()): string {
  const configDir = findConfigDir(startDir)
  return configDir ? path.dirname(configDir) : path.resolve(startDir)
}

/**
 * Load a single config file
 */
function loadConfigFile(configPath: string, required: boolean = true): RawConfig {
  if (!fs.existsSync(configPath)) {
    if (required) {
      throw new ConfigNotFoundError(configPath)
    }
    return {}
  }

  const content = fs.readFileSync(configPath, 'utf-8')
  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (err) {
    throw new InvalidConfigError(
      `Cannot parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`
    )
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }
  if (!isPlainObject(parsed)) {
    throw new InvalidConfigError(`Config file must contain a mapping: ${configPath}`)
  }

  const expanded = expandEnvVarsInValue(parsed)
  return isPlainObject(expanded) ? expanded : {}
}

/**
 * Deep merge two raw config objects (arrays are replaced, not concatenated)
 */
function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target }

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key]
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue)
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue
    }
  }

  return result
}

/**
 * Load config with inheritance support
 */
function loadConfigWithExtends(
  configPath: string,
  visited: Set<string> = new Set(),
  depth: number = 0
): RawConfig {
  if (depth > MAX_EXTENDS_DEPTH) {
    throw new ExtendsDepthError(MAX_EXTENDS_DEPTH)
  }

  const absolutePath = path.resolve(configPath)
  if (visited.has(absolutePath)) {
    throw new CircularExtendsError(absolutePath)
  }
  visited.add(absolutePath)

  const { extends: parent, ...config } = loadConfigFile(absolutePath)

  if (parent === undefined) {
    return config
  }
  if (typeof parent !== 'string') {
    throw new InvalidConfigError('"extends" must be a file path', 'extends')
  }

  const parentPath = path.resolve(path.dirname(absolutePath), parent)
  return deepMerge(loadConfigWithExtends(parentPath, visited, depth + 1), config)
}

// =============================================================================
// Validation
// =============================================================================

function section(raw: RawConfig, name: string): RawConfig {
  const value = raw[name]
  if (value === undefined || value === null) return {}
  if (!isPlainObject(value)) {
    throw new InvalidConfigError(`"${name}" must be a mapping`, name)
  }
  return value
}

function readString(obj: RawConfig, key: string, field: string): string | undefined {
  const value = obj[key]
  if (value === undefined || value === null) return undefined
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  throw new InvalidConfigError(`"${field}" must be a string`, field)
}

function readNumber(obj: RawConfig, key: string, field: string): number | undefined {
  const value = obj[key]
  if (value === undefined || value === null || value === '') return undefined
  const num = typeof value === 'string' ? Number(value) : value
  if (typeof num !== 'number' || Number.isNaN(num)) {
    throw new InvalidConfigError(`"${field}" must be a number`, field)
  }
  if (num < 0) {
    throw new InvalidConfigError(`"${field}" must not be negative (got ${num})`, field)
  }
  return num
}

function readBoolean(obj: RawConfig, key: string, field: string): boolean | undefined {
  const value = obj[key]
  if (value === undefined || value === null || value === '') return undefined
  if (typeof value === 'boolean') return value
  if (value === 'true') return true
  if (value === 'false') return false
  throw new InvalidConfigError(`"${field}" must be true or false`, field)
}

function readStringArray(obj: RawConfig, key: string, field: string): string[] | undefined {
  const value = obj[key]
  if (value === undefined || value === null) return undefined
  if (!Array.isArray(value)) {
    throw new InvalidConfigError(`"${field}" must be a list`, field)
  }
  return value.map((item, index) => {
    if (typeof item === 'string' || typeof item === 'number') return String(item)
    throw new InvalidConfigError(`"${field}[${index}]" must be a string`, field)
  })
}

function readStringRecord(obj: RawConfig, key: string, field: string): Record<string, string> | undefined {
  const value = obj[key]
  if (value === undefined || value === null) return undefined
  if (!isPlainObject(value)) {
    throw new InvalidConfigError(`"${field}" must be a mapping`, field)
  }
  const result: Record<string, string> = {}
  for (const [name, item] of Object.entries(value)) {
    if (typeof item !== 'string') {
      throw new InvalidConfigError(`"${field}.${name}" must be a file name`, field)
    }
    result[name] = item
  }
  return result
}

function readMarkerStrategy(obj: RawConfig): MarkerStrategy | undefined {
  const value = readString(obj, 'marker_strategy', 'generation.marker_strategy')
  if (value === undefined) return undefined
  if (value === 'timestamp' || value === 'content-hash') return value
  throw new InvalidConfigError(
    `"generation.marker_strategy" must be "timestamp" or "content-hash" (got "${value}")`,
    'generation.marker_strategy'
  )
}

/** Set only defined values so spreads over defaults keep the default */
function setIfDefined<T, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
  if (value !== undefined) {
    target[key] = value
  }
}

type Section<K extends keyof NeuroreportConfig> = NonNullable<NeuroreportConfig[K]>

/**
 * Validate a raw (merged) config object into a typed config
 */
export function validateConfig(raw: RawConfig): NeuroreportConfig {
  const version = raw.version
  if (version !== undefined && String(version) !== '1') {
    throw new InvalidConfigError(`Unsupported config version: ${String(version)}`, 'version')
  }

  const subjectRaw = section(raw, 'subject')
  const subject: Section<'subject'> = {}
  setIfDefined(subject, 'label', readString(subjectRaw, 'label', 'subject.label'))
  setIfDefined(subject, 'age', readNumber(subjectRaw, 'age', 'subject.age'))

  const dataRaw = section(raw, 'data')
  const data: Section<'data'> = {}
  setIfDefined(data, 'dir', readString(dataRaw, 'dir', 'data.dir'))
  setIfDefined(data, 'sources', readStringRecord(dataRaw, 'sources', 'data.sources'))
  setIfDefined(data, 'pediatric_tests', readStringArray(dataRaw, 'pediatric_tests', 'data.pediatric_tests'))

  const artifactsRaw = section(raw, 'artifacts')
  const artifacts: Section<'artifacts'> = {}
  setIfDefined(artifacts, 'dir', readString(artifactsRaw, 'dir', 'artifacts.dir'))
  setIfDefined(artifacts, 'prefix', readString(artifactsRaw, 'prefix', 'artifacts.prefix'))
  setIfDefined(artifacts, 'extension', readString(artifactsRaw, 'extension', 'artifacts.extension'))
  setIfDefined(artifacts, 'manifest', readString(artifactsRaw, 'manifest', 'artifacts.manifest'))

  const generationRaw = section(raw, 'generation')
  const generation: Section<'generation'> = {}
  setIfDefined(generation, 'protect_edits', readBoolean(generationRaw, 'protect_edits', 'generation.protect_edits'))
  setIfDefined(generation, 'marker_strategy', readMarkerStrategy(generationRaw))
  setIfDefined(generation, 'processor', readString(generationRaw, 'processor', 'generation.processor'))

  const renderRaw = section(raw, 'render')
  const render: Section<'render'> = {}
  setIfDefined(render, 'enabled', readBoolean(renderRaw, 'enabled', 'render.enabled'))
  setIfDefined(render, 'two_stage', readBoolean(renderRaw, 'two_stage', 'render.two_stage'))
  setIfDefined(render, 'command', readString(renderRaw, 'command', 'render.command'))
  setIfDefined(render, 'template', readString(renderRaw, 'template', 'render.template'))
  setIfDefined(render, 'format', readString(renderRaw, 'format', 'render.format'))
  setIfDefined(render, 'output_dir', readString(renderRaw, 'output_dir', 'render.output_dir'))
  setIfDefined(render, 'timeout_ms', readNumber(renderRaw, 'timeout_ms', 'render.timeout_ms'))

  const enrichmentRaw = section(raw, 'enrichment')
  const enrichment: Section<'enrichment'> = {}
  setIfDefined(enrichment, 'command', readString(enrichmentRaw, 'command', 'enrichment.command'))
  setIfDefined(enrichment, 'args', readStringArray(enrichmentRaw, 'args', 'enrichment.args'))
  setIfDefined(enrichment, 'wait_ms', readNumber(enrichmentRaw, 'wait_ms', 'enrichment.wait_ms'))

  return { version: '1', subject, data, artifacts, generation, render, enrichment }
}

/**
 * Layer a validated config over DEFAULT_CONFIG, section by section
 */
function applyDefaults(config: NeuroreportConfig): NeuroreportConfig {
  const d = DEFAULT_CONFIG
  return {
    version: '1',
    subject: { ...d.subject, ...config.subject },
    data: {
      ...d.data,
      ...config.data,
      sources: { ...d.data?.sources, ...config.data?.sources }
    },
    artifacts: { ...d.artifacts, ...config.artifacts },
    generation: { ...d.generation, ...config.generation },
    render: { ...d.render, ...config.render },
    enrichment: { ...d.enrichment, ...config.enrichment }
  }
}

/**
 * Load configuration from the nearest .neuroreport/config.yaml
 * Also merges config.local.yaml if it exists (for machine-specific overrides)
 */
export function loadConfig(startDir?: string): NeuroreportConfig {
  const configDir = findConfigDir(startDir)

  if (!configDir) {
    return applyDefaults({ version: '1' })
  }

  let raw = loadConfigWithExtends(path.join(configDir, CONFIG_FILE))

  const localConfig = loadConfigFile(path.join(configDir, CONFIG_LOCAL_FILE), false)
  if (Object.keys(localConfig).length > 0) {
    raw = deepMerge(raw, localConfig)
  }

  return applyDefaults(validateConfig(raw))
}

// =============================================================================
// Resolved Settings
// =============================================================================

/**
 * Config with defaults applied and every path made absolute
 */
export interface WorkflowSettings {
  workspaceRoot: string
  subject?: string
  subjectAge?: number
  /** Data source handle -> absolute file path */
  sources: Record<string, string>
  pediatricTests: string[]
  artifactsDir: string
  artifactPrefix: string
  artifactExtension: string
  manifestPath: string
  protectEdits: boolean
  markerStrategy: MarkerStrategy
  processorModule?: string
  render: {
    enabled: boolean
    twoStage: boolean
    command: string
    template?: string
    format: string
    outputDir: string
    timeoutMs: number
  }
  enrichment: {
    command?: string
    args: string[]
    waitMs: number
  }
  lockPath: string
}

export function resolveSettings(config: NeuroreportConfig, workspaceRoot: string): WorkflowSettings {
  const full = applyDefaults(config)
  const root = path.resolve(workspaceRoot)
  const fromRoot = (p: string) => path.resolve(root, p)

  const dataDir = fromRoot(full.data?.dir ?? 'data')
  const sources: Record<string, string> = {}
  for (const [source, file] of Object.entries(full.data?.sources ?? {})) {
    sources[source] = path.resolve(dataDir, file)
  }

  const artifactsDir = fromRoot(full.artifacts?.dir ?? '.')

  return {
    workspaceRoot: root,
    subject: full.subject?.label,
    subjectAge: full.subject?.age,
    sources,
    pediatricTests: full.data?.pediatric_tests ?? [],
    artifactsDir,
    artifactPrefix: full.artifacts?.prefix ?? '_02-',
    artifactExtension: full.artifacts?.extension ?? '.qmd',
    manifestPath: path.resolve(artifactsDir, full.artifacts?.manifest ?? '_02-00_domains.qmd'),
    protectEdits: full.generation?.protect_edits ?? true,
    markerStrategy: full.generation?.marker_strategy ?? 'timestamp',
    processorModule: full.generation?.processor ? fromRoot(full.generation.processor) : undefined,
    render: {
      enabled: full.render?.enabled ?? true,
      twoStage: full.render?.two_stage ?? true,
      command: full.render?.command ?? 'quarto',
      template: full.render?.template ? fromRoot(full.render.template) : undefined,
      format: full.render?.format ?? 'typst',
      outputDir: fromRoot(full.render?.output_dir ?? 'output'),
      timeoutMs: full.render?.timeout_ms ?? 600_000
    },
    enrichment: {
      command: full.enrichment?.command,
      args: full.enrichment?.args ?? [],
      waitMs: full.enrichment?.wait_ms ?? 30_000
    },
    lockPath: path.join(root, LOCK_FILE)
  }
}

/**
 * Check if a config directory exists
 */
export function configExists(startDir?: string): boolean {
  return findConfigDir(startDir) !== null
}

/**
 * Create a default config file
 */
export function createDefaultConfig(configDir: string, subject: string): string {
  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true })
  }

  const configPath = path.join(configDir, CONFIG_FILE)
  const yamlContent = `# neuroreport configuration
version: "1"

# Opaque label used for the output file name
subject:
  label: ${JSON.stringify(subject)}
  # age: 21            # overrides adult/child detection from the data

# Tabular sources (CSV, header row required, "domain" column required)
# Supports: \${VAR}, \${VAR:-default}, $VAR
data:
  dir: data
  sources:
    neurocog: neurocog.csv
    neurobehav: neurobehav.csv
    validity: validity.csv
  # pediatric_tests: [basc3_prs_child, basc3_trs_child]

# Generated section files
artifacts:
  dir: .
  prefix: _02-
  extension: .qmd
  manifest: _02-00_domains.qmd

generation:
  protect_edits: true          # never overwrite hand-edited sections
  marker_strategy: timestamp   # timestamp | content-hash
  # processor: ./processors/custom.js

render:
  enabled: true
  two_stage: true
  command: quarto
  # template: template.qmd
  format: typst
  output_dir: output
  timeout_ms: 600000

# Out-of-process text summarization, triggered before the first render pass
enrichment:
  # command: ./scripts/summarize.sh
  # args: []
  wait_ms: 30000

# TIP: machine-specific overrides go in .neuroreport/config.local.yaml (gitignored)
`

  fs.writeFileSync(configPath, yamlContent)
  return configPath
}
