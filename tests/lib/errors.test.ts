/**
 * Tests for the neuroreport error hierarchy
 */

import { describe, it, expect } from 'vitest'
import {
  NeuroreportError,
  ConfigError,
  DataError,
  GenerationError,
  RenderError,
  RunError,
  RegistryError,
  ConfigNotFoundError,
  InvalidConfigError,
  CircularExtendsError,
  ExtendsDepthError,
  InvalidRegistryError,
  UnknownDomainError,
  MissingDataSourceError,
  NoUsableDataError,
  ProtectedEditConflictError,
  ProcessorFailureError,
  ProcessorLoadError,
  RenderFailureError,
  ConcurrentRunDetectedError,
  isNeuroreportError,
  isConfigError,
  isDataError,
  isGenerationError,
  isRenderError,
  formatErrorForCli,
  toError,
  wrapError
} from '../../src/lib/errors.js'

describe('NeuroreportError (base class)', () => {
  it('should create error with message and code', () => {
    const error = new NeuroreportError('test message', 'TEST_CODE')
    expect(error.message).toBe('test message')
    expect(error.code).toBe('TEST_CODE')
    expect(error.name).toBe('NeuroreportError')
    expect(error instanceof Error).toBe(true)
  })

  it('should keep suggestion, context and cause', () => {
    const cause = new Error('root')
    const error = new NeuroreportError('test', 'TEST', {
      suggestion: 'try this',
      context: { foo: 'bar' },
      cause
    })
    expect(error.suggestion).toBe('try this')
    expect(error.context).toEqual({ foo: 'bar' })
    expect(error.cause).toBe(cause)
  })

  it('should format CLI output with suggestion', () => {
    const error = new NeuroreportError('broken', 'TEST', { suggestion: 'fix it' })
    expect(error.toCliOutput()).toBe('Error: broken\n  Suggestion: fix it')
  })

  it('should format CLI output without suggestion', () => {
    expect(new NeuroreportError('broken', 'TEST').toCliOutput()).toBe('Error: broken')
  })

  it('should serialize to JSON', () => {
    const json = new NeuroreportError('broken', 'TEST', { context: { a: 1 } }).toJSON()
    expect(json.name).toBe('NeuroreportError')
    expect(json.code).toBe('TEST')
    expect(json.message).toBe('broken')
    expect(json.context).toEqual({ a: 1 })
  })
})

describe('error families', () => {
  it('config errors', () => {
    const notFound = new ConfigNotFoundError('/w/.neuroreport/config.yaml')
    expect(notFound).toBeInstanceOf(ConfigError)
    expect(notFound.code).toBe('CONFIG_NOT_FOUND')
    expect(notFound.message).toBe('Config file not found: /w/.neuroreport/config.yaml')

    const invalid = new InvalidConfigError('"render.format" must be a string', 'render.format')
    expect(invalid.code).toBe('INVALID_CONFIG')
    expect(invalid.suggestion).toBe('Check the "render.format" entry in .neuroreport/config.yaml')

    expect(new CircularExtendsError('/a.yaml').code).toBe('CIRCULAR_EXTENDS')
    expect(new ExtendsDepthError(10).message).toBe('Config inheritance depth exceeded (max 10)')
  })

  it('registry errors', () => {
    expect(new InvalidRegistryError('dup')).toBeInstanceOf(RegistryError)
    const unknown = new UnknownDomainError('Nope', ['iq', 'memory'])
    expect(unknown.code).toBe('UNKNOWN_DOMAIN')
    expect(unknown.message).toBe('Unknown domain: "Nope"')
    expect(unknown.suggestion).toBe('Known domain keys: iq, memory')
  })

  it('data errors', () => {
    const missing = new MissingDataSourceError('neurocog', '/data/neurocog.csv')
    expect(missing).toBeInstanceOf(DataError)
    expect(missing.code).toBe('MISSING_DATA_SOURCE')
    expect(missing.message).toBe('Data source "neurocog" not found: /data/neurocog.csv')

    expect(new MissingDataSourceError('extra').message).toBe('Data source "extra" is not configured')

    const noData = new NoUsableDataError('memory', 'no scored rows')
    expect(noData.code).toBe('NO_USABLE_DATA')
    expect(noData.message).toBe('No usable data for domain "memory": no scored rows')
  })

  it('generation errors', () => {
    const conflict = new ProtectedEditConflictError('iq', ['/w/_02-01_iq.qmd'])
    expect(conflict).toBeInstanceOf(GenerationError)
    expect(conflict.code).toBe('PROTECTED_EDIT_CONFLICT')
    expect(conflict.artifacts).toEqual(['/w/_02-01_iq.qmd'])

    const failure = new ProcessorFailureError('adhd', 'parent', new Error('boom'))
    expect(failure.message).toBe('Processor failed for domain "adhd" (parent): boom')
    expect(new ProcessorFailureError('iq', 'default', new Error('boom')).message)
      .toBe('Processor failed for domain "iq": boom')

    expect(new ProcessorLoadError('/p.js', 'missing').code).toBe('PROCESSOR_LOAD_FAILED')
  })

  it('render and run errors', () => {
    const render = new RenderFailureError(2, 'exit 1')
    expect(render).toBeInstanceOf(RenderError)
    expect(render.pass).toBe(2)
    expect(render.message).toBe('Render pass 2 failed: exit 1')

    const concurrent = new ConcurrentRunDetectedError('/w/.neuroreport.lock', 'pid 42')
    expect(concurrent).toBeInstanceOf(RunError)
    expect(concurrent.code).toBe('CONCURRENT_RUN')
    expect(concurrent.message).toBe('Another run is in progress (pid 42)')
    expect(new ConcurrentRunDetectedError('/w/.lock').message).toBe('Another run is in progress')
  })
})

describe('type guards', () => {
  it('should narrow by family', () => {
    expect(isNeuroreportError(new InvalidConfigError('x'))).toBe(true)
    expect(isNeuroreportError(new Error('x'))).toBe(false)
    expect(isConfigError(new InvalidConfigError('x'))).toBe(true)
    expect(isDataError(new NoUsableDataError('iq', 'x'))).toBe(true)
    expect(isGenerationError(new ProcessorLoadError('/p', 'x'))).toBe(true)
    expect(isRenderError(new RenderFailureError(1, 'x'))).toBe(true)
    expect(isRenderError(new InvalidConfigError('x'))).toBe(false)
  })
})

describe('helpers', () => {
  it('formatErrorForCli handles every kind of value', () => {
    expect(formatErrorForCli(new NeuroreportError('a', 'X', { suggestion: 'b' })))
      .toBe('Error: a\n  Suggestion: b')
    expect(formatErrorForCli(new Error('plain'))).toBe('Error: plain')
    expect(formatErrorForCli('text')).toBe('Error: text')
  })

  it('toError wraps non-errors', () => {
    const err = new Error('x')
    expect(toError(err)).toBe(err)
    expect(toError(42).message).toBe('42')
  })

  it('wrapError keeps NeuroreportErrors and wraps others', () => {
    const own = new NoUsableDataError('iq', 'x')
    expect(wrapError(own)).toBe(own)

    const wrapped = wrapError(new Error('disk full'), 'WRITE_FAILED')
    expect(wrapped.code).toBe('WRITE_FAILED')
    expect(wrapped.message).toBe('disk full')

    expect(wrapError('odd').code).toBe('UNKNOWN_ERROR')
  })
})
